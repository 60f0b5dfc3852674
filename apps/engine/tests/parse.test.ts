/**
 * Tests for model response parsing
 */

import { parseJsonResponse, parseScore } from '../src/workflow/parse';

describe('parseJsonResponse', () => {
    it('should read a fenced json block', () => {
        const response = 'Here is the plan:\n```json\n{"title": "Tulips", "tags": ["spring"]}\n```\nEnjoy!';
        expect(parseJsonResponse(response)).toEqual({ title: 'Tulips', tags: ['spring'] });
    });

    it('should read a bare object', () => {
        expect(parseJsonResponse('  {"score": 80}  ')).toEqual({ score: 80 });
    });

    it('should read an object surrounded by prose', () => {
        expect(parseJsonResponse('Sure! {"a": {"b": 1}} Hope this helps.')).toEqual({ a: { b: 1 } });
    });

    it('should keep the raw text when nothing parses', () => {
        expect(parseJsonResponse('no json here')).toEqual({
            error: 'JSON parse failed',
            rawResponse: 'no json here',
        });
    });

    it('should not accept a top-level array', () => {
        expect(parseJsonResponse('[1, 2, 3]')).toEqual({
            error: 'JSON parse failed',
            rawResponse: '[1, 2, 3]',
        });
    });
});

describe('parseScore', () => {
    it('should read a bare number', () => {
        expect(parseScore('85', 75)).toBe(85);
        expect(parseScore(' 92.5\n', 75)).toBe(92.5);
    });

    it('should read a labelled score', () => {
        expect(parseScore('Score: 64', 75)).toBe(64);
        expect(parseScore('I would rate it 70/100.', 75)).toBe(70);
    });

    it('should fall back when there is no usable number', () => {
        expect(parseScore('Excellent work', 75)).toBe(75);
        expect(parseScore('150', 75)).toBe(75);
        expect(parseScore('{"title": "H1 heading"}', 75)).toBe(75);
    });
});
