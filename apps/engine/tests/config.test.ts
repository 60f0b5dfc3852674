/**
 * Tests for provider configuration loading
 */

import { loadProviderConfigs, stubProviderConfig } from '../src/config';

describe('loadProviderConfigs', () => {
    it('should only return providers with an API key', () => {
        const configs = loadProviderConfigs({
            GEMINI_API_KEY: 'test-secret',
            OPENAI_API_KEY: 'test-secret',
        });

        expect(configs.map(c => c.id)).toEqual(['gemini', 'openai']);
    });

    it('should apply defaults for missing settings', () => {
        const [gemini] = loadProviderConfigs({ GEMINI_API_KEY: 'test-secret' });

        expect(gemini).toEqual({
            id: 'gemini',
            apiKey: 'test-secret',
            model: 'gemini-1.5-flash',
            priority: 1,
            costPerRequest: 0.0005,
            dailyQuota: undefined,
            monthlyQuota: undefined,
        });
    });

    it('should read overrides and quotas', () => {
        const [anthropic] = loadProviderConfigs({
            ANTHROPIC_API_KEY: 'test-secret',
            ANTHROPIC_MODEL: 'claude-test',
            ANTHROPIC_PRIORITY: '0',
            ANTHROPIC_DAILY_QUOTA: '100',
            ANTHROPIC_MONTHLY_QUOTA: '2000',
            ANTHROPIC_COST_PER_REQUEST: '0.02',
        });

        expect(anthropic).toMatchObject({
            id: 'anthropic',
            model: 'claude-test',
            priority: 0,
            dailyQuota: 100,
            monthlyQuota: 2000,
            costPerRequest: 0.02,
        });
        expect(Object.isFrozen(anthropic)).toBe(true);
    });

    it('should never include the stub provider', () => {
        expect(loadProviderConfigs({ STUB_API_KEY: 'test-secret' })).toEqual([]);
        expect(stubProviderConfig()).toMatchObject({ id: 'stub', costPerRequest: 0 });
    });
});
