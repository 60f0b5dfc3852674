import { createLogger } from '../../logger';
import { AiProvider, AdapterResult, GenerationOptions } from './AiProvider';

const logger = createLogger('stub-provider');

/**
 * Offline provider for dry runs: answers every prompt with a canned JSON
 * object so the whole workflow can be exercised without API keys.
 */
export class StubProvider implements AiProvider {
    readonly id = 'stub' as const;
    readonly name = 'Stub';

    isConfigured(): boolean {
        return true;
    }

    async generate(prompt: string, options?: GenerationOptions): Promise<AdapterResult> {
        options?.signal?.throwIfAborted();
        logger.debug('Stub completion', { promptLength: prompt.length });

        const topic = prompt.match(/"([^"]+)"/)?.[1] ?? 'the topic';
        const content = JSON.stringify({
            title: `A practical guide to ${topic}`,
            metaDescription: `Everything readers need to know about ${topic}, explained step by step.`,
            sections: [
                { heading: `What is ${topic}?`, content: `An overview of ${topic}.` },
                { heading: `How to get started with ${topic}`, content: 'Practical first steps.' },
            ],
            relatedKeywords: [`${topic} guide`, `${topic} tips`],
            proposedHeadings: [
                { level: 'H1', text: `A practical guide to ${topic}` },
                { level: 'H2', text: `What is ${topic}?` },
            ],
            recommendations: [`Publish a follow-up on ${topic} tips`],
        });

        return { content, tokensUsed: Math.ceil((prompt.length + content.length) / 4) };
    }
}
