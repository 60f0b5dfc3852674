import OpenAI from 'openai';
import { createLogger } from '../../logger';
import { classifyHttpStatus, ProviderError } from '../../errors';
import {
    AiProvider,
    AdapterResult,
    GenerationOptions,
    ProviderConfig,
} from './AiProvider';
import { SYSTEM_PROMPT } from './prompts';

const logger = createLogger('openai-provider');

/**
 * OpenAI-based AI Provider implementation
 */
export class OpenAiProvider implements AiProvider {
    readonly id = 'openai' as const;
    readonly name = 'OpenAI';
    private client: OpenAI;
    private model: string;
    private apiKey: string;

    constructor(providerConfig: Pick<ProviderConfig, 'apiKey' | 'model'>) {
        this.apiKey = providerConfig.apiKey;
        this.client = new OpenAI({
            apiKey: providerConfig.apiKey,
            // Fallback to the next provider replaces the SDK's own retries
            maxRetries: 0,
        });
        this.model = providerConfig.model;
    }

    isConfigured(): boolean {
        return !!this.apiKey;
    }

    async generate(prompt: string, options?: GenerationOptions): Promise<AdapterResult> {
        logger.debug('Generating completion', { promptLength: prompt.length });

        try {
            const response = await this.client.chat.completions.create(
                {
                    model: this.model,
                    messages: [
                        { role: 'system', content: options?.systemPrompt || SYSTEM_PROMPT },
                        { role: 'user', content: prompt },
                    ],
                    temperature: options?.temperature ?? 0.7,
                    max_tokens: options?.maxTokens ?? 4096,
                },
                { signal: options?.signal }
            );

            const content = response.choices[0]?.message?.content || '';
            if (!content) {
                throw new ProviderError('openai', 'unknown', 'OpenAI returned an empty response');
            }

            const tokensUsed = response.usage?.total_tokens ?? 0;
            logger.debug('Completion generated', { tokens: tokensUsed });

            return { content, tokensUsed };
        } catch (error) {
            const providerError = toOpenAiProviderError(error);
            logger.error('OpenAI API error', {
                error: providerError.message,
                kind: providerError.providerKind,
            });
            throw providerError;
        }
    }
}

/**
 * Map SDK errors onto the closed provider error set
 */
export function toOpenAiProviderError(error: unknown): ProviderError {
    if (error instanceof ProviderError) {
        return error;
    }

    // Connection and timeout errors carry no status
    if (error instanceof OpenAI.APIConnectionError) {
        return new ProviderError('openai', 'transient', `OpenAI API error: ${error.message}`);
    }

    if (error instanceof OpenAI.APIError) {
        return new ProviderError(
            'openai',
            classifyHttpStatus(error.status),
            `OpenAI API error: ${error.message}`,
            error.status
        );
    }

    const message = error instanceof Error ? error.message : 'Unknown error';
    return new ProviderError('openai', 'unknown', `OpenAI API error: ${message}`);
}
