import axios, { AxiosInstance } from 'axios';
import { createLogger } from '../../logger';
import { ProviderError } from '../../errors';
import {
    AiProvider,
    AdapterResult,
    GenerationOptions,
    ProviderConfig,
} from './AiProvider';
import { SYSTEM_PROMPT } from './prompts';
import { toProviderError } from './httpErrors';

const logger = createLogger('anthropic-provider');

const ANTHROPIC_VERSION = '2023-06-01';

interface AnthropicResponse {
    content?: Array<{ type: string; text?: string }>;
    usage?: { input_tokens?: number; output_tokens?: number };
}

/**
 * Anthropic Claude provider over the Messages REST API
 */
export class AnthropicProvider implements AiProvider {
    readonly id = 'anthropic' as const;
    readonly name = 'Anthropic';
    private apiKey: string;
    private model: string;
    private client: AxiosInstance;

    constructor(providerConfig: Pick<ProviderConfig, 'apiKey' | 'model'>, client?: AxiosInstance) {
        this.apiKey = providerConfig.apiKey;
        this.model = providerConfig.model;
        this.client = client ?? axios.create({
            baseURL: 'https://api.anthropic.com/v1',
            headers: {
                'Content-Type': 'application/json',
            },
        });
    }

    isConfigured(): boolean {
        return !!this.apiKey;
    }

    async generate(prompt: string, options?: GenerationOptions): Promise<AdapterResult> {
        logger.debug('Generating completion with Anthropic', { promptLength: prompt.length });

        try {
            const response = await this.client.post<AnthropicResponse>(
                '/messages',
                {
                    model: this.model,
                    system: options?.systemPrompt || SYSTEM_PROMPT,
                    messages: [{ role: 'user', content: prompt }],
                    max_tokens: options?.maxTokens ?? 4096,
                    temperature: options?.temperature ?? 0.7,
                },
                {
                    headers: {
                        'x-api-key': this.apiKey,
                        'anthropic-version': ANTHROPIC_VERSION,
                    },
                    signal: options?.signal,
                }
            );

            const content = (response.data.content ?? [])
                .filter(block => block.type === 'text')
                .map(block => block.text ?? '')
                .join('');
            if (!content) {
                throw new ProviderError('anthropic', 'unknown', 'Anthropic returned an empty response');
            }

            const usage = response.data.usage;
            const tokensUsed = (usage?.input_tokens ?? 0) + (usage?.output_tokens ?? 0);
            logger.debug('Anthropic completion generated', {
                responseLength: content.length,
                tokens: tokensUsed,
            });

            return { content, tokensUsed };
        } catch (error) {
            const providerError = toProviderError('anthropic', 'Anthropic', error);
            logger.error('Anthropic API error', {
                error: providerError.message,
                kind: providerError.providerKind,
            });
            throw providerError;
        }
    }
}
