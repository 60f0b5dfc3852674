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

const logger = createLogger('gemini-provider');

interface GeminiResponse {
    candidates?: Array<{
        content?: { parts?: Array<{ text?: string }> };
    }>;
    usageMetadata?: { totalTokenCount?: number };
}

/**
 * Google Gemini AI Provider implementation
 */
export class GeminiProvider implements AiProvider {
    readonly id = 'gemini' as const;
    readonly name = 'Gemini';
    private apiKey: string;
    private model: string;
    private client: AxiosInstance;

    constructor(providerConfig: Pick<ProviderConfig, 'apiKey' | 'model'>, client?: AxiosInstance) {
        this.apiKey = providerConfig.apiKey;
        this.model = providerConfig.model;
        this.client = client ?? axios.create({
            baseURL: 'https://generativelanguage.googleapis.com/v1',
            headers: {
                'Content-Type': 'application/json',
            },
        });
    }

    isConfigured(): boolean {
        return !!this.apiKey;
    }

    async generate(prompt: string, options?: GenerationOptions): Promise<AdapterResult> {
        logger.debug('Generating completion with Gemini', { promptLength: prompt.length });

        try {
            const systemPrompt = options?.systemPrompt || SYSTEM_PROMPT;
            const fullPrompt = `${systemPrompt}\n\n${prompt}`;

            const response = await this.client.post<GeminiResponse>(
                `/models/${this.model}:generateContent`,
                {
                    contents: [
                        {
                            parts: [{ text: fullPrompt }]
                        }
                    ],
                    generationConfig: {
                        temperature: options?.temperature ?? 0.7,
                        maxOutputTokens: options?.maxTokens ?? 8192,
                    }
                },
                {
                    params: { key: this.apiKey },
                    signal: options?.signal,
                }
            );

            const content = response.data.candidates?.[0]?.content?.parts?.[0]?.text || '';
            if (!content) {
                throw new ProviderError('gemini', 'unknown', 'Gemini returned an empty response');
            }

            const tokensUsed = response.data.usageMetadata?.totalTokenCount ?? 0;
            logger.debug('Gemini completion generated', {
                responseLength: content.length,
                tokens: tokensUsed,
            });

            return { content, tokensUsed };
        } catch (error) {
            const providerError = toProviderError('gemini', 'Gemini', error);
            logger.error('Gemini API error', {
                error: providerError.message,
                kind: providerError.providerKind,
            });
            throw providerError;
        }
    }
}
