/**
 * AI Provider Interface
 *
 * Defines the uniform contract every LLM vendor adapter implements.
 * Vendor-specific failures are translated into a ProviderError with one of
 * the kinds below so the orchestrator can log attempts uniformly.
 */

export const PROVIDER_IDS = ['gemini', 'anthropic', 'openai', 'stub'] as const;

export type ProviderId = typeof PROVIDER_IDS[number];

export type ProviderErrorKind = 'rate_limited' | 'auth_failed' | 'transient' | 'unknown';

export function isProviderId(value: string): value is ProviderId {
    return PROVIDER_IDS.some(id => id === value);
}

/**
 * Static identity and limits of one vendor, loaded at process start
 */
export interface ProviderConfig {
    readonly id: ProviderId;
    readonly apiKey: string;
    readonly model: string;
    /** Lower is tried first */
    readonly priority: number;
    /** Requests per calendar day; undefined means unlimited */
    readonly dailyQuota?: number;
    /** Requests per calendar month; undefined means unlimited */
    readonly monthlyQuota?: number;
    /** Estimated USD per request */
    readonly costPerRequest: number;
}

export interface GenerationOptions {
    temperature?: number;
    maxTokens?: number;
    systemPrompt?: string;
    /** Aborted by the orchestrator when the call exceeds its timeout */
    signal?: AbortSignal;
}

export interface AdapterResult {
    content: string;
    tokensUsed: number;
}

export interface AiProvider {
    readonly id: ProviderId;

    /**
     * Provider name for logging
     */
    readonly name: string;

    /**
     * Generate text; throws ProviderError on failure
     */
    generate(prompt: string, options?: GenerationOptions): Promise<AdapterResult>;

    /**
     * Check if the provider is properly configured
     */
    isConfigured(): boolean;
}
