/**
 * Provider Orchestrator
 *
 * Tries the configured LLM providers in priority order, skipping those over
 * quota and falling back past those that fail. Provider failures never
 * escape this class: they end up in the attempt log of the result.
 */

import { createLogger } from '../logger';
import { errorMessage, InvalidRequestError, ProviderError } from '../errors';
import { AdapterResult, ProviderErrorKind, ProviderId } from '../providers/ai/AiProvider';
import { ProviderRegistration } from '../providers/ai/factory';
import { CONNECTION_TEST_PROMPT } from '../providers/ai/prompts';
import {
    AttemptReason,
    GenerationRequest,
    GenerationResult,
    ProviderAttempt,
    ProviderStatistics,
} from './types';
import { UsageTracker } from './UsageTracker';

const logger = createLogger('provider-orchestrator');

const ATTEMPT_REASONS: Record<ProviderErrorKind, AttemptReason> = {
    rate_limited: 'rate_limited',
    auth_failed: 'auth_failed',
    transient: 'transient_error',
    unknown: 'unknown_error',
};

export interface OrchestratorOptions {
    /** Per-call timeout; a timeout counts as a transient failure */
    timeoutMs?: number;
    /** Extra attempts on the same provider after a transient failure */
    retriesPerProvider?: number;
    /** Backoff before the first same-provider retry, doubled each time */
    retryBaseDelayMs?: number;
}

export interface ConnectionTestResult {
    provider: ProviderId;
    success: boolean;
    error?: string;
}

export class ProviderOrchestrator {
    private readonly providers: ProviderRegistration[];
    private readonly timeoutMs: number;
    private readonly retriesPerProvider: number;
    private readonly retryBaseDelayMs: number;

    constructor(
        registrations: ProviderRegistration[],
        private readonly usageTracker: UsageTracker,
        options: OrchestratorOptions = {},
    ) {
        // Array.prototype.sort is stable: equal priorities keep configuration order
        this.providers = [...registrations].sort((a, b) => a.config.priority - b.config.priority);
        this.timeoutMs = options.timeoutMs ?? 30000;
        this.retriesPerProvider = Math.max(0, options.retriesPerProvider ?? 0);
        this.retryBaseDelayMs = options.retryBaseDelayMs ?? 1000;
    }

    /**
     * Provider ids in the order they are tried by default
     */
    listProviders(): ProviderId[] {
        return this.providers.map(p => p.config.id);
    }

    async generate(request: GenerationRequest): Promise<GenerationResult> {
        this.validate(request);

        const attempts: ProviderAttempt[] = [];
        const startedAt = Date.now();

        for (const registration of this.candidates(request.preferredProvider)) {
            const { config: providerConfig } = registration;
            const provider = providerConfig.id;

            const reservation = this.usageTracker.reserve(provider);
            if (!reservation) {
                logger.info('Provider over quota, skipping', { provider });
                attempts.push({ provider, reason: 'over_quota', message: 'Usage quota exhausted', retries: 0 });
                continue;
            }

            let outcome: AdapterResult | ProviderAttempt;
            try {
                outcome = await this.callProvider(registration, request);
                if ('content' in outcome) {
                    reservation.commit({ tokens: outcome.tokensUsed, costUsd: providerConfig.costPerRequest });
                }
            } finally {
                // No-op after a commit
                reservation.release();
            }

            if (!('content' in outcome)) {
                attempts.push(outcome);
                continue;
            }

            if (attempts.length > 0) {
                logger.info('Generation succeeded after fallback', {
                    provider,
                    skipped: attempts.map(a => `${a.provider}:${a.reason}`),
                });
            }

            return {
                success: true,
                providerUsed: provider,
                content: outcome.content,
                usage: { tokensUsed: outcome.tokensUsed, costUsd: providerConfig.costPerRequest },
                attempts,
                durationMs: Date.now() - startedAt,
            };
        }

        const allOverQuota = attempts.length > 0 && attempts.every(a => a.reason === 'over_quota');
        const error = allOverQuota
            ? 'All providers are over quota'
            : `All providers failed. Last error: ${attempts[attempts.length - 1]?.message ?? 'no providers configured'}`;

        logger.error('Generation failed on every provider', {
            attempts: attempts.map(a => `${a.provider}:${a.reason}`),
        });

        return { success: false, attempts, error };
    }

    /**
     * Quotas, usage and last use for every configured provider
     */
    getProviderStatistics(): ProviderStatistics[] {
        return this.providers.map(({ config: providerConfig, adapter }) => ({
            ...this.usageTracker.getUsage(providerConfig.id),
            configured: adapter.isConfigured(),
            priority: providerConfig.priority,
            model: providerConfig.model,
            withinQuota: this.usageTracker.isWithinQuota(providerConfig.id),
        }));
    }

    /**
     * Send a trivial prompt to every provider; usage is not recorded
     */
    async testConnections(): Promise<ConnectionTestResult[]> {
        const results: ConnectionTestResult[] = [];

        for (const { config: providerConfig, adapter } of this.providers) {
            try {
                await this.callWithTimeout(providerConfig.id, adapter.name, signal =>
                    adapter.generate(CONNECTION_TEST_PROMPT, { maxTokens: 16, temperature: 0, signal })
                );
                results.push({ provider: providerConfig.id, success: true });
            } catch (error) {
                results.push({ provider: providerConfig.id, success: false, error: errorMessage(error) });
            }
        }

        return results;
    }

    /**
     * Call one provider, retrying transient failures when configured.
     * Resolves with the adapter result or the attempt entry to log.
     */
    private async callProvider(
        { config: providerConfig, adapter }: ProviderRegistration,
        request: GenerationRequest,
    ): Promise<AdapterResult | ProviderAttempt> {
        const provider = providerConfig.id;
        let retries = 0;

        for (;;) {
            try {
                return await this.callWithTimeout(provider, adapter.name, signal =>
                    adapter.generate(request.prompt, {
                        maxTokens: request.maxTokens,
                        temperature: request.temperature,
                        systemPrompt: request.systemPrompt,
                        signal,
                    })
                );
            } catch (error) {
                const kind: ProviderErrorKind = error instanceof ProviderError ? error.providerKind : 'unknown';

                if (kind === 'transient' && retries < this.retriesPerProvider) {
                    const delayMs = this.retryBaseDelayMs * 2 ** retries;
                    retries++;
                    logger.warn('Transient provider error, retrying', { provider, retries, delayMs });
                    await new Promise(resolve => setTimeout(resolve, delayMs));
                    continue;
                }

                logger.warn('Provider failed, falling back', {
                    provider,
                    kind,
                    error: errorMessage(error),
                });
                return { provider, reason: ATTEMPT_REASONS[kind], message: errorMessage(error), retries };
            }
        }
    }

    private validate(request: GenerationRequest): void {
        if (!request.prompt || request.prompt.trim().length === 0) {
            throw new InvalidRequestError('Prompt must not be empty');
        }

        if (request.preferredProvider !== undefined
            && !this.providers.some(p => p.config.id === request.preferredProvider)) {
            throw new InvalidRequestError(`Preferred provider is not configured: ${request.preferredProvider}`);
        }

        if (request.maxTokens !== undefined && (!Number.isInteger(request.maxTokens) || request.maxTokens <= 0)) {
            throw new InvalidRequestError('maxTokens must be a positive integer');
        }

        if (request.temperature !== undefined && (request.temperature < 0 || request.temperature > 2)) {
            throw new InvalidRequestError('temperature must be between 0 and 2');
        }
    }

    /**
     * Preferred provider first, then the rest by ascending priority
     */
    private candidates(preferred?: ProviderId): ProviderRegistration[] {
        if (!preferred) {
            return this.providers;
        }

        const first = this.providers.filter(p => p.config.id === preferred);
        const rest = this.providers.filter(p => p.config.id !== preferred);
        return [...first, ...rest];
    }

    private async callWithTimeout(
        provider: ProviderId,
        name: string,
        call: (signal: AbortSignal) => Promise<AdapterResult>,
    ): Promise<AdapterResult> {
        const controller = new AbortController();
        const timeoutError = new ProviderError(provider, 'transient', `${name} timed out after ${this.timeoutMs}ms`);
        let timer: NodeJS.Timeout | undefined;

        const timeout = new Promise<never>((_, reject) => {
            timer = setTimeout(() => {
                reject(timeoutError);
                controller.abort();
            }, this.timeoutMs);
        });

        try {
            return await Promise.race([call(controller.signal), timeout]);
        } catch (error) {
            // An adapter reacting to the abort must not mask the timeout
            throw controller.signal.aborted ? timeoutError : error;
        } finally {
            clearTimeout(timer);
        }
    }
}
