/**
 * Engine bootstrap
 *
 * Wires configuration into the provider registry, usage tracker,
 * orchestrator, session store, rate limiter and workflow engine.
 */

import config, { loadProviderConfigs, stubProviderConfig } from './config';
import { createLogger } from './logger';
import { ProviderOrchestrator } from './orchestration/ProviderOrchestrator';
import { UsageTracker } from './orchestration/UsageTracker';
import { createProviderRegistrations, ProviderConfig } from './providers/ai';
import { RateLimiter } from './ratelimit/RateLimiter';
import { PostgresSessionStore } from './storage/PostgresSessionStore';
import { WorkflowEngine } from './workflow/engine';
import { InMemorySessionStore, SessionStore } from './workflow/sessionStore';

const logger = createLogger('app');

export interface EngineContext {
    engine: WorkflowEngine;
    orchestrator: ProviderOrchestrator;
    usageTracker: UsageTracker;
    rateLimiter: RateLimiter;
    store: SessionStore;
}

export interface CreateEngineOptions {
    /** Use the offline stub provider instead of the configured vendors */
    stub?: boolean;
    providers?: ProviderConfig[];
    store?: SessionStore;
}

export function createSessionStore(kind: typeof config.workflow.store = config.workflow.store): SessionStore {
    return kind === 'postgres' ? new PostgresSessionStore() : new InMemorySessionStore();
}

export function createEngine(options: CreateEngineOptions = {}): EngineContext {
    const providerConfigs = options.providers
        ?? (options.stub ? [stubProviderConfig()] : loadProviderConfigs());

    const registrations = createProviderRegistrations(providerConfigs);
    if (registrations.length === 0) {
        throw new Error('No AI providers configured');
    }

    const usageTracker = new UsageTracker(providerConfigs, { timezone: config.usage.timezone });
    const orchestrator = new ProviderOrchestrator(registrations, usageTracker, {
        timeoutMs: config.ai.timeoutMs,
        retriesPerProvider: config.ai.retriesPerProvider,
        retryBaseDelayMs: config.ai.retryBaseDelayMs,
    });
    const store = options.store ?? createSessionStore();
    const rateLimiter = new RateLimiter({
        maxCalls: config.rateLimit.maxCalls,
        windowSeconds: config.rateLimit.windowSeconds,
    });
    const engine = new WorkflowEngine({
        orchestrator,
        store,
        rateLimiter,
        settings: {
            writingMaxIterations: config.workflow.writingMaxIterations,
            writingQualityThreshold: config.workflow.writingQualityThreshold,
        },
    });

    logger.info('Engine assembled', {
        providers: orchestrator.listProviders(),
        store: store.name,
    });

    return { engine, orchestrator, usageTracker, rateLimiter, store };
}

export default { createEngine, createSessionStore };
