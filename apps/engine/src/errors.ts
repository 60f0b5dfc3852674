/**
 * Engine Errors
 *
 * Every error the engine raises to its callers carries a `kind` so the
 * control surface can map it without string matching.
 */

import type { ProviderAttempt } from './orchestration/types';
import type { ProviderErrorKind, ProviderId } from './providers/ai/AiProvider';

export type EngineErrorKind =
    | 'InvalidRequest'
    | 'ProviderRateLimited'
    | 'ProviderAuthFailed'
    | 'ProviderTransient'
    | 'ProviderUnknown'
    | 'AllProvidersExhausted'
    | 'SessionNotFound'
    | 'SessionAlreadyTerminal'
    | 'SessionNotReady'
    | 'ClientRateLimited';

export class EngineError extends Error {
    constructor(
        readonly kind: EngineErrorKind,
        message: string,
    ) {
        super(message);
        this.name = 'EngineError';
    }
}

/**
 * Caller error; never retried and never recorded in an attempt log
 */
export class InvalidRequestError extends EngineError {
    constructor(message: string) {
        super('InvalidRequest', message);
        this.name = 'InvalidRequestError';
    }
}

const PROVIDER_ERROR_KINDS: Record<ProviderErrorKind, EngineErrorKind> = {
    rate_limited: 'ProviderRateLimited',
    auth_failed: 'ProviderAuthFailed',
    transient: 'ProviderTransient',
    unknown: 'ProviderUnknown',
};

/**
 * Raised by adapters; vendor failures are translated into one of four kinds.
 */
export class ProviderError extends EngineError {
    constructor(
        readonly provider: ProviderId,
        readonly providerKind: ProviderErrorKind,
        message: string,
        readonly statusCode?: number,
    ) {
        super(PROVIDER_ERROR_KINDS[providerKind], message);
        this.name = 'ProviderError';
    }
}

export class AllProvidersExhaustedError extends EngineError {
    constructor(
        readonly attempts: ProviderAttempt[],
        message = 'All providers failed',
    ) {
        super('AllProvidersExhausted', message);
        this.name = 'AllProvidersExhaustedError';
    }
}

export class SessionNotFoundError extends EngineError {
    constructor(readonly sessionId: string) {
        super('SessionNotFound', `Session not found: ${sessionId}`);
        this.name = 'SessionNotFoundError';
    }
}

export class SessionAlreadyTerminalError extends EngineError {
    constructor(readonly sessionId: string, readonly status: string) {
        super('SessionAlreadyTerminal', `Session ${sessionId} is already ${status}`);
        this.name = 'SessionAlreadyTerminalError';
    }
}

export class SessionNotReadyError extends EngineError {
    constructor(readonly sessionId: string, readonly status: string) {
        super('SessionNotReady', `Session ${sessionId} has no results yet (status: ${status})`);
        this.name = 'SessionNotReadyError';
    }
}

export class ClientRateLimitedError extends EngineError {
    constructor(readonly clientId: string, readonly retryAfterSeconds: number) {
        super('ClientRateLimited', `Rate limit exceeded for ${clientId}, retry in ${retryAfterSeconds}s`);
        this.name = 'ClientRateLimitedError';
    }
}

/**
 * Map an HTTP status code onto the closed provider error set
 */
export function classifyHttpStatus(status: number | undefined): ProviderErrorKind {
    if (status === undefined) return 'transient';
    if (status === 429) return 'rate_limited';
    if (status === 401 || status === 403) return 'auth_failed';
    if (status === 408 || status === 409 || status >= 500) return 'transient';
    return 'unknown';
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : 'Unknown error';
}
