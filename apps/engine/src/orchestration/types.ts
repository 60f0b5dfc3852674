/**
 * Orchestration Types
 */

import { ProviderId } from '../providers/ai/AiProvider';

export interface GenerationRequest {
    prompt: string;
    /** Tried first, ahead of the priority order */
    preferredProvider?: ProviderId;
    maxTokens?: number;
    temperature?: number;
    systemPrompt?: string;
}

/**
 * Why a candidate did not produce the result
 */
export type AttemptReason =
    | 'over_quota'
    | 'rate_limited'
    | 'auth_failed'
    | 'transient_error'
    | 'unknown_error';

export interface ProviderAttempt {
    provider: ProviderId;
    reason: AttemptReason;
    message: string;
    /** Same-provider retries spent before giving up */
    retries: number;
}

export interface GenerationUsage {
    tokensUsed: number;
    costUsd: number;
}

export interface GenerationSuccess {
    success: true;
    providerUsed: ProviderId;
    content: string;
    usage: GenerationUsage;
    /** Candidates skipped or failed before the winner */
    attempts: ProviderAttempt[];
    durationMs: number;
}

export interface GenerationFailure {
    success: false;
    attempts: ProviderAttempt[];
    error: string;
}

export type GenerationResult = GenerationSuccess | GenerationFailure;

/**
 * One accounting entry; never mutated after creation
 */
export interface UsageRecord {
    readonly provider: ProviderId;
    readonly requests: number;
    readonly tokens: number;
    readonly costUsd: number;
    readonly timestamp: Date;
}

export interface ProviderUsage {
    provider: ProviderId;
    dailyRequests: number;
    monthlyRequests: number;
    dailyTokens: number;
    monthlyTokens: number;
    monthlyCostUsd: number;
    dailyQuota?: number;
    monthlyQuota?: number;
    /** Slots held by calls still in flight */
    reservedRequests: number;
    lastUsedAt?: Date;
}

export interface ProviderStatistics extends ProviderUsage {
    configured: boolean;
    priority: number;
    model: string;
    withinQuota: boolean;
}
