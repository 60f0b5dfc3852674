/**
 * Workflow Types
 *
 * Shared type definitions for the seven-step content workflow.
 */

import { ProviderAttempt } from '../orchestration/types';
import { ProviderId } from '../providers/ai/AiProvider';

export const WORKFLOW_STEPS = [
    'research',
    'planning',
    'writing',
    'editing',
    'publishing',
    'analysis',
    'improvement',
] as const;

export type StepName = typeof WORKFLOW_STEPS[number];

export type SessionStatus = 'started' | 'in_progress' | 'completed' | 'error';

export type StepData = Record<string, unknown>;

/**
 * Output of one completed step
 */
export interface StepResult {
    step: StepName;
    /** Raw model output of the step's final call */
    content: string;
    /** Parsed JSON object, or `{ error, rawResponse }` when unparsable */
    data: StepData;
    providerUsed: ProviderId;
    tokensUsed: number;
    costUsd: number;
    completedAt: Date;
}

export type ErrorReason = 'providers_exhausted' | 'cancelled' | 'step_failed';

export interface ErrorDetail {
    reason: ErrorReason;
    step?: StepName;
    message: string;
    /** Ordered providers tried by the failing call and why each failed */
    attempts: ProviderAttempt[];
}

export interface WorkflowSession {
    id: string;
    topic: string;
    clientId: string;
    status: SessionStatus;
    currentStep: StepName;
    /** 0-100, derived from completed steps */
    progress: number;
    results: Partial<Record<StepName, StepResult>>;
    errorDetail?: ErrorDetail;
    preferredProvider?: ProviderId;
    createdAt: Date;
    updatedAt: Date;
    completedAt?: Date;
}

export interface SessionStatusView {
    sessionId: string;
    topic: string;
    status: SessionStatus;
    currentStep: StepName;
    progress: number;
    updatedAt: Date;
    errorDetail?: ErrorDetail;
}

export function isTerminal(status: SessionStatus): boolean {
    return status === 'completed' || status === 'error';
}
