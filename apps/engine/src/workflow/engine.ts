/**
 * Workflow Engine
 *
 * Drives sessions through research → planning → writing → editing →
 * publishing → analysis → improvement. Each session runs as its own
 * promise chain; steps inside a session run strictly one after another and
 * each step's write is persisted before the next step starts.
 */

import { v4 as uuid } from 'uuid';
import { createLogger } from '../logger';
import {
    AllProvidersExhaustedError,
    ClientRateLimitedError,
    errorMessage,
    InvalidRequestError,
    SessionAlreadyTerminalError,
    SessionNotFoundError,
    SessionNotReadyError,
} from '../errors';
import { ProviderOrchestrator } from '../orchestration/ProviderOrchestrator';
import { GenerationSuccess } from '../orchestration/types';
import { ProviderId } from '../providers/ai/AiProvider';
import { RateLimiter } from '../ratelimit/RateLimiter';
import { SessionStore } from './sessionStore';
import { nextStep, STEP_DEFINITIONS, StepContext, StepDefinition, StepSettings } from './steps';
import {
    ErrorDetail,
    isTerminal,
    SessionStatusView,
    StepName,
    StepResult,
    WORKFLOW_STEPS,
    WorkflowSession,
} from './types';

const logger = createLogger('workflow-engine');

export interface WorkflowEngineOptions {
    orchestrator: ProviderOrchestrator;
    store: SessionStore;
    /** Throttles startWorkflow per client when set */
    rateLimiter?: RateLimiter;
    settings?: Partial<StepSettings>;
}

export interface StartWorkflowOptions {
    preferredProvider?: ProviderId;
}

const DEFAULT_SETTINGS: StepSettings = {
    writingMaxIterations: 3,
    writingQualityThreshold: 75,
};

export class WorkflowEngine {
    private readonly orchestrator: ProviderOrchestrator;
    private readonly store: SessionStore;
    private readonly rateLimiter?: RateLimiter;
    private readonly settings: StepSettings;
    private readonly running = new Map<string, Promise<void>>();
    private readonly cancelRequested = new Set<string>();

    constructor(options: WorkflowEngineOptions) {
        this.orchestrator = options.orchestrator;
        this.store = options.store;
        this.rateLimiter = options.rateLimiter;
        this.settings = { ...DEFAULT_SETTINGS, ...options.settings };
    }

    /**
     * Create a session and run it in the background; returns its id
     */
    async startWorkflow(topic: string, clientId: string, options: StartWorkflowOptions = {}): Promise<string> {
        const trimmedTopic = topic.trim();
        if (!trimmedTopic) {
            throw new InvalidRequestError('Topic must not be empty');
        }
        if (!clientId.trim()) {
            throw new InvalidRequestError('Client id must not be empty');
        }
        if (options.preferredProvider && !this.orchestrator.listProviders().includes(options.preferredProvider)) {
            throw new InvalidRequestError(`Preferred provider is not configured: ${options.preferredProvider}`);
        }

        if (this.rateLimiter) {
            const limit = this.rateLimiter.check(clientId);
            if (!limit.allowed) {
                logger.warn('Workflow launch rate limited', { clientId, retryAfterSeconds: limit.retryAfterSeconds });
                throw new ClientRateLimitedError(clientId, limit.retryAfterSeconds);
            }
        }

        const now = new Date();
        const session: WorkflowSession = {
            id: uuid(),
            topic: trimmedTopic,
            clientId,
            status: 'started',
            currentStep: WORKFLOW_STEPS[0],
            progress: 0,
            results: {},
            preferredProvider: options.preferredProvider,
            createdAt: now,
            updatedAt: now,
        };
        await this.store.save(session);

        logger.info('Workflow started', { sessionId: session.id, topic: session.topic, clientId });

        const run = this.execute(session)
            .catch(error => this.abandon(session, error))
            .finally(() => {
                this.running.delete(session.id);
                this.cancelRequested.delete(session.id);
            });
        this.running.set(session.id, run);

        return session.id;
    }

    async getStatus(sessionId: string): Promise<SessionStatusView> {
        const session = await this.load(sessionId);
        return toStatusView(session);
    }

    /**
     * Full session payload; only available once the session is terminal
     */
    async getResults(sessionId: string): Promise<WorkflowSession> {
        const session = await this.load(sessionId);
        if (!isTerminal(session.status)) {
            throw new SessionNotReadyError(sessionId, session.status);
        }
        return session;
    }

    /**
     * Request cancellation. A running session stops at its next step
     * boundary; the call in flight is allowed to finish first.
     */
    async cancel(sessionId: string): Promise<SessionStatusView> {
        const session = await this.load(sessionId);
        if (isTerminal(session.status)) {
            throw new SessionAlreadyTerminalError(sessionId, session.status);
        }

        if (this.running.has(sessionId)) {
            this.cancelRequested.add(sessionId);
            logger.info('Cancellation requested', { sessionId, step: session.currentStep });
            return toStatusView(session);
        }

        // Nobody is driving this session (e.g. persisted by an earlier process)
        const latest = await this.load(sessionId);
        if (isTerminal(latest.status)) {
            throw new SessionAlreadyTerminalError(sessionId, latest.status);
        }
        if (!(await this.finish(latest, cancelledDetail(latest.currentStep)))) {
            const current = await this.load(sessionId);
            throw new SessionAlreadyTerminalError(sessionId, current.status);
        }
        return toStatusView(latest);
    }

    async deleteSession(sessionId: string): Promise<void> {
        await this.load(sessionId);

        if (this.running.has(sessionId)) {
            this.cancelRequested.add(sessionId);
        }
        await this.store.delete(sessionId);

        logger.info('Session deleted', { sessionId });
    }

    /**
     * Resolve once the session's background run has ended
     */
    async waitForCompletion(sessionId: string): Promise<WorkflowSession> {
        const run = this.running.get(sessionId);
        if (run) {
            await run;
        }
        return this.load(sessionId);
    }

    isRunning(sessionId: string): boolean {
        return this.running.has(sessionId);
    }

    /**
     * Delete terminal sessions not updated within `ttlMs`
     */
    async purgeExpired(ttlMs: number, now: Date = new Date()): Promise<number> {
        const expired = await this.store.list({
            statuses: ['completed', 'error'],
            updatedBefore: new Date(now.getTime() - ttlMs),
        });

        for (const session of expired) {
            await this.store.delete(session.id);
        }

        if (expired.length > 0) {
            logger.info('Purged expired sessions', { count: expired.length });
        }
        return expired.length;
    }

    private async execute(session: WorkflowSession): Promise<void> {
        for (const [index, step] of STEP_DEFINITIONS.entries()) {
            if (await this.shouldStop(session)) return;

            session.status = 'in_progress';
            session.currentStep = step.name;
            session.updatedAt = new Date();
            if (!(await this.persist(session))) return;

            logger.info('Step started', { sessionId: session.id, step: step.name });

            let result: StepResult;
            try {
                result = await this.runStep(session, step);
            } catch (error) {
                if (await this.shouldStop(session)) return;
                await this.finish(session, failureDetail(step.name, error));
                return;
            }

            // Cancellation is honoured once the in-flight step returns; its output is dropped
            if (await this.shouldStop(session)) return;

            session.results[step.name] = result;
            session.progress = Math.round(((index + 1) / WORKFLOW_STEPS.length) * 100);

            const next = nextStep(step.name);
            if (next) {
                session.currentStep = next;
                session.updatedAt = new Date();
                if (!(await this.persist(session))) return;
            } else if (!(await this.finish(session))) {
                return;
            }

            logger.info('Step completed', {
                sessionId: session.id,
                step: step.name,
                provider: result.providerUsed,
                progress: session.progress,
            });
        }
    }

    private async runStep(session: WorkflowSession, step: StepDefinition): Promise<StepResult> {
        let tokensUsed = 0;
        let costUsd = 0;

        const inputs: StepContext['inputs'] = {};
        for (const dependency of step.dependsOn) {
            inputs[dependency] = session.results[dependency];
        }

        const context: StepContext = {
            topic: session.topic,
            inputs,
            settings: this.settings,
            generate: async (prompt, options = {}): Promise<GenerationSuccess> => {
                const result = await this.orchestrator.generate({
                    prompt,
                    preferredProvider: session.preferredProvider,
                    maxTokens: options.maxTokens,
                    temperature: options.temperature,
                });
                if (!result.success) {
                    throw new AllProvidersExhaustedError(result.attempts, result.error);
                }
                tokensUsed += result.usage.tokensUsed;
                costUsd += result.usage.costUsd;
                return result;
            },
        };

        const output = await step.run(context);
        return {
            step: step.name,
            content: output.content,
            data: output.data,
            providerUsed: output.providerUsed,
            tokensUsed,
            costUsd,
            completedAt: new Date(),
        };
    }

    /**
     * True when the run must not touch the session any more: it was
     * deleted, finalised elsewhere, or cancellation was requested (in
     * which case it is marked cancelled here).
     */
    private async shouldStop(session: WorkflowSession): Promise<boolean> {
        const stored = await this.store.get(session.id);
        if (!stored) {
            logger.info('Session removed while running, stopping', { sessionId: session.id });
            return true;
        }
        if (isTerminal(stored.status)) {
            return true;
        }
        if (this.cancelRequested.has(session.id)) {
            await this.finish(session, cancelledDetail(session.currentStep));
            return true;
        }
        return false;
    }

    /**
     * Write a running session; false once it was deleted or finalised
     * elsewhere, in which case the run must stop
     */
    private async persist(session: WorkflowSession): Promise<boolean> {
        const written = await this.store.saveIfActive(session);
        if (!written) {
            logger.info('Session changed elsewhere, stopping', { sessionId: session.id, step: session.currentStep });
        }
        return written;
    }

    /**
     * The run itself failed, usually on a store write. Try to leave the
     * session in `error` rather than in progress.
     */
    private async abandon(session: WorkflowSession, error: unknown): Promise<void> {
        const message = errorMessage(error);
        logger.error('Workflow run crashed', { sessionId: session.id, step: session.currentStep, error: message });

        try {
            await this.finish(session, { reason: 'step_failed', step: session.currentStep, message, attempts: [] });
        } catch (finishError) {
            logger.error('Could not mark crashed workflow as failed', {
                sessionId: session.id,
                error: errorMessage(finishError),
            });
        }
    }

    /**
     * Move the session to its terminal state; no writes happen afterwards.
     * False when the session was already gone or terminal.
     */
    private async finish(session: WorkflowSession, errorDetail?: ErrorDetail): Promise<boolean> {
        const now = new Date();
        session.status = errorDetail ? 'error' : 'completed';
        session.errorDetail = errorDetail;
        session.updatedAt = now;
        session.completedAt = now;
        if (!(await this.persist(session))) {
            return false;
        }

        if (errorDetail) {
            logger.warn('Workflow ended with error', {
                sessionId: session.id,
                step: errorDetail.step,
                reason: errorDetail.reason,
                message: errorDetail.message,
            });
        } else {
            logger.info('Workflow completed', { sessionId: session.id, topic: session.topic });
        }
        return true;
    }

    private async load(sessionId: string): Promise<WorkflowSession> {
        const session = await this.store.get(sessionId);
        if (!session) {
            throw new SessionNotFoundError(sessionId);
        }
        return session;
    }
}

function cancelledDetail(step: StepName): ErrorDetail {
    return { reason: 'cancelled', step, message: 'cancelled', attempts: [] };
}

function failureDetail(step: StepName, error: unknown): ErrorDetail {
    if (error instanceof AllProvidersExhaustedError) {
        return {
            reason: 'providers_exhausted',
            step,
            message: error.message,
            attempts: error.attempts,
        };
    }
    return { reason: 'step_failed', step, message: errorMessage(error), attempts: [] };
}

export function toStatusView(session: WorkflowSession): SessionStatusView {
    return {
        sessionId: session.id,
        topic: session.topic,
        status: session.status,
        currentStep: session.currentStep,
        progress: session.progress,
        updatedAt: session.updatedAt,
        errorDetail: session.errorDetail,
    };
}
