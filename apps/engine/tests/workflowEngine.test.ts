/**
 * Tests for WorkflowEngine
 */

import {
    ClientRateLimitedError,
    InvalidRequestError,
    SessionAlreadyTerminalError,
    SessionNotFoundError,
    SessionNotReadyError,
} from '../src/errors';
import { ProviderOrchestrator } from '../src/orchestration/ProviderOrchestrator';
import { UsageTracker } from '../src/orchestration/UsageTracker';
import { StubProvider } from '../src/providers/ai/StubProvider';
import { RateLimiter } from '../src/ratelimit/RateLimiter';
import { WorkflowEngine } from '../src/workflow/engine';
import { InMemorySessionStore } from '../src/workflow/sessionStore';
import { WORKFLOW_STEPS, WorkflowSession } from '../src/workflow/types';
import { deferred, fail, gated, providerConfig, registration, Script, succeed } from './fakes';

/**
 * Keeps a copy of every saved state
 */
class RecordingStore extends InMemorySessionStore {
    readonly saved: WorkflowSession[] = [];

    async save(session: WorkflowSession): Promise<void> {
        this.saved.push(structuredClone(session));
        await super.save(session);
    }

    async saveIfActive(session: WorkflowSession): Promise<boolean> {
        const written = await super.saveIfActive(session);
        if (written) {
            this.saved.push(structuredClone(session));
        }
        return written;
    }
}

/**
 * Fails every write from the `failFrom`-th on (1-based), up to `failUntil`
 */
class FlakyStore extends InMemorySessionStore {
    private writes = 0;

    constructor(private readonly failFrom: number, private readonly failUntil = failFrom) {
        super();
    }

    async save(session: WorkflowSession): Promise<void> {
        this.countWrite();
        await super.save(session);
    }

    async saveIfActive(session: WorkflowSession): Promise<boolean> {
        this.countWrite();
        return super.saveIfActive(session);
    }

    private countWrite(): void {
        this.writes++;
        if (this.writes >= this.failFrom && this.writes <= this.failUntil) {
            throw new Error('database unavailable');
        }
    }
}

async function flushMicrotasks(count: number): Promise<void> {
    for (let i = 0; i < count; i++) {
        await Promise.resolve();
    }
}

function stubEngine(options: { rateLimiter?: RateLimiter } = {}) {
    const config = providerConfig('stub', 1);
    const tracker = new UsageTracker([config]);
    const orchestrator = new ProviderOrchestrator([{ config, adapter: new StubProvider() }], tracker, { timeoutMs: 1000 });
    const store = new RecordingStore();
    const engine = new WorkflowEngine({ orchestrator, store, rateLimiter: options.rateLimiter });
    return { engine, store, tracker };
}

function scriptedEngine(script: Script) {
    const gemini = registration(providerConfig('gemini', 1), script);
    const orchestrator = new ProviderOrchestrator([gemini], new UsageTracker([]), { timeoutMs: 1000 });
    const store = new RecordingStore();
    const engine = new WorkflowEngine({ orchestrator, store });
    return { engine, store, provider: gemini.adapter };
}

describe('WorkflowEngine full run', () => {
    it('should take a topic through all seven steps', async () => {
        const { engine, tracker } = stubEngine();

        const sessionId = await engine.startWorkflow('march birth flowers', 'client-a');
        const session = await engine.waitForCompletion(sessionId);

        expect(session.status).toBe('completed');
        expect(session.progress).toBe(100);
        expect(session.currentStep).toBe('improvement');
        expect(session.errorDetail).toBeUndefined();
        expect(session.completedAt).toBeInstanceOf(Date);
        expect(Object.keys(session.results)).toEqual([
            'research', 'planning', 'writing', 'editing', 'publishing', 'analysis', 'improvement',
        ]);
        expect(session.results.writing?.data).toMatchObject({
            title: 'A practical guide to march birth flowers',
            qualityScore: 75,
            iterations: 1,
            wordCount: 29,
        });
        expect(session.results.publishing?.data.slug).toBe('a-practical-guide-to-march-birth-flowers');
        expect(session.results.research?.providerUsed).toBe('stub');

        // one call per step, plus the quality grade inside writing
        expect(tracker.getUsage('stub').dailyRequests).toBe(8);
        expect(engine.isRunning(sessionId)).toBe(false);
    });

    it('should persist each step before starting the next', async () => {
        const { engine, store } = stubEngine();

        const sessionId = await engine.startWorkflow('tulips', 'client-a');
        await engine.waitForCompletion(sessionId);

        const progress = store.saved
            .map(s => s.progress)
            .filter((value, index, all) => index === 0 || value !== all[index - 1]);
        expect(progress).toEqual([0, 14, 29, 43, 57, 71, 86, 100]);

        for (const step of WORKFLOW_STEPS) {
            const startedAt = store.saved.findIndex(s =>
                s.status === 'in_progress' && s.currentStep === step && s.results[step] === undefined);
            const doneAt = store.saved.findIndex(s => s.results[step] !== undefined);
            expect(startedAt).toBeGreaterThan(-1);
            expect(doneAt).toBeGreaterThan(startedAt);
        }

        expect(store.saved[0].status).toBe('started');
        expect(store.saved[store.saved.length - 1].status).toBe('completed');
    });

    it('should run sessions for different topics side by side', async () => {
        const { engine, tracker } = stubEngine();

        const first = await engine.startWorkflow('tulips', 'client-a');
        const second = await engine.startWorkflow('daffodils', 'client-b');
        const [a, b] = await Promise.all([engine.waitForCompletion(first), engine.waitForCompletion(second)]);

        expect(a.status).toBe('completed');
        expect(b.status).toBe('completed');
        expect(a.results.publishing?.data.slug).toBe('a-practical-guide-to-tulips');
        expect(b.results.publishing?.data.slug).toBe('a-practical-guide-to-daffodils');
        expect(tracker.getUsage('stub').dailyRequests).toBe(16);
    });
});

describe('WorkflowEngine failures', () => {
    it('should stop at the step whose providers are exhausted', async () => {
        const { engine, provider } = scriptedEngine(async prompt => {
            if (prompt.includes('Write the article')) {
                return fail('gemini', 'transient', 'Gemini API error: overloaded')(prompt);
            }
            return succeed()(prompt);
        });

        const sessionId = await engine.startWorkflow('peonies', 'client-a');
        const session = await engine.waitForCompletion(sessionId);

        expect(session.status).toBe('error');
        expect(session.currentStep).toBe('writing');
        expect(session.progress).toBe(29);
        expect(Object.keys(session.results)).toEqual(['research', 'planning']);
        expect(session.errorDetail).toEqual({
            reason: 'providers_exhausted',
            step: 'writing',
            message: 'All providers failed. Last error: Gemini API error: overloaded',
            attempts: [
                { provider: 'gemini', reason: 'transient_error', message: 'Gemini API error: overloaded', retries: 0 },
            ],
        });
        // research, planning, the failed draft; nothing after
        expect(provider.calls).toHaveLength(3);

        const results = await engine.getResults(sessionId);
        expect(results.status).toBe('error');
    });
});

describe('WorkflowEngine store failures', () => {
    it('should mark the session failed when a progress write throws', async () => {
        // writes: initial save, research started, research done (fails)
        const store = new FlakyStore(3);
        const gemini = registration(providerConfig('gemini', 1), succeed());
        const engine = new WorkflowEngine({
            orchestrator: new ProviderOrchestrator([gemini], new UsageTracker([])),
            store,
        });

        const sessionId = await engine.startWorkflow('tulips', 'client-a');
        const session = await engine.waitForCompletion(sessionId);

        expect(session.status).toBe('error');
        expect(session.completedAt).toBeInstanceOf(Date);
        expect(session.errorDetail).toEqual({
            reason: 'step_failed',
            step: 'planning',
            message: 'database unavailable',
            attempts: [],
        });
        expect(engine.isRunning(sessionId)).toBe(false);
        expect(gemini.adapter.calls).toHaveLength(1);
    });

    it('should end the run even when the failure cannot be recorded', async () => {
        const store = new FlakyStore(3, Number.POSITIVE_INFINITY);
        const gemini = registration(providerConfig('gemini', 1), succeed());
        const engine = new WorkflowEngine({
            orchestrator: new ProviderOrchestrator([gemini], new UsageTracker([])),
            store,
        });

        const sessionId = await engine.startWorkflow('tulips', 'client-a');
        const session = await engine.waitForCompletion(sessionId);

        expect(session).toMatchObject({ status: 'in_progress', currentStep: 'research', progress: 0 });
        expect(engine.isRunning(sessionId)).toBe(false);
    });
});

describe('WorkflowEngine writes racing outside changes', () => {
    const OFFSETS = Array.from({ length: 41 }, (_, i) => i);

    it.each(OFFSETS)('should not bring back a session deleted %i microtasks after a step returns', async offset => {
        const started = deferred();
        const gate = deferred();
        const { engine, store } = scriptedEngine(gated(started, gate));

        const sessionId = await engine.startWorkflow('tulips', 'client-a');
        await started.promise;

        gate.resolve();
        await flushMicrotasks(offset);
        await store.delete(sessionId);

        await expect(engine.waitForCompletion(sessionId)).rejects.toBeInstanceOf(SessionNotFoundError);
        expect(await store.get(sessionId)).toBeNull();
        expect(engine.isRunning(sessionId)).toBe(false);
    });

    it.each(OFFSETS)('should not overwrite a session finalised elsewhere %i microtasks after a step returns', async offset => {
        const started = deferred();
        const gate = deferred();
        const { engine, store } = scriptedEngine(gated(started, gate));

        const sessionId = await engine.startWorkflow('tulips', 'client-a');
        await started.promise;

        gate.resolve();
        await flushMicrotasks(offset);
        const current = await store.get(sessionId);
        if (!current) throw new Error('expected a session');
        await store.save({
            ...current,
            status: 'error',
            errorDetail: { reason: 'cancelled', step: current.currentStep, message: 'cancelled elsewhere', attempts: [] },
            completedAt: new Date(),
        });

        const session = await engine.waitForCompletion(sessionId);

        expect(session.status).toBe('error');
        expect(session.errorDetail?.message).toBe('cancelled elsewhere');
        expect(engine.isRunning(sessionId)).toBe(false);
    });
});

describe('WorkflowEngine control surface', () => {
    it('should reject an empty topic or an unconfigured preferred provider', async () => {
        const { engine } = stubEngine();

        await expect(engine.startWorkflow('   ', 'client-a')).rejects.toBeInstanceOf(InvalidRequestError);
        await expect(engine.startWorkflow('tulips', 'client-a', { preferredProvider: 'openai' }))
            .rejects.toBeInstanceOf(InvalidRequestError);
    });

    it('should rate limit launches per client', async () => {
        const { engine } = stubEngine({ rateLimiter: new RateLimiter({ maxCalls: 1, windowSeconds: 60 }) });

        const first = await engine.startWorkflow('tulips', 'client-a');
        const error = await engine.startWorkflow('tulips', 'client-a').catch((e: unknown) => e);
        const other = await engine.startWorkflow('tulips', 'client-b');

        expect(error).toBeInstanceOf(ClientRateLimitedError);
        expect(error).toMatchObject({ clientId: 'client-a', retryAfterSeconds: 60 });

        await engine.waitForCompletion(first);
        await engine.waitForCompletion(other);
    });

    it('should return the same status on repeated reads', async () => {
        const { engine } = stubEngine();
        const sessionId = await engine.startWorkflow('tulips', 'client-a');
        await engine.waitForCompletion(sessionId);

        const first = await engine.getStatus(sessionId);
        const second = await engine.getStatus(sessionId);

        expect(second).toEqual(first);
        expect(first).toMatchObject({ sessionId, topic: 'tulips', status: 'completed', progress: 100 });
    });

    it('should raise SessionNotFound for an unknown id', async () => {
        const { engine } = stubEngine();

        await expect(engine.getStatus('missing')).rejects.toBeInstanceOf(SessionNotFoundError);
        await expect(engine.getResults('missing')).rejects.toBeInstanceOf(SessionNotFoundError);
        await expect(engine.cancel('missing')).rejects.toBeInstanceOf(SessionNotFoundError);
        await expect(engine.deleteSession('missing')).rejects.toBeInstanceOf(SessionNotFoundError);
    });

    it('should refuse results while a session is running', async () => {
        const started = deferred();
        const gate = deferred();
        const { engine } = scriptedEngine(gated(started, gate));

        const sessionId = await engine.startWorkflow('tulips', 'client-a');
        await started.promise;

        await expect(engine.getResults(sessionId)).rejects.toBeInstanceOf(SessionNotReadyError);
        expect(await engine.getStatus(sessionId)).toMatchObject({ status: 'in_progress', currentStep: 'research', progress: 0 });

        gate.resolve();
        const session = await engine.waitForCompletion(sessionId);
        expect(session.status).toBe('completed');
    });

    it('should cancel at the next step boundary and drop the in-flight output', async () => {
        const started = deferred();
        const gate = deferred();
        const { engine, provider } = scriptedEngine(gated(started, gate));

        const sessionId = await engine.startWorkflow('tulips', 'client-a');
        await started.promise;

        await engine.cancel(sessionId);
        gate.resolve();
        const session = await engine.waitForCompletion(sessionId);

        expect(session.status).toBe('error');
        expect(session.errorDetail).toEqual({ reason: 'cancelled', step: 'research', message: 'cancelled', attempts: [] });
        expect(session.results).toEqual({});
        expect(provider.calls).toHaveLength(1);

        await expect(engine.cancel(sessionId)).rejects.toBeInstanceOf(SessionAlreadyTerminalError);
    });

    it('should cancel a stored session that nothing is running', async () => {
        const { engine, store } = stubEngine();
        const now = new Date();
        await store.save({
            id: 'orphan',
            topic: 'tulips',
            clientId: 'client-a',
            status: 'in_progress',
            currentStep: 'editing',
            progress: 43,
            results: {},
            createdAt: now,
            updatedAt: now,
        });

        const view = await engine.cancel('orphan');

        expect(view).toMatchObject({ status: 'error', currentStep: 'editing' });
        expect(view.errorDetail?.reason).toBe('cancelled');
    });

    it('should delete a running session and stop its run', async () => {
        const started = deferred();
        const gate = deferred();
        const { engine, provider } = scriptedEngine(gated(started, gate));

        const sessionId = await engine.startWorkflow('tulips', 'client-a');
        await started.promise;

        await engine.deleteSession(sessionId);
        await expect(engine.getStatus(sessionId)).rejects.toBeInstanceOf(SessionNotFoundError);

        gate.resolve();
        await expect(engine.waitForCompletion(sessionId)).rejects.toBeInstanceOf(SessionNotFoundError);
        expect(engine.isRunning(sessionId)).toBe(false);
        expect(provider.calls).toHaveLength(1);
    });

    it('should purge terminal sessions older than the TTL', async () => {
        const { engine } = stubEngine();
        const sessionId = await engine.startWorkflow('tulips', 'client-a');
        await engine.waitForCompletion(sessionId);

        const hour = 60 * 60 * 1000;
        expect(await engine.purgeExpired(hour)).toBe(0);
        expect(await engine.purgeExpired(hour, new Date(Date.now() + 2 * hour))).toBe(1);
        await expect(engine.getStatus(sessionId)).rejects.toBeInstanceOf(SessionNotFoundError);
    });
});
