/**
 * Tests for InMemorySessionStore
 */

import { InMemorySessionStore } from '../src/workflow/sessionStore';
import { WorkflowSession } from '../src/workflow/types';

function session(id: string, overrides: Partial<WorkflowSession> = {}): WorkflowSession {
    const at = new Date('2024-06-01T12:00:00Z');
    return {
        id,
        topic: 'tulips',
        clientId: 'client-a',
        status: 'started',
        currentStep: 'research',
        progress: 0,
        results: {},
        createdAt: at,
        updatedAt: at,
        ...overrides,
    };
}

describe('InMemorySessionStore', () => {
    it('should hand out copies, not the stored object', async () => {
        const store = new InMemorySessionStore();
        await store.save(session('s1'));

        const copy = await store.get('s1');
        if (!copy) throw new Error('expected a session');
        copy.status = 'completed';

        expect((await store.get('s1'))?.status).toBe('started');
        expect(copy.createdAt).toEqual(new Date('2024-06-01T12:00:00Z'));
    });

    it('should return null for unknown ids and report deletions', async () => {
        const store = new InMemorySessionStore();
        await store.save(session('s1'));

        expect(await store.get('nope')).toBeNull();
        expect(await store.delete('s1')).toBe(true);
        expect(await store.delete('s1')).toBe(false);
    });

    it('should only conditionally write sessions that exist and are still running', async () => {
        const store = new InMemorySessionStore();

        expect(await store.saveIfActive(session('missing', { status: 'in_progress' }))).toBe(false);
        expect(await store.get('missing')).toBeNull();

        await store.save(session('s1'));
        expect(await store.saveIfActive(session('s1', { status: 'in_progress', progress: 14 }))).toBe(true);
        expect(await store.saveIfActive(session('s1', { status: 'completed', progress: 100 }))).toBe(true);
        expect(await store.saveIfActive(session('s1', { status: 'in_progress', progress: 29 }))).toBe(false);

        expect(await store.get('s1')).toMatchObject({ status: 'completed', progress: 100 });
    });

    it('should filter by status, age and client', async () => {
        const store = new InMemorySessionStore();
        await store.save(session('old-done', { status: 'completed', updatedAt: new Date('2024-05-01T00:00:00Z') }));
        await store.save(session('new-done', { status: 'completed', clientId: 'client-b' }));
        await store.save(session('running', { status: 'in_progress' }));

        const ids = async (filter: Parameters<InMemorySessionStore['list']>[0]) =>
            (await store.list(filter)).map(s => s.id).sort();

        expect(await ids({})).toEqual(['new-done', 'old-done', 'running']);
        expect(await ids({ statuses: ['completed', 'error'] })).toEqual(['new-done', 'old-done']);
        expect(await ids({ updatedBefore: new Date('2024-05-15T00:00:00Z') })).toEqual(['old-done']);
        expect(await ids({ clientId: 'client-b' })).toEqual(['new-done']);
    });
});
