/**
 * Workflow Session Store
 *
 * Key-value storage for workflow sessions. The engine only talks to this
 * interface, so sessions can live in process memory (tests, single node)
 * or in Postgres (see storage/PostgresSessionStore).
 */

import { isTerminal, SessionStatus, WorkflowSession } from './types';

export interface SessionFilter {
    statuses?: SessionStatus[];
    /** Only sessions last updated before this instant */
    updatedBefore?: Date;
    clientId?: string;
}

export interface SessionStore {
    readonly name: string;

    /** A copy of the stored session, or null */
    get(id: string): Promise<WorkflowSession | null>;

    /** Insert or replace */
    save(session: WorkflowSession): Promise<void>;

    /**
     * Replace the stored session only while it still exists and is not
     * terminal. False when the write was refused.
     */
    saveIfActive(session: WorkflowSession): Promise<boolean>;

    /** True if a session was removed */
    delete(id: string): Promise<boolean>;

    list(filter?: SessionFilter): Promise<WorkflowSession[]>;
}

export class InMemorySessionStore implements SessionStore {
    readonly name = 'memory';
    private readonly sessions = new Map<string, WorkflowSession>();

    async get(id: string): Promise<WorkflowSession | null> {
        const session = this.sessions.get(id);
        return session ? structuredClone(session) : null;
    }

    async save(session: WorkflowSession): Promise<void> {
        this.sessions.set(session.id, structuredClone(session));
    }

    async saveIfActive(session: WorkflowSession): Promise<boolean> {
        const stored = this.sessions.get(session.id);
        if (!stored || isTerminal(stored.status)) {
            return false;
        }
        this.sessions.set(session.id, structuredClone(session));
        return true;
    }

    async delete(id: string): Promise<boolean> {
        return this.sessions.delete(id);
    }

    async list(filter: SessionFilter = {}): Promise<WorkflowSession[]> {
        return [...this.sessions.values()]
            .filter(s => matches(s, filter))
            .map(s => structuredClone(s));
    }
}

export function matches(session: WorkflowSession, filter: SessionFilter): boolean {
    if (filter.statuses && !filter.statuses.includes(session.status)) return false;
    if (filter.updatedBefore && session.updatedAt >= filter.updatedBefore) return false;
    if (filter.clientId && session.clientId !== filter.clientId) return false;
    return true;
}
