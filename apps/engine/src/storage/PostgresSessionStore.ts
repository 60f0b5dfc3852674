/**
 * Postgres-backed workflow session store
 *
 * Sessions survive process restarts. Step results are kept as JSONB.
 */

import { query } from '../db';
import { createLogger } from '../logger';
import { ProviderId } from '../providers/ai/AiProvider';
import { SessionFilter, SessionStore } from '../workflow/sessionStore';
import {
    ErrorDetail,
    SessionStatus,
    StepName,
    StepResult,
    WorkflowSession,
} from '../workflow/types';

const logger = createLogger('session-store');

type StoredStepResult = Omit<StepResult, 'completedAt'> & { completedAt: string };

interface SessionRow {
    id: string;
    topic: string;
    client_id: string;
    status: SessionStatus;
    current_step: StepName;
    progress: number;
    results: Partial<Record<StepName, StoredStepResult>>;
    error_detail: ErrorDetail | null;
    preferred_provider: ProviderId | null;
    created_at: Date;
    updated_at: Date;
    completed_at: Date | null;
}

const COLUMNS = `id, topic, client_id, status, current_step, progress, results,
    error_detail, preferred_provider, created_at, updated_at, completed_at`;

export function rowToSession(row: SessionRow): WorkflowSession {
    const results: WorkflowSession['results'] = {};
    for (const [step, stored] of Object.entries(row.results)) {
        if (stored) {
            results[stored.step] = { ...stored, completedAt: new Date(stored.completedAt) };
        } else {
            logger.warn('Empty step result in stored session', { sessionId: row.id, step });
        }
    }

    return {
        id: row.id,
        topic: row.topic,
        clientId: row.client_id,
        status: row.status,
        currentStep: row.current_step,
        progress: row.progress,
        results,
        errorDetail: row.error_detail ?? undefined,
        preferredProvider: row.preferred_provider ?? undefined,
        createdAt: row.created_at,
        updatedAt: row.updated_at,
        completedAt: row.completed_at ?? undefined,
    };
}

export class PostgresSessionStore implements SessionStore {
    readonly name = 'postgres';

    async get(id: string): Promise<WorkflowSession | null> {
        const result = await query<SessionRow>(
            `SELECT ${COLUMNS} FROM workflow_sessions WHERE id = $1`,
            [id]
        );
        const row = result.rows[0];
        return row ? rowToSession(row) : null;
    }

    async save(session: WorkflowSession): Promise<void> {
        await query(
            `INSERT INTO workflow_sessions (${COLUMNS})
     VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12)
     ON CONFLICT (id) DO UPDATE SET
       status = EXCLUDED.status,
       current_step = EXCLUDED.current_step,
       progress = EXCLUDED.progress,
       results = EXCLUDED.results,
       error_detail = EXCLUDED.error_detail,
       updated_at = EXCLUDED.updated_at,
       completed_at = EXCLUDED.completed_at`,
            [
                session.id,
                session.topic,
                session.clientId,
                session.status,
                session.currentStep,
                session.progress,
                JSON.stringify(session.results),
                session.errorDetail ? JSON.stringify(session.errorDetail) : null,
                session.preferredProvider ?? null,
                session.createdAt,
                session.updatedAt,
                session.completedAt ?? null,
            ]
        );
    }

    async saveIfActive(session: WorkflowSession): Promise<boolean> {
        const result = await query(
            `UPDATE workflow_sessions SET
       status = $2,
       current_step = $3,
       progress = $4,
       results = $5,
       error_detail = $6,
       updated_at = $7,
       completed_at = $8
     WHERE id = $1 AND status NOT IN ('completed', 'error')`,
            [
                session.id,
                session.status,
                session.currentStep,
                session.progress,
                JSON.stringify(session.results),
                session.errorDetail ? JSON.stringify(session.errorDetail) : null,
                session.updatedAt,
                session.completedAt ?? null,
            ]
        );
        return (result.rowCount ?? 0) > 0;
    }

    async delete(id: string): Promise<boolean> {
        const result = await query(`DELETE FROM workflow_sessions WHERE id = $1`, [id]);
        return (result.rowCount ?? 0) > 0;
    }

    async list(filter: SessionFilter = {}): Promise<WorkflowSession[]> {
        const whereClauses: string[] = [];
        const values: unknown[] = [];
        let paramIndex = 1;

        if (filter.statuses && filter.statuses.length > 0) {
            whereClauses.push(`status = ANY($${paramIndex++})`);
            values.push(filter.statuses);
        }
        if (filter.updatedBefore) {
            whereClauses.push(`updated_at < $${paramIndex++}`);
            values.push(filter.updatedBefore);
        }
        if (filter.clientId) {
            whereClauses.push(`client_id = $${paramIndex++}`);
            values.push(filter.clientId);
        }

        const where = whereClauses.length > 0 ? ` WHERE ${whereClauses.join(' AND ')}` : '';
        const result = await query<SessionRow>(
            `SELECT ${COLUMNS} FROM workflow_sessions${where} ORDER BY created_at DESC`,
            values
        );
        return result.rows.map(rowToSession);
    }
}
