import { Pool, PoolClient, QueryResult, QueryResultRow } from 'pg';
import config from './config';
import { createLogger } from './logger';

const logger = createLogger('db');

let pool: Pool | null = null;

/**
 * PostgreSQL connection pool, created on first use so that the in-memory
 * session store never opens a connection
 */
export function getPool(): Pool {
    if (pool) {
        return pool;
    }

    pool = new Pool({
        connectionString: config.database.url,
        max: 10,
        idleTimeoutMillis: 30000,
        connectionTimeoutMillis: 5000,
    });

    pool.on('connect', () => {
        logger.debug('New database connection established');
    });

    pool.on('error', (err) => {
        logger.error('Unexpected database error', { error: err.message });
    });

    return pool;
}

/**
 * Execute a query with automatic connection management
 */
export async function query<T extends QueryResultRow = QueryResultRow>(
    text: string,
    params?: unknown[]
): Promise<QueryResult<T>> {
    const start = Date.now();
    try {
        const result = await getPool().query<T>(text, params);
        logger.debug('Query executed', {
            duration: `${Date.now() - start}ms`,
            rows: result.rowCount
        });
        return result;
    } catch (error) {
        logger.error('Query failed', {
            text: text.substring(0, 100),
            error: error instanceof Error ? error.message : 'Unknown error'
        });
        throw error;
    }
}

/**
 * Execute a function within a transaction
 */
export async function withTransaction<T>(
    callback: (client: PoolClient) => Promise<T>
): Promise<T> {
    const client = await getPool().connect();
    try {
        await client.query('BEGIN');
        const result = await callback(client);
        await client.query('COMMIT');
        return result;
    } catch (error) {
        await client.query('ROLLBACK');
        throw error;
    } finally {
        client.release();
    }
}

/**
 * Check database connectivity
 */
export async function checkConnection(): Promise<boolean> {
    try {
        await query('SELECT 1');
        logger.info('Database connection verified');
        return true;
    } catch (error) {
        logger.error('Database connection failed', {
            error: error instanceof Error ? error.message : 'Unknown error'
        });
        return false;
    }
}

/**
 * Close all database connections
 */
export async function closePool(): Promise<void> {
    if (!pool) return;
    await pool.end();
    pool = null;
    logger.info('Database pool closed');
}

export default { getPool, query, withTransaction, checkConnection, closePool };
