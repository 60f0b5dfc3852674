/**
 * Database Migration Runner
 *
 * Applies storage/migrations/*.sql in name order, each inside its own
 * transaction. Only needed with SESSION_STORE=postgres.
 */

import fs from 'fs';
import path from 'path';
import { query, checkConnection, closePool, withTransaction } from '../db';
import { createLogger } from '../logger';

const logger = createLogger('migrate');

export const MIGRATIONS_DIR = path.join(__dirname, 'migrations');

/**
 * SQL files in the directory, sorted by name
 */
export function listMigrationFiles(migrationsDir: string = MIGRATIONS_DIR): string[] {
    if (!fs.existsSync(migrationsDir)) {
        return [];
    }
    return fs.readdirSync(migrationsDir)
        .filter(f => f.endsWith('.sql'))
        .sort();
}

/**
 * Apply pending migrations; returns the names of the ones applied
 */
export async function runMigrations(migrationsDir: string = MIGRATIONS_DIR): Promise<string[]> {
    logger.info('Running database migrations', { migrationsDir });

    await query(`
      CREATE TABLE IF NOT EXISTS _migrations (
        id SERIAL PRIMARY KEY,
        name VARCHAR(255) UNIQUE NOT NULL,
        applied_at TIMESTAMP WITH TIME ZONE DEFAULT CURRENT_TIMESTAMP
      )
    `);

    const applied: string[] = [];

    for (const file of listMigrationFiles(migrationsDir)) {
        const result = await query(`SELECT id FROM _migrations WHERE name = $1`, [file]);
        if (result.rows.length > 0) {
            logger.debug('Migration already applied', { file });
            continue;
        }

        const sql = fs.readFileSync(path.join(migrationsDir, file), 'utf-8');

        logger.info('Applying migration', { file });
        await withTransaction(async client => {
            await client.query(sql);
            await client.query(`INSERT INTO _migrations (name) VALUES ($1)`, [file]);
        });
        applied.push(file);
    }

    logger.info('All migrations completed', { applied: applied.length });
    return applied;
}

async function main(): Promise<void> {
    const connected = await checkConnection();
    if (!connected) {
        throw new Error('Cannot connect to database');
    }

    try {
        await runMigrations();
    } finally {
        await closePool();
    }
}

if (require.main === module) {
    main()
        .then(() => process.exit(0))
        .catch(error => {
            logger.error('Migration failed', {
                error: error instanceof Error ? error.message : 'Unknown error',
            });
            process.exit(1);
        });
}
