import config, { validateConfig } from './config';
import { createLogger } from './logger';
import { checkConnection, closePool } from './db';
import { createEngine } from './app';
import { startScheduler, stopScheduler } from './scheduler/cron';

const logger = createLogger('main');

/**
 * Graceful shutdown handler
 */
async function shutdown(signal: string): Promise<void> {
    logger.info(`Received ${signal}, shutting down...`);

    stopScheduler();
    // In-memory sessions end with the process
    if (config.workflow.store === 'postgres') {
        await closePool();
    }

    logger.info('Shutdown complete');
    process.exit(0);
}

/**
 * Main entry point
 */
async function main(): Promise<void> {
    logger.info('SEO workflow engine starting...', {
        nodeEnv: config.nodeEnv,
        sessionStore: config.workflow.store,
        timezone: config.usage.timezone,
    });

    try {
        validateConfig();
        logger.info('Configuration validated');

        if (config.workflow.store === 'postgres') {
            const dbConnected = await checkConnection();
            if (!dbConnected) {
                throw new Error('Failed to connect to database');
            }
        }

        const { engine, usageTracker, orchestrator, rateLimiter } = createEngine();

        startScheduler({ engine, usageTracker, rateLimiter });

        logger.info('Engine is running. Press Ctrl+C to stop.', {
            providers: orchestrator.listProviders(),
        });
    } catch (error) {
        logger.error('Startup failed', {
            error: error instanceof Error ? error.message : 'Unknown error'
        });
        process.exit(1);
    }
}

process.on('SIGTERM', () => void shutdown('SIGTERM'));
process.on('SIGINT', () => void shutdown('SIGINT'));

process.on('uncaughtException', (error) => {
    logger.error('Uncaught exception', { error: error.message, stack: error.stack });
    process.exit(1);
});

process.on('unhandledRejection', (reason) => {
    logger.error('Unhandled rejection', { reason });
    process.exit(1);
});

void main();
