import cron from 'node-cron';
import config from '../config';
import { createLogger } from '../logger';
import { UsageTracker } from '../orchestration/UsageTracker';
import { RateLimiter } from '../ratelimit/RateLimiter';
import { WorkflowEngine } from '../workflow/engine';

const logger = createLogger('scheduler');

let scheduledTask: cron.ScheduledTask | null = null;

export interface MaintenanceTargets {
    engine: WorkflowEngine;
    usageTracker: UsageTracker;
    rateLimiter?: RateLimiter;
}

export interface MaintenanceReport {
    purgedSessions: number;
    prunedUsageRecords: number;
    sweptRateLimitClients: number;
}

/**
 * Purge expired sessions, stale usage records and idle rate-limit clients
 */
export async function runMaintenance(
    targets: MaintenanceTargets,
    now: Date = new Date()
): Promise<MaintenanceReport> {
    const ttlMs = config.workflow.sessionTtlHours * 60 * 60 * 1000;
    const purgedSessions = await targets.engine.purgeExpired(ttlMs, now);
    const prunedUsageRecords = targets.usageTracker.prune();
    const sweptRateLimitClients = targets.rateLimiter?.sweep() ?? 0;

    return { purgedSessions, prunedUsageRecords, sweptRateLimitClients };
}

/**
 * Start the maintenance cron job
 */
export function startScheduler(targets: MaintenanceTargets): void {
    if (!config.scheduler.enabled) {
        logger.info('Scheduler disabled by configuration');
        return;
    }

    const schedule = config.scheduler.maintenanceCron;

    if (!cron.validate(schedule)) {
        logger.error('Invalid cron schedule', { schedule });
        throw new Error(`Invalid cron schedule: ${schedule}`);
    }

    logger.info('Starting scheduler', { schedule });

    scheduledTask = cron.schedule(schedule, async () => {
        try {
            const report = await runMaintenance(targets);
            logger.info('Maintenance run completed', { ...report });
        } catch (error) {
            logger.error('Maintenance run failed', {
                error: error instanceof Error ? error.message : 'Unknown error'
            });
        }
    });

    scheduledTask.start();
    logger.info('Scheduler started successfully');
}

/**
 * Stop the cron scheduler
 */
export function stopScheduler(): void {
    if (scheduledTask) {
        scheduledTask.stop();
        scheduledTask = null;
        logger.info('Scheduler stopped');
    }
}

export default { startScheduler, stopScheduler, runMaintenance };
