/**
 * Provider Stats CLI
 *
 * Print configured providers with their quotas and usage, optionally
 * sending a test prompt to each.
 *
 * Usage: npm run providers -- [--test] [--stub]
 */

import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { createEngine } from '../app';
import { createLogger } from '../logger';
import { InMemorySessionStore } from '../workflow/sessionStore';

const logger = createLogger('provider-stats');

async function main(): Promise<void> {
    const argv = await yargs(hideBin(process.argv))
        .option('test', {
            type: 'boolean',
            description: 'Send a connection test prompt to every provider',
            default: false,
        })
        .option('stub', {
            type: 'boolean',
            description: 'Use the offline stub provider',
            default: false,
        })
        .help()
        .parse();

    const { orchestrator } = createEngine({ stub: argv.stub, store: new InMemorySessionStore() });

    for (const stats of orchestrator.getProviderStatistics()) {
        console.log(
            `${stats.priority}. ${stats.provider} (${stats.model}) ` +
            `day ${stats.dailyRequests}/${stats.dailyQuota ?? '∞'} ` +
            `month ${stats.monthlyRequests}/${stats.monthlyQuota ?? '∞'} ` +
            `${stats.withinQuota ? 'available' : 'over quota'}`
        );
    }

    if (argv.test) {
        const results = await orchestrator.testConnections();
        for (const result of results) {
            console.log(`${result.provider}: ${result.success ? 'ok' : `failed (${result.error})`}`);
        }

        const failed = results.filter(r => !r.success).length;
        if (failed > 0) {
            logger.warn('Some providers failed the connection test', { failed });
        }
    }
}

main()
    .then(() => process.exit(0))
    .catch(error => {
        logger.error('Provider stats failed', {
            error: error instanceof Error ? error.message : 'Unknown error',
        });
        process.exit(1);
    });
