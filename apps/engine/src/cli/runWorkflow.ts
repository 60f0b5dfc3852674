/**
 * Run Workflow CLI
 *
 * Run one topic through all seven steps and print the finished session.
 *
 * Usage: npm run workflow -- --topic "march birth flowers" [--client cli] [--provider gemini] [--stub]
 */

import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { createEngine, createSessionStore } from '../app';
import config from '../config';
import { closePool } from '../db';
import { createLogger } from '../logger';
import { isProviderId, PROVIDER_IDS, ProviderId } from '../providers/ai';

const logger = createLogger('run-workflow');

async function main(): Promise<void> {
    const argv = await yargs(hideBin(process.argv))
        .option('topic', {
            alias: 't',
            type: 'string',
            description: 'Article topic',
            demandOption: true,
        })
        .option('client', {
            alias: 'c',
            type: 'string',
            description: 'Client id used for rate limiting',
            default: 'cli',
        })
        .option('provider', {
            alias: 'p',
            type: 'string',
            choices: PROVIDER_IDS,
            description: 'Provider to try first',
        })
        .option('stub', {
            type: 'boolean',
            description: 'Use the offline stub provider',
            default: false,
        })
        .help()
        .parse();

    let preferredProvider: ProviderId | undefined;
    if (argv.provider !== undefined) {
        if (!isProviderId(argv.provider)) {
            throw new Error(`Unknown provider: ${argv.provider}`);
        }
        preferredProvider = argv.provider;
    }

    try {
        const { engine, orchestrator } = createEngine({
            stub: argv.stub,
            store: createSessionStore(argv.stub ? 'memory' : config.workflow.store),
        });

        const sessionId = await engine.startWorkflow(argv.topic, argv.client, { preferredProvider });
        logger.info('Workflow launched', { sessionId });

        const session = await engine.waitForCompletion(sessionId);

        console.log(JSON.stringify(session, null, 2));
        logger.info('Provider usage', {
            usage: orchestrator.getProviderStatistics().map(s => `${s.provider}:${s.dailyRequests}`),
        });

        if (session.status !== 'completed') {
            throw new Error(session.errorDetail?.message ?? `Workflow ended with status ${session.status}`);
        }
    } finally {
        await closePool();
    }
}

main()
    .then(() => process.exit(0))
    .catch(error => {
        logger.error('Workflow run failed', {
            error: error instanceof Error ? error.message : 'Unknown error',
        });
        process.exit(1);
    });
