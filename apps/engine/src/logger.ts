import winston from 'winston';
import config from './config';

const { combine, timestamp, printf, colorize, errors } = winston.format;

/**
 * Line format: `<time> [<level>] (<context>): <message> {meta}`
 */
const logFormat = printf(({ level, message, timestamp, stack, context, ...meta }) => {
    const scope = typeof context === 'string' ? ` (${context})` : '';
    let log = `${timestamp} [${level}]${scope}: ${message}`;

    if (stack) {
        log += `\n${stack}`;
    }

    if (Object.keys(meta).length > 0) {
        log += ` ${JSON.stringify(meta)}`;
    }

    return log;
});

export const logger = winston.createLogger({
    level: config.logging.level,
    // Jest sets NODE_ENV=test; keep test output clean
    silent: config.nodeEnv === 'test',
    format: combine(
        errors({ stack: true }),
        timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
        logFormat
    ),
    defaultMeta: { service: 'seo-engine' },
    transports: [
        new winston.transports.Console({
            format: config.isDev
                ? combine(colorize(), logFormat)
                : logFormat,
        }),
    ],
});

if (!config.isDev) {
    logger.add(
        new winston.transports.File({
            filename: 'logs/error.log',
            level: 'error'
        })
    );
    logger.add(
        new winston.transports.File({
            filename: 'logs/engine.log'
        })
    );
}

/**
 * Create a child logger tagged with a component name
 */
export function createLogger(context: string): winston.Logger {
    return logger.child({ context });
}

export default logger;
