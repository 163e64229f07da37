import pino, { type Logger } from 'pino';
import config from '../config';

export type { Logger };

const pretty =
    process.stdout.isTTY && config.NODE_ENV !== 'production' && config.NODE_ENV !== 'test';

export const logger: Logger = pino({
    level: config.LOG_LEVEL,
    transport: pretty
        ? { target: 'pino-pretty', options: { colorize: true, translateTime: 'HH:MM:ss' } }
        : undefined,
});

/** Logger that drops everything, for tests and callers that report elsewhere. */
export const silentLogger: Logger = pino({ level: 'silent' });
