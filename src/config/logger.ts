import pino from 'pino';

/**
 * Logger Interface
 *
 * Defines the contract for logging operations across the application.
 * Structured fields come first, the message second, the same order pino uses.
 */
export interface ILogger {
    info(data: object, message?: string): void;
    error(data: object, message?: string): void;
    warn(data: object, message?: string): void;
    debug(data: object, message?: string): void;
}

/**
 * Logger Configuration
 *
 * JSON logger for the interview engine. Covers session lifecycle
 * transitions, question selection, scoring calls and queue activity.
 * Pretty printing is for local development only.
 */
export const logger = pino({
    level: process.env.LOG_LEVEL || 'info',
    ...((process.env.NODE_ENV ?? 'development') === 'development' && {
        transport: {
            target: 'pino-pretty',
            options: {
                colorize: true,
                translateTime: 'SYS:standard',
                ignore: 'pid,hostname',
                singleLine: false
            }
        }
    }),
    serializers: {
        req: pino.stdSerializers.req,
        res: pino.stdSerializers.res,
        err: pino.stdSerializers.err
    }
});
