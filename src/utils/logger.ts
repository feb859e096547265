import type { LogConfig } from '../types/config.types.js';
import pino from 'pino';

export interface LogMeta {
    correlationId?: string;
    documentName?: string;
    pageIndex?: number;
    [key: string]: unknown;
}

export interface Logger {
    debug(message: string, meta?: LogMeta): void;
    info(message: string, meta?: LogMeta): void;
    warn(message: string, meta?: LogMeta): void;
    error(message: string, meta?: LogMeta): void;
    /** Logger whose entries all carry `bindings` */
    child(bindings: LogMeta): Logger;
}

type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Creates a Pino-backed logger
 *
 * - Structured JSON logging by default
 * - Pretty print when `structured` is false
 * - Bound metadata (correlation ID, document) via `child`
 */
export function createLogger(config: LogConfig): Logger {
    const pinoLogger = pino({
        level: config.level,
        // Use transport for pretty printing in dev mode
        ...(config.structured === false && {
            transport: {
                target: 'pino-pretty',
                options: {
                    colorize: true,
                    translateTime: 'SYS:standard',
                    ignore: 'pid,hostname',
                },
            },
        }),
    });

    return wrap(pinoLogger, config, {});
}

function wrap(pinoLogger: pino.Logger, config: LogConfig, bindings: LogMeta): Logger {
    const log = (level: LogLevel, message: string, meta?: LogMeta): void => {
        // Support custom logger if configured
        if (config.customLogger) {
            config.customLogger(level, message, { ...bindings, ...meta });
            return;
        }

        pinoLogger[level](meta ?? {}, message);
    };

    return {
        debug: (message: string, meta?: LogMeta) => log('debug', message, meta),
        info: (message: string, meta?: LogMeta) => log('info', message, meta),
        warn: (message: string, meta?: LogMeta) => log('warn', message, meta),
        error: (message: string, meta?: LogMeta) => log('error', message, meta),
        child: (childBindings: LogMeta) => wrap(
            pinoLogger.child(childBindings),
            config,
            { ...bindings, ...childBindings }
        ),
    };
}
