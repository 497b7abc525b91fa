import type { LogConfig } from '../types/config.types.js';
import { getCorrelationId } from '../errors/index.js';
import pino from 'pino';

export interface LogMeta {
    correlationId?: string;
    file?: string;
    page?: number;
    [key: string]: unknown;
}

export interface Logger {
    debug(message: string, meta?: LogMeta): void;
    info(message: string, meta?: LogMeta): void;
    warn(message: string, meta?: LogMeta): void;
    error(message: string, meta?: LogMeta): void;
}

type LogLevel = LogConfig['level'];

const LEVEL_ORDER: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
};

/**
 * Creates a Pino logger instance
 * Injects the current correlation ID into every entry.
 * `structured: false` switches to pino-pretty output for terminals.
 */
export function createLogger(config: LogConfig): Logger {
    // Only build a pino instance when nothing else will receive the entries
    const pinoLogger = config.customLogger
        ? undefined
        : pino({
            level: config.level,
            ...(config.structured === false && {
                transport: {
                    target: 'pino-pretty',
                    options: {
                        colorize: true,
                        translateTime: 'SYS:standard',
                        ignore: 'pid,hostname,correlationId',
                    },
                },
            }),
        });

    const enrichMeta = (meta?: LogMeta): LogMeta => ({
        correlationId: meta?.correlationId ?? getCorrelationId(),
        ...meta,
    });

    const log = (level: LogLevel, message: string, meta?: LogMeta): void => {
        const enrichedMeta = enrichMeta(meta);

        if (config.customLogger) {
            if (LEVEL_ORDER[level] >= LEVEL_ORDER[config.level]) {
                config.customLogger(level, message, enrichedMeta);
            }
            return;
        }

        pinoLogger?.[level](enrichedMeta, message);
    };

    return {
        debug: (message: string, meta?: LogMeta) => log('debug', message, meta),
        info: (message: string, meta?: LogMeta) => log('info', message, meta),
        warn: (message: string, meta?: LogMeta) => log('warn', message, meta),
        error: (message: string, meta?: LogMeta) => log('error', message, meta),
    };
}
