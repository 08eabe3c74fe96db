/**
 * Structured logger with run/item context support
 */
import pino from 'pino';
import { LOG_LEVELS, type LogLevel } from '../config/index.js';

function resolveLevel(value: string | undefined): LogLevel {
    const level = LOG_LEVELS.find(candidate => candidate === value);
    return level ?? 'info';
}

// Create base logger
const baseLogger = pino({
    level: resolveLevel(process.env['LOG_LEVEL']),
    base: {
        service: 'catalog-publisher',
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
        level: (label) => ({ level: label }),
    },
});

// Logger interface with run/item context
export interface LogContext {
    runId?: string;
    requestId?: string;
    externalId?: string;
    stage?: 'fetch' | 'normalize' | 'filter' | 'classify' | 'render' | 'publish' | 'export';
}

export class Logger {
    private logger: pino.Logger;

    constructor(context?: LogContext) {
        this.logger = context ? baseLogger.child(context) : baseLogger;
    }

    child(context: LogContext): Logger {
        const newLogger = new Logger();
        newLogger.logger = this.logger.child(context);
        return newLogger;
    }

    // pino children keep the level they were created with
    private get target(): pino.Logger {
        if (this.logger.level !== baseLogger.level) {
            this.logger.level = baseLogger.level;
        }
        return this.logger;
    }

    debug(message: string, data?: Record<string, unknown>): void {
        this.target.debug(data || {}, message);
    }

    info(message: string, data?: Record<string, unknown>): void {
        this.target.info(data || {}, message);
    }

    warn(message: string, data?: Record<string, unknown>): void {
        this.target.warn(data || {}, message);
    }

    error(message: string, error?: Error | unknown, data?: Record<string, unknown>): void {
        const errorData = error instanceof Error
            ? { error: { code: error.name, message: error.message, stack: error.stack } }
            : { error };
        this.target.error({ ...errorData, ...data }, message);
    }
}

/**
 * Apply the configured level once the run config is known
 */
export function setLogLevel(level: LogLevel): void {
    baseLogger.level = level;
}

// Export singleton and factory
export const logger = new Logger();
export const createLogger = (context: LogContext) => new Logger(context);
