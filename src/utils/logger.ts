import pino from 'pino';
import type { LogLevel } from '../types/index.js';

export type Logger = pino.Logger;

/**
 * Logger singleton. Configured once at startup via `initLogger()`.
 * Library code receives a logger explicitly; the singleton only backs
 * the CLI and callers that do not pass one.
 */
let loggerInstance: Logger | null = null;

/**
 * Initialize the logger with the specified options.
 * Should be called once at CLI startup.
 */
export function initLogger(options: { level?: LogLevel; jsonLogs?: boolean }): Logger {
    const { level = 'info', jsonLogs = false } = options;

    if (jsonLogs) {
        loggerInstance = pino({ level }, pino.destination(2));
    } else {
        loggerInstance = pino({
            level,
            transport: {
                target: 'pino-pretty',
                options: {
                    colorize: true,
                    translateTime: 'HH:MM:ss',
                    ignore: 'pid,hostname',
                    destination: 2,
                },
            },
        });
    }

    return loggerInstance;
}

/**
 * Get the logger instance.
 * If not initialized, creates a default info-level logger.
 */
export function getLogger(): Logger {
    if (!loggerInstance) {
        loggerInstance = initLogger({ level: 'info' });
    }
    return loggerInstance;
}

/**
 * A logger that discards everything. Used by tests and by callers that
 * want a quiet pipeline.
 */
export function silentLogger(): Logger {
    return pino({ level: 'silent' });
}
