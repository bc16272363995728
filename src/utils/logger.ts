import pino from 'pino';
import type { LogLevel } from '../types/index.js';

/**
 * Process-wide logger. Configured once at CLI startup via `initLogger()`;
 * modules call `getLogger()` where they log, so a later `initLogger()` reaches them.
 * Logs go to stderr so exports written to stdout stay clean.
 */
let loggerInstance: pino.Logger | null = null;
let jsonMode = false;

export interface LoggerOptions {
    level?: LogLevel;
    jsonLogs?: boolean;
}

/**
 * Initialize the logger with the specified options.
 * When the output mode is unchanged the live instance is reused with the new level.
 */
export function initLogger(options: LoggerOptions): pino.Logger {
    const { level = 'info', jsonLogs = false } = options;

    if (loggerInstance && jsonLogs === jsonMode) {
        loggerInstance.level = level;
        return loggerInstance;
    }

    jsonMode = jsonLogs;
    if (jsonLogs) {
        loggerInstance = pino({ name: 'pubcost', level }, pino.destination(2));
    } else {
        loggerInstance = pino({
            name: 'pubcost',
            level,
            transport: {
                target: 'pino-pretty',
                options: {
                    colorize: true,
                    translateTime: 'HH:MM:ss',
                    ignore: 'pid,hostname,name',
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
export function getLogger(): pino.Logger {
    if (!loggerInstance) {
        loggerInstance = initLogger({ level: 'info' });
    }
    return loggerInstance;
}
