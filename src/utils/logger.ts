import { join } from 'node:path';
import pino from 'pino';
import type { LogLevel } from '../types/index.js';

/**
 * Logger singleton. Configured once at startup via `initLogger()`.
 * Uses pino for structured JSON logging with human-readable default.
 */
let loggerInstance: pino.Logger | null = null;

const PRETTY_OPTIONS = {
    colorize: true,
    translateTime: 'HH:MM:ss',
    ignore: 'pid,hostname',
};

/**
 * Initialize the logger with the specified options.
 * Should be called once at CLI startup.
 *
 * When `logDir` is given, every record at debug and above is also written to
 * `debug.json.log` and errors to `error.json.log` in that directory, whatever
 * the console level.
 */
export function initLogger(options: {
    level?: LogLevel;
    jsonLogs?: boolean;
    logDir?: string;
}): pino.Logger {
    const { level = 'info', jsonLogs = false, logDir } = options;

    if (logDir) {
        const targets: pino.TransportTargetOptions[] = [
            jsonLogs
                ? { target: 'pino/file', level, options: { destination: 1 } }
                : { target: 'pino-pretty', level, options: PRETTY_OPTIONS },
            {
                target: 'pino/file',
                level: 'debug',
                options: { destination: join(logDir, 'debug.json.log'), mkdir: true },
            },
            {
                target: 'pino/file',
                level: 'error',
                options: { destination: join(logDir, 'error.json.log'), mkdir: true },
            },
        ];
        loggerInstance = pino({ level: 'debug' }, pino.transport({ targets }));
    } else if (jsonLogs) {
        loggerInstance = pino({ level });
    } else {
        loggerInstance = pino({
            level,
            transport: {
                target: 'pino-pretty',
                options: PRETTY_OPTIONS,
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
