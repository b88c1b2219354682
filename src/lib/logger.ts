/**
 * Logger interface for engine and node observability.
 * Callers inject their own logger (e.g., pino, winston, console);
 * nothing in the engine holds a process-wide instance.
 */
export interface Logger {
    debug(message: string, meta?: Record<string, unknown>): void;
    info(message: string, meta?: Record<string, unknown>): void;
    warn(message: string, meta?: Record<string, unknown>): void;
    error(message: string, meta?: Record<string, unknown>): void;
}

/**
 * Default no-op logger (silent)
 */
export const noopLogger: Logger = {
    debug: () => { },
    info: () => { },
    warn: () => { },
    error: () => { },
};

/**
 * Console logger for development/debugging
 */
export const consoleLogger: Logger = {
    debug: (msg, meta) => console.debug(`[ReportFlow:DEBUG] ${msg}`, meta ?? ''),
    info: (msg, meta) => console.info(`[ReportFlow:INFO] ${msg}`, meta ?? ''),
    warn: (msg, meta) => console.warn(`[ReportFlow:WARN] ${msg}`, meta ?? ''),
    error: (msg, meta) => console.error(`[ReportFlow:ERROR] ${msg}`, meta ?? ''),
};

/**
 * Log levels for filtering
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3,
    silent: 4,
};

/**
 * Creates a filtered logger that only logs messages at or above the specified level
 */
export function createFilteredLogger(baseLogger: Logger, level: LogLevel): Logger {
    const minPriority = LOG_LEVEL_PRIORITY[level];

    return {
        debug: (msg, meta) => {
            if (LOG_LEVEL_PRIORITY.debug >= minPriority) {
                baseLogger.debug(msg, meta);
            }
        },
        info: (msg, meta) => {
            if (LOG_LEVEL_PRIORITY.info >= minPriority) {
                baseLogger.info(msg, meta);
            }
        },
        warn: (msg, meta) => {
            if (LOG_LEVEL_PRIORITY.warn >= minPriority) {
                baseLogger.warn(msg, meta);
            }
        },
        error: (msg, meta) => {
            if (LOG_LEVEL_PRIORITY.error >= minPriority) {
                baseLogger.error(msg, meta);
            }
        },
    };
}

/**
 * Bind fixed metadata (session id, node name) to every log call.
 */
export function childLogger(baseLogger: Logger, bindings: Record<string, unknown>): Logger {
    return {
        debug: (msg, meta) => baseLogger.debug(msg, { ...bindings, ...meta }),
        info: (msg, meta) => baseLogger.info(msg, { ...bindings, ...meta }),
        warn: (msg, meta) => baseLogger.warn(msg, { ...bindings, ...meta }),
        error: (msg, meta) => baseLogger.error(msg, { ...bindings, ...meta }),
    };
}
