/**
 * Logging for the sync engine
 *
 * The engine reports retries, resyncs, conflict resolutions and dropped zones
 * through a Logger. The default writes warnings and errors to the console.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface Logger {
    debug(message: string, details?: Record<string, unknown>): void;
    info(message: string, details?: Record<string, unknown>): void;
    warn(message: string, details?: Record<string, unknown>): void;
    error(message: string, details?: Record<string, unknown>): void;
}

const LEVELS: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
    silent: 100,
};

/**
 * Create a logger that writes to the console at or above the given level
 */
export function createConsoleLogger(level: LogLevel = 'warn', prefix = '[zonesync]'): Logger {
    const threshold = LEVELS[level];
    const emit = (messageLevel: Exclude<LogLevel, 'silent'>, message: string, details?: Record<string, unknown>) => {
        if (LEVELS[messageLevel] < threshold) return;
        const line = `${prefix} ${message}`;
        if (details) {
            console[messageLevel](line, details);
        } else {
            console[messageLevel](line);
        }
    };
    return {
        debug: (message, details) => emit('debug', message, details),
        info: (message, details) => emit('info', message, details),
        warn: (message, details) => emit('warn', message, details),
        error: (message, details) => emit('error', message, details),
    };
}

export const silentLogger: Logger = createConsoleLogger('silent');
