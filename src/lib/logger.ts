// src/lib/logger.ts

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;

export type LogLevel = typeof LOG_LEVELS[number];

export interface Logger {
    debug(message: string): void;
    info(message: string): void;
    warn(message: string): void;
    error(message: string): void;
}

const LEVEL_RANK: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
    silent: 100
};

/**
 * Timestamped console logger
 *
 * Output format: [2024-01-01T09:00:00.000Z] WARN coordinator: message
 *
 * @param scope Short component name printed on every line
 * @param level Minimum level written; lower levels are dropped
 */
export function createLogger(scope: string, level: LogLevel = 'info'): Logger {
    const threshold = LEVEL_RANK[level];

    const write = (lineLevel: Exclude<LogLevel, 'silent'>, message: string): void => {
        if (LEVEL_RANK[lineLevel] < threshold) {
            return;
        }
        const line = `[${new Date().toISOString()}] ${lineLevel.toUpperCase()} ${scope}: ${message}`;
        if (lineLevel === 'error') {
            console.error(line);
        } else if (lineLevel === 'warn') {
            console.warn(line);
        } else {
            console.log(line);
        }
    };

    return {
        debug: (message) => write('debug', message),
        info: (message) => write('info', message),
        warn: (message) => write('warn', message),
        error: (message) => write('error', message)
    };
}

export const silentLogger: Logger = createLogger('silent', 'silent');
