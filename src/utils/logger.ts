/**
 * @fileoverview Scoped stderr logger.
 * Log lines go to stderr because stdout carries reports and the MCP
 * JSON-RPC stream.
 *
 * @module utils/logger
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
    silent: 100,
};

const ENV_VAR = 'OBJCLINT_LOG_LEVEL';

export interface Logger {
    debug(message: string, ...details: unknown[]): void;
    info(message: string, ...details: unknown[]): void;
    warn(message: string, ...details: unknown[]): void;
    error(message: string, ...details: unknown[]): void;
    /** Creates a logger for a nested scope (`cli` -> `cli:config`) */
    child(scope: string): Logger;
}

function isLogLevel(value: string): value is LogLevel {
    return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

function levelFromEnv(): LogLevel {
    const raw = process.env[ENV_VAR]?.trim().toLowerCase();
    return raw !== undefined && isLogLevel(raw) ? raw : 'warn';
}

let currentLevel: LogLevel = levelFromEnv();

/**
 * Sets the process-wide log level.
 */
export function setLogLevel(level: LogLevel): void {
    currentLevel = level;
}

export function getLogLevel(): LogLevel {
    return currentLevel;
}

/**
 * Creates a logger whose lines are prefixed with `[objclint:<scope>]`.
 *
 * @example
 * const log = createLogger('config');
 * log.info('Loaded .objclint.json');
 * // stderr: [objclint:config] Loaded .objclint.json
 */
export function createLogger(scope: string): Logger {
    const prefix = `[objclint:${scope}]`;

    const emit = (level: Exclude<LogLevel, 'silent'>, message: string, details: unknown[]): void => {
        if (LEVEL_ORDER[level] < LEVEL_ORDER[currentLevel]) return;
        const tag = level === 'info' ? '' : ` ${level}:`;
        console.error(`${prefix}${tag} ${message}`, ...details);
    };

    return {
        debug: (message, ...details) => emit('debug', message, details),
        info: (message, ...details) => emit('info', message, details),
        warn: (message, ...details) => emit('warn', message, details),
        error: (message, ...details) => emit('error', message, details),
        child: (child) => createLogger(`${scope}:${child}`),
    };
}
