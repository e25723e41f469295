//
//
//

import winston, { Logger } from "winston";

export type LogLevel = "error" | "warn" | "info" | "debug";

export const LOG_LEVELS: readonly LogLevel[] = ["error", "warn", "info", "debug"];

const LEVEL_NAMES: ReadonlySet<string> = new Set<string>(LOG_LEVELS);

export function isLogLevel(value: string): value is LogLevel {
    return LEVEL_NAMES.has(value);
}

/**
 * Creates the application logger. Every level is written to stderr so that
 * log lines never interleave with the frames drawn on stdout.
 */
export function createLogger(level: LogLevel = "warn", silent = false): Logger {
    return winston.createLogger({
        level,
        silent,
        format: winston.format.combine(winston.format.colorize(), winston.format.simple()),
        transports: [new winston.transports.Console({ stderrLevels: [...LOG_LEVELS] })],
    });
}
