//
//
//

import winston, { createLogger, Logger } from "winston";

export const LOG_LEVELS = ["error", "warn", "info", "debug"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export function isLogLevel(value: string): value is LogLevel {
    return LOG_LEVELS.some((level) => level === value);
}

export function createAppLogger(level: LogLevel = "info", silent = false): Logger {
    return createLogger({
        level,
        silent,
        format: winston.format.combine(winston.format.colorize(), winston.format.simple()),
        transports: [new winston.transports.Console()],
    });
}
