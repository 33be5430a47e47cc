// src/utils/logger.ts
// Console logger for the swap router

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
    silent: 100,
};

function isLogLevel(value: string): value is LogLevel {
    return value in LEVEL_ORDER;
}

function resolveLevel(): LogLevel {
    const fromEnv = process.env.LOG_LEVEL?.toLowerCase();
    if (fromEnv && isLogLevel(fromEnv)) return fromEnv;
    return process.env.DEBUG === "1" ? "debug" : "info";
}

let threshold: LogLevel = resolveLevel();

export function setLogLevel(level: LogLevel): void {
    threshold = level;
}

export function getLogLevel(): LogLevel {
    return threshold;
}

function enabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[threshold];
}

export interface Logger {
    info(...args: unknown[]): void;
    warn(...args: unknown[]): void;
    error(...args: unknown[]): void;
    debug(...args: unknown[]): void;
    child(scope: string): Logger;
}

function makeLogger(prefix: string[]): Logger {
    return {
        info: (...args: unknown[]) => {
            if (enabled("info")) console.log("[INFO]", ...prefix, ...args);
        },
        warn: (...args: unknown[]) => {
            if (enabled("warn")) console.warn("[WARN]", ...prefix, ...args);
        },
        error: (...args: unknown[]) => {
            if (enabled("error")) console.error("[ERROR]", ...prefix, ...args);
        },
        debug: (...args: unknown[]) => {
            if (enabled("debug")) console.log("[DEBUG]", ...prefix, ...args);
        },
        child: (scope: string) => makeLogger([...prefix, `[${scope}]`]),
    };
}

export const logger: Logger = makeLogger([]);

/** Short form of a base58 address for log lines */
export function short(address: string): string {
    return address.length > 12 ? `${address.slice(0, 8)}...` : address;
}

export default logger;
