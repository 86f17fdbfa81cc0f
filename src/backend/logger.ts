// src/backend/logger.ts

export const LOG_LEVELS = ["debug", "info", "warn", "error", "silent"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export type LogMeta = Record<string, unknown>;

export interface Logger {
    debug(message: string, meta?: LogMeta): void;
    info(message: string, meta?: LogMeta): void;
    warn(message: string, meta?: LogMeta): void;
    error(message: string, meta?: LogMeta): void;
}

export interface LoggerOptions {
    level: LogLevel;
    /** One JSON object per line instead of readable text. */
    json?: boolean;
    name?: string;
}

const rank: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40, silent: 100 };

// Errors don't survive JSON.stringify on their own.
function serialize(meta: LogMeta): LogMeta {
    const out: LogMeta = {};
    for (const [key, value] of Object.entries(meta)) {
        out[key] = value instanceof Error ? { name: value.name, message: value.message, stack: value.stack } : value;
    }
    return out;
}

/**
 * Console logger with levels. Production gets JSON lines for the log
 * shipper, development gets something readable.
 */
export function createLogger({ level, json = false, name = "student-api" }: LoggerOptions): Logger {
    const write = (at: Exclude<LogLevel, "silent">, message: string, meta?: LogMeta) => {
        if (rank[at] < rank[level]) return;
        const sink = at === "error" ? console.error : at === "warn" ? console.warn : console.log;
        const time = new Date().toISOString();

        if (json) {
            sink(JSON.stringify({ time, level: at, name, message, ...(meta ? serialize(meta) : {}) }));
            return;
        }
        const suffix = meta && Object.keys(meta).length > 0 ? ` ${JSON.stringify(serialize(meta))}` : "";
        sink(`${time} ${at.toUpperCase()} [${name}] ${message}${suffix}`);
    };

    return {
        debug: (message, meta) => write("debug", message, meta),
        info: (message, meta) => write("info", message, meta),
        warn: (message, meta) => write("warn", message, meta),
        error: (message, meta) => write("error", message, meta)
    };
}

export const silentLogger: Logger = createLogger({ level: "silent" });
