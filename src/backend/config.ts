// src/backend/config.ts
import { z } from "zod";
import { LOG_LEVELS, type LogLevel } from "./logger";

export type Environment = "development" | "production" | "test";

export interface AppConfig {
    env: Environment;
    host: string;
    port: number;
    mongoUri: string;
    redisUrl: string;
    cacheTtlSeconds: number;
    storeTimeoutMs: number;
    cacheTimeoutMs: number;
    readinessTimeoutMs: number;
    seedSampleData: boolean;
    logLevel: LogLevel;
}

export class ConfigError extends Error {
    constructor(readonly problems: string[]) {
        super(`Invalid configuration: ${problems.join("; ")}`);
        this.name = "ConfigError";
    }
}

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const envSchema = z.object({
    NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
    HOST: z.string().min(1).default("0.0.0.0"),
    PORT: z.coerce.number().int().min(0).max(65535).default(3000),
    MONGODB_URI: z.string({ required_error: "is required" }).min(1, "is required"),
    REDIS_URL: z.string().min(1).default("redis://localhost:6379"),
    CACHE_TTL_SECONDS: positiveInt(300),
    STORE_TIMEOUT_MS: positiveInt(5000),
    CACHE_TIMEOUT_MS: positiveInt(500),
    READINESS_TIMEOUT_MS: positiveInt(2000),
    SEED_SAMPLE_DATA: z.enum(["true", "false"]).default("false"),
    LOG_LEVEL: z.enum(LOG_LEVELS).optional()
});

// Environment mode only picks the default verbosity.
const defaultLogLevel: Record<Environment, LogLevel> = {
    development: "debug",
    production: "info",
    test: "silent"
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
    const parsed = envSchema.safeParse(env);
    if (!parsed.success) {
        throw new ConfigError(parsed.error.issues.map((issue) => `${issue.path.join(".")} ${issue.message}`));
    }

    const vars = parsed.data;
    return {
        env: vars.NODE_ENV,
        host: vars.HOST,
        port: vars.PORT,
        mongoUri: vars.MONGODB_URI,
        redisUrl: vars.REDIS_URL,
        cacheTtlSeconds: vars.CACHE_TTL_SECONDS,
        storeTimeoutMs: vars.STORE_TIMEOUT_MS,
        cacheTimeoutMs: vars.CACHE_TIMEOUT_MS,
        readinessTimeoutMs: vars.READINESS_TIMEOUT_MS,
        seedSampleData: vars.SEED_SAMPLE_DATA === "true",
        logLevel: vars.LOG_LEVEL ?? defaultLogLevel[vars.NODE_ENV]
    };
}
