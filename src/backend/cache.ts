// src/backend/cache.ts
import Redis from "ioredis";
import type { Logger } from "./logger";

/** String key/value cache with per-entry expiry. */
export interface CacheStore {
    get(key: string): Promise<string | null>;
    set(key: string, value: string, ttlSeconds: number): Promise<void>;
    delete(...keys: string[]): Promise<void>;
    /** Health: can we reach the backend? */
    ping(): Promise<void>;
}

// The slice of the ioredis client the cache uses.
export interface RedisCommands {
    get(key: string): Promise<string | null>;
    set(key: string, value: string, secondsToken: "EX", seconds: number): Promise<unknown>;
    del(...keys: string[]): Promise<number>;
    ping(): Promise<string>;
}

export class RedisCache implements CacheStore {
    constructor(private readonly redis: RedisCommands) {}

    get(key: string): Promise<string | null> {
        return this.redis.get(key);
    }

    async set(key: string, value: string, ttlSeconds: number): Promise<void> {
        await this.redis.set(key, value, "EX", ttlSeconds);
    }

    async delete(...keys: string[]): Promise<void> {
        if (keys.length === 0) return;
        await this.redis.del(...keys);
    }

    async ping(): Promise<void> {
        const reply = await this.redis.ping();
        if (reply !== "PONG") throw new Error(`Unexpected PING reply: ${reply}`);
    }
}

export interface RedisClientOptions {
    url: string;
    /** Per-command timeout; also bounds the initial connect. */
    timeoutMs: number;
    logger: Logger;
}

/**
 * One client per process. Commands fail straight away while the
 * connection is down instead of queueing, so callers can fall back to
 * the store; ioredis keeps reconnecting in the background.
 */
export function createRedisClient({ url, timeoutMs, logger }: RedisClientOptions): Redis {
    const redis = new Redis(url, {
        lazyConnect: true,
        enableOfflineQueue: false,
        maxRetriesPerRequest: 1,
        commandTimeout: timeoutMs,
        connectTimeout: timeoutMs
    });

    redis.on("ready", () => logger.info("Redis connected"));
    redis.on("error", (err: Error) => logger.warn("Redis error", { err: err.message }));
    redis.on("end", () => logger.warn("Redis connection closed"));

    return redis;
}
