// src/backend/server.ts
import dotenv from "dotenv";
import { createApp } from "./app";
import { RedisCache, createRedisClient } from "./cache";
import { loadConfig } from "./config";
import { sampleStudents } from "./data/samples";
import { connectToDatabase, disconnectFromDatabase } from "./db";
import { createReadinessProbe } from "./health";
import { createLogger } from "./logger";
import { cacheObserver, createMetrics } from "./metrics";
import { MongoStudentRepository } from "./repositories/mongo-student.repository";
import { StudentService } from "./services/student.service";

dotenv.config();

// ---------- Startup: connect DB first, then listen ----------
async function start(): Promise<void> {
    const config = loadConfig();
    const logger = createLogger({ level: config.logLevel, json: config.env === "production" });

    await connectToDatabase({ uri: config.mongoUri, timeoutMs: config.storeTimeoutMs, logger });

    const redis = createRedisClient({ url: config.redisUrl, timeoutMs: config.cacheTimeoutMs, logger });
    try {
        await redis.connect();
    } catch (err) {
        // The cache is optional; requests go to the store until Redis comes back.
        logger.warn("Redis unavailable at startup, serving without cache", {
            err: err instanceof Error ? err.message : String(err)
        });
    }

    const repository = new MongoStudentRepository();
    const cache = new RedisCache(redis);
    const metrics = createMetrics();
    const students = new StudentService(repository, cache, {
        cacheTtlSeconds: config.cacheTtlSeconds,
        storeTimeoutMs: config.storeTimeoutMs,
        cacheTimeoutMs: config.cacheTimeoutMs,
        logger,
        observer: cacheObserver(metrics)
    });
    const readiness = createReadinessProbe(
        { store: () => repository.ping(), cache: () => cache.ping() },
        config.readinessTimeoutMs
    );

    if (config.seedSampleData) await students.seed(sampleStudents);

    const app = createApp({ students, readiness, metrics, logger });
    const server = app.listen(config.port, config.host, () => {
        logger.info(`Server listening on http://${config.host}:${config.port}`, { env: config.env });
    });

    const shutdown = async (signal: string) => {
        logger.info("Shutting down...", { signal });
        server.close();
        await Promise.allSettled([disconnectFromDatabase(), redis.quit()]);
        process.exit(0);
    };
    process.on("SIGINT", () => void shutdown("SIGINT"));
    process.on("SIGTERM", () => void shutdown("SIGTERM"));
}

start().catch((err: unknown) => {
    console.error("Failed to start:", err);
    process.exit(1);
});
