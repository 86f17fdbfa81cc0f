// src/backend/routes/system.ts
import { Router } from "express";
import type { ReadinessProbe } from "../health";
import type { Metrics } from "../metrics";
import type { StudentService } from "../services/student.service";

// Probes and counters polled by the load balancer, the orchestrator and Prometheus.
export function createSystemRouter(readiness: ReadinessProbe, students: StudentService, metrics: Metrics): Router {
    const router = Router();

    router.get("/healthcheck", (_req, res) => {
        res.status(200).json({ status: "healthy" });
    });

    router.get("/ready", async (_req, res) => {
        const report = await readiness.check();
        res.status(report.ready ? 200 : 503).json({
            status: report.ready ? "ready" : "not_ready",
            checks: report.checks
        });
    });

    router.get("/cache/stats", (_req, res) => {
        const stats = students.cacheStats();
        res.status(200).json({
            hits: stats.hits,
            misses: stats.misses,
            errors: stats.errors,
            hit_ratio: stats.hitRatio,
            ttl_seconds: stats.ttlSeconds
        });
    });

    router.get("/metrics", async (_req, res) => {
        res.set("Content-Type", metrics.registry.contentType).send(await metrics.registry.metrics());
    });

    return router;
}
