// src/backend/metrics.ts
import type { RequestHandler } from "express";
import { Counter, Histogram, Registry, collectDefaultMetrics } from "prom-client";
import type { CacheObserver } from "./services/student.service";

type HttpLabels = "method" | "route" | "status_code";

export interface Metrics {
    registry: Registry;
    httpRequests: Counter<HttpLabels>;
    httpDuration: Histogram<HttpLabels>;
    cacheHits: Counter;
    cacheMisses: Counter;
    cacheErrors: Counter<"operation">;
}

/**
 * A registry per app instance, so tests (and anything else building more
 * than one app) never collide on metric names.
 */
export function createMetrics({ collectDefaults = true }: { collectDefaults?: boolean } = {}): Metrics {
    const registry = new Registry();
    if (collectDefaults) collectDefaultMetrics({ register: registry });

    return {
        registry,
        httpRequests: new Counter({
            name: "http_requests_total",
            help: "Total HTTP requests",
            labelNames: ["method", "route", "status_code"] as const,
            registers: [registry]
        }),
        httpDuration: new Histogram({
            name: "http_request_duration_seconds",
            help: "HTTP request latency in seconds",
            labelNames: ["method", "route", "status_code"] as const,
            buckets: [0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5],
            registers: [registry]
        }),
        cacheHits: new Counter({
            name: "cache_hits_total",
            help: "Student cache hits",
            registers: [registry]
        }),
        cacheMisses: new Counter({
            name: "cache_misses_total",
            help: "Student cache misses",
            registers: [registry]
        }),
        cacheErrors: new Counter({
            name: "cache_errors_total",
            help: "Cache calls that failed or timed out",
            labelNames: ["operation"] as const,
            registers: [registry]
        })
    };
}

export function cacheObserver(metrics: Metrics): CacheObserver {
    return {
        hit: () => metrics.cacheHits.inc(),
        miss: () => metrics.cacheMisses.inc(),
        error: (operation) => metrics.cacheErrors.inc({ operation })
    };
}

/** Counts and times every response once it has been sent. */
export function requestMetrics(metrics: Metrics): RequestHandler {
    return (req, res, next) => {
        const stopTimer = metrics.httpDuration.startTimer();
        res.on("finish", () => {
            // Label by route pattern, not raw path, to keep cardinality bounded.
            const pattern: unknown = req.route?.path;
            const route = typeof pattern === "string" ? `${req.baseUrl}${pattern}` : "unmatched";
            const labels = { method: req.method, route, status_code: String(res.statusCode) };
            metrics.httpRequests.inc(labels);
            stopTimer(labels);
        });
        next();
    };
}
