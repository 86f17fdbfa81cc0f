// src/backend/health.ts
import { withTimeout } from "./errors";

export type ReadinessCheck = () => Promise<void>;

export interface CheckResult {
    status: "up" | "down";
    latencyMs: number;
    error?: string;
}

export interface ReadinessReport {
    ready: boolean;
    checks: Record<string, CheckResult>;
}

export interface ReadinessProbe {
    check(): Promise<ReadinessReport>;
}

/**
 * Runs every check on each call, concurrently, each bounded by
 * `timeoutMs`. Ready only when all of them pass. Nothing is cached
 * between calls.
 */
export function createReadinessProbe(checks: Record<string, ReadinessCheck>, timeoutMs: number): ReadinessProbe {
    const run = async (name: string, check: ReadinessCheck): Promise<[string, CheckResult]> => {
        const started = Date.now();
        try {
            await withTimeout(check(), timeoutMs, () => new Error(`${name} check timed out after ${timeoutMs}ms`));
            return [name, { status: "up", latencyMs: Date.now() - started }];
        } catch (err) {
            const error = err instanceof Error ? err.message : String(err);
            return [name, { status: "down", latencyMs: Date.now() - started, error }];
        }
    };

    return {
        async check() {
            const results = await Promise.all(Object.entries(checks).map(([name, check]) => run(name, check)));
            return {
                ready: results.every(([, result]) => result.status === "up"),
                checks: Object.fromEntries(results)
            };
        }
    };
}
