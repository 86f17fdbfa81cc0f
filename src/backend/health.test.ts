import { describe, it, expect } from "vitest";
import { createReadinessProbe } from "./health";

const up = () => Promise.resolve();
const down = () => Promise.reject(new Error("connect ECONNREFUSED"));
const hangs = () => new Promise<void>(() => undefined);

describe("createReadinessProbe", () => {
    it("is ready when every check passes", async () => {
        const report = await createReadinessProbe({ store: up, cache: up }, 50).check();
        expect(report.ready).toBe(true);
        expect(report.checks.store.status).toBe("up");
        expect(report.checks.cache.status).toBe("up");
    });

    it("is not ready when the store is down even if the cache is up", async () => {
        const report = await createReadinessProbe({ store: down, cache: up }, 50).check();
        expect(report.ready).toBe(false);
        expect(report.checks.store).toMatchObject({ status: "down", error: "connect ECONNREFUSED" });
        expect(report.checks.cache.status).toBe("up");
    });

    it("gives up on a check that does not answer in time", async () => {
        const report = await createReadinessProbe({ store: hangs, cache: up }, 20).check();
        expect(report.ready).toBe(false);
        expect(report.checks.store.error).toBe("store check timed out after 20ms");
    });

    it("runs the checks again on every call", async () => {
        let calls = 0;
        const probe = createReadinessProbe({ store: async () => void calls++ }, 50);
        await probe.check();
        await probe.check();
        expect(calls).toBe(2);
    });
});
