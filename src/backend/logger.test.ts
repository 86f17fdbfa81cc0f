import { describe, it, expect, afterEach, vi } from "vitest";
import { createLogger } from "./logger";

describe("createLogger", () => {
    afterEach(() => {
        vi.restoreAllMocks();
    });

    it("drops messages below the configured level", () => {
        const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
        const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
        const logger = createLogger({ level: "warn" });

        logger.info("ignored");
        logger.warn("kept");

        expect(log).not.toHaveBeenCalled();
        expect(warn).toHaveBeenCalledTimes(1);
    });

    it("writes one JSON object per line in json mode", () => {
        const error = vi.spyOn(console, "error").mockImplementation(() => undefined);
        const logger = createLogger({ level: "info", json: true, name: "test" });

        logger.error("Student lookup failed", { studentId: 4, err: new Error("boom") });

        expect(error).toHaveBeenCalledTimes(1);
        const line = JSON.parse(String(error.mock.calls[0][0]));
        expect(line).toMatchObject({
            level: "error",
            name: "test",
            message: "Student lookup failed",
            studentId: 4,
            err: { name: "Error", message: "boom" }
        });
    });

    it("writes nothing when silent", () => {
        const error = vi.spyOn(console, "error").mockImplementation(() => undefined);
        createLogger({ level: "silent" }).error("nope");
        expect(error).not.toHaveBeenCalled();
    });
});
