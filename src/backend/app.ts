// src/backend/app.ts
import express, { type Express, type NextFunction, type Request, type Response } from "express";
import { AppError, ValidationError } from "./errors";
import type { ReadinessProbe } from "./health";
import { silentLogger, type Logger } from "./logger";
import { requestMetrics, type Metrics } from "./metrics";
import { createStudentRouter } from "./routes/students";
import { createSystemRouter } from "./routes/system";
import type { StudentService } from "./services/student.service";
import type { ApiError } from "./types/student";

export interface AppDependencies {
    students: StudentService;
    readiness: ReadinessProbe;
    metrics: Metrics;
    logger?: Logger;
}

const statusFor: Record<AppError["kind"], number> = {
    validation: 400,
    not_found: 404,
    conflict: 409,
    dependency_unavailable: 503
};

// body-parser marks a malformed JSON body this way
function isBodyParseError(err: unknown): boolean {
    return typeof err === "object" && err !== null && "type" in err && err.type === "entity.parse.failed";
}

/** Builds the Express app around already-connected collaborators. */
export function createApp({ students, readiness, metrics, logger = silentLogger }: AppDependencies): Express {
    const app = express();

    // ---------- Core middleware ----------
    app.use(requestMetrics(metrics));
    app.use((req, res, next) => {
        const started = Date.now();
        res.on("finish", () => {
            logger.debug("request", {
                method: req.method,
                path: req.originalUrl,
                status: res.statusCode,
                durationMs: Date.now() - started
            });
        });
        next();
    });
    app.use(express.json({ limit: "100kb" }));

    // ---------- Routes (bare and under /api/v1) ----------
    const system = createSystemRouter(readiness, students, metrics);
    const api = createStudentRouter(students);
    app.use("/api/v1", system, api);
    app.use(system, api);

    app.use((_req: Request, res: Response<ApiError>) => {
        res.status(404).json({ error: "The requested resource was not found." });
    });

    // ---------- Final error handler ----------
    app.use((err: unknown, req: Request, res: Response<ApiError>, _next: NextFunction) => {
        if (err instanceof AppError) {
            const status = statusFor[err.kind];
            const body: ApiError = { error: err.message };
            if (err instanceof ValidationError && Object.keys(err.details).length > 0) {
                body.details = err.details;
            }
            if (err.kind === "dependency_unavailable") {
                logger.error("Dependency unavailable", { method: req.method, path: req.originalUrl, err });
            }
            res.status(status).json(body);
            return;
        }
        if (isBodyParseError(err)) {
            res.status(400).json({ error: "Malformed JSON body." });
            return;
        }
        logger.error("Unhandled error", { method: req.method, path: req.originalUrl, err });
        res.status(500).json({ error: "Internal Server Error" });
    });

    return app;
}
