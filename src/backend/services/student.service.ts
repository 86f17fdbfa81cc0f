// src/backend/services/student.service.ts
import type { z } from "zod";
import type { CacheStore } from "../cache";
import { ConflictError, DependencyUnavailableError, NotFoundError, withTimeout } from "../errors";
import { silentLogger, type Logger } from "../logger";
import type { StudentRepository } from "../repositories/student.repository";
import {
    studentListSnapshotSchema,
    studentSnapshotSchema,
    type NewStudent,
    type Student,
    type StudentChanges
} from "../types/student";

export const cacheKeys = {
    all: "students:all",
    student: (id: number) => `students:${id}`
} as const;

/** Told about every cache lookup; the metrics exporter listens here. */
export interface CacheObserver {
    hit(key: string): void;
    miss(key: string): void;
    error(operation: "get" | "set" | "delete"): void;
}

export interface StudentServiceOptions {
    cacheTtlSeconds: number;
    storeTimeoutMs: number;
    cacheTimeoutMs: number;
    logger?: Logger;
    observer?: CacheObserver;
}

export interface CacheStats {
    hits: number;
    misses: number;
    errors: number;
    hitRatio: number;
    ttlSeconds: number;
}

/**
 * Cache-aside access to student records.
 *
 * Reads try the cache first and fill it from the store on a miss. Every
 * write clears `students:all` plus the record's own key when it has one,
 * also when the write failed or its outcome is unknown; nothing is
 * written into the cache on the write path.
 *
 * The cache is best-effort: a cache call that fails or outlives
 * `cacheTimeoutMs` is logged and counted and the request carries on
 * against the store. Store calls are bounded by `storeTimeoutMs` and
 * fail with DependencyUnavailableError.
 */
export class StudentService {
    private hits = 0;
    private misses = 0;
    private errors = 0;
    private readonly logger: Logger;

    constructor(
        private readonly repository: StudentRepository,
        private readonly cache: CacheStore,
        private readonly options: StudentServiceOptions
    ) {
        this.logger = options.logger ?? silentLogger;
    }

    async listAll(): Promise<Student[]> {
        const cached = await this.readCache(cacheKeys.all, studentListSnapshotSchema);
        if (cached) return cached;

        const students = await this.store("list", () => this.repository.findAll());
        await this.writeCache(cacheKeys.all, students);
        return students;
    }

    async getById(id: number): Promise<Student> {
        const key = cacheKeys.student(id);
        const cached = await this.readCache(key, studentSnapshotSchema);
        if (cached) return cached;

        const student = await this.store("get", () => this.repository.findById(id));
        if (!student) throw new NotFoundError("Student", id);
        await this.writeCache(key, student);
        return student;
    }

    async create(input: NewStudent): Promise<Student> {
        const student = await this.write("create", [cacheKeys.all], () => this.repository.create(input));
        this.logger.info("Student created", { studentId: student.id });
        return student;
    }

    async update(id: number, changes: StudentChanges): Promise<Student> {
        const keys = [cacheKeys.student(id), cacheKeys.all];
        const student = await this.write("update", keys, () => this.repository.update(id, changes));
        if (!student) throw new NotFoundError("Student", id);
        this.logger.info("Student updated", { studentId: id, fields: Object.keys(changes) });
        return student;
    }

    async delete(id: number): Promise<{ id: number }> {
        const keys = [cacheKeys.student(id), cacheKeys.all];
        const deleted = await this.write("delete", keys, () => this.repository.delete(id));
        if (!deleted) throw new NotFoundError("Student", id);
        this.logger.info("Student deleted", { studentId: id });
        return { id };
    }

    cacheStats(): CacheStats {
        const lookups = this.hits + this.misses;
        return {
            hits: this.hits,
            misses: this.misses,
            errors: this.errors,
            hitRatio: lookups === 0 ? 0 : this.hits / lookups,
            ttlSeconds: this.options.cacheTtlSeconds
        };
    }

    /**
     * Inserts `samples` into an empty store. Returns how many were
     * inserted; 0 when the store already had students.
     */
    async seed(samples: readonly NewStudent[]): Promise<number> {
        const existing = await this.store("count", () => this.repository.count());
        if (existing > 0) return 0;

        let inserted = 0;
        for (const sample of samples) {
            try {
                await this.store("seed", () => this.repository.create(sample));
                inserted++;
            } catch (err) {
                // another instance seeding at the same time got there first
                if (!(err instanceof ConflictError)) throw err;
            }
        }
        await this.invalidate(cacheKeys.all);
        this.logger.info("Seeded sample students", { inserted });
        return inserted;
    }

    private store<T>(operation: string, work: () => Promise<T>): Promise<T> {
        return withTimeout(
            work(),
            this.options.storeTimeoutMs,
            () => new DependencyUnavailableError("store", `Student store timed out (${operation}).`)
        );
    }

    /**
     * Runs a store write and clears `keys` whatever the outcome. When the
     * write outlives the store timeout it may still commit, so the keys
     * are cleared again once it settles.
     */
    private async write<T>(operation: string, keys: string[], work: () => Promise<T>): Promise<T> {
        const pending = work();
        try {
            return await withTimeout(
                pending,
                this.options.storeTimeoutMs,
                () => new DependencyUnavailableError("store", `Student store timed out (${operation}).`)
            );
        } catch (err) {
            if (err instanceof DependencyUnavailableError) {
                const settle = () => this.invalidate(...keys);
                // invalidate() never rejects
                void pending.then(settle, settle);
            }
            throw err;
        } finally {
            await this.invalidate(...keys);
        }
    }

    private cacheCall<T>(operation: string, work: Promise<T>): Promise<T> {
        return withTimeout(
            work,
            this.options.cacheTimeoutMs,
            () => new DependencyUnavailableError("cache", `Cache timed out (${operation}).`)
        );
    }

    private async readCache<T>(key: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T | null> {
        let raw: string | null;
        try {
            raw = await this.cacheCall(`get ${key}`, this.cache.get(key));
        } catch (err) {
            this.cacheFailed("get", key, err);
            return this.miss(key);
        }
        if (raw === null) return this.miss(key);

        let parsed: z.SafeParseReturnType<unknown, T>;
        try {
            parsed = schema.safeParse(JSON.parse(raw));
        } catch (err) {
            this.logger.warn("Discarding unreadable cache entry", { key, err });
            return this.miss(key);
        }
        if (!parsed.success) {
            this.logger.warn("Discarding malformed cache entry", { key });
            return this.miss(key);
        }

        this.hits++;
        this.options.observer?.hit(key);
        this.logger.debug("Cache hit", { key });
        return parsed.data;
    }

    private async writeCache(key: string, value: Student | Student[]): Promise<void> {
        try {
            await this.cacheCall(`set ${key}`, this.cache.set(key, JSON.stringify(value), this.options.cacheTtlSeconds));
        } catch (err) {
            this.cacheFailed("set", key, err);
        }
    }

    private async invalidate(...keys: string[]): Promise<void> {
        try {
            await this.cacheCall(`delete ${keys.join(",")}`, this.cache.delete(...keys));
        } catch (err) {
            this.cacheFailed("delete", keys.join(","), err);
        }
    }

    private miss(key: string): null {
        this.misses++;
        this.options.observer?.miss(key);
        this.logger.debug("Cache miss", { key });
        return null;
    }

    private cacheFailed(operation: "get" | "set" | "delete", key: string, err: unknown): void {
        this.errors++;
        this.options.observer?.error(operation);
        this.logger.warn("Cache unavailable, continuing without it", {
            operation,
            key,
            err: err instanceof Error ? err.message : String(err)
        });
    }
}
