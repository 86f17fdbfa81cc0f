// src/backend/testing/in-memory.ts
// Stand-ins for MongoDB and Redis so tests stay inside the process.
import type { CacheStore } from "../cache";
import { ConflictError, DependencyUnavailableError } from "../errors";
import type { StudentRepository } from "../repositories/student.repository";
import type { NewStudent, Student, StudentChanges } from "../types/student";

export type Outage = "up" | "down" | "hang";

// Never settles; lets tests exercise the timeouts.
const hang = <T>(): Promise<T> => new Promise<T>(() => undefined);

export class InMemoryStudentRepository implements StudentRepository {
    state: Outage = "up";
    /** Delay before each call reaches the rows, read when the call starts. */
    latencyMs = 0;
    calls = 0;
    private readonly rows = new Map<number, Student>();
    private sequence = 0;

    constructor(private readonly clock: () => number = Date.now) {}

    async findAll(): Promise<Student[]> {
        await this.gate();
        return [...this.rows.values()].sort((a, b) => a.id - b.id).map((s) => ({ ...s }));
    }

    async findById(id: number): Promise<Student | null> {
        await this.gate();
        const row = this.rows.get(id);
        return row ? { ...row } : null;
    }

    async create(input: NewStudent): Promise<Student> {
        await this.gate();
        if ([...this.rows.values()].some((s) => s.email === input.email)) {
            throw new ConflictError("Email already exists.");
        }
        const now = this.now();
        const student: Student = {
            id: ++this.sequence,
            name: input.name,
            email: input.email,
            age: input.age ?? null,
            createdAt: now,
            updatedAt: now
        };
        this.rows.set(student.id, student);
        return { ...student };
    }

    async update(id: number, changes: StudentChanges): Promise<Student | null> {
        await this.gate();
        const row = this.rows.get(id);
        if (!row) return null;
        if (changes.email !== undefined && [...this.rows.values()].some((s) => s.id !== id && s.email === changes.email)) {
            throw new ConflictError("Email already exists.");
        }
        const next: Student = {
            ...row,
            name: changes.name ?? row.name,
            email: changes.email ?? row.email,
            age: changes.age !== undefined ? changes.age : row.age,
            updatedAt: this.now()
        };
        this.rows.set(id, next);
        return { ...next };
    }

    async delete(id: number): Promise<boolean> {
        await this.gate();
        return this.rows.delete(id);
    }

    async count(): Promise<number> {
        await this.gate();
        return this.rows.size;
    }

    async ping(): Promise<void> {
        await this.gate();
    }

    private gate(): Promise<void> {
        this.calls++;
        if (this.state === "down") return Promise.reject(new DependencyUnavailableError("store", "Student store is unavailable."));
        if (this.state === "hang") return hang();
        if (this.latencyMs > 0) return new Promise<void>((resolve) => setTimeout(resolve, this.latencyMs));
        return Promise.resolve();
    }

    private now(): Date {
        return new Date(this.clock());
    }
}

export class InMemoryCache implements CacheStore {
    state: Outage = "up";
    readonly entries = new Map<string, { value: string; expiresAt: number }>();
    readonly deleted: string[] = [];

    constructor(private readonly clock: () => number = Date.now) {}

    async get(key: string): Promise<string | null> {
        await this.gate();
        const entry = this.entries.get(key);
        if (!entry) return null;
        if (entry.expiresAt <= this.clock()) {
            this.entries.delete(key);
            return null;
        }
        return entry.value;
    }

    async set(key: string, value: string, ttlSeconds: number): Promise<void> {
        await this.gate();
        this.entries.set(key, { value, expiresAt: this.clock() + ttlSeconds * 1000 });
    }

    async delete(...keys: string[]): Promise<void> {
        await this.gate();
        for (const key of keys) {
            this.entries.delete(key);
            this.deleted.push(key);
        }
    }

    async ping(): Promise<void> {
        await this.gate();
    }

    private gate(): Promise<void> {
        if (this.state === "down") return Promise.reject(new Error("connect ECONNREFUSED 127.0.0.1:6379"));
        if (this.state === "hang") return hang();
        return Promise.resolve();
    }
}
