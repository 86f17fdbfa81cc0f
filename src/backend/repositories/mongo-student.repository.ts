// src/backend/repositories/mongo-student.repository.ts
import mongoose from "mongoose";
import { AppError, ConflictError, DependencyUnavailableError, ValidationError } from "../errors";
import { nextSequence } from "../models/counter.model";
import { StudentModel, type StudentDocument } from "../models/student.model";
import type { NewStudent, Student, StudentChanges } from "../types/student";
import type { StudentRepository } from "./student.repository";

const UNREACHABLE = new Set([
    "MongooseServerSelectionError",
    "MongoServerSelectionError",
    "MongoNetworkError",
    "MongoNetworkTimeoutError",
    "MongoNotConnectedError"
]);

function isDuplicateKey(err: unknown): boolean {
    return typeof err === "object" && err !== null && "code" in err && err.code === 11000;
}

function isUnreachable(err: unknown): err is Error {
    if (!(err instanceof Error)) return false;
    // Commands queued while disconnected fail with "Operation `x` buffering timed out".
    return UNREACHABLE.has(err.name) || err.message.includes("buffering timed out");
}

/** Maps driver and mongoose failures onto the service's error types. */
export function translateMongoError(err: unknown): unknown {
    if (err instanceof AppError) return err;
    if (isDuplicateKey(err)) return new ConflictError("Email already exists.");
    if (err instanceof mongoose.Error.ValidationError) {
        const details: Record<string, string[]> = {};
        for (const [path, cause] of Object.entries(err.errors)) details[path] = [cause.message];
        return new ValidationError("Student failed store validation.", details);
    }
    if (isUnreachable(err)) {
        return new DependencyUnavailableError("store", "Student store is unavailable.", { cause: err });
    }
    return err;
}

function toStudent(doc: StudentDocument): Student {
    return {
        id: doc.id,
        name: doc.name,
        email: doc.email,
        age: doc.age ?? null,
        createdAt: doc.createdAt,
        updatedAt: doc.updatedAt
    };
}

export class MongoStudentRepository implements StudentRepository {
    findAll(): Promise<Student[]> {
        return this.run(async () => {
            const rows = await StudentModel.find().sort({ id: 1 }).lean();
            return rows.map(toStudent);
        });
    }

    findById(id: number): Promise<Student | null> {
        return this.run(async () => {
            const row = await StudentModel.findOne({ id }).lean();
            return row ? toStudent(row) : null;
        });
    }

    create(input: NewStudent): Promise<Student> {
        return this.run(async () => {
            const id = await nextSequence("students");
            const doc = await StudentModel.create({ id, name: input.name, email: input.email, age: input.age ?? null });
            return toStudent(doc.toObject());
        });
    }

    update(id: number, changes: StudentChanges): Promise<Student | null> {
        return this.run(async () => {
            const update: Partial<Pick<StudentDocument, "name" | "email" | "age">> = {};
            if (changes.name !== undefined) update.name = changes.name;
            if (changes.email !== undefined) update.email = changes.email;
            if (changes.age !== undefined) update.age = changes.age;

            // timestamps: true makes mongoose refresh updatedAt here
            const row = await StudentModel.findOneAndUpdate(
                { id },
                { $set: update },
                { new: true, runValidators: true }
            ).lean();
            return row ? toStudent(row) : null;
        });
    }

    delete(id: number): Promise<boolean> {
        return this.run(async () => {
            const result = await StudentModel.deleteOne({ id });
            return result.deletedCount > 0;
        });
    }

    count(): Promise<number> {
        return this.run(() => StudentModel.countDocuments().exec());
    }

    ping(): Promise<void> {
        return this.run(async () => {
            // 1 === connected
            const db = mongoose.connection.db;
            if (mongoose.connection.readyState !== 1 || !db) {
                throw new DependencyUnavailableError("store", "Database not connected");
            }
            await db.admin().ping();
        });
    }

    private async run<T>(operation: () => Promise<T>): Promise<T> {
        try {
            return await operation();
        } catch (err) {
            throw translateMongoError(err);
        }
    }
}
