// src/backend/repositories/student.repository.ts
import type { NewStudent, Student, StudentChanges } from "../types/student";

/**
 * Durable storage for students. Implementations assign ids, keep the
 * timestamps and enforce email uniqueness and the age range themselves.
 *
 * Failures are reported as the errors in ../errors: ConflictError for a
 * duplicate email, DependencyUnavailableError when the store can't be
 * reached. Anything else is unexpected.
 */
export interface StudentRepository {
    findAll(): Promise<Student[]>;
    findById(id: number): Promise<Student | null>;
    create(input: NewStudent): Promise<Student>;
    /** Resolves to null when there is no student with that id. */
    update(id: number, changes: StudentChanges): Promise<Student | null>;
    /** Resolves to false when there was nothing to delete. */
    delete(id: number): Promise<boolean>;
    count(): Promise<number>;
    /** Cheap round-trip used by the readiness probe. */
    ping(): Promise<void>;
}
