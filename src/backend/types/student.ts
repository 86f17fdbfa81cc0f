// src/backend/types/student.ts
import { z } from "zod";

// A student as the service sees it, whichever layer it came from.
export interface Student {
    id: number;
    name: string;
    email: string;
    age: number | null;
    createdAt: Date;
    updatedAt: Date;
}

const name = z
    .string({ required_error: "name is required", invalid_type_error: "name must be a string" })
    .trim()
    .min(1, "name must not be empty")
    .max(100, "name must be at most 100 characters");

const email = z
    .string({ required_error: "email is required", invalid_type_error: "email must be a string" })
    .trim()
    .toLowerCase()
    .min(1, "email must not be empty")
    .max(100, "email must be at most 100 characters")
    .email("email must be a valid email address");

const age = z
    .number({ invalid_type_error: "age must be a number" })
    .int("age must be an integer")
    .gt(0, "age must be greater than 0")
    .lt(150, "age must be less than 150")
    .nullable();

// The shape of data we expect from the client on create. Unknown keys are stripped.
export const createStudentSchema = z.object({
    name,
    email,
    age: age.optional()
});

// Partial update: any subset of the mutable fields, but at least one of them.
export const updateStudentSchema = createStudentSchema
    .partial()
    .refine(
        (v) => v.name !== undefined || v.email !== undefined || v.age !== undefined,
        "Provide at least one of: name, email, age."
    );

// Plain decimal digits only, so "0x10", "1e3" or " 7 " never alias another id.
export const studentIdSchema = z
    .string()
    .regex(/^[1-9]\d*$/, "id must be a positive integer")
    .transform(Number)
    .pipe(z.number().max(Number.MAX_SAFE_INTEGER, "id is too large"));

export type NewStudent = z.infer<typeof createStudentSchema>;
export type StudentChanges = z.infer<typeof updateStudentSchema>;

// What we keep in the cache. Dates travel as ISO strings and come back as Dates.
export const studentSnapshotSchema = z.object({
    id: z.number().int().positive(),
    name: z.string(),
    email: z.string(),
    age: z.number().int().nullable(),
    createdAt: z.coerce.date(),
    updatedAt: z.coerce.date()
});

export const studentListSnapshotSchema = z.array(studentSnapshotSchema);

// A single student on the wire.
export interface StudentResponse {
    id: number;
    name: string;
    email: string;
    age: number | null;
    created_at: string;
    updated_at: string;
}

export interface DeleteResponse {
    message: string;
    id: number;
}

// An error response payload.
export interface ApiError {
    error: string;
    details?: Record<string, string[]>;
}

export function toStudentResponse(student: Student): StudentResponse {
    return {
        id: student.id,
        name: student.name,
        email: student.email,
        age: student.age,
        created_at: student.createdAt.toISOString(),
        updated_at: student.updatedAt.toISOString()
    };
}
