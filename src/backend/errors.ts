// src/backend/errors.ts
import type { ZodError } from "zod";

/**
 * Errors the service layer raises. Only the HTTP error handler turns
 * them into status codes.
 */
export abstract class AppError extends Error {
    abstract readonly kind: "validation" | "not_found" | "conflict" | "dependency_unavailable";

    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

export class ValidationError extends AppError {
    readonly kind = "validation";

    constructor(message: string, readonly details: Record<string, string[]> = {}) {
        super(message);
    }

    static fromZod(error: ZodError, message = "Invalid request body."): ValidationError {
        const { formErrors, fieldErrors } = error.flatten();
        const details: Record<string, string[]> = {};
        for (const [field, messages] of Object.entries(fieldErrors)) {
            if (messages && messages.length > 0) details[field] = messages;
        }
        if (formErrors.length > 0) details.body = formErrors;
        return new ValidationError(message, details);
    }
}

export class NotFoundError extends AppError {
    readonly kind = "not_found";

    constructor(readonly resource: string, readonly id: number) {
        super(`${resource} ${id} not found.`);
    }
}

export class ConflictError extends AppError {
    readonly kind = "conflict";
}

export type Dependency = "store" | "cache";

export class DependencyUnavailableError extends AppError {
    readonly kind = "dependency_unavailable";

    constructor(readonly dependency: Dependency, message: string, options?: { cause?: unknown }) {
        super(message, options);
    }
}

/** Rejects with `onTimeout()` if `work` has not settled within `ms`. */
export async function withTimeout<T>(work: Promise<T>, ms: number, onTimeout: () => Error): Promise<T> {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
        timer = setTimeout(() => reject(onTimeout()), ms);
    });
    try {
        return await Promise.race([work, timeout]);
    } finally {
        clearTimeout(timer);
    }
}
