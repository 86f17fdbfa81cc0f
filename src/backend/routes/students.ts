// src/backend/routes/students.ts
import { Router, type Request, type Response } from "express";
import type { z } from "zod";
import { ValidationError } from "../errors";
import type { StudentService } from "../services/student.service";
import {
    createStudentSchema,
    studentIdSchema,
    toStudentResponse,
    updateStudentSchema,
    type ApiError,
    type DeleteResponse,
    type StudentResponse
} from "../types/student";

function parse<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: unknown, message: string): T {
    const result = schema.safeParse(value);
    if (!result.success) throw ValidationError.fromZod(result.error, message);
    return result.data;
}

function parseId(raw: string): number {
    const result = studentIdSchema.safeParse(raw);
    if (!result.success) throw new ValidationError("Invalid student id.", { id: result.error.issues.map((i) => i.message) });
    return result.data;
}

/**
 * CRUD over students. Handlers only translate HTTP to service calls;
 * errors flow to the error handler (Express 5 forwards rejected promises).
 */
export function createStudentRouter(students: StudentService): Router {
    const router = Router();

    // List
    router.get("/students", async (_req, res: Response<StudentResponse[]>) => {
        const all = await students.listAll();
        res.status(200).json(all.map(toStudentResponse));
    });

    // Get by id
    router.get("/students/:id", async (req: Request<{ id: string }>, res: Response<StudentResponse>) => {
        const student = await students.getById(parseId(req.params.id));
        res.status(200).json(toStudentResponse(student));
    });

    // Create
    router.post("/students", async (req: Request, res: Response<StudentResponse | ApiError>) => {
        const input = parse(createStudentSchema, req.body, "Invalid body: 'name' and 'email' are required.");
        const student = await students.create(input);
        res.status(201)
            .location(`${req.baseUrl}/students/${student.id}`)
            .json(toStudentResponse(student));
    });

    // Update (partial: name/email/age)
    router.put("/students/:id", async (req: Request<{ id: string }>, res: Response<StudentResponse>) => {
        const id = parseId(req.params.id);
        const changes = parse(updateStudentSchema, req.body, "Invalid body.");
        const student = await students.update(id, changes);
        res.status(200).json(toStudentResponse(student));
    });

    // Delete
    router.delete("/students/:id", async (req: Request<{ id: string }>, res: Response<DeleteResponse>) => {
        const { id } = await students.delete(parseId(req.params.id));
        res.status(200).json({ message: "Student deleted.", id });
    });

    return router;
}
