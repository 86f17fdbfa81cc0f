// src/backend/data/samples.ts
import { z } from "zod";
import { createStudentSchema, type NewStudent } from "../types/student";
import rawSamples from "./sample-students.json";

/** Sample students inserted into an empty store when SEED_SAMPLE_DATA=true. */
export const sampleStudents: readonly NewStudent[] = z.array(createStudentSchema).parse(rawSamples);
