// src/backend/models/student.model.ts
import mongoose, { Schema } from "mongoose";

export interface StudentDocument {
    id: number;
    name: string;
    email: string;
    age?: number | null;
    createdAt: Date;
    updatedAt: Date;
}

const StudentSchema = new Schema<StudentDocument>(
    {
        id:    { type: Number, required: true, unique: true, immutable: true },
        name:  { type: String, required: true, trim: true, minlength: 1, maxlength: 100 },
        email: { type: String, required: true, trim: true, lowercase: true, maxlength: 100, unique: true, index: true },
        age: {
            type: Number,
            default: null,
            min: [1, "age must be greater than 0"],
            max: [149, "age must be less than 150"],
            validate: {
                validator: (v: unknown) => v === null || v === undefined || Number.isInteger(v),
                message: "age must be an integer"
            }
        }
    },
    // createdAt & updatedAt; the numeric `id` path replaces mongoose's string id virtual
    { timestamps: true, id: false, versionKey: false }
);

StudentSchema.index({ createdAt: 1 });

export const StudentModel = mongoose.model<StudentDocument>("Student", StudentSchema);
