// src/backend/models/counter.model.ts
import mongoose, { Schema } from "mongoose";

interface Counter {
    _id: string;
    seq: number;
}

const CounterSchema = new Schema<Counter>(
    {
        _id: { type: String, required: true },
        seq: { type: Number, required: true, default: 0 }
    },
    { versionKey: false }
);

export const CounterModel = mongoose.model<Counter>("Counter", CounterSchema);

/**
 * Atomically bumps and returns the named sequence. Values are never
 * handed out twice, even after the documents using them are deleted.
 */
export async function nextSequence(name: string): Promise<number> {
    const counter = await CounterModel.findOneAndUpdate(
        { _id: name },
        { $inc: { seq: 1 } },
        { new: true, upsert: true }
    ).lean();
    if (!counter) throw new Error(`Sequence ${name} could not be incremented`);
    return counter.seq;
}
