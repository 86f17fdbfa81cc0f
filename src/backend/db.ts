// src/backend/db.ts
import mongoose from "mongoose";
import type { Logger } from "./logger";
import { StudentModel } from "./models/student.model";

export interface DatabaseOptions {
    uri: string;
    /** Bounds server selection, and with it every command while disconnected. */
    timeoutMs: number;
    logger: Logger;
}

/**
 * Connect to MongoDB once at startup.
 * Mongoose manages an internal connection pool shared by every request.
 */
export async function connectToDatabase({ uri, timeoutMs, logger }: DatabaseOptions): Promise<void> {
    // Keeps queries strict; removes deprecation warnings.
    mongoose.set("strictQuery", true);
    // Fail instead of queueing while disconnected; the driver's server
    // selection timeout then bounds every command.
    mongoose.set("bufferCommands", false);

    mongoose.connection.on("connected", () => {
        logger.info("MongoDB connected", { database: mongoose.connection.name });
    });
    mongoose.connection.on("error", (err: unknown) => {
        logger.error("MongoDB connection error", { err });
    });
    mongoose.connection.on("disconnected", () => {
        logger.warn("MongoDB disconnected");
    });

    await mongoose.connect(uri, {
        serverSelectionTimeoutMS: timeoutMs,
        bufferCommands: false,
        family: 4
    });

    // Ensure indexes (unique email, unique id)
    await StudentModel.init();
}

/** Gracefully close DB on shutdown (CTRL+C, etc.) */
export async function disconnectFromDatabase(): Promise<void> {
    await mongoose.connection.close();
}
