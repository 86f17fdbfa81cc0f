import { describe, it, expect } from "vitest";
import { sampleStudents } from "./samples";

describe("sampleStudents", () => {
    it("loads the sample list with unique emails", () => {
        expect(sampleStudents).toHaveLength(8);
        expect(sampleStudents[0]).toEqual({ name: "John Doe", email: "john.doe@example.com", age: 20 });
        expect(new Set(sampleStudents.map((s) => s.email)).size).toBe(8);
    });
});
