import { describe, it, expect } from "vitest";
import * as z from "zod";
import { parseWithSchema } from "../zod.js";

const schema = z.object({
    name: z.string(),
    limits: z.object({ max: z.number().int().min(1) }),
});

describe("parseWithSchema", () => {
    it("should return the parsed value", () => {
        expect(parseWithSchema(schema, { name: "a", limits: { max: 2 } }, "input")).toEqual({
            name: "a",
            limits: { max: 2 },
        });
    });

    it("should prefix nested issue paths", () => {
        expect(() => parseWithSchema(schema, { name: "a", limits: { max: 0 } }, "input")).toThrow(
            /^Invalid input: limits\.max: /
        );
    });

    it("should join several issues", () => {
        let message = "";
        try {
            parseWithSchema(schema, { limits: { max: 0 } }, "input");
        } catch (error) {
            message = error instanceof Error ? error.message : "";
        }
        expect(message.startsWith("Invalid input: name: ")).toBe(true);
        expect(message).toContain("; limits.max: ");
    });
});
