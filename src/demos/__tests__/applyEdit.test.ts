import { describe, it, expect } from "vitest";
import { applyEdit, describeStep } from "../sequence-editor/sequenceEditor.js";
import type { Row } from "../sequence-editor/sequenceEditor.js";

const rows: Row[] = [
    { id: "A", text: "alpha" },
    { id: "B", text: "beta" },
    { id: "C", text: "gamma" },
];

const ids = (list: Row[]) => list.map((row) => row.id);

describe("applyEdit", () => {
    it("should remove a row", () => {
        expect(ids(applyEdit(rows, { op: "remove", id: "B" }))).toEqual(["A", "C"]);
    });

    it("should insert at an index or append", () => {
        const row = { id: "D", text: "delta" };
        expect(ids(applyEdit(rows, { op: "insert", row, index: 1 }))).toEqual(["A", "D", "B", "C"]);
        expect(ids(applyEdit(rows, { op: "insert", row }))).toEqual(["A", "B", "C", "D"]);
        expect(ids(applyEdit(rows, { op: "insert", row, index: 9 }))).toEqual(["A", "B", "C", "D"]);
    });

    it("should rename without touching the other rows", () => {
        const next = applyEdit(rows, { op: "rename", id: "A", text: "ALPHA" });
        expect(next[0]).toEqual({ id: "A", text: "ALPHA" });
        expect(next[1]).toBe(rows[1]);
        expect(rows[0]?.text).toBe("alpha");
    });

    it("should move a row", () => {
        expect(ids(applyEdit(rows, { op: "move", id: "C", index: 0 }))).toEqual(["C", "A", "B"]);
        expect(ids(applyEdit(rows, { op: "move", id: "A", index: 5 }))).toEqual(["B", "C", "A"]);
    });

    it("should throw for unknown or duplicate rows", () => {
        expect(() => applyEdit(rows, { op: "remove", id: "Z" })).toThrow("Row not found: Z");
        expect(() => applyEdit(rows, { op: "insert", row: { id: "A", text: "again" } })).toThrow(
            "Row already exists: A"
        );
    });
});

describe("describeStep", () => {
    it("should label each step", () => {
        expect(describeStep({ op: "invalidate", id: "A" })).toBe("invalidate A");
        expect(describeStep({ op: "move", id: "B", index: 2 })).toBe("move B to 2");
        expect(describeStep({ op: "insert", row: { id: "D", text: "delta" } })).toBe("insert D");
    });
});
