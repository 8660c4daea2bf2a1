import * as z from "zod";
import type { CacheContext, InvalidationToken, StateHandle } from "@slot-cache/core";

export const rowSchema = z.object({
    id: z.string().min(1).describe("Stable row key"),
    text: z.string().describe("Row content"),
});

export type Row = z.infer<typeof rowSchema>;

export const editStepSchema = z.discriminatedUnion("op", [
    z.object({ op: z.literal("invalidate"), id: z.string() }),
    z.object({ op: z.literal("remove"), id: z.string() }),
    z.object({ op: z.literal("insert"), row: rowSchema, index: z.number().int().min(0).optional() }),
    z.object({ op: z.literal("rename"), id: z.string(), text: z.string() }),
    z.object({ op: z.literal("move"), id: z.string(), index: z.number().int().min(0) }),
]);

export type EditStep = z.infer<typeof editStepSchema>;

export function describeStep(step: EditStep): string {
    switch (step.op) {
        case "invalidate":
            return `invalidate ${step.id}`;
        case "remove":
            return `remove ${step.id}`;
        case "insert":
            return `insert ${step.row.id}`;
        case "rename":
            return `rename ${step.id}`;
        case "move":
            return `move ${step.id} to ${step.index}`;
    }
}

function indexOfRow(rows: Row[], id: string): number {
    const index = rows.findIndex((row) => row.id === id);
    if (index < 0) {
        throw new Error(`Row not found: ${id}`);
    }
    return index;
}

/**
 * Apply one edit to a row list, returning a new list
 */
export function applyEdit(rows: Row[], step: Exclude<EditStep, { op: "invalidate" }>): Row[] {
    switch (step.op) {
        case "remove": {
            const index = indexOfRow(rows, step.id);
            return [...rows.slice(0, index), ...rows.slice(index + 1)];
        }
        case "insert": {
            if (rows.some((row) => row.id === step.row.id)) {
                throw new Error(`Row already exists: ${step.row.id}`);
            }
            const index = Math.min(step.index ?? rows.length, rows.length);
            return [...rows.slice(0, index), step.row, ...rows.slice(index)];
        }
        case "rename": {
            const index = indexOfRow(rows, step.id);
            return rows.map((row, i) => (i === index ? { ...row, text: step.text } : row));
        }
        case "move": {
            const index = indexOfRow(rows, step.id);
            const moved = rows[index];
            if (!moved) return rows;
            const rest = [...rows.slice(0, index), ...rows.slice(index + 1)];
            const target = Math.min(step.index, rest.length);
            return [...rest.slice(0, target), moved, ...rest.slice(target)];
        }
    }
}

/**
 * Editor whose rows are keyed groups. Each row keeps its own `expanded` state
 * and can be invalidated on its own.
 */
export class SequenceEditor {
    private rows: StateHandle<Row[]> | null = null;
    /** Row list as of the last render plus the edits queued since */
    private current: Row[];
    private readonly tokens = new Map<string, InvalidationToken>();
    private readonly disposed: string[] = [];

    constructor(private readonly initialRows: Row[]) {
        this.current = initialRows;
    }

    get rowIds(): string[] {
        return this.current.map((row) => row.id);
    }

    /** Ids of rows that can currently be invalidated */
    get invalidatableRows(): string[] {
        return [...this.tokens.keys()];
    }

    /** Ids of rows whose state was torn down, in order */
    get disposedRows(): string[] {
        return [...this.disposed];
    }

    readonly render = (cx: CacheContext): string[] =>
        cx.group("editor", (editor) => {
            const rows = editor.state("rows", () => this.initialRows);
            this.rows = rows;
            this.current = rows.get();
            return this.current.map((row) =>
                editor.group(
                    "row",
                    (r) => {
                        const token = r.invalidationToken();
                        this.tokens.set(row.id, token);
                        r.state("expanded", () => false, {
                            dispose: () => {
                                this.disposed.push(row.id);
                                if (this.tokens.get(row.id) === token) {
                                    this.tokens.delete(row.id);
                                }
                            },
                        });
                        return `${row.id}:${row.text}`;
                    },
                    { key: row.id, args: row }
                )
            );
        });

    /**
     * Queue an edit for the next pass
     */
    apply(step: EditStep): void {
        if (step.op === "invalidate") {
            const token = this.tokens.get(step.id);
            if (!token || !token.alive) {
                throw new Error(`Row not found: ${step.id}`);
            }
            token.invalidate();
            return;
        }
        if (!this.rows) {
            throw new Error("Editor has not rendered yet");
        }
        const next = applyEdit(this.current, step);
        this.rows.set(next);
        this.current = next;
    }
}
