import * as z from "zod";
import type { RunDemoFunction, PassSummary } from "../../core/CoreDef.js";
import { parseWithSchema } from "../../utils/zod.js";
import { formatPassSummary, summarizePass } from "../report.js";
import { describeStep, editStepSchema, rowSchema, SequenceEditor } from "./sequenceEditor.js";

export const sequenceEditorParamsSchema = z.object({
    rows: z
        .array(rowSchema)
        .default([
            { id: "A", text: "alpha" },
            { id: "B", text: "beta" },
            { id: "C", text: "gamma" },
        ])
        .describe("Initial rows"),
    steps: z
        .array(editStepSchema)
        .default([
            { op: "invalidate", id: "B" },
            { op: "remove", id: "B" },
        ])
        .describe("Edits applied one per pass"),
});

export const runSequenceEditorDemo = (async (rawParams: unknown, { cache, log }) => {
    const params = parseWithSchema(sequenceEditorParamsSchema, rawParams ?? {}, "sequence-editor params");
    const editor = new SequenceEditor(params.rows);
    const passes: PassSummary[] = [];

    const runPass = (label: string) => {
        const output = cache.runPass(editor.render);
        const summary = summarizePass(label, output, cache.lastPassStats);
        passes.push(summary);
        log(formatPassSummary(summary));
    };

    runPass("initial");
    for (const step of params.steps) {
        editor.apply(step);
        runPass(describeStep(step));
    }

    return {
        report: { demo: "sequence-editor", passes },
        root: editor.render,
    };
}) satisfies RunDemoFunction<unknown>;
