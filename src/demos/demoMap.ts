import type { RunDemoFunction } from "../core/CoreDef.js";
import { runCounterDemo } from "./counter/counterDemo.js";
import { runSequenceEditorDemo } from "./sequence-editor/sequenceEditorDemo.js";

export default {
    counter: runCounterDemo,
    "sequence-editor": runSequenceEditorDemo,
} satisfies Record<string, RunDemoFunction<unknown>>;
