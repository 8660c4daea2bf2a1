import type { PassStats } from "@slot-cache/core";
import type { PassSummary } from "../core/CoreDef.js";

export function summarizePass(label: string, output: string[], stats: PassStats | null): PassSummary {
    if (!stats) {
        throw new Error(`Pass "${label}" did not commit`);
    }
    return {
        label,
        output,
        evaluated: stats.evaluated,
        reentered: stats.reentered,
        skipped: stats.skipped,
        created: stats.created,
        tornDown: stats.tornDown,
        evaluations: stats.evaluations,
    };
}

export function formatPassSummary(summary: PassSummary): string {
    const { label, output, evaluated, reentered, skipped, created, tornDown } = summary;
    return (
        `[demo] ${label}: [${output.join(", ")}] ` +
        `evaluated=${evaluated} reentered=${reentered} skipped=${skipped} created=${created} tornDown=${tornDown}`
    );
}
