import * as z from "zod";
import type { CacheContext, StateHandle } from "@slot-cache/core";
import type { RunDemoFunction, PassSummary } from "../../core/CoreDef.js";
import { parseWithSchema } from "../../utils/zod.js";
import { formatPassSummary, summarizePass } from "../report.js";

export const counterParamsSchema = z.object({
    increments: z.number().int().min(0).default(3).describe("Writes made between passes"),
    step: z.number().int().default(1).describe("Amount added per write"),
});

/**
 * A counter cell written from outside the pass, next to a static label
 */
export function createCounter() {
    const refs: { count: StateHandle<number> | null } = { count: null };

    const render = (cx: CacheContext): string[] => {
        const value = cx.group("counter", (counter) => {
            const count = counter.state("count", () => 0);
            refs.count = count;
            return `count: ${count.get()}`;
        });
        const label = cx.group("label", () => "counter demo");
        return [label, value];
    };

    const increment = (step: number) => {
        if (!refs.count) {
            throw new Error("Counter has not rendered yet");
        }
        refs.count.update((n) => n + step);
    };

    return { render, increment };
}

export const runCounterDemo = (async (rawParams: unknown, { cache, log }) => {
    const params = parseWithSchema(counterParamsSchema, rawParams ?? {}, "counter params");
    const counter = createCounter();
    const passes: PassSummary[] = [];

    const runPass = (label: string) => {
        const output = cache.runPass(counter.render);
        const summary = summarizePass(label, output, cache.lastPassStats);
        passes.push(summary);
        log(formatPassSummary(summary));
    };

    runPass("initial");
    for (let i = 1; i <= params.increments; i++) {
        counter.increment(params.step);
        runPass(`increment ${i}`);
    }

    return {
        report: { demo: "counter", passes },
        root: counter.render,
    };
}) satisfies RunDemoFunction<unknown>;
