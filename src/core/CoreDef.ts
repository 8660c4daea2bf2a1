import type { CacheContext, GroupEvaluation, SlotCache } from "@slot-cache/core";

export type DemoConfig<T> = {
    demoName: string;
    params: T;
};

export type DemoContext = {
    cache: SlotCache;
    log: (message: string) => void;
};

export type PassSummary = {
    label: string;
    output: string[];
    evaluated: number;
    reentered: number;
    skipped: number;
    created: number;
    tornDown: number;
    evaluations: GroupEvaluation[];
};

export type DemoReport = {
    demo: string;
    passes: PassSummary[];
};

export type DemoRun = {
    report: DemoReport;
    /** Root of the demo's rebuild pass, re-run by the inspector */
    root: (cx: CacheContext) => string[];
};

export type RunDemoFunction<P> = (params: P, context: DemoContext) => Promise<DemoRun>;
