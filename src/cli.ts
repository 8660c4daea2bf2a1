import { program } from "commander";
import * as fs from "fs";
import * as z from "zod";
import { SlotCache } from "@slot-cache/core";
import { CacheInspector, startInspectorServer } from "@slot-cache/inspector";
import type { RunDemoFunction } from "./core/CoreDef.js";
import demoMap from "./demos/demoMap.js";
import { parseWithSchema } from "./utils/zod.js";

const DEFAULT_INSPECTOR_PORT = 4100;

const cliOptionsSchema = z.object({
    config: z.string().optional(),
    json: z.string().optional(),
    dump: z.boolean().optional(),
    debug: z.boolean().optional(),
    serve: z.union([z.boolean(), z.string()]).optional(),
});

const demoConfigSchema = z.object({
    demoName: z.string().min(1),
    params: z.unknown().optional(),
});

const portSchema = z.coerce.number().int().min(1).max(65535);

program
    .option("-c, --config <path>", "Path to a demo config file")
    .option("-j, --json <jsonString>", "Demo config as a JSON string")
    .option("--dump", "Print the slot table after the last pass")
    .option("--debug", "Log pass summaries from the cache")
    .option("--serve [port]", "Start the inspector server after the demo")
    .parse(process.argv);

const options = parseWithSchema(cliOptionsSchema, program.opts(), "options");

// Check for mutually exclusive parameters
if (options.config && options.json) {
    console.error("Error: --config and --json cannot be used together");
    process.exit(1);
}

if (!options.config && !options.json) {
    console.error("Error: provide --config or --json");
    process.exit(1);
}

try {
    const raw = options.config ? fs.readFileSync(options.config, "utf-8") : (options.json ?? "");
    const config = parseWithSchema(demoConfigSchema, JSON.parse(raw), "demo config");

    const demos: Record<string, RunDemoFunction<unknown>> = demoMap;
    const runDemo = Object.hasOwn(demos, config.demoName) ? demos[config.demoName] : undefined;
    if (!runDemo) {
        console.error(`Error: unknown demoName: ${config.demoName}`);
        process.exit(1);
    } else {
        const cache = new SlotCache({ debug: options.debug ?? false });
        const run = await runDemo(config.params, { cache, log: (message) => console.log(message) });
        console.log(JSON.stringify(run.report, null, 2));

        if (options.dump) {
            console.log(cache.dump());
        }

        if (options.serve !== undefined && options.serve !== false) {
            const port =
                options.serve === true
                    ? DEFAULT_INSPECTOR_PORT
                    : parseWithSchema(portSchema, options.serve, "port");
            const inspector = new CacheInspector(cache, {
                onInvalidate: () => {
                    try {
                        cache.runPass(run.root);
                    } catch (error) {
                        const message = error instanceof Error ? error.message : String(error);
                        console.error(`Error: pass after invalidation failed: ${message}`);
                    }
                },
            });
            startInspectorServer(inspector, { port });
        }
    }
} catch (error) {
    if (error instanceof Error) {
        console.error(`Error: ${error.message}`);
    } else {
        console.error("Unknown error");
    }
    process.exit(1);
}
