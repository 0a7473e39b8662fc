import { parseArgs } from "node:util";
import { z } from "zod";

import { ScenarioError } from "./errors.js";
import type { ScenarioOptions } from "./scenario.js";

export const USAGE = `usage: gtfs-scenario <gtfs.zip> [options]

Creates a ONE scenario from a GTFS feed. If the feed has no shape data, the
routes can be matched to and read from an OpenStreetMap file (--osm).

  --osm <file>                 .osm file to match routes with when the feed has no shapes
  -t, --types <list>           route types to keep, comma separated (default 0, trams)
  -d, --weekday <0|1|2>        0 mon-fri, 1 saturdays, 2 sundays (default 0)
  -e, --max-exceptions <n>     max calendar exceptions of a regular service (default 180)
  --exception-counting <mode>  both | added | removed (default both)
  --strict                     drop routes that only run on irregular services
  -o, --out <dir>              simulator root to write into (default out, env SCENARIO_OUT_DIR)
  --precision <n>              decimals of projected coordinates (default 2, env SCENARIO_PRECISION)
  -q, --quiet                  only print the warning summary and errors
  -h, --help                   show this help
`;

const optionsSchema = z.object({
    gtfsFile: z.string({ required_error: "a GTFS feed (.zip) is required" }).min(1),
    osmFile: z.string().min(1).optional(),
    routeTypes: z
        .string()
        .regex(/^\s*\d+\s*(,\s*\d+\s*)*$/, "route types must be a comma separated list of numbers")
        .default("0")
        .transform(s => [...new Set(s.split(",").map(Number))]),
    weekdayClass: z.coerce
        .number()
        .pipe(z.union([z.literal(0), z.literal(1), z.literal(2)], { errorMap: () => ({ message: "weekday must be 0, 1 or 2" }) }))
        .default(0),
    maxExceptions: z.coerce.number().int().min(0).default(180),
    exceptionCounting: z.enum(["both", "added", "removed"]).default("both"),
    fallbackToIrregular: z.boolean().default(true),
    outDir: z.string().min(1).default("out"),
    precision: z.coerce.number().int().min(0).max(10).default(2),
});

export type Env = Record<string, string | undefined>;

function readArgs(argv: string[]) {
    try {
        return parseArgs({
            args: argv,
            allowPositionals: true,
            options: {
                osm: { type: "string" },
                types: { type: "string", short: "t" },
                weekday: { type: "string", short: "d" },
                "max-exceptions": { type: "string", short: "e" },
                "exception-counting": { type: "string" },
                strict: { type: "boolean" },
                out: { type: "string", short: "o" },
                precision: { type: "string" },
                quiet: { type: "boolean", short: "q" },
                help: { type: "boolean", short: "h" },
            },
        });
    } catch (err) {
        throw new ScenarioError("INVALID_OPTIONS", err instanceof Error ? err.message : String(err));
    }
}

export type CliOptions = ScenarioOptions & { help: boolean; quiet: boolean };

export function parseCliArgs(argv: string[], env: Env = {}): CliOptions {
    const { values, positionals } = readArgs(argv);
    const help = values.help ?? false;
    const quiet = values.quiet ?? false;

    const result = optionsSchema.safeParse({
        gtfsFile: positionals[0] ?? (help ? "-" : undefined),
        osmFile: values.osm,
        routeTypes: values.types,
        weekdayClass: values.weekday,
        maxExceptions: values["max-exceptions"],
        exceptionCounting: values["exception-counting"],
        fallbackToIrregular: !values.strict,
        outDir: values.out ?? env.SCENARIO_OUT_DIR,
        precision: values.precision ?? env.SCENARIO_PRECISION,
    });
    if (!result.success) {
        const msg = result.error.issues.map(i => `${i.path.join(".") || "options"}: ${i.message}`).join("; ");
        throw new ScenarioError("INVALID_OPTIONS", msg);
    }
    return { ...result.data, help, quiet };
}
