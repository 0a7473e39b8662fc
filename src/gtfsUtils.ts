import path from "node:path";
import { pipeline } from "node:stream/promises";
import { parse } from "csv-parse";
import type StreamZip from "node-stream-zip";
import { z } from "zod";

import { ScenarioError } from "./errors.js";

export type ZipArchive = InstanceType<typeof StreamZip.async>;
export type CsvRow = Record<string, string>;

// GTFS times go past 24:00:00 for trips running after midnight
export function hmsToSec(s?: string) {
    if (!s) return;
    const m = /^(\d+):(\d{2}):(\d{2})$/.exec(s.trim());
    if (!m) return;
    return +m[1] * 3600 + +m[2] * 60 + +m[3];
}

const BASIC_MODES: Record<number, string> = {
    0: "tram", 1: "metro", 2: "rail", 3: "bus", 4: "water",
    5: "cablecar", 6: "gondola", 7: "funicular", 11: "trolleybus", 12: "monorail",
};

// extended route types, inclusive ranges
const EXTENDED_MODES: [number, number, string][] = [
    [100, 117, "rail"],
    [200, 209, "coach"],
    [400, 405, "metro"],
    [700, 716, "bus"],
    [800, 800, "trolleybus"],
    [900, 906, "tram"],
    [1000, 1000, "water"],
    [1200, 1200, "water"],
    [1300, 1307, "aerial lift"],
    [1400, 1400, "funicular"],
];

// used for log lines only
export function routeTypeToMode(rt: number | string): string {
    const n = Number(rt);
    if (n in BASIC_MODES) return BASIC_MODES[n];
    return EXTENDED_MODES.find(([lo, hi]) => n >= lo && n <= hi)?.[2] ?? "unknown";
}

export function median(arr: number[]) {
    if (!arr.length) return;
    const a = arr.slice().sort((x, y) => x - y);
    const mid = Math.floor(a.length / 2);
    return a.length % 2 ? a[mid] : Math.round((a[mid - 1] + a[mid]) / 2);
}

export function compareIds(a: string, b: string) {
    return a < b ? -1 : a > b ? 1 : 0;
}

// context csv-parse attaches to the errors of skipped records
const csvErrorAt = z.object({ lines: z.number() });

const csvRecord = z.object({
    record: z.record(z.string()),
    info: z.object({ lines: z.number() }),
});

/**
 * Streams one csv entry of the archive row by row. `line` is the line the
 * record ended on, used for pointing at broken rows.
 * Records the parser cannot read go to `onSkip` instead of failing the
 * stream, once per record. Returns false when an optional entry is absent.
 */
export async function streamCsv(
    zip: ZipArchive,
    entry: string,
    fn: (row: CsvRow, line: number) => void,
    { optional = false, onSkip }: { optional?: boolean; onSkip?: (message: string, line?: number) => void } = {}
): Promise<boolean> {
    const entries = await zip.entries();
    const key = Object.keys(entries).find(k => path.basename(k).toLowerCase() === entry.toLowerCase());
    if (!key) {
        if (optional) return false;
        throw new ScenarioError("MISSING_ENTRY", `missing ${entry} in feed archive`);
    }
    const stream = await zip.stream(key);
    let lastSkipped: number | undefined;
    const parser = parse({
        columns: true,
        skip_empty_lines: true,
        bom: true,
        trim: true,
        info: true,
        relax_column_count: true,
        skip_records_with_error: true,
        on_skip: err => {
            const at = csvErrorAt.safeParse(err);
            const line = at.success ? at.data.lines : undefined;
            // a record can raise several errors before it is dropped
            if (line !== undefined && line === lastSkipped) return;
            lastSkipped = line;
            onSkip?.(err?.message ?? "unreadable record", line);
        },
    });
    await pipeline(
        stream,
        parser,
        async function (src: AsyncIterable<unknown>) {
            for await (const chunk of src) {
                const { record, info } = csvRecord.parse(chunk);
                fn(record, info.lines);
            }
        }
    );
    return true;
}
