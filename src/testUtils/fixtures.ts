/**
 * Test fixtures: hand-built trips, calendars and tiny GTFS archives.
 */

import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import JSZip from "jszip";
import Papa from "papaparse";

import type { Direction, FeedTrip, ServiceCalendar, ServicePattern } from "../types.js";

export const MON_FRI = 0b0011111;

/** [stopId, arrival, departure?] in seconds */
export type TimedStop = [string, number, number?];

export function trip(
    id: string,
    stops: TimedStop[],
    { route = "1", service = "WK", direction = 0, shapeId }: { route?: string; service?: string; direction?: Direction; shapeId?: string } = {}
): FeedTrip {
    return {
        id,
        routeName: route,
        serviceId: service,
        direction,
        ...(shapeId ? { shapeId } : {}),
        stopTimes: stops.map(([stopId, arr, dep], i) => ({ stopId, seq: i + 1, arr, dep: dep ?? arr })),
    };
}

export function calendar(
    serviceId: string,
    { mask = MON_FRI, start = "20240101", end = "20240114", added = [], removed = [] }:
        { mask?: number; start?: string; end?: string; added?: string[]; removed?: string[] } = {}
): ServiceCalendar {
    return {
        serviceId,
        weekly: { kind: "weekly", mask, startDate: start, endDate: end },
        added: new Set(added),
        removed: new Set(removed),
    };
}

export function pattern(serviceId: string, { regular = true, active = true } = {}): ServicePattern {
    const dates = active ? ["20240101"] : [];
    return {
        serviceId,
        baseDates: dates,
        exceptionDates: [],
        activeDates: dates,
        exceptionCount: regular ? 0 : 99,
        regular,
        conflicts: [],
    };
}

export function csv(rows: Record<string, string | number>[]) {
    return Papa.unparse(rows, { newline: "\n" });
}

export function tmpDir(prefix = "scenario-test-") {
    return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

/** Writes a zip with the given entries into `dir` and returns its path. */
export async function writeFeedZip(dir: string, name: string, files: Record<string, string>) {
    const zip = new JSZip();
    for (const [entry, content] of Object.entries(files)) zip.file(entry, content);
    const file = path.join(dir, name);
    fs.writeFileSync(file, await zip.generateAsync({ type: "nodebuffer" }));
    return file;
}
