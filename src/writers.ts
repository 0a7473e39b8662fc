import fs from "node:fs";
import Papa from "papaparse";

import { compareIds } from "./gtfsUtils.js";
import type { PlanePoint } from "./types.js";

export type ScheduleRow = {
    startTime: number;
    startIndex: number;
    endIndex: number;
    direction: number;      // 0 = along the stops file, 1 = against it
};

function wktCoord([x, y]: PlanePoint) {
    return `${x} ${y}`;
}

export function wktLineString(coords: PlanePoint[]) {
    return `LINESTRING (${coords.map(wktCoord).join(", ")})`;
}

export function wktMultiPoint(points: PlanePoint[]) {
    return `MULTIPOINT (${points.map(p => `(${wktCoord(p)})`).join(", ")})`;
}

// one row per stop: "x y" and the seconds to the next stop (empty on the last one)
export function stopsCsv(coords: PlanePoint[], durations: number[]) {
    const rows = coords.map((c, i) => [wktCoord(c), i < durations.length ? durations[i] : ""]);
    return Papa.unparse(rows, { newline: "\n" });
}

export function scheduleCsv(rows: ScheduleRow[]) {
    return Papa.unparse(
        rows.map(r => [r.startTime, r.startIndex, r.endIndex, r.direction]),
        { newline: "\n" }
    );
}

export function writeWktLineString(coords: PlanePoint[], file: string) {
    fs.writeFileSync(file, wktLineString(coords) + "\n");
}

export function writeWktPoints(points: PlanePoint[], file: string) {
    fs.writeFileSync(file, wktMultiPoint(points) + "\n");
}

export function writeCsvStops(coords: PlanePoint[], durations: number[], file: string) {
    fs.writeFileSync(file, stopsCsv(coords, durations) + "\n");
}

export function writeCsvSchedule(rows: ScheduleRow[], file: string) {
    fs.writeFileSync(file, rows.length ? scheduleCsv(rows) + "\n" : "");
}

/**
 * File-name stems per route name. Anything outside [A-Za-z0-9_-] becomes "_";
 * stems that clash (case-insensitively) get -2, -3 ... in name order.
 */
export function assignFileStems(names: string[]): Map<string, string> {
    const out = new Map<string, string>();
    const taken = new Set<string>();
    for (const name of [...new Set(names)].sort(compareIds)) {
        const base = name.replace(/[^A-Za-z0-9_-]/g, "_") || "_";
        let stem = base;
        for (let n = 2; taken.has(stem.toLowerCase()); n++) stem = `${base}-${n}`;
        taken.add(stem.toLowerCase());
        out.set(name, stem);
    }
    return out;
}
