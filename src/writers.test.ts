import fs from "node:fs";
import path from "node:path";

import { tmpDir } from "./testUtils/fixtures.js";
import {
    assignFileStems,
    scheduleCsv,
    stopsCsv,
    wktLineString,
    wktMultiPoint,
    writeCsvSchedule,
    writeCsvStops,
    writeWktLineString,
    writeWktPoints,
} from "./writers.js";

describe("formats", () => {
    test("wkt", () => {
        expect(wktLineString([[0, 0], [1.5, 2]])).toBe("LINESTRING (0 0, 1.5 2)");
        expect(wktMultiPoint([[0, 0], [1.5, 2]])).toBe("MULTIPOINT ((0 0), (1.5 2))");
    });

    test("stops csv leaves the last duration empty", () => {
        expect(stopsCsv([[0, 0], [10, 0], [20, 5.25]], [30, 40])).toBe("0 0,30\n10 0,40\n20 5.25,");
    });

    test("schedule csv", () => {
        const rows = [
            { startTime: 28800, startIndex: 0, endIndex: 2, direction: 0 },
            { startTime: 36000, startIndex: 2, endIndex: 0, direction: 1 },
        ];
        expect(scheduleCsv(rows)).toBe("28800,0,2,0\n36000,2,0,1");
    });
});

describe("file writers", () => {
    let dir: string;

    beforeAll(() => {
        dir = tmpDir();
    });

    afterAll(() => {
        fs.rmSync(dir, { recursive: true, force: true });
    });

    const read = (name: string) => fs.readFileSync(path.join(dir, name), "utf8");

    test("end every file with a newline", () => {
        writeWktLineString([[0, 0], [1, 1]], path.join(dir, "nodes.wkt"));
        writeWktPoints([[0, 0]], path.join(dir, "points.wkt"));
        writeCsvStops([[0, 0], [1, 1]], [12], path.join(dir, "stops.csv"));
        writeCsvSchedule([{ startTime: 60, startIndex: 0, endIndex: 1, direction: 0 }], path.join(dir, "schedule.csv"));

        expect(read("nodes.wkt")).toBe("LINESTRING (0 0, 1 1)\n");
        expect(read("points.wkt")).toBe("MULTIPOINT ((0 0))\n");
        expect(read("stops.csv")).toBe("0 0,12\n1 1,\n");
        expect(read("schedule.csv")).toBe("60,0,1,0\n");
    });

    test("an empty schedule is an empty file", () => {
        writeCsvSchedule([], path.join(dir, "empty.csv"));
        expect(read("empty.csv")).toBe("");
    });
});

describe("assignFileStems", () => {
    test("replaces unsafe characters and numbers clashes in name order", () => {
        const stems = assignFileStems(["n1", "12_a", "12/a", "N1", "12"]);
        expect([...stems.entries()]).toEqual([
            ["12", "12"],
            ["12/a", "12_a"],
            ["12_a", "12_a-2"],
            ["N1", "N1"],
            ["n1", "n1-2"],
        ]);
    });

    test("names without safe characters", () => {
        expect(assignFileStems(["", "Ø"])).toEqual(new Map([["", "_"], ["Ø", "_-2"]]));
    });
});
