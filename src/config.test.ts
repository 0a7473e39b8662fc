import { parseCliArgs } from "./config.js";
import { ScenarioError } from "./errors.js";

function failure(argv: string[]) {
    try {
        parseCliArgs(argv);
    } catch (err) {
        if (err instanceof ScenarioError) return { code: err.code, message: err.message };
        throw err;
    }
    throw new Error("expected parseCliArgs to fail");
}

describe("parseCliArgs", () => {
    test("defaults", () => {
        expect(parseCliArgs(["feed.zip"])).toEqual({
            gtfsFile: "feed.zip",
            routeTypes: [0],
            weekdayClass: 0,
            maxExceptions: 180,
            exceptionCounting: "both",
            fallbackToIrregular: true,
            outDir: "out",
            precision: 2,
            help: false,
            quiet: false,
        });
    });

    test("flags", () => {
        const options = parseCliArgs([
            "feed.zip",
            "--osm", "city.osm",
            "-t", "0, 3,0",
            "-d", "2",
            "-e", "5",
            "--exception-counting", "removed",
            "--strict",
            "-o", "sim",
            "--precision", "0",
        ]);
        expect(options).toMatchObject({
            gtfsFile: "feed.zip",
            osmFile: "city.osm",
            routeTypes: [0, 3],
            weekdayClass: 2,
            maxExceptions: 5,
            exceptionCounting: "removed",
            fallbackToIrregular: false,
            outDir: "sim",
            precision: 0,
        });
    });

    test("environment fills in what the command line leaves out", () => {
        const env = { SCENARIO_OUT_DIR: "from-env", SCENARIO_PRECISION: "3" };
        expect(parseCliArgs(["feed.zip"], env)).toMatchObject({ outDir: "from-env", precision: 3 });
        expect(parseCliArgs(["feed.zip", "-o", "cli"], env)).toMatchObject({ outDir: "cli", precision: 3 });
    });

    test("quiet", () => {
        expect(parseCliArgs(["feed.zip", "-q"]).quiet).toBe(true);
    });

    test("help needs no feed", () => {
        expect(parseCliArgs(["--help"]).help).toBe(true);
    });

    test("rejects bad values", () => {
        expect(failure([])).toEqual({ code: "INVALID_OPTIONS", message: "gtfsFile: a GTFS feed (.zip) is required" });
        expect(failure(["feed.zip", "-d", "3"])).toEqual({ code: "INVALID_OPTIONS", message: "weekdayClass: weekday must be 0, 1 or 2" });
        expect(failure(["feed.zip", "-t", "tram"])).toEqual({
            code: "INVALID_OPTIONS",
            message: "routeTypes: route types must be a comma separated list of numbers",
        });
        expect(failure(["feed.zip", "--exception-counting", "all"]).message).toMatch(/^exceptionCounting: /);
        expect(failure(["feed.zip", "--max-exceptions=-1"]).message).toMatch(/^maxExceptions: /);
    });

    test("unknown flags", () => {
        expect(failure(["feed.zip", "--colour"]).code).toBe("INVALID_OPTIONS");
    });
});
