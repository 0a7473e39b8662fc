import { Diagnostics } from "./diagnostics.js";
import { pattern, trip } from "./testUtils/fixtures.js";
import { buildSchedule, representativeAmong, selectTrips, tripSpan } from "./tripSelector.js";

const patterns = new Map([
    ["WK", pattern("WK")],
    ["IRR", pattern("IRR", { regular: false })],
    ["IRR2", pattern("IRR2", { regular: false })],
    ["OFF", pattern("OFF", { active: false })],
]);

describe("representativeAmong", () => {
    test("picks the trip closest to the median span", () => {
        const trips = [
            trip("c", [["A", 0], ["B", 700]]),
            trip("a", [["A", 0], ["B", 600]]),
            trip("b", [["A", 0], ["B", 620]]),
        ];
        expect(representativeAmong(trips)?.id).toBe("b");
    });

    test("breaks ties on the smallest trip id", () => {
        // median of 600 and 640 is 620, both are 20 away
        const trips = [trip("T2", [["A", 0], ["B", 640]]), trip("T1", [["A", 0], ["B", 600]])];
        expect(representativeAmong(trips)?.id).toBe("T1");
    });

    test("nothing to pick from", () => {
        expect(representativeAmong([])).toBeUndefined();
    });
});

test("tripSpan runs from first departure to last arrival", () => {
    expect(tripSpan(trip("T", [["A", 100, 130], ["B", 400, 420]]))).toBe(270);
});

describe("selectTrips", () => {
    test("prefers trips on regular services", () => {
        const diagnostics = new Diagnostics();
        const trips = [
            trip("T1", [["A", 0], ["B", 600]]),
            trip("T2", [["A", 100], ["B", 700]], { service: "IRR" }),
        ];
        const [sel, ...rest] = selectTrips(trips, patterns, { fallbackToIrregular: true }, diagnostics);
        expect(rest).toEqual([]);
        expect(sel.routeName).toBe("1");
        expect(sel.regular).toBe(true);
        expect(sel.departures.map(t => t.id)).toEqual(["T1"]);
        expect(sel.representative.id).toBe("T1");
        expect(diagnostics.size).toBe(0);
    });

    test("falls back to the most common irregular service", () => {
        const diagnostics = new Diagnostics();
        const trips = [
            trip("T1", [["A", 0], ["B", 600]], { route: "2", service: "IRR2" }),
            trip("T2", [["A", 100], ["B", 700]], { route: "2", service: "IRR" }),
            trip("T3", [["A", 200], ["B", 800]], { route: "2", service: "IRR" }),
        ];
        const [sel] = selectTrips(trips, patterns, { fallbackToIrregular: true }, diagnostics);
        expect(sel.regular).toBe(false);
        expect(sel.departures.map(t => t.id)).toEqual(["T2", "T3"]);
        expect(diagnostics.list()).toEqual([
            { kind: "irregular-service", message: "no regular service, falling back to IRR", context: "route 2 direction 0" },
        ]);
    });

    test("drops routes without a regular service in strict mode", () => {
        const diagnostics = new Diagnostics();
        const trips = [trip("T1", [["A", 0], ["B", 600]], { route: "2", service: "IRR" })];
        expect(selectTrips(trips, patterns, { fallbackToIrregular: false }, diagnostics)).toEqual([]);
        expect(diagnostics.list()).toEqual([
            { kind: "dropped-route", message: "no regular service for the selected weekdays", context: "route 2 direction 0" },
        ]);
    });

    test("ignores inactive services, unknown services and single stop trips", () => {
        const trips = [
            trip("T1", [["A", 0], ["B", 600]], { service: "OFF" }),
            trip("T2", [["A", 0], ["B", 600]], { service: "NONE" }),
            trip("T3", [["A", 0]]),
        ];
        expect(selectTrips(trips, patterns, { fallbackToIrregular: true }, new Diagnostics())).toEqual([]);
    });

    test("orders selections by route name and direction", () => {
        const trips = [
            trip("T1", [["A", 0], ["B", 600]], { route: "2", direction: 1 }),
            trip("T2", [["A", 0], ["B", 600]], { route: "2" }),
            trip("T3", [["A", 0], ["B", 600]], { route: "11" }),
        ];
        const out = selectTrips(trips, patterns, { fallbackToIrregular: true }, new Diagnostics());
        expect(out.map(s => [s.routeName, s.direction])).toEqual([["11", 0], ["2", 0], ["2", 1]]);
    });
});

describe("buildSchedule", () => {
    test("one sorted entry per distinct departure", () => {
        const trips = [
            trip("T1", [["A", 500], ["B", 600]]),
            trip("T2", [["A", 100], ["B", 200]]),
            trip("T3", [["A", 100], ["B", 200]]),
            trip("T4", [["B", 100], ["A", 200]], { direction: 1 }),
        ];
        const selections = selectTrips(trips, patterns, { fallbackToIrregular: true }, new Diagnostics());
        const schedule = buildSchedule(selections);
        expect([...schedule.keys()]).toEqual(["1"]);
        expect(schedule.get("1")).toEqual([
            { startTime: 100, startStop: "A", endStop: "B", direction: 0 },
            { startTime: 100, startStop: "B", endStop: "A", direction: 1 },
            { startTime: 500, startStop: "A", endStop: "B", direction: 0 },
        ]);
    });
});
