import { Diagnostics } from "./diagnostics.js";
import { joinKey, reconcileRoutes, resolveShapeRoutes } from "./routeResolver.js";
import { pattern, trip } from "./testUtils/fixtures.js";
import { selectTrips } from "./tripSelector.js";
import type { Feed, FeedStop, FeedTrip, GeoPoint, MapRoute } from "./types.js";

function feedOf(trips: FeedTrip[], shapes: Record<string, GeoPoint[]> = {}): Feed {
    const stops: FeedStop[] = [
        { id: "A", name: "Alpha", lat: 50, lon: 10 },
        { id: "B", name: "Mid", lat: 50, lon: 10.01 },
        { id: "C", name: "Zulu", lat: 50, lon: 10.02 },
    ];
    return {
        routes: new Map([["12", [{ id: "R12", name: "12", routeType: 0 }]]]),
        stops: new Map(stops.map((s): [string, FeedStop] => [s.id, s])),
        trips,
        calendars: new Map(),
        shapes: new Map(Object.entries(shapes)),
    };
}

function selectionsOf(feed: Feed) {
    return selectTrips(feed.trips, new Map([["WK", pattern("WK")]]), { fallbackToIrregular: true }, new Diagnostics());
}

function mapRoute(id: string, overrides: Partial<MapRoute> = {}): MapRoute {
    return {
        id,
        name: "12",
        firstStop: "Alpha",
        lastStop: "Zulu",
        stopCount: 3,
        nodes: [[10, 50], [10.01, 50], [10.02, 50], [10.02, 50.005]],
        stops: [[10, 50], [10.01, 50], [10.02, 50.005]],
        ...overrides,
    };
}

const outbound = (id: string, start: number) =>
    trip(id, [["A", start], ["B", start + 120], ["C", start + 300]], { route: "12", shapeId: "SH1" });

describe("resolveShapeRoutes", () => {
    test("places the stops of the representative trip on its shape", () => {
        const feed = feedOf([outbound("T1", 0), outbound("T2", 600)], { SH1: [[10, 50], [10.005, 50], [10.02, 50]] });
        const diagnostics = new Diagnostics();
        const [route, ...rest] = resolveShapeRoutes(feed, selectionsOf(feed), diagnostics);

        expect(rest).toEqual([]);
        expect(route.name).toBe("12");
        expect(route.routeType).toBe(0);
        expect(route.referenceTrip.id).toBe("T1");
        expect(route.stopIds).toEqual(["A", "B", "C"]);
        expect(route.stopNames).toEqual(["Alpha", "Mid", "Zulu"]);
        expect(route.stopIndices).toEqual([0, 2, 3]);
        expect(route.nodes).toHaveLength(4);
        expect(diagnostics.size).toBe(0);
    });

    test("drops routes without a usable shape", () => {
        const feed = feedOf([trip("T1", [["A", 0], ["C", 300]], { route: "12" })]);
        const diagnostics = new Diagnostics();
        expect(resolveShapeRoutes(feed, selectionsOf(feed), diagnostics)).toEqual([]);
        expect(diagnostics.list()).toEqual([
            { kind: "dropped-route", message: "trip T1 has no usable shape (no shape_id)", context: "route 12" },
        ]);
    });

    test("drops routes whose trip uses unknown stops", () => {
        const feed = feedOf([trip("T1", [["A", 0], ["X", 300]], { route: "12", shapeId: "SH1" })], {
            SH1: [[10, 50], [10.02, 50]],
        });
        const diagnostics = new Diagnostics();
        expect(resolveShapeRoutes(feed, selectionsOf(feed), diagnostics)).toEqual([]);
        expect(diagnostics.list().map(d => d.message)).toEqual(["trip T1 references unknown stops"]);
    });
});

describe("reconcileRoutes", () => {
    test("takes geometry from the matching map route", () => {
        const feed = feedOf([outbound("T1", 0), outbound("T2", 600)]);
        const diagnostics = new Diagnostics();
        const [route, ...rest] = reconcileRoutes(feed, selectionsOf(feed), [mapRoute("100")], diagnostics);

        expect(rest).toEqual([]);
        expect(route.nodes).toEqual([[10, 50], [10.01, 50], [10.02, 50], [10.02, 50.005]]);
        expect(route.stopIndices).toEqual([0, 1, 3]);
        expect(route.stopIds).toEqual(["A", "B", "C"]);
        expect(diagnostics.size).toBe(0);
    });

    test("a stop count mismatch finds nothing", () => {
        const feed = feedOf([outbound("T1", 0)]);
        const diagnostics = new Diagnostics();
        const routes = reconcileRoutes(feed, selectionsOf(feed), [mapRoute("100", { stopCount: 4 })], diagnostics);

        expect(routes).toEqual([]);
        expect(diagnostics.list()).toEqual([
            { kind: "join-failure", message: "no map route with matching name, endpoints and stop count", context: "route 12" },
            { kind: "unmatched-map-route", message: "Alpha → Zulu, 4 stops matches no feed route", context: "map route 12 (100)" },
        ]);
    });

    test("two map routes matching the same departures are ambiguous", () => {
        const feed = feedOf([outbound("T1", 0), outbound("T2", 600)]);
        const diagnostics = new Diagnostics();
        const routes = reconcileRoutes(feed, selectionsOf(feed), [mapRoute("100"), mapRoute("101")], diagnostics);

        expect(routes).toEqual([]);
        expect(diagnostics.list("join-failure")).toEqual([
            { kind: "join-failure", message: "ambiguous: map routes 100, 101 match direction 0", context: "route 12" },
        ]);
        expect(diagnostics.list("unmatched-map-route")).toHaveLength(2);
    });

    test("map routes matching different departures of one direction are ambiguous", () => {
        const shortTurn = trip("T3", [["B", 1200], ["C", 1380]], { route: "12" });
        const feed = feedOf([outbound("T1", 0), outbound("T2", 600), shortTurn]);
        const shortMap = mapRoute("300", {
            firstStop: "Mid",
            stopCount: 2,
            nodes: [[10.01, 50], [10.02, 50]],
            stops: [[10.01, 50], [10.02, 50]],
        });
        const diagnostics = new Diagnostics();
        const routes = reconcileRoutes(feed, selectionsOf(feed), [shortMap, mapRoute("100")], diagnostics);

        expect(routes).toEqual([]);
        expect(diagnostics.list("join-failure")).toEqual([
            { kind: "join-failure", message: "ambiguous: map routes 100, 300 match direction 0", context: "route 12" },
        ]);
        expect(diagnostics.list("unmatched-map-route").map(d => d.context)).toEqual(["map route 12 (300)", "map route 12 (100)"]);
    });

    test("join keys compare stop names exactly", () => {
        expect(joinKey("12", "Alpha", "Zulu", 3)).toBe(JSON.stringify(["12", "Alpha", "Zulu", 3]));
        expect(joinKey("12", " Alpha", "Zulu", 3)).not.toBe(joinKey("12", "Alpha", "Zulu", 3));
        expect(joinKey("12", "Alpha", "Zulu", 3)).not.toBe(joinKey("12", "Alpha", "Zulu", 4));
    });
});
