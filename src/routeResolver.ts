import type { Diagnostics } from "./diagnostics.js";
import { alignStops } from "./geometry.js";
import { compareIds } from "./gtfsUtils.js";
import { representativeAmong } from "./tripSelector.js";
import type { Feed, FeedStop, FeedTrip, GeoPoint, MapRoute, TransitRoute, TripSelection } from "./types.js";

function groupByRoute(selections: TripSelection[]) {
    const out = new Map<string, TripSelection[]>();
    for (const sel of selections) {
        const list = out.get(sel.routeName) ?? [];
        list.push(sel);
        out.set(sel.routeName, list);
    }
    for (const list of out.values()) list.sort((a, b) => a.direction - b.direction);
    return new Map([...out.entries()].sort((a, b) => compareIds(a[0], b[0])));
}

function tripStops(feed: Feed, trip: FeedTrip): FeedStop[] | undefined {
    const out: FeedStop[] = [];
    for (const st of trip.stopTimes) {
        const stop = feed.stops.get(st.stopId);
        if (!stop) return;
        out.push(stop);
    }
    return out;
}

function routeType(feed: Feed, name: string) {
    return feed.routes.get(name)?.[0]?.routeType ?? 0;
}

function buildRoute(feed: Feed, name: string, trip: FeedTrip, path: GeoPoint[], stopPoints: GeoPoint[], stops: FeedStop[]): TransitRoute {
    const { nodes, stopIndices } = alignStops(path, stopPoints);
    return {
        name,
        routeType: routeType(feed, name),
        nodes,
        stopIndices,
        stopIds: stops.map(s => s.id),
        stopNames: stops.map(s => s.name),
        referenceTrip: trip,
    };
}

/**
 * Native mode: the representative trip of the lowest direction supplies the
 * shape, its stops are projected onto that shape.
 */
export function resolveShapeRoutes(feed: Feed, selections: TripSelection[], diagnostics: Diagnostics): TransitRoute[] {
    const out: TransitRoute[] = [];
    for (const [name, sels] of groupByRoute(selections)) {
        const trip = sels[0].representative;
        const context = `route ${name}`;
        const shape = trip.shapeId ? feed.shapes.get(trip.shapeId) : undefined;
        if (!shape || shape.length < 2) {
            diagnostics.report("dropped-route", `trip ${trip.id} has no usable shape (${trip.shapeId ?? "no shape_id"})`, context);
            continue;
        }
        const stops = tripStops(feed, trip);
        if (!stops) {
            diagnostics.report("dropped-route", `trip ${trip.id} references unknown stops`, context);
            continue;
        }
        out.push(buildRoute(feed, name, trip, shape, stops.map(s => [s.lon, s.lat]), stops));
    }
    return out;
}

export function joinKey(name: string, firstStop: string, lastStop: string, stopCount: number) {
    return JSON.stringify([name, firstStop, lastStop, stopCount]);
}

function tripKey(feed: Feed, name: string, trip: FeedTrip) {
    const first = feed.stops.get(trip.stopTimes[0].stopId);
    const last = feed.stops.get(trip.stopTimes[trip.stopTimes.length - 1].stopId);
    if (!first || !last) return;
    return joinKey(name, first.name, last.name, trip.stopTimes.length);
}

/**
 * Reconciliation mode: joins map routes to feed trips on
 * (name, first stop name, last stop name, stop count). Geometry and stop
 * positions come from the map route, timing from the matching feed trips.
 * A route needs exactly one matching map route; one matched by several, or
 * by none, is dropped.
 */
export function reconcileRoutes(
    feed: Feed,
    selections: TripSelection[],
    mapRoutes: MapRoute[],
    diagnostics: Diagnostics
): TransitRoute[] {
    const index = new Map<string, MapRoute[]>();
    for (const r of mapRoutes) {
        const key = joinKey(r.name, r.firstStop, r.lastStop, r.stopCount);
        index.set(key, [...(index.get(key) ?? []), r]);
    }

    const used = new Set<MapRoute>();
    const out: TransitRoute[] = [];
    for (const [name, sels] of groupByRoute(selections)) {
        const context = `route ${name}`;
        let chosen: { mapRoute: MapRoute; trips: FeedTrip[] } | undefined;
        let ambiguous = false;

        for (const sel of sels) {
            const matches = new Map<MapRoute, FeedTrip[]>();
            for (const trip of sel.departures) {
                const key = tripKey(feed, name, trip);
                const candidates = key ? index.get(key) ?? [] : [];
                for (const r of candidates) {
                    matches.set(r, [...(matches.get(r) ?? []), trip]);
                }
            }
            if (!matches.size) continue;

            if (matches.size > 1) {
                ambiguous = true;
                const ids = [...matches.keys()].map(r => r.id).sort(compareIds);
                diagnostics.report("join-failure", `ambiguous: map routes ${ids.join(", ")} match direction ${sel.direction}`, context);
                break;
            }
            const [[mapRoute, trips]] = matches;
            chosen = { mapRoute, trips };
            break;
        }

        if (!chosen) {
            if (!ambiguous) {
                diagnostics.report("join-failure", "no map route with matching name, endpoints and stop count", context);
            }
            continue;
        }

        const { mapRoute, trips } = chosen;
        const trip = representativeAmong(trips);
        const stops = trip && tripStops(feed, trip);
        if (!trip || !stops) {
            diagnostics.report("dropped-route", "matched trips reference unknown stops", context);
            continue;
        }
        if (mapRoute.nodes.length < 2) {
            diagnostics.report("dropped-route", `map route ${mapRoute.id} has fewer than two nodes`, context);
            continue;
        }
        used.add(mapRoute);
        out.push(buildRoute(feed, name, trip, mapRoute.nodes, mapRoute.stops, stops));
    }

    for (const r of mapRoutes) {
        if (!used.has(r)) {
            diagnostics.report(
                "unmatched-map-route",
                `${r.firstStop} → ${r.lastStop}, ${r.stopCount} stops matches no feed route`,
                `map route ${r.name} (${r.id})`
            );
        }
    }
    return out;
}
