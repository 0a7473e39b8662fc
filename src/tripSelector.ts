import type { Diagnostics } from "./diagnostics.js";
import { compareIds, median } from "./gtfsUtils.js";
import type { Direction, FeedTrip, ScheduleEntry, ServicePattern, TripSelection } from "./types.js";

export type SelectionOptions = {
    // use the most common irregular service when a route has no regular one
    fallbackToIrregular: boolean;
};

export function tripSpan(trip: FeedTrip) {
    const first = trip.stopTimes[0];
    const last = trip.stopTimes[trip.stopTimes.length - 1];
    return last.arr - first.dep;
}

/**
 * The trip whose span is closest to the median span of `trips`.
 * Equal distances go to the smallest trip id.
 */
export function representativeAmong(trips: FeedTrip[]): FeedTrip | undefined {
    const mid = median(trips.map(tripSpan));
    if (mid === undefined) return;
    return trips
        .slice()
        .sort((a, b) => Math.abs(tripSpan(a) - mid) - Math.abs(tripSpan(b) - mid) || compareIds(a.id, b.id))[0];
}

function mostCommonService(trips: FeedTrip[]) {
    const counts = new Map<string, number>();
    for (const t of trips) counts.set(t.serviceId, (counts.get(t.serviceId) ?? 0) + 1);
    return [...counts.entries()].sort((a, b) => b[1] - a[1] || compareIds(a[0], b[0]))[0][0];
}

export function selectTrips(
    trips: FeedTrip[],
    patterns: ReadonlyMap<string, ServicePattern>,
    options: SelectionOptions,
    diagnostics: Diagnostics
): TripSelection[] {
    const groups = new Map<string, { routeName: string; direction: Direction; trips: FeedTrip[] }>();
    for (const trip of trips) {
        const pattern = patterns.get(trip.serviceId);
        if (!pattern || !pattern.activeDates.length || trip.stopTimes.length < 2) continue;
        const key = JSON.stringify([trip.routeName, trip.direction]);
        let group = groups.get(key);
        if (!group) {
            group = { routeName: trip.routeName, direction: trip.direction, trips: [] };
            groups.set(key, group);
        }
        group.trips.push(trip);
    }

    const ordered = [...groups.values()].sort(
        (a, b) => compareIds(a.routeName, b.routeName) || a.direction - b.direction
    );

    const out: TripSelection[] = [];
    for (const { routeName, direction, trips: candidates } of ordered) {
        const context = `route ${routeName} direction ${direction}`;
        let departures = candidates.filter(t => patterns.get(t.serviceId)?.regular);
        const regular = departures.length > 0;

        if (!regular) {
            if (!options.fallbackToIrregular) {
                diagnostics.report("dropped-route", "no regular service for the selected weekdays", context);
                continue;
            }
            const serviceId = mostCommonService(candidates);
            departures = candidates.filter(t => t.serviceId === serviceId);
            diagnostics.report("irregular-service", `no regular service, falling back to ${serviceId}`, context);
        }

        const representative = representativeAmong(departures);
        if (!representative) continue;
        out.push({ routeName, direction, representative, departures, regular });
    }
    return out;
}

/** One entry per distinct departure, sorted by start time. */
export function buildSchedule(selections: TripSelection[]): Map<string, ScheduleEntry[]> {
    const byRoute = new Map<string, Map<string, ScheduleEntry>>();
    for (const sel of selections) {
        let entries = byRoute.get(sel.routeName);
        if (!entries) {
            entries = new Map();
            byRoute.set(sel.routeName, entries);
        }
        for (const trip of sel.departures) {
            const first = trip.stopTimes[0];
            const last = trip.stopTimes[trip.stopTimes.length - 1];
            const entry: ScheduleEntry = {
                startTime: first.dep,
                startStop: first.stopId,
                endStop: last.stopId,
                direction: sel.direction,
            };
            entries.set(JSON.stringify(entry), entry);
        }
    }

    const out = new Map<string, ScheduleEntry[]>();
    for (const name of [...byRoute.keys()].sort(compareIds)) {
        const entries = [...(byRoute.get(name)?.values() ?? [])].sort(
            (a, b) =>
                a.startTime - b.startTime ||
                a.direction - b.direction ||
                compareIds(a.startStop, b.startStop) ||
                compareIds(a.endStop, b.endStop)
        );
        out.set(name, entries);
    }
    return out;
}
