import StreamZip from "node-stream-zip";
import { z } from "zod";

import { resolveServicePatterns } from "./calendar.js";
import { Diagnostics } from "./diagnostics.js";
import { estimateDurations, interpolateTimes, type RawStopTime } from "./durations.js";
import { compareIds, hmsToSec, routeTypeToMode, streamCsv, type CsvRow, type ZipArchive } from "./gtfsUtils.js";
import { reconcileRoutes, resolveShapeRoutes } from "./routeResolver.js";
import { buildSchedule, selectTrips } from "./tripSelector.js";
import type {
    Direction,
    ExceptionCounting,
    Feed,
    FeedRoute,
    FeedStop,
    FeedTrip,
    GeoPoint,
    Logger,
    MapRoute,
    ScheduleEntry,
    ServiceCalendar,
    ServicePattern,
    TransitRoute,
    TripSelection,
    WeekdayClass,
} from "./types.js";

export type LoadOptions = {
    routeTypes: number[];
    withShapes: boolean;
};

export type ServiceOptions = {
    exceptionCounting?: ExceptionCounting;
    fallbackToIrregular?: boolean;
};

// ------------------------------
// row schemas
// ------------------------------

const id = z.string().min(1);
const numeric = z.string().min(1).pipe(z.coerce.number());
const gtfsDate = z.string().regex(/^\d{8}$/, "expected YYYYMMDD");
const flag = z.enum(["0", "1"]);

const routeRow = z.object({
    route_id: id,
    route_short_name: z.string().optional(),
    route_long_name: z.string().optional(),
    route_type: numeric.pipe(z.number().int()),
});
const tripRow = z.object({
    route_id: id,
    service_id: id,
    trip_id: id,
    direction_id: z.enum(["", "0", "1"]).optional(),
    shape_id: z.string().optional(),
});
const stopRow = z.object({
    stop_id: id,
    stop_name: z.string().optional(),
    stop_lat: numeric,
    stop_lon: numeric,
});
const stopTimeRow = z.object({
    trip_id: id,
    stop_id: id,
    stop_sequence: numeric.pipe(z.number().int()),
    arrival_time: z.string().optional(),
    departure_time: z.string().optional(),
});
const calendarRow = z.object({
    service_id: id,
    monday: flag,
    tuesday: flag,
    wednesday: flag,
    thursday: flag,
    friday: flag,
    saturday: flag,
    sunday: flag,
    start_date: gtfsDate,
    end_date: gtfsDate,
});
const calendarDateRow = z.object({
    service_id: id,
    date: gtfsDate,
    exception_type: z.enum(["1", "2"]),
});
const shapeRow = z.object({
    shape_id: id,
    shape_pt_lat: numeric,
    shape_pt_lon: numeric,
    shape_pt_sequence: numeric,
});

const WEEKDAY_COLUMNS = ["monday", "tuesday", "wednesday", "thursday", "friday", "saturday", "sunday"] as const;

function rowReader<T extends z.ZodTypeAny>(schema: T, entry: string, diagnostics: Diagnostics, fn: (row: z.infer<T>, line: number) => void) {
    return (row: CsvRow, line: number) => {
        const parsed = schema.safeParse(row);
        if (!parsed.success) {
            const issue = parsed.error.issues[0];
            diagnostics.report("malformed-record", `${issue?.path.join(".") || "row"}: ${issue?.message ?? "invalid"}`, `${entry}:${line}`);
            return;
        }
        fn(parsed.data, line);
    };
}

function skipped(entry: string, diagnostics: Diagnostics) {
    return (message: string, line?: number) =>
        diagnostics.report("malformed-record", message, line === undefined ? entry : `${entry}:${line}`);
}

function parseTime(raw: string | undefined, entry: string, line: number, diagnostics: Diagnostics) {
    if (!raw) return;
    const sec = hmsToSec(raw);
    if (sec === undefined) diagnostics.report("malformed-record", `bad time "${raw}"`, `${entry}:${line}`);
    return sec;
}

/**
 * Reads the parts of a GTFS archive the scenario needs. Only routes of the
 * given types are kept; trips, stop times and shapes are filtered to them.
 */
export async function readFeed(zip: ZipArchive, options: LoadOptions, diagnostics: Diagnostics, log: Logger): Promise<Feed> {
    const types = new Set(options.routeTypes);

    // --- routes ---
    const routeById = new Map<string, FeedRoute>();
    await streamCsv(zip, "routes.txt", rowReader(routeRow, "routes.txt", diagnostics, r => {
        if (!types.has(r.route_type)) return;
        const name = r.route_short_name || r.route_long_name || r.route_id;
        routeById.set(r.route_id, { id: r.route_id, name, routeType: r.route_type });
    }), { onSkip: skipped("routes.txt", diagnostics) });
    const routes = new Map<string, FeedRoute[]>();
    for (const route of [...routeById.values()].sort((a, b) => compareIds(a.id, b.id))) {
        routes.set(route.name, [...(routes.get(route.name) ?? []), route]);
    }
    const modes = [...new Set(options.routeTypes.map(routeTypeToMode))].join(", ");
    log.log(`routes=${routes.size.toLocaleString()} (${modes})`);

    // --- trips ---
    const tripMeta = new Map<string, Omit<FeedTrip, "stopTimes">>();
    await streamCsv(zip, "trips.txt", rowReader(tripRow, "trips.txt", diagnostics, r => {
        const route = routeById.get(r.route_id);
        if (!route) return;
        const direction: Direction = r.direction_id === "1" ? 1 : 0;
        tripMeta.set(r.trip_id, {
            id: r.trip_id,
            routeName: route.name,
            serviceId: r.service_id,
            direction,
            ...(r.shape_id ? { shapeId: r.shape_id } : {}),
        });
    }), { onSkip: skipped("trips.txt", diagnostics) });

    // --- stop_times (filtered by trips) ---
    const times = new Map<string, RawStopTime[]>();
    let seen = 0;
    await streamCsv(zip, "stop_times.txt", rowReader(stopTimeRow, "stop_times.txt", diagnostics, (r, line) => {
        seen++;
        if (!tripMeta.has(r.trip_id)) return;
        const list = times.get(r.trip_id) ?? [];
        list.push({
            stopId: r.stop_id,
            seq: r.stop_sequence,
            arr: parseTime(r.arrival_time, "stop_times.txt", line, diagnostics),
            dep: parseTime(r.departure_time, "stop_times.txt", line, diagnostics),
        });
        times.set(r.trip_id, list);
    }), { onSkip: skipped("stop_times.txt", diagnostics) });
    log.log(`stop_times: seen=${seen.toLocaleString()} trips=${times.size.toLocaleString()}`);

    const trips: FeedTrip[] = [];
    for (const meta of [...tripMeta.values()].sort((a, b) => compareIds(a.id, b.id))) {
        const list = (times.get(meta.id) ?? []).sort((a, b) => a.seq - b.seq);
        if (list.length < 2) continue;
        const stopTimes = interpolateTimes(list);
        if (!stopTimes) {
            diagnostics.report("malformed-record", "first or last stop has no time", `trip ${meta.id}`);
            continue;
        }
        trips.push({ ...meta, stopTimes });
    }

    // --- stops ---
    const used = new Set(trips.flatMap(t => t.stopTimes.map(st => st.stopId)));
    const stops = new Map<string, FeedStop>();
    await streamCsv(zip, "stops.txt", rowReader(stopRow, "stops.txt", diagnostics, r => {
        if (!used.has(r.stop_id)) return;
        stops.set(r.stop_id, { id: r.stop_id, name: r.stop_name || r.stop_id, lat: r.stop_lat, lon: r.stop_lon });
    }), { onSkip: skipped("stops.txt", diagnostics) });
    log.log(`kept stops: ${stops.size.toLocaleString()}`);

    // --- calendars ---
    const calendars = new Map<string, { weekly: ServiceCalendar["weekly"]; added: Set<string>; removed: Set<string> }>();
    const calendarOf = (serviceId: string) => {
        let c = calendars.get(serviceId);
        if (!c) {
            c = { weekly: null, added: new Set(), removed: new Set() };
            calendars.set(serviceId, c);
        }
        return c;
    };
    await streamCsv(zip, "calendar.txt", rowReader(calendarRow, "calendar.txt", diagnostics, r => {
        const mask = WEEKDAY_COLUMNS.reduce((m, day, bit) => (r[day] === "1" ? m | (1 << bit) : m), 0);
        calendarOf(r.service_id).weekly = { kind: "weekly", mask, startDate: r.start_date, endDate: r.end_date };
    }), { optional: true, onSkip: skipped("calendar.txt", diagnostics) });
    await streamCsv(zip, "calendar_dates.txt", rowReader(calendarDateRow, "calendar_dates.txt", diagnostics, r => {
        const c = calendarOf(r.service_id);
        (r.exception_type === "1" ? c.added : c.removed).add(r.date);
    }), { optional: true, onSkip: skipped("calendar_dates.txt", diagnostics) });

    // --- shapes ---
    const shapes = new Map<string, GeoPoint[]>();
    if (options.withShapes) {
        const wanted = new Set(trips.flatMap(t => (t.shapeId ? [t.shapeId] : [])));
        const points = new Map<string, { seq: number; p: GeoPoint }[]>();
        await streamCsv(zip, "shapes.txt", rowReader(shapeRow, "shapes.txt", diagnostics, r => {
            if (!wanted.has(r.shape_id)) return;
            const list = points.get(r.shape_id) ?? [];
            list.push({ seq: r.shape_pt_sequence, p: [r.shape_pt_lon, r.shape_pt_lat] });
            points.set(r.shape_id, list);
        }), { optional: true, onSkip: skipped("shapes.txt", diagnostics) });
        for (const [shapeId, list] of points) {
            shapes.set(shapeId, list.sort((a, b) => a.seq - b.seq).map(x => x.p));
        }
        log.log(`shapes: ${shapes.size.toLocaleString()}`);
    }

    return {
        routes,
        stops,
        trips,
        calendars: new Map(
            [...calendars.entries()].map(([serviceId, c]): [string, ServiceCalendar] => [serviceId, { serviceId, ...c }])
        ),
        shapes,
    };
}

/**
 * Feed facade used by the scenario builder. Call order:
 * loadFeed → resolveService → buildRefTrips | setRefTrips → the getters.
 */
export class GtfsReader {
    private feed?: Feed;
    private patterns = new Map<string, ServicePattern>();
    private selections: TripSelection[] = [];
    private routes: TransitRoute[] = [];

    constructor(
        readonly diagnostics: Diagnostics = new Diagnostics(),
        private readonly log: Logger = console
    ) {}

    async loadFeed(file: string, options: LoadOptions): Promise<Feed> {
        const zip = new StreamZip.async({ file });
        try {
            const feed = await readFeed(zip, options, this.diagnostics, this.log);
            this.feed = feed;
            return feed;
        } finally {
            await zip.close();
        }
    }

    private loaded(): Feed {
        if (!this.feed) throw new Error("feed not loaded, call loadFeed first");
        return this.feed;
    }

    resolveService(weekdayClass: WeekdayClass, maxExceptions: number, options: ServiceOptions = {}): TripSelection[] {
        const feed = this.loaded();
        this.patterns = resolveServicePatterns(
            feed.calendars,
            { weekdayClass, maxExceptions, exceptionCounting: options.exceptionCounting },
            this.diagnostics
        );
        this.selections = selectTrips(
            feed.trips,
            this.patterns,
            { fallbackToIrregular: options.fallbackToIrregular ?? true },
            this.diagnostics
        );
        this.log.log(`selected trips for ${new Set(this.selections.map(s => s.routeName)).size} routes`);
        return this.selections;
    }

    /** Native mode: geometry from the feed's own shapes. */
    buildRefTrips(): TransitRoute[] {
        this.routes = resolveShapeRoutes(this.loaded(), this.selections, this.diagnostics);
        return this.routes;
    }

    /** Reconciliation mode: geometry from map-extract routes. */
    setRefTrips(mapRoutes: MapRoute[]): TransitRoute[] {
        this.routes = reconcileRoutes(this.loaded(), this.selections, mapRoutes, this.diagnostics);
        return this.routes;
    }

    routeNames(): string[] {
        return this.routes.map(r => r.name);
    }

    shapePaths(): Map<string, GeoPoint[]> {
        return new Map(this.routes.map((r): [string, GeoPoint[]] => [r.name, r.nodes]));
    }

    shapeStops(): Map<string, GeoPoint[]> {
        return new Map(this.routes.map((r): [string, GeoPoint[]] => [r.name, r.stopIndices.map(i => r.nodes[i])]));
    }

    schedule(): Map<string, ScheduleEntry[]> {
        const names = new Set(this.routeNames());
        return buildSchedule(this.selections.filter(s => names.has(s.routeName)));
    }

    tripDurations(): Map<string, number[]> {
        return new Map(
            this.routes.map((r): [string, number[]] => [r.name, estimateDurations(r.referenceTrip, this.diagnostics)])
        );
    }

    serviceCalendars(): ReadonlyMap<string, ServiceCalendar> {
        return this.loaded().calendars;
    }

    servicePatterns(): ReadonlyMap<string, ServicePattern> {
        return this.patterns;
    }

    stop(stopId: string): FeedStop | undefined {
        return this.loaded().stops.get(stopId);
    }
}
