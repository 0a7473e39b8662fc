/**
 * Builds a ONE simulator scenario out of a GTFS feed.
 *
 * The feed is read and reduced to one canonical path, stop sequence,
 * schedule and duration table per route. Paths come from the feed's shapes or,
 * when the feed has none, from route relations of an OSM extract matched to the
 * feed routes. All coordinates are then projected into one shared plane and
 * written out as WKT/CSV files plus a settings file that wires them into host
 * groups: one transit vehicle group per route, one stationary relay host per
 * station.
 */

import fs from "node:fs";
import path from "node:path";

import { Diagnostics } from "./diagnostics.js";
import { ScenarioError } from "./errors.js";
import { GtfsReader } from "./gtfsReader.js";
import { parseOsmRoutes } from "./osmRoutes.js";
import { ProjectionCollector, applyFrame, type ProjectionFrame } from "./projection.js";
import { HostGroup, ScenarioSettings } from "./settings.js";
import type { ExceptionCounting, FeedStop, Logger, PlanePoint, ScheduleEntry, TransitRoute, WeekdayClass } from "./types.js";
import {
    assignFileStems,
    writeCsvSchedule,
    writeCsvStops,
    writeWktLineString,
    writeWktPoints,
    type ScheduleRow,
} from "./writers.js";

export const DATA_DIR = "data";
const NODES_FILE = "{}_nodes.wkt";
const STOPS_FILE = "{}_stops.csv";
const SCHEDULE_FILE = "{}_schedule.csv";
const STATIONS_FILE = "stations.wkt";
const NR_OF_HOSTS = 1;
const HOST_ID_DELIM = "_";

export type ScenarioOptions = {
    gtfsFile: string;
    osmFile?: string;
    routeTypes: number[];
    weekdayClass: WeekdayClass;
    maxExceptions: number;
    exceptionCounting: ExceptionCounting;
    fallbackToIrregular: boolean;
    outDir: string;
    precision: number;
};

export type ProjectedRoute = {
    name: string;
    stem: string;
    routeType: number;
    nodes: PlanePoint[];
    stops: PlanePoint[];
    durations: number[];
    schedule: ScheduleRow[];
};

export type Scenario = {
    name: string;
    frame: ProjectionFrame;
    routes: ProjectedRoute[];
    stations: PlanePoint[];
    diagnostics: Diagnostics;
};

export function scenarioName(gtfsFile: string) {
    return path.basename(gtfsFile, path.extname(gtfsFile));
}

function matchesStop(route: TransitRoute, i: number, stopId: string, stop: FeedStop | undefined) {
    return route.stopIds[i] === stopId || (stop !== undefined && route.stopNames[i] === stop.name);
}

/**
 * Schedule entries as positions in the route's stop list. Trips running the
 * same way as the reference trip are looked up front to back, the others back
 * to front; entries whose end stops are not on the route are dropped.
 */
export function resolveScheduleRows(
    route: TransitRoute,
    entries: ScheduleEntry[],
    stopOf: (stopId: string) => FeedStop | undefined,
    diagnostics: Diagnostics
): ScheduleRow[] {
    const n = route.stopIds.length;
    const rows: ScheduleRow[] = [];
    for (const e of entries) {
        const start = stopOf(e.startStop);
        const end = stopOf(e.endStop);
        const forward = e.direction === route.referenceTrip.direction;

        let startIndex = -1;
        let endIndex = -1;
        if (forward) {
            for (let i = 0; i < n && startIndex < 0; i++) if (matchesStop(route, i, e.startStop, start)) startIndex = i;
            for (let i = n - 1; i > startIndex && endIndex < 0; i--) if (matchesStop(route, i, e.endStop, end)) endIndex = i;
        } else {
            for (let i = n - 1; i >= 0 && startIndex < 0; i--) if (matchesStop(route, i, e.startStop, start)) startIndex = i;
            for (let i = 0; i < startIndex && endIndex < 0; i++) if (matchesStop(route, i, e.endStop, end)) endIndex = i;
        }

        if (startIndex < 0 || endIndex < 0) {
            diagnostics.report(
                "dropped-departure",
                `departure at ${e.startTime}s (${e.startStop} → ${e.endStop}) does not run along the route's stops`,
                `route ${route.name} schedule`
            );
            continue;
        }
        rows.push({ startTime: e.startTime, startIndex, endIndex, direction: startIndex < endIndex ? 0 : 1 });
    }
    return rows;
}

/** Everything in memory; nothing touches the output directory. */
export async function buildScenario(
    options: ScenarioOptions,
    log: Logger = console,
    diagnostics: Diagnostics = new Diagnostics()
): Promise<Scenario> {
    const name = scenarioName(options.gtfsFile);
    const gtfs = new GtfsReader(diagnostics, log);

    log.log(`\n=== Building scenario: ${name} ===`);
    log.log(`reading gtfs feed in ${options.gtfsFile}`);
    await gtfs.loadFeed(options.gtfsFile, { routeTypes: options.routeTypes, withShapes: !options.osmFile });
    gtfs.resolveService(options.weekdayClass, options.maxExceptions, {
        exceptionCounting: options.exceptionCounting,
        fallbackToIrregular: options.fallbackToIrregular,
    });

    let routes: TransitRoute[];
    if (options.osmFile) {
        log.log(`reading route paths from ${options.osmFile}`);
        const mapRoutes = parseOsmRoutes(fs.readFileSync(options.osmFile, "utf8"), diagnostics);
        log.log(`map routes: ${mapRoutes.length.toLocaleString()}`);
        routes = gtfs.setRefTrips(mapRoutes);
    } else {
        log.log("reading route paths from gtfs shapes");
        routes = gtfs.buildRefTrips();
    }
    if (!routes.length) {
        throw new ScenarioError("NO_ROUTES", "no route survived resolution, nothing to write");
    }

    log.log("building schedule and trip durations");
    const schedule = gtfs.schedule();
    const durations = gtfs.tripDurations();

    // every route's points go in before the frame is fitted
    const collector = new ProjectionCollector();
    for (const r of routes) collector.add(r.nodes);
    const frame = collector.fit(options.precision);
    log.log(`projection plane: ${frame.width} x ${frame.height} m`);

    const stems = assignFileStems(routes.map(r => r.name));
    const stationKeys = new Map<string, PlanePoint>();
    const projected: ProjectedRoute[] = routes.map(r => {
        const nodes = applyFrame(frame, r.nodes);
        const stops = r.stopIndices.map(i => nodes[i]);
        for (const s of stops) stationKeys.set(`${s[0]} ${s[1]}`, s);
        return {
            name: r.name,
            stem: stems.get(r.name) ?? r.name,
            routeType: r.routeType,
            nodes,
            stops,
            durations: durations.get(r.name) ?? [],
            schedule: resolveScheduleRows(r, schedule.get(r.name) ?? [], id => gtfs.stop(id), diagnostics),
        };
    });
    const stations = [...stationKeys.values()].sort((a, b) => a[0] - b[0] || a[1] - b[1]);

    log.log(`routes=${projected.length} stations=${stations.length}`);
    return { name, frame, routes: projected, stations, diagnostics };
}

export function scenarioSettings(scenario: Scenario, dataDir: string): ScenarioSettings {
    const file = (pattern: string, stem: string) => path.posix.join(dataDir, pattern.replace("{}", stem));
    const s = new ScenarioSettings(scenario.name);

    for (const r of scenario.routes) {
        const g = new HostGroup(r.stem, HOST_ID_DELIM)
            .set("movementModel", "TransitMapMovement")
            .set("routeFile", file(STOPS_FILE, r.stem))
            .set("scheduleFile", file(SCHEDULE_FILE, r.stem))
            .set("routeType", 2)
            .set("nrofHosts", NR_OF_HOSTS)
            .setOkMap(file(NODES_FILE, r.stem));
        s.addGroup(g);
    }

    s.addGroup(
        new HostGroup("S")
            .set("movementModel", "StationaryMultiPointMovement")
            .set("stationarySystemNr", 1)
            .set("pointFile", path.posix.join(dataDir, STATIONS_FILE))
            .set("nrofHosts", scenario.stations.length)
    );

    s.completeGroups();
    s.spacer();
    s.set("MovementModel.worldSize", `${Math.ceil(scenario.frame.width)}, ${Math.ceil(scenario.frame.height)}`);
    s.set("Events1.hosts", `0,${s.hostCount - 1}`);
    return s;
}

export type ScenarioFiles = {
    dataDir: string;
    settingsFile: string;
    files: string[];
};

export function writeScenario(scenario: Scenario, outDir: string, log: Logger = console): ScenarioFiles {
    const relDataDir = path.posix.join(DATA_DIR, scenario.name);
    const dataDir = path.join(outDir, DATA_DIR, scenario.name);
    fs.mkdirSync(dataDir, { recursive: true });

    const files: string[] = [];
    const out = (pattern: string, stem: string) => {
        const f = path.join(dataDir, pattern.replace("{}", stem));
        files.push(f);
        return f;
    };

    for (const r of scenario.routes) {
        writeWktLineString(r.nodes, out(NODES_FILE, r.stem));
        writeCsvStops(r.stops, r.durations, out(STOPS_FILE, r.stem));
        writeCsvSchedule(r.schedule, out(SCHEDULE_FILE, r.stem));
    }
    writeWktPoints(scenario.stations, out(STATIONS_FILE, ""));

    const settingsFile = path.join(outDir, `${scenario.name}_settings.txt`);
    fs.writeFileSync(settingsFile, scenarioSettings(scenario, relDataDir).toString());

    log.log(`[${scenario.name}] Done. files=${files.length + 1} in ${dataDir}`);
    return { dataDir, settingsFile, files };
}

export async function runScenario(options: ScenarioOptions, log: Logger = console): Promise<ScenarioFiles> {
    const diagnostics = new Diagnostics();
    try {
        const scenario = await buildScenario(options, log, diagnostics);
        return writeScenario(scenario, options.outDir, log);
    } finally {
        diagnostics.print(log);
    }
}
