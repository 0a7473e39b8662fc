export type GeoPoint = [number, number]; // [lon, lat]
export type PlanePoint = [number, number]; // [x, y] in metres

// 0 = mon-fri, 1 = saturdays, 2 = sundays
export type WeekdayClass = 0 | 1 | 2;
export type Direction = 0 | 1;
export type ExceptionCounting = "both" | "added" | "removed";

export type Logger = Pick<Console, "log" | "warn">;

export const silentLogger: Logger = {
    log: () => undefined,
    warn: () => undefined,
};

export type FeedRoute = {
    id: string;
    name: string;           // short name, falls back to long name, then id
    routeType: number;
};

export type FeedStop = {
    id: string;
    name: string;
    lat: number;
    lon: number;
};

export type StopTime = {
    stopId: string;
    seq: number;
    arr: number;            // seconds after midnight, may exceed 24h
    dep: number;
};

export type FeedTrip = {
    id: string;
    routeName: string;
    serviceId: string;
    direction: Direction;
    shapeId?: string;
    stopTimes: StopTime[];
};

export type WeeklyRule = {
    kind: "weekly";
    mask: number;           // bit 0 = monday ... bit 6 = sunday
    startDate: string;      // YYYYMMDD
    endDate: string;
};

export type ServiceCalendar = {
    serviceId: string;
    weekly: WeeklyRule | null;
    added: ReadonlySet<string>;
    removed: ReadonlySet<string>;
};

export type ServicePattern = {
    serviceId: string;
    baseDates: string[];
    exceptionDates: string[];
    activeDates: string[];
    exceptionCount: number;
    regular: boolean;
    conflicts: string[];    // dates both added and removed
};

export type Feed = {
    routes: Map<string, FeedRoute[]>;     // keyed by route name
    stops: Map<string, FeedStop>;
    trips: FeedTrip[];                    // sorted by trip id
    calendars: Map<string, ServiceCalendar>;
    shapes: Map<string, GeoPoint[]>;
};

export type TripSelection = {
    routeName: string;
    direction: Direction;
    representative: FeedTrip;
    departures: FeedTrip[];
    regular: boolean;
};

export type ScheduleEntry = {
    startTime: number;
    startStop: string;
    endStop: string;
    direction: Direction;
};

export type TransitRoute = {
    name: string;
    routeType: number;
    nodes: GeoPoint[];
    stopIndices: number[];  // strictly increasing positions in nodes
    stopIds: string[];
    stopNames: string[];
    referenceTrip: FeedTrip;
};

export type MapRoute = {
    id: string;             // relation id in the extract
    name: string;
    firstStop: string;
    lastStop: string;
    stopCount: number;
    nodes: GeoPoint[];
    stops: GeoPoint[];
};
