import { ScenarioError } from "./errors.js";
import type { GeoPoint, PlanePoint } from "./types.js";

const EARTH_RADIUS_M = 6371008.8;
const METRES_PER_DEGREE = (EARTH_RADIUS_M * Math.PI) / 180;

/**
 * Equirectangular projection around `refLat`, shifted so the north-west
 * corner of all fitted points is (0, 0); y grows southward.
 */
export type ProjectionFrame = {
    refLat: number;
    xScale: number;         // metres per degree of longitude
    yScale: number;         // metres per degree of latitude
    minX: number;
    maxY: number;
    width: number;
    height: number;
    precision: number;
};

function roundTo(v: number, precision: number) {
    const f = 10 ** precision;
    return Math.round(v * f) / f;
}

export function fitFrame(points: Iterable<GeoPoint>, precision = 2): ProjectionFrame {
    let minLon = Infinity, maxLon = -Infinity, minLat = Infinity, maxLat = -Infinity;
    let n = 0;
    for (const [lon, lat] of points) {
        if (lon < minLon) minLon = lon;
        if (lon > maxLon) maxLon = lon;
        if (lat < minLat) minLat = lat;
        if (lat > maxLat) maxLat = lat;
        n++;
    }
    if (!n) throw new ScenarioError("NO_POINTS", "no points to project");

    const refLat = (minLat + maxLat) / 2;
    const xScale = METRES_PER_DEGREE * Math.cos((refLat * Math.PI) / 180);
    const yScale = METRES_PER_DEGREE;
    const minX = minLon * xScale;
    const maxY = maxLat * yScale;
    return {
        refLat,
        xScale,
        yScale,
        minX,
        maxY,
        width: roundTo(maxLon * xScale - minX, precision),
        height: roundTo(maxY - minLat * yScale, precision),
        precision,
    };
}

export function applyFrame(frame: ProjectionFrame, points: GeoPoint[]): PlanePoint[] {
    return points.map(([lon, lat]) => [
        roundTo(lon * frame.xScale - frame.minX, frame.precision),
        roundTo(frame.maxY - lat * frame.yScale, frame.precision),
    ]);
}

/**
 * Collect-then-fit: every route adds its points first, the frame is fitted
 * once afterwards and no point can be added after that.
 */
export class ProjectionCollector {
    private readonly points: GeoPoint[] = [];
    private frame?: ProjectionFrame;

    add(points: Iterable<GeoPoint>) {
        if (this.frame) throw new ScenarioError("FRAME_STATE", "projection frame already fitted");
        for (const p of points) this.points.push(p);
    }

    get size() {
        return this.points.length;
    }

    fit(precision = 2): ProjectionFrame {
        if (this.frame) throw new ScenarioError("FRAME_STATE", "projection frame can only be fitted once");
        this.frame = fitFrame(this.points, precision);
        return this.frame;
    }
}
