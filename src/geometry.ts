import type { GeoPoint } from "./types.js";

export type AlignedPath = {
    nodes: GeoPoint[];
    stopIndices: number[];
};

type Placement = {
    vertex: number;         // segment start (or the last vertex with t = 0)
    t: number;              // position along the segment, [0, 1)
};

const EPS = 1e-9;
const DEG = Math.PI / 180;

// local equirectangular plane, fine for distances within a city
function toPlane([lon, lat]: GeoPoint, refLat: number): [number, number] {
    return [lon * Math.cos(refLat * DEG), lat];
}

export function lerp(a: GeoPoint, b: GeoPoint, t: number): GeoPoint {
    return [a[0] + (b[0] - a[0]) * t, a[1] + (b[1] - a[1]) * t];
}

/**
 * Closest point of segment a-b to p, as the segment parameter t in [0, 1]
 * and squared planar distance.
 */
export function projectOntoSegment(p: GeoPoint, a: GeoPoint, b: GeoPoint, refLat: number, tMin = 0) {
    const [px, py] = toPlane(p, refLat);
    const [ax, ay] = toPlane(a, refLat);
    const [bx, by] = toPlane(b, refLat);
    const dx = bx - ax;
    const dy = by - ay;
    const len2 = dx * dx + dy * dy;

    let t = len2 === 0 ? 0 : ((px - ax) * dx + (py - ay) * dy) / len2;
    t = Math.min(1, Math.max(tMin, t));

    const cx = ax + t * dx - px;
    const cy = ay + t * dy - py;
    return { t, dist2: cx * cx + cy * cy };
}

function midLatitude(points: GeoPoint[]) {
    let min = Infinity;
    let max = -Infinity;
    for (const [, lat] of points) {
        if (lat < min) min = lat;
        if (lat > max) max = lat;
    }
    return (min + max) / 2;
}

/**
 * Places every stop, in travel order, on the closest segment of `path` at or
 * after the previous stop. Stops landing on a vertex reuse it, all others are
 * inserted into the path, so the returned indices strictly increase.
 */
export function alignStops(path: GeoPoint[], stops: GeoPoint[]): AlignedPath {
    if (path.length < 2) throw new Error(`cannot align stops on a path of ${path.length} points`);
    const refLat = midLatitude(path);
    const lastSegment = path.length - 2;

    const placements: Placement[] = [];
    let segment = 0;
    let tMin = 0;
    for (const stop of stops) {
        let best = { segment, t: tMin, dist2: Infinity };
        for (let i = segment; i <= lastSegment; i++) {
            const proj = projectOntoSegment(stop, path[i], path[i + 1], refLat, i === segment ? tMin : 0);
            if (proj.dist2 < best.dist2) best = { segment: i, t: proj.t, dist2: proj.dist2 };
        }
        segment = best.segment;
        tMin = best.t;
        placements.push(best.t >= 1 - EPS ? { vertex: best.segment + 1, t: 0 } : { vertex: best.segment, t: best.t });
    }

    const nodes: GeoPoint[] = [];
    const stopIndices: number[] = [];
    let next = 0;
    for (let v = 0; v < path.length; v++) {
        nodes.push(path[v]);
        const vertexIndex = nodes.length - 1;
        while (next < placements.length && placements[next].vertex === v) {
            const { t } = placements[next++];
            if (t <= EPS) {
                if (stopIndices[stopIndices.length - 1] === vertexIndex) {
                    // second stop on the same vertex
                    nodes.push(path[v]);
                    stopIndices.push(nodes.length - 1);
                } else {
                    stopIndices.push(vertexIndex);
                }
            } else {
                nodes.push(lerp(path[v], path[v + 1], t));
                stopIndices.push(nodes.length - 1);
            }
        }
    }
    return { nodes, stopIndices };
}

export function isOrderedSubsequence(indices: number[], length: number) {
    for (let i = 0; i < indices.length; i++) {
        if (indices[i] < 0 || indices[i] >= length) return false;
        if (i > 0 && indices[i] <= indices[i - 1]) return false;
    }
    return true;
}
