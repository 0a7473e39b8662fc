import { XMLParser } from "fast-xml-parser";
import { z } from "zod";

import type { Diagnostics } from "./diagnostics.js";
import type { GeoPoint, MapRoute } from "./types.js";

const ARRAY_ELEMENTS = new Set(["node", "way", "relation", "nd", "member", "tag"]);
const WAY_ROLES = new Set(["", "forward", "backward"]);
const STOP_ROLES = new Set(["stop", "stop_entry_only", "stop_exit_only"]);

const coordinate = z.string().trim().min(1).pipe(z.coerce.number());
const tags = z.array(z.object({ k: z.string(), v: z.string() })).default([]);

const osmNode = z.object({ id: z.string(), lat: coordinate, lon: coordinate, tag: tags });
const osmWay = z.object({ id: z.string(), nd: z.array(z.object({ ref: z.string() })).default([]), tag: tags });
const osmRelation = z.object({
    id: z.string(),
    member: z
        .array(z.object({ type: z.enum(["node", "way", "relation"]), ref: z.string(), role: z.string().default("") }))
        .default([]),
    tag: tags,
});
const osmDocument = z.object({
    osm: z.object({
        node: z.array(z.unknown()).default([]),
        way: z.array(z.unknown()).default([]),
        relation: z.array(z.unknown()).default([]),
    }),
});

type OsmNode = z.infer<typeof osmNode>;
type OsmRelation = z.infer<typeof osmRelation>;

function tagMap(list: { k: string; v: string }[]) {
    return new Map(list.map((t): [string, string] => [t.k, t.v]));
}

function recordId(raw: unknown) {
    const parsed = z.object({ id: z.string() }).safeParse(raw);
    return parsed.success ? parsed.data.id : "?";
}

/**
 * Chains way node lists into one path, flipping a way when its last node is
 * the one touching the path. Returns undefined on a gap.
 */
export function chainWays(ways: string[][]): string[] | undefined {
    const path: string[] = [];
    let chained = 0;
    for (const way of ways) {
        if (!way.length) continue;
        const first = way[0];
        const last = way[way.length - 1];
        if (!path.length) {
            path.push(...way);
            chained++;
            continue;
        }
        const touchesEnd = first === path[path.length - 1] || last === path[path.length - 1];
        // the first way may be stored against the direction of travel
        if (chained === 1 && !touchesEnd && (first === path[0] || last === path[0])) path.reverse();

        const end = path[path.length - 1];
        if (first === end) path.push(...way.slice(1));
        else if (last === end) path.push(...way.slice().reverse().slice(1));
        else return;
        chained++;
    }
    return path;
}

/** Route relations (type=route) of an OSM XML extract. */
export function parseOsmRoutes(xml: string, diagnostics: Diagnostics): MapRoute[] {
    const parser = new XMLParser({
        ignoreAttributes: false,
        attributeNamePrefix: "",
        parseAttributeValue: false,
        isArray: (name, _jpath, _isLeaf, isAttribute) => !isAttribute && ARRAY_ELEMENTS.has(name),
    });
    const doc = osmDocument.safeParse(parser.parse(xml));
    if (!doc.success) {
        diagnostics.report("malformed-record", "document has no <osm> root", "map extract");
        return [];
    }

    const nodes = new Map<string, OsmNode>();
    for (const raw of doc.data.osm.node) {
        const parsed = osmNode.safeParse(raw);
        if (!parsed.success) {
            diagnostics.report("malformed-record", parsed.error.issues[0]?.message ?? "invalid node", `node ${recordId(raw)}`);
            continue;
        }
        nodes.set(parsed.data.id, parsed.data);
    }

    const ways = new Map<string, string[]>();
    for (const raw of doc.data.osm.way) {
        const parsed = osmWay.safeParse(raw);
        if (!parsed.success) {
            diagnostics.report("malformed-record", parsed.error.issues[0]?.message ?? "invalid way", `way ${recordId(raw)}`);
            continue;
        }
        ways.set(parsed.data.id, parsed.data.nd.map(n => n.ref));
    }

    const out: MapRoute[] = [];
    for (const raw of doc.data.osm.relation) {
        const parsed = osmRelation.safeParse(raw);
        if (!parsed.success) {
            diagnostics.report("malformed-record", parsed.error.issues[0]?.message ?? "invalid relation", `relation ${recordId(raw)}`);
            continue;
        }
        const rel = parsed.data;
        if (tagMap(rel.tag).get("type") !== "route") continue;
        const route = toMapRoute(rel, nodes, ways, diagnostics);
        if (route) out.push(route);
    }
    return out;
}

function toMapRoute(
    rel: OsmRelation,
    nodes: Map<string, OsmNode>,
    ways: Map<string, string[]>,
    diagnostics: Diagnostics
): MapRoute | undefined {
    const context = `relation ${rel.id}`;
    const t = tagMap(rel.tag);
    const name = t.get("ref") ?? t.get("name");
    if (!name) {
        diagnostics.report("malformed-record", "route relation without ref or name", context);
        return;
    }

    const wayNodes: string[][] = [];
    const stops: OsmNode[] = [];
    for (const m of rel.member) {
        if (m.type === "way" && WAY_ROLES.has(m.role)) {
            const w = ways.get(m.ref);
            if (!w) {
                diagnostics.report("malformed-record", `unknown way ${m.ref}`, context);
                return;
            }
            wayNodes.push(w);
        } else if (m.type === "node" && STOP_ROLES.has(m.role)) {
            const n = nodes.get(m.ref);
            if (!n) {
                diagnostics.report("malformed-record", `unknown stop node ${m.ref}`, context);
                return;
            }
            stops.push(n);
        }
    }

    if (!wayNodes.length) {
        diagnostics.report("malformed-record", "route relation without ways", context);
        return;
    }
    if (stops.length < 2) {
        diagnostics.report("malformed-record", `route relation has ${stops.length} stops`, context);
        return;
    }
    const chained = chainWays(wayNodes);
    if (!chained) {
        diagnostics.report("malformed-record", "ways do not form a continuous path", context);
        return;
    }

    const path: GeoPoint[] = [];
    for (const ref of chained) {
        const n = nodes.get(ref);
        if (!n) {
            diagnostics.report("malformed-record", `unknown way node ${ref}`, context);
            return;
        }
        path.push([n.lon, n.lat]);
    }

    const stopName = (n: OsmNode) => (tagMap(n.tag).get("name") ?? n.id).trim();
    return {
        id: rel.id,
        name,
        firstStop: stopName(stops[0]),
        lastStop: stopName(stops[stops.length - 1]),
        stopCount: stops.length,
        nodes: path,
        stops: stops.map(n => [n.lon, n.lat]),
    };
}
