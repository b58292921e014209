/**
 * Overpass JSON response parsers.
 *
 * With `out body geom;`, Overpass returns:
 * - Nodes with `lat`/`lon` and `tags`
 * - Ways with `nodes[]` (OSM node IDs) and a parallel `geometry[]`
 * - Relations whose way members carry their own `geometry[]`
 *
 * Responses are validated with zod before use; anything structurally off
 * is a FacilitySourceError.
 */

import type { MultiPolygon, Point, Polygon, Position } from "geojson";
import type { Coordinate, FacilityRecord, OsmTags, RoadNetworkData, RoadWay } from "@hubline/types";
import { z } from "zod";
import { FacilitySourceError } from "../../errors.js";

const latLonSchema = z.object({ lat: z.number(), lon: z.number() });
const geometrySchema = z.array(latLonSchema.nullable());
const tagsSchema = z.record(z.string()).optional();

const nodeSchema = z.object({
  type: z.literal("node"),
  id: z.number(),
  lat: z.number(),
  lon: z.number(),
  tags: tagsSchema,
});

const waySchema = z.object({
  type: z.literal("way"),
  id: z.number(),
  nodes: z.array(z.number()).default([]),
  geometry: geometrySchema.optional(),
  tags: tagsSchema,
});

const memberSchema = z.object({
  type: z.string(),
  ref: z.number(),
  role: z.string().default(""),
  geometry: geometrySchema.optional(),
});

const relationSchema = z.object({
  type: z.literal("relation"),
  id: z.number(),
  members: z.array(memberSchema).default([]),
  tags: tagsSchema,
});

/** area, count, timeline ... and anything else Overpass may add */
const otherSchema = z.object({ type: z.string() }).passthrough();

const responseSchema = z.object({
  elements: z.array(z.union([nodeSchema, waySchema, relationSchema, otherSchema])),
});

type OverpassElement = z.infer<typeof responseSchema>["elements"][number];
type LatLon = z.infer<typeof latLonSchema>;

export interface FacilityParseResult {
  records: FacilityRecord[];
  /** Elements that could not become a facility (open ways, other relations, ...) */
  skipped: number;
  /** Of those, areas cut off by the query bbox (null geometry entries) */
  partial: number;
}

function parseResponse(json: unknown): OverpassElement[] {
  const result = responseSchema.safeParse(json);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new FacilitySourceError(
      `Malformed Overpass response${issue ? ` at ${issue.path.join(".")}: ${issue.message}` : ""}`,
    );
  }
  return result.data.elements;
}

/** Overpass leaves null in place of nodes outside the query bbox */
function hasGaps(geometry: ReadonlyArray<LatLon | null> | undefined): boolean {
  return geometry?.some((point) => point === null) ?? false;
}

function toPositions(geometry: ReadonlyArray<LatLon | null> | undefined): Position[] {
  const positions: Position[] = [];
  for (const point of geometry ?? []) {
    if (point) positions.push([point.lon, point.lat]);
  }
  return positions;
}

function samePosition(a: Position | undefined, b: Position | undefined): boolean {
  return a !== undefined && b !== undefined && a[0] === b[0] && a[1] === b[1];
}

function isClosedRing(ring: Position[]): boolean {
  return ring.length >= 4 && samePosition(ring[0], ring[ring.length - 1]);
}

/**
 * Join member lines that share endpoints into closed rings. Lines that
 * never close are discarded.
 */
export function assembleRings(lines: readonly Position[][]): Position[][] {
  const pending = lines.filter((line) => line.length >= 2).map((line) => [...line]);
  const rings: Position[][] = [];

  let ring = pending.shift();
  while (ring) {
    let extended = true;
    while (!isClosedRing(ring) && extended) {
      extended = false;
      for (let i = 0; i < pending.length; i++) {
        const line = pending[i];
        if (!line) continue;
        const start = ring[0];
        const end = ring[ring.length - 1];
        const first = line[0];
        const last = line[line.length - 1];

        if (samePosition(end, first)) ring = ring.concat(line.slice(1));
        else if (samePosition(end, last)) ring = ring.concat(line.slice(0, -1).reverse());
        else if (samePosition(start, last)) ring = line.slice(0, -1).concat(ring);
        else if (samePosition(start, first)) ring = line.slice(1).reverse().concat(ring);
        else continue;

        pending.splice(i, 1);
        extended = true;
        break;
      }
    }
    if (isClosedRing(ring)) rings.push(ring);
    ring = pending.shift();
  }

  return rings;
}

/** Even-odd ray casting in lng/lat space */
function ringContains(ring: Position[], point: Position): boolean {
  const [x, y] = point;
  if (x === undefined || y === undefined) return false;
  let inside = false;
  for (let i = 0, j = ring.length - 1; i < ring.length; j = i++) {
    const a = ring[i];
    const b = ring[j];
    if (!a || !b) continue;
    const [xi = 0, yi = 0] = a;
    const [xj = 0, yj = 0] = b;
    if (yi > y !== yj > y && x < ((xj - xi) * (y - yi)) / (yj - yi) + xi) {
      inside = !inside;
    }
  }
  return inside;
}

function multipolygonGeometry(
  members: z.infer<typeof memberSchema>[],
): MultiPolygon | null {
  const outerLines: Position[][] = [];
  const innerLines: Position[][] = [];
  for (const member of members) {
    if (member.type !== "way") continue;
    const line = toPositions(member.geometry);
    if (member.role === "inner") innerLines.push(line);
    else outerLines.push(line);
  }

  const polygons: Position[][][] = assembleRings(outerLines).map((outer) => [outer]);
  if (polygons.length === 0) return null;

  for (const inner of assembleRings(innerLines)) {
    const host = polygons.find((polygon) => {
      const outer = polygon[0];
      return outer !== undefined && ringContains(outer, inner[0] ?? []);
    });
    host?.push(inner);
  }

  return { type: "MultiPolygon", coordinates: polygons };
}

function attributesOf(
  osmType: string,
  id: number,
  tags: OsmTags | undefined,
): Record<string, unknown> {
  return { ...tags, osmType, osmId: id };
}

/**
 * Convert a facility query response into FacilityRecords.
 *
 * - tagged nodes -> Point
 * - closed ways -> Polygon
 * - multipolygon relations -> MultiPolygon
 */
export function parseFacilityResponse(json: unknown): FacilityParseResult {
  const records: FacilityRecord[] = [];
  let skipped = 0;
  let partial = 0;

  for (const element of parseResponse(json)) {
    switch (element.type) {
      case "node": {
        const node = nodeSchema.safeParse(element);
        if (!node.success || !node.data.tags) {
          skipped++;
          break;
        }
        const geometry: Point = { type: "Point", coordinates: [node.data.lon, node.data.lat] };
        records.push({ geometry, attributes: attributesOf("node", node.data.id, node.data.tags) });
        break;
      }
      case "way": {
        const way = waySchema.safeParse(element);
        if (way.success && hasGaps(way.data.geometry)) {
          partial++;
          skipped++;
          break;
        }
        const ring = way.success ? toPositions(way.data.geometry) : [];
        if (!way.success || !isClosedRing(ring)) {
          skipped++;
          break;
        }
        const geometry: Polygon = { type: "Polygon", coordinates: [ring] };
        records.push({ geometry, attributes: attributesOf("way", way.data.id, way.data.tags) });
        break;
      }
      case "relation": {
        const relation = relationSchema.safeParse(element);
        if (
          relation.success &&
          relation.data.members.some((m) => m.type === "way" && hasGaps(m.geometry))
        ) {
          partial++;
          skipped++;
          break;
        }
        const geometry =
          relation.success && relation.data.tags?.["type"] === "multipolygon"
            ? multipolygonGeometry(relation.data.members)
            : null;
        if (!relation.success || !geometry) {
          skipped++;
          break;
        }
        records.push({
          geometry,
          attributes: attributesOf("relation", relation.data.id, relation.data.tags),
        });
        break;
      }
      default:
        skipped++;
    }
  }

  if (partial > 0) {
    console.warn(`[overpass] Skipped ${partial} area(s) extending past the query bbox`);
  }
  if (skipped > 0) {
    console.log(`[overpass] Skipped ${skipped} element(s) without facility geometry`);
  }

  return { records, skipped, partial };
}

/**
 * Convert a road network query response into node coordinates and ways.
 *
 * way.geometry[i] is the coordinate of way.nodes[i]; missing entries
 * (nodes outside the bbox) leave the node without a coordinate.
 */
export function parseRoadNetworkResponse(json: unknown): RoadNetworkData {
  const nodes = new Map<number, Coordinate>();
  const ways: RoadWay[] = [];

  for (const element of parseResponse(json)) {
    if (element.type === "node") {
      const node = nodeSchema.safeParse(element);
      if (node.success) nodes.set(node.data.id, { lat: node.data.lat, lng: node.data.lon });
      continue;
    }
    if (element.type !== "way") continue;

    const way = waySchema.safeParse(element);
    if (!way.success) continue;
    const { id, nodes: refs, geometry, tags } = way.data;

    refs.forEach((ref, i) => {
      const point = geometry?.[i];
      if (point && !nodes.has(ref)) nodes.set(ref, { lat: point.lat, lng: point.lon });
    });

    ways.push(tags ? { id, refs, tags } : { id, refs });
  }

  return { nodes, ways };
}
