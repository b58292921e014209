/**
 * Facility records: the raw input of the network pipeline.
 *
 * A facility is any logistics-relevant location (warehouse, terminal, port,
 * rail yard). Records come from OSM via Overpass, but the pipeline only sees
 * the GeoJSON geometry and a flat bag of attributes.
 */

import type { Geometry, MultiPolygon, Point, Polygon } from "geojson";

/** Transport category that selects which OSM tags identify facilities */
export type TransportMode = "auto" | "aero" | "sea" | "rail";

export const TRANSPORT_MODES: readonly TransportMode[] = [
  "auto",
  "aero",
  "sea",
  "rail",
] as const;

/**
 * OSM tag filter for one mode.
 * A list matches any of its values; `true` matches any value of the key.
 */
export type TagFilter = Record<string, readonly string[] | true>;

/** Geometry kinds the extractor can reduce to a single coordinate */
export type FacilityGeometry = Point | Polygon | MultiPolygon;

/** Attribute value as found on the source record (OSM tags, ids, ...) */
export type AttributeValue = unknown;

/** One input feature. Coordinates follow GeoJSON order: [lng, lat]. */
export interface FacilityRecord {
  /** Usually a FacilityGeometry; anything else is rejected by the extractor */
  readonly geometry: Geometry | null;
  readonly attributes: Readonly<Record<string, AttributeValue>>;
}
