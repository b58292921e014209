/**
 * Overpass API query construction and execution.
 *
 * Generates Overpass QL queries for facilities and drivable roads, and
 * fetches results via the overpass-ts client.
 */

import type { BoundingBox, TagFilter } from "@hubline/types";
import { overpassJson } from "overpass-ts";
import type { OverpassJson, OverpassOptions as OverpassTsOptions } from "overpass-ts";

/** Options for Overpass API requests */
export interface OverpassOptions {
  /** Overpass API endpoint URL (for self-hosted instances) */
  endpoint?: string;
  /** User-agent string */
  userAgent?: string;
}

export const DEFAULT_ENDPOINT = "https://overpass-api.de/api/interpreter";
export const DEFAULT_TIMEOUT = 90;

/** Highway values that make up the drivable road network */
export const DRIVABLE_HIGHWAYS = [
  "motorway",
  "motorway_link",
  "trunk",
  "trunk_link",
  "primary",
  "primary_link",
  "secondary",
  "secondary_link",
  "tertiary",
  "tertiary_link",
  "unclassified",
  "residential",
  "living_street",
  "service",
] as const;

/** Overpass bbox format: (south, west, north, east) */
export function formatBbox(bbox: BoundingBox): string {
  return `${bbox.minLat},${bbox.minLng},${bbox.maxLat},${bbox.maxLng}`;
}

/** Escape a value for an Overpass QL string literal */
function escapeValue(value: string): string {
  return value.replace(/[\\"]/g, "\\$&");
}

function escapeRegex(value: string): string {
  return escapeValue(value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&"));
}

/**
 * Build an Overpass QL query for facilities matching a tag filter.
 *
 * Each key becomes one `nwr` statement: a list of values is matched as an
 * anchored regex, `true` matches any value. Uses `out body geom;` so ways
 * and relations carry inline geometry.
 */
export function buildFacilityQuery(
  bbox: BoundingBox,
  tags: TagFilter,
  timeout: number = DEFAULT_TIMEOUT,
): string {
  const bboxStr = formatBbox(bbox);
  const statements = Object.entries(tags).map(([key, values]) => {
    const k = escapeValue(key);
    if (values === true) return `  nwr["${k}"](${bboxStr});`;
    const regex = `^(${values.map(escapeRegex).join("|")})$`;
    return `  nwr["${k}"~"${regex}"](${bboxStr});`;
  });

  return `[out:json][timeout:${timeout}];
(
${statements.join("\n")}
);
out body geom;`;
}

/**
 * Build an Overpass QL query for the drivable road network within a bbox.
 */
export function buildRoadNetworkQuery(
  bbox: BoundingBox,
  timeout: number = DEFAULT_TIMEOUT,
): string {
  const highwayRegex = `^(${DRIVABLE_HIGHWAYS.join("|")})$`;

  return `[out:json][timeout:${timeout}];
(
  way["highway"~"${highwayRegex}"](${formatBbox(bbox)});
);
out body geom;`;
}

/**
 * Run a query against the Overpass API.
 */
export async function fetchOverpassData(
  query: string,
  options?: OverpassOptions,
): Promise<OverpassJson> {
  const overpassOpts: Partial<OverpassTsOptions> = {
    endpoint: options?.endpoint ?? DEFAULT_ENDPOINT,
  };
  if (options?.userAgent) {
    overpassOpts.userAgent = options.userAgent;
  }

  const start = Date.now();
  console.log(`[overpass] POST ${overpassOpts.endpoint}`);
  const data = await overpassJson(query, overpassOpts);
  console.log(
    `[overpass] ${data.elements.length} element(s) in ${Date.now() - start}ms`,
  );
  return data;
}
