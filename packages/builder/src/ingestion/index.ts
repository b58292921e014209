/**
 * Facility ingestion.
 *
 * bbox + mode -> Overpass query -> FacilityRecord[], through an optional
 * read-through cache.
 */

import type { BoundingBox, FacilityRecord, TransportMode } from "@hubline/types";
import { FacilitySourceError } from "../errors.js";
import type { FacilityCache, FacilityCacheEntry } from "./cache.js";
import { MODE_TAGS } from "./modes.js";
import { parseFacilityResponse } from "./overpass/parser.js";
import {
  buildFacilityQuery,
  DEFAULT_TIMEOUT,
  fetchOverpassData,
  type OverpassOptions,
} from "./overpass/query.js";

export interface LoadFacilitiesOptions {
  cache?: FacilityCache;
  /** Skip the cache read (the result is still written) */
  force?: boolean;
  /** Query runner; defaults to the overpass-ts client */
  fetch?: (query: string) => Promise<unknown>;
  overpass?: OverpassOptions;
  /** Overpass query timeout in seconds (default 90) */
  timeout?: number;
}

export interface FacilityLoadResult {
  records: FacilityRecord[];
  fromCache: boolean;
  /** Set when the records were written to the cache */
  entry?: FacilityCacheEntry;
}

/**
 * Load the facilities of one mode inside a bbox.
 *
 * @throws FacilitySourceError when the download or the response fails
 */
export async function loadFacilities(
  bbox: BoundingBox,
  mode: TransportMode,
  options: LoadFacilitiesOptions = {},
): Promise<FacilityLoadResult> {
  const { cache } = options;
  const key = { mode, bbox };

  if (cache && !options.force) {
    const cached = cache.get(key);
    if (cached) {
      console.log(`[cache] HIT ${mode}: ${cached.length} facilities`);
      return { records: cached, fromCache: true };
    }
    console.log(`[cache] MISS ${mode}`);
  }

  const query = buildFacilityQuery(bbox, MODE_TAGS[mode], options.timeout ?? DEFAULT_TIMEOUT);
  const run = options.fetch ?? ((q: string) => fetchOverpassData(q, options.overpass));

  let data: unknown;
  try {
    data = await run(query);
  } catch (err) {
    throw new FacilitySourceError(
      `Facility download failed for mode ${mode}: ${err instanceof Error ? err.message : String(err)}`,
      { cause: err },
    );
  }

  const { records } = parseFacilityResponse(data);
  console.log(`[overpass] ${mode}: ${records.length} facilities`);

  const entry = cache?.set(key, records);
  return entry ? { records, fromCache: false, entry } : { records, fromCache: false };
}
