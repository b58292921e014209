/**
 * Facility source: read-through cached Overpass facility downloads.
 */

import type { BoundingBox, FacilityRecord, TransportMode } from "@hubline/types";
import {
  formatBbox,
  loadFacilities,
  type FacilityCache,
  type OverpassOptions,
} from "@hubline/builder";

export interface FacilitySource {
  load(bbox: BoundingBox, mode: TransportMode): Promise<FacilityRecord[]>;
}

export interface FacilitySourceOptions {
  cache: FacilityCache;
  overpass?: OverpassOptions;
  /** Overpass query timeout in seconds */
  timeoutSeconds?: number;
  /** Query runner override, mainly for tests */
  fetch?: (query: string) => Promise<unknown>;
}

export class FacilitySourceService implements FacilitySource {
  constructor(private readonly options: FacilitySourceOptions) {}

  async load(bbox: BoundingBox, mode: TransportMode): Promise<FacilityRecord[]> {
    const start = Date.now();
    const { records, fromCache } = await loadFacilities(bbox, mode, {
      cache: this.options.cache,
      overpass: this.options.overpass,
      timeout: this.options.timeoutSeconds,
      fetch: this.options.fetch,
    });
    console.log(
      `[facilities] ${mode} ${formatBbox(bbox)}: ${records.length} records ` +
        `(${fromCache ? "cache" : "overpass"}, ${Date.now() - start}ms)`,
    );
    return records;
  }
}
