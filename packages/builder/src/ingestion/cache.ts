/**
 * Facility cache: parsed facility records per (mode, bbox).
 *
 * Entries are keyed by a 16-char hex hash of the mode and the bbox rounded
 * to 4 decimals (~11m), so repeated requests for the same region hit the
 * same entry. DiskFacilityCache lives at ~/.hubline/feature-cache/ by
 * default: one `<id>.json` with the records and one `<id>.meta.json`
 * sidecar per entry.
 */

import { createHash } from "node:crypto";
import {
  existsSync,
  mkdirSync,
  readdirSync,
  readFileSync,
  rmSync,
  statSync,
  writeFileSync,
} from "node:fs";
import { homedir } from "node:os";
import { join } from "node:path";
import type { BoundingBox, FacilityRecord, TransportMode } from "@hubline/types";
import { z } from "zod";

/** Region + mode identifying one cached feature set */
export interface FacilityCacheKey {
  mode: TransportMode;
  bbox: BoundingBox;
}

export interface FacilityCacheEntry {
  id: string;
  mode: TransportMode;
  bbox: BoundingBox;
  featureCount: number;
  /** ISO timestamp */
  cachedAt: string;
  sizeBytes: number;
}

export interface FacilityCache {
  get(key: FacilityCacheKey): FacilityRecord[] | null;
  set(key: FacilityCacheKey, records: readonly FacilityRecord[]): FacilityCacheEntry;
  /** Remove one entry by key or id. Returns whether it existed. */
  invalidate(keyOrId: FacilityCacheKey | string): boolean;
  /** Remove every entry. Returns how many were removed. */
  clear(): number;
  list(): FacilityCacheEntry[];
}

/** Default cache directory */
export function defaultCacheDir(): string {
  return join(homedir(), ".hubline", "feature-cache");
}

/**
 * Deterministic cache id for a key.
 */
export function facilityCacheId(key: FacilityCacheKey): string {
  const { bbox } = key;
  const input = `${key.mode}|${[bbox.minLat, bbox.minLng, bbox.maxLat, bbox.maxLng]
    .map((v) => v.toFixed(4))
    .join(",")}`;
  return createHash("sha256").update(input).digest("hex").slice(0, 16);
}

function idOf(keyOrId: FacilityCacheKey | string): string {
  return typeof keyOrId === "string" ? keyOrId : facilityCacheId(keyOrId);
}

const positionSchema = z.array(z.number());
const geometrySchema = z.union([
  z.object({ type: z.literal("Point"), coordinates: positionSchema }),
  z.object({ type: z.literal("Polygon"), coordinates: z.array(z.array(positionSchema)) }),
  z.object({
    type: z.literal("MultiPolygon"),
    coordinates: z.array(z.array(z.array(positionSchema))),
  }),
]);
const recordsSchema = z.array(
  z.object({
    geometry: geometrySchema.nullable(),
    attributes: z.record(z.unknown()),
  }),
);
const bboxSchema = z.object({
  minLat: z.number(),
  maxLat: z.number(),
  minLng: z.number(),
  maxLng: z.number(),
});
const entrySchema = z.object({
  id: z.string(),
  mode: z.enum(["auto", "aero", "sea", "rail"]),
  bbox: bboxSchema,
  featureCount: z.number(),
  cachedAt: z.string(),
  sizeBytes: z.number(),
});

/** Facility records on disk, one JSON file + metadata sidecar per entry */
export class DiskFacilityCache implements FacilityCache {
  constructor(private readonly dir: string = defaultCacheDir()) {}

  get(key: FacilityCacheKey): FacilityRecord[] | null {
    const id = facilityCacheId(key);
    const filepath = this.dataPath(id);
    if (!existsSync(filepath)) return null;

    try {
      const stat = statSync(filepath);
      if (stat.size === 0) return null;

      const parsed = recordsSchema.safeParse(JSON.parse(readFileSync(filepath, "utf-8")));
      if (!parsed.success) {
        console.warn(`[cache] Ignoring malformed entry ${id}`);
        return null;
      }
      return parsed.data;
    } catch (err) {
      console.warn(
        `[cache] Failed to read entry ${id}: ${err instanceof Error ? err.message : String(err)}`,
      );
      return null;
    }
  }

  set(key: FacilityCacheKey, records: readonly FacilityRecord[]): FacilityCacheEntry {
    mkdirSync(this.dir, { recursive: true });

    const id = facilityCacheId(key);
    const json = JSON.stringify(records);
    writeFileSync(this.dataPath(id), json);

    const entry: FacilityCacheEntry = {
      id,
      mode: key.mode,
      bbox: { ...key.bbox },
      featureCount: records.length,
      cachedAt: new Date().toISOString(),
      sizeBytes: Buffer.byteLength(json),
    };
    writeFileSync(this.metaPath(id), JSON.stringify(entry, null, 2));
    return entry;
  }

  invalidate(keyOrId: FacilityCacheKey | string): boolean {
    const id = idOf(keyOrId);
    // Ids come from URLs; anything but a cache id cannot name a file here
    if (!/^[0-9a-f]{16}$/.test(id)) return false;

    const existed = existsSync(this.dataPath(id)) || existsSync(this.metaPath(id));
    rmSync(this.dataPath(id), { force: true });
    rmSync(this.metaPath(id), { force: true });
    return existed;
  }

  clear(): number {
    const entries = this.list();
    for (const entry of entries) this.invalidate(entry.id);
    return entries.length;
  }

  list(): FacilityCacheEntry[] {
    if (!existsSync(this.dir)) return [];

    const entries: FacilityCacheEntry[] = [];
    for (const file of readdirSync(this.dir)) {
      if (!file.endsWith(".meta.json")) continue;
      try {
        const parsed = entrySchema.safeParse(
          JSON.parse(readFileSync(join(this.dir, file), "utf-8")),
        );
        if (parsed.success) entries.push(parsed.data);
        else console.warn(`[cache] Ignoring malformed metadata ${file}`);
      } catch (err) {
        console.warn(
          `[cache] Failed to read metadata ${file}: ${err instanceof Error ? err.message : String(err)}`,
        );
      }
    }

    return entries.sort((a, b) => a.cachedAt.localeCompare(b.cachedAt) || a.id.localeCompare(b.id));
  }

  private dataPath(id: string): string {
    return join(this.dir, `${id}.json`);
  }

  private metaPath(id: string): string {
    return join(this.dir, `${id}.meta.json`);
  }
}

/** In-process cache for tests and ephemeral servers */
export class MemoryFacilityCache implements FacilityCache {
  private entries = new Map<string, { entry: FacilityCacheEntry; records: FacilityRecord[] }>();

  get(key: FacilityCacheKey): FacilityRecord[] | null {
    const hit = this.entries.get(facilityCacheId(key));
    return hit ? [...hit.records] : null;
  }

  set(key: FacilityCacheKey, records: readonly FacilityRecord[]): FacilityCacheEntry {
    const id = facilityCacheId(key);
    const entry: FacilityCacheEntry = {
      id,
      mode: key.mode,
      bbox: { ...key.bbox },
      featureCount: records.length,
      cachedAt: new Date().toISOString(),
      sizeBytes: Buffer.byteLength(JSON.stringify(records)),
    };
    this.entries.set(id, { entry, records: [...records] });
    return entry;
  }

  invalidate(keyOrId: FacilityCacheKey | string): boolean {
    return this.entries.delete(idOf(keyOrId));
  }

  clear(): number {
    const count = this.entries.size;
    this.entries.clear();
    return count;
  }

  list(): FacilityCacheEntry[] {
    return [...this.entries.values()].map(({ entry }) => ({ ...entry, bbox: { ...entry.bbox } }));
  }
}

/** Total size of all entries in kilobytes, rounded to one decimal */
export function cacheSizeKB(cache: FacilityCache): number {
  let bytes = 0;
  for (const entry of cache.list()) bytes += entry.sizeBytes;
  return Math.round((bytes / 1024) * 10) / 10;
}
