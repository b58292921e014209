/**
 * Geometry extraction: FacilityRecord[] -> LocatedPoint[].
 *
 * Each record is reduced to one representative coordinate: points are used
 * as is, polygons and multi-polygons by their planar area-weighted centroid.
 * Anything else is invalid; the `onInvalid` policy decides whether invalid
 * records abort the run or are dropped and reported.
 */

import type { Geometry } from "geojson";
import type { Coordinate, FacilityRecord, LocatedPoint } from "@hubline/types";
import { polygonCentroid } from "../geo/centroid.js";
import { InvalidGeometryError, type InvalidGeometryReason } from "../errors.js";

/** What to do with a record that has no valid coordinate */
export type InvalidGeometryPolicy = "fail" | "drop";

export interface ExtractionOptions {
  /** Default: "fail" */
  onInvalid?: InvalidGeometryPolicy;
}

export interface DroppedRecord {
  index: number;
  reason: InvalidGeometryReason;
  geometryType?: string;
}

export interface ExtractionResult {
  /** Points in input order, invalid records removed */
  points: LocatedPoint[];
  dropped: DroppedRecord[];
}

type Resolution =
  | { ok: true; coordinate: Coordinate }
  | { ok: false; reason: InvalidGeometryReason };

/**
 * Resolve the representative coordinate of a geometry.
 */
export function representativeCoordinate(geometry: Geometry): Resolution {
  switch (geometry.type) {
    case "Point": {
      const [lng, lat] = geometry.coordinates;
      if (lng === undefined || lat === undefined) {
        return { ok: false, reason: "empty-geometry" };
      }
      return validateCoordinate({ lat, lng });
    }
    case "Polygon":
    case "MultiPolygon": {
      const centroid = polygonCentroid(geometry);
      if (!centroid) return { ok: false, reason: "empty-geometry" };
      return validateCoordinate(centroid);
    }
    default:
      return { ok: false, reason: "unsupported-geometry" };
  }
}

function validateCoordinate(coordinate: Coordinate): Resolution {
  if (!Number.isFinite(coordinate.lat) || !Number.isFinite(coordinate.lng)) {
    return { ok: false, reason: "non-finite-coordinate" };
  }
  if (Math.abs(coordinate.lat) > 90 || Math.abs(coordinate.lng) > 180) {
    return { ok: false, reason: "coordinate-out-of-range" };
  }
  return { ok: true, coordinate };
}

function stripGeometry(
  attributes: Readonly<Record<string, unknown>>,
): Record<string, unknown> {
  const copy: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(attributes)) {
    if (key === "geometry") continue;
    copy[key] = value;
  }
  return copy;
}

/**
 * Extract one LocatedPoint per valid facility record.
 */
export function extractLocatedPoints(
  records: readonly FacilityRecord[],
  options: ExtractionOptions = {},
): ExtractionResult {
  const policy = options.onInvalid ?? "fail";
  const points: LocatedPoint[] = [];
  const dropped: DroppedRecord[] = [];

  records.forEach((record, index) => {
    const geometryType = record.geometry?.type;
    const resolved = record.geometry
      ? representativeCoordinate(record.geometry)
      : ({ ok: false, reason: "empty-geometry" } as const);

    if (!resolved.ok) {
      if (policy === "fail") {
        throw new InvalidGeometryError(index, resolved.reason, geometryType);
      }
      dropped.push({ index, reason: resolved.reason, geometryType });
      return;
    }

    points.push({
      lat: resolved.coordinate.lat,
      lng: resolved.coordinate.lng,
      attributes: stripGeometry(record.attributes),
    });
  });

  if (dropped.length > 0) {
    console.warn(
      `[extract] Dropped ${dropped.length} of ${records.length} record(s) without a valid coordinate`,
    );
  }

  return { points, dropped };
}
