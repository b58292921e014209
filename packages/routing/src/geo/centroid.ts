/**
 * Planar area-weighted centroids for polygon geometries.
 *
 * Coordinates are treated as planar (x = lng, y = lat) in degree space,
 * which is the standard GIS centroid for unprojected data. Inner rings are
 * subtracted; multi-polygon parts are combined by area. Each ring is
 * translated to its first vertex before the shoelace sums to keep the
 * cross products small.
 */

import type { MultiPolygon, Polygon, Position } from "geojson";
import type { Coordinate } from "@hubline/types";

interface RingMoments {
  /** Signed area (positive for counter-clockwise rings) */
  area: number;
  /** Area-weighted centroid sums: Σ cx·area, Σ cy·area */
  weightedX: number;
  weightedY: number;
}

function ringMoments(ring: Position[]): RingMoments {
  const origin = ring[0];
  if (!origin || ring.length < 4) return { area: 0, weightedX: 0, weightedY: 0 };
  const ox = origin[0] ?? 0;
  const oy = origin[1] ?? 0;

  let twiceArea = 0;
  let sumX = 0;
  let sumY = 0;
  for (let i = 0; i < ring.length - 1; i++) {
    const p = ring[i];
    const q = ring[i + 1];
    if (!p || !q) continue;
    const x0 = (p[0] ?? 0) - ox;
    const y0 = (p[1] ?? 0) - oy;
    const x1 = (q[0] ?? 0) - ox;
    const y1 = (q[1] ?? 0) - oy;
    const cross = x0 * y1 - x1 * y0;
    twiceArea += cross;
    sumX += (x0 + x1) * cross;
    sumY += (y0 + y1) * cross;
  }

  const area = twiceArea / 2;
  if (area === 0) return { area: 0, weightedX: 0, weightedY: 0 };

  // Centroid relative to origin is sum / (6·area); weight it back by area.
  const cx = sumX / (6 * area) + ox;
  const cy = sumY / (6 * area) + oy;
  return { area, weightedX: cx * area, weightedY: cy * area };
}

function accumulatePolygon(
  rings: Position[][],
  acc: { area: number; x: number; y: number },
): void {
  rings.forEach((ring, idx) => {
    const m = ringMoments(ring);
    if (m.area === 0) return;
    // Outer ring adds, holes subtract, whatever their winding.
    const sign = (idx === 0 ? 1 : -1) * Math.sign(m.area);
    acc.area += sign * m.area;
    acc.x += sign * m.weightedX;
    acc.y += sign * m.weightedY;
  });
}

function outerRingVertexMean(polygons: Position[][][]): Coordinate | null {
  let sumLng = 0;
  let sumLat = 0;
  let count = 0;
  for (const rings of polygons) {
    const outer = rings[0];
    if (!outer) continue;
    const first = outer[0];
    const last = outer[outer.length - 1];
    const closed =
      outer.length > 1 && first && last && first[0] === last[0] && first[1] === last[1];
    const vertices = closed ? outer.slice(0, -1) : outer;
    for (const pos of vertices) {
      sumLng += pos[0] ?? NaN;
      sumLat += pos[1] ?? NaN;
      count++;
    }
  }
  if (count === 0) return null;
  return { lat: sumLat / count, lng: sumLng / count };
}

/**
 * Area-weighted centroid of a Polygon or MultiPolygon.
 *
 * Zero-area input (collapsed rings) falls back to the mean of the outer-ring
 * vertices. Returns null when the geometry has no vertices at all.
 */
export function polygonCentroid(geometry: Polygon | MultiPolygon): Coordinate | null {
  const polygons =
    geometry.type === "Polygon" ? [geometry.coordinates] : geometry.coordinates;

  const acc = { area: 0, x: 0, y: 0 };
  for (const rings of polygons) accumulatePolygon(rings, acc);

  if (acc.area === 0 || !Number.isFinite(acc.area)) {
    return outerRingVertexMean(polygons);
  }

  return { lat: acc.y / acc.area, lng: acc.x / acc.area };
}
