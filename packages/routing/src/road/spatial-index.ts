/**
 * Grid-based spatial index over road graph nodes.
 *
 * Uses ~500m grid cells with a flat-earth approximation around the mean
 * latitude; distances are always measured with haversine.
 */

import type { Coordinate } from "@hubline/types";
import { haversineDistance } from "../geo/haversine.js";

/** Default grid cell size in meters */
const DEFAULT_CELL_SIZE = 500;

/** Meters per degree of latitude (roughly constant) */
const METERS_PER_DEG_LAT = 111_320;

export interface NearestMatch {
  index: number;
  distanceMeters: number;
}

export class NodeSpatialIndex {
  /** cell key -> node indices */
  private grid = new Map<string, number[]>();
  private cellSize: number;
  private metersPerDegLng: number;

  constructor(
    private readonly coords: readonly Coordinate[],
    cellSizeMeters: number = DEFAULT_CELL_SIZE,
  ) {
    this.cellSize = cellSizeMeters;

    let sumLat = 0;
    for (const c of coords) sumLat += c.lat;
    const midLat = coords.length > 0 ? sumLat / coords.length : 0;
    // Keep lng cells finite near the poles
    this.metersPerDegLng = Math.max(
      METERS_PER_DEG_LAT * Math.cos((midLat * Math.PI) / 180),
      1,
    );

    coords.forEach((c, index) => {
      const key = this.cellKey(this.cellRow(c.lat), this.cellCol(c.lng));
      const bucket = this.grid.get(key);
      if (bucket) bucket.push(index);
      else this.grid.set(key, [index]);
    });
  }

  get size(): number {
    return this.coords.length;
  }

  /**
   * Closest indexed node within maxDistance meters, or null.
   *
   * Searches rings of cells outward from the query cell and stops once
   * every unvisited cell is farther than the best match found so far.
   */
  nearest(coord: Coordinate, maxDistance: number): NearestMatch | null {
    if (this.coords.length === 0) return null;

    const row = this.cellRow(coord.lat);
    const col = this.cellCol(coord.lng);
    // One extra ring absorbs the flat-earth error of the cell grid
    const maxRing = Math.ceil(maxDistance / this.cellSize) + 1;

    let best: NearestMatch | null = null;

    for (let ring = 0; ring <= maxRing; ring++) {
      if (best && (ring - 1) * this.cellSize > best.distanceMeters) break;

      for (const key of this.ringKeys(row, col, ring)) {
        const bucket = this.grid.get(key);
        if (!bucket) continue;
        for (const index of bucket) {
          const c = this.coords[index];
          if (!c) continue;
          const d = haversineDistance(coord, c);
          if (d > maxDistance) continue;
          if (
            !best ||
            d < best.distanceMeters ||
            (d === best.distanceMeters && index < best.index)
          ) {
            best = { index, distanceMeters: d };
          }
        }
      }
    }

    return best;
  }

  private cellRow(lat: number): number {
    return Math.floor((lat * METERS_PER_DEG_LAT) / this.cellSize);
  }

  private cellCol(lng: number): number {
    return Math.floor((lng * this.metersPerDegLng) / this.cellSize);
  }

  private cellKey(row: number, col: number): string {
    return `${row}:${col}`;
  }

  /** Keys of the cells on the square ring at Chebyshev distance `ring` */
  private *ringKeys(row: number, col: number, ring: number): Generator<string> {
    if (ring === 0) {
      yield this.cellKey(row, col);
      return;
    }
    for (let dc = -ring; dc <= ring; dc++) {
      yield this.cellKey(row - ring, col + dc);
      yield this.cellKey(row + ring, col + dc);
    }
    for (let dr = -ring + 1; dr <= ring - 1; dr++) {
      yield this.cellKey(row + dr, col - ring);
      yield this.cellKey(row + dr, col + ring);
    }
  }
}
