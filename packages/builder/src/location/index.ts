/**
 * Bounding box helpers.
 *
 * The HTTP layer speaks (west, south, east, north); everything else uses
 * BoundingBox { minLat, maxLat, minLng, maxLng }.
 */

import type { BoundingBox } from "@hubline/types";

/** Edges of a bbox in map order */
export interface BboxEdges {
  west: number;
  south: number;
  east: number;
  north: number;
}

export function bboxFromEdges(edges: BboxEdges): BoundingBox {
  return {
    minLat: edges.south,
    maxLat: edges.north,
    minLng: edges.west,
    maxLng: edges.east,
  };
}

export function edgesFromBbox(bbox: BoundingBox): BboxEdges {
  return {
    west: bbox.minLng,
    south: bbox.minLat,
    east: bbox.maxLng,
    north: bbox.maxLat,
  };
}

/**
 * Parse "west,south,east,north". Returns null unless there are exactly
 * four finite numbers.
 */
export function parseBboxEdges(value: string): BboxEdges | null {
  const parts = value.split(",").map((part) => Number(part.trim()));
  if (parts.length !== 4 || !parts.every(Number.isFinite)) return null;
  const [west = 0, south = 0, east = 0, north = 0] = parts;
  return { west, south, east, north };
}

/** Why a bbox is unusable, or null if it is fine */
export function bboxProblem(edges: BboxEdges): string | null {
  if (Math.abs(edges.south) > 90 || Math.abs(edges.north) > 90) {
    return "latitude must be within [-90, 90]";
  }
  if (Math.abs(edges.west) > 180 || Math.abs(edges.east) > 180) {
    return "longitude must be within [-180, 180]";
  }
  if (edges.south >= edges.north) return "south must be less than north";
  if (edges.west >= edges.east) return "west must be less than east";
  return null;
}

/**
 * Expand a bounding box by a buffer distance in kilometers.
 *
 * @param bbox - Original bounding box
 * @param bufferKm - Buffer distance in km
 * @returns Expanded bounding box
 */
export function expandBbox(bbox: BoundingBox, bufferKm: number): BoundingBox {
  const latBuffer = bufferKm / 111.32;

  // Use the center latitude for longitude scaling
  const centerLat = (bbox.minLat + bbox.maxLat) / 2;
  const lngBuffer =
    bufferKm / (111.32 * Math.cos((centerLat * Math.PI) / 180));

  return {
    minLat: Math.max(bbox.minLat - latBuffer, -90),
    maxLat: Math.min(bbox.maxLat + latBuffer, 90),
    minLng: Math.max(bbox.minLng - lngBuffer, -180),
    maxLng: Math.min(bbox.maxLng + lngBuffer, 180),
  };
}

/** Short label for logs */
export function formatBbox(bbox: BoundingBox): string {
  return `[${bbox.minLat.toFixed(4)},${bbox.minLng.toFixed(4)} → ${bbox.maxLat.toFixed(4)},${bbox.maxLng.toFixed(4)}]`;
}
