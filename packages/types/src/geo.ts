/**
 * Geographic utility types.
 */

/** Geographic coordinate (WGS84) */
export interface Coordinate {
  lat: number;
  lng: number;
}

/** Axis-aligned bounding box in WGS84 coordinates */
export interface BoundingBox {
  minLat: number;
  maxLat: number;
  minLng: number;
  maxLng: number;
}
