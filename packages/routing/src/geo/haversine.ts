/**
 * Great-circle distance on a spherical Earth.
 *
 * This is the single geodesic weight function of the pipeline: the distance
 * graph, the road graph and the refiner's fallback all go through it.
 */

import type { Coordinate } from "@hubline/types";

export const EARTH_RADIUS_METERS = 6_371_000;

const TO_RAD = Math.PI / 180;

/**
 * Haversine distance between two coordinates in meters.
 */
export function haversineDistance(a: Coordinate, b: Coordinate): number {
  const phi1 = a.lat * TO_RAD;
  const phi2 = b.lat * TO_RAD;
  const dPhi = (b.lat - a.lat) * TO_RAD;
  const dLambda = (b.lng - a.lng) * TO_RAD;

  const sinHalfPhi = Math.sin(dPhi / 2);
  const sinHalfLambda = Math.sin(dLambda / 2);
  const h =
    sinHalfPhi * sinHalfPhi +
    Math.cos(phi1) * Math.cos(phi2) * sinHalfLambda * sinHalfLambda;

  return 2 * EARTH_RADIUS_METERS * Math.atan2(Math.sqrt(h), Math.sqrt(1 - h));
}
