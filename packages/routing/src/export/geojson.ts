/**
 * GeoJSON export for network results.
 *
 * Facilities become Point features carrying their sanitized attributes,
 * edges become two-vertex LineString features with distance and status.
 * Useful for visualization in QGIS, geojson.io, Mapbox, etc.
 */

import type { Feature, FeatureCollection, LineString, Point } from "geojson";
import type { EdgeStatus, NetworkPoint, NetworkResult, RefinedEdge } from "@hubline/types";

export type NetworkFeature = Feature<Point | LineString>;
export type NetworkFeatureCollection = FeatureCollection<Point | LineString>;

/** Options for GeoJSON export */
export interface GeoJsonExportOptions {
  /** Include facility points (default true) */
  includePoints?: boolean;
  /** Include only edges with these statuses */
  statuses?: EdgeStatus[];
}

/**
 * Export a NetworkResult to a GeoJSON FeatureCollection.
 *
 * Point properties: featureType "facility", index, then the attributes.
 * Edge properties: featureType "edge", from, to, distance,
 * geodesicDistance, status, reason.
 */
export function networkToGeoJson(
  network: NetworkResult,
  options: GeoJsonExportOptions = {},
): NetworkFeatureCollection {
  const features: NetworkFeature[] = [];

  if (options.includePoints ?? true) {
    network.points.forEach((point, index) => {
      features.push(pointToFeature(point, index));
    });
  }

  for (const edge of network.edges) {
    if (options.statuses && !options.statuses.includes(edge.status)) continue;
    const from = network.points[edge.from];
    const to = network.points[edge.to];
    if (!from || !to) continue;
    features.push(edgeToFeature(edge, from, to));
  }

  return {
    type: "FeatureCollection",
    features,
  };
}

function pointToFeature(point: NetworkPoint, index: number): NetworkFeature {
  return {
    type: "Feature",
    geometry: {
      type: "Point",
      coordinates: [point.lng, point.lat],
    },
    properties: {
      ...point.attributes,
      featureType: "facility",
      index,
    },
  };
}

function edgeToFeature(edge: RefinedEdge, from: NetworkPoint, to: NetworkPoint): NetworkFeature {
  return {
    type: "Feature",
    geometry: {
      type: "LineString",
      coordinates: [
        [from.lng, from.lat],
        [to.lng, to.lat],
      ],
    },
    properties: {
      featureType: "edge",
      from: edge.from,
      to: edge.to,
      distance: Math.round(edge.weight),
      geodesicDistance: Math.round(edge.geodesicWeight),
      status: edge.status,
      reason: edge.reason ?? null,
    },
  };
}
