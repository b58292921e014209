/**
 * Network pipeline types: extracted points, weighted edges and the
 * assembled result handed to the presentation layer.
 */

import type { AttributeValue, TransportMode } from "./facility.js";
import type { BoundingBox } from "./geo.js";

/** Representative coordinate of one facility. Identity = index in the sequence. */
export interface LocatedPoint {
  lat: number;
  lng: number;
  /** Source attributes with the geometry field stripped */
  attributes: Record<string, AttributeValue>;
}

/** Undirected edge between two point indices, canonical form from < to */
export interface WeightedEdge {
  from: number;
  to: number;
  /** Meters, never negative */
  weight: number;
}

/** Complete or spanning graph over points 0..nodeCount-1 */
export interface DistanceGraph {
  nodeCount: number;
  edges: WeightedEdge[];
}

export type EdgeStatus = "refined" | "fallback";

/** Why an edge kept its geodesic weight */
export type FallbackReason =
  | "no-path"
  | "snap-failed"
  | "provider-error"
  | "timeout"
  | "refinement-skipped";

/** An MST edge after the refinement stage */
export interface RefinedEdge extends WeightedEdge {
  status: EdgeStatus;
  /** The geodesic weight computed by the distance graph builder */
  geodesicWeight: number;
  reason?: FallbackReason;
}

/** Serializable attribute value after assembly */
export type SanitizedValue = string | number | boolean | null;

export interface NetworkPoint {
  lat: number;
  lng: number;
  attributes: Record<string, SanitizedValue>;
}

/**
 * How the refinement stage ran:
 * - applied: a routable network was available
 * - skipped: the network provider failed systemically
 * - disabled: the caller asked for geodesic weights only
 */
export type RefinementState = "applied" | "skipped" | "disabled";

/** "empty" is a successful run over zero facilities, not a failure */
export type NetworkStatus = "ok" | "empty";

export interface NetworkResult {
  status: NetworkStatus;
  points: NetworkPoint[];
  edges: RefinedEdge[];
  /** Sum of final edge weights in meters */
  totalDistance: number;
  nodesCount: number;
  edgesCount: number;
  refinedCount: number;
  fallbackCount: number;
  /** Records the extractor dropped (drop policy only) */
  droppedCount: number;
  refinement: RefinementState;
  mode?: TransportMode;
  bbox?: BoundingBox;
}

/** Per-node network metrics over the assembled tree */
export const NETWORK_METRICS = ["degree_centrality", "closeness_centrality"] as const;

export type NetworkMetric = (typeof NETWORK_METRICS)[number];

export interface NodeMetricValue {
  /** Index into NetworkResult.points */
  index: number;
  lat: number;
  lng: number;
  value: number;
}

export interface NetworkMetricsResult {
  metric: NetworkMetric;
  nodesCount: number;
  edgesCount: number;
  /** One entry per point, in point order */
  values: NodeMetricValue[];
  mode?: TransportMode;
  bbox?: BoundingBox;
}
