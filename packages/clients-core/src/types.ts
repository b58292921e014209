/**
 * API request/response types for the logistics network server.
 *
 * These mirror the server's models; domain shapes come from @hubline/types.
 */

import type { FeatureCollection, LineString, Point } from "geojson";
import type {
  BoundingBox,
  NetworkMetric,
  NetworkMetricsResult,
  NetworkResult,
  NodeMetricValue,
  TagFilter,
  TransportMode,
} from "@hubline/types";

export type {
  BoundingBox,
  NetworkMetric,
  NetworkMetricsResult,
  NetworkResult,
  NodeMetricValue,
  TransportMode,
};

// ---------------------------------------------------------------------------
// Network analysis
// ---------------------------------------------------------------------------

/** Omitted bbox edges fall back to the server's default region */
export interface AnalyzeRequest {
  west?: number;
  south?: number;
  east?: number;
  north?: number;
  /** Case-insensitive, defaults to "auto" */
  mode?: string;
  /** Refine edges with road distances (default true) */
  refine?: boolean;
}

export type AnalyzeAllRequest = Omit<AnalyzeRequest, "mode">;

export interface AnalyzeAllResponse {
  results: Record<TransportMode, NetworkResult>;
}

export interface MetricsRequest extends AnalyzeRequest {
  metric: NetworkMetric;
}

export type NetworkGeoJson = FeatureCollection<Point | LineString>;

// ---------------------------------------------------------------------------
// Modes
// ---------------------------------------------------------------------------

export interface ModeInfo {
  mode: TransportMode;
  tags: TagFilter;
}

export interface ModesResponse {
  modes: ModeInfo[];
}

// ---------------------------------------------------------------------------
// Health
// ---------------------------------------------------------------------------

export interface CacheStats {
  entries: number;
  totalSizeKB: number;
}

export interface HealthResponse {
  status: "ok";
  service: string;
  uptime: number;
  cache: CacheStats;
}

// ---------------------------------------------------------------------------
// Feature cache
// ---------------------------------------------------------------------------

export interface CacheEntry {
  id: string;
  mode: TransportMode;
  bbox: BoundingBox;
  featureCount: number;
  cachedAt: string;
}

export interface CacheListResponse {
  entries: CacheEntry[];
}

export interface CacheClearResponse {
  cleared: number;
  /** In-memory road graphs dropped alongside (full clear only) */
  roadGraphsCleared?: number;
}

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

export interface FieldIssue {
  path: string;
  message: string;
}

export interface ErrorResponse {
  message: string;
  /** Present on 422 validation failures */
  details?: FieldIssue[];
}
