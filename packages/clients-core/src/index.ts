// Base
export { ApiError, BaseClient, type ClientConfig, type RequestParams } from "./baseClient.js";

// Domain clients
export { NetworkClient } from "./networkClient.js";
export { CacheClient } from "./cacheClient.js";
export { HealthClient } from "./healthClient.js";

// Types
export type {
  // Domain
  BoundingBox,
  NetworkResult,
  NetworkMetric,
  NetworkMetricsResult,
  NodeMetricValue,
  TransportMode,
  // Network
  AnalyzeRequest,
  AnalyzeAllRequest,
  AnalyzeAllResponse,
  MetricsRequest,
  NetworkGeoJson,
  // Modes
  ModeInfo,
  ModesResponse,
  // Health
  CacheStats,
  HealthResponse,
  // Cache
  CacheEntry,
  CacheListResponse,
  CacheClearResponse,
  // Errors
  FieldIssue,
  ErrorResponse,
} from "./types.js";
