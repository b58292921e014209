import type { BoundingBox, NetworkResult, TagFilter, TransportMode } from "@hubline/types";

export interface HealthResponse {
  status: "ok";
  service: string;
  uptime: number;
  cache: CacheStats;
}

export interface CacheStats {
  entries: number;
  totalSizeKB: number;
}

export interface ModeInfo {
  mode: TransportMode;
  tags: TagFilter;
}

export interface ModesResponse {
  modes: ModeInfo[];
}

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

export interface AnalyzeAllResponse {
  results: Record<TransportMode, NetworkResult>;
}
