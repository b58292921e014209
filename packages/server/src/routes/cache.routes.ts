import type { Express } from "express";
import type { FacilityCache } from "@hubline/builder";
import type {
  CacheClearResponse,
  CacheListResponse,
} from "../models/responses.js";
import type { RoadNetworkProvider } from "../services/road-network.service.js";

export interface CacheRouteDependencies {
  cache: FacilityCache;
  roads: RoadNetworkProvider;
}

export function registerCacheRoutes(app: Express, deps: CacheRouteDependencies): void {
  app.get("/api/cache", (_req, res) => {
    const body: CacheListResponse = {
      entries: deps.cache.list().map(({ id, mode, bbox, featureCount, cachedAt }) => ({
        id,
        mode,
        bbox,
        featureCount,
        cachedAt,
      })),
    };
    res.json(body);
  });

  app.delete("/api/cache", (_req, res) => {
    const cleared = deps.cache.clear();
    const roadGraphsCleared = deps.roads.clear();
    console.log(`[cache] Cleared ${cleared} entries, ${roadGraphsCleared} road graphs`);
    const body: CacheClearResponse = { cleared, roadGraphsCleared };
    res.json(body);
  });

  app.delete("/api/cache/:id", (req, res) => {
    const id = req.params["id"] ?? "";
    const removed = deps.cache.invalidate(id);
    console.log(`[cache] ${removed ? "Cleared" : "No entry"} ${id}`);
    const body: CacheClearResponse = { cleared: removed ? 1 : 0 };
    res.status(removed ? 200 : 404).json(body);
  });
}
