import type { Express } from "express";
import { cacheSizeKB, type FacilityCache } from "@hubline/builder";
import type { HealthResponse } from "../models/responses.js";

export const SERVICE_NAME = "Logistics Network API";

export interface HealthRouteDependencies {
  cache: FacilityCache;
}

export function registerHealthRoutes(app: Express, deps: HealthRouteDependencies): void {
  app.get("/", (_req, res) => {
    res.json({
      service: SERVICE_NAME,
      endpoints: [
        "GET /health",
        "GET /api/modes",
        "POST /api/network/analyze",
        "POST /api/network/analyze-all",
        "POST /api/network/geojson",
        "GET /api/network/metrics?metric=degree_centrality|closeness_centrality",
        "GET /api/cache",
        "DELETE /api/cache",
        "DELETE /api/cache/:id",
      ],
    });
  });

  app.get("/health", (_req, res) => {
    const body: HealthResponse = {
      status: "ok",
      service: SERVICE_NAME,
      uptime: process.uptime(),
      cache: {
        entries: deps.cache.list().length,
        totalSizeKB: cacheSizeKB(deps.cache),
      },
    };
    res.json(body);
  });
}
