import express from "express";
import cors from "cors";
import { DiskFacilityCache, type FacilityCache } from "@hubline/builder";
import type { Config } from "./config.js";
import { errorHandler } from "./middleware/error-handler.js";
import { registerCacheRoutes } from "./routes/cache.routes.js";
import { registerHealthRoutes } from "./routes/health.routes.js";
import { registerModeRoutes } from "./routes/modes.routes.js";
import { registerNetworkRoutes } from "./routes/network.routes.js";
import { FacilitySourceService } from "./services/facility-source.service.js";
import { NetworkAnalysisService } from "./services/network-analysis.service.js";
import { RoadNetworkService, type RoadNetworkProvider } from "./services/road-network.service.js";

export interface AppDependencies {
  config: Config;
  cache: FacilityCache;
  roads: RoadNetworkProvider;
  analysis: NetworkAnalysisService;
}

/**
 * Wire the production services from configuration.
 */
export function createServices(
  config: Config,
  cache: FacilityCache = new DiskFacilityCache(config.CACHE_DIR),
): AppDependencies {
  const overpass = { endpoint: config.OVERPASS_ENDPOINT };
  const facilities = new FacilitySourceService({
    cache,
    overpass,
    timeoutSeconds: config.OVERPASS_TIMEOUT_SECONDS,
  });
  const roads = new RoadNetworkService({
    endpoint: config.OVERPASS_ENDPOINT,
    timeoutSeconds: config.OVERPASS_TIMEOUT_SECONDS,
    maxRetries: config.PROVIDER_MAX_RETRIES,
  });
  const analysis = new NetworkAnalysisService(facilities, roads, {
    onInvalid: config.INVALID_GEOMETRY_POLICY,
    refine: {
      concurrency: config.REFINE_CONCURRENCY,
      edgeTimeoutMs: config.REFINE_EDGE_TIMEOUT_MS,
    },
    pipelineTimeoutMs: config.PIPELINE_TIMEOUT_MS,
  });

  return { config, cache, roads, analysis };
}

export function createApp(deps: AppDependencies): express.Express {
  const app = express();

  // Middleware
  app.use(cors());
  app.use(express.json({ limit: "1mb" }));

  registerHealthRoutes(app, { cache: deps.cache });
  registerModeRoutes(app);
  registerNetworkRoutes(app, {
    analysis: deps.analysis,
    defaultBbox: deps.config.DEFAULT_BBOX,
  });
  registerCacheRoutes(app, { cache: deps.cache, roads: deps.roads });

  // Error handler (must be after routes)
  app.use(errorHandler);

  return app;
}
