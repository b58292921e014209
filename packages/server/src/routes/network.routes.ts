import type { Express } from "express";
import type { BboxEdges } from "@hubline/builder";
import { networkToGeoJson } from "@hubline/routing";
import { asyncHandler } from "../middleware/error-handler.js";
import { parseAnalyzeRequest, parseMetricsQuery } from "../models/requests.js";
import type { AnalyzeAllResponse } from "../models/responses.js";
import type { NetworkAnalysisService } from "../services/network-analysis.service.js";

export interface NetworkRouteDependencies {
  analysis: NetworkAnalysisService;
  defaultBbox: BboxEdges;
}

export function registerNetworkRoutes(app: Express, deps: NetworkRouteDependencies): void {
  app.post(
    "/api/network/analyze",
    asyncHandler(async (req, res) => {
      const { bbox, mode, refine } = parseAnalyzeRequest(req.body, deps.defaultBbox);
      res.json(await deps.analysis.analyze({ bbox, mode, refine }));
    }),
  );

  app.post(
    "/api/network/analyze-all",
    asyncHandler(async (req, res) => {
      const { bbox, refine } = parseAnalyzeRequest(req.body, deps.defaultBbox);
      const body: AnalyzeAllResponse = {
        results: await deps.analysis.analyzeAll({ bbox, refine }),
      };
      res.json(body);
    }),
  );

  app.get(
    "/api/network/metrics",
    asyncHandler(async (req, res) => {
      const { bbox, mode, refine, metric } = parseMetricsQuery(req.query, deps.defaultBbox);
      res.json(await deps.analysis.metrics({ bbox, mode, refine, metric }));
    }),
  );

  app.post(
    "/api/network/geojson",
    asyncHandler(async (req, res) => {
      const { bbox, mode, refine } = parseAnalyzeRequest(req.body, deps.defaultBbox);
      const network = await deps.analysis.analyze({ bbox, mode, refine });
      res.type("application/geo+json").send(JSON.stringify(networkToGeoJson(network)));
    }),
  );
}
