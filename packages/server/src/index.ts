export { createApp, createServices, type AppDependencies } from "./app.js";
export { loadConfig, type Config } from "./config.js";
export { PipelineTimeoutError, ValidationError, type FieldIssue } from "./errors.js";
export { errorHandler, asyncHandler } from "./middleware/error-handler.js";
export {
  FacilitySourceService,
  type FacilitySource,
  type FacilitySourceOptions,
} from "./services/facility-source.service.js";
export {
  RoadNetworkService,
  fetchOverpassWithRetry,
  type RoadNetworkProvider,
  type RoadNetworkServiceOptions,
  type RetryOptions,
} from "./services/road-network.service.js";
export {
  NetworkAnalysisService,
  type AnalysisOptions,
  type AnalysisRequest,
} from "./services/network-analysis.service.js";
export type * from "./models/responses.js";
export {
  parseAnalyzeRequest,
  parseMetricsQuery,
  type AnalyzeRequest,
  type MetricsRequest,
} from "./models/requests.js";
