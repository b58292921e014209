import { BaseClient, type ClientConfig } from "./baseClient.js";
import type {
  AnalyzeAllRequest,
  AnalyzeAllResponse,
  AnalyzeRequest,
  MetricsRequest,
  ModesResponse,
  NetworkGeoJson,
  NetworkMetricsResult,
  NetworkResult,
} from "./types.js";

export class NetworkClient {
  private client: BaseClient;
  private modes: BaseClient;

  constructor(config: ClientConfig) {
    this.client = new BaseClient("api/network", config);
    this.modes = new BaseClient("api/modes", config);
  }

  /** Minimum network for one transport mode */
  public async analyze(request: AnalyzeRequest = {}): Promise<NetworkResult> {
    return this.client.post<NetworkResult>({ path: "analyze", body: request });
  }

  /** Every transport mode over the same region */
  public async analyzeAll(request: AnalyzeAllRequest = {}): Promise<AnalyzeAllResponse> {
    return this.client.post<AnalyzeAllResponse>({ path: "analyze-all", body: request });
  }

  public async geojson(request: AnalyzeRequest = {}): Promise<NetworkGeoJson> {
    return this.client.post<NetworkGeoJson>({ path: "geojson", body: request });
  }

  /** Per-node centrality, sent as query parameters */
  public async metrics(request: MetricsRequest): Promise<NetworkMetricsResult> {
    return this.client.get<NetworkMetricsResult>({ path: "metrics", query: { ...request } });
  }

  /** Supported transport modes and their facility tag filters */
  public async listModes(): Promise<ModesResponse> {
    return this.modes.get<ModesResponse>();
  }
}
