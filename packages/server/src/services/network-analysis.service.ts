/**
 * Network analysis: facilities + road network + pipeline, per request.
 */

import {
  TRANSPORT_MODES,
  type BoundingBox,
  type NetworkMetric,
  type NetworkMetricsResult,
  type NetworkResult,
  type TransportMode,
} from "@hubline/types";
import { formatBbox } from "@hubline/builder";
import {
  buildLogisticsNetwork,
  computeNetworkMetric,
  type InvalidGeometryPolicy,
  type RefineOptions,
} from "@hubline/routing";
import { PipelineTimeoutError } from "../errors.js";
import type { FacilitySource } from "./facility-source.service.js";
import type { RoadNetworkProvider } from "./road-network.service.js";

export interface AnalysisOptions {
  onInvalid: InvalidGeometryPolicy;
  refine: RefineOptions;
  pipelineTimeoutMs: number;
}

export interface AnalysisRequest {
  bbox: BoundingBox;
  mode: TransportMode;
  /** Refine edges with road distances */
  refine: boolean;
}

export class NetworkAnalysisService {
  constructor(
    private readonly facilities: FacilitySource,
    private readonly roads: RoadNetworkProvider,
    private readonly options: AnalysisOptions,
  ) {}

  /**
   * @throws PipelineTimeoutError when the whole run exceeds the limit
   */
  async analyze(request: AnalysisRequest): Promise<NetworkResult> {
    return this.withDeadline(this.run(request));
  }

  /** Node centrality over the network for one mode */
  async metrics(
    request: AnalysisRequest & { metric: NetworkMetric },
  ): Promise<NetworkMetricsResult> {
    return this.withDeadline(
      this.run(request).then((network) => {
        const result = computeNetworkMetric(network, request.metric);
        console.log(`[analysis] ${request.mode}: ${request.metric} over ${result.nodesCount} nodes`);
        return result;
      }),
    );
  }

  /** Run every mode over the same bbox, one after another */
  async analyzeAll(
    request: Omit<AnalysisRequest, "mode">,
  ): Promise<Record<TransportMode, NetworkResult>> {
    return this.withDeadline(
      (async () => {
        const results: Partial<Record<TransportMode, NetworkResult>> = {};
        for (const mode of TRANSPORT_MODES) {
          results[mode] = await this.run({ ...request, mode });
        }
        return {
          auto: required(results.auto),
          aero: required(results.aero),
          sea: required(results.sea),
          rail: required(results.rail),
        };
      })(),
    );
  }

  private async run(request: AnalysisRequest): Promise<NetworkResult> {
    const { bbox, mode } = request;
    const start = Date.now();
    console.log(`[analysis] ${mode} ${formatBbox(bbox)} refine=${request.refine}`);

    const records = await this.facilities.load(bbox, mode);
    const result = await buildLogisticsNetwork(records, {
      onInvalid: this.options.onInvalid,
      network: request.refine ? () => this.roads.load(bbox) : undefined,
      refine: this.options.refine,
      mode,
      bbox,
    });

    console.log(
      `[analysis] ${mode}: ${result.status}, ${result.nodesCount} nodes, ` +
        `${result.refinedCount}/${result.edgesCount} refined in ${Date.now() - start}ms`,
    );
    return result;
  }

  private async withDeadline<T>(work: Promise<T>): Promise<T> {
    const timeoutMs = this.options.pipelineTimeoutMs;
    let timer: ReturnType<typeof setTimeout> | undefined;
    const deadline = new Promise<never>((_, reject) => {
      timer = setTimeout(() => reject(new PipelineTimeoutError(timeoutMs)), timeoutMs);
    });

    try {
      return await Promise.race([work, deadline]);
    } finally {
      clearTimeout(timer);
    }
  }
}

function required(result: NetworkResult | undefined): NetworkResult {
  if (!result) throw new Error("Analysis finished without a result");
  return result;
}
