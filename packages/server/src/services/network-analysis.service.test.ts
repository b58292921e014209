import { describe, it, expect, vi } from "vitest";
import type {
  BoundingBox,
  FacilityRecord,
  PathSegment,
  RoutableNetwork,
  TransportMode,
} from "@hubline/types";
import { ExternalProviderError } from "@hubline/routing";
import { PipelineTimeoutError } from "../errors.js";
import { NetworkAnalysisService, type AnalysisOptions } from "./network-analysis.service.js";
import type { FacilitySource } from "./facility-source.service.js";
import type { RoadNetworkProvider } from "./road-network.service.js";

const bbox: BoundingBox = { minLat: 59.87, maxLat: 59.89, minLng: 29.81, maxLng: 29.88 };

const records: FacilityRecord[] = [
  { geometry: { type: "Point", coordinates: [29.82, 59.88] }, attributes: { name: "North" } },
  { geometry: { type: "Point", coordinates: [29.85, 59.87] }, attributes: { name: "South" } },
  { geometry: { type: "Point", coordinates: [29.87, 59.89] }, attributes: { name: "East" } },
];

const options: AnalysisOptions = {
  onInvalid: "drop",
  refine: { concurrency: 2, edgeTimeoutMs: 1000 },
  pipelineTimeoutMs: 5000,
};

class StaticFacilities implements FacilitySource {
  readonly calls: TransportMode[] = [];

  constructor(private readonly byMode: Partial<Record<TransportMode, FacilityRecord[]>>) {}

  async load(_bbox: BoundingBox, mode: TransportMode): Promise<FacilityRecord[]> {
    this.calls.push(mode);
    return this.byMode[mode] ?? [];
  }
}

/** Every point snaps to its own node; paths are a fixed 5 km */
const flatNetwork: RoutableNetwork = {
  async nearestNode(lat, lng) {
    return `${lat}:${lng}`;
  },
  async shortestPath(from, to): Promise<PathSegment[]> {
    return [{ fromNodeId: from, toNodeId: to, lengthMeters: 5000 }];
  },
};

function roads(load: RoadNetworkProvider["load"]): RoadNetworkProvider {
  return { load: vi.fn(load), clear: () => 0 };
}

describe("NetworkAnalysisService", () => {
  it("refines the network with road distances", async () => {
    const provider = roads(async () => flatNetwork);
    const service = new NetworkAnalysisService(
      new StaticFacilities({ auto: records }),
      provider,
      options,
    );

    const result = await service.analyze({ bbox, mode: "auto", refine: true });

    expect(result.status).toBe("ok");
    expect(result.mode).toBe("auto");
    expect(result.bbox).toEqual(bbox);
    expect(result.refinement).toBe("applied");
    expect(result.refinedCount).toBe(2);
    expect(result.totalDistance).toBe(10000);
    expect(provider.load).toHaveBeenCalledWith(bbox);
  });

  it("skips the road download when refinement is off", async () => {
    const provider = roads(async () => flatNetwork);
    const service = new NetworkAnalysisService(
      new StaticFacilities({ auto: records }),
      provider,
      options,
    );

    const result = await service.analyze({ bbox, mode: "auto", refine: false });

    expect(result.refinement).toBe("disabled");
    expect(result.fallbackCount).toBe(2);
    expect(provider.load).not.toHaveBeenCalled();
  });

  it("falls back to geodesic weights when roads are unavailable", async () => {
    const service = new NetworkAnalysisService(
      new StaticFacilities({ auto: records }),
      roads(async () => {
        throw new ExternalProviderError("Road network download failed: timeout");
      }),
      options,
    );

    const result = await service.analyze({ bbox, mode: "auto", refine: true });

    expect(result.refinement).toBe("skipped");
    expect(result.edges.map((e) => e.reason)).toEqual([
      "refinement-skipped",
      "refinement-skipped",
    ]);
  });

  it("returns an empty network for a mode without facilities", async () => {
    const provider = roads(async () => flatNetwork);
    const service = new NetworkAnalysisService(new StaticFacilities({}), provider, options);

    const result = await service.analyze({ bbox, mode: "sea", refine: true });

    expect(result.status).toBe("empty");
    expect(result.nodesCount).toBe(0);
    expect(provider.load).not.toHaveBeenCalled();
  });

  it("analyzes every mode in order", async () => {
    const facilities = new StaticFacilities({ auto: records, rail: records.slice(0, 2) });
    const service = new NetworkAnalysisService(facilities, roads(async () => flatNetwork), options);

    const results = await service.analyzeAll({ bbox, refine: true });

    expect(facilities.calls).toEqual(["auto", "aero", "sea", "rail"]);
    expect(results.auto.edgesCount).toBe(2);
    expect(results.aero.status).toBe("empty");
    expect(results.sea.status).toBe("empty");
    expect(results.rail.edgesCount).toBe(1);
    expect(results.rail.mode).toBe("rail");
  });

  it("computes metrics over the analyzed network", async () => {
    const service = new NetworkAnalysisService(
      new StaticFacilities({ sea: records }),
      roads(async () => flatNetwork),
      options,
    );

    const result = await service.metrics({
      bbox,
      mode: "sea",
      refine: true,
      metric: "closeness_centrality",
    });

    expect(result.metric).toBe("closeness_centrality");
    expect(result.mode).toBe("sea");
    // Every refined edge is 5 km, so the middle node sits 5 km from both ends
    expect(result.values.map((v) => v.value).sort((a, b) => a - b)).toEqual([
      2 / 15000,
      2 / 15000,
      2 / 10000,
    ]);
  });

  it("rejects with PipelineTimeoutError past the deadline", async () => {
    const stalled: FacilitySource = { load: () => new Promise<FacilityRecord[]>(() => {}) };
    const service = new NetworkAnalysisService(stalled, roads(async () => flatNetwork), {
      ...options,
      pipelineTimeoutMs: 20,
    });

    await expect(service.analyze({ bbox, mode: "auto", refine: true })).rejects.toBeInstanceOf(
      PipelineTimeoutError,
    );
  });
});
