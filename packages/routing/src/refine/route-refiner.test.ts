import { describe, it, expect, vi } from "vitest";
import type { Coordinate, PathSegment, RoutableNetwork, WeightedEdge } from "@hubline/types";
import { geodesicFallback, refineEdges } from "./route-refiner.js";

const points: Coordinate[] = [
  { lat: 59.9, lng: 30.3 },
  { lat: 59.8, lng: 30.4 },
  { lat: 59.7, lng: 30.5 },
];

const tree: WeightedEdge[] = [
  { from: 0, to: 1, weight: 12_500 },
  { from: 1, to: 2, weight: 12_600 },
];

function segment(fromNodeId: string, toNodeId: string, lengthMeters: number): PathSegment {
  return { fromNodeId, toNodeId, lengthMeters };
}

/** Snaps point i to node "n{i}"; paths are looked up by "from>to" */
class FakeNetwork implements RoutableNetwork {
  readonly snapCalls: string[] = [];

  constructor(
    private readonly paths: Record<string, PathSegment[] | null>,
    private readonly snaps: Record<string, string | null> = {},
  ) {}

  async nearestNode(lat: number, lng: number): Promise<string | null> {
    const key = `${lat},${lng}`;
    this.snapCalls.push(key);
    if (key in this.snaps) return this.snaps[key] ?? null;
    const index = points.findIndex((p) => p.lat === lat && p.lng === lng);
    return index >= 0 ? `n${index}` : null;
  }

  async shortestPath(from: string, to: string): Promise<PathSegment[] | null> {
    return this.paths[`${from}>${to}`] ?? null;
  }
}

describe("refineEdges", () => {
  it("sums path segments for routable edges and keeps geodesic weight otherwise", async () => {
    const network = new FakeNetwork({
      "n0>n1": [segment("n0", "a", 8_000), segment("a", "n1", 7_500)],
    });

    const { edges, stats } = await refineEdges(tree, points, network);

    expect(edges).toEqual([
      { from: 0, to: 1, weight: 15_500, status: "refined", geodesicWeight: 12_500 },
      {
        from: 1,
        to: 2,
        weight: 12_600,
        status: "fallback",
        geodesicWeight: 12_600,
        reason: "no-path",
      },
    ]);
    expect(stats).toEqual({ refined: 1, fallback: 1, byReason: { "no-path": 1 } });
  });

  it("snaps each point once per run", async () => {
    const network = new FakeNetwork({});
    await refineEdges(tree, points, network, { concurrency: 1 });
    expect(network.snapCalls).toHaveLength(3);
  });

  it("marks unsnappable endpoints as snap-failed", async () => {
    const network = new FakeNetwork(
      { "n0>n1": [segment("n0", "n1", 9_000)] },
      { "59.7,30.5": null },
    );
    const { edges } = await refineEdges(tree, points, network);
    expect(edges.map((e) => e.reason)).toEqual([undefined, "snap-failed"]);
    expect(edges[1]?.weight).toBe(12_600);
  });

  it("treats endpoints snapped to the same node as no path", async () => {
    const network = new FakeNetwork({}, { "59.9,30.3": "shared", "59.8,30.4": "shared" });
    const { edges } = await refineEdges(tree.slice(0, 1), points, network);
    expect(edges[0]?.status).toBe("fallback");
    expect(edges[0]?.reason).toBe("no-path");
  });

  it("treats an empty path as no path", async () => {
    const network = new FakeNetwork({ "n0>n1": [] });
    const { edges } = await refineEdges(tree.slice(0, 1), points, network);
    expect(edges[0]?.reason).toBe("no-path");
  });

  it("absorbs provider errors per edge", async () => {
    const network = new FakeNetwork({ "n1>n2": [segment("n1", "n2", 13_000)] });
    vi.spyOn(network, "shortestPath").mockImplementation(async (from, to) => {
      if (from === "n0") throw new Error("connection reset");
      return [segment(from, to, 13_000)];
    });
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});

    const { edges, stats } = await refineEdges(tree, points, network);

    expect(edges.map((e) => [e.status, e.weight])).toEqual([
      ["fallback", 12_500],
      ["refined", 13_000],
    ]);
    expect(stats.byReason).toEqual({ "provider-error": 1 });
    expect(warn).toHaveBeenCalledWith("[refine] Edge 0-1 failed: connection reset");
    warn.mockRestore();
  });

  it("times out slow edges", async () => {
    const network = new FakeNetwork({});
    vi.spyOn(network, "shortestPath").mockImplementation(
      () => new Promise<PathSegment[] | null>(() => {}),
    );

    const { edges } = await refineEdges(tree, points, network, { edgeTimeoutMs: 20 });

    expect(edges.map((e) => e.reason)).toEqual(["timeout", "timeout"]);
    expect(edges.map((e) => e.weight)).toEqual([12_500, 12_600]);
  });

  it("returns an empty result for an empty tree", async () => {
    const { edges, stats } = await refineEdges([], points, new FakeNetwork({}));
    expect(edges).toEqual([]);
    expect(stats).toEqual({ refined: 0, fallback: 0, byReason: {} });
  });
});

describe("geodesicFallback", () => {
  it("keeps every weight and records the reason", () => {
    const { edges, stats } = geodesicFallback(tree, "refinement-skipped");
    expect(edges.map((e) => [e.weight, e.geodesicWeight, e.status, e.reason])).toEqual([
      [12_500, 12_500, "fallback", "refinement-skipped"],
      [12_600, 12_600, "fallback", "refinement-skipped"],
    ]);
    expect(stats).toEqual({ refined: 0, fallback: 2, byReason: { "refinement-skipped": 2 } });
  });
});
