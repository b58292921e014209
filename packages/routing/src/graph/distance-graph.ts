/**
 * Complete geodesic distance graph over located points.
 *
 * One edge per unordered pair, emitted in lexicographic (from, to) order
 * with from < to. O(n²) edges: fine for the tens to low hundreds of
 * facilities a region yields, and the reason the pipeline does not scale
 * past that without sparsifying first.
 */

import type { Coordinate, DistanceGraph, WeightedEdge } from "@hubline/types";
import { haversineDistance } from "../geo/haversine.js";

/**
 * Build the complete undirected graph with haversine weights in meters.
 */
export function buildDistanceGraph(points: readonly Coordinate[]): DistanceGraph {
  const edges: WeightedEdge[] = [];
  const n = points.length;

  for (let from = 0; from < n; from++) {
    const a = points[from];
    if (!a) continue;
    for (let to = from + 1; to < n; to++) {
      const b = points[to];
      if (!b) continue;
      edges.push({ from, to, weight: haversineDistance(a, b) });
    }
  }

  return { nodeCount: n, edges };
}

/**
 * Look up the weight of the edge between two points, in either order.
 * Returns undefined when the graph has no such edge.
 */
export function edgeWeight(
  graph: DistanceGraph,
  i: number,
  j: number,
): number | undefined {
  const from = Math.min(i, j);
  const to = Math.max(i, j);
  const n = graph.nodeCount;
  if (from === to || from < 0 || to >= n) return undefined;

  // Row `from` starts after the (n-1) + (n-2) + ... + (n-from) earlier edges.
  const rowStart = from * n - (from * (from + 1)) / 2;
  const edge = graph.edges[rowStart + (to - from - 1)];
  if (edge && edge.from === from && edge.to === to) return edge.weight;
  return graph.edges.find((e) => e.from === from && e.to === to)?.weight;
}
