/**
 * Node centrality over an assembled network.
 *
 * Both metrics are normalized to [0, 1]. Closeness uses the final edge
 * weights (refined distances where available) as path lengths.
 */

import type {
  NetworkMetric,
  NetworkMetricsResult,
  NetworkResult,
  RefinedEdge,
} from "@hubline/types";

interface Neighbor {
  node: number;
  weight: number;
}

function adjacencyOf(nodeCount: number, edges: readonly RefinedEdge[]): Neighbor[][] {
  const adjacency: Neighbor[][] = Array.from({ length: nodeCount }, () => []);
  for (const { from, to, weight } of edges) {
    adjacency[from]?.push({ node: to, weight });
    adjacency[to]?.push({ node: from, weight });
  }
  return adjacency;
}

/** Edge count per node divided by n - 1; a lone node scores 1 */
export function degreeCentrality(nodeCount: number, edges: readonly RefinedEdge[]): number[] {
  if (nodeCount === 1) return [1];
  return adjacencyOf(nodeCount, edges).map((neighbors) => neighbors.length / (nodeCount - 1));
}

/**
 * Reachable nodes divided by their summed path distance, scaled by the
 * reachable share of the graph. Nodes with no reachable neighbors (or
 * only zero-length paths) score 0.
 */
export function closenessCentrality(nodeCount: number, edges: readonly RefinedEdge[]): number[] {
  const adjacency = adjacencyOf(nodeCount, edges);
  const scores: number[] = [];

  for (let source = 0; source < nodeCount; source++) {
    const distance = new Float64Array(nodeCount).fill(Number.POSITIVE_INFINITY);
    distance[source] = 0;
    const stack = [source];
    let reached = 0;
    let total = 0;

    // Tree paths are unique, so a plain traversal gives shortest distances
    while (stack.length > 0) {
      const node = stack.pop() ?? source;
      const base = distance[node] ?? 0;
      for (const next of adjacency[node] ?? []) {
        if (distance[next.node] !== Number.POSITIVE_INFINITY) continue;
        const d = base + next.weight;
        distance[next.node] = d;
        reached++;
        total += d;
        stack.push(next.node);
      }
    }

    scores.push(total > 0 && nodeCount > 1 ? (reached / total) * (reached / (nodeCount - 1)) : 0);
  }

  return scores;
}

/**
 * Compute one metric for every point of a network.
 */
export function computeNetworkMetric(
  network: NetworkResult,
  metric: NetworkMetric,
): NetworkMetricsResult {
  const nodeCount = network.points.length;
  const scores =
    metric === "degree_centrality"
      ? degreeCentrality(nodeCount, network.edges)
      : closenessCentrality(nodeCount, network.edges);

  const result: NetworkMetricsResult = {
    metric,
    nodesCount: network.nodesCount,
    edgesCount: network.edgesCount,
    values: network.points.map((point, index) => ({
      index,
      lat: point.lat,
      lng: point.lng,
      value: scores[index] ?? 0,
    })),
  };
  if (network.mode) result.mode = network.mode;
  if (network.bbox) result.bbox = { ...network.bbox };
  return result;
}
