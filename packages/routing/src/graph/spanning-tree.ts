/**
 * Minimum spanning tree (Kruskal).
 *
 * Edges are taken in a total order (weight, then from, then to) so equal
 * weights always resolve the same way and results are reproducible.
 */

import type { DistanceGraph, WeightedEdge } from "@hubline/types";
import { UnionFind } from "./union-find.js";
import { GraphDisconnectedError } from "../errors.js";

/** Total order over edges used for tie-breaking */
export function compareEdges(a: WeightedEdge, b: WeightedEdge): number {
  return a.weight - b.weight || a.from - b.from || a.to - b.to;
}

/**
 * Compute the minimum spanning tree of a connected graph.
 *
 * Returns a new graph over the same nodes with exactly nodeCount - 1 edges,
 * in the order Kruskal accepted them. The input is not modified.
 *
 * @throws GraphDisconnectedError if the input does not connect all nodes
 */
export function minimumSpanningTree(graph: DistanceGraph): DistanceGraph {
  const { nodeCount } = graph;
  if (nodeCount <= 1) return { nodeCount, edges: [] };

  const sorted = [...graph.edges].sort(compareEdges);
  const forest = new UnionFind(nodeCount);
  const tree: WeightedEdge[] = [];

  for (const edge of sorted) {
    if (forest.union(edge.from, edge.to)) {
      tree.push({ from: edge.from, to: edge.to, weight: edge.weight });
      if (tree.length === nodeCount - 1) break;
    }
  }

  if (forest.componentCount !== 1) {
    throw new GraphDisconnectedError(nodeCount, tree.length);
  }

  return { nodeCount, edges: tree };
}

/** Sum of edge weights */
export function totalWeight(edges: readonly WeightedEdge[]): number {
  let total = 0;
  for (const edge of edges) total += edge.weight;
  return total;
}
