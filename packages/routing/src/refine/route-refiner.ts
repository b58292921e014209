/**
 * Route refinement: replace geodesic spanning-tree weights with road
 * distances from a RoutableNetwork.
 *
 * Per edge: snap both endpoints, ask for the shortest path, sum its
 * segment lengths. Any failure keeps the geodesic weight and marks the
 * edge as a fallback with a reason. Nothing here throws for a single
 * edge; topology and edge order are never changed.
 */

import type {
  Coordinate,
  FallbackReason,
  RefinedEdge,
  RoutableNetwork,
  WeightedEdge,
} from "@hubline/types";
import { mapWithConcurrency, withTimeout } from "./worker-pool.js";

export const DEFAULT_REFINE_CONCURRENCY = 4;
export const DEFAULT_EDGE_TIMEOUT_MS = 15_000;

export interface RefineOptions {
  /** Edges resolved in parallel (default 4) */
  concurrency?: number;
  /** Per-edge budget; exceeding it is a routing failure (default 15s, 0 disables) */
  edgeTimeoutMs?: number;
}

export interface RefinementStats {
  refined: number;
  fallback: number;
  byReason: Partial<Record<FallbackReason, number>>;
}

export interface RefinementOutcome {
  edges: RefinedEdge[];
  stats: RefinementStats;
}

type Resolution =
  | { ok: true; distance: number }
  | { ok: false; reason: FallbackReason };

/** Tree edges with geodesic weights, all marked as fallback for `reason` */
export function geodesicFallback(
  tree: readonly WeightedEdge[],
  reason: FallbackReason,
): RefinementOutcome {
  const edges = tree.map((edge) => toFallback(edge, reason));
  return { edges, stats: summarize(edges) };
}

export async function refineEdges(
  tree: readonly WeightedEdge[],
  points: readonly Coordinate[],
  network: RoutableNetwork,
  options: RefineOptions = {},
): Promise<RefinementOutcome> {
  const concurrency = options.concurrency ?? DEFAULT_REFINE_CONCURRENCY;
  const edgeTimeoutMs = options.edgeTimeoutMs ?? DEFAULT_EDGE_TIMEOUT_MS;
  const start = Date.now();

  // Snapped node per point index, shared by every edge touching the point
  const snapped = new Map<number, Promise<string | null>>();
  const snap = (index: number): Promise<string | null> => {
    const known = snapped.get(index);
    if (known) return known;
    const point = points[index];
    const pending = point
      ? network.nearestNode(point.lat, point.lng)
      : Promise.resolve(null);
    snapped.set(index, pending);
    return pending;
  };

  const resolveEdge = async (edge: WeightedEdge): Promise<Resolution> => {
    try {
      const [fromNode, toNode] = await Promise.all([snap(edge.from), snap(edge.to)]);
      if (fromNode === null || toNode === null) {
        return { ok: false, reason: "snap-failed" };
      }
      if (fromNode === toNode) return { ok: false, reason: "no-path" };

      const path = await network.shortestPath(fromNode, toNode);
      if (!path || path.length === 0) return { ok: false, reason: "no-path" };

      let distance = 0;
      for (const segment of path) distance += segment.lengthMeters;
      if (!Number.isFinite(distance) || distance < 0) {
        return { ok: false, reason: "provider-error" };
      }
      return { ok: true, distance };
    } catch (err) {
      console.warn(
        `[refine] Edge ${edge.from}-${edge.to} failed: ${err instanceof Error ? err.message : String(err)}`,
      );
      return { ok: false, reason: "provider-error" };
    }
  };

  const edges = await mapWithConcurrency(tree, concurrency, async (edge) => {
    const resolution = await withTimeout<Resolution>(
      resolveEdge(edge),
      edgeTimeoutMs,
      () => ({ ok: false, reason: "timeout" }),
    );
    return resolution.ok
      ? toRefined(edge, resolution.distance)
      : toFallback(edge, resolution.reason);
  });

  const stats = summarize(edges);
  const reasons = Object.entries(stats.byReason)
    .map(([reason, count]) => `${reason}: ${count}`)
    .join(", ");
  console.log(
    `[refine] ${stats.refined} refined, ${stats.fallback} fallback` +
      (reasons ? ` (${reasons})` : "") +
      ` in ${Date.now() - start}ms`,
  );

  return { edges, stats };
}

function toRefined(edge: WeightedEdge, distance: number): RefinedEdge {
  return {
    from: edge.from,
    to: edge.to,
    weight: distance,
    status: "refined",
    geodesicWeight: edge.weight,
  };
}

function toFallback(edge: WeightedEdge, reason: FallbackReason): RefinedEdge {
  return {
    from: edge.from,
    to: edge.to,
    weight: edge.weight,
    status: "fallback",
    geodesicWeight: edge.weight,
    reason,
  };
}

function summarize(edges: readonly RefinedEdge[]): RefinementStats {
  const stats: RefinementStats = { refined: 0, fallback: 0, byReason: {} };
  for (const edge of edges) {
    if (edge.status === "refined") {
      stats.refined++;
    } else {
      stats.fallback++;
      if (edge.reason) {
        stats.byReason[edge.reason] = (stats.byReason[edge.reason] ?? 0) + 1;
      }
    }
  }
  return stats;
}
