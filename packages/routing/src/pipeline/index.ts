/**
 * Logistics network pipeline.
 *
 * records -> extract -> distance graph -> spanning tree -> refine -> assemble
 *
 * Stages run strictly in order; only refinement does concurrent work.
 */

import type {
  BoundingBox,
  FacilityRecord,
  NetworkResult,
  RefinementState,
  RoutableNetwork,
  TransportMode,
} from "@hubline/types";
import { ExternalProviderError } from "../errors.js";
import { extractLocatedPoints, type ExtractionOptions } from "../extraction/geometry-extractor.js";
import { buildDistanceGraph } from "../graph/distance-graph.js";
import { minimumSpanningTree } from "../graph/spanning-tree.js";
import {
  geodesicFallback,
  refineEdges,
  type RefinementOutcome,
  type RefineOptions,
} from "../refine/route-refiner.js";
import { assembleNetwork } from "../assemble/network-assembler.js";

/** A ready network, or a loader called only when there is something to refine */
export type NetworkSource = RoutableNetwork | (() => Promise<RoutableNetwork>);

export interface PipelineOptions extends ExtractionOptions {
  /** Omit for geodesic weights only */
  network?: NetworkSource;
  refine?: RefineOptions;
  mode?: TransportMode;
  bbox?: BoundingBox;
}

/**
 * Build the minimum logistics network over a set of facility records.
 *
 * @throws InvalidGeometryError under the "fail" policy
 */
export async function buildLogisticsNetwork(
  records: readonly FacilityRecord[],
  options: PipelineOptions = {},
): Promise<NetworkResult> {
  const start = Date.now();
  const label = options.mode ? ` (${options.mode})` : "";

  let stageStart = Date.now();
  const { points, dropped } = extractLocatedPoints(records, { onInvalid: options.onInvalid });
  console.log(
    `[pipeline]${label} Extracted ${points.length} point(s) from ${records.length} record(s) in ${Date.now() - stageStart}ms`,
  );

  stageStart = Date.now();
  const complete = buildDistanceGraph(points);
  console.log(
    `[pipeline]${label} Distance graph: ${complete.edges.length} edge(s) in ${Date.now() - stageStart}ms`,
  );

  stageStart = Date.now();
  const tree = minimumSpanningTree(complete);
  console.log(
    `[pipeline]${label} Spanning tree: ${tree.edges.length} edge(s) in ${Date.now() - stageStart}ms`,
  );

  let refinement: RefinementState = "disabled";
  let outcome: RefinementOutcome;

  if (!options.network) {
    outcome = geodesicFallback(tree.edges, "refinement-skipped");
  } else if (tree.edges.length === 0) {
    refinement = "applied";
    outcome = geodesicFallback([], "refinement-skipped");
  } else {
    const network = await resolveNetwork(options.network);
    if (network) {
      refinement = "applied";
      outcome = await refineEdges(tree.edges, points, network, options.refine);
    } else {
      refinement = "skipped";
      outcome = geodesicFallback(tree.edges, "refinement-skipped");
    }
  }

  const result = assembleNetwork({
    points,
    edges: outcome.edges,
    refinement,
    droppedCount: dropped.length,
    mode: options.mode,
    bbox: options.bbox,
  });

  console.log(
    `[pipeline]${label} Done: ${result.nodesCount} node(s), ${result.edgesCount} edge(s), ` +
      `${Math.round(result.totalDistance)}m, refinement ${refinement} in ${Date.now() - start}ms`,
  );

  return result;
}

/** Load the network; a systemic provider failure means no refinement */
async function resolveNetwork(source: NetworkSource): Promise<RoutableNetwork | null> {
  if ("nearestNode" in source) return source;
  try {
    return await source();
  } catch (err) {
    if (err instanceof ExternalProviderError) {
      console.warn(`[pipeline] Routable network unavailable, using geodesic weights: ${err.message}`);
      return null;
    }
    throw err;
  }
}
