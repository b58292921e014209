/**
 * @hubline/routing
 *
 * Builds a minimum logistics network over a set of facilities.
 *
 * Pipeline:
 * 1. Extract one representative coordinate per facility record
 * 2. Build the complete geodesic distance graph
 * 3. Reduce it to its minimum spanning tree
 * 4. Refine tree edges with road distances from a RoutableNetwork
 * 5. Assemble a frozen NetworkResult (optionally exported as GeoJSON)
 */

export * from "./errors.js";
export * from "./geo/haversine.js";
export { polygonCentroid } from "./geo/centroid.js";
export * from "./extraction/geometry-extractor.js";
export * from "./graph/distance-graph.js";
export * from "./graph/spanning-tree.js";
export { UnionFind } from "./graph/union-find.js";
export * from "./road/road-graph.js";
export * from "./refine/route-refiner.js";
export { mapWithConcurrency, withTimeout } from "./refine/worker-pool.js";
export * from "./assemble/network-assembler.js";
export * from "./export/index.js";
export * from "./metrics/centrality.js";
export * from "./pipeline/index.js";
