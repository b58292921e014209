/**
 * In-memory road graph: the RoutableNetwork the server builds from an
 * Overpass road download.
 *
 * Every OSM node on a way is a graph node; consecutive way nodes become an
 * undirected edge weighted by haversine length. One-way tags are ignored:
 * the graph estimates travel distance, it does not navigate.
 */

import type {
  Coordinate,
  PathSegment,
  RoadNetworkData,
  RoutableNetwork,
} from "@hubline/types";
import { haversineDistance } from "../geo/haversine.js";
import { MinPriorityQueue } from "./priority-queue.js";
import { NodeSpatialIndex } from "./spatial-index.js";

/** Default maximum snapping distance in meters */
export const DEFAULT_MAX_SNAP_DISTANCE = 5_000;

export interface RoadGraphOptions {
  /** Nearest-node queries farther than this return null (default 5 km) */
  maxSnapDistanceMeters?: number;
  /** Spatial index cell size in meters (default 500) */
  cellSizeMeters?: number;
}

interface Neighbor {
  to: number;
  distance: number;
}

export interface RoadGraphStats {
  nodeCount: number;
  edgeCount: number;
}

export class RoadGraph implements RoutableNetwork {
  private readonly indexById = new Map<string, number>();
  private readonly index: NodeSpatialIndex;
  private readonly maxSnapDistance: number;

  constructor(
    private readonly nodeIds: readonly string[],
    private readonly coords: readonly Coordinate[],
    private readonly adjacency: readonly Neighbor[][],
    private readonly edgeCount: number,
    options: RoadGraphOptions = {},
  ) {
    nodeIds.forEach((id, i) => this.indexById.set(id, i));
    this.maxSnapDistance = options.maxSnapDistanceMeters ?? DEFAULT_MAX_SNAP_DISTANCE;
    this.index = new NodeSpatialIndex(coords, options.cellSizeMeters);
  }

  get stats(): RoadGraphStats {
    return { nodeCount: this.nodeIds.length, edgeCount: this.edgeCount };
  }

  coordinateOf(nodeId: string): Coordinate | undefined {
    const i = this.indexById.get(nodeId);
    return i === undefined ? undefined : this.coords[i];
  }

  async nearestNode(lat: number, lng: number): Promise<string | null> {
    return this.findNearestNode(lat, lng);
  }

  async shortestPath(fromNodeId: string, toNodeId: string): Promise<PathSegment[] | null> {
    return this.findShortestPath(fromNodeId, toNodeId);
  }

  findNearestNode(lat: number, lng: number): string | null {
    const match = this.index.nearest({ lat, lng }, this.maxSnapDistance);
    if (!match) return null;
    return this.nodeIds[match.index] ?? null;
  }

  /**
   * Dijkstra by length. Returns null for unknown nodes, identical endpoints
   * and unreachable targets.
   */
  findShortestPath(fromNodeId: string, toNodeId: string): PathSegment[] | null {
    const source = this.indexById.get(fromNodeId);
    const target = this.indexById.get(toNodeId);
    if (source === undefined || target === undefined || source === target) {
      return null;
    }

    const n = this.nodeIds.length;
    const distances = new Float64Array(n).fill(Number.POSITIVE_INFINITY);
    const previous = new Int32Array(n).fill(-1);
    const hopLength = new Float64Array(n);
    const queue = new MinPriorityQueue();

    distances[source] = 0;
    queue.push({ node: source, distance: 0 });

    while (queue.size > 0) {
      const current = queue.pop();
      if (!current) break;
      if (current.distance > (distances[current.node] ?? Number.POSITIVE_INFINITY)) {
        continue;
      }
      if (current.node === target) break;

      for (const edge of this.adjacency[current.node] ?? []) {
        const next = current.distance + edge.distance;
        if (next < (distances[edge.to] ?? Number.POSITIVE_INFINITY)) {
          distances[edge.to] = next;
          previous[edge.to] = current.node;
          hopLength[edge.to] = edge.distance;
          queue.push({ node: edge.to, distance: next });
        }
      }
    }

    if (!Number.isFinite(distances[target] ?? Number.POSITIVE_INFINITY)) {
      return null;
    }

    const segments: PathSegment[] = [];
    let node = target;
    while (node !== source) {
      const prev = previous[node] ?? -1;
      if (prev < 0) return null;
      segments.push({
        fromNodeId: this.nodeIds[prev] ?? String(prev),
        toNodeId: this.nodeIds[node] ?? String(node),
        lengthMeters: hopLength[node] ?? 0,
      });
      node = prev;
    }

    return segments.reverse();
  }
}

/**
 * Build a RoadGraph from parsed ways. Refs without a known coordinate split
 * the way; repeated segments between the same two nodes are kept once,
 * at their shortest length.
 */
export function buildRoadGraph(
  data: RoadNetworkData,
  options: RoadGraphOptions = {},
): RoadGraph {
  const nodeIds: string[] = [];
  const coords: Coordinate[] = [];
  const indexByOsmId = new Map<number, number>();
  const edgeLengths = new Map<string, number>();

  const indexOf = (osmId: number): number | undefined => {
    const existing = indexByOsmId.get(osmId);
    if (existing !== undefined) return existing;
    const coord = data.nodes.get(osmId);
    if (!coord) return undefined;
    const index = nodeIds.length;
    nodeIds.push(String(osmId));
    coords.push(coord);
    indexByOsmId.set(osmId, index);
    return index;
  };

  for (const way of data.ways) {
    for (let k = 1; k < way.refs.length; k++) {
      const fromRef = way.refs[k - 1];
      const toRef = way.refs[k];
      if (fromRef === undefined || toRef === undefined || fromRef === toRef) continue;

      const a = indexOf(fromRef);
      const b = indexOf(toRef);
      if (a === undefined || b === undefined) continue;

      const ca = coords[a];
      const cb = coords[b];
      if (!ca || !cb) continue;

      const key = a < b ? `${a}:${b}` : `${b}:${a}`;
      const length = haversineDistance(ca, cb);
      const known = edgeLengths.get(key);
      if (known === undefined || length < known) edgeLengths.set(key, length);
    }
  }

  const adjacency: Neighbor[][] = nodeIds.map(() => []);
  for (const [key, distance] of edgeLengths) {
    const [a, b] = key.split(":").map(Number);
    if (a === undefined || b === undefined) continue;
    adjacency[a]?.push({ to: b, distance });
    adjacency[b]?.push({ to: a, distance });
  }

  return new RoadGraph(nodeIds, coords, adjacency, edgeLengths.size, options);
}
