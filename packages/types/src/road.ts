/**
 * Routable road network contracts.
 *
 * The refiner only depends on RoutableNetwork; the in-memory road graph in
 * @hubline/routing is one implementation, built from RoadNetworkData.
 */

import type { Coordinate } from "./geo.js";

/** OSM tags as key-value pairs */
export type OsmTags = Record<string, string>;

/** A road way: ordered OSM node ids plus tags */
export interface RoadWay {
  id: number;
  refs: number[];
  tags?: OsmTags;
}

/** Parsed road network, ready for graph building */
export interface RoadNetworkData {
  nodes: Map<number, Coordinate>;
  ways: RoadWay[];
}

/** One hop of a shortest path */
export interface PathSegment {
  fromNodeId: string;
  toNodeId: string;
  lengthMeters: number;
}

/** External graph of real-world paths */
export interface RoutableNetwork {
  /** Closest network node, or null if nothing is close enough */
  nearestNode(lat: number, lng: number): Promise<string | null>;
  /** Ordered path segments minimizing length, or null if no path exists */
  shortestPath(fromNodeId: string, toNodeId: string): Promise<PathSegment[] | null>;
}
