import { describe, it, expect } from "vitest";
import type { DistanceGraph } from "@hubline/types";
import { minimumSpanningTree, compareEdges, totalWeight } from "./spanning-tree.js";
import { buildDistanceGraph } from "./distance-graph.js";
import { UnionFind } from "./union-find.js";
import { GraphDisconnectedError } from "../errors.js";

/** Deterministic pseudo-random points (Park-Miller), no Math.random in tests */
function scatter(n: number, seed = 7) {
  let state = seed;
  const next = () => {
    state = (state * 16807) % 2147483647;
    return state / 2147483647;
  };
  return Array.from({ length: n }, () => ({
    lat: 59.7 + next() * 0.4,
    lng: 30.0 + next() * 0.6,
  }));
}

function assertSpanningTree(tree: DistanceGraph): void {
  const uf = new UnionFind(tree.nodeCount);
  for (const edge of tree.edges) {
    // A cycle would join two already-connected nodes
    expect(uf.union(edge.from, edge.to)).toBe(true);
  }
  expect(uf.componentCount).toBe(tree.nodeCount === 0 ? 0 : 1);
}

describe("minimumSpanningTree", () => {
  it("returns no edges for 0 or 1 nodes", () => {
    expect(minimumSpanningTree({ nodeCount: 0, edges: [] })).toEqual({ nodeCount: 0, edges: [] });
    expect(minimumSpanningTree({ nodeCount: 1, edges: [] })).toEqual({ nodeCount: 1, edges: [] });
  });

  it("drops the longest edge of a triangle", () => {
    const graph = buildDistanceGraph([
      { lat: 59.9, lng: 30.3 },
      { lat: 59.8, lng: 30.4 },
      { lat: 59.7, lng: 30.5 },
    ]);
    const tree = minimumSpanningTree(graph);

    const longest = [...graph.edges].sort(compareEdges)[2];
    expect(longest).toMatchObject({ from: 0, to: 2 });
    expect(tree.edges).toHaveLength(2);
    expect(tree.edges.map((e) => [e.from, e.to]).sort()).toEqual([
      [0, 1],
      [1, 2],
    ]);
  });

  it("picks the cheapest edges on a weighted toy graph", () => {
    const tree = minimumSpanningTree({
      nodeCount: 3,
      edges: [
        { from: 0, to: 1, weight: 100 },
        { from: 0, to: 2, weight: 150 },
        { from: 1, to: 2, weight: 200 },
      ],
    });
    expect(tree.edges).toEqual([
      { from: 0, to: 1, weight: 100 },
      { from: 0, to: 2, weight: 150 },
    ]);
    expect(totalWeight(tree.edges)).toBe(250);
  });

  it.each([2, 3, 8, 25, 60])("spans %i scattered nodes with n-1 acyclic edges", (n) => {
    const tree = minimumSpanningTree(buildDistanceGraph(scatter(n, n)));
    expect(tree.edges).toHaveLength(n - 1);
    assertSpanningTree(tree);
  });

  it("resolves weight ties by (from, to)", () => {
    // Four corners of a square with equal sides: every side ties.
    const tree = minimumSpanningTree({
      nodeCount: 4,
      edges: [
        { from: 2, to: 3, weight: 1 },
        { from: 0, to: 3, weight: 1 },
        { from: 1, to: 2, weight: 1 },
        { from: 0, to: 1, weight: 1 },
        { from: 0, to: 2, weight: 1.4 },
        { from: 1, to: 3, weight: 1.4 },
      ],
    });
    expect(tree.edges.map((e) => [e.from, e.to])).toEqual([
      [0, 1],
      [0, 3],
      [1, 2],
    ]);
  });

  it("is deterministic across runs and input orderings", () => {
    const graph = buildDistanceGraph(scatter(30));
    const shuffled: DistanceGraph = { nodeCount: graph.nodeCount, edges: [...graph.edges].reverse() };
    expect(minimumSpanningTree(shuffled)).toEqual(minimumSpanningTree(graph));
  });

  it("does not modify its input", () => {
    const graph = buildDistanceGraph(scatter(6));
    const before = JSON.stringify(graph);
    minimumSpanningTree(graph);
    expect(JSON.stringify(graph)).toBe(before);
  });

  it("asserts connectivity", () => {
    expect(() =>
      minimumSpanningTree({ nodeCount: 3, edges: [{ from: 0, to: 1, weight: 5 }] }),
    ).toThrow(GraphDisconnectedError);
  });
});
