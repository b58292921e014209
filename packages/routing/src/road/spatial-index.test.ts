import { describe, it, expect } from "vitest";
import { NodeSpatialIndex } from "./spatial-index.js";

const nodes = [
  { lat: 59.0, lng: 30.0 },
  { lat: 59.0, lng: 30.01 },
  { lat: 59.02, lng: 30.0 },
  { lat: 59.0, lng: 30.0 },
];

describe("NodeSpatialIndex", () => {
  const index = new NodeSpatialIndex(nodes);

  it("finds the closest node in the query cell", () => {
    expect(index.nearest({ lat: 59.0, lng: 30.004 }, 5000)?.index).toBe(0);
    expect(index.nearest({ lat: 59.018, lng: 30.0 }, 5000)?.index).toBe(2);
  });

  it("searches outward across rings of cells", () => {
    const match = index.nearest({ lat: 59.0, lng: 30.05 }, 5000);
    expect(match?.index).toBe(1);
    expect(match?.distanceMeters).toBeGreaterThan(2000);
  });

  it("ignores nodes beyond the maximum distance", () => {
    expect(index.nearest({ lat: 59.01, lng: 30.0 }, 500)).toBeNull();
  });

  it("prefers the lower index among coincident nodes", () => {
    expect(index.nearest({ lat: 59.0, lng: 30.0 }, 100)).toEqual({ index: 0, distanceMeters: 0 });
  });

  it("returns null when empty", () => {
    const empty = new NodeSpatialIndex([]);
    expect(empty.size).toBe(0);
    expect(empty.nearest({ lat: 0, lng: 0 }, 1000)).toBeNull();
  });
});
