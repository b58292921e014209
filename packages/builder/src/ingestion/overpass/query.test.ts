import { describe, it, expect, vi, beforeEach } from "vitest";
import type { OverpassJson } from "overpass-ts";
import {
  DRIVABLE_HIGHWAYS,
  buildFacilityQuery,
  buildRoadNetworkQuery,
  fetchOverpassData,
} from "./query.js";

vi.mock("overpass-ts", () => ({
  overpassJson: vi.fn(),
}));

import { overpassJson } from "overpass-ts";

const bbox = { minLat: 59.87, maxLat: 59.89, minLng: 29.81, maxLng: 29.88 };

describe("buildFacilityQuery", () => {
  it("emits one nwr statement per tag key", () => {
    expect(buildFacilityQuery(bbox, { harbour: true, man_made: ["pier", "dock"] })).toBe(
      `[out:json][timeout:90];
(
  nwr["harbour"](59.87,29.81,59.89,29.88);
  nwr["man_made"~"^(pier|dock)$"](59.87,29.81,59.89,29.88);
);
out body geom;`,
    );
  });

  it("respects custom timeout", () => {
    const query = buildFacilityQuery(bbox, { building: ["warehouse"] }, 120);
    expect(query.startsWith("[out:json][timeout:120];")).toBe(true);
  });

  it("escapes regex metacharacters in values", () => {
    const query = buildFacilityQuery(bbox, { ref: ["a.b"] });
    expect(query).toContain('nwr["ref"~"^(a\\\\.b)$"]');
  });
});

describe("buildRoadNetworkQuery", () => {
  it("selects drivable highways with inline geometry", () => {
    const query = buildRoadNetworkQuery(bbox);
    expect(query).toContain(
      `way["highway"~"^(${DRIVABLE_HIGHWAYS.join("|")})$"](59.87,29.81,59.89,29.88);`,
    );
    expect(query).toContain("out body geom;");
    expect(query).not.toContain("footway");
  });
});

describe("fetchOverpassData", () => {
  const mockedOverpassJson = vi.mocked(overpassJson);
  const response: OverpassJson = {
    version: 0.6,
    generator: "test",
    osm3s: {
      timestamp_osm_base: "2024-01-01T00:00:00Z",
      copyright: "test",
    },
    elements: [],
  };

  beforeEach(() => {
    mockedOverpassJson.mockReset();
    mockedOverpassJson.mockResolvedValue(response);
  });

  it("posts the query to the default endpoint", async () => {
    const result = await fetchOverpassData("[out:json];out;");
    expect(result).toBe(response);
    expect(mockedOverpassJson).toHaveBeenCalledWith("[out:json];out;", {
      endpoint: "https://overpass-api.de/api/interpreter",
    });
  });

  it("passes endpoint and user agent through", async () => {
    await fetchOverpassData("q", { endpoint: "http://localhost:12345/api", userAgent: "hubline-test" });
    expect(mockedOverpassJson).toHaveBeenCalledWith("q", {
      endpoint: "http://localhost:12345/api",
      userAgent: "hubline-test",
    });
  });
});
