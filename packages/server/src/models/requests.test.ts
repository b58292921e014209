import { describe, it, expect } from "vitest";
import { UnknownModeError } from "@hubline/builder";
import { parseAnalyzeRequest, parseMetricsQuery } from "./requests.js";
import { ValidationError } from "../errors.js";

const defaults = { west: 29.81, south: 59.87, east: 29.88, north: 59.89 };

describe("parseAnalyzeRequest", () => {
  it("applies defaults to an empty body", () => {
    expect(parseAnalyzeRequest(undefined, defaults)).toEqual({
      edges: defaults,
      bbox: { minLat: 59.87, maxLat: 59.89, minLng: 29.81, maxLng: 29.88 },
      mode: "auto",
      refine: true,
    });
  });

  it("fills missing edges from the defaults", () => {
    const request = parseAnalyzeRequest({ north: 59.95, mode: "RAIL", refine: false }, defaults);
    expect(request.edges).toEqual({ ...defaults, north: 59.95 });
    expect(request.mode).toBe("rail");
    expect(request.refine).toBe(false);
  });

  it("reports malformed fields", () => {
    const error = (() => {
      try {
        parseAnalyzeRequest({ west: "29.8", south: 95 }, defaults);
        return null;
      } catch (err) {
        return err;
      }
    })();

    expect(error).toBeInstanceOf(ValidationError);
    expect(error instanceof ValidationError ? error.details : []).toEqual([
      { path: "west", message: "Expected number, received string" },
      { path: "south", message: "Number must be less than or equal to 90" },
    ]);
  });

  it("rejects an inverted bbox", () => {
    expect(() => parseAnalyzeRequest({ west: 30, east: 29 }, defaults)).toThrow(ValidationError);
  });

  it("rejects unknown modes", () => {
    expect(() => parseAnalyzeRequest({ mode: "space" }, defaults)).toThrow(UnknownModeError);
  });
});

describe("parseMetricsQuery", () => {
  function issuesOf(query: unknown) {
    try {
      parseMetricsQuery(query, defaults);
      return null;
    } catch (err) {
      return err instanceof ValidationError ? err.details : err;
    }
  }

  it("coerces query strings and applies defaults", () => {
    expect(
      parseMetricsQuery({ north: "59.95", refine: "false", metric: "degree_centrality" }, defaults),
    ).toEqual({
      edges: { ...defaults, north: 59.95 },
      bbox: { minLat: 59.87, maxLat: 59.95, minLng: 29.81, maxLng: 29.88 },
      mode: "auto",
      refine: false,
      metric: "degree_centrality",
    });
  });

  it("refines by default", () => {
    expect(parseMetricsQuery({ metric: "closeness_centrality" }, defaults).refine).toBe(true);
  });

  it("requires a metric", () => {
    expect(issuesOf({ mode: "sea" })).toEqual([{ path: "metric", message: "Required" }]);
  });

  it("rejects unknown metrics and non-numeric edges", () => {
    expect(issuesOf({ metric: "pagerank", west: "abc" })).toEqual([
      { path: "west", message: "Expected number, received nan" },
      {
        path: "metric",
        message:
          "Invalid enum value. Expected 'degree_centrality' | 'closeness_centrality', received 'pagerank'",
      },
    ]);
  });
});
