/**
 * Network assembly: located points + refined edges -> NetworkResult.
 */

import type {
  AttributeValue,
  BoundingBox,
  LocatedPoint,
  NetworkPoint,
  NetworkResult,
  RefinedEdge,
  RefinementState,
  SanitizedValue,
  TransportMode,
} from "@hubline/types";
import { totalWeight } from "../graph/spanning-tree.js";

export interface AssembleInput {
  points: readonly LocatedPoint[];
  edges: readonly RefinedEdge[];
  refinement: RefinementState;
  droppedCount?: number;
  mode?: TransportMode;
  bbox?: BoundingBox;
}

/** Reduce one attribute value to something JSON can carry unchanged */
export function sanitizeValue(value: AttributeValue): SanitizedValue {
  if (value === undefined || value === null) return null;
  switch (typeof value) {
    case "string":
    case "boolean":
      return value;
    case "number":
      return Number.isFinite(value) ? value : null;
    case "bigint":
      return value.toString();
    case "object":
      return stringifyObject(value);
    default:
      return String(value);
  }
}

/** JSON text of an object or array; null when it has no JSON form */
function stringifyObject(value: object): string | null {
  try {
    const json: string | undefined = JSON.stringify(value, (_key, nested: unknown) =>
      typeof nested === "bigint" ? nested.toString() : nested,
    );
    return json ?? null;
  } catch (err) {
    // Circular structures and throwing toJSON()
    console.warn(
      `[assemble] Attribute not serializable: ${err instanceof Error ? err.message : String(err)}`,
    );
    return null;
  }
}

/**
 * Sanitize a point's attributes. The geometry key is dropped; every other
 * key is kept, with missing values as explicit null.
 */
export function sanitizeAttributes(
  attributes: Readonly<Record<string, AttributeValue>>,
): Record<string, SanitizedValue> {
  const result: Record<string, SanitizedValue> = {};
  for (const [key, value] of Object.entries(attributes)) {
    if (key === "geometry") continue;
    result[key] = sanitizeValue(value);
  }
  return result;
}

/**
 * Merge the pipeline outputs into one deeply frozen result.
 */
export function assembleNetwork(input: AssembleInput): NetworkResult {
  const points: NetworkPoint[] = input.points.map((p) => ({
    lat: p.lat,
    lng: p.lng,
    attributes: sanitizeAttributes(p.attributes),
  }));
  const edges: RefinedEdge[] = input.edges.map((e) => ({ ...e }));

  let refinedCount = 0;
  for (const edge of edges) {
    if (edge.status === "refined") refinedCount++;
  }

  const result: NetworkResult = {
    status: points.length === 0 ? "empty" : "ok",
    points,
    edges,
    totalDistance: totalWeight(edges),
    nodesCount: points.length,
    edgesCount: edges.length,
    refinedCount,
    fallbackCount: edges.length - refinedCount,
    droppedCount: input.droppedCount ?? 0,
    refinement: input.refinement,
  };
  if (input.mode) result.mode = input.mode;
  if (input.bbox) result.bbox = { ...input.bbox };

  return deepFreeze(result);
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}
