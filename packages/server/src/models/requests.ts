import { NETWORK_METRICS, type BoundingBox, type NetworkMetric, type TransportMode } from "@hubline/types";
import { bboxFromEdges, bboxProblem, parseMode, type BboxEdges } from "@hubline/builder";
import { z, type ZodError } from "zod";
import { ValidationError, type FieldIssue } from "../errors.js";

const longitude = z.number().finite().min(-180).max(180);
const latitude = z.number().finite().min(-90).max(90);

export const analyzeRequestSchema = z.object({
  west: longitude.optional(),
  south: latitude.optional(),
  east: longitude.optional(),
  north: latitude.optional(),
  /** Case-insensitive; defaults to "auto" */
  mode: z.string().min(1).max(32).optional(),
  /** Refine edges with road distances (default true) */
  refine: z.boolean().default(true),
});

export type AnalyzeRequestBody = z.input<typeof analyzeRequestSchema>;

// Query strings arrive as text
const queryLongitude = z.coerce.number().finite().min(-180).max(180).optional();
const queryLatitude = z.coerce.number().finite().min(-90).max(90).optional();

export const metricsQuerySchema = z.object({
  west: queryLongitude,
  south: queryLatitude,
  east: queryLongitude,
  north: queryLatitude,
  mode: z.string().min(1).max(32).optional(),
  refine: z
    .enum(["true", "false"])
    .default("true")
    .transform((value) => value === "true"),
  metric: z.enum(NETWORK_METRICS),
});

/** A validated analysis request with defaults applied */
export interface AnalyzeRequest {
  edges: BboxEdges;
  bbox: BoundingBox;
  mode: TransportMode;
  refine: boolean;
}

export interface MetricsRequest extends AnalyzeRequest {
  metric: NetworkMetric;
}

export function zodIssues(error: ZodError): FieldIssue[] {
  return error.issues.map((issue) => ({ path: issue.path.join("."), message: issue.message }));
}

/**
 * Validate a request body. Missing bbox edges fall back to `defaults`.
 *
 * @throws ValidationError for malformed fields or an inverted bbox
 * @throws UnknownModeError for an unsupported mode
 */
export function parseAnalyzeRequest(body: unknown, defaults: BboxEdges): AnalyzeRequest {
  const parsed = analyzeRequestSchema.safeParse(body ?? {});
  if (!parsed.success) throw new ValidationError(zodIssues(parsed.error));
  return resolveRequest(parsed.data, defaults);
}

/**
 * Validate the query of a metrics request. `metric` is required.
 *
 * @throws ValidationError for a missing or unknown metric and malformed fields
 * @throws UnknownModeError for an unsupported mode
 */
export function parseMetricsQuery(query: unknown, defaults: BboxEdges): MetricsRequest {
  const parsed = metricsQuerySchema.safeParse(query ?? {});
  if (!parsed.success) throw new ValidationError(zodIssues(parsed.error));
  return { ...resolveRequest(parsed.data, defaults), metric: parsed.data.metric };
}

interface RequestFields {
  west?: number;
  south?: number;
  east?: number;
  north?: number;
  mode?: string;
  refine: boolean;
}

function resolveRequest(data: RequestFields, defaults: BboxEdges): AnalyzeRequest {
  const edges: BboxEdges = {
    west: data.west ?? defaults.west,
    south: data.south ?? defaults.south,
    east: data.east ?? defaults.east,
    north: data.north ?? defaults.north,
  };
  const problem = bboxProblem(edges);
  if (problem) throw new ValidationError([{ path: "bbox", message: problem }]);

  return {
    edges,
    bbox: bboxFromEdges(edges),
    mode: parseMode(data.mode ?? "auto"),
    refine: data.refine,
  };
}
