/**
 * Server configuration from environment variables, validated once at startup.
 */

import { homedir } from "node:os";
import { join } from "node:path";
import { parseBboxEdges, bboxProblem, type BboxEdges } from "@hubline/builder";
import { z } from "zod";

const DEFAULT_BBOX = "29.81,59.87,29.88,59.89";

const bboxSchema = z.string().transform((value, ctx): BboxEdges => {
  const edges = parseBboxEdges(value);
  if (!edges) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: "expected west,south,east,north as four numbers",
    });
    return z.NEVER;
  }
  const problem = bboxProblem(edges);
  if (problem) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: problem });
    return z.NEVER;
  }
  return edges;
});

const configSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(3000),
  OVERPASS_ENDPOINT: z.string().url().default("https://overpass-api.de/api/interpreter"),
  OVERPASS_TIMEOUT_SECONDS: z.coerce.number().int().positive().default(90),
  CACHE_DIR: z.string().min(1).default(join(homedir(), ".hubline", "feature-cache")),
  REFINE_CONCURRENCY: z.coerce.number().int().min(1).max(64).default(4),
  // 0 disables the per-edge timeout
  REFINE_EDGE_TIMEOUT_MS: z.coerce.number().int().min(0).default(15_000),
  PIPELINE_TIMEOUT_MS: z.coerce.number().int().positive().default(300_000),
  PROVIDER_MAX_RETRIES: z.coerce.number().int().min(0).max(10).default(3),
  INVALID_GEOMETRY_POLICY: z.enum(["fail", "drop"]).default("drop"),
  DEFAULT_BBOX: bboxSchema.default(DEFAULT_BBOX),
});

export type Config = z.infer<typeof configSchema>;

/**
 * Parse and validate configuration.
 *
 * @throws Error listing every invalid variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const result = configSchema.safeParse(env);

  if (!result.success) {
    const errors = result.error.issues
      .map((issue) => `  ${issue.path.join(".")}: ${issue.message}`)
      .join("\n");
    throw new Error(`Configuration validation failed:\n${errors}`);
  }

  return result.data;
}
