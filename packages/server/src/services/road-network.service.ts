/**
 * Road network provider: Overpass road download + in-memory road graph.
 *
 * Downloads are retried with backoff on rate limiting and network errors;
 * any remaining failure surfaces as ExternalProviderError, which the
 * pipeline turns into geodesic-only weights.
 */

import type { BoundingBox, RoutableNetwork } from "@hubline/types";
import {
  buildRoadNetworkQuery,
  DEFAULT_ENDPOINT,
  expandBbox,
  formatBbox,
  parseRoadNetworkResponse,
} from "@hubline/builder";
import { buildRoadGraph, ExternalProviderError, type RoadGraph } from "@hubline/routing";
import axios from "axios";

const RETRY_DELAYS = [2000, 5000, 10000];
/** Roads slightly outside the bbox let edge facilities snap */
const DEFAULT_BUFFER_KM = 1;
const DEFAULT_MAX_CACHED = 8;

export interface RetryOptions {
  endpoint?: string;
  maxRetries?: number;
  delays?: readonly number[];
  /** Overpass query timeout, also bounds the HTTP request */
  timeoutSeconds?: number;
  sleep?: (ms: number) => Promise<void>;
}

const defaultSleep = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));

class OverpassHttpError extends Error {
  constructor(
    readonly status: number,
    statusText: string,
  ) {
    super(`Overpass API error: ${status} ${statusText}`);
    this.name = "OverpassHttpError";
  }
}

/**
 * POST a query to Overpass, retrying 429/5xx responses and network errors.
 */
export async function fetchOverpassWithRetry(
  query: string,
  options: RetryOptions = {},
): Promise<unknown> {
  const endpoint = options.endpoint ?? DEFAULT_ENDPOINT;
  const maxRetries = options.maxRetries ?? 3;
  const delays = options.delays ?? RETRY_DELAYS;
  const sleep = options.sleep ?? defaultSleep;
  const timeoutMs = ((options.timeoutSeconds ?? 90) + 30) * 1000;

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    const delay = delays[attempt] ?? delays[delays.length - 1] ?? 10000;
    try {
      console.log(`[overpass] POST ${endpoint} (attempt ${attempt + 1})`);
      const res = await axios.post<unknown>(endpoint, `data=${encodeURIComponent(query)}`, {
        headers: { "Content-Type": "application/x-www-form-urlencoded" },
        timeout: timeoutMs,
        validateStatus: () => true,
      });

      if (res.status >= 200 && res.status < 300) {
        return res.data;
      }

      if (res.status >= 429 && attempt < maxRetries) {
        console.log(
          `[overpass] ${res.status} ${res.statusText}, retrying in ${delay / 1000}s`,
        );
        await sleep(delay);
        continue;
      }

      throw new OverpassHttpError(res.status, res.statusText);
    } catch (err) {
      if (attempt < maxRetries && !(err instanceof OverpassHttpError)) {
        console.log(
          `[overpass] Network error: ${err instanceof Error ? err.message : String(err)}, retrying in ${delay / 1000}s`,
        );
        await sleep(delay);
        continue;
      }
      throw err;
    }
  }
  throw new Error("Overpass API: max retries exceeded");
}

export interface RoadNetworkProvider {
  load(bbox: BoundingBox): Promise<RoutableNetwork>;
  /** Drop cached road graphs; returns how many were dropped */
  clear(): number;
}

export interface RoadNetworkServiceOptions extends RetryOptions {
  bufferKm?: number;
  /** Road graphs kept in memory (oldest evicted first) */
  maxCached?: number;
  /** Query runner override, mainly for tests */
  fetch?: (query: string) => Promise<unknown>;
}

export class RoadNetworkService implements RoadNetworkProvider {
  private graphs = new Map<string, Promise<RoadGraph>>();

  constructor(private readonly options: RoadNetworkServiceOptions = {}) {}

  get cachedCount(): number {
    return this.graphs.size;
  }

  /**
   * Road graph for a bbox; concurrent and repeated calls share one download.
   *
   * @throws ExternalProviderError
   */
  async load(bbox: BoundingBox): Promise<RoadGraph> {
    const key = [bbox.minLat, bbox.minLng, bbox.maxLat, bbox.maxLng]
      .map((v) => v.toFixed(4))
      .join(",");
    const known = this.graphs.get(key);
    if (known) {
      console.log(`[road-network] Cache HIT ${formatBbox(bbox)}`);
      return known;
    }

    const pending = this.build(bbox);
    this.graphs.set(key, pending);
    this.evict();

    try {
      return await pending;
    } catch (err) {
      this.graphs.delete(key);
      throw err;
    }
  }

  clear(): number {
    const count = this.graphs.size;
    this.graphs.clear();
    return count;
  }

  private async build(bbox: BoundingBox): Promise<RoadGraph> {
    const start = Date.now();
    const fetchBbox = expandBbox(bbox, this.options.bufferKm ?? DEFAULT_BUFFER_KM);
    const query = buildRoadNetworkQuery(fetchBbox, this.options.timeoutSeconds);

    let data: unknown;
    try {
      data = this.options.fetch
        ? await this.options.fetch(query)
        : await fetchOverpassWithRetry(query, this.options);
    } catch (err) {
      throw new ExternalProviderError(
        `Road network download failed: ${err instanceof Error ? err.message : String(err)}`,
        { cause: err },
      );
    }

    let graph: RoadGraph;
    try {
      graph = buildRoadGraph(parseRoadNetworkResponse(data));
    } catch (err) {
      throw new ExternalProviderError(
        `Road network response unusable: ${err instanceof Error ? err.message : String(err)}`,
        { cause: err },
      );
    }

    const { nodeCount, edgeCount } = graph.stats;
    console.log(
      `[road-network] ${formatBbox(fetchBbox)}: ${nodeCount.toLocaleString()} nodes, ` +
        `${edgeCount.toLocaleString()} edges in ${Date.now() - start}ms`,
    );
    return graph;
  }

  private evict(): void {
    const max = this.options.maxCached ?? DEFAULT_MAX_CACHED;
    while (this.graphs.size > max) {
      const oldest = this.graphs.keys().next();
      if (oldest.done) break;
      this.graphs.delete(oldest.value);
    }
  }
}
