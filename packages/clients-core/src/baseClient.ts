import axios, { type AxiosRequestConfig } from "axios";
import type { FieldIssue } from "./types.js";

export interface ClientConfig {
  /** Base URL for the API server (e.g., "http://localhost:3000") */
  baseUrl: string;
  /** Request timeout in milliseconds (default: 300000, the server's pipeline limit) */
  timeout?: number;
}

export interface RequestParams {
  path?: string;
  body?: unknown;
  query?: Record<string, unknown>;
}

/** Non-2xx response, or no response at all (status 0) */
export class ApiError extends Error {
  constructor(
    message: string,
    readonly status: number,
    readonly details: FieldIssue[] = [],
  ) {
    super(message);
    this.name = "ApiError";
  }
}

function isFieldIssue(value: unknown): value is FieldIssue {
  return (
    typeof value === "object" &&
    value !== null &&
    "path" in value &&
    "message" in value &&
    typeof value.path === "string" &&
    typeof value.message === "string"
  );
}

function toApiError(err: unknown): unknown {
  if (!axios.isAxiosError(err)) return err;
  const response = err.response;
  if (!response) return new ApiError(err.message, 0);

  const body: unknown = response.data;
  let message = err.message;
  let details: FieldIssue[] = [];
  if (typeof body === "object" && body !== null) {
    if ("message" in body && typeof body.message === "string") message = body.message;
    if ("details" in body && Array.isArray(body.details)) {
      details = body.details.filter(isFieldIssue);
    }
  }
  return new ApiError(message, response.status, details);
}

export class BaseClient {
  protected baseUrl: string;
  protected resource: string;
  protected timeout: number;

  constructor(resource: string, config: ClientConfig) {
    this.resource = "/" + resource;
    this.baseUrl = config.baseUrl;
    this.timeout = config.timeout ?? 300_000;
  }

  protected buildPath(params: RequestParams): string {
    return params.path ? this.resource + "/" + encodeURIComponent(params.path) : this.resource;
  }

  protected buildConfig(params: RequestParams): AxiosRequestConfig {
    const config: AxiosRequestConfig = {
      baseURL: this.baseUrl,
      timeout: this.timeout,
      headers: {
        "Content-Type": "application/json",
        Accept: "application/json",
      },
    };

    if (params.query) {
      config.params = params.query;
    }

    return config;
  }

  /** @throws ApiError */
  public async get<T>(params: RequestParams = {}): Promise<T> {
    try {
      const response = await axios.get<T>(this.buildPath(params), this.buildConfig(params));
      return response.data;
    } catch (err) {
      throw toApiError(err);
    }
  }

  /** @throws ApiError */
  public async post<T>(params: RequestParams = {}): Promise<T> {
    try {
      const response = await axios.post<T>(
        this.buildPath(params),
        params.body ?? {},
        this.buildConfig(params),
      );
      return response.data;
    } catch (err) {
      throw toApiError(err);
    }
  }

  /** @throws ApiError */
  public async delete<T>(params: RequestParams = {}): Promise<T> {
    try {
      const response = await axios.delete<T>(this.buildPath(params), this.buildConfig(params));
      return response.data;
    } catch (err) {
      throw toApiError(err);
    }
  }
}
