import { describe, it, expect, vi, beforeEach } from "vitest";
import { ApiError, BaseClient, type RequestParams } from "./baseClient.js";

vi.mock("axios", async (importOriginal) => {
  const actual = await importOriginal<typeof import("axios")>();
  return {
    ...actual,
    default: { isAxiosError: actual.isAxiosError, get: vi.fn(), post: vi.fn(), delete: vi.fn() },
  };
});

import axios, { AxiosError, AxiosHeaders, type AxiosResponse } from "axios";

// Expose protected methods for testing via a thin subclass
class TestClient extends BaseClient {
  public exposedBuildPath(params: RequestParams) {
    return this.buildPath(params);
  }
  public exposedBuildConfig(params: RequestParams) {
    return this.buildConfig(params);
  }
}

function reply(status: number, data: unknown): AxiosResponse<unknown> {
  return { status, statusText: "", data, headers: {}, config: { headers: new AxiosHeaders() } };
}

function httpError(status: number, data: unknown): AxiosError {
  return new AxiosError(
    `Request failed with status code ${status}`,
    "ERR_BAD_REQUEST",
    undefined,
    undefined,
    reply(status, data),
  );
}

const baseUrl = "http://localhost:3000";

describe("BaseClient", () => {
  describe("buildPath", () => {
    it("returns resource root when no sub-path", () => {
      const client = new TestClient("api/cache", { baseUrl });
      expect(client.exposedBuildPath({})).toBe("/api/cache");
    });

    it("appends an encoded sub-path to resource", () => {
      const client = new TestClient("api/cache", { baseUrl });
      expect(client.exposedBuildPath({ path: "a1b2" })).toBe("/api/cache/a1b2");
      expect(client.exposedBuildPath({ path: "../x" })).toBe("/api/cache/..%2Fx");
    });
  });

  describe("buildConfig", () => {
    it("sets baseURL and default timeout", () => {
      const client = new TestClient("api/network", { baseUrl });
      const config = client.exposedBuildConfig({});
      expect(config.baseURL).toBe(baseUrl);
      expect(config.timeout).toBe(300_000);
    });

    it("uses custom timeout when provided", () => {
      const client = new TestClient("api/network", { baseUrl, timeout: 5000 });
      expect(client.exposedBuildConfig({}).timeout).toBe(5000);
    });

    it("sets JSON content headers", () => {
      const client = new TestClient("api/network", { baseUrl });
      expect(client.exposedBuildConfig({}).headers).toEqual({
        "Content-Type": "application/json",
        Accept: "application/json",
      });
    });

    it("passes query params through", () => {
      const client = new TestClient("api/network", { baseUrl });
      const config = client.exposedBuildConfig({ query: { mode: "rail" } });
      expect(config.params).toEqual({ mode: "rail" });
    });
  });

  describe("requests", () => {
    const get = vi.mocked(axios.get);
    const post = vi.mocked(axios.post);
    const del = vi.mocked(axios.delete);

    beforeEach(() => {
      get.mockReset();
      post.mockReset();
      del.mockReset();
    });

    it("returns the response body", async () => {
      get.mockResolvedValueOnce(reply(200, { status: "ok" }));
      const client = new BaseClient("health", { baseUrl });

      await expect(client.get()).resolves.toEqual({ status: "ok" });
      expect(get).toHaveBeenCalledWith("/health", expect.objectContaining({ baseURL: baseUrl }));
    });

    it("posts an empty object when there is no body", async () => {
      post.mockResolvedValueOnce(reply(200, {}));
      await new BaseClient("api/network", { baseUrl }).post({ path: "analyze" });
      expect(post).toHaveBeenCalledWith("/api/network/analyze", {}, expect.anything());
    });

    it("turns error responses into ApiError with field details", async () => {
      post.mockRejectedValueOnce(
        httpError(422, {
          message: "Validation failed",
          details: [{ path: "refine", message: "Expected boolean, received string" }, 7],
        }),
      );

      const error = await new BaseClient("api/network", { baseUrl })
        .post({ path: "analyze", body: { refine: "yes" } })
        .catch((err: unknown) => err);

      expect(error).toBeInstanceOf(ApiError);
      expect(error).toMatchObject({
        message: "Validation failed",
        status: 422,
        details: [{ path: "refine", message: "Expected boolean, received string" }],
      });
    });

    it("keeps the axios message when the body has none", async () => {
      del.mockRejectedValueOnce(httpError(404, { cleared: 0 }));

      await expect(
        new BaseClient("api/cache", { baseUrl }).delete({ path: "0000000000000000" }),
      ).rejects.toMatchObject({ message: "Request failed with status code 404", status: 404 });
    });

    it("reports a missing response as status 0", async () => {
      get.mockRejectedValueOnce(new AxiosError("connect ECONNREFUSED", "ECONNREFUSED"));

      await expect(new BaseClient("health", { baseUrl }).get()).rejects.toMatchObject({
        name: "ApiError",
        status: 0,
        message: "connect ECONNREFUSED",
      });
    });

    it("rethrows errors that did not come from axios", async () => {
      const boom = new TypeError("boom");
      get.mockRejectedValueOnce(boom);
      await expect(new BaseClient("health", { baseUrl }).get()).rejects.toBe(boom);
    });
  });
});
