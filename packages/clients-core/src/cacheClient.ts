import { BaseClient, type ClientConfig } from "./baseClient.js";
import type { CacheClearResponse, CacheListResponse } from "./types.js";

export class CacheClient {
  private client: BaseClient;

  constructor(config: ClientConfig) {
    this.client = new BaseClient("api/cache", config);
  }

  /** List cached facility downloads */
  public async listCache(): Promise<CacheListResponse> {
    return this.client.get<CacheListResponse>();
  }

  /** Clear every cached facility download */
  public async clearAllCache(): Promise<CacheClearResponse> {
    return this.client.delete<CacheClearResponse>();
  }

  /**
   * Clear one entry by ID.
   *
   * @throws ApiError with status 404 when the entry does not exist
   */
  public async clearCacheEntry(id: string): Promise<CacheClearResponse> {
    return this.client.delete<CacheClearResponse>({ path: id });
  }
}
