import { openAsBlob } from "node:fs";
import { z } from "zod";
import type {
  AlbumSummary,
  AssetPatch,
  AssetRecord,
  AssetServiceClient,
  UploadInput,
  UploadResult,
} from "../types/interfaces";
import { PermanentRemoteError, TransientRemoteError, errorMessage } from "../types/errors";
import { DEFAULT_RETRY_POLICY, withRetry, type RetryPolicy } from "../core/retry";

const assetSchema = z.object({
  id: z.string(),
  checksum: z.string(),
  originalFileName: z.string(),
  fileCreatedAt: z.string(),
  localDateTime: z.string().optional(),
  type: z.string(),
  isFavorite: z.boolean().optional(),
  isTrashed: z.boolean().optional(),
  deviceId: z.string().optional(),
  deviceAssetId: z.string().optional(),
  exifInfo: z
    .object({
      make: z.string().nullish(),
      model: z.string().nullish(),
      fileSizeInByte: z.number().nullish(),
    })
    .nullish(),
  stack: z.object({ id: z.string(), primaryAssetId: z.string() }).nullish(),
});

const searchResponseSchema = z.object({
  assets: z.object({
    items: z.array(assetSchema),
    nextPage: z.union([z.string(), z.number()]).nullish(),
  }),
});

const albumListSchema = z.array(z.object({ id: z.string(), albumName: z.string() }));

const albumDetailSchema = z.object({
  assets: z.array(z.object({ id: z.string() })).default([]),
});

const uploadResponseSchema = z.object({
  id: z.string(),
  status: z.string(),
});

const bulkIdResponseSchema = z.array(
  z.object({ id: z.string(), success: z.boolean(), error: z.string().optional() })
);

const stackResponseSchema = z.object({ id: z.string() });

export type ImmichClientOptions = {
  deviceId: string;
  requestTimeoutMs: number;
  // floor for uploads, which also get a second per MiB
  uploadTimeoutMs?: number;
  retry?: RetryPolicy;
};

export const DEFAULT_UPLOAD_TIMEOUT_MS = 300_000;

const BYTES_PER_MIB = 1024 * 1024;

export class ImmichApiClient implements AssetServiceClient {
  private baseUrl: string;
  private apiKey: string;
  private deviceId: string;
  private requestTimeoutMs: number;
  private uploadTimeoutMs: number;
  private retry: RetryPolicy;

  constructor(serverUrl: string, apiKey: string, options: ImmichClientOptions) {
    this.baseUrl = serverUrl.replace(/\/+$/, "").replace(/\/api$/, "");
    this.apiKey = apiKey;
    this.deviceId = options.deviceId;
    this.requestTimeoutMs = options.requestTimeoutMs;
    this.uploadTimeoutMs = options.uploadTimeoutMs ?? DEFAULT_UPLOAD_TIMEOUT_MS;
    this.retry = options.retry ?? DEFAULT_RETRY_POLICY;
  }

  async ping(): Promise<void> {
    await this.request("ping", "/api/server/ping", () => ({ method: "GET" }));
  }

  async searchAssets(
    page: number,
    size: number
  ): Promise<{ items: AssetRecord[]; nextPage: number | null }> {
    const response = await this.request("searchAssets", "/api/search/metadata", () => ({
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({ page, size, withExif: true, withStacked: true }),
    }));
    const data = searchResponseSchema.parse(await response.json());
    const next = data.assets.nextPage;
    const nextPage = next === null || next === undefined || next === "" ? null : Number(next);
    return {
      items: data.assets.items,
      nextPage: nextPage !== null && Number.isFinite(nextPage) ? nextPage : null,
    };
  }

  async listAlbums(): Promise<AlbumSummary[]> {
    const response = await this.request("listAlbums", "/api/albums", () => ({ method: "GET" }));
    return albumListSchema.parse(await response.json());
  }

  async getAlbumAssetIds(albumId: string): Promise<string[]> {
    const response = await this.request(
      `getAlbum ${albumId}`,
      `/api/albums/${encodeURIComponent(albumId)}`,
      () => ({ method: "GET" })
    );
    const data = albumDetailSchema.parse(await response.json());
    return data.assets.map((asset) => asset.id);
  }

  async uploadAsset(input: UploadInput): Promise<UploadResult> {
    const timeoutMs = Math.max(this.uploadTimeoutMs, Math.ceil(input.size / BYTES_PER_MIB) * 1000);
    const response = await this.request(
      `upload ${input.fileName}`,
      "/api/assets",
      async () => {
        // A body stream can only be sent once, so each attempt builds its own form.
        const form = new FormData();
        form.set("deviceAssetId", input.deviceAssetId);
        form.set("deviceId", this.deviceId);
        form.set("fileCreatedAt", input.fileCreatedAt);
        form.set("fileModifiedAt", input.fileModifiedAt);
        form.set("assetData", await openAsBlob(input.path), input.fileName);
        if (input.sidecarPath) {
          form.set("sidecarData", await openAsBlob(input.sidecarPath), `${input.fileName}.xmp`);
        }
        return { method: "POST", body: form };
      },
      timeoutMs
    );
    const data = uploadResponseSchema.parse(await response.json());
    return { id: data.id, duplicate: data.status === "duplicate" };
  }

  async deleteAssets(ids: string[]): Promise<void> {
    if (ids.length === 0) {
      return;
    }
    await this.request(`delete ${ids.join(",")}`, "/api/assets", () => ({
      method: "DELETE",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({ ids, force: false }),
    }));
  }

  async addAssetsToAlbum(albumId: string, assetIds: string[]): Promise<void> {
    if (assetIds.length === 0) {
      return;
    }
    const response = await this.request(
      `addToAlbum ${albumId}`,
      `/api/albums/${encodeURIComponent(albumId)}/assets`,
      () => ({
        method: "PUT",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({ ids: assetIds }),
      })
    );
    const results = bulkIdResponseSchema.parse(await response.json());
    const failed = results.filter((entry) => !entry.success && entry.error !== "duplicate");
    if (failed.length > 0) {
      const details = failed.map((entry) => `${entry.id}: ${entry.error ?? "unknown"}`).join(", ");
      throw new PermanentRemoteError(`Album ${albumId} rejected assets (${details})`, 400);
    }
  }

  async updateAsset(id: string, patch: AssetPatch): Promise<void> {
    await this.request(`updateAsset ${id}`, `/api/assets/${encodeURIComponent(id)}`, () => ({
      method: "PUT",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(patch),
    }));
  }

  async createStack(assetIds: string[]): Promise<string> {
    const response = await this.request("createStack", "/api/stacks", () => ({
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({ assetIds }),
    }));
    return stackResponseSchema.parse(await response.json()).id;
  }

  private async request(
    label: string,
    path: string,
    buildInit: () => RequestInit | Promise<RequestInit>,
    timeoutMs: number = this.requestTimeoutMs
  ): Promise<Response> {
    return withRetry(
      label,
      async () => {
        const init = await buildInit();
        const controller = new AbortController();
        const timer = setTimeout(() => controller.abort(), timeoutMs);
        let response: Response;
        try {
          response = await fetch(`${this.baseUrl}${path}`, {
            ...init,
            signal: controller.signal,
            headers: {
              "x-api-key": this.apiKey,
              Accept: "application/json",
              ...(init.headers ?? {}),
            },
          });
        } catch (error) {
          if (controller.signal.aborted) {
            throw new TransientRemoteError(
              `Immich API timeout after ${timeoutMs}ms (${label})`
            );
          }
          throw new TransientRemoteError(`Immich API unreachable (${label}): ${errorMessage(error)}`);
        } finally {
          clearTimeout(timer);
        }

        if (response.ok) {
          return response;
        }

        const text = await response.text();
        if (this.isTransientStatus(response.status)) {
          throw new TransientRemoteError(
            `Immich API error ${response.status} (${label}): ${text}`,
            response.status,
            this.getRetryAfterMs(response)
          );
        }
        throw new PermanentRemoteError(
          `Immich API error ${response.status} (${label}): ${text}`,
          response.status
        );
      },
      this.retry
    );
  }

  private isTransientStatus(status: number): boolean {
    return status === 408 || status === 429 || status >= 500;
  }

  private getRetryAfterMs(response: Response): number | undefined {
    const retryAfter = response.headers.get("retry-after");
    if (!retryAfter) {
      return undefined;
    }
    const seconds = Number(retryAfter);
    return Number.isFinite(seconds) ? Math.max(seconds, 0) * 1000 : undefined;
  }
}
