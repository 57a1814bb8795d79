import type { RemoteAsset, RemoteIndex } from "../types/sync-types";
import type { AlbumSummary, AssetRecord, AssetServiceClient, RemoteIndexer } from "../types/interfaces";
import { RemoteIndexError, errorMessage } from "../types/errors";
import { runParallel } from "../core/run-parallel";
import { parseXmpDate } from "./sidecar";
import { ProvenanceClassifier } from "./provenance";
import { mediaTypeForRemote, normalizeStem, splitFileName } from "./variants";

export const timeBucket = (wallClock: number, windowMs: number): number =>
  Math.floor(wallClock / windowMs);

export const nameTimeKey = (stem: string, bucket: number): string => `${stem}|${bucket}`;

export type RemoteIndexerOptions = {
  timeWindowSeconds: number;
  pageSize?: number;
};

export class ImmichRemoteIndexer implements RemoteIndexer {
  private client: AssetServiceClient;
  private classifier: ProvenanceClassifier;
  private timeWindowMs: number;
  private pageSize: number;

  constructor(client: AssetServiceClient, classifier: ProvenanceClassifier, options: RemoteIndexerOptions) {
    this.client = client;
    this.classifier = classifier;
    this.timeWindowMs = Math.max(1, Math.round(options.timeWindowSeconds * 1000));
    this.pageSize = options.pageSize ?? 1000;
  }

  async fetchIndex(options: { scopeAlbum?: string; concurrency: number }): Promise<RemoteIndex> {
    try {
      const records = await this.fetchAllAssets();
      const albums = await this.client.listAlbums();
      const albumIdsByAsset = await this.buildAlbumAssetIndex(albums, options.concurrency);

      const index: RemoteIndex = {
        assets: {},
        byChecksum: {},
        byNameAndTime: {},
        albumNames: Object.fromEntries(albums.map((album) => [album.id, album.albumName])),
        scopeAlbumId: options.scopeAlbum ? this.findAlbumId(albums, options.scopeAlbum) : undefined,
        timeWindowMs: this.timeWindowMs,
      };

      for (const record of records) {
        const asset = this.toRemoteAsset(record, albumIdsByAsset.get(record.id) ?? []);
        if (asset) {
          addToIndex(index, asset);
        }
      }

      return index;
    } catch (error) {
      throw new RemoteIndexError(`Failed to build remote index: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }

  private async fetchAllAssets(): Promise<AssetRecord[]> {
    const records: AssetRecord[] = [];
    let page: number | null = 1;
    while (page !== null) {
      const result = await this.client.searchAssets(page, this.pageSize);
      records.push(...result.items);
      page = result.nextPage !== null && result.nextPage > page ? result.nextPage : null;
    }
    return records;
  }

  private async buildAlbumAssetIndex(
    albums: AlbumSummary[],
    concurrency: number
  ): Promise<Map<string, string[]>> {
    const assetIdsPerAlbum = await runParallel(
      albums.map((album) => () => this.client.getAlbumAssetIds(album.id)),
      concurrency
    );

    const albumIdsByAsset = new Map<string, string[]>();
    albums.forEach((album, position) => {
      for (const assetId of assetIdsPerAlbum[position] ?? []) {
        const list = albumIdsByAsset.get(assetId) ?? [];
        list.push(album.id);
        albumIdsByAsset.set(assetId, list);
      }
    });
    return albumIdsByAsset;
  }

  private findAlbumId(albums: AlbumSummary[], name: string): string | undefined {
    const exact = albums.find((album) => album.albumName === name);
    if (exact) {
      return exact.id;
    }
    const lower = name.toLowerCase();
    return albums.find((album) => album.albumName.toLowerCase() === lower)?.id;
  }

  private toRemoteAsset(record: AssetRecord, albumIds: string[]): RemoteAsset | null {
    if (record.isTrashed) {
      return null;
    }

    const mediaType = mediaTypeForRemote(record.type);
    const capturedAt = Date.parse(record.fileCreatedAt);
    if (!mediaType || !Number.isFinite(capturedAt)) {
      return null;
    }

    // localDateTime is the wall clock at the capture location, serialized as if it were UTC
    const local = record.localDateTime ? parseXmpDate(record.localDateTime) : null;
    const size = record.exifInfo?.fileSizeInByte;

    return {
      id: record.id,
      checksum: record.checksum,
      fileName: record.originalFileName,
      stem: normalizeStem(splitFileName(record.originalFileName).stem),
      capturedAt,
      wallClock: local ? local.wallClock : capturedAt,
      mediaType,
      size: typeof size === "number" ? size : undefined,
      albumIds: [...new Set(albumIds)].sort(),
      isFavorite: record.isFavorite ?? false,
      provenance: this.classifier.classify({
        deviceId: record.deviceId,
        deviceAssetId: record.deviceAssetId,
        make: record.exifInfo?.make,
        model: record.exifInfo?.model,
      }),
      stack: record.stack ? { id: record.stack.id, primaryAssetId: record.stack.primaryAssetId } : null,
      deviceId: record.deviceId ?? "",
      deviceAssetId: record.deviceAssetId ?? "",
    };
  }
}

export function addToIndex(index: RemoteIndex, asset: RemoteAsset): void {
  index.assets[asset.id] = asset;

  const sameChecksum = index.byChecksum[asset.checksum] ?? [];
  sameChecksum.push(asset);
  index.byChecksum[asset.checksum] = sameChecksum;

  const key = nameTimeKey(asset.stem, timeBucket(asset.wallClock, index.timeWindowMs));
  const sameName = index.byNameAndTime[key] ?? [];
  sameName.push(asset);
  index.byNameAndTime[key] = sameName;
}
