import type {
  AssetMatch,
  ExecutionResult,
  LocalAsset,
  LocalCatalog,
  MatchResult,
  RemoteIndex,
  ReviewRecord,
  RunRecord,
  StackGroup,
  SyncConfig,
  SyncLogEntry,
  SyncPlan,
  SyncSummary,
} from "./sync-types";

export type ScanOptions = {
  ignorePatterns: string[];
  concurrency: number;
  maxFileSizeMB?: number;
};

export interface LocalIndexer {
  scan(exportRoot: string, options: ScanOptions): Promise<LocalCatalog>;
  computeChecksum(path: string): Promise<string>;
}

export interface RemoteIndexer {
  fetchIndex(options: { scopeAlbum?: string; concurrency: number }): Promise<RemoteIndex>;
}

export interface Matcher {
  match(assets: LocalAsset[], remote: RemoteIndex): MatchResult;
}

export interface StackPlanner {
  group(matches: AssetMatch[]): StackGroup[];
}

export interface SyncPlanner {
  plan(groups: StackGroup[], remote: RemoteIndex, records: Record<string, RunRecord>): SyncPlan;
}

export type ExecuteOptions = {
  dryRun: boolean;
  concurrency: number;
  scopeAlbumId?: string;
  signal?: AbortSignal;
  onOpFinished?: (finished: number, total: number) => void;
};

export interface ReconciliationExecutor {
  execute(plan: SyncPlan, options: ExecuteOptions): Promise<ExecutionResult>;
}

export interface StateStore {
  loadRecords(): Promise<Record<string, RunRecord>>;
  getRecord(key: string): Promise<RunRecord | null>;
  saveRecord(record: RunRecord): Promise<void>;
  saveReviews(records: ReviewRecord[]): Promise<void>;
  loadReviews(): Promise<ReviewRecord[]>;
  appendLog(entry: SyncLogEntry): Promise<void>;
  loadLogs(): Promise<SyncLogEntry[]>;
}

export interface ReportWriter {
  append(lines: string[]): Promise<void>;
}

/** Asset as returned by the remote service's search endpoint. */
export type AssetRecord = {
  id: string;
  checksum: string;
  originalFileName: string;
  fileCreatedAt: string;
  localDateTime?: string;
  type: string;
  isFavorite?: boolean;
  isTrashed?: boolean;
  deviceId?: string;
  deviceAssetId?: string;
  exifInfo?: {
    make?: string | null;
    model?: string | null;
    fileSizeInByte?: number | null;
  } | null;
  stack?: { id: string; primaryAssetId: string } | null;
};

export type AlbumSummary = {
  id: string;
  albumName: string;
};

export type UploadInput = {
  path: string;
  sidecarPath?: string;
  fileName: string;
  size: number;
  deviceAssetId: string;
  fileCreatedAt: string;
  fileModifiedAt: string;
};

export type UploadResult = {
  id: string;
  duplicate: boolean;
};

export type AssetPatch = {
  isFavorite?: boolean;
  dateTimeOriginal?: string;
};

export interface AssetServiceClient {
  ping(): Promise<void>;
  searchAssets(page: number, size: number): Promise<{ items: AssetRecord[]; nextPage: number | null }>;
  listAlbums(): Promise<AlbumSummary[]>;
  getAlbumAssetIds(albumId: string): Promise<string[]>;
  uploadAsset(input: UploadInput): Promise<UploadResult>;
  deleteAssets(ids: string[]): Promise<void>;
  addAssetsToAlbum(albumId: string, assetIds: string[]): Promise<void>;
  updateAsset(id: string, patch: AssetPatch): Promise<void>;
  createStack(assetIds: string[]): Promise<string>;
}

export interface SyncEngine {
  sync(config: SyncConfig): Promise<SyncSummary>;
}
