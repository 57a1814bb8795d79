import type { CatalogError, MatchAmbiguityError } from "./errors";

export type MediaType = "image" | "video";

export type VariantKind = "original" | "edited" | "derivative";

export type Provenance = "mobile" | "desktop" | "unknown";

export type MatchReason = "exact-checksum" | "name-and-time-proximity" | "none";

export type SyncConfig = {
  exportRoot: string;
  exportAlbum?: string;
  dryRun: boolean;
  ignorePatterns: string[];
  concurrency: number;
  maxFileSizeMB?: number;
  signal?: AbortSignal;
  onProgress?: (progress: SyncProgress) => void;
  onLog?: (entry: SyncLogEntry) => void;
};

export type SyncProgress = {
  stage: "scanning" | "matching" | "planning" | "executing" | "reporting";
  message: string;
  current?: number;
  total?: number;
  percentage?: number;
};

export type LocalAsset = {
  path: string;
  relativePath: string;
  sidecarPath: string;
  fileName: string;
  stem: string;
  checksum: string;
  capturedAt: number;
  offsetMinutes: number;
  wallClock: number;
  variant: VariantKind;
  baseKey: string;
  size: number;
  mediaType: MediaType;
};

export type LocalCatalog = {
  assets: LocalAsset[];
  errors: CatalogError[];
};

export type RemoteStack = {
  id: string;
  primaryAssetId: string;
};

export type RemoteAsset = {
  id: string;
  checksum: string;
  fileName: string;
  stem: string;
  capturedAt: number;
  wallClock: number;
  mediaType: MediaType;
  size?: number;
  albumIds: string[];
  isFavorite: boolean;
  provenance: Provenance;
  stack: RemoteStack | null;
  deviceId: string;
  deviceAssetId: string;
};

export type RemoteIndex = {
  assets: Record<string, RemoteAsset>;
  byChecksum: Record<string, RemoteAsset[]>;
  byNameAndTime: Record<string, RemoteAsset[]>;
  albumNames: Record<string, string>;
  scopeAlbumId?: string;
  timeWindowMs: number;
};

export type AssetMatch = {
  local: LocalAsset;
  remote: RemoteAsset | null;
  reason: MatchReason;
  confidence: number;
  ambiguity?: MatchAmbiguityError;
};

export type MatchResult = {
  matches: AssetMatch[];
  residual: RemoteAsset[];
};

export type StackGroup = {
  key: string;
  members: AssetMatch[];
  primary: AssetMatch;
};

export type MetadataSnapshot = {
  albumIds: string[];
  isFavorite: boolean;
};

export type SkipReason = "already-uploaded";

export type ReviewReason = "ambiguous-match" | "remote-index-empty-safety";

export type SyncOp =
  | { type: "upload"; groupKey: string; asset: LocalAsset }
  | {
      type: "replace";
      groupKey: string;
      asset: LocalAsset;
      target: RemoteAsset;
      snapshot: MetadataSnapshot;
      reason: Exclude<MatchReason, "none">;
      reuseRemoteId?: string;
    }
  | {
      type: "stack";
      groupKey: string;
      primary: LocalAsset;
      members: LocalAsset[];
    }
  | {
      type: "skip";
      groupKey: string;
      asset: LocalAsset;
      remote: RemoteAsset;
      reason: SkipReason;
    }
  | {
      type: "review";
      groupKey: string;
      asset: LocalAsset;
      reason: ReviewReason;
      candidateIds: string[];
      message: string;
    };

export type SyncPlan = {
  ops: SyncOp[];
  warnings?: string[];
};

export type RunStatus = "done" | "failed" | "skipped";

export type RunRecord = {
  key: string;
  status: RunStatus;
  op: SyncOp["type"];
  remoteId?: string;
  replacedRemoteId?: string;
  memberRemoteIds?: string[];
  error?: string;
  updatedAt: string;
};

export type OpStatus = "done" | "failed" | "skipped" | "review" | "cancelled";

export type OpOutcome = {
  op: SyncOp;
  identity: string;
  status: OpStatus;
  simulated: boolean;
  alreadyDone: boolean;
  remoteId?: string;
  detail?: string;
};

export type ExecutionResult = {
  outcomes: OpOutcome[];
  cancelled: boolean;
};

export type SyncSummary = {
  runId: string;
  dryRun: boolean;
  localCount: number;
  remoteCount: number;
  residualCount: number;
  catalogErrors: number;
  counts: Record<OpStatus, number>;
  outcomes: OpOutcome[];
  cancelled: boolean;
};

export type ReviewRecord = {
  path: string;
  reason: ReviewReason;
  candidateIds: string[];
  message: string;
  timestamp: string;
};

export type SyncLogEntry = {
  timestamp: string;
  level: "info" | "warn" | "error";
  message: string;
};
