import type {
  ExecutionResult,
  LocalAsset,
  OpOutcome,
  RunRecord,
  SyncOp,
  SyncPlan,
} from "../types/sync-types";
import type {
  AssetServiceClient,
  ExecuteOptions,
  ReconciliationExecutor,
  StateStore,
  UploadInput,
} from "../types/interfaces";
import { MetadataCarryOverFailed, RemoteOperationFailed, errorMessage } from "../types/errors";
import { assetIdentity, isInPlaceReplace, opIdentity } from "./sync-planner";
import { runParallel } from "./run-parallel";

export type ExecutorLog = (level: "info" | "warn" | "error", message: string) => Promise<void>;

type RunContext = ExecuteOptions & {
  // local asset identity -> remote id it resolves to in this run
  resolved: Map<string, string>;
  finished: number;
  total: number;
};

type Progress = {
  remoteId?: string;
  replacedRemoteId?: string;
  memberRemoteIds?: string[];
  detail?: string;
};

const IN_PLACE_DETAIL = "capture time corrected in place";

const pad = (value: number): string => String(value).padStart(2, "0");

export function formatOffset(offsetMinutes: number): string {
  const sign = offsetMinutes < 0 ? "-" : "+";
  const abs = Math.abs(offsetMinutes);
  return `${sign}${pad(Math.floor(abs / 60))}:${pad(abs % 60)}`;
}

/** Capture time as written in the sidecar: local wall clock plus its offset. */
export function captureTimeWithOffset(asset: LocalAsset): string {
  return `${new Date(asset.wallClock).toISOString().slice(0, 23)}${formatOffset(asset.offsetMinutes)}`;
}

const describe = (op: SyncOp): string => {
  switch (op.type) {
    case "stack":
      return `stack ${op.groupKey} (${op.members.length} members)`;
    case "replace":
      return `replace ${op.asset.relativePath} -> ${op.target.id}`;
    default:
      return `${op.type} ${op.asset.relativePath}`;
  }
};

export class DefaultReconciliationExecutor implements ReconciliationExecutor {
  private client: AssetServiceClient;
  private stateStore: StateStore;
  private log: ExecutorLog;
  private now: () => Date;

  constructor(client: AssetServiceClient, stateStore: StateStore, log: ExecutorLog, now: () => Date = () => new Date()) {
    this.client = client;
    this.stateStore = stateStore;
    this.log = log;
    this.now = now;
  }

  async execute(plan: SyncPlan, options: ExecuteOptions): Promise<ExecutionResult> {
    const groups = new Map<string, SyncOp[]>();
    for (const op of plan.ops) {
      const ops = groups.get(op.groupKey) ?? [];
      ops.push(op);
      groups.set(op.groupKey, ops);
    }

    const context: RunContext = { ...options, resolved: new Map(), finished: 0, total: plan.ops.length };
    const isRunning = (): boolean => !options.signal?.aborted;
    const groupOps = [...groups.values()];

    // Groups run side by side; ops inside a group run in plan order.
    const results = await runParallel(
      groupOps.map((ops) => () => this.runGroup(ops, context)),
      options.concurrency,
      isRunning
    );

    const outcomes = groupOps.flatMap(
      (ops, index) => results[index] ?? ops.map((op) => this.cancelled(op))
    );
    return { outcomes, cancelled: options.signal?.aborted ?? false };
  }

  private async runGroup(ops: SyncOp[], context: RunContext): Promise<OpOutcome[]> {
    const outcomes: OpOutcome[] = [];
    for (const op of ops) {
      if (context.signal?.aborted) {
        outcomes.push(this.cancelled(op));
        continue;
      }
      outcomes.push(await this.runOp(op, context));
      context.finished += 1;
      context.onOpFinished?.(context.finished, context.total);
    }
    return outcomes;
  }

  private async runOp(op: SyncOp, context: RunContext): Promise<OpOutcome> {
    const identity = opIdentity(op);
    const base = { op, identity, simulated: context.dryRun, alreadyDone: false };

    if (op.type === "skip") {
      context.resolved.set(identity, op.remote.id);
      await this.record(context, { key: identity, status: "skipped", op: op.type, remoteId: op.remote.id });
      return { ...base, status: "skipped", remoteId: op.remote.id, detail: op.reason };
    }

    if (op.type === "review") {
      await this.log("warn", `Manual review: ${op.asset.relativePath}: ${op.message}`);
      await this.record(context, { key: identity, status: "skipped", op: op.type, error: op.message });
      return { ...base, status: "review", detail: `${op.reason}: ${op.message}` };
    }

    const progress: Progress = {};
    try {
      const memberIds = op.type === "stack" ? this.resolveStackMembers(op, context) : undefined;
      const existing = await this.stateStore.getRecord(identity);
      if (existing?.status === "done" && this.coversSameWork(existing, memberIds)) {
        if (existing.remoteId && op.type !== "stack") {
          context.resolved.set(identity, existing.remoteId);
        }
        return { ...base, status: "skipped", alreadyDone: true, remoteId: existing.remoteId, detail: "already-done" };
      }

      if (op.type === "stack") {
        await this.applyStack(op, memberIds ?? [], context, progress);
      } else if (op.type === "upload") {
        await this.applyUpload(op.asset, context, progress);
      } else {
        await this.applyReplace(op, context, progress);
      }

      if (op.type !== "stack" && progress.remoteId) {
        context.resolved.set(identity, progress.remoteId);
      }
      await this.record(context, {
        key: identity,
        status: "done",
        op: op.type,
        remoteId: progress.remoteId,
        replacedRemoteId: progress.replacedRemoteId,
        memberRemoteIds: progress.memberRemoteIds,
      });
      await this.log("info", `${context.dryRun ? "[dry-run] would" : "Op ok:"} ${describe(op)}`);
      return { ...base, status: "done", remoteId: progress.remoteId, detail: progress.detail };
    } catch (error) {
      const message = errorMessage(error);
      await this.record(context, {
        key: identity,
        status: "failed",
        op: op.type,
        remoteId: progress.remoteId,
        replacedRemoteId: progress.replacedRemoteId,
        error: message,
      });
      await this.log("error", `Op failed: ${describe(op)}: ${message}`);
      return { ...base, status: "failed", remoteId: progress.remoteId, detail: `${this.errorKind(error)}: ${message}` };
    }
  }

  private async applyUpload(asset: LocalAsset, context: RunContext, progress: Progress): Promise<void> {
    if (context.dryRun) {
      await this.log("info", `[dry-run] upload ${asset.relativePath}`);
      progress.remoteId = `dry-run:${assetIdentity(asset)}`;
      if (context.scopeAlbumId) {
        await this.log("info", `[dry-run] add ${asset.relativePath} to album ${context.scopeAlbumId}`);
      }
      return;
    }

    const result = await this.client.uploadAsset(this.uploadInput(asset));
    progress.remoteId = result.id;
    if (result.duplicate) {
      progress.detail = `duplicate of ${result.id}`;
    }
    if (context.scopeAlbumId) {
      await this.client.addAssetsToAlbum(context.scopeAlbumId, [result.id]);
    }
  }

  private async applyReplace(
    op: Extract<SyncOp, { type: "replace" }>,
    context: RunContext,
    progress: Progress
  ): Promise<void> {
    const { asset, target, snapshot } = op;
    progress.replacedRemoteId = target.id;

    if (context.dryRun) {
      if (isInPlaceReplace(op)) {
        await this.log(
          "info",
          `[dry-run] upload ${asset.relativePath} (same bytes as ${target.id}), ` +
            `set capture time ${captureTimeWithOffset(asset)}`
        );
        progress.remoteId = target.id;
        progress.replacedRemoteId = undefined;
        progress.detail = IN_PLACE_DETAIL;
        return;
      }
      await this.log(
        "info",
        `[dry-run] ${op.reuseRemoteId ? `reuse ${op.reuseRemoteId} for` : "upload"} ${asset.relativePath}, ` +
          `carry ${snapshot.albumIds.length} album(s)${snapshot.isFavorite ? " and favorite" : ""}, delete ${target.id}`
      );
      progress.remoteId = op.reuseRemoteId ?? `dry-run:${assetIdentity(asset)}`;
      progress.detail = `replaced ${target.id}`;
      return;
    }

    const newId = op.reuseRemoteId ?? (await this.client.uploadAsset(this.uploadInput(asset))).id;
    progress.remoteId = newId;

    if (newId === target.id) {
      // The service keeps one copy per checksum: the bytes already live under the old asset,
      // so only its capture time needs correcting and nothing is deleted.
      await this.client.updateAsset(target.id, { dateTimeOriginal: captureTimeWithOffset(asset) });
      progress.replacedRemoteId = undefined;
      progress.detail = IN_PLACE_DETAIL;
      return;
    }

    try {
      for (const albumId of snapshot.albumIds) {
        await this.client.addAssetsToAlbum(albumId, [newId]);
      }
      if (snapshot.isFavorite) {
        await this.client.updateAsset(newId, { isFavorite: true });
      }
    } catch (error) {
      throw new MetadataCarryOverFailed(
        `Could not carry albums/favorite from ${target.id} to ${newId}; kept ${target.id}: ${errorMessage(error)}`,
        newId,
        target.id,
        { cause: error }
      );
    }

    // Last and only destructive step.
    await this.client.deleteAssets([target.id]);
    progress.detail = `replaced ${target.id}`;
  }

  private async applyStack(
    op: Extract<SyncOp, { type: "stack" }>,
    memberIds: string[],
    context: RunContext,
    progress: Progress
  ): Promise<void> {
    progress.memberRemoteIds = memberIds;
    if (context.dryRun) {
      await this.log("info", `[dry-run] stack ${memberIds.join(", ")} (primary ${memberIds[0]})`);
      progress.remoteId = `dry-run:stack:${op.groupKey}`;
      progress.detail = `primary ${memberIds[0]}`;
      return;
    }

    progress.remoteId = await this.client.createStack(memberIds);
    progress.detail = `primary ${memberIds[0]}`;
  }

  private resolveStackMembers(op: Extract<SyncOp, { type: "stack" }>, context: RunContext): string[] {
    const ordered = [op.primary, ...op.members.filter((member) => member !== op.primary)];
    const missing: string[] = [];
    const ids: string[] = [];
    for (const member of ordered) {
      const id = context.resolved.get(assetIdentity(member));
      if (id) {
        ids.push(id);
      } else {
        missing.push(member.relativePath);
      }
    }

    if (missing.length > 0) {
      throw new RemoteOperationFailed(`Stack members not available remotely: ${missing.join(", ")}`, 0);
    }
    return [...new Set(ids)];
  }

  private coversSameWork(record: RunRecord, memberIds: string[] | undefined): boolean {
    if (!memberIds) {
      return true;
    }
    const recorded = record.memberRemoteIds ?? [];
    return recorded.length === memberIds.length && recorded.every((id, index) => id === memberIds[index]);
  }

  private uploadInput(asset: LocalAsset): UploadInput {
    const capturedAt = new Date(asset.capturedAt).toISOString();
    return {
      path: asset.path,
      sidecarPath: asset.sidecarPath,
      fileName: asset.fileName,
      size: asset.size,
      deviceAssetId: `${asset.fileName}-${asset.size}`,
      fileCreatedAt: capturedAt,
      fileModifiedAt: capturedAt,
    };
  }

  private async record(context: RunContext, record: Omit<RunRecord, "updatedAt">): Promise<void> {
    if (context.dryRun) {
      return;
    }
    await this.stateStore.saveRecord({ ...record, updatedAt: this.now().toISOString() });
  }

  private cancelled(op: SyncOp): OpOutcome {
    return {
      op,
      identity: opIdentity(op),
      status: "cancelled",
      simulated: false,
      alreadyDone: false,
      detail: "run cancelled before this operation started",
    };
  }

  private errorKind(error: unknown): string {
    return error instanceof Error ? error.name : "Error";
  }
}
