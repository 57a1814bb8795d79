import { randomUUID } from "node:crypto";
import type {
  OpStatus,
  ReviewRecord,
  SyncConfig,
  SyncLogEntry,
  SyncProgress,
  SyncSummary,
} from "../types/sync-types";
import type {
  AssetServiceClient,
  LocalIndexer,
  Matcher,
  RemoteIndexer,
  ReportWriter,
  StackPlanner,
  StateStore,
  SyncEngine,
  SyncPlanner,
} from "../types/interfaces";
import { errorMessage } from "../types/errors";
import { DefaultReconciliationExecutor } from "./reconciliation-executor";
import { formatCatalogErrorLine, formatOutcomeLine, type ReportContext } from "../storage/report-writer";

export type SyncEngineParts = {
  client: AssetServiceClient;
  localIndexer: LocalIndexer;
  remoteIndexer: RemoteIndexer;
  matcher: Matcher;
  stackPlanner: StackPlanner;
  planner: SyncPlanner;
  stateStore: StateStore;
  reportWriter: ReportWriter;
  now?: () => Date;
};

type Logger = (level: SyncLogEntry["level"], message: string) => Promise<void>;

export class DefaultSyncEngine implements SyncEngine {
  private client: AssetServiceClient;
  private localIndexer: LocalIndexer;
  private remoteIndexer: RemoteIndexer;
  private matcher: Matcher;
  private stackPlanner: StackPlanner;
  private planner: SyncPlanner;
  private stateStore: StateStore;
  private reportWriter: ReportWriter;
  private now: () => Date;

  constructor(parts: SyncEngineParts) {
    this.client = parts.client;
    this.localIndexer = parts.localIndexer;
    this.remoteIndexer = parts.remoteIndexer;
    this.matcher = parts.matcher;
    this.stackPlanner = parts.stackPlanner;
    this.planner = parts.planner;
    this.stateStore = parts.stateStore;
    this.reportWriter = parts.reportWriter;
    this.now = parts.now ?? (() => new Date());
  }

  async sync(config: SyncConfig): Promise<SyncSummary> {
    const runId = randomUUID();
    const log = this.createLogger(config);
    await log("info", `Sync ${runId} started${config.dryRun ? " (dry run)" : ""}.`);

    try {
      this.reportProgress(config, { stage: "scanning", message: "Scanning export tree and remote library..." });
      const [catalog, remote, records] = await Promise.all([
        this.localIndexer.scan(config.exportRoot, {
          ignorePatterns: config.ignorePatterns,
          concurrency: config.concurrency,
          maxFileSizeMB: config.maxFileSizeMB,
        }),
        this.remoteIndexer.fetchIndex({ scopeAlbum: config.exportAlbum, concurrency: config.concurrency }),
        this.stateStore.loadRecords(),
      ]);

      const remoteCount = Object.keys(remote.assets).length;
      await log(
        "info",
        `Scan results: ${catalog.assets.length} local assets, ${catalog.errors.length} catalog errors, ` +
          `${remoteCount} remote assets, ${Object.keys(records).length} ledger entries.`
      );
      for (const error of catalog.errors) {
        await log("warn", `Catalog error: ${error.path}: ${error.message}`);
      }
      if (config.exportAlbum && !remote.scopeAlbumId) {
        await log("warn", `Album "${config.exportAlbum}" not found; new uploads will not be added to it.`);
      }

      this.reportProgress(config, { stage: "matching", message: "Matching local assets to remote assets..." });
      const { matches, residual } = this.matcher.match(catalog.assets, remote);

      this.reportProgress(config, { stage: "planning", message: "Planning operations..." });
      const groups = this.stackPlanner.group(matches);
      const plan = this.planner.plan(groups, remote, records);

      const byType = plan.ops.reduce<Record<string, number>>((acc, op) => {
        acc[op.type] = (acc[op.type] ?? 0) + 1;
        return acc;
      }, {});
      for (const warning of plan.warnings ?? []) {
        await log("warn", warning);
      }
      await log("info", `Planned ${plan.ops.length} ops in ${groups.length} groups.`);
      for (const [type, count] of Object.entries(byType)) {
        await log("info", `  ${type}: ${count}`);
      }

      this.reportProgress(config, {
        stage: "executing",
        message: `Executing ${plan.ops.length} operations...`,
        total: plan.ops.length,
      });
      const executor = new DefaultReconciliationExecutor(this.client, this.stateStore, log, this.now);
      const result = await executor.execute(plan, {
        dryRun: config.dryRun,
        concurrency: config.concurrency,
        scopeAlbumId: remote.scopeAlbumId,
        signal: config.signal,
        onOpFinished: (finished, total) =>
          this.reportProgress(config, {
            stage: "executing",
            message: `Executed ${finished} of ${total} operations`,
            current: finished,
            total,
          }),
      });

      this.reportProgress(config, { stage: "reporting", message: "Writing report..." });
      const timestamp = this.now().toISOString();
      const context: ReportContext = { runId, dryRun: config.dryRun, timestamp };
      await this.reportWriter.append([
        ...catalog.errors.map((error) => formatCatalogErrorLine(context, error)),
        ...result.outcomes.map((outcome) => formatOutcomeLine(context, outcome)),
      ]);

      const reviews: ReviewRecord[] = result.outcomes.flatMap((outcome) =>
        outcome.op.type === "review"
          ? [
              {
                path: outcome.op.asset.relativePath,
                reason: outcome.op.reason,
                candidateIds: outcome.op.candidateIds,
                message: outcome.op.message,
                timestamp,
              },
            ]
          : []
      );
      if (!config.dryRun) {
        await this.stateStore.saveReviews(reviews);
      }

      const counts: Record<OpStatus, number> = { done: 0, failed: 0, skipped: 0, review: 0, cancelled: 0 };
      for (const outcome of result.outcomes) {
        counts[outcome.status] += 1;
      }

      await log(
        counts.failed > 0 ? "warn" : "info",
        `Sync ${result.cancelled ? "cancelled" : "completed"}: ${counts.done} done, ${counts.skipped} skipped, ` +
          `${counts.review} for review, ${counts.failed} failed, ${counts.cancelled} cancelled.`
      );

      return {
        runId,
        dryRun: config.dryRun,
        localCount: catalog.assets.length,
        remoteCount,
        residualCount: residual.length,
        catalogErrors: catalog.errors.length,
        counts,
        outcomes: result.outcomes,
        cancelled: result.cancelled,
      };
    } catch (error) {
      await log("error", `Sync failed: ${errorMessage(error)}`);
      throw error;
    }
  }

  // Dry runs echo their log but keep the state file untouched.
  private createLogger(config: SyncConfig): Logger {
    return async (level, message) => {
      const entry: SyncLogEntry = { timestamp: this.now().toISOString(), level, message };
      config.onLog?.(entry);
      if (!config.dryRun) {
        await this.stateStore.appendLog(entry);
      }
    };
  }

  private reportProgress(config: SyncConfig, progress: SyncProgress): void {
    if (config.onProgress) {
      if (progress.current !== undefined && progress.total !== undefined && progress.total > 0) {
        progress.percentage = Math.round((progress.current / progress.total) * 100);
      }
      config.onProgress(progress);
    }
  }
}
