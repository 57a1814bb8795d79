import type { Command } from "commander";
import { ImmichApiClient } from "../../clients/immich-client";
import { resolveSettings, type Settings } from "../../config/settings";
import { DEFAULT_RETRY_POLICY } from "../../core/retry";
import { DefaultMatcher } from "../../core/matcher";
import { DefaultStackPlanner } from "../../core/stack-planner";
import { DefaultSyncEngine } from "../../core/sync-engine";
import { DefaultSyncPlanner } from "../../core/sync-planner";
import { ExportTreeIndexer } from "../../indexers/local-indexer";
import { ProvenanceClassifier } from "../../indexers/provenance";
import { ImmichRemoteIndexer } from "../../indexers/remote-indexer";
import { FileReportWriter } from "../../storage/report-writer";
import { FileStateStore } from "../../storage/state-store";
import type { SyncLogEntry, SyncSummary } from "../../types/sync-types";
import { c } from "../colors";
import { EXIT_FAILURES, EXIT_OK, handleFatal } from "../helpers";

export function createSyncEngine(settings: Settings): { engine: DefaultSyncEngine; client: ImmichApiClient } {
  const client = new ImmichApiClient(settings.serverUrl, settings.apiKey, {
    deviceId: settings.deviceId,
    requestTimeoutMs: settings.requestTimeoutMs,
    uploadTimeoutMs: settings.uploadTimeoutMs,
    retry: { ...DEFAULT_RETRY_POLICY, maxAttempts: settings.maxAttempts },
  });

  const engine = new DefaultSyncEngine({
    client,
    localIndexer: new ExportTreeIndexer(),
    remoteIndexer: new ImmichRemoteIndexer(client, new ProvenanceClassifier(settings.deviceId), {
      timeWindowSeconds: settings.timeWindowSeconds,
    }),
    matcher: new DefaultMatcher(),
    stackPlanner: new DefaultStackPlanner(),
    planner: new DefaultSyncPlanner(),
    stateStore: new FileStateStore(settings.stateFile),
    reportWriter: new FileReportWriter(settings.reportFile),
  });
  return { engine, client };
}

const printLog = (entry: SyncLogEntry): void => {
  if (entry.level === "error") {
    console.error(c.error(entry.message));
  } else if (entry.level === "warn") {
    console.warn(c.warning(entry.message));
  } else if (entry.message.startsWith("[dry-run]")) {
    console.log(c.dim(entry.message));
  }
};

function printSummary(summary: SyncSummary): void {
  const { counts } = summary;
  console.log(`\n${c.title(summary.dryRun ? "Dry run summary" : "Sync summary")} ${c.dim(summary.runId)}`);
  console.log(`  Local assets:    ${summary.localCount} (${summary.catalogErrors} catalog errors)`);
  console.log(`  Remote assets:   ${summary.remoteCount} (${summary.residualCount} without a local file)`);
  console.log(`  Done:            ${c.success(String(counts.done))}`);
  console.log(`  Skipped:         ${counts.skipped}`);
  console.log(`  Manual review:   ${counts.review > 0 ? c.warning(String(counts.review)) : "0"}`);
  console.log(`  Failed:          ${counts.failed > 0 ? c.error(String(counts.failed)) : "0"}`);
  if (summary.cancelled) {
    console.log(`  Cancelled:       ${c.warning(String(counts.cancelled))}`);
  }

  for (const outcome of summary.outcomes) {
    if (outcome.status === "failed") {
      const subject = outcome.op.type === "stack" ? outcome.op.groupKey : outcome.op.asset.relativePath;
      console.log(`  ${c.error("FAILED")} ${c.file(subject)}: ${outcome.detail ?? ""}`);
    }
  }
}

type SyncCommandOptions = {
  server?: string;
  root?: string;
  album?: string;
  dryRun?: boolean;
  state?: string;
  report?: string;
  concurrency?: string;
};

export function registerSyncCommand(program: Command): void {
  program
    .command("sync")
    .description("Reconcile the export tree with the photo library")
    .option("--server <url>", "Immich server URL (IMMICH_URL)")
    .option("--root <dir>", "Export root directory (ROOT)")
    .option("--album <name>", "Album that new uploads are added to (EXPORT_ALBUM)")
    .option("--dry-run", "Report what would change without changing anything")
    .option("--state <file>", "Run state file (STATE_FILE)")
    .option("--report <file>", "Report file (REPORT_FILE)")
    .option("-c, --concurrency <n>", "Parallel workers (CONCURRENCY)")
    .action(async (options: SyncCommandOptions) => {
      try {
        const settings = resolveSettings(process.env, {
          serverUrl: options.server,
          exportRoot: options.root,
          exportAlbum: options.album,
          dryRun: options.dryRun === true,
          stateFile: options.state,
          reportFile: options.report,
          concurrency: options.concurrency,
        });
        const { engine, client } = createSyncEngine(settings);

        console.log(c.title(`\nreexport-sync ${settings.dryRun ? "(dry run)" : ""}`));
        console.log(`  Server: ${settings.serverUrl}`);
        console.log(`  Root:   ${c.file(settings.exportRoot)}\n`);
        await client.ping();

        const controller = new AbortController();
        const onInterrupt = (): void => {
          if (controller.signal.aborted) {
            process.exit(130);
          }
          console.warn(c.warning("\nStopping after in-flight operations finish (Ctrl-C again to quit now)..."));
          controller.abort();
        };
        process.on("SIGINT", onInterrupt);

        try {
          const summary = await engine.sync({
            exportRoot: settings.exportRoot,
            exportAlbum: settings.exportAlbum,
            dryRun: settings.dryRun,
            ignorePatterns: settings.ignorePatterns,
            concurrency: settings.concurrency,
            maxFileSizeMB: settings.maxFileSizeMB,
            signal: controller.signal,
            onLog: printLog,
            onProgress: (progress) => {
              if (progress.percentage === undefined) {
                console.log(c.info(progress.message));
              }
            },
          });
          printSummary(summary);
          process.exitCode = summary.counts.failed > 0 ? EXIT_FAILURES : EXIT_OK;
        } finally {
          process.off("SIGINT", onInterrupt);
        }
      } catch (error) {
        handleFatal(error);
      }
    });
}
