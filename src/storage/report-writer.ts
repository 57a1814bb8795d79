import { appendFile, mkdir } from "node:fs/promises";
import path from "node:path";
import type { ReportWriter } from "../types/interfaces";
import type { OpOutcome } from "../types/sync-types";
import type { CatalogError } from "../types/errors";

export type ReportContext = {
  runId: string;
  dryRun: boolean;
  timestamp: string;
};

// Tabs and newlines would break the one-line-per-entry layout.
const clean = (value: string): string => value.replace(/[\t\r\n]+/g, " ").trim();

export function formatOutcomeLine(context: ReportContext, outcome: OpOutcome): string {
  const detail = outcome.detail ?? outcome.remoteId ?? "";
  return [
    context.timestamp,
    context.runId,
    context.dryRun ? "dry-run" : "live",
    outcome.op.type === "stack" ? outcome.op.groupKey : outcome.op.asset.relativePath,
    outcome.op.type,
    outcome.alreadyDone ? "skipped(already-done)" : outcome.status,
    detail,
  ]
    .map(clean)
    .join("\t");
}

export function formatCatalogErrorLine(context: ReportContext, error: CatalogError): string {
  return [
    context.timestamp,
    context.runId,
    context.dryRun ? "dry-run" : "live",
    error.path,
    "catalog-error",
    "failed",
    error.message,
  ]
    .map(clean)
    .join("\t");
}

export class FileReportWriter implements ReportWriter {
  private filePath: string;

  constructor(filePath: string) {
    this.filePath = path.resolve(filePath);
  }

  async append(lines: string[]): Promise<void> {
    if (lines.length === 0) {
      return;
    }
    await mkdir(path.dirname(this.filePath), { recursive: true });
    await appendFile(this.filePath, `${lines.join("\n")}\n`, "utf8");
  }
}
