import { mkdir, readFile, rename, writeFile } from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import type { ReviewRecord, RunRecord, SyncLogEntry } from "../types/sync-types";
import type { StateStore } from "../types/interfaces";
import { errorMessage } from "../types/errors";

const MAX_LOG_ENTRIES = 500;

const runRecordSchema = z.object({
  key: z.string(),
  status: z.enum(["done", "failed", "skipped"]),
  op: z.enum(["upload", "replace", "stack", "skip", "review"]),
  remoteId: z.string().optional(),
  replacedRemoteId: z.string().optional(),
  memberRemoteIds: z.array(z.string()).optional(),
  error: z.string().optional(),
  updatedAt: z.string(),
});

const reviewRecordSchema = z.object({
  path: z.string(),
  reason: z.enum(["ambiguous-match", "remote-index-empty-safety"]),
  candidateIds: z.array(z.string()),
  message: z.string(),
  timestamp: z.string(),
});

const logEntrySchema = z.object({
  timestamp: z.string(),
  level: z.enum(["info", "warn", "error"]),
  message: z.string(),
});

const storedStateSchema = z.object({
  version: z.literal(1),
  records: z.record(runRecordSchema).default({}),
  reviews: z.array(reviewRecordSchema).default([]),
  logs: z.array(logEntrySchema).default([]),
});

type StoredState = z.infer<typeof storedStateSchema>;

/**
 * Run ledger kept in a single JSON file. Writes are queued and each one replaces the file
 * through a temporary sibling, so an interrupted run never leaves a half-written ledger.
 */
export class FileStateStore implements StateStore {
  private filePath: string;
  private state: Promise<StoredState> | null = null;
  private writeQueue: Promise<void> = Promise.resolve();

  constructor(filePath: string) {
    this.filePath = path.resolve(filePath);
  }

  async loadRecords(): Promise<Record<string, RunRecord>> {
    const state = await this.loadState();
    return { ...state.records };
  }

  async getRecord(key: string): Promise<RunRecord | null> {
    const state = await this.loadState();
    return state.records[key] ?? null;
  }

  async saveRecord(record: RunRecord): Promise<void> {
    const state = await this.loadState();
    state.records[record.key] = record;
    await this.persist(state);
  }

  async saveReviews(records: ReviewRecord[]): Promise<void> {
    const state = await this.loadState();
    state.reviews = records;
    await this.persist(state);
  }

  async loadReviews(): Promise<ReviewRecord[]> {
    const state = await this.loadState();
    return state.reviews;
  }

  async appendLog(entry: SyncLogEntry): Promise<void> {
    const state = await this.loadState();
    state.logs.push(entry);
    if (state.logs.length > MAX_LOG_ENTRIES) {
      state.logs = state.logs.slice(-MAX_LOG_ENTRIES);
    }
    await this.persist(state);
  }

  async loadLogs(): Promise<SyncLogEntry[]> {
    const state = await this.loadState();
    return state.logs;
  }

  private loadState(): Promise<StoredState> {
    if (!this.state) {
      this.state = this.readState();
    }
    return this.state;
  }

  private async readState(): Promise<StoredState> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, "utf8");
    } catch (error) {
      if (error instanceof Error && "code" in error && error.code === "ENOENT") {
        return { version: 1, records: {}, reviews: [], logs: [] };
      }
      throw error;
    }

    try {
      return storedStateSchema.parse(JSON.parse(raw));
    } catch (error) {
      throw new Error(`State file ${this.filePath} is corrupt: ${errorMessage(error)}`);
    }
  }

  private persist(state: StoredState): Promise<void> {
    const snapshot = JSON.stringify(state, null, 2);
    const write = this.writeQueue.then(() => this.writeAtomic(snapshot));
    // A failed write is reported to its caller; later writes still run.
    this.writeQueue = write.catch(() => undefined);
    return write;
  }

  private async writeAtomic(contents: string): Promise<void> {
    await mkdir(path.dirname(this.filePath), { recursive: true });
    const tempPath = `${this.filePath}.${process.pid}.tmp`;
    await writeFile(tempPath, contents, "utf8");
    await rename(tempPath, this.filePath);
  }
}
