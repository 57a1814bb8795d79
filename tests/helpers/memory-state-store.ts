import type { StateStore } from "../../src/types/interfaces";
import type { ReviewRecord, RunRecord, SyncLogEntry } from "../../src/types/sync-types";

export class MemoryStateStore implements StateStore {
  records: Record<string, RunRecord> = {};
  reviews: ReviewRecord[] = [];
  logs: SyncLogEntry[] = [];

  async loadRecords(): Promise<Record<string, RunRecord>> {
    return { ...this.records };
  }

  async getRecord(key: string): Promise<RunRecord | null> {
    return this.records[key] ?? null;
  }

  async saveRecord(record: RunRecord): Promise<void> {
    this.records[record.key] = record;
  }

  async saveReviews(records: ReviewRecord[]): Promise<void> {
    this.reviews = records;
  }

  async loadReviews(): Promise<ReviewRecord[]> {
    return this.reviews;
  }

  async appendLog(entry: SyncLogEntry): Promise<void> {
    this.logs.push(entry);
  }

  async loadLogs(): Promise<SyncLogEntry[]> {
    return this.logs;
  }
}
