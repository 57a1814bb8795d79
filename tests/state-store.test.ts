import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { FileStateStore } from "../src/storage/state-store";
import type { ReviewRecord, RunRecord } from "../src/types/sync-types";

describe("FileStateStore", () => {
  let dir: string;
  let file: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), "reexport-state-"));
    file = path.join(dir, "nested", "state.json");
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  const record = (key: string, status: RunRecord["status"] = "done"): RunRecord => ({
    key,
    status,
    op: "upload",
    remoteId: `remote-${key}`,
    updatedAt: "2024-06-01T00:00:00.000Z",
  });

  it("starts empty when the file does not exist", async () => {
    const store = new FileStateStore(file);

    expect(await store.loadRecords()).toEqual({});
    expect(await store.getRecord("missing")).toBeNull();
    expect(await store.loadReviews()).toEqual([]);
  });

  it("persists records across instances", async () => {
    const store = new FileStateStore(file);
    await store.saveRecord(record("a"));
    await store.saveRecord(record("b", "failed"));
    await store.saveRecord(record("a", "failed"));

    const reopened = new FileStateStore(file);

    expect(await reopened.loadRecords()).toEqual({ a: record("a", "failed"), b: record("b", "failed") });
  });

  it("keeps concurrent writes", async () => {
    const store = new FileStateStore(file);

    await Promise.all(Array.from({ length: 20 }, (_, index) => store.saveRecord(record(`k${index}`))));

    const stored = JSON.parse(await readFile(file, "utf8"));
    expect(Object.keys(stored.records)).toHaveLength(20);
  });

  it("replaces reviews as a whole", async () => {
    const store = new FileStateStore(file);
    const review: ReviewRecord = {
      path: "IMG_0001.JPG",
      reason: "ambiguous-match",
      candidateIds: ["r1", "r2"],
      message: "2 remote candidates are equally close to IMG_0001.JPG",
      timestamp: "2024-06-01T00:00:00.000Z",
    };

    await store.saveReviews([review, { ...review, path: "IMG_0002.JPG" }]);
    await store.saveReviews([review]);

    expect(await new FileStateStore(file).loadReviews()).toEqual([review]);
  });

  it("caps log length", async () => {
    const store = new FileStateStore(file);

    for (let i = 0; i < 600; i += 1) {
      await store.appendLog({ timestamp: String(i), level: "info", message: "m" });
    }

    const logs = await store.loadLogs();
    expect(logs).toHaveLength(500);
    expect(logs[0].timestamp).toBe("100");
  });

  it("refuses a corrupt state file", async () => {
    const corrupt = path.join(dir, "corrupt.json");
    await writeFile(corrupt, "{ not json");

    await expect(new FileStateStore(corrupt).loadRecords()).rejects.toThrow(/is corrupt/);
  });
});
