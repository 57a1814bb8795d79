import { mkdtemp, rm } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { Command } from "commander";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { registerLogCommand } from "../src/cli/commands/log";
import { registerReviewsCommand } from "../src/cli/commands/reviews";
import { registerSyncCommand } from "../src/cli/commands/sync";
import { EXIT_FATAL } from "../src/cli/helpers";
import { FileStateStore } from "../src/storage/state-store";

const run = async (register: (program: Command) => void, args: string[]): Promise<void> => {
  const program = new Command();
  register(program);
  await program.parseAsync(["node", "reexport-sync", ...args]);
};

describe("CLI commands", () => {
  let dir: string;
  let stateFile: string;
  let output: string[];
  let errors: string[];

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), "reexport-cli-"));
    stateFile = path.join(dir, "state.json");
    output = [];
    errors = [];
    vi.stubEnv("NO_COLOR", "1");
    vi.spyOn(console, "log").mockImplementation((line: string) => void output.push(line));
    vi.spyOn(console, "error").mockImplementation((line: string) => void errors.push(line));
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    vi.unstubAllEnvs();
    process.exitCode = undefined;
    await rm(dir, { recursive: true, force: true });
  });

  it("prints the most recent log entries", async () => {
    const store = new FileStateStore(stateFile);
    await store.appendLog({ timestamp: "t1", level: "info", message: "first" });
    await store.appendLog({ timestamp: "t2", level: "info", message: "second" });
    await store.appendLog({ timestamp: "t3", level: "warn", message: "third" });

    await run(registerLogCommand, ["log", "--state", stateFile, "-n", "2"]);

    expect(output).toEqual(["t2 info  second", "t3 warn  third"]);
  });

  it("lists reviews as JSON", async () => {
    const review = {
      path: "IMG_0001.JPG",
      reason: "ambiguous-match" as const,
      candidateIds: ["r1", "r2"],
      message: "2 remote candidates are equally close to IMG_0001.JPG",
      timestamp: "2024-06-01T00:00:00.000Z",
    };
    await new FileStateStore(stateFile).saveReviews([review]);

    await run(registerReviewsCommand, ["reviews", "--state", stateFile, "--json"]);

    expect(output).toHaveLength(1);
    expect(JSON.parse(output[0])).toEqual([review]);
  });

  it("says when nothing needs review", async () => {
    await run(registerReviewsCommand, ["reviews", "--state", stateFile]);

    expect(output).toEqual(["Nothing needs review."]);
  });

  it("exits with the fatal code on a configuration error", async () => {
    vi.stubEnv("IMMICH_URL", "");
    vi.stubEnv("IMMICH_API_KEY", "");
    vi.stubEnv("ROOT", "");

    await run(registerSyncCommand, ["sync"]);

    expect(process.exitCode).toBe(EXIT_FATAL);
    expect(errors).toEqual([
      "Configuration error Invalid configuration: serverUrl: IMMICH_URL or --server is required; " +
        "apiKey: IMMICH_API_KEY is required; exportRoot: ROOT or --root is required",
    ]);
  });
});
