import type { Command } from "commander";
import { DEFAULT_STATE_FILE } from "../../config/settings";
import { FileStateStore } from "../../storage/state-store";
import type { SyncLogEntry } from "../../types/sync-types";
import { c } from "../colors";
import { handleFatal, parseCount } from "../helpers";

const levelLabel: Record<SyncLogEntry["level"], (s: string) => string> = {
  info: c.info,
  warn: c.warning,
  error: c.error,
};

export function registerLogCommand(program: Command): void {
  program
    .command("log")
    .description("Show recent sync log entries")
    .option("-n, --limit <number>", "Max entries to show", "50")
    .option("--state <file>", "Run state file (STATE_FILE)")
    .action(async (options: { limit?: string; state?: string }) => {
      try {
        const store = new FileStateStore(options.state ?? process.env.STATE_FILE ?? DEFAULT_STATE_FILE);
        const entries = (await store.loadLogs()).slice(-parseCount(options.limit, 50));
        if (entries.length === 0) {
          console.log("No log entries yet.");
          return;
        }
        for (const entry of entries) {
          console.log(`${c.time(entry.timestamp)} ${levelLabel[entry.level](entry.level.padEnd(5))} ${entry.message}`);
        }
      } catch (error) {
        handleFatal(error);
      }
    });
}
