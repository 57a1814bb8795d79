#!/usr/bin/env node

/**
 * reexport-sync CLI
 *
 * Commands:
 * - sync: reconcile the export tree with the photo library
 * - reviews: list assets routed to manual review by the last sync
 * - log: show recent sync log entries
 */

import { Command } from "commander";
import { loadEnvFiles } from "./config/settings";
import { registerSyncCommand } from "./cli/commands/sync";
import { registerReviewsCommand } from "./cli/commands/reviews";
import { registerLogCommand } from "./cli/commands/log";
import { handleFatal } from "./cli/helpers";

export function buildProgram(): Command {
  const program = new Command();
  program
    .name("reexport-sync")
    .description("Reconcile a re-exported photo library with an Immich server")
    .version("0.1.0");

  registerSyncCommand(program);
  registerReviewsCommand(program);
  registerLogCommand(program);
  return program;
}

async function main(): Promise<void> {
  loadEnvFiles();
  await buildProgram().parseAsync(process.argv);
}

if (require.main === module) {
  main().catch(handleFatal);
}
