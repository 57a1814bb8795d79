import type { Command } from "commander";
import { DEFAULT_STATE_FILE } from "../../config/settings";
import { FileStateStore } from "../../storage/state-store";
import { c } from "../colors";
import { handleFatal } from "../helpers";

export function registerReviewsCommand(program: Command): void {
  program
    .command("reviews")
    .description("List assets the last sync routed to manual review")
    .option("--state <file>", "Run state file (STATE_FILE)")
    .option("--json", "Output as JSON")
    .action(async (options: { state?: string; json?: boolean }) => {
      try {
        const store = new FileStateStore(options.state ?? process.env.STATE_FILE ?? DEFAULT_STATE_FILE);
        const reviews = await store.loadReviews();

        if (options.json) {
          console.log(JSON.stringify(reviews, null, 2));
          return;
        }
        if (reviews.length === 0) {
          console.log("Nothing needs review.");
          return;
        }

        console.log(`\n${c.title("Manual review")} (${reviews.length})`);
        for (const review of reviews) {
          console.log(`  ${c.file(review.path)} ${c.dim(`[${review.reason}]`)}`);
          console.log(`    ${review.message}`);
          if (review.candidateIds.length > 0) {
            console.log(`    candidates: ${review.candidateIds.join(", ")}`);
          }
        }
      } catch (error) {
        handleFatal(error);
      }
    });
}
