#!/usr/bin/env node
import "dotenv/config";
import { Command } from "commander";
import { assertValidConfig } from "../src/config/configValidator.js";
import { loadConfig } from "../src/config/loadConfig.js";
import { connectGoogle } from "../src/google/collaborators.js";
import { createLogger } from "../src/logger.js";
import { RunOrchestrator } from "../src/orchestrator/runOrchestrator.js";
import { Scheduler } from "../src/orchestrator/scheduler.js";
import { renderSummaryBox } from "../src/summary.js";
import { ProgressUI } from "../src/ui/progressUI.js";

const program = new Command();

program
  .name("inbox-sheet-ingest")
  .description("Store spreadsheet attachments from Gmail in Drive and append their new rows to a Google Sheet")
  .option("--run-once", "Run a single time and exit instead of running on a schedule", false)
  .parse(process.argv);

async function main() {
  const opts = program.opts<{ runOnce?: boolean }>();
  const config = loadConfig(process.env);
  const logger = createLogger({ quiet: config.quiet, logFile: config.logFile });

  let exitCode = 0;
  try {
    assertValidConfig(config, logger);
    const progress = new ProgressUI(config.quiet);

    const runWorkflow = async () => {
      const orchestrator = new RunOrchestrator({
        config,
        connect: () => connectGoogle(config, logger),
        logger,
        progress
      });
      const result = await orchestrator.run();
      // Print summary to stderr to be visible even when quiet
      // eslint-disable-next-line no-console
      console.error(renderSummaryBox(result.summary, result.cacheStats));
      return result;
    };

    if (opts.runOnce) {
      await runWorkflow();
      return;
    }

    const scheduler = new Scheduler({
      intervalHours: config.scheduleIntervalHours,
      task: runWorkflow,
      logger
    });
    process.once("SIGINT", () => void scheduler.stop());
    process.once("SIGTERM", () => void scheduler.stop());
    await scheduler.start();
  } catch (err) {
    // eslint-disable-next-line no-console
    console.error(`Fatal error: ${err instanceof Error ? err.message : String(err)}`);
    exitCode = 1;
  } finally {
    process.exit(exitCode);
  }
}

// eslint-disable-next-line @typescript-eslint/no-floating-promises
main();
