#!/usr/bin/env node
/**
 * One-time OAuth consent flow: opens the loopback callback, prints the
 * consent URL and saves the token the ingest job reads on every run.
 */

import "dotenv/config";
import { Command } from "commander";
import { loadConfig } from "../src/config/loadConfig.js";
import { authorize } from "../src/google/auth.js";
import { createLogger } from "../src/logger.js";

const program = new Command();

program
  .name("inbox-sheet-authorize")
  .description("Authorize Gmail, Drive and Sheets access once and store the token")
  .parse(process.argv);

async function main() {
  const config = loadConfig(process.env);
  const logger = createLogger({ quiet: config.quiet, logFile: config.logFile });

  let exitCode = 0;
  try {
    await authorize({ ...config.google, logger }, { interactive: true });
    logger.info(`Authorized; token stored at ${config.google.tokenPath}`);
  } catch (err) {
    // eslint-disable-next-line no-console
    console.error(`Authorization failed: ${err instanceof Error ? err.message : String(err)}`);
    exitCode = 1;
  } finally {
    process.exit(exitCode);
  }
}

// eslint-disable-next-line @typescript-eslint/no-floating-promises
main();
