import fs from "node:fs";
import chalk from "chalk";
import { formatTimestamp } from "./time.js";

type LoggerOptions = {
  quiet?: boolean;
  logFile?: string;
};

type Level = "INFO" | "WARNING" | "ERROR";

export function createLogger(options: LoggerOptions = {}) {
  const quiet = Boolean(options.quiet);
  const logFile = options.logFile;

  const write = (level: Level, args: unknown[]) => {
    const message = args.map(a => (a instanceof Error ? a.message : String(a))).join(" ");
    const line = `${formatTimestamp(new Date())} - ${level} - ${message}`;
    if (logFile) {
      fs.appendFileSync(logFile, `${line}\n`, "utf8");
    }
    if (level === "ERROR") {
      // eslint-disable-next-line no-console
      console.error(chalk.red(line));
    } else if (level === "WARNING") {
      // eslint-disable-next-line no-console
      console.warn(chalk.yellow(line));
    } else if (!quiet) {
      // eslint-disable-next-line no-console
      console.log(line);
    }
  };

  const info = (...args: unknown[]) => write("INFO", args);
  const warn = (...args: unknown[]) => write("WARNING", args);
  const error = (...args: unknown[]) => write("ERROR", args);
  const step = (title: string) => {
    info(`--- ${title} ---`);
  };
  return {
    info,
    warn,
    error,
    step
  };
}

export type Logger = ReturnType<typeof createLogger>;

/** Logger that drops everything; for tests and library callers without output. */
export function createSilentLogger(): Logger {
  const noop = () => undefined;
  return { info: noop, warn: noop, error: noop, step: noop };
}
