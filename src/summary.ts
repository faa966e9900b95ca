import chalk from "chalk";
import type { FolderListingCacheStats } from "./cache/folderListingCache.js";
import type { RunStatus, RunSummary } from "./types.js";

type FailureCounts = Pick<RunSummary, "attachmentsFailed" | "filesFailed">;

function formatDuration(ms: number): string {
  const seconds = ms / 1000;
  if (seconds < 1) return `${ms.toFixed(0)} ms`;
  if (seconds < 60) return `${seconds.toFixed(1)} s`;
  return `${Math.floor(seconds / 60)}m ${Math.round(seconds % 60)}s`;
}

export function computeStatus(counts: FailureCounts): RunStatus {
  if (counts.attachmentsFailed > 0 || counts.filesFailed > 0) return "Completed With Errors";
  return "Completed Successfully";
}

export function renderSummaryBox(summary: RunSummary, cacheStats?: FolderListingCacheStats): string {
  const duration = summary.endedAt ? formatDuration(summary.endedAt.getTime() - summary.startedAt.getTime()) : "-";

  const content = [
    "SUMMARY",
    `Status: ${summary.status}`,
    `Emails checked: ${summary.emailsChecked}`,
    `Attachments saved/skipped/failed: ${summary.attachmentsSaved}/${summary.attachmentsSkipped}/${summary.attachmentsFailed} of ${summary.attachmentsFound}`,
    `Files processed/skipped/failed: ${summary.filesProcessed}/${summary.filesSkipped}/${summary.filesFailed} of ${summary.filesFound}`,
    `Duplicates removed: ${summary.duplicatesRemoved}`,
    `Duration: ${duration}`
  ];

  if (cacheStats && cacheStats.hits + cacheStats.misses > 0) {
    content.push(
      `Folder listing hits/misses: ${cacheStats.hits}/${cacheStats.misses}`,
      `Folder listing pages: ${cacheStats.pagesFetched}`
    );
  }

  // Compute max content width and render a neatly padded box
  const maxLen = content.reduce((m, s) => Math.max(m, s.length), 0);
  const horizontal = "─".repeat(maxLen + 2);
  const top = `┌${horizontal}┐`;
  const bottom = `└${horizontal}┘`;
  const body = content.map((line) => `│ ${line.padEnd(maxLen, " ")} │`);
  const box = [top, ...body, bottom].join("\n");

  if (summary.status === "Completed Successfully") return chalk.green(box);
  if (summary.status === "Completed With Errors" || summary.status === "Skipped - Another Run In Progress") {
    return chalk.yellow(box);
  }
  return chalk.red(box);
}
