/**
 * Stats Module
 * Displays download statistics and failed URLs
 */

import chalk from "chalk";
import type { HarvestContext, HarvestStats, RunSummary, Tracker } from "../types";

// ============================================================================
// Formatting Helpers
// ============================================================================

/**
 * Format duration in a human-readable way
 */
function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }
  const seconds = ms / 1000;
  if (seconds < 60) {
    return `${seconds.toFixed(2)}s`;
  }
  const minutes = Math.floor(seconds / 60);
  const remainingSeconds = (seconds % 60).toFixed(0);
  return `${minutes}m ${remainingSeconds}s`;
}

function progressBar(
  current: number,
  total: number,
  width: number = 24,
): string {
  if (total === 0) return chalk.dim("─".repeat(width));

  const percentage = current / total;
  const filled = Math.round(width * percentage);
  const empty = width - filled;
  const percentText = `${Math.round(percentage * 100)}%`;

  const filledBar = chalk.green("━".repeat(filled));
  const emptyBar = chalk.dim("━".repeat(empty));

  return `${filledBar}${emptyBar} ${chalk.dim(percentText)}`;
}

function statRow(
  icon: string,
  label: string,
  value: string | number,
  color: (s: string) => string = chalk.white,
): string {
  return `   ${icon} ${chalk.dim(label.padEnd(18))} ${color(String(value))}`;
}

function sectionHeader(title: string): string {
  return `\n  ${chalk.bold.white(title)}`;
}

// ============================================================================
// Main Stats Display
// ============================================================================

export async function stats(ctx: HarvestContext): Promise<void> {
  if (!ctx.summary) {
    throw new Error("Reporter must run before stats");
  }

  const { config, tracker, verbose, summary } = ctx;
  const stats = tracker.getStats();
  const hasFailures = summary.failedUrls.length > 0;
  const allFailed = hasFailures && summary.succeeded === 0;

  console.log("");

  const statusIcon = allFailed
    ? chalk.red("✖")
    : hasFailures
      ? chalk.yellow("◆")
      : chalk.green("✔");

  console.log(
    `  ${statusIcon} ${chalk.bold("Download Complete")} ${chalk.dim("·")} ${chalk.dim(formatDuration(stats.duration))}`,
  );

  displayImagesSection(summary, stats);

  if (hasFailures) {
    displayFailuresSection(summary, tracker, config.output.failedUrlsFile, verbose);
  }

  console.log("");
}

// ============================================================================
// Section Displays
// ============================================================================

function displayImagesSection(summary: RunSummary, stats: HarvestStats): void {
  console.log(sectionHeader("Images"));

  const bar = progressBar(summary.succeeded, summary.total);
  console.log(`   ${bar}`);

  console.log(
    statRow(
      chalk.green("◉"),
      "Downloaded",
      summary.succeeded - summary.skipped,
      chalk.green,
    ),
  );

  if (summary.skipped > 0) {
    console.log(
      statRow(chalk.cyan("◉"), "Already present", summary.skipped, chalk.cyan),
    );
  }

  const permanentlyFailed = summary.failedUrls.length - summary.timedOut;
  if (permanentlyFailed > 0) {
    console.log(
      statRow(chalk.red("◉"), "Failed", permanentlyFailed, chalk.red),
    );
  }

  if (summary.timedOut > 0) {
    console.log(
      statRow(chalk.yellow("◉"), "Timed out", summary.timedOut, chalk.yellow),
    );
  }

  if (stats.failedAttempts > 0) {
    console.log(
      statRow(chalk.dim("◉"), "Retried attempts", stats.failedAttempts, chalk.dim),
    );
  }
}

function displayFailuresSection(
  summary: RunSummary,
  tracker: Tracker,
  reportPath: string,
  verbose?: boolean,
): void {
  console.log(sectionHeader(chalk.red("Errors")));
  console.log(
    statRow(chalk.red("✖"), "Failed URLs", reportPath, chalk.red),
  );

  if (!verbose) {
    return;
  }

  for (const url of summary.failedUrls) {
    console.log(`      ${chalk.dim("·")} ${url}`);
    const issue = tracker.getIssue(url);
    if (issue) {
      console.log(`        ${chalk.dim(`${issue.reason}: ${issue.details}`)}`);
    }
  }
}
