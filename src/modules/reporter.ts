/**
 * Reporter Module
 * Partitions run outcomes and writes the failed-URL report
 */

import { writeFile } from "fs/promises";
import type { HarvestContext, RunResult, RunSummary } from "../types";

export function summarize(result: RunResult): RunSummary {
  const summary: RunSummary = {
    total: result.size,
    succeeded: 0,
    skipped: 0,
    timedOut: 0,
    failedUrls: [],
  };

  for (const [url, outcome] of result) {
    switch (outcome) {
      case "skipped":
        summary.skipped++;
        summary.succeeded++;
        break;
      case "succeeded":
        summary.succeeded++;
        break;
      case "timed-out":
        summary.timedOut++;
        summary.failedUrls.push(url);
        break;
      case "permanently-failed":
        summary.failedUrls.push(url);
        break;
    }
  }

  return summary;
}

/**
 * Write one URL per line, replacing any earlier report
 */
export async function writeFailedUrls(path: string, urls: string[]): Promise<void> {
  await writeFile(path, urls.map((url) => `${url}\n`).join(""), "utf-8");
}

/**
 * Summarizes `ctx.result` into `ctx.summary` and dumps failed URLs
 */
export async function report(ctx: HarvestContext): Promise<void> {
  if (!ctx.result) {
    throw new Error("Dispatcher must run before reporter");
  }

  const { config, logger, tracker } = ctx;
  const summary = summarize(ctx.result);
  ctx.summary = summary;

  if (summary.failedUrls.length > 0) {
    await writeFailedUrls(config.output.failedUrlsFile, summary.failedUrls);
    logger.warn(
      `Failed downloading ${summary.failedUrls.length} urls. Dumping failed urls at \`${config.output.failedUrlsFile}\``,
    );
    return;
  }

  const seconds = tracker.getStats().duration / 1000;
  logger.info(`Successfully downloaded ${summary.total} urls in ${seconds.toFixed(2)} secs`);
}
