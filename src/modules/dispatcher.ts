/**
 * Dispatcher Module
 * Submits one task per URL to a bounded worker pool and collects outcomes
 * in completion order
 */

import { createTask, executeTask } from "./task";
import { taskTimeout } from "./retry-policy";
import { WorkerPool } from "../utils";
import type { CompletionCounter, JobResult, Logger, Tracker } from "../utils";
import type {
  Collaborators,
  DownloadConfig,
  HarvestContext,
  ProgressListener,
  RunResult,
  TaskOutcome,
} from "../types";

export interface RunOptions {
  download: DownloadConfig;
  outputFolder: string;
}

export interface RunDependencies extends Collaborators {
  counter: CompletionCounter;
  logger: Logger;
  tracker?: Tracker;
  random?: () => number;
  onProgress?: ProgressListener;
}

// ============================================================================
// Core
// ============================================================================

/**
 * Download every URL and return one outcome per distinct URL.
 *
 * Duplicate URLs run as separate tasks; the entry for that URL holds
 * whichever finished last.
 */
export async function run(
  urls: string[],
  options: RunOptions,
  deps: RunDependencies,
): Promise<RunResult> {
  const { logger, tracker } = deps;
  const result: RunResult = new Map();
  const total = urls.length;
  const timeoutMs = taskTimeout(options.download);

  logger.debug(
    timeoutMs > 0
      ? `Setting timeout=${timeoutMs / 1000} seconds per task`
      : "Per-task timeout disabled",
  );

  const record = (url: string, outcome: TaskOutcome): void => {
    result.set(url, outcome);
    tracker?.trackOutcome(outcome);
  };

  const pool = new WorkerPool(options.download.maxWorkers);

  try {
    await Promise.all(
      urls.map(async (url) => {
        const task = createTask(url, options, total);
        const settled: JobResult<TaskOutcome> = await pool.submit(
          (signal, workerId) =>
            executeTask(task, {
              ...deps,
              logger: logger.child(`worker-${workerId}`),
              signal,
            }),
          timeoutMs,
        );

        switch (settled.status) {
          case "fulfilled":
            record(url, settled.value);
            break;
          case "timed-out":
            logger.warn(`Timed out downloading ${url} after ${timeoutMs / 1000} seconds`);
            record(url, "timed-out");
            break;
          case "rejected":
            logger.error(`Unexpected error while downloading ${url}`, settled.error);
            record(url, "permanently-failed");
            break;
        }
      }),
    );
  } finally {
    pool.shutdown();
  }

  return result;
}

// ============================================================================
// Pipeline step
// ============================================================================

/**
 * Runs the download for `ctx.urls` and writes `ctx.result`
 */
export async function dispatch(ctx: HarvestContext): Promise<void> {
  if (!ctx.urls) {
    throw new Error("Reader must run before dispatcher");
  }

  const { config, collaborators, counter, logger, tracker, onProgress } = ctx;
  tracker.setTotalUrls(ctx.urls.length);
  logger.info(`Downloading ${ctx.urls.length} urls`);

  ctx.result = await run(
    ctx.urls,
    { download: config.download, outputFolder: config.output.directory },
    { ...collaborators, counter, logger, tracker, onProgress },
  );
}
