/**
 * Task Module
 * One URL's full attempt sequence: skip check, then delay, fetch and store until
 * the image is saved or the attempts run out
 */

import { join } from "node:path";
import { nextDelay, attemptsExhausted } from "./retry-policy";
import { fileNameFromUrl, sleep } from "../utils";
import type { CompletionCounter, Logger, Tracker } from "../utils";
import type {
  Collaborators,
  DownloadConfig,
  ProgressListener,
  SleepConfig,
  TaskOutcome,
} from "../types";

export interface Task {
  url: string;
  outputFolder: string;
  outputPath: string;
  attempt: number;
  maxAttempts: number;
  sleep: SleepConfig;
  total: number; // Tasks submitted in this run, for progress messages
}

export interface TaskDependencies extends Collaborators {
  counter: CompletionCounter;
  logger: Logger;
  tracker?: Tracker;
  signal?: AbortSignal;
  random?: () => number;
  onProgress?: ProgressListener;
}

export function createTask(
  url: string,
  options: { download: DownloadConfig; outputFolder: string },
  total: number,
): Task {
  const { download, outputFolder } = options;
  return {
    url,
    outputFolder,
    outputPath: join(outputFolder, fileNameFromUrl(url)),
    attempt: 0,
    maxAttempts: download.maxAttempts,
    sleep: {
      sleepTime: download.sleepTime,
      minSleepTime: download.minSleepTime,
      maxSleepTime: download.maxSleepTime,
      randomSleepTime: download.randomSleepTime,
    },
    total,
  };
}

/**
 * Run a task to a terminal outcome.
 *
 * Any failed attempt (folder creation, fetch or store) is retried until
 * `maxAttempts` attempts have been made. Aborting `deps.signal` ends the task
 * as "timed-out" at the next check.
 */
export async function executeTask(
  task: Task,
  deps: TaskDependencies,
): Promise<TaskOutcome> {
  const { fetcher, sink, fs, counter, logger, tracker, signal } = deps;
  const name = fileNameFromUrl(task.url);

  if (await fs.exists(task.outputPath)) {
    const completed = counter.increment();
    logger.warn(`Image with name: ${name} already downloaded`);
    deps.onProgress?.(completed, task.total);
    return "skipped";
  }

  while (true) {
    if (attemptsExhausted(task.attempt, task.maxAttempts)) {
      logger.info(`Cannot download image: ${name} after ${task.attempt} attempts`);
      return "permanently-failed";
    }

    const dir = await fs.ensureDir(task.outputFolder);
    if (!dir.ok) {
      task.attempt++;
      tracker?.trackAttemptError(task.url, dir.error, task.attempt, "store");
      logger.info(
        `[attempt: ${task.attempt}/${task.maxAttempts}] Cannot create output folder ${task.outputFolder}: ${dir.error.message}`,
      );
      continue;
    }

    const delay = nextDelay(task.attempt, task.sleep, deps.random);
    if (delay > 0) {
      logger.debug(`Sleeping for ${delay}ms on attempt ${task.attempt}`);
      await sleep(delay, signal);
    }
    if (signal?.aborted) {
      return "timed-out";
    }

    task.attempt++;
    const fetched = await fetcher.fetch(task.url, signal);
    if (!fetched.ok) {
      tracker?.trackAttemptError(task.url, fetched.error, task.attempt);
      logger.info(
        `[attempt: ${task.attempt}/${task.maxAttempts}] Failed downloading image: ${name} (${fetched.error.message})`,
      );
      continue;
    }
    logger.info(
      `[attempt: ${task.attempt}/${task.maxAttempts}] Successfully downloaded image: ${name}`,
    );

    if (signal?.aborted) {
      return "timed-out";
    }

    const stored = await sink.store(fetched.value, task.outputPath);
    if (!stored.ok) {
      tracker?.trackAttemptError(task.url, stored.error, task.attempt, "store");
      logger.info(
        `[attempt: ${task.attempt}/${task.maxAttempts}] Failed saving image: ${name} (${stored.error.message})`,
      );
      continue;
    }
    if (signal?.aborted) {
      return "timed-out";
    }

    const completed = counter.increment();
    logger.info(`[Completed: ${completed}/${task.total}] Saved image: ${name} to disk`);
    deps.onProgress?.(completed, task.total);
    return "succeeded";
  }
}
