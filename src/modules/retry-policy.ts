/**
 * Retry Policy
 * Delay and exhaustion rules for repeated download attempts
 */

import { MAX_TIMER_DELAY_MS } from "../types";
import type { DownloadConfig, SleepConfig } from "../types";

/**
 * Delay before an attempt, in milliseconds
 *
 * With `randomSleepTime` the delay is drawn uniformly from
 * [minSleepTime, maxSleepTime) seconds, otherwise it is `sleepTime` seconds.
 * The attempt number does not change the delay.
 */
export function nextDelay(
  _attempt: number,
  config: SleepConfig,
  random: () => number = Math.random,
): number {
  if (!config.randomSleepTime) {
    return Math.round(config.sleepTime * 1000);
  }
  const min = config.minSleepTime * 1000;
  const max = config.maxSleepTime * 1000;
  return Math.floor(min + random() * (max - min));
}

/**
 * True once `attempt` attempts have been made out of `maxAttempts`
 */
export function attemptsExhausted(attempt: number, maxAttempts: number): boolean {
  return attempt >= maxAttempts;
}

/**
 * Wall-clock budget for one task, in milliseconds (0 = no timeout)
 *
 * Defaults to the longest delay a single attempt may sleep times the number
 * of attempts; `taskTimeout` overrides it. Capped at the longest delay a
 * Node timer can wait.
 */
export function taskTimeout(
  config: Pick<DownloadConfig, keyof SleepConfig | "maxAttempts" | "taskTimeout">,
): number {
  if (config.taskTimeout !== null) {
    return Math.min(Math.round(config.taskTimeout * 1000), MAX_TIMER_DELAY_MS);
  }
  const maxDelayPerAttempt = config.randomSleepTime
    ? config.maxSleepTime
    : config.sleepTime;
  return Math.min(
    Math.round(maxDelayPerAttempt * config.maxAttempts * 1000),
    MAX_TIMER_DELAY_MS,
  );
}
