/**
 * Task outcomes and run results
 */

// "skipped" means the destination already existed and counts as a success
export type TaskOutcome =
  | "succeeded"
  | "skipped"
  | "permanently-failed"
  | "timed-out";

// Keyed by URL, filled in completion order
export type RunResult = Map<string, TaskOutcome>;

export interface RunSummary {
  total: number;
  succeeded: number; // Includes skipped
  skipped: number;
  timedOut: number;
  failedUrls: string[]; // Permanently failed and timed out
}
