/**
 * Harvest context - flows through the entire pipeline
 * Each module reads what it needs and writes its results back
 */

import type { HarvesterConfig } from "./config";
import type { Collaborators } from "./collaborators";
import type { RunResult, RunSummary } from "./outcome";
import type { Tracker } from "../utils/tracker";
import type { Logger } from "../utils/logger";
import type { CompletionCounter } from "../utils/completion-counter";

// Re-export types from tracker
export type {
  DownloadIssue,
  DownloadIssueReason,
  HarvestStats,
} from "../utils/tracker";

export type ProgressListener = (completed: number, total: number) => void;

export interface HarvestContext {
  // Input - provided at initialization
  config: HarvesterConfig;
  collaborators: Collaborators;
  logger: Logger;

  // Unified tracking for stats and per-URL errors
  tracker: Tracker;

  // Scoped to this run, never shared between runs
  counter: CompletionCounter;

  verbose?: boolean;
  onProgress?: ProgressListener;

  urls?: string[]; // Written by reader
  result?: RunResult; // Written by dispatcher
  summary?: RunSummary; // Written by reporter
}
