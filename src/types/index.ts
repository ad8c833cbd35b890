/**
 * Central type exports
 */

// Configuration
export type {
  HarvesterConfig,
  PartialHarvesterConfig,
  InputConfig,
  DownloadConfig,
  OutputConfig,
  LoggingConfig,
  LogLevel,
  SleepConfig,
  ConfigError,
} from "./config";
export {
  HarvesterConfigSchema,
  PartialHarvesterConfigSchema,
  MAX_TIMER_DELAY_MS,
} from "./config";

// Collaborators
export type {
  DecodedImage,
  Failure,
  Result,
  VoidResult,
  Fetcher,
  Sink,
  FileSystem,
  Collaborators,
} from "./collaborators";

// Outcomes
export type { TaskOutcome, RunResult, RunSummary } from "./outcome";

// Context
export type {
  HarvestContext,
  ProgressListener,
  DownloadIssue,
  DownloadIssueReason,
  HarvestStats,
} from "./context";

// Tracker
export { Tracker } from "../utils/tracker";
