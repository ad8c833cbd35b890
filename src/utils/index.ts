/**
 * Utility exports
 */

// Path/filename utilities
export { fileNameFromUrl } from "./file-name-from-url";

// Filesystem utilities
export { fileExists, ensureDir, nodeFileSystem } from "./fs";

// Config utilities
export {
  loadConfig,
  loadDefaultConfig,
  mergeConfig,
  getUserConfigPath,
} from "./load-config";

// Helpers
export { sleep } from "./sleep";
export { shuffle } from "./shuffle";
export { toError } from "./to-error";

// Classes
export { Logger } from "./logger";
export { Tracker } from "./tracker";
export { CompletionCounter } from "./completion-counter";
export { WorkerPool } from "./worker-pool";
export type { PoolJob, JobResult, PoolStats } from "./worker-pool";
