/**
 * Library entry point
 */

export { Harvester, createCollaborators } from "./harvester";
export type { HarvesterOptions } from "./harvester";
export { ImageHandler, formatForPath } from "./image-handler";
export { run } from "./modules/dispatcher";
export type { RunOptions, RunDependencies } from "./modules/dispatcher";
export { createTask, executeTask } from "./modules/task";
export type { Task, TaskDependencies } from "./modules/task";
export { nextDelay, attemptsExhausted, taskTimeout } from "./modules/retry-policy";
export { summarize, writeFailedUrls } from "./modules/reporter";
export { readTextFile, readCsvColumn, selectUrls } from "./modules/reader";
export {
  CompletionCounter,
  Logger,
  WorkerPool,
  loadConfig,
  nodeFileSystem,
} from "./utils";
export * from "./types";
