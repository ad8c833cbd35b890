/**
 * Configuration type definitions with Zod schemas
 */

import { z } from "zod";

// Zod schemas
export const InputConfigSchema = z.object({
  textFile: z.string().nullable(), // One URL per line
  csvFile: z.string().nullable(),
  column: z.string().min(1), // CSV column holding the URLs
  maxImages: z.number().int(), // -1 (or any value <= 0) keeps every URL
  shuffle: z.boolean(), // Shuffle before truncating to maxImages
});

// Node timers fire at once for delays above 2^31 - 1 ms
export const MAX_TIMER_DELAY_MS = 2_147_483_647;
const MAX_SECONDS = Math.floor(MAX_TIMER_DELAY_MS / 1000);

const seconds = z.number().nonnegative().max(MAX_SECONDS);

export const DownloadConfigSchema = z.object({
  maxWorkers: z.number().int().positive(),
  maxAttempts: z.number().int().nonnegative(),
  // Delays are in seconds
  sleepTime: seconds,
  minSleepTime: seconds,
  maxSleepTime: seconds,
  randomSleepTime: z.boolean(),
  // Per-task timeout in seconds; null derives it from the sleep settings
  taskTimeout: seconds.nullable(),
  requestTimeout: z.number().int().positive().max(MAX_TIMER_DELAY_MS), // In milliseconds
  userAgent: z.string(),
});

export const OutputConfigSchema = z.object({
  directory: z.string().min(1),
  failedUrlsFile: z.string().min(1),
});

export const LoggingConfigSchema = z.object({
  level: z.enum(["debug", "info", "warn", "error"]),
  showProgress: z.boolean(),
});

const HarvesterConfigObjectSchema = z.object({
  input: InputConfigSchema,
  download: DownloadConfigSchema,
  output: OutputConfigSchema,
  logging: LoggingConfigSchema,
});

export const HarvesterConfigSchema = HarvesterConfigObjectSchema.refine(
  (config) => config.download.minSleepTime <= config.download.maxSleepTime,
  {
    message: "minSleepTime must not be greater than maxSleepTime",
    path: ["download", "minSleepTime"],
  },
);

// Partial schema for user/custom configs (top-level AND nested properties optional)
export const PartialHarvesterConfigSchema = HarvesterConfigObjectSchema.partial()
  .extend({
    input: InputConfigSchema.partial().optional(),
    download: DownloadConfigSchema.partial().optional(),
    output: OutputConfigSchema.partial().optional(),
    logging: LoggingConfigSchema.partial().optional(),
  });

// Infer TypeScript types from Zod schemas
export type InputConfig = z.infer<typeof InputConfigSchema>;
export type DownloadConfig = z.infer<typeof DownloadConfigSchema>;
export type OutputConfig = z.infer<typeof OutputConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
export type LogLevel = LoggingConfig["level"];
export type HarvesterConfig = z.infer<typeof HarvesterConfigSchema>;
export type PartialHarvesterConfig = z.infer<typeof PartialHarvesterConfigSchema>;

/**
 * Sleep settings a task carries with it
 */
export type SleepConfig = Pick<
  DownloadConfig,
  "sleepTime" | "minSleepTime" | "maxSleepTime" | "randomSleepTime"
>;

export interface ConfigError {
  path: string;
  error: unknown;
}
