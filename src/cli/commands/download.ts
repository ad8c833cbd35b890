/**
 * Download command - Loads config and runs the download pipeline
 */

import ora from "ora";
import { z } from "zod";
import { Harvester } from "../../harvester";
import { loadConfig, Logger } from "../../utils";
import * as modules from "../../modules";
import { HarvesterConfigSchema } from "../../types";
import type { HarvesterConfig } from "../../types";

export const DownloadOptionsSchema = z.object({
  input: z.string().optional(),
  csv: z.string().optional(),
  column: z.string().optional(),
  output: z.string().optional(),
  maxWorkers: z.coerce.number().int().optional(),
  maxAttempts: z.coerce.number().int().optional(),
  sleepTime: z.coerce.number().optional(),
  minSleepTime: z.coerce.number().optional(),
  maxSleepTime: z.coerce.number().optional(),
  randomSleepTime: z.boolean().optional(),
  timeout: z.coerce.number().optional(),
  maxImages: z.coerce.number().int().optional(),
  shuffle: z.boolean().optional(),
  failedUrls: z.string().optional(),
  config: z.string().optional(),
  verbose: z.boolean().optional(),
  debug: z.boolean().optional(),
});

type Options = z.infer<typeof DownloadOptionsSchema>;

/**
 * Layer CLI options over the loaded config and validate the result
 */
export function applyCliOptions(
  loaded: HarvesterConfig,
  options: Options,
): HarvesterConfig {
  const config = structuredClone(loaded);
  const { input, download, output, logging } = config;

  // An input given on the command line replaces both configured sources
  if (options.input !== undefined || options.csv !== undefined) {
    input.textFile = options.input ?? null;
    input.csvFile = options.csv ?? null;
  }
  if (options.column !== undefined) input.column = options.column;
  if (options.maxImages !== undefined) input.maxImages = options.maxImages;
  if (options.shuffle !== undefined) input.shuffle = options.shuffle;

  if (options.maxWorkers !== undefined) download.maxWorkers = options.maxWorkers;
  if (options.maxAttempts !== undefined) download.maxAttempts = options.maxAttempts;
  if (options.sleepTime !== undefined) download.sleepTime = options.sleepTime;
  if (options.minSleepTime !== undefined) download.minSleepTime = options.minSleepTime;
  if (options.maxSleepTime !== undefined) download.maxSleepTime = options.maxSleepTime;
  if (options.randomSleepTime !== undefined) {
    download.randomSleepTime = options.randomSleepTime;
  }
  if (options.timeout !== undefined) download.taskTimeout = options.timeout;

  if (options.output !== undefined) output.directory = options.output;
  if (options.failedUrls !== undefined) output.failedUrlsFile = options.failedUrls;

  if (options.debug) logging.level = "debug";

  return HarvesterConfigSchema.parse(config);
}

export async function downloadCommand(opts: Options): Promise<void> {
  const spinner = ora({ text: "Initializing...", indent: 2 }).start();

  try {
    // Validate CLI options
    const options = DownloadOptionsSchema.parse(opts);

    // Load configuration (default → user → custom), then CLI options on top
    const { config: loaded, errors } = await loadConfig(options.config);
    const config = applyCliOptions(loaded, options);
    // Warnings print above the spinner instead of through it
    const logger = new Logger(config.logging.level, undefined, (print) => {
      const spinning = spinner.isSpinning;
      if (spinning) spinner.clear();
      print();
      if (spinning) spinner.render();
    });

    for (const err of errors) {
      const message = err.error instanceof Error ? err.error.message : String(err.error);
      logger.warn(`Ignoring config file ${err.path}: ${message}`);
    }

    // Info and debug output is a line per attempt; a spinner only gets in the way
    if (!config.logging.showProgress || logger.isEnabled("info")) {
      spinner.stop();
    } else {
      spinner.text = "Downloading...";
    }

    const harvester = new Harvester(config, {
      verbose: options.verbose,
      logger,
      onProgress: (completed, total) => {
        spinner.text = `Downloading... ${completed}/${total}`;
      },
    });
    const ctx = await harvester.run();

    // Clear and stop spinner before displaying stats
    spinner.clear();
    spinner.stop();

    await modules.stats(ctx);
  } catch (error) {
    spinner.fail("Download failed");
    console.error(error);
    process.exit(1);
  }
}
