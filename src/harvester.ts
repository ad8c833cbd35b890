/**
 * Harvester - Pipeline orchestrator
 * Builds the run context and calls the pipeline modules in sequence
 */

import type {
  Collaborators,
  HarvestContext,
  HarvesterConfig,
  ProgressListener,
  RunSummary,
} from "./types";
import * as modules from "./modules";
import { ImageHandler } from "./image-handler";
import { CompletionCounter, Logger, Tracker, nodeFileSystem } from "./utils";

export interface HarvesterOptions {
  verbose?: boolean;
  logger?: Logger;
  collaborators?: Collaborators;
  onProgress?: ProgressListener;
}

/**
 * Default collaborators: HTTP + sharp for images, node:fs for the output folder
 */
export function createCollaborators(config: HarvesterConfig): Collaborators {
  const handler = new ImageHandler({
    userAgent: config.download.userAgent,
    requestTimeout: config.download.requestTimeout,
  });
  return { fetcher: handler, sink: handler, fs: nodeFileSystem };
}

export class Harvester {
  constructor(
    private config: HarvesterConfig,
    private options: HarvesterOptions = {},
  ) {}

  /**
   * Run the pipeline once. Every call gets a fresh tracker and counter.
   */
  async run(): Promise<HarvestContext & { summary: RunSummary }> {
    const ctx: HarvestContext = {
      config: this.config,
      collaborators: this.options.collaborators ?? createCollaborators(this.config),
      logger: this.options.logger ?? new Logger(this.config.logging.level),
      tracker: new Tracker(),
      counter: new CompletionCounter(),
      verbose: this.options.verbose,
      onProgress: this.options.onProgress,
    };

    await modules.read(ctx);
    await modules.dispatch(ctx);
    await modules.report(ctx);

    const { summary } = ctx;
    if (!summary) {
      throw new Error("Reporter module failed to populate the summary");
    }

    return { ...ctx, summary };
  }
}
