#!/usr/bin/env node

/**
 * CLI entry point for the image harvester
 * Handles command-line argument parsing and user interaction
 */

import { Command } from "commander";
import { downloadCommand } from "./commands/download";
import { configCommand } from "./commands/config";

const program = new Command();

program
  .name("image-harvester")
  .description("Download images from a list of URLs with bounded retries")
  .version("0.1.0");

// Main download command (default action)
program
  .option("-i, --input <path>", "Text file containing one URL per line")
  .option("--csv <path>", "CSV file containing image URLs")
  .option("--column <name>", "CSV column containing image URLs")
  .option("-o, --output <path>", "Folder the images are saved in")
  .option("-w, --max-workers <n>", "Maximum number of concurrent downloads")
  .option("-a, --max-attempts <n>", "Attempts per URL before it is marked as failed")
  .option("--sleep-time <seconds>", "Seconds to wait before each attempt")
  .option("--min-sleep-time <seconds>", "Lower bound of the random wait")
  .option("--max-sleep-time <seconds>", "Upper bound of the random wait")
  .option("--random-sleep-time", "Wait a random time between the bounds instead of --sleep-time")
  .option("--timeout <seconds>", "Per-URL timeout (defaults to max wait x attempts, 0 disables)")
  .option("-n, --max-images <n>", "Only download the first n URLs")
  .option("--shuffle", "Shuffle URLs before applying --max-images")
  .option("--failed-urls <path>", "Where failed URLs are written")
  .option("-c, --config <path>", "Path to custom config file")
  .option("-v, --verbose", "List failed URLs and their last error")
  .option("--debug", "Log debug information")
  .action(downloadCommand);

// Config command - show config location
program
  .command("config")
  .description("Show configuration file location")
  .action(configCommand);

program.parse();
