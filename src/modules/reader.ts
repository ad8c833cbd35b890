/**
 * Reader Module
 * Loads the URL list from a text or CSV file and applies the maxImages cap
 */

import { readFile } from "fs/promises";
import { parse } from "csv-parse";
import { z } from "zod";
import { shuffle } from "../utils";
import type { HarvestContext, InputConfig } from "../types";

const CsvRecordsSchema = z.array(z.record(z.string(), z.string()));

function parseCsv(content: string): Promise<unknown> {
  return new Promise((resolve, reject) => {
    parse(
      content,
      { columns: true, skip_empty_lines: true, trim: true, bom: true },
      (error, records) => {
        if (error) {
          reject(error);
        } else {
          resolve(records);
        }
      },
    );
  });
}

/**
 * One URL per line; surrounding whitespace and blank lines are dropped
 */
export async function readTextFile(path: string): Promise<string[]> {
  const content = await readFile(path, "utf-8");
  return content
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}

/**
 * URLs from one column of a CSV file with a header row
 */
export async function readCsvColumn(path: string, column: string): Promise<string[]> {
  const content = await readFile(path, "utf-8");
  const records = CsvRecordsSchema.parse(await parseCsv(content));

  if (records.length > 0 && !(column in records[0])) {
    throw new Error(`Column "${column}" not found in ${path}`);
  }

  return records
    .map((record) => record[column] ?? "")
    .filter((url) => url.length > 0);
}

/**
 * Keep the first `maxImages` URLs, shuffling first when asked.
 * A non-positive `maxImages` keeps every URL in order.
 */
export function selectUrls(
  urls: string[],
  options: Pick<InputConfig, "maxImages" | "shuffle">,
  random?: () => number,
): string[] {
  if (options.maxImages <= 0) {
    return urls;
  }
  const ordered = options.shuffle ? shuffle(urls, random) : urls;
  return ordered.slice(0, options.maxImages);
}

/**
 * Reads the configured input source and writes `ctx.urls`
 */
export async function read(ctx: HarvestContext): Promise<void> {
  const { input } = ctx.config;

  let urls: string[];
  if (input.textFile) {
    urls = await readTextFile(input.textFile);
  } else if (input.csvFile) {
    urls = await readCsvColumn(input.csvFile, input.column);
  } else {
    throw new Error("No text file or CSV file given");
  }

  ctx.urls = selectUrls(urls, input);

  if (ctx.urls.length < urls.length) {
    ctx.logger.warn(
      `${input.shuffle ? "Shuffled urls list and downloading" : "Downloading"} only ${ctx.urls.length} of ${urls.length} urls`,
    );
  }
}
