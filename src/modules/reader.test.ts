import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm, writeFile } from "fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { readTextFile, readCsvColumn, selectUrls, read } from "./reader";
import { CompletionCounter, Logger, Tracker, loadDefaultConfig } from "../utils";
import { MemoryFileSystem, MemorySink, ScriptedFetcher } from "../testing/fakes";
import type { HarvestContext } from "../types";

describe("input files", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "image-harvester-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("reads one trimmed URL per line and drops blank lines", async () => {
    const path = join(dir, "urls.txt");
    await writeFile(path, "http://a/1.jpg\r\n  http://a/2.jpg  \n\n");

    expect(await readTextFile(path)).toEqual(["http://a/1.jpg", "http://a/2.jpg"]);
  });

  it("reads the named CSV column and drops empty cells", async () => {
    const path = join(dir, "urls.csv");
    await writeFile(path, "id,image_url\n1,http://a/1.jpg\n2,\n3,http://a/3.jpg\n");

    expect(await readCsvColumn(path, "image_url")).toEqual([
      "http://a/1.jpg",
      "http://a/3.jpg",
    ]);
  });

  it("rejects a CSV file without the column", async () => {
    const path = join(dir, "urls.csv");
    await writeFile(path, "id,link\n1,http://a/1.jpg\n");

    await expect(readCsvColumn(path, "image_url")).rejects.toThrow(
      `Column "image_url" not found in ${path}`,
    );
  });

  it("prefers the text file over the CSV file", async () => {
    const textFile = join(dir, "urls.txt");
    await writeFile(textFile, "http://a/from-text.jpg\n");

    const config = loadDefaultConfig();
    config.input.textFile = textFile;
    config.input.csvFile = join(dir, "missing.csv");
    const ctx = context(config);

    await read(ctx);

    expect(ctx.urls).toEqual(["http://a/from-text.jpg"]);
  });

  it("fails without any input source", async () => {
    await expect(read(context(loadDefaultConfig()))).rejects.toThrow(
      "No text file or CSV file given",
    );
  });
});

function context(config: HarvestContext["config"]): HarvestContext {
  const fs = new MemoryFileSystem();
  return {
    config,
    collaborators: { fetcher: new ScriptedFetcher(), sink: new MemorySink(fs), fs },
    logger: new Logger("error"),
    tracker: new Tracker(),
    counter: new CompletionCounter(),
  };
}

describe("selectUrls", () => {
  const urls = ["a", "b", "c", "d"];

  it("keeps everything when maxImages is not positive", () => {
    expect(selectUrls(urls, { maxImages: -1, shuffle: true })).toBe(urls);
  });

  it("truncates in order without shuffling", () => {
    expect(selectUrls(urls, { maxImages: 2, shuffle: false })).toEqual(["a", "b"]);
  });

  it("shuffles before truncating", () => {
    // random() = 0 swaps each position with the first: [d,b,c,a] -> [c,b,d,a] -> [b,c,d,a]
    expect(selectUrls(urls, { maxImages: 2, shuffle: true }, () => 0)).toEqual(["b", "c"]);
    expect(urls).toEqual(["a", "b", "c", "d"]);
  });
});
