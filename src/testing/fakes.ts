/**
 * In-memory collaborators for tests
 */

import type {
  DecodedImage,
  DownloadConfig,
  Failure,
  Fetcher,
  FileSystem,
  Result,
  Sink,
  VoidResult,
} from "../types";

export const PIXEL: DecodedImage = {
  data: Buffer.from([255, 0, 0]),
  width: 1,
  height: 1,
  channels: 3,
};

export function failure(message: string): Failure {
  return { ok: false, error: new Error(message) };
}

export function downloadConfig(overrides: Partial<DownloadConfig> = {}): DownloadConfig {
  return {
    maxWorkers: 1,
    maxAttempts: 3,
    sleepTime: 0,
    minSleepTime: 0,
    maxSleepTime: 0,
    randomSleepTime: false,
    taskTimeout: null,
    requestTimeout: 1000,
    userAgent: "test-agent",
    ...overrides,
  };
}

/**
 * Files "written" by MemorySink show up in exists()
 */
export class MemoryFileSystem implements FileSystem {
  readonly files = new Map<string, DecodedImage>();
  readonly dirs = new Set<string>();

  async exists(path: string): Promise<boolean> {
    return this.files.has(path) || this.dirs.has(path);
  }

  async ensureDir(path: string): Promise<VoidResult> {
    this.dirs.add(path);
    return { ok: true };
  }
}

export class MemorySink implements Sink {
  readonly calls: string[] = [];

  constructor(
    private fs: MemoryFileSystem,
    private failures = 0, // Fail this many calls before succeeding
  ) {}

  async store(image: DecodedImage, path: string): Promise<VoidResult> {
    this.calls.push(path);
    if (this.calls.length <= this.failures) {
      return failure("disk full");
    }
    this.fs.files.set(path, image);
    return { ok: true };
  }
}

type FetchBehavior = (
  url: string,
  call: number,
  signal?: AbortSignal,
) => Promise<Result<DecodedImage>> | Result<DecodedImage>;

/**
 * Fetcher whose answer per URL comes from a callback; counts calls per URL
 */
export class ScriptedFetcher implements Fetcher {
  readonly calls: string[] = [];

  constructor(private behavior: FetchBehavior = () => ({ ok: true, value: PIXEL })) {}

  async fetch(url: string, signal?: AbortSignal): Promise<Result<DecodedImage>> {
    this.calls.push(url);
    return this.behavior(url, this.callsFor(url), signal);
  }

  callsFor(url: string): number {
    return this.calls.filter((called) => called === url).length;
  }
}
