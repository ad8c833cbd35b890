/**
 * Boundaries the download engine calls through.
 * Implementations report failures as values instead of throwing.
 */

export interface DecodedImage {
  data: Buffer; // Raw pixels, row-major, interleaved channels
  width: number;
  height: number;
  channels: 1 | 2 | 3 | 4;
}

export interface Failure {
  ok: false;
  error: Error;
}

export type Result<T> = { ok: true; value: T } | Failure;

export type VoidResult = { ok: true } | Failure;

export interface Fetcher {
  fetch(url: string, signal?: AbortSignal): Promise<Result<DecodedImage>>;
}

export interface Sink {
  store(image: DecodedImage, path: string): Promise<VoidResult>;
}

export interface FileSystem {
  exists(path: string): Promise<boolean>;
  /** Must succeed when the directory already exists */
  ensureDir(path: string): Promise<VoidResult>;
}

export interface Collaborators {
  fetcher: Fetcher;
  sink: Sink;
  fs: FileSystem;
}
