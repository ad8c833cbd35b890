/**
 * Image Downloader & Writer
 * Fetches images over HTTP, decodes them to raw pixels and encodes them back to disk
 */

import { extname } from "node:path";
import sharp from "sharp";
import type { DecodedImage, Fetcher, Result, Sink, VoidResult } from "./types";
import { toError } from "./utils";

export interface ImageHandlerOptions {
  userAgent: string;
  requestTimeout: number; // In milliseconds
}

type OutputFormat = "jpeg" | "png" | "webp" | "gif" | "tiff" | "avif";

const FORMATS_BY_EXTENSION: Record<string, OutputFormat> = {
  ".jpg": "jpeg",
  ".jpeg": "jpeg",
  ".png": "png",
  ".webp": "webp",
  ".gif": "gif",
  ".tif": "tiff",
  ".tiff": "tiff",
  ".avif": "avif",
};

/**
 * Output format for a destination path; unknown extensions are written as PNG
 */
export function formatForPath(path: string): OutputFormat {
  return FORMATS_BY_EXTENSION[extname(path).toLowerCase()] ?? "png";
}

class DecodeError extends Error {
  override name = "DecodeError";
}

export class ImageHandler implements Fetcher, Sink {
  constructor(private options: ImageHandlerOptions) {}

  /**
   * Download an image and decode it. Non-2xx responses, network errors and
   * undecodable bodies all come back as failures.
   */
  async fetch(url: string, signal?: AbortSignal): Promise<Result<DecodedImage>> {
    const controller = new AbortController();
    const timeoutId = setTimeout(
      () => controller.abort(),
      this.options.requestTimeout,
    );
    const forwardAbort = (): void => controller.abort();
    signal?.addEventListener("abort", forwardAbort, { once: true });

    try {
      const response = await fetch(url, {
        headers: { "user-agent": this.options.userAgent },
        signal: controller.signal,
      });

      if (!response.ok) {
        throw new Error(`HTTP ${response.status}: ${response.statusText}`);
      }

      const buffer = Buffer.from(await response.arrayBuffer());
      return { ok: true, value: await decode(buffer) };
    } catch (error) {
      return { ok: false, error: toError(error) };
    } finally {
      clearTimeout(timeoutId);
      signal?.removeEventListener("abort", forwardAbort);
    }
  }

  /**
   * Encode raw pixels in the format implied by the path's extension and write the file
   */
  async store(image: DecodedImage, path: string): Promise<VoidResult> {
    try {
      await sharp(image.data, {
        raw: {
          width: image.width,
          height: image.height,
          channels: image.channels,
        },
      })
        .toFormat(formatForPath(path))
        .toFile(path);
      return { ok: true };
    } catch (error) {
      return { ok: false, error: toError(error) };
    }
  }
}

async function decode(buffer: Buffer): Promise<DecodedImage> {
  try {
    const { data, info } = await sharp(buffer)
      .raw()
      .toBuffer({ resolveWithObject: true });
    return {
      data,
      width: info.width,
      height: info.height,
      channels: info.channels,
    };
  } catch (error) {
    throw new DecodeError(toError(error).message);
  }
}
