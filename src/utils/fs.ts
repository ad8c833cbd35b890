/**
 * Filesystem Utilities
 * Shared filesystem helper functions
 */

import { access, mkdir } from "fs/promises";
import { constants } from "node:fs";
import type { FileSystem, VoidResult } from "../types";
import { toError } from "./to-error";

/**
 * Check if a file or directory exists
 *
 * @param path - Path to check
 * @returns True if file/directory exists, false otherwise
 */
export async function fileExists(path: string): Promise<boolean> {
  try {
    await access(path, constants.F_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Create a directory and its parents.
 * Concurrent callers racing on the same path all succeed.
 */
export async function ensureDir(path: string): Promise<VoidResult> {
  try {
    await mkdir(path, { recursive: true });
    return { ok: true };
  } catch (error) {
    return { ok: false, error: toError(error) };
  }
}

export const nodeFileSystem: FileSystem = {
  exists: fileExists,
  ensureDir,
};
