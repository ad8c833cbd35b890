import { posix } from "node:path";

const FALLBACK_NAME = "image";

function decodeName(name: string): string {
  try {
    return decodeURIComponent(name);
  } catch {
    return name; // Malformed escape sequence
  }
}

/**
 * Derive the destination file name from a URL
 * Uses the basename of the path component, so query strings and fragments are dropped
 *
 * @example
 * fileNameFromUrl("https://cdn.example.com/a/cat.jpg?w=200") // => "cat.jpg"
 */
export function fileNameFromUrl(url: string): string {
  let pathname: string;
  try {
    pathname = new URL(url).pathname;
  } catch {
    pathname = url;
  }

  // Decoded separators would escape the output folder
  const name = decodeName(posix.basename(pathname)).replace(/[\\/]/g, "_");
  return name && name !== "." && name !== ".." ? name : FALLBACK_NAME;
}
