/**
 * Candidate source files for batch operations
 */
import type { Stats } from "node:fs";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import { glob } from "glob";

import { debugBatch } from "../debug.js";
import { IoError } from "../errors.js";

/** Image extensions picked up from directories, compared case-insensitively */
export const SUPPORTED_EXTENSIONS: ReadonlySet<string> = new Set([
  "jpg",
  "jpeg",
  "png",
  "heic",
  "heif",
  "raw",
  "cr2",
  "nef",
  "arw",
  "dng",
  "tiff",
  "tif",
  "webp",
]);

export function isSupportedImage(fileName: string): boolean {
  return SUPPORTED_EXTENSIONS.has(path.extname(fileName).slice(1).toLowerCase());
}

/**
 * List source files under a path
 *
 * A file path yields itself, whatever its extension. A directory yields its
 * image files (one level, or the whole tree when recursive) and skips hidden
 * entries. Sidecars, backups and temp files never carry an image extension.
 * Sorted for stable output.
 *
 * @throws IoError when the path does not exist or cannot be listed
 */
export async function listSourceFiles(target: string, recursive: boolean): Promise<string[]> {
  let stat: Stats;
  try {
    stat = await fs.stat(target);
  } catch (error) {
    throw IoError.from(error, `Path not found: ${target}`);
  }

  if (stat.isFile()) {
    return [target];
  }
  if (!stat.isDirectory()) {
    throw new IoError(`Path is neither a file nor a directory: ${target}`);
  }

  let matches: string[];
  try {
    matches = await glob(recursive ? "**/*" : "*", {
      cwd: target,
      nodir: true,
      dot: false,
    });
  } catch (error) {
    throw IoError.from(error, `Failed to list ${target}`);
  }

  const files = matches
    .filter((relative) => isSupportedImage(relative))
    .map((relative) => path.join(target, relative))
    .sort();

  debugBatch("Found %d source files under %s (recursive: %s)", files.length, target, recursive);
  return files;
}
