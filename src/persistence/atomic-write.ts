/**
 * Atomic sidecar persistence
 *
 * Write sequence:
 *   1. encode
 *   2. write `<sidecar>.tmp` in the same directory
 *   3. fsync the temp file
 *   4. rotate backups (when requested and a sidecar already exists)
 *   5. rename temp over the sidecar, then fsync the directory
 *
 * Readers never lock: the rename means they see either the old or the new
 * record in full. Anything failing before step 5 leaves the sidecar as it was.
 * At most one writer per sidecar path is assumed.
 */
import * as fs from "node:fs/promises";
import * as path from "node:path";

import { debugPersist } from "../debug.js";
import { IoError, isNotFound } from "../errors.js";
import { encodeSidecar } from "../sidecar/codec.js";
import { tempPathFor } from "../sidecar/paths.js";
import type { Sidecar } from "../types.js";
import { rotateBackups } from "./backup-rotation.js";

export interface WriteOptions {
  /** Keep the previous version in `.bak1` (shifting older backups) */
  backup: boolean;
}

export interface WriteOutcome {
  /** Sidecar path that now holds the new record */
  path: string;
  /** `.bak1` written by this call, null when no backup was taken */
  backupPath: string | null;
}

async function writeDurably(filePath: string, content: string): Promise<void> {
  const handle = await fs.open(filePath, "w");
  try {
    await handle.writeFile(content, "utf-8");
    await handle.sync();
  } finally {
    await handle.close();
  }
}

/**
 * fsync a directory so a completed rename survives power loss
 * Windows cannot open directories for syncing; NTFS journals renames itself
 */
async function syncDirectory(dirPath: string): Promise<void> {
  if (process.platform === "win32") {
    return;
  }
  const handle = await fs.open(dirPath, "r");
  try {
    await handle.sync();
  } finally {
    await handle.close();
  }
}

async function removeTemp(tempPath: string): Promise<void> {
  try {
    await fs.rm(tempPath, { force: true });
  } catch (error) {
    debugPersist.error(`Failed to remove temp file ${tempPath}`, error);
  }
}

/**
 * Write a sidecar record atomically
 *
 * @param sidecarPath - Target `<file>.json` path
 * @throws IoError on any filesystem failure; the existing sidecar is untouched
 */
export async function writeSidecar(
  sidecarPath: string,
  sidecar: Sidecar,
  options: WriteOptions
): Promise<WriteOutcome> {
  const content = encodeSidecar(sidecar);
  const tempPath = tempPathFor(sidecarPath);

  try {
    await writeDurably(tempPath, content);
  } catch (error) {
    await removeTemp(tempPath);
    throw IoError.from(error, `Failed to write ${tempPath}`);
  }

  let backup: string | null = null;
  if (options.backup) {
    try {
      backup = await rotateBackups(sidecarPath);
    } catch (error) {
      await removeTemp(tempPath);
      throw error;
    }
  }

  try {
    await fs.rename(tempPath, sidecarPath);
  } catch (error) {
    await removeTemp(tempPath);
    throw IoError.from(error, `Failed to commit ${sidecarPath}`);
  }

  try {
    await syncDirectory(path.dirname(sidecarPath));
  } catch (error) {
    // The rename already happened; only its durability across power loss is in doubt
    debugPersist.warn(`Directory fsync failed for ${sidecarPath}: ${error instanceof Error ? error.message : String(error)}`);
  }

  debugPersist("Wrote %s (backup: %s)", sidecarPath, backup ?? "none");
  return { path: sidecarPath, backupPath: backup };
}

/**
 * Read raw sidecar bytes
 *
 * @returns File contents, or null when no sidecar exists
 * @throws IoError when the sidecar exists but cannot be read
 */
export async function readSidecarBytes(sidecarPath: string): Promise<Buffer | null> {
  try {
    return await fs.readFile(sidecarPath);
  } catch (error) {
    if (isNotFound(error)) {
      return null;
    }
    throw IoError.from(error, `Failed to read ${sidecarPath}`);
  }
}
