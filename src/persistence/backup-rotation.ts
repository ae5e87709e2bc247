/**
 * Backup rotation for sidecars
 *
 * Slots are `.bak1` (newest) to `.bak3` (oldest). Rotation shifts existing
 * backups down only as far as the first empty slot, so a gap left by an
 * interrupted run is filled rather than carried along, then copies the current
 * sidecar into `.bak1`. The sidecar itself is only read, never moved.
 */
import * as fs from "node:fs/promises";

import { debugPersist } from "../debug.js";
import { IoError, isNotFound } from "../errors.js";
import { MAX_BACKUPS, backupPath, backupPaths } from "../sidecar/paths.js";

async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

/**
 * Rotate backups and copy the current sidecar into `.bak1`
 *
 * @returns Path of the new `.bak1`, or null when there was no sidecar to back up
 * @throws IoError if any rename or copy fails
 */
export async function rotateBackups(sidecarPath: string): Promise<string | null> {
  if (!(await fileExists(sidecarPath))) {
    return null;
  }

  // First empty slot; when all are taken the oldest (.bak3) gets overwritten
  let firstFree = MAX_BACKUPS;
  for (let slot = 1; slot <= MAX_BACKUPS; slot++) {
    if (!(await fileExists(backupPath(sidecarPath, slot)))) {
      firstFree = slot;
      break;
    }
  }

  for (let slot = firstFree - 1; slot >= 1; slot--) {
    const from = backupPath(sidecarPath, slot);
    const to = backupPath(sidecarPath, slot + 1);
    try {
      await fs.rename(from, to);
      debugPersist("Rotated %s -> %s", from, to);
    } catch (error) {
      throw IoError.from(error, `Failed to rotate backup ${from}`);
    }
  }

  const bak1 = backupPath(sidecarPath, 1);
  try {
    await fs.copyFile(sidecarPath, bak1);
  } catch (error) {
    if (isNotFound(error)) {
      debugPersist.warn(`Sidecar vanished before backup: ${sidecarPath}`);
      return null;
    }
    throw IoError.from(error, `Failed to back up ${sidecarPath}`);
  }

  return bak1;
}

/**
 * Backups that currently exist for a sidecar, newest first
 */
export async function listBackups(sidecarPath: string): Promise<string[]> {
  const existing: string[] = [];
  for (const candidate of backupPaths(sidecarPath)) {
    if (await fileExists(candidate)) {
      existing.push(candidate);
    }
  }
  return existing;
}
