/**
 * Sidecar file naming
 *
 *   IMG_1234.JPG            source file (never modified)
 *   IMG_1234.JPG.json       sidecar
 *   IMG_1234.JPG.json.bak1  most recent prior version
 *   IMG_1234.JPG.json.bak2
 *   IMG_1234.JPG.json.bak3  oldest retained version
 *   IMG_1234.JPG.json.tmp   in-flight write
 */

export const SIDECAR_SUFFIX = ".json";
export const TEMP_SUFFIX = ".tmp";

/** Number of backup slots kept per sidecar */
export const MAX_BACKUPS = 3;

export function sidecarPathFor(filePath: string): string {
  return `${filePath}${SIDECAR_SUFFIX}`;
}

/**
 * Path of backup slot n (1 = newest) for a sidecar path
 */
export function backupPath(sidecarPath: string, slot: number): string {
  if (!Number.isInteger(slot) || slot < 1 || slot > MAX_BACKUPS) {
    throw new RangeError(`Backup slot must be 1..${MAX_BACKUPS}, got ${slot}`);
  }
  return `${sidecarPath}.bak${slot}`;
}

/**
 * All backup paths for a sidecar, newest first
 */
export function backupPaths(sidecarPath: string): string[] {
  return Array.from({ length: MAX_BACKUPS }, (_, i) => backupPath(sidecarPath, i + 1));
}

export function tempPathFor(sidecarPath: string): string {
  return `${sidecarPath}${TEMP_SUFFIX}`;
}
