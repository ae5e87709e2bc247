/**
 * Post-processing of verification results (`--fix`, `--strict`)
 * Neither knob changes how a record is classified
 */
import { debugVerify } from "../debug.js";
import { fingerprint } from "../fingerprint.js";
import { writeSidecar } from "../persistence/atomic-write.js";
import { loadSidecar } from "../sidecar/store.js";
import type { VerifyResult } from "../types.js";
import { INFORMATIONAL_REASONS } from "./classify.js";

/**
 * Whether a result should fail the run
 * Under strict mode informational reasons count as failures too
 */
export function needsAttention(result: VerifyResult, strict: boolean): boolean {
  if (result.status !== "ok") {
    return true;
  }
  return strict && result.reasons.some((reason) => INFORMATIONAL_REASONS.has(reason));
}

export interface FixOptions {
  backup: boolean;
  now?: Date;
}

/**
 * Re-record the live mtime of a file whose content is unchanged
 *
 * Only results that are ok and carry `file_touched_no_content_change` are
 * rewritten; the hash is checked again right before writing.
 *
 * @returns true when the sidecar was rewritten
 */
export async function fixTouchedSidecar(
  result: VerifyResult,
  options: FixOptions
): Promise<boolean> {
  if (result.status !== "ok" || !result.reasons.includes("file_touched_no_content_change")) {
    return false;
  }

  const loaded = await loadSidecar(result.sidecar_path);
  if (loaded.kind !== "valid") {
    return false;
  }

  const live = await fingerprint(result.path);
  if (live.hash_b3 !== loaded.sidecar.source.file_hash_b3) {
    debugVerify.warn(`Content changed since verification, not fixing ${result.path}`);
    return false;
  }

  const updated = {
    ...loaded.sidecar,
    updated_at: (options.now ?? new Date()).toISOString(),
    source: { ...loaded.sidecar.source, file_modified_at: live.modified_at },
  };
  await writeSidecar(result.sidecar_path, updated, { backup: options.backup });

  debugVerify("Refreshed mtime for %s", result.path);
  return true;
}
