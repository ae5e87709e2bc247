/**
 * Verification engine
 * Classifies the health of sidecars for a file or a directory tree
 */
import { type BatchOptions, type BatchReport, runBatch } from "../batch/runner.js";
import { listSourceFiles } from "../batch/walker.js";
import { getConcurrency, getCurrentSignature } from "../config.js";
import { debugVerify } from "../debug.js";
import { fingerprint } from "../fingerprint.js";
import { sidecarPathFor } from "../sidecar/paths.js";
import { loadSidecar } from "../sidecar/store.js";
import type { PipelineSignature, ProgressListener, VerifyResult } from "../types.js";
import { classifyRecord, classifyUnreadable } from "./classify.js";

export interface VerifyOptions {
  /** Pipeline to compare against (defaults to the current build's) */
  signature?: PipelineSignature;
}

export interface VerifyPathOptions extends VerifyOptions {
  recursive: boolean;
  concurrency?: number;
  onProgress?: ProgressListener;
}

/**
 * Verify the sidecar of one source file
 *
 * @throws IoError when the sidecar exists but is unreadable, or when the
 *   source file cannot be fingerprinted
 */
export async function verifyFile(
  filePath: string,
  options: VerifyOptions = {}
): Promise<VerifyResult> {
  const sidecarPath = sidecarPathFor(filePath);
  const loaded = await loadSidecar(sidecarPath);

  if (loaded.kind !== "valid") {
    const verdict = classifyUnreadable(loaded);
    debugVerify("%s: %s [%s]", filePath, verdict.status, verdict.reasons.join(", "));
    return { path: filePath, sidecar_path: sidecarPath, ...verdict };
  }

  const current = options.signature ?? getCurrentSignature();
  const live = await fingerprint(filePath);
  const verdict = classifyRecord(loaded.sidecar, live, current);

  debugVerify("%s: %s [%s]", filePath, verdict.status, verdict.reasons.join(", "));
  return { path: filePath, sidecar_path: sidecarPath, ...verdict };
}

/**
 * Verify every source file under a path
 * Per-file failures are collected in the report instead of aborting the run
 *
 * @throws IoError only when the path itself cannot be listed
 */
export async function verifyPath(
  target: string,
  options: VerifyPathOptions
): Promise<BatchReport<VerifyResult>> {
  const files = await listSourceFiles(target, options.recursive);
  const signature = options.signature ?? getCurrentSignature();
  const batchOptions: BatchOptions<VerifyResult> = {
    concurrency: options.concurrency ?? getConcurrency(),
    onProgress: options.onProgress,
  };

  return runBatch(files, (filePath) => verifyFile(filePath, { signature }), batchOptions);
}
