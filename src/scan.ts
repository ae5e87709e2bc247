/**
 * Scan writer
 *
 * Produces a current-schema sidecar for a source file from its live
 * fingerprint. Feature data (image, faces, tags, thumbnails and unknown keys)
 * from an existing record is kept only while it still describes the same
 * content under the same schema; otherwise it is dropped for the feature
 * modules to recompute.
 */
import { type BatchReport, runBatch } from "./batch/runner.js";
import { listSourceFiles } from "./batch/walker.js";
import { getConcurrency, getCurrentSignature } from "./config.js";
import { debugScan } from "./debug.js";
import { fingerprint } from "./fingerprint.js";
import { writeSidecar } from "./persistence/atomic-write.js";
import { schemaVersionsMatch } from "./schema-version.js";
import { sidecarPathFor } from "./sidecar/paths.js";
import { loadSidecar } from "./sidecar/store.js";
import type {
  Fingerprint,
  PipelineSignature,
  ProgressListener,
  ScanResult,
  Sidecar,
} from "./types.js";

export interface ScanOptions {
  dryRun: boolean;
  backup: boolean;
  /** Pipeline to record (defaults to the current build's) */
  signature?: PipelineSignature;
  now?: Date;
}

export interface ScanPathOptions extends ScanOptions {
  recursive: boolean;
  concurrency?: number;
  onProgress?: ProgressListener;
}

const CORE_KEYS = new Set([
  "schema_version",
  "producer_version",
  "created_at",
  "updated_at",
  "pipeline_signature",
  "source",
]);

function carriesOver(existing: Sidecar, live: Fingerprint, signature: PipelineSignature): boolean {
  return (
    existing.source.file_hash_b3 === live.hash_b3 &&
    existing.pipeline_signature.hash_algorithm === signature.hash_algorithm &&
    schemaVersionsMatch(existing.schema_version, signature.schema_version) &&
    schemaVersionsMatch(existing.pipeline_signature.schema_version, signature.schema_version)
  );
}

/**
 * Assemble the record to write
 * Model identifiers are only recorded next to the feature data they produced
 */
export function buildSidecar(
  filePath: string,
  live: Fingerprint,
  signature: PipelineSignature,
  existing: Sidecar | null,
  now: Date
): Sidecar {
  const timestamp = now.toISOString();
  const keep = existing !== null && carriesOver(existing, live, signature);

  const pipeline: PipelineSignature = {
    schema_version: signature.schema_version,
    producer_version: signature.producer_version,
    hash_algorithm: signature.hash_algorithm,
    created_at: signature.created_at,
  };

  const sidecar: Sidecar = {
    schema_version: signature.schema_version,
    producer_version: signature.producer_version,
    created_at: existing?.created_at ?? timestamp,
    updated_at: timestamp,
    pipeline_signature: pipeline,
    source: {
      file_path: filePath,
      file_size_bytes: live.size_bytes,
      file_hash_b3: live.hash_b3,
      file_modified_at: live.modified_at,
    },
  };

  if (keep && existing) {
    for (const [key, value] of Object.entries(existing)) {
      if (!CORE_KEYS.has(key) && value !== undefined) {
        sidecar[key] = value;
      }
    }
    if (existing.faces?.length && existing.pipeline_signature.face_model) {
      pipeline.face_model = existing.pipeline_signature.face_model;
    }
    if (existing.tags?.length && existing.pipeline_signature.tag_model) {
      pipeline.tag_model = existing.pipeline_signature.tag_model;
    }
  }

  return sidecar;
}

/**
 * Fingerprint a file and write its sidecar
 *
 * An existing sidecar that cannot be decoded is replaced (and, with backups
 * on, kept as `.bak1`).
 *
 * @throws IoError when the file cannot be read or the sidecar cannot be written
 */
export async function scanFile(filePath: string, options: ScanOptions): Promise<ScanResult> {
  const sidecarPath = sidecarPathFor(filePath);
  const now = options.now ?? new Date();
  const signature = options.signature ?? getCurrentSignature({}, now);

  const live = await fingerprint(filePath);
  const loaded = await loadSidecar(sidecarPath);
  const existing = loaded.kind === "valid" ? loaded.sidecar : null;
  if (loaded.kind === "syntax_error" || loaded.kind === "schema_error") {
    debugScan.warn(`Replacing unreadable sidecar ${sidecarPath}`);
  }

  const sidecar = buildSidecar(filePath, live, signature, existing, now);
  const result: ScanResult = {
    path: filePath,
    sidecar_path: sidecarPath,
    sidecar,
    written: false,
    dry_run: options.dryRun,
    backup_path: null,
  };

  if (options.dryRun) {
    debugScan("%s: dry run, nothing written", filePath);
    return result;
  }

  const outcome = await writeSidecar(sidecarPath, sidecar, { backup: options.backup });
  debugScan("%s: wrote %s", filePath, sidecarPath);
  return { ...result, written: true, backup_path: outcome.backupPath };
}

/**
 * Scan every source file under a path
 * Per-file failures are collected in the report instead of aborting the run
 *
 * @throws IoError only when the path itself cannot be listed
 */
export async function scanPath(
  target: string,
  options: ScanPathOptions
): Promise<BatchReport<ScanResult>> {
  const files = await listSourceFiles(target, options.recursive);
  const signature = options.signature ?? getCurrentSignature({}, options.now);

  return runBatch(files, (filePath) => scanFile(filePath, { ...options, signature }), {
    concurrency: options.concurrency ?? getConcurrency(),
    onProgress: options.onProgress,
    sizeOf: (result) => result.sidecar.source.file_size_bytes,
  });
}
