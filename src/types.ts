/**
 * Core type definitions for sidecar-keeper
 *
 * Wire types keep the snake_case keys of the on-disk JSON so that a decoded
 * record can be written back without a mapping layer.
 */

// ============================================================================
// JSON
// ============================================================================

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

/** RFC3339 timestamp, e.g. 2025-01-15T14:30:00.000Z */
export type Timestamp = string;

// ============================================================================
// Sidecar Record
// ============================================================================

/**
 * Configuration of the pipeline that produced a sidecar
 * Compared against the current pipeline to detect stale records
 */
export interface PipelineSignature {
  schema_version: string;
  producer_version: string;
  /** Hash algorithm of source.file_hash_b3 (always "blake3" for this build) */
  hash_algorithm: string;
  /** Face model used, present only when faces were computed */
  face_model?: string;
  /** Tag model used, present only when tags were computed */
  tag_model?: string;
  created_at: Timestamp;
}

/**
 * Identity of the source file at the time the sidecar was produced
 */
export interface SourceInfo {
  file_path: string;
  file_size_bytes: number;
  /** BLAKE3 of the file contents, 64 lowercase hex chars */
  file_hash_b3: string;
  file_modified_at: Timestamp;
}

/**
 * Versioned metadata record stored as `<file>.json`
 *
 * `image`, `faces`, `tags` and `thumbnails` belong to feature modules and are
 * carried through untouched unless a migration targets them. Unknown top-level
 * keys written by other producers are preserved as well.
 */
export interface Sidecar {
  schema_version: string;
  producer_version: string;
  created_at: Timestamp;
  updated_at: Timestamp;
  pipeline_signature: PipelineSignature;
  source: SourceInfo;
  image?: JsonObject;
  faces?: JsonValue[];
  tags?: JsonValue[];
  thumbnails?: JsonValue[];
  [extra: string]: JsonValue | PipelineSignature | SourceInfo | undefined;
}

/**
 * Content fingerprint of one file
 */
export interface Fingerprint {
  hash_b3: string;
  size_bytes: number;
  modified_at: Timestamp;
}

// ============================================================================
// Verification
// ============================================================================

export type VerifyStatus = "ok" | "stale" | "missing" | "corrupt";

export type SuggestedAction = "noop" | "rescan" | "migrate";

/**
 * Reasons attached to a verification result
 * Corrupt records additionally use `missing_field:<name>` and `invalid_field:<name>`
 */
export type VerifyReason =
  | "sidecar_not_found"
  | "invalid_json"
  | `missing_field:${string}`
  | `invalid_field:${string}`
  | "file_hash_changed"
  | "hash_algorithm_mismatch"
  | "file_touched_no_content_change"
  | "file_mtime_regressed"
  | "schema_version_mismatch"
  | "producer_version_mismatch";

export interface VerifyResult {
  /** Source file path */
  path: string;
  sidecar_path: string;
  status: VerifyStatus;
  reasons: VerifyReason[];
  suggested_action: SuggestedAction;
}

// ============================================================================
// Migration
// ============================================================================

export interface MigrationResult {
  /** Source file path */
  path: string;
  sidecar_path: string;
  from: string;
  to: string;
  migrated: boolean;
  dry_run: boolean;
  /** Path of the .bak1 written for this migration, null if none */
  backup_path: string | null;
}

// ============================================================================
// Scan
// ============================================================================

export interface ScanResult {
  /** Source file path */
  path: string;
  sidecar_path: string;
  /** Record that was (or, on a dry run, would have been) written */
  sidecar: Sidecar;
  written: boolean;
  dry_run: boolean;
  backup_path: string | null;
}

// ============================================================================
// Batch & Progress
// ============================================================================

export type ProgressEvent =
  | { type: "file_started"; path: string }
  | {
      type: "file_completed";
      path: string;
      success: boolean;
      error?: string;
      /** Size of the processed file, when the operation knows it */
      size_bytes?: number;
    };

export type ProgressListener = (event: ProgressEvent) => void;

/**
 * Timing wrapper applied at process boundaries (CLI output)
 */
export interface OperationResponse<T> {
  started_at: Timestamp;
  finished_at: Timestamp;
  duration_ms: number;
  data: T;
}
