/**
 * Sidecar health classification
 *
 * First match wins:
 *   1. no sidecar                       -> missing / rescan
 *   2. invalid JSON or schema violation -> corrupt / rescan
 *   3. content drift (hash, algorithm)  -> stale / rescan
 *   4. version drift (schema, models)   -> stale / migrate
 *   5. otherwise                        -> ok / noop
 *
 * Content drift dominates version drift: migration only reshapes facts that
 * are assumed correct, while a rescan re-derives a current-schema record.
 * mtime differences with a matching hash are reported but never make a
 * record stale on their own.
 */
import { schemaVersionsMatch } from "../schema-version.js";
import type { LoadedSidecar } from "../sidecar/store.js";
import type {
  Fingerprint,
  JsonValue,
  PipelineSignature,
  Sidecar,
  SuggestedAction,
  VerifyReason,
  VerifyStatus,
} from "../types.js";

export interface Verdict {
  status: VerifyStatus;
  reasons: VerifyReason[];
  suggested_action: SuggestedAction;
}

const CONTENT_DRIFT: ReadonlySet<VerifyReason> = new Set<VerifyReason>([
  "file_hash_changed",
  "hash_algorithm_mismatch",
]);

const VERSION_DRIFT: ReadonlySet<VerifyReason> = new Set<VerifyReason>([
  "schema_version_mismatch",
  "producer_version_mismatch",
]);

/** Reasons that are reported but never change the status */
export const INFORMATIONAL_REASONS: ReadonlySet<VerifyReason> = new Set<VerifyReason>([
  "file_touched_no_content_change",
  "file_mtime_regressed",
]);

/**
 * Verdict for a sidecar that is absent or cannot be decoded
 */
export function classifyUnreadable(loaded: Exclude<LoadedSidecar, { kind: "valid" }>): Verdict {
  switch (loaded.kind) {
    case "missing":
      return { status: "missing", reasons: ["sidecar_not_found"], suggested_action: "rescan" };
    case "syntax_error":
      return { status: "corrupt", reasons: ["invalid_json"], suggested_action: "rescan" };
    case "schema_error":
      return {
        status: "corrupt",
        reasons: [
          ...loaded.missingFields.map((f): VerifyReason => `missing_field:${f}`),
          ...loaded.invalidFields.map((f): VerifyReason => `invalid_field:${f}`),
        ],
        suggested_action: "rescan",
      };
  }
}

function hasEntries(value: JsonValue[] | undefined): boolean {
  return Array.isArray(value) && value.length > 0;
}

/**
 * Reasons derived from comparing the recorded source facts with the live file
 */
export function contentReasons(
  record: Sidecar,
  live: Fingerprint,
  current: PipelineSignature
): VerifyReason[] {
  if (record.pipeline_signature.hash_algorithm !== current.hash_algorithm) {
    return ["hash_algorithm_mismatch"];
  }
  if (record.source.file_hash_b3 !== live.hash_b3) {
    return ["file_hash_changed"];
  }

  const recordedMtime = Date.parse(record.source.file_modified_at);
  const liveMtime = Date.parse(live.modified_at);
  if (recordedMtime < liveMtime) {
    return ["file_touched_no_content_change"];
  }
  if (recordedMtime > liveMtime) {
    return ["file_mtime_regressed"];
  }
  return [];
}

/**
 * Reasons derived from comparing the recorded pipeline with the current one
 *
 * Schemas must match exactly. A model identifier only matters when the record
 * actually holds that feature's data and the current pipeline names a model.
 */
export function signatureReasons(record: Sidecar, current: PipelineSignature): VerifyReason[] {
  const reasons: VerifyReason[] = [];
  const recorded = record.pipeline_signature;

  if (
    !schemaVersionsMatch(recorded.schema_version, current.schema_version) ||
    !schemaVersionsMatch(record.schema_version, current.schema_version)
  ) {
    reasons.push("schema_version_mismatch");
  }

  const faceDrift =
    hasEntries(record.faces) &&
    current.face_model !== undefined &&
    recorded.face_model !== current.face_model;
  const tagDrift =
    hasEntries(record.tags) &&
    current.tag_model !== undefined &&
    recorded.tag_model !== current.tag_model;
  if (faceDrift || tagDrift) {
    reasons.push("producer_version_mismatch");
  }

  return reasons;
}

/**
 * Verdict for a decoded sidecar given the live fingerprint of its file
 */
export function classifyRecord(
  record: Sidecar,
  live: Fingerprint,
  current: PipelineSignature
): Verdict {
  const reasons = [...contentReasons(record, live, current), ...signatureReasons(record, current)];

  if (reasons.some((r) => CONTENT_DRIFT.has(r))) {
    return { status: "stale", reasons, suggested_action: "rescan" };
  }
  if (reasons.some((r) => VERSION_DRIFT.has(r))) {
    return { status: "stale", reasons, suggested_action: "migrate" };
  }
  return { status: "ok", reasons, suggested_action: "noop" };
}
