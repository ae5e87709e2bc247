/**
 * JSON Schema validation for sidecar records
 */
import { Ajv, type ErrorObject } from "ajv";
import addFormatsPlugin from "ajv-formats";

import { SEMVER_PATTERN } from "../schema-version.js";
import type { Sidecar } from "../types.js";

// ajv-formats ships CommonJS; under NodeNext the plugin function sits on .default
const addFormats = addFormatsPlugin.default;

const timestamp = { type: "string", format: "date-time" } as const;
const semver = { type: "string", pattern: SEMVER_PATTERN } as const;
const nonEmptyString = { type: "string", minLength: 1 } as const;

/**
 * JSON Schema for `<file>.json` sidecars
 * Unknown keys are allowed everywhere so newer producers' fields survive a rewrite
 */
export const sidecarSchema = {
  $schema: "http://json-schema.org/draft-07/schema#",
  type: "object",
  required: [
    "schema_version",
    "producer_version",
    "created_at",
    "updated_at",
    "pipeline_signature",
    "source",
  ],
  properties: {
    schema_version: { ...semver, description: "Sidecar schema version" },
    producer_version: { ...nonEmptyString, description: "Version of the producing tool" },
    created_at: timestamp,
    updated_at: timestamp,
    pipeline_signature: {
      type: "object",
      required: ["schema_version", "producer_version", "hash_algorithm", "created_at"],
      properties: {
        schema_version: semver,
        producer_version: nonEmptyString,
        hash_algorithm: nonEmptyString,
        face_model: nonEmptyString,
        tag_model: nonEmptyString,
        created_at: timestamp,
      },
    },
    source: {
      type: "object",
      required: ["file_path", "file_size_bytes", "file_hash_b3", "file_modified_at"],
      properties: {
        file_path: nonEmptyString,
        file_size_bytes: { type: "integer", minimum: 0 },
        file_hash_b3: {
          type: "string",
          pattern: "^[0-9a-f]{64}$",
          description: "BLAKE3 hash, 64 lowercase hex chars",
        },
        file_modified_at: timestamp,
      },
    },
    image: { type: "object", description: "Image metadata (feature module)" },
    faces: { type: "array", description: "Face detections (feature module)" },
    tags: { type: "array", description: "Tags (feature module)" },
    thumbnails: { type: "array", description: "Thumbnails (feature module)" },
  },
};

/**
 * Field paths in the order reasons are reported
 * Matches the key order produced by the encoder
 */
export const FIELD_ORDER = [
  "schema_version",
  "producer_version",
  "created_at",
  "updated_at",
  "pipeline_signature",
  "pipeline_signature.schema_version",
  "pipeline_signature.producer_version",
  "pipeline_signature.hash_algorithm",
  "pipeline_signature.face_model",
  "pipeline_signature.tag_model",
  "pipeline_signature.created_at",
  "source",
  "source.file_path",
  "source.file_size_bytes",
  "source.file_hash_b3",
  "source.file_modified_at",
  "image",
  "faces",
  "tags",
  "thumbnails",
] as const;

export interface SchemaViolations {
  missingFields: string[];
  invalidFields: string[];
}

/**
 * Create the sidecar validator
 */
export function createSidecarValidator() {
  const ajv = new Ajv({ allErrors: true, strict: true });
  addFormats(ajv);
  return ajv.compile<Sidecar>(sidecarSchema);
}

let cachedValidator: ReturnType<typeof createSidecarValidator> | null = null;

function getValidator() {
  if (!cachedValidator) {
    cachedValidator = createSidecarValidator();
  }
  return cachedValidator;
}

/** "/source/file_hash_b3" -> "source.file_hash_b3" */
function toFieldPath(instancePath: string, child?: string): string {
  const segments = instancePath.split("/").filter((s) => s.length > 0);
  if (child) {
    segments.push(child);
  }
  return segments.join(".");
}

function fieldRank(field: string): number {
  const index = FIELD_ORDER.findIndex((f) => f === field);
  return index === -1 ? FIELD_ORDER.length : index;
}

function sortFields(fields: Iterable<string>): string[] {
  return [...new Set(fields)].sort((a, b) => fieldRank(a) - fieldRank(b) || a.localeCompare(b));
}

function collectViolations(errors: ErrorObject[]): SchemaViolations {
  const missing: string[] = [];
  const invalid: string[] = [];

  for (const error of errors) {
    if (error.keyword === "required") {
      const property: unknown = error.params.missingProperty;
      if (typeof property === "string") {
        missing.push(toFieldPath(error.instancePath, property));
      }
    } else {
      invalid.push(toFieldPath(error.instancePath));
    }
  }

  return { missingFields: sortFields(missing), invalidFields: sortFields(invalid) };
}

/**
 * Validate a parsed JSON object against the sidecar schema
 * Returns the typed record, or the offending field paths
 */
export function validateSidecar(
  data: unknown
): { valid: true; sidecar: Sidecar } | ({ valid: false } & SchemaViolations) {
  const validate = getValidator();

  if (validate(data)) {
    return { valid: true, sidecar: data };
  }

  return { valid: false, ...collectViolations(validate.errors ?? []) };
}
