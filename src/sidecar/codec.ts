/**
 * Sidecar codec
 *
 * decode never throws: a sidecar is valid, syntactically broken, or well-formed
 * JSON missing/mistyping mandatory fields. The verification engine relies on
 * that split to tell "corrupt" from "stale" without parsing anything itself.
 */
import { debugCodec } from "../debug.js";
import type { Sidecar } from "../types.js";
import { validateSidecar } from "./schema.js";

export type DecodeResult =
  | { kind: "valid"; sidecar: Sidecar }
  | { kind: "syntax_error"; message: string }
  | { kind: "schema_error"; missingFields: string[]; invalidFields: string[] };

const TOP_LEVEL_ORDER = [
  "schema_version",
  "producer_version",
  "created_at",
  "updated_at",
  "pipeline_signature",
  "source",
  "image",
  "faces",
  "tags",
  "thumbnails",
];

const SIGNATURE_ORDER = [
  "schema_version",
  "producer_version",
  "hash_algorithm",
  "face_model",
  "tag_model",
  "created_at",
];

const SOURCE_ORDER = ["file_path", "file_size_bytes", "file_hash_b3", "file_modified_at"];

const utf8 = new TextDecoder("utf-8", { fatal: true });

/**
 * Parse sidecar bytes
 */
export function decodeSidecar(input: string | Uint8Array): DecodeResult {
  let text: string;
  try {
    text = typeof input === "string" ? input : utf8.decode(input);
  } catch {
    return { kind: "syntax_error", message: "Sidecar is not valid UTF-8" };
  }

  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    debugCodec("JSON parse failed: %s", message);
    return { kind: "syntax_error", message };
  }

  if (data === null || typeof data !== "object" || Array.isArray(data)) {
    return { kind: "syntax_error", message: "Sidecar root is not a JSON object" };
  }

  const validation = validateSidecar(data);
  if (validation.valid) {
    return { kind: "valid", sidecar: validation.sidecar };
  }

  debugCodec(
    "Schema violations: missing=[%s] invalid=[%s]",
    validation.missingFields.join(", "),
    validation.invalidFields.join(", ")
  );
  return {
    kind: "schema_error",
    missingFields: validation.missingFields,
    invalidFields: validation.invalidFields,
  };
}

/**
 * Copy an object with known keys first (in the given order), then any other
 * keys alphabetically. Undefined values are dropped.
 *
 * Extra keys come straight from JSON and may be named `__proto__` or
 * `constructor`, so child orders live in a Map and the copy is built with
 * Object.fromEntries, which defines own properties only.
 */
function orderKeys(
  value: object,
  order: readonly string[],
  nested: ReadonlyMap<string, readonly string[]> = new Map()
): Record<string, unknown> {
  const entries = new Map<string, unknown>(Object.entries(value));
  const extras = [...entries.keys()].filter((k) => !order.includes(k)).sort();
  const ordered: Array<[string, unknown]> = [];

  for (const key of [...order, ...extras]) {
    const field = entries.get(key);
    if (field === undefined) continue;

    const childOrder = nested.get(key);
    ordered.push([
      key,
      childOrder && field !== null && typeof field === "object" && !Array.isArray(field)
        ? orderKeys(field, childOrder)
        : field,
    ]);
  }

  return Object.fromEntries(ordered);
}

/**
 * Serialize a sidecar with stable key order, 2-space indentation and a
 * trailing newline. Feature-module sections keep their own key order.
 */
export function encodeSidecar(sidecar: Sidecar): string {
  const ordered = orderKeys(
    sidecar,
    TOP_LEVEL_ORDER,
    new Map([
      ["pipeline_signature", SIGNATURE_ORDER],
      ["source", SOURCE_ORDER],
    ])
  );
  return `${JSON.stringify(ordered, null, 2)}\n`;
}
