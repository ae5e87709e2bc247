/**
 * Read-side access to a file's sidecar
 */
import { readSidecarBytes } from "../persistence/atomic-write.js";
import { type DecodeResult, decodeSidecar } from "./codec.js";

export type LoadedSidecar = { kind: "missing" } | DecodeResult;

/**
 * Load and decode the sidecar at `sidecarPath`
 *
 * @throws IoError when the sidecar exists but cannot be read
 */
export async function loadSidecar(sidecarPath: string): Promise<LoadedSidecar> {
  const bytes = await readSidecarBytes(sidecarPath);
  if (bytes === null) {
    return { kind: "missing" };
  }
  return decodeSidecar(bytes);
}

/**
 * One-line description of why a loaded sidecar is unusable
 */
export function describeUnusable(loaded: Exclude<LoadedSidecar, { kind: "valid" }>): string {
  switch (loaded.kind) {
    case "missing":
      return "sidecar not found";
    case "syntax_error":
      return `invalid JSON (${loaded.message})`;
    case "schema_error": {
      const parts = [
        ...loaded.missingFields.map((f) => `missing ${f}`),
        ...loaded.invalidFields.map((f) => `invalid ${f}`),
      ];
      return `schema violation: ${parts.join(", ")}`;
    }
  }
}
