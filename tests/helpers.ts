/**
 * Shared fixtures for sidecar tests
 */
import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";

import { fingerprint } from "../src/fingerprint.js";
import { encodeSidecar } from "../src/sidecar/codec.js";
import { sidecarPathFor } from "../src/sidecar/paths.js";
import type { PipelineSignature, Sidecar } from "../src/types.js";

export const FIXED_TIME = "2025-01-15T14:30:00.000Z";
export const ZERO_HASH = "0".repeat(64);

export async function makeTempDir(prefix = "sidecar-keeper-test-"): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function removeTempDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}

export function makeSignature(overrides: Partial<PipelineSignature> = {}): PipelineSignature {
  return {
    schema_version: "1.1.0",
    producer_version: "0.1.0",
    hash_algorithm: "blake3",
    created_at: FIXED_TIME,
    ...overrides,
  };
}

/**
 * A valid record with placeholder source facts
 */
export function makeRecord(overrides: Partial<Sidecar> = {}): Sidecar {
  return {
    schema_version: "1.1.0",
    producer_version: "0.1.0",
    created_at: FIXED_TIME,
    updated_at: FIXED_TIME,
    pipeline_signature: makeSignature(),
    source: {
      file_path: "/photos/IMG_0001.JPG",
      file_size_bytes: 5,
      file_hash_b3: ZERO_HASH,
      file_modified_at: FIXED_TIME,
    },
    ...overrides,
  };
}

/**
 * Write a source file plus a sidecar matching its live fingerprint
 * `mutate` may adjust the record before it is written
 */
export async function writeTrackedFile(
  dir: string,
  name: string,
  content: string,
  mutate: (record: Sidecar) => Sidecar = (record) => record
): Promise<{ filePath: string; sidecarPath: string; record: Sidecar }> {
  const filePath = path.join(dir, name);
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, content);

  const live = await fingerprint(filePath);
  const record = mutate(
    makeRecord({
      source: {
        file_path: filePath,
        file_size_bytes: live.size_bytes,
        file_hash_b3: live.hash_b3,
        file_modified_at: live.modified_at,
      },
    })
  );

  const sidecarPath = sidecarPathFor(filePath);
  await fs.writeFile(sidecarPath, encodeSidecar(record));
  return { filePath, sidecarPath, record };
}

export async function readJson(filePath: string): Promise<unknown> {
  return JSON.parse(await fs.readFile(filePath, "utf-8"));
}
