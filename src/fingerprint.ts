/**
 * Fingerprint service
 * Content hash (BLAKE3) plus size and modification time of a single file
 */
import { createReadStream, type Stats } from "node:fs";
import * as fs from "node:fs/promises";
import { blake3 } from "@noble/hashes/blake3";
import { bytesToHex } from "@noble/hashes/utils";

import { debugFingerprint } from "./debug.js";
import { InternalError, IoError } from "./errors.js";
import type { Fingerprint } from "./types.js";

/** Read size for streaming the file through the hasher */
const CHUNK_SIZE = 64 * 1024;

/**
 * Hash a byte buffer with BLAKE3, returning 64 lowercase hex chars
 */
export function hashBytes(bytes: Uint8Array): string {
  return bytesToHex(blake3(bytes));
}

/**
 * Stream a file through BLAKE3
 */
async function hashFile(filePath: string): Promise<string> {
  const hasher = blake3.create({});
  const stream = createReadStream(filePath, { highWaterMark: CHUNK_SIZE });

  try {
    for await (const chunk of stream) {
      if (!(chunk instanceof Uint8Array)) {
        throw new InternalError(`Unexpected chunk type while hashing ${filePath}`);
      }
      hasher.update(chunk);
    }
  } catch (error) {
    if (error instanceof InternalError) throw error;
    throw IoError.from(error, `Failed to read ${filePath}`);
  }

  return bytesToHex(hasher.digest());
}

/**
 * Compute the fingerprint of one file
 *
 * Identical bytes always give the identical hash, whatever the path or
 * mtime. Symlinks are followed; a loop fails with ELOOP once the OS gives up.
 *
 * @throws IoError when the file is unreadable, vanished, or not a regular file
 */
export async function fingerprint(filePath: string): Promise<Fingerprint> {
  let stat: Stats;
  try {
    stat = await fs.stat(filePath);
  } catch (error) {
    throw IoError.from(error, `Cannot stat ${filePath}`);
  }

  if (!stat.isFile()) {
    throw new IoError(`Not a regular file: ${filePath}`, { details: { code: "EISDIR" } });
  }

  const hash = await hashFile(filePath);
  debugFingerprint("%s %s (%d bytes)", hash, filePath, stat.size);

  return {
    hash_b3: hash,
    size_bytes: stat.size,
    modified_at: stat.mtime.toISOString(),
  };
}
