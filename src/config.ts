/**
 * Runtime configuration
 * Supports customization via environment variables and .env files
 */
import * as fs from "node:fs";
import * as path from "node:path";
import { fileURLToPath } from "node:url";

import { debugConfig } from "./debug.js";
import { UserError } from "./errors.js";
import { CURRENT_SCHEMA_VERSION, parseSchemaVersion } from "./schema-version.js";
import type { PipelineSignature } from "./types.js";

/** Hash algorithm used for source.file_hash_b3 */
export const HASH_ALGORITHM = "blake3";

/** Default number of files processed in parallel by batch operations */
export const DEFAULT_CONCURRENCY = 4;

/**
 * Environment variable names
 */
export const CONFIG_ENV_VARS = {
  FACE_MODEL: "SIDECAR_KEEPER_FACE_MODEL",
  TAG_MODEL: "SIDECAR_KEEPER_TAG_MODEL",
  CONCURRENCY: "SIDECAR_KEEPER_CONCURRENCY",
  BACKUP: "SIDECAR_KEEPER_BACKUP",
} as const;

/**
 * Load .env files if they exist
 * Values already present in the environment win
 */
function loadEnvFile(): void {
  const envPaths = [
    path.join(process.cwd(), ".env"),
    path.join(process.env.HOME || "", ".sidecar-keeper.env"),
  ];

  for (const envPath of envPaths) {
    let content: string;
    try {
      content = fs.readFileSync(envPath, "utf-8");
    } catch {
      continue;
    }
    debugConfig("Loading %s", envPath);

    for (const line of content.split("\n")) {
      const trimmed = line.trim();
      if (!trimmed || trimmed.startsWith("#")) continue;

      const match = trimmed.match(/^([^=]+)=(.*)$/);
      if (match) {
        const key = match[1].trim();
        let value = match[2].trim();
        if ((value.startsWith('"') && value.endsWith('"')) ||
            (value.startsWith("'") && value.endsWith("'"))) {
          value = value.slice(1, -1);
        }
        if (!process.env[key]) {
          process.env[key] = value;
        }
      }
    }
  }
}

let envLoaded = false;

function ensureEnvLoaded(): void {
  if (!envLoaded) {
    loadEnvFile();
    envLoaded = true;
  }
}

function readEnv(name: string): string | undefined {
  ensureEnvLoaded();
  const value = process.env[name]?.trim();
  return value ? value : undefined;
}

/**
 * Number of files processed in parallel by batch verify/migrate/scan
 * Priority: environment variable > default value
 */
export function getConcurrency(): number {
  const envValue = readEnv(CONFIG_ENV_VARS.CONCURRENCY);
  if (envValue) {
    const parsed = parseInt(envValue, 10);
    if (!isNaN(parsed) && parsed > 0) {
      return parsed;
    }
    debugConfig.warn(`Ignoring invalid ${CONFIG_ENV_VARS.CONCURRENCY}=${envValue}`);
  }
  return DEFAULT_CONCURRENCY;
}

/**
 * Whether writes keep .bakN backups unless told otherwise
 */
export function getDefaultBackup(): boolean {
  const envValue = readEnv(CONFIG_ENV_VARS.BACKUP);
  if (!envValue) {
    return true;
  }
  return !["0", "false", "no", "off"].includes(envValue.toLowerCase());
}

let cachedProducerVersion: string | null = null;

/**
 * Version of this tool, read from package.json
 * Works both from src/ (tests, tsx) and dist/src/ (built)
 */
export function getProducerVersion(): string {
  if (cachedProducerVersion) {
    return cachedProducerVersion;
  }

  const here = path.dirname(fileURLToPath(import.meta.url));
  for (const candidate of [path.join(here, "..", "package.json"), path.join(here, "..", "..", "package.json")]) {
    try {
      const pkg: unknown = JSON.parse(fs.readFileSync(candidate, "utf-8"));
      if (pkg && typeof pkg === "object" && "version" in pkg && typeof pkg.version === "string") {
        cachedProducerVersion = pkg.version;
        return pkg.version;
      }
    } catch {
      debugConfig("No package.json at %s", candidate);
    }
  }

  cachedProducerVersion = "0.0.0";
  return cachedProducerVersion;
}

export type SignatureOverrides = Partial<Omit<PipelineSignature, "created_at">>;

/**
 * Pipeline signature of the current build
 * Model identifiers come from the environment; overrides win over both
 */
export function getCurrentSignature(
  overrides: SignatureOverrides = {},
  now: Date = new Date()
): PipelineSignature {
  const signature: PipelineSignature = {
    schema_version: overrides.schema_version ?? CURRENT_SCHEMA_VERSION,
    producer_version: overrides.producer_version ?? getProducerVersion(),
    hash_algorithm: overrides.hash_algorithm ?? HASH_ALGORITHM,
    created_at: now.toISOString(),
  };

  const faceModel = overrides.face_model ?? readEnv(CONFIG_ENV_VARS.FACE_MODEL);
  if (faceModel) {
    signature.face_model = faceModel;
  }
  const tagModel = overrides.tag_model ?? readEnv(CONFIG_ENV_VARS.TAG_MODEL);
  if (tagModel) {
    signature.tag_model = tagModel;
  }

  return signature;
}

const OVERRIDABLE_KEYS = [
  "schema_version",
  "producer_version",
  "hash_algorithm",
  "face_model",
  "tag_model",
] as const;

/**
 * Parse a `--pipeline-signature` JSON override
 *
 * @throws UserError for malformed JSON, unknown keys, or non-string values
 */
export function parseSignatureOverrides(json: string): SignatureOverrides {
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (error) {
    throw new UserError(`Invalid --pipeline-signature JSON: ${error instanceof Error ? error.message : String(error)}`);
  }

  if (!parsed || typeof parsed !== "object" || Array.isArray(parsed)) {
    throw new UserError("--pipeline-signature must be a JSON object");
  }

  const overrides: SignatureOverrides = {};
  for (const [key, value] of Object.entries(parsed)) {
    const known = OVERRIDABLE_KEYS.find((k) => k === key);
    if (!known) {
      throw new UserError(`Unknown --pipeline-signature field '${key}'`);
    }
    if (typeof value !== "string" || value.length === 0) {
      throw new UserError(`--pipeline-signature field '${key}' must be a non-empty string`);
    }
    if (known === "schema_version") {
      parseSchemaVersion(value);
    }
    overrides[known] = value;
  }
  return overrides;
}
