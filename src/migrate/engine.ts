/**
 * Migration engine
 *
 * Rewrites a sidecar from one schema version to another through the atomic
 * persistence path. A migration never fingerprints the source file: it only
 * reshapes facts already on record.
 */
import { type BatchReport, runBatch } from "../batch/runner.js";
import { listSourceFiles } from "../batch/walker.js";
import { getConcurrency } from "../config.js";
import { debugMigrate } from "../debug.js";
import { InternalError, ValidationError } from "../errors.js";
import { writeSidecar } from "../persistence/atomic-write.js";
import {
  type SchemaVersion,
  formatSchemaVersion,
  parseSchemaVersion,
  sameSchemaVersion,
  tryParseSchemaVersion,
} from "../schema-version.js";
import { sidecarPathFor } from "../sidecar/paths.js";
import { validateSidecar } from "../sidecar/schema.js";
import { describeUnusable, loadSidecar } from "../sidecar/store.js";
import type { MigrationResult, ProgressListener, Sidecar } from "../types.js";
import { type MigrationRegistry, type MigrationStep, resolveMigration } from "./registry.js";

export interface MigrateOptions {
  /** Target schema version */
  to: string;
  /** Expected current version; read from the record when omitted */
  from?: string;
  dryRun: boolean;
  backup: boolean;
  registry: MigrationRegistry;
  now?: Date;
}

export interface MigratePathOptions extends MigrateOptions {
  recursive: boolean;
  concurrency?: number;
  onProgress?: ProgressListener;
}

/**
 * @throws ValidationError when the sidecar is missing or cannot be decoded
 */
async function requireSidecar(sidecarPath: string): Promise<Sidecar> {
  const loaded = await loadSidecar(sidecarPath);
  if (loaded.kind !== "valid") {
    throw new ValidationError(`Cannot migrate ${sidecarPath}: ${describeUnusable(loaded)}`, {
      details: { sidecar_path: sidecarPath, kind: loaded.kind },
    });
  }
  return loaded.sidecar;
}

function recordVersion(record: Sidecar, sidecarPath: string): SchemaVersion {
  const version = tryParseSchemaVersion(record.schema_version);
  if (!version) {
    throw new ValidationError(
      `Cannot migrate ${sidecarPath}: schema_version '${record.schema_version}' is not a semantic version`
    );
  }
  return version;
}

function applyStep(step: MigrationStep, record: Sidecar, to: string, sidecarPath: string): Sidecar {
  let migrated: Sidecar;
  try {
    migrated = step.transform(structuredClone(record));
  } catch (error) {
    throw new InternalError(`Migration ${step.from} -> ${step.to} failed for ${sidecarPath}`, {
      cause: error,
    });
  }

  migrated.schema_version = to;
  migrated.pipeline_signature = { ...migrated.pipeline_signature, schema_version: to };

  const check = validateSidecar(migrated);
  if (!check.valid) {
    const fields = [...check.missingFields, ...check.invalidFields].join(", ");
    throw new InternalError(
      `Migration ${step.from} -> ${step.to} produced an invalid record for ${sidecarPath} (${fields})`
    );
  }
  return migrated;
}

/**
 * Migrate the sidecar of one source file
 *
 * Returns `migrated: false` without touching the disk when `from` equals
 * `to` or when the record is already at the target version. A dry run
 * transforms an in-memory copy and writes nothing.
 *
 * @throws UserError for malformed versions or an unregistered pair
 * @throws ValidationError when the sidecar is unusable or not at `from`
 * @throws InternalError when a transform fails
 * @throws IoError when writing fails (the original sidecar is left intact)
 */
export async function migrateFile(
  filePath: string,
  options: MigrateOptions
): Promise<MigrationResult> {
  const sidecarPath = sidecarPathFor(filePath);
  const to = parseSchemaVersion(options.to);

  let record: Sidecar | null = null;
  let from: SchemaVersion;
  if (options.from !== undefined) {
    from = parseSchemaVersion(options.from);
  } else {
    record = await requireSidecar(sidecarPath);
    from = recordVersion(record, sidecarPath);
  }

  const result: MigrationResult = {
    path: filePath,
    sidecar_path: sidecarPath,
    from: formatSchemaVersion(from),
    to: formatSchemaVersion(to),
    migrated: false,
    dry_run: options.dryRun,
    backup_path: null,
  };

  const resolved = resolveMigration(options.registry, from, to);
  if (resolved.kind === "identity") {
    debugMigrate("%s: already at %s", filePath, result.to);
    return result;
  }

  record ??= await requireSidecar(sidecarPath);
  const current = recordVersion(record, sidecarPath);
  if (sameSchemaVersion(current, to)) {
    debugMigrate("%s: already at %s", filePath, result.to);
    return result;
  }
  if (!sameSchemaVersion(current, from)) {
    throw new ValidationError(
      `Cannot migrate ${sidecarPath}: record is at ${formatSchemaVersion(current)}, expected ${result.from}`,
      { details: { sidecar_path: sidecarPath, found: formatSchemaVersion(current), expected: result.from } }
    );
  }

  const migrated = applyStep(resolved.step, record, result.to, sidecarPath);

  if (options.dryRun) {
    debugMigrate("%s: would migrate %s -> %s", filePath, result.from, result.to);
    return { ...result, migrated: true };
  }

  migrated.updated_at = (options.now ?? new Date()).toISOString();
  const outcome = await writeSidecar(sidecarPath, migrated, { backup: options.backup });

  debugMigrate("%s: migrated %s -> %s", filePath, result.from, result.to);
  return { ...result, migrated: true, backup_path: outcome.backupPath };
}

/**
 * Migrate every sidecar under a path
 * Per-file failures are collected in the report instead of aborting the run
 *
 * @throws UserError for malformed versions or an unregistered pair (checked
 *   once up front when `from` is given)
 * @throws IoError when the path itself cannot be listed
 */
export async function migratePath(
  target: string,
  options: MigratePathOptions
): Promise<BatchReport<MigrationResult>> {
  const to = parseSchemaVersion(options.to);
  if (options.from !== undefined) {
    resolveMigration(options.registry, parseSchemaVersion(options.from), to);
  }

  const files = await listSourceFiles(target, options.recursive);
  return runBatch(files, (filePath) => migrateFile(filePath, options), {
    concurrency: options.concurrency ?? getConcurrency(),
    onProgress: options.onProgress,
  });
}
