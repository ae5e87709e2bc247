/**
 * Migration registry
 *
 * An immutable mapping from (from, to) to a transform, built once and handed
 * to the migration engine. Pairs are looked up directly; chains across several
 * versions must be registered as their own pre-composed step.
 */
import { InternalError, UserError } from "../errors.js";
import {
  type SchemaVersion,
  formatSchemaVersion,
  parseSchemaVersion,
  sameSchemaVersion,
} from "../schema-version.js";
import { type MigrationTransform, downgradeTo100, upgradeTo110 } from "./transforms.js";

export interface MigrationStep {
  from: string;
  to: string;
  description: string;
  transform: MigrationTransform;
}

export interface MigrationRegistry {
  readonly steps: ReadonlyMap<string, MigrationStep>;
}

export type ResolvedMigration =
  | { kind: "identity" }
  | { kind: "step"; step: MigrationStep };

/** Steps shipped with this build */
export const BUILTIN_MIGRATIONS: readonly MigrationStep[] = [
  {
    from: "1.0.0",
    to: "1.1.0",
    description: "Store tags and thumbnails as objects",
    transform: upgradeTo110,
  },
  {
    from: "1.1.0",
    to: "1.0.0",
    description: "Collapse plain tags and thumbnails back to strings",
    transform: downgradeTo100,
  },
];

function pairKey(from: string, to: string): string {
  return `${from}->${to}`;
}

/**
 * Build a registry from migration steps
 *
 * @throws InternalError for malformed, self-referencing or duplicate steps
 */
export function createMigrationRegistry(
  steps: readonly MigrationStep[] = BUILTIN_MIGRATIONS
): MigrationRegistry {
  const map = new Map<string, MigrationStep>();

  for (const step of steps) {
    let from: SchemaVersion;
    let to: SchemaVersion;
    try {
      from = parseSchemaVersion(step.from);
      to = parseSchemaVersion(step.to);
    } catch (error) {
      throw new InternalError(`Invalid migration step ${step.from} -> ${step.to}`, { cause: error });
    }
    if (sameSchemaVersion(from, to)) {
      throw new InternalError(`Migration step ${step.from} -> ${step.to} maps a version to itself`);
    }

    const key = pairKey(formatSchemaVersion(from), formatSchemaVersion(to));
    if (map.has(key)) {
      throw new InternalError(`Duplicate migration step ${key}`);
    }
    map.set(key, Object.freeze({ ...step }));
  }

  return Object.freeze({ steps: map });
}

/**
 * Resolve how to get from one schema version to another
 *
 * @throws UserError when no step is registered for the pair
 */
export function resolveMigration(
  registry: MigrationRegistry,
  from: SchemaVersion,
  to: SchemaVersion
): ResolvedMigration {
  if (sameSchemaVersion(from, to)) {
    return { kind: "identity" };
  }

  const key = pairKey(formatSchemaVersion(from), formatSchemaVersion(to));
  const step = registry.steps.get(key);
  if (!step) {
    const available = [...registry.steps.keys()].join(", ") || "none";
    throw new UserError(`No migration path from ${formatSchemaVersion(from)} to ${formatSchemaVersion(to)} (available: ${available})`);
  }
  return { kind: "step", step };
}
