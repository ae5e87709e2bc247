/**
 * Sidecar schema versions
 *
 * Versions are a closed set of known identifiers plus an `unknown` fallback
 * for well-formed versions written by a newer (or older, unsupported) producer.
 * Syntax is checked once, here; everything downstream switches on `kind`.
 */
import { UserError } from "./errors.js";

/** Every schema version this build understands, oldest first */
export const KNOWN_SCHEMA_VERSIONS = ["1.0.0", "1.1.0"] as const;

export type KnownSchemaVersionId = (typeof KNOWN_SCHEMA_VERSIONS)[number];

/** Schema version written by this build */
export const CURRENT_SCHEMA_VERSION: KnownSchemaVersionId = "1.1.0";

export type SchemaVersion =
  | { kind: "known"; id: KnownSchemaVersionId }
  | { kind: "unknown"; raw: string };

/**
 * Semantic version: MAJOR.MINOR.PATCH with optional pre-release and build
 * metadata, no leading zeros in numeric parts
 */
export const SEMVER_PATTERN =
  "^(0|[1-9]\\d*)\\.(0|[1-9]\\d*)\\.(0|[1-9]\\d*)" +
  "(?:-((?:0|[1-9]\\d*|\\d*[a-zA-Z-][0-9a-zA-Z-]*)(?:\\.(?:0|[1-9]\\d*|\\d*[a-zA-Z-][0-9a-zA-Z-]*))*))?" +
  "(?:\\+([0-9a-zA-Z-]+(?:\\.[0-9a-zA-Z-]+)*))?$";

const SEMVER_REGEX = new RegExp(SEMVER_PATTERN);

export function isSemver(value: string): boolean {
  return SEMVER_REGEX.test(value);
}

function knownId(value: string): KnownSchemaVersionId | undefined {
  return KNOWN_SCHEMA_VERSIONS.find((id) => id === value);
}

/**
 * Classify a syntactically valid version string
 * Returns null when the string is not semver
 */
export function tryParseSchemaVersion(raw: string): SchemaVersion | null {
  const value = raw.trim();
  if (!isSemver(value)) {
    return null;
  }
  const id = knownId(value);
  return id ? { kind: "known", id } : { kind: "unknown", raw: value };
}

/**
 * Parse a version supplied by a caller (CLI flag, API argument)
 *
 * @throws UserError when the string is not a semantic version
 */
export function parseSchemaVersion(raw: string): SchemaVersion {
  const version = tryParseSchemaVersion(raw);
  if (!version) {
    throw new UserError(
      `Invalid schema version '${raw}': expected MAJOR.MINOR.PATCH (e.g. ${CURRENT_SCHEMA_VERSION})`
    );
  }
  return version;
}

export function formatSchemaVersion(version: SchemaVersion): string {
  return version.kind === "known" ? version.id : version.raw;
}

export function sameSchemaVersion(a: SchemaVersion, b: SchemaVersion): boolean {
  return formatSchemaVersion(a) === formatSchemaVersion(b);
}

/**
 * Compare two raw version strings through the parsed variant
 * Anything that does not parse never matches
 */
export function schemaVersionsMatch(a: string, b: string): boolean {
  const left = tryParseSchemaVersion(a);
  const right = tryParseSchemaVersion(b);
  return left !== null && right !== null && sameSchemaVersion(left, right);
}

export function isCurrentSchemaVersion(version: SchemaVersion): boolean {
  return version.kind === "known" && version.id === CURRENT_SCHEMA_VERSION;
}
