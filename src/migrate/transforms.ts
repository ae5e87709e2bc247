/**
 * Schema transforms
 *
 * 1.0.0 allowed bare strings in `tags` and `thumbnails`; 1.1.0 stores every
 * entry as an object. Each transform only rewrites entries that are still in
 * the source shape, so running it on already-migrated data changes nothing.
 * Version fields are set by the migration engine, not here.
 */
import * as path from "node:path";

import type { JsonObject, JsonValue, Sidecar } from "../types.js";

export type MigrationTransform = (record: Sidecar) => Sidecar;

/** Tag source assumed for 1.0.0 bare-string tags */
const LEGACY_TAG_SOURCE = "user";

function isObject(value: JsonValue): value is JsonObject {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

/**
 * Thumbnail format implied by a file name ("IMG_1_256.JPEG" -> "jpg")
 */
export function thumbnailFormat(thumbPath: string): string {
  const ext = path.extname(thumbPath).slice(1).toLowerCase();
  return ext === "jpeg" ? "jpg" : ext;
}

function hasOnlyKeys(value: JsonObject, keys: readonly string[]): boolean {
  const own = Object.keys(value);
  return own.length === keys.length && keys.every((k) => own.includes(k));
}

function upgradeTag(tag: JsonValue): JsonValue {
  return typeof tag === "string" ? { label: tag, source: LEGACY_TAG_SOURCE } : tag;
}

function upgradeThumbnail(thumb: JsonValue): JsonValue {
  return typeof thumb === "string" ? { path: thumb, format: thumbnailFormat(thumb) } : thumb;
}

/**
 * A user tag without a score carries nothing a bare string cannot hold
 */
function downgradeTag(tag: JsonValue): JsonValue {
  if (
    isObject(tag) &&
    hasOnlyKeys(tag, ["label", "source"]) &&
    typeof tag.label === "string" &&
    tag.source === LEGACY_TAG_SOURCE
  ) {
    return tag.label;
  }
  return tag;
}

/**
 * A thumbnail whose format is implied by its path collapses back to the path
 */
function downgradeThumbnail(thumb: JsonValue): JsonValue {
  if (
    isObject(thumb) &&
    hasOnlyKeys(thumb, ["path", "format"]) &&
    typeof thumb.path === "string" &&
    thumb.format === thumbnailFormat(thumb.path)
  ) {
    return thumb.path;
  }
  return thumb;
}

function mapEntries(
  record: Sidecar,
  tagFn: (tag: JsonValue) => JsonValue,
  thumbFn: (thumb: JsonValue) => JsonValue
): Sidecar {
  const result: Sidecar = { ...record };
  if (record.tags) {
    result.tags = record.tags.map(tagFn);
  }
  if (record.thumbnails) {
    result.thumbnails = record.thumbnails.map(thumbFn);
  }
  return result;
}

/** 1.0.0 -> 1.1.0: bare tag and thumbnail strings become objects */
export const upgradeTo110: MigrationTransform = (record) =>
  mapEntries(record, upgradeTag, upgradeThumbnail);

/** 1.1.0 -> 1.0.0: objects that a bare string fully describes become strings again */
export const downgradeTo100: MigrationTransform = (record) =>
  mapEntries(record, downgradeTag, downgradeThumbnail);
