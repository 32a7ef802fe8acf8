import { Tags } from "../types";
import { TagFormatError } from "../core/errors";

/**
 * Entry delimiter. A forward slash cannot occur in a file name on any host
 * platform, and captured metadata never spans path segments.
 */
export const TAG_DELIMITER = "/";
export const TAG_VALUE_DELIMITER = ":";

/**
 * Assigning this key on a plain object replaces its prototype
 */
export const RESERVED_KEY = "__proto__";

/**
 * Serialize a flat map as `/key:value/key:value/`, sorted by key. The empty
 * map serializes to the empty string. Keys may not contain either delimiter;
 * values may contain `:` but not `/`.
 */
export function serializeTags(tags: Tags): string {
  const keys = Object.keys(tags).sort();
  if (keys.length === 0) {
    return "";
  }
  const entries = keys.map((key) => serializeTag(key, tags[key]));
  return TAG_DELIMITER + entries.join(TAG_DELIMITER) + TAG_DELIMITER;
}

export function serializeTag(key: string, value: string): string {
  if (
    key.length === 0 ||
    key === RESERVED_KEY ||
    key.includes(TAG_DELIMITER) ||
    key.includes(TAG_VALUE_DELIMITER)
  ) {
    throw new TagFormatError(`${key}${TAG_VALUE_DELIMITER}${value}`, "invalid key");
  }
  if (value.includes(TAG_DELIMITER)) {
    throw new TagFormatError(
      `${key}${TAG_VALUE_DELIMITER}${value}`,
      `value contains '${TAG_DELIMITER}'`
    );
  }
  return `${key}${TAG_VALUE_DELIMITER}${value}`;
}

/**
 * Parse the output of serializeTags. Splits each entry at its first `:`;
 * an entry without one, or with an empty key, is a TagFormatError.
 *
 * Unlike a strict two-part split, an entry with more than one `:` is not an
 * error: `a:b:c` reads back as `{ a: "b:c" }`, so values containing `:`
 * (times, drive letters) survive a round trip.
 */
export function deserializeTags(serialized: string | null | undefined): Tags {
  const tags: Tags = {};
  if (!serialized) {
    return tags;
  }

  for (const entry of serialized.split(TAG_DELIMITER)) {
    if (entry.length === 0) continue;
    const [key, value] = deserializeTag(entry);
    tags[key] = value;
  }
  return tags;
}

export function deserializeTag(entry: string): [string, string] {
  const index = entry.indexOf(TAG_VALUE_DELIMITER);
  if (index <= 0) {
    throw new TagFormatError(entry);
  }
  if (entry.slice(0, index) === RESERVED_KEY) {
    throw new TagFormatError(entry, "invalid key");
  }
  return [entry.slice(0, index), entry.slice(index + 1)];
}

/**
 * Import tags have case-insensitive keys; store them lower-cased and trimmed
 */
export function normalizeTagKeys(tags: Tags): Tags {
  const normalized: Tags = {};
  for (const [key, value] of Object.entries(tags)) {
    normalized[key.trim().toLowerCase()] = value;
  }
  return normalized;
}
