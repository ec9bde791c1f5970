/**
 * Key listing and counting helpers
 */

import type { Mapping, Value } from "./types.js";
import { formatValue, isMapping } from "./value.js";

function joinKey(prefix: string, key: string): string {
  const escaped = key.replaceAll(".", "\\.");
  return prefix ? `${prefix}.${escaped}` : escaped;
}

function* walkLeaves(mapping: Mapping, prefix: string): Generator<[string, Value]> {
  for (const [key, value] of mapping) {
    const fullKey = joinKey(prefix, key);
    if (isMapping(value)) {
      yield* walkLeaves(value, fullKey);
    } else {
      yield [fullKey, value];
    }
  }
}

/**
 * Sorted dot-notation keys of every leaf below a mapping.
 * Sequences are leaves; empty mappings contribute no key.
 *
 * @example
 * flattenKeys(new Map([["a", new Map([["b", 1]])], ["c", [1, 2]]])) // ["a.b", "c"]
 */
export function flattenKeys(mapping: Mapping, prefix = ""): string[] {
  return Array.from(walkLeaves(mapping, prefix), ([key]) => key).sort();
}

/**
 * Sorted `[key, formatted value]` pairs of every leaf below a mapping
 */
export function flattenEntries(mapping: Mapping, prefix = ""): Array<[string, string]> {
  return Array.from(walkLeaves(mapping, prefix), ([key, value]): [string, string] => [
    key,
    formatValue(value),
  ]).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
}

export function countKeys(mapping: Mapping): number {
  return Array.from(walkLeaves(mapping, "")).length;
}

export function topLevelSections(mapping: Mapping): string[] {
  return [...mapping.keys()].sort();
}

/**
 * Parse a key list: one key per line, `#` starts a comment, blank lines are skipped
 */
export function parseKeyList(text: string): string[] {
  const keys: string[] = [];
  for (const line of text.split(/\r?\n/)) {
    const hash = line.indexOf("#");
    const key = (hash === -1 ? line : line.slice(0, hash)).trim();
    if (key) {
      keys.push(key);
    }
  }
  return keys;
}

/**
 * Drop repeated keys, keeping the first occurrence
 */
export function uniqueKeys(keys: readonly string[]): string[] {
  return [...new Set(keys)];
}
