/**
 * Dry-run previews
 *
 * Reads only. Old values are looked up in the document as loaded, and new
 * values are what set/multiset would store after coercion.
 */

import { parsePath } from "./path.js";
import { getAt } from "./tree.js";
import type { BatchPair, Change, Document, Value } from "./types.js";
import { cloneValue, coerceValue } from "./value.js";

/**
 * Compute the before/after pair of a single update
 * @param doc - Document as loaded, or an empty mapping when the file is missing
 */
export function previewChange(doc: Document, key: string, value: Value, coerce = true): Change {
  const before = getAt(doc, parsePath(key));
  return {
    key,
    oldValue: before.found ? cloneValue(before.value) : undefined,
    newValue: coerce ? coerceValue(value) : value,
  };
}

/**
 * Compute the before/after pair for each requested update, in order.
 * Every old value comes from the same unmodified document.
 */
export function previewChanges(doc: Document, pairs: BatchPair[], coerce = true): Change[] {
  return pairs.map((pair) => previewChange(doc, pair.key, pair.value, coerce));
}
