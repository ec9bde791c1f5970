/**
 * Validate-then-commit batch update
 *
 * Every pair is applied to one private copy of the document. The first pair
 * that fails aborts the whole batch with a BatchError, and the caller's
 * document (and therefore the file) is left as it was.
 */

import { BatchError } from "./errors.js";
import { logger } from "./observability/logs.js";
import { parsePath } from "./path.js";
import { resolveNegativeIndices } from "./resolve.js";
import { getAt, setAt } from "./tree.js";
import type { BatchPair, Change, Document } from "./types.js";
import { cloneMapping, cloneValue, coerceValue } from "./value.js";

export interface BatchResult {
  /** Updated copy of the input document */
  doc: Document;
  /** One change per pair, in input order */
  changes: Change[];
}

/**
 * Apply all pairs to a copy of the document
 * @param doc - Current document (not modified)
 * @param pairs - Ordered key/value pairs; later pairs see the effect of earlier ones
 * @param coerce - Convert numeric-looking strings to numbers
 * @throws {BatchError} Wrapping the first failing pair and its position
 */
export function applyBatch(doc: Document, pairs: BatchPair[], coerce = true): BatchResult {
  const working = cloneMapping(doc);
  const changes: Change[] = [];

  for (const [index, pair] of pairs.entries()) {
    try {
      const path = resolveNegativeIndices(working, parsePath(pair.key));
      const before = getAt(working, path);
      const newValue = coerce ? coerceValue(pair.value) : pair.value;

      setAt(working, path, cloneValue(newValue));
      changes.push({
        key: pair.key,
        oldValue: before.found ? cloneValue(before.value) : undefined,
        newValue,
      });
    } catch (err) {
      logger.debug("batch.rejected", {
        key: pair.key,
        message: err instanceof Error ? err.message : String(err),
        details: { index },
      });
      throw new BatchError(index, pair.key, { cause: err });
    }
  }

  return { doc: working, changes };
}
