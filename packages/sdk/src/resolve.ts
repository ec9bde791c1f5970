/**
 * Negative index resolution
 *
 * The comment-aware patch engine only understands canonical (non-negative)
 * indices, so paths are rewritten against the document as it was just read,
 * inside the same locked section as the patch that uses them.
 */

import { PathError } from "./errors.js";
import { formatPath, indexSegment } from "./path.js";
import type { Document, Path, Segment, Value } from "./types.js";
import { isMapping, isSequence } from "./value.js";
import { resolveIndex } from "./tree.js";

/**
 * Rewrite every negative index in a path to its canonical position
 * @throws {PathError} If a negative index targets a non-array or is out of bounds
 */
export function resolveNegativeIndices(doc: Document, path: Path): Path {
  const resolved: Segment[] = [];
  let current: Value | undefined = doc;

  for (const segment of path) {
    if (segment.kind === "index" && segment.index !== undefined && segment.index < 0) {
      if (!isSequence(current)) {
        throw new PathError(
          formatPath([...resolved, segment]),
          `negative index ${segment.index} used on non-array`
        );
      }
      const idx = resolveIndex(segment, current.length);
      if (idx === undefined) {
        throw new PathError(
          formatPath([...resolved, segment]),
          `array index out of bounds: ${segment.index} (length: ${current.length})`
        );
      }
      resolved.push(indexSegment(String(idx)));
      current = current[idx];
      continue;
    }

    resolved.push(segment);
    if (segment.kind === "key") {
      current = isMapping(current) ? current.get(segment.key) : undefined;
    } else if (isSequence(current)) {
      const idx = resolveIndex(segment, current.length);
      current = idx === undefined ? undefined : current[idx];
    } else {
      current = undefined;
    }
  }

  return resolved;
}
