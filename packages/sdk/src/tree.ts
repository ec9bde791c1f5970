/**
 * Tree accessor: get/set/delete/push/pop on a decoded document
 *
 * Invariants:
 * - Operations mutate the document passed in; persisting it is the caller's job
 * - Negative indices count from the end of a sequence (`-1` is the last element)
 * - `set` creates missing mappings on the way but never extends a sequence
 * - `set` replaces a non-mapping intermediate with an empty mapping when a key
 *   must be applied to it (the old value is discarded)
 */

import { KeyNotFoundError, PathError } from "./errors.js";
import { formatPath } from "./path.js";
import type { Document, IndexSegment, Lookup, Mapping, Path, Sequence, Value } from "./types.js";
import { isMapping, isSequence } from "./value.js";

/**
 * Resolve an index segment against a sequence length
 * @returns The canonical non-negative index, or undefined when invalid or out of range
 */
export function resolveIndex(segment: IndexSegment, length: number): number | undefined {
  if (segment.index === undefined) return undefined;
  const idx = segment.index < 0 ? length + segment.index : segment.index;
  return idx >= 0 && idx < length ? idx : undefined;
}

function requireIndex(seq: Sequence, segment: IndexSegment, where: string): number {
  if (segment.index === undefined) {
    throw new PathError(where, `invalid array index: ${segment.raw}`);
  }
  const idx = resolveIndex(segment, seq.length);
  if (idx === undefined) {
    throw new PathError(
      where,
      `array index out of bounds: ${segment.index} (length: ${seq.length})`
    );
  }
  return idx;
}

/**
 * Look up the value at a path
 */
export function getAt(doc: Document, path: Path): Lookup {
  let current: Value = doc;

  for (const segment of path) {
    let next: Value | undefined;
    if (segment.kind === "key") {
      next = isMapping(current) ? current.get(segment.key) : undefined;
    } else if (isSequence(current)) {
      const idx = resolveIndex(segment, current.length);
      next = idx === undefined ? undefined : current[idx];
    }
    if (next === undefined) {
      return { found: false };
    }
    current = next;
  }

  return { found: true, value: current };
}

/**
 * Set the value at a path, creating intermediate mappings as needed
 * @throws {PathError} For an empty path, a bad or out-of-bounds index, or an index on a non-array
 */
export function setAt(doc: Document, path: Path, value: Value): void {
  const last = path[path.length - 1];
  if (last === undefined) {
    throw new PathError("", "empty path");
  }

  let cursor: Mapping | Sequence = doc;
  const parents = path.slice(0, -1);

  for (const [i, segment] of parents.entries()) {
    const next = path[i + 1] ?? last;
    const where = formatPath(path.slice(0, i + 1));

    let child: Value | undefined;
    let assign: (v: Value) => void;

    if (segment.kind === "key") {
      if (!isMapping(cursor)) {
        throw new PathError(where, "cannot use a key on an array");
      }
      const mapping: Mapping = cursor;
      child = mapping.get(segment.key);
      assign = (v) => mapping.set(segment.key, v);
    } else {
      if (!isSequence(cursor)) {
        throw new PathError(where, "not an array");
      }
      const seq: Sequence = cursor;
      const idx = requireIndex(seq, segment, where);
      child = seq[idx];
      assign = (v) => {
        seq[idx] = v;
      };
    }

    if (next.kind === "index") {
      if (!isSequence(child)) {
        throw new PathError(where, "not an array");
      }
      cursor = child;
    } else if (isMapping(child)) {
      cursor = child;
    } else {
      const fresh: Mapping = new Map();
      assign(fresh);
      cursor = fresh;
    }
  }

  const where = formatPath(path);
  if (last.kind === "key") {
    if (!isMapping(cursor)) {
      throw new PathError(where, "cannot use a key on an array");
    }
    cursor.set(last.key, value);
  } else {
    if (!isSequence(cursor)) {
      throw new PathError(where, "not an array");
    }
    cursor[requireIndex(cursor, last, where)] = value;
  }
}

/**
 * Delete the key at a path
 * @returns true if a key was removed; a missing key or parent is a no-op
 * @throws {PathError} For an empty path, an array element target, or a non-mapping parent
 */
export function deleteAt(doc: Document, path: Path): boolean {
  const last = path[path.length - 1];
  if (last === undefined) {
    throw new PathError("", "empty path");
  }
  if (last.kind === "index") {
    throw new PathError(formatPath(path), "deleting array elements is not supported");
  }

  const parentPath = path.slice(0, -1);
  const parent = getAt(doc, parentPath);
  if (!parent.found) {
    return false;
  }
  if (!isMapping(parent.value)) {
    throw new PathError(formatPath(parentPath), "path is not traversable");
  }
  return parent.value.delete(last.key);
}

/**
 * Append a value to the sequence at a path, creating it when absent
 * @throws {PathError} If the existing value is not an array
 */
export function pushAt(doc: Document, path: Path, value: Value): void {
  const existing = getAt(doc, path);
  if (!existing.found) {
    setAt(doc, path, [value]);
    return;
  }
  if (!isSequence(existing.value)) {
    throw new PathError(formatPath(path), "not an array");
  }
  existing.value.push(value);
}

/**
 * Remove and return the last element of the sequence at a path
 * @throws {KeyNotFoundError} If nothing exists at the path
 * @throws {PathError} If the value is not an array or is empty
 */
export function popAt(doc: Document, path: Path): Value {
  const where = formatPath(path);
  const existing = getAt(doc, path);
  if (!existing.found) {
    throw new KeyNotFoundError(where);
  }
  if (!isSequence(existing.value)) {
    throw new PathError(where, "not an array");
  }
  const popped = existing.value.pop();
  if (popped === undefined) {
    throw new PathError(where, "empty array");
  }
  return popped;
}
