/**
 * Path expression parser
 *
 * Grammar (single left-to-right scan):
 * - `a.b.c`   nested keys; empty segments are never produced (`a..b` == `a.b`)
 * - `a\.b`    escaped dot, part of the key
 * - `arr[3]`  sequence index; `arr[-1]` counts from the end
 * - `[`       without a closing `]` is kept as a literal character
 *
 * Parsing never fails. Bracket content that is not a signed integer yields an
 * index segment with `index: undefined`, which only errors when applied.
 */

import type { IndexSegment, KeySegment, Path, Segment } from "./types.js";

const SIGNED_INTEGER = /^[-+]?\d+$/;

export function keySegment(key: string): KeySegment {
  return { kind: "key", key };
}

export function indexSegment(raw: string): IndexSegment {
  const index = SIGNED_INTEGER.test(raw) ? Number.parseInt(raw, 10) : undefined;
  return { kind: "index", raw, index };
}

/**
 * Parse a path expression into segments
 * @param expr - Path expression (e.g., "items[0].name")
 * @returns Segments; empty for the root
 */
export function parsePath(expr: string): Path {
  const segments: Path = [];
  let current = "";

  const flush = (): void => {
    if (current.length > 0) {
      segments.push(keySegment(current));
      current = "";
    }
  };

  for (let i = 0; i < expr.length; i++) {
    const ch = expr[i];

    if (ch === "\\" && expr[i + 1] === ".") {
      current += ".";
      i++;
    } else if (ch === ".") {
      flush();
    } else if (ch === "[") {
      flush();
      const end = expr.indexOf("]", i + 1);
      if (end === -1) {
        current += ch;
        continue;
      }
      segments.push(indexSegment(expr.slice(i + 1, end)));
      i = end;
    } else {
      current += ch;
    }
  }

  flush();
  return segments;
}

/**
 * Render segments back into canonical path syntax
 */
export function formatPath(path: readonly Segment[]): string {
  let out = "";
  for (const segment of path) {
    if (segment.kind === "index") {
      out += `[${segment.index ?? segment.raw}]`;
    } else {
      const escaped = segment.key.replaceAll(".", "\\.");
      out += out.length > 0 ? `.${escaped}` : escaped;
    }
  }
  return out;
}
