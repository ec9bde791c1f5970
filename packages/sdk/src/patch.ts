/**
 * Comment-preserving patch of an existing node
 *
 * This module is the only place that knows about the YAML AST. Callers hand
 * in a canonical path (no negative indices) and get back new source text, or
 * undefined when the edit cannot be made in place.
 *
 * Strategies:
 * - splice: the target's source span is replaced with a one-line rendering of
 *   the new value and every other byte of the file is kept. A block node that
 *   starts on the line below its key is moved up behind the key.
 * - node: the AST node is swapped and the document re-rendered from the AST,
 *   used only when the splice does not read back correctly
 *
 * Each candidate text is decoded again and compared with the whole expected
 * document, so an edit that would also change an alias of the target (an
 * anchor kept in the source) is never returned.
 */

import {
  isMap,
  isNode,
  isScalar,
  isSeq,
  parseDocument,
  Scalar,
  stringify,
  type Document as YamlDocument,
  type Node as YamlNode,
  type ToStringOptions,
} from "yaml";
import { decodeDocument, PARSE_OPTIONS } from "./codec.js";
import { ParseError } from "./errors.js";
import { logger } from "./observability/logs.js";
import { setAt } from "./tree.js";
import type { Document, Path, Value } from "./types.js";
import { cloneValue, valuesEqual } from "./value.js";

export type PatchStrategy = "splice" | "node";

export interface PatchResult {
  text: string;
  strategy: PatchStrategy;
}

interface Located {
  node: unknown;
  inFlow: boolean;
  replace: (node: YamlNode) => void;
}

const FRAGMENT_OPTIONS = {
  collectionStyle: "flow",
  flowCollectionPadding: false,
  blockQuote: false,
  singleQuote: false,
  doubleQuotedMinMultiLineLength: Number.POSITIVE_INFINITY,
  lineWidth: 0,
} as const;

const RENDER_OPTIONS = {
  lineWidth: 0,
} as const;

/**
 * Find the value node at a canonical path, matching keys the same way the
 * decoder does (String() of the scalar key)
 */
function locate(doc: YamlDocument.Parsed, path: Path): Located | undefined {
  let node: unknown = doc.contents;
  let inFlow = false;
  let replace: ((n: YamlNode) => void) | undefined;

  for (const segment of path) {
    if (segment.kind === "key") {
      if (!isMap(node)) return undefined;
      const pair = node.items.find(
        (item) => isScalar(item.key) && String(item.key.value) === segment.key
      );
      if (!pair) return undefined;
      inFlow ||= node.flow === true;
      node = pair.value;
      replace = (n) => {
        pair.value = n;
      };
    } else {
      const idx = segment.index;
      if (!isSeq(node) || idx === undefined || idx < 0 || idx >= node.items.length) {
        return undefined;
      }
      const seq = node;
      inFlow ||= seq.flow === true;
      node = seq.items[idx];
      replace = (n) => {
        seq.items[idx] = n;
      };
    }
  }

  return replace ? { node, inFlow, replace } : undefined;
}

interface Span {
  start: number;
  end: number;
  lead: string;
  tail: string;
}

/**
 * Source span of a node, widened to the key's colon when a block node sits on
 * the following lines. `tail` is the line break the span swallowed.
 */
function spliceSpan(text: string, node: unknown): Span | undefined {
  if (!isNode(node)) return undefined;
  const range = node.range;
  if (!range || range[1] <= range[0]) return undefined;

  const [from, end] = range;
  const body = text.slice(from, end);
  const trailing = body.slice(body.trimEnd().length);
  const tail = trailing.includes("\n") ? trailing : "";

  let gapStart = from;
  while (gapStart > 0 && /\s/.test(text.charAt(gapStart - 1))) {
    gapStart--;
  }
  if (text.slice(gapStart, from).includes("\n") && text.charAt(gapStart - 1) === ":") {
    return { start: gapStart, end, lead: " ", tail };
  }
  return { start: from, end, lead: "", tail };
}

/**
 * Render a value as a single-line YAML fragment
 */
export function renderFragment(value: Value, inFlow = false): string {
  const options: ToStringOptions = inFlow
    ? { ...FRAGMENT_OPTIONS, defaultStringType: Scalar.QUOTE_DOUBLE }
    : FRAGMENT_OPTIONS;
  return stringify(value, options).trimEnd();
}

function expectedDocument(text: string, path: Path, value: Value): Document | undefined {
  try {
    const doc = decodeDocument(text);
    setAt(doc, path, cloneValue(value));
    return doc;
  } catch (err) {
    logger.debug("patch.rejected", { message: err instanceof Error ? err.message : String(err) });
    return undefined;
  }
}

function readsAs(text: string, expected: Document): boolean {
  try {
    return valuesEqual(decodeDocument(text), expected);
  } catch {
    return false;
  }
}

/**
 * Swap the AST node and re-render; undefined when the result cannot be
 * rendered (an alias of the replaced node no longer resolves)
 */
function renderNode(doc: YamlDocument.Parsed, target: Located, value: Value): string | undefined {
  try {
    target.replace(doc.createNode(value, { flow: target.inFlow }));
    return doc.toString(RENDER_OPTIONS);
  } catch (err) {
    logger.debug("patch.rejected", { message: err instanceof Error ? err.message : String(err) });
    return undefined;
  }
}

/**
 * Replace the value at an existing path while keeping comments and formatting
 * @param text - Current source text
 * @param path - Canonical path (negative indices already resolved)
 * @param value - New value
 * @param source - Label for parse errors
 * @returns Patched text, or undefined if the path does not exist in the source
 *   or the edit cannot be made without changing other values
 * @throws {ParseError} If the source text is not valid YAML
 */
export function patchDocument(
  text: string,
  path: Path,
  value: Value,
  source = "<input>"
): PatchResult | undefined {
  const doc = parseDocument(text, PARSE_OPTIONS);
  const firstError = doc.errors[0];
  if (firstError) {
    throw new ParseError(source, firstError.message, { cause: firstError });
  }

  const target = locate(doc, path);
  if (!target) {
    return undefined;
  }

  const expected = expectedDocument(text, path, value);
  if (!expected) {
    return undefined;
  }

  const span = spliceSpan(text, target.node);
  if (span) {
    const spliced =
      text.slice(0, span.start) +
      span.lead +
      renderFragment(value, target.inFlow) +
      span.tail +
      text.slice(span.end);
    if (readsAs(spliced, expected)) {
      return { text: spliced, strategy: "splice" };
    }
  }

  const rendered = renderNode(doc, target, value);
  if (rendered !== undefined && readsAs(rendered, expected)) {
    return { text: rendered, strategy: "node" };
  }
  return undefined;
}
