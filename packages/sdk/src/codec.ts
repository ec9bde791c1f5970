/**
 * YAML codec for configuration documents
 *
 * Invariants:
 * - An empty (or comment-only, or `null`) source decodes to an empty mapping
 * - The root must be a mapping; anything else is a ParseError
 * - Scalars (string, number, boolean, null) round-trip exactly; integers
 *   beyond the safe integer range decode to bigint
 */

import { parseDocument, stringify } from "yaml";
import { ParseError } from "./errors.js";
import type { Document } from "./types.js";
import { fromUnknown, isMapping } from "./value.js";

/**
 * Parse options shared with the patcher so both read the same values
 */
export const PARSE_OPTIONS = {
  intAsBigInt: true,
} as const;

const ENCODE_OPTIONS = {
  indent: 2,
  indentSeq: true,
  lineWidth: 0,
} as const;

/**
 * Decode YAML text into a document
 * @param text - Source text
 * @param source - Label used in error messages (usually the file path)
 * @throws {ParseError} If the text is not valid YAML or its root is not a mapping
 */
export function decodeDocument(text: string, source = "<input>"): Document {
  const parsed = parseDocument(text, PARSE_OPTIONS);

  const firstError = parsed.errors[0];
  if (firstError) {
    throw new ParseError(source, firstError.message, { cause: firstError });
  }

  if (parsed.contents === null) {
    return new Map();
  }

  let raw: unknown;
  try {
    raw = parsed.toJS({ mapAsMap: true });
  } catch (err) {
    throw new ParseError(source, err instanceof Error ? err.message : String(err), {
      cause: err,
    });
  }

  const value = fromUnknown(raw);
  if (value === undefined) {
    throw new ParseError(source, "document contains an unsupported value");
  }
  if (value === null) {
    return new Map();
  }
  if (!isMapping(value)) {
    throw new ParseError(source, "root node must be a mapping");
  }
  return value;
}

/**
 * Serialize a document to YAML text (block style, two-space indent)
 */
export function encodeDocument(doc: Document): string {
  return stringify(doc, ENCODE_OPTIONS);
}
