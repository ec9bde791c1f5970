/**
 * Value model helpers: type guards, copying, comparison and coercion
 */

import { stringify } from "yaml";
import type { Mapping, Scalar, Sequence, Value } from "./types.js";

export function isMapping(value: Value | undefined): value is Mapping {
  return value instanceof Map;
}

export function isSequence(value: Value | undefined): value is Sequence {
  return Array.isArray(value);
}

export function isScalar(value: Value | undefined): value is Scalar {
  return (
    value === null ||
    typeof value === "string" ||
    typeof value === "number" ||
    typeof value === "bigint" ||
    typeof value === "boolean"
  );
}

/**
 * Deep copy of a value
 */
export function cloneValue(value: Value): Value {
  if (isMapping(value)) {
    return cloneMapping(value);
  }
  if (isSequence(value)) {
    return value.map((item) => cloneValue(item));
  }
  return value;
}

/**
 * Deep copy of a mapping
 */
export function cloneMapping(mapping: Mapping): Mapping {
  const copy: Mapping = new Map();
  for (const [k, v] of mapping) {
    copy.set(k, cloneValue(v));
  }
  return copy;
}

/**
 * Structural equality; mapping key order is ignored
 */
export function valuesEqual(a: Value, b: Value): boolean {
  if (isMapping(a)) {
    if (!isMapping(b) || a.size !== b.size) return false;
    for (const [k, v] of a) {
      const other = b.get(k);
      if (other === undefined || !valuesEqual(v, other)) return false;
    }
    return true;
  }
  if (isSequence(a)) {
    if (!isSequence(b) || a.length !== b.length) return false;
    return a.every((item, i) => {
      const other = b[i];
      return other !== undefined && valuesEqual(item, other);
    });
  }
  return a === b;
}

/**
 * Normalize arbitrary decoder output into a Value.
 * Mapping keys are converted with String(); unsupported types return undefined.
 * A bigint that fits in a safe integer becomes a number.
 */
export function fromUnknown(input: unknown): Value | undefined {
  if (typeof input === "bigint") {
    return narrowInteger(input);
  }
  if (
    input === null ||
    typeof input === "string" ||
    typeof input === "boolean" ||
    (typeof input === "number" && !Number.isNaN(input))
  ) {
    return input;
  }
  if (typeof input === "number") {
    // NaN (.nan) has no faithful round trip through the value model
    return undefined;
  }
  if (Array.isArray(input)) {
    const items: Sequence = [];
    for (const item of input) {
      const value = fromUnknown(item);
      if (value === undefined) return undefined;
      items.push(value);
    }
    return items;
  }
  if (input instanceof Map) {
    const mapping: Mapping = new Map();
    for (const [k, v] of input) {
      const value = fromUnknown(v);
      if (value === undefined) return undefined;
      mapping.set(String(k), value);
    }
    return mapping;
  }
  if (typeof input === "object") {
    const mapping: Mapping = new Map();
    for (const [k, v] of Object.entries(input)) {
      const value = fromUnknown(v);
      if (value === undefined) return undefined;
      mapping.set(k, value);
    }
    return mapping;
  }
  return undefined;
}

const MIN_SAFE = BigInt(Number.MIN_SAFE_INTEGER);
const MAX_SAFE = BigInt(Number.MAX_SAFE_INTEGER);

function narrowInteger(value: bigint): number | bigint {
  return value >= MIN_SAFE && value <= MAX_SAFE ? Number(value) : value;
}

/**
 * JSON-friendly view of a value (mappings become plain objects, bigint
 * integers become their decimal string)
 */
export function toPlain(value: Value): unknown {
  if (isMapping(value)) {
    const obj: Record<string, unknown> = {};
    for (const [k, v] of value) {
      obj[k] = toPlain(v);
    }
    return obj;
  }
  if (isSequence(value)) {
    return value.map((item) => toPlain(item));
  }
  if (typeof value === "bigint") {
    return value.toString();
  }
  return value;
}

const NUMBER_PATTERN = /^[-+]?(?:\d+\.\d*|\.\d+|\d+)(?:[eE][-+]?\d+)?$/;
const INTEGER_PATTERN = /^[-+]?\d+$/;

/**
 * Convert a numeric-looking string to a number; anything else is returned unchanged
 *
 * @example
 * coerceScalar("42")   // 42
 * coerceScalar("2.5")  // 2.5
 * coerceScalar("v1.2") // "v1.2"
 * coerceScalar("12345678901234567890") // 12345678901234567890n
 */
export function coerceScalar(raw: string): Scalar {
  if (INTEGER_PATTERN.test(raw)) {
    return narrowInteger(BigInt(raw));
  }
  if (NUMBER_PATTERN.test(raw)) {
    const num = Number(raw);
    if (Number.isFinite(num)) {
      return num;
    }
  }
  return raw;
}

/**
 * Apply coerceScalar to string values only
 */
export function coerceValue(value: Value): Value {
  return typeof value === "string" ? coerceScalar(value) : value;
}

const FLOW_OPTIONS = {
  collectionStyle: "flow",
  flowCollectionPadding: false,
  lineWidth: 0,
} as const;

/**
 * Human-readable rendering of a value: strings as-is, null as empty string,
 * collections as single-line flow YAML
 */
export function formatValue(value: Value): string {
  if (value === null) return "";
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "bigint" || typeof value === "boolean") {
    return String(value);
  }
  return stringify(value, FLOW_OPTIONS).trimEnd();
}
