import { describe, it, expect } from "vitest";
import {
  cloneValue,
  coerceScalar,
  coerceValue,
  formatValue,
  fromUnknown,
  isMapping,
  toPlain,
  valuesEqual,
} from "./value.js";

describe("value model", () => {
  describe("coerceScalar", () => {
    it("should convert integers and floats", () => {
      expect(coerceScalar("42")).toBe(42);
      expect(coerceScalar("-3")).toBe(-3);
      expect(coerceScalar("2.5")).toBe(2.5);
      expect(coerceScalar(".5")).toBe(0.5);
      expect(coerceScalar("1e5")).toBe(100000);
      expect(coerceScalar("007")).toBe(7);
      expect(coerceScalar("12345678901234567890")).toBe(12345678901234567890n);
      expect(coerceScalar("-9007199254740991")).toBe(-9007199254740991);
    });

    it("should keep non-numeric strings", () => {
      expect(coerceScalar("v1.2")).toBe("v1.2");
      expect(coerceScalar("")).toBe("");
      expect(coerceScalar("0x10")).toBe("0x10");
      expect(coerceScalar("Infinity")).toBe("Infinity");
      expect(coerceScalar("true")).toBe("true");
      expect(coerceScalar(" 1")).toBe(" 1");
    });

    it("should only coerce strings", () => {
      expect(coerceValue(true)).toBe(true);
      expect(coerceValue(["1"])).toEqual(["1"]);
      expect(coerceValue("8080")).toBe(8080);
    });
  });

  describe("valuesEqual", () => {
    it("should ignore mapping key order", () => {
      const a = new Map([
        ["x", 1],
        ["y", 2],
      ]);
      const b = new Map([
        ["y", 2],
        ["x", 1],
      ]);
      expect(valuesEqual(a, b)).toBe(true);
    });

    it("should compare sequences element-wise", () => {
      expect(valuesEqual([1, "a", null], [1, "a", null])).toBe(true);
      expect(valuesEqual([1, 2], [2, 1])).toBe(false);
      expect(valuesEqual([1], new Map())).toBe(false);
      expect(valuesEqual(null, false)).toBe(false);
    });
  });

  describe("cloneValue", () => {
    it("should deep copy nested containers", () => {
      const original = new Map([["list", [1, 2]]]);
      const copy = cloneValue(original);

      if (!isMapping(copy)) throw new Error("expected a mapping");
      const list = copy.get("list");
      if (!Array.isArray(list)) throw new Error("expected a sequence");
      list.push(3);

      expect(original.get("list")).toEqual([1, 2]);
    });
  });

  describe("fromUnknown and toPlain", () => {
    it("should stringify mapping keys and keep insertion order", () => {
      const value = fromUnknown(
        new Map<unknown, unknown>([
          [2, "b"],
          [1, "a"],
        ])
      );
      expect(isMapping(value) ? [...value.keys()] : undefined).toEqual(["2", "1"]);
    });

    it("should accept plain objects and convert back", () => {
      const value = fromUnknown({ a: { b: [1, null, true] } });
      expect(value === undefined ? undefined : toPlain(value)).toEqual({ a: { b: [1, null, true] } });
    });

    it("should narrow safe bigint integers and keep the rest", () => {
      expect(fromUnknown(42n)).toBe(42);
      expect(fromUnknown(9007199254740993n)).toBe(9007199254740993n);
      expect(toPlain(9007199254740993n)).toBe("9007199254740993");
    });

    it("should reject unsupported values", () => {
      expect(fromUnknown(Number.NaN)).toBeUndefined();
      expect(fromUnknown({ fn: () => 1 })).toBeUndefined();
      expect(fromUnknown([undefined])).toBeUndefined();
    });
  });

  describe("formatValue", () => {
    it("should render scalars plainly", () => {
      expect(formatValue(null)).toBe("");
      expect(formatValue("text")).toBe("text");
      expect(formatValue(2000)).toBe("2000");
      expect(formatValue(false)).toBe("false");
      expect(formatValue(12345678901234567890n)).toBe("12345678901234567890");
    });

    it("should render collections as single-line flow YAML", () => {
      expect(formatValue(["a", "b"])).toBe("[a, b]");
      expect(formatValue(new Map([["k", 1]]))).toBe("{k: 1}");
    });
  });
});
