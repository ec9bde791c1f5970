import { describe, it, expect } from "vitest";
import { getAt, setAt, deleteAt, pushAt, popAt } from "./tree.js";
import { parsePath } from "./path.js";
import { decodeDocument } from "./codec.js";
import { toPlain } from "./value.js";
import { KeyNotFoundError, PathError } from "./errors.js";

const p = parsePath;

describe("tree accessor", () => {
  describe("getAt", () => {
    const doc = decodeDocument("items: [10, 20, 30]\nname: demo\nnothing: null\n");

    it("should return the whole document for the empty path", () => {
      expect(getAt(doc, [])).toEqual({ found: true, value: doc });
    });

    it("should resolve positive and negative indices", () => {
      expect(getAt(doc, p("items[0]"))).toEqual({ found: true, value: 10 });
      expect(getAt(doc, p("items[-1]"))).toEqual({ found: true, value: 30 });
      expect(getAt(doc, p("items[-3]"))).toEqual({ found: true, value: 10 });
    });

    it("should report out-of-range indices as not found", () => {
      expect(getAt(doc, p("items[3]"))).toEqual({ found: false });
      expect(getAt(doc, p("items[-4]"))).toEqual({ found: false });
    });

    it("should distinguish a stored null from a missing key", () => {
      expect(getAt(doc, p("nothing"))).toEqual({ found: true, value: null });
      expect(getAt(doc, p("missing"))).toEqual({ found: false });
    });

    it("should report segments applied to the wrong kind of node as not found", () => {
      expect(getAt(doc, p("name.first"))).toEqual({ found: false });
      expect(getAt(doc, p("items.0"))).toEqual({ found: false });
      expect(getAt(doc, p("name[0]"))).toEqual({ found: false });
      expect(getAt(doc, p("items[x]"))).toEqual({ found: false });
    });

    it("should agree between [-1] and [N-1]", () => {
      expect(getAt(doc, p("items[-1]"))).toEqual(getAt(doc, p("items[2]")));
    });

    it("should report [-1] on an empty sequence as not found", () => {
      expect(getAt(decodeDocument("empty: []\n"), p("empty[-1]"))).toEqual({ found: false });
    });
  });

  describe("setAt", () => {
    it("should create missing mappings on the way", () => {
      const doc = decodeDocument("");
      setAt(doc, p("a.b.c"), 1);
      expect(toPlain(doc)).toEqual({ a: { b: { c: 1 } } });
    });

    it("should replace a scalar intermediate with a fresh mapping", () => {
      const doc = decodeDocument("a:\n  b: hello\n");
      setAt(doc, p("a.b.c"), 1);
      expect(toPlain(doc)).toEqual({ a: { b: { c: 1 } } });
    });

    it("should replace an array intermediate when a key is applied to it", () => {
      const doc = decodeDocument("items: [1, 2]\n");
      setAt(doc, p("items.first"), 1);
      expect(toPlain(doc)).toEqual({ items: { first: 1 } });
    });

    it("should assign existing sequence elements", () => {
      const doc = decodeDocument("items: [10, 20, 30]\n");
      setAt(doc, p("items[1]"), 99);
      setAt(doc, p("items[-1]"), 5);
      expect(toPlain(doc)).toEqual({ items: [10, 99, 5] });
    });

    it("should set keys inside sequence elements", () => {
      const doc = decodeDocument("servers:\n  - host: a\n  - host: b\n");
      setAt(doc, p("servers[-1].port"), 8080);
      expect(toPlain(doc)).toEqual({ servers: [{ host: "a" }, { host: "b", port: 8080 }] });
    });

    it("should upsert the final key and keep a round trip", () => {
      const doc = decodeDocument("a:\n  b: 1\n");
      setAt(doc, p("a.b"), "two");
      expect(getAt(doc, p("a.b"))).toEqual({ found: true, value: "two" });
    });

    it("should never extend a sequence", () => {
      const doc = decodeDocument("items: [10, 20, 30]\n");
      expect(() => setAt(doc, p("items[3]"), 1)).toThrow(PathError);
      expect(() => setAt(doc, p("items[3]"), 1)).toThrow("array index out of bounds: 3 (length: 3)");
      expect(toPlain(doc)).toEqual({ items: [10, 20, 30] });
    });

    it("should fail when an index is applied to a missing or non-array value", () => {
      const doc = decodeDocument("x: 1\n");
      expect(() => setAt(doc, p("y[5]"), "z")).toThrow("not an array (path: y)");
      expect(() => setAt(doc, p("x[0]"), "z")).toThrow(PathError);
    });

    it("should fail on a non-numeric index", () => {
      const doc = decodeDocument("items: [1]\n");
      expect(() => setAt(doc, p("items[x]"), 2)).toThrow("invalid array index: x");
    });

    it("should reject the empty path", () => {
      expect(() => setAt(decodeDocument(""), [], 1)).toThrow("empty path");
    });
  });

  describe("deleteAt", () => {
    it("should remove an existing key", () => {
      const doc = decodeDocument("a:\n  b: 1\n  c: 2\n");
      expect(deleteAt(doc, p("a.b"))).toBe(true);
      expect(toPlain(doc)).toEqual({ a: { c: 2 } });
    });

    it("should be a no-op for missing keys, twice in a row", () => {
      const doc = decodeDocument("a: 1\n");
      expect(deleteAt(doc, p("missing"))).toBe(false);
      expect(deleteAt(doc, p("missing"))).toBe(false);
      expect(deleteAt(doc, p("nope.deeper.key"))).toBe(false);
      expect(toPlain(doc)).toEqual({ a: 1 });
    });

    it("should not delete array elements", () => {
      const doc = decodeDocument("items: [1, 2]\n");
      expect(() => deleteAt(doc, p("items[0]"))).toThrow("deleting array elements is not supported");
    });

    it("should fail when the parent is not a mapping", () => {
      const doc = decodeDocument("a: scalar\n");
      expect(() => deleteAt(doc, p("a.b"))).toThrow("path is not traversable (path: a)");
    });
  });

  describe("pushAt and popAt", () => {
    it("should create a one-element sequence when the path is absent", () => {
      const doc = decodeDocument("");
      pushAt(doc, p("tags"), "x");
      pushAt(doc, p("tags"), "y");
      expect(toPlain(doc)).toEqual({ tags: ["x", "y"] });
    });

    it("should refuse to push onto a non-array", () => {
      const doc = decodeDocument("name: demo\n");
      expect(() => pushAt(doc, p("name"), "x")).toThrow("not an array (path: name)");
    });

    it("should pop the last element", () => {
      const doc = decodeDocument("items: [1, 2, 3]\n");
      expect(popAt(doc, p("items"))).toBe(3);
      expect(toPlain(doc)).toEqual({ items: [1, 2] });
    });

    it("should fail to pop a missing, non-array or empty value", () => {
      const doc = decodeDocument("name: demo\nempty: []\n");
      expect(() => popAt(doc, p("missing"))).toThrow(KeyNotFoundError);
      expect(() => popAt(doc, p("name"))).toThrow("not an array");
      expect(() => popAt(doc, p("empty"))).toThrow("empty array (path: empty)");
    });
  });
});
