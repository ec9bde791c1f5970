import { describe, it, expect } from "vitest";
import { resolveNegativeIndices } from "./resolve.js";
import { formatPath, parsePath } from "./path.js";
import { decodeDocument } from "./codec.js";
import { getAt } from "./tree.js";
import { PathError } from "./errors.js";

const doc = decodeDocument(
  "items: [10, 20, 30]\nservers:\n  - name: a\n    tags: [x, y]\n  - name: b\n    tags: [z]\nempty: []\nname: demo\n"
);

function resolved(expr: string): string {
  return formatPath(resolveNegativeIndices(doc, parsePath(expr)));
}

describe("resolveNegativeIndices", () => {
  it("should rewrite a negative index against the sequence length", () => {
    expect(resolved("items[-1]")).toBe("items[2]");
    expect(resolved("items[-3]")).toBe("items[0]");
  });

  it("should rewrite nested negative indices", () => {
    expect(resolved("servers[-2].tags[-1]")).toBe("servers[0].tags[1]");
  });

  it("should leave canonical paths unchanged", () => {
    expect(resolved("servers[1].name")).toBe("servers[1].name");
    expect(resolved("missing.key")).toBe("missing.key");
  });

  it("should address the same node as the original path", () => {
    const path = parsePath("servers[-1].tags[-1]");
    expect(getAt(doc, resolveNegativeIndices(doc, path))).toEqual(getAt(doc, path));
  });

  it("should reject a negative index on a non-array", () => {
    expect(() => resolved("name[-1]")).toThrow(PathError);
    expect(() => resolved("name[-1]")).toThrow("negative index -1 used on non-array (path: name[-1])");
    expect(() => resolved("missing[-1]")).toThrow(PathError);
  });

  it("should reject an out-of-bounds negative index", () => {
    expect(() => resolved("items[-4]")).toThrow("array index out of bounds: -4 (length: 3)");
    expect(() => resolved("empty[-1]")).toThrow("array index out of bounds: -1 (length: 0)");
  });
});
