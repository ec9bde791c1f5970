import { describe, it, expect } from "vitest";
import { parsePath, formatPath, keySegment, indexSegment } from "./path.js";

describe("parsePath", () => {
  it("should return no segments for the empty string", () => {
    expect(parsePath("")).toEqual([]);
  });

  it("should split nested keys on dots", () => {
    expect(parsePath("a.b.c")).toEqual([keySegment("a"), keySegment("b"), keySegment("c")]);
  });

  it("should treat an escaped dot as part of the key", () => {
    expect(parsePath("a\\.b.c")).toEqual([keySegment("a.b"), keySegment("c")]);
  });

  it("should parse bracket indices", () => {
    expect(parsePath("items[0].name")).toEqual([
      keySegment("items"),
      { kind: "index", raw: "0", index: 0 },
      keySegment("name"),
    ]);
  });

  it("should parse negative and signed indices", () => {
    expect(parsePath("arr[-1]")).toEqual([keySegment("arr"), { kind: "index", raw: "-1", index: -1 }]);
    expect(parsePath("arr[+2]")).toEqual([keySegment("arr"), { kind: "index", raw: "+2", index: 2 }]);
  });

  it("should parse consecutive indices and a leading index", () => {
    expect(parsePath("grid[1][2]")).toEqual([keySegment("grid"), indexSegment("1"), indexSegment("2")]);
    expect(parsePath("[0]")).toEqual([indexSegment("0")]);
  });

  it("should never produce empty key segments", () => {
    expect(parsePath("a..b")).toEqual([keySegment("a"), keySegment("b")]);
    expect(parsePath(".a.")).toEqual([keySegment("a")]);
  });

  it("should keep an unclosed bracket as a literal character", () => {
    expect(parsePath("a[b")).toEqual([keySegment("a"), keySegment("[b")]);
  });

  it("should accept non-numeric bracket content without failing", () => {
    expect(parsePath("arr[x]")).toEqual([keySegment("arr"), { kind: "index", raw: "x", index: undefined }]);
  });
});

describe("formatPath", () => {
  it("should render keys and indices canonically", () => {
    expect(formatPath(parsePath("items[-1].name"))).toBe("items[-1].name");
    expect(formatPath([keySegment("a.b"), indexSegment("2")])).toBe("a\\.b[2]");
  });

  it("should render the raw text of invalid indices", () => {
    expect(formatPath(parsePath("arr[x]"))).toBe("arr[x]");
  });

  it("should round-trip through parsePath", () => {
    const path = [keySegment("server.name"), keySegment("ports"), indexSegment("3")];
    expect(parsePath(formatPath(path))).toEqual(path);
  });
});
