import { describe, it, expect } from "vitest";
import { Doc, docGet, docValueEquals, isTableShaped, isDocArray } from "./doc-value.js";

describe("isTableShaped", () => {
  it("accepts root and inline tables", () => {
    expect(isTableShaped(Doc.table([]))).toBe(true);
    expect(isTableShaped(Doc.inlineTable([]))).toBe(true);
  });

  it("rejects arrays and scalars", () => {
    expect(isTableShaped(Doc.array([]))).toBe(false);
    expect(isTableShaped(Doc.string("a"))).toBe(false);
    expect(isDocArray(Doc.array([]))).toBe(true);
  });
});

describe("docGet", () => {
  it("finds a key in a table", () => {
    expect(docGet(Doc.inlineTable([["a", Doc.integer(1)]]), "a")).toEqual(Doc.integer(1));
  });

  it("returns undefined for missing keys and non-tables", () => {
    expect(docGet(Doc.table([]), "a")).toBeUndefined();
    expect(docGet(Doc.integer(1), "a")).toBeUndefined();
  });
});

describe("docValueEquals", () => {
  it("compares scalars by kind and value", () => {
    expect(docValueEquals(Doc.integer(1), Doc.integer(1))).toBe(true);
    expect(docValueEquals(Doc.integer(1), Doc.float(1))).toBe(false);
    expect(docValueEquals(Doc.string("1"), Doc.integer(1))).toBe(false);
    expect(docValueEquals(Doc.float(NaN), Doc.float(NaN))).toBe(true);
  });

  it("stores integers as bigint", () => {
    expect(Doc.integer(7)).toEqual({ kind: "integer", value: 7n });
    expect(docValueEquals(Doc.integer(7), Doc.integer(7n))).toBe(true);
  });

  it("compares table entries by key, not position", () => {
    const ab = Doc.table([["a", Doc.integer(1)], ["b", Doc.integer(2)]]);
    const ba = Doc.table([["b", Doc.integer(2)], ["a", Doc.integer(1)]]);
    const ac = Doc.table([["a", Doc.integer(1)], ["c", Doc.integer(2)]]);
    expect(docValueEquals(ab, ba)).toBe(true);
    expect(docValueEquals(ab, ac)).toBe(false);
  });

  it("treats root and inline tables with the same entries as equal", () => {
    const entries: Parameters<typeof Doc.table>[0] = [["a", Doc.array([Doc.boolean(true)])]];
    expect(docValueEquals(Doc.table(entries), Doc.inlineTable(entries))).toBe(true);
  });

  it("compares arrays item by item", () => {
    expect(docValueEquals(Doc.array([Doc.integer(1)]), Doc.array([Doc.integer(1), Doc.integer(2)]))).toBe(false);
    expect(docValueEquals(Doc.array([Doc.integer(1)]), Doc.array([Doc.integer(1)]))).toBe(true);
  });

  it("compares datetimes by instant", () => {
    expect(docValueEquals(Doc.datetime(new Date(0)), Doc.datetime(new Date(0)))).toBe(true);
  });
});
