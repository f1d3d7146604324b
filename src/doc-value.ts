/**
 * The TOML document's own value model. Produced by the classifier,
 * consumed by the emitter.
 */

export type DocEntry = [key: string, value: DocValue];

export type DocValue =
  | { kind: "boolean"; value: boolean }
  | { kind: "integer"; value: bigint }
  | { kind: "float"; value: number }
  | { kind: "string"; value: string }
  | { kind: "datetime"; value: Date } // only from a reparsed document
  | { kind: "array"; items: DocValue[] }
  | { kind: "inline-table"; entries: DocEntry[] }
  | { kind: "table"; entries: DocEntry[] };

export type DocKind = DocValue["kind"];

export type DocTable = Extract<DocValue, { kind: "table" | "inline-table" }>;
export type DocArray = Extract<DocValue, { kind: "array" }>;

export const Doc = {
  boolean: (value: boolean): DocValue => ({ kind: "boolean", value }),
  integer: (value: number | bigint): DocValue => ({
    kind: "integer",
    value: typeof value === "bigint" ? value : BigInt(Math.trunc(value)),
  }),
  float: (value: number): DocValue => ({ kind: "float", value }),
  string: (value: string): DocValue => ({ kind: "string", value }),
  datetime: (value: Date): DocValue => ({ kind: "datetime", value }),
  array: (items: DocValue[]): DocArray => ({ kind: "array", items }),
  inlineTable: (entries: DocEntry[]): DocTable => ({ kind: "inline-table", entries }),
  table: (entries: DocEntry[]): DocTable => ({ kind: "table", entries }),
};

export function isTableShaped(value: DocValue): value is DocTable {
  return value.kind === "inline-table" || value.kind === "table";
}

export function isDocArray(value: DocValue): value is DocArray {
  return value.kind === "array";
}

/** Look up a key in a table; undefined for non-tables and missing keys. */
export function docGet(value: DocValue, key: string): DocValue | undefined {
  if (!isTableShaped(value)) return undefined;
  return value.entries.find(([k]) => k === key)?.[1];
}

/**
 * Structural equality. Tables compare by key, since a TOML printer may move
 * sub-tables after plain keys; array items compare in order. A root table
 * and an inline table with the same entries are equal.
 */
export function docValueEquals(a: DocValue, b: DocValue): boolean {
  if (isTableShaped(a) && isTableShaped(b)) {
    if (a.entries.length !== b.entries.length) return false;
    return a.entries.every(([key, val]) => {
      const other = docGet(b, key);
      return other !== undefined && docValueEquals(val, other);
    });
  }
  if (a.kind === "array" && b.kind === "array") {
    if (a.items.length !== b.items.length) return false;
    return a.items.every((item, i) => docValueEquals(item, b.items[i]));
  }
  if (a.kind === "datetime" && b.kind === "datetime") {
    return a.value.toISOString() === b.value.toISOString();
  }
  if (a.kind === "float" && b.kind === "float") {
    return Object.is(a.value, b.value) || a.value === b.value;
  }
  if (
    (a.kind === "boolean" && b.kind === "boolean") ||
    (a.kind === "integer" && b.kind === "integer") ||
    (a.kind === "string" && b.kind === "string")
  ) {
    return a.value === b.value;
  }
  return false;
}
