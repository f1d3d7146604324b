/**
 * Bridge between the document value tree and smol-toml, which does all of
 * the printing and parsing. No escaping or layout happens here.
 *
 * Integers travel as bigint and floats as number in both directions, so
 * `2.0` stays a float and 64-bit integers keep every digit.
 */

import { parse, stringify } from "smol-toml";
import { Doc, type DocEntry, type DocTable, type DocValue } from "./doc-value.js";
import { ConversionError } from "./errors.js";

type TomlInput = boolean | bigint | number | string | Date | TomlInput[] | TomlInputTable;
interface TomlInputTable {
  [key: string]: TomlInput;
}

function childPath(path: string, key: string): string {
  return path ? `${path}.${key}` : key;
}

function toInputTable(entries: DocEntry[]): TomlInputTable {
  const table: TomlInputTable = {};
  for (const [key, value] of entries) {
    table[key] = toTomlValue(value);
  }
  return table;
}

/** Convert one document value to the printer's input model. */
export function toTomlValue(doc: DocValue): TomlInput {
  switch (doc.kind) {
    case "boolean":
    case "integer":
    case "float":
    case "string":
    case "datetime":
      return doc.value;
    case "array":
      return doc.items.map(toTomlValue);
    case "inline-table":
    case "table":
      return toInputTable(doc.entries);
  }
}

/** Render a root table as a TOML document: one trailing newline, or "" when empty. */
export function emitDocument(doc: DocTable): string {
  const text = stringify(toInputTable(doc.entries), { numbersAsFloat: true }).trimEnd();
  return text === "" ? "" : `${text}\n`;
}

// --- Parsed TOML → document value ---

function fromParsed(value: unknown, path: string): DocValue {
  if (typeof value === "boolean") return Doc.boolean(value);
  if (typeof value === "string") return Doc.string(value);
  if (typeof value === "bigint") return Doc.integer(value);
  if (typeof value === "number") return Doc.float(value);
  if (value instanceof Date) return Doc.datetime(value);
  if (Array.isArray(value)) {
    return Doc.array(value.map((item: unknown, i) => fromParsed(item, `${path}[${i}]`)));
  }
  if (value !== null && typeof value === "object") {
    return Doc.inlineTable(parsedEntries(value, path));
  }
  throw new ConversionError(`Unexpected ${typeof value} in parsed TOML at "${path}"`);
}

function parsedEntries(table: object, path: string): DocEntry[] {
  return Object.entries(table).map(([key, value]): DocEntry => [key, fromParsed(value, childPath(path, key))]);
}

/** Map a parsed document to a root table. */
export function fromTomlDocument(document: object): DocTable {
  return Doc.table(parsedEntries(document, ""));
}

/** Parse TOML text with the same library that prints it. Throws the parser's error. */
export function parseDocument(text: string): DocTable {
  return fromTomlDocument(parse(text, { integersAsBigInt: true }));
}
