/**
 * Entry point of the converter: checks the root shape, converts, emits.
 */

import { encodeList, encodeRecord, type ClassifyOptions } from "./classify.js";
import { Doc, isTableShaped, type DocValue } from "./doc-value.js";
import { emitDocument, parseDocument } from "./emit.js";
import { EmbeddedParseError, ShapeError } from "./errors.js";
import {
  isRecord,
  typeName,
  valueSpan,
  type ErrorValue,
  type ListValue,
  type RecordValue,
  type StringValue,
  type Value,
} from "./value.js";

export type ConvertOptions = ClassifyOptions;

type RootValue = RecordValue | ListValue | StringValue | ErrorValue;

/**
 * Reject roots that cannot become a TOML document, before any conversion
 * work. A root list needs at least one element, and every element must be
 * a record. Error values pass so that their own error surfaces.
 */
export function checkTopLevel(value: Value): asserts value is RootValue {
  switch (value.type) {
    case "record":
    case "string":
    case "error":
      return;
    case "list":
      if (value.vals.length > 0 && value.vals.every(isRecord)) return;
      throw new ShapeError("Expected a table with TOML-compatible structure from pipeline", {
        span: valueSpan(value),
      });
    default:
      throw new ShapeError(`${typeName(value)} is not a valid top-level TOML`, { span: valueSpan(value) });
  }
}

/** Treat a root string as an already-serialized document. */
export function reparseString(value: StringValue): DocValue {
  try {
    return parseDocument(value.val);
  } catch (e: unknown) {
    throw new EmbeddedParseError(`${JSON.stringify(value.val)} unable to de-serialize string to TOML`, {
      span: valueSpan(value),
      cause: e,
    });
  }
}

/**
 * Convert a root value to a document tree. A record becomes the root table;
 * a list of records becomes an array of tables, or the table itself when
 * there is exactly one.
 */
export function valueToDoc(value: Value, options: ConvertOptions = {}): DocValue {
  checkTopLevel(value);
  switch (value.type) {
    case "record":
      return Doc.table(encodeRecord(value, options).entries);
    case "list": {
      const doc = encodeList(value, options);
      return isTableShaped(doc) ? Doc.table(doc.entries) : doc;
    }
    case "string":
      return reparseString(value);
    case "error":
      throw value.error;
  }
}

/**
 * Convert a root value to TOML text. A TOML document is always a table, so
 * a list of two or more records fails here, before anything is written.
 */
export function toToml(value: Value, options: ConvertOptions = {}): string {
  const doc = valueToDoc(value, options);
  if (doc.kind !== "table") {
    const count = doc.kind === "array" ? doc.items.length : 1;
    throw new ShapeError(`Expected a single table at the TOML document root, found an array of ${count} tables`, {
      span: valueSpan(value),
    });
  }
  return emitDocument(doc);
}
