/**
 * Dynamic value → document value.
 *
 * classifyValue is the recursive leaf/dispatch step; encodeRecord and
 * encodeList handle the two containers. The first failing field or element
 * aborts the whole walk, so no partial table or array ever escapes.
 */

import { Doc, isTableShaped, type DocArray, type DocEntry, type DocTable, type DocValue } from "./doc-value.js";
import { ConversionCancelledError, DepthLimitError, UnsupportedValueError } from "./errors.js";
import { renderDate, renderDuration } from "./render.js";
import { typeName, valueSpan, type ListValue, type RecordValue, type Value } from "./value.js";

export const DEFAULT_MAX_DEPTH = 256;

export const PLACEHOLDERS = {
  range: "<Range>",
  block: "<Block>",
  nothing: "<Nothing>",
  custom: "<Custom Value>",
} as const;

export interface ClassifyOptions {
  /** Fail on range, block, nothing and custom values instead of writing a placeholder. */
  strict?: boolean;
  /** Max container nesting depth (default 256). */
  maxDepth?: number;
  /** Polled between the elements of a list handed to encodeList; nested lists are not polled. */
  signal?: AbortSignal;
}

interface Context {
  strict: boolean;
  maxDepth: number;
}

function toContext(options: ClassifyOptions): Context {
  return {
    strict: options.strict ?? false,
    maxDepth: options.maxDepth ?? DEFAULT_MAX_DEPTH,
  };
}

// --- Single-table unwrap ---

/** True for an array holding exactly one table. Two or more tables stay an array. */
export function isSingleTableArray(array: DocArray): boolean {
  return array.items.length === 1 && isTableShaped(array.items[0]);
}

export function unwrapSingleTable(array: DocArray): DocValue {
  return isSingleTableArray(array) ? array.items[0] : array;
}

// --- Classification ---

function placeholder(value: Value, text: string, ctx: Context): DocValue {
  if (ctx.strict) {
    throw new UnsupportedValueError(`${typeName(value)} has no TOML representation`, { span: valueSpan(value) });
  }
  return Doc.string(text);
}

function enter(value: Value, depth: number, ctx: Context): void {
  if (depth > ctx.maxDepth) {
    throw new DepthLimitError(`Maximum nesting depth exceeded (${ctx.maxDepth})`, { span: valueSpan(value) });
  }
}

function classify(value: Value, ctx: Context, depth: number): DocValue {
  switch (value.type) {
    case "bool":
      return Doc.boolean(value.val);
    case "int":
      return Doc.integer(value.val);
    case "float":
      return Doc.float(value.val);
    case "string":
      return Doc.string(value.val);
    case "filesize":
      return Doc.integer(value.val);
    case "duration":
      return Doc.string(renderDuration(value.val));
    case "date":
      return Doc.string(renderDate(value.val, value.offsetMinutes));
    case "binary":
      return Doc.array(Array.from(value.val, (byte) => Doc.integer(byte)));
    case "cellpath":
      return Doc.array(
        value.members.map((m) => (m.kind === "string" ? Doc.string(m.val) : Doc.integer(m.val))),
      );
    case "record":
      return recordToTable(value, ctx, depth);
    case "list":
      return listToArray(value, ctx, depth);
    case "range":
      return placeholder(value, PLACEHOLDERS.range, ctx);
    case "block":
      return placeholder(value, PLACEHOLDERS.block, ctx);
    case "nothing":
      return placeholder(value, PLACEHOLDERS.nothing, ctx);
    case "custom":
      return placeholder(value, PLACEHOLDERS.custom, ctx);
    case "error":
      // Re-surfaced as-is: same object, same message.
      throw value.error;
    default: {
      const unhandled: never = value;
      throw new Error(`Unhandled value: ${JSON.stringify(unhandled)}`);
    }
  }
}

function recordToTable(record: RecordValue, ctx: Context, depth: number): DocTable {
  enter(record, depth, ctx);
  const entries: DocEntry[] = [];
  for (let i = 0; i < record.cols.length; i++) {
    entries.push([record.cols[i], classify(record.vals[i], ctx, depth + 1)]);
  }
  return Doc.inlineTable(entries);
}

function listToArray(
  list: ListValue,
  ctx: Context,
  depth: number,
  beforeElement?: () => void,
): DocValue {
  enter(list, depth, ctx);
  const items: DocValue[] = [];
  for (const element of list.vals) {
    beforeElement?.();
    items.push(classify(element, ctx, depth + 1));
  }
  return unwrapSingleTable(Doc.array(items));
}

// --- Public API ---

export function classifyValue(value: Value, options: ClassifyOptions = {}): DocValue {
  return classify(value, toContext(options), 0);
}

/** Record → inline table, fields in their original order. */
export function encodeRecord(record: RecordValue, options: ClassifyOptions = {}): DocTable {
  return recordToTable(record, toContext(options), 0);
}

/**
 * List → array, elements in their original order, then the single-table
 * unwrap. When a signal is given it is checked before each element.
 */
export function encodeList(list: ListValue, options: ClassifyOptions = {}): DocValue {
  const { signal } = options;
  const poll = signal
    ? () => {
        if (signal.aborted) {
          throw new ConversionCancelledError("Conversion cancelled", { span: valueSpan(list), cause: signal.reason });
        }
      }
    : undefined;
  return listToArray(list, toContext(options), 0, poll);
}
