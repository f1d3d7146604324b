/**
 * The dynamic value handed in by the host pipeline.
 * One variant per kind; every variant may carry the span it came from.
 */

export interface Span {
  start: number;
  end: number;
}

export const UNKNOWN_SPAN: Span = { start: 0, end: 0 };

export type PathMember =
  | { kind: "string"; val: string }
  | { kind: "int"; val: number };

export type RangeInclusion = "inclusive" | "right-exclusive";

interface Spanned {
  span?: Span;
}

export interface BoolValue extends Spanned { type: "bool"; val: boolean; }
export interface IntValue extends Spanned { type: "int"; val: number | bigint; } // bigint beyond 2^53
export interface FloatValue extends Spanned { type: "float"; val: number; }
export interface StringValue extends Spanned { type: "string"; val: string; }
export interface BinaryValue extends Spanned { type: "binary"; val: Uint8Array; }
export interface DurationValue extends Spanned { type: "duration"; val: number; } // nanoseconds
export interface DateValue extends Spanned { type: "date"; val: Date; offsetMinutes: number; }
export interface FilesizeValue extends Spanned { type: "filesize"; val: number; } // bytes
export interface RangeValue extends Spanned { type: "range"; from: Value; to: Value; inclusion: RangeInclusion; }
export interface ListValue extends Spanned { type: "list"; vals: Value[]; }
export interface RecordValue extends Spanned { type: "record"; cols: string[]; vals: Value[]; }
export interface BlockValue extends Spanned { type: "block"; id: number; }
export interface NothingValue extends Spanned { type: "nothing"; }
export interface ErrorValue extends Spanned { type: "error"; error: Error; }
export interface CellPathValue extends Spanned { type: "cellpath"; members: PathMember[]; }
export interface CustomValue extends Spanned { type: "custom"; name: string; }

export type Value =
  | BoolValue
  | IntValue
  | FloatValue
  | StringValue
  | BinaryValue
  | DurationValue
  | DateValue
  | FilesizeValue
  | RangeValue
  | ListValue
  | RecordValue
  | BlockValue
  | NothingValue
  | ErrorValue
  | CellPathValue
  | CustomValue;

export type ValueType = Value["type"];

const TYPE_NAMES: Record<ValueType, string> = {
  bool: "bool",
  int: "int",
  float: "float",
  string: "string",
  binary: "binary",
  duration: "duration",
  date: "date",
  filesize: "filesize",
  range: "range",
  list: "list",
  record: "record",
  block: "block",
  nothing: "nothing",
  error: "error",
  cellpath: "cell path",
  custom: "custom",
};

/** Runtime type name, as shown in error messages. */
export function typeName(value: Value): string {
  return TYPE_NAMES[value.type];
}

export function valueSpan(value: Value): Span {
  return value.span ?? UNKNOWN_SPAN;
}

export function isRecord(value: Value): value is RecordValue {
  return value.type === "record";
}

// --- Constructors ---

export const Value = {
  bool: (val: boolean, span?: Span): BoolValue => ({ type: "bool", val, span }),
  int: (val: number | bigint, span?: Span): IntValue => ({ type: "int", val, span }),
  float: (val: number, span?: Span): FloatValue => ({ type: "float", val, span }),
  string: (val: string, span?: Span): StringValue => ({ type: "string", val, span }),
  binary: (val: Uint8Array | number[], span?: Span): BinaryValue => ({
    type: "binary",
    val: val instanceof Uint8Array ? val : Uint8Array.from(val),
    span,
  }),
  duration: (nanos: number, span?: Span): DurationValue => ({ type: "duration", val: nanos, span }),
  date: (val: Date, offsetMinutes = 0, span?: Span): DateValue => ({ type: "date", val, offsetMinutes, span }),
  filesize: (bytes: number, span?: Span): FilesizeValue => ({ type: "filesize", val: bytes, span }),
  range: (from: Value, to: Value, inclusion: RangeInclusion = "inclusive", span?: Span): RangeValue => ({
    type: "range",
    from,
    to,
    inclusion,
    span,
  }),
  list: (vals: Value[], span?: Span): ListValue => ({ type: "list", vals, span }),
  /** Build a record from an object; key order follows insertion order. */
  record: (fields: Record<string, Value>, span?: Span): RecordValue => ({
    type: "record",
    cols: Object.keys(fields),
    vals: Object.values(fields),
    span,
  }),
  block: (id: number, span?: Span): BlockValue => ({ type: "block", id, span }),
  nothing: (span?: Span): NothingValue => ({ type: "nothing", span }),
  error: (error: Error, span?: Span): ErrorValue => ({ type: "error", error, span }),
  cellPath: (members: Array<string | number>, span?: Span): CellPathValue => ({
    type: "cellpath",
    members: members.map((m): PathMember =>
      typeof m === "string" ? { kind: "string", val: m } : { kind: "int", val: m },
    ),
    span,
  }),
  custom: (name: string, span?: Span): CustomValue => ({ type: "custom", name, span }),
};
