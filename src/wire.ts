/**
 * JSON wire form of a dynamic value, as the tools receive it.
 *
 *   { "type": "record", "cols": ["a"], "vals": [{ "type": "int", "val": 1 }] }
 *
 * Dates are ISO-8601 strings with an explicit offset; binary is a byte array.
 * An int may also be a string of decimal digits, for values beyond 2^53.
 */

import { z } from "zod";
import { PipelineError } from "./errors.js";
import { Value, type RangeInclusion, type Span } from "./value.js";

export type WireValue =
  | { type: "bool"; val: boolean; span?: Span }
  | { type: "int"; val: number | string; span?: Span }
  | { type: "float"; val: number; span?: Span }
  | { type: "string"; val: string; span?: Span }
  | { type: "binary"; val: number[]; span?: Span }
  | { type: "duration"; val: number; span?: Span }
  | { type: "date"; val: string; span?: Span }
  | { type: "filesize"; val: number; span?: Span }
  | { type: "range"; from: WireValue; to: WireValue; inclusion?: RangeInclusion; span?: Span }
  | { type: "list"; vals: WireValue[]; span?: Span }
  | { type: "record"; cols: string[]; vals: WireValue[]; span?: Span }
  | { type: "block"; id: number; span?: Span }
  | { type: "nothing"; span?: Span }
  | { type: "error"; msg: string; span?: Span }
  | { type: "cellpath"; members: Array<string | number>; span?: Span }
  | { type: "custom"; name: string; span?: Span };

const spanSchema = z.object({
  start: z.number().int().nonnegative(),
  end: z.number().int().nonnegative(),
});

const int = z.number().int();
const bigIntText = z.string().regex(/^-?\d+$/, "Expected a string of decimal digits");

export const wireValueSchema: z.ZodType<WireValue> = z.lazy(() =>
  z
    .discriminatedUnion("type", [
      z.object({ type: z.literal("bool"), val: z.boolean(), span: spanSchema.optional() }),
      z.object({ type: z.literal("int"), val: z.union([int, bigIntText]), span: spanSchema.optional() }),
      z.object({ type: z.literal("float"), val: z.number(), span: spanSchema.optional() }),
      z.object({ type: z.literal("string"), val: z.string(), span: spanSchema.optional() }),
      z.object({ type: z.literal("binary"), val: z.array(int.min(0).max(255)), span: spanSchema.optional() }),
      z.object({ type: z.literal("duration"), val: int, span: spanSchema.optional() }),
      z.object({ type: z.literal("date"), val: z.string().datetime({ offset: true }), span: spanSchema.optional() }),
      z.object({ type: z.literal("filesize"), val: int, span: spanSchema.optional() }),
      z.object({
        type: z.literal("range"),
        from: wireValueSchema,
        to: wireValueSchema,
        inclusion: z.enum(["inclusive", "right-exclusive"]).optional(),
        span: spanSchema.optional(),
      }),
      z.object({ type: z.literal("list"), vals: z.array(wireValueSchema), span: spanSchema.optional() }),
      z.object({
        type: z.literal("record"),
        cols: z.array(z.string()),
        vals: z.array(wireValueSchema),
        span: spanSchema.optional(),
      }),
      z.object({ type: z.literal("block"), id: int, span: spanSchema.optional() }),
      z.object({ type: z.literal("nothing"), span: spanSchema.optional() }),
      z.object({ type: z.literal("error"), msg: z.string(), span: spanSchema.optional() }),
      z.object({
        type: z.literal("cellpath"),
        members: z.array(z.union([z.string(), int.nonnegative()])),
        span: spanSchema.optional(),
      }),
      z.object({ type: z.literal("custom"), name: z.string(), span: spanSchema.optional() }),
    ])
    .superRefine((value, ctx) => {
      if (value.type !== "record") return;
      if (value.cols.length !== value.vals.length) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Record has ${value.cols.length} columns but ${value.vals.length} values`,
          path: ["vals"],
        });
      }
      const seen = new Set<string>();
      for (const [i, col] of value.cols.entries()) {
        if (seen.has(col)) {
          ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Duplicate column: ${col}`, path: ["cols", i] });
        }
        seen.add(col);
      }
    }),
);

const OFFSET_PATTERN = /(?:Z|([+-])(\d{2}):(\d{2}))$/i;

/** Minutes east of UTC named by an ISO-8601 timestamp's suffix. */
export function parseOffsetMinutes(iso: string): number {
  const match = iso.match(OFFSET_PATTERN);
  if (!match || match[1] === undefined) return 0;
  const minutes = parseInt(match[2], 10) * 60 + parseInt(match[3], 10);
  return match[1] === "-" ? -minutes : minutes;
}

function toValue(wire: WireValue): Value {
  const span = wire.span;
  switch (wire.type) {
    case "bool":
      return Value.bool(wire.val, span);
    case "int":
      return Value.int(typeof wire.val === "string" ? BigInt(wire.val) : wire.val, span);
    case "float":
      return Value.float(wire.val, span);
    case "string":
      return Value.string(wire.val, span);
    case "binary":
      return Value.binary(wire.val, span);
    case "duration":
      return Value.duration(wire.val, span);
    case "date":
      return Value.date(new Date(wire.val), parseOffsetMinutes(wire.val), span);
    case "filesize":
      return Value.filesize(wire.val, span);
    case "range":
      return Value.range(toValue(wire.from), toValue(wire.to), wire.inclusion, span);
    case "list":
      return Value.list(wire.vals.map(toValue), span);
    case "record":
      return { type: "record", cols: wire.cols, vals: wire.vals.map(toValue), span };
    case "block":
      return Value.block(wire.id, span);
    case "nothing":
      return Value.nothing(span);
    case "error":
      return Value.error(new PipelineError(wire.msg, span), span);
    case "cellpath":
      return Value.cellPath(wire.members, span);
    case "custom":
      return Value.custom(wire.name, span);
  }
}

/** Validate a wire value and build the dynamic value. Throws the zod error on bad input. */
export function decodeValue(input: unknown): Value {
  return toValue(wireValueSchema.parse(input));
}

/**
 * Lift plain JSON into a dynamic value: objects become records in key
 * order, arrays lists, null nothing; integral numbers are ints.
 */
export function liftJson(json: unknown): Value {
  if (json === null || json === undefined) return Value.nothing();
  if (typeof json === "boolean") return Value.bool(json);
  if (typeof json === "number") return Number.isInteger(json) ? Value.int(json) : Value.float(json);
  if (typeof json === "string") return Value.string(json);
  if (Array.isArray(json)) return Value.list(json.map((item: unknown) => liftJson(item)));
  if (typeof json === "object") {
    const cols: string[] = [];
    const vals: Value[] = [];
    for (const [key, item] of Object.entries(json)) {
      cols.push(key);
      vals.push(liftJson(item));
    }
    return { type: "record", cols, vals };
  }
  return Value.string(String(json));
}

/** Parse JSON text and lift it. Throws the JSON parser's SyntaxError. */
export function fromJson(text: string): Value {
  const parsed: unknown = JSON.parse(text);
  return liftJson(parsed);
}
