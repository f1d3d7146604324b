/**
 * Conversion errors. Each carries the span of the value it is about.
 */

import type { Span } from "./value.js";

type ConversionErrorOptions = { span?: Span; cause?: unknown };

function describeSpan(span: Span | undefined): string {
  if (!span || (span.start === 0 && span.end === 0)) return "";
  return `at bytes ${span.start}..${span.end}`;
}

export class ConversionError extends Error {
  override readonly name: string = "ConversionError";
  readonly span?: Span;

  constructor(message: string, options?: ConversionErrorOptions) {
    super(message);
    this.span = options?.span;
    if (options?.cause !== undefined) this.cause = options.cause;
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /** Human-readable location, empty when the span is unknown. */
  get location(): string {
    return describeSpan(this.span);
  }

  override toString(): string {
    const loc = this.location;
    return loc ? `${this.message} (${loc})` : this.message;
  }
}

/** Root value cannot be the root of a TOML document. */
export class ShapeError extends ConversionError {
  override readonly name = "ShapeError";
}

/** Root value is a string that does not parse as TOML. */
export class EmbeddedParseError extends ConversionError {
  override readonly name = "EmbeddedParseError";
}

/** Range, block, nothing or custom value met in strict mode. */
export class UnsupportedValueError extends ConversionError {
  override readonly name = "UnsupportedValueError";
}

export class DepthLimitError extends ConversionError {
  override readonly name = "DepthLimitError";
}

export class ConversionCancelledError extends ConversionError {
  override readonly name = "ConversionCancelledError";
}

/**
 * A failure that happened upstream and travels inside an `error` value.
 * The converter rethrows it untouched.
 */
export class PipelineError extends Error {
  override readonly name = "PipelineError";
  readonly span?: Span;

  constructor(message: string, span?: Span) {
    super(message);
    this.span = span;
    Object.setPrototypeOf(this, new.target.prototype);
  }

  get location(): string {
    return describeSpan(this.span);
  }
}
