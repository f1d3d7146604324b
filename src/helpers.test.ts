import { describe, it, expect } from "vitest";
import { errorMessage, formatError, closestMatch, unknownParameterError } from "./helpers.js";
import { PipelineError, ShapeError } from "./errors.js";

describe("errorMessage", () => {
  it("extracts message from Error", () => {
    expect(errorMessage(new Error("boom"))).toBe("boom");
  });

  it("returns string errors as-is", () => {
    expect(errorMessage("something broke")).toBe("something broke");
  });

  it("stringifies non-Error non-string values", () => {
    expect(errorMessage(42)).toBe("42");
    expect(errorMessage(null)).toBe("null");
    expect(errorMessage(undefined)).toBe("undefined");
  });
});

describe("formatError", () => {
  it("appends the location of conversion errors", () => {
    expect(formatError(new ShapeError("int is not a valid top-level TOML", { span: { start: 0, end: 2 } }))).toBe(
      "int is not a valid top-level TOML (at bytes 0..2)",
    );
  });

  it("appends the location of pipeline errors", () => {
    expect(formatError(new PipelineError("boom", { start: 4, end: 8 }))).toBe("boom (at bytes 4..8)");
  });

  it("leaves out an unknown location", () => {
    expect(formatError(new ShapeError("no span"))).toBe("no span");
    expect(formatError(new PipelineError("zero span", { start: 0, end: 0 }))).toBe("zero span");
  });

  it("formats plain errors by message", () => {
    expect(formatError(new Error("plain"))).toBe("plain");
  });
});

describe("closestMatch", () => {
  it("suggests a close parameter name", () => {
    expect(closestMatch("strct", ["value", "strict"])).toBe("strict");
    expect(closestMatch("VALUE", ["value", "strict"])).toBe("value");
  });

  it("returns null when nothing is close", () => {
    expect(closestMatch("completely_different", ["value", "strict"])).toBeNull();
  });
});

describe("unknownParameterError", () => {
  it("returns null when all parameters are known", () => {
    expect(unknownParameterError("to_toml", { value: 1, strict: true }, ["value", "strict"])).toBeNull();
  });

  it("lists unknown parameters with suggestions", () => {
    expect(unknownParameterError("to_toml", { value: 1, strct: true }, ["value", "strict"])).toBe(
      "Unknown parameter 'strct': Did you mean 'strict'?\n\nValid parameters for to_toml: value, strict",
    );
  });

  it("omits the suggestion when nothing is close", () => {
    expect(unknownParameterError("to_toml", { zzzzzzzz: 1 }, ["value", "strict"])).toBe(
      "Unknown parameter 'zzzzzzzz'.\n\nValid parameters for to_toml: value, strict",
    );
  });
});
