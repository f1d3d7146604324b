import { describe, it, expect } from "vitest";
import { renderDate, renderDuration, formatOffset } from "./render.js";

describe("renderDuration", () => {
  it("writes whole nanoseconds", () => {
    expect(renderDuration(1_500_000_000)).toBe("1500000000");
    expect(renderDuration(0)).toBe("0");
    expect(renderDuration(-42)).toBe("-42");
  });
});

describe("formatOffset", () => {
  it("formats positive, zero and negative offsets", () => {
    expect(formatOffset(0)).toBe("+00:00");
    expect(formatOffset(60)).toBe("+01:00");
    expect(formatOffset(-330)).toBe("-05:30");
  });
});

describe("renderDate", () => {
  const instant = new Date("2020-01-02T03:04:05Z");

  it("renders UTC", () => {
    expect(renderDate(instant, 0)).toBe("2020-01-02 03:04:05 +00:00");
  });

  it("shows wall-clock time in the value's offset", () => {
    expect(renderDate(instant, 60)).toBe("2020-01-02 04:04:05 +01:00");
    expect(renderDate(instant, -330)).toBe("2020-01-01 21:34:05 -05:30");
  });

  it("includes milliseconds only when non-zero", () => {
    expect(renderDate(new Date("2020-01-02T03:04:05.120Z"), 0)).toBe("2020-01-02 03:04:05.120 +00:00");
  });
});
