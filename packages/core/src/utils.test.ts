import { describe, expect, it } from "vitest";
import { createCounts, decrementCount, incrementCount, parseTimestampMs, trimTitle, truncateCodePoints } from "./utils.js";

describe("parseTimestampMs", () => {
  it("reads RFC3339 strings with any fractional precision", () => {
    expect(parseTimestampMs("2024-01-02T03:04:05Z")).toBe(Date.UTC(2024, 0, 2, 3, 4, 5));
    expect(parseTimestampMs("2024-01-02T03:04:05.123456789Z")).toBe(Date.UTC(2024, 0, 2, 3, 4, 5, 123));
  });

  it("reads unix seconds and milliseconds as numbers or digit strings", () => {
    expect(parseTimestampMs("1700000000")).toBe(1_700_000_000_000);
    expect(parseTimestampMs(1_700_000_000)).toBe(1_700_000_000_000);
    expect(parseTimestampMs(1_700_000_000_123)).toBe(1_700_000_000_123);
  });

  it("returns null for values that are not timestamps", () => {
    expect(parseTimestampMs("yesterday")).toBeNull();
    expect(parseTimestampMs(12_345)).toBeNull();
    expect(parseTimestampMs("")).toBeNull();
    expect(parseTimestampMs({ seconds: 1 })).toBeNull();
  });
});

describe("titles", () => {
  it("cuts titles at 80 code points and appends an ellipsis", () => {
    expect(trimTitle("a".repeat(80))).toBe("a".repeat(80));
    expect(trimTitle("a".repeat(81))).toBe(`${"a".repeat(80)}…`);
    expect(trimTitle("😀".repeat(81))).toBe(`${"😀".repeat(80)}…`);
  });

  it("trims and flattens newlines", () => {
    expect(trimTitle("  first line\r\nsecond line\n")).toBe("first line second line");
  });

  it("truncates previews without splitting surrogate pairs", () => {
    expect(truncateCodePoints("ab😀cd", 3)).toBe("ab😀");
    expect(truncateCodePoints("abc", 10)).toBe("abc");
  });
});

describe("histograms", () => {
  it("drops a key once its count reaches zero", () => {
    const counts = createCounts();
    incrementCount(counts, "user");
    incrementCount(counts, "user");
    decrementCount(counts, "user");
    expect({ ...counts }).toEqual({ user: 1 });
    decrementCount(counts, "user");
    expect({ ...counts }).toEqual({});
  });

  it("counts keys that name Object.prototype members", () => {
    const counts = createCounts();
    incrementCount(counts, "constructor");
    incrementCount(counts, "toString");
    incrementCount(counts, "toString");
    incrementCount(counts, "__proto__");
    expect(counts["constructor"]).toBe(1);
    expect(counts["toString"]).toBe(2);
    expect(Object.keys(counts)).toEqual(["constructor", "toString", "__proto__"]);
    decrementCount(counts, "__proto__");
    expect(Object.keys(counts)).toEqual(["constructor", "toString"]);
  });
});
