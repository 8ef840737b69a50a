import { describe, expect, it } from "vitest";
import { InvalidResolutionError } from "../src/common/errors";
import {
  bucketCount,
  bucketStart,
  isResolution,
  parseResolution,
  selectResolution,
} from "../src/store/resolution";
import { T } from "./helpers";

const DAY = 86400;

describe("selectResolution", () => {
  it("picks 6h for a 30 day window", () => {
    expect(selectResolution(T, T + 30 * DAY, "auto")).toBe("6h");
  });

  it("picks 1m for a 10 minute window since raw would exceed the budget", () => {
    expect(selectResolution(T, T + 600, "auto")).toBe("1m");
  });

  it("picks raw for windows within the budget", () => {
    expect(selectResolution(T, T + 499, "auto")).toBe("raw");
    expect(selectResolution(T, T, "auto")).toBe("raw");
  });

  it("picks 5m for a day", () => {
    expect(selectResolution(T, T + DAY, "auto")).toBe("5m");
  });

  it("falls back to 1d when nothing fits", () => {
    expect(selectResolution(0, 1000 * DAY, "auto")).toBe("1d");
  });

  it("honours a smaller budget", () => {
    expect(selectResolution(T, T + DAY, "auto", 30)).toBe("1h");
  });

  it("passes explicit resolutions through", () => {
    expect(selectResolution(T, T + 30 * DAY, "raw")).toBe("raw");
    expect(selectResolution(T, T + 60, "1d")).toBe("1d");
  });
});

describe("bucketStart", () => {
  it("aligns to the epoch rather than the query start", () => {
    expect(bucketStart(T + 1799, 3600)).toBe(T);
    expect(bucketStart(T - 1, 3600)).toBe(T - 3600);
    expect(bucketStart(T + 125, 60)).toBe(T + 120);
  });

  it("counts every bucket the range touches", () => {
    expect(bucketCount(T, T + 3 * 3600, 3600)).toBe(4);
    expect(bucketCount(T - 1800, T + 3 * 3600 + 1800, 3600)).toBe(5);
  });
});

describe("parseResolution", () => {
  it.each(["auto", "raw", "1m", "5m", "15m", "1h", "6h", "1d"])("accepts %s", (value) => {
    expect(parseResolution(value)).toBe(value);
  });

  it("rejects unknown widths", () => {
    expect(() => parseResolution("2h")).toThrow(InvalidResolutionError);
  });

  it.each(["constructor", "toString", "__proto__"])("rejects the object key %s", (value) => {
    expect(() => parseResolution(value)).toThrow(InvalidResolutionError);
    expect(isResolution(value)).toBe(false);
  });
});
