/**
 * Lock estimation tests.
 */

import { describe, expect, it } from "vitest";
import { estimateLockMs } from "../src/analyzer/estimate.js";

describe("estimateLockMs", () => {
  it("should add the row-driven term to the baseline", () => {
    expect(estimateLockMs(10, 1_000_000)).toBe(110);
  });

  it("should estimate from rows alone when there is no baseline", () => {
    expect(estimateLockMs(null, 1_000_000)).toBe(100);
  });

  it("should return the baseline without a row count", () => {
    expect(estimateLockMs(50, 0)).toBe(50);
    expect(estimateLockMs(50, -5)).toBe(50);
  });

  it("should return null with neither baseline nor row count", () => {
    expect(estimateLockMs(null, 0)).toBeNull();
  });

  it("should truncate the row-driven term", () => {
    expect(estimateLockMs(5, 19_999)).toBe(6);
    expect(estimateLockMs(5, 9_999)).toBe(5);
  });

  it("should never estimate below 1ms once rows are given", () => {
    expect(estimateLockMs(null, 5_000)).toBe(1);
    expect(estimateLockMs(0, 5_000)).toBe(1);
  });
});
