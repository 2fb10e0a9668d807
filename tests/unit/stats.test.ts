import { describe, it, expect } from "vitest";
import { mean, median, percentile, summarizeLatencies } from "../../src/report/stats";

describe("percentile", () => {
  const sample = [1, 2, 3, 4, 5];

  it("returns the middle value at P50", () => {
    expect(percentile(sample, 50)).toBe(3);
    expect(median(sample)).toBe(3);
  });

  it("interpolates between neighbouring ranks", () => {
    // rank 0.9 × 4 = 3.6 → 4 + 0.6 × (5 − 4)
    expect(percentile(sample, 90)).toBeCloseTo(4.6, 10);
    expect(percentile(sample, 99)).toBeCloseTo(4.96, 10);
  });

  it("returns the extremes at P0 and P100", () => {
    expect(percentile(sample, 0)).toBe(1);
    expect(percentile(sample, 100)).toBe(5);
  });

  it("returns the only value of a single-element sample", () => {
    expect(percentile([10], 99)).toBe(10);
  });

  it("rejects an empty sample", () => {
    expect(() => percentile([], 50)).toThrow(RangeError);
  });

  it("rejects an out-of-range percentile", () => {
    expect(() => percentile(sample, 101)).toThrow(RangeError);
  });
});

describe("mean", () => {
  it("averages the sample", () => {
    expect(mean([1, 2, 3, 4, 5])).toBe(3);
  });

  it("rejects an empty sample", () => {
    expect(() => mean([])).toThrow(RangeError);
  });
});

describe("summarizeLatencies", () => {
  it("sorts before taking percentiles", () => {
    const summary = summarizeLatencies([5, 1, 3, 2, 4]);
    expect(summary.p50).toBe(3);
    expect(summary.mean).toBe(3);
    expect(summary.p95).toBeCloseTo(4.8, 10);
  });

  it("scales every figure", () => {
    const summary = summarizeLatencies([0.001, 0.002], 1000);
    expect(summary.p50).toBeCloseTo(1.5, 10);
    expect(summary.mean).toBeCloseTo(1.5, 10);
  });

  it("leaves its input untouched", () => {
    const values = [3, 1, 2];
    summarizeLatencies(values);
    expect(values).toEqual([3, 1, 2]);
  });
});
