/**
 * Percentile statistics over latency samples.
 */

import type { LatencySummary } from "../types";

/**
 * Linear-interpolation percentile of an ascending sample: the value at
 * rank p/100 × (n − 1), interpolated between its two neighbours.
 */
export function percentile(sorted: readonly number[], p: number): number {
  if (sorted.length === 0) {
    throw new RangeError("percentile of an empty sample");
  }
  if (p < 0 || p > 100) {
    throw new RangeError(`percentile must be within 0–100, got ${p}`);
  }

  const rank = (p / 100) * (sorted.length - 1);
  const lower = Math.floor(rank);
  const upper = Math.ceil(rank);
  const weight = rank - lower;
  return sorted[lower] + (sorted[upper] - sorted[lower]) * weight;
}

export function median(sorted: readonly number[]): number {
  return percentile(sorted, 50);
}

export function mean(values: readonly number[]): number {
  if (values.length === 0) {
    throw new RangeError("mean of an empty sample");
  }
  let sum = 0;
  for (const v of values) sum += v;
  return sum / values.length;
}

/** P50/P90/P95/P99 and mean of `values`, each multiplied by `scale` */
export function summarizeLatencies(values: readonly number[], scale = 1): LatencySummary {
  const sorted = [...values].sort((a, b) => a - b);
  return {
    p50: median(sorted) * scale,
    p90: percentile(sorted, 90) * scale,
    p95: percentile(sorted, 95) * scale,
    p99: percentile(sorted, 99) * scale,
    mean: mean(sorted) * scale,
  };
}
