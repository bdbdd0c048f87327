import type { StatsRow } from "./schema";
import { InsufficientDataError } from "./errors";

function requireValues(operation: string, values: readonly number[], required = 1): void {
  if (values.length < required) {
    throw new InsufficientDataError(operation, required, values.length);
  }
}

function sortAscending(values: readonly number[]): number[] {
  return [...values].sort((a, b) => a - b);
}

export function minimum(values: readonly number[]): number {
  requireValues("min", values);
  return values.reduce((min, value) => (value < min ? value : min), values[0]);
}

export function maximum(values: readonly number[]): number {
  requireValues("max", values);
  return values.reduce((max, value) => (value > max ? value : max), values[0]);
}

export function mean(values: readonly number[]): number {
  requireValues("mean", values);
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}

export function median(values: readonly number[]): number {
  requireValues("median", values);
  const sorted = sortAscending(values);
  const middle = Math.floor(sorted.length / 2);
  return sorted.length % 2 === 1 ? sorted[middle] : (sorted[middle - 1] + sorted[middle]) / 2;
}

/** Standard deviation with the n - 1 denominator. */
export function sampleStdev(values: readonly number[]): number {
  requireValues("stdev", values, 2);
  const avg = mean(values);
  const squares = values.reduce((sum, value) => sum + (value - avg) ** 2, 0);
  return Math.sqrt(squares / (values.length - 1));
}

/** Linear interpolation between the closest ranks, `q` in [0, 1]. */
export function quantile(values: readonly number[], q: number): number {
  requireValues("quantile", values);
  const sorted = sortAscending(values);
  const position = Math.max(0, Math.min(sorted.length - 1, q * (sorted.length - 1)));
  const lo = Math.floor(position);
  const hi = Math.ceil(position);
  return lo === hi ? sorted[lo] : sorted[lo] + (position - lo) * (sorted[hi] - sorted[lo]);
}

export function buildStatsRow(source: string, key: string, values: readonly number[]): StatsRow {
  return {
    source,
    key,
    number: values.length,
    min: minimum(values),
    max: maximum(values),
    mean: mean(values),
    median: median(values),
    stdev: sampleStdev(values),
    q95: quantile(values, 0.95),
  };
}

/** `count` evenly spaced values from `start` to `stop`, both included. */
export function linspace(start: number, stop: number, count: number): number[] {
  if (count <= 0) {
    return [];
  }
  if (count === 1) {
    return [start];
  }
  const step = (stop - start) / (count - 1);
  return Array.from({ length: count }, (_, index) =>
    index === count - 1 ? stop : start + step * index,
  );
}

/**
 * Counts values per bin. Bins are half-open `[edge, next)` except the last,
 * which also takes values equal to the final edge. Values outside the edges
 * are not counted.
 */
export function histogramCounts(values: readonly number[], edges: readonly number[]): number[] {
  const binCount = Math.max(0, edges.length - 1);
  const counts = new Array<number>(binCount).fill(0);
  if (binCount === 0) {
    return counts;
  }
  const first = edges[0];
  const last = edges[edges.length - 1];
  values.forEach((value) => {
    if (value < first || value > last || Number.isNaN(value)) {
      return;
    }
    if (value === last) {
      counts[binCount - 1] += 1;
      return;
    }
    let bin = 0;
    while (bin < binCount - 1 && value >= edges[bin + 1]) {
      bin += 1;
    }
    counts[bin] += 1;
  });
  return counts;
}
