import type { AggregatedSeries } from "./schema";
import { getSeries } from "./frame-aggregation";

function isPresent(value: number | null | undefined): value is number {
  return typeof value === "number";
}

export function filterPresent(series: readonly (number | null)[]): number[] {
  return series.filter(isPresent);
}

function collectSums(
  frames: Map<string, AggregatedSeries>,
  keys: readonly string[],
): Map<number, number> {
  const sums = new Map<number, number>();
  keys.forEach((key) => {
    getSeries(frames, key).forEach((value, index) => {
      if (isPresent(value)) {
        sums.set(index, (sums.get(index) ?? 0) + value);
      }
    });
  });
  return sums;
}

/**
 * Per-frame sum over `keys`. Frames where every key is missing are left out,
 * so the result can be shorter than the source series.
 */
export function sumAcrossKeys(
  frames: Map<string, AggregatedSeries>,
  keys: readonly string[],
): number[] {
  const sums = collectSums(frames, keys);
  return Array.from(sums.keys())
    .sort((a, b) => a - b)
    .map((index) => sums.get(index) ?? 0);
}

/** Like {@link sumAcrossKeys}, but keeps frame alignment with `null` gaps. */
export function sumPerFrame(
  frames: Map<string, AggregatedSeries>,
  keys: readonly string[],
): AggregatedSeries {
  const sums = collectSums(frames, keys);
  const length = keys.reduce((longest, key) => Math.max(longest, getSeries(frames, key).length), 0);
  return Array.from({ length }, (_, index) => sums.get(index) ?? null);
}

export function cumulativeSum(series: readonly (number | null)[]): AggregatedSeries {
  let total = 0;
  return series.map((value) => {
    if (!isPresent(value)) {
      return null;
    }
    total += value;
    return total;
  });
}

export function ratioSeries(
  numerator: readonly (number | null)[],
  denominator: readonly (number | null)[],
): number[] {
  const length = Math.min(numerator.length, denominator.length);
  const ratios: number[] = [];
  for (let index = 0; index < length; index += 1) {
    const a = numerator[index];
    const b = denominator[index];
    if (isPresent(a) && isPresent(b)) {
      const ratio = a / b;
      if (Number.isFinite(ratio)) {
        ratios.push(ratio);
      }
    }
  }
  return ratios;
}
