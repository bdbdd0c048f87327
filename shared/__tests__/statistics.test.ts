import test from "node:test";
import assert from "node:assert/strict";
import {
  buildStatsRow,
  histogramCounts,
  linspace,
  maximum,
  mean,
  median,
  minimum,
  quantile,
  sampleStdev,
} from "../statistics";
import { InsufficientDataError } from "../errors";

test("mean, median and sample stdev", () => {
  assert.equal(mean([1, 2, 3, 4]), 2.5);
  assert.equal(median([1, 2, 3, 4]), 2.5);
  assert.equal(median([3, 1, 2]), 2);
  assert.equal(sampleStdev([1, 2, 3, 4]), Math.sqrt(5 / 3));
  assert.equal(minimum([4, -1, 2]), -1);
  assert.equal(maximum([4, -1, 2]), 4);
});

test("quantile interpolates between ranks", () => {
  assert.equal(quantile([50, 10, 40, 20, 30], 0.5), 30);
  assert.equal(quantile([10, 20, 30, 40, 50], 0.25), 20);
  assert.equal(quantile([10, 20], 0.5), 15);
  const hundred = Array.from({ length: 101 }, (_, index) => index);
  assert.equal(quantile(hundred, 0.95), 95);
});

test("statistics need present values", () => {
  assert.throws(() => mean([]), InsufficientDataError);
  assert.throws(() => quantile([], 0.5), InsufficientDataError);
  assert.throws(
    () => sampleStdev([1]),
    (error: unknown) =>
      error instanceof InsufficientDataError &&
      error.required === 2 &&
      error.available === 1 &&
      error.message === "stdev requires at least 2 values, got 1",
  );
});

test("buildStatsRow summarizes a series", () => {
  const row = buildStatsRow("run-a", "Physics Actors", [2, 4, 4, 4, 5, 5, 7, 9]);
  assert.equal(row.source, "run-a");
  assert.equal(row.key, "Physics Actors");
  assert.equal(row.number, 8);
  assert.equal(row.min, 2);
  assert.equal(row.max, 9);
  assert.equal(row.mean, 5);
  assert.equal(row.median, 4.5);
  assert.equal(row.stdev, Math.sqrt(32 / 7));
  assert.ok(Math.abs(row.q95 - 8.3) < 1e-9);
});

test("linspace includes both ends", () => {
  assert.deepEqual(linspace(0, 1, 5), [0, 0.25, 0.5, 0.75, 1]);
  assert.deepEqual(linspace(2, 2, 3), [2, 2, 2]);
  assert.deepEqual(linspace(1, 5, 1), [1]);
  assert.deepEqual(linspace(1, 5, 0), []);
});

test("histogramCounts closes only the last bin", () => {
  assert.deepEqual(
    histogramCounts([0, 0.1, 0.25, 0.5, 1, 2, -1], [0, 0.25, 0.5, 0.75, 1]),
    [2, 1, 1, 1],
  );
  assert.deepEqual(histogramCounts([2, 2], [2, 2, 2]), [0, 2]);
  assert.deepEqual(histogramCounts([1], [1]), []);
});
