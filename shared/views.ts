import type {
  AggregatedFrames,
  AggregatedPlotLine,
  AggregatedSeries,
  AggregationFunction,
  Histogram,
  HistogramView,
  LineSeries,
  PlotView,
  StatsView,
  TimeseriesView,
  View,
  ViewRequest,
} from "./schema";
import { InsufficientDataError } from "./errors";
import { getSeries } from "./frame-aggregation";
import {
  cumulativeSum,
  filterPresent,
  ratioSeries,
  sumAcrossKeys,
  sumPerFrame,
} from "./derived-metrics";
import {
  buildStatsRow,
  histogramCounts,
  linspace,
  mean,
  median,
  sampleStdev,
} from "./statistics";

export const HISTOGRAM_EDGE_COUNT = 20;
export const STDEV_HISTOGRAM_EDGE_COUNT = 9;
export const SUM_KEY = "sum";

const AGGREGATIONS: Record<AggregationFunction, (values: readonly number[]) => number> = {
  mean,
  median,
};

function range(length: number): number[] {
  return Array.from({ length }, (_, index) => index);
}

function seriesLength(frames: Map<string, AggregatedSeries>, keys: readonly string[]): number {
  return keys.reduce((longest, key) => Math.max(longest, getSeries(frames, key).length), 0);
}

function buildLines(
  sources: AggregatedFrames,
  keys: readonly string[],
  addSum: boolean,
  transform: (series: AggregatedSeries) => AggregatedSeries,
): LineSeries[] {
  const lines: LineSeries[] = [];
  sources.forEach((frames, source) => {
    const x = range(seriesLength(frames, keys));
    keys.forEach((key) => {
      lines.push({
        label: `${key}:${source}`,
        source,
        key,
        x,
        y: transform(getSeries(frames, key)),
      });
    });
    if (addSum) {
      lines.push({
        label: `${SUM_KEY}:${source}`,
        source,
        key: SUM_KEY,
        x,
        y: transform(sumPerFrame(frames, keys)),
      });
    }
  });
  return lines;
}

export function buildTimeseriesView(
  sources: AggregatedFrames,
  keys: readonly string[],
  addSum = false,
): TimeseriesView {
  return {
    kind: "timeseries",
    lines: buildLines(sources, keys, addSum, (series) => series),
  };
}

export function buildCumulativeTimeseriesView(
  sources: AggregatedFrames,
  keys: readonly string[],
  addSum = false,
): TimeseriesView {
  return {
    kind: "cumulative_timeseries",
    lines: buildLines(sources, keys, addSum, cumulativeSum),
  };
}

type HistogramInput = Omit<Histogram, "counts"> & { values: number[] };

function buildSharedBinHistogram(
  kind: HistogramView["kind"],
  inputs: HistogramInput[],
): HistogramView {
  const all = inputs.flatMap((input) => input.values);
  if (all.length === 0) {
    throw new InsufficientDataError(kind, 1, 0);
  }
  const edges = linspace(
    all.reduce((min, value) => Math.min(min, value), all[0]),
    all.reduce((max, value) => Math.max(max, value), all[0]),
    HISTOGRAM_EDGE_COUNT,
  );
  return {
    kind,
    edges,
    histograms: inputs.map(({ values, ...rest }) => ({
      ...rest,
      counts: histogramCounts(values, edges),
    })),
  };
}

export function buildHistogramView(
  sources: AggregatedFrames,
  keys: readonly string[],
): HistogramView {
  const inputs: HistogramInput[] = [];
  sources.forEach((frames, source) => {
    keys.forEach((key) => {
      inputs.push({
        label: `${key}:${source}`,
        source,
        key,
        values: filterPresent(getSeries(frames, key)),
      });
    });
  });
  return buildSharedBinHistogram("hist", inputs);
}

export function buildRatioHistogramView(
  sources: AggregatedFrames,
  pairs: ReadonlyArray<readonly [string, string]>,
): HistogramView {
  const inputs: HistogramInput[] = [];
  sources.forEach((frames, source) => {
    pairs.forEach(([numerator, denominator]) => {
      const key = `${numerator} / ${denominator}`;
      inputs.push({
        label: `${key}:${source}`,
        source,
        key,
        values: ratioSeries(getSeries(frames, numerator), getSeries(frames, denominator)),
      });
    });
  });
  return buildSharedBinHistogram("hist_ratio", inputs);
}

/**
 * Histogram over a window centred on the median of the first source, `scale`
 * standard deviations wide. Every source is binned over the same window.
 */
export function buildStdevHistogramView(
  sources: AggregatedFrames,
  key: string,
  scale: number,
): HistogramView {
  const first = sources.values().next();
  const reference = first.done ? [] : filterPresent(getSeries(first.value, key));
  const center = median(reference);
  const halfWidth = (sampleStdev(reference) / 2) * scale;
  const start = center - halfWidth;
  const stop = center + halfWidth;
  const edges = linspace(start, stop, STDEV_HISTOGRAM_EDGE_COUNT);

  const histograms: Histogram[] = [];
  sources.forEach((frames, source) => {
    const values = filterPresent(getSeries(frames, key)).filter(
      (value) => start <= value && value <= stop,
    );
    histograms.push({
      label: `${key}:${source}`,
      source,
      key,
      counts: histogramCounts(values, edges),
    });
  });

  return { kind: "stdev_hist", edges, histograms };
}

export function aggregateByX(
  xSeries: AggregatedSeries,
  ySeries: AggregatedSeries,
  aggregation: AggregationFunction,
): { x: number[]; y: number[] } {
  const grouped = new Map<number, number[]>();
  const length = Math.min(xSeries.length, ySeries.length);
  for (let index = 0; index < length; index += 1) {
    const x = xSeries[index];
    const y = ySeries[index];
    if (x === null || y === null) {
      continue;
    }
    const bucket = grouped.get(x);
    if (bucket) {
      bucket.push(y);
    } else {
      grouped.set(x, [y]);
    }
  }

  const aggregate = AGGREGATIONS[aggregation];
  const points = Array.from(grouped.entries())
    .map(([x, ys]) => [x, aggregate(ys)] as const)
    .sort((a, b) => a[0] - b[0]);
  return {
    x: points.map(([x]) => x),
    y: points.map(([, y]) => y),
  };
}

export function buildPlotView(
  sources: AggregatedFrames,
  plots: ReadonlyArray<readonly [string, string, AggregationFunction]>,
): PlotView {
  const lines: AggregatedPlotLine[] = [];
  sources.forEach((frames, source) => {
    plots.forEach(([xKey, yKey, aggregation]) => {
      const { x, y } = aggregateByX(getSeries(frames, xKey), getSeries(frames, yKey), aggregation);
      lines.push({
        label: `x=${xKey}, y=${yKey}, agg=${aggregation}:${source}`,
        source,
        xKey,
        yKey,
        aggregation,
        x,
        y,
      });
    });
  });
  return { kind: "plot", lines };
}

export function buildStatsView(
  sources: AggregatedFrames,
  keys: readonly string[],
  addSum = false,
): StatsView {
  const rows: StatsView["rows"] = [];
  sources.forEach((frames, source) => {
    keys.forEach((key) => {
      rows.push(buildStatsRow(source, key, filterPresent(getSeries(frames, key))));
    });
    if (addSum) {
      rows.push(buildStatsRow(source, SUM_KEY, sumAcrossKeys(frames, keys)));
    }
  });
  return { kind: "stats", rows };
}

/** Builds every view the request asks for, in a fixed order. */
export function buildViews(sources: AggregatedFrames, request: ViewRequest): View[] {
  const views: View[] = [];
  if (request.timeseries.length > 0) {
    views.push(buildTimeseriesView(sources, request.timeseries, request.timeseriesSum));
  }
  if (request.cumulativeTimeseries.length > 0) {
    views.push(
      buildCumulativeTimeseriesView(
        sources,
        request.cumulativeTimeseries,
        request.cumulativeTimeseriesSum,
      ),
    );
  }
  if (request.hist.length > 0) {
    views.push(buildHistogramView(sources, request.hist));
  }
  if (request.histRatio.length > 0) {
    views.push(buildRatioHistogramView(sources, request.histRatio));
  }
  request.stdevHist.forEach(([key, scale]) => {
    views.push(buildStdevHistogramView(sources, key, scale));
  });
  if (request.plot.length > 0) {
    views.push(buildPlotView(sources, request.plot));
  }
  if (request.stats.length > 0) {
    views.push(buildStatsView(sources, request.stats, request.statsSum));
  }
  return views;
}

/** Keys a request reads, deduplicated in first-use order. */
export function collectRequestedKeys(request: ViewRequest): string[] {
  const keys = new Set<string>([
    ...request.timeseries,
    ...request.cumulativeTimeseries,
    ...request.hist,
    ...request.histRatio.flat(),
    ...request.stdevHist.map(([key]) => key),
    ...request.plot.flatMap(([x, y]) => [x, y]),
    ...request.stats,
  ]);
  return [...keys];
}
