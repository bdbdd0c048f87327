import { z } from "zod";

export type MetricValue = number;

/** Metrics reported between two frame-start markers of one source. */
export type FrameRecord = Readonly<Record<string, MetricValue>>;

/** Source name to its frame records, in log order. */
export type FrameSources = Map<string, FrameRecord[]>;

/** One entry per frame; `null` marks a frame that did not report the key. */
export type AggregatedSeries = Array<number | null>;

export type AggregatedFrames = Map<string, Map<string, AggregatedSeries>>;

export const STDIN_SOURCE = "stdin";
export const DEFAULT_BEGIN_FRAME = 0;
export const DEFAULT_END_FRAME = Number.MAX_SAFE_INTEGER;

const metricKeySchema = z.string().min(1);
const frameBoundSchema = z.number().int();

export const aggregationFunctionSchema = z.enum(["mean", "median"]);

export type AggregationFunction = z.infer<typeof aggregationFunctionSchema>;

export const frameRangeSchema = z.object({
  beginFrame: frameBoundSchema.default(DEFAULT_BEGIN_FRAME),
  endFrame: frameBoundSchema.default(DEFAULT_END_FRAME),
});

export type FrameRange = z.infer<typeof frameRangeSchema>;

export const framesRequestSchema = frameRangeSchema.extend({
  keys: z.array(metricKeySchema).optional(),
});

export const viewRequestSchema = z.object({
  timeseries: z.array(metricKeySchema).default([]),
  timeseriesSum: z.boolean().default(false),
  cumulativeTimeseries: z.array(metricKeySchema).default([]),
  cumulativeTimeseriesSum: z.boolean().default(false),
  hist: z.array(metricKeySchema).default([]),
  histRatio: z.array(z.tuple([metricKeySchema, metricKeySchema])).default([]),
  stdevHist: z.array(z.tuple([metricKeySchema, z.number().finite()])).default([]),
  plot: z
    .array(z.tuple([metricKeySchema, metricKeySchema, aggregationFunctionSchema]))
    .default([]),
  stats: z.array(metricKeySchema).default([]),
  statsSum: z.boolean().default(false),
});

export type ViewRequest = z.infer<typeof viewRequestSchema>;
export type ViewRequestInput = z.input<typeof viewRequestSchema>;

export const viewsRequestSchema = viewRequestSchema.merge(frameRangeSchema);

export interface LineSeries {
  label: string;
  source: string;
  key: string;
  x: number[];
  y: AggregatedSeries;
}

export interface TimeseriesView {
  kind: "timeseries" | "cumulative_timeseries";
  lines: LineSeries[];
}

export interface Histogram {
  label: string;
  source: string;
  key: string;
  counts: number[];
}

export interface HistogramView {
  kind: "hist" | "hist_ratio" | "stdev_hist";
  edges: number[];
  histograms: Histogram[];
}

export interface AggregatedPlotLine {
  label: string;
  source: string;
  xKey: string;
  yKey: string;
  aggregation: AggregationFunction;
  x: number[];
  y: number[];
}

export interface PlotView {
  kind: "plot";
  lines: AggregatedPlotLine[];
}

export interface StatsRow {
  source: string;
  key: string;
  number: number;
  min: number;
  max: number;
  mean: number;
  median: number;
  stdev: number;
  q95: number;
}

export interface StatsView {
  kind: "stats";
  rows: StatsRow[];
}

export type View = TimeseriesView | HistogramView | PlotView | StatsView;

export interface SourceSummary {
  name: string;
  frameCount: number;
}
