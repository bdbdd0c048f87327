import type {
  AggregatedFrames,
  AggregatedSeries,
  FrameRecord,
  FrameSources,
  SourceSummary,
} from "./schema";
import { DEFAULT_BEGIN_FRAME, DEFAULT_END_FRAME } from "./schema";

export function collectUniqueKeys(sources: FrameSources): string[] {
  const keys = new Set<string>();
  sources.forEach((frames) => {
    frames.forEach((frame) => {
      Object.keys(frame).forEach((key) => keys.add(key));
    });
  });
  // Code unit order, independent of locale.
  return [...keys].sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
}

function getFrameValue(frame: FrameRecord, key: string): number | null {
  return Object.prototype.hasOwnProperty.call(frame, key) ? frame[key] : null;
}

export function collectPerFrame({
  sources,
  keys,
  beginFrame = DEFAULT_BEGIN_FRAME,
  endFrame = DEFAULT_END_FRAME,
}: {
  sources: FrameSources;
  keys: readonly string[];
  beginFrame?: number;
  endFrame?: number;
}): AggregatedFrames {
  const result: AggregatedFrames = new Map();

  sources.forEach((frames, name) => {
    const columns = new Map<string, AggregatedSeries>(keys.map((key) => [key, []]));
    frames.forEach((frame) => {
      columns.forEach((column, key) => {
        column.push(getFrameValue(frame, key));
      });
    });

    const sliced = new Map<string, AggregatedSeries>();
    columns.forEach((column, key) => {
      sliced.set(key, column.slice(beginFrame, endFrame));
    });
    result.set(name, sliced);
  });

  return result;
}

export function getSeries(frames: Map<string, AggregatedSeries>, key: string): AggregatedSeries {
  return frames.get(key) ?? [];
}

export function summarizeSources(sources: FrameSources): SourceSummary[] {
  return Array.from(sources.entries()).map(([name, frames]) => ({
    name,
    frameCount: frames.length,
  }));
}

export function aggregatedFramesToJson(
  frames: AggregatedFrames,
): Record<string, Record<string, AggregatedSeries>> {
  const result: Record<string, Record<string, AggregatedSeries>> = {};
  frames.forEach((series, name) => {
    result[name] = Object.fromEntries(series.entries());
  });
  return result;
}

/** JSON has no NaN or Infinity; such values are written as "NaN", "Infinity" and "-Infinity". */
export function encodeNonFiniteNumbers(_key: string, value: unknown): unknown {
  return typeof value === "number" && !Number.isFinite(value) ? String(value) : value;
}
