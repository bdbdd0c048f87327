import type { AggregatedFrames, FrameRecord, FrameSources, SourceSummary } from "@shared/schema";
import { DEFAULT_BEGIN_FRAME, DEFAULT_END_FRAME } from "@shared/schema";
import { collectPerFrame, collectUniqueKeys, summarizeSources } from "@shared/frame-aggregation";

/** Loaded sources held by the server, with the key universe kept current. */
export class FrameStore {
  private readonly sources: FrameSources;
  private keys: string[];

  constructor(initial: FrameSources = new Map()) {
    this.sources = new Map(initial);
    this.keys = collectUniqueKeys(this.sources);
  }

  setSource(name: string, frames: FrameRecord[]) {
    this.sources.set(name, frames);
    this.keys = collectUniqueKeys(this.sources);
  }

  hasSource(name: string) {
    return this.sources.has(name);
  }

  listSources(): SourceSummary[] {
    return summarizeSources(this.sources);
  }

  getKeys(): string[] {
    return [...this.keys];
  }

  /**
   * Aggregates `keys` (the whole key universe when omitted). Requested keys
   * no source reports still get an all-missing series.
   */
  aggregate({
    keys,
    beginFrame = DEFAULT_BEGIN_FRAME,
    endFrame = DEFAULT_END_FRAME,
  }: {
    keys?: readonly string[];
    beginFrame?: number;
    endFrame?: number;
  }): AggregatedFrames {
    return collectPerFrame({
      sources: this.sources,
      keys: keys ?? this.keys,
      beginFrame,
      endFrame,
    });
  }
}
