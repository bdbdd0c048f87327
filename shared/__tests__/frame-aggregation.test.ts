import test from "node:test";
import assert from "node:assert/strict";
import type { FrameRecord, FrameSources } from "../schema";
import {
  aggregatedFramesToJson,
  collectPerFrame,
  collectUniqueKeys,
  encodeNonFiniteNumbers,
  summarizeSources,
} from "../frame-aggregation";
import { readFrameRecordsFromText } from "../log-reader";

const sources: FrameSources = new Map<string, FrameRecord[]>([
  [
    "run-a",
    [
      { framenumber: 1, x: 1 },
      { framenumber: 2 },
      { framenumber: 3, x: 3, y: 9 },
    ],
  ],
  ["run-b", [{ framenumber: 1, z: 5 }]],
]);

test("collectUniqueKeys returns the sorted union of keys", () => {
  assert.deepEqual(collectUniqueKeys(sources), ["framenumber", "x", "y", "z"]);
});

test("collectUniqueKeys sorts by code unit, not locale", () => {
  const mixed: FrameSources = new Map([
    ["b", [{ framenumber: 1, "Time taken Camera 1": 2 }]],
    ["a", [{ "Physics Actors": 3, framenumber: 1 }]],
  ]);
  assert.deepEqual(collectUniqueKeys(mixed), ["Physics Actors", "Time taken Camera 1", "framenumber"]);
});

test("collectPerFrame aligns every key per source with null gaps", () => {
  const frames = collectPerFrame({ sources, keys: ["x", "y"] });
  assert.deepEqual(aggregatedFramesToJson(frames), {
    "run-a": { x: [1, null, 3], y: [null, null, 9] },
    "run-b": { x: [null], y: [null] },
  });
});

test("collectPerFrame slices to the frame range", () => {
  const middle = collectPerFrame({ sources, keys: ["x"], beginFrame: 1, endFrame: 2 });
  assert.deepEqual(middle.get("run-a")?.get("x"), [null]);
  assert.deepEqual(middle.get("run-b")?.get("x"), []);

  const clamped = collectPerFrame({ sources, keys: ["x"], beginFrame: 1, endFrame: 100 });
  assert.deepEqual(clamped.get("run-a")?.get("x"), [null, 3]);

  const inverted = collectPerFrame({ sources, keys: ["x"], beginFrame: 2, endFrame: 1 });
  assert.deepEqual(inverted.get("run-a")?.get("x"), []);
});

test("series of one source share the range length", () => {
  const keys = collectUniqueKeys(sources);
  for (const [beginFrame, endFrame] of [
    [0, 3],
    [0, 2],
    [1, 10],
    [3, 5],
    [2, 0],
  ]) {
    const frames = collectPerFrame({ sources, keys, beginFrame, endFrame });
    frames.forEach((series, name) => {
      const frameCount = sources.get(name)?.length ?? 0;
      const expected = Math.max(0, Math.min(endFrame, frameCount) - beginFrame);
      series.forEach((values) => assert.equal(values.length, expected));
    });
  }
});

test("aggregating the stats viewer sample yields the first frame's actors", () => {
  const text = [
    "Stats Viewer : framenumber 1",
    "    Physics Actors 3",
    "Stats Camera",
    "    Time taken 1.5",
    "Stats Camera",
    "    Time taken 2.5",
    "Stats Viewer : framenumber 2",
    "    Physics Actors 4",
    "Stats Viewer : framenumber 3",
  ].join("\n");
  const parsed: FrameSources = new Map([["stdin", readFrameRecordsFromText(text)]]);
  const frames = collectPerFrame({
    sources: parsed,
    keys: collectUniqueKeys(parsed),
    beginFrame: 0,
    endFrame: 1,
  });
  assert.deepEqual(frames.get("stdin")?.get("Physics Actors"), [3]);
  assert.deepEqual(frames.get("stdin")?.get("Time taken Camera 2"), [2.5]);
});

test("summarizeSources lists frame counts in source order", () => {
  assert.deepEqual(summarizeSources(sources), [
    { name: "run-a", frameCount: 3 },
    { name: "run-b", frameCount: 1 },
  ]);
});

test("encodeNonFiniteNumbers spells out values JSON cannot hold", () => {
  assert.equal(
    JSON.stringify({ y: [1.5, Number.NaN, Number.POSITIVE_INFINITY, Number.NEGATIVE_INFINITY, null] }, encodeNonFiniteNumbers),
    '{"y":[1.5,"NaN","Infinity","-Infinity",null]}',
  );
});
