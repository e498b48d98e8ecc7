import test from "node:test";
import assert from "node:assert/strict";
import type { FrameRecord } from "../schema";
import { StatsAggregator, median } from "../stats";

function frame(frameIdx: number, indexed: number, resolution: number): FrameRecord {
  return { frameIdx, spotCount: 10, indexed, resolution };
}

test("median handles odd, even and empty inputs", () => {
  assert.equal(median([1.0, 2.0, 3.0]), 2.0);
  assert.equal(median([1.0, 2.0]), 1.5);
  assert.ok(Number.isNaN(median([])));
});

test("median does not depend on input order", () => {
  assert.equal(median([3, 1, 2]), 2);
  assert.equal(median([4, 1, 3, 2]), 2.5);
});

test("aggregator counts indexed frames and tracks the median incrementally", () => {
  const stats = new StatsAggregator();
  stats.add([frame(1, Number.NaN, 2.0)]);
  assert.equal(stats.indexedCount, 0);
  assert.equal(stats.medianResolution, 2.0);

  stats.add([frame(2, 0.0, 1.8)]);
  assert.equal(stats.indexedCount, 1);
  assert.equal(stats.medianResolution, 1.9);

  stats.add([frame(3, 1.0, 3.5), frame(4, Number.NaN, 1.5)]);
  assert.equal(stats.indexedCount, 2);
  assert.equal(stats.medianResolution, 1.9);
});

test("summarize scopes the hit count to the accepted records", () => {
  const stats = new StatsAggregator();
  const records = [frame(1, 0.2, 2.0), frame(2, Number.NaN, 2.4), frame(3, 0.1, 2.2)];
  stats.add(records);
  assert.deepEqual(stats.summarize(records.slice(0, 1)), {
    hitCount: 1,
    indexedCount: 2,
    medianResolution: 2.2,
  });
});

test("an empty history reports a NaN median rather than failing", () => {
  const summary = new StatsAggregator().summarize([]);
  assert.equal(summary.hitCount, 0);
  assert.equal(summary.indexedCount, 0);
  assert.ok(Number.isNaN(summary.medianResolution));
});
