import test from "node:test";
import assert from "node:assert/strict";
import type { RoutedRecord } from "../schema";
import { RunRegistry, type Run } from "../run-registry";

function routed(runId: number | null, frameIdx: number, spotCount = 12): RoutedRecord {
  return { runId, frameIdx, spotCount, indexed: Number.NaN, resolution: 2 };
}

test("the first record for a run id creates exactly one run", () => {
  const registry = new RunRegistry();
  const created: number[] = [];
  registry.onRunCreated((run) => created.push(run.runId));

  const first = registry.route([routed(7, 1), routed(7, 2)]);
  assert.deepEqual(first, { routed: 2, created: [7] });

  const second = registry.route([routed(7, 3)]);
  assert.deepEqual(second, { routed: 1, created: [] });
  assert.deepEqual(created, [7]);
  assert.equal(registry.size, 1);
  assert.equal(registry.get(7)?.pendingCount, 3);
});

test("new runs start with the default threshold and a title", () => {
  const registry = new RunRegistry({ defaultThreshold: 25 });
  registry.route([routed(3, 1)]);
  const run = registry.get(3);
  assert.equal(run?.threshold, 25);
  assert.equal(run?.title, "Run 3");
  assert.equal(run?.window.mode, "full");
});

test("unnumbered records share one run numbered after the highest id", () => {
  const empty = new RunRegistry();
  assert.deepEqual(empty.route([routed(null, 1), routed(null, 2)]).created, [1]);
  assert.equal(empty.get(1)?.pendingCount, 2);

  const registry = new RunRegistry();
  registry.route([routed(7, 1), routed(2, 1)]);
  assert.equal(registry.nextRunId(), 8);
  assert.deepEqual(registry.route([routed(null, 5)]).created, [8]);
});

test("records wait in the pending buffer until merged", () => {
  const registry = new RunRegistry();
  registry.route([routed(1, 1), routed(1, 2)]);
  const run = registry.get(1);
  assert.equal(run?.store.size, 0);

  const merged = registry.mergePending();
  assert.deepEqual([...merged.entries()], [[1, 2]]);
  assert.equal(run?.store.size, 2);
  assert.equal(run?.pendingCount, 0);
});

test("interleaved runs keep their own arrival order", () => {
  const registry = new RunRegistry();
  registry.route([routed(1, 1), routed(2, 1), routed(1, 3), routed(2, 9), routed(1, 2)]);
  registry.mergePending();

  const frames = (run: Run | undefined) => run?.store.all().map((record) => record.frameIdx);
  assert.deepEqual(frames(registry.get(1)), [1, 3, 2]);
  assert.deepEqual(frames(registry.get(2)), [1, 9]);
});

test("re-delivered records merge as a no-op", () => {
  const registry = new RunRegistry();
  const batch = [routed(4, 1), routed(4, 2)];
  registry.route(batch);
  registry.mergePending();
  registry.route(batch);
  assert.equal(registry.mergePending().size, 0);
  assert.equal(registry.get(4)?.store.size, 2);
});

test("merged records feed the run statistics", () => {
  const registry = new RunRegistry();
  registry.route([
    { runId: 1, frameIdx: 1, spotCount: 5, indexed: Number.NaN, resolution: 2.0 },
    { runId: 1, frameIdx: 2, spotCount: 15, indexed: 0.0, resolution: 1.8 },
  ]);
  registry.mergePending();
  const run = registry.get(1);
  assert.equal(run?.stats.indexedCount, 1);
  assert.equal(run?.stats.medianResolution, 1.9);
});

test("discardPending drops unmerged records and keeps history", () => {
  const registry = new RunRegistry();
  registry.route([routed(1, 1)]);
  registry.mergePending();
  registry.route([routed(1, 2), routed(1, 3)]);

  assert.equal(registry.discardPending(), 2);
  assert.equal(registry.get(1)?.store.size, 1);
  assert.equal(registry.mergePending().size, 0);
});

test("createRun reuses an existing id and lists runs in order", () => {
  const registry = new RunRegistry();
  const created: number[] = [];
  registry.onRunCreated((run) => created.push(run.runId));

  registry.createRun(5);
  registry.createRun(5);
  registry.createRun();
  assert.deepEqual(created, [5, 6]);
  assert.deepEqual(
    registry.list().map((run) => run.runId),
    [5, 6],
  );
});
