import test from "node:test";
import assert from "node:assert/strict";
import { controlCommandSchema, runIdParamSchema } from "../schema";
import {
  buildCapabilitiesPayload,
  buildRunList,
  deriveViewSnapshot,
  normalizeIngestBatch,
  normalizeIngestRecord,
} from "../protocol-utils";
import { formatCount, formatResolution } from "../format";
import { RunRegistry } from "../run-registry";

test("normalizeIngestRecord maps wire fields and the NaN sentinel", () => {
  assert.deepEqual(
    normalizeIngestRecord({ run_no: 3, frame_idx: 12, n_spots: 40, indexed: 0.25, hres: 1.7 }),
    { runId: 3, frameIdx: 12, spotCount: 40, indexed: 0.25, resolution: 1.7 },
  );

  const unindexed = normalizeIngestRecord({ frame_idx: 1, n_spots: 2, indexed: null, hres: 3.1 });
  assert.ok(unindexed);
  assert.equal(unindexed.runId, null);
  assert.ok(Number.isNaN(unindexed.indexed));
});

test("normalizeIngestBatch drops malformed records and keeps the rest", () => {
  const { records, report } = normalizeIngestBatch([
    { run_no: 1, frame_idx: 1, n_spots: 5, hres: 2.0 },
    { run_no: 1, frame_idx: 2, hres: 2.0 },
    { run_no: 1, frame_idx: "3", n_spots: 5, hres: 2.0 },
    null,
    { run_no: 1, frame_idx: 4, n_spots: 8, indexed: null, hres: 1.5 },
  ]);

  assert.deepEqual(report, { received: 5, kept: 2, dropped: 3 });
  assert.deepEqual(
    records.map((record) => record.frameIdx),
    [1, 4],
  );
});

test("normalizeIngestRecord rejects non-integer frame indices and run numbers", () => {
  assert.equal(normalizeIngestRecord({ frame_idx: 1.5, n_spots: 2, hres: 2 }), null);
  assert.equal(normalizeIngestRecord({ run_no: 0, frame_idx: 1, n_spots: 2, hres: 2 }), null);
});

test("deriveViewSnapshot classifies the full-view scenario", () => {
  const registry = new RunRegistry();
  registry.route(
    normalizeIngestBatch([
      { run_no: 1, frame_idx: 1, n_spots: 5, indexed: null, hres: 2.0 },
      { run_no: 1, frame_idx: 2, n_spots: 15, indexed: 0.0, hres: 1.8 },
    ]).records,
  );
  registry.mergePending();
  const run = registry.get(1);
  assert.ok(run);

  const snapshot = deriveViewSnapshot(run);
  assert.deepEqual(snapshot.visibleAccepted, [{ frameIdx: 2, spotCount: 15 }]);
  assert.deepEqual(snapshot.visibleRejected, [{ frameIdx: 1, spotCount: 5 }]);
  assert.equal(snapshot.hitCount, 1);
  assert.equal(snapshot.indexedCount, 1);
  assert.equal(snapshot.medianResolution, 1.9);
  assert.deepEqual(snapshot.thresholdLine, { value: 10, visible: true });
  assert.equal(run.window.state().yMax, 16);
});

test("buildRunList marks the selected run", () => {
  const registry = new RunRegistry();
  registry.route(normalizeIngestBatch([{ run_no: 2, frame_idx: 1, n_spots: 5, hres: 2 }]).records);
  registry.createRun(4);

  assert.deepEqual(buildRunList(registry.list(), 4), [
    {
      runId: 2,
      title: "Run 2",
      recordCount: 0,
      pending: 1,
      threshold: 10,
      mode: "full",
      selected: false,
    },
    {
      runId: 4,
      title: "Run 4",
      recordCount: 0,
      pending: 0,
      threshold: 10,
      mode: "full",
      selected: true,
    },
  ]);
});

test("capabilities list every control command", () => {
  const commands = controlCommandSchema.options.map((option) => option.shape.type.value);
  assert.deepEqual([...buildCapabilitiesPayload().commands].sort(), [...commands].sort());
});

test("stat labels fall back to a placeholder", () => {
  assert.equal(formatResolution(1.9), "1.90 Å");
  assert.equal(formatResolution(Number.NaN), "—");
  assert.equal(formatCount(3), "3");
  assert.equal(formatCount(null), "—");
});

test("normalizeIngestRecord drops records whose resolution is not finite", () => {
  assert.equal(normalizeIngestRecord(JSON.parse('{"frame_idx":1,"n_spots":2,"hres":1e999}')), null);
  assert.equal(normalizeIngestRecord({ frame_idx: 1, n_spots: 2, hres: Number.NaN }), null);
});

test("runIdParamSchema only accepts whole positive run numbers", () => {
  const parsed = runIdParamSchema.safeParse("3");
  assert.ok(parsed.success);
  assert.equal(parsed.data, 3);
  assert.equal(runIdParamSchema.safeParse("3abc").success, false);
  assert.equal(runIdParamSchema.safeParse("2.5").success, false);
  assert.equal(runIdParamSchema.safeParse("0").success, false);
  assert.equal(runIdParamSchema.safeParse("").success, false);
});
