import test from "node:test";
import assert from "node:assert/strict";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { normalizeIngestBatch } from "@shared/protocol-utils";
import {
  isRemoteSource,
  pollLiveSource,
  resolveLocalSourcePath,
  toLiveSourceStatus,
  type LiveSourceState,
} from "../live-source";

function makeState(source: string): LiveSourceState {
  return {
    sourceId: "test",
    source,
    pollIntervalMs: 1000,
    controller: new AbortController(),
    timer: null,
    startedAt: "2026-01-01T00:00:00.000Z",
    received: 0,
    dropped: 0,
    lineOffset: 0,
    byteOffset: 0,
    remainder: "",
    lastError: null,
    isPolling: false,
  };
}

function line(frameIdx: number) {
  return JSON.stringify({ run_no: 1, frame_idx: frameIdx, n_spots: 12, hres: 2.0 });
}

function collector() {
  const batches: unknown[][] = [];
  const ingest = (values: readonly unknown[]) => {
    batches.push([...values]);
    return normalizeIngestBatch(values).report;
  };
  return { batches, ingest };
}

test("source kinds resolve by prefix", () => {
  assert.equal(isRemoteSource("https://host/feed.jsonl"), true);
  assert.equal(isRemoteSource("./feed.jsonl"), false);
  assert.equal(resolveLocalSourcePath("/tmp/feed.jsonl"), "/tmp/feed.jsonl");
  assert.equal(resolveLocalSourcePath("file:///tmp/feed.jsonl"), "/tmp/feed.jsonl");
});

test("pollLiveSource tails a growing file without re-reading delivered lines", async (t) => {
  const dir = await fs.promises.mkdtemp(path.join(os.tmpdir(), "spotwatch-"));
  t.after(() => fs.promises.rm(dir, { recursive: true, force: true }));
  const filePath = path.join(dir, "feed.jsonl");
  const partial = line(3);

  await fs.promises.writeFile(filePath, `${line(1)}\n${line(2)}\n${partial.slice(0, 10)}`);
  const state = makeState(filePath);
  const { batches, ingest } = collector();

  const first = await pollLiveSource(state, ingest);
  assert.deepEqual(first, { received: 2, kept: 2, dropped: 0 });
  assert.equal(state.remainder, partial.slice(0, 10));

  await fs.promises.appendFile(filePath, `${partial.slice(10)}\nnot json\n`);
  const second = await pollLiveSource(state, ingest);
  assert.deepEqual(second, { received: 2, kept: 1, dropped: 1 });
  assert.deepEqual(batches[1][0], JSON.parse(partial));

  assert.equal(await pollLiveSource(state, ingest), null);
  assert.equal(batches.length, 2);

  const status = toLiveSourceStatus(state);
  assert.equal(status.received, 4);
  assert.equal(status.dropped, 1);
  assert.equal(status.lastError, null);
});

test("pollLiveSource flushes a complete final line without a newline", async (t) => {
  const dir = await fs.promises.mkdtemp(path.join(os.tmpdir(), "spotwatch-"));
  t.after(() => fs.promises.rm(dir, { recursive: true, force: true }));
  const filePath = path.join(dir, "feed.jsonl");
  await fs.promises.writeFile(filePath, `${line(1)}\n${line(2)}`);

  const state = makeState(filePath);
  const { ingest } = collector();
  assert.deepEqual(await pollLiveSource(state, ingest), { received: 2, kept: 2, dropped: 0 });
  assert.equal(state.remainder, "");

  await fs.promises.appendFile(filePath, `\n${line(3)}\n`);
  assert.deepEqual(await pollLiveSource(state, ingest), { received: 1, kept: 1, dropped: 0 });
});

test("pollLiveSource records a missing file as the last error", async () => {
  const state = makeState(path.join(os.tmpdir(), "spotwatch-missing", "feed.jsonl"));
  const { ingest } = collector();
  assert.equal(await pollLiveSource(state, ingest), null);
  assert.match(state.lastError ?? "", /ENOENT/);
});
