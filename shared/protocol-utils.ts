import {
  ingestRecordSchema,
  type CapabilitiesPayload,
  type FrameRecord,
  type IndexedPoint,
  type IngestRecord,
  type IngestReport,
  type RoutedRecord,
  type RunSummary,
  type SpotPoint,
  type ViewSnapshot,
} from "./schema";
import { classifyRecords, isVisible } from "./classifier";
import { buildSnapshotLabels } from "./format";
import type { Run } from "./run-registry";

export function toRoutedRecord(record: IngestRecord): RoutedRecord {
  return {
    runId: record.run_no ?? null,
    frameIdx: record.frame_idx,
    spotCount: record.n_spots,
    indexed: record.indexed ?? Number.NaN,
    resolution: record.hres,
  };
}

export function normalizeIngestRecord(value: unknown): RoutedRecord | null {
  const parsed = ingestRecordSchema.safeParse(value);
  return parsed.success ? toRoutedRecord(parsed.data) : null;
}

/**
 * Validates a raw batch record by record. Bad entries are dropped and counted;
 * the rest of the batch still goes through.
 */
export function normalizeIngestBatch(values: readonly unknown[]): {
  records: RoutedRecord[];
  report: IngestReport;
} {
  const records: RoutedRecord[] = [];
  values.forEach((value) => {
    const record = normalizeIngestRecord(value);
    if (record) {
      records.push(record);
    }
  });
  return {
    records,
    report: {
      received: values.length,
      kept: records.length,
      dropped: values.length - records.length,
    },
  };
}

function toSpotPoint(record: FrameRecord): SpotPoint {
  return { frameIdx: record.frameIdx, spotCount: record.spotCount };
}

/**
 * Recomputes a run's view from its full history: window bounds, the visible
 * accepted/rejected split, y-bound and summary stats.
 */
export function deriveViewSnapshot(run: Run): ViewSnapshot {
  const maxFrame = run.store.maxFrameIdx;
  const windowBounds = run.window.sync(maxFrame);
  const records = run.store.all();
  const { accepted, rejected, yMax } = classifyRecords(records, windowBounds, run.threshold);
  run.window.setYMax(yMax);

  const indexedSeries: IndexedPoint[] = records
    .filter((record) => !Number.isNaN(record.indexed) && isVisible(record, windowBounds))
    .map((record) => ({ frameIdx: record.frameIdx, indexed: record.indexed }));
  const stats = run.stats.summarize(accepted);

  return {
    runId: run.runId,
    title: run.title,
    mode: run.window.mode,
    drawable: yMax !== null,
    visibleAccepted: accepted.map(toSpotPoint),
    visibleRejected: rejected.map(toSpotPoint),
    indexedSeries,
    windowBounds,
    yMax,
    threshold: run.threshold,
    thresholdLine: { value: run.threshold, visible: run.threshold > 0 },
    scrollbar: run.window.scrollbar(maxFrame),
    hitCount: stats.hitCount,
    indexedCount: stats.indexedCount,
    medianResolution: stats.medianResolution,
    recordCount: run.store.size,
    labels: buildSnapshotLabels(stats),
  };
}

export function buildRunList(runs: readonly Run[], selectedRunId: number | null): RunSummary[] {
  return runs.map((run) => ({
    runId: run.runId,
    title: run.title,
    recordCount: run.store.size,
    pending: run.pendingCount,
    threshold: run.threshold,
    mode: run.window.mode,
    selected: run.runId === selectedRunId,
  }));
}

export function buildCapabilitiesPayload(): CapabilitiesPayload {
  return {
    protocolVersion: "1.0.0",
    commands: [
      "hello",
      "ingest_batch",
      "set_threshold",
      "zoom_select",
      "zoom_cancel",
      "set_chart_range",
      "scroll",
      "select_run",
      "create_run",
      "list_runs",
      "get_snapshot",
    ],
    responses: [
      "ack",
      "error",
      "capabilities",
      "ingest_report",
      "runs_list",
      "view_snapshot",
      "run_created",
    ],
  };
}
