import { z } from "zod";

// Wire shape pushed by the ingestion collaborator. `indexed` travels as null
// when the frame did not index, since JSON has no NaN.
export const ingestRecordSchema = z.object({
  run_no: z.number().int().positive().nullable().optional(),
  frame_idx: z.number().int(),
  n_spots: z.number().int(),
  indexed: z.number().nullable().optional(),
  hres: z.number().finite(),
});

export type IngestRecord = z.infer<typeof ingestRecordSchema>;

// `:runId` path segments; "3abc" is not run 3.
export const runIdParamSchema = z.coerce.number().int().positive();

export interface FrameRecord {
  frameIdx: number;
  spotCount: number;
  indexed: number;
  resolution: number;
}

export interface RoutedRecord extends FrameRecord {
  runId: number | null;
}

export interface IngestReport {
  received: number;
  kept: number;
  dropped: number;
}

export type ViewMode = "full" | "zoomed-free" | "zoomed-locked";

export interface WindowBounds {
  xMin: number;
  xMax: number;
}

export interface ViewWindowState extends WindowBounds {
  yMax: number | null;
  zoomActive: boolean;
  lockToLatest: boolean;
  chartRange: number | null;
}

export interface ScrollbarState {
  position: number;
  thumbSize: number;
  range: number;
}

export interface SpotPoint {
  frameIdx: number;
  spotCount: number;
}

export interface IndexedPoint {
  frameIdx: number;
  indexed: number;
}

export interface SnapshotLabels {
  hits: string;
  indexed: string;
  resolution: string;
}

export interface ViewSnapshot {
  runId: number;
  title: string;
  mode: ViewMode;
  drawable: boolean;
  visibleAccepted: SpotPoint[];
  visibleRejected: SpotPoint[];
  indexedSeries: IndexedPoint[];
  windowBounds: WindowBounds;
  yMax: number | null;
  threshold: number;
  thresholdLine: { value: number; visible: boolean };
  scrollbar: ScrollbarState | null;
  hitCount: number;
  indexedCount: number;
  medianResolution: number;
  recordCount: number;
  labels: SnapshotLabels;
}

export interface RunSummary {
  runId: number;
  title: string;
  recordCount: number;
  pending: number;
  threshold: number;
  mode: ViewMode;
  selected: boolean;
}

const requestId = { request_id: z.string().optional() };

export const controlCommandSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("hello"), ...requestId }),
  z.object({
    type: z.literal("ingest_batch"),
    records: z.array(z.unknown()),
    ...requestId,
  }),
  z.object({ type: z.literal("set_threshold"), value: z.number().int(), ...requestId }),
  z.object({
    type: z.literal("zoom_select"),
    min: z.number(),
    max: z.number(),
    ...requestId,
  }),
  z.object({ type: z.literal("zoom_cancel"), ...requestId }),
  z.object({
    type: z.literal("set_chart_range"),
    range: z.number().positive().nullable(),
    ...requestId,
  }),
  z.object({ type: z.literal("scroll"), center: z.number(), ...requestId }),
  z.object({ type: z.literal("select_run"), runId: z.number().int().positive(), ...requestId }),
  z.object({
    type: z.literal("create_run"),
    runId: z.number().int().positive().optional(),
    ...requestId,
  }),
  z.object({ type: z.literal("list_runs"), ...requestId }),
  z.object({
    type: z.literal("get_snapshot"),
    runId: z.number().int().positive().optional(),
    ...requestId,
  }),
]);

export type ControlCommand = z.infer<typeof controlCommandSchema>;

export interface ControlResponse {
  type:
    | "ack"
    | "error"
    | "capabilities"
    | "ingest_report"
    | "runs_list"
    | "view_snapshot"
    | "run_created";
  request_id?: string;
  payload?: unknown;
  error?: string;
}

export interface CapabilitiesPayload {
  protocolVersion: string;
  commands: string[];
  responses: string[];
}
