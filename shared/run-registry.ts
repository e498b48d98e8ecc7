import type { FrameRecord, RoutedRecord } from "./schema";
import { RecordStore } from "./record-store";
import { StatsAggregator } from "./stats";
import { MIN_ZOOM_SPAN, ViewWindow } from "./view-window";

export const DEFAULT_THRESHOLD = 10;

export class Run {
  readonly store = new RecordStore();
  readonly stats = new StatsAggregator();
  readonly window: ViewWindow;
  threshold: number;
  private pending: FrameRecord[] = [];

  constructor(
    readonly runId: number,
    { threshold, minZoomSpan }: { threshold: number; minZoomSpan: number },
  ) {
    this.threshold = threshold;
    this.window = new ViewWindow(minZoomSpan);
  }

  get title(): string {
    return `Run ${this.runId}`;
  }

  get pendingCount(): number {
    return this.pending.length;
  }

  enqueue(record: FrameRecord) {
    this.pending.push(record);
  }

  /** Moves the pending buffer into the store; returns how many were new. */
  merge(): number {
    if (this.pending.length === 0) {
      return 0;
    }
    const batch = this.pending;
    this.pending = [];
    const before = this.store.size;
    const added = this.store.append(batch);
    if (added > 0) {
      this.stats.add(this.store.since(before));
    }
    return added;
  }

  discardPending(): number {
    const discarded = this.pending.length;
    this.pending = [];
    return discarded;
  }
}

export interface RouteResult {
  routed: number;
  created: number[];
}

export type RunCreatedListener = (run: Run) => void;

export class RunRegistry {
  private readonly runs = new Map<number, Run>();
  private readonly listeners = new Set<RunCreatedListener>();
  private readonly threshold: number;
  private readonly minZoomSpan: number;

  constructor({
    defaultThreshold = DEFAULT_THRESHOLD,
    minZoomSpan = MIN_ZOOM_SPAN,
  }: { defaultThreshold?: number; minZoomSpan?: number } = {}) {
    this.threshold = defaultThreshold;
    this.minZoomSpan = minZoomSpan;
  }

  onRunCreated(listener: RunCreatedListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  nextRunId(): number {
    if (this.runs.size === 0) {
      return 1;
    }
    return Math.max(...this.runs.keys()) + 1;
  }

  createRun(runId?: number): Run {
    const id = runId ?? this.nextRunId();
    const existing = this.runs.get(id);
    if (existing) {
      return existing;
    }
    const run = new Run(id, { threshold: this.threshold, minZoomSpan: this.minZoomSpan });
    this.runs.set(id, run);
    this.listeners.forEach((listener) => listener(run));
    return run;
  }

  /**
   * Sends each record to its run's pending buffer, opening runs on first
   * sight. Records without a run number in one call share a single new run.
   */
  route(records: readonly RoutedRecord[]): RouteResult {
    const created: number[] = [];
    let unnumbered: Run | null = null;

    for (const { runId, ...record } of records) {
      let run: Run;
      if (runId === null) {
        if (!unnumbered) {
          unnumbered = this.createRun();
          created.push(unnumbered.runId);
        }
        run = unnumbered;
      } else {
        const existing = this.runs.get(runId);
        if (existing) {
          run = existing;
        } else {
          run = this.createRun(runId);
          created.push(runId);
        }
      }
      run.enqueue(record);
    }

    return { routed: records.length, created };
  }

  mergePending(): Map<number, number> {
    const merged = new Map<number, number>();
    this.runs.forEach((run) => {
      const added = run.merge();
      if (added > 0) {
        merged.set(run.runId, added);
      }
    });
    return merged;
  }

  discardPending(): number {
    let discarded = 0;
    this.runs.forEach((run) => {
      discarded += run.discardPending();
    });
    return discarded;
  }

  get(runId: number): Run | undefined {
    return this.runs.get(runId);
  }

  has(runId: number): boolean {
    return this.runs.has(runId);
  }

  list(): Run[] {
    return Array.from(this.runs.values()).sort((a, b) => a.runId - b.runId);
  }

  get size(): number {
    return this.runs.size;
  }
}
