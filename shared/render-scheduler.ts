import type { ViewSnapshot } from "./schema";
import type { IngestQueue } from "./ingest-queue";
import type { Run, RunRegistry } from "./run-registry";
import { deriveViewSnapshot } from "./protocol-utils";

export const DEFAULT_TICK_INTERVAL_MS = 250;

/**
 * What a UI layer calls into. The scheduler owns no event loop integration
 * beyond its own tick timer.
 */
export interface MonitorControls {
  onThreshold(value: number): void;
  onZoomSelect(min: number, max: number): void;
  onScroll(center: number): void;
  onZoomCancel(): void;
  onChartRange(range: number | null): void;
  selectRun(runId: number): void;
}

export type SnapshotListener = (snapshot: ViewSnapshot) => void;

export interface RenderSchedulerOptions {
  registry: RunRegistry;
  queue: IngestQueue;
  tickIntervalMs?: number;
  followNewRuns?: boolean;
}

export class RenderScheduler implements MonitorControls {
  private readonly registry: RunRegistry;
  private readonly queue: IngestQueue;
  private readonly tickIntervalMs: number;
  private readonly listeners = new Set<SnapshotListener>();
  private readonly backlog: Array<() => void> = [];
  private readonly detachRegistry: () => void;
  private timer: ReturnType<typeof setInterval> | null = null;
  private selectedRunId: number | null = null;
  private busy = false;
  private latest: ViewSnapshot | null = null;

  constructor({
    registry,
    queue,
    tickIntervalMs = DEFAULT_TICK_INTERVAL_MS,
    followNewRuns = true,
  }: RenderSchedulerOptions) {
    this.registry = registry;
    this.queue = queue;
    this.tickIntervalMs = tickIntervalMs;
    this.detachRegistry = registry.onRunCreated((run) => {
      if (followNewRuns || this.selectedRunId === null) {
        this.selectedRunId = run.runId;
      }
    });
  }

  get selectedRun(): number | null {
    return this.selectedRunId;
  }

  get running(): boolean {
    return this.timer !== null;
  }

  get lastSnapshot(): ViewSnapshot | null {
    return this.latest;
  }

  onSnapshot(listener: SnapshotListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  start() {
    if (this.timer) {
      return;
    }
    this.timer = setInterval(() => this.tick(), this.tickIntervalMs);
  }

  /**
   * Halts the tick and throws away anything not yet merged. Merged history
   * stays with each run.
   */
  stop(): number {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    return this.queue.clear() + this.registry.discardPending();
  }

  dispose() {
    this.stop();
    this.detachRegistry();
    this.listeners.clear();
  }

  /** Periodic trigger: merge every run, re-derive only the selected one. */
  tick() {
    this.serialize(() => {
      this.queue.drain().forEach((batch) => {
        this.registry.route(batch);
      });
      this.registry.mergePending();
      this.render();
    });
  }

  onThreshold(value: number) {
    this.serialize(() => {
      const run = this.currentRun();
      if (!run || !Number.isFinite(value)) {
        return;
      }
      run.threshold = Math.trunc(value);
      this.render();
    });
  }

  onZoomSelect(min: number, max: number) {
    this.serialize(() => {
      const run = this.currentRun();
      if (run && run.window.selectSpan(min, max)) {
        this.render();
      }
    });
  }

  onScroll(center: number) {
    this.serialize(() => {
      const run = this.currentRun();
      if (run && run.window.scroll(center, run.store.maxFrameIdx)) {
        this.render();
      }
    });
  }

  onZoomCancel() {
    this.serialize(() => {
      const run = this.currentRun();
      if (!run) {
        return;
      }
      run.window.cancelZoom();
      this.render();
    });
  }

  onChartRange(range: number | null) {
    this.serialize(() => {
      const run = this.currentRun();
      if (!run) {
        return;
      }
      if (range === null) {
        run.window.cancelZoom();
      } else if (!run.window.setChartRange(range)) {
        return;
      }
      this.render();
    });
  }

  /**
   * Switching runs replays that run's whole history into a fresh full view.
   * The run keeps its threshold.
   */
  selectRun(runId: number) {
    this.serialize(() => {
      const run = this.registry.get(runId);
      if (!run) {
        return;
      }
      if (this.selectedRunId !== runId) {
        run.window.reset();
      }
      this.selectedRunId = runId;
      run.merge();
      this.render();
    });
  }

  createRun(runId?: number): number | null {
    let created: number | null = null;
    this.serialize(() => {
      created = this.registry.createRun(runId).runId;
      this.render();
    });
    return created;
  }

  /**
   * Derives a snapshot for `runId` (or the selected run) without notifying
   * listeners. Called from inside a listener it is deferred and yields null.
   */
  snapshot(runId?: number): ViewSnapshot | null {
    let result: ViewSnapshot | null = null;
    this.serialize(() => {
      const run = runId === undefined ? this.currentRun() : this.registry.get(runId);
      if (run) {
        result = deriveViewSnapshot(run);
      }
    });
    return result;
  }

  private currentRun(): Run | undefined {
    return this.selectedRunId === null ? undefined : this.registry.get(this.selectedRunId);
  }

  private render() {
    const run = this.currentRun();
    if (!run) {
      return;
    }
    const snapshot = deriveViewSnapshot(run);
    this.latest = snapshot;
    this.listeners.forEach((listener) => {
      try {
        listener(snapshot);
      } catch (error) {
        console.error("[monitor] Snapshot listener failed:", error);
      }
    });
  }

  // Single consumer: work requested while a recomputation is running waits
  // for it and runs afterwards, in arrival order.
  private serialize(task: () => void) {
    this.backlog.push(task);
    if (this.busy) {
      return;
    }
    this.busy = true;
    try {
      let next = this.backlog.shift();
      while (next) {
        try {
          next();
        } catch (error) {
          console.error("[monitor] Scheduled update failed:", error);
        }
        next = this.backlog.shift();
      }
    } finally {
      this.busy = false;
    }
  }
}
