import type { IngestReport } from "@shared/schema";
import { IngestQueue } from "@shared/ingest-queue";
import { RunRegistry } from "@shared/run-registry";
import { RenderScheduler } from "@shared/render-scheduler";
import { normalizeIngestBatch } from "@shared/protocol-utils";
import type { MonitorConfig } from "./config";
import { log } from "./log";

export interface Monitor {
  registry: RunRegistry;
  queue: IngestQueue;
  scheduler: RenderScheduler;
  ingest: (values: readonly unknown[]) => IngestReport;
}

export function createMonitor(
  config: Pick<MonitorConfig, "tickIntervalMs" | "defaultThreshold" | "minZoomSpan" | "followNewRuns">,
): Monitor {
  const registry = new RunRegistry({
    defaultThreshold: config.defaultThreshold,
    minZoomSpan: config.minZoomSpan,
  });
  const queue = new IngestQueue();
  const scheduler = new RenderScheduler({
    registry,
    queue,
    tickIntervalMs: config.tickIntervalMs,
    followNewRuns: config.followNewRuns,
  });

  registry.onRunCreated((run) => {
    log(`creating new run #${run.runId}`, "monitor");
  });

  // Producers only touch the queue; routing and merging happen on the tick.
  const ingest = (values: readonly unknown[]): IngestReport => {
    const { records, report } = normalizeIngestBatch(values);
    if (report.dropped > 0) {
      log(`dropped ${report.dropped} of ${report.received} malformed records`, "monitor");
    }
    queue.push(records);
    return report;
  };

  return { registry, queue, scheduler, ingest };
}
