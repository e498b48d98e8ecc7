import type { RoutedRecord } from "./schema";

/**
 * Hand-off between the ingestion side and the scheduler. Producers only push;
 * the scheduler is the single consumer. Unbounded.
 */
export class IngestQueue {
  private batches: RoutedRecord[][] = [];

  push(batch: readonly RoutedRecord[]) {
    if (batch.length === 0) {
      return;
    }
    this.batches.push([...batch]);
  }

  drain(): RoutedRecord[][] {
    const drained = this.batches;
    this.batches = [];
    return drained;
  }

  clear(): number {
    const discarded = this.batches.reduce((total, batch) => total + batch.length, 0);
    this.batches = [];
    return discarded;
  }

  get size(): number {
    return this.batches.length;
  }
}
