import type { FrameRecord } from "./schema";

export interface RunStats {
  hitCount: number;
  indexedCount: number;
  medianResolution: number;
}

function medianOfSorted(sorted: readonly number[]): number {
  if (sorted.length === 0) {
    return Number.NaN;
  }
  const mid = Math.floor(sorted.length / 2);
  if (sorted.length % 2 === 1) {
    return sorted[mid];
  }
  return (sorted[mid - 1] + sorted[mid]) / 2;
}

export function median(values: readonly number[]): number {
  return medianOfSorted([...values].sort((a, b) => a - b));
}

function insertSorted(target: number[], value: number) {
  let lo = 0;
  let hi = target.length;
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    if (target[mid] <= value) {
      lo = mid + 1;
    } else {
      hi = mid;
    }
  }
  target.splice(lo, 0, value);
}

/**
 * Full-history aggregates for one run, updated as records are merged so a
 * recomputation never rescans the store.
 */
export class StatsAggregator {
  private readonly resolutions: number[] = [];
  private indexed = 0;

  add(records: readonly FrameRecord[]) {
    records.forEach((record) => {
      if (!Number.isNaN(record.indexed)) {
        this.indexed += 1;
      }
      if (Number.isFinite(record.resolution)) {
        insertSorted(this.resolutions, record.resolution);
      }
    });
  }

  get indexedCount(): number {
    return this.indexed;
  }

  get medianResolution(): number {
    return medianOfSorted(this.resolutions);
  }

  summarize(accepted: readonly FrameRecord[]): RunStats {
    return {
      hitCount: accepted.length,
      indexedCount: this.indexed,
      medianResolution: this.medianResolution,
    };
  }
}
