import type { FrameRecord } from "./schema";

/**
 * Identity key for a record. Every field takes part; NaN in `indexed` is a
 * sentinel, so two NaNs compare equal here.
 */
export function recordKey(record: FrameRecord): string {
  return `${record.frameIdx}|${record.spotCount}|${record.indexed}|${record.resolution}`;
}

/**
 * Append-only, deduplicated history of one run in arrival order.
 */
export class RecordStore {
  private readonly records: FrameRecord[] = [];
  private readonly keys = new Set<string>();
  private maxFrame: number | null = null;

  append(records: readonly FrameRecord[]): number {
    let added = 0;
    for (const record of records) {
      const key = recordKey(record);
      if (this.keys.has(key)) {
        continue;
      }
      this.keys.add(key);
      this.records.push(record);
      this.maxFrame = this.maxFrame === null ? record.frameIdx : Math.max(this.maxFrame, record.frameIdx);
      added += 1;
    }
    return added;
  }

  all(): readonly FrameRecord[] {
    return this.records;
  }

  since(index: number): readonly FrameRecord[] {
    return this.records.slice(Math.max(0, index));
  }

  has(record: FrameRecord): boolean {
    return this.keys.has(recordKey(record));
  }

  get size(): number {
    return this.records.length;
  }

  get maxFrameIdx(): number | null {
    return this.maxFrame;
  }
}
