import type { FrameRecord, WindowBounds } from "./schema";

export interface Classification {
  accepted: FrameRecord[];
  rejected: FrameRecord[];
  yMax: number | null;
}

export function isVisible(record: FrameRecord, bounds: WindowBounds): boolean {
  return bounds.xMin < record.frameIdx && record.frameIdx < bounds.xMax;
}

export function computeYMax(maxVisibleSpots: number, threshold: number): number {
  if (threshold > maxVisibleSpots) {
    return threshold + Math.floor(0.1 * threshold);
  }
  return maxVisibleSpots + Math.floor(0.1 * maxVisibleSpots);
}

// A record sitting exactly on the threshold lands in both lists.
export function classifyRecords(
  records: readonly FrameRecord[],
  bounds: WindowBounds,
  threshold: number,
): Classification {
  const accepted: FrameRecord[] = [];
  const rejected: FrameRecord[] = [];
  let maxSpots: number | null = null;

  for (const record of records) {
    if (!isVisible(record, bounds)) {
      continue;
    }
    maxSpots = maxSpots === null ? record.spotCount : Math.max(maxSpots, record.spotCount);
    if (record.spotCount >= threshold) {
      accepted.push(record);
    }
    if (record.spotCount <= threshold) {
      rejected.push(record);
    }
  }

  return {
    accepted,
    rejected,
    yMax: maxSpots === null ? null : computeYMax(maxSpots, threshold),
  };
}
