import type { SnapshotLabels } from "./schema";

export const PLACEHOLDER = "—";

function isFiniteNumber(value: number | null | undefined): value is number {
  return typeof value === "number" && Number.isFinite(value);
}

export function formatCount(value: number | null | undefined): string {
  if (!isFiniteNumber(value)) {
    return PLACEHOLDER;
  }
  return `${value}`;
}

export function formatResolution(value: number | null | undefined): string {
  if (!isFiniteNumber(value)) {
    return PLACEHOLDER;
  }
  return `${value.toFixed(2)} Å`;
}

export function buildSnapshotLabels({
  hitCount,
  indexedCount,
  medianResolution,
}: {
  hitCount: number;
  indexedCount: number;
  medianResolution: number;
}): SnapshotLabels {
  return {
    hits: formatCount(hitCount),
    indexed: formatCount(indexedCount),
    resolution: formatResolution(medianResolution),
  };
}
