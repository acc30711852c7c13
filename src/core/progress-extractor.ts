import { ProgressMarker } from '../types/execution';

// [12/345], [ 12 / 345 ]
const PROGRESS_PATTERN = /\[\s*(\d+)\s*\/\s*(\d+)\s*\]/;

/**
 * Find the first bracketed `current/total` pair in a line of build output.
 * Returns undefined for lines without one, or when total is zero.
 */
export function extractProgress(line: string): ProgressMarker | undefined {
  const match = PROGRESS_PATTERN.exec(line);
  if (!match) {
    return undefined;
  }

  const current = Number(match[1]);
  const total = Number(match[2]);
  if (!Number.isSafeInteger(current) || !Number.isSafeInteger(total) || total === 0) {
    return undefined;
  }

  return { current: Math.min(current, total), total };
}

export function progressFraction(marker: ProgressMarker): number {
  if (marker.total <= 0) {
    return 0;
  }
  return Math.max(0, Math.min(1, marker.current / marker.total));
}
