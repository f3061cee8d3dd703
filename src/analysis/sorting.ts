import { compareTimestamps } from '../parsing/timestamp';
import type { Detection } from '../types';

/**
 * Stable sort by timestamp, then y. Files are read in enumeration order, so
 * ingest output is only chronological after this step. Null y sorts first.
 */
export function sortChronologically<T extends Detection>(detections: T[]): T[] {
  return [...detections].sort((a, b) => {
    const byTime = compareTimestamps(a.timestamp, b.timestamp);
    if (byTime !== 0) return byTime;
    if (a.y === b.y) return 0;
    if (a.y === null) return -1;
    if (b.y === null) return 1;
    return a.y - b.y;
  });
}
