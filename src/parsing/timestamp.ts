import type { Timestamp } from '../types';

const TIMESTAMP_PATTERN = /^(\d{4}-\d{2}-\d{2})\s+(\d{2}:\d{2}:\d{2})\.(\d+)/;

export interface TimestampMatch {
  timestamp: Timestamp;
  // text after the timestamp, trimmed; empty for a bare timestamp line
  rest: string;
}

/**
 * `.1`, `.100` and `.1000` are the same instant, so trailing zeros of the
 * fraction are dropped before padding back to milliseconds.
 */
export function normalizeTimestamp(date: string, time: string, fraction: string): Timestamp {
  const trimmed = fraction.replace(/0+$/, '').padEnd(3, '0');
  return `${date} ${time}.${trimmed}`;
}

export function matchTimestamp(line: string): TimestampMatch | null {
  const match = TIMESTAMP_PATTERN.exec(line);
  if (!match) return null;

  const rest = line.slice(match[0].length);
  // `12:00:00.5abc` is not a timestamp followed by text
  if (rest.length > 0 && !/^\s/.test(rest)) return null;

  return {
    timestamp: normalizeTimestamp(match[1], match[2], match[3]),
    rest: rest.trim()
  };
}

export function compareTimestamps(a: Timestamp, b: Timestamp): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}
