import { compareTimestamps } from '../parsing/timestamp';
import type { Detection, ImageDetection, MatchResult, RadarDetection, TimeFrame, Timestamp } from '../types';

function groupByTimestamp<T extends Detection>(detections: T[]): Map<Timestamp, T[]> {
  const groups = new Map<Timestamp, T[]>();
  for (const detection of detections) {
    const group = groups.get(detection.timestamp);
    if (group) {
      group.push(detection);
    } else {
      groups.set(detection.timestamp, [detection]);
    }
  }
  return groups;
}

/**
 * Exact equality on x, y and confidence. A null on either side never matches.
 */
export function isSameObject(radar: RadarDetection, image: ImageDetection): boolean {
  return (
    radar.x !== null && radar.x === image.x &&
    radar.y !== null && radar.y === image.y &&
    radar.confidence !== null && radar.confidence === image.confidence
  );
}

/**
 * Checks every radar time-frame against the image detections of the same
 * timestamp. A frame counts as matched only when all of its radar detections
 * have a partner; one miss sends the whole frame, image side included, to
 * `unmatched`. Image detections may be reused by several radar detections.
 * Timestamps seen only by the image sensor are not visited.
 */
export function matchSensors(radar: RadarDetection[], image: ImageDetection[]): MatchResult {
  const radarByTime = groupByTimestamp(radar);
  const imageByTime = groupByTimestamp(image);
  const timestamps = Array.from(radarByTime.keys()).sort(compareTimestamps);

  const matched: TimeFrame[] = [];
  const unmatched: TimeFrame[] = [];
  const unmatchedRadar: RadarDetection[] = [];
  let matchedCount = 0;
  let totalCount = 0;

  for (const timestamp of timestamps) {
    const frame: TimeFrame = {
      timestamp,
      radar: radarByTime.get(timestamp) ?? [],
      image: imageByTime.get(timestamp) ?? []
    };

    const missing = frame.radar.filter(r => !frame.image.some(i => isSameObject(r, i)));
    totalCount += frame.radar.length;

    if (missing.length === 0 && frame.radar.length > 0) {
      matchedCount += frame.radar.length;
      matched.push(frame);
    } else {
      unmatched.push(frame);
      unmatchedRadar.push(...missing);
    }
  }

  return {
    matched,
    unmatched,
    matchedCount,
    totalCount,
    matchPercentage: totalCount > 0 ? (matchedCount / totalCount) * 100 : 0,
    unmatchedRadar
  };
}
