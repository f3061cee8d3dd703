import { compareTimestamps } from '../parsing/timestamp';
import type { ImageDetection, RadarDetection, TimelineStep, Timestamp } from '../types';

/**
 * Maps every timestamp seen by either sensor to an integer step 0..N-1 in
 * chronological order, for plotting consumers that animate frame by frame.
 */
export function buildTimeline(radar: RadarDetection[], image: ImageDetection[]): TimelineStep[] {
  const timestamps = new Set<Timestamp>();
  radar.forEach(d => timestamps.add(d.timestamp));
  image.forEach(d => timestamps.add(d.timestamp));

  const steps = new Map<Timestamp, TimelineStep>();
  Array.from(timestamps)
    .sort(compareTimestamps)
    .forEach((timestamp, step) => {
      steps.set(timestamp, { step, timestamp, radar: [], image: [] });
    });

  for (const d of radar) {
    steps.get(d.timestamp)?.radar.push({ x: d.x, y: d.y });
  }
  for (const d of image) {
    steps.get(d.timestamp)?.image.push({ x: d.x, y: d.y });
  }

  return Array.from(steps.values());
}
