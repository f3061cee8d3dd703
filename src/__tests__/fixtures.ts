import type { ImageDetection, RadarDetection, Timestamp } from '../types';

export const T1: Timestamp = '2025-01-02 15:53:39.100';
export const T2: Timestamp = '2025-01-02 15:53:39.200';
export const T3: Timestamp = '2025-01-02 15:53:40.000';

let line = 0;

export function radar(fields: Partial<RadarDetection> = {}): RadarDetection {
  line++;
  return {
    sensor: 'radar',
    x: 0,
    y: 0,
    confidence: null,
    distance: null,
    theta: null,
    velocity: null,
    power: null,
    timestamp: T1,
    source: { file: 'radar.txt', line },
    ...fields
  };
}

export function image(fields: Partial<ImageDetection> = {}): ImageDetection {
  line++;
  return {
    sensor: 'image',
    x: 0,
    y: 0,
    confidence: null,
    left: null,
    top: null,
    width: null,
    height: null,
    timestamp: T1,
    source: { file: 'image.txt', line },
    ...fields
  };
}
