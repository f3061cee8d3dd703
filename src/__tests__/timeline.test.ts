import { describe, it, expect } from 'vitest';
import { buildTimeline } from '../analysis/timeline';
import { sortChronologically } from '../analysis/sorting';
import { T1, T2, T3, image, radar } from './fixtures';

describe('buildTimeline', () => {
  it('maps the timestamps of both sensors to consecutive steps', () => {
    const steps = buildTimeline(
      [radar({ x: -1, y: 5, timestamp: T2 }), radar({ x: 0, y: 5, timestamp: T1 })],
      [image({ x: 3, y: 2, timestamp: T3 }), image({ x: 0, y: 5, timestamp: T1 })]
    );

    expect(steps).toEqual([
      { step: 0, timestamp: T1, radar: [{ x: 0, y: 5 }], image: [{ x: 0, y: 5 }] },
      { step: 1, timestamp: T2, radar: [{ x: -1, y: 5 }], image: [] },
      { step: 2, timestamp: T3, radar: [], image: [{ x: 3, y: 2 }] }
    ]);
  });

  it('is empty without detections', () => {
    expect(buildTimeline([], [])).toEqual([]);
  });
});

describe('sortChronologically', () => {
  it('orders by timestamp, then y, without touching the input', () => {
    const late = radar({ y: 1, timestamp: T3 });
    const earlyHigh = radar({ y: 50, timestamp: T1 });
    const earlyLow = radar({ y: 2, timestamp: T1 });
    const unknownY = radar({ y: null, timestamp: T1 });
    const input = [late, earlyHigh, earlyLow, unknownY];

    expect(sortChronologically(input)).toEqual([unknownY, earlyLow, earlyHigh, late]);
    expect(input[0]).toBe(late);
  });

  it('keeps equal keys in encounter order', () => {
    const first = radar({ y: 4, confidence: 1 });
    const second = radar({ y: 4, confidence: 2 });

    const sorted = sortChronologically([first, second]);

    expect(sorted[0]).toBe(first);
    expect(sorted[1]).toBe(second);
  });
});
