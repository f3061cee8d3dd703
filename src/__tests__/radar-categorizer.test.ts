import { describe, it, expect } from 'vitest';
import { CATEGORY_LABELS, categorizeRadar, summarizeCategories } from '../analysis/radar-categorizer';
import { RadarCategory } from '../types';
import type { RadarDetection } from '../types';
import { radar } from './fixtures';

describe('categorizeRadar', () => {
  it('puts a stationary object at the origin only in Stationary', () => {
    const still = radar({ x: 0, y: 0, velocity: 0 });
    const result = categorizeRadar([still]);

    expect(result[RadarCategory.Stationary]).toEqual([still]);
    expect(result[RadarCategory.Near]).toEqual([]);
    expect(result[RadarCategory.Mid]).toEqual([]);
    expect(result[RadarCategory.Far]).toEqual([]);
  });

  it('puts a moving object at the origin only in Near', () => {
    const moving = radar({ x: 0, y: 0, velocity: 5 });
    const result = categorizeRadar([moving]);

    expect(result[RadarCategory.Near]).toEqual([moving]);
    expect(result[RadarCategory.Stationary]).toEqual([]);
  });

  it('evaluates each predicate exactly at its thresholds', () => {
    const ys: Array<number | null> = [-5, 0, 19, 20, 50, 80, 81, null];
    const velocities: Array<number | null> = [null, 0, -3, 3];
    const xs: Array<number | null> = [0, 1, null];

    const all: RadarDetection[] = [];
    for (const y of ys) {
      for (const velocity of velocities) {
        for (const x of xs) {
          all.push(radar({ x, y, velocity }));
        }
      }
    }

    const result = categorizeRadar(all);
    const moving = (d: RadarDetection) => d.velocity !== null && d.velocity !== 0;

    for (const d of all) {
      const near = d.y !== null && d.y < 20 && moving(d);
      const mid = d.y !== null && d.y >= 20 && d.y <= 80 && moving(d);
      const far = d.y !== null && d.y > 80 && moving(d);
      const stationary = d.x === 0 && d.y === 0 && d.velocity === 0;

      expect(result[RadarCategory.Near].includes(d)).toBe(near);
      expect(result[RadarCategory.Mid].includes(d)).toBe(mid);
      expect(result[RadarCategory.Far].includes(d)).toBe(far);
      expect(result[RadarCategory.Stationary].includes(d)).toBe(stationary);
    }
  });

  it('never treats a null velocity as zero', () => {
    const unknown = radar({ x: 0, y: 0, velocity: null });
    const result = categorizeRadar([unknown]);

    expect(summarizeCategories(result).map(s => s.count)).toEqual([0, 0, 0, 0]);
  });

  it('sorts moving categories by y and keeps ties in encounter order', () => {
    const a = radar({ y: 10, velocity: 1 });
    const b = radar({ y: 5, velocity: 1 });
    const c = radar({ y: -1, velocity: 1 });
    const d = radar({ y: 5, velocity: 2 });
    const e = radar({ y: 90, velocity: 1 });
    const f = radar({ y: 85, velocity: 1 });

    const result = categorizeRadar([a, b, c, d, e, f]);

    expect(result[RadarCategory.Near]).toEqual([c, b, d, a]);
    expect(result[RadarCategory.Near][1]).toBe(b);
    expect(result[RadarCategory.Near][2]).toBe(d);
    expect(result[RadarCategory.Far]).toEqual([f, e]);
  });

  it('keeps Stationary in encounter order', () => {
    const first = radar({ x: 0, y: 0, velocity: 0, confidence: 2 });
    const second = radar({ x: 0, y: 0, velocity: 0, confidence: 1 });

    expect(categorizeRadar([first, second])[RadarCategory.Stationary]).toEqual([first, second]);
  });

  it('returns four empty categories for no input', () => {
    expect(categorizeRadar([])).toEqual({
      [RadarCategory.Near]: [],
      [RadarCategory.Mid]: [],
      [RadarCategory.Far]: [],
      [RadarCategory.Stationary]: []
    });
  });

  it('does not reorder the input', () => {
    const input = [radar({ y: 30, velocity: 1 }), radar({ y: 25, velocity: 1 })];
    const before = [...input];

    categorizeRadar(input);

    expect(input).toEqual(before);
  });
});

describe('summarizeCategories', () => {
  it('reports counts in category order', () => {
    const result = categorizeRadar([
      radar({ y: 10, velocity: 1 }),
      radar({ y: 50, velocity: 1 }),
      radar({ y: 60, velocity: -1 }),
      radar({ x: 0, y: 0, velocity: 0 })
    ]);

    expect(summarizeCategories(result)).toEqual([
      { category: RadarCategory.Near, label: CATEGORY_LABELS[RadarCategory.Near], count: 1 },
      { category: RadarCategory.Mid, label: CATEGORY_LABELS[RadarCategory.Mid], count: 2 },
      { category: RadarCategory.Far, label: CATEGORY_LABELS[RadarCategory.Far], count: 0 },
      { category: RadarCategory.Stationary, label: CATEGORY_LABELS[RadarCategory.Stationary], count: 1 }
    ]);
  });
});
