import { RadarCategory } from '../types';
import type { CategorizedRadar, RadarDetection } from '../types';

export const NEAR_MAX_Y = 20;
export const FAR_MIN_Y = 80;

export const CATEGORY_LABELS: Record<RadarCategory, string> = {
  [RadarCategory.Near]: 'Category 1 (y < 20 and velocity ≠ 0)',
  [RadarCategory.Mid]: 'Category 2 (20 ≤ y ≤ 80 and velocity ≠ 0)',
  [RadarCategory.Far]: 'Category 3 (y > 80 and velocity ≠ 0)',
  [RadarCategory.Stationary]: 'Category 4 (x = 0, y = 0, and velocity = 0)'
};

export const CATEGORY_ORDER: RadarCategory[] = [
  RadarCategory.Near,
  RadarCategory.Mid,
  RadarCategory.Far,
  RadarCategory.Stationary
];

// A null field never satisfies a comparison; it is not read as zero.
function isMoving(detection: RadarDetection): boolean {
  return detection.velocity !== null && detection.velocity !== 0;
}

// No lower bound on y: negative y and y = 0 are Near when moving.
export function isNear(detection: RadarDetection): boolean {
  return detection.y !== null && detection.y < NEAR_MAX_Y && isMoving(detection);
}

export function isMid(detection: RadarDetection): boolean {
  return detection.y !== null && detection.y >= NEAR_MAX_Y && detection.y <= FAR_MIN_Y && isMoving(detection);
}

export function isFar(detection: RadarDetection): boolean {
  return detection.y !== null && detection.y > FAR_MIN_Y && isMoving(detection);
}

export function isStationaryAtOrigin(detection: RadarDetection): boolean {
  return detection.x === 0 && detection.y === 0 && detection.velocity === 0;
}

const PREDICATES: Record<RadarCategory, (detection: RadarDetection) => boolean> = {
  [RadarCategory.Near]: isNear,
  [RadarCategory.Mid]: isMid,
  [RadarCategory.Far]: isFar,
  [RadarCategory.Stationary]: isStationaryAtOrigin
};

function byY(a: RadarDetection, b: RadarDetection): number {
  return (a.y ?? 0) - (b.y ?? 0);
}

/**
 * Each category is evaluated independently over the whole collection. Near,
 * Mid and Far are sorted by y (stable); Stationary keeps encounter order.
 */
export function categorizeRadar(radar: RadarDetection[]): CategorizedRadar {
  const pick = (category: RadarCategory) => radar.filter(PREDICATES[category]);

  return {
    [RadarCategory.Near]: pick(RadarCategory.Near).sort(byY),
    [RadarCategory.Mid]: pick(RadarCategory.Mid).sort(byY),
    [RadarCategory.Far]: pick(RadarCategory.Far).sort(byY),
    [RadarCategory.Stationary]: pick(RadarCategory.Stationary)
  };
}

export function summarizeCategories(categories: CategorizedRadar): Array<{ category: RadarCategory; label: string; count: number }> {
  return CATEGORY_ORDER.map(category => ({
    category,
    label: CATEGORY_LABELS[category],
    count: categories[category].length
  }));
}
