const TWO_PI = Math.PI * 2;

/**
 * Angle - helpers for working with angles in radians
 */
export const Angle = {
  TWO_PI,

  /**
   * Wrap an angle into [0, 2π)
   */
  wrap(angle: number): number {
    return ((angle % TWO_PI) + TWO_PI) % TWO_PI;
  },

  toRadians(degrees: number): number {
    return (degrees * Math.PI) / 180;
  },

  toDegrees(radians: number): number {
    return (radians * 180) / Math.PI;
  },
};

/**
 * Evenly spaced values from `start` to `end` inclusive.
 *
 * A single sample sits at the midpoint so that one-ray beams stay centered.
 * Returns an empty array for counts below 1.
 */
export function linspace(start: number, end: number, count: number): number[] {
  if (count < 1) return [];
  if (count === 1) return [(start + end) / 2];

  const step = (end - start) / (count - 1);
  const values: number[] = [];
  for (let i = 0; i < count; i++) {
    values.push(start + i * step);
  }
  return values;
}
