/**
 * TimeRange Value Object
 *
 * Half-open [start, end) ranges of unix seconds.
 */

import { z } from 'zod';

export const timeRangeSchema = z.tuple([z.number(), z.number()]);
export type TimeRange = z.infer<typeof timeRangeSchema>;

export const TimeRange = {
  create: (start: number, end: number): TimeRange => {
    if (!Number.isFinite(start) || !Number.isFinite(end)) {
      throw new Error(`Invalid time range: [${start}, ${end}]. Values must be finite.`);
    }
    if (end < start) {
      throw new Error(
        `Invalid time range: [${start}, ${end}]. End must be greater than or equal to start.`
      );
    }
    return [start, end];
  },

  duration: (range: TimeRange): number => range[1] - range[0],

  overlaps: (a: TimeRange, b: TimeRange): boolean => {
    return a[0] < b[1] && b[0] < a[1];
  },

  overlapDuration: (a: TimeRange, b: TimeRange): number => {
    if (!TimeRange.overlaps(a, b)) return 0;
    const start = Math.max(a[0], b[0]);
    const end = Math.min(a[1], b[1]);
    return end - start;
  },

  /**
   * Intersect `range` with `bounds`. Returns null when nothing is left.
   */
  clamp: (range: TimeRange, bounds: TimeRange): TimeRange | null => {
    const start = Math.max(range[0], bounds[0]);
    const end = Math.min(range[1], bounds[1]);
    return end > start ? [start, end] : null;
  },

  /**
   * Total seconds of `target` covered by the union of `parts`.
   */
  coverage: (target: TimeRange, parts: TimeRange[]): number => {
    const clipped = parts
      .map((p) => TimeRange.clamp(p, target))
      .filter((p): p is TimeRange => p !== null)
      .sort((a, b) => a[0] - b[0]);

    let covered = 0;
    let cursor = target[0];
    for (const [start, end] of clipped) {
      const from = Math.max(start, cursor);
      if (end > from) {
        covered += end - from;
        cursor = end;
      }
    }
    return covered;
  },

  contains: (range: TimeRange, timestamp: number): boolean => {
    return timestamp >= range[0] && timestamp < range[1];
  },
};
