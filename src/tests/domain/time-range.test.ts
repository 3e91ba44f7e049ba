import { describe, expect, it } from 'vitest';
import { TimeRange } from '../../domain/time-range.js';

describe('TimeRange Value Object', () => {
  describe('overlapDuration', () => {
    it('should return 0 when there is no overlap', () => {
      const overlap = TimeRange.overlapDuration([0, 10], [20, 30]);
      expect(overlap).toBe(0);
    });

    it('should calculate partial overlap correctly', () => {
      // Overlap between [0, 10] and [5, 15] is [5, 10] = 5 seconds
      const overlap = TimeRange.overlapDuration([0, 10], [5, 15]);
      expect(overlap).toBe(5);
    });

    it('should handle range fully contained within another', () => {
      const overlap = TimeRange.overlapDuration([0, 100], [10, 20]);
      expect(overlap).toBe(10);
    });

    it('treats touching ranges as disjoint', () => {
      expect(TimeRange.overlaps([0, 10], [10, 20])).toBe(false);
    });
  });

  describe('create', () => {
    it('accepts ranges before the epoch origin', () => {
      expect(TimeRange.create(-60, 10)).toEqual([-60, 10]);
    });

    it('should throw for end < start', () => {
      expect(() => TimeRange.create(10, 5)).toThrow();
    });

    it('should throw for non-finite values', () => {
      expect(() => TimeRange.create(0, Number.POSITIVE_INFINITY)).toThrow(
        'Values must be finite'
      );
    });
  });

  describe('clamp', () => {
    it('cuts a range down to the bounds', () => {
      expect(TimeRange.clamp([-300, 600], [0, 500])).toEqual([0, 500]);
    });

    it('returns null when nothing is left', () => {
      expect(TimeRange.clamp([600, 900], [0, 600])).toBeNull();
    });
  });

  describe('coverage', () => {
    it('counts overlapping parts once', () => {
      // [0,40] ∪ [30,60] ∪ [80,120] clipped to [0,100] = 60 + 20
      expect(
        TimeRange.coverage([0, 100], [
          [30, 60],
          [0, 40],
          [80, 120],
        ])
      ).toBe(80);
    });
  });
});
