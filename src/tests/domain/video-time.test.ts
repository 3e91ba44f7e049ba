import { describe, expect, it } from 'vitest';
import {
  VIDEO_TIMESTAMP_PATTERN,
  formatVideoTimestamp,
  parseVideoTimestamp,
  toAbsolute,
  toRelative,
} from '../../domain/video-time.js';

describe('parseVideoTimestamp', () => {
  it('parses mm:ss', () => {
    expect(parseVideoTimestamp('05:10')).toBe(310);
  });

  it('parses h:mm:ss', () => {
    expect(parseVideoTimestamp('1:02:03')).toBe(3723);
  });

  it('parses offsets before the batch start', () => {
    expect(parseVideoTimestamp('-12:30')).toBe(-750);
  });

  it('accepts minutes past an hour', () => {
    expect(parseVideoTimestamp('75:00')).toBe(4500);
  });

  it('returns 0 for garbage', () => {
    expect(parseVideoTimestamp('half past ten')).toBe(0);
  });
});

describe('formatVideoTimestamp', () => {
  it('pads minutes and seconds', () => {
    expect(formatVideoTimestamp(310)).toBe('05:10');
  });

  it('does not wrap minutes into hours', () => {
    expect(formatVideoTimestamp(3723)).toBe('62:03');
  });

  it('keeps the sign of negative offsets', () => {
    expect(formatVideoTimestamp(-750)).toBe('-12:30');
  });

  it('rounds fractional seconds', () => {
    expect(formatVideoTimestamp(59.6)).toBe('01:00');
  });
});

describe('batch-relative conversion', () => {
  const batchStart = 1_760_000_000;

  it('maps an offset to unix seconds', () => {
    expect(toAbsolute('02:00', batchStart)).toBe(batchStart + 120);
  });

  it('maps earlier unix seconds to a negative offset', () => {
    expect(toRelative(batchStart - 120, batchStart)).toBe('-02:00');
  });

  it('round-trips offsets through unix seconds', () => {
    for (const offset of ['00:00', '00:59', '05:10', '62:03', '-12:30', '-75:00']) {
      expect(toRelative(toAbsolute(offset, batchStart), batchStart)).toBe(offset);
    }
  });

  it('round-trips unix seconds through offsets', () => {
    for (const delta of [0, 59, 3723, -1, -4501]) {
      const ts = batchStart + delta;
      expect(toAbsolute(toRelative(ts, batchStart), batchStart)).toBe(ts);
    }
  });

  it('normalises h:mm:ss to minutes on the way back', () => {
    expect(toRelative(toAbsolute('1:02:03', batchStart), batchStart)).toBe('62:03');
  });
});

describe('VIDEO_TIMESTAMP_PATTERN', () => {
  it('accepts provider timestamps', () => {
    for (const value of ['05:10', '1:02:03', '-12:30', '75:00']) {
      expect(VIDEO_TIMESTAMP_PATTERN.test(value)).toBe(true);
    }
  });

  it('rejects anything else', () => {
    for (const value of ['about five minutes in', '5:1', '05:10s', '', '1:2:3']) {
      expect(VIDEO_TIMESTAMP_PATTERN.test(value)).toBe(false);
    }
  });
});
