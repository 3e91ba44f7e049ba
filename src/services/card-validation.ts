/**
 * Card validation for providers that synthesize a whole card list at once.
 */

import type { RelativeCard } from '../0_types.js';
import { TimeRange } from '../domain/time-range.js';
import {
  formatVideoTimestamp,
  parseVideoTimestamp,
} from '../domain/video-time.js';

export interface CardValidationOptions {
  /** Slack on each side of a card when checking coverage */
  flexibilitySeconds: number;
  /** Every card but the last must be at least this long */
  minCardMinutes: number;
}

export const DEFAULT_CARD_VALIDATION: CardValidationOptions = {
  flexibilitySeconds: 180,
  minCardMinutes: 10,
};

const MIN_COUNTED_CARD_SECONDS = 6;

export function toRange(item: { start: string; end: string }): TimeRange {
  const start = parseVideoTimestamp(item.start);
  const end = parseVideoTimestamp(item.end);
  return [start, Math.max(start, end)];
}

export function mergeRanges(ranges: TimeRange[]): TimeRange[] {
  const sorted = [...ranges].sort((a, b) => a[0] - b[0]);
  const merged: TimeRange[] = [];
  for (const range of sorted) {
    const last = merged[merged.length - 1];
    if (last && range[0] <= last[1]) {
      last[1] = Math.max(last[1], range[1]);
    } else {
      merged.push([range[0], range[1]]);
    }
  }
  return merged;
}

/**
 * Parts of `required` not covered by any of `covering`.
 */
export function uncoveredSegments(
  required: TimeRange[],
  covering: TimeRange[]
): TimeRange[] {
  const cover = mergeRanges(covering);
  const gaps: TimeRange[] = [];

  for (const [start, end] of mergeRanges(required)) {
    let cursor = start;
    for (const [cs, ce] of cover) {
      if (ce <= cursor) continue;
      if (cs >= end) break;
      if (cs > cursor) gaps.push([cursor, cs]);
      cursor = Math.max(cursor, ce);
      if (cursor >= end) break;
    }
    if (cursor < end) gaps.push([cursor, end]);
  }
  return gaps;
}

export function validateCardCoverage(
  required: TimeRange[],
  cards: RelativeCard[],
  options: CardValidationOptions = DEFAULT_CARD_VALIDATION
): string | null {
  const flex = options.flexibilitySeconds;
  const covering = cards
    .map(toRange)
    .filter((r) => TimeRange.duration(r) >= MIN_COUNTED_CARD_SECONDS)
    .map((r): TimeRange => [r[0] - flex, r[1] + flex]);

  const significant = uncoveredSegments(required, covering).filter(
    (gap) => TimeRange.duration(gap) > flex
  );
  if (significant.length === 0) return null;

  const described = significant.map(
    ([s, e]) =>
      `${formatVideoTimestamp(s)}-${formatVideoTimestamp(e)} (${Math.floor((e - s) / 60)} min)`
  );
  return `Missing coverage for time segments: ${described.join(', ')}`;
}

export function validateCardDurations(
  cards: RelativeCard[],
  options: CardValidationOptions = DEFAULT_CARD_VALIDATION
): string | null {
  for (let i = 0; i < cards.length - 1; i++) {
    const minutes = TimeRange.duration(toRange(cards[i])) / 60;
    if (minutes < options.minCardMinutes) {
      return `Card ${i + 1} '${cards[i].title}' is only ${minutes.toFixed(1)} minutes long`;
    }
  }
  return null;
}

/**
 * All validation failures for a synthesized card list; empty when valid.
 */
export function validateCards(
  required: TimeRange[],
  cards: RelativeCard[],
  options: CardValidationOptions = DEFAULT_CARD_VALIDATION
): string[] {
  if (cards.length === 0) return ['No cards returned'];
  const errors: string[] = [];
  const coverage = validateCardCoverage(required, cards, options);
  if (coverage) errors.push(coverage);
  const durations = validateCardDurations(cards, options);
  if (durations) errors.push(durations);
  return errors;
}
