/**
 * Card merge policy
 *
 * Decides whether a freshly generated card may be folded into the last card
 * of the window before asking a model. All times are video-relative.
 */

import type { RelativeCard } from '../0_types.js';
import { parseVideoTimestamp } from '../domain/video-time.js';

export const MERGE_LIMITS = {
  /** A last card this long is left alone */
  maxLastCardMinutes: 40,
  maxGapMinutes: 5,
  maxMergedMinutes: 60,
  minConfidence: 0.8,
} as const;

export type MergeGuard =
  | { allowed: true }
  | { allowed: false; reason: string };

export function minutesBetween(start: string, end: string): number {
  return (parseVideoTimestamp(end) - parseVideoTimestamp(start)) / 60;
}

export function cardMinutes(card: Pick<RelativeCard, 'start' | 'end'>): number {
  return minutesBetween(card.start, card.end);
}

export function checkMergeGuards(
  last: RelativeCard,
  next: RelativeCard,
  limits: typeof MERGE_LIMITS = MERGE_LIMITS
): MergeGuard {
  const lastMinutes = cardMinutes(last);
  if (lastMinutes >= limits.maxLastCardMinutes) {
    return {
      allowed: false,
      reason: `last card already ${lastMinutes.toFixed(1)} minutes`,
    };
  }

  const gap = minutesBetween(last.end, next.start);
  if (gap > limits.maxGapMinutes) {
    return { allowed: false, reason: `gap of ${gap.toFixed(1)} minutes` };
  }

  const merged = minutesBetween(last.start, next.end);
  if (merged > limits.maxMergedMinutes) {
    return {
      allowed: false,
      reason: `merged card would be ${merged.toFixed(1)} minutes`,
    };
  }

  return { allowed: true };
}

export function shouldMerge(
  decision: { combine: boolean; confidence: number },
  limits: typeof MERGE_LIMITS = MERGE_LIMITS
): boolean {
  return decision.combine && decision.confidence >= limits.minConfidence;
}

/**
 * Keep the merged card only while it stays under the merged-span cap.
 */
export function acceptMergedCard(
  merged: RelativeCard,
  limits: typeof MERGE_LIMITS = MERGE_LIMITS
): boolean {
  return cardMinutes(merged) <= limits.maxMergedMinutes;
}
