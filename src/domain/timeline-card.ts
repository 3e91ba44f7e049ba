/**
 * Timeline card conversions between stored (absolute) and provider
 * (batch-relative) form.
 */

import { z } from 'zod';
import {
  type DbTimelineCard,
  type DbTimelineCardInsert,
  type RelativeCard,
  appSitesSchema,
} from '../0_types.js';
import { generateId } from '../db/helpers.js';
import { logicalDayFor } from './logical-day.js';
import { TimeRange } from './time-range.js';
import { toAbsolute, toRelative } from './video-time.js';

const cardMetadataSchema = z.object({
  appSites: appSitesSchema.optional(),
  distractions: z
    .array(
      z.object({
        startTs: z.number(),
        endTs: z.number(),
        title: z.string(),
        summary: z.string(),
      })
    )
    .optional(),
});
export type CardMetadata = z.infer<typeof cardMetadataSchema>;

export function parseCardMetadata(raw: string | null): CardMetadata {
  if (!raw) return {};
  try {
    const result = cardMetadataSchema.safeParse(JSON.parse(raw));
    return result.success ? result.data : {};
  } catch {
    return {};
  }
}

export function toRelativeCard(
  card: DbTimelineCard,
  batchStartTs: number
): RelativeCard {
  const metadata = parseCardMetadata(card.metadata);
  return {
    start: toRelative(card.start_ts, batchStartTs),
    end: toRelative(card.end_ts, batchStartTs),
    title: card.title,
    summary: card.summary,
    detailedSummary: card.detailed_summary,
    category: card.category,
    subcategory: card.subcategory,
    ...(metadata.appSites && { appSites: metadata.appSites }),
    ...(metadata.distractions && {
      distractions: metadata.distractions.map((d) => ({
        start: toRelative(d.startTs, batchStartTs),
        end: toRelative(d.endTs, batchStartTs),
        title: d.title,
        summary: d.summary,
      })),
    }),
  };
}

/**
 * Convert a provider card to a row, clamped to `bounds`.
 * Returns null when nothing of the card is left inside the bounds.
 */
export function toCardInsert(
  card: RelativeCard,
  options: { batchId: string; batchStartTs: number; bounds: TimeRange }
): DbTimelineCardInsert | null {
  const { batchId, batchStartTs, bounds } = options;
  const start = toAbsolute(card.start, batchStartTs);
  const end = toAbsolute(card.end, batchStartTs);
  if (end <= start) return null;

  const clamped = TimeRange.clamp([start, end], bounds);
  if (!clamped) return null;

  const metadata: CardMetadata = {
    ...(card.appSites && { appSites: card.appSites }),
    ...(card.distractions && {
      distractions: card.distractions.map((d) => ({
        startTs: toAbsolute(d.start, batchStartTs),
        endTs: toAbsolute(d.end, batchStartTs),
        title: d.title,
        summary: d.summary,
      })),
    }),
  };

  return {
    id: generateId(),
    batch_id: batchId,
    start_ts: clamped[0],
    end_ts: clamped[1],
    day: logicalDayFor(clamped[0]),
    title: card.title,
    summary: card.summary,
    detailed_summary: card.detailedSummary,
    category: card.category,
    subcategory: card.subcategory,
    metadata: Object.keys(metadata).length > 0 ? JSON.stringify(metadata) : null,
  };
}
