/**
 * Batch Builder
 *
 * Groups time-ordered chunks into analysis batches. Pure: no I/O, no clock.
 */

import {
  type BatchingConfig,
  DEFAULT_BATCHING_CONFIG,
} from '../0_types.js';

export interface ChunkSpan {
  id: string;
  start_ts: number;
  end_ts: number;
}

export interface BatchDraft {
  chunkIds: string[];
  startTs: number;
  endTs: number;
  /** Sum of chunk durations; gaps between chunks are not counted */
  durationSeconds: number;
  /** Below minBatchDuration: persist it, but do not analyse it */
  isShort: boolean;
}

export interface BuildOptions {
  /** Unix seconds */
  now?: number;
  openChunks?: readonly Pick<ChunkSpan, 'start_ts'>[];
}

interface Bucket {
  chunks: ChunkSpan[];
  duration: number;
}

/**
 * Build batch drafts from chunks.
 *
 * A bucket closes when the gap to the previous chunk's end exceeds
 * `maxGapSeconds`, or when the next chunk would push it past
 * `targetBatchDuration`. The trailing bucket is held back until it reaches
 * the target, so a batch still being recorded is never submitted early.
 *
 * With `options.now`, a short trailing bucket whose last chunk ended more
 * than `maxGapSeconds` before `now` is sealed and kept, unless one of
 * `options.openChunks` (still recording) starts close enough to join it.
 */
export function buildBatches(
  chunks: readonly ChunkSpan[],
  config: Partial<BatchingConfig> = {},
  options: BuildOptions = {}
): BatchDraft[] {
  const { maxGapSeconds, targetBatchDuration, minBatchDuration } = {
    ...DEFAULT_BATCHING_CONFIG,
    ...config,
  };

  if (chunks.length === 0) return [];

  const ordered = [...chunks].sort((a, b) => a.start_ts - b.start_ts);
  const buckets: Bucket[] = [];
  let current: Bucket = { chunks: [], duration: 0 };

  for (const chunk of ordered) {
    const duration = chunkDuration(chunk);
    const previous = current.chunks.at(-1);

    if (previous) {
      const gap = chunk.start_ts - previous.end_ts;
      if (
        gap > maxGapSeconds ||
        current.duration + duration > targetBatchDuration
      ) {
        buckets.push(current);
        current = { chunks: [], duration: 0 };
      }
    }

    current.chunks.push(chunk);
    current.duration += duration;
  }

  if (
    current.duration >= targetBatchDuration ||
    isSealed(current, maxGapSeconds, options)
  ) {
    buckets.push(current);
  }

  return buckets.map((bucket) => toDraft(bucket, minBatchDuration));
}

function isSealed(
  bucket: Bucket,
  maxGapSeconds: number,
  { now, openChunks = [] }: BuildOptions
): boolean {
  const first = bucket.chunks[0];
  const last = bucket.chunks.at(-1);
  if (now === undefined || !first || !last) return false;
  if (now - last.end_ts <= maxGapSeconds) return false;

  const canStillJoin = openChunks.some(
    (open) =>
      open.start_ts >= first.start_ts &&
      open.start_ts - last.end_ts <= maxGapSeconds
  );
  return !canStillJoin;
}

function chunkDuration(chunk: ChunkSpan): number {
  return Math.max(0, chunk.end_ts - chunk.start_ts);
}

function toDraft(bucket: Bucket, minBatchDuration: number): BatchDraft {
  const first = bucket.chunks[0];
  const last = bucket.chunks[bucket.chunks.length - 1];
  return {
    chunkIds: bucket.chunks.map((c) => c.id),
    startTs: first.start_ts,
    endTs: last.end_ts,
    durationSeconds: bucket.duration,
    isShort: bucket.duration < minBatchDuration,
  };
}
