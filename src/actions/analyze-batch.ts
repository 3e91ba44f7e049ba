/**
 * Analyze Batch Action
 *
 * Takes one pending batch through stitching, transcription and card
 * synthesis. The batch ends in a terminal status, or back in pending when
 * the run is stopped, and every provider call made for it is in the audit
 * table.
 */

import { mkdir, rm } from 'node:fs/promises';
import path from 'node:path';
import type {
  AnalysisProvider,
  BatchingConfig,
  BatchStatus,
  Category,
  DbObservationInsert,
  DbTimelineCard,
  LlmCallRecord,
  Repositories,
  SchedulerConfig,
  SynthesisContext,
  VideoService,
} from '../0_types.js';
import { generateId } from '../db/helpers.js';
import {
  type Batch,
  completeBatch,
  failBatch,
  failEmpty,
  fromRow,
  releaseBatch,
  skipShort,
  startProcessing,
} from '../domain/batch.js';
import { toCardInsert, toRelativeCard } from '../domain/timeline-card.js';
import { toAbsolute, toRelative } from '../domain/video-time.js';
import { ProviderError, errorMessage } from '../errors.js';
import { log, step } from '../pipeline/context.js';
import { removeFile } from '../services/chunk-store.js';
import type { TimelapseService } from '../services/timelapse.js';

export type BatchOutcomeStatus = BatchStatus | 'not_claimed' | 'not_found';

export interface BatchOutcome {
  batchId: string;
  status: BatchOutcomeStatus;
  reason: string | null;
  cards: number;
}

export interface AnalyzeBatchDeps {
  repos: Repositories;
  provider: AnalysisProvider;
  video: Pick<VideoService, 'stitch' | 'getDuration'>;
  timelapses: TimelapseService;
  categories: Category[];
  tmpDir: string;
  /** Unix seconds */
  now: () => number;
  /** Receives fire-and-forget work so callers can await it */
  track: (work: Promise<unknown>) => void;
  /** Once aborted, an interrupted batch goes back to pending instead of failing */
  signal?: AbortSignal;
}

export interface AnalyzeBatchConfig {
  batching: Pick<BatchingConfig, 'minBatchDuration'>;
  scheduler: Pick<SchedulerConfig, 'windowSeconds'>;
}

export async function analyzeBatch(
  deps: AnalyzeBatchDeps,
  config: AnalyzeBatchConfig,
  batchId: string
): Promise<BatchOutcome> {
  const { repos } = deps;

  const row = repos.batches.findById(batchId);
  if (!row) {
    return { batchId, status: 'not_found', reason: null, cards: 0 };
  }
  if (row.status !== 'pending') {
    return { batchId, status: 'not_claimed', reason: row.status, cards: 0 };
  }

  const chunks = repos.chunks.findByBatch(batchId);
  if (chunks.length === 0) {
    return persist(deps, failEmpty(fromRow(row)), 0);
  }

  const duration = chunks.reduce(
    (sum, c) => sum + Math.max(0, c.end_ts - c.start_ts),
    0
  );
  if (duration < config.batching.minBatchDuration) {
    return persist(deps, skipShort(fromRow(row), duration), 0);
  }

  if (!repos.batches.claim(batchId)) {
    return { batchId, status: 'not_claimed', reason: null, cards: 0 };
  }
  const batch = startProcessing(fromRow(row));

  const stitched = path.join(deps.tmpDir, `batch-${batchId}.mp4`);
  try {
    await mkdir(deps.tmpDir, { recursive: true });
    await step('stitch chunks', () =>
      deps.video.stitch(
        chunks.map((c) => c.file_path),
        stitched
      )
    );
    const videoSeconds = (await deps.video.getDuration(stitched)) || duration;

    const transcription = await step('transcribe', () =>
      deps.provider.transcribe({
        batchId,
        path: stitched,
        mimeType: 'video/mp4',
        durationSeconds: videoSeconds,
      })
    );
    saveAudit(deps, transcription.auditLog);

    if (transcription.observations.length === 0) {
      log('info', `Batch ${batchId}: no observations`);
      return persist(deps, completeBatch(batch), 0);
    }

    const observations: DbObservationInsert[] = transcription.observations.map(
      (o) => {
        const start = toAbsolute(o.start, batch.startTs);
        return {
          id: generateId(),
          batch_id: batchId,
          start_ts: start,
          end_ts: Math.max(start, toAbsolute(o.end, batch.startTs)),
          observation: o.description,
          llm_model: deps.provider.model,
        };
      }
    );
    repos.observations.saveBatch(observations);

    const now = deps.now();
    const windowStart = batch.endTs - config.scheduler.windowSeconds;
    const context: SynthesisContext = {
      batchId,
      batchDurationSeconds: videoSeconds,
      windowObservations: repos.observations
        .findInRange(windowStart, batch.endTs)
        .map((o) => ({
          start: toRelative(o.start_ts, batch.startTs),
          end: toRelative(o.end_ts, batch.startTs),
          description: o.observation,
        })),
      existingCards: repos.cards
        .findInRange(windowStart, batch.endTs)
        .map((c) => toRelativeCard(c, batch.startTs)),
      categories: deps.categories,
      currentOffset: toRelative(now, batch.startTs),
    };

    const synthesis = await step('synthesize cards', () =>
      deps.provider.synthesizeCards(transcription.observations, context)
    );
    saveAudit(deps, synthesis.auditLog);

    const upper = Math.min(batch.endTs, now);
    const cards = synthesis.cards.flatMap((card) => {
      const insert = toCardInsert(card, {
        batchId,
        batchStartTs: batch.startTs,
        bounds: [windowStart, upper],
      });
      return insert ? [insert] : [];
    });

    const completed = completeBatch(batch);
    const { removed, inserted } = repos.transaction(() => {
      const result = repos.cards.replaceInRange(windowStart, batch.endTs, cards);
      repos.batches.updateStatus(completed.id, completed.status, completed.reason);
      return result;
    });

    await removeTimelapses(removed);
    deps.track(renderTimelapses(deps, inserted));

    log('info', `Batch ${batchId}: ${observations.length} observations, ${inserted.length} cards`);
    return { batchId, status: 'completed', reason: null, cards: inserted.length };
  } catch (error) {
    if (error instanceof ProviderError) {
      saveAudit(deps, error.calls);
    }
    if (deps.signal?.aborted) {
      log('warn', `Batch ${batchId} interrupted, back to pending`);
      persist(deps, releaseBatch(batch), 0);
      return { batchId, status: 'pending', reason: 'Analysis stopped', cards: 0 };
    }
    const message = errorMessage(error);
    log('error', `Batch ${batchId} failed: ${message}`);
    return persist(deps, failBatch(batch, message), 0);
  } finally {
    await rm(stitched, { force: true });
  }
}

function persist(
  deps: Pick<AnalyzeBatchDeps, 'repos'>,
  batch: Batch,
  cards: number
): BatchOutcome {
  deps.repos.batches.updateStatus(batch.id, batch.status, batch.reason);
  return { batchId: batch.id, status: batch.status, reason: batch.reason, cards };
}

function saveAudit(deps: Pick<AnalyzeBatchDeps, 'repos'>, calls: LlmCallRecord[]): void {
  try {
    deps.repos.llmRequests.saveMany(calls);
  } catch (error) {
    log('warn', `Could not save ${calls.length} audit rows: ${errorMessage(error)}`);
  }
}

export async function removeTimelapses(cards: DbTimelineCard[]): Promise<void> {
  for (const card of cards) {
    if (card.video_summary_path) {
      await removeFile(card.video_summary_path);
    }
  }
}

async function renderTimelapses(
  deps: Pick<AnalyzeBatchDeps, 'timelapses'>,
  cards: DbTimelineCard[]
): Promise<void> {
  for (const card of cards) {
    await deps.timelapses.generateForCard(card);
  }
}
