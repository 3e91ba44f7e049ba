/**
 * Reprocess Action
 *
 * Throws away the analysis of a logical day (or of chosen batches) and
 * runs the batches through the analyser again, one at a time.
 */

import { setTimeout as sleep } from 'node:timers/promises';
import type {
  BatchStatus,
  DbBatch,
  DbTimelineCard,
  ReprocessConfig,
  Repositories,
} from '../0_types.js';
import { isTerminal } from '../domain/batch.js';
import { logicalDayFor, logicalDayRange } from '../domain/logical-day.js';
import { TimeweaveError } from '../errors.js';
import { log, withPipeline } from '../pipeline/context.js';
import { type BatchOutcome, removeTimelapses } from './analyze-batch.js';
import type { AnalysisScheduler } from './analysis-scheduler.js';

export type ReprocessPhase = 'cleanup' | 'processing' | 'batch_done' | 'done';

export interface ReprocessProgress {
  phase: ReprocessPhase;
  /** 1-based; 0 outside the per-batch phases */
  batchIndex: number;
  total: number;
  batchId: string | null;
  status: BatchStatus | 'timeout' | null;
  elapsedMs: number;
  message: string;
}

export interface ReprocessBatchResult {
  batchId: string;
  status: BatchStatus | 'timeout';
  elapsedMs: number;
  reason: string | null;
}

export interface ReprocessSummary {
  total: number;
  succeeded: number;
  failed: number;
  skipped: number;
  results: ReprocessBatchResult[];
  totalElapsedMs: number;
  text: string;
}

export type ProgressCallback = (progress: ReprocessProgress) => void;

export interface ReprocessDeps {
  repos: Repositories;
  scheduler: Pick<AnalysisScheduler, 'processBatch' | 'runExclusive'>;
  config: ReprocessConfig;
  /** Milliseconds; injectable for tests */
  clock?: { now(): number; sleep(ms: number): Promise<void> };
}

export interface Reprocessor {
  reprocessDay(day: string, onProgress?: ProgressCallback): Promise<ReprocessSummary>;
  reprocessSpecificBatches(
    batchIds: string[],
    onProgress?: ProgressCallback
  ): Promise<ReprocessSummary>;
}

const systemClock = {
  now: () => Date.now(),
  sleep: async (ms: number) => {
    await sleep(ms);
  },
};

export function createReprocessor(deps: ReprocessDeps): Reprocessor {
  const { repos, scheduler, config } = deps;
  const clock = deps.clock ?? systemClock;

  /**
   * Delete cards and observations and reset the batches, in one transaction.
   */
  async function cleanup(days: string[], batches: DbBatch[]): Promise<DbTimelineCard[]> {
    const ids = batches.map((b) => b.id);
    const removed = repos.transaction(() => {
      const cards = [...repos.cards.deleteByDays(days), ...repos.cards.deleteByBatchIds(ids)];
      repos.observations.deleteByBatchIds(ids);
      repos.batches.resetToPending(ids);
      return cards;
    });
    await removeTimelapses(removed);
    return removed;
  }

  async function waitForTerminal(
    batchId: string,
    outcome: BatchOutcome
  ): Promise<{ status: BatchStatus | 'timeout'; reason: string | null }> {
    const started = clock.now();
    for (;;) {
      const row = repos.batches.findById(batchId);
      if (!row) return { status: 'failed', reason: outcome.reason ?? 'Batch disappeared' };
      if (isTerminal(row.status)) return { status: row.status, reason: row.reason };
      if (clock.now() - started >= config.maxWaitPerBatchMs) {
        return { status: 'timeout', reason: `Still ${row.status} after ${config.maxWaitPerBatchMs}ms` };
      }
      await clock.sleep(config.pollIntervalMs);
    }
  }

  async function run(
    label: string,
    days: string[],
    batches: DbBatch[],
    onProgress: ProgressCallback
  ): Promise<ReprocessSummary> {
    const runStarted = clock.now();
    const total = batches.length;
    const elapsed = () => clock.now() - runStarted;

    const removed = await cleanup(days, batches);
    onProgress({
      phase: 'cleanup',
      batchIndex: 0,
      total,
      batchId: null,
      status: null,
      elapsedMs: elapsed(),
      message: `Removed ${removed.length} cards, reset ${total} batches`,
    });

    const results: ReprocessBatchResult[] = [];
    for (const [index, batch] of batches.entries()) {
      const batchStarted = clock.now();
      onProgress({
        phase: 'processing',
        batchIndex: index + 1,
        total,
        batchId: batch.id,
        status: 'processing',
        elapsedMs: elapsed(),
        message: `Processing batch ${index + 1}/${total}`,
      });

      const outcome = await scheduler.processBatch(batch.id);
      const { status, reason } = await waitForTerminal(batch.id, outcome);
      const result = { batchId: batch.id, status, elapsedMs: clock.now() - batchStarted, reason };
      results.push(result);

      onProgress({
        phase: 'batch_done',
        batchIndex: index + 1,
        total,
        batchId: batch.id,
        status,
        elapsedMs: elapsed(),
        message: describeResult(index + 1, total, result),
      });
    }

    const summary = summarize(label, results, elapsed());
    onProgress({
      phase: 'done',
      batchIndex: 0,
      total,
      batchId: null,
      status: null,
      elapsedMs: summary.totalElapsedMs,
      message: summary.text,
    });
    return summary;
  }

  return {
    async reprocessDay(day, onProgress = () => {}) {
      const { startTs, endTs } = logicalDayRange(day);
      return scheduler.runExclusive(() =>
        withPipeline(`reprocess ${day}`, 'reprocess', () => {
          const batches = repos.batches.findInRange(startTs, endTs);
          log('info', `Reprocessing ${batches.length} batches of ${day}`);
          return run(day, [day], batches, onProgress);
        })
      );
    },

    async reprocessSpecificBatches(batchIds, onProgress = () => {}) {
      const unique = [...new Set(batchIds)];
      return scheduler.runExclusive(() =>
        withPipeline(`reprocess ${unique.length} batches`, 'reprocess', () => {
          const batches = repos.batches.findByIds(unique);
          const found = new Set(batches.map((b) => b.id));
          const missing = unique.filter((id) => !found.has(id));
          if (missing.length > 0) {
            throw new TimeweaveError(`Unknown batch ids: ${missing.join(', ')}`);
          }
          const days = [...new Set(batches.map((b) => logicalDayFor(b.batch_start_ts)))];
          return run(`${unique.length} batches`, days, batches, onProgress);
        })
      );
    },
  };
}

function isSuccess(status: ReprocessBatchResult['status']): boolean {
  return status === 'completed';
}

function isSkip(status: ReprocessBatchResult['status']): boolean {
  return status === 'skipped_short';
}

function describeResult(index: number, total: number, result: ReprocessBatchResult): string {
  const icon = isSuccess(result.status) ? '✅' : isSkip(result.status) ? '⏭️' : '❌';
  const seconds = (result.elapsedMs / 1000).toFixed(1);
  const reason = result.reason && !isSuccess(result.status) ? `: ${result.reason}` : '';
  return `${icon} [${index}/${total}] ${result.batchId} ${result.status} (${seconds}s)${reason}`;
}

export function summarize(
  label: string,
  results: ReprocessBatchResult[],
  totalElapsedMs: number
): ReprocessSummary {
  const succeeded = results.filter((r) => isSuccess(r.status)).length;
  const skipped = results.filter((r) => isSkip(r.status)).length;
  const failed = results.length - succeeded - skipped;

  const lines = [
    `Reprocessed ${label}: ${results.length} batches in ${(totalElapsedMs / 1000).toFixed(1)}s`,
    `  ${succeeded} succeeded, ${failed} failed, ${skipped} skipped`,
    ...results.map((r, i) => `  ${describeResult(i + 1, results.length, r)}`),
  ];

  return {
    total: results.length,
    succeeded,
    failed,
    skipped,
    results,
    totalElapsedMs,
    text: lines.join('\n'),
  };
}
