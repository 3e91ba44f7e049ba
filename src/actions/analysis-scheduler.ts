/**
 * Analysis Scheduler
 *
 * A timer that turns finished chunks into batches and analyses them one at
 * a time. Only one run is ever in flight; reprocessing takes the same slot.
 */

import type {
  AnalysisProvider,
  BatchingConfig,
  Category,
  DbBatchInsert,
  Repositories,
  SchedulerConfig,
  VideoService,
} from '../0_types.js';
import { generateId } from '../db/helpers.js';
import { errorMessage } from '../errors.js';
import { log, withPipeline } from '../pipeline/context.js';
import { buildBatches } from '../services/batch-builder.js';
import type { ChunkStore } from '../services/chunk-store.js';
import type { TimelapseService } from '../services/timelapse.js';
import { type BatchOutcome, analyzeBatch } from './analyze-batch.js';

export interface SchedulerDeps {
  repos: Repositories;
  chunkStore: Pick<ChunkStore, 'fetchUnprocessedChunks' | 'fetchOpenChunks'>;
  provider: AnalysisProvider;
  video: Pick<VideoService, 'stitch' | 'getDuration'>;
  timelapses: TimelapseService;
  categories: Category[];
  tmpDir: string;
  /** Unix seconds; defaults to the wall clock */
  now?: () => number;
  /** Aborted by stop() */
  controller?: AbortController;
}

export interface SchedulerOptions {
  batching: BatchingConfig;
  scheduler: SchedulerConfig;
}

export type RunResult =
  | { skipped: true }
  | { skipped: false; created: number; outcomes: BatchOutcome[] };

export interface AnalysisScheduler {
  start(): void;
  stop(): void;
  runOnce(): Promise<RunResult>;
  processBatch(batchId: string): Promise<BatchOutcome>;
  /**
   * Run `fn` once no timer run is in flight, keeping timer runs out until
   * it settles.
   */
  runExclusive<T>(fn: () => Promise<T>): Promise<T>;
  /** Resolves when the current run and all background work are done */
  idle(): Promise<void>;
  readonly signal: AbortSignal;
}

export function createAnalysisScheduler(
  deps: SchedulerDeps,
  options: SchedulerOptions
): AnalysisScheduler {
  const { repos } = deps;
  const now = deps.now ?? (() => Math.floor(Date.now() / 1000));
  const controller = deps.controller ?? new AbortController();
  const background = new Set<Promise<unknown>>();

  let timer: NodeJS.Timeout | null = null;
  let busy: Promise<unknown> | null = null;

  function track(work: Promise<unknown>): void {
    const settled = work
      .catch((error: unknown) => {
        log('warn', `Background task failed: ${errorMessage(error)}`);
      })
      .finally(() => {
        background.delete(settled);
      });
    background.add(settled);
  }

  function processBatch(batchId: string): Promise<BatchOutcome> {
    return analyzeBatch(
      {
        repos,
        provider: deps.provider,
        video: deps.video,
        timelapses: deps.timelapses,
        categories: deps.categories,
        tmpDir: deps.tmpDir,
        now,
        track,
        signal: controller.signal,
      },
      options,
      batchId
    );
  }

  function createBatches(): DbBatchInsert[] {
    const current = now();
    const since = current - options.scheduler.lookbackSeconds;
    const chunks = deps.chunkStore.fetchUnprocessedChunks(since);
    const drafts = buildBatches(chunks, options.batching, {
      now: current,
      openChunks: deps.chunkStore.fetchOpenChunks(since),
    });
    const inserts = drafts.map((draft) => ({
      id: generateId(),
      batch_start_ts: draft.startTs,
      batch_end_ts: draft.endTs,
      chunk_ids: draft.chunkIds,
    }));
    repos.batches.createWithChunks(inserts);
    return inserts;
  }

  async function run(): Promise<RunResult> {
    const created = createBatches().length;
    // includes batches an earlier run left behind (stopped or crashed)
    const queue = repos.batches.findPending(now() - options.scheduler.lookbackSeconds);
    if (queue.length === 0) {
      return { skipped: false, created, outcomes: [] };
    }

    return withPipeline(`analysis ${queue.length} batches`, 'scheduled', async () => {
      const outcomes: BatchOutcome[] = [];
      for (const batch of queue) {
        if (controller.signal.aborted) break;
        try {
          outcomes.push(await processBatch(batch.id));
        } catch (error) {
          // processBatch settles the batch itself; this is a storage failure
          log('error', `Batch ${batch.id}: ${errorMessage(error)}`);
        }
      }
      return { skipped: false, created, outcomes };
    });
  }

  function runOnce(): Promise<RunResult> {
    if (busy) {
      log('debug', 'Analysis run already in flight, skipping');
      return Promise.resolve({ skipped: true });
    }
    const current = run().catch((error: unknown): RunResult => {
      log('error', `Analysis run failed: ${errorMessage(error)}`);
      return { skipped: false, created: 0, outcomes: [] };
    });
    busy = current.finally(() => {
      busy = null;
    });
    return current;
  }

  async function runExclusive<T>(fn: () => Promise<T>): Promise<T> {
    while (busy) {
      await busy;
    }
    // fn starts on the next microtask, after the slot is taken
    const current = Promise.resolve().then(fn);
    busy = current
      .catch(() => undefined)
      .finally(() => {
        busy = null;
      });
    return current;
  }

  function tick(): void {
    runOnce().catch((error: unknown) => {
      log('error', `Analysis tick failed: ${errorMessage(error)}`);
    });
  }

  return {
    start() {
      if (timer) return;
      tick();
      timer = setInterval(tick, options.scheduler.intervalMs);
    },

    stop() {
      if (timer) {
        clearInterval(timer);
        timer = null;
      }
      controller.abort();
    },

    runOnce,
    processBatch,
    runExclusive,

    async idle() {
      while (busy || background.size > 0) {
        if (busy) await busy;
        await Promise.all([...background]);
      }
    },

    signal: controller.signal,
  };
}
