import { existsSync } from 'node:fs';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { AnalysisProvider, DbTimelineCardInsert } from '../../0_types.js';
import { createAnalysisScheduler } from '../../actions/analysis-scheduler.js';
import {
  type ReprocessProgress,
  createReprocessor,
  summarize,
} from '../../actions/reprocess.js';
import { generateId } from '../../db/helpers.js';
import { createTestRepositories } from '../../db/index.js';

const T0 = Math.floor(new Date(2026, 2, 10, 10, 0).getTime() / 1000);
const NOW = T0 + 7200;
const DAY = '2026-03-10';

const options = {
  batching: { maxGapSeconds: 120, targetBatchDuration: 900, minBatchDuration: 300 },
  scheduler: { intervalMs: 60_000, lookbackSeconds: 86_400, windowSeconds: 3600 },
};

/** Time stands still; sleeping advances it */
function fakeClock() {
  let t = 0;
  return {
    now: () => t,
    sleep: vi.fn(async (ms: number) => {
      t += ms;
    }),
  };
}

describe('Reprocessor', () => {
  let repos: ReturnType<typeof createTestRepositories>;
  let dir: string;
  let batchIds: string[];
  let timelapseFile: string;
  const seenAtFirstCall: { cards: number; observations: number }[] = [];

  const transcribe = vi.fn<AnalysisProvider['transcribe']>();
  const synthesizeCards = vi.fn<AnalysisProvider['synthesizeCards']>();

  beforeEach(async () => {
    repos = createTestRepositories();
    dir = await mkdtemp(join(tmpdir(), 'timeweave-reprocess-'));
    seenAtFirstCall.length = 0;

    transcribe.mockReset();
    transcribe.mockImplementation(async () => {
      if (seenAtFirstCall.length === 0) {
        seenAtFirstCall.push({
          cards: repos.cards.findByDay(DAY).length,
          observations: batchIds.reduce(
            (sum, id) => sum + repos.observations.findByBatch(id).length,
            0
          ),
        });
      }
      return {
        observations: [{ start: '00:00', end: '15:00', description: 'Reviewing code' }],
        auditLog: [],
      };
    });
    synthesizeCards.mockReset();
    synthesizeCards.mockImplementation(async (observations, context) => ({
      cards: [
        ...context.existingCards,
        ...observations.map((o) => ({
          start: o.start,
          end: o.end,
          title: 'Code review',
          summary: '',
          detailedSummary: '',
          category: 'Work',
          subcategory: '',
        })),
      ],
      auditLog: [],
    }));

    timelapseFile = join(dir, 'old-timelapse.mp4');
    await writeFile(timelapseFile, 'mp4');
    batchIds = seedAnalysedDay();
  });

  afterEach(async () => {
    repos.cleanup();
    await rm(dir, { recursive: true, force: true });
  });

  /**
   * Three completed 15 minute batches from T0, four cards and two
   * observations each.
   */
  function seedAnalysedDay(): string[] {
    const ids: string[] = [];
    for (let b = 0; b < 3; b++) {
      const start = T0 + b * 900;
      const chunkIds = [0, 1, 2].map((i) => {
        const id = generateId();
        repos.chunks.insert({
          id,
          start_ts: start + i * 300,
          end_ts: start + (i + 1) * 300,
          file_path: `/rec/${start + i * 300}.mp4`,
          status: 'completed',
        });
        return id;
      });
      const batchId = generateId();
      repos.batches.createWithChunks([
        { id: batchId, batch_start_ts: start, batch_end_ts: start + 900, chunk_ids: chunkIds },
      ]);
      repos.batches.updateStatus(batchId, 'completed', null);

      repos.observations.saveBatch(
        [0, 1].map((i) => ({
          id: generateId(),
          batch_id: batchId,
          start_ts: start + i * 450,
          end_ts: start + (i + 1) * 450,
          observation: `Observation ${b}.${i}`,
          llm_model: 'gemini-2.5-flash',
        }))
      );

      const cards: DbTimelineCardInsert[] = [0, 1, 2, 3].map((i) => ({
        id: generateId(),
        batch_id: batchId,
        start_ts: start + i * 225,
        end_ts: start + (i + 1) * 225,
        day: DAY,
        title: `Old card ${b}.${i}`,
        summary: '',
        detailed_summary: '',
        category: 'Work',
        subcategory: '',
        metadata: null,
      }));
      repos.cards.replaceInRange(0, 0, cards);
      if (b === 0) repos.cards.updateVideoSummaryPath(cards[0].id, timelapseFile);
      ids.push(batchId);
    }
    return ids;
  }

  function setup() {
    const scheduler = createAnalysisScheduler(
      {
        repos,
        chunkStore: {
          fetchUnprocessedChunks: (since) => repos.chunks.findUnbatchedCompleted(since),
          fetchOpenChunks: (since) => repos.chunks.findRecording(since),
        },
        provider: { name: 'gemini', model: 'gemini-2.5-flash', transcribe, synthesizeCards },
        video: {
          stitch: async (_inputs, output) => output,
          getDuration: async () => 900,
        },
        timelapses: {
          timelapsePath: (card) => join(dir, `${card.id}.mp4`),
          generateForCard: async () => null,
        },
        categories: [{ name: 'Work', description: '', isIdle: false }],
        tmpDir: join(dir, 'tmp'),
        now: () => NOW,
      },
      options
    );
    const reprocessor = createReprocessor({
      repos,
      scheduler,
      config: { pollIntervalMs: 2000, maxWaitPerBatchMs: 30 * 60 * 1000 },
      clock: fakeClock(),
    });
    return { scheduler, reprocessor };
  }

  it('clears the day before the first provider call and rebuilds it', async () => {
    const { scheduler, reprocessor } = setup();
    const phases: ReprocessProgress['phase'][] = [];
    const messages: string[] = [];

    const summary = await reprocessor.reprocessDay(DAY, (p) => {
      phases.push(p.phase);
      messages.push(p.message);
    });
    await scheduler.idle();

    expect(seenAtFirstCall).toEqual([{ cards: 0, observations: 0 }]);
    expect(messages[0]).toBe('Removed 12 cards, reset 3 batches');
    expect(phases).toEqual([
      'cleanup',
      'processing',
      'batch_done',
      'processing',
      'batch_done',
      'processing',
      'batch_done',
      'done',
    ]);
    expect(existsSync(timelapseFile)).toBe(false);

    expect(summary).toMatchObject({ total: 3, succeeded: 3, failed: 0, skipped: 0 });
    expect(summary.text.split('\n')).toEqual([
      `Reprocessed ${DAY}: 3 batches in 0.0s`,
      '  3 succeeded, 0 failed, 0 skipped',
      `  ✅ [1/3] ${batchIds[0]} completed (0.0s)`,
      `  ✅ [2/3] ${batchIds[1]} completed (0.0s)`,
      `  ✅ [3/3] ${batchIds[2]} completed (0.0s)`,
    ]);

    expect(repos.cards.findByDay(DAY).map((c) => [c.start_ts, c.end_ts])).toEqual([
      [T0, T0 + 900],
      [T0 + 900, T0 + 1800],
      [T0 + 1800, T0 + 2700],
    ]);
    expect(batchIds.map((id) => repos.observations.findByBatch(id).length)).toEqual([1, 1, 1]);
  });

  it('reprocesses chosen batches and leaves the others alone', async () => {
    const { reprocessor } = setup();

    const summary = await reprocessor.reprocessSpecificBatches([batchIds[1]]);

    expect(summary.results.map((r) => [r.batchId, r.status])).toEqual([[batchIds[1], 'completed']]);
    expect(transcribe).toHaveBeenCalledTimes(1);
    expect(repos.observations.findByBatch(batchIds[0])).toHaveLength(2);
    expect(repos.observations.findByBatch(batchIds[1])).toHaveLength(1);
    expect(repos.batches.findById(batchIds[2])?.status).toBe('completed');
    expect(repos.cards.findByDay(DAY).map((c) => c.batch_id)).toEqual([batchIds[1]]);
  });

  it('rejects unknown batch ids before touching anything', async () => {
    const { reprocessor } = setup();

    await expect(reprocessor.reprocessSpecificBatches([batchIds[0], 'nope'])).rejects.toThrow(
      'Unknown batch ids: nope'
    );
    expect(repos.cards.findByDay(DAY)).toHaveLength(12);
  });

  it('rejects a malformed day', async () => {
    const { reprocessor } = setup();

    await expect(reprocessor.reprocessDay('2026-13-01')).rejects.toThrow(
      'Invalid day "2026-13-01". Expected YYYY-MM-DD.'
    );
  });

  it('gives up on a batch that never settles', async () => {
    const clock = fakeClock();
    const reprocessor = createReprocessor({
      repos,
      scheduler: {
        // claims the batch and leaves it processing
        processBatch: async (batchId) => {
          repos.batches.claim(batchId);
          return { batchId, status: 'not_claimed', reason: null, cards: 0 };
        },
        runExclusive: (fn) => fn(),
      },
      config: { pollIntervalMs: 2000, maxWaitPerBatchMs: 6000 },
      clock,
    });

    const summary = await reprocessor.reprocessSpecificBatches([batchIds[0]]);

    expect(summary.results).toEqual([
      {
        batchId: batchIds[0],
        status: 'timeout',
        elapsedMs: 6000,
        reason: 'Still processing after 6000ms',
      },
    ]);
    expect(summary.failed).toBe(1);
    expect(clock.sleep).toHaveBeenCalledTimes(3);
  });
});

describe('summarize', () => {
  it('counts outcomes and lists each batch', () => {
    const summary = summarize(
      'test',
      [
        { batchId: 'a', status: 'completed', elapsedMs: 1000, reason: null },
        {
          batchId: 'b',
          status: 'skipped_short',
          elapsedMs: 500,
          reason: 'Batch duration 120s is below the analysis minimum',
        },
        { batchId: 'c', status: 'failed', elapsedMs: 3000, reason: 'boom' },
      ],
      4500
    );

    expect(summary).toMatchObject({ total: 3, succeeded: 1, failed: 1, skipped: 1 });
    expect(summary.text).toBe(
      [
        'Reprocessed test: 3 batches in 4.5s',
        '  1 succeeded, 1 failed, 1 skipped',
        '  ✅ [1/3] a completed (1.0s)',
        '  ⏭️ [2/3] b skipped_short (0.5s): Batch duration 120s is below the analysis minimum',
        '  ❌ [3/3] c failed (3.0s): boom',
      ].join('\n')
    );
  });
});
