import { existsSync } from 'node:fs';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { createTestRepositories } from '../../db/index.js';
import {
  type ChunkStore,
  createChunkStore,
  directoryUsage,
} from '../../services/chunk-store.js';

const GB = 1024 ** 3;

describe('ChunkStore', () => {
  let repos: ReturnType<typeof createTestRepositories>;
  let root: string;

  beforeEach(async () => {
    repos = createTestRepositories();
    root = await mkdtemp(join(tmpdir(), 'timeweave-chunks-'));
  });

  afterEach(async () => {
    repos.cleanup();
    await rm(root, { recursive: true, force: true });
  });

  function store(measureUsage = vi.fn(async () => 0)): ChunkStore {
    return createChunkStore({
      chunks: repos.chunks,
      recordingsRoot: root,
      quotaBytes: 5 * GB,
      purgeLimit: 10,
      measureUsage,
    });
  }

  async function recordFile(name: string): Promise<string> {
    const path = join(root, name);
    await writeFile(path, 'video-bytes');
    return path;
  }

  describe('chunk lifecycle', () => {
    it('registers in recording status and completes with the true end time', async () => {
      const chunkStore = store();
      const chunk = chunkStore.registerChunk('/rec/a.mp4', 1000, 1015);

      expect(chunk.status).toBe('recording');
      expect(chunk.end_ts).toBe(1015);

      const completed = chunkStore.markChunkCompleted(chunk.id, 1013);
      expect(completed?.status).toBe('completed');
      expect(completed?.end_ts).toBe(1013);

      await chunkStore.idle();
    });

    it('never lets end precede start', async () => {
      const chunkStore = store();
      const chunk = chunkStore.registerChunk('/rec/a.mp4', 1000, 990);
      expect(chunk.end_ts).toBe(1000);

      expect(chunkStore.markChunkCompleted(chunk.id, 900)?.end_ts).toBe(1000);
      await chunkStore.idle();
    });

    it('deletes the row and the partial file when capture fails', async () => {
      const chunkStore = store();
      const path = await recordFile('partial.mp4');
      const chunk = chunkStore.registerChunk(path, 0, 15);

      await chunkStore.markChunkFailed(chunk.id);

      expect(repos.chunks.findById(chunk.id)).toBeNull();
      expect(existsSync(path)).toBe(false);
      await chunkStore.idle();
    });

    it('still deletes the row when the file is already gone', async () => {
      const chunkStore = store();
      const chunk = chunkStore.registerChunk(join(root, 'missing.mp4'), 0, 15);

      await expect(chunkStore.markChunkFailed(chunk.id)).resolves.toBeUndefined();
      expect(repos.chunks.findById(chunk.id)).toBeNull();
      await chunkStore.idle();
    });

    it('fetches completed, unbatched chunks at or after the cutoff', async () => {
      const chunkStore = store();
      const old = chunkStore.registerChunk('/rec/old.mp4', 100, 115);
      const fresh = chunkStore.registerChunk('/rec/fresh.mp4', 5000, 5015);
      const live = chunkStore.registerChunk('/rec/live.mp4', 5015, 5030);
      const batched = chunkStore.registerChunk('/rec/batched.mp4', 4000, 4015);
      for (const c of [old, fresh, batched]) {
        chunkStore.markChunkCompleted(c.id, c.end_ts);
      }
      repos.batches.createWithChunks([
        {
          id: 'batch-1',
          batch_start_ts: 4000,
          batch_end_ts: 4015,
          chunk_ids: [batched.id],
        },
      ]);

      const result = chunkStore.fetchUnprocessedChunks(1000);

      expect(result.map((c) => c.id)).toEqual([fresh.id]);
      expect(live.status).toBe('recording');
      await chunkStore.idle();
    });
  });

  describe('purgeIfNeeded', () => {
    it('does nothing while usage is within quota', async () => {
      const chunkStore = store(vi.fn(async () => 5 * GB));
      const chunk = chunkStore.registerChunk(await recordFile('a.mp4'), 0, 15);
      await chunkStore.idle();

      const result = await chunkStore.purgeIfNeeded();

      expect(result).toEqual({ usageBytes: 5 * GB, deleted: [] });
      expect(repos.chunks.findById(chunk.id)).not.toBeNull();
    });

    it('evicts at most ten of the oldest chunks and skips batched ones', async () => {
      const measure = vi.fn(async () => 6 * GB);
      const chunkStore = createChunkStore({
        chunks: repos.chunks,
        recordingsRoot: root,
        quotaBytes: 5 * GB,
        purgeLimit: 10,
        measureUsage: measure,
      });

      const ids: string[] = [];
      const paths: string[] = [];
      for (let i = 0; i < 12; i++) {
        const path = await recordFile(`chunk-${i}.mp4`);
        const chunk = repos.chunks.insert({
          id: `chunk-${i.toString().padStart(2, '0')}`,
          start_ts: i * 15,
          end_ts: (i + 1) * 15,
          file_path: path,
          status: 'completed',
        });
        ids.push(chunk.id);
        paths.push(path);
      }
      // The oldest chunk belongs to a batch
      repos.batches.createWithChunks([
        { id: 'b1', batch_start_ts: 0, batch_end_ts: 15, chunk_ids: [ids[0]] },
      ]);

      const result = await chunkStore.purgeIfNeeded();

      expect(result.deleted).toEqual(ids.slice(1, 11));
      expect(repos.chunks.findById(ids[0])).not.toBeNull();
      expect(existsSync(paths[0])).toBe(true);
      expect(repos.chunks.findById(ids[11])).not.toBeNull();
      expect(existsSync(paths[5])).toBe(false);
    });

    it('refuses to delete a batched chunk at the database level', () => {
      const chunk = repos.chunks.insert({
        id: 'held',
        start_ts: 0,
        end_ts: 15,
        file_path: '/rec/held.mp4',
        status: 'completed',
      });
      repos.batches.createWithChunks([
        { id: 'b1', batch_start_ts: 0, batch_end_ts: 15, chunk_ids: [chunk.id] },
      ]);

      expect(repos.chunks.deleteIfUnbatched(chunk.id)).toBe(false);
      expect(() => repos.chunks.delete(chunk.id)).toThrow(/FOREIGN KEY/);
    });

    it('runs in the background after every registration', async () => {
      const measure = vi.fn(async () => 0);
      const chunkStore = store(measure);

      chunkStore.registerChunk('/rec/a.mp4', 0, 15);
      expect(measure).not.toHaveBeenCalled();

      await chunkStore.idle();
      expect(measure).toHaveBeenCalledWith(root);
    });
  });

  describe('directoryUsage', () => {
    it('returns 0 for a missing directory', async () => {
      expect(await directoryUsage(join(root, 'nope'))).toBe(0);
    });

    it('counts allocated bytes of files under the root', async () => {
      await recordFile('top.mp4');
      expect(await directoryUsage(root)).toBeGreaterThan(0);
    });
  });
});
