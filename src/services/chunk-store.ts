/**
 * Chunk Store
 *
 * Lifecycle of recorded chunks plus the storage quota. Eviction never
 * touches a chunk that belongs to a batch.
 */

import { readdir, rm, stat } from 'node:fs/promises';
import { join } from 'node:path';
import type { ChunkRepository, DbChunk } from '../0_types.js';
import { generateId } from '../db/helpers.js';
import { errorMessage } from '../errors.js';
import { log } from '../pipeline/context.js';

export interface PurgeResult {
  usageBytes: number;
  deleted: string[];
}

export interface ChunkStore {
  registerChunk(filePath: string, startTs: number, estimatedEndTs: number): DbChunk;
  markChunkCompleted(id: string, endTs: number): DbChunk | null;
  markChunkFailed(id: string): Promise<void>;
  fetchUnprocessedChunks(olderThan: number): DbChunk[];
  /** Chunks still recording; their final end is not known yet */
  fetchOpenChunks(olderThan: number): DbChunk[];
  purgeIfNeeded(): Promise<PurgeResult>;
  /** Resolves once any background purge has finished */
  idle(): Promise<void>;
}

export interface ChunkStoreOptions {
  chunks: ChunkRepository;
  recordingsRoot: string;
  quotaBytes: number;
  purgeLimit: number;
  /** Bytes allocated under the recordings root */
  measureUsage?: (root: string) => Promise<number>;
}

export function createChunkStore(options: ChunkStoreOptions): ChunkStore {
  const { chunks, recordingsRoot, quotaBytes, purgeLimit } = options;
  const measureUsage = options.measureUsage ?? directoryUsage;

  let running: Promise<PurgeResult> | null = null;

  async function purge(): Promise<PurgeResult> {
    const usageBytes = await measureUsage(recordingsRoot);
    if (usageBytes <= quotaBytes) {
      return { usageBytes, deleted: [] };
    }

    log(
      'info',
      `[storage] Usage ${formatBytes(usageBytes)} exceeds quota ${formatBytes(quotaBytes)}, evicting up to ${purgeLimit} chunks`
    );

    const deleted: string[] = [];
    for (const chunk of chunks.findEvictionCandidates(purgeLimit)) {
      // Membership is re-checked inside the delete transaction: a batch may
      // have claimed the chunk since the candidate query ran.
      if (!chunks.deleteIfUnbatched(chunk.id)) continue;
      deleted.push(chunk.id);
      await removeFile(chunk.file_path);
    }

    log('info', `[storage] Evicted ${deleted.length} chunks`);
    return { usageBytes, deleted };
  }

  function purgeIfNeeded(): Promise<PurgeResult> {
    if (!running) {
      running = purge().finally(() => {
        running = null;
      });
    }
    return running;
  }

  return {
    registerChunk(filePath, startTs, estimatedEndTs) {
      const chunk = chunks.insert({
        id: generateId(),
        start_ts: startTs,
        end_ts: Math.max(startTs, estimatedEndTs),
        file_path: filePath,
        status: 'recording',
      });

      // Background path: registration never waits on eviction
      setImmediate(() => {
        purgeIfNeeded().catch((error: unknown) => {
          log('warn', `[storage] Purge failed: ${errorMessage(error)}`);
        });
      });

      return chunk;
    },

    markChunkCompleted(id, endTs) {
      return chunks.complete(id, endTs);
    },

    async markChunkFailed(id) {
      const chunk = chunks.findById(id);
      if (!chunk) return;
      chunks.delete(id);
      await removeFile(chunk.file_path);
    },

    fetchUnprocessedChunks(olderThan) {
      return chunks.findUnbatchedCompleted(olderThan);
    },

    fetchOpenChunks(olderThan) {
      return chunks.findRecording(olderThan);
    },

    purgeIfNeeded,

    async idle() {
      // let a just-scheduled setImmediate purge start first
      await new Promise<void>((resolve) => setImmediate(resolve));
      if (running) await running.then(() => undefined, () => undefined);
    },
  };
}

/**
 * Best-effort file removal; the database row is the source of truth.
 */
export async function removeFile(path: string): Promise<boolean> {
  try {
    await rm(path);
    return true;
  } catch (error) {
    log('warn', `[storage] Could not remove ${path}: ${errorMessage(error)}`);
    return false;
  }
}

/**
 * Allocated bytes of all files below `root` (0 if it does not exist).
 */
export async function directoryUsage(root: string): Promise<number> {
  let entries: string[];
  try {
    entries = await readdir(root, { recursive: true });
  } catch (error) {
    if (isNotFound(error)) return 0;
    throw error;
  }

  let total = 0;
  for (const entry of entries) {
    const info = await stat(join(root, entry)).catch(() => null);
    // null: removed while walking
    if (!info?.isFile()) continue;
    total += info.blocks > 0 ? info.blocks * 512 : info.size;
  }
  return total;
}

function isNotFound(error: unknown): boolean {
  return (
    error instanceof Error && 'code' in error && error.code === 'ENOENT'
  );
}

function formatBytes(bytes: number): string {
  return `${(bytes / 1024 ** 3).toFixed(2)} GB`;
}
