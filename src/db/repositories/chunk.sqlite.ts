/**
 * Chunk Repository - SQLite Implementation
 */

import type Database from 'better-sqlite3';
import type { ChunkRepository, DbChunk, DbChunkInsert } from '../../0_types.js';
import { nowISO } from '../helpers.js';

const NOT_IN_BATCH =
  'NOT EXISTS (SELECT 1 FROM batch_chunks bc WHERE bc.chunk_id = c.id)';

export function createSqliteChunkRepository(
  db: Database.Database
): ChunkRepository {
  const stmts = {
    insert: db.prepare<[string, number, number, string, string, string]>(`
      INSERT INTO chunks (id, start_ts, end_ts, file_path, status, created_at)
      VALUES (?, ?, ?, ?, ?, ?)
    `),
    findById: db.prepare<[string], DbChunk>(
      'SELECT * FROM chunks WHERE id = ?'
    ),
    complete: db.prepare<[number, string]>(`
      UPDATE chunks
      SET end_ts = MAX(start_ts, ?), status = 'completed'
      WHERE id = ?
    `),
    delete: db.prepare<[string]>('DELETE FROM chunks WHERE id = ?'),
    findUnbatchedCompleted: db.prepare<[number], DbChunk>(`
      SELECT c.* FROM chunks c
      WHERE c.status = 'completed' AND c.start_ts >= ? AND ${NOT_IN_BATCH}
      ORDER BY c.start_ts ASC
    `),
    findRecording: db.prepare<[number], DbChunk>(`
      SELECT * FROM chunks
      WHERE status = 'recording' AND start_ts >= ?
      ORDER BY start_ts ASC
    `),
    findEvictionCandidates: db.prepare<[number], DbChunk>(`
      SELECT c.* FROM chunks c
      WHERE c.status IN ('completed', 'recording') AND ${NOT_IN_BATCH}
      ORDER BY c.start_ts ASC
      LIMIT ?
    `),
    isInBatch: db.prepare<[string], { found: number }>(
      'SELECT 1 AS found FROM batch_chunks WHERE chunk_id = ? LIMIT 1'
    ),
    findByBatch: db.prepare<[string], DbChunk>(`
      SELECT c.* FROM chunks c
      JOIN batch_chunks bc ON bc.chunk_id = c.id
      WHERE bc.batch_id = ?
      ORDER BY c.start_ts ASC
    `),
    findOverlapping: db.prepare<[number, number], DbChunk>(`
      SELECT * FROM chunks
      WHERE status = 'completed' AND start_ts < ? AND end_ts > ?
      ORDER BY start_ts ASC
    `),
    countByStatus: db.prepare<[], { status: string; count: number }>(
      'SELECT status, COUNT(*) AS count FROM chunks GROUP BY status'
    ),
  };

  const deleteIfUnbatched = db.transaction((id: string): boolean => {
    if (stmts.isInBatch.get(id)) return false;
    return stmts.delete.run(id).changes > 0;
  });

  return {
    insert(chunk: DbChunkInsert): DbChunk {
      const createdAt = nowISO();
      stmts.insert.run(
        chunk.id,
        chunk.start_ts,
        chunk.end_ts,
        chunk.file_path,
        chunk.status,
        createdAt
      );
      return { ...chunk, is_uploaded: 0, created_at: createdAt };
    },

    findById(id: string): DbChunk | null {
      return stmts.findById.get(id) ?? null;
    },

    complete(id: string, endTs: number): DbChunk | null {
      stmts.complete.run(endTs, id);
      return stmts.findById.get(id) ?? null;
    },

    delete(id: string): boolean {
      return stmts.delete.run(id).changes > 0;
    },

    findUnbatchedCompleted(sinceTs: number): DbChunk[] {
      return stmts.findUnbatchedCompleted.all(sinceTs);
    },

    findRecording(sinceTs: number): DbChunk[] {
      return stmts.findRecording.all(sinceTs);
    },

    findEvictionCandidates(limit: number): DbChunk[] {
      return stmts.findEvictionCandidates.all(limit);
    },

    deleteIfUnbatched(id: string): boolean {
      return deleteIfUnbatched(id);
    },

    findByBatch(batchId: string): DbChunk[] {
      return stmts.findByBatch.all(batchId);
    },

    findOverlapping(startTs: number, endTs: number): DbChunk[] {
      return stmts.findOverlapping.all(endTs, startTs);
    },

    countByStatus(): Record<string, number> {
      const counts: Record<string, number> = {};
      for (const row of stmts.countByStatus.all()) {
        counts[row.status] = row.count;
      }
      return counts;
    },
  };
}
