/**
 * Analysis Batch Repository - SQLite Implementation
 */

import type Database from 'better-sqlite3';
import type {
  BatchRepository,
  BatchStatus,
  DbBatch,
  DbBatchInsert,
} from '../../0_types.js';
import { nowISO, placeholders } from '../helpers.js';

export function createSqliteBatchRepository(
  db: Database.Database
): BatchRepository {
  const stmts = {
    insert: db.prepare<[string, number, number, string, string]>(`
      INSERT INTO analysis_batches (
        id, batch_start_ts, batch_end_ts, status, reason, created_at, updated_at
      )
      VALUES (?, ?, ?, 'pending', NULL, ?, ?)
    `),
    insertJoin: db.prepare<[string, string]>(
      'INSERT INTO batch_chunks (batch_id, chunk_id) VALUES (?, ?)'
    ),
    findById: db.prepare<[string], DbBatch>(
      'SELECT * FROM analysis_batches WHERE id = ?'
    ),
    findInRange: db.prepare<[number, number], DbBatch>(`
      SELECT * FROM analysis_batches
      WHERE batch_start_ts >= ? AND batch_end_ts <= ?
      ORDER BY batch_start_ts ASC
    `),
    findPending: db.prepare<[number], DbBatch>(`
      SELECT * FROM analysis_batches
      WHERE status = 'pending' AND batch_start_ts >= ?
      ORDER BY batch_start_ts ASC
    `),
    findRecent: db.prepare<[number], DbBatch>(`
      SELECT * FROM analysis_batches
      ORDER BY batch_start_ts DESC
      LIMIT ?
    `),
    claim: db.prepare<[string, string]>(`
      UPDATE analysis_batches
      SET status = 'processing', reason = NULL, updated_at = ?
      WHERE id = ? AND status = 'pending'
    `),
    updateStatus: db.prepare<[string, string | null, string, string]>(`
      UPDATE analysis_batches
      SET status = ?, reason = ?, updated_at = ?
      WHERE id = ?
    `),
    countByStatus: db.prepare<[], { status: string; count: number }>(
      'SELECT status, COUNT(*) AS count FROM analysis_batches GROUP BY status'
    ),
  };

  const createWithChunks = db.transaction(
    (batches: DbBatchInsert[]): DbBatch[] => {
      const now = nowISO();
      return batches.map((batch) => {
        stmts.insert.run(
          batch.id,
          batch.batch_start_ts,
          batch.batch_end_ts,
          now,
          now
        );
        for (const chunkId of batch.chunk_ids) {
          stmts.insertJoin.run(batch.id, chunkId);
        }
        return {
          id: batch.id,
          batch_start_ts: batch.batch_start_ts,
          batch_end_ts: batch.batch_end_ts,
          status: 'pending',
          reason: null,
          created_at: now,
          updated_at: now,
        };
      });
    }
  );

  return {
    createWithChunks(batches: DbBatchInsert[]): DbBatch[] {
      if (batches.length === 0) return [];
      return createWithChunks(batches);
    },

    findById(id: string): DbBatch | null {
      return stmts.findById.get(id) ?? null;
    },

    findByIds(ids: string[]): DbBatch[] {
      if (ids.length === 0) return [];
      return db
        .prepare<string[], DbBatch>(
          `SELECT * FROM analysis_batches WHERE id IN (${placeholders(ids.length)})
           ORDER BY batch_start_ts ASC`
        )
        .all(...ids);
    },

    findInRange(startTs: number, endTs: number): DbBatch[] {
      return stmts.findInRange.all(startTs, endTs);
    },

    findPending(sinceTs: number): DbBatch[] {
      return stmts.findPending.all(sinceTs);
    },

    findRecent(limit: number): DbBatch[] {
      return stmts.findRecent.all(limit);
    },

    claim(id: string): boolean {
      return stmts.claim.run(nowISO(), id).changes === 1;
    },

    updateStatus(id: string, status: BatchStatus, reason: string | null): void {
      stmts.updateStatus.run(status, reason, nowISO(), id);
    },

    resetToPending(ids: string[]): number {
      if (ids.length === 0) return 0;
      return db
        .prepare<[string, ...string[]]>(
          `UPDATE analysis_batches
           SET status = 'pending', reason = NULL, updated_at = ?
           WHERE id IN (${placeholders(ids.length)})`
        )
        .run(nowISO(), ...ids).changes;
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
