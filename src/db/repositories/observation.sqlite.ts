/**
 * Observation Repository - SQLite Implementation
 */

import type Database from 'better-sqlite3';
import type {
  DbObservation,
  DbObservationInsert,
  ObservationRepository,
} from '../../0_types.js';
import { nowISO, placeholders } from '../helpers.js';

export function createSqliteObservationRepository(
  db: Database.Database
): ObservationRepository {
  const stmts = {
    insert: db.prepare<
      [string, string, number, number, string, string | null, string]
    >(`
      INSERT INTO observations (
        id, batch_id, start_ts, end_ts, observation, llm_model, created_at
      )
      VALUES (?, ?, ?, ?, ?, ?, ?)
    `),
    findByBatch: db.prepare<[string], DbObservation>(
      'SELECT * FROM observations WHERE batch_id = ? ORDER BY start_ts ASC'
    ),
    findInRange: db.prepare<[number, number], DbObservation>(`
      SELECT * FROM observations
      WHERE start_ts < ? AND end_ts > ?
      ORDER BY start_ts ASC
    `),
  };

  const insertMany = db.transaction((obsList: DbObservationInsert[]) => {
    const now = nowISO();
    for (const obs of obsList) {
      stmts.insert.run(
        obs.id,
        obs.batch_id,
        obs.start_ts,
        obs.end_ts,
        obs.observation,
        obs.llm_model,
        now
      );
    }
  });

  return {
    saveBatch(observations: DbObservationInsert[]): void {
      insertMany(observations);
    },

    findByBatch(batchId: string): DbObservation[] {
      return stmts.findByBatch.all(batchId);
    },

    /** Observations overlapping [startTs, endTs) */
    findInRange(startTs: number, endTs: number): DbObservation[] {
      return stmts.findInRange.all(endTs, startTs);
    },

    deleteByBatchIds(batchIds: string[]): number {
      if (batchIds.length === 0) return 0;
      return db
        .prepare<string[]>(
          `DELETE FROM observations WHERE batch_id IN (${placeholders(batchIds.length)})`
        )
        .run(...batchIds).changes;
    },
  };
}
