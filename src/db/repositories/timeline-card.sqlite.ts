/**
 * Timeline Card Repository - SQLite Implementation
 */

import type Database from 'better-sqlite3';
import type {
  DbTimelineCard,
  DbTimelineCardInsert,
  TimelineCardRepository,
} from '../../0_types.js';
import { nowISO, placeholders } from '../helpers.js';

export function createSqliteTimelineCardRepository(
  db: Database.Database
): TimelineCardRepository {
  const stmts = {
    insert: db.prepare<
      [
        string,
        string | null,
        number,
        number,
        string,
        string,
        string,
        string,
        string,
        string,
        string | null,
        string,
      ]
    >(`
      INSERT INTO timeline_cards (
        id, batch_id, start_ts, end_ts, day, title, summary,
        detailed_summary, category, subcategory, metadata, created_at
      )
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `),
    findById: db.prepare<[string], DbTimelineCard>(
      'SELECT * FROM timeline_cards WHERE id = ?'
    ),
    findByDay: db.prepare<[string], DbTimelineCard>(
      'SELECT * FROM timeline_cards WHERE day = ? ORDER BY start_ts ASC'
    ),
    findInRange: db.prepare<[number, number], DbTimelineCard>(`
      SELECT * FROM timeline_cards
      WHERE start_ts >= ? AND start_ts < ?
      ORDER BY start_ts ASC
    `),
    deleteInRange: db.prepare<[number, number]>(
      'DELETE FROM timeline_cards WHERE start_ts >= ? AND start_ts < ?'
    ),
    updateVideoSummaryPath: db.prepare<[string, string]>(
      'UPDATE timeline_cards SET video_summary_path = ? WHERE id = ?'
    ),
  };

  function insertAll(cards: DbTimelineCardInsert[]): DbTimelineCard[] {
    const now = nowISO();
    return cards.map((card) => {
      stmts.insert.run(
        card.id,
        card.batch_id,
        card.start_ts,
        card.end_ts,
        card.day,
        card.title,
        card.summary,
        card.detailed_summary,
        card.category,
        card.subcategory,
        card.metadata,
        now
      );
      return { ...card, video_summary_path: null, created_at: now };
    });
  }

  const replaceInRange = db.transaction(
    (startTs: number, endTs: number, cards: DbTimelineCardInsert[]) => {
      const removed = stmts.findInRange.all(startTs, endTs);
      stmts.deleteInRange.run(startTs, endTs);
      const inserted = insertAll(cards);
      return { removed, inserted };
    }
  );

  function deleteWhereIn(column: 'day' | 'batch_id', values: string[]) {
    if (values.length === 0) return [];
    const list = placeholders(values.length);
    const removed = db
      .prepare<string[], DbTimelineCard>(
        `SELECT * FROM timeline_cards WHERE ${column} IN (${list}) ORDER BY start_ts ASC`
      )
      .all(...values);
    db.prepare<string[]>(
      `DELETE FROM timeline_cards WHERE ${column} IN (${list})`
    ).run(...values);
    return removed;
  }

  return {
    findById(id: string): DbTimelineCard | null {
      return stmts.findById.get(id) ?? null;
    },

    findByDay(day: string): DbTimelineCard[] {
      return stmts.findByDay.all(day);
    },

    findInRange(startTs: number, endTs: number): DbTimelineCard[] {
      return stmts.findInRange.all(startTs, endTs);
    },

    replaceInRange(startTs, endTs, cards) {
      return replaceInRange(startTs, endTs, cards);
    },

    deleteByDays(days: string[]): DbTimelineCard[] {
      return db.transaction(() => deleteWhereIn('day', days))();
    },

    deleteByBatchIds(batchIds: string[]): DbTimelineCard[] {
      return db.transaction(() => deleteWhereIn('batch_id', batchIds))();
    },

    updateVideoSummaryPath(id: string, path: string): void {
      stmts.updateVideoSummaryPath.run(path, id);
    },
  };
}
