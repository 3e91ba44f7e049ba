/**
 * LLM Request Audit Repository - SQLite Implementation
 *
 * Append-only. Rows are never updated.
 */

import type Database from 'better-sqlite3';
import type {
  DbLlmRequest,
  LlmCallRecord,
  LlmRequestRepository,
} from '../../0_types.js';
import { generateId } from '../helpers.js';

export function createSqliteLlmRequestRepository(
  db: Database.Database
): LlmRequestRepository {
  const stmts = {
    insert: db.prepare<
      [
        string,
        string | null,
        string,
        number,
        string,
        string,
        string,
        string,
        number,
        number | null,
        string,
        string | null,
        string | null,
        string,
      ]
    >(`
      INSERT INTO llm_requests (
        id, batch_id, call_group_id, attempt, provider, model, operation,
        status, latency_ms, http_status, request_payload, response_payload,
        error_message, created_at
      )
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `),
    findByBatch: db.prepare<[string], DbLlmRequest>(`
      SELECT * FROM llm_requests
      WHERE batch_id = ?
      ORDER BY rowid ASC
    `),
  };

  const insertMany = db.transaction((records: LlmCallRecord[]) => {
    for (const record of records) {
      stmts.insert.run(
        generateId(),
        record.batchId,
        record.callGroupId,
        record.attempt,
        record.provider,
        record.model,
        record.operation,
        record.status,
        Math.round(record.latencyMs),
        record.httpStatus,
        JSON.stringify(record.request),
        record.response ? JSON.stringify(record.response) : null,
        record.errorMessage,
        record.createdAt
      );
    }
  });

  return {
    saveMany(records: LlmCallRecord[]): void {
      if (records.length === 0) return;
      insertMany(records);
    },

    findByBatch(batchId: string): DbLlmRequest[] {
      return stmts.findByBatch.all(batchId);
    },
  };
}
