/**
 * Manual Database Types for SQLite
 */

export type ChunkStatus = 'recording' | 'completed' | 'failed';

export interface DbChunk {
  id: string;
  start_ts: number;
  end_ts: number;
  file_path: string;
  status: ChunkStatus;
  is_uploaded: number; // 0 | 1
  created_at: string;
}

export type DbChunkInsert = Omit<DbChunk, 'created_at' | 'is_uploaded'>;

export type BatchStatus =
  | 'pending'
  | 'processing'
  | 'completed'
  | 'failed'
  | 'failed_empty'
  | 'skipped_short';

export interface DbBatch {
  id: string;
  batch_start_ts: number;
  batch_end_ts: number;
  status: BatchStatus;
  reason: string | null;
  created_at: string;
  updated_at: string;
}

export interface DbBatchInsert {
  id: string;
  batch_start_ts: number;
  batch_end_ts: number;
  chunk_ids: string[];
}

export interface DbObservation {
  id: string;
  batch_id: string;
  start_ts: number;
  end_ts: number;
  observation: string;
  llm_model: string | null;
  created_at: string;
}

export type DbObservationInsert = Omit<DbObservation, 'created_at'>;

export interface DbTimelineCard {
  id: string;
  batch_id: string | null;
  start_ts: number;
  end_ts: number;
  day: string; // YYYY-MM-DD logical day
  title: string;
  summary: string;
  detailed_summary: string;
  category: string;
  subcategory: string;
  metadata: string | null; // JSON
  video_summary_path: string | null;
  created_at: string;
}

export type DbTimelineCardInsert = Omit<
  DbTimelineCard,
  'created_at' | 'video_summary_path'
>;

export interface DbLlmRequest {
  id: string;
  batch_id: string | null;
  call_group_id: string;
  attempt: number;
  provider: string;
  model: string;
  operation: string;
  status: 'success' | 'failure';
  latency_ms: number;
  http_status: number | null;
  request_payload: string; // JSON
  response_payload: string | null; // JSON
  error_message: string | null;
  created_at: string;
}
