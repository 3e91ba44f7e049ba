import type { BatchStatus, DbBatch } from '../0_types.js';

export type TerminalBatchStatus = Exclude<BatchStatus, 'pending' | 'processing'>;

export interface Batch {
  readonly id: string;
  readonly startTs: number;
  readonly endTs: number;
  readonly status: BatchStatus;
  readonly reason: string | null;
}

const TERMINAL: ReadonlySet<BatchStatus> = new Set<BatchStatus>([
  'completed',
  'failed',
  'failed_empty',
  'skipped_short',
]);

export function isTerminal(status: BatchStatus): status is TerminalBatchStatus {
  return TERMINAL.has(status);
}

export class InvalidBatchTransitionError extends Error {
  constructor(
    readonly batchId: string,
    readonly from: BatchStatus,
    readonly to: BatchStatus
  ) {
    super(`Batch ${batchId}: cannot move from ${from} to ${to}`);
    this.name = 'InvalidBatchTransitionError';
  }
}

export function fromRow(row: DbBatch): Batch {
  return {
    id: row.id,
    startTs: row.batch_start_ts,
    endTs: row.batch_end_ts,
    status: row.status,
    reason: row.reason,
  };
}

function transition(
  batch: Batch,
  allowedFrom: readonly BatchStatus[],
  to: BatchStatus,
  reason: string | null
): Batch {
  if (!allowedFrom.includes(batch.status)) {
    throw new InvalidBatchTransitionError(batch.id, batch.status, to);
  }
  return { ...batch, status: to, reason };
}

/**
 * Claim a pending batch for analysis
 */
export function startProcessing(batch: Batch): Batch {
  return transition(batch, ['pending'], 'processing', null);
}

/**
 * Mark batch as analysed (cards, if any, are persisted alongside)
 */
export function completeBatch(batch: Batch): Batch {
  return transition(batch, ['processing'], 'completed', null);
}

/**
 * Mark batch as failed, keeping the provider or transport message verbatim
 */
export function failBatch(batch: Batch, reason: string): Batch {
  return transition(batch, ['processing'], 'failed', reason);
}

// Policy outcomes: decided before any provider call, so no claim is needed.

export function skipShort(batch: Batch, durationSeconds: number): Batch {
  return transition(
    batch,
    ['pending', 'processing'],
    'skipped_short',
    `Batch duration ${durationSeconds}s is below the analysis minimum`
  );
}

export function failEmpty(batch: Batch): Batch {
  return transition(
    batch,
    ['pending', 'processing'],
    'failed_empty',
    'No chunks found for batch'
  );
}

/**
 * Hand a claimed batch back to the queue when analysis was interrupted
 */
export function releaseBatch(batch: Batch): Batch {
  return transition(batch, ['processing'], 'pending', null);
}
