/**
 * Repository exports
 */

export { createSqliteBatchRepository } from './batch.sqlite.js';
export { createSqliteChunkRepository } from './chunk.sqlite.js';
export { createSqliteLlmRequestRepository } from './llm-request.sqlite.js';
export { createSqliteObservationRepository } from './observation.sqlite.js';
export { createSqliteTimelineCardRepository } from './timeline-card.sqlite.js';
