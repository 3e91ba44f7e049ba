/**
 * timeweave - Core Types
 *
 * Schemas, ports and configuration in one place.
 */

import { homedir } from 'node:os';
import { join } from 'node:path';
import { z } from 'zod';
import type {
  BatchStatus,
  DbBatch,
  DbBatchInsert,
  DbChunk,
  DbChunkInsert,
  DbLlmRequest,
  DbObservation,
  DbObservationInsert,
  DbTimelineCard,
  DbTimelineCardInsert,
} from './db/types.js';
import { VIDEO_TIMESTAMP_PATTERN } from './domain/video-time.js';

export type * from './db/types.js';

// =============================================================================
// OBSERVATIONS & CARDS (video-relative, as exchanged with providers)
// =============================================================================

export const videoTimestampSchema = z
  .string()
  .regex(VIDEO_TIMESTAMP_PATTERN, 'Expected a mm:ss or h:mm:ss timestamp');

export const relativeObservationSchema = z.object({
  start: videoTimestampSchema,
  end: videoTimestampSchema,
  description: z.string().min(1),
});
export type RelativeObservation = z.infer<typeof relativeObservationSchema>;

export const appSitesSchema = z.object({
  primary: z.string().nullable().optional(),
  secondary: z.string().nullable().optional(),
});

export const distractionSchema = z.object({
  start: videoTimestampSchema,
  end: videoTimestampSchema,
  title: z.string(),
  summary: z.string(),
});

export const relativeCardSchema = z.object({
  start: videoTimestampSchema,
  end: videoTimestampSchema,
  title: z.string().min(1),
  summary: z.string(),
  detailedSummary: z.string().default(''),
  category: z.string(),
  subcategory: z.string().default(''),
  appSites: appSitesSchema.optional(),
  distractions: z.array(distractionSchema).optional(),
});
export type RelativeCard = z.infer<typeof relativeCardSchema>;

// =============================================================================
// CATEGORIES
// =============================================================================

export const categorySchema = z.object({
  name: z.string().min(1),
  description: z.string().default(''),
  isIdle: z.boolean().default(false),
});
export type Category = z.infer<typeof categorySchema>;

// =============================================================================
// LLM CALL AUDIT
// =============================================================================

export interface LlmCallRecord {
  batchId: string | null;
  callGroupId: string;
  attempt: number;
  provider: string;
  model: string;
  operation: string;
  status: 'success' | 'failure';
  latencyMs: number;
  httpStatus: number | null;
  request: {
    method: string;
    url: string;
    headers: Record<string, string>;
    body: string | null;
  };
  response: {
    headers: Record<string, string>;
    body: string | null;
  } | null;
  errorMessage: string | null;
  createdAt: string;
}

// =============================================================================
// PORTS (Interfaces)
// =============================================================================

export interface BatchVideo {
  batchId: string;
  path: string;
  mimeType: string;
  durationSeconds: number;
}

/**
 * Everything a provider may look at when turning observations into cards.
 * All timestamps are relative to the current batch start; earlier ones are
 * negative.
 */
export interface SynthesisContext {
  batchId: string;
  batchDurationSeconds: number;
  windowObservations: RelativeObservation[];
  existingCards: RelativeCard[];
  categories: Category[];
  currentOffset: string;
}

export type ProviderName = 'gemini' | 'ollama';

export interface AnalysisProvider {
  readonly name: ProviderName;
  readonly model: string;
  transcribe(video: BatchVideo): Promise<{
    observations: RelativeObservation[];
    auditLog: LlmCallRecord[];
  }>;
  /**
   * Returns the complete card list for the synthesis window, which the
   * caller swaps in for `context.existingCards`.
   */
  synthesizeCards(
    observations: RelativeObservation[],
    context: SynthesisContext
  ): Promise<{ cards: RelativeCard[]; auditLog: LlmCallRecord[] }>;
}

export interface SampledFrame {
  path: string;
  /** Seconds from video start */
  timestamp: number;
}

export interface VideoService {
  stitch(inputPaths: string[], outputPath: string): Promise<string>;
  getDuration(videoPath: string): Promise<number>;
  sampleFrames(
    videoPath: string,
    intervalSeconds: number,
    outputDir: string
  ): Promise<SampledFrame[]>;
  createTimelapse(
    inputPath: string,
    outputPath: string,
    options: { speedMultiplier: number; fps: number }
  ): Promise<string>;
}

// =============================================================================
// REPOSITORIES
// =============================================================================

export interface ChunkRepository {
  insert(chunk: DbChunkInsert): DbChunk;
  findById(id: string): DbChunk | null;
  complete(id: string, endTs: number): DbChunk | null;
  delete(id: string): boolean;
  /** Completed chunks at or after `sinceTs` that no batch owns, by start time */
  findUnbatchedCompleted(sinceTs: number): DbChunk[];
  /** Chunks still being written, at or after `sinceTs` */
  findRecording(sinceTs: number): DbChunk[];
  /** Oldest completed/recording chunks that no batch owns */
  findEvictionCandidates(limit: number): DbChunk[];
  /** Delete only while no batch owns the chunk; check and delete are atomic */
  deleteIfUnbatched(id: string): boolean;
  findByBatch(batchId: string): DbChunk[];
  findOverlapping(startTs: number, endTs: number): DbChunk[];
  countByStatus(): Record<string, number>;
}

export interface BatchRepository {
  /** Insert batches with their chunk joins in one transaction */
  createWithChunks(batches: DbBatchInsert[]): DbBatch[];
  findById(id: string): DbBatch | null;
  findByIds(ids: string[]): DbBatch[];
  findInRange(startTs: number, endTs: number): DbBatch[];
  /** Pending batches starting at or after `sinceTs`, oldest first */
  findPending(sinceTs: number): DbBatch[];
  findRecent(limit: number): DbBatch[];
  /** pending → processing; false when another worker got there first */
  claim(id: string): boolean;
  updateStatus(id: string, status: BatchStatus, reason: string | null): void;
  resetToPending(ids: string[]): number;
  countByStatus(): Record<string, number>;
}

export interface ObservationRepository {
  saveBatch(observations: DbObservationInsert[]): void;
  findByBatch(batchId: string): DbObservation[];
  findInRange(startTs: number, endTs: number): DbObservation[];
  deleteByBatchIds(batchIds: string[]): number;
}

export interface TimelineCardRepository {
  findById(id: string): DbTimelineCard | null;
  findByDay(day: string): DbTimelineCard[];
  /** Cards starting inside [startTs, endTs) */
  findInRange(startTs: number, endTs: number): DbTimelineCard[];
  /** Delete cards starting inside [startTs, endTs) and insert `cards` */
  replaceInRange(
    startTs: number,
    endTs: number,
    cards: DbTimelineCardInsert[]
  ): { removed: DbTimelineCard[]; inserted: DbTimelineCard[] };
  deleteByDays(days: string[]): DbTimelineCard[];
  deleteByBatchIds(batchIds: string[]): DbTimelineCard[];
  updateVideoSummaryPath(id: string, path: string): void;
}

export interface LlmRequestRepository {
  saveMany(records: LlmCallRecord[]): void;
  findByBatch(batchId: string): DbLlmRequest[];
}

export interface Repositories {
  chunks: ChunkRepository;
  batches: BatchRepository;
  observations: ObservationRepository;
  cards: TimelineCardRepository;
  llmRequests: LlmRequestRepository;
  /** Run `fn` in one SQLite transaction (nested calls become savepoints) */
  transaction<T>(fn: () => T): T;
}

// =============================================================================
// CONFIG
// =============================================================================

const DEFAULT_DATA_DIR = join(homedir(), '.timeweave');

export const storageConfigSchema = z.object({
  dataDir: z.string().default(DEFAULT_DATA_DIR),
  quotaBytes: z.number().int().positive().default(5 * 1024 ** 3),
  purgeLimit: z.number().int().positive().default(10),
});
export type StorageConfig = z.infer<typeof storageConfigSchema>;

export const batchingConfigSchema = z.object({
  maxGapSeconds: z.number().nonnegative().default(120),
  targetBatchDuration: z.number().positive().default(900),
  minBatchDuration: z.number().nonnegative().default(300),
});
export type BatchingConfig = z.infer<typeof batchingConfigSchema>;

export const schedulerConfigSchema = z.object({
  intervalMs: z.number().int().positive().default(60_000),
  lookbackSeconds: z.number().int().positive().default(24 * 60 * 60),
  windowSeconds: z.number().int().positive().default(60 * 60),
});
export type SchedulerConfig = z.infer<typeof schedulerConfigSchema>;

export const reprocessConfigSchema = z.object({
  pollIntervalMs: z.number().int().positive().default(2000),
  maxWaitPerBatchMs: z.number().int().positive().default(30 * 60 * 1000),
});
export type ReprocessConfig = z.infer<typeof reprocessConfigSchema>;

export const timelapseConfigSchema = z.object({
  enabled: z.boolean().default(true),
  speedMultiplier: z.number().positive().default(20),
  fps: z.number().int().positive().default(24),
});
export type TimelapseConfig = z.infer<typeof timelapseConfigSchema>;

export const uploadPollConfigSchema = z.object({
  timeoutMs: z.number().int().positive().default(5 * 60 * 1000),
  pollIntervalMs: z.number().int().positive().default(2000),
});
export type UploadPollConfig = z.infer<typeof uploadPollConfigSchema>;

export const geminiConfigSchema = z.object({
  provider: z.literal('gemini'),
  apiKey: z.string().min(1),
  endpoint: z
    .string()
    .default('https://generativelanguage.googleapis.com'),
  model: z.string().default('gemini-2.5-flash'),
  maxRetries: z.number().int().positive().default(3),
  retryDelayMs: z.number().int().nonnegative().default(1000),
  timeout: z.number().int().positive().default(300_000),
  upload: uploadPollConfigSchema.prefault({}),
});
export type GeminiConfig = z.infer<typeof geminiConfigSchema>;

export const ollamaConfigSchema = z.object({
  provider: z.literal('ollama'),
  endpoint: z.string().default('http://localhost:11434/api/chat'),
  model: z.string().default('qwen2.5vl:7b'),
  maxRetries: z.number().int().positive().default(3),
  retryDelayMs: z.number().int().nonnegative().default(1000),
  timeout: z.number().int().positive().default(120_000),
  keepAlive: z.string().default('10m'),
  frameIntervalSeconds: z.number().positive().default(60),
  frameConcurrency: z.number().int().positive().default(1),
});
export type OllamaConfig = z.infer<typeof ollamaConfigSchema>;

export const providerConfigSchema = z.discriminatedUnion('provider', [
  geminiConfigSchema,
  ollamaConfigSchema,
]);
export type ProviderConfig = z.infer<typeof providerConfigSchema>;

export const DEFAULT_CATEGORIES: Category[] = [
  { name: 'Work', description: 'Focused, productive tasks', isIdle: false },
  {
    name: 'Personal',
    description: 'Personal errands, communication and admin',
    isIdle: false,
  },
  {
    name: 'Distraction',
    description: 'Entertainment and unfocused browsing',
    isIdle: false,
  },
  { name: 'Idle', description: 'No meaningful activity', isIdle: true },
];

export const appConfigSchema = z.object({
  storage: storageConfigSchema.prefault({}),
  batching: batchingConfigSchema.prefault({}),
  scheduler: schedulerConfigSchema.prefault({}),
  reprocess: reprocessConfigSchema.prefault({}),
  timelapse: timelapseConfigSchema.prefault({}),
  provider: providerConfigSchema.default({
    provider: 'ollama',
    endpoint: 'http://localhost:11434/api/chat',
    model: 'qwen2.5vl:7b',
    maxRetries: 3,
    retryDelayMs: 1000,
    timeout: 120_000,
    keepAlive: '10m',
    frameIntervalSeconds: 60,
    frameConcurrency: 1,
  }),
  categories: z.array(categorySchema).min(1).default(DEFAULT_CATEGORIES),
});
export type AppConfig = z.infer<typeof appConfigSchema>;

export const DEFAULT_BATCHING_CONFIG: BatchingConfig =
  batchingConfigSchema.parse({});
