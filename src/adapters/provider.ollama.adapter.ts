/**
 * timeweave - Decomposed analysis provider (Ollama)
 *
 * Works with a local vision model that cannot take a whole video:
 * describe sampled frames one at a time, fold the descriptions into a few
 * observations, then build and merge cards with small text calls.
 */

import { readFile, rm } from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import {
  type AnalysisProvider,
  type OllamaConfig,
  type RelativeCard,
  type RelativeObservation,
  type SampledFrame,
  type VideoService,
  videoTimestampSchema,
} from '../0_types.js';
import { formatVideoTimestamp, parseVideoTimestamp } from '../domain/video-time.js';
import { ProviderContentError, ProviderError, errorMessage, withCalls } from '../errors.js';
import { log } from '../pipeline/context.js';
import {
  acceptMergedCard,
  checkMergeGuards,
  shouldMerge,
} from '../services/card-merge.js';
import { formatCategoriesForPrompt, normalizeCategory } from '../services/categories.js';
import { parallelMapSettled } from '../utils/parallel.js';
import {
  type CallLog,
  auditedFetch,
  createCallLog,
  markLastAttemptFailed,
  parseJsonContent,
  withRetries,
} from './llm-http.js';
import { loadPrompt } from './prompts.js';

/** One describe_frame attempt plus one retry */
export const FRAME_DESCRIBE_ATTEMPTS = 2;
export const SEGMENT_ATTEMPTS = 2;
export const MIN_SEGMENT_COVERAGE = 0.8;
export const MAX_SEGMENTS = 5;
/** Seconds a segment may run past either end of the video */
const SEGMENT_TOLERANCE_SECONDS = 30;

const chatResponseSchema = z.object({
  message: z.object({ content: z.string() }),
  done: z.boolean().default(true),
  done_reason: z.string().optional(),
});

const frameDescriptionSchema = z.object({ description: z.string().min(1) });

const segmentResponseSchema = z.object({
  reasoning: z.string().optional(),
  segments: z.array(
    z.object({
      start: videoTimestampSchema,
      end: videoTimestampSchema,
      description: z.string().min(1),
    })
  ),
});

const titleSummarySchema = z.object({
  title: z.string().min(1),
  summary: z.string(),
  category: z.string().default(''),
});

const mergeDecisionSchema = z.object({
  reason: z.string().default(''),
  combine: z.boolean(),
  confidence: z.number().min(0).max(1),
});

const mergedCardSchema = z.object({
  start: videoTimestampSchema,
  end: videoTimestampSchema,
  title: z.string().min(1),
  summary: z.string(),
  category: z.string().default(''),
});

/**
 * Ollama takes a JSON schema as `format`; drop the $schema key it rejects.
 */
function toOllamaSchema(schema: z.ZodType): Record<string, unknown> {
  const { $schema: _ignored, ...rest } = z.toJSONSchema(schema);
  return rest;
}

export interface DescribedFrame {
  timestamp: number;
  description: string;
}

export class SegmentCoverageError extends ProviderContentError {
  constructor(readonly coverage: number, duration: string) {
    super(
      `Segments cover ${Math.round(coverage * 100)}% of the ${duration} video, below ${Math.round(MIN_SEGMENT_COVERAGE * 100)}%`
    );
    this.name = 'SegmentCoverageError';
  }
}

/**
 * Turn merged segments into observations, dropping those outside the video.
 */
export function segmentsToObservations(
  segments: RelativeObservation[],
  durationSeconds: number
): { observations: RelativeObservation[]; coverage: number } {
  const observations: RelativeObservation[] = [];
  let covered = 0;

  for (const segment of segments) {
    const start = parseVideoTimestamp(segment.start);
    const end = parseVideoTimestamp(segment.end);
    if (
      start < -SEGMENT_TOLERANCE_SECONDS ||
      end > durationSeconds + SEGMENT_TOLERANCE_SECONDS
    ) {
      log('warn', `Dropping segment ${segment.start}-${segment.end} outside the video`);
      continue;
    }
    covered += Math.max(0, end - start);
    observations.push(segment);
  }

  if (observations.length === 0) {
    throw new ProviderContentError('No valid observations generated from merge');
  }
  if (observations.length > MAX_SEGMENTS) {
    throw new ProviderContentError(
      `Generated ${observations.length} observations, expected at most ${MAX_SEGMENTS}`
    );
  }

  return {
    observations,
    coverage: durationSeconds > 0 ? covered / durationSeconds : 0,
  };
}

/**
 * One observation per described frame, each running until the next frame.
 */
export function observationsFromFrames(
  frames: DescribedFrame[],
  intervalSeconds: number,
  durationSeconds: number
): RelativeObservation[] {
  const sorted = [...frames].sort((a, b) => a.timestamp - b.timestamp);
  const cap = durationSeconds > 0 ? durationSeconds : Number.POSITIVE_INFINITY;

  return sorted.map((frame, index) => {
    const start = Math.max(0, frame.timestamp);
    let end = start + intervalSeconds;
    const next = sorted[index + 1];
    if (next) end = Math.min(end, next.timestamp);
    end = Math.min(end, cap);
    if (end <= start) end = Math.min(start + Math.max(1, intervalSeconds), cap);

    return {
      start: formatVideoTimestamp(start),
      end: formatVideoTimestamp(end),
      description: frame.description,
    };
  });
}

export interface OllamaProviderDeps {
  video: Pick<VideoService, 'sampleFrames'>;
  /** Scratch space for sampled frames */
  tmpDir: string;
}

export function createOllamaProvider(
  config: OllamaConfig,
  deps: OllamaProviderDeps
): AnalysisProvider {
  async function chat<S extends z.ZodType>(
    callLog: CallLog,
    operation: string,
    request: { prompt: string; schema: S; images?: string[]; maxRetries?: number }
  ): Promise<z.infer<S>> {
    const retry = {
      maxRetries: request.maxRetries ?? config.maxRetries,
      retryDelayMs: config.retryDelayMs,
    };

    return withRetries(operation, retry, async (attempt, callGroupId) => {
      const res = await auditedFetch(callLog, {
        operation,
        callGroupId,
        attempt,
        url: config.endpoint,
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({
          model: config.model,
          messages: [
            {
              role: 'user',
              content: request.prompt,
              ...(request.images && { images: request.images }),
            },
          ],
          stream: false,
          keep_alive: config.keepAlive,
          format: toOllamaSchema(request.schema),
          options: { temperature: 0.3 },
        }),
        timeoutMs: config.timeout,
      });

      try {
        const data = parseJsonContent(res.text, chatResponseSchema, operation);
        if (!data.done || (data.done_reason && data.done_reason !== 'stop')) {
          throw new ProviderContentError(
            `Incomplete ${operation} response: done=${data.done}, reason=${data.done_reason ?? 'none'}`
          );
        }
        return parseJsonContent(data.message.content, request.schema, operation);
      } catch (error) {
        if (error instanceof ProviderContentError) {
          markLastAttemptFailed(callLog, callGroupId, error.message);
        }
        throw error;
      }
    });
  }

  async function describeFrames(
    callLog: CallLog,
    frames: SampledFrame[]
  ): Promise<DescribedFrame[]> {
    const settled = await parallelMapSettled(
      frames,
      async (frame) => {
        const image = (await readFile(frame.path)).toString('base64');
        const { description } = await chat(callLog, 'describe_frame', {
          prompt: loadPrompt('ollama-describe-frame', {
            TIMESTAMP: formatVideoTimestamp(frame.timestamp),
          }),
          schema: frameDescriptionSchema,
          images: [image],
          maxRetries: FRAME_DESCRIBE_ATTEMPTS,
        });
        return { timestamp: frame.timestamp, description };
      },
      config.frameConcurrency
    );

    const described: DescribedFrame[] = [];
    settled.forEach((result, index) => {
      if (result.ok) {
        described.push(result.value);
      } else {
        log(
          'warn',
          `Skipping frame at ${formatVideoTimestamp(frames[index].timestamp)}: ${errorMessage(result.error)}`
        );
      }
    });
    return described;
  }

  async function segmentFrames(
    callLog: CallLog,
    frames: DescribedFrame[],
    durationSeconds: number
  ): Promise<RelativeObservation[]> {
    const duration = formatVideoTimestamp(durationSeconds);
    const frameList = frames
      .map((f) => `[${formatVideoTimestamp(f.timestamp)}] ${f.description}`)
      .join('\n');
    let retryNote = '';
    let lastError: unknown = null;

    for (let attempt = 1; attempt <= SEGMENT_ATTEMPTS; attempt++) {
      try {
        const response = await chat(callLog, 'segment_video_activity', {
          prompt: loadPrompt('ollama-segment', {
            FRAME_COUNT: frames.length,
            DURATION: duration,
            FRAMES: frameList,
            RETRY_NOTE: retryNote,
          }),
          schema: segmentResponseSchema,
        });

        const { observations, coverage } = segmentsToObservations(
          response.segments,
          durationSeconds
        );
        if (coverage < MIN_SEGMENT_COVERAGE) {
          throw new SegmentCoverageError(coverage, duration);
        }
        return observations;
      } catch (error) {
        lastError = error;
        log('warn', `Segment attempt ${attempt}/${SEGMENT_ATTEMPTS} failed: ${errorMessage(error)}`);
        retryNote =
          error instanceof SegmentCoverageError
            ? `\nPREVIOUS ATTEMPT FAILED: your segments covered only ${Math.round(error.coverage * 100)}% of the ${duration} video. Cover at least 80%.`
            : `\nPREVIOUS ATTEMPT FAILED: ${errorMessage(error)}`;
      }
    }

    log(
      'warn',
      `Falling back to per-frame observations: ${errorMessage(lastError)}`
    );
    return observationsFromFrames(frames, config.frameIntervalSeconds, durationSeconds);
  }

  async function mergeIntoWindow(
    callLog: CallLog,
    existing: RelativeCard[],
    card: RelativeCard,
    categories: Parameters<typeof normalizeCategory>[1]
  ): Promise<RelativeCard[]> {
    const last = existing[existing.length - 1];
    if (!last) return [card];

    const guard = checkMergeGuards(last, card);
    if (!guard.allowed) {
      log('debug', `Not merging: ${guard.reason}`);
      return [...existing, card];
    }

    const pair = {
      PREVIOUS_START: last.start,
      PREVIOUS_END: last.end,
      PREVIOUS_TITLE: last.title,
      PREVIOUS_SUMMARY: last.summary,
      PREVIOUS_CATEGORY: last.category,
      NEW_START: card.start,
      NEW_END: card.end,
      NEW_TITLE: card.title,
      NEW_SUMMARY: card.summary,
      NEW_CATEGORY: card.category,
    };

    const decision = await chat(callLog, 'evaluate_card_merge', {
      prompt: loadPrompt('ollama-evaluate-merge', pair),
      schema: mergeDecisionSchema,
    });
    if (!shouldMerge(decision)) {
      log('debug', `Keeping cards separate (confidence ${decision.confidence}): ${decision.reason}`);
      return [...existing, card];
    }

    const merged = await chat(callLog, 'merge_cards', {
      prompt: loadPrompt('ollama-merge-cards', pair),
      schema: mergedCardSchema,
    });
    const mergedCard: RelativeCard = {
      ...last,
      start: merged.start,
      end: merged.end,
      title: merged.title,
      summary: merged.summary,
      category: normalizeCategory(merged.category || last.category, categories),
    };

    if (!acceptMergedCard(mergedCard)) {
      log('warn', `Discarding merged card ${merged.start}-${merged.end}: too long`);
      return [...existing, card];
    }
    return [...existing.slice(0, -1), mergedCard];
  }

  return {
    name: 'ollama',
    model: config.model,

    async transcribe(video) {
      const callLog = createCallLog({
        provider: 'ollama',
        model: config.model,
        batchId: video.batchId,
      });
      const framesDir = path.join(deps.tmpDir, `frames-${video.batchId}`);

      try {
        const frames = await deps.video.sampleFrames(
          video.path,
          config.frameIntervalSeconds,
          framesDir
        );
        if (frames.length === 0) {
          return { observations: [], auditLog: callLog.calls };
        }

        const described = await describeFrames(callLog, frames);
        if (described.length === 0) {
          throw new ProviderError(`All ${frames.length} frame descriptions failed`);
        }

        const observations = await segmentFrames(
          callLog,
          described,
          video.durationSeconds
        );
        return { observations, auditLog: callLog.calls };
      } catch (error) {
        throw withCalls(error, callLog.calls);
      } finally {
        await rm(framesDir, { recursive: true, force: true });
      }
    },

    async synthesizeCards(observations, context) {
      const callLog = createCallLog({
        provider: 'ollama',
        model: config.model,
        batchId: context.batchId,
      });
      if (observations.length === 0) {
        return { cards: context.existingCards, auditLog: callLog.calls };
      }

      try {
        const sorted = [...observations].sort(
          (a, b) => parseVideoTimestamp(a.start) - parseVideoTimestamp(b.start)
        );
        const first = sorted[0];
        const lastEnd = Math.max(...sorted.map((o) => parseVideoTimestamp(o.end)));

        const titleSummary = await chat(callLog, 'generate_title_summary', {
          prompt: loadPrompt('ollama-title-summary', {
            OBSERVATIONS: sorted
              .map((o) => `[${o.start} - ${o.end}] ${o.description}`)
              .join('\n'),
            CATEGORIES: formatCategoriesForPrompt(context.categories),
          }),
          schema: titleSummarySchema,
        });

        const card: RelativeCard = {
          start: first.start,
          end: formatVideoTimestamp(lastEnd),
          title: titleSummary.title,
          summary: titleSummary.summary,
          detailedSummary: '',
          category: normalizeCategory(titleSummary.category, context.categories),
          subcategory: '',
        };

        const cards = await mergeIntoWindow(
          callLog,
          context.existingCards,
          card,
          context.categories
        );
        return { cards, auditLog: callLog.calls };
      } catch (error) {
        throw withCalls(error, callLog.calls);
      }
    },
  };
}
