/**
 * timeweave - Holistic analysis provider (Gemini)
 *
 * Uploads the whole batch video, asks for a transcription of it in one
 * call and for the window's cards in a second.
 */

import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import {
  type AnalysisProvider,
  type GeminiConfig,
  type RelativeCard,
  type RelativeObservation,
  type SynthesisContext,
  relativeCardSchema,
  relativeObservationSchema,
} from '../0_types.js';
import type { TimeRange } from '../domain/time-range.js';
import { formatVideoTimestamp, parseVideoTimestamp } from '../domain/video-time.js';
import { ProviderContentError, ProviderTransportError, withCalls } from '../errors.js';
import { log } from '../pipeline/context.js';
import { validateCards, toRange } from '../services/card-validation.js';
import { formatCategoriesForPrompt } from '../services/categories.js';
import {
  type PollClock,
  type RemoteFileState,
  type UploadPollProtocol,
  uploadAndAwaitReady,
} from '../services/upload-poll.js';
import {
  type CallLog,
  auditedFetch,
  createCallLog,
  dropAttempts,
  markLastAttemptFailed,
  parseJsonContent,
  withRetries,
} from './llm-http.js';
import { loadPrompt } from './prompts.js';

/** Seconds an observation may run past either end of the video */
export const OBSERVATION_TOLERANCE_SECONDS = 120;
export const CARD_VALIDATION_ATTEMPTS = 3;

const geminiFileSchema = z.object({
  name: z.string(),
  uri: z.string(),
  mimeType: z.string().optional(),
  state: z.string().default('PROCESSING'),
  error: z.object({ message: z.string().optional() }).optional(),
});
type GeminiFile = z.infer<typeof geminiFileSchema>;

const uploadResponseSchema = z.object({ file: geminiFileSchema });

const generateResponseSchema = z.object({
  candidates: z
    .array(
      z.object({
        content: z
          .object({
            parts: z.array(z.object({ text: z.string().optional() })).default([]),
          })
          .optional(),
        finishReason: z.string().optional(),
      })
    )
    .default([]),
});

const observationListSchema = z.array(relativeObservationSchema);
const cardListSchema = z.array(relativeCardSchema);

export interface GeminiProviderDeps {
  /** Clock for the upload poll loop */
  clock?: PollClock;
  signal?: AbortSignal;
}

export function createGeminiProvider(
  config: GeminiConfig,
  deps: GeminiProviderDeps = {}
): AnalysisProvider {
  const base = config.endpoint.replace(/\/+$/, '');
  const authHeaders = { 'x-goog-api-key': config.apiKey };
  const retry = { maxRetries: config.maxRetries, retryDelayMs: config.retryDelayMs };

  function uploadProtocol(
    callLog: CallLog,
    video: { path: string; mimeType: string },
    bytes: Uint8Array
  ): UploadPollProtocol<string, GeminiFile> {
    let polls = 0;
    let pollGroup: string | null = null;

    return {
      startSession: () =>
        withRetries('upload_start', retry, async (attempt, callGroupId) => {
          const res = await auditedFetch(callLog, {
            operation: 'upload_start',
            callGroupId,
            attempt,
            url: `${base}/upload/v1beta/files`,
            method: 'POST',
            headers: {
              ...authHeaders,
              'Content-Type': 'application/json',
              'X-Goog-Upload-Protocol': 'resumable',
              'X-Goog-Upload-Command': 'start',
              'X-Goog-Upload-Header-Content-Length': String(bytes.byteLength),
              'X-Goog-Upload-Header-Content-Type': video.mimeType,
            },
            body: JSON.stringify({ file: { display_name: path.basename(video.path) } }),
            timeoutMs: config.timeout,
          });
          const uploadUrl = res.headers['x-goog-upload-url'];
          if (!uploadUrl) {
            markLastAttemptFailed(callLog, callGroupId, 'Missing upload URL');
            throw new ProviderTransportError('Upload session returned no upload URL');
          }
          return uploadUrl;
        }),

      upload: (uploadUrl) =>
        withRetries('upload_file', retry, async (attempt, callGroupId) => {
          const res = await auditedFetch(callLog, {
            operation: 'upload_file',
            callGroupId,
            attempt,
            url: uploadUrl,
            method: 'POST',
            headers: {
              'Content-Length': String(bytes.byteLength),
              'X-Goog-Upload-Offset': '0',
              'X-Goog-Upload-Command': 'upload, finalize',
            },
            body: bytes,
            timeoutMs: config.timeout,
          });
          return parseJsonContent(res.text, uploadResponseSchema, 'upload').file;
        }),

      poll: async (file): Promise<RemoteFileState<GeminiFile>> => {
        polls++;
        pollGroup ??= file.name;
        dropAttempts(callLog, pollGroup);
        const res = await auditedFetch(callLog, {
          operation: 'file_status',
          callGroupId: pollGroup,
          attempt: polls,
          url: `${base}/v1beta/${file.name}`,
          method: 'GET',
          headers: authHeaders,
          timeoutMs: config.timeout,
        });
        const status = parseJsonContent(res.text, geminiFileSchema, 'file status');
        if (status.state === 'ACTIVE') return { state: 'ready', file: status };
        if (status.state === 'FAILED') {
          return { state: 'failed', remoteState: status.state, detail: status.error?.message };
        }
        return { state: 'processing' };
      },
    };
  }

  async function generate<S extends z.ZodType>(
    callLog: CallLog,
    operation: string,
    parts: unknown[],
    schema: S,
    onGroup?: (callGroupId: string) => void
  ): Promise<z.infer<S>> {
    return withRetries(operation, retry, async (attempt, callGroupId) => {
      onGroup?.(callGroupId);
      const res = await auditedFetch(callLog, {
        operation,
        callGroupId,
        attempt,
        url: `${base}/v1beta/models/${config.model}:generateContent`,
        method: 'POST',
        headers: { ...authHeaders, 'Content-Type': 'application/json' },
        body: JSON.stringify({
          contents: [{ parts }],
          generationConfig: {
            temperature: 0.3,
            responseMimeType: 'application/json',
          },
        }),
        timeoutMs: config.timeout,
      });

      try {
        const envelope = parseJsonContent(res.text, generateResponseSchema, operation);
        const text = (envelope.candidates[0]?.content?.parts ?? [])
          .map((p) => p.text ?? '')
          .join('');
        if (!text) {
          throw new ProviderContentError(
            `Invalid ${operation} response: no text (finishReason: ${envelope.candidates[0]?.finishReason ?? 'none'})`
          );
        }
        return parseJsonContent(text, schema, operation);
      } catch (error) {
        if (error instanceof ProviderContentError) {
          markLastAttemptFailed(callLog, callGroupId, error.message);
        }
        throw error;
      }
    });
  }

  return {
    name: 'gemini',
    model: config.model,

    async transcribe(video) {
      const callLog = createCallLog({
        provider: 'gemini',
        model: config.model,
        batchId: video.batchId,
      });

      try {
        const bytes = await readFile(video.path);
        const file = await uploadAndAwaitReady(uploadProtocol(callLog, video, bytes), {
          timeoutMs: config.upload.timeoutMs,
          pollIntervalMs: config.upload.pollIntervalMs,
          clock: deps.clock,
          signal: deps.signal,
        });

        const duration = formatVideoTimestamp(video.durationSeconds);
        const prompt = loadPrompt('gemini-transcribe', { DURATION: duration });
        const withinVideo = observationListSchema.superRefine((items, ctx) => {
          const outOfRange = items.filter(
            (o) =>
              parseVideoTimestamp(o.start) < -OBSERVATION_TOLERANCE_SECONDS ||
              parseVideoTimestamp(o.end) > video.durationSeconds + OBSERVATION_TOLERANCE_SECONDS
          );
          if (outOfRange.length > 0) {
            ctx.addIssue({
              code: 'custom',
              message: `observations extend beyond the ${duration} video (${outOfRange.map((o) => `${o.start}-${o.end}`).join(', ')})`,
            });
          }
        });

        const observations = await generate(
          callLog,
          'transcribe',
          [
            { file_data: { mime_type: file.mimeType ?? video.mimeType, file_uri: file.uri } },
            { text: prompt },
          ],
          withinVideo
        );

        log('info', `Transcribed ${observations.length} observations`);
        return { observations, auditLog: callLog.calls };
      } catch (error) {
        throw withCalls(error, callLog.calls);
      }
    },

    async synthesizeCards(observations, context) {
      const callLog = createCallLog({
        provider: 'gemini',
        model: config.model,
        batchId: context.batchId,
      });

      try {
        const basePrompt = buildCardsPrompt(context);
        const required: TimeRange[] = [
          ...context.existingCards.map(toRange),
          ...observations.map(toRange),
        ];

        let prompt = basePrompt;
        let cards: RelativeCard[] = [];

        for (let attempt = 1; attempt <= CARD_VALIDATION_ATTEMPTS; attempt++) {
          let groupId = '';
          cards = await generate(callLog, 'generate_cards', [{ text: prompt }], cardListSchema, (id) => {
            groupId = id;
          });

          const problems = validateCards(required, cards);
          if (problems.length === 0) break;

          if (attempt === CARD_VALIDATION_ATTEMPTS) {
            log('warn', `Accepting cards after ${attempt} attempts: ${problems.join('; ')}`);
            break;
          }

          markLastAttemptFailed(callLog, groupId, problems.join('\n'));
          log('warn', `Card validation attempt ${attempt} failed: ${problems.join('; ')}`);
          prompt = `${basePrompt}\n\n## Previous attempt failed\n\n${problems.join('\n\n')}\n\nFix these issues. Cover every existing card and observation, and keep every card but the last at least 10 minutes long.`;
        }

        return { cards, auditLog: callLog.calls };
      } catch (error) {
        throw withCalls(error, callLog.calls);
      }
    },
  };
}

function formatObservations(observations: RelativeObservation[]): string {
  if (observations.length === 0) return 'None';
  return observations.map((o) => `[${o.start} - ${o.end}] ${o.description}`).join('\n');
}

function formatCards(cards: RelativeCard[]): string {
  if (cards.length === 0) return 'None';
  return JSON.stringify(cards, null, 2);
}

export function buildCardsPrompt(context: SynthesisContext): string {
  return loadPrompt('gemini-cards', {
    CURRENT_OFFSET: context.currentOffset,
    CATEGORIES: formatCategoriesForPrompt(context.categories),
    EXISTING_CARDS: formatCards(context.existingCards),
    OBSERVATIONS: formatObservations(context.windowObservations),
  });
}
