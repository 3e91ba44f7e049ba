/**
 * Provider HTTP plumbing
 *
 * Every HTTP attempt a provider makes goes through auditedFetch, which
 * appends one LlmCallRecord (secrets redacted) to the call log whether the
 * attempt succeeds or not.
 */

import { setTimeout as sleep } from 'node:timers/promises';
import type { z } from 'zod';
import type { LlmCallRecord } from '../0_types.js';
import { generateId, nowISO } from '../db/helpers.js';
import {
  ProviderContentError,
  ProviderError,
  ProviderTransportError,
  RemoteProcessingError,
  UploadTimeoutError,
  errorMessage,
} from '../errors.js';
import { debugLog, log } from '../pipeline/context.js';

const SECRET_QUERY_PARAMS = ['key', 'api_key', 'token'];
const SECRET_HEADERS = ['authorization', 'x-api-key', 'x-goog-api-key'];
const REDACTED = 'REDACTED';
const MAX_LOGGED_BODY = 64 * 1024;

export interface CallLog {
  readonly provider: string;
  readonly model: string;
  readonly batchId: string | null;
  readonly calls: LlmCallRecord[];
}

export function createCallLog(meta: {
  provider: string;
  model: string;
  batchId: string | null;
}): CallLog {
  return { ...meta, calls: [] };
}

export interface HttpCall {
  operation: string;
  callGroupId: string;
  attempt: number;
  url: string;
  method: 'GET' | 'POST' | 'PUT';
  headers?: Record<string, string>;
  body?: string | Uint8Array;
  timeoutMs: number;
}

export interface HttpResult {
  status: number;
  headers: Record<string, string>;
  text: string;
}

export function redactUrl(url: string): string {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return url;
  }
  for (const param of SECRET_QUERY_PARAMS) {
    if (parsed.searchParams.has(param)) {
      parsed.searchParams.set(param, REDACTED);
    }
  }
  return parsed.toString();
}

export function redactHeaders(
  headers: Record<string, string>
): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [name, value] of Object.entries(headers)) {
    result[name] = SECRET_HEADERS.includes(name.toLowerCase())
      ? REDACTED
      : value;
  }
  return result;
}

function describeBody(body: string | Uint8Array | undefined): string | null {
  if (body === undefined) return null;
  if (typeof body !== 'string') return `<binary ${body.byteLength} bytes>`;
  return truncate(body);
}

function truncate(text: string): string {
  return text.length > MAX_LOGGED_BODY
    ? `${text.slice(0, MAX_LOGGED_BODY)}…[truncated ${text.length - MAX_LOGGED_BODY} chars]`
    : text;
}

function headersToRecord(headers: Headers): Record<string, string> {
  const result: Record<string, string> = {};
  headers.forEach((value, name) => {
    result[name] = value;
  });
  return result;
}

/**
 * Retry-After is either delta-seconds or an HTTP date.
 */
export function parseRetryAfter(
  value: string | null,
  now = Date.now()
): number | null {
  if (!value) return null;
  const seconds = Number(value);
  if (Number.isFinite(seconds)) return Math.max(0, seconds * 1000);
  const date = Date.parse(value);
  return Number.isNaN(date) ? null : Math.max(0, date - now);
}

export async function auditedFetch(
  callLog: CallLog,
  call: HttpCall
): Promise<HttpResult> {
  const started = Date.now();
  const headers = call.headers ?? {};
  const request = {
    method: call.method,
    url: redactUrl(call.url),
    headers: redactHeaders(headers),
    body: describeBody(call.body),
  };

  const record = (
    entry: Pick<LlmCallRecord, 'status' | 'httpStatus' | 'response' | 'errorMessage'>
  ) => {
    callLog.calls.push({
      batchId: callLog.batchId,
      callGroupId: call.callGroupId,
      attempt: call.attempt,
      provider: callLog.provider,
      model: callLog.model,
      operation: call.operation,
      latencyMs: Date.now() - started,
      request,
      createdAt: nowISO(),
      ...entry,
    });
  };

  debugLog(
    callLog.provider,
    `${call.operation} #${call.attempt} → ${call.method} ${request.url}`
  );

  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), call.timeoutMs);

  let response: Response;
  let text: string;
  try {
    response = await fetch(call.url, {
      method: call.method,
      headers,
      body: call.body,
      signal: controller.signal,
    });
    text = await response.text();
  } catch (error) {
    const message =
      error instanceof Error && error.name === 'AbortError'
        ? `Request timed out after ${call.timeoutMs}ms`
        : errorMessage(error);
    record({
      status: 'failure',
      httpStatus: null,
      response: null,
      errorMessage: message,
    });
    throw new ProviderTransportError(message, { cause: error });
  } finally {
    clearTimeout(timeoutId);
  }

  const responseHeaders = headersToRecord(response.headers);
  debugLog(
    callLog.provider,
    `${call.operation} #${call.attempt} ← ${response.status} in ${Date.now() - started}ms`
  );

  if (!response.ok) {
    const message = `${callLog.provider} API error: ${response.status} ${truncate(text).slice(0, 500)}`;
    record({
      status: 'failure',
      httpStatus: response.status,
      response: { headers: responseHeaders, body: truncate(text) },
      errorMessage: message,
    });
    throw new ProviderTransportError(message, {
      httpStatus: response.status,
      retryAfterMs: parseRetryAfter(response.headers.get('retry-after')),
    });
  }

  record({
    status: 'success',
    httpStatus: response.status,
    response: { headers: responseHeaders, body: truncate(text) },
    errorMessage: null,
  });
  return { status: response.status, headers: responseHeaders, text };
}

/**
 * Mark the most recent attempt of a call group as failed after the fact,
 * e.g. when the HTTP exchange succeeded but the payload did not validate.
 */
export function markLastAttemptFailed(
  callLog: CallLog,
  callGroupId: string,
  message: string
): void {
  for (let i = callLog.calls.length - 1; i >= 0; i--) {
    const call = callLog.calls[i];
    if (call.callGroupId === callGroupId) {
      call.status = 'failure';
      call.errorMessage = message;
      return;
    }
  }
}

/**
 * Forget the recorded attempts of a call group. Status polls use this so
 * only the latest poll reaches the audit table.
 */
export function dropAttempts(callLog: CallLog, callGroupId: string): void {
  for (let i = callLog.calls.length - 1; i >= 0; i--) {
    if (callLog.calls[i].callGroupId === callGroupId) {
      callLog.calls.splice(i, 1);
    }
  }
}

export interface RetryOptions {
  maxRetries: number;
  retryDelayMs: number;
}

function isRetryable(error: unknown): boolean {
  if (error instanceof UploadTimeoutError) return false;
  if (error instanceof RemoteProcessingError) return false;
  if (error instanceof ProviderTransportError && error.httpStatus !== null) {
    const status = error.httpStatus;
    return status === 408 || status === 429 || status >= 500;
  }
  return true;
}

/**
 * Run `fn` up to `maxRetries` times. Each logical call gets one call group
 * id shared by all its attempts.
 */
export async function withRetries<T>(
  operation: string,
  options: RetryOptions,
  fn: (attempt: number, callGroupId: string) => Promise<T>
): Promise<T> {
  const callGroupId = generateId();
  const { maxRetries, retryDelayMs } = options;
  let lastError: unknown = null;

  for (let attempt = 1; attempt <= maxRetries; attempt++) {
    try {
      return await fn(attempt, callGroupId);
    } catch (error) {
      lastError = error;
      if (!isRetryable(error)) throw error;

      log(
        'warn',
        `[${operation}] Attempt ${attempt}/${maxRetries} failed: ${errorMessage(error)}`
      );

      if (attempt < maxRetries) {
        const retryAfter =
          error instanceof ProviderTransportError ? error.retryAfterMs : null;
        await sleep(retryAfter ?? retryDelayMs * attempt);
      }
    }
  }

  const message = `Request failed after ${maxRetries} retries: ${errorMessage(lastError)}`;
  if (lastError instanceof ProviderContentError) {
    throw new ProviderContentError(message, { cause: lastError });
  }
  if (lastError instanceof ProviderTransportError) {
    throw new ProviderTransportError(message, {
      cause: lastError,
      httpStatus: lastError.httpStatus,
    });
  }
  throw new ProviderError(message, { cause: lastError });
}

/**
 * Parse a model's JSON answer, tolerating ``` fences, and validate it.
 */
export function parseJsonContent<S extends z.ZodType>(
  content: string,
  schema: S,
  label: string
): z.infer<S> {
  let jsonStr = content.trim();
  if (jsonStr.startsWith('```')) {
    jsonStr = jsonStr.replace(/^```(?:json)?\n?/, '').replace(/\n?```$/, '');
  }

  let raw: unknown;
  try {
    raw = JSON.parse(jsonStr);
  } catch (error) {
    throw new ProviderContentError(
      `Invalid ${label} response: not JSON (${errorMessage(error)})`
    );
  }

  const result = schema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .slice(0, 3)
      .map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`)
      .join('; ');
    throw new ProviderContentError(`Invalid ${label} response: ${issues}`);
  }
  return result.data;
}
