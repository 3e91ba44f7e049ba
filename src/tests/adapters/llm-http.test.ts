import { afterEach, describe, expect, it, vi } from 'vitest';
import { z } from 'zod';
import {
  auditedFetch,
  createCallLog,
  dropAttempts,
  markLastAttemptFailed,
  parseJsonContent,
  redactHeaders,
  redactUrl,
  withRetries,
} from '../../adapters/llm-http.js';
import {
  ProviderContentError,
  ProviderTransportError,
} from '../../errors.js';

const originalFetch = global.fetch;

function callLog() {
  return createCallLog({ provider: 'gemini', model: 'gemini-2.5-flash', batchId: 'batch-1' });
}

const baseCall = {
  operation: 'generate_cards',
  callGroupId: 'group-1',
  attempt: 1,
  url: 'https://api.example.test/v1beta/models/m:generateContent?key=test-secret',
  method: 'POST' as const,
  headers: { 'x-goog-api-key': 'test-secret', 'Content-Type': 'application/json' },
  body: '{"contents":[]}',
  timeoutMs: 5000,
};

describe('redaction', () => {
  it('hides secret query parameters', () => {
    expect(redactUrl('https://api.example.test/v1?key=abc&alt=json')).toBe(
      'https://api.example.test/v1?key=REDACTED&alt=json'
    );
  });

  it('hides secret headers regardless of case', () => {
    expect(
      redactHeaders({ 'X-Goog-Api-Key': 'test-secret', Authorization: 'Bearer test-secret', Accept: '*/*' })
    ).toEqual({ 'X-Goog-Api-Key': 'REDACTED', Authorization: 'REDACTED', Accept: '*/*' });
  });
});

describe('auditedFetch', () => {
  afterEach(() => {
    global.fetch = originalFetch;
  });

  it('records a successful attempt with redacted request data', async () => {
    global.fetch = vi.fn().mockResolvedValue(
      new Response('{"ok":true}', { status: 200, headers: { 'content-type': 'application/json' } })
    );
    const log = callLog();

    const result = await auditedFetch(log, baseCall);

    expect(result.text).toBe('{"ok":true}');
    expect(log.calls).toHaveLength(1);
    expect(log.calls[0]).toMatchObject({
      batchId: 'batch-1',
      callGroupId: 'group-1',
      attempt: 1,
      provider: 'gemini',
      operation: 'generate_cards',
      status: 'success',
      httpStatus: 200,
      errorMessage: null,
      request: {
        method: 'POST',
        url: 'https://api.example.test/v1beta/models/m:generateContent?key=REDACTED',
        headers: { 'x-goog-api-key': 'REDACTED', 'Content-Type': 'application/json' },
        body: '{"contents":[]}',
      },
      response: { headers: { 'content-type': 'application/json' }, body: '{"ok":true}' },
    });
  });

  it('describes binary bodies instead of storing them', async () => {
    global.fetch = vi.fn().mockResolvedValue(new Response('{}', { status: 200 }));
    const log = callLog();

    await auditedFetch(log, { ...baseCall, body: new Uint8Array(2048) });

    expect(log.calls[0].request.body).toBe('<binary 2048 bytes>');
  });

  it('turns an HTTP error into a transport error carrying Retry-After', async () => {
    global.fetch = vi.fn().mockResolvedValue(
      new Response('slow down', { status: 429, headers: { 'retry-after': '3' } })
    );
    const log = callLog();

    const error = await auditedFetch(log, baseCall).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ProviderTransportError);
    if (!(error instanceof ProviderTransportError)) return;
    expect(error.message).toBe('gemini API error: 429 slow down');
    expect(error.httpStatus).toBe(429);
    expect(error.retryAfterMs).toBe(3000);
    expect(log.calls[0]).toMatchObject({
      status: 'failure',
      httpStatus: 429,
      errorMessage: 'gemini API error: 429 slow down',
    });
  });

  it('records network failures without a status', async () => {
    global.fetch = vi.fn().mockRejectedValue(new TypeError('fetch failed'));
    const log = callLog();

    await expect(auditedFetch(log, baseCall)).rejects.toThrow('fetch failed');
    expect(log.calls[0]).toMatchObject({
      status: 'failure',
      httpStatus: null,
      response: null,
      errorMessage: 'fetch failed',
    });
  });
});

describe('withRetries', () => {
  const retry = { maxRetries: 3, retryDelayMs: 0 };

  it('retries transient failures under one call group', async () => {
    const groups: string[] = [];
    const fn = vi.fn(async (attempt: number, callGroupId: string) => {
      groups.push(callGroupId);
      if (attempt < 3) throw new ProviderTransportError('fetch failed');
      return 'done';
    });

    await expect(withRetries('transcribe', retry, fn)).resolves.toBe('done');
    expect(fn).toHaveBeenCalledTimes(3);
    expect(new Set(groups).size).toBe(1);
  });

  it('does not retry client errors', async () => {
    const fn = vi.fn(async () => {
      throw new ProviderTransportError('gemini API error: 400 bad request', { httpStatus: 400 });
    });

    await expect(withRetries('transcribe', retry, fn)).rejects.toThrow(
      'gemini API error: 400 bad request'
    );
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('gives up after the last attempt and keeps the error kind', async () => {
    const fn = vi.fn(async () => {
      throw new ProviderContentError('Invalid transcribe response: not JSON');
    });

    const error = await withRetries('transcribe', { maxRetries: 2, retryDelayMs: 0 }, fn).catch(
      (e: unknown) => e
    );

    expect(error).toBeInstanceOf(ProviderContentError);
    expect(error).toHaveProperty(
      'message',
      'Request failed after 2 retries: Invalid transcribe response: not JSON'
    );
    expect(fn).toHaveBeenCalledTimes(2);
  });
});

describe('parseJsonContent', () => {
  const schema = z.object({ description: z.string() });

  it('strips code fences', () => {
    expect(parseJsonContent('```json\n{"description":"Editor"}\n```', schema, 'frame')).toEqual({
      description: 'Editor',
    });
  });

  it('rejects text that is not JSON', () => {
    expect(() => parseJsonContent('Sure! Here it is', schema, 'frame')).toThrow(
      /^Invalid frame response: not JSON/
    );
  });

  it('names the failing field', () => {
    expect(() => parseJsonContent('{"description":5}', schema, 'frame')).toThrow(
      /^Invalid frame response: description: /
    );
  });
});

describe('markLastAttemptFailed', () => {
  it('flags only the latest attempt of the group', async () => {
    global.fetch = vi.fn().mockImplementation(async () => new Response('{}', { status: 200 }));
    const log = callLog();
    await auditedFetch(log, baseCall);
    await auditedFetch(log, { ...baseCall, attempt: 2 });
    global.fetch = originalFetch;

    markLastAttemptFailed(log, 'group-1', 'Missing coverage');

    expect(log.calls.map((c) => [c.attempt, c.status, c.errorMessage])).toEqual([
      [1, 'success', null],
      [2, 'failure', 'Missing coverage'],
    ]);
  });
});

describe('dropAttempts', () => {
  it('forgets one group and keeps the rest in order', async () => {
    global.fetch = vi.fn().mockImplementation(async () => new Response('{}', { status: 200 }));
    const log = callLog();
    await auditedFetch(log, { ...baseCall, callGroupId: 'files/abc', operation: 'file_status' });
    await auditedFetch(log, baseCall);
    await auditedFetch(log, { ...baseCall, callGroupId: 'files/abc', operation: 'file_status', attempt: 2 });
    global.fetch = originalFetch;

    dropAttempts(log, 'files/abc');

    expect(log.calls.map((c) => [c.callGroupId, c.attempt])).toEqual([['group-1', 1]]);
  });
});
