/**
 * Error types
 *
 * Provider failures carry the audit records of every attempt made before
 * the failure, so a failed batch still leaves its call trail behind.
 */

import type { LlmCallRecord } from './0_types.js';

export class TimeweaveError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TimeweaveError';
  }
}

export class ConfigError extends TimeweaveError {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export type ProviderErrorKind =
  | 'transport'
  | 'content'
  | 'upload_timeout'
  | 'remote_failure'
  | 'unknown';

export class ProviderError extends TimeweaveError {
  readonly kind: ProviderErrorKind = 'unknown';
  calls: LlmCallRecord[];

  constructor(
    message: string,
    options: { calls?: LlmCallRecord[]; cause?: unknown } = {}
  ) {
    super(message, { cause: options.cause });
    this.name = 'ProviderError';
    this.calls = options.calls ?? [];
  }
}

/**
 * Network failure, HTTP error status or request timeout.
 */
export class ProviderTransportError extends ProviderError {
  override readonly kind = 'transport';
  readonly httpStatus: number | null;
  readonly retryAfterMs: number | null;

  constructor(
    message: string,
    options: {
      calls?: LlmCallRecord[];
      cause?: unknown;
      httpStatus?: number | null;
      retryAfterMs?: number | null;
    } = {}
  ) {
    super(message, options);
    this.name = 'ProviderTransportError';
    this.httpStatus = options.httpStatus ?? null;
    this.retryAfterMs = options.retryAfterMs ?? null;
  }
}

/**
 * The provider answered, but the payload did not parse or validate.
 */
export class ProviderContentError extends ProviderError {
  override readonly kind = 'content';

  constructor(
    message: string,
    options: { calls?: LlmCallRecord[]; cause?: unknown } = {}
  ) {
    super(message, options);
    this.name = 'ProviderContentError';
  }
}

export class UploadTimeoutError extends ProviderError {
  override readonly kind = 'upload_timeout';

  constructor(
    readonly timeoutMs: number,
    options: { calls?: LlmCallRecord[] } = {}
  ) {
    super(
      `File processing timed out after ${Math.round(timeoutMs / 1000)}s`,
      options
    );
    this.name = 'UploadTimeoutError';
  }
}

export class RemoteProcessingError extends ProviderError {
  override readonly kind = 'remote_failure';

  constructor(
    readonly remoteState: string,
    detail?: string,
    options: { calls?: LlmCallRecord[] } = {}
  ) {
    super(
      `Remote file processing failed (state: ${remoteState})${detail ? `: ${detail}` : ''}`,
      options
    );
    this.name = 'RemoteProcessingError';
  }
}

/**
 * Attach the call trail to an error escaping a provider operation.
 */
export function withCalls(
  error: unknown,
  calls: LlmCallRecord[]
): ProviderError {
  if (error instanceof ProviderError) {
    error.calls = calls;
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new ProviderError(message, { calls, cause: error });
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
