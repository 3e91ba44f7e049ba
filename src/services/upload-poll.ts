/**
 * Upload / poll protocol
 *
 * Three phases for providers that process files asynchronously:
 * start a session, upload the file, then poll until the remote side
 * reports the file ready or failed, or the deadline passes.
 */

import { setTimeout as sleep } from 'node:timers/promises';
import { RemoteProcessingError, UploadTimeoutError } from '../errors.js';

export type RemoteFileState<TFile> =
  | { state: 'processing' }
  | { state: 'ready'; file: TFile }
  | { state: 'failed'; remoteState: string; detail?: string };

export interface UploadPollProtocol<TSession, TFile> {
  startSession(): Promise<TSession>;
  upload(session: TSession): Promise<TFile>;
  poll(file: TFile): Promise<RemoteFileState<TFile>>;
}

export interface PollClock {
  now(): number;
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

export const systemClock: PollClock = {
  now: () => Date.now(),
  sleep: async (ms, signal) => {
    await sleep(ms, undefined, { signal });
  },
};

export interface UploadPollOptions {
  timeoutMs: number;
  pollIntervalMs: number;
  signal?: AbortSignal;
  clock?: PollClock;
  onPoll?: (attempt: number, elapsedMs: number) => void;
}

/**
 * Run the protocol and resolve with the ready file.
 *
 * @throws UploadTimeoutError when the file is still processing at the deadline
 * @throws RemoteProcessingError when the remote side reports failure
 */
export async function uploadAndAwaitReady<TSession, TFile>(
  protocol: UploadPollProtocol<TSession, TFile>,
  options: UploadPollOptions
): Promise<TFile> {
  const clock = options.clock ?? systemClock;

  const session = await protocol.startSession();
  const uploaded = await protocol.upload(session);

  const startedAt = clock.now();
  let attempt = 0;

  for (;;) {
    options.signal?.throwIfAborted();
    attempt++;

    const status = await protocol.poll(uploaded);
    const elapsed = clock.now() - startedAt;
    options.onPoll?.(attempt, elapsed);

    if (status.state === 'ready') return status.file;
    if (status.state === 'failed') {
      throw new RemoteProcessingError(status.remoteState, status.detail);
    }
    if (elapsed >= options.timeoutMs) {
      throw new UploadTimeoutError(options.timeoutMs);
    }

    await clock.sleep(options.pollIntervalMs, options.signal);
  }
}
