import { describe, expect, it, vi } from 'vitest';
import { RemoteProcessingError, UploadTimeoutError } from '../../errors.js';
import {
  type PollClock,
  type RemoteFileState,
  uploadAndAwaitReady,
} from '../../services/upload-poll.js';

/** Clock whose time only moves when someone sleeps */
function fakeClock(): PollClock & { elapsed: () => number } {
  let t = 0;
  return {
    now: () => t,
    sleep: vi.fn(async (ms: number) => {
      t += ms;
    }),
    elapsed: () => t,
  };
}

function protocolWith(states: RemoteFileState<string>[]) {
  const poll = vi.fn(async () => states.shift() ?? { state: 'processing' as const });
  return {
    startSession: vi.fn(async () => 'session-1'),
    upload: vi.fn(async (session: string) => `files/${session}`),
    poll,
  };
}

const options = { timeoutMs: 300_000, pollIntervalMs: 2000 };

describe('uploadAndAwaitReady', () => {
  it('runs start, upload and poll in order and returns the ready file', async () => {
    const clock = fakeClock();
    const protocol = protocolWith([
      { state: 'processing' },
      { state: 'processing' },
      { state: 'ready', file: 'files/session-1' },
    ]);

    const file = await uploadAndAwaitReady(protocol, { ...options, clock });

    expect(file).toBe('files/session-1');
    expect(protocol.upload).toHaveBeenCalledWith('session-1');
    expect(protocol.poll).toHaveBeenCalledTimes(3);
    expect(protocol.poll).toHaveBeenCalledWith('files/session-1');
    expect(clock.elapsed()).toBe(4000);
  });

  it('times out after five minutes of processing', async () => {
    const clock = fakeClock();
    const protocol = protocolWith([]);

    const error = await uploadAndAwaitReady(protocol, {
      ...options,
      clock,
    }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(UploadTimeoutError);
    expect(error).not.toBeInstanceOf(RemoteProcessingError);
    expect(error).toHaveProperty(
      'message',
      'File processing timed out after 300s'
    );
    // polls at t = 0, 2s, ..., 300s
    expect(protocol.poll).toHaveBeenCalledTimes(151);
    expect(clock.elapsed()).toBe(300_000);
  });

  it('reports remote failure as its own error kind', async () => {
    const clock = fakeClock();
    const protocol = protocolWith([
      { state: 'processing' },
      { state: 'failed', remoteState: 'FAILED', detail: 'unsupported codec' },
    ]);

    const error = await uploadAndAwaitReady(protocol, {
      ...options,
      clock,
    }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RemoteProcessingError);
    expect(error).not.toBeInstanceOf(UploadTimeoutError);
    expect(error).toHaveProperty('kind', 'remote_failure');
    expect(error).toHaveProperty(
      'message',
      'Remote file processing failed (state: FAILED): unsupported codec'
    );
  });

  it('stops polling when the signal is aborted', async () => {
    const controller = new AbortController();
    const clock = fakeClock();
    const protocol = protocolWith([]);
    protocol.poll.mockImplementation(async () => {
      controller.abort();
      return { state: 'processing' as const };
    });

    await expect(
      uploadAndAwaitReady(protocol, {
        ...options,
        clock,
        signal: controller.signal,
      })
    ).rejects.toThrow();
    expect(protocol.poll).toHaveBeenCalledTimes(1);
  });

  it('does not poll when the upload itself fails', async () => {
    const protocol = protocolWith([]);
    protocol.upload.mockRejectedValueOnce(new Error('connection reset'));

    await expect(
      uploadAndAwaitReady(protocol, { ...options, clock: fakeClock() })
    ).rejects.toThrow('connection reset');
    expect(protocol.poll).not.toHaveBeenCalled();
  });
});
