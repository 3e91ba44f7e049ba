import { homedir } from 'node:os';
import { join } from 'node:path';
import { describe, expect, it } from 'vitest';
import { dataPaths, loadConfig } from '../config.js';
import { ConfigError } from '../errors.js';

describe('loadConfig', () => {
  it('fills every setting from defaults', () => {
    const config = loadConfig({});

    expect(config.storage.quotaBytes).toBe(5 * 1024 ** 3);
    expect(config.storage.purgeLimit).toBe(10);
    expect(config.batching).toEqual({
      maxGapSeconds: 120,
      targetBatchDuration: 900,
      minBatchDuration: 300,
    });
    expect(config.scheduler.intervalMs).toBe(60_000);
    expect(config.scheduler.lookbackSeconds).toBe(86_400);
    expect(config.timelapse).toEqual({ enabled: true, speedMultiplier: 20, fps: 24 });
    expect(config.provider.provider).toBe('ollama');
    expect(config.categories[0].name).toBe('Work');
  });

  it('reads the gemini provider from the environment', () => {
    const config = loadConfig({
      TIMEWEAVE_PROVIDER: 'gemini',
      TIMEWEAVE_GEMINI_API_KEY: 'test-secret',
      TIMEWEAVE_UPLOAD_TIMEOUT_MS: '60000',
    });

    expect(config.provider).toMatchObject({
      provider: 'gemini',
      apiKey: 'test-secret',
      model: 'gemini-2.5-flash',
      upload: { timeoutMs: 60_000, pollIntervalMs: 2000 },
    });
  });

  it('requires an API key for gemini', () => {
    expect(() => loadConfig({ TIMEWEAVE_PROVIDER: 'gemini' })).toThrow(ConfigError);
    expect(() => loadConfig({ TIMEWEAVE_PROVIDER: 'gemini' })).toThrow(/provider\.apiKey/);
  });

  it('rejects non-numeric numbers', () => {
    expect(() => loadConfig({ TIMEWEAVE_QUOTA_BYTES: 'lots' })).toThrow(/storage\.quotaBytes/);
  });

  it('expands ~ in the data directory and derives the paths', () => {
    const config = loadConfig({ TIMEWEAVE_DATA_DIR: '~/tw', TIMEWEAVE_TIMELAPSE: 'false' });

    expect(config.timelapse.enabled).toBe(false);
    expect(dataPaths(config)).toEqual({
      dataDir: join(homedir(), 'tw'),
      recordingsRoot: join(homedir(), 'tw', 'recordings'),
      timelapsesRoot: join(homedir(), 'tw', 'timelapses'),
      tmpDir: join(homedir(), 'tw', 'tmp'),
    });
  });
});
