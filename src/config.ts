/**
 * Configuration
 *
 * Defaults live in the zod schemas; the environment only overrides them.
 */

import { homedir } from 'node:os';
import path from 'node:path';
import { type AppConfig, appConfigSchema } from './0_types.js';
import { ConfigError } from './errors.js';

type Env = Record<string, string | undefined>;

function num(value: string | undefined): number | undefined {
  return value === undefined || value === '' ? undefined : Number(value);
}

function bool(value: string | undefined): boolean | undefined {
  if (value === undefined || value === '') return undefined;
  return value === 'true' || value === '1';
}

function expandHome(p: string | undefined): string | undefined {
  if (!p) return undefined;
  return p === '~' || p.startsWith('~/') ? path.join(homedir(), p.slice(1)) : p;
}

function providerFromEnv(env: Env): Record<string, unknown> {
  const provider = env.TIMEWEAVE_PROVIDER ?? 'ollama';
  if (provider === 'gemini') {
    return {
      provider,
      apiKey: env.TIMEWEAVE_GEMINI_API_KEY,
      endpoint: env.TIMEWEAVE_GEMINI_ENDPOINT,
      model: env.TIMEWEAVE_GEMINI_MODEL,
      maxRetries: num(env.TIMEWEAVE_MAX_RETRIES),
      upload: {
        timeoutMs: num(env.TIMEWEAVE_UPLOAD_TIMEOUT_MS),
      },
    };
  }
  return {
    provider,
    endpoint: env.TIMEWEAVE_OLLAMA_ENDPOINT,
    model: env.TIMEWEAVE_OLLAMA_MODEL,
    maxRetries: num(env.TIMEWEAVE_MAX_RETRIES),
    keepAlive: env.TIMEWEAVE_OLLAMA_KEEP_ALIVE,
    frameIntervalSeconds: num(env.TIMEWEAVE_FRAME_INTERVAL_SECONDS),
    frameConcurrency: num(env.TIMEWEAVE_FRAME_CONCURRENCY),
  };
}

/**
 * Build the app config from TIMEWEAVE_* variables.
 *
 * @throws ConfigError listing every invalid setting
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const result = appConfigSchema.safeParse({
    storage: {
      dataDir: expandHome(env.TIMEWEAVE_DATA_DIR),
      quotaBytes: num(env.TIMEWEAVE_QUOTA_BYTES),
    },
    scheduler: {
      intervalMs: num(env.TIMEWEAVE_INTERVAL_MS),
      lookbackSeconds: num(env.TIMEWEAVE_LOOKBACK_SECONDS),
    },
    timelapse: {
      enabled: bool(env.TIMEWEAVE_TIMELAPSE),
    },
    provider: providerFromEnv(env),
  });

  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `  ${i.path.join('.') || '(root)'}: ${i.message}`)
      .join('\n');
    throw new ConfigError(`Invalid configuration:\n${issues}`);
  }
  return result.data;
}

export interface DataPaths {
  dataDir: string;
  recordingsRoot: string;
  timelapsesRoot: string;
  tmpDir: string;
}

export function dataPaths(config: AppConfig): DataPaths {
  const { dataDir } = config.storage;
  return {
    dataDir,
    recordingsRoot: path.join(dataDir, 'recordings'),
    timelapsesRoot: path.join(dataDir, 'timelapses'),
    tmpDir: path.join(dataDir, 'tmp'),
  };
}
