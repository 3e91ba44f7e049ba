#!/usr/bin/env node
/**
 * timeweave CLI Entry Point
 *
 * Commands:
 *   run                        Analyse on a timer until interrupted
 *   once                       One scheduler pass, then exit
 *   ingest <file> --start <ts> Register a finished recording chunk
 *   reprocess --day <day>      Redo a logical day
 *   reprocess --batches <ids>  Redo specific batches
 *   status                     Print chunk and batch counts
 */

import path from 'node:path';
import type { AppConfig } from './0_types.js';
import { type AnalysisScheduler, createAnalysisScheduler } from './actions/analysis-scheduler.js';
import {
  type ReprocessProgress,
  type ReprocessSummary,
  createReprocessor,
} from './actions/reprocess.js';
import { createAnalysisProvider } from './adapters/provider.adapter.js';
import { createFfmpegVideoService } from './adapters/video.ffmpeg.adapter.js';
import { type DataPaths, dataPaths, loadConfig } from './config.js';
import { closeDb, getDbPath, getRepositories } from './db/index.js';
import { isLogicalDay } from './domain/logical-day.js';
import { errorMessage } from './errors.js';
import { log, setResourceTracker } from './pipeline/context.js';
import { createChunkStore } from './services/chunk-store.js';
import { createTimelapseService } from './services/timelapse.js';
import { ResourceTracker } from './stats/index.js';

interface ParsedArgs {
  command: string | null;
  positional: string[];
  flags: Map<string, string | true>;
}

function main(): void {
  const args = parseArgs(process.argv.slice(2));

  if (!args.command || args.flags.has('help') || args.command === 'help') {
    showHelp();
    process.exit(0);
  }

  run(args)
    .then(() => {
      closeDb();
    })
    .catch((error: unknown) => {
      console.error('Error:', errorMessage(error));
      if (process.env.TIMEWEAVE_VERBOSE === 'true' && error instanceof Error) {
        console.error(error.stack);
      }
      closeDb();
      process.exit(1);
    });
}

function parseArgs(argv: string[]): ParsedArgs {
  const flags = new Map<string, string | true>();
  const positional: string[] = [];

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === '-h') {
      flags.set('help', true);
    } else if (arg.startsWith('--')) {
      const name = arg.slice(2);
      const next = argv[i + 1];
      if (next !== undefined && !next.startsWith('--')) {
        flags.set(name, next);
        i++;
      } else {
        flags.set(name, true);
      }
    } else {
      positional.push(arg);
    }
  }

  return { command: positional.shift() ?? null, positional, flags };
}

function showHelp(): void {
  console.log(`
timeweave - screen recording timeline analysis

Usage:
  timeweave run                               Analyse new chunks every minute
  timeweave once                              Run one analysis pass and exit
  timeweave ingest <file> --start <unix-ts>   Register a recorded chunk
  timeweave reprocess --day YYYY-MM-DD        Reprocess a logical day (04:00 to 04:00)
  timeweave reprocess --batches id1,id2       Reprocess specific batches
  timeweave status                            Show chunk and batch counts

Environment:
  TIMEWEAVE_PROVIDER          gemini | ollama (default ollama)
  TIMEWEAVE_GEMINI_API_KEY    API key for the gemini provider
  TIMEWEAVE_OLLAMA_ENDPOINT   Ollama chat endpoint
  TIMEWEAVE_DATA_DIR          Data directory (default ~/.timeweave)
  TIMEWEAVE_VERBOSE=true      Verbose step output
  TIMEWEAVE_DEBUG_LLM=true    Trace provider HTTP calls
`);
}

function stringFlag(args: ParsedArgs, name: string): string | null {
  const value = args.flags.get(name);
  return typeof value === 'string' ? value : null;
}

function buildApp(config: AppConfig, paths: DataPaths) {
  const repos = getRepositories(paths.dataDir);
  const video = createFfmpegVideoService();
  const controller = new AbortController();

  const tracker = new ResourceTracker();
  tracker.register(video);
  setResourceTracker(tracker);

  const chunkStore = createChunkStore({
    chunks: repos.chunks,
    recordingsRoot: paths.recordingsRoot,
    quotaBytes: config.storage.quotaBytes,
    purgeLimit: config.storage.purgeLimit,
  });

  const provider = createAnalysisProvider(config.provider, {
    video,
    tmpDir: paths.tmpDir,
    signal: controller.signal,
  });

  const timelapses = createTimelapseService({
    chunks: repos.chunks,
    cards: repos.cards,
    video,
    timelapsesRoot: paths.timelapsesRoot,
    tmpDir: paths.tmpDir,
    config: config.timelapse,
  });

  const scheduler = createAnalysisScheduler(
    {
      repos,
      chunkStore,
      provider,
      video,
      timelapses,
      categories: config.categories,
      tmpDir: paths.tmpDir,
      controller,
    },
    { batching: config.batching, scheduler: config.scheduler }
  );

  return { repos, video, chunkStore, scheduler };
}

async function run(args: ParsedArgs): Promise<void> {
  const config = loadConfig();
  const paths = dataPaths(config);
  const app = buildApp(config, paths);
  log('debug', `Database: ${getDbPath()}`);

  switch (args.command) {
    case 'run':
      return runForever(app.scheduler);

    case 'once': {
      const result = await app.scheduler.runOnce();
      await app.scheduler.idle();
      if (!result.skipped) {
        console.log(`Created ${result.created} batches`);
        for (const outcome of result.outcomes) {
          console.log(
            `  ${outcome.batchId} ${outcome.status}${outcome.reason ? `: ${outcome.reason}` : ''}`
          );
        }
      }
      return;
    }

    case 'ingest': {
      const file = args.positional[0];
      const start = Number(stringFlag(args, 'start'));
      if (!file || !Number.isFinite(start)) {
        throw new Error('Usage: timeweave ingest <file> --start <unix-ts>');
      }
      const filePath = path.resolve(file);
      const duration = await app.video.getDuration(filePath);
      const chunk = app.chunkStore.registerChunk(filePath, start, Math.round(start + duration));
      app.chunkStore.markChunkCompleted(chunk.id, Math.round(start + duration));
      await app.chunkStore.idle();
      console.log(`Registered chunk ${chunk.id} (${duration.toFixed(1)}s)`);
      return;
    }

    case 'reprocess': {
      const reprocessor = createReprocessor({
        repos: app.repos,
        scheduler: app.scheduler,
        config: config.reprocess,
      });
      const onProgress = (p: ReprocessProgress) => {
        if (p.phase !== 'done') console.log(p.message);
      };

      const day = stringFlag(args, 'day');
      const batches = stringFlag(args, 'batches');
      let summary: ReprocessSummary;
      if (day) {
        if (!isLogicalDay(day)) throw new Error(`Invalid day "${day}". Expected YYYY-MM-DD.`);
        summary = await reprocessor.reprocessDay(day, onProgress);
      } else if (batches) {
        const ids = batches.split(',').map((id) => id.trim()).filter(Boolean);
        summary = await reprocessor.reprocessSpecificBatches(ids, onProgress);
      } else {
        throw new Error('Usage: timeweave reprocess --day YYYY-MM-DD | --batches id1,id2');
      }
      await app.scheduler.idle();
      console.log(summary.text);
      if (summary.failed > 0) process.exitCode = 1;
      return;
    }

    case 'status': {
      console.log(`Database: ${getDbPath()}`);
      console.log('Chunks:', app.repos.chunks.countByStatus());
      console.log('Batches:', app.repos.batches.countByStatus());
      for (const batch of app.repos.batches.findRecent(10)) {
        const started = new Date(batch.batch_start_ts * 1000).toLocaleString();
        console.log(
          `  ${batch.id} ${started} ${batch.status}${batch.reason ? ` (${batch.reason})` : ''}`
        );
      }
      return;
    }

    default:
      throw new Error(`Unknown command "${args.command}". Run timeweave --help.`);
  }
}

async function runForever(scheduler: AnalysisScheduler): Promise<void> {
  console.log('Analysis scheduler started. Press Ctrl+C to stop.');
  scheduler.start();

  await new Promise<void>((resolve) => {
    const shutdown = () => {
      console.log('\nStopping...');
      scheduler.stop();
      resolve();
    };
    process.once('SIGINT', shutdown);
    process.once('SIGTERM', shutdown);
  });

  await scheduler.idle();
}

main();
