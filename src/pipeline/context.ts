import { AsyncLocalStorage } from 'node:async_hooks';
import { performance } from 'node:perf_hooks';
import { generateId } from '../db/helpers.js';
import type { ResourceTracker } from '../stats/resource-tracker.js';
import type { ResourceSnapshot } from '../stats/types.js';

export type RunKind = 'scheduled' | 'reprocess' | 'manual';

export interface StepResult {
  name: string;
  durationMs: number;
  status: 'success' | 'error';
  error?: string;
  resources?: ResourceSnapshot;
}

export interface PipelineState {
  label: string;
  runId: string;
  kind: RunKind;
  steps: StepResult[];
  verbose: boolean;
  startTime: number;
}

const storage = new AsyncLocalStorage<PipelineState>();
let resourceTracker: ResourceTracker | null = null;

const DEBUG_LLM = process.env.TIMEWEAVE_DEBUG_LLM === 'true';

export function setResourceTracker(tracker: ResourceTracker | null): void {
  resourceTracker = tracker;
}

/**
 * Request/response tracing for provider calls.
 */
export function debugLog(scope: string, ...args: unknown[]): void {
  if (DEBUG_LLM) {
    console.log(`[${scope}]`, ...args);
  }
}

export function withPipeline<T>(
  label: string,
  kind: RunKind,
  fn: () => Promise<T>
): Promise<T> {
  const state: PipelineState = {
    label,
    runId: generateId(),
    kind,
    steps: [],
    verbose: process.env.TIMEWEAVE_VERBOSE === 'true',
    startTime: performance.now(),
  };

  console.log(`\n🚀 Run: [${label}] (${kind})`);

  return storage.run(state, async () => {
    try {
      const result = await fn();
      printSummary(state, 'completed');
      return result;
    } catch (error) {
      printSummary(state, 'failed');
      throw error;
    }
  });
}

export interface StepOptions {
  itemsTotal?: number;
}

export async function step<T>(
  name: string,
  fn: () => Promise<T>,
  options?: StepOptions
): Promise<T> {
  const state = storage.getStore();
  if (!state) return fn();

  const start = performance.now();

  if (state.verbose) {
    console.log(`  ▶ ${name}`);
  }

  await resourceTracker?.start();

  try {
    const result = await fn();
    const durationMs = performance.now() - start;
    const resources = resourceTracker?.stop();
    state.steps.push({ name, durationMs, status: 'success', resources });

    const itemsProcessed = Array.isArray(result) ? result.length : undefined;
    const itemsInfo = options?.itemsTotal
      ? ` (${itemsProcessed ?? options.itemsTotal}/${options.itemsTotal})`
      : itemsProcessed
        ? ` (${itemsProcessed})`
        : '';

    if (!state.verbose) {
      console.log(
        `  ✅ ${name.padEnd(30, '.')} ${(durationMs / 1000).toFixed(1)}s${itemsInfo}`
      );
    } else {
      console.log(
        `  ✅ ${name} completed in ${(durationMs / 1000).toFixed(1)}s${itemsInfo}${formatResources(resources)}`
      );
    }

    return result;
  } catch (error) {
    const durationMs = performance.now() - start;
    const message = error instanceof Error ? error.message : String(error);
    const resources = resourceTracker?.stop();
    state.steps.push({
      name,
      durationMs,
      status: 'error',
      error: message,
      resources,
    });

    console.error(
      `  ❌ ${name} failed after ${(durationMs / 1000).toFixed(1)}s: ${message}`
    );
    throw error;
  }
}

export function log(
  level: 'debug' | 'info' | 'warn' | 'error',
  message: string
): void {
  const state = storage.getStore();
  if (!state) {
    if (level === 'debug' && process.env.TIMEWEAVE_VERBOSE !== 'true') return;
    if (level === 'error') console.error(message);
    else if (level === 'warn') console.warn(message);
    else console.log(message);
    return;
  }

  if (level === 'debug' && !state.verbose) return;

  const prefix = level === 'info' ? '    ' : `    [${level}] `;
  if (level === 'error') console.error(`${prefix}${message}`);
  else console.log(`${prefix}${message}`);
}

function formatResources(resources: ResourceSnapshot | undefined): string {
  const node = resources?.nodejs;
  if (!node) return '';
  return ` [mem ${node.peakMemoryMB}MB, cpu ${node.avgCpuPercent}%]`;
}

function printSummary(state: PipelineState, outcome: 'completed' | 'failed') {
  const totalDuration = (performance.now() - state.startTime) / 1000;
  const failedSteps = state.steps.filter((s) => s.status === 'error').length;
  console.log('─'.repeat(50));
  console.log(
    `🏁 Run ${outcome === 'completed' ? 'Finished' : 'Failed'}: [${state.label}]`
  );
  console.log(
    `📊 Total Duration: ${totalDuration.toFixed(1)}s, ${state.steps.length} steps${failedSteps ? `, ${failedSteps} failed` : ''}`
  );
  console.log('─'.repeat(50));
}
