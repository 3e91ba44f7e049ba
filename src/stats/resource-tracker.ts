import pidusage from 'pidusage';
import type {
  ResourceSnapshot,
  ResourceStats,
  ResourceTrackable,
} from './types.js';

interface Samples {
  memories: number[];
  cpus: number[];
}

/**
 * Samples memory/CPU of registered processes between start() and stop().
 * Steps nest, so start() while running only bumps a depth counter and the
 * outermost stop() produces the snapshot.
 */
export class ResourceTracker {
  private resources = new Map<string, ResourceTrackable>();
  private samples = new Map<string, Samples>();
  private interval: NodeJS.Timeout | null = null;
  private depth = 0;

  constructor(private readonly intervalMs = 1000) {
    this.register({
      getResourceName: () => 'nodejs',
      getPid: () => process.pid,
    });
  }

  register(resource: ResourceTrackable): void {
    const name = resource.getResourceName();
    if (!this.resources.has(name)) {
      this.resources.set(name, resource);
      this.samples.set(name, { memories: [], cpus: [] });
    }
  }

  async start(): Promise<void> {
    this.depth++;
    if (this.depth > 1) return;

    await this.sample();
    this.interval = setInterval(() => {
      this.sample().catch((error: unknown) => {
        console.warn(`[resources] Sampling failed: ${String(error)}`);
      });
    }, this.intervalMs);
    this.interval.unref();
  }

  private async sample(): Promise<void> {
    for (const [name, resource] of this.resources) {
      const pid = resource.getPid();
      if (!pid) continue;

      const stats = await pidusage(pid).catch(() => null);
      // null: the process exited between getPid() and the sample
      if (!stats) continue;

      const sample = this.samples.get(name);
      if (sample) {
        sample.memories.push(stats.memory / 1024 / 1024);
        sample.cpus.push(stats.cpu);
      }
    }
  }

  stop(): ResourceSnapshot | undefined {
    if (this.depth === 0) return undefined;
    this.depth--;
    if (this.depth > 0) return undefined;

    if (this.interval) {
      clearInterval(this.interval);
      this.interval = null;
    }

    const result: ResourceSnapshot = {};
    for (const [name, sample] of this.samples) {
      const stats = summarize(sample);
      if (stats) result[name] = stats;
      this.samples.set(name, { memories: [], cpus: [] });
    }
    return result;
  }
}

function summarize(sample: Samples): ResourceStats | null {
  if (sample.memories.length === 0) return null;
  const avg = (values: number[]) =>
    values.reduce((a, b) => a + b, 0) / values.length;

  return {
    peakMemoryMB: Math.round(Math.max(...sample.memories)),
    avgMemoryMB: Math.round(avg(sample.memories)),
    peakCpuPercent: Math.round(Math.max(...sample.cpus) * 10) / 10,
    avgCpuPercent: Math.round(avg(sample.cpus) * 10) / 10,
    sampleCount: sample.memories.length,
  };
}
