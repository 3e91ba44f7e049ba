/**
 * Something whose OS process can be sampled while a step runs
 * (the node process itself, an ffmpeg child).
 */
export interface ResourceTrackable {
  getResourceName(): string;
  getPid(): number | null;
}

export interface ResourceStats {
  peakMemoryMB: number;
  avgMemoryMB: number;
  peakCpuPercent: number;
  avgCpuPercent: number;
  sampleCount: number;
}

export interface ResourceSnapshot {
  [resourceName: string]: ResourceStats;
}
