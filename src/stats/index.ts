export { ResourceTracker } from './resource-tracker.js';
export type {
  ResourceSnapshot,
  ResourceStats,
  ResourceTrackable,
} from './types.js';
