/**
 * timeweave - Analysis provider factory
 */

import type { AnalysisProvider, ProviderConfig, VideoService } from '../0_types.js';
import { type GeminiProviderDeps, createGeminiProvider } from './provider.gemini.adapter.js';
import { createOllamaProvider } from './provider.ollama.adapter.js';

export interface ProviderDeps extends GeminiProviderDeps {
  video: Pick<VideoService, 'sampleFrames'>;
  tmpDir: string;
}

export function createAnalysisProvider(
  config: ProviderConfig,
  deps: ProviderDeps
): AnalysisProvider {
  switch (config.provider) {
    case 'gemini':
      return createGeminiProvider(config, { clock: deps.clock, signal: deps.signal });
    case 'ollama':
      return createOllamaProvider(config, { video: deps.video, tmpDir: deps.tmpDir });
  }
}
