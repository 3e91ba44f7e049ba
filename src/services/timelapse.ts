/**
 * Timelapse generation for timeline cards
 *
 * Runs after a batch has committed its cards. A failure leaves the card
 * without a video and is only logged.
 */

import { rm } from 'node:fs/promises';
import path from 'node:path';
import type {
  ChunkRepository,
  DbTimelineCard,
  TimelapseConfig,
  TimelineCardRepository,
  VideoService,
} from '../0_types.js';
import { errorMessage } from '../errors.js';
import { log } from '../pipeline/context.js';

export interface TimelapseService {
  timelapsePath(card: Pick<DbTimelineCard, 'id' | 'day'>): string;
  /** Resolves with the written path, or null when nothing was produced */
  generateForCard(card: DbTimelineCard): Promise<string | null>;
}

export interface TimelapseDeps {
  chunks: Pick<ChunkRepository, 'findOverlapping'>;
  cards: Pick<TimelineCardRepository, 'findById' | 'updateVideoSummaryPath'>;
  video: Pick<VideoService, 'stitch' | 'createTimelapse'>;
  timelapsesRoot: string;
  tmpDir: string;
  config: TimelapseConfig;
}

export function createTimelapseService(deps: TimelapseDeps): TimelapseService {
  const { chunks, cards, video, timelapsesRoot, tmpDir, config } = deps;

  function timelapsePath(card: Pick<DbTimelineCard, 'id' | 'day'>): string {
    return path.join(timelapsesRoot, card.day, `${card.id}.mp4`);
  }

  async function render(card: DbTimelineCard): Promise<string | null> {
    const sources = chunks.findOverlapping(card.start_ts, card.end_ts);
    if (sources.length === 0) {
      log('warn', `[timelapse] No chunks cover card ${card.id}`);
      return null;
    }

    const stitched = path.join(tmpDir, `timelapse-${card.id}.mp4`);
    const output = timelapsePath(card);
    try {
      await video.stitch(
        sources.map((c) => c.file_path),
        stitched
      );
      await video.createTimelapse(stitched, output, {
        speedMultiplier: config.speedMultiplier,
        fps: config.fps,
      });
    } finally {
      await rm(stitched, { force: true });
    }

    // The card may have been replaced while ffmpeg was running
    if (!cards.findById(card.id)) {
      await rm(output, { force: true });
      return null;
    }
    cards.updateVideoSummaryPath(card.id, output);
    return output;
  }

  return {
    timelapsePath,

    async generateForCard(card) {
      if (!config.enabled) return null;
      try {
        return await render(card);
      } catch (error) {
        log('warn', `[timelapse] Card ${card.id} failed: ${errorMessage(error)}`);
        return null;
      }
    },
  };
}
