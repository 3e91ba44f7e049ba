/**
 * FFmpeg Adapter
 *
 * Stitches chunks into one batch video, samples frames for the decomposed
 * provider and renders sped-up timelapses for timeline cards.
 */

import { type ChildProcess, execFile, spawn } from 'node:child_process';
import { mkdir, readdir, rm, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { promisify } from 'node:util';
import { z } from 'zod';
import type { SampledFrame, VideoService } from '../0_types.js';
import { debugLog } from '../pipeline/context.js';
import type { ResourceTrackable } from '../stats/types.js';

const execFileAsync = promisify(execFile);

const FRAME_WIDTH = Number(process.env.TIMEWEAVE_FRAME_WIDTH) || 1280;

const formatInfoSchema = z.object({
  format: z.object({ duration: z.string().optional() }).optional(),
});

/**
 * Creates a VideoService that uses FFmpeg CLI
 */
export function createFfmpegVideoService(
  options: { ffmpegPath?: string; ffprobePath?: string } = {}
): VideoService & ResourceTrackable {
  const ffmpeg = options.ffmpegPath ?? 'ffmpeg';
  const ffprobe = options.ffprobePath ?? 'ffprobe';
  let currentProcess: ChildProcess | null = null;

  function run(args: string[], label: string): Promise<void> {
    debugLog('ffmpeg', `${label}: ${ffmpeg} ${args.join(' ')}`);

    return new Promise<void>((resolve, reject) => {
      const child = spawn(ffmpeg, ['-hide_banner', '-loglevel', 'error', ...args]);
      currentProcess = child;
      let stderr = '';

      child.stderr?.on('data', (data: Buffer) => {
        stderr += data.toString();
      });

      child.on('close', (code) => {
        currentProcess = null;
        if (code === 0) {
          resolve();
        } else {
          reject(
            new Error(`${label} failed with code ${code}: ${stderr.trim().slice(-500)}`)
          );
        }
      });

      child.on('error', (err) => {
        currentProcess = null;
        reject(new Error(`${label} could not start ${ffmpeg}: ${err.message}`));
      });
    });
  }

  return {
    /**
     * Concatenate chunk files (same codec) without re-encoding.
     */
    stitch: async (inputPaths, outputPath) => {
      if (inputPaths.length === 0) {
        throw new Error('Cannot stitch an empty chunk list');
      }
      await mkdir(path.dirname(outputPath), { recursive: true });

      // concat demuxer list; single quotes escaped per ffmpeg's quoting rules
      const listPath = `${outputPath}.txt`;
      const list = inputPaths
        .map((p) => `file '${path.resolve(p).replace(/'/g, "'\\''")}'`)
        .join('\n');
      await writeFile(listPath, list, 'utf-8');

      try {
        await run(
          ['-f', 'concat', '-safe', '0', '-i', listPath, '-c', 'copy', '-y', outputPath],
          'Stitch'
        );
      } finally {
        await rm(listPath, { force: true });
      }
      return outputPath;
    },

    getDuration: async (videoPath) => {
      try {
        const { stdout } = await execFileAsync(ffprobe, [
          '-v',
          'error',
          '-show_entries',
          'format=duration',
          '-of',
          'json',
          videoPath,
        ]);
        const data = formatInfoSchema.parse(JSON.parse(stdout));
        return Number.parseFloat(data.format?.duration ?? '0') || 0;
      } catch (error) {
        throw new Error(
          `Failed to get video duration: ${error instanceof Error ? error.message : String(error)}`
        );
      }
    },

    /**
     * One frame every `intervalSeconds`, starting at 0.
     */
    sampleFrames: async (videoPath, intervalSeconds, outputDir) => {
      await rm(outputDir, { recursive: true, force: true });
      await mkdir(outputDir, { recursive: true });

      await run(
        [
          '-i',
          videoPath,
          '-vf',
          `fps=1/${intervalSeconds},scale=${FRAME_WIDTH}:-2`,
          '-q:v',
          '4',
          '-y',
          path.join(outputDir, 'frame_%05d.jpg'),
        ],
        'Frame sampling'
      );

      const files = (await readdir(outputDir))
        .filter((f) => f.startsWith('frame_') && f.endsWith('.jpg'))
        .sort();

      // fps filter emits frame N at (N - 1) * interval
      return files.map(
        (file, index): SampledFrame => ({
          path: path.join(outputDir, file),
          timestamp: index * intervalSeconds,
        })
      );
    },

    createTimelapse: async (inputPath, outputPath, { speedMultiplier, fps }) => {
      await mkdir(path.dirname(outputPath), { recursive: true });
      await run(
        [
          '-i',
          inputPath,
          '-vf',
          `setpts=PTS/${speedMultiplier},fps=${fps}`,
          '-an',
          '-c:v',
          'libx264',
          '-preset',
          'veryfast',
          '-pix_fmt',
          'yuv420p',
          '-movflags',
          '+faststart',
          '-y',
          outputPath,
        ],
        'Timelapse'
      );
      return outputPath;
    },

    getResourceName(): string {
      return 'ffmpeg';
    },

    getPid(): number | null {
      return currentProcess?.pid ?? null;
    },
  };
}
