/**
 * Command-line surface
 * Maps flags onto a validated RunConfig
 */

import { Command } from 'commander';
import { readFileSync } from 'node:fs';
import { z } from 'zod';
import {
  DEFAULT_FPS,
  DEFAULT_FRAME_PATTERN,
  DEFAULT_OUT_DIR,
  DEFAULT_VIDEO_PATH,
  runConfigSchema,
  ValidationError,
  type RunConfig,
} from '@framegrab/shared';

export interface CliOptions {
  outDir: string;
  fps: string;
  pattern: string;
  scale?: string;
  start?: string;
  duration?: string;
  keepVideo: boolean;
  videoPath: string;
  fetchYtDlp: boolean;
}

const packageJsonSchema = z.object({ version: z.string() });

function readVersion(): string {
  const raw = readFileSync(new URL('../package.json', import.meta.url), 'utf-8');
  return packageJsonSchema.parse(JSON.parse(raw)).version;
}

/**
 * Validate parsed flags. `videoPathGiven` is true when --video-path came from the command line.
 */
export function toRunConfig(url: string, options: CliOptions, videoPathGiven = false): RunConfig {
  if (videoPathGiven && !options.keepVideo) {
    throw new ValidationError('--video-path requires --keep-video');
  }

  const result = runConfigSchema.safeParse({ url, ...options });
  if (!result.success) {
    const details = result.error.errors.map((e) => `${e.path.join('.') || 'input'}: ${e.message}`);
    throw new ValidationError(`Invalid arguments: ${details.join('; ')}`, { issues: details });
  }
  return result.data;
}

export function createProgram(handler: (config: RunConfig) => Promise<void>): Command {
  return new Command()
    .name('framegrab')
    .description('Download a video with yt-dlp and extract frames from it with FFmpeg')
    .version(readVersion(), '-V, --version', 'Show version')
    .argument('<url>', 'Video URL')
    .option('-o, --out-dir <dir>', 'Output directory for frames (will be created)', DEFAULT_OUT_DIR)
    .option('-f, --fps <fps>', 'Frames per second to extract', String(DEFAULT_FPS))
    .option('--pattern <pattern>', 'Output image file name pattern', DEFAULT_FRAME_PATTERN)
    .option('--scale <w:h>', 'Rescale after sampling, e.g. 1280:-1 or 720:-2')
    .option('--start <time>', 'Start time, e.g. 00:00:05')
    .option('--duration <time>', 'Duration, e.g. 10 or 00:00:10')
    .option('--keep-video', 'Keep the downloaded video instead of using a temp dir', false)
    .option('--video-path <path>', 'Where to save the video with --keep-video', DEFAULT_VIDEO_PATH)
    .option('--fetch-yt-dlp', 'Download yt-dlp if it is not installed', false)
    .action(async (url: string, options: CliOptions, command: Command) => {
      const videoPathGiven = command.getOptionValueSource('videoPath') === 'cli';
      await handler(toRunConfig(url, options, videoPathGiven));
    });
}
