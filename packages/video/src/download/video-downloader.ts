/**
 * Video Downloader
 * Fetches a remote video with yt-dlp and coerces it into an MP4 container
 */

import { mkdir, stat } from 'node:fs/promises';
import { dirname } from 'node:path';
import { createChildLogger, DownloadError, TOOL_NAMES } from '@framegrab/shared';
import { stderrTail } from '../runner/spawn-command-runner.js';
import { toProcessEnv } from '../tools/tool-locator.js';
import type {
  CommandInvocation,
  CommandResult,
  CommandRunner,
  ToolResolutionContext,
} from '../types.js';

/** Separate mp4/m4a pair, else a single mp4, else anything */
export const YT_DLP_FORMAT = 'bv*[ext=mp4]+ba[ext=m4a]/b[ext=mp4]/best';
export const REMUX_CONTAINER = 'mp4';

const PROGRESS_PATTERN = /^\[download\]\s+(\d{1,3}(?:\.\d+)?)%/;

/**
 * yt-dlp arguments. `ffmpegPath` is where yt-dlp finds ffmpeg for merging and remuxing.
 */
export function buildDownloadArgs(url: string, targetPath: string, ffmpegPath?: string): string[] {
  const args = ['-o', targetPath, '-f', YT_DLP_FORMAT, '--remux-video', REMUX_CONTAINER, '--newline'];
  if (ffmpegPath) {
    args.push('--ffmpeg-location', ffmpegPath);
  }
  args.push(url);
  return args;
}

/**
 * Percent from a yt-dlp progress line, or null for any other line
 */
export function parseDownloadProgress(line: string): number | null {
  const match = PROGRESS_PATTERN.exec(line.trim());
  if (!match?.[1]) return null;
  const percent = Number(match[1]);
  return Number.isFinite(percent) && percent >= 0 && percent <= 100 ? percent : null;
}

export class VideoDownloader {
  private logger = createChildLogger({ component: 'VideoDownloader' });

  constructor(private readonly runner: CommandRunner) {}

  /**
   * Download `url` to `targetPath`. The exit code alone is not trusted:
   * the file must exist and be non-empty afterwards.
   */
  async download(url: string, targetPath: string, context: ToolResolutionContext): Promise<void> {
    try {
      await mkdir(dirname(targetPath), { recursive: true });
    } catch (error) {
      // A later write failure inside yt-dlp is what counts
      this.logger.debug({ dir: dirname(targetPath), err: error }, 'Could not create target directory');
    }

    const invocation: CommandInvocation = {
      tool: TOOL_NAMES.YT_DLP,
      command: context.tools[TOOL_NAMES.YT_DLP] ?? TOOL_NAMES.YT_DLP,
      args: buildDownloadArgs(url, targetPath, context.tools[TOOL_NAMES.FFMPEG]),
      env: toProcessEnv(context),
    };

    this.logger.info({ url, targetPath }, 'Downloading video');

    let lastReported = -1;
    let result: CommandResult;
    try {
      result = await this.runner.run(invocation, (line) => {
        const percent = parseDownloadProgress(line);
        if (percent === null) return;
        const step = Math.floor(percent / 10);
        if (step > lastReported) {
          lastReported = step;
          this.logger.debug({ percent }, 'Download progress');
        }
      });
    } catch (error) {
      throw new DownloadError('TOOL_FAILED', `Could not launch ${invocation.command}`, {
        cause: error,
        context: { url },
      });
    }

    if (result.exitCode !== 0) {
      const tail = stderrTail(result.stderr);
      throw new DownloadError(
        'TOOL_FAILED',
        `yt-dlp exited with ${result.exitCode === null ? 'a signal' : `code ${result.exitCode}`}${tail ? `\n${tail}` : ''}`,
        { context: { url, exitCode: result.exitCode } }
      );
    }

    if (!(await isNonEmptyFile(targetPath))) {
      throw new DownloadError('MISSING_OUTPUT', `yt-dlp did not produce expected file: ${targetPath}`, {
        context: { url, targetPath },
      });
    }

    this.logger.info({ targetPath, durationMs: result.durationMs }, 'Video downloaded');
  }
}

async function isNonEmptyFile(path: string): Promise<boolean> {
  try {
    const stats = await stat(path);
    return stats.isFile() && stats.size > 0;
  } catch {
    return false;
  }
}
