/**
 * Frame Extractor
 * Uses FFmpeg to write a numbered image sequence from a local video
 */

import { mkdir } from 'node:fs/promises';
import { join } from 'node:path';
import { createChildLogger, ExtractionError, TOOL_NAMES } from '@framegrab/shared';
import { stderrTail } from '../runner/spawn-command-runner.js';
import { toProcessEnv } from '../tools/tool-locator.js';
import type {
  CommandInvocation,
  CommandResult,
  CommandRunner,
  ExtractionOptions,
  ToolResolutionContext,
} from '../types.js';

/**
 * Sampling comes first so scaling only touches frames that are kept
 */
export function buildFilterChain(fps: number, scale?: string): string {
  const filters = [`fps=${fps}`];
  if (scale) {
    filters.push(`scale=${scale}`);
  }
  return filters.join(',');
}

/**
 * FFmpeg arguments. `-ss` sits before `-i` (input seek) and `-t` after it (output duration).
 */
export function buildExtractionArgs(options: ExtractionOptions): string[] {
  const args = ['-hide_banner', '-y'];

  if (options.start) {
    args.push('-ss', options.start);
  }

  args.push('-i', options.inputPath);

  if (options.duration) {
    args.push('-t', options.duration);
  }

  args.push(
    '-vf',
    buildFilterChain(options.fps, options.scale),
    // Keep frame timing and name files from presentation timestamps
    '-vsync',
    'vfr',
    '-frame_pts',
    '1',
    join(options.outDir, options.pattern)
  );

  return args;
}

export class FrameExtractor {
  private logger = createChildLogger({ component: 'FrameExtractor' });

  constructor(private readonly runner: CommandRunner) {}

  /**
   * Extract frames into `outDir`. The number of files written is not checked here.
   */
  async extractFrames(options: ExtractionOptions, context: ToolResolutionContext): Promise<void> {
    try {
      await mkdir(options.outDir, { recursive: true });
    } catch (error) {
      throw new ExtractionError(
        'OUTPUT_DIR_UNAVAILABLE',
        `Could not create output directory ${options.outDir}`,
        { cause: error, context: { outDir: options.outDir } }
      );
    }

    const invocation: CommandInvocation = {
      tool: TOOL_NAMES.FFMPEG,
      command: context.tools[TOOL_NAMES.FFMPEG] ?? TOOL_NAMES.FFMPEG,
      args: buildExtractionArgs(options),
      env: toProcessEnv(context),
    };

    this.logger.info(
      {
        inputPath: options.inputPath,
        outDir: options.outDir,
        fps: options.fps,
        scale: options.scale,
        start: options.start,
        duration: options.duration,
      },
      'Extracting frames'
    );
    this.logger.debug({ args: invocation.args }, 'FFmpeg command');

    let result: CommandResult;
    try {
      result = await this.runner.run(invocation);
    } catch (error) {
      throw new ExtractionError('TOOL_FAILED', `Could not launch ${invocation.command}`, {
        cause: error,
      });
    }

    if (result.exitCode !== 0) {
      const tail = stderrTail(result.stderr);
      throw new ExtractionError(
        'TOOL_FAILED',
        `ffmpeg exited with ${result.exitCode === null ? 'a signal' : `code ${result.exitCode}`}${tail ? `\n${tail}` : ''}`,
        { context: { exitCode: result.exitCode } }
      );
    }

    this.logger.info({ outDir: options.outDir, durationMs: result.durationMs }, 'Frame extraction complete');
  }
}
