/**
 * Frame Summary
 * Reports what an extraction left in the output directory
 */

import sharp from 'sharp';
import { readdir } from 'node:fs/promises';
import { basename, dirname, join } from 'node:path';
import { createChildLogger } from '@framegrab/shared';
import type { FrameSummary } from '../types.js';

const logger = createChildLogger({ component: 'FrameSummary' });

/**
 * Regex matching file names produced by a printf-style pattern such as `frame_%06d.png`
 */
export function patternToRegExp(pattern: string): RegExp {
  let source = '';
  let i = 0;

  while (i < pattern.length) {
    const rest = pattern.slice(i);

    if (rest.startsWith('%%')) {
      source += '%';
      i += 2;
      continue;
    }

    const placeholder = /^%(0?)(\d*)d/.exec(rest);
    if (placeholder) {
      const width = placeholder[2] ? Number(placeholder[2]) : 0;
      // Zero-padded widths are minimums; larger numbers overflow them
      source += width > 0 ? `(\\d{${width},})` : '(\\d+)';
      i += placeholder[0].length;
      continue;
    }

    source += rest.charAt(0).replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
    i += 1;
  }

  return new RegExp(`^${source}$`);
}

/**
 * Count frame files matching `pattern` under `outDir` and read the first frame's size.
 * Frames are ordered by their numeric part so overflowing widths sort correctly.
 */
export async function summarizeFrames(outDir: string, pattern: string): Promise<FrameSummary> {
  // The pattern may carry its own subdirectory
  const frameDir = dirname(join(outDir, pattern));
  const matcher = patternToRegExp(basename(pattern));
  const entries = await readdir(frameDir);

  const frames = entries
    .filter((name) => matcher.test(name))
    .sort((a, b) => frameNumber(matcher, a) - frameNumber(matcher, b) || a.localeCompare(b));

  const firstFrame = frames[0];
  const lastFrame = frames[frames.length - 1];
  if (!firstFrame || !lastFrame) {
    return { count: 0 };
  }

  const firstPath = join(frameDir, firstFrame);
  const summary: FrameSummary = {
    count: frames.length,
    firstFrame: firstPath,
    lastFrame: join(frameDir, lastFrame),
  };

  try {
    const metadata = await sharp(firstPath).metadata();
    return { ...summary, width: metadata.width, height: metadata.height };
  } catch (error) {
    // Formats sharp cannot decode still count as frames
    logger.debug({ frame: firstPath, err: error }, 'Could not read frame dimensions');
    return summary;
  }
}

function frameNumber(matcher: RegExp, name: string): number {
  const digits = matcher.exec(name)?.[1];
  return digits === undefined ? 0 : Number(digits);
}
