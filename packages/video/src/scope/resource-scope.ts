/**
 * Resource Scope
 * Decides where the downloaded video lives and guarantees temp-dir cleanup
 */

import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join, resolve } from 'node:path';
import { createChildLogger, DEFAULT_VIDEO_PATH, ResourceError } from '@framegrab/shared';

export const EPHEMERAL_VIDEO_NAME = 'video.mp4';
const TEMP_DIR_PREFIX = 'framegrab-';

const logger = createChildLogger({ component: 'ResourceScope' });

/**
 * A uniquely named temp directory, removed recursively on release
 */
export class EphemeralScope {
  private released = false;

  private constructor(public readonly dir: string) {}

  static async create(tempRoot: string = tmpdir()): Promise<EphemeralScope> {
    try {
      const dir = await mkdtemp(join(tempRoot, TEMP_DIR_PREFIX));
      logger.debug({ dir }, 'Created ephemeral directory');
      return new EphemeralScope(dir);
    } catch (error) {
      throw new ResourceError(`Could not create a temporary directory under ${tempRoot}`, {
        cause: error,
        context: { tempRoot },
      });
    }
  }

  get isReleased(): boolean {
    return this.released;
  }

  /**
   * Delete the directory and its contents. Only the first call does anything.
   */
  async release(): Promise<void> {
    if (this.released) return;
    this.released = true;
    await rm(this.dir, { recursive: true, force: true });
    logger.debug({ dir: this.dir }, 'Released ephemeral directory');
  }
}

export interface VideoTargetOptions {
  keepVideo: boolean;
  videoPath?: string;
  tempRoot?: string;
}

export interface VideoTarget {
  path: string;
  /** null when the caller owns the file */
  scope: EphemeralScope | null;
}

export async function createVideoTarget(options: VideoTargetOptions): Promise<VideoTarget> {
  if (options.keepVideo) {
    return { path: resolve(options.videoPath ?? DEFAULT_VIDEO_PATH), scope: null };
  }

  const scope = await EphemeralScope.create(options.tempRoot);
  return { path: join(scope.dir, EPHEMERAL_VIDEO_NAME), scope };
}

/**
 * Run `fn` with a video target; an ephemeral scope is released however `fn` exits
 */
export async function withVideoTarget<T>(
  options: VideoTargetOptions,
  fn: (target: VideoTarget) => Promise<T>
): Promise<T> {
  const target = await createVideoTarget(options);
  try {
    return await fn(target);
  } finally {
    if (target.scope) {
      try {
        await target.scope.release();
      } catch (error) {
        logger.warn({ dir: target.scope.dir, err: error }, 'Failed to remove temporary directory');
      }
    }
  }
}
