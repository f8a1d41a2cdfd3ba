/**
 * Frame Pipeline
 * Coordinates a run: locate tools → acquire yt-dlp → prepare storage → download → extract
 */

import { EventEmitter } from 'eventemitter3';
import { resolve } from 'node:path';
import {
  ConfigurationError,
  createChildLogger,
  FetchError,
  StageError,
  TOOL_NAMES,
  type RunConfig,
  type ToolName,
} from '@framegrab/shared';
import { VideoDownloader } from '../download/video-downloader.js';
import { FrameExtractor } from '../extraction/frame-extractor.js';
import { summarizeFrames } from '../extraction/frame-summary.js';
import { SpawnCommandRunner } from '../runner/spawn-command-runner.js';
import { withVideoTarget } from '../scope/resource-scope.js';
import { ToolAcquirer } from '../tools/tool-acquirer.js';
import { createResolutionContext, ToolLocator } from '../tools/tool-locator.js';
import type {
  CommandRunner,
  FrameSummary,
  PipelineResult,
  PipelineStage,
  ToolResolutionContext,
} from '../types.js';

interface FramePipelineEvents {
  stageChange: (stage: PipelineStage) => void;
  complete: (result: PipelineResult) => void;
  error: (error: Error) => void;
}

/** Message attached to a failure in each stage */
export const STAGE_LABELS = {
  'locating-tools': 'ffmpeg check failed',
  'acquiring-tools': 'yt-dlp setup failed',
  'preparing-storage': 'create temp dir',
  downloading: 'downloading video with yt-dlp failed',
  extracting: 'ffmpeg frame extraction failed',
} as const satisfies Partial<Record<PipelineStage, string>>;

type LabelledStage = keyof typeof STAGE_LABELS;

export const FFMPEG_MISSING_MESSAGE =
  'ffmpeg not found on PATH. Install it (e.g. `apt install ffmpeg` or `brew install ffmpeg`) or set FFMPEG_PATH.';
export const YT_DLP_MISSING_MESSAGE =
  'yt-dlp not found on PATH. Install it (`pip install yt-dlp`, package manager) or run with --fetch-yt-dlp.';

export interface FramePipelineOptions {
  /** Starting lookup context; defaults to the process PATH */
  context?: ToolResolutionContext;
  /** Parent of the ephemeral video directory */
  tempRoot?: string;
  runner?: CommandRunner;
  locator?: ToolLocator;
  acquirer?: ToolAcquirer;
  summarize?: (outDir: string, pattern: string) => Promise<FrameSummary>;
}

function withTool(context: ToolResolutionContext, name: ToolName, path: string): ToolResolutionContext {
  return { ...context, tools: { ...context.tools, [name]: path } };
}

export class FramePipeline extends EventEmitter<FramePipelineEvents> {
  private readonly initialContext: ToolResolutionContext;
  private readonly tempRoot: string | undefined;
  private readonly locator: ToolLocator;
  private readonly acquirer: ToolAcquirer;
  private readonly downloader: VideoDownloader;
  private readonly extractor: FrameExtractor;
  private readonly summarize: (outDir: string, pattern: string) => Promise<FrameSummary>;
  private stage: PipelineStage = 'pending';
  private logger = createChildLogger({ component: 'FramePipeline' });

  constructor(options: FramePipelineOptions = {}) {
    super();
    const runner = options.runner ?? new SpawnCommandRunner();
    this.initialContext = options.context ?? createResolutionContext();
    this.tempRoot = options.tempRoot;
    this.locator = options.locator ?? new ToolLocator();
    this.acquirer = options.acquirer ?? new ToolAcquirer();
    this.downloader = new VideoDownloader(runner);
    this.extractor = new FrameExtractor(runner);
    this.summarize = options.summarize ?? summarizeFrames;
  }

  get currentStage(): PipelineStage {
    return this.stage;
  }

  /**
   * Run every stage in order. A failure stops the run and is rethrown as a StageError;
   * the ephemeral video directory is removed either way.
   */
  async run(config: RunConfig): Promise<PipelineResult> {
    const startTime = Date.now();
    this.logger.info({ url: config.url, outDir: config.outDir, fps: config.fps }, 'Starting frame pipeline');

    try {
      const outputDir = resolve(config.outDir);
      const context = await this.resolveTools(config);

      this.setStage('preparing-storage');
      const videoPath = await this.withStorage(config, async (targetPath, retained) => {
        await this.runStage('downloading', () =>
          this.downloader.download(config.url, targetPath, context)
        );

        await this.runStage('extracting', () =>
          this.extractor.extractFrames(
            {
              inputPath: targetPath,
              outDir: outputDir,
              pattern: config.pattern,
              fps: config.fps,
              scale: config.scale,
              start: config.start,
              duration: config.duration,
            },
            context
          )
        );

        return retained ? targetPath : null;
      });

      const frames = await this.reportFrames(outputDir, config.pattern);

      const result: PipelineResult = {
        outputDir,
        videoPath,
        frames,
        durationMs: Date.now() - startTime,
      };

      this.setStage('complete');
      this.emit('complete', result);
      this.logger.info({ outputDir, frameCount: frames.count, durationMs: result.durationMs }, 'Frame pipeline complete');
      return result;
    } catch (error) {
      this.setStage('failed');
      const failure = error instanceof Error ? error : new Error(String(error));
      this.emit('error', failure);
      throw failure;
    }
  }

  /**
   * ffmpeg must exist before anything is fetched; yt-dlp may be acquired
   */
  private async resolveTools(config: RunConfig): Promise<ToolResolutionContext> {
    const withFfmpeg = await this.runStage('locating-tools', async () => {
      const located = await this.locator.locate(TOOL_NAMES.FFMPEG, this.initialContext);
      if (!located.found) {
        throw new ConfigurationError(FFMPEG_MISSING_MESSAGE, { tool: TOOL_NAMES.FFMPEG });
      }
      return withTool(this.initialContext, TOOL_NAMES.FFMPEG, located.path);
    });

    return this.runStage('acquiring-tools', async () => {
      const located = await this.locator.locate(TOOL_NAMES.YT_DLP, withFfmpeg);
      if (located.found) {
        return withTool(withFfmpeg, TOOL_NAMES.YT_DLP, located.path);
      }

      if (!config.fetchYtDlp) {
        throw new ConfigurationError(YT_DLP_MISSING_MESSAGE, { tool: TOOL_NAMES.YT_DLP });
      }

      const acquired = await this.acquirer.acquireYtDlp(withFfmpeg);
      const relocated = await this.locator.locate(TOOL_NAMES.YT_DLP, acquired.context);
      if (!relocated.found) {
        throw new FetchError(`Fetched yt-dlp at ${acquired.path} is not executable`);
      }

      this.logger.info({ path: relocated.path }, 'yt-dlp installed');
      return withTool(acquired.context, TOOL_NAMES.YT_DLP, relocated.path);
    });
  }

  /**
   * Scope the video file; failures creating the scope belong to the storage stage
   */
  private async withStorage<T>(
    config: RunConfig,
    fn: (targetPath: string, retained: boolean) => Promise<T>
  ): Promise<T> {
    try {
      return await withVideoTarget(
        { keepVideo: config.keepVideo, videoPath: config.videoPath, tempRoot: this.tempRoot },
        (target) => fn(target.path, target.scope === null)
      );
    } catch (error) {
      if (error instanceof StageError) throw error;
      throw new StageError('preparing-storage', STAGE_LABELS['preparing-storage'], error);
    }
  }

  private async reportFrames(outputDir: string, pattern: string): Promise<FrameSummary> {
    try {
      const frames = await this.summarize(outputDir, pattern);
      if (frames.count === 0) {
        this.logger.warn({ outputDir, pattern }, 'No frame files matching the pattern were written');
      } else {
        this.logger.info(
          { count: frames.count, width: frames.width, height: frames.height },
          'Frames written'
        );
      }
      return frames;
    } catch (error) {
      // Extraction already succeeded; the summary is informational
      this.logger.warn({ outputDir, err: error }, 'Could not summarize extracted frames');
      return { count: 0 };
    }
  }

  private async runStage<T>(stage: LabelledStage, fn: () => Promise<T>): Promise<T> {
    this.setStage(stage);
    try {
      return await fn();
    } catch (error) {
      this.logger.debug({ stage, err: error }, 'Stage failed');
      throw new StageError(stage, STAGE_LABELS[stage], error);
    }
  }

  private setStage(stage: PipelineStage): void {
    this.stage = stage;
    this.emit('stageChange', stage);
  }
}
