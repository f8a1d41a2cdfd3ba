/**
 * Wires environment config into a FramePipeline and reports its progress
 */

import {
  TOOL_NAMES,
  type Config,
  type Logger,
  type RunConfig,
  type ToolName,
} from '@framegrab/shared';
import {
  createResolutionContext,
  FramePipeline,
  ToolAcquirer,
  type CommandRunner,
  type PipelineResult,
} from '@framegrab/video';

export type PipelineLogger = Pick<Logger, 'debug' | 'info'>;

export interface CreatePipelineOptions {
  env?: NodeJS.ProcessEnv;
  runner?: CommandRunner;
}

/** Tool paths set through FFMPEG_PATH and YT_DLP_PATH */
export function toolOverrides(config: Config): Partial<Record<ToolName, string>> {
  const overrides: Partial<Record<ToolName, string>> = {};
  if (config.tools.ffmpegPath) overrides[TOOL_NAMES.FFMPEG] = config.tools.ffmpegPath;
  if (config.tools.ytDlpPath) overrides[TOOL_NAMES.YT_DLP] = config.tools.ytDlpPath;
  return overrides;
}

export function createPipeline(config: Config, options: CreatePipelineOptions = {}): FramePipeline {
  return new FramePipeline({
    context: createResolutionContext(options.env ?? process.env, toolOverrides(config)),
    tempRoot: config.storage.tempDir,
    runner: options.runner,
    acquirer: new ToolAcquirer({
      releaseBaseUrl: config.tools.ytDlpReleaseUrl,
      installDirs: config.tools.ytDlpInstallDir ? [config.tools.ytDlpInstallDir] : undefined,
      timeoutMs: config.network.fetchTimeoutMs,
    }),
  });
}

export function logPipelineEvents(pipeline: FramePipeline, logger: PipelineLogger): void {
  pipeline.on('stageChange', (stage) => {
    logger.debug({ stage }, 'Pipeline stage');
  });

  pipeline.on('complete', (result) => {
    logger.info(
      {
        outputDir: result.outputDir,
        frameCount: result.frames.count,
        videoPath: result.videoPath,
        durationMs: result.durationMs,
      },
      'Frames extracted'
    );
  });

  pipeline.on('error', (error) => {
    logger.debug({ err: error }, 'Pipeline failed');
  });
}

/**
 * Run the pipeline and print where the frames went
 */
export async function runExtraction(
  pipeline: FramePipeline,
  runConfig: RunConfig,
  write: (text: string) => void = (text) => {
    process.stdout.write(text);
  }
): Promise<PipelineResult> {
  const result = await pipeline.run(runConfig);
  write(` Done. Frames in: ${runConfig.outDir}\n`);
  return result;
}
