/**
 * @framegrab/video
 * Download a video with yt-dlp and turn it into still frames with FFmpeg
 */

export { FramePipeline, STAGE_LABELS, FFMPEG_MISSING_MESSAGE, YT_DLP_MISSING_MESSAGE } from './pipeline/frame-pipeline.js';
export type { FramePipelineOptions } from './pipeline/frame-pipeline.js';
export { ToolLocator, createResolutionContext, toProcessEnv } from './tools/tool-locator.js';
export { ToolAcquirer, resolveYtDlpAsset, DEFAULT_TOOL_ACQUIRER_CONFIG } from './tools/tool-acquirer.js';
export type { ToolAcquirerConfig } from './tools/tool-acquirer.js';
export {
  EphemeralScope,
  createVideoTarget,
  withVideoTarget,
  EPHEMERAL_VIDEO_NAME,
} from './scope/resource-scope.js';
export type { VideoTarget, VideoTargetOptions } from './scope/resource-scope.js';
export { VideoDownloader, buildDownloadArgs, parseDownloadProgress, YT_DLP_FORMAT } from './download/video-downloader.js';
export { FrameExtractor, buildExtractionArgs, buildFilterChain } from './extraction/frame-extractor.js';
export { summarizeFrames, patternToRegExp } from './extraction/frame-summary.js';
export { SpawnCommandRunner, stderrTail } from './runner/spawn-command-runner.js';
export * from './types.js';
