/**
 * Video pipeline types
 */

import type { ToolName } from '@framegrab/shared';

/**
 * Where executables are looked up, and which have already been resolved.
 * Never mutated: acquisition hands back a new context.
 */
export interface ToolResolutionContext {
  /** Directories searched in order, like PATH entries */
  readonly searchPath: readonly string[];
  /** Resolved absolute paths by tool name */
  readonly tools: Readonly<Partial<Record<ToolName, string>>>;
}

export type LocateResult =
  | { found: true; path: string }
  | { found: false };

export interface AcquiredTool {
  path: string;
  context: ToolResolutionContext;
}

export interface CommandInvocation {
  tool: ToolName;
  /** Executable to launch (absolute path or a name resolved on the invocation's PATH) */
  command: string;
  args: string[];
  env?: NodeJS.ProcessEnv;
}

export interface CommandResult {
  /** null when the process was ended by a signal */
  exitCode: number | null;
  stdout: string;
  stderr: string;
  durationMs: number;
}

export type OutputStream = 'stdout' | 'stderr';

export type OutputLineHandler = (line: string, stream: OutputStream) => void;

/**
 * Runs an external tool to completion.
 * Rejects only when the process cannot be launched.
 */
export interface CommandRunner {
  run(invocation: CommandInvocation, onOutputLine?: OutputLineHandler): Promise<CommandResult>;
}

export interface ExtractionOptions {
  inputPath: string;
  outDir: string;
  pattern: string;
  fps: number;
  /** `W:H`, either side may be -1 or -2 */
  scale?: string;
  /** Input seek offset, placed before `-i` */
  start?: string;
  /** Output duration cap, placed after `-i` */
  duration?: string;
}

export interface FrameSummary {
  count: number;
  firstFrame?: string;
  lastFrame?: string;
  width?: number;
  height?: number;
}

export type PipelineStage =
  | 'pending'
  | 'locating-tools'
  | 'acquiring-tools'
  | 'preparing-storage'
  | 'downloading'
  | 'extracting'
  | 'complete'
  | 'failed';

export interface PipelineResult {
  /** Absolute frame output directory */
  outputDir: string;
  /** Retained video, or null when it lived in an ephemeral directory */
  videoPath: string | null;
  frames: FrameSummary;
  durationMs: number;
}
