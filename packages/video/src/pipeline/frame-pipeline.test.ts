/**
 * Frame Pipeline Tests
 * Tests for the run order: locate → acquire → storage → download → extract
 */
import { describe, it, expect, beforeEach, afterEach, vi, type Mock } from 'vitest';
import { access, readdir, rm } from 'node:fs/promises';
import { join } from 'node:path';
import {
  ConfigurationError,
  DownloadError,
  ExtractionError,
  ResourceError,
  rootCause,
  runConfigSchema,
  StageError,
  type RunConfigInput,
} from '@framegrab/shared';
import { FFMPEG_MISSING_MESSAGE, FramePipeline, YT_DLP_MISSING_MESSAGE } from './frame-pipeline.js';
import { ToolAcquirer } from '../tools/tool-acquirer.js';
import type { PipelineStage } from '../types.js';
import { argAfter, FakeCommandRunner } from '../../../../tests/mocks/fake-command-runner.js';
import {
  installFakeTool,
  makeTempDir,
  writeDownloadedVideo,
  writeFrames,
} from '../../../../tests/mocks/fake-tools.js';

const VIDEO_URL = 'https://example.com/v';

describe('FramePipeline', () => {
  let binDir: string;
  let tempRoot: string;
  let workDir: string;
  let runner: FakeCommandRunner;
  let fetchImpl: Mock<typeof fetch>;

  function config(overrides: Partial<RunConfigInput> = {}) {
    return runConfigSchema.parse({ url: VIDEO_URL, outDir: join(workDir, 'frames'), ...overrides });
  }

  function pipeline(searchPath: string[] = [binDir], installDir = workDir): FramePipeline {
    return new FramePipeline({
      context: { searchPath, tools: {} },
      tempRoot,
      runner,
      acquirer: new ToolAcquirer({ installDirs: [installDir], platform: 'linux', arch: 'x64', fetchImpl }),
    });
  }

  beforeEach(async () => {
    binDir = await makeTempDir();
    tempRoot = await makeTempDir();
    workDir = await makeTempDir();
    runner = new FakeCommandRunner()
      .on('yt-dlp', writeDownloadedVideo)
      .on('ffmpeg', (invocation) => writeFrames(invocation, 3));
    fetchImpl = vi.fn<typeof fetch>().mockImplementation(async () => new Response('#!/bin/sh\nexit 0\n'));
  });

  afterEach(async () => {
    await rm(binDir, { recursive: true, force: true });
    await rm(tempRoot, { recursive: true, force: true });
    await rm(workDir, { recursive: true, force: true });
  });

  // ===========================================
  // Successful runs
  // ===========================================

  describe('successful run', () => {
    beforeEach(async () => {
      await installFakeTool(binDir, 'ffmpeg');
      await installFakeTool(binDir, 'yt-dlp');
    });

    it('downloads once, extracts once and cleans up', async () => {
      const result = await pipeline().run(config());

      expect(runner.callsFor('yt-dlp')).toHaveLength(1);
      expect(runner.callsFor('ffmpeg')).toHaveLength(1);
      expect(runner.invocations.map((invocation) => invocation.tool)).toEqual(['yt-dlp', 'ffmpeg']);
      expect(result.outputDir).toBe(join(workDir, 'frames'));
      expect(result.videoPath).toBeNull();
      expect(result.frames.count).toBe(3);
      expect(await readdir(tempRoot)).toEqual([]);
      expect(fetchImpl).not.toHaveBeenCalled();
    });

    it('extracts from the file yt-dlp wrote, using located tools', async () => {
      await pipeline().run(config({ scale: '1280:-1' }));

      const download = runner.callsFor('yt-dlp')[0];
      const extract = runner.callsFor('ffmpeg')[0];
      if (!download || !extract) throw new Error('expected one download and one extraction');

      expect(download.command).toBe(join(binDir, 'yt-dlp'));
      expect(extract.command).toBe(join(binDir, 'ffmpeg'));
      expect(argAfter(download.args, '--ffmpeg-location')).toBe(join(binDir, 'ffmpeg'));
      expect(argAfter(extract.args, '-i')).toBe(argAfter(download.args, '-o'));
      expect(argAfter(extract.args, '-vf')).toBe('fps=10,scale=1280:-1');
    });

    it('emits every stage in order', async () => {
      const stages: PipelineStage[] = [];
      const instance = pipeline();
      instance.on('stageChange', (stage) => stages.push(stage));
      const complete = vi.fn();
      instance.on('complete', complete);

      await instance.run(config());

      expect(stages).toEqual([
        'locating-tools',
        'acquiring-tools',
        'preparing-storage',
        'downloading',
        'extracting',
        'complete',
      ]);
      expect(complete).toHaveBeenCalledTimes(1);
      expect(instance.currentStage).toBe('complete');
    });

    it('keeps the video where asked', async () => {
      const videoPath = join(workDir, 'kept.mp4');

      const result = await pipeline().run(config({ keepVideo: true, videoPath }));

      expect(result.videoPath).toBe(videoPath);
      await expect(access(videoPath)).resolves.toBeUndefined();
      expect(argAfter(runner.callsFor('yt-dlp')[0]?.args ?? [], '-o')).toBe(videoPath);
    });

    it('survives a failing frame summary', async () => {
      const instance = new FramePipeline({
        context: { searchPath: [binDir], tools: {} },
        tempRoot,
        runner,
        summarize: () => Promise.reject(new Error('unreadable image')),
      });

      const result = await instance.run(config());

      expect(result.frames).toEqual({ count: 0 });
    });
  });

  // ===========================================
  // Tool resolution
  // ===========================================

  describe('tool resolution', () => {
    it('stops before anything else when ffmpeg is missing', async () => {
      await installFakeTool(binDir, 'yt-dlp');
      const instance = pipeline();
      const onError = vi.fn();
      instance.on('error', onError);

      const error = await instance.run(config({ fetchYtDlp: true })).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(StageError);
      expect(error).toHaveProperty('stage', 'locating-tools');
      expect(error).toHaveProperty('message', 'ffmpeg check failed');
      const cause = rootCause(error);
      expect(cause).toBeInstanceOf(ConfigurationError);
      expect(cause).toHaveProperty('message', FFMPEG_MISSING_MESSAGE);
      expect(runner.invocations).toHaveLength(0);
      expect(fetchImpl).not.toHaveBeenCalled();
      expect(await readdir(tempRoot)).toEqual([]);
      expect(onError).toHaveBeenCalledWith(error);
      expect(instance.currentStage).toBe('failed');
    });

    it('requires yt-dlp when fetching is not allowed', async () => {
      await installFakeTool(binDir, 'ffmpeg');

      const error = await pipeline().run(config()).catch((e: unknown) => e);

      expect(error).toHaveProperty('stage', 'acquiring-tools');
      expect(error).toHaveProperty('message', 'yt-dlp setup failed');
      const cause = rootCause(error);
      expect(cause).toBeInstanceOf(ConfigurationError);
      expect(cause).toHaveProperty('message', YT_DLP_MISSING_MESSAGE);
      expect(runner.invocations).toHaveLength(0);
      expect(fetchImpl).not.toHaveBeenCalled();
    });

    it('fetches yt-dlp and downloads with the fetched binary', async () => {
      await installFakeTool(binDir, 'ffmpeg');
      const installDir = await makeTempDir();

      try {
        await pipeline([binDir], installDir).run(config({ fetchYtDlp: true }));

        expect(fetchImpl).toHaveBeenCalledTimes(1);
        const download = runner.callsFor('yt-dlp')[0];
        expect(download?.command).toBe(join(installDir, 'yt-dlp'));
        expect(download?.env?.PATH?.startsWith(installDir)).toBe(true);
        expect(runner.callsFor('ffmpeg')[0]?.command).toBe(join(binDir, 'ffmpeg'));
      } finally {
        await rm(installDir, { recursive: true, force: true });
      }
    });

    it('uses an explicitly configured ffmpeg', async () => {
      await installFakeTool(binDir, 'yt-dlp');
      const custom = await installFakeTool(workDir, 'ffmpeg-custom');

      const instance = new FramePipeline({
        context: { searchPath: [binDir], tools: { ffmpeg: custom } },
        tempRoot,
        runner,
      });
      await instance.run(config());

      expect(runner.callsFor('ffmpeg')[0]?.command).toBe(custom);
      expect(argAfter(runner.callsFor('yt-dlp')[0]?.args ?? [], '--ffmpeg-location')).toBe(custom);
    });
  });

  // ===========================================
  // Failures after tools are resolved
  // ===========================================

  describe('stage failures', () => {
    beforeEach(async () => {
      await installFakeTool(binDir, 'ffmpeg');
      await installFakeTool(binDir, 'yt-dlp');
    });

    it('reports a missing download and removes the temp dir', async () => {
      runner.on('yt-dlp', () => ({ exitCode: 0 }));

      const error = await pipeline().run(config()).catch((e: unknown) => e);

      expect(error).toHaveProperty('stage', 'downloading');
      expect(error).toHaveProperty('message', 'downloading video with yt-dlp failed');
      const cause = rootCause(error);
      expect(cause).toBeInstanceOf(DownloadError);
      expect(cause).toHaveProperty('kind', 'MISSING_OUTPUT');
      expect(runner.callsFor('ffmpeg')).toHaveLength(0);
      expect(await readdir(tempRoot)).toEqual([]);
    });

    it('removes the temp dir when extraction fails', async () => {
      runner.on('ffmpeg', () => ({ exitCode: 1, stderr: 'Invalid data found when processing input' }));

      const error = await pipeline().run(config()).catch((e: unknown) => e);

      expect(error).toHaveProperty('stage', 'extracting');
      expect(error).toHaveProperty('message', 'ffmpeg frame extraction failed');
      expect(rootCause(error)).toBeInstanceOf(ExtractionError);
      expect(await readdir(tempRoot)).toEqual([]);
    });

    it('labels temp dir failures', async () => {
      const instance = new FramePipeline({
        context: { searchPath: [binDir], tools: {} },
        tempRoot: join(tempRoot, 'missing'),
        runner,
      });

      const error = await instance.run(config()).catch((e: unknown) => e);

      expect(error).toHaveProperty('stage', 'preparing-storage');
      expect(error).toHaveProperty('message', 'create temp dir');
      expect(error instanceof StageError ? error.cause : undefined).toBeInstanceOf(ResourceError);
      expect(runner.invocations).toHaveLength(0);
    });
  });
});
