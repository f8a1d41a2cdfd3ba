/**
 * Configuration tests
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { tmpdir } from 'node:os';
import { DEFAULT_YT_DLP_RELEASE_URL, getConfig, resetConfig, validateConfig } from './index.js';

const MANAGED_VARS = [
  'LOG_LEVEL',
  'FFMPEG_PATH',
  'YT_DLP_PATH',
  'YT_DLP_INSTALL_DIR',
  'YT_DLP_RELEASE_URL',
  'FRAMEGRAB_TEMP_DIR',
  'FETCH_TIMEOUT_MS',
];

describe('config', () => {
  const saved: Record<string, string | undefined> = {};

  beforeEach(() => {
    for (const name of MANAGED_VARS) {
      saved[name] = process.env[name];
      delete process.env[name];
    }
    resetConfig();
  });

  afterEach(() => {
    for (const name of MANAGED_VARS) {
      const value = saved[name];
      if (value === undefined) {
        delete process.env[name];
      } else {
        process.env[name] = value;
      }
    }
    resetConfig();
  });

  it('applies defaults', () => {
    const config = getConfig();

    expect(config.nodeEnv).toBe('test');
    expect(config.logLevel).toBe('info');
    expect(config.tools.ffmpegPath).toBeUndefined();
    expect(config.tools.ytDlpReleaseUrl).toBe(DEFAULT_YT_DLP_RELEASE_URL);
    expect(config.storage.tempDir).toBe(tmpdir());
    expect(config.network.fetchTimeoutMs).toBe(120000);
  });

  it('reads overrides from the environment', () => {
    process.env.LOG_LEVEL = 'debug';
    process.env.FFMPEG_PATH = '/opt/ffmpeg/bin/ffmpeg';
    process.env.YT_DLP_INSTALL_DIR = '/opt/tools';
    process.env.FRAMEGRAB_TEMP_DIR = '/scratch';
    process.env.FETCH_TIMEOUT_MS = '5000';

    const config = getConfig();

    expect(config.logLevel).toBe('debug');
    expect(config.tools.ffmpegPath).toBe('/opt/ffmpeg/bin/ffmpeg');
    expect(config.tools.ytDlpInstallDir).toBe('/opt/tools');
    expect(config.storage.tempDir).toBe('/scratch');
    expect(config.network.fetchTimeoutMs).toBe(5000);
  });

  it('treats empty variables as unset', () => {
    process.env.FFMPEG_PATH = '';
    process.env.FETCH_TIMEOUT_MS = '  ';

    const config = getConfig();

    expect(config.tools.ffmpegPath).toBeUndefined();
    expect(config.network.fetchTimeoutMs).toBe(120000);
  });

  it('caches until reset', () => {
    const first = getConfig();
    process.env.LOG_LEVEL = 'warn';

    expect(getConfig()).toBe(first);

    resetConfig();
    expect(getConfig().logLevel).toBe('warn');
  });

  it('reports invalid values', () => {
    process.env.LOG_LEVEL = 'loud';
    process.env.YT_DLP_RELEASE_URL = 'not a url';

    const result = validateConfig();

    expect(result.valid).toBe(false);
    expect(result.errors).toHaveLength(2);
    expect(result.errors?.[0]).toMatch(/^logLevel: /);
    expect(result.errors?.[1]).toMatch(/^tools\.ytDlpReleaseUrl: /);
  });

  it('accepts a valid environment', () => {
    expect(validateConfig()).toEqual({ valid: true });
  });
});
