/**
 * Configuration management for framegrab
 */

import { z } from 'zod';
import { config as dotenvConfig } from 'dotenv';
import { tmpdir } from 'node:os';
import { resolve } from 'node:path';

// Load .env from the working directory before anything reads process.env
dotenvConfig({ path: resolve(process.cwd(), '.env') });

export const DEFAULT_YT_DLP_RELEASE_URL =
  'https://github.com/yt-dlp/yt-dlp/releases/latest/download';

// Configuration schema
const configSchema = z.object({
  // Application
  nodeEnv: z.enum(['development', 'production', 'test']).default('production'),
  logLevel: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),

  // External tools
  tools: z.object({
    /** Explicit ffmpeg executable; looked up on PATH when unset */
    ffmpegPath: z.string().min(1).optional(),
    /** Explicit yt-dlp executable; looked up on PATH when unset */
    ytDlpPath: z.string().min(1).optional(),
    /** Where a fetched yt-dlp is written; entry-script dir, then cwd, when unset */
    ytDlpInstallDir: z.string().min(1).optional(),
    ytDlpReleaseUrl: z.string().url().default(DEFAULT_YT_DLP_RELEASE_URL),
  }),

  // Storage
  storage: z.object({
    tempDir: z.string().min(1).default(tmpdir()),
  }),

  // Network
  network: z.object({
    fetchTimeoutMs: z.coerce.number().int().positive().default(120000),
  }),
});

export type Config = z.infer<typeof configSchema>;

// Empty strings count as unset
function fromEnv(name: string): string | undefined {
  const value = process.env[name];
  return value === undefined || value.trim() === '' ? undefined : value;
}

// Parse and validate configuration
function loadConfig(): Config {
  const rawConfig = {
    nodeEnv: fromEnv('NODE_ENV'),
    logLevel: fromEnv('LOG_LEVEL'),

    tools: {
      ffmpegPath: fromEnv('FFMPEG_PATH'),
      ytDlpPath: fromEnv('YT_DLP_PATH'),
      ytDlpInstallDir: fromEnv('YT_DLP_INSTALL_DIR'),
      ytDlpReleaseUrl: fromEnv('YT_DLP_RELEASE_URL'),
    },

    storage: {
      tempDir: fromEnv('FRAMEGRAB_TEMP_DIR'),
    },

    network: {
      fetchTimeoutMs: fromEnv('FETCH_TIMEOUT_MS'),
    },
  };

  return configSchema.parse(rawConfig);
}

// Singleton config instance
let configInstance: Config | null = null;

export function getConfig(): Config {
  if (!configInstance) {
    configInstance = loadConfig();
  }
  return configInstance;
}

// For testing - reset config
export function resetConfig(): void {
  configInstance = null;
}

// Validate config without loading (for startup checks)
export function validateConfig(): { valid: boolean; errors?: string[] } {
  try {
    loadConfig();
    return { valid: true };
  } catch (error) {
    if (error instanceof z.ZodError) {
      return {
        valid: false,
        errors: error.errors.map((e) => `${e.path.join('.')}: ${e.message}`),
      };
    }
    throw error;
  }
}
