/**
 * Tool Acquirer
 * Fetches a prebuilt yt-dlp binary when none is installed
 */

import { access, chmod, realpath, writeFile } from 'node:fs/promises';
import { constants as fsConstants } from 'node:fs';
import { dirname, join, resolve } from 'node:path';
import {
  createChildLogger,
  DEFAULT_YT_DLP_RELEASE_URL,
  FetchError,
  TOOL_NAMES,
} from '@framegrab/shared';
import type { AcquiredTool, ToolResolutionContext } from '../types.js';

export interface ToolAcquirerConfig {
  /** Base URL the release asset name is appended to */
  releaseBaseUrl: string;
  /** Candidate install directories, first writable one wins */
  installDirs?: string[];
  timeoutMs: number;
  platform: NodeJS.Platform;
  arch: string;
  fetchImpl: typeof fetch;
}

export const DEFAULT_TOOL_ACQUIRER_CONFIG: ToolAcquirerConfig = {
  releaseBaseUrl: DEFAULT_YT_DLP_RELEASE_URL,
  timeoutMs: 120000,
  platform: process.platform,
  arch: process.arch,
  fetchImpl: (input, init) => fetch(input, init),
};

/**
 * Standalone release asset for a platform, or null when yt-dlp publishes none
 */
export function resolveYtDlpAsset(platform: NodeJS.Platform, arch: string): string | null {
  switch (platform) {
    case 'linux':
      if (arch === 'x64') return 'yt-dlp_linux';
      if (arch === 'arm64') return 'yt-dlp_linux_aarch64';
      return null;
    case 'darwin':
      return 'yt-dlp_macos';
    case 'win32':
      if (arch === 'x64') return 'yt-dlp.exe';
      if (arch === 'ia32') return 'yt-dlp_x86.exe';
      return null;
    default:
      return null;
  }
}

/** Directory of the entry script, then the working directory */
async function defaultInstallDirs(): Promise<string[]> {
  const dirs: string[] = [];
  const entry = process.argv[1];
  if (entry) {
    try {
      dirs.push(dirname(await realpath(entry)));
    } catch {
      dirs.push(dirname(resolve(entry)));
    }
  }
  dirs.push(process.cwd());
  return dirs;
}

export class ToolAcquirer {
  private config: ToolAcquirerConfig;
  private logger = createChildLogger({ component: 'ToolAcquirer' });

  constructor(config: Partial<ToolAcquirerConfig> = {}) {
    this.config = { ...DEFAULT_TOOL_ACQUIRER_CONFIG, ...config };
  }

  /**
   * Download yt-dlp, mark it executable and return a context that resolves it by name
   */
  async acquireYtDlp(context: ToolResolutionContext): Promise<AcquiredTool> {
    const { platform, arch } = this.config;
    const asset = resolveYtDlpAsset(platform, arch);
    if (!asset) {
      throw new FetchError(`No prebuilt yt-dlp is available for ${platform}/${arch}`, {
        context: { platform, arch },
      });
    }

    const url = `${this.config.releaseBaseUrl.replace(/\/+$/, '')}/${asset}`;
    const fileName = platform === 'win32' ? `${TOOL_NAMES.YT_DLP}.exe` : TOOL_NAMES.YT_DLP;

    const installDir = await this.findWritableDir();
    const targetPath = join(installDir, fileName);

    this.logger.info({ url, targetPath }, 'Fetching yt-dlp');
    const binary = await this.download(url);

    try {
      await writeFile(targetPath, binary, { mode: 0o755 });
      await chmod(targetPath, 0o755);
    } catch (error) {
      throw new FetchError(`Could not write yt-dlp to ${targetPath}`, {
        cause: error,
        context: { targetPath },
      });
    }

    // TODO: verify against the SHA2-256SUMS asset published with each release once a policy for it is agreed
    this.logger.warn({ targetPath }, 'Fetched yt-dlp binary has not been checksum-verified');

    return {
      path: targetPath,
      context: {
        searchPath: [installDir, ...context.searchPath.filter((entry) => entry !== installDir)],
        tools: { ...context.tools, [TOOL_NAMES.YT_DLP]: targetPath },
      },
    };
  }

  private async findWritableDir(): Promise<string> {
    const candidates = this.config.installDirs ?? (await defaultInstallDirs());

    for (const dir of candidates) {
      const absolute = resolve(dir);
      try {
        await access(absolute, fsConstants.W_OK);
        return absolute;
      } catch {
        this.logger.debug({ dir: absolute }, 'Install directory not writable');
      }
    }

    throw new FetchError('No writable directory to install yt-dlp into', {
      context: { candidates },
    });
  }

  private async download(url: string): Promise<Buffer> {
    let response: Response;
    try {
      response = await this.config.fetchImpl(url, {
        redirect: 'follow',
        signal: AbortSignal.timeout(this.config.timeoutMs),
      });
    } catch (error) {
      throw new FetchError(`Failed to download yt-dlp from ${url}`, {
        cause: error,
        context: { url },
      });
    }

    if (!response.ok) {
      throw new FetchError(`Failed to download yt-dlp from ${url}: HTTP ${response.status}`, {
        context: { url, status: response.status },
      });
    }

    try {
      return Buffer.from(await response.arrayBuffer());
    } catch (error) {
      throw new FetchError(`Failed to read yt-dlp download from ${url}`, {
        cause: error,
        context: { url },
      });
    }
  }
}
