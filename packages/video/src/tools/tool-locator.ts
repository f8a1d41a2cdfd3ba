/**
 * Tool Locator
 * Finds external executables along a ToolResolutionContext's search path
 */

import which from 'which';
import { delimiter } from 'node:path';
import { createChildLogger, type ToolName } from '@framegrab/shared';
import type { LocateResult, ToolResolutionContext } from '../types.js';

/**
 * Context seeded from the process's PATH and any explicitly configured tool paths
 */
export function createResolutionContext(
  env: NodeJS.ProcessEnv = process.env,
  overrides: Partial<Record<ToolName, string>> = {}
): ToolResolutionContext {
  const rawPath = env.PATH ?? env.Path ?? '';
  return {
    searchPath: rawPath.split(delimiter).filter((entry) => entry.length > 0),
    tools: { ...overrides },
  };
}

/**
 * Child-process environment whose PATH mirrors the context's search path.
 * Any existing path variable is dropped whatever its case (Windows carries `Path`).
 */
export function toProcessEnv(
  context: ToolResolutionContext,
  baseEnv: NodeJS.ProcessEnv = process.env
): NodeJS.ProcessEnv {
  const env: NodeJS.ProcessEnv = {};
  for (const [key, value] of Object.entries(baseEnv)) {
    if (key.toUpperCase() !== 'PATH') env[key] = value;
  }
  env.PATH = context.searchPath.join(delimiter);
  return env;
}

export class ToolLocator {
  private logger = createChildLogger({ component: 'ToolLocator' });

  /**
   * Resolve a tool by name. An explicit path in the context wins over the search path;
   * if that path is not an executable the tool counts as not found.
   */
  async locate(name: ToolName, context: ToolResolutionContext): Promise<LocateResult> {
    const explicit = context.tools[name];
    const target = explicit ?? name;

    // An empty path string makes which search the working directory
    if (explicit === undefined && context.searchPath.length === 0) {
      return { found: false };
    }

    const path = await which(target, {
      path: context.searchPath.join(delimiter),
      nothrow: true,
    });

    if (path === null) {
      this.logger.debug({ tool: name, explicit }, 'Tool not found');
      return { found: false };
    }

    this.logger.debug({ tool: name, path }, 'Tool located');
    return { found: true, path };
  }
}
