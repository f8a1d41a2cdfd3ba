#!/usr/bin/env node
/**
 * framegrab CLI
 */

import {
  ConfigurationError,
  createLogger,
  formatErrorChain,
  getConfig,
  validateConfig,
} from '@framegrab/shared';
import { createProgram } from './program.js';
import { createPipeline, logPipelineEvents, runExtraction } from './run.js';

const logger = createLogger('CLI');

async function main(argv: string[]): Promise<void> {
  const validation = validateConfig();
  if (!validation.valid) {
    throw new ConfigurationError(`Invalid environment: ${(validation.errors ?? []).join('; ')}`);
  }
  const config = getConfig();

  const program = createProgram(async (runConfig) => {
    const pipeline = createPipeline(config);
    logPipelineEvents(pipeline, logger);
    await runExtraction(pipeline, runConfig);
  });

  await program.parseAsync(argv);
}

main(process.argv).catch((error: unknown) => {
  process.stderr.write(`Error: ${formatErrorChain(error)}\n`);
  process.exitCode = 1;
});
