/**
 * @framegrab/shared
 * Shared types, configuration, logging and errors for framegrab
 */

export * from './types/index.js';
export * from './config/index.js';
export * from './logger/index.js';
export * from './errors/index.js';
