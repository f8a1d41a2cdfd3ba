/**
 * Core types for framegrab
 */

export * from './run-config.js';
