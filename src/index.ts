/**
 * Library entry point for the benchmark engine: load once at start-up,
 * then pass the frozen configuration to whatever needs it.
 */

export * from './config/index.js';
export * from './schema/index.js';
export * from './report/index.js';
