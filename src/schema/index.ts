/**
 * Schema module — single source of truth for all data shapes.
 * Zod schemas + inferred TypeScript types.
 */

export * from './config.js';
export * from './jsonOutput.js';
