/**
 * Report generation module.
 * Pure formatting — reads a finished configuration, decides nothing.
 */

export { generateRunSummary, generateJSON, serializeJSON, toHex } from './reporter.js';
export type { JsonOutput } from './reporter.js';
export { generateUsage } from './usage.js';
