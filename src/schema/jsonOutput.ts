import { z } from 'zod';

// ── Version ─────────────────────────────────────────────────
// Bump this when the contract changes.

export const JSON_OUTPUT_VERSION = '1.0' as const;

// ── Sections ────────────────────────────────────────────────

export const jsonOutputFlagsSchema = z.object({
  useHipCall: z.boolean(),
  useMemset: z.boolean(),
  useSingleSync: z.boolean(),
  useInteractive: z.boolean(),
  combineTiming: z.boolean(),
  showAddr: z.boolean(),
  outputToCsv: z.boolean(),
});

export type JsonOutputFlags = z.infer<typeof jsonOutputFlagsSchema>;

export const jsonOutputFillPatternSchema = z.object({
  specified: z.boolean(),
  hex: z.string(),
  byteLength: z.number().int().nonnegative(),
});

export type JsonOutputFillPattern = z.infer<typeof jsonOutputFillPatternSchema>;

// ── Root output ─────────────────────────────────────────────

export const jsonOutputSchema = z.object({
  version: z.literal(JSON_OUTPUT_VERSION),
  flags: jsonOutputFlagsSchema,
  byteOffset: z.number().int(),
  numWarmups: z.number().int().nonnegative(),
  numIterations: z.number().int().positive(),
  samplingFactor: z.number().int().positive(),
  numCpuPerLink: z.number().int().positive(),
  fillPattern: jsonOutputFillPatternSchema,
});

export type JsonOutput = z.infer<typeof jsonOutputSchema>;
