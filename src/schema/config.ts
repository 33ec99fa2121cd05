import { z } from 'zod';

import { ELEMENT_SIZE } from '../config/defaults.js';

// ── Configuration ───────────────────────────────────────────
// Field order is validation order: the first failing rule is the one
// reported.

export const configurationSchema = z.object({
  useHipCall: z.boolean(),
  useMemset: z.boolean(),
  useSingleSync: z.boolean(),
  useInteractive: z.boolean(),
  combineTiming: z.boolean(),
  showAddr: z.boolean(),
  outputToCsv: z.boolean(),

  byteOffset: z
    .number()
    .int()
    .multipleOf(ELEMENT_SIZE, `BYTE_OFFSET must be set to multiple of ${String(ELEMENT_SIZE)}`),
  numWarmups: z
    .number()
    .int()
    .min(0, 'NUM_WARMUPS must be set to a non-negative number'),
  numIterations: z
    .number()
    .int()
    .min(1, 'NUM_ITERATIONS must be set to a positive number'),
  samplingFactor: z
    .number()
    .int()
    .min(1, 'SAMPLING_FACTOR must be greater or equal to 1'),
  numCpuPerLink: z
    .number()
    .int()
    .min(1, 'NUM_CPU_PER_LINK must be greater or equal to 1'),

  fillPattern: z
    .custom<Uint8Array>((value) => value instanceof Uint8Array, 'FILL_PATTERN must be a byte buffer')
    .refine((bytes) => bytes.length % ELEMENT_SIZE === 0, {
      message: `FILL_PATTERN must decode to a multiple of ${String(ELEMENT_SIZE)} bytes`,
    }),
  fillPatternText: z.string().optional(),
});

/**
 * Frozen run configuration. The freeze is shallow: `fillPattern` bytes are
 * the configuration's own buffer and must not be written. Consumers that
 * need mutable source data take it from `fillSourceElements`, which copies.
 */
export type Configuration = Readonly<z.infer<typeof configurationSchema>>;

// ── Environment file ────────────────────────────────────────
// Scalars only. YAML is read with the failsafe schema, so values arrive as
// their source text; true/false map to the 1/0 the flags expect.

export const envVariableNameSchema = z
  .string()
  .regex(/^[A-Z][A-Z0-9_]*$/, 'Variable names must be upper-case identifiers');

function toVariableText(value: string | number | boolean): string {
  if (value === true || value === 'true') return '1';
  if (value === false || value === 'false') return '0';
  return String(value);
}

export const envFileSchema = z
  .record(envVariableNameSchema, z.union([z.string(), z.number(), z.boolean()]))
  .transform((entries) => {
    const env: Record<string, string> = {};
    for (const [name, value] of Object.entries(entries)) {
      env[name] = toVariableText(value);
    }
    return env;
  });

export type EnvFile = z.infer<typeof envFileSchema>;
