import { readFile } from 'node:fs/promises';

import { parse as parseYaml } from 'yaml';
import type { ZodError } from 'zod';

import { configurationSchema, envFileSchema } from '../schema/config.js';
import type { Configuration, EnvFile } from '../schema/config.js';
import type { BoundedField } from './defaults.js';
import { BOUNDED_OPTIONS, FILL_PATTERN_VARIABLE, FLAG_VARIABLES } from './defaults.js';
import { ConfigError, ConfigRangeError } from './errors.js';
import type { EnvSource } from './env.js';
import { readIntVar } from './env.js';
import { decodeFillPattern } from './pattern.js';

// ── Result ───────────────────────────────────────────────────

export type LoadResult =
  | { ok: true; config: Configuration; warnings: string[] }
  | { ok: false; error: ConfigError };

// ── Public API ──────────────────────────────────────────────

/**
 * Build the run configuration from an environment.
 *
 * Integer options fall back to their defaults when unset and are converted
 * leniently when set. The fill pattern is decoded next, then the bounded
 * options are checked in declaration order; the first failure is returned
 * and nothing after it is checked.
 */
export function loadConfig(env: EnvSource): LoadResult {
  const warnings: string[] = [];

  const read = (name: string, defaultValue: number): number => {
    const reading = readIntVar(env, name, defaultValue);
    if (reading.warning !== undefined) warnings.push(reading.warning);
    return reading.value;
  };
  const flag = (name: string): boolean => read(name, 0) !== 0;
  const bounded = (field: BoundedField): number =>
    read(BOUNDED_OPTIONS[field].variable, BOUNDED_OPTIONS[field].defaultValue);

  const useHipCall = flag(FLAG_VARIABLES.useHipCall);
  const useMemset = flag(FLAG_VARIABLES.useMemset);
  const useSingleSync = flag(FLAG_VARIABLES.useSingleSync);
  const useInteractive = flag(FLAG_VARIABLES.useInteractive);
  const combineTiming = flag(FLAG_VARIABLES.combineTiming);
  const showAddr = flag(FLAG_VARIABLES.showAddr);
  const outputToCsv = flag(FLAG_VARIABLES.outputToCsv);
  const byteOffset = bounded('byteOffset');
  const numWarmups = bounded('numWarmups');
  const numIterations = bounded('numIterations');
  const samplingFactor = bounded('samplingFactor');
  const numCpuPerLink = bounded('numCpuPerLink');

  const fillPatternText = env[FILL_PATTERN_VARIABLE];
  let fillPattern: Uint8Array;
  try {
    fillPattern = decodeFillPattern(fillPatternText);
  } catch (err) {
    if (err instanceof ConfigError) return { ok: false, error: err };
    throw err;
  }

  const parsed = configurationSchema.safeParse({
    useHipCall,
    useMemset,
    useSingleSync,
    useInteractive,
    combineTiming,
    showAddr,
    outputToCsv,
    byteOffset,
    numWarmups,
    numIterations,
    samplingFactor,
    numCpuPerLink,
    fillPattern,
    fillPatternText,
  });

  if (!parsed.success) {
    return { ok: false, error: toRangeError(parsed.error) };
  }

  return { ok: true, config: Object.freeze(parsed.data), warnings };
}

/**
 * Load and validate a YAML (or JSON) file of environment variables.
 * YAML scalars keep their exact text (`00112233` stays `00112233`) so a
 * value means the same here as in the process environment.
 * Throws a descriptive error if the file is missing or invalid.
 */
export async function loadEnvFile(envFilePath: string): Promise<EnvFile> {
  const raw = await readFile(envFilePath, 'utf-8');

  const parsed: unknown = envFilePath.endsWith('.json')
    ? JSON.parse(raw)
    : parseYaml(raw, { schema: 'failsafe' });

  return envFileSchema.parse(parsed ?? {});
}

// ── Helpers ─────────────────────────────────────────────────

function isBoundedField(key: unknown): key is BoundedField {
  return typeof key === 'string' && key in BOUNDED_OPTIONS;
}

function toRangeError(error: ZodError): ConfigError {
  const issue = error.issues[0];
  const field = issue?.path[0];
  if (issue === undefined || !isBoundedField(field)) {
    throw new Error(`Unexpected configuration issue: ${error.message}`);
  }
  return new ConfigRangeError(field, issue.message);
}
