import type { Configuration } from '../schema/index.js';
import { JSON_OUTPUT_VERSION } from '../schema/jsonOutput.js';
import type { JsonOutput } from '../schema/jsonOutput.js';
import { FLAG_VARIABLES, PSEUDO_RANDOM_FILL, SDMA_VARIABLE } from '../config/defaults.js';
import type { EnvSource } from '../config/env.js';

// Re-export contract types for consumers
export type { JsonOutput };

// ── Run summary ──────────────────────────────────────────────

const NAME_WIDTH = 20;
const VALUE_WIDTH = 12;

function row(name: string, value: string | number, description: string): string {
  return `${name.padEnd(NAME_WIDTH)} = ${String(value).padStart(VALUE_WIDTH)} : ${description}`;
}

function flagValue(enabled: boolean): number {
  return enabled ? 1 : 0;
}

/**
 * Human-readable run configuration table.
 * Empty when CSV output is requested so the CSV stream stays parseable.
 */
export function generateRunSummary(config: Configuration, env: EnvSource): string {
  if (config.outputToCsv) return '';

  const lines: string[] = [];
  lines.push('Run configuration');
  lines.push('='.repeat(53));

  lines.push(
    row(
      FLAG_VARIABLES.useHipCall,
      flagValue(config.useHipCall),
      `Using ${config.useHipCall ? 'HIP functions' : 'custom kernels'} for GPU-executed copies`,
    ),
  );
  lines.push(
    row(
      FLAG_VARIABLES.useMemset,
      flagValue(config.useMemset),
      `Performing ${config.useMemset ? 'memset' : 'memcopy'}`,
    ),
  );

  // Only meaningful when runtime copies are in play
  if (config.useHipCall && !config.useMemset) {
    const sdma = env[SDMA_VARIABLE];
    lines.push(
      row(
        SDMA_VARIABLE,
        sdma ?? '(unset)',
        sdma === '0' ? 'Using blit kernels for hipMemcpy' : 'Using DMA copy engines',
      ),
    );
  }

  lines.push(
    row(
      FLAG_VARIABLES.useSingleSync,
      flagValue(config.useSingleSync),
      config.useSingleSync
        ? 'Synchronizing only once, after all iterations'
        : 'Synchronizing per iteration',
    ),
  );
  lines.push(
    row(
      FLAG_VARIABLES.useInteractive,
      flagValue(config.useInteractive),
      `Running in ${config.useInteractive ? 'interactive' : 'non-interactive'} mode`,
    ),
  );
  lines.push(
    row(
      FLAG_VARIABLES.combineTiming,
      flagValue(config.combineTiming),
      config.combineTiming ? 'Using combined timing+launch' : 'Using separate timing / launch',
    ),
  );
  lines.push(
    row(
      FLAG_VARIABLES.showAddr,
      flagValue(config.showAddr),
      config.showAddr
        ? 'Displaying src/dst mem addresses'
        : 'Not displaying src/dst mem addresses',
    ),
  );
  lines.push(row(FLAG_VARIABLES.outputToCsv, 0, 'Output to console'));

  lines.push(row('BYTE_OFFSET', config.byteOffset, `Using byte offset of ${String(config.byteOffset)}`));
  lines.push(
    row(
      'NUM_WARMUPS',
      config.numWarmups,
      `Running ${String(config.numWarmups)} warmup iteration(s) per topology`,
    ),
  );
  lines.push(
    row(
      'NUM_ITERATIONS',
      config.numIterations,
      `Running ${String(config.numIterations)} timed iteration(s) per topology`,
    ),
  );
  lines.push(
    row(
      'SAMPLING_FACTOR',
      config.samplingFactor,
      `Adding ${String(config.samplingFactor)} sample(s) between powers of 2 for generated sizes`,
    ),
  );
  lines.push(
    row(
      'NUM_CPU_PER_LINK',
      config.numCpuPerLink,
      `Using ${String(config.numCpuPerLink)} CPU thread(s) per CPU-based-copy Link`,
    ),
  );

  const patternDescription =
    config.fillPattern.length > 0 && config.fillPatternText !== undefined
      ? `Pattern: ${config.fillPatternText}`
      : `Pseudo-random: (Element i = i modulo ${String(PSEUDO_RANDOM_FILL.MODULUS)} + ${String(PSEUDO_RANDOM_FILL.OFFSET)})`;
  lines.push(
    row(
      'FILL_PATTERN',
      config.fillPatternText !== undefined ? '(specified)' : '(unspecified)',
      patternDescription,
    ),
  );

  return lines.join('\n') + '\n';
}

// ── JSON generator ───────────────────────────────────────────

export function toHex(bytes: Uint8Array): string {
  return Array.from(bytes, (b) => b.toString(16).toUpperCase().padStart(2, '0')).join('');
}

export function generateJSON(config: Configuration): JsonOutput {
  return {
    version: JSON_OUTPUT_VERSION,
    flags: {
      useHipCall: config.useHipCall,
      useMemset: config.useMemset,
      useSingleSync: config.useSingleSync,
      useInteractive: config.useInteractive,
      combineTiming: config.combineTiming,
      showAddr: config.showAddr,
      outputToCsv: config.outputToCsv,
    },
    byteOffset: config.byteOffset,
    numWarmups: config.numWarmups,
    numIterations: config.numIterations,
    samplingFactor: config.samplingFactor,
    numCpuPerLink: config.numCpuPerLink,
    fillPattern: {
      specified: config.fillPatternText !== undefined,
      hex: toHex(config.fillPattern),
      byteLength: config.fillPattern.length,
    },
  };
}

// ── Deterministic serialization ─────────────────────────────
// Keys are sorted lexicographically for stable, diffable output.

export function serializeJSON(output: JsonOutput): string {
  return JSON.stringify(output, sortedReplacer, 2);
}

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function sortedReplacer(_key: string, value: unknown): unknown {
  if (!isPlainRecord(value)) return value;
  const sorted: Record<string, unknown> = {};
  for (const k of Object.keys(value).sort()) {
    sorted[k] = value[k];
  }
  return sorted;
}
