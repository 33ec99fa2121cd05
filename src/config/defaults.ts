/**
 * Default configuration values and the environment variables that
 * override them. All values are overridable via environment.
 */

/** Size in bytes of one data element (a 32-bit float). */
export const ELEMENT_SIZE = 4;

export const DEFAULTS = {
  BYTE_OFFSET: 0,
  NUM_WARMUPS: 3,
  NUM_ITERATIONS: 10,
  SAMPLING_FACTOR: 1,
  NUM_CPU_PER_LINK: 4,
} as const;

// Element i of the pseudo-random default fill is (i % MODULUS) + OFFSET.
export const PSEUDO_RANDOM_FILL = {
  MODULUS: 383,
  OFFSET: 31,
} as const;

// ── Variable names ──────────────────────────────────────────

export const FLAG_VARIABLES = {
  useHipCall: 'USE_HIP_CALL',
  useMemset: 'USE_MEMSET',
  useSingleSync: 'USE_SINGLE_SYNC',
  useInteractive: 'USE_INTERACTIVE',
  combineTiming: 'COMBINE_TIMING',
  showAddr: 'SHOW_ADDR',
  outputToCsv: 'OUTPUT_TO_CSV',
} as const;

export type FlagField = keyof typeof FLAG_VARIABLES;

export const BOUNDED_OPTIONS = {
  byteOffset: {
    variable: 'BYTE_OFFSET',
    defaultValue: DEFAULTS.BYTE_OFFSET,
    code: 'INVALID_BYTE_OFFSET',
  },
  numWarmups: {
    variable: 'NUM_WARMUPS',
    defaultValue: DEFAULTS.NUM_WARMUPS,
    code: 'INVALID_WARMUP_COUNT',
  },
  numIterations: {
    variable: 'NUM_ITERATIONS',
    defaultValue: DEFAULTS.NUM_ITERATIONS,
    code: 'INVALID_ITERATION_COUNT',
  },
  samplingFactor: {
    variable: 'SAMPLING_FACTOR',
    defaultValue: DEFAULTS.SAMPLING_FACTOR,
    code: 'INVALID_SAMPLING_FACTOR',
  },
  numCpuPerLink: {
    variable: 'NUM_CPU_PER_LINK',
    defaultValue: DEFAULTS.NUM_CPU_PER_LINK,
    code: 'INVALID_THREAD_COUNT',
  },
} as const;

export type BoundedField = keyof typeof BOUNDED_OPTIONS;

export const FILL_PATTERN_VARIABLE = 'FILL_PATTERN';

/** Read by the run summary only; never part of the configuration. */
export const SDMA_VARIABLE = 'HSA_ENABLE_SDMA';
