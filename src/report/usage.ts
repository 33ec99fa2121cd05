import { DEFAULTS, ELEMENT_SIZE } from '../config/defaults.js';

// ── Usage banner ─────────────────────────────────────────────

const USAGE_ENTRIES: ReadonlyArray<readonly [label: string, description: string]> = [
  ['USE_HIP_CALL', 'Use HIP runtime copy/set calls instead of custom shader kernels for GPU-executed copies'],
  ['USE_MEMSET', 'Perform a memset instead of a copy (ignores source memory)'],
  ['USE_SINGLE_SYNC', 'Perform synchronization only once after all iterations instead of per iteration'],
  ['USE_INTERACTIVE', 'Pause for user-input before starting transfer loop'],
  ['COMBINE_TIMING', 'Combines timing with launch (potentially lower timing overhead)'],
  ['SHOW_ADDR', 'Print out memory addresses for each Link'],
  ['OUTPUT_TO_CSV', 'Outputs to CSV format if set'],
  [
    'BYTE_OFFSET',
    `Initial byte-offset for memory allocations.  Must be multiple of ${String(ELEMENT_SIZE)}. Defaults to ${String(DEFAULTS.BYTE_OFFSET)}`,
  ],
  ['NUM_WARMUPS=W', `Perform W untimed warmup iteration(s) per test. Defaults to ${String(DEFAULTS.NUM_WARMUPS)}`],
  ['NUM_ITERATIONS=I', `Perform I timed iteration(s) per test. Defaults to ${String(DEFAULTS.NUM_ITERATIONS)}`],
  ['SAMPLING_FACTOR=F', 'Add F samples (when possible) between powers of 2 when auto-generating data sizes'],
  ['NUM_CPU_PER_LINK=C', `Use C threads per Link for CPU-executed copies. Defaults to ${String(DEFAULTS.NUM_CPU_PER_LINK)}`],
  ['FILL_PATTERN=STR', 'Fill input buffer with pattern specified in hex digits (0-9,a-f,A-F).  Must be even number of digits'],
];

const LABEL_WIDTH = 18;

export function generateUsage(): string {
  const lines = ['Environment variables:', '='.repeat(22)];
  for (const [label, description] of USAGE_ENTRIES) {
    lines.push(` ${label.padEnd(LABEL_WIDTH)} - ${description}`);
  }
  return lines.join('\n') + '\n';
}
