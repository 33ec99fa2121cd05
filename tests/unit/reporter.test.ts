import { describe, expect, it } from 'vitest';

import { loadConfig } from '../../src/config/loader.js';
import type { EnvSource } from '../../src/config/env.js';
import type { Configuration } from '../../src/schema/config.js';
import { generateJSON, generateRunSummary, serializeJSON, toHex } from '../../src/report/reporter.js';
import { generateUsage } from '../../src/report/usage.js';

function mustLoad(env: EnvSource): Configuration {
  const result = loadConfig(env);
  if (!result.ok) throw result.error;
  return result.config;
}

describe('report/reporter', () => {
  describe('generateRunSummary', () => {
    it('renders the default configuration', () => {
      const lines = generateRunSummary(mustLoad({}), {}).split('\n');

      expect(lines[0]).toBe('Run configuration');
      expect(lines[1]).toBe('='.repeat(53));
      expect(lines[2]).toBe(
        'USE_HIP_CALL         =            0 : Using custom kernels for GPU-executed copies',
      );
      expect(lines).toContain(
        'NUM_ITERATIONS       =           10 : Running 10 timed iteration(s) per topology',
      );
      expect(lines[lines.length - 2]).toBe(
        'FILL_PATTERN         = (unspecified) : Pseudo-random: (Element i = i modulo 383 + 31)',
      );
      expect(lines[lines.length - 1]).toBe('');
      expect(lines).toHaveLength(16);
    });

    it('shows the pattern text when a pattern is set', () => {
      const summary = generateRunSummary(mustLoad({ FILL_PATTERN: 'CAFE' }), {});
      expect(summary.endsWith('FILL_PATTERN         =  (specified) : Pattern: CAFE\n')).toBe(true);
    });

    it('falls back to pseudo-random for an empty pattern', () => {
      const summary = generateRunSummary(mustLoad({ FILL_PATTERN: '' }), {});
      expect(summary).toContain('FILL_PATTERN         =  (specified) : Pseudo-random:');
    });

    it('adds the SDMA row for runtime copies', () => {
      const config = mustLoad({ USE_HIP_CALL: '1' });
      const lines = generateRunSummary(config, { HSA_ENABLE_SDMA: '0' }).split('\n');
      expect(lines[4]).toBe('HSA_ENABLE_SDMA      =            0 : Using blit kernels for hipMemcpy');
      expect(lines).toHaveLength(17);
    });

    it('omits the SDMA row for memset runs', () => {
      const config = mustLoad({ USE_HIP_CALL: '1', USE_MEMSET: '1' });
      expect(generateRunSummary(config, {})).not.toContain('HSA_ENABLE_SDMA');
    });

    it('is empty for CSV output', () => {
      expect(generateRunSummary(mustLoad({ OUTPUT_TO_CSV: '1' }), {})).toBe('');
    });
  });

  describe('generateJSON', () => {
    it('renders the replicated pattern as hex', () => {
      const output = generateJSON(mustLoad({ FILL_PATTERN: 'cafe' }));
      expect(output.fillPattern).toEqual({ specified: true, hex: 'CAFECAFE', byteLength: 4 });
      expect(output.version).toBe('1.0');
      expect(output.numIterations).toBe(10);
    });

    it('serializes with sorted keys', () => {
      const json = serializeJSON(generateJSON(mustLoad({})));
      const parsed: Record<string, unknown> = JSON.parse(json);
      expect(Object.keys(parsed)).toEqual([
        'byteOffset',
        'fillPattern',
        'flags',
        'numCpuPerLink',
        'numIterations',
        'numWarmups',
        'samplingFactor',
        'version',
      ]);
    });
  });

  describe('toHex', () => {
    it('pads each byte to two upper-case digits', () => {
      expect(toHex(new Uint8Array([0x00, 0x0a, 0xff]))).toBe('000AFF');
    });
  });
});

describe('report/usage', () => {
  it('lists every variable under a header', () => {
    const lines = generateUsage().split('\n');
    expect(lines[0]).toBe('Environment variables:');
    expect(lines[1]).toBe('======================');
    expect(lines[3]).toBe(' USE_MEMSET         - Perform a memset instead of a copy (ignores source memory)');
    expect(lines).toHaveLength(16);
  });
});
