import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { Command } from 'commander';
import { afterEach, describe, expect, it, vi } from 'vitest';

import { registerShowCommand, resolveConfig } from '../../src/cli/run.js';

describe('cli/run', () => {
  describe('resolveConfig', () => {
    it('loads straight from the given environment', async () => {
      const { env, result } = await resolveConfig({ NUM_WARMUPS: '1', UNRELATED: undefined });
      expect(env).toEqual({ NUM_WARMUPS: '1' });
      expect(result.ok && result.config.numWarmups).toBe(1);
    });

    it('layers the process environment over the env file', async () => {
      const dir = await mkdtemp(path.join(os.tmpdir(), 'xferbench-config-'));
      try {
        const file = path.join(dir, 'bench.yaml');
        await writeFile(file, 'NUM_ITERATIONS: 20\nNUM_WARMUPS: 2\n', 'utf-8');

        const { env, result } = await resolveConfig({ NUM_ITERATIONS: '5' }, file);
        expect(env).toEqual({ NUM_ITERATIONS: '5', NUM_WARMUPS: '2' });
        expect(result.ok && result.config.numIterations).toBe(5);
        expect(result.ok && result.config.numWarmups).toBe(2);
      } finally {
        await rm(dir, { recursive: true, force: true });
      }
    });

    it('propagates env file failures', async () => {
      await expect(resolveConfig({}, '/nonexistent/xferbench.yaml')).rejects.toThrow();
    });
  });

  describe('show command', () => {
    afterEach(() => {
      vi.restoreAllMocks();
      vi.unstubAllEnvs();
      process.exitCode = undefined;
    });

    function captureOutput() {
      return {
        stdout: vi.spyOn(process.stdout, 'write').mockImplementation(() => true),
        stderr: vi.spyOn(process.stderr, 'write').mockImplementation(() => true),
      };
    }

    function program(): Command {
      const cmd = new Command();
      cmd.exitOverride();
      registerShowCommand(cmd);
      return cmd;
    }

    it('prints the error line and exits 1 on an invalid value', async () => {
      const { stdout, stderr } = captureOutput();
      vi.stubEnv('NUM_ITERATIONS', '0');
      await program().parseAsync(['show'], { from: 'user' });

      expect(stderr).toHaveBeenCalledWith('[ERROR] NUM_ITERATIONS must be set to a positive number\n');
      expect(stdout).not.toHaveBeenCalled();
      expect(process.exitCode).toBe(1);
    });

    it('exits 4 when the env file cannot be read', async () => {
      const { stdout, stderr } = captureOutput();
      await program().parseAsync(['show', '--env-file', '/nonexistent/xferbench.yaml'], {
        from: 'user',
      });

      expect(stderr).toHaveBeenCalledWith(expect.stringMatching(/^\[ERROR\] ENOENT/));
      expect(stdout).not.toHaveBeenCalled();
      expect(process.exitCode).toBe(4);
    });

    it('writes JSON to stdout', async () => {
      const { stdout } = captureOutput();
      vi.stubEnv('FILL_PATTERN', 'AB');
      vi.stubEnv('NUM_ITERATIONS', '7');
      await program().parseAsync(['show', '--json'], { from: 'user' });

      expect(stdout).toHaveBeenCalledTimes(1);
      const [written] = stdout.mock.calls[0] ?? [];
      expect(typeof written).toBe('string');
      const output: unknown = JSON.parse(String(written));
      expect(output).toMatchObject({
        numIterations: 7,
        fillPattern: { specified: true, hex: 'ABABABAB', byteLength: 4 },
      });
      expect(process.exitCode).toBeUndefined();
    });

    it('logs lenient values as warnings', async () => {
      const { stdout, stderr } = captureOutput();
      vi.stubEnv('NUM_WARMUPS', '2 warmups');
      vi.stubEnv('OUTPUT_TO_CSV', '1');
      await program().parseAsync(['show'], { from: 'user' });

      expect(stderr).toHaveBeenCalledWith(
        '[WARN] NUM_WARMUPS="2 warmups" is not an integer; using 2\n',
      );
      expect(stdout).toHaveBeenCalledWith('');
    });
  });
});
