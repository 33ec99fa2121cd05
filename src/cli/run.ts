import type { Command } from 'commander';

import { loadConfig, loadEnvFile } from '../config/loader.js';
import type { LoadResult } from '../config/loader.js';
import { mergeEnv } from '../config/env.js';
import type { EnvSource } from '../config/env.js';
import { generateJSON, generateRunSummary, serializeJSON } from '../report/reporter.js';
import { generateUsage } from '../report/usage.js';
import * as log from '../utils/logger.js';

// Config errors exit 1; anything else (unreadable env file, bad YAML) exits 4.
const EXIT_UNEXPECTED = 4;

// ── Config resolution ────────────────────────────────────────

/**
 * Layer the process environment over an optional env file and load.
 * Env-file failures propagate; configuration failures come back in the
 * result.
 */
export async function resolveConfig(
  processEnv: EnvSource,
  envFilePath?: string,
): Promise<{ env: EnvSource; result: LoadResult }> {
  const fileEnv = envFilePath !== undefined ? await loadEnvFile(envFilePath) : {};
  const env = mergeEnv(fileEnv, processEnv);
  return { env, result: loadConfig(env) };
}

// ── Command registration ─────────────────────────────────────

export function registerShowCommand(program: Command): void {
  program
    .command('show', { isDefault: true })
    .description('Load the configuration from the environment and print it')
    .option('--json', 'Output JSON to stdout')
    .option('--env-file <path>', 'YAML or JSON file of variables under the process environment')
    .action(async (opts: { json?: true; envFile?: string }) => {
      try {
        const { env, result } = await resolveConfig(process.env, opts.envFile);

        if (!result.ok) {
          log.error(result.error.message);
          process.exitCode = result.error.exitCode;
          return;
        }

        for (const warning of result.warnings) {
          log.warn(warning);
        }

        if (opts.json) {
          process.stdout.write(serializeJSON(generateJSON(result.config)) + '\n');
        } else {
          process.stdout.write(generateRunSummary(result.config, env));
        }
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        log.error(message);
        process.exitCode = EXIT_UNEXPECTED;
      }
    });
}

export function registerUsageCommand(program: Command): void {
  program
    .command('usage')
    .description('List the environment variables the benchmark reads')
    .action(() => {
      process.stdout.write(generateUsage());
    });
}
