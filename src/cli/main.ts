#!/usr/bin/env node

/**
 * xferbench-config CLI entry point.
 * Thin wrapper — all logic delegated to config and report.
 */

import 'dotenv/config';
import { Command } from 'commander';

import { registerShowCommand, registerUsageCommand } from './run.js';

const program = new Command();

program
  .name('xferbench-config')
  .description(
    'Load, validate and display the environment configuration of a memory-transfer benchmark.',
  )
  .version('0.1.0');

registerShowCommand(program);
registerUsageCommand(program);

await program.parseAsync();
