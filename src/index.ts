#!/usr/bin/env node

import { Command } from 'commander';
import { realpathSync } from 'node:fs';
import { pathToFileURL } from 'node:url';
import { pin } from './commands/pin.js';
import { ToolCommandError } from './core/package-manager.js';
import { InterruptedError } from './utils/cleanup.js';
import { VERSION } from './version.js';

export function exitCodeFor(err: unknown): number {
  if (err instanceof InterruptedError) return err.exitCode;
  return err instanceof ToolCommandError && err.exitCode !== 0 ? err.exitCode : 1;
}

interface CliOptions {
  config?: string;
  env: boolean;
  verbose?: boolean;
}

export function buildProgram(): Command {
  const program = new Command();

  program
    .name('pin')
    .description(
      'Re-lock pyproject.toml with Poetry and rewrite the pinned requirements file without local packages',
    )
    .version(VERSION)
    .allowExcessArguments(false)
    .option('--config <path>', 'Config file (default: pin.config.json beside the manifest)')
    .option('--no-env', 'Skip loading .env file')
    .option('--verbose', 'Show package manager output and config sources')
    .action(async (options: CliOptions) => {
      try {
        await pin({
          config: options.config,
          noEnv: options.env === false,
          verbose: options.verbose === true,
        });
      } catch (err) {
        console.error(err instanceof Error ? err.message : err);
        process.exit(exitCodeFor(err));
      }
    });

  return program;
}

// Only parse when run as CLI entry point (ESM check with symlink resolution)
const selfUrl = import.meta.url;
let isDirectRun = false;
try {
  if (process.argv[1]) {
    isDirectRun = selfUrl === pathToFileURL(realpathSync(process.argv[1])).href;
  }
} catch {
  // Missing or virtual argv path: not the CLI entry point
}
if (isDirectRun) {
  buildProgram().parseAsync().catch((err: unknown) => {
    console.error(err instanceof Error ? err.message : err);
    process.exit(1);
  });
}
