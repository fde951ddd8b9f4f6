#!/usr/bin/env node
/**
 * Production entry point for the Hookrail CLI.
 *
 * Wires real dependencies (filesystem, process streams) into CliDeps and
 * dispatches to the CLI command handler.
 *
 * Usage:
 *   node dist/main.js check ./hookrail.toml
 *   node dist/main.js list
 */

import { existsSync } from 'node:fs';

import { parseArgs, runCommand } from './cli.js';
import type { CliDeps } from './cli.js';
import { resolveConfigPath } from './types/config.js';
import { FileConfigurationSource } from './core/config-loader.js';
import { configureLogging, isLogLevel } from './core/logger.js';

/**
 * Run the CLI with the given arguments.
 *
 * @param argv - Process arguments (defaults to process.argv).
 * @returns Process exit code.
 */
export async function main(argv: string[] = process.argv): Promise<number> {
  const { command, subcommand, flags } = parseArgs(argv);

  const level = process.env['HOOKRAIL_LOG_LEVEL'];
  // The CLI reports results itself; log only errors unless asked for more.
  configureLogging({ level: isLogLevel(level) ? level : 'error' });

  const deps: CliDeps = {
    stdout: (msg) => process.stdout.write(msg + '\n'),
    stderr: (msg) => process.stderr.write(msg + '\n'),
    defaultConfigPath: resolveConfigPath(),
    fileExists: existsSync,
    openConfig: (path) => new FileConfigurationSource(path),
  };

  return runCommand(command, deps, flags, subcommand);
}

// ---------------------------------------------------------------------------
// Entry point — run when executed directly
// ---------------------------------------------------------------------------

/* c8 ignore next 3 */
main().then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    process.stderr.write(`${err instanceof Error ? (err.stack ?? err.message) : String(err)}\n`);
    process.exitCode = 1;
  },
);
