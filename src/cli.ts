/**
 * Hookrail CLI.
 *
 * Provides the `hookrail` command with subcommands:
 *   - `check [path]` — Validate a config file and load every step it names.
 *   - `list [path]`  — Show each configured filter with its steps and policy.
 *
 * Without a path, the config file comes from `$HOOKRAIL_CONFIG` or
 * `./hookrail.toml`. All external dependencies are injected via
 * {@link CliDeps} for testability; `main.ts` wires the real ones.
 */

import { dirname } from 'node:path';

import { VERSION } from './index.js';
import { normalizeFilterConfig, type FilterConfig } from './types/config.js';
import { formatErrorMessage } from './types/errors.js';
import type { ListableConfigurationSource } from './core/config-loader.js';
import { ModuleStepLoader, type ModuleImporter } from './core/module-step-loader.js';
import { StepRegistry } from './core/step-resolver.js';
import { isFilterType } from './filters/names.js';

// ---------------------------------------------------------------------------
// CLI dependency injection
// ---------------------------------------------------------------------------

/** Loads every filter of a config file; throws when the file is invalid. */
export interface ConfigFileReader extends ListableConfigurationSource {
  load(): unknown;
}

/** Injectable dependencies for CLI commands. */
export interface CliDeps {
  /** Write to stdout. */
  stdout: (msg: string) => void;
  /** Write to stderr. */
  stderr: (msg: string) => void;
  /** Config path used when the command names none. */
  defaultConfigPath: string;
  /** Check whether a file exists. */
  fileExists: (path: string) => boolean;
  /** Open a config file as a configuration source. */
  openConfig: (path: string) => ConfigFileReader;
  /** Import a step module. Omit to use dynamic `import()`. */
  importModule?: ModuleImporter;
}

// ---------------------------------------------------------------------------
// Argument parsing
// ---------------------------------------------------------------------------

/** Parsed CLI arguments. */
export interface ParsedArgs {
  command: string;
  subcommand: string;
  flags: Record<string, boolean>;
}

/**
 * Parse process.argv into a command, optional subcommand, and flags.
 *
 * Expects argv in the form: [node, script, command?, subcommand?, ...flags]
 */
export function parseArgs(argv: string[]): ParsedArgs {
  const args = argv.slice(2);
  const flags: Record<string, boolean> = {};
  let command = '';
  let subcommand = '';

  for (const arg of args) {
    if (arg.startsWith('--')) {
      flags[arg.slice(2)] = true;
    } else if (!command) {
      command = arg;
    } else if (!subcommand) {
      subcommand = arg;
    }
  }

  return { command, subcommand, flags };
}

// ---------------------------------------------------------------------------
// Command dispatch
// ---------------------------------------------------------------------------

const USAGE = `Usage: hookrail <command> [config]

Commands:
  check [config]   Validate a config file and load every step it names
  list [config]    Show configured filters, their steps and failure policy

Options:
  --version    Show version number
  --help       Show this help message`;

/**
 * Dispatch a command string to the appropriate handler.
 *
 * @returns Process exit code (0 = success, 1 = failure).
 */
export async function runCommand(
  command: string,
  deps: CliDeps,
  flags: Record<string, boolean> = {},
  subcommand = '',
): Promise<number> {
  if (command === '--version' || flags['version']) {
    deps.stdout(VERSION);
    return 0;
  }

  if (command === '' || command === '--help' || flags['help']) {
    deps.stdout(USAGE);
    return 0;
  }

  const configPath = subcommand || deps.defaultConfigPath;

  switch (command) {
    case 'check':
      return check(configPath, deps);
    case 'list':
      return list(configPath, deps);
    default:
      deps.stderr(`Unknown command: "${command}"\n`);
      deps.stdout(USAGE);
      return 1;
  }
}

// ---------------------------------------------------------------------------
// Shared loading
// ---------------------------------------------------------------------------

interface LoadedFilter {
  filterType: string;
  config?: FilterConfig;
  error?: string;
}

function loadFilters(configPath: string, deps: CliDeps): LoadedFilter[] | null {
  if (!deps.fileExists(configPath)) {
    deps.stderr(`Config file not found: ${configPath}`);
    return null;
  }

  const source = deps.openConfig(configPath);
  try {
    source.load();
  } catch (err: unknown) {
    deps.stderr(`  FAIL  ${configPath}: ${formatErrorMessage(err)}`);
    return null;
  }

  return source.filterTypes().map((filterType) => {
    try {
      return { filterType, config: normalizeFilterConfig(source.getConfig(filterType), filterType) };
    } catch (err: unknown) {
      return { filterType, error: formatErrorMessage(err) };
    }
  });
}

// ---------------------------------------------------------------------------
// check
// ---------------------------------------------------------------------------

/**
 * Validate a config file.
 *
 * Reports, per filter type: shape errors, malformed filter type names
 * (warning only) and step references that fail to load. Relative module
 * references resolve against the config file's directory.
 */
export async function check(configPath: string, deps: CliDeps): Promise<number> {
  const filters = loadFilters(configPath, deps);
  if (filters === null) {
    return 1;
  }

  const loader = new ModuleStepLoader({
    registry: new StepRegistry(),
    baseDir: dirname(configPath),
    importModule: deps.importModule,
  });

  let failures = 0;
  for (const filter of filters) {
    if (!isFilterType(filter.filterType)) {
      deps.stderr(`  WARN  ${filter.filterType}: name does not follow org.<namespace>...v<N>`);
    }

    if (!filter.config) {
      failures++;
      deps.stderr(`  FAIL  ${filter.filterType}: ${filter.error ?? 'invalid configuration'}`);
      continue;
    }

    const results = await loader.preload(filter.config.pipeline);
    const failed = results.filter((result) => !result.ok);
    if (failed.length === 0) {
      deps.stdout(`  PASS  ${filter.filterType}: ${describeSteps(filter.config.pipeline.length)}`);
      continue;
    }

    failures++;
    deps.stderr(`  FAIL  ${filter.filterType}:`);
    for (const result of failed) {
      if (!result.ok) {
        deps.stderr(`        ${result.reference}: ${result.error}`);
      }
    }
  }

  deps.stdout(
    failures === 0
      ? `\n${filters.length} filter(s) OK`
      : `\n${failures} of ${filters.length} filter(s) failed`,
  );
  return failures === 0 ? 0 : 1;
}

function describeSteps(count: number): string {
  return count === 1 ? '1 step' : `${count} steps`;
}

// ---------------------------------------------------------------------------
// list
// ---------------------------------------------------------------------------

/** Print configured filters with their steps in execution order. */
export function list(configPath: string, deps: CliDeps): number {
  const filters = loadFilters(configPath, deps);
  if (filters === null) {
    return 1;
  }

  if (filters.length === 0) {
    deps.stdout('No filters configured.');
    return 0;
  }

  let invalid = false;
  for (const filter of filters) {
    if (!filter.config) {
      invalid = true;
      deps.stderr(`${filter.filterType} (invalid: ${filter.error ?? 'unknown error'})`);
      continue;
    }

    deps.stdout(`${filter.filterType} (fail_silently: ${String(filter.config.failSilently)})`);
    filter.config.pipeline.forEach((reference, index) => {
      deps.stdout(`  ${index + 1}. ${reference}`);
    });
  }

  return invalid ? 1 : 0;
}
