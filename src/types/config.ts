/**
 * Filter configuration schema and config file resolution.
 *
 * Operators configure, per filter type, the ordered step references to run
 * and how failures are handled. A filter's configuration value may take
 * four shapes, all normalized by {@link normalizeFilterConfig}:
 *
 *   1. a table: `{ pipeline = [...], fail_silently = false, log_level = "debug" }`
 *   2. a bare list of step references
 *   3. a single step reference string
 *   4. absent or empty, meaning a no-op pipeline
 */

import { join } from 'node:path';
import { homedir } from 'node:os';
import { ConfigurationError } from './errors.js';

// ---------------------------------------------------------------------------
// Raw shapes
// ---------------------------------------------------------------------------

/** The table form of a filter configuration, as written by operators. */
export interface FilterConfigTable {
  pipeline?: string[] | string;
  fail_silently?: boolean;
  [option: string]: unknown;
}

/** Any accepted raw filter configuration value. */
export type RawFilterConfig = FilterConfigTable | string[] | string | null | undefined;

// ---------------------------------------------------------------------------
// Normalized shape
// ---------------------------------------------------------------------------

/** A filter configuration after normalization. */
export interface FilterConfig {
  /** Step references in execution order. Duplicates run each time. */
  pipeline: string[];
  /** Whether unexpected step errors and unresolvable references are skipped. */
  failSilently: boolean;
  /** Every other option from the table form, handed to class-based steps. */
  extraConfig: Record<string, unknown>;
}

/**
 * Fail-silently applies when a configuration does not say otherwise,
 * including the bare-list and single-string shapes.
 */
export const DEFAULT_FAIL_SILENTLY = true;

/** A configuration with no steps. */
export const EMPTY_FILTER_CONFIG: Readonly<FilterConfig> = Object.freeze({
  pipeline: [],
  failSilently: DEFAULT_FAIL_SILENTLY,
  extraConfig: {},
});

// ---------------------------------------------------------------------------
// normalizeFilterConfig()
// ---------------------------------------------------------------------------

/**
 * Normalize a raw filter configuration value.
 *
 * Never mutates `raw`. Throws {@link ConfigurationError} for values that fit
 * none of the accepted shapes.
 */
export function normalizeFilterConfig(raw: unknown, filterType?: string): FilterConfig {
  if (raw === undefined || raw === null || raw === '') {
    return { pipeline: [], failSilently: DEFAULT_FAIL_SILENTLY, extraConfig: {} };
  }

  if (typeof raw === 'string') {
    return { pipeline: [raw], failSilently: DEFAULT_FAIL_SILENTLY, extraConfig: {} };
  }

  if (Array.isArray(raw)) {
    return {
      pipeline: checkReferences(raw, filterType),
      failSilently: DEFAULT_FAIL_SILENTLY,
      extraConfig: {},
    };
  }

  if (typeof raw !== 'object') {
    throw new ConfigurationError(
      `Filter configuration must be a table, a list or a string, got ${typeof raw}`,
      { filterType },
    );
  }

  const table: Record<string, unknown> = { ...raw };
  const { pipeline, fail_silently: failSilently, ...extraConfig } = table;

  let steps: string[];
  if (pipeline === undefined || pipeline === null || pipeline === '') {
    steps = [];
  } else if (typeof pipeline === 'string') {
    steps = [pipeline];
  } else if (Array.isArray(pipeline)) {
    steps = checkReferences(pipeline, filterType);
  } else {
    throw new ConfigurationError('pipeline must be a list of step references', {
      filterType,
      field: 'pipeline',
    });
  }

  if (failSilently !== undefined && typeof failSilently !== 'boolean') {
    throw new ConfigurationError('fail_silently must be a boolean', {
      filterType,
      field: 'fail_silently',
    });
  }

  return {
    pipeline: steps,
    failSilently: typeof failSilently === 'boolean' ? failSilently : DEFAULT_FAIL_SILENTLY,
    extraConfig,
  };
}

function checkReferences(entries: unknown[], filterType: string | undefined): string[] {
  const refs: string[] = [];
  for (const entry of entries) {
    if (typeof entry !== 'string' || entry.length === 0) {
      throw new ConfigurationError('pipeline entries must be non-empty strings', {
        filterType,
        field: 'pipeline',
      });
    }
    refs.push(entry);
  }
  return refs;
}

// ---------------------------------------------------------------------------
// Config file
// ---------------------------------------------------------------------------

/** Top-level shape of a Hookrail config file. */
export interface FiltersFile {
  filters: Record<string, RawFilterConfig>;
  [section: string]: unknown;
}

/** Default config file name, looked up in the working directory. */
export const DEFAULT_CONFIG_FILE = 'hookrail.toml';

/**
 * Resolve the config file path.
 *
 * Precedence:
 *  1. `$HOOKRAIL_CONFIG` environment variable (if non-empty)
 *  2. `./hookrail.toml` under `cwd`
 *
 * Trailing slashes are stripped. A leading `~` is expanded to the
 * user's home directory.
 */
export function resolveConfigPath(cwd: string = process.cwd()): string {
  const envValue = process.env['HOOKRAIL_CONFIG'];
  if (envValue && envValue.length > 0) {
    let resolved = envValue;
    if (resolved.startsWith('~/') || resolved === '~') {
      resolved = join(homedir(), resolved.slice(2));
    }
    if (resolved.length > 1 && resolved.endsWith('/')) {
      resolved = resolved.slice(0, -1);
    }
    return resolved;
  }
  return join(cwd, DEFAULT_CONFIG_FILE);
}
