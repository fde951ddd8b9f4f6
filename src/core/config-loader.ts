/**
 * Configuration sources for Hookrail.
 *
 * The pipeline runner reads a filter's configuration through the
 * {@link ConfigurationSource} interface on every run, never caching it.
 * Two sources ship here:
 *
 *   - {@link StaticConfigurationSource}: an in-memory mapping owned by the host.
 *   - {@link FileConfigurationSource}: a TOML, YAML or JSON file re-read on
 *     every lookup, so edits apply to the next run.
 *
 * Config files hold a top-level `filters` table keyed by filter type:
 *
 * ```toml
 * [filters."org.platform.learning.student.login.requested.v1"]
 * pipeline = ["./steps/login.js#BlockSuspended", "./steps/login.js#Audit"]
 * fail_silently = false
 * log_level = "debug"
 * ```
 */

import { parse as parseTOML } from 'smol-toml';
import { parse as parseYAML } from 'yaml';
import { existsSync, readFileSync } from 'node:fs';
import { extname } from 'node:path';

import _Ajv from 'ajv';
// ajv ESM interop: default export is the constructor
const Ajv = _Ajv.default ?? _Ajv;

import type { FiltersFile, RawFilterConfig } from '../types/config.js';
import { FILTERS_CONFIG_JSON_SCHEMA } from '../types/config-schema.js';
import { ConfigurationError } from '../types/errors.js';

// ---------------------------------------------------------------------------
// ConfigurationSource
// ---------------------------------------------------------------------------

/**
 * Supplies the raw configuration value of a filter type. Values are
 * validated by the runner on every read, so sources may hand back whatever
 * the host stores.
 */
export interface ConfigurationSource {
  getConfig(filterType: string): unknown;
}

/** A source that can also enumerate its configured filter types. */
export interface ListableConfigurationSource extends ConfigurationSource {
  filterTypes(): string[];
}

// ---------------------------------------------------------------------------
// StaticConfigurationSource
// ---------------------------------------------------------------------------

export class StaticConfigurationSource implements ListableConfigurationSource {
  private readonly filters: Map<string, unknown>;

  constructor(filters: Record<string, unknown> = {}) {
    this.filters = new Map(Object.entries(filters));
  }

  getConfig(filterType: string): unknown {
    return this.filters.get(filterType);
  }

  /** Replace (or add) the configuration of one filter type. */
  set(filterType: string, config: unknown): void {
    this.filters.set(filterType, config);
  }

  delete(filterType: string): boolean {
    return this.filters.delete(filterType);
  }

  filterTypes(): string[] {
    return [...this.filters.keys()];
  }
}

// ---------------------------------------------------------------------------
// Config file parsing
// ---------------------------------------------------------------------------

/** File formats understood by {@link parseFiltersFile}. */
export type ConfigFormat = 'toml' | 'yaml' | 'json';

/** Pick a format from a file extension. Unknown extensions are read as TOML. */
export function detectFormat(path: string): ConfigFormat {
  switch (extname(path).toLowerCase()) {
    case '.yaml':
    case '.yml':
      return 'yaml';
    case '.json':
      return 'json';
    default:
      return 'toml';
  }
}

const ajv = new Ajv({ allErrors: true, strict: false });
const validateFiltersFile = ajv.compile<{
  filters?: Record<string, RawFilterConfig>;
  [section: string]: unknown;
}>(FILTERS_CONFIG_JSON_SCHEMA);

/**
 * Parse and validate config file content.
 *
 * Empty content yields no filters. Throws {@link ConfigurationError} on
 * syntax errors and schema violations.
 */
export function parseFiltersFile(content: string, format: ConfigFormat): FiltersFile {
  if (content.trim().length === 0) {
    return { filters: {} };
  }

  let raw: unknown;
  try {
    if (format === 'toml') {
      raw = parseTOML(content);
    } else if (format === 'yaml') {
      raw = parseYAML(content);
    } else {
      raw = JSON.parse(content);
    }
  } catch (err: unknown) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigurationError(`Invalid ${format.toUpperCase()} config: ${message}`);
  }

  if (raw === null || raw === undefined) {
    return { filters: {} };
  }

  if (!validateFiltersFile(raw)) {
    const details = (validateFiltersFile.errors ?? [])
      .map((err) => `${err.instancePath || '/'} ${err.message ?? 'is invalid'}`)
      .join('; ');
    throw new ConfigurationError(`Config does not match schema: ${details}`);
  }

  return { ...raw, filters: raw.filters ?? {} };
}

// ---------------------------------------------------------------------------
// FileConfigurationSource
// ---------------------------------------------------------------------------

/** Injectable filesystem access for {@link FileConfigurationSource}. */
export interface ConfigFileSystem {
  existsSync: (path: string) => boolean;
  readFileSync: (path: string, encoding: 'utf-8') => string;
}

export class FileConfigurationSource implements ListableConfigurationSource {
  readonly path: string;
  readonly format: ConfigFormat;
  private readonly fs: ConfigFileSystem;

  constructor(path: string, opts: { format?: ConfigFormat; fs?: ConfigFileSystem } = {}) {
    this.path = path;
    this.format = opts.format ?? detectFormat(path);
    this.fs = opts.fs ?? { existsSync, readFileSync };
  }

  /** Read and validate the whole file. A missing file has no filters. */
  load(): FiltersFile {
    if (!this.fs.existsSync(this.path)) {
      return { filters: {} };
    }
    return parseFiltersFile(this.fs.readFileSync(this.path, 'utf-8'), this.format);
  }

  getConfig(filterType: string): RawFilterConfig | undefined {
    const { filters } = this.load();
    return Object.prototype.hasOwnProperty.call(filters, filterType)
      ? filters[filterType]
      : undefined;
  }

  filterTypes(): string[] {
    return Object.keys(this.load().filters);
  }
}
