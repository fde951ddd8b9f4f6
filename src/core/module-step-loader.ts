/**
 * Module step loader for Hookrail.
 *
 * Loads module-qualified step references with dynamic `import()` and
 * registers the exported steps into a {@link StepRegistry}, so that
 * pipeline runs themselves resolve synchronously.
 *
 * Reference format: `<module specifier>#<export name>`. Without `#`, the
 * module's default export is used. Relative specifiers (`./`, `../`)
 * resolve against the loader's base directory; bare specifiers resolve
 * as packages.
 *
 * A reference that fails to load is recorded in the returned report but
 * does not prevent other references from loading.
 */

import { resolve } from 'node:path';

import { isStepDefinition } from '../types/step.js';
import { normalizeFilterConfig } from '../types/config.js';
import { formatErrorMessage } from '../types/errors.js';
import type { ConfigurationSource } from './config-loader.js';
import type { StepRegistry } from './step-resolver.js';
import { createLogger, type Logger } from './logger.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Imports a module by specifier. Injectable for tests. */
export type ModuleImporter = (specifier: string) => Promise<Record<string, unknown>>;

/** Outcome of loading a single step reference. */
export type StepLoadResult =
  | { ok: true; reference: string; cached: boolean }
  | { ok: false; reference: string; error: string };

/** A step reference split into module specifier and export name. */
export interface ParsedReference {
  specifier: string;
  exportName: string;
}

const DEFAULT_EXPORT = 'default';

// ---------------------------------------------------------------------------
// parseStepReference()
// ---------------------------------------------------------------------------

/**
 * Split a reference at its last `#`.
 *
 * @throws If the module specifier or export name is empty.
 */
export function parseStepReference(reference: string): ParsedReference {
  const hash = reference.lastIndexOf('#');
  const specifier = hash === -1 ? reference : reference.slice(0, hash);
  const exportName = hash === -1 ? DEFAULT_EXPORT : reference.slice(hash + 1);

  if (specifier.length === 0) {
    throw new Error(`Step reference "${reference}" has no module specifier`);
  }
  if (exportName.length === 0) {
    throw new Error(`Step reference "${reference}" has an empty export name`);
  }

  return { specifier, exportName };
}

// ---------------------------------------------------------------------------
// ModuleStepLoader
// ---------------------------------------------------------------------------

export class ModuleStepLoader {
  private readonly registry: StepRegistry;
  private readonly baseDir: string;
  private readonly importModule: ModuleImporter;
  private readonly logger: Logger;
  private readonly modules: Map<string, Promise<Record<string, unknown>>> = new Map();

  constructor(opts: {
    registry: StepRegistry;
    baseDir?: string;
    importModule?: ModuleImporter;
    logger?: Logger;
  }) {
    this.registry = opts.registry;
    this.baseDir = opts.baseDir ?? process.cwd();
    this.importModule = opts.importModule ?? ((specifier) => import(specifier));
    this.logger = opts.logger ?? createLogger('resolver:modules');
  }

  /** Turn a module specifier into what `import()` should receive. */
  resolveSpecifier(specifier: string): string {
    if (specifier.startsWith('./') || specifier.startsWith('../')) {
      return resolve(this.baseDir, specifier);
    }
    return specifier;
  }

  /**
   * Load one reference into the registry.
   *
   * References already present in the registry are not loaded again.
   */
  async load(reference: string): Promise<StepLoadResult> {
    if (this.registry.has(reference)) {
      return { ok: true, reference, cached: true };
    }

    try {
      const { specifier, exportName } = parseStepReference(reference);
      const mod = await this.importOnce(this.resolveSpecifier(specifier));

      if (!Object.prototype.hasOwnProperty.call(mod, exportName)) {
        throw new Error(`module does not export "${exportName}"`);
      }
      const exported = mod[exportName];
      if (!isStepDefinition(exported)) {
        throw new Error(`export "${exportName}" is not a function or a PipelineStep class`);
      }

      // Another load of the same reference may have finished while importing.
      if (!this.registry.has(reference)) {
        this.registry.register(reference, exported);
      }
      this.logger.debug('step loaded', { step: reference });
      return { ok: true, reference, cached: false };
    } catch (err: unknown) {
      const error = formatErrorMessage(err);
      this.logger.warn('step load failed', { step: reference, reason: error });
      return { ok: false, reference, error };
    }
  }

  /** Load several references. Duplicates are loaded once. */
  async preload(references: readonly string[]): Promise<StepLoadResult[]> {
    const unique = [...new Set(references)];
    const results: StepLoadResult[] = [];
    for (const reference of unique) {
      results.push(await this.load(reference));
    }
    return results;
  }

  /** Load every reference configured for the given filter types. */
  async preloadConfigured(
    source: ConfigurationSource,
    filterTypes: readonly string[],
  ): Promise<StepLoadResult[]> {
    const references: string[] = [];
    for (const filterType of filterTypes) {
      const config = normalizeFilterConfig(source.getConfig(filterType), filterType);
      references.push(...config.pipeline);
    }
    return this.preload(references);
  }

  private importOnce(specifier: string): Promise<Record<string, unknown>> {
    let pending = this.modules.get(specifier);
    if (!pending) {
      pending = this.importModule(specifier);
      this.modules.set(specifier, pending);
      // A failed import may succeed later (e.g. after the file is fixed).
      void pending.catch(() => this.modules.delete(specifier));
    }
    return pending;
  }
}
