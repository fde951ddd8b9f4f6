/**
 * Step resolution: turning configured step references into steps.
 *
 * The runner depends only on the {@link StepResolver} interface. The
 * in-memory {@link StepRegistry} is the default implementation; hosts fill
 * it directly or through the ModuleStepLoader.
 */

import type { ResolvedStep, StepDefinition } from '../types/step.js';
import { isStepDefinition } from '../types/step.js';
import { StepResolutionError, formatErrorMessage } from '../types/errors.js';
import { createLogger, type Logger } from './logger.js';

// ---------------------------------------------------------------------------
// StepResolver
// ---------------------------------------------------------------------------

/** Maps a step reference to a step definition. */
export interface StepResolver {
  /** @throws StepResolutionError when the reference is unknown. */
  resolve(reference: string): StepDefinition;
}

// ---------------------------------------------------------------------------
// StepRegistry
// ---------------------------------------------------------------------------

export class StepRegistry implements StepResolver {
  private readonly steps: Map<string, StepDefinition> = new Map();

  /**
   * Register a step under a reference.
   *
   * @throws If the reference is empty, already taken, or the definition is not callable.
   */
  register(reference: string, definition: StepDefinition): void {
    if (reference.length === 0) {
      throw new Error('Step reference must be a non-empty string');
    }
    if (!isStepDefinition(definition)) {
      throw new Error(`Step "${reference}" must be a function or a PipelineStep class`);
    }
    if (this.steps.has(reference)) {
      throw new Error(`Step already registered: "${reference}"`);
    }
    this.steps.set(reference, definition);
  }

  /** Register every entry of a reference → step mapping. */
  registerAll(entries: Record<string, StepDefinition>): void {
    for (const [reference, definition] of Object.entries(entries)) {
      this.register(reference, definition);
    }
  }

  /** Remove a step. Returns true if it was registered. */
  unregister(reference: string): boolean {
    return this.steps.delete(reference);
  }

  has(reference: string): boolean {
    return this.steps.has(reference);
  }

  /** Registered references, in registration order. */
  references(): string[] {
    return [...this.steps.keys()];
  }

  resolve(reference: string): StepDefinition {
    const definition = this.steps.get(reference);
    if (!definition) {
      throw new StepResolutionError(reference, 'no step registered under this reference');
    }
    return definition;
  }
}

// ---------------------------------------------------------------------------
// resolveSteps()
// ---------------------------------------------------------------------------

const defaultLogger = createLogger('resolver');

/**
 * Resolve step references in order.
 *
 * Unresolvable references are logged. With `failSilently` they are skipped;
 * otherwise the first failure is rethrown and nothing is returned. Errors
 * other than {@link StepResolutionError} thrown by a resolver are reported
 * as resolution failures of that reference.
 */
export function resolveSteps(
  references: readonly string[],
  failSilently: boolean,
  resolver: StepResolver,
  logger: Logger = defaultLogger,
): ResolvedStep[] {
  const steps: ResolvedStep[] = [];

  for (const reference of references) {
    try {
      steps.push({ reference, definition: resolver.resolve(reference) });
    } catch (err: unknown) {
      const error =
        err instanceof StepResolutionError
          ? err
          : new StepResolutionError(reference, formatErrorMessage(err), { cause: err });
      logger.error('failed to resolve step', {
        step: reference,
        error,
        skipped: failSilently,
      });
      if (failSilently) {
        continue;
      }
      throw error;
    }
  }

  return steps;
}
