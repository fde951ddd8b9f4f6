/**
 * Invoke a single resolved step and classify what it did.
 *
 * Class-based steps are constructed with the run's metadata first; function
 * steps are called directly. Throws never escape: they come back as `halt`
 * or `failed` outcomes for the runner to apply its policy to.
 */

import type { ArgumentBag, ResolvedStep, StepMetadata } from '../../types/step.js';
import { isArgumentBag, isStepClass } from '../../types/step.js';
import { isFilterError } from '../../types/errors.js';
import type { StepOutcome } from './types.js';

/** Classify a step's return value. */
export function classifyStepResult(result: unknown): StepOutcome {
  if (result === undefined || result === null) {
    return { kind: 'continue', changes: {} };
  }
  if (isArgumentBag(result)) {
    return { kind: 'continue', changes: result };
  }
  return { kind: 'short-circuit', value: result };
}

/**
 * Run one step against the accumulated bag.
 *
 * The step receives a shallow copy, so a step that mutates its argument
 * object in place does not change the bag behind the runner's back.
 */
export function invokeStep(
  step: ResolvedStep,
  metadata: StepMetadata,
  accumulated: ArgumentBag,
  positional: readonly unknown[] = [],
): StepOutcome {
  const args: ArgumentBag = { ...accumulated };

  try {
    const { definition } = step;
    const result = isStepClass(definition)
      ? new definition(metadata).runFilter(args, ...positional)
      : definition(args, ...positional);
    if (result instanceof Promise) {
      // Runs are synchronous; a pending result would be lost.
      void result.catch(() => undefined);
      return {
        kind: 'failed',
        error: new TypeError('Step returned a Promise; pipeline steps must be synchronous'),
      };
    }
    return classifyStepResult(result);
  } catch (err: unknown) {
    if (isFilterError(err)) {
      return { kind: 'halt', error: err };
    }
    return { kind: 'failed', error: err };
  }
}
