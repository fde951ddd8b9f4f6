/**
 * Pipeline types for the Hookrail filter runner.
 *
 * A run moves through ResolvingConfig → ResolvingSteps → ExecutingStep(i)
 * and ends in one of three terminal states: Completed, ShortCircuited, or
 * Aborted (a thrown error). The first two are values; the third is the
 * original error, rethrown.
 */

import type { ArgumentBag } from '../../types/step.js';
import type { FilterError } from '../../types/errors.js';

// ---------------------------------------------------------------------------
// Run options
// ---------------------------------------------------------------------------

/** Per-call options for a pipeline run. */
export interface RunOptions {
  /** Positional arguments passed to every step after the argument bag. */
  positional?: readonly unknown[];
}

// ---------------------------------------------------------------------------
// Step outcome
// ---------------------------------------------------------------------------

/**
 * What happened when one step ran.
 *
 *   - `continue`: merge `changes` (possibly empty) and run the next step
 *   - `short-circuit`: stop and hand `value` back to the caller
 *   - `halt`: the step raised a terminating {@link FilterError}
 *   - `failed`: the step raised anything else
 */
export type StepOutcome =
  | { kind: 'continue'; changes: ArgumentBag }
  | { kind: 'short-circuit'; value: unknown }
  | { kind: 'halt'; error: FilterError }
  | { kind: 'failed'; error: unknown };

// ---------------------------------------------------------------------------
// Pipeline outcome
// ---------------------------------------------------------------------------

/**
 * Terminal result of a run that did not throw.
 *
 * `short-circuited` keeps the bag accumulated before the stopping step so
 * that wrappers can still extract their results from it.
 */
export type PipelineOutcome =
  | { status: 'completed'; data: ArgumentBag }
  | { status: 'short-circuited'; value: unknown; step: string; accumulated: ArgumentBag };
