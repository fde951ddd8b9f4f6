/**
 * Run traces: what a pipeline run logs about itself when asked to.
 *
 * Operators opt in per filter with the `log_level` option:
 *
 *   - `"info"`: one entry with the keys of the final bag
 *   - `"debug"`: one entry with the pipeline context and every step's outcome
 *
 * Any other value, or no value, records nothing.
 */

import type { ArgumentBag } from '../../types/step.js';
import { formatErrorMessage } from '../../types/errors.js';
import type { Logger } from '../logger.js';
import type { StepOutcome } from './types.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Trace verbosity selected by a filter's `log_level` option. */
export type TraceLevel = 'info' | 'debug';

/** Context recorded for one executed step. */
export interface StepTraceEntry {
  step: string;
  outcome: StepOutcome['kind'];
  keys?: string[];
  error?: string;
}

/** How a traced run ended. */
export type RunStatus = 'completed' | 'short-circuited' | 'aborted';

export interface RunTrace {
  recordPipeline(context: { pipeline: readonly string[]; initialKeys: string[] }): void;
  recordStep(step: string, outcome: StepOutcome): void;
  flush(status: RunStatus, accumulated: ArgumentBag): void;
}

// ---------------------------------------------------------------------------
// Strategies
// ---------------------------------------------------------------------------

const NOOP_TRACE: RunTrace = {
  recordPipeline: () => undefined,
  recordStep: () => undefined,
  flush: () => undefined,
};

/** Read the trace level from a filter's extra config. */
export function traceLevelOf(extraConfig: Readonly<Record<string, unknown>>): TraceLevel | null {
  const value = extraConfig['log_level'];
  return value === 'info' || value === 'debug' ? value : null;
}

function describeOutcome(step: string, outcome: StepOutcome): StepTraceEntry {
  switch (outcome.kind) {
    case 'continue':
      return { step, outcome: outcome.kind, keys: Object.keys(outcome.changes) };
    case 'short-circuit':
      return { step, outcome: outcome.kind };
    case 'halt':
    case 'failed':
      return { step, outcome: outcome.kind, error: formatErrorMessage(outcome.error) };
  }
}

/** Create the trace for one run. */
export function createRunTrace(level: TraceLevel | null, logger: Logger): RunTrace {
  if (level === null) {
    return NOOP_TRACE;
  }

  let pipelineContext: { pipeline: readonly string[]; initialKeys: string[] } = {
    pipeline: [],
    initialKeys: [],
  };
  const steps: StepTraceEntry[] = [];

  return {
    recordPipeline(context) {
      pipelineContext = context;
    },

    recordStep(step, outcome) {
      steps.push(describeOutcome(step, outcome));
    },

    flush(status, accumulated) {
      if (level === 'info') {
        logger.info('pipeline results', { status, keys: Object.keys(accumulated) });
        return;
      }
      logger.debug('pipeline execution', {
        status,
        pipeline: [...pipelineContext.pipeline],
        initial_keys: pipelineContext.initialKeys,
        steps,
        keys: Object.keys(accumulated),
      });
    },
  };
}
