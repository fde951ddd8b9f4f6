/**
 * Pipeline runner: executes the configured steps of a filter type.
 *
 * Flow for one run:
 *   1. Read the filter's configuration (fresh on every run). No steps →
 *      the caller's arguments come back unchanged, as the same object.
 *   2. Resolve the step references. Unresolvable references are skipped
 *      when the filter fails silently, fatal otherwise.
 *   3. Run the steps in order over a copy of the arguments:
 *        - a mapping result is merged in (later keys win)
 *        - `undefined` / `null` changes nothing
 *        - any other value stops the run and becomes its result
 *   4. A {@link FilterError} from a step always propagates. Any other
 *      error is logged, then skipped when the filter fails silently and
 *      rethrown otherwise.
 *
 * Runners hold no per-run state; concurrent runs of the same filter type
 * each get their own bag and configuration read.
 */

import { randomUUID } from 'node:crypto';

import type { ArgumentBag, ResolvedStep, StepMetadata } from '../../types/step.js';
import { stepName } from '../../types/step.js';
import { normalizeFilterConfig, type FilterConfig } from '../../types/config.js';
import type { ConfigurationSource } from '../config-loader.js';
import { resolveSteps, type StepResolver } from '../step-resolver.js';
import { createLogger, type Logger } from '../logger.js';
import { invokeStep } from './invoke-step.js';
import { createRunTrace, traceLevelOf, type RunStatus, type RunTrace } from './run-trace.js';
import type { PipelineOutcome, RunOptions } from './types.js';

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export interface PipelineRunnerOptions {
  config: ConfigurationSource;
  resolver: StepResolver;
  logger?: Logger;
  /** Produces the correlation id bound to each run's log entries. */
  newRunId?: () => string;
}

// ---------------------------------------------------------------------------
// PipelineRunner
// ---------------------------------------------------------------------------

export class PipelineRunner {
  private readonly config: ConfigurationSource;
  private readonly resolver: StepResolver;
  private readonly logger: Logger;
  private readonly newRunId: () => string;

  constructor(opts: PipelineRunnerOptions) {
    this.config = opts.config;
    this.resolver = opts.resolver;
    this.logger = opts.logger ?? createLogger('pipeline');
    this.newRunId = opts.newRunId ?? randomUUID;
  }

  /** Read and normalize the current configuration of a filter type. */
  loadConfig(filterType: string): FilterConfig {
    return normalizeFilterConfig(this.config.getConfig(filterType), filterType);
  }

  /**
   * Run a filter's pipeline and return the final bag, or the value a step
   * short-circuited with.
   */
  run(filterType: string, initialArgs: ArgumentBag, options?: RunOptions): unknown {
    const outcome = this.execute(filterType, initialArgs, options);
    return outcome.status === 'completed' ? outcome.data : outcome.value;
  }

  /** Run a filter's pipeline and return how it ended. */
  execute(filterType: string, initialArgs: ArgumentBag, options: RunOptions = {}): PipelineOutcome {
    const config = this.loadConfig(filterType);

    if (config.pipeline.length === 0) {
      return { status: 'completed', data: initialArgs };
    }

    const logger = this.logger.withContext({ correlation: this.newRunId(), filter: filterType });
    const steps = resolveSteps(config.pipeline, config.failSilently, this.resolver, logger);

    const metadata: StepMetadata = {
      filterType,
      runningPipeline: Object.freeze([...config.pipeline]),
      extraConfig: Object.freeze({ ...config.extraConfig }),
    };

    const trace = createRunTrace(traceLevelOf(config.extraConfig), logger);
    trace.recordPipeline({ pipeline: config.pipeline, initialKeys: Object.keys(initialArgs) });

    const accumulated: ArgumentBag = { ...initialArgs };
    let status: RunStatus = 'aborted';

    try {
      const stopped = this.runSteps(steps, metadata, accumulated, config, options, logger, trace);
      status = stopped ? 'short-circuited' : 'completed';
      return stopped ?? { status: 'completed', data: accumulated };
    } finally {
      trace.flush(status, accumulated);
    }
  }

  /**
   * Execute steps in order, merging into `accumulated` in place.
   * Returns the short-circuit outcome if a step stopped the run.
   */
  private runSteps(
    steps: readonly ResolvedStep[],
    metadata: StepMetadata,
    accumulated: ArgumentBag,
    config: FilterConfig,
    options: RunOptions,
    logger: Logger,
    trace: RunTrace,
  ): PipelineOutcome | null {
    for (const step of steps) {
      const name = stepName(step);
      const outcome = invokeStep(step, metadata, accumulated, options.positional);
      trace.recordStep(name, outcome);

      switch (outcome.kind) {
        case 'continue':
          Object.assign(accumulated, outcome.changes);
          break;

        case 'short-circuit':
          logger.info('pipeline stopped by step', { step: name });
          return {
            status: 'short-circuited',
            value: outcome.value,
            step: name,
            accumulated: { ...accumulated },
          };

        case 'halt':
          logger.error('filter error raised by step', {
            step: name,
            error: outcome.error,
            attributes: Object.keys(outcome.error.attributes),
          });
          throw outcome.error;

        case 'failed':
          logger.error('step raised an unexpected error', {
            step: name,
            error: outcome.error,
            continuing: config.failSilently,
          });
          if (!config.failSilently) {
            throw outcome.error;
          }
          break;
      }
    }

    return null;
  }
}
