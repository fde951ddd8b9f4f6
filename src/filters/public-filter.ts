/**
 * Base class for extension-point wrappers.
 *
 * A wrapper names its filter type, packs its typed arguments into a bag,
 * runs the pipeline through a {@link PipelineRunner}, and picks its
 * results back out of the final bag. When a step short-circuits, results
 * are read from the bag accumulated up to that step; callers that need the
 * short-circuit value itself use the runner directly.
 */

import type { ArgumentBag } from '../types/step.js';
import { isArgumentBag } from '../types/step.js';
import type { PipelineRunner } from '../core/pipeline/runner.js';
import type { RunOptions } from '../core/pipeline/types.js';

export abstract class PublicFilter {
  abstract readonly filterType: string;

  constructor(protected readonly runner: PipelineRunner) {}

  /** Run this filter's pipeline and return the bag to read results from. */
  protected runPipeline(args: ArgumentBag, options?: RunOptions): ArgumentBag {
    const outcome = this.runner.execute(this.filterType, args, options);
    return outcome.status === 'completed' ? outcome.data : outcome.accumulated;
  }

  toString(): string {
    return `<PublicFilter: ${this.filterType}>`;
  }
}

/** Read a nested mapping from a bag, falling back when a step replaced it with something else. */
export function bagAt(data: ArgumentBag, key: string, fallback: ArgumentBag = {}): ArgumentBag {
  const value = data[key];
  return isArgumentBag(value) ? value : fallback;
}
