/**
 * Step contracts for filter pipelines.
 *
 * A step is either a plain function receiving the accumulated argument bag,
 * or a class extending {@link PipelineStep} that is constructed with the
 * run's {@link StepMetadata} before its `runFilter()` is called. Both shapes
 * are accepted anywhere a step is registered.
 */

// ---------------------------------------------------------------------------
// Argument bag
// ---------------------------------------------------------------------------

/** Named arguments threaded through a pipeline. */
export type ArgumentBag = Record<string, unknown>;

/**
 * What a step may hand back:
 *   - a mapping, merged into the accumulated bag
 *   - `undefined` / `null` / nothing, meaning no change
 *   - any other value, which stops the pipeline and becomes its result
 */
export type StepResult = unknown;

// ---------------------------------------------------------------------------
// Metadata
// ---------------------------------------------------------------------------

/** Construction metadata handed to class-based steps. */
export interface StepMetadata {
  /** Filter type whose pipeline is running. */
  filterType: string;
  /** Full ordered list of step references configured for the run. */
  runningPipeline: readonly string[];
  /** Operator options from the filter configuration besides pipeline and fail_silently. */
  extraConfig: Readonly<Record<string, unknown>>;
}

// ---------------------------------------------------------------------------
// Step shapes
// ---------------------------------------------------------------------------

/** A function step. Positional arguments follow the bag when the call site supplies them. */
export type StepFunction = (args: ArgumentBag, ...positional: unknown[]) => StepResult;

/**
 * Base class for class-based steps.
 *
 * @example
 * ```ts
 * class HonorToAudit extends PipelineStep {
 *   runFilter({ mode }: ArgumentBag) {
 *     if (mode !== 'honor') return;
 *     return { mode: 'audit' };
 *   }
 * }
 * ```
 */
export abstract class PipelineStep {
  readonly filterType: string;
  readonly runningPipeline: readonly string[];
  readonly extraConfig: Readonly<Record<string, unknown>>;

  constructor(metadata: StepMetadata) {
    this.filterType = metadata.filterType;
    this.runningPipeline = metadata.runningPipeline;
    this.extraConfig = metadata.extraConfig;
  }

  abstract runFilter(args: ArgumentBag, ...positional: unknown[]): StepResult;
}

/** Constructor of a concrete {@link PipelineStep}. */
export type PipelineStepClass = new (metadata: StepMetadata) => PipelineStep;

/** Anything that can be registered as a step. */
export type StepDefinition = StepFunction | PipelineStepClass;

/** A step paired with the reference it was resolved from. */
export interface ResolvedStep {
  reference: string;
  definition: StepDefinition;
}

// ---------------------------------------------------------------------------
// Guards
// ---------------------------------------------------------------------------

/**
 * Whether a step definition is a class step: a {@link PipelineStep} subclass,
 * or any class whose instances have a `runFilter` method (a subclass of
 * another copy of this package, say). Such classes cannot be called without
 * `new`.
 */
export function isStepClass(definition: StepDefinition): definition is PipelineStepClass {
  const proto: unknown = definition.prototype;
  if (proto instanceof PipelineStep) return true;
  return (
    typeof proto === 'object' &&
    proto !== null &&
    'runFilter' in proto &&
    typeof proto.runFilter === 'function'
  );
}

/** Whether a value can be used as a step definition. */
export function isStepDefinition(value: unknown): value is StepDefinition {
  return typeof value === 'function';
}

/** Whether a step result is a mapping to merge into the bag. */
export function isArgumentBag(value: unknown): value is ArgumentBag {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/** Display name of a resolved step: its reference, else the function or class name. */
export function stepName(step: ResolvedStep): string {
  return step.reference || step.definition.name || '<anonymous>';
}
