export type { RunOptions, StepOutcome, PipelineOutcome } from './types.js';

export { classifyStepResult, invokeStep } from './invoke-step.js';
export {
  createRunTrace,
  traceLevelOf,
  type TraceLevel,
  type RunStatus,
  type RunTrace,
  type StepTraceEntry,
} from './run-trace.js';
export { PipelineRunner, type PipelineRunnerOptions } from './runner.js';
