export {
  FilterError,
  StepResolutionError,
  ConfigurationError,
  isFilterError,
  formatErrorMessage,
  type FilterErrorAttributes,
} from './errors.js';

export {
  PipelineStep,
  isStepClass,
  isStepDefinition,
  isArgumentBag,
  stepName,
  type ArgumentBag,
  type StepResult,
  type StepMetadata,
  type StepFunction,
  type PipelineStepClass,
  type StepDefinition,
  type ResolvedStep,
} from './step.js';

export {
  DEFAULT_FAIL_SILENTLY,
  EMPTY_FILTER_CONFIG,
  DEFAULT_CONFIG_FILE,
  normalizeFilterConfig,
  resolveConfigPath,
  type FilterConfigTable,
  type RawFilterConfig,
  type FilterConfig,
  type FiltersFile,
} from './config.js';

export { FILTERS_CONFIG_JSON_SCHEMA } from './config-schema.js';
