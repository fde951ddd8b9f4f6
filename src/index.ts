/**
 * Hookrail: configurable filter pipelines for host extension points.
 *
 * @example
 * ```ts
 * const registry = new StepRegistry();
 * registry.register('audit', ({ user }) => ({ audited: true }));
 *
 * const runner = new PipelineRunner({
 *   config: new StaticConfigurationSource({ 'org.platform.learning.student.login.requested.v1': ['audit'] }),
 *   resolver: registry,
 * });
 * const user = new StudentLoginRequested(runner).runFilter(currentUser);
 * ```
 */

export const VERSION = '0.4.0';

export * from './types/index.js';

export {
  createLogger,
  configureLogging,
  resetLogging,
  isLogLevel,
  NEVER_LOG_FIELDS,
  type Logger,
  type LogLevel,
  type LogEntry,
  type LogSink,
  type LogContext,
} from './core/logger.js';
export { StepRegistry, resolveSteps, type StepResolver } from './core/step-resolver.js';
export {
  ModuleStepLoader,
  parseStepReference,
  type ModuleImporter,
  type StepLoadResult,
  type ParsedReference,
} from './core/module-step-loader.js';
export {
  StaticConfigurationSource,
  FileConfigurationSource,
  parseFiltersFile,
  detectFormat,
  type ConfigurationSource,
  type ListableConfigurationSource,
  type ConfigFormat,
  type ConfigFileSystem,
} from './core/config-loader.js';
export * from './core/pipeline/index.js';
export * from './filters/index.js';
