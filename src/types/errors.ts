/**
 * Error types for Hookrail filter pipelines.
 *
 * Three kinds of failure cross the engine boundary:
 *   - {@link FilterError}: raised on purpose by a step to halt the guarded
 *     operation. Carries a message plus an open set of named attributes
 *     (e.g. `redirect_to`, `status_code`, `response`) for the call site.
 *   - {@link StepResolutionError}: a configured step reference could not be
 *     turned into a step.
 *   - {@link ConfigurationError}: a filter configuration has an invalid shape.
 *
 * Anything else a step throws is an "unexpected" error and is handled by the
 * pipeline's fail-silently policy.
 */

// ---------------------------------------------------------------------------
// Brand symbol
// ---------------------------------------------------------------------------

/**
 * Registered symbol used to brand FilterError instances, so that two copies
 * of this package loaded side by side still recognize each other's errors.
 */
const FILTER_ERROR_BRAND = Symbol.for('hookrail.FilterError');

// ---------------------------------------------------------------------------
// FilterError
// ---------------------------------------------------------------------------

/** Open attribute mapping carried by a {@link FilterError}. */
export type FilterErrorAttributes = Record<string, unknown>;

/**
 * Terminating error raised by pipeline steps.
 *
 * Each extension point declares its own subclasses with the attributes
 * its call site knows how to act on. The pipeline runner always rethrows
 * FilterErrors, whatever the pipeline's fail-silently setting.
 *
 * @example
 * ```ts
 * throw new FilterError('Course closed', { redirect_to: '/catalog', status_code: 302 });
 * ```
 */
export class FilterError extends Error {
  /** Extra named data for the consumer of the error. */
  readonly attributes: Readonly<FilterErrorAttributes>;

  /** @internal */
  readonly [FILTER_ERROR_BRAND] = true as const;

  constructor(message = '', attributes: FilterErrorAttributes = {}) {
    super(message);
    this.name = 'FilterError';
    this.attributes = Object.freeze({ ...attributes });
  }

  /** URL the host should redirect to, when the raiser supplied one. */
  get redirectTo(): string | undefined {
    const value = this.attributes['redirect_to'];
    return typeof value === 'string' ? value : undefined;
  }

  /** HTTP status code the host should answer with, when supplied. */
  get statusCode(): number | undefined {
    const value = this.attributes['status_code'];
    return typeof value === 'number' ? value : undefined;
  }

  /** Read a named attribute. */
  get(name: string): unknown {
    return this.attributes[name];
  }

  /** Whether the raiser set the named attribute. */
  has(name: string): boolean {
    return Object.prototype.hasOwnProperty.call(this.attributes, name);
  }

  override toString(): string {
    return `FilterError: ${this.message}`;
  }
}

/**
 * Type guard for FilterError instances, including ones created by another
 * copy of this module.
 */
export function isFilterError(value: unknown): value is FilterError {
  if (value instanceof FilterError) {
    return true;
  }

  return (
    typeof value === 'object' &&
    value !== null &&
    FILTER_ERROR_BRAND in value &&
    value[FILTER_ERROR_BRAND] === true
  );
}

// ---------------------------------------------------------------------------
// StepResolutionError
// ---------------------------------------------------------------------------

/** A configured step reference could not be resolved. */
export class StepResolutionError extends Error {
  readonly reference: string;
  readonly reason: string;

  constructor(reference: string, reason: string, options?: { cause?: unknown }) {
    super(`Failed to resolve step "${reference}": ${reason}`, options);
    this.name = 'StepResolutionError';
    this.reference = reference;
    this.reason = reason;
  }
}

// ---------------------------------------------------------------------------
// ConfigurationError
// ---------------------------------------------------------------------------

/** A filter configuration value has an unsupported shape. */
export class ConfigurationError extends Error {
  readonly filterType: string | undefined;
  readonly field: string | undefined;

  constructor(message: string, details: { filterType?: string; field?: string } = {}) {
    super(message);
    this.name = 'ConfigurationError';
    this.filterType = details.filterType;
    this.field = details.field;
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Render an unknown thrown value as a message string. */
export function formatErrorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
