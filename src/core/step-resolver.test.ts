import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { StepRegistry, resolveSteps, type StepResolver } from './step-resolver.js';
import { configureLogging, resetLogging, type LogEntry } from './logger.js';
import { StepResolutionError } from '../types/errors.js';
import { PipelineStep, type StepDefinition } from '../types/step.js';
import { createTestSink } from '../testing/factories.js';

const audit = (): undefined => undefined;
const stamp = () => ({ stamped: true });

class Noop extends PipelineStep {
  runFilter(): undefined {
    return undefined;
  }
}

// ---------------------------------------------------------------------------
// StepRegistry
// ---------------------------------------------------------------------------

describe('StepRegistry', () => {
  let registry: StepRegistry;

  beforeEach(() => {
    registry = new StepRegistry();
  });

  it('resolves registered functions and classes', () => {
    registry.register('audit', audit);
    registry.register('noop', Noop);
    expect(registry.resolve('audit')).toBe(audit);
    expect(registry.resolve('noop')).toBe(Noop);
  });

  it('throws StepResolutionError for unknown references', () => {
    expect(() => registry.resolve('missing')).toThrow(StepResolutionError);
    expect(() => registry.resolve('missing')).toThrow(
      'Failed to resolve step "missing": no step registered under this reference',
    );
  });

  it('rejects duplicate and empty references', () => {
    registry.register('audit', audit);
    expect(() => registry.register('audit', stamp)).toThrow('Step already registered: "audit"');
    expect(() => registry.register('', audit)).toThrow('Step reference must be a non-empty string');
  });

  it('registers mappings in order and lists references', () => {
    registry.registerAll({ b: stamp, a: audit });
    expect(registry.references()).toEqual(['b', 'a']);
    expect(registry.has('a')).toBe(true);
  });

  it('unregisters steps', () => {
    registry.register('audit', audit);
    expect(registry.unregister('audit')).toBe(true);
    expect(registry.unregister('audit')).toBe(false);
    expect(registry.has('audit')).toBe(false);
  });
});

// ---------------------------------------------------------------------------
// resolveSteps()
// ---------------------------------------------------------------------------

describe('resolveSteps', () => {
  let entries: LogEntry[];
  let registry: StepRegistry;

  beforeEach(() => {
    const test = createTestSink();
    entries = test.entries;
    configureLogging({ level: 'debug', sink: test.sink });
    registry = new StepRegistry();
    registry.registerAll({ audit, stamp });
  });

  afterEach(() => {
    resetLogging();
  });

  it('resolves references in order, duplicates included', () => {
    const steps = resolveSteps(['stamp', 'audit', 'stamp'], false, registry);
    expect(steps.map((s) => s.reference)).toEqual(['stamp', 'audit', 'stamp']);
    expect(steps[1]?.definition).toBe(audit);
  });

  it('skips and logs unresolvable references when failing silently', () => {
    const steps = resolveSteps(['audit', 'missing', 'stamp'], true, registry);
    expect(steps.map((s) => s.reference)).toEqual(['audit', 'stamp']);
    expect(entries).toHaveLength(1);
    expect(entries[0]).toMatchObject({
      level: 'error',
      component: 'resolver',
      msg: 'failed to resolve step',
      step: 'missing',
      meta: { skipped: true },
    });
  });

  it('rethrows the first failure otherwise', () => {
    expect(() => resolveSteps(['audit', 'missing', 'gone'], false, registry)).toThrow(
      'Failed to resolve step "missing"',
    );
    expect(entries).toHaveLength(1);
    expect(entries[0]?.meta?.['skipped']).toBe(false);
  });

  it('wraps other resolver errors as resolution failures', () => {
    const broken: StepResolver = {
      resolve(): StepDefinition {
        throw new RangeError('registry offline');
      },
    };
    let caught: unknown;
    try {
      resolveSteps(['audit'], false, broken);
    } catch (err: unknown) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(StepResolutionError);
    expect(caught).toMatchObject({
      reference: 'audit',
      reason: 'registry offline',
      message: 'Failed to resolve step "audit": registry offline',
    });
  });
});
