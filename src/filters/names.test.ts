import { describe, it, expect } from 'vitest';
import * as names from './names.js';
import { isFilterType } from './names.js';

describe('filter type names', () => {
  it('are all well formed and unique', () => {
    const ids = Object.values<unknown>(names).filter((value): value is string => typeof value === 'string');
    expect(ids).toHaveLength(11);
    expect(ids.every(isFilterType)).toBe(true);
    expect(new Set(ids).size).toBe(ids.length);
  });

  it('rejects malformed identifiers', () => {
    expect(isFilterType('org.platform.learning.login.v1')).toBe(true);
    expect(isFilterType('org.platform.login.v1')).toBe(false);
    expect(isFilterType('org.platform.learning.login')).toBe(false);
    expect(isFilterType('org.platform.learning.login.v0')).toBe(false);
    expect(isFilterType('com.platform.learning.login.v1')).toBe(false);
    expect(isFilterType('org.Platform.learning.login.v1')).toBe(false);
  });
});
