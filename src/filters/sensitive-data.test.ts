import { describe, it, expect } from 'vitest';
import {
  SENSITIVE_FORM_FIELDS,
  extractSensitiveData,
  restoreSensitiveData,
} from './sensitive-data.js';

describe('extractSensitiveData', () => {
  it('splits listed keys from the rest', () => {
    const form = { username: 'ada', password: 'test-secret', email: 'ada@example.com' };
    expect(extractSensitiveData(form, SENSITIVE_FORM_FIELDS)).toEqual({
      sensitive: { password: 'test-secret' },
      remainder: { username: 'ada', email: 'ada@example.com' },
    });
  });

  it('leaves the input untouched', () => {
    const form = { username: 'ada', new_password1: 'test-secret' };
    extractSensitiveData(form, SENSITIVE_FORM_FIELDS);
    expect(form).toEqual({ username: 'ada', new_password1: 'test-secret' });
  });

  it('returns empty sensitive data when no listed key is present', () => {
    expect(extractSensitiveData({ username: 'ada' }, ['password'])).toEqual({
      sensitive: {},
      remainder: { username: 'ada' },
    });
  });
});

describe('restoreSensitiveData', () => {
  it('overlays the held-back fields on the result', () => {
    expect(
      restoreSensitiveData({ username: 'ada2', password: 'replaced' }, { password: 'test-secret' }),
    ).toEqual({ username: 'ada2', password: 'test-secret' });
  });
});
