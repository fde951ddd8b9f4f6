/**
 * Sensitive field handling for filter wrappers.
 *
 * Wrappers that expose form data (registration, password changes) take
 * the listed fields out before the pipeline runs and put them back on the
 * result afterwards. Steps never see those values and cannot change them.
 */

import type { ArgumentBag } from '../types/step.js';

/** Result of splitting a bag into its sensitive and shareable parts. */
export interface SensitiveSplit {
  sensitive: ArgumentBag;
  remainder: ArgumentBag;
}

/** Form fields holding passwords, kept away from pipeline steps. */
export const SENSITIVE_FORM_FIELDS: readonly string[] = [
  'password',
  'newpassword',
  'new_password',
  'oldpassword',
  'old_password',
  'new_password1',
  'new_password2',
];

/**
 * Split `data` into the listed keys that are present and everything else.
 * `data` is not modified.
 */
export function extractSensitiveData(data: ArgumentBag, keys: readonly string[]): SensitiveSplit {
  const listed = new Set(keys);
  const sensitive: ArgumentBag = {};
  const remainder: ArgumentBag = {};

  for (const [key, value] of Object.entries(data)) {
    if (listed.has(key)) {
      sensitive[key] = value;
    } else {
      remainder[key] = value;
    }
  }

  return { sensitive, remainder };
}

/** Overlay the extracted fields on a pipeline result, returning a new bag. */
export function restoreSensitiveData(result: ArgumentBag, sensitive: ArgumentBag): ArgumentBag {
  return { ...result, ...sensitive };
}
