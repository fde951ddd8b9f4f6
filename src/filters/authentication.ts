/**
 * Filters of the authentication subdomain.
 */

import type { ArgumentBag } from '../types/step.js';
import { SESSION_JWT_CREATION_REQUESTED } from './names.js';
import { PublicFilter, bagAt } from './public-filter.js';

/**
 * Runs when a session JWT is about to be signed. Steps may add claims to
 * the payload.
 */
export class SessionJWTCreationRequested extends PublicFilter {
  readonly filterType = SESSION_JWT_CREATION_REQUESTED;

  runFilter(payload: ArgumentBag, user: unknown): { payload: ArgumentBag; user: unknown } {
    const data = this.runPipeline({ payload, user });
    return { payload: bagAt(data, 'payload'), user: data['user'] };
  }
}
