import type { FastifyRequest } from 'fastify';
import type { CredentialRecord } from '../types/users.js';
import { NotAuthorizedError } from './errors.js';
import type { ScopeId } from './scopes.js';

/**
 * Who is calling and with which scopes, for one request. Created by the
 * authorization gate and discarded with the request.
 */
export interface CurrentSessionContext {
  /** Account the token resolved to. Borrowed for the request lifetime. */
  user: CredentialRecord;
  /** Scopes carried by this session's token; may be narrower than the roles permit. */
  scopes: ScopeId[];
}

/** For handlers behind a mandatory gate; an absent session means the route was wired without one. */
export function requireCurrentSession(request: FastifyRequest): CurrentSessionContext {
  if (!request.currentSession) {
    throw new NotAuthorizedError();
  }
  return request.currentSession;
}
