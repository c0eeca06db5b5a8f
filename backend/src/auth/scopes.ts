/**
 * Scope identifiers and the subset check every permission decision goes
 * through. Route declarations, login-time negotiation and the request gates
 * all call into `verifyScopes`; nothing else compares scope sets.
 */

import { PermissionDeniedError } from './errors.js';

export type ScopeId = string;

/** Scope naming: {domain}_{action}_{entity} */
export const Scopes = {
  HEALTH_GET_HEALTH: 'HEALTH_GET_HEALTH',
  AUTH_REFRESH_TOKEN: 'AUTH_REFRESH_TOKEN',
  USERS_GET_ME: 'USERS_GET_ME',
  USERS_CREATE_USER: 'USERS_CREATE_USER',
  USERS_UPDATE_USER: 'USERS_UPDATE_USER',
  USERS_DELETE_USER: 'USERS_DELETE_USER',
  ROLES_GET_ROLES: 'ROLES_GET_ROLES',
} as const satisfies Record<string, ScopeId>;

export type ScopeVerification =
  | { authorized: true; missingScopes: [] }
  | { authorized: false; missingScopes: ScopeId[] };

export function verifyScopes(
  granted: Iterable<ScopeId>,
  required: Iterable<ScopeId>,
): ScopeVerification {
  const grantedSet = new Set(granted);
  const missingScopes: ScopeId[] = [];

  for (const scope of required) {
    if (!grantedSet.has(scope) && !missingScopes.includes(scope)) {
      missingScopes.push(scope);
    }
  }

  if (missingScopes.length === 0) {
    return { authorized: true, missingScopes: [] };
  }
  return { authorized: false, missingScopes };
}

export function assertScopes(granted: Iterable<ScopeId>, required: Iterable<ScopeId>): void {
  const result = verifyScopes(granted, required);
  if (!result.authorized) {
    throw new PermissionDeniedError(result.missingScopes);
  }
}

/** Splits an OAuth2-style space separated `scope` parameter, keeping first-seen order. */
export function parseScopeParameter(raw: string | undefined | null): ScopeId[] {
  if (!raw) {
    return [];
  }
  const unique = new Set<ScopeId>();
  for (const entry of raw.split(/\s+/)) {
    if (entry.length > 0) {
      unique.add(entry);
    }
  }
  return [...unique];
}
