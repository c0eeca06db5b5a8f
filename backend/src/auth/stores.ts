import type { CredentialRecord, RoleId } from '../types/users.js';
import type { ScopeId } from './scopes.js';

/** Read side of the user store, as far as authentication is concerned. */
export interface CredentialStore {
  getByUsername(username: string): Promise<CredentialRecord | null>;
  getById(id: string): Promise<CredentialRecord | null>;
}

export interface RoleStore {
  getScopesForRoles(roleIds: readonly RoleId[]): Promise<ScopeId[]>;
}
