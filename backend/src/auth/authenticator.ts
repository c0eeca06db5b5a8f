import { IncorrectCredentialsError } from './errors.js';
import type { PasswordHasher } from './password.js';
import type { RoleScopeResolver } from './roleScopeResolver.js';
import { assertScopes, type ScopeId } from './scopes.js';
import type { CredentialStore } from './stores.js';

export interface AuthenticatedSession {
  subject: string;
  grantedScopes: ScopeId[];
}

export interface CredentialAuthenticatorDeps {
  credentials: CredentialStore;
  resolver: RoleScopeResolver;
  passwords: PasswordHasher;
}

export class CredentialAuthenticator {
  constructor(private readonly deps: CredentialAuthenticatorDeps) {}

  /**
   * Checks the password, then narrows the session to the requested scopes.
   * An empty request grants everything the account's roles permit.
   */
  async authenticate(
    username: string,
    password: string,
    requestedScopes: readonly ScopeId[] = [],
  ): Promise<AuthenticatedSession> {
    const record = await this.deps.credentials.getByUsername(username);

    if (!record || record.deleted) {
      throw new IncorrectCredentialsError();
    }
    if (!(await this.deps.passwords.verify(password, record.hashedPassword))) {
      throw new IncorrectCredentialsError();
    }

    const permitted = await this.deps.resolver.resolve(record.roles);

    if (requestedScopes.length > 0) {
      assertScopes(permitted, requestedScopes);
      return { subject: record.id, grantedScopes: [...requestedScopes] };
    }

    return { subject: record.id, grantedScopes: permitted };
  }
}
