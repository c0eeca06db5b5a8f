import type { FastifyReply, FastifyRequest, preHandlerAsyncHookHandler } from 'fastify';
import type { CurrentSessionContext } from './context.js';
import { NotAuthorizedError } from './errors.js';
import { assertScopes, type ScopeId } from './scopes.js';
import type { CredentialStore } from './stores.js';
import type { TokenCodec, TokenKind } from './tokenCodec.js';

export type TokenPresence = 'mandatory' | 'optional';

export interface GateConfiguration {
  presence: TokenPresence;
  tokenKind: TokenKind;
}

export const STRICT = { presence: 'mandatory', tokenKind: 'access' } as const satisfies GateConfiguration;
export const STRICT_REFRESH = { presence: 'mandatory', tokenKind: 'refresh' } as const satisfies GateConfiguration;
export const OPTIONAL = { presence: 'optional', tokenKind: 'access' } as const satisfies GateConfiguration;

export interface AuthorizationGateDeps {
  codec: TokenCodec;
  credentials: CredentialStore;
}

export function extractBearerToken(headerValue: string | undefined): string | undefined {
  if (!headerValue) {
    return undefined;
  }

  const match = headerValue.match(/^Bearer\s+(.+)$/i);
  const token = match?.[1]?.trim();
  return token ? token : undefined;
}

/**
 * One authorization procedure for every route. The configuration decides
 * whether a missing token is fatal and which signing key must verify it;
 * decoding, the scope check and the deleted-account check never vary.
 * Instances hold no per-request state and are shared across requests.
 */
export class AuthorizationGate {
  constructor(
    readonly configuration: GateConfiguration,
    private readonly deps: AuthorizationGateDeps,
  ) {}

  /**
   * Resolves the session for a raw `Authorization` header value.
   * Returns null only for an anonymous caller on an optional gate.
   */
  async authorize(
    authorizationHeader: string | undefined,
    requiredScopes: readonly ScopeId[],
  ): Promise<CurrentSessionContext | null> {
    const token = extractBearerToken(authorizationHeader);

    if (!token) {
      if (this.configuration.presence === 'optional') {
        return null;
      }
      throw new NotAuthorizedError();
    }

    const claims = await this.deps.codec.decode(token, this.configuration.tokenKind);

    assertScopes(claims.scopes, requiredScopes);

    const user = await this.deps.credentials.getById(claims.subject);
    if (!user || user.deleted) {
      throw new NotAuthorizedError();
    }

    return { user, scopes: claims.scopes };
  }

  /** Fastify preHandler that publishes the session on `request.currentSession`. */
  guard(requiredScopes: readonly ScopeId[]): preHandlerAsyncHookHandler {
    const scopes = Object.freeze([...requiredScopes]);

    return async (request: FastifyRequest, _reply: FastifyReply) => {
      request.currentSession = await this.authorize(request.headers.authorization, scopes);
    };
  }
}

export interface AuthorizationGates {
  strict: AuthorizationGate;
  strictRefresh: AuthorizationGate;
  optional: AuthorizationGate;
}

export function createAuthorizationGates(deps: AuthorizationGateDeps): AuthorizationGates {
  return {
    strict: new AuthorizationGate(STRICT, deps),
    strictRefresh: new AuthorizationGate(STRICT_REFRESH, deps),
    optional: new AuthorizationGate(OPTIONAL, deps),
  };
}
