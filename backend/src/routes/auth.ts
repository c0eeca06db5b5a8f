import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import type { CredentialAuthenticator } from '../auth/authenticator.js';
import { requireCurrentSession } from '../auth/context.js';
import type { AuthorizationGates } from '../auth/gate.js';
import type { RoleScopeResolver } from '../auth/roleScopeResolver.js';
import { parseScopeParameter, Scopes } from '../auth/scopes.js';
import type { TokenCodec } from '../auth/tokenCodec.js';
import { rateLimitByIp, type FixedWindowRateLimiter } from '../middleware/rateLimit.js';
import { sendError } from '../utils/errors.js';

const TOKEN_TYPE = 'Bearer';

/** OAuth2 password-grant fields; `scope` is space separated. */
const TokenRequestSchema = z.object({
  username: z.string().min(1),
  password: z.string().min(1),
  scope: z.string().optional(),
});

interface RegisterAuthRoutesOptions {
  authenticator: CredentialAuthenticator;
  codec: TokenCodec;
  resolver: RoleScopeResolver;
  gates: AuthorizationGates;
  loginRateLimiter: FixedWindowRateLimiter;
}

export async function registerAuthRoutes(app: FastifyInstance, options: RegisterAuthRoutesOptions) {
  const { authenticator, codec, resolver, gates, loginRateLimiter } = options;

  app.post('/auth/tokens', { preHandler: rateLimitByIp(loginRateLimiter) }, async (request, reply) => {
    const parsed = TokenRequestSchema.safeParse(request.body ?? {});
    if (!parsed.success) {
      return sendError(reply, 400, 'invalid_request', 'Invalid request', parsed.error.issues);
    }

    const { username, password, scope } = parsed.data;
    const session = await authenticator.authenticate(username, password, parseScopeParameter(scope));
    const tokens = await codec.issueSessionPair(session.subject, session.grantedScopes);

    request.log.info({ userId: session.subject, scopes: session.grantedScopes.length }, 'Issued session tokens');
    reply.status(201);
    return {
      access_token: tokens.access,
      refresh_token: tokens.refresh,
      token_type: TOKEN_TYPE,
    };
  });

  // Refresh tokens are not rotated: this only mints a new access token,
  // carrying every scope the account's current roles permit.
  app.post(
    '/auth/access-token',
    { preHandler: gates.strictRefresh.guard([Scopes.AUTH_REFRESH_TOKEN]) },
    async (request, reply) => {
      const { user } = requireCurrentSession(request);
      const scopes = await resolver.resolve(user.roles);
      const accessToken = await codec.issue(user.id, scopes, 'access');

      reply.status(201);
      return { access_token: accessToken, token_type: TOKEN_TYPE };
    },
  );
}
