import type { Database as BetterSqlite3Database } from 'better-sqlite3';
import Fastify, { type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import formBody from '@fastify/formbody';
import { CredentialAuthenticator } from './auth/authenticator.js';
import { createAuthorizationGates, type AuthorizationGates } from './auth/gate.js';
import { BcryptPasswordHasher, type PasswordHasher } from './auth/password.js';
import { RoleScopeResolver } from './auth/roleScopeResolver.js';
import { TokenCodec } from './auth/tokenCodec.js';
import { MemoryCache } from './cache/memoryCache.js';
import type { Cache } from './cache/types.js';
import type { AppConfig } from './config.js';
import { SqliteCache } from './db/cacheRepository.js';
import { RoleRepository } from './db/roleRepository.js';
import { UserRepository } from './db/userRepository.js';
import { loggerOptions } from './logger.js';
import { registerErrorHandler } from './middleware/errorHandler.js';
import { createFixedWindowRateLimiter } from './middleware/rateLimit.js';
import { registerAuthRoutes } from './routes/auth.js';
import { registerHealthRoute } from './routes/health.js';
import { registerRoleRoutes } from './routes/roles.js';
import { registerUserRoutes } from './routes/users.js';

export interface AppDependencies {
  config: AppConfig;
  db: BetterSqlite3Database;
  /** Overrides the cache chosen by `config.cache.backend`. */
  cache?: Cache;
  passwords?: PasswordHasher;
  now?: () => Date;
}

export interface AppServices {
  users: UserRepository;
  roles: RoleRepository;
  cache: Cache;
  passwords: PasswordHasher;
  codec: TokenCodec;
  resolver: RoleScopeResolver;
  authenticator: CredentialAuthenticator;
  gates: AuthorizationGates;
}

/** Wires the stateless auth objects once; every route shares them. */
export function createServices(deps: AppDependencies): AppServices {
  const { config, db } = deps;
  const now = deps.now ?? (() => new Date());

  const users = new UserRepository(db);
  const roles = new RoleRepository(db);
  const cache =
    deps.cache ??
    (config.cache.backend === 'memory'
      ? new MemoryCache(() => now().getTime())
      : new SqliteCache(db, () => now().getTime()));
  const passwords = deps.passwords ?? new BcryptPasswordHasher(config.auth.passwordHashRounds);

  const codec = new TokenCodec({
    algorithm: config.auth.algorithm,
    access: { secret: config.auth.secretKey, ttlMinutes: config.auth.accessTokenExpireMinutes },
    refresh: { secret: config.auth.refreshSecretKey, ttlMinutes: config.auth.refreshTokenExpireMinutes },
    now,
  });
  const resolver = new RoleScopeResolver(roles, cache, { ttlSeconds: config.cache.roleScopesTtlSeconds });
  const authenticator = new CredentialAuthenticator({ credentials: users, resolver, passwords });
  const gates = createAuthorizationGates({ codec, credentials: users });

  return { users, roles, cache, passwords, codec, resolver, authenticator, gates };
}

export async function buildApp(
  deps: AppDependencies,
): Promise<{ app: FastifyInstance; services: AppServices }> {
  const services = createServices(deps);
  const app = Fastify({ logger: loggerOptions, trustProxy: deps.config.trustProxy });

  await app.register(cors, {
    origin: true,
    methods: ['GET', 'POST', 'DELETE', 'OPTIONS'],
    allowedHeaders: ['Authorization', 'Content-Type'],
    exposedHeaders: ['WWW-Authenticate', 'X-RateLimit-Limit', 'X-RateLimit-Remaining', 'X-RateLimit-Reset'],
  });

  // OAuth2 clients post the password grant as a form.
  await app.register(formBody);

  app.addHook('onRequest', async (request, reply) => {
    reply.header('x-request-id', request.id);
  });

  registerErrorHandler(app);

  const loginRateLimiter = createFixedWindowRateLimiter(deps.config.auth.loginRateLimit);

  await registerHealthRoute(app, { db: deps.db, gates: services.gates });
  await registerAuthRoutes(app, {
    authenticator: services.authenticator,
    codec: services.codec,
    resolver: services.resolver,
    gates: services.gates,
    loginRateLimiter,
  });
  await registerUserRoutes(app, {
    users: services.users,
    roles: services.roles,
    passwords: services.passwords,
    gates: services.gates,
  });
  await registerRoleRoutes(app, { roles: services.roles, gates: services.gates });

  return { app, services };
}
