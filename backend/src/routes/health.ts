import type { Database as BetterSqlite3Database } from 'better-sqlite3';
import type { FastifyInstance } from 'fastify';
import type { AuthorizationGates } from '../auth/gate.js';
import { Scopes } from '../auth/scopes.js';

interface RegisterHealthRouteOptions {
  db: BetterSqlite3Database;
  gates: AuthorizationGates;
}

export async function registerHealthRoute(app: FastifyInstance, options: RegisterHealthRouteOptions) {
  const { db, gates } = options;

  app.get('/health', { preHandler: gates.strict.guard([Scopes.HEALTH_GET_HEALTH]) }, async () => {
    return { status: 'healthy' } as const;
  });

  // Public readiness probe for orchestrators.
  app.get('/ready', async (_request, reply) => {
    try {
      db.prepare('SELECT 1').get();
      reply.code(200);
      return { status: 'ready' } as const;
    } catch (error) {
      reply.code(503);
      return { status: 'not-ready', error: error instanceof Error ? error.message : String(error) } as const;
    }
  });
}
