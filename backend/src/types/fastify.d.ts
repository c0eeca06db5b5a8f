import 'fastify';
import type { CurrentSessionContext } from '../auth/context.js';

declare module 'fastify' {
  interface FastifyRequest {
    /** Set by an authorization guard; null for an anonymous caller on an optional route. */
    currentSession?: CurrentSessionContext | null;
  }
}
