import type { FastifyReply, FastifyRequest, preHandlerAsyncHookHandler } from 'fastify';

type Bucket = { count: number; windowStart: number };

export type RateState = {
  limit: number;
  remaining: number;
  resetEpochSeconds: number;
  retryAfterSeconds: number;
};

export interface FixedWindowRateLimiter {
  tryConsume(key: string): { allowed: boolean; state: RateState };
  peek(key: string): RateState;
  /** Number of keys currently holding a bucket. */
  readonly size: number;
}

export function createFixedWindowRateLimiter(opts: {
  windowMs: number;
  limit: number;
  now?: () => number;
}): FixedWindowRateLimiter {
  const store = new Map<string, Bucket>();
  const { windowMs, limit } = opts;
  const clock = opts.now ?? Date.now;
  let lastSweep = clock();

  // Drops buckets whose window has closed; runs at most once per window.
  function sweep(now: number): void {
    if (now - lastSweep < windowMs) {
      return;
    }
    lastSweep = now;
    for (const [key, bucket] of store) {
      if (now - bucket.windowStart >= windowMs) {
        store.delete(key);
      }
    }
  }

  function computeState(now: number, b: Bucket | undefined): RateState {
    const windowStart = b ? b.windowStart : now;
    const elapsed = now - windowStart;
    const resetMs = elapsed < windowMs ? windowMs - elapsed : 0;
    const resetEpochSeconds = Math.ceil((now + resetMs) / 1000);
    const used = b ? b.count : 0;
    const remaining = Math.max(0, limit - used);
    return { limit, remaining, resetEpochSeconds, retryAfterSeconds: Math.ceil(resetMs / 1000) };
  }

  return {
    tryConsume(key: string) {
      const now = clock();
      sweep(now);
      let b = store.get(key);
      if (!b || now - b.windowStart >= windowMs) {
        b = { count: 0, windowStart: now };
        store.set(key, b);
      }
      if (b.count < limit) {
        b.count += 1;
        return { allowed: true, state: computeState(now, b) };
      }
      return { allowed: false, state: computeState(now, b) };
    },
    peek(key: string) {
      return computeState(clock(), store.get(key));
    },
    get size() {
      return store.size;
    },
  };
}

// `request.ip` only follows X-Forwarded-For when the server runs with `trustProxy`.
function clientIp(request: FastifyRequest): string {
  const rawIp = request.ip;
  return rawIp.startsWith('::ffff:') ? rawIp.slice(7) : rawIp;
}

/** Per-IP throttle for credential endpoints; answers 429 once the window is used up. */
export function rateLimitByIp(limiter: FixedWindowRateLimiter): preHandlerAsyncHookHandler {
  return async (request: FastifyRequest, reply: FastifyReply) => {
    const res = limiter.tryConsume(clientIp(request) || 'unknown');
    reply.header('X-RateLimit-Limit', String(res.state.limit));
    reply.header('X-RateLimit-Remaining', String(res.state.remaining));
    reply.header('X-RateLimit-Reset', String(res.state.resetEpochSeconds));
    if (!res.allowed) {
      reply.header('Retry-After', String(res.state.retryAfterSeconds));
      request.log.warn({ ip: clientIp(request) }, 'Login rate limit exceeded');
      reply.code(429);
      return reply.send({ error: 'Too Many Requests', code: 'rate_limit.exceeded' });
    }
  };
}
