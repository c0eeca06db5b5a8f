import { z } from 'zod';
import type { Cache } from '../cache/types.js';
import logger from '../logger.js';
import type { RoleId } from '../types/users.js';
import type { ScopeId } from './scopes.js';
import type { RoleStore } from './stores.js';

const CACHE_KEY_PREFIX = 'role_scopes:';

const CachedScopesSchema = z.array(z.string());

export interface RoleScopeResolverOptions {
  ttlSeconds: number;
}

/** Same key for any ordering or duplication of the same role set. */
export function roleScopesCacheKey(roles: readonly RoleId[]): string {
  const canonical = [...new Set(roles)].sort();
  return `${CACHE_KEY_PREFIX}${JSON.stringify(canonical)}`;
}

/**
 * Read-through cache in front of the role store. Two concurrent misses for
 * the same key both query the store and both write the same value; there is
 * no lock. Entries only leave the cache by expiring.
 */
export class RoleScopeResolver {
  constructor(
    private readonly roles: RoleStore,
    private readonly cache: Cache,
    private readonly options: RoleScopeResolverOptions,
  ) {}

  async resolve(roles: readonly RoleId[]): Promise<ScopeId[]> {
    const key = roleScopesCacheKey(roles);

    const cached = await this.cache.get(key);
    if (cached !== null) {
      const parsed = CachedScopesSchema.safeParse(safeJsonParse(cached));
      if (parsed.success) {
        return parsed.data;
      }
      logger.warn({ key }, 'Discarding unreadable role-scope cache entry');
    }

    const scopes = await this.roles.getScopesForRoles([...new Set(roles)].sort());
    await this.cache.set(key, JSON.stringify(scopes), this.options.ttlSeconds);
    return scopes;
  }
}

function safeJsonParse(value: string): unknown {
  try {
    return JSON.parse(value);
  } catch {
    return undefined;
  }
}
