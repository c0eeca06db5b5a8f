import type { Database as BetterSqlite3Database } from 'better-sqlite3';
import { fileURLToPath } from 'node:url';
import type { CredentialStore, RoleStore } from '../src/auth/stores.js';
import type { ScopeId } from '../src/auth/scopes.js';
import { loadConfig, type AppConfig } from '../src/config.js';
import { openDatabase } from '../src/db/index.js';
import { RoleRepository } from '../src/db/roleRepository.js';
import { loadRoleSeed, seedRoles, type RoleSeed } from '../src/db/roleSeed.js';
import type { CredentialRecord, RoleId } from '../src/types/users.js';

export const ROLE_SEED_PATH = fileURLToPath(new URL('../data/roles.json', import.meta.url));

export const TEST_ACCESS_SECRET = 'test-access-secret';
export const TEST_REFRESH_SECRET = 'test-refresh-secret';

export function testConfig(overrides: NodeJS.ProcessEnv = {}): AppConfig {
  return loadConfig({
    NODE_ENV: 'test',
    DATABASE_FILE: ':memory:',
    ROLE_SEED_FILE: ROLE_SEED_PATH,
    AUTH_SECRET_KEY: TEST_ACCESS_SECRET,
    AUTH_REFRESH_SECRET_KEY: TEST_REFRESH_SECRET,
    AUTH_PASSWORD_HASH_ROUNDS: '4',
    ROLE_SCOPES_CACHE: 'memory',
    ...overrides,
  });
}

export async function createSeededDatabase(): Promise<{ db: BetterSqlite3Database; seed: RoleSeed }> {
  const db = openDatabase(':memory:');
  const seed = await loadRoleSeed(ROLE_SEED_PATH);
  await seedRoles(new RoleRepository(db), seed);
  return { db, seed };
}

export function scopesOf(seed: RoleSeed, machineName: RoleId): ScopeId[] {
  const role = seed.roles.find((entry) => entry.machineName === machineName);
  if (!role) {
    throw new Error(`Role ${machineName} is not in the seed`);
  }
  return role.scopes;
}

/** Mutable clock shared by the codec, caches and limiter under test. */
export class TestClock {
  constructor(private current: Date) {}

  readonly now = (): Date => new Date(this.current.getTime());

  readonly nowMs = (): number => this.current.getTime();

  advance(ms: number): void {
    this.current = new Date(this.current.getTime() + ms);
  }
}

export const MINUTE_MS = 60_000;

export function credentialRecord(overrides: Partial<CredentialRecord> & Pick<CredentialRecord, 'id' | 'username'>): CredentialRecord {
  return {
    email: `${overrides.username}@example.test`,
    firstName: 'Test',
    lastName: 'User',
    roles: ['Customer'],
    hashedPassword: '',
    deleted: false,
    createdAt: '2026-01-01 00:00:00',
    updatedAt: null,
    ...overrides,
  };
}

export class InMemoryCredentialStore implements CredentialStore {
  private readonly records = new Map<string, CredentialRecord>();

  constructor(records: CredentialRecord[] = []) {
    for (const record of records) {
      this.records.set(record.id, record);
    }
  }

  async getByUsername(username: string): Promise<CredentialRecord | null> {
    for (const record of this.records.values()) {
      if (record.username === username) {
        return record;
      }
    }
    return null;
  }

  async getById(id: string): Promise<CredentialRecord | null> {
    return this.records.get(id) ?? null;
  }
}

/** Role store over a fixed table that records every lookup it serves. */
export class RecordingRoleStore implements RoleStore {
  readonly calls: RoleId[][] = [];
  failWith: Error | null = null;

  constructor(private readonly table: Record<RoleId, ScopeId[]>) {}

  async getScopesForRoles(roleIds: readonly RoleId[]): Promise<ScopeId[]> {
    this.calls.push([...roleIds]);
    if (this.failWith) {
      throw this.failWith;
    }
    const union = new Set<ScopeId>();
    for (const roleId of roleIds) {
      for (const scope of this.table[roleId] ?? []) {
        union.add(scope);
      }
    }
    return [...union];
  }
}
