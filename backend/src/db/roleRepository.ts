import type { Database as BetterSqlite3Database } from 'better-sqlite3';
import { z } from 'zod';
import type { ScopeId } from '../auth/scopes.js';
import type { RoleStore } from '../auth/stores.js';
import type { RoleId, RoleRecord } from '../types/users.js';

type RoleRow = {
  machine_name: string;
  name: string;
  scopes: string;
  created_at: string;
  updated_at: string | null;
};

const ScopeListSchema = z.array(z.string());

function mapRole(row: RoleRow): RoleRecord {
  return {
    machineName: row.machine_name,
    name: row.name,
    scopes: ScopeListSchema.parse(JSON.parse(row.scopes)),
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

export class RoleRepository implements RoleStore {
  constructor(private readonly db: BetterSqlite3Database) {}

  async list(): Promise<RoleRecord[]> {
    const rows = this.db
      .prepare<[], RoleRow>(
        `SELECT machine_name, name, scopes, created_at, updated_at FROM roles ORDER BY machine_name ASC`,
      )
      .all();
    return rows.map(mapRole);
  }

  /** Union of the scopes granted by the given roles, in role then declaration order. */
  async getScopesForRoles(roleIds: readonly RoleId[]): Promise<ScopeId[]> {
    if (roleIds.length === 0) {
      return [];
    }

    const rows = this.db
      .prepare<[string], Pick<RoleRow, 'scopes'>>(
        `SELECT scopes FROM roles
         WHERE machine_name IN (SELECT value FROM json_each(?))
         ORDER BY machine_name ASC`,
      )
      .all(JSON.stringify(roleIds));

    const union = new Set<ScopeId>();
    for (const row of rows) {
      for (const scope of ScopeListSchema.parse(JSON.parse(row.scopes))) {
        union.add(scope);
      }
    }
    return [...union];
  }

  async upsert(role: { machineName: RoleId; name: string; scopes: ScopeId[] }): Promise<void> {
    this.db
      .prepare(
        `INSERT INTO roles (machine_name, name, scopes)
         VALUES (@machine_name, @name, @scopes)
         ON CONFLICT(machine_name) DO UPDATE SET
           name = excluded.name,
           scopes = excluded.scopes,
           updated_at = datetime('now')`,
      )
      .run({ machine_name: role.machineName, name: role.name, scopes: JSON.stringify(role.scopes) });
  }
}
