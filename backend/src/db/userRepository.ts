import type { Database as BetterSqlite3Database } from 'better-sqlite3';
import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import type { CredentialStore } from '../auth/stores.js';
import type { CredentialRecord, RoleId } from '../types/users.js';

type UserRow = {
  id: string;
  username: string;
  email: string;
  first_name: string;
  last_name: string;
  roles: string;
  hashed_password: string;
  deleted: number;
  created_at: string;
  updated_at: string | null;
};

const RoleListSchema = z.array(z.string());

const USER_COLUMNS = `id, username, email, first_name, last_name, roles, hashed_password, deleted, created_at, updated_at`;

function mapUser(row: UserRow): CredentialRecord {
  return {
    id: row.id,
    username: row.username,
    email: row.email,
    firstName: row.first_name,
    lastName: row.last_name,
    roles: RoleListSchema.parse(JSON.parse(row.roles)),
    hashedPassword: row.hashed_password,
    deleted: Boolean(row.deleted),
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

export interface CreateUserInput {
  username: string;
  email: string;
  firstName: string;
  lastName: string;
  roles: RoleId[];
  hashedPassword: string;
}

export type UpdateUserInput = Partial<Pick<CreateUserInput, 'email' | 'firstName' | 'lastName' | 'roles'>>;

export class UserRepository implements CredentialStore {
  constructor(private readonly db: BetterSqlite3Database) {}

  async getByUsername(username: string): Promise<CredentialRecord | null> {
    const row = this.db
      .prepare<[string], UserRow>(`SELECT ${USER_COLUMNS} FROM users WHERE username = ? LIMIT 1`)
      .get(username);
    return row ? mapUser(row) : null;
  }

  async getById(id: string): Promise<CredentialRecord | null> {
    const row = this.db
      .prepare<[string], UserRow>(`SELECT ${USER_COLUMNS} FROM users WHERE id = ? LIMIT 1`)
      .get(id);
    return row ? mapUser(row) : null;
  }

  /** Which unique field an existing account already holds; `excludeId` skips the account being edited. */
  async findConflict(username: string, email: string, excludeId?: string): Promise<'username' | 'email' | null> {
    const row = this.db
      .prepare<{ username: string; email: string; exclude_id: string }, { username: string; email: string }>(
        `SELECT username, email FROM users
         WHERE (username = @username OR email = @email) AND id != @exclude_id
         LIMIT 1`,
      )
      .get({ username, email, exclude_id: excludeId ?? '' });
    if (!row) {
      return null;
    }
    return row.username === username ? 'username' : 'email';
  }

  async create(input: CreateUserInput): Promise<CredentialRecord> {
    const id = randomUUID();
    this.db
      .prepare(
        `INSERT INTO users (id, username, email, first_name, last_name, roles, hashed_password)
         VALUES (@id, @username, @email, @first_name, @last_name, @roles, @hashed_password)`,
      )
      .run({
        id,
        username: input.username,
        email: input.email,
        first_name: input.firstName,
        last_name: input.lastName,
        roles: JSON.stringify(input.roles),
        hashed_password: input.hashedPassword,
      });

    const created = await this.getById(id);
    if (!created) {
      throw new Error(`User ${id} was not persisted`);
    }
    return created;
  }

  /** Applies the given fields to an active account; returns null when there is none. */
  async update(id: string, patch: UpdateUserInput): Promise<CredentialRecord | null> {
    const result = this.db
      .prepare(
        `UPDATE users SET
           email = COALESCE(@email, email),
           first_name = COALESCE(@first_name, first_name),
           last_name = COALESCE(@last_name, last_name),
           roles = COALESCE(@roles, roles),
           updated_at = datetime('now')
         WHERE id = @id AND deleted = 0`,
      )
      .run({
        id,
        email: patch.email ?? null,
        first_name: patch.firstName ?? null,
        last_name: patch.lastName ?? null,
        roles: patch.roles ? JSON.stringify(patch.roles) : null,
      });
    return result.changes > 0 ? this.getById(id) : null;
  }

  /** Soft delete; the row stays so outstanding tokens resolve to a deleted record. */
  async markDeleted(id: string): Promise<boolean> {
    const result = this.db
      .prepare(`UPDATE users SET deleted = 1, updated_at = datetime('now') WHERE id = ? AND deleted = 0`)
      .run(id);
    return result.changes > 0;
  }
}
