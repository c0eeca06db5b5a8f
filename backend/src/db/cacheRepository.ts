import type { Database as BetterSqlite3Database } from 'better-sqlite3';
import type { Cache } from '../cache/types.js';

/**
 * Cache entries kept in the service database. Expired rows are ignored on
 * read and replaced on the next write; `purgeExpired` trims them in bulk.
 */
export class SqliteCache implements Cache {
  constructor(
    private readonly db: BetterSqlite3Database,
    private readonly now: () => number = Date.now,
  ) {}

  async get(key: string): Promise<string | null> {
    const row = this.db
      .prepare<{ key: string; now: number }, { value: string }>(
        `SELECT value FROM cache_entries WHERE key = @key AND expires_at > @now LIMIT 1`,
      )
      .get({ key, now: this.now() });
    return row?.value ?? null;
  }

  async set(key: string, value: string, ttlSeconds: number): Promise<void> {
    this.db
      .prepare(
        `INSERT OR REPLACE INTO cache_entries (key, value, expires_at) VALUES (@key, @value, @expires_at)`,
      )
      .run({ key, value, expires_at: this.now() + ttlSeconds * 1000 });
  }

  purgeExpired(): number {
    return this.db.prepare(`DELETE FROM cache_entries WHERE expires_at <= ?`).run(this.now()).changes;
  }
}
