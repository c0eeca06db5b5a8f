import type { Database as BetterSqlite3Database } from 'better-sqlite3';
import logger from '../logger.js';

type Migration = {
  version: number;
  name: string;
  up: (db: BetterSqlite3Database) => void;
};

const migrations: Migration[] = [
  {
    version: 1,
    name: 'users-and-roles',
    up: (db) => {
      db.exec(`
        CREATE TABLE IF NOT EXISTS roles (
          machine_name TEXT PRIMARY KEY,
          name TEXT NOT NULL,
          scopes TEXT NOT NULL DEFAULT '[]',
          created_at TEXT NOT NULL DEFAULT (datetime('now')),
          updated_at TEXT
        );

        CREATE TABLE IF NOT EXISTS users (
          id TEXT PRIMARY KEY,
          username TEXT NOT NULL UNIQUE,
          email TEXT NOT NULL UNIQUE,
          first_name TEXT NOT NULL,
          last_name TEXT NOT NULL,
          roles TEXT NOT NULL DEFAULT '[]',
          hashed_password TEXT NOT NULL,
          deleted INTEGER NOT NULL DEFAULT 0 CHECK (deleted IN (0,1)),
          created_at TEXT NOT NULL DEFAULT (datetime('now')),
          updated_at TEXT
        );

        CREATE INDEX IF NOT EXISTS idx_users_deleted ON users(deleted);
      `);
    },
  },
  {
    version: 2,
    name: 'cache-entries',
    up: (db) => {
      db.exec(`
        CREATE TABLE IF NOT EXISTS cache_entries (
          key TEXT PRIMARY KEY,
          value TEXT NOT NULL,
          expires_at INTEGER NOT NULL
        );

        CREATE INDEX IF NOT EXISTS idx_cache_entries_expires ON cache_entries(expires_at);
      `);
    },
  },
];

export function runMigrations(db: BetterSqlite3Database): void {
  const currentVersion = Number(db.pragma('user_version', { simple: true }));
  const pending = migrations.filter((migration) => migration.version > currentVersion).sort((a, b) => a.version - b.version);

  for (const migration of pending) {
    logger.info({ version: migration.version, name: migration.name }, 'Applying database migration');
    const transaction = db.transaction(() => {
      migration.up(db);
      db.pragma(`user_version = ${migration.version}`);
    });
    transaction();
  }
}
