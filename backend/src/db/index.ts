import Database from 'better-sqlite3';
import type { Database as BetterSqlite3Database } from 'better-sqlite3';
import fs from 'node:fs';
import path from 'node:path';
import logger from '../logger.js';
import { runMigrations } from './migrations.js';

const IN_MEMORY = ':memory:';

let dbInstance: BetterSqlite3Database | null = null;

/** Opens a fresh connection and brings its schema up to date. */
export function openDatabase(databasePath: string): BetterSqlite3Database {
  let target = databasePath;
  if (databasePath !== IN_MEMORY) {
    target = path.resolve(databasePath);
    fs.mkdirSync(path.dirname(target), { recursive: true });
  }

  logger.info({ databasePath: target }, 'Initialising SQLite database');

  const db = new Database(target);
  db.pragma('foreign_keys = ON');
  if (target !== IN_MEMORY) {
    db.pragma('journal_mode = WAL');
  }
  db.pragma('busy_timeout = 5000');

  runMigrations(db);
  return db;
}

export async function initDatabase(databasePath: string): Promise<BetterSqlite3Database> {
  if (dbInstance) {
    return dbInstance;
  }
  dbInstance = openDatabase(databasePath);
  return dbInstance;
}

export function closeDatabase(): void {
  if (dbInstance) {
    dbInstance.close();
    dbInstance = null;
  }
}
