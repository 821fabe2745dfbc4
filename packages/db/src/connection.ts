/**
 * SQLite connection for the structured store
 *
 * Opens (or creates) the database file, applies pragmas and runs pending
 * migrations. Pass ':memory:' for a throwaway database.
 */

import Database from 'better-sqlite3';
import type BetterSqlite3 from 'better-sqlite3';
import { mkdirSync } from 'fs';
import { dirname, resolve } from 'path';
import pino from 'pino';
import { runMigrations } from './migrations.js';

const logger = pino({ level: process.env.LOG_LEVEL || 'info' });

export const IN_MEMORY = ':memory:';

export function openDatabase(path: string): BetterSqlite3.Database {
  if (path !== IN_MEMORY) {
    mkdirSync(dirname(resolve(path)), { recursive: true });
  }

  const db = new Database(path);

  db.pragma('foreign_keys = ON');
  if (path !== IN_MEMORY) {
    db.pragma('journal_mode = WAL');
  }

  logger.debug({ event: 'db.open', path }, 'Opened database');
  runMigrations(db);

  return db;
}
