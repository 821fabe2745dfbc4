/**
 * SQLite structured store
 *
 * Note: .env loading is handled centrally by @kexp/config; callers pass the
 * database path in explicitly.
 */

export { openDatabase, IN_MEMORY } from './connection.js';
export { runMigrations, getCurrentSchemaVersion, migrations, type Migration } from './migrations.js';
export { SqliteStructuredStore, type SqliteStoreOptions } from './store.js';
