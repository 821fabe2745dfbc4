/**
 * Schema migrations, applied in order inside one transaction each
 */

import type BetterSqlite3 from 'better-sqlite3';
import pino from 'pino';

const logger = pino({ level: process.env.LOG_LEVEL || 'info' });

export interface Migration {
  version: number;
  description: string;
  up: (db: BetterSqlite3.Database) => void;
}

const URGENCY_CHECK = "('low', 'medium', 'high', 'critical')";

export const migrations: Migration[] = [
  {
    version: 1,
    description: 'Initial knowledge expiry schema',
    up(db) {
      db.exec(`
        CREATE TABLE documents (
          id INTEGER PRIMARY KEY AUTOINCREMENT,
          vector_id TEXT UNIQUE,
          file_path TEXT NOT NULL,
          filename TEXT NOT NULL,
          file_type TEXT NOT NULL,
          file_size INTEGER NOT NULL,
          mime_type TEXT,
          status TEXT NOT NULL DEFAULT 'pending'
            CHECK (status IN ('pending', 'processing', 'analyzed', 'error')),
          processed_at TEXT,
          analysis_confidence REAL,
          content_summary TEXT,
          created_at TEXT NOT NULL,
          modified_at TEXT,
          updated_at TEXT NOT NULL
        );

        CREATE TABLE critical_points (
          id INTEGER PRIMARY KEY AUTOINCREMENT,
          document_id INTEGER NOT NULL REFERENCES documents(id) ON DELETE CASCADE,
          description TEXT NOT NULL,
          category TEXT NOT NULL
            CHECK (category IN ('technical', 'process', 'policy', 'regulatory', 'product', 'organizational')),
          urgency TEXT NOT NULL CHECK (urgency IN ${URGENCY_CHECK}),
          last_updated_date TEXT,
          expiry_indicators TEXT NOT NULL DEFAULT '[]',
          confidence_score REAL,
          context_snippet TEXT,
          page_number INTEGER,
          section_title TEXT,
          extracted_by_model TEXT,
          created_at TEXT NOT NULL,
          updated_at TEXT NOT NULL
        );

        CREATE TABLE recommendations (
          id INTEGER PRIMARY KEY AUTOINCREMENT,
          critical_point_id INTEGER NOT NULL REFERENCES critical_points(id) ON DELETE CASCADE,
          title TEXT NOT NULL,
          description TEXT NOT NULL,
          priority TEXT NOT NULL CHECK (priority IN ${URGENCY_CHECK}),
          estimated_effort_hours REAL,
          suggested_owner_role TEXT,
          suggested_timeline TEXT,
          dependencies TEXT NOT NULL DEFAULT '[]',
          is_implemented INTEGER NOT NULL DEFAULT 0,
          implemented_date TEXT,
          implementation_notes TEXT,
          generated_by_model TEXT,
          created_at TEXT NOT NULL,
          updated_at TEXT NOT NULL
        );

        CREATE TABLE document_ownership (
          id INTEGER PRIMARY KEY AUTOINCREMENT,
          document_id INTEGER NOT NULL REFERENCES documents(id) ON DELETE CASCADE,
          owner_name TEXT,
          owner_email TEXT,
          department TEXT,
          role TEXT,
          last_reviewed_by TEXT,
          last_review_date TEXT,
          next_review_date TEXT,
          review_frequency_months INTEGER,
          is_primary INTEGER NOT NULL DEFAULT 1,
          is_active INTEGER NOT NULL DEFAULT 1,
          created_at TEXT NOT NULL,
          updated_at TEXT NOT NULL
        );

        CREATE TABLE analysis_sessions (
          session_id TEXT PRIMARY KEY,
          analysis_model TEXT NOT NULL,
          documents_analyzed INTEGER NOT NULL DEFAULT 0,
          critical_points_found INTEGER NOT NULL DEFAULT 0,
          high_priority_items INTEGER NOT NULL DEFAULT 0,
          medium_priority_items INTEGER NOT NULL DEFAULT 0,
          low_priority_items INTEGER NOT NULL DEFAULT 0,
          file_types_analyzed TEXT NOT NULL DEFAULT '[]',
          directories_scanned TEXT NOT NULL DEFAULT '[]',
          status TEXT NOT NULL DEFAULT 'running' CHECK (status IN ('running', 'completed', 'error')),
          started_at TEXT NOT NULL,
          completed_at TEXT,
          duration_seconds INTEGER,
          errors_encountered INTEGER NOT NULL DEFAULT 0,
          error_details TEXT NOT NULL DEFAULT '[]'
        );

        CREATE TABLE knowledge_expiry_reports (
          report_id TEXT PRIMARY KEY,
          title TEXT NOT NULL,
          description TEXT,
          report_type TEXT NOT NULL CHECK (report_type IN ('executive', 'detailed', 'comprehensive')),
          output_format TEXT NOT NULL,
          output_path TEXT,
          documents_included INTEGER NOT NULL DEFAULT 0,
          expired_knowledge_count INTEGER NOT NULL DEFAULT 0,
          critical_findings_count INTEGER NOT NULL DEFAULT 0,
          recommendations_count INTEGER NOT NULL DEFAULT 0,
          generated_by_model TEXT NOT NULL,
          generation_duration_seconds INTEGER,
          status TEXT NOT NULL DEFAULT 'generating' CHECK (status IN ('generating', 'completed', 'error')),
          generated_at TEXT NOT NULL,
          created_at TEXT NOT NULL,
          updated_at TEXT NOT NULL
        );
      `);
    },
  },
  {
    version: 2,
    description: 'Lookup indexes for reports',
    up(db) {
      db.exec(`
        CREATE INDEX idx_documents_status ON documents(status);
        CREATE INDEX idx_critical_points_document ON critical_points(document_id);
        CREATE INDEX idx_critical_points_urgency ON critical_points(urgency);
        CREATE INDEX idx_recommendations_point ON recommendations(critical_point_id);
      `);
    },
  },
];

export function getCurrentSchemaVersion(db: BetterSqlite3.Database): number {
  const row = db.prepare<[], { version: number | null }>('SELECT MAX(version) AS version FROM schema_version').get();
  return row?.version ?? 0;
}

/**
 * Apply migrations newer than the recorded schema version
 */
export function runMigrations(db: BetterSqlite3.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS schema_version (
      version INTEGER PRIMARY KEY,
      applied_at TEXT DEFAULT CURRENT_TIMESTAMP,
      description TEXT
    );
  `);

  const currentVersion = getCurrentSchemaVersion(db);
  const pending = migrations.filter((migration) => migration.version > currentVersion);

  if (pending.length === 0) {
    logger.debug({ event: 'db.migrations.current', currentVersion }, 'Migrations up to date');
    return;
  }

  for (const migration of pending) {
    const apply = db.transaction(() => {
      migration.up(db);
      db.prepare('INSERT INTO schema_version (version, description) VALUES (?, ?)').run(
        migration.version,
        migration.description
      );
    });
    apply();
    logger.info(
      { event: 'db.migrations.applied', version: migration.version, description: migration.description },
      'Applied migration'
    );
  }
}
