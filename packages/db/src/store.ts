/**
 * SQLite-backed structured store
 *
 * better-sqlite3 is synchronous, so each method is one atomic statement or
 * one explicit transaction. Failures propagate to the caller.
 */

import { randomUUID } from 'crypto';
import type BetterSqlite3 from 'better-sqlite3';
import pino from 'pino';
import {
  emptyUrgencyCounts,
  URGENCY_LEVELS,
  type AnalysisSessionOutcome,
  type AnalysisSessionRecord,
  type CriticalPointFilter,
  type CriticalPointRecord,
  type CriticalPointsSummary,
  type CriticalPointWithDocument,
  type DocumentAnalysisUpdate,
  type DocumentOwnershipRecord,
  type DocumentRecord,
  type DocumentsSummary,
  type KnowledgeExpiryReportRecord,
  type NewAnalysisSession,
  type NewCriticalPoint,
  type NewDocument,
  type NewDocumentOwnership,
  type NewRecommendation,
  type NewReport,
  type RecommendationRecord,
  type ReportOutcome,
  type StructuredStore,
  type UrgencyLevel,
} from '@kexp/core';
import { openDatabase } from './connection.js';
import {
  toAnalysisSession,
  toCriticalPoint,
  toCriticalPointWithDocument,
  toDocument,
  toDocumentOwnership,
  toRecommendation,
  toReport,
  type AnalysisSessionRow,
  type CriticalPointJoinedRow,
  type CriticalPointRow,
  type DocumentOwnershipRow,
  type DocumentRow,
  type RecommendationRow,
  type ReportRow,
} from './rows.js';

const logger = pino({ level: process.env.LOG_LEVEL || 'info' });

export interface SqliteStoreOptions {
  /** Clock used for timestamps and durations */
  now?: () => Date;
}

const CRITICAL_POINT_SELECT = `
  SELECT cp.*, d.filename AS document_filename, d.file_path AS document_path
  FROM critical_points cp
  JOIN documents d ON d.id = cp.document_id
`;

function secondsBetween(startIso: string, end: Date): number {
  const started = Date.parse(startIso);
  if (Number.isNaN(started)) return 0;
  return Math.max(0, Math.floor((end.getTime() - started) / 1000));
}

export class SqliteStructuredStore implements StructuredStore {
  private readonly db: BetterSqlite3.Database;
  private readonly now: () => Date;

  constructor(db: BetterSqlite3.Database, options: SqliteStoreOptions = {}) {
    this.db = db;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Open the database at path (':memory:' for tests) and wrap it
   */
  static open(path: string, options: SqliteStoreOptions = {}): SqliteStructuredStore {
    return new SqliteStructuredStore(openDatabase(path), options);
  }

  private timestamp(): string {
    return this.now().toISOString();
  }

  // ==========================================================================
  // Documents
  // ==========================================================================

  async createDocument(input: NewDocument): Promise<DocumentRecord> {
    const at = this.timestamp();
    const result = this.db
      .prepare(
        `INSERT INTO documents
          (vector_id, file_path, filename, file_type, file_size, mime_type, status, created_at, modified_at, updated_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`
      )
      .run(
        input.vectorId,
        input.filePath,
        input.filename,
        input.fileType,
        input.fileSize,
        input.mimeType,
        input.status ?? 'pending',
        at,
        input.modifiedAt ? input.modifiedAt.toISOString() : null,
        at
      );

    const document = this.requireDocument(Number(result.lastInsertRowid));
    logger.debug({ event: 'db.document.created', documentId: document.id, filename: document.filename }, 'Created document');
    return document;
  }

  async updateDocumentAnalysis(documentId: number, update: DocumentAnalysisUpdate): Promise<DocumentRecord> {
    const at = this.timestamp();
    const result = this.db
      .prepare(
        `UPDATE documents
         SET content_summary = ?, analysis_confidence = ?, status = 'analyzed', processed_at = ?, updated_at = ?
         WHERE id = ?`
      )
      .run(update.contentSummary, update.analysisConfidence, at, at, documentId);

    if (result.changes === 0) {
      throw new Error(`Document not found: ${documentId}`);
    }
    return this.requireDocument(documentId);
  }

  /**
   * Drop any critical points (and their recommendations) written for the
   * document and set its status to error
   */
  async markDocumentFailed(documentId: number): Promise<void> {
    const at = this.timestamp();
    const discard = this.db.transaction((id: number) => {
      this.db.prepare('DELETE FROM critical_points WHERE document_id = ?').run(id);
      this.db.prepare("UPDATE documents SET status = 'error', updated_at = ? WHERE id = ?").run(at, id);
    });
    discard(documentId);
    logger.debug({ event: 'db.document.failed', documentId }, 'Discarded partial document analysis');
  }

  async getDocument(documentId: number): Promise<DocumentRecord | null> {
    const row = this.db.prepare<[number], DocumentRow>('SELECT * FROM documents WHERE id = ?').get(documentId);
    return row ? toDocument(row) : null;
  }

  async getDocumentByVectorId(vectorId: string): Promise<DocumentRecord | null> {
    const row = this.db.prepare<[string], DocumentRow>('SELECT * FROM documents WHERE vector_id = ?').get(vectorId);
    return row ? toDocument(row) : null;
  }

  async listDocuments(): Promise<DocumentRecord[]> {
    return this.db.prepare<[], DocumentRow>('SELECT * FROM documents ORDER BY id').all().map(toDocument);
  }

  private requireDocument(documentId: number): DocumentRecord {
    const row = this.db.prepare<[number], DocumentRow>('SELECT * FROM documents WHERE id = ?').get(documentId);
    if (!row) {
      throw new Error(`Document not found: ${documentId}`);
    }
    return toDocument(row);
  }

  // ==========================================================================
  // Critical points
  // ==========================================================================

  async createCriticalPoints(documentId: number, points: NewCriticalPoint[]): Promise<CriticalPointRecord[]> {
    const at = this.timestamp();
    const insert = this.db.prepare(
      `INSERT INTO critical_points
        (document_id, description, category, urgency, last_updated_date, expiry_indicators, confidence_score,
         context_snippet, page_number, section_title, extracted_by_model, created_at, updated_at)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`
    );

    const insertAll = this.db.transaction((batch: NewCriticalPoint[]): number[] =>
      batch.map((point) =>
        Number(
          insert.run(
            documentId,
            point.description,
            point.category,
            point.urgency,
            point.lastUpdatedDate,
            JSON.stringify(point.expiryIndicators),
            point.confidenceScore,
            point.contextSnippet ?? null,
            point.pageNumber ?? null,
            point.sectionTitle ?? null,
            point.extractedByModel,
            at,
            at
          ).lastInsertRowid
        )
      )
    );

    const ids = insertAll(points);
    logger.debug({ event: 'db.critical_points.created', documentId, count: ids.length }, 'Created critical points');

    const select = this.db.prepare<[number], CriticalPointRow>('SELECT * FROM critical_points WHERE id = ?');
    return ids.flatMap((id) => {
      const row = select.get(id);
      return row ? [toCriticalPoint(row)] : [];
    });
  }

  async getCriticalPointsByDocument(documentId: number): Promise<CriticalPointRecord[]> {
    return this.db
      .prepare<[number], CriticalPointRow>('SELECT * FROM critical_points WHERE document_id = ? ORDER BY id')
      .all(documentId)
      .map(toCriticalPoint);
  }

  async listCriticalPoints(filter: CriticalPointFilter = {}): Promise<CriticalPointWithDocument[]> {
    if (filter.urgency) {
      return this.db
        .prepare<[UrgencyLevel], CriticalPointJoinedRow>(`${CRITICAL_POINT_SELECT} WHERE cp.urgency = ? ORDER BY cp.id`)
        .all(filter.urgency)
        .map(toCriticalPointWithDocument);
    }
    return this.db
      .prepare<[], CriticalPointJoinedRow>(`${CRITICAL_POINT_SELECT} ORDER BY cp.id`)
      .all()
      .map(toCriticalPointWithDocument);
  }

  // ==========================================================================
  // Recommendations and ownership
  // ==========================================================================

  async createRecommendations(recommendations: NewRecommendation[]): Promise<RecommendationRecord[]> {
    const at = this.timestamp();
    const insert = this.db.prepare(
      `INSERT INTO recommendations
        (critical_point_id, title, description, priority, estimated_effort_hours, suggested_owner_role,
         suggested_timeline, dependencies, is_implemented, generated_by_model, created_at, updated_at)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?, 0, ?, ?, ?)`
    );

    const insertAll = this.db.transaction((batch: NewRecommendation[]): number[] =>
      batch.map((rec) =>
        Number(
          insert.run(
            rec.criticalPointId,
            rec.title,
            rec.description,
            rec.priority,
            rec.estimatedEffortHours ?? null,
            rec.suggestedOwnerRole,
            rec.suggestedTimeline,
            JSON.stringify(rec.dependencies),
            rec.generatedByModel,
            at,
            at
          ).lastInsertRowid
        )
      )
    );

    const ids = insertAll(recommendations);
    const select = this.db.prepare<[number], RecommendationRow>('SELECT * FROM recommendations WHERE id = ?');
    return ids.flatMap((id) => {
      const row = select.get(id);
      return row ? [toRecommendation(row)] : [];
    });
  }

  async listRecommendations(criticalPointId?: number): Promise<RecommendationRecord[]> {
    if (criticalPointId !== undefined) {
      return this.db
        .prepare<[number], RecommendationRow>('SELECT * FROM recommendations WHERE critical_point_id = ? ORDER BY id')
        .all(criticalPointId)
        .map(toRecommendation);
    }
    return this.db
      .prepare<[], RecommendationRow>('SELECT * FROM recommendations ORDER BY id')
      .all()
      .map(toRecommendation);
  }

  async createDocumentOwnership(input: NewDocumentOwnership): Promise<DocumentOwnershipRecord> {
    const at = this.timestamp();
    const result = this.db
      .prepare(
        `INSERT INTO document_ownership
          (document_id, owner_name, owner_email, department, role, last_reviewed_by, last_review_date,
           next_review_date, review_frequency_months, is_primary, is_active, created_at, updated_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, 1, ?, ?)`
      )
      .run(
        input.documentId,
        input.ownerName ?? null,
        input.ownerEmail ?? null,
        input.department ?? null,
        input.role ?? null,
        input.lastReviewedBy ?? null,
        input.lastReviewDate ?? null,
        input.nextReviewDate ?? null,
        input.reviewFrequencyMonths ?? null,
        input.isPrimary === false ? 0 : 1,
        at,
        at
      );

    const row = this.db
      .prepare<[number], DocumentOwnershipRow>('SELECT * FROM document_ownership WHERE id = ?')
      .get(Number(result.lastInsertRowid));
    if (!row) {
      throw new Error(`Document ownership not found after insert for document ${input.documentId}`);
    }
    return toDocumentOwnership(row);
  }

  async listDocumentOwnership(documentId: number): Promise<DocumentOwnershipRecord[]> {
    return this.db
      .prepare<[number], DocumentOwnershipRow>('SELECT * FROM document_ownership WHERE document_id = ? ORDER BY id')
      .all(documentId)
      .map(toDocumentOwnership);
  }

  // ==========================================================================
  // Analysis sessions
  // ==========================================================================

  async createAnalysisSession(input: NewAnalysisSession): Promise<AnalysisSessionRecord> {
    const sessionId = randomUUID();
    this.db
      .prepare(
        `INSERT INTO analysis_sessions
          (session_id, analysis_model, file_types_analyzed, directories_scanned, status, started_at)
         VALUES (?, ?, ?, ?, 'running', ?)`
      )
      .run(
        sessionId,
        input.analysisModel,
        JSON.stringify(input.fileTypesAnalyzed),
        JSON.stringify(input.directoriesScanned),
        this.timestamp()
      );

    logger.info({ event: 'db.session.created', sessionId }, 'Created analysis session');
    return this.requireSession(sessionId);
  }

  async completeAnalysisSession(sessionId: string, outcome: AnalysisSessionOutcome): Promise<AnalysisSessionRecord> {
    const existing = this.requireSession(sessionId);
    const completedAt = this.now();

    this.db
      .prepare(
        `UPDATE analysis_sessions
         SET documents_analyzed = ?, critical_points_found = ?, high_priority_items = ?, medium_priority_items = ?,
             low_priority_items = ?, status = ?, completed_at = ?, duration_seconds = ?, errors_encountered = ?,
             error_details = ?
         WHERE session_id = ?`
      )
      .run(
        outcome.documentsAnalyzed,
        outcome.criticalPointsFound,
        outcome.urgencyCounts.high + outcome.urgencyCounts.critical,
        outcome.urgencyCounts.medium,
        outcome.urgencyCounts.low,
        outcome.status,
        completedAt.toISOString(),
        secondsBetween(existing.startedAt, completedAt),
        outcome.errorDetails.length,
        JSON.stringify(outcome.errorDetails),
        sessionId
      );

    logger.info({ event: 'db.session.completed', sessionId, status: outcome.status }, 'Updated analysis session');
    return this.requireSession(sessionId);
  }

  async getAnalysisSession(sessionId: string): Promise<AnalysisSessionRecord | null> {
    const row = this.db
      .prepare<[string], AnalysisSessionRow>('SELECT * FROM analysis_sessions WHERE session_id = ?')
      .get(sessionId);
    return row ? toAnalysisSession(row) : null;
  }

  async listAnalysisSessions(limit = 10): Promise<AnalysisSessionRecord[]> {
    return this.db
      .prepare<[number], AnalysisSessionRow>('SELECT * FROM analysis_sessions ORDER BY started_at DESC, rowid DESC LIMIT ?')
      .all(limit)
      .map(toAnalysisSession);
  }

  private requireSession(sessionId: string): AnalysisSessionRecord {
    const row = this.db
      .prepare<[string], AnalysisSessionRow>('SELECT * FROM analysis_sessions WHERE session_id = ?')
      .get(sessionId);
    if (!row) {
      throw new Error(`Analysis session not found: ${sessionId}`);
    }
    return toAnalysisSession(row);
  }

  // ==========================================================================
  // Reports
  // ==========================================================================

  async createReport(input: NewReport): Promise<KnowledgeExpiryReportRecord> {
    const reportId = randomUUID();
    const at = this.timestamp();
    this.db
      .prepare(
        `INSERT INTO knowledge_expiry_reports
          (report_id, title, description, report_type, output_format, generated_by_model, status,
           generated_at, created_at, updated_at)
         VALUES (?, ?, ?, ?, ?, ?, 'generating', ?, ?, ?)`
      )
      .run(
        reportId,
        input.title,
        input.description ?? null,
        input.reportType,
        input.outputFormat,
        input.generatedByModel,
        at,
        at,
        at
      );

    logger.info({ event: 'db.report.created', reportId }, 'Created report record');
    return this.requireReport(reportId);
  }

  async completeReport(reportId: string, outcome: ReportOutcome): Promise<KnowledgeExpiryReportRecord> {
    const result = this.db
      .prepare(
        `UPDATE knowledge_expiry_reports
         SET status = ?, output_path = ?, documents_included = ?, expired_knowledge_count = ?,
             critical_findings_count = ?, recommendations_count = ?, generation_duration_seconds = ?, updated_at = ?
         WHERE report_id = ?`
      )
      .run(
        outcome.status,
        outcome.outputPath,
        outcome.documentsIncluded,
        outcome.expiredKnowledgeCount,
        outcome.criticalFindingsCount,
        outcome.recommendationsCount,
        outcome.generationDurationSeconds,
        this.timestamp(),
        reportId
      );

    if (result.changes === 0) {
      throw new Error(`Report not found: ${reportId}`);
    }
    logger.info({ event: 'db.report.completed', reportId, status: outcome.status }, 'Updated report record');
    return this.requireReport(reportId);
  }

  async getReport(reportId: string): Promise<KnowledgeExpiryReportRecord | null> {
    const row = this.db
      .prepare<[string], ReportRow>('SELECT * FROM knowledge_expiry_reports WHERE report_id = ?')
      .get(reportId);
    return row ? toReport(row) : null;
  }

  private requireReport(reportId: string): KnowledgeExpiryReportRecord {
    const row = this.db
      .prepare<[string], ReportRow>('SELECT * FROM knowledge_expiry_reports WHERE report_id = ?')
      .get(reportId);
    if (!row) {
      throw new Error(`Report not found: ${reportId}`);
    }
    return toReport(row);
  }

  // ==========================================================================
  // Summaries
  // ==========================================================================

  async getDocumentsSummary(): Promise<DocumentsSummary> {
    const row = this.db
      .prepare<[], { total: number; analyzed: number | null; average: number | null }>(
        `SELECT COUNT(*) AS total,
                SUM(CASE WHEN status = 'analyzed' THEN 1 ELSE 0 END) AS analyzed,
                AVG(analysis_confidence) AS average
         FROM documents`
      )
      .get();

    const total = row?.total ?? 0;
    const analyzed = row?.analyzed ?? 0;
    return {
      totalDocuments: total,
      analyzedDocuments: analyzed,
      averageConfidence: row?.average ?? 0,
      analysisCompletionRate: total > 0 ? (analyzed / total) * 100 : 0,
    };
  }

  async getCriticalPointsSummary(): Promise<CriticalPointsSummary> {
    const byUrgency = emptyUrgencyCounts();
    const urgencyRows = this.db
      .prepare<[], { urgency: string; count: number }>(
        'SELECT urgency, COUNT(*) AS count FROM critical_points GROUP BY urgency'
      )
      .all();
    for (const row of urgencyRows) {
      const level = URGENCY_LEVELS.find((candidate) => candidate === row.urgency);
      if (level) byUrgency[level] = row.count;
    }

    const byCategory: Record<string, number> = {};
    const categoryRows = this.db
      .prepare<[], { category: string; count: number }>(
        'SELECT category, COUNT(*) AS count FROM critical_points GROUP BY category ORDER BY category'
      )
      .all();
    for (const row of categoryRows) {
      byCategory[row.category] = row.count;
    }

    const total = urgencyRows.reduce((sum, row) => sum + row.count, 0);
    return { totalCriticalPoints: total, byUrgency, byCategory };
  }

  close(): void {
    this.db.close();
  }
}
