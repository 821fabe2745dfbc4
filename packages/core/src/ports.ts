/**
 * Contracts for the collaborators the pipeline talks to: relational store,
 * vector store, document source and export sink
 */

import type {
  AnalysisSessionRecord,
  CriticalPointRecord,
  CriticalPointWithDocument,
  DocumentDescriptor,
  DocumentOwnershipRecord,
  DocumentRecord,
  DocumentStatus,
  KnowledgeCategory,
  KnowledgeExpiryReportRecord,
  LoadedDocument,
  RecommendationRecord,
  ReportStatus,
  ReportType,
  SessionStatus,
  UrgencyCounts,
  UrgencyLevel,
} from './types.js';
import type { ReportTree } from './report.js';

// ============================================================================
// Structured store
// ============================================================================

export interface NewDocument {
  vectorId: string;
  filePath: string;
  filename: string;
  fileType: string;
  fileSize: number;
  mimeType: string | null;
  modifiedAt: Date | null;
  status?: DocumentStatus;
}

export interface DocumentAnalysisUpdate {
  contentSummary: string;
  analysisConfidence: number;
}

export interface NewCriticalPoint {
  description: string;
  category: KnowledgeCategory;
  urgency: UrgencyLevel;
  lastUpdatedDate: string | null;
  expiryIndicators: string[];
  confidenceScore: number | null;
  contextSnippet?: string | null;
  pageNumber?: number | null;
  sectionTitle?: string | null;
  extractedByModel: string | null;
}

export interface NewRecommendation {
  criticalPointId: number;
  title: string;
  description: string;
  priority: UrgencyLevel;
  estimatedEffortHours?: number | null;
  suggestedOwnerRole: string | null;
  suggestedTimeline: string | null;
  dependencies: string[];
  generatedByModel: string | null;
}

export interface NewDocumentOwnership {
  documentId: number;
  ownerName?: string | null;
  ownerEmail?: string | null;
  department?: string | null;
  role?: string | null;
  lastReviewedBy?: string | null;
  lastReviewDate?: string | null;
  nextReviewDate?: string | null;
  reviewFrequencyMonths?: number | null;
  isPrimary?: boolean;
}

export interface NewAnalysisSession {
  analysisModel: string;
  fileTypesAnalyzed: string[];
  directoriesScanned: string[];
}

export interface AnalysisSessionOutcome {
  status: Exclude<SessionStatus, 'running'>;
  documentsAnalyzed: number;
  criticalPointsFound: number;
  urgencyCounts: UrgencyCounts;
  errorDetails: string[];
}

export interface NewReport {
  title: string;
  description?: string | null;
  reportType: ReportType;
  outputFormat: string;
  generatedByModel: string;
}

export interface ReportOutcome {
  status: Exclude<ReportStatus, 'generating'>;
  outputPath: string | null;
  documentsIncluded: number;
  expiredKnowledgeCount: number;
  criticalFindingsCount: number;
  recommendationsCount: number;
  generationDurationSeconds: number;
}

export interface CriticalPointFilter {
  urgency?: UrgencyLevel;
}

export interface DocumentsSummary {
  totalDocuments: number;
  analyzedDocuments: number;
  averageConfidence: number;
  analysisCompletionRate: number;
}

export interface CriticalPointsSummary {
  totalCriticalPoints: number;
  byUrgency: UrgencyCounts;
  byCategory: Record<string, number>;
}

/**
 * Relational store; every operation is its own unit of work
 */
export interface StructuredStore {
  createDocument(input: NewDocument): Promise<DocumentRecord>;
  updateDocumentAnalysis(documentId: number, update: DocumentAnalysisUpdate): Promise<DocumentRecord>;
  /** Remove partial analysis rows and set status to error */
  markDocumentFailed(documentId: number): Promise<void>;
  getDocument(documentId: number): Promise<DocumentRecord | null>;
  getDocumentByVectorId(vectorId: string): Promise<DocumentRecord | null>;
  listDocuments(): Promise<DocumentRecord[]>;

  createCriticalPoints(documentId: number, points: NewCriticalPoint[]): Promise<CriticalPointRecord[]>;
  getCriticalPointsByDocument(documentId: number): Promise<CriticalPointRecord[]>;
  listCriticalPoints(filter?: CriticalPointFilter): Promise<CriticalPointWithDocument[]>;

  createRecommendations(recommendations: NewRecommendation[]): Promise<RecommendationRecord[]>;
  listRecommendations(criticalPointId?: number): Promise<RecommendationRecord[]>;

  createDocumentOwnership(input: NewDocumentOwnership): Promise<DocumentOwnershipRecord>;
  listDocumentOwnership(documentId: number): Promise<DocumentOwnershipRecord[]>;

  createAnalysisSession(input: NewAnalysisSession): Promise<AnalysisSessionRecord>;
  completeAnalysisSession(sessionId: string, outcome: AnalysisSessionOutcome): Promise<AnalysisSessionRecord>;
  getAnalysisSession(sessionId: string): Promise<AnalysisSessionRecord | null>;
  listAnalysisSessions(limit?: number): Promise<AnalysisSessionRecord[]>;

  createReport(input: NewReport): Promise<KnowledgeExpiryReportRecord>;
  completeReport(reportId: string, outcome: ReportOutcome): Promise<KnowledgeExpiryReportRecord>;
  getReport(reportId: string): Promise<KnowledgeExpiryReportRecord | null>;

  getDocumentsSummary(): Promise<DocumentsSummary>;
  getCriticalPointsSummary(): Promise<CriticalPointsSummary>;

  close(): void;
}

// ============================================================================
// Vector store
// ============================================================================

export interface VectorCriticalPoint {
  description: string;
  category: string;
  urgency: string;
  source: string;
}

/**
 * Payload stored beside each document embedding; keys are persisted as-is
 */
export interface DocumentVectorPayload {
  document_path: string;
  filename: string;
  content_summary: string;
  analysis_result: {
    critical_points: VectorCriticalPoint[];
    expiry_indicators: string[];
    recommendations: string[];
    confidence_score: number | null;
  };
  metadata: {
    file_size: number | null;
    mime_type: string | null;
    session_id: string | null;
    file_created_at: string | null;
    file_modified_at: string | null;
  };
  created_at: string | null;
  updated_at: string | null;
}

export interface VectorUpsert {
  id?: string;
  vector: number[];
  payload: DocumentVectorPayload;
}

export interface VectorRecord {
  id: string;
  payload: DocumentVectorPayload;
}

export interface VectorSearchHit extends VectorRecord {
  score: number;
}

export interface VectorPage {
  records: VectorRecord[];
  nextOffset: string | null;
}

export interface VectorStoreStats {
  vectorsCount: number;
  indexedVectorsCount: number;
  pointsCount: number;
  segmentsCount: number;
  status: string;
  optimizerStatus: string;
}

export interface VectorStore {
  upsert(input: VectorUpsert): Promise<string>;
  get(id: string): Promise<VectorRecord | null>;
  scrollAll(limit: number, offset?: string | null): Promise<VectorPage>;
  search(vector: number[], limit: number, threshold?: number): Promise<VectorSearchHit[]>;
  deleteById(id: string): Promise<void>;
  stats(): Promise<VectorStoreStats>;
}

// ============================================================================
// Document source
// ============================================================================

export interface DiscoverOptions {
  recursive: boolean;
  /** Lower-case extensions with the leading dot */
  extensions: readonly string[];
}

export interface DocumentSource {
  discover(root: string, options: DiscoverOptions): AsyncIterable<DocumentDescriptor>;
  load(descriptor: DocumentDescriptor): Promise<LoadedDocument>;
}

// ============================================================================
// Export sink
// ============================================================================

/**
 * Writes a report tree to disk; each method resolves false when nothing was written
 */
export interface ExportSink {
  writeExcel(tree: ReportTree, path: string, reportType: ReportType): Promise<boolean>;
  writeJson(tree: ReportTree, path: string): Promise<boolean>;
  writeCsv(tree: ReportTree, path: string): Promise<boolean>;
}
