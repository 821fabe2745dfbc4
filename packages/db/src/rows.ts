/**
 * Row shapes as stored in SQLite and their mapping onto domain records
 */

import { z } from 'zod';
import type {
  AnalysisSessionRecord,
  CriticalPointRecord,
  CriticalPointWithDocument,
  DocumentOwnershipRecord,
  DocumentRecord,
  DocumentStatus,
  KnowledgeCategory,
  KnowledgeExpiryReportRecord,
  RecommendationRecord,
  ReportStatus,
  ReportType,
  SessionStatus,
  UrgencyLevel,
} from '@kexp/core';

const StringListSchema = z.array(z.string());

/**
 * Decode a JSON list column; anything malformed reads as empty
 */
export function parseStringList(text: string | null): string[] {
  if (!text) return [];
  try {
    const parsed = StringListSchema.safeParse(JSON.parse(text));
    return parsed.success ? parsed.data : [];
  } catch {
    return [];
  }
}

export interface DocumentRow {
  id: number;
  vector_id: string;
  file_path: string;
  filename: string;
  file_type: string;
  file_size: number;
  mime_type: string | null;
  status: DocumentStatus;
  processed_at: string | null;
  analysis_confidence: number | null;
  content_summary: string | null;
  created_at: string;
  modified_at: string | null;
  updated_at: string;
}

export interface CriticalPointRow {
  id: number;
  document_id: number;
  description: string;
  category: KnowledgeCategory;
  urgency: UrgencyLevel;
  last_updated_date: string | null;
  expiry_indicators: string;
  confidence_score: number | null;
  context_snippet: string | null;
  page_number: number | null;
  section_title: string | null;
  extracted_by_model: string | null;
  created_at: string;
}

export interface CriticalPointJoinedRow extends CriticalPointRow {
  document_filename: string;
  document_path: string;
}

export interface RecommendationRow {
  id: number;
  critical_point_id: number;
  title: string;
  description: string;
  priority: UrgencyLevel;
  estimated_effort_hours: number | null;
  suggested_owner_role: string | null;
  suggested_timeline: string | null;
  dependencies: string;
  is_implemented: number;
  implemented_date: string | null;
  implementation_notes: string | null;
  generated_by_model: string | null;
  created_at: string;
}

export interface DocumentOwnershipRow {
  id: number;
  document_id: number;
  owner_name: string | null;
  owner_email: string | null;
  department: string | null;
  role: string | null;
  last_reviewed_by: string | null;
  last_review_date: string | null;
  next_review_date: string | null;
  review_frequency_months: number | null;
  is_primary: number;
  is_active: number;
}

export interface AnalysisSessionRow {
  session_id: string;
  analysis_model: string;
  documents_analyzed: number;
  critical_points_found: number;
  high_priority_items: number;
  medium_priority_items: number;
  low_priority_items: number;
  file_types_analyzed: string;
  directories_scanned: string;
  status: SessionStatus;
  started_at: string;
  completed_at: string | null;
  duration_seconds: number | null;
  errors_encountered: number;
  error_details: string;
}

export interface ReportRow {
  report_id: string;
  title: string;
  description: string | null;
  report_type: ReportType;
  output_format: string;
  output_path: string | null;
  documents_included: number;
  expired_knowledge_count: number;
  critical_findings_count: number;
  recommendations_count: number;
  generated_by_model: string;
  generation_duration_seconds: number | null;
  status: ReportStatus;
  generated_at: string;
}

export function toDocument(row: DocumentRow): DocumentRecord {
  return {
    id: row.id,
    vectorId: row.vector_id,
    filePath: row.file_path,
    filename: row.filename,
    fileType: row.file_type,
    fileSize: row.file_size,
    mimeType: row.mime_type,
    status: row.status,
    processedAt: row.processed_at,
    analysisConfidence: row.analysis_confidence,
    contentSummary: row.content_summary,
    createdAt: row.created_at,
    modifiedAt: row.modified_at,
    updatedAt: row.updated_at,
  };
}

export function toCriticalPoint(row: CriticalPointRow): CriticalPointRecord {
  return {
    id: row.id,
    documentId: row.document_id,
    description: row.description,
    category: row.category,
    urgency: row.urgency,
    lastUpdatedDate: row.last_updated_date,
    expiryIndicators: parseStringList(row.expiry_indicators),
    confidenceScore: row.confidence_score,
    contextSnippet: row.context_snippet,
    pageNumber: row.page_number,
    sectionTitle: row.section_title,
    extractedByModel: row.extracted_by_model,
    createdAt: row.created_at,
  };
}

export function toCriticalPointWithDocument(row: CriticalPointJoinedRow): CriticalPointWithDocument {
  return {
    ...toCriticalPoint(row),
    documentFilename: row.document_filename,
    documentPath: row.document_path,
  };
}

export function toRecommendation(row: RecommendationRow): RecommendationRecord {
  return {
    id: row.id,
    criticalPointId: row.critical_point_id,
    title: row.title,
    description: row.description,
    priority: row.priority,
    estimatedEffortHours: row.estimated_effort_hours,
    suggestedOwnerRole: row.suggested_owner_role,
    suggestedTimeline: row.suggested_timeline,
    dependencies: parseStringList(row.dependencies),
    isImplemented: row.is_implemented === 1,
    implementedDate: row.implemented_date,
    implementationNotes: row.implementation_notes,
    generatedByModel: row.generated_by_model,
    createdAt: row.created_at,
  };
}

export function toDocumentOwnership(row: DocumentOwnershipRow): DocumentOwnershipRecord {
  return {
    id: row.id,
    documentId: row.document_id,
    ownerName: row.owner_name,
    ownerEmail: row.owner_email,
    department: row.department,
    role: row.role,
    lastReviewedBy: row.last_reviewed_by,
    lastReviewDate: row.last_review_date,
    nextReviewDate: row.next_review_date,
    reviewFrequencyMonths: row.review_frequency_months,
    isPrimary: row.is_primary === 1,
    isActive: row.is_active === 1,
  };
}

export function toAnalysisSession(row: AnalysisSessionRow): AnalysisSessionRecord {
  return {
    sessionId: row.session_id,
    analysisModel: row.analysis_model,
    documentsAnalyzed: row.documents_analyzed,
    criticalPointsFound: row.critical_points_found,
    highPriorityItems: row.high_priority_items,
    mediumPriorityItems: row.medium_priority_items,
    lowPriorityItems: row.low_priority_items,
    fileTypesAnalyzed: parseStringList(row.file_types_analyzed),
    directoriesScanned: parseStringList(row.directories_scanned),
    status: row.status,
    startedAt: row.started_at,
    completedAt: row.completed_at,
    durationSeconds: row.duration_seconds,
    errorsEncountered: row.errors_encountered,
    errorDetails: parseStringList(row.error_details),
  };
}

export function toReport(row: ReportRow): KnowledgeExpiryReportRecord {
  return {
    reportId: row.report_id,
    title: row.title,
    description: row.description,
    reportType: row.report_type,
    outputFormat: row.output_format,
    outputPath: row.output_path,
    documentsIncluded: row.documents_included,
    expiredKnowledgeCount: row.expired_knowledge_count,
    criticalFindingsCount: row.critical_findings_count,
    recommendationsCount: row.recommendations_count,
    generatedByModel: row.generated_by_model,
    generationDurationSeconds: row.generation_duration_seconds,
    status: row.status,
    generatedAt: row.generated_at,
  };
}
