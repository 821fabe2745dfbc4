/**
 * Shared domain types for knowledge expiry analysis
 */

export const URGENCY_LEVELS = ['low', 'medium', 'high', 'critical'] as const;
export type UrgencyLevel = (typeof URGENCY_LEVELS)[number];

export const KNOWLEDGE_CATEGORIES = [
  'technical',
  'process',
  'policy',
  'regulatory',
  'product',
  'organizational',
] as const;
export type KnowledgeCategory = (typeof KNOWLEDGE_CATEGORIES)[number];

export type DocumentStatus = 'pending' | 'processing' | 'analyzed' | 'error';

export type SessionStatus = 'running' | 'completed' | 'error';

export type ReportStatus = 'generating' | 'completed' | 'error';

export const REPORT_TYPES = ['executive', 'detailed', 'comprehensive'] as const;
export type ReportType = (typeof REPORT_TYPES)[number];

export const EXPORT_FORMATS = ['excel', 'json', 'csv'] as const;
export type ExportFormat = (typeof EXPORT_FORMATS)[number];

export type UrgencyCounts = Record<UrgencyLevel, number>;

/**
 * A file found by the document source, before its content is read
 */
export interface DocumentDescriptor {
  filePath: string;
  filename: string;
  fileSize: number;
  fileType: string; // lower-cased extension including the dot, e.g. ".md"
  mimeType: string | null;
  createdAt: Date | null;
  modifiedAt: Date | null;
}

export interface LoadedDocument extends DocumentDescriptor {
  content: string;
}

export interface DocumentRecord {
  id: number;
  vectorId: string;
  filePath: string;
  filename: string;
  fileType: string;
  fileSize: number;
  mimeType: string | null;
  status: DocumentStatus;
  processedAt: string | null;
  analysisConfidence: number | null;
  contentSummary: string | null;
  createdAt: string;
  modifiedAt: string | null;
  updatedAt: string;
}

export interface CriticalPointRecord {
  id: number;
  documentId: number;
  description: string;
  category: KnowledgeCategory;
  urgency: UrgencyLevel;
  lastUpdatedDate: string | null;
  expiryIndicators: string[];
  confidenceScore: number | null;
  contextSnippet: string | null;
  pageNumber: number | null;
  sectionTitle: string | null;
  extractedByModel: string | null;
  createdAt: string;
}

/**
 * Critical point joined with its owning document, as used by reports
 */
export interface CriticalPointWithDocument extends CriticalPointRecord {
  documentFilename: string;
  documentPath: string;
}

export interface RecommendationRecord {
  id: number;
  criticalPointId: number;
  title: string;
  description: string;
  priority: UrgencyLevel;
  estimatedEffortHours: number | null;
  suggestedOwnerRole: string | null;
  suggestedTimeline: string | null;
  dependencies: string[];
  isImplemented: boolean;
  implementedDate: string | null;
  implementationNotes: string | null;
  generatedByModel: string | null;
  createdAt: string;
}

export interface DocumentOwnershipRecord {
  id: number;
  documentId: number;
  ownerName: string | null;
  ownerEmail: string | null;
  department: string | null;
  role: string | null;
  lastReviewedBy: string | null;
  lastReviewDate: string | null;
  nextReviewDate: string | null;
  reviewFrequencyMonths: number | null;
  isPrimary: boolean;
  isActive: boolean;
}

export interface AnalysisSessionRecord {
  sessionId: string;
  analysisModel: string;
  documentsAnalyzed: number;
  criticalPointsFound: number;
  highPriorityItems: number;
  mediumPriorityItems: number;
  lowPriorityItems: number;
  fileTypesAnalyzed: string[];
  directoriesScanned: string[];
  status: SessionStatus;
  startedAt: string;
  completedAt: string | null;
  durationSeconds: number | null;
  errorsEncountered: number;
  errorDetails: string[];
}

export interface KnowledgeExpiryReportRecord {
  reportId: string;
  title: string;
  description: string | null;
  reportType: ReportType;
  outputFormat: string;
  outputPath: string | null;
  documentsIncluded: number;
  expiredKnowledgeCount: number;
  criticalFindingsCount: number;
  recommendationsCount: number;
  generatedByModel: string;
  generationDurationSeconds: number | null;
  status: ReportStatus;
  generatedAt: string;
}
