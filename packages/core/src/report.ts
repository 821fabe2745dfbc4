/**
 * Report tree: the nested structure handed to exporters and written as JSON.
 * Key names are part of the export format.
 */

import type { ReportType, UrgencyLevel } from './types.js';

export const TIMELINE_BUCKETS = [
  'immediate_attention',
  'next_30_days',
  'next_90_days',
  'next_6_months',
  'annual_review',
] as const;
export type TimelineBucket = (typeof TIMELINE_BUCKETS)[number];

export const CONFIDENCE_BUCKETS = ['high (>0.8)', 'medium (0.5-0.8)', 'low (<0.5)'] as const;
export type ConfidenceBucket = (typeof CONFIDENCE_BUCKETS)[number];

export type AgeBucket = 'recent' | 'moderate' | 'old';

export interface ReportCriticalPoint {
  id: number;
  description: string;
  category: string;
  urgency: UrgencyLevel;
  last_updated_date: string | null;
  confidence_score: number | null;
  document_filename: string;
  document_path: string;
  context_snippet: string | null;
  expiry_indicators: string[];
}

export interface ReportFinding {
  finding: string;
  impact?: string;
  recommendation?: string;
}

export interface ReportActionItem {
  task: string;
  priority?: string;
  owner?: string;
  timeline?: string;
}

export interface KeyMetrics {
  documents_analyzed: number;
  critical_points_identified: number;
  expired_knowledge_items: number;
  high_priority_items: number;
  average_confidence: number;
}

export interface DocumentAnalysis {
  file_type_distribution: Record<string, number>;
  average_confidence_score: number;
  confidence_distribution: Record<ConfidenceBucket, number>;
  document_age_distribution: Record<AgeBucket, number>;
}

export interface ExpiryAnalysis {
  total_points_with_indicators: number;
  most_common_indicators: Array<[string, number]>;
  indicator_distribution: Record<string, number>;
}

export interface TimelineAnalysis {
  timeline_categories: Record<TimelineBucket, number>;
  detailed_timeline: Record<TimelineBucket, ReportCriticalPoint[]>;
}

export interface DatabaseStatistics {
  total_documents: number;
  analyzed_documents: number;
  average_confidence: number;
  analysis_completion_rate: number;
}

export interface CriticalPointStatistics {
  total_critical_points: number;
  by_urgency: Record<UrgencyLevel, number>;
  by_category: Record<string, number>;
}

export type VectorDbStatistics =
  | {
      vectors_count: number;
      indexed_vectors_count: number;
      points_count: number;
      segments_count: number;
      status: string;
      optimizer_status: string;
    }
  | { error: string };

export interface ReportTree {
  metadata: {
    report_type: ReportType;
    generated_at: string;
    total_documents: number;
    total_critical_points: number;
    analysis_model: string;
    filter: { urgency: UrgencyLevel | null };
  };
  executive_summary: {
    overview: string;
    key_metrics: KeyMetrics;
  };
  critical_findings: ReportFinding[];
  critical_points: {
    by_urgency: Record<UrgencyLevel, ReportCriticalPoint[]>;
    by_category: Record<string, ReportCriticalPoint[]>;
    detailed_list: ReportCriticalPoint[];
  };
  document_analysis: DocumentAnalysis;
  expiry_analysis: ExpiryAnalysis;
  timeline_analysis: TimelineAnalysis;
  recommendations: {
    strategic: string[];
    action_items: ReportActionItem[];
  };
  appendix: {
    database_statistics: DatabaseStatistics;
    critical_point_statistics: CriticalPointStatistics;
    vector_db_statistics: VectorDbStatistics;
  };
}
