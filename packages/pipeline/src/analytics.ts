/**
 * Deterministic report analytics over stored records. Every function that
 * depends on the current time takes it as an argument.
 */

import {
  type AgeBucket,
  type ConfidenceBucket,
  type CriticalPointWithDocument,
  type DocumentAnalysis,
  type ExpiryAnalysis,
  type ReportCriticalPoint,
  type TimelineAnalysis,
  type TimelineBucket,
  type UrgencyLevel,
  type VectorRecord,
} from '@kexp/core';

const DAY_MS = 24 * 60 * 60 * 1000;
export const TOP_INDICATORS = 10;

export function toReportPoint(point: CriticalPointWithDocument): ReportCriticalPoint {
  return {
    id: point.id,
    description: point.description,
    category: point.category,
    urgency: point.urgency,
    last_updated_date: point.lastUpdatedDate,
    confidence_score: point.confidenceScore,
    document_filename: point.documentFilename,
    document_path: point.documentPath,
    context_snippet: point.contextSnippet,
    expiry_indicators: [...point.expiryIndicators],
  };
}

function daysSince(timestamp: string | null, now: Date): number | null {
  if (!timestamp) return null;
  const parsed = Date.parse(timestamp);
  if (Number.isNaN(parsed)) return null;
  return Math.floor((now.getTime() - parsed) / DAY_MS);
}

// ============================================================================
// Cross-tabulation
// ============================================================================

export function groupByUrgency(points: ReportCriticalPoint[]): Record<UrgencyLevel, ReportCriticalPoint[]> {
  const groups: Record<UrgencyLevel, ReportCriticalPoint[]> = { critical: [], high: [], medium: [], low: [] };
  for (const point of points) {
    groups[point.urgency].push(point);
  }
  return groups;
}

export function groupByCategory(points: ReportCriticalPoint[]): Record<string, ReportCriticalPoint[]> {
  const groups: Record<string, ReportCriticalPoint[]> = {};
  for (const point of points) {
    (groups[point.category] ??= []).push(point);
  }
  return groups;
}

// ============================================================================
// Expiry indicators
// ============================================================================

/**
 * Ties keep first-encountered order (Array.prototype.sort is stable)
 */
export function analyzeExpiryIndicators(points: ReportCriticalPoint[]): ExpiryAnalysis {
  const counts = new Map<string, number>();
  let withIndicators = 0;

  for (const point of points) {
    if (point.expiry_indicators.length === 0) continue;
    withIndicators++;
    for (const indicator of point.expiry_indicators) {
      counts.set(indicator, (counts.get(indicator) ?? 0) + 1);
    }
  }

  const ranked = [...counts.entries()].sort((a, b) => b[1] - a[1]);
  return {
    total_points_with_indicators: withIndicators,
    most_common_indicators: ranked.slice(0, TOP_INDICATORS),
    indicator_distribution: Object.fromEntries(counts),
  };
}

// ============================================================================
// Documents
// ============================================================================

export function fileExtension(filename: string): string | null {
  const dot = filename.lastIndexOf('.');
  if (dot === -1) return null;
  return filename.slice(dot + 1).toLowerCase();
}

export function confidenceBucket(score: number): ConfidenceBucket {
  if (score > 0.8) return 'high (>0.8)';
  if (score >= 0.5) return 'medium (0.5-0.8)';
  return 'low (<0.5)';
}

/**
 * Missing or unparseable timestamps count as moderate
 */
export function ageBucket(createdAt: string | null, now: Date): AgeBucket {
  const days = daysSince(createdAt, now);
  if (days === null) return 'moderate';
  if (days < 30) return 'recent';
  if (days < 180) return 'moderate';
  return 'old';
}

/**
 * File types, confidence and age per stored document. Scores of 0 (failed
 * analyses) and missing scores stay out of the confidence figures; age is
 * measured from the record's own `created_at`.
 */
export function analyzeDocuments(documents: VectorRecord[], now: Date): DocumentAnalysis {
  const fileTypes: Record<string, number> = {};
  const confidence: Record<ConfidenceBucket, number> = { 'high (>0.8)': 0, 'medium (0.5-0.8)': 0, 'low (<0.5)': 0 };
  const ages: Record<AgeBucket, number> = { recent: 0, moderate: 0, old: 0 };
  const scores: number[] = [];

  for (const { payload } of documents) {
    const extension = fileExtension(payload.filename);
    if (extension !== null) {
      fileTypes[extension] = (fileTypes[extension] ?? 0) + 1;
    }

    const score = payload.analysis_result.confidence_score;
    if (typeof score === 'number' && score > 0) {
      scores.push(score);
      confidence[confidenceBucket(score)]++;
    }

    ages[ageBucket(payload.created_at, now)]++;
  }

  return {
    file_type_distribution: fileTypes,
    average_confidence_score: scores.reduce((sum, score) => sum + score, 0) / Math.max(scores.length, 1),
    confidence_distribution: confidence,
    document_age_distribution: ages,
  };
}

/**
 * Mean payload confidence over every document; a missing score counts as 0
 */
export function averagePayloadConfidence(documents: VectorRecord[]): number {
  const total = documents.reduce((sum, { payload }) => sum + (payload.analysis_result.confidence_score ?? 0), 0);
  return total / Math.max(documents.length, 1);
}

// ============================================================================
// Timeline
// ============================================================================

export function timelineBucket(point: ReportCriticalPoint, now: Date): TimelineBucket {
  switch (point.urgency) {
    case 'critical':
      return 'immediate_attention';
    case 'high':
      return 'next_30_days';
    case 'medium':
      return 'next_90_days';
    case 'low': {
      const days = daysSince(point.last_updated_date, now);
      return days !== null && days > 365 ? 'next_6_months' : 'annual_review';
    }
  }
}

export function buildTimeline(points: ReportCriticalPoint[], now: Date): TimelineAnalysis {
  const detailed: Record<TimelineBucket, ReportCriticalPoint[]> = {
    immediate_attention: [],
    next_30_days: [],
    next_90_days: [],
    next_6_months: [],
    annual_review: [],
  };
  for (const point of points) {
    detailed[timelineBucket(point, now)].push(point);
  }

  return {
    timeline_categories: {
      immediate_attention: detailed.immediate_attention.length,
      next_30_days: detailed.next_30_days.length,
      next_90_days: detailed.next_90_days.length,
      next_6_months: detailed.next_6_months.length,
      annual_review: detailed.annual_review.length,
    },
    detailed_timeline: detailed,
  };
}
