/**
 * Turns parsed critical point drafts into store inputs
 */

import pino from 'pino';
import {
  decodeCategory,
  decodeUrgency,
  UnknownEnumValueError,
  type KnowledgeCategory,
  type NewCriticalPoint,
  type UrgencyLevel,
} from '@kexp/core';
import type { EnumDecoding } from '@kexp/config';
import type { AnalysisResult } from '@kexp/llm';

const logger = pino({ level: process.env.LOG_LEVEL || 'info' });

export const FALLBACK_CATEGORY: KnowledgeCategory = 'technical';
export const FALLBACK_URGENCY: UrgencyLevel = 'medium';

/**
 * ISO timestamp for a date-like string, null when it does not parse
 */
export function parseLastUpdated(text: string | undefined): string | null {
  if (!text || text.trim().length === 0) return null;
  const parsed = Date.parse(text.trim());
  return Number.isNaN(parsed) ? null : new Date(parsed).toISOString();
}

function decodeOrFallback<T extends string>(decode: (value: string) => T, value: string, fallback: T, mode: EnumDecoding): T {
  try {
    return decode(value);
  } catch (error: unknown) {
    if (mode === 'strict' || !(error instanceof UnknownEnumValueError)) {
      throw error;
    }
    logger.warn(
      { event: 'pipeline.enum.degraded', enumName: error.enumName, value, fallback },
      `Unknown ${error.enumName} "${value}", using "${fallback}"`
    );
    return fallback;
  }
}

/**
 * Decode every draft before anything is written.
 * @throws UnknownEnumValueError in strict mode when a category or urgency is unmapped
 */
export function toNewCriticalPoints(result: AnalysisResult, mode: EnumDecoding, model: string): NewCriticalPoint[] {
  return result.criticalPoints.map((draft) => ({
    description: draft.description,
    category: decodeOrFallback(decodeCategory, draft.category, FALLBACK_CATEGORY, mode),
    urgency: decodeOrFallback(decodeUrgency, draft.urgency, FALLBACK_URGENCY, mode),
    lastUpdatedDate: parseLastUpdated(draft.lastUpdated),
    expiryIndicators: [...result.expiryIndicators],
    confidenceScore: result.confidenceScore,
    extractedByModel: model,
  }));
}
