/**
 * Case-insensitive decoders for the closed enums
 *
 * Model output and CLI flags arrive as free text; these map them onto the
 * fixed variants or throw UnknownEnumValueError.
 */

import { UnknownEnumValueError } from './errors.js';
import {
  EXPORT_FORMATS,
  KNOWLEDGE_CATEGORIES,
  REPORT_TYPES,
  URGENCY_LEVELS,
  type ExportFormat,
  type KnowledgeCategory,
  type ReportType,
  type UrgencyCounts,
  type UrgencyLevel,
} from './types.js';

function decode<T extends string>(enumName: string, allowed: readonly T[], value: string): T {
  const normalized = value.trim().toLowerCase();
  const match = allowed.find((candidate) => candidate === normalized);
  if (!match) {
    throw new UnknownEnumValueError(enumName, value, allowed);
  }
  return match;
}

export function decodeUrgency(value: string): UrgencyLevel {
  return decode('urgency', URGENCY_LEVELS, value);
}

export function decodeCategory(value: string): KnowledgeCategory {
  return decode('category', KNOWLEDGE_CATEGORIES, value);
}

export function decodeReportType(value: string): ReportType {
  return decode('report type', REPORT_TYPES, value);
}

export function decodeExportFormat(value: string): ExportFormat {
  return decode('export format', EXPORT_FORMATS, value);
}

/**
 * Severity rank, low = 0 … critical = 3
 */
export function urgencyRank(urgency: UrgencyLevel): number {
  return URGENCY_LEVELS.indexOf(urgency);
}

export function compareUrgency(a: UrgencyLevel, b: UrgencyLevel): number {
  return urgencyRank(a) - urgencyRank(b);
}

export function isHighPriority(urgency: UrgencyLevel): boolean {
  return urgency === 'high' || urgency === 'critical';
}

export function emptyUrgencyCounts(): UrgencyCounts {
  return { low: 0, medium: 0, high: 0, critical: 0 };
}
