/**
 * Response parser
 *
 * Turns the sectioned free text returned by the model into typed analysis
 * and report records. Missing sections fall back to defaults; nothing here
 * throws.
 */

import pino from 'pino';
import type {
  ActionItem,
  AnalysisResult,
  CriticalFinding,
  CriticalPointDraft,
  ReportAnalysis,
} from './types.js';

const logger = pino({ level: process.env.LOG_LEVEL || 'info' });

export const NO_SUMMARY = 'No summary available';
export const DEFAULT_CONFIDENCE = 0.5;

const HEADING_PATTERN = /^\*\*\s*([A-Za-z][A-Za-z0-9 _-]*?)\s*(?::\*\*|\*\*\s*:)\s*(.*)$/;
const BULLET_PATTERN = /^(?:[-*•]|\d+[.)])\s+/;

/** Headings that may carry their content on the same line */
const SECTION_KEYS: ReadonlySet<string> = new Set([
  'DOCUMENT_SUMMARY',
  'CRITICAL_POINTS',
  'EXPIRY_INDICATORS',
  'RECOMMENDATIONS',
  'CONFIDENCE_SCORE',
  'EXECUTIVE_SUMMARY',
  'EXPIRED_KNOWLEDGE_COUNT',
  'CRITICAL_FINDINGS',
  'ACTION_ITEMS',
]);

function sectionKey(name: string): string {
  return name.trim().toUpperCase().replace(/[\s-]+/g, '_');
}

/**
 * Split text into named sections; lines before the first heading are dropped.
 * A bold label followed by text (`**Note:** ...`) opens a section only for a
 * known key, otherwise the line stays in the current section.
 */
export function parseSections(text: string): Map<string, string[]> {
  const sections = new Map<string, string[]>();
  let current: string[] | null = null;

  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.trim();
    const heading = HEADING_PATTERN.exec(line);
    if (heading) {
      const key = sectionKey(heading[1] ?? '');
      const inline = (heading[2] ?? '').trim();
      if (!inline || SECTION_KEYS.has(key)) {
        current = [];
        sections.set(key, current);
        if (inline) current.push(inline);
        continue;
      }
    }
    if (current && line) {
      current.push(line);
    }
  }

  return sections;
}

/**
 * Value after a `- Field:` prefix (case-insensitive), or null when the line has another shape
 */
function fieldValue(line: string, ...fields: string[]): string | null {
  const lower = line.toLowerCase();
  for (const field of fields) {
    const prefix = `- ${field.toLowerCase()}:`;
    if (lower.startsWith(prefix)) {
      return line.slice(prefix.length).trim();
    }
  }
  return null;
}

function stripBullet(line: string): string {
  return line.replace(BULLET_PATTERN, '').trim();
}

function listSection(sections: Map<string, string[]>, key: string): string[] {
  return (sections.get(key) ?? []).map(stripBullet).filter((line) => line.length > 0);
}

function textSection(sections: Map<string, string[]>, key: string): string {
  const lines = sections.get(key) ?? [];
  return lines.length > 0 ? lines.join('\n') : NO_SUMMARY;
}

/**
 * First numeral in the section; values above 1 are read as percentages
 */
export function parseConfidence(lines: string[] | undefined): number {
  const match = lines?.join(' ').match(/\d+(?:\.\d+)?/);
  if (!match) return DEFAULT_CONFIDENCE;

  let value = Number.parseFloat(match[0]);
  if (!Number.isFinite(value)) return DEFAULT_CONFIDENCE;
  if (value > 1) value = value / 100;
  return Math.min(1, Math.max(0, value));
}

function parseCriticalPoints(lines: string[]): CriticalPointDraft[] {
  const points: CriticalPointDraft[] = [];
  let current: CriticalPointDraft | null = null;

  for (const line of lines) {
    const description = fieldValue(line, 'Point');
    if (description !== null) {
      current = { description, category: 'technical', urgency: 'medium', source: 'current' };
      points.push(current);
      continue;
    }
    if (!current) continue;

    const category = fieldValue(line, 'Category');
    if (category !== null) {
      current.category = category;
      continue;
    }
    const urgency = fieldValue(line, 'Urgency');
    if (urgency !== null) {
      current.urgency = urgency;
      continue;
    }
    const lastUpdated = fieldValue(line, 'Last_Updated', 'Last Updated');
    if (lastUpdated !== null) {
      current.lastUpdated = lastUpdated;
    }
  }

  return points;
}

function parseFindings(lines: string[]): CriticalFinding[] {
  const findings: CriticalFinding[] = [];
  let current: CriticalFinding | null = null;

  for (const line of lines) {
    const finding = fieldValue(line, 'Finding');
    if (finding !== null) {
      current = { finding };
      findings.push(current);
      continue;
    }
    if (!current) continue;

    const impact = fieldValue(line, 'Impact');
    if (impact !== null) {
      current.impact = impact;
      continue;
    }
    const recommendation = fieldValue(line, 'Recommendation');
    if (recommendation !== null) {
      current.recommendation = recommendation;
    }
  }

  return findings;
}

function parseActionItems(lines: string[]): ActionItem[] {
  const items: ActionItem[] = [];
  let current: ActionItem | null = null;

  for (const line of lines) {
    const task = fieldValue(line, 'Task');
    if (task !== null) {
      current = { task };
      items.push(current);
      continue;
    }
    if (!current) continue;

    const priority = fieldValue(line, 'Priority');
    if (priority !== null) {
      current.priority = priority;
      continue;
    }
    const owner = fieldValue(line, 'Owner');
    if (owner !== null) {
      current.owner = owner;
      continue;
    }
    const timeline = fieldValue(line, 'Timeline');
    if (timeline !== null) {
      current.timeline = timeline;
    }
  }

  return items;
}

/**
 * Parse a document analysis response
 */
export function parseAnalysisResponse(text: string): AnalysisResult {
  const sections = parseSections(text);

  const result: AnalysisResult = {
    summary: textSection(sections, 'DOCUMENT_SUMMARY'),
    criticalPoints: parseCriticalPoints(sections.get('CRITICAL_POINTS') ?? []),
    expiryIndicators: listSection(sections, 'EXPIRY_INDICATORS'),
    recommendations: listSection(sections, 'RECOMMENDATIONS'),
    confidenceScore: parseConfidence(sections.get('CONFIDENCE_SCORE')),
  };

  logger.debug(
    {
      event: 'parser.analysis',
      sections: [...sections.keys()],
      criticalPoints: result.criticalPoints.length,
      confidenceScore: result.confidenceScore,
    },
    'Parsed analysis response'
  );

  return result;
}

/**
 * Parse a report narrative response
 */
export function parseReportResponse(text: string): ReportAnalysis {
  const sections = parseSections(text);
  const countMatch = sections.get('EXPIRED_KNOWLEDGE_COUNT')?.join(' ').match(/\d+/);

  return {
    executiveSummary: textSection(sections, 'EXECUTIVE_SUMMARY'),
    expiredKnowledgeCount: countMatch ? Number.parseInt(countMatch[0], 10) : 0,
    criticalFindings: parseFindings(sections.get('CRITICAL_FINDINGS') ?? []),
    recommendations: listSection(sections, 'RECOMMENDATIONS'),
    actionItems: parseActionItems(sections.get('ACTION_ITEMS') ?? []),
  };
}

/**
 * Result used when the analysis call itself failed
 */
export function failedAnalysis(): AnalysisResult {
  return {
    summary: 'Analysis failed',
    criticalPoints: [],
    expiryIndicators: [],
    recommendations: [],
    confidenceScore: 0,
  };
}

/**
 * Narrative used when the report call itself failed
 */
export function failedReport(): ReportAnalysis {
  return {
    executiveSummary: 'Report generation failed',
    expiredKnowledgeCount: 0,
    criticalFindings: [],
    recommendations: [],
    actionItems: [],
  };
}
