/**
 * Unit tests for critical point decoding and default recommendations
 */

import { describe, expect, it } from 'vitest';
import { UnknownEnumValueError, type CriticalPointRecord, type UrgencyLevel } from '@kexp/core';
import type { AnalysisResult } from '@kexp/llm';
import { parseLastUpdated, toNewCriticalPoints } from './drafts.js';
import { buildDefaultRecommendations } from './recommendations.js';

function result(points: AnalysisResult['criticalPoints']): AnalysisResult {
  return {
    summary: 'summary',
    criticalPoints: points,
    expiryIndicators: ['Node 16'],
    recommendations: [],
    confidenceScore: 0.7,
  };
}

function stored(id: number, urgency: UrgencyLevel): CriticalPointRecord {
  return {
    id,
    documentId: 1,
    description: `Point ${id}`,
    category: 'process',
    urgency,
    lastUpdatedDate: null,
    expiryIndicators: [],
    confidenceScore: null,
    contextSnippet: null,
    pageNumber: null,
    sectionTitle: null,
    extractedByModel: null,
    createdAt: '2024-06-01T00:00:00.000Z',
  };
}

describe('parseLastUpdated', () => {
  it('normalizes dates to ISO timestamps', () => {
    expect(parseLastUpdated('2021-03-01')).toBe('2021-03-01T00:00:00.000Z');
  });

  it('returns null for text that is not a date', () => {
    expect(parseLastUpdated('unknown')).toBeNull();
    expect(parseLastUpdated('  ')).toBeNull();
    expect(parseLastUpdated(undefined)).toBeNull();
  });
});

describe('toNewCriticalPoints', () => {
  it('decodes case-insensitively and copies analysis fields', () => {
    const points = toNewCriticalPoints(
      result([{ description: 'Old API', category: 'Regulatory', urgency: 'HIGH', source: 'current', lastUpdated: '2022-07-04' }]),
      'strict',
      'test-model'
    );

    expect(points).toEqual([
      {
        description: 'Old API',
        category: 'regulatory',
        urgency: 'high',
        lastUpdatedDate: '2022-07-04T00:00:00.000Z',
        expiryIndicators: ['Node 16'],
        confidenceScore: 0.7,
        extractedByModel: 'test-model',
      },
    ]);
  });

  it('throws on an unknown urgency in strict mode', () => {
    expect(() =>
      toNewCriticalPoints(result([{ description: 'x', category: 'technical', urgency: 'urgent', source: 'current' }]), 'strict', 'm')
    ).toThrow(UnknownEnumValueError);
  });

  it('falls back in lenient mode', () => {
    const [point] = toNewCriticalPoints(
      result([{ description: 'x', category: 'Legal', urgency: 'urgent', source: 'current' }]),
      'lenient',
      'm'
    );

    expect(point?.category).toBe('technical');
    expect(point?.urgency).toBe('medium');
  });
});

describe('buildDefaultRecommendations', () => {
  it('creates one recommendation per high or critical point', () => {
    const recommendations = buildDefaultRecommendations(
      [stored(1, 'low'), stored(2, 'critical'), stored(3, 'medium'), stored(4, 'high')],
      'test-model'
    );

    expect(recommendations).toEqual([
      {
        criticalPointId: 2,
        title: 'Review process information',
        description: 'Review and update: Point 2',
        priority: 'critical',
        suggestedOwnerRole: 'Knowledge Manager',
        suggestedTimeline: '30 days',
        dependencies: [],
        generatedByModel: 'test-model',
      },
      {
        criticalPointId: 4,
        title: 'Review process information',
        description: 'Review and update: Point 4',
        priority: 'high',
        suggestedOwnerRole: 'Knowledge Manager',
        suggestedTimeline: '30 days',
        dependencies: [],
        generatedByModel: 'test-model',
      },
    ]);
  });

  it('creates nothing for low and medium points', () => {
    expect(buildDefaultRecommendations([stored(1, 'low'), stored(2, 'medium')], 'm')).toEqual([]);
  });
});
