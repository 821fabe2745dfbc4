/**
 * Default follow-up recommendations for high-priority critical points
 */

import { isHighPriority, type CriticalPointRecord, type NewRecommendation } from '@kexp/core';

export const DEFAULT_OWNER_ROLE = 'Knowledge Manager';
export const DEFAULT_TIMELINE = '30 days';

/**
 * Exactly one recommendation per high or critical point, none otherwise
 */
export function buildDefaultRecommendations(points: CriticalPointRecord[], model: string): NewRecommendation[] {
  return points
    .filter((point) => isHighPriority(point.urgency))
    .map((point) => ({
      criticalPointId: point.id,
      title: `Review ${point.category} information`,
      description: `Review and update: ${point.description}`,
      priority: point.urgency,
      suggestedOwnerRole: DEFAULT_OWNER_ROLE,
      suggestedTimeline: DEFAULT_TIMELINE,
      dependencies: [],
      generatedByModel: model,
    }));
}
