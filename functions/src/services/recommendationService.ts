import { applyHardFilters, computeAdminScore, type AdminPreferences } from './adminPreferences';
import type { AvailabilitySummary } from './availabilityService';

export interface RecommendationWeights {
  interest: number;
  overlap: number;
  admin: number;
}

export const DEFAULT_RECOMMENDATION_WEIGHTS: Readonly<RecommendationWeights> = Object.freeze({
  interest: 0.4,
  overlap: 0.4,
  admin: 0.2,
});

export const DEFAULT_RECOMMENDATION_TOP_N = 5;

export interface RankableEvent {
  id: number;
  dateStart: string | null;
  priceMin: number | null;
  priceMax: number | null;
  tags: readonly string[];
}

export interface RecommendationScores {
  interestScore: number;
  overlapScore: number;
  adminScore: number;
  compositeScore: number;
}

export type Recommendation<T extends RankableEvent> = T & RecommendationScores;

export interface RecommendationOptions {
  weights?: RecommendationWeights;
  topN?: number;
}

export function computeRecommendations<T extends RankableEvent>(
  events: readonly T[],
  voteTallies: ReadonlyMap<number, number>,
  overlapByEventId: ReadonlyMap<number, number>,
  preferences: AdminPreferences,
  options: RecommendationOptions = {},
): Array<Recommendation<T>> {
  const weights = options.weights ?? DEFAULT_RECOMMENDATION_WEIGHTS;
  const topN = options.topN ?? DEFAULT_RECOMMENDATION_TOP_N;
  const maxVotes = Math.max(1, ...voteTallies.values());

  const ranked = applyHardFilters(events, preferences).map(event => {
    const interestScore = (voteTallies.get(event.id) ?? 0) / maxVotes;
    const overlapScore = overlapByEventId.get(event.id) ?? 0;
    const adminScore = computeAdminScore(event, preferences);
    const compositeScore =
      weights.interest * interestScore + weights.overlap * overlapScore + weights.admin * adminScore;
    return { ...event, interestScore, overlapScore, adminScore, compositeScore };
  });

  ranked.sort((left, right) => {
    if (left.compositeScore !== right.compositeScore) {
      return right.compositeScore - left.compositeScore;
    }
    if (left.overlapScore !== right.overlapScore) {
      return right.overlapScore - left.overlapScore;
    }
    const leftPrice = left.priceMin ?? 0;
    const rightPrice = right.priceMin ?? 0;
    if (leftPrice !== rightPrice) {
      return leftPrice - rightPrice;
    }
    const leftDate = String(left.dateStart);
    const rightDate = String(right.dateStart);
    if (leftDate === rightDate) {
      return 0;
    }
    return leftDate < rightDate ? -1 : 1;
  });

  return ranked.slice(0, Math.max(0, topN));
}

/**
 * Overlap per event: the best slot on the event's own day, else the best
 * slot overall, else 0.
 */
export function buildOverlapByEvent(
  events: ReadonlyArray<{ id: number; dateStart: string | null }>,
  availability: AvailabilitySummary,
): Map<number, number> {
  const bestByDate = new Map<string, number>();
  let bestOverall = 0;
  for (const slot of availability.slots) {
    bestByDate.set(slot.date, Math.max(bestByDate.get(slot.date) ?? 0, slot.overlapScore));
    bestOverall = Math.max(bestOverall, slot.overlapScore);
  }

  const overlap = new Map<number, number>();
  for (const event of events) {
    const day = event.dateStart ? event.dateStart.slice(0, 10) : '';
    overlap.set(event.id, bestByDate.get(day) ?? bestOverall);
  }
  return overlap;
}
