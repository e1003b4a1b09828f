import { Attempt } from "./session";

/**
 * Performance tracking over a session's drill history.
 * Everything here is pure: same history in, same answer out.
 */

export const DEFAULT_WEAK_AREA_THRESHOLD = 0.7;
export const DEFAULT_WEAK_AREA_LIMIT = 3;

export interface FamilyStats {
  factFamily: number;
  attempts: number;
  correct: number;
  accuracy: number; // 0-1
}

/**
 * Fraction of correct attempts, 0 for an empty history.
 */
export function accuracy(history: readonly Attempt[]): number {
  if (history.length === 0) {
    return 0;
  }
  const correct = history.filter(a => a.correct).length;
  return correct / history.length;
}

/**
 * Per-family attempt counts, grouped by the first operand.
 * Only families with at least one attempt are listed, smallest family first.
 */
export function familyStats(history: readonly Attempt[]): FamilyStats[] {
  const groups = new Map<number, { attempts: number; correct: number }>();

  for (const attempt of history) {
    const group = groups.get(attempt.factorA) ?? { attempts: 0, correct: 0 };
    group.attempts++;
    if (attempt.correct) group.correct++;
    groups.set(attempt.factorA, group);
  }

  return Array.from(groups.entries())
    .map(([factFamily, group]) => ({
      factFamily,
      attempts: group.attempts,
      correct: group.correct,
      accuracy: group.correct / group.attempts,
    }))
    .sort((a, b) => a.factFamily - b.factFamily);
}

/**
 * Fact families the learner struggles with, weakest first.
 *
 * A family is weak when its accuracy is below the threshold. Ties go to the
 * family with more attempts, then to the smaller family number. Families
 * with no attempts are never weak.
 */
export function weakAreas(
  history: readonly Attempt[],
  topN: number = DEFAULT_WEAK_AREA_LIMIT,
  threshold: number = DEFAULT_WEAK_AREA_THRESHOLD
): number[] {
  if (topN <= 0) {
    return [];
  }

  return familyStats(history)
    .filter(stats => stats.accuracy < threshold)
    .sort((a, b) =>
      a.accuracy - b.accuracy ||
      b.attempts - a.attempts ||
      a.factFamily - b.factFamily
    )
    .slice(0, topN)
    .map(stats => stats.factFamily);
}

/**
 * Number of correct attempts at the end of the history.
 */
export function recentStreak(history: readonly Attempt[]): number {
  let streak = 0;
  for (let i = history.length - 1; i >= 0; i--) {
    if (!history[i].correct) break;
    streak++;
  }
  return streak;
}

/**
 * Convert a 0-1 fraction to a percentage with one decimal place.
 */
export function toPercent(fraction: number): number {
  return Math.round(fraction * 1000) / 10;
}
