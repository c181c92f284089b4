import type { RoleBreakdownEntry, RoleIndicators, ScoreResult } from '../types.js';
import type { RoleRegistry } from '../templates/roleRegistry.js';

/**
 * Total weighted score at which keyword evidence counts as fully significant.
 * Below it, significance scales linearly (5 matches -> 0.5).
 */
export const SIGNIFICANCE_SATURATION_THRESHOLD = 10;
export const SEPARATION_WEIGHT = 0.7;
export const SIGNIFICANCE_WEIGHT = 0.3;
export const DEFAULT_BREAKDOWN_THRESHOLD = 5;

function sum(values: Iterable<number>): number {
  let total = 0;
  for (const value of values) total += value;
  return total;
}

/**
 * Turns per-category keyword counts into weighted scores, percentages and a
 * best match. Every iteration follows registry declaration order, which is
 * also the tie-break: the first declared category wins an equal score.
 */
export class TemplateMatcher {
  constructor(private readonly registry: RoleRegistry) {}

  calculateScores(indicators: RoleIndicators): Record<string, number> {
    const scores: Record<string, number> = {};
    for (const category of this.registry.categories) {
      const matches = indicators[category.key] ?? {};
      scores[category.key] = sum(Object.values(matches)) / category.priority;
    }
    return scores;
  }

  calculateScoreResults(indicators: RoleIndicators): Record<string, ScoreResult> {
    const weighted = this.calculateScores(indicators);
    const percentages = this.calculatePercentages(weighted);

    const results: Record<string, ScoreResult> = {};
    for (const category of this.registry.categories) {
      results[category.key] = {
        rawScore: sum(Object.values(indicators[category.key] ?? {})),
        weightedScore: weighted[category.key] ?? 0,
        percentage: percentages[category.key] ?? 0,
      };
    }
    return results;
  }

  calculatePercentages(scores: Readonly<Record<string, number>>): Record<string, number> {
    const total = sum(Object.values(scores));
    const percentages: Record<string, number> = {};

    for (const [key, score] of Object.entries(scores)) {
      percentages[key] = total === 0 ? 0 : (score / total) * 100;
    }
    return percentages;
  }

  getRoleBreakdown(
    percentages: Readonly<Record<string, number>>,
    threshold: number = DEFAULT_BREAKDOWN_THRESHOLD
  ): RoleBreakdownEntry[] {
    // Array.prototype.sort is stable, so equal percentages keep input order
    return Object.entries(percentages)
      .filter(([, percentage]) => percentage >= threshold)
      .sort((a, b) => b[1] - a[1]);
  }

  selectBestMatch(scores: Readonly<Record<string, number>>): [string, number] {
    let bestKey = '';
    let bestScore = 0;
    let first = true;

    for (const [key, score] of Object.entries(scores)) {
      if (first || score > bestScore) {
        bestKey = key;
        bestScore = score;
        first = false;
      }
    }
    return [bestKey, bestScore];
  }

  /**
   * Template to use when the primary pick is missing or rejected.
   * Returns the registry's fallback key unless it is excluded, then the
   * non-excluded category with the lowest priority number.
   */
  getFallbackTemplate(excluded: Iterable<string> = []): string {
    const excludedKeys = new Set(excluded);
    const defaultKey = this.registry.fallbackKey;

    if (!excludedKeys.has(defaultKey)) {
      return defaultKey;
    }

    let candidate: { key: string; priority: number } | null = null;
    for (const category of this.registry.categories) {
      if (excludedKeys.has(category.key)) continue;
      if (candidate === null || category.priority < candidate.priority) {
        candidate = { key: category.key, priority: category.priority };
      }
    }

    // Everything excluded: still hand back a template
    return candidate?.key ?? defaultKey;
  }

  calculateConfidenceScore(bestScore: number, secondBestScore: number, totalScore: number): number {
    if (totalScore === 0) return 0;

    const separation =
      secondBestScore === 0
        ? 1
        : Math.max(0, Math.min(1, (bestScore - secondBestScore) / bestScore));

    const significance = Math.min(1, totalScore / SIGNIFICANCE_SATURATION_THRESHOLD);

    return SEPARATION_WEIGHT * separation + SIGNIFICANCE_WEIGHT * significance;
  }
}
