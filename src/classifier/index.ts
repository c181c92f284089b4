import { createLogger } from '../logger.js';
import type { RoleRegistry } from '../templates/roleRegistry.js';
import type { ClassificationResult, ClassifyOptions, ScoreResult } from '../types.js';
import { identifyRoleIndicatorDetails } from './jobAnalyzer.js';
import { DEFAULT_BREAKDOWN_THRESHOLD, TemplateMatcher } from './templateMatcher.js';

export * from './jobAnalyzer.js';
export * from './templateMatcher.js';

const log = createLogger('Classifier');

export const DEFAULT_LOW_CONFIDENCE_THRESHOLD = 0.4;

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
    Object.freeze(value);
  }
  return value;
}

/**
 * Scores a category may win with. Excluded categories, and categories whose
 * share of the total is below their minShare, are zeroed out. Reported
 * scores and percentages are left untouched.
 */
function eligibleScores(
  registry: RoleRegistry,
  scores: Readonly<Record<string, number>>,
  percentages: Readonly<Record<string, number>>,
  excluded: ReadonlySet<string>
): Record<string, number> {
  const eligible: Record<string, number> = {};
  for (const category of registry.categories) {
    const score = scores[category.key] ?? 0;
    const share = percentages[category.key] ?? 0;

    if (excluded.has(category.key)) {
      eligible[category.key] = 0;
    } else if (category.minShare !== undefined && score > 0 && share < category.minShare) {
      log.debug(
        `${category.key} holds ${share.toFixed(1)}% (< ${category.minShare}%), not eligible to win`
      );
      eligible[category.key] = 0;
    } else {
      eligible[category.key] = score;
    }
  }
  return eligible;
}

/**
 * Classify a job description against the role registry.
 * Pure and deterministic: equal inputs give deeply equal results.
 */
export function classifyJob(
  jobDescription: string | null | undefined,
  registry: RoleRegistry,
  options: ClassifyOptions = {}
): ClassificationResult {
  const matcher = new TemplateMatcher(registry);
  const threshold = options.breakdownThreshold ?? DEFAULT_BREAKDOWN_THRESHOLD;
  const lowConfidenceThreshold = options.lowConfidenceThreshold ?? DEFAULT_LOW_CONFIDENCE_THRESHOLD;
  const excluded = new Set(options.excluded ?? []);

  const { indicators, skipped } = identifyRoleIndicatorDetails(jobDescription, registry);

  const scoreResults: Record<string, ScoreResult> = matcher.calculateScoreResults(indicators);
  const scores: Record<string, number> = {};
  const percentages: Record<string, number> = {};
  for (const [key, result] of Object.entries(scoreResults)) {
    scores[key] = result.weightedScore;
    percentages[key] = result.percentage;
  }

  const breakdown = matcher.getRoleBreakdown(percentages, threshold);

  const eligible = eligibleScores(registry, scores, percentages, excluded);
  const [candidate, candidateScore] = matcher.selectBestMatch(eligible);
  const bestCategory = candidateScore > 0 ? candidate : '';
  const bestScore = bestCategory ? candidateScore : 0;

  const ranked = Object.values(eligible).sort((a, b) => b - a);
  const totalScore = Object.values(scores).reduce((total, score) => total + score, 0);
  const confidence = bestCategory
    ? matcher.calculateConfidenceScore(ranked[0] ?? 0, ranked[1] ?? 0, totalScore)
    : 0;

  const usedFallback = bestCategory === '';
  const templateCategory = usedFallback ? matcher.getFallbackTemplate(excluded) : bestCategory;

  const context = options.jobUrl ? ` (${options.jobUrl})` : '';
  if (usedFallback) {
    log.debug(`No role evidence${context}, falling back to ${templateCategory}`);
  } else {
    log.debug(
      `Best match${context}: ${bestCategory} score=${bestScore.toFixed(2)} confidence=${confidence.toFixed(2)}`
    );
  }

  return deepFreeze({
    bestCategory,
    bestScore,
    scores: scoreResults,
    percentages,
    breakdown,
    confidence,
    lowConfidence: confidence < lowConfidenceThreshold,
    keywordMatches: indicators,
    skippedKeywords: skipped,
    templateCategory,
    usedFallback,
  });
}
