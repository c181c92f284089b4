import { createLogger } from '../logger.js';
import type {
  KeywordCounts,
  KeywordOutcome,
  RoleCategory,
  RoleIndicators,
  SkippedKeyword,
} from '../types.js';

const log = createLogger('Analyzer');

// Letters, combining marks, digits and underscore count as word characters,
// so "ö" in Swedish text is treated like any other letter.
const WORD_CHAR = '[\\p{L}\\p{M}\\p{N}_]';

export function normalizeText(text: string | null | undefined): string {
  if (!text) return '';
  return text.toLowerCase().replace(/\s+/g, ' ').trim();
}

export function escapeRegExp(literal: string): string {
  return literal.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Build a matcher for a literal keyword that only hits whole words/phrases:
 * the match may not be preceded or followed by a word character.
 */
export function buildKeywordPattern(keyword: string): RegExp {
  return new RegExp(`(?<!${WORD_CHAR})${escapeRegExp(keyword.toLowerCase())}(?!${WORD_CHAR})`, 'gu');
}

/**
 * Count one keyword in already-normalized text.
 * Every failure is reported as a typed outcome instead of an exception.
 */
export function countKeyword(normalizedText: string, keyword: unknown): KeywordOutcome {
  if (typeof keyword !== 'string') {
    return { ok: false, keyword: String(keyword), reason: 'not-a-string' };
  }

  const normalizedKeyword = normalizeText(keyword);
  if (!normalizedKeyword) {
    return { ok: false, keyword, reason: 'empty' };
  }

  let pattern: RegExp;
  try {
    pattern = buildKeywordPattern(normalizedKeyword);
  } catch (error) {
    return {
      ok: false,
      keyword,
      reason: 'invalid-pattern',
      detail: error instanceof Error ? error.message : String(error),
    };
  }

  if (!normalizedText) {
    return { ok: true, keyword, count: 0 };
  }

  const count = Array.from(normalizedText.toLowerCase().matchAll(pattern)).length;
  return { ok: true, keyword, count };
}

export function countOccurrences(normalizedText: string, keyword: string): number {
  if (!normalizedText || !keyword) return 0;
  const outcome = countKeyword(normalizedText, keyword);
  return outcome.ok ? outcome.count : 0;
}

export interface KeywordExtraction {
  counts: KeywordCounts;
  skipped: SkippedKeyword[];
}

export function extractKeywordDetails(
  jobDescription: string | null | undefined,
  keywords: readonly unknown[]
): KeywordExtraction {
  const counts: KeywordCounts = {};
  const skipped: SkippedKeyword[] = [];

  if (typeof jobDescription !== 'string' || !jobDescription) {
    log.debug('Empty job description, nothing to extract');
    return { counts, skipped };
  }
  if (keywords.length === 0) {
    log.debug('Empty keyword list, nothing to extract');
    return { counts, skipped };
  }

  const normalizedText = normalizeText(jobDescription);

  for (const keyword of keywords) {
    if (!keyword) continue;

    const outcome = countKeyword(normalizedText, keyword);
    if (!outcome.ok) {
      log.warn(`Skipping keyword "${outcome.keyword}" (${outcome.reason})`, outcome.detail);
      skipped.push({ keyword: outcome.keyword, reason: outcome.reason });
      continue;
    }

    if (outcome.count > 0) {
      counts[outcome.keyword] = outcome.count;
    }
  }

  return { counts, skipped };
}

/**
 * Count every keyword of the list in the job description.
 * Keywords that were not found are left out of the result.
 */
export function extractKeywords(
  jobDescription: string | null | undefined,
  keywords: readonly unknown[]
): KeywordCounts {
  return extractKeywordDetails(jobDescription, keywords).counts;
}

export interface RoleIndicatorExtraction {
  indicators: RoleIndicators;
  skipped: SkippedKeyword[];
}

export function identifyRoleIndicatorDetails(
  jobDescription: string | null | undefined,
  registry: { readonly categories: readonly RoleCategory[] }
): RoleIndicatorExtraction {
  const indicators: RoleIndicators = {};
  const skipped: SkippedKeyword[] = [];

  if (!jobDescription || registry.categories.length === 0) {
    return { indicators, skipped };
  }

  log.debug(`Analyzing job description for ${registry.categories.length} role categories`);

  for (const category of registry.categories) {
    if (category.keywords.length === 0) {
      log.debug(`No keywords defined for role: ${category.key}`);
      continue;
    }

    const extraction = extractKeywordDetails(jobDescription, category.keywords);
    indicators[category.key] = extraction.counts;
    for (const entry of extraction.skipped) {
      skipped.push({ ...entry, category: category.key });
    }

    const total = Object.values(extraction.counts).reduce((sum, n) => sum + n, 0);
    if (total > 0) {
      log.debug(`Role ${category.key}: ${total} keyword matches`, extraction.counts);
    }
  }

  return { indicators, skipped };
}

export function identifyRoleIndicators(
  jobDescription: string | null | undefined,
  registry: { readonly categories: readonly RoleCategory[] }
): RoleIndicators {
  return identifyRoleIndicatorDetails(jobDescription, registry).indicators;
}
