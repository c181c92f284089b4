import type { RoleRegistry } from '../templates/roleRegistry.js';
import type { ClassificationResult } from '../types.js';

export function formatPercentage(value: number): string {
  return `${value.toFixed(1)}%`;
}

export function formatClassification(result: ClassificationResult, registry: RoleRegistry): string[] {
  const lines: string[] = [];

  if (result.bestCategory) {
    lines.push(
      `Best match: ${registry.displayName(result.bestCategory)} (${result.bestCategory}) score=${result.bestScore.toFixed(2)}`
    );
  } else {
    lines.push('Best match: none (no role keywords found)');
  }

  const flag = result.lowConfidence ? ' [LOW - review manually]' : '';
  lines.push(`Confidence: ${result.confidence.toFixed(2)}${flag}`);

  if (result.breakdown.length > 0) {
    lines.push('Role breakdown:');
    for (const [category, percentage] of result.breakdown) {
      lines.push(`  ${registry.displayName(category)}: ${formatPercentage(percentage)}`);
    }
  }

  const matched = result.bestCategory ? result.keywordMatches[result.bestCategory] : undefined;
  if (matched && Object.keys(matched).length > 0) {
    const keywords = Object.entries(matched).map(([keyword, count]) => `${keyword} x${count}`);
    lines.push(`Matched: ${keywords.join(', ')}`);
  }

  lines.push(`Template: ${result.templateCategory}${result.usedFallback ? ' (fallback)' : ''}`);

  if (result.skippedKeywords.length > 0) {
    lines.push(`Skipped keywords: ${result.skippedKeywords.length}`);
  }

  return lines;
}
