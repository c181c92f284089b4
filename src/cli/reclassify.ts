import type { ClassificationResult, Job } from '../types.js';

function samePercentages(
  stored: Readonly<Record<string, number>> | undefined,
  fresh: Readonly<Record<string, number>>
): boolean {
  if (!stored) return false;
  const keys = Object.keys(fresh);
  return (
    keys.length === Object.keys(stored).length && keys.every(key => stored[key] === fresh[key])
  );
}

/**
 * Whether the stored classification of a job differs from a fresh one.
 * Compares every persisted column, not only the template.
 */
export function classificationChanged(job: Job, result: ClassificationResult): boolean {
  if (!job.classifiedAt) return true;

  return (
    (job.roleCategory ?? '') !== result.bestCategory ||
    job.templateCategory !== result.templateCategory ||
    job.roleScore !== result.bestScore ||
    job.confidence !== result.confidence ||
    !samePercentages(job.rolePercentages, result.percentages)
  );
}
