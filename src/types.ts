export type TemplateKind = 'cv' | 'coverLetter';

export interface TemplatePaths {
  cv: string;
  coverLetter: string;
}

export interface RoleCategory {
  key: string;
  keywords: readonly string[];
  priority: number;
  templates: TemplatePaths;
  minShare?: number; // Minimum % of total weighted score needed to win
}

// keyword -> occurrences (only keywords that were found)
export type KeywordCounts = Record<string, number>;

// categoryKey -> keyword counts
export type RoleIndicators = Record<string, KeywordCounts>;

export type SkipReason = 'empty' | 'not-a-string' | 'invalid-pattern';

export type KeywordOutcome =
  | { ok: true; keyword: string; count: number }
  | { ok: false; keyword: string; reason: SkipReason; detail?: string };

export interface SkippedKeyword {
  category?: string;
  keyword: string;
  reason: SkipReason;
}

export interface ScoreResult {
  rawScore: number;
  weightedScore: number;
  percentage: number;
}

export type RoleBreakdownEntry = readonly [category: string, percentage: number];

export interface ClassificationResult {
  readonly bestCategory: string;
  readonly bestScore: number;
  readonly scores: Readonly<Record<string, ScoreResult>>;
  readonly percentages: Readonly<Record<string, number>>;
  readonly breakdown: readonly RoleBreakdownEntry[];
  readonly confidence: number;
  readonly lowConfidence: boolean;
  readonly keywordMatches: Readonly<RoleIndicators>;
  readonly skippedKeywords: readonly SkippedKeyword[];
  readonly templateCategory: string;
  readonly usedFallback: boolean;
}

export interface ClassifyOptions {
  jobUrl?: string;
  breakdownThreshold?: number;
  lowConfidenceThreshold?: number;
  excluded?: readonly string[];
}

export type JobStatus = 'NEW' | 'CLASSIFIED' | 'APPLIED' | 'REJECTED' | 'NOT_FIT';

export interface RawJob {
  title: string;
  company: string;
  url: string;
  description: string;
}

export interface Job extends RawJob {
  id: string;
  dateFound: string;
  status: JobStatus;
  roleCategory?: string;
  roleScore?: number;
  confidence?: number;
  rolePercentages?: Record<string, number>;
  templateCategory?: string;
  classifiedAt?: string;
}
