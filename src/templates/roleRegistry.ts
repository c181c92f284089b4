import fs from 'fs';
import { z } from 'zod';
import { createLogger } from '../logger.js';
import type { RoleCategory } from '../types.js';

const log = createLogger('Registry');

// Never integer-like, so Record<key, ...> keeps declaration order
const CATEGORY_KEY_PATTERN = /^[a-z][a-z0-9_]*$/;

export const DEFAULT_FALLBACK_ROLE = 'devops_cloud';

const categorySchema = z.object({
  key: z.string().regex(CATEGORY_KEY_PATTERN, 'must be lowercase snake_case'),
  priority: z.number().int().positive(),
  keywords: z.array(z.string()),
  templates: z.object({
    cv: z.string().min(1),
    coverLetter: z.string().min(1),
  }),
  minShare: z.number().min(0).max(100).optional(),
});

const registrySchema = z
  .array(categorySchema)
  .superRefine((categories, ctx) => {
    const seen = new Set<string>();
    categories.forEach((category, index) => {
      if (seen.has(category.key)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [index, 'key'],
          message: `duplicate category key "${category.key}"`,
        });
      }
      seen.add(category.key);
    });
  });

export class RegistryConfigError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = [], options?: { cause?: unknown }) {
    super(issues.length > 0 ? `${message}:\n  - ${issues.join('\n  - ')}` : message, options);
    this.name = 'RegistryConfigError';
    this.issues = issues;
  }
}

export interface RoleRegistryOptions {
  fallbackKey?: string;
}

export interface RoleInfo extends RoleCategory {
  category: string;
  displayName: string;
}

export function toDisplayName(key: string): string {
  return key
    .split('_')
    .filter(Boolean)
    .map(part => part.charAt(0).toUpperCase() + part.slice(1).toLowerCase())
    .join(' ');
}

function freezeCategory(category: z.infer<typeof categorySchema>): RoleCategory {
  const frozen: RoleCategory = {
    key: category.key,
    priority: category.priority,
    keywords: Object.freeze([...category.keywords]),
    templates: Object.freeze({ ...category.templates }),
  };
  if (category.minShare !== undefined) {
    frozen.minShare = category.minShare;
  }
  return Object.freeze(frozen);
}

/**
 * Read-only table of role categories, kept in declaration order.
 * Declaration order is the tie-break everywhere scores are compared.
 */
export class RoleRegistry {
  readonly categories: readonly RoleCategory[];
  readonly fallbackKey: string;
  private readonly byKey: ReadonlyMap<string, RoleCategory>;

  private constructor(categories: readonly RoleCategory[], fallbackKey: string) {
    this.categories = Object.freeze([...categories]);
    this.byKey = new Map(categories.map(c => [c.key, c]));
    this.fallbackKey = fallbackKey;
    Object.freeze(this);
  }

  /**
   * Validate raw category data and build a registry.
   * Throws RegistryConfigError listing every problem found.
   */
  static create(input: unknown, options: RoleRegistryOptions = {}): RoleRegistry {
    const result = registrySchema.safeParse(input);
    if (!result.success) {
      const issues = result.error.issues.map(issue =>
        issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
      );
      throw new RegistryConfigError('Invalid role category registry', issues);
    }

    const categories = result.data.map(freezeCategory);
    const fallbackKey = options.fallbackKey ?? DEFAULT_FALLBACK_ROLE;

    // An empty registry classifies nothing and falls back to the configured key
    if (categories.length > 0 && !categories.some(c => c.key === fallbackKey)) {
      throw new RegistryConfigError('Invalid role category registry', [
        `fallback category "${fallbackKey}" is not a registered category`,
      ]);
    }

    for (const category of categories) {
      if (category.keywords.length === 0) {
        log.warn(`Category "${category.key}" has no keywords and can never be matched`);
      }
    }

    log.debug(`Loaded ${categories.length} role categories`, { fallbackKey });
    return new RoleRegistry(categories, fallbackKey);
  }

  keys(): string[] {
    return this.categories.map(c => c.key);
  }

  has(key: string): boolean {
    return this.byKey.has(key);
  }

  get(key: string): RoleCategory | undefined {
    return this.byKey.get(key);
  }

  getOrThrow(key: string): RoleCategory {
    const category = this.byKey.get(key);
    if (!category) {
      throw new Error(`Unknown role category: ${key}`);
    }
    return category;
  }

  displayName(key: string): string {
    return toDisplayName(key);
  }

  getRoleInfo(key: string): RoleInfo | null {
    const category = this.byKey.get(key);
    if (!category) return null;
    return {
      ...category,
      category: key,
      displayName: toDisplayName(key),
    };
  }
}

export function loadRoleRegistry(filePath: string, options: RoleRegistryOptions = {}): RoleRegistry {
  let raw: string;
  try {
    raw = fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    throw new RegistryConfigError(`Cannot read role categories from ${filePath}`, [], { cause: error });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new RegistryConfigError(`Role categories file ${filePath} is not valid JSON`, [reason], {
      cause: error,
    });
  }

  return RoleRegistry.create(parsed, options);
}
