import fs from 'fs';
import path from 'path';
import { createLogger } from '../logger.js';
import type { TemplateKind } from '../types.js';
import type { RoleRegistry } from './roleRegistry.js';

const log = createLogger('Templates');

function isFile(filePath: string): boolean {
  try {
    return fs.statSync(filePath).isFile();
  } catch {
    // Missing or unreadable
    return false;
  }
}

/**
 * Absolute path of a category's CV or cover-letter template,
 * or null when the category is unknown or the file does not exist.
 */
export function getTemplatePath(
  registry: RoleRegistry,
  category: string,
  kind: TemplateKind,
  baseDir: string
): string | null {
  const role = registry.get(category);
  if (!role) return null;

  const fullPath = path.resolve(baseDir, role.templates[kind]);
  return isFile(fullPath) ? fullPath : null;
}

export function loadTemplate(
  registry: RoleRegistry,
  category: string,
  kind: TemplateKind,
  baseDir: string
): string | null {
  const templatePath = getTemplatePath(registry, category, kind, baseDir);
  if (!templatePath) return null;

  try {
    return fs.readFileSync(templatePath, 'utf-8');
  } catch (error) {
    log.error(`Error loading ${kind} template for ${category}:`, error);
    return null;
  }
}

export interface TemplatePair {
  category: string;
  cv: string | null;
  coverLetter: string | null;
}

export function selectTemplate(
  registry: RoleRegistry,
  result: { readonly templateCategory: string },
  baseDir: string
): TemplatePair {
  const category = result.templateCategory;
  return {
    category,
    cv: getTemplatePath(registry, category, 'cv', baseDir),
    coverLetter: getTemplatePath(registry, category, 'coverLetter', baseDir),
  };
}

export interface TemplateListing {
  role: string;
  displayName: string;
  keywords: readonly string[];
  priority: number;
  cvExists: boolean;
  clExists: boolean;
  cvPath: string | null;
  clPath: string | null;
}

// Sorted by priority; equal priorities keep registry order
export function listAvailableTemplates(registry: RoleRegistry, baseDir: string): TemplateListing[] {
  return registry.categories
    .map(category => {
      const cvPath = getTemplatePath(registry, category.key, 'cv', baseDir);
      const clPath = getTemplatePath(registry, category.key, 'coverLetter', baseDir);
      return {
        role: category.key,
        displayName: registry.displayName(category.key),
        keywords: category.keywords,
        priority: category.priority,
        cvExists: cvPath !== null,
        clExists: clPath !== null,
        cvPath,
        clPath,
      };
    })
    .sort((a, b) => a.priority - b.priority);
}
