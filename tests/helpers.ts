import { fileURLToPath } from 'url';
import { RoleRegistry } from '../src/templates/roleRegistry.js';

export const SHIPPED_REGISTRY_PATH = fileURLToPath(new URL('../config/role-categories.json', import.meta.url));

export interface CategoryInput {
  key: string;
  priority: number;
  keywords: string[];
  minShare?: number;
}

export function makeCategory({ key, priority, keywords, minShare }: CategoryInput) {
  return {
    key,
    priority,
    keywords,
    templates: { cv: `${key}/cv.tex`, coverLetter: `${key}/cl.tex` },
    ...(minShare === undefined ? {} : { minShare }),
  };
}

export function makeRegistry(categories: CategoryInput[], fallbackKey = 'devops_cloud'): RoleRegistry {
  return RoleRegistry.create(categories.map(makeCategory), { fallbackKey });
}

// Small registry mirroring the shapes used across the classifier tests
export function sampleRegistry(): RoleRegistry {
  return makeRegistry([
    { key: 'android_developer', priority: 1, keywords: ['android', 'kotlin', 'mobile', 'apk'] },
    { key: 'fullstack_developer', priority: 2, keywords: ['fullstack', 'full-stack', 'full stack', 'react', 'typescript'] },
    { key: 'devops_cloud', priority: 4, keywords: ['devops', 'kubernetes', 'aws', 'ci/cd', 'terraform'] },
    { key: 'backend_developer', priority: 3, keywords: ['backend', 'java', 'spring boot', 'microservices'] },
  ]);
}
