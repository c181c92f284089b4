import { config } from 'dotenv';
import path from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { LOG_LEVELS } from './logger.js';

config({ quiet: true });

const __dirname = path.dirname(fileURLToPath(import.meta.url));

export const PROJECT_ROOT = path.join(__dirname, '..');

const envSchema = z.object({
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),

  // Registry + template locations (relative paths resolve from project root)
  ROLE_CATEGORIES_PATH: z.string().min(1).default('config/role-categories.json'),
  TEMPLATES_DIR: z.string().min(1).default('.'),
  DB_PATH: z.string().min(1).default('jobs.db'),

  FALLBACK_ROLE: z.string().min(1).default('devops_cloud'),
  BREAKDOWN_THRESHOLD: z.coerce.number().min(0).max(100).default(5),
  LOW_CONFIDENCE_THRESHOLD: z.coerce.number().min(0).max(1).default(0.4),

  DRY_RUN: z.string().optional().transform(val => val === 'true'),
});

export type Env = z.infer<typeof envSchema>;

function loadEnv(): Env {
  const result = envSchema.safeParse(process.env);
  if (!result.success) {
    console.error('Missing or invalid environment variables:');
    console.error(result.error.message);
    process.exit(1);
  }
  return result.data;
}

export const env = loadEnv();

export function resolveFromRoot(target: string): string {
  return path.isAbsolute(target) ? target : path.join(PROJECT_ROOT, target);
}

export const classifierConfig = {
  breakdownThreshold: env.BREAKDOWN_THRESHOLD,
  lowConfidenceThreshold: env.LOW_CONFIDENCE_THRESHOLD,
  fallbackRole: env.FALLBACK_ROLE,
} as const;

export const paths = {
  roleCategories: resolveFromRoot(env.ROLE_CATEGORIES_PATH),
  templatesDir: resolveFromRoot(env.TEMPLATES_DIR),
  database: env.DB_PATH === ':memory:' ? ':memory:' : resolveFromRoot(env.DB_PATH),
};
