import Database, { type Database as DatabaseType } from 'better-sqlite3';
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import { createLogger } from '../logger.js';
import type { ClassificationResult, Job, JobStatus, RawJob } from '../types.js';

const log = createLogger('DB');

const JOB_STATUSES = ['NEW', 'CLASSIFIED', 'APPLIED', 'REJECTED', 'NOT_FIT'] as const satisfies readonly JobStatus[];

const percentagesSchema = z.record(z.number());

const jobRowSchema = z.object({
  id: z.string(),
  date_found: z.string(),
  company: z.string(),
  title: z.string(),
  url: z.string(),
  description: z.string().nullable(),
  status: z.enum(JOB_STATUSES).catch('NEW'),
  role_category: z.string().nullable(),
  role_score: z.number().nullable(),
  confidence: z.number().nullable(),
  role_percentages: z.string().nullable(),
  template_category: z.string().nullable(),
  classified_at: z.string().nullable(),
});

type JobRow = z.infer<typeof jobRowSchema>;

function parsePercentages(raw: string | null): Record<string, number> | undefined {
  if (!raw) return undefined;
  try {
    const parsed = percentagesSchema.safeParse(JSON.parse(raw));
    return parsed.success ? parsed.data : undefined;
  } catch (error) {
    log.warn('Ignoring unreadable role_percentages column', error);
    return undefined;
  }
}

function rowToJob(row: JobRow): Job {
  return {
    id: row.id,
    dateFound: row.date_found,
    company: row.company,
    title: row.title,
    url: row.url,
    description: row.description || '',
    status: row.status,
    roleCategory: row.role_category || undefined,
    roleScore: row.role_score ?? undefined,
    confidence: row.confidence ?? undefined,
    rolePercentages: parsePercentages(row.role_percentages),
    templateCategory: row.template_category || undefined,
    classifiedAt: row.classified_at || undefined,
  };
}

export function rawJobToJob(rawJob: RawJob, status: JobStatus = 'NEW'): Job {
  return {
    id: uuidv4(),
    dateFound: new Date().toISOString(),
    company: rawJob.company,
    title: rawJob.title,
    url: rawJob.url,
    description: rawJob.description,
    status,
  };
}

/**
 * SQLite store of jobs and the last classification computed for each.
 * Pass ':memory:' for a throwaway database.
 */
export class JobStore {
  readonly db: DatabaseType;

  constructor(dbPath: string) {
    this.db = new Database(dbPath);

    if (dbPath !== ':memory:') {
      // WAL journal for file-backed databases
      this.db.pragma('journal_mode = WAL');
    }

    this.db.exec(`
      CREATE TABLE IF NOT EXISTS jobs (
        id TEXT PRIMARY KEY,
        date_found TEXT NOT NULL,
        company TEXT NOT NULL,
        title TEXT NOT NULL,
        url TEXT UNIQUE NOT NULL,
        description TEXT,
        status TEXT DEFAULT 'NEW',
        role_category TEXT,
        role_score REAL,
        confidence REAL,
        role_percentages TEXT,
        template_category TEXT,
        classified_at TEXT,
        created_at TEXT DEFAULT CURRENT_TIMESTAMP
      )
    `);

    this.db.exec(`
      CREATE INDEX IF NOT EXISTS idx_jobs_status ON jobs(status);
      CREATE INDEX IF NOT EXISTS idx_jobs_role_category ON jobs(role_category);
    `);
  }

  getExistingJobUrls(): Set<string> {
    const rows = z.array(z.object({ url: z.string() })).parse(this.db.prepare('SELECT url FROM jobs').all());
    const urls = new Set(rows.map(r => r.url));
    log.debug(`Found ${urls.size} existing jobs in database`);
    return urls;
  }

  appendJobs(jobs: Job[]): number {
    if (jobs.length === 0) {
      log.info('No jobs to append');
      return 0;
    }

    const insert = this.db.prepare(`
      INSERT OR IGNORE INTO jobs (id, date_found, company, title, url, description, status)
      VALUES (?, ?, ?, ?, ?, ?, ?)
    `);

    const insertMany = this.db.transaction((batch: Job[]) => {
      let count = 0;
      for (const job of batch) {
        const result = insert.run(
          job.id,
          job.dateFound,
          job.company,
          job.title,
          job.url,
          job.description.substring(0, 50000), // Limit description size
          job.status
        );
        if (result.changes > 0) count++;
      }
      return count;
    });

    const inserted = insertMany(jobs);
    log.info(`Inserted ${inserted} jobs into database`);
    return inserted;
  }

  saveClassification(
    jobId: string,
    result: ClassificationResult,
    classifiedAt: string = new Date().toISOString()
  ): boolean {
    const update = this.db.prepare(`
      UPDATE jobs
      SET role_category = ?,
          role_score = ?,
          confidence = ?,
          role_percentages = ?,
          template_category = ?,
          classified_at = ?,
          status = CASE WHEN status = 'NEW' THEN 'CLASSIFIED' ELSE status END
      WHERE id = ?
    `);

    const outcome = update.run(
      result.bestCategory || null,
      result.bestScore,
      result.confidence,
      JSON.stringify(result.percentages),
      result.templateCategory,
      classifiedAt,
      jobId
    );
    return outcome.changes > 0;
  }

  updateJobStatus(jobId: string, status: JobStatus): void {
    this.db.prepare('UPDATE jobs SET status = ? WHERE id = ?').run(status, jobId);
  }

  getJobById(jobId: string): Job | null {
    const row = this.db.prepare('SELECT * FROM jobs WHERE id = ?').get(jobId);
    return row === undefined ? null : rowToJob(jobRowSchema.parse(row));
  }

  getJobByUrl(url: string): Job | null {
    const row = this.db.prepare('SELECT * FROM jobs WHERE url = ?').get(url);
    return row === undefined ? null : rowToJob(jobRowSchema.parse(row));
  }

  getAllJobs(): Job[] {
    const rows = z.array(jobRowSchema).parse(this.db.prepare('SELECT * FROM jobs ORDER BY date_found').all());
    return rows.map(rowToJob);
  }

  close(): void {
    this.db.close();
  }
}
