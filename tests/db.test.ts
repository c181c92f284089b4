import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { classifyJob } from '../src/classifier/index.js';
import { JobStore, rawJobToJob } from '../src/storage/db.js';
import type { RawJob } from '../src/types.js';
import { sampleRegistry } from './helpers.js';

const rawJob: RawJob = {
  title: 'Platform Engineer',
  company: 'Example AB',
  url: 'https://jobs.example.com/1',
  description: 'DevOps role with Kubernetes and Terraform on AWS',
};

describe('JobStore', () => {
  let store: JobStore;

  beforeEach(() => {
    store = new JobStore(':memory:');
  });

  afterEach(() => {
    store.close();
  });

  it('creates new jobs with a fresh id and NEW status', () => {
    const a = rawJobToJob(rawJob);
    const b = rawJobToJob(rawJob);

    expect(a.status).toBe('NEW');
    expect(a.id).not.toBe(b.id);
    expect(a.id).toMatch(/^[0-9a-f-]{36}$/);
  });

  it('inserts jobs and skips duplicate urls', () => {
    expect(store.appendJobs([rawJobToJob(rawJob)])).toBe(1);
    expect(store.appendJobs([rawJobToJob(rawJob)])).toBe(0);
    expect(store.appendJobs([])).toBe(0);

    expect(store.getExistingJobUrls()).toEqual(new Set(['https://jobs.example.com/1']));
    expect(store.getAllJobs()).toHaveLength(1);
  });

  it('round-trips a job', () => {
    const job = rawJobToJob(rawJob);
    store.appendJobs([job]);

    expect(store.getJobById(job.id)).toEqual({
      id: job.id,
      dateFound: job.dateFound,
      company: 'Example AB',
      title: 'Platform Engineer',
      url: 'https://jobs.example.com/1',
      description: 'DevOps role with Kubernetes and Terraform on AWS',
      status: 'NEW',
      roleCategory: undefined,
      roleScore: undefined,
      confidence: undefined,
      rolePercentages: undefined,
      templateCategory: undefined,
      classifiedAt: undefined,
    });
    expect(store.getJobById('missing')).toBeNull();
    expect(store.getJobByUrl('https://jobs.example.com/1')?.id).toBe(job.id);
  });

  it('saves a classification and marks the job classified', () => {
    const job = rawJobToJob(rawJob);
    store.appendJobs([job]);
    const result = classifyJob(job.description, sampleRegistry());

    expect(store.saveClassification(job.id, result, '2026-01-05T10:00:00.000Z')).toBe(true);

    const saved = store.getJobById(job.id);
    expect(saved?.status).toBe('CLASSIFIED');
    expect(saved?.roleCategory).toBe('devops_cloud');
    expect(saved?.roleScore).toBe(1);
    expect(saved?.confidence).toBeCloseTo(result.confidence, 10);
    expect(saved?.rolePercentages).toEqual({ ...result.percentages });
    expect(saved?.templateCategory).toBe('devops_cloud');
    expect(saved?.classifiedAt).toBe('2026-01-05T10:00:00.000Z');
  });

  it('stores a fallback classification without a role category', () => {
    const job = rawJobToJob({ ...rawJob, description: 'Barista wanted' });
    store.appendJobs([job]);

    store.saveClassification(job.id, classifyJob(job.description, sampleRegistry()));

    const saved = store.getJobById(job.id);
    expect(saved?.roleCategory).toBeUndefined();
    expect(saved?.templateCategory).toBe('devops_cloud');
  });

  it('keeps a status that has moved past NEW', () => {
    const job = rawJobToJob(rawJob);
    store.appendJobs([job]);
    store.updateJobStatus(job.id, 'APPLIED');

    store.saveClassification(job.id, classifyJob(job.description, sampleRegistry()));

    expect(store.getJobById(job.id)?.status).toBe('APPLIED');
  });

  it('reports when there is no job to update', () => {
    const result = classifyJob('devops', sampleRegistry());
    expect(store.saveClassification('missing', result)).toBe(false);
  });
});
