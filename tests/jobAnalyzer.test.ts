import { describe, it, expect } from 'vitest';
import {
  countKeyword,
  countOccurrences,
  extractKeywordDetails,
  extractKeywords,
  identifyRoleIndicators,
  normalizeText,
} from '../src/classifier/jobAnalyzer.js';
import { makeRegistry, sampleRegistry } from './helpers.js';

describe('normalizeText', () => {
  it('lowercases and collapses whitespace runs', () => {
    expect(normalizeText('  Hello   World\n\nThis  is   a   test  ')).toBe('hello world this is a test');
  });

  it('returns an empty string for empty or absent input', () => {
    expect(normalizeText('')).toBe('');
    expect(normalizeText(undefined)).toBe('');
    expect(normalizeText(null)).toBe('');
  });

  it('never leaves double or edge whitespace', () => {
    const samples = ['\tKotlin\r\n\r\nAndroid ', 'a   b', ' x\n', 'Senior  DevOps\tEngineer\n\n\n(Remote)'];
    for (const sample of samples) {
      const normalized = normalizeText(sample);
      expect(normalized).not.toMatch(/\s\s/);
      expect(normalized).toBe(normalized.trim());
    }
  });
});

describe('countOccurrences', () => {
  it('returns 0 when text or keyword is empty', () => {
    expect(countOccurrences('', 'react')).toBe(0);
    expect(countOccurrences('i love react', '')).toBe(0);
  });

  it('respects word boundaries', () => {
    expect(countOccurrences('reactive framework', 'react')).toBe(0);
    expect(countOccurrences('I love react', 'react')).toBe(1);
  });

  it('matches multi-word phrases only as a whole', () => {
    expect(countOccurrences('site reliability engineer', 'site reliability')).toBe(1);
    expect(countOccurrences('this website is down', 'site reliability')).toBe(0);
  });

  it('counts non-overlapping matches', () => {
    expect(countOccurrences('react react react', 'react')).toBe(3);
  });

  it('treats regex characters in keywords literally', () => {
    expect(countOccurrences('ci/cd pipelines and ci/cd tooling', 'ci/cd')).toBe(2);
    expect(countOccurrences('we use next.js daily', 'next.js')).toBe(1);
    expect(countOccurrences('nextxjs', 'next.js')).toBe(0);
  });

  it('matches keywords that end in punctuation as standalone tokens', () => {
    expect(countOccurrences('senior c++ developer', 'c++')).toBe(1);
    expect(countOccurrences('abc++ developer', 'c++')).toBe(0);
  });

  it('is case-insensitive on the keyword', () => {
    expect(countOccurrences('kubernetes and more kubernetes', 'Kubernetes')).toBe(2);
  });

  it('treats non-ASCII letters as word characters', () => {
    expect(countOccurrences('erfarenhet av drift och förvaltning', 'drift')).toBe(1);
    expect(countOccurrences('driftö', 'drift')).toBe(0);
    expect(countOccurrences('utvecklare för molnet', 'för')).toBe(1);
  });
});

describe('countKeyword', () => {
  it('reports non-string keywords as a typed failure', () => {
    expect(countKeyword('react', 42)).toEqual({ ok: false, keyword: '42', reason: 'not-a-string' });
  });

  it('reports whitespace-only keywords as empty', () => {
    expect(countKeyword('react', '   ')).toEqual({ ok: false, keyword: '   ', reason: 'empty' });
  });

  it('returns the count on success', () => {
    expect(countKeyword('react and react native', 'react')).toEqual({ ok: true, keyword: 'react', count: 2 });
  });
});

describe('extractKeywords', () => {
  const jobDescription = `
    We are looking for a Full-Stack Developer with experience in React, TypeScript,
    and cloud technologies. You should have strong full stack development skills
    and experience with fullstack projects. Knowledge of cloud platforms is essential.
  `;

  it('counts each keyword and omits the ones not found', () => {
    const counts = extractKeywords(jobDescription, [
      'full-stack',
      'fullstack',
      'full stack',
      'react',
      'typescript',
      'cloud',
      'python',
    ]);

    expect(counts).toEqual({
      'full-stack': 1,
      fullstack: 1,
      'full stack': 1,
      react: 1,
      typescript: 1,
      cloud: 2,
    });
    expect(counts).not.toHaveProperty('python');
  });

  it('returns an empty map for empty text or keyword list', () => {
    expect(extractKeywords('', ['react'])).toEqual({});
    expect(extractKeywords(undefined, ['react'])).toEqual({});
    expect(extractKeywords('react', [])).toEqual({});
  });

  it('keys results by the keyword as configured', () => {
    expect(extractKeywords('Site Reliability engineer', ['Site   Reliability'])).toEqual({
      'Site   Reliability': 1,
    });
  });

  it('counts overlapping keywords independently', () => {
    expect(
      extractKeywords('we need a site reliability engineer for our website', ['site', 'site reliability', 'website'])
    ).toEqual({ site: 1, 'site reliability': 1, website: 1 });
  });

  it('skips bad keywords and keeps going', () => {
    const { counts, skipped } = extractKeywordDetails('react and kotlin', ['react', 42, '', '   ', null, 'kotlin']);

    expect(counts).toEqual({ react: 1, kotlin: 1 });
    expect(skipped).toEqual([
      { keyword: '42', reason: 'not-a-string' },
      { keyword: '   ', reason: 'empty' },
    ]);
  });
});

describe('identifyRoleIndicators', () => {
  it('returns a keyword map for every category with keywords', () => {
    const indicators = identifyRoleIndicators('Android developer using Kotlin', sampleRegistry());

    expect(indicators).toEqual({
      android_developer: { android: 1, kotlin: 1 },
      fullstack_developer: {},
      devops_cloud: {},
      backend_developer: {},
    });
  });

  it('leaves out categories without keywords', () => {
    const registry = makeRegistry([
      { key: 'devops_cloud', priority: 4, keywords: ['devops'] },
      { key: 'placeholder', priority: 9, keywords: [] },
    ]);

    const indicators = identifyRoleIndicators('devops', registry);

    expect(indicators).toEqual({ devops_cloud: { devops: 1 } });
    expect(indicators).not.toHaveProperty('placeholder');
  });

  it('returns an empty map for empty text', () => {
    expect(identifyRoleIndicators('', sampleRegistry())).toEqual({});
  });
});
