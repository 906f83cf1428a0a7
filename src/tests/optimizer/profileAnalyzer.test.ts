/**
 * Tests for the profile analyzer
 */

import { describe, it, expect } from 'vitest';
import {
  ProfileAnalyzer,
  EMPTY_CAPABILITY_SUMMARY,
  buildProfileDigest,
  normalizeReviewScore
} from '../../optimizer/analyzer/profileAnalyzer';
import { ExternalServiceError, OptimizerErrorCode } from '../../optimizer/errors/types';
import { LogType, RunLog } from '../../optimizer/logging/runLog';
import type { JobPosting, Profile } from '../../optimizer/types';
import { StubLLMClient } from '../helpers/stubs';

const PROFILE: Profile = {
  statements: [
    {
      id: 'github-1',
      text: 'Built graph-db: A graph database',
      skill: 'Rust',
      source: 'github',
      provenance: { kind: 'repository', reference: 'graph-db' }
    }
  ],
  sources: [{ source: 'github', status: 'ok', statementCount: 1 }],
  raw: {
    github: {
      username: 'octo',
      repositories: [
        {
          name: 'graph-db',
          description: 'A graph database',
          language: 'Rust',
          url: 'https://github.com/octo/graph-db',
          stars: 3,
          topics: [],
          readmeBullets: ['Implements MVCC']
        }
      ],
      languages: { Rust: 1 }
    }
  },
  ingestedAt: '2026-01-01T00:00:00.000Z'
};

const JOB: JobPosting = {
  role: 'Backend Engineer',
  responsibilities: ['Build APIs'],
  keywords: ['rust'],
  requirements: [
    {
      id: 'req-1',
      text: 'Experience with Rust',
      skill: 'Rust',
      kind: 'required',
      keywords: ['rust'],
      sourceText: 'Experience with Rust'
    }
  ],
  rawText: 'Backend Engineer. Experience with Rust.',
  extraction: 'text'
};

const SUMMARY = {
  ...EMPTY_CAPABILITY_SUMMARY,
  coreSkills: ['Rust'],
  projects: ['graph-db']
};

describe('buildProfileDigest', () => {
  it('should render labelled sections from the raw profile', () => {
    expect(buildProfileDigest(PROFILE)).toBe([
      'GITHUB REPOSITORIES:',
      '- graph-db: A graph database (Language: Rust) Key points: Implements MVCC',
      '',
      'PROGRAMMING LANGUAGES:',
      'Rust',
      '',
      'CAPABILITY STATEMENTS:',
      '- Built graph-db: A graph database'
    ].join('\n'));
  });
});

describe('normalizeReviewScore', () => {
  it.each([
    [85, 85],
    ['85', 85],
    [0.72, 72],
    [1, 100],
    [150, 100],
    [-5, 0],
    ['high', 0],
    [undefined, 0]
  ])('should map %s to %s', (input, expected) => {
    expect(normalizeReviewScore(input)).toBe(expected);
  });
});

describe('ProfileAnalyzer', () => {
  describe('analyzeCapabilities', () => {
    it('should not call the model for an empty profile', async () => {
      const llm = new StubLLMClient();
      const summary = await new ProfileAnalyzer(llm).analyzeCapabilities({ ...PROFILE, statements: [] });

      expect(summary).toEqual(EMPTY_CAPABILITY_SUMMARY);
      expect(llm.calls).toHaveLength(0);
    });

    it('should map the reply and drop unusable members', async () => {
      const llm = new StubLLMClient({
        capabilities: {
          core_skills: ['Rust', 7, '  '],
          technologies: ['PostgreSQL'],
          experiences: 'not a list',
          projects: ['graph-db'],
          achievements: [],
          domain_expertise: ['Databases']
        }
      });
      const runLog = new RunLog('run');

      const summary = await new ProfileAnalyzer(llm, runLog).analyzeCapabilities(PROFILE);

      expect(summary).toEqual({
        coreSkills: ['Rust'],
        technologies: ['PostgreSQL'],
        experiences: [],
        projects: ['graph-db'],
        achievements: [],
        domainExpertise: ['Databases'],
        education: 'Not specified'
      });
      expect(llm.callsTo('capabilities')[0].messages[0].content)
        .toContain('CAPABILITY STATEMENTS:\n- Built graph-db: A graph database');
      expect(runLog.getEntries(LogType.LLM)[0].message).toBe('profile-analyzer: capability summary');
    });

    it('should accept fenced replies', async () => {
      const llm = new StubLLMClient({
        capabilities: '```json\n{"core_skills": ["Go"], "education_background": "BSc Computer Science"}\n```'
      });
      const summary = await new ProfileAnalyzer(llm).analyzeCapabilities(PROFILE);

      expect(summary.coreSkills).toEqual(['Go']);
      expect(summary.education).toBe('BSc Computer Science');
    });

    it('should wrap provider failures', async () => {
      const llm = new StubLLMClient({ capabilities: Object.assign(new Error('rate limited'), { status: 429 }) });

      const error = await new ProfileAnalyzer(llm).analyzeCapabilities(PROFILE).catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(ExternalServiceError);
      expect(error).toMatchObject({
        code: OptimizerErrorCode.LLM_REQUEST_FAILED,
        component: 'profile-analyzer',
        statusCode: 429,
        technicalDetails: 'rate limited'
      });
    });

    it('should reject replies of the wrong shape', async () => {
      const llm = new StubLLMClient({ capabilities: '[1, 2]' });

      await expect(new ProfileAnalyzer(llm).analyzeCapabilities(PROFILE)).rejects.toMatchObject({
        code: OptimizerErrorCode.MALFORMED_MODEL_REPLY,
        component: 'profile-analyzer'
      });
    });
  });

  describe('reviewMatch', () => {
    it('should keep only well-formed recommendations', async () => {
      const llm = new StubLLMClient({
        review: {
          strengths: ['Rust systems work'],
          missing_skills: ['Kubernetes'],
          recommendations: [
            { action: 'emphasize', skill_or_topic: 'Rust', evidence: ' graph-db ', suggestion: 'Lead with it' },
            { action: 'DELETE', skill_or_topic: 'PHP' },
            { action: 'ADD', skill_or_topic: '' }
          ],
          match_score: 0.72
        }
      });

      const review = await new ProfileAnalyzer(llm).reviewMatch(SUMMARY, JOB);

      expect(review).toEqual({
        strengths: ['Rust systems work'],
        missingSkills: ['Kubernetes'],
        recommendations: [{ action: 'EMPHASIZE', topic: 'Rust', evidence: 'graph-db', suggestion: 'Lead with it' }],
        llmMatchScore: 72
      });
      const prompt = llm.callsTo('review')[0].messages[0].content;
      expect(prompt).toContain('Required Skills: Rust');
      expect(prompt).toContain('Core Skills: Rust');
    });

    it('should default missing fields', async () => {
      const llm = new StubLLMClient({ review: {} });
      const review = await new ProfileAnalyzer(llm).reviewMatch(SUMMARY, JOB);

      expect(review).toEqual({ strengths: [], missingSkills: [], recommendations: [], llmMatchScore: 0 });
    });
  });
});
