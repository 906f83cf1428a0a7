/**
 * Profile Analyzer
 *
 * Condenses the ingested profile into a structured capability summary, and
 * optionally asks the model for a qualitative comparison with the job.
 *
 * The model sees only ingested data and is told never to add to it. Its
 * output is descriptive: nothing it returns enters the evidence index.
 */

import { z } from 'zod';
import type { LLMCompleter } from '../../shared/llm/types';
import { buildPromptSections, formatList, truncateText, PromptSection } from '../../shared/llm/prompts';
import { LenientStringListSchema, LenientStringSchema } from '../../shared/validation/schemas';
import { createComponentLogger } from '../../shared/logging/logger';
import { OptimizerErrorFactory } from '../errors/types';
import type { RunLog } from '../logging/runLog';
import type {
  CapabilitySummary,
  JobPosting,
  Profile,
  ProfileReview,
  ReviewRecommendation
} from '../types';

const log = createComponentLogger('profile-analyzer');

const MAX_REPOSITORIES = 10;
const MAX_LANGUAGES = 15;
const MAX_PUBLICATIONS = 5;
const MAX_POSITIONS = 5;
const MAX_STATEMENTS = 40;

export const EMPTY_CAPABILITY_SUMMARY: CapabilitySummary = {
  coreSkills: [],
  technologies: [],
  experiences: [],
  projects: [],
  achievements: [],
  domainExpertise: [],
  education: 'Not specified'
};

const CAPABILITY_SYSTEM_PROMPT = `You are an expert at analyzing professional profiles. Extract and structure key capabilities from a user's profile.

Analyze the profile data (GitHub repositories, work experience, publications, capability statements) and extract:
- core_skills: Technical skills and programming languages the user is proficient in
- technologies: Frameworks, tools, platforms they've worked with
- experiences: Key work experiences and achievements
- projects: Notable projects and their technologies
- achievements: Quantifiable achievements, metrics, impact
- domain_expertise: Areas of expertise (e.g., "Machine Learning", "Full-stack Development")
- education_background: Educational qualifications if available

Use only what the profile states. Never invent skills, projects, employers or metrics.

Return ONLY valid JSON, no other text.`;

const REVIEW_SYSTEM_PROMPT = `You are an expert at matching candidate profiles with job requirements.
Analyze what the candidate has vs what the job requires, and provide actionable recommendations.

Compare:
1. Strengths: What does the candidate excel at that's relevant?
2. Missing skills: What required skills are missing?
3. Recommendations: What should be emphasized, added or rewritten in the resume?
4. Evidence: Specific examples from the profile that support each recommendation

IMPORTANT: Only recommend additions that have supporting evidence in the profile. Never invent skills or experiences.

Return ONLY valid JSON, no other text.`;

const CapabilityReplySchema = z.object({
  core_skills: LenientStringListSchema,
  technologies: LenientStringListSchema,
  experiences: LenientStringListSchema,
  projects: LenientStringListSchema,
  achievements: LenientStringListSchema,
  domain_expertise: LenientStringListSchema,
  education_background: LenientStringSchema
});

const ReviewRecommendationSchema = z.object({
  action: z.preprocess(
    value => (typeof value === 'string' ? value.trim().toUpperCase() : value),
    z.enum(['EMPHASIZE', 'ADD', 'REWRITE'])
  ),
  skill_or_topic: z.string().trim().min(1),
  evidence: z.string().default(''),
  suggestion: z.string().default('')
});

const ReviewReplySchema = z.object({
  strengths: LenientStringListSchema,
  missing_skills: LenientStringListSchema,
  recommendations: z.unknown().transform(value => {
    const recommendations: ReviewRecommendation[] = [];
    for (const item of Array.isArray(value) ? value : []) {
      const parsed = ReviewRecommendationSchema.safeParse(item);
      if (parsed.success) {
        recommendations.push({
          action: parsed.data.action,
          topic: parsed.data.skill_or_topic,
          evidence: parsed.data.evidence.trim(),
          suggestion: parsed.data.suggestion.trim()
        });
      }
    }
    return recommendations;
  }),
  match_score: z.unknown().transform(normalizeReviewScore)
});

/**
 * Coerce a model-reported score to [0, 100]. Fractions are read as ratios.
 */
export function normalizeReviewScore(value: unknown): number {
  const numeric = typeof value === 'string' ? parseFloat(value) : value;
  if (typeof numeric !== 'number' || !Number.isFinite(numeric)) {
    return 0;
  }
  const scaled = numeric > 0 && numeric <= 1 ? numeric * 100 : numeric;
  return Math.max(0, Math.min(100, Math.round(scaled)));
}

/**
 * Plain-text digest of the profile handed to the model
 */
export function buildProfileDigest(profile: Profile): string {
  const sections: PromptSection[] = [];
  const { github, scholar, linkedin } = profile.raw;

  if (github && github.repositories.length > 0) {
    const repositories = github.repositories.slice(0, MAX_REPOSITORIES).map(repo => {
      let line = `${repo.name}: ${repo.description ?? ''}`.trim();
      if (repo.language) line += ` (Language: ${repo.language})`;
      if (repo.readmeBullets.length > 0) line += ` Key points: ${repo.readmeBullets.slice(0, 3).join(', ')}`;
      return line;
    });
    sections.push({ label: 'GitHub repositories', body: formatList(repositories) });

    const languages = Object.keys(github.languages).slice(0, MAX_LANGUAGES);
    sections.push({ label: 'Programming languages', body: languages.join(', ') });
  }

  if (linkedin && linkedin.positions.length > 0) {
    const positions = linkedin.positions.slice(0, MAX_POSITIONS).map(position =>
      position.description
        ? `${position.title} at ${position.company}: ${position.description}`
        : `${position.title} at ${position.company}`
    );
    sections.push({ label: 'Work experience', body: formatList(positions) });
  }
  if (linkedin && linkedin.education.length > 0) {
    sections.push({ label: 'Education', body: formatList(linkedin.education) });
  }

  if (scholar && scholar.publications.length > 0) {
    const publications = scholar.publications.slice(0, MAX_PUBLICATIONS).map(publication => {
      let line = `${publication.title} (${publication.venue ?? ''})`;
      if (publication.citations > 0) line += ` - ${publication.citations} citations`;
      return line;
    });
    sections.push({ label: 'Publications', body: formatList(publications) });
  }

  sections.push({
    label: 'Capability statements',
    body: formatList(profile.statements.slice(0, MAX_STATEMENTS).map(statement => statement.text))
  });

  return buildPromptSections(sections);
}

export class ProfileAnalyzer {
  constructor(
    private readonly llm: LLMCompleter,
    private readonly runLog?: RunLog
  ) {}

  async analyzeCapabilities(profile: Profile): Promise<CapabilitySummary> {
    if (profile.statements.length === 0) {
      log.info('Empty profile, skipping capability analysis');
      return { ...EMPTY_CAPABILITY_SUMMARY };
    }

    const userPrompt = `Analyze this professional profile and extract structured capabilities:

${buildProfileDigest(profile)}

Return a JSON object with these keys:
{
  "core_skills": ["skill1", "skill2"],
  "technologies": ["tech1", "tech2"],
  "experiences": ["experience1", "experience2"],
  "projects": ["project1", "project2"],
  "achievements": ["achievement1 with metrics"],
  "domain_expertise": ["domain1", "domain2"],
  "education_background": "..."
}`;

    const reply = await this.ask(CAPABILITY_SYSTEM_PROMPT, userPrompt, 0.2, 'capability summary');
    const parsed = CapabilityReplySchema.safeParse(reply);
    if (!parsed.success) {
      throw OptimizerErrorFactory.malformedReply(
        'profile-analyzer',
        `Capability summary does not match the expected shape: ${parsed.error.errors[0]?.message ?? 'unknown'}`
      );
    }

    const summary: CapabilitySummary = {
      coreSkills: parsed.data.core_skills,
      technologies: parsed.data.technologies,
      experiences: parsed.data.experiences,
      projects: parsed.data.projects,
      achievements: parsed.data.achievements,
      domainExpertise: parsed.data.domain_expertise,
      education: parsed.data.education_background ?? EMPTY_CAPABILITY_SUMMARY.education
    };

    log.info(
      { skills: summary.coreSkills.length, projects: summary.projects.length },
      'Profile analyzed'
    );
    return summary;
  }

  /**
   * Qualitative comparison of the summary with the job. Informational only.
   */
  async reviewMatch(summary: CapabilitySummary, job: JobPosting): Promise<ProfileReview> {
    const requiredSkills = job.requirements.map(requirement => requirement.skill);
    const userPrompt = `Match this candidate profile with the job requirements:

${buildPromptSections([
  {
    label: 'Candidate profile capabilities',
    body: [
      `Core Skills: ${summary.coreSkills.join(', ')}`,
      `Technologies: ${summary.technologies.join(', ')}`,
      `Domain Expertise: ${summary.domainExpertise.join(', ')}`,
      `Key Experiences: ${summary.experiences.join('; ')}`,
      `Projects: ${summary.projects.join('; ')}`,
      `Achievements: ${summary.achievements.join('; ')}`
    ].join('\n')
  },
  {
    label: 'Job requirements',
    body: [
      `Role: ${job.role}`,
      `Required Skills: ${requiredSkills.join(', ')}`,
      `Responsibilities: ${truncateText(job.responsibilities.join('; '), 1500)}`,
      `Requirements: ${truncateText(job.requirements.map(requirement => requirement.text).join('; '), 2500)}`
    ].join('\n')
  }
])}

Analyze and return JSON with:
{
  "strengths": ["strength1", "strength2"],
  "missing_skills": ["skill1", "skill2"],
  "recommendations": [
    {
      "action": "EMPHASIZE" or "ADD" or "REWRITE",
      "skill_or_topic": "...",
      "evidence": "specific example from profile",
      "suggestion": "how to phrase it in resume"
    }
  ],
  "match_score": 0-100
}`;

    const reply = await this.ask(REVIEW_SYSTEM_PROMPT, userPrompt, 0.3, 'match review');
    const parsed = ReviewReplySchema.safeParse(reply);
    if (!parsed.success) {
      throw OptimizerErrorFactory.malformedReply(
        'profile-analyzer',
        `Match review does not match the expected shape: ${parsed.error.errors[0]?.message ?? 'unknown'}`
      );
    }

    return {
      strengths: parsed.data.strengths,
      missingSkills: parsed.data.missing_skills,
      recommendations: parsed.data.recommendations,
      llmMatchScore: parsed.data.match_score
    };
  }

  private async ask(systemPrompt: string, userPrompt: string, temperature: number, purpose: string): Promise<unknown> {
    const started = Date.now();
    let content: string;
    try {
      const response = await this.llm.complete({
        systemPrompt,
        messages: [{ role: 'user', content: userPrompt }],
        temperature,
        maxTokens: 2000
      });
      content = response.content;
    } catch (error) {
      throw OptimizerErrorFactory.llmFailed('profile-analyzer', error);
    }
    this.runLog?.logLLMCall('profile-analyzer', purpose, Date.now() - started);

    try {
      return this.llm.parseJsonResponse(content);
    } catch (error) {
      throw OptimizerErrorFactory.malformedReply(
        'profile-analyzer',
        error instanceof Error ? error.message : String(error),
        error
      );
    }
  }
}
