/**
 * Job Description Parser
 *
 * Accepts a posting URL or raw posting text and produces a JobPosting whose
 * requirements are the unit the alignment engine scores against.
 */

import { z } from 'zod';
import type { LLMCompleter, LLMRequest } from '../../shared/llm/types';
import { truncateText } from '../../shared/llm/prompts';
import { LenientStringListSchema, LenientStringSchema } from '../../shared/validation/schemas';
import { createComponentLogger } from '../../shared/logging/logger';
import { OptimizerErrorFactory } from '../errors/types';
import { HttpClient } from '../http/httpClient';
import type { RunLog } from '../logging/runLog';
import type { ExtractionMethod, JobPosting, JobRequirement, RequirementKind } from '../types';
import { extractJobText, ExtractedJobText } from './htmlExtractor';
import { normalizeText, prepareForParsing } from './textNormalizer';

const log = createComponentLogger('job-parser');

export const MAX_JOB_TEXT_LENGTH = 12000;
export const MAX_REQUIREMENTS = 40;
export const MAX_RESPONSIBILITIES = 30;
export const MAX_KEYWORDS = 50;
const MAX_REQUIREMENT_KEYWORDS = 10;

const NOT_SPECIFIED = /^(not specified|unknown|n\/a|none)$/i;

const JOB_PARSING_SYSTEM_PROMPT = `You are an expert at parsing job descriptions. Extract structured information from job postings and return valid JSON.

Extract the following fields:
- role: Job title/position (e.g., "Senior Software Engineer")
- company: Company name (or "Not specified" if not mentioned)
- location: Job location (e.g., "San Francisco, CA" or "Remote")
- experience_level: One of "Entry-level", "Mid-level", "Senior", "Executive", or "Not specified"
- education: Education requirement like "Bachelor's", "Master's", "PhD", or "Not specified"
- responsibilities: List of job responsibilities and duties (as separate items)
- keywords: Important keywords and phrases relevant to the role (skills, technologies, domain terms)
- requirements: One entry per distinct qualification the candidate must or should have:
  - text: the requirement as a short standalone statement
  - skill: the core skill or qualification it names, in 1-4 words
  - kind: "required" for must-haves; "preferred" for nice-to-have, bonus or "a plus" items
  - keywords: the technologies or terms a resume line would need to mention to satisfy it
  - source_text: the sentence of the posting it was taken from

Only use what the posting says. Return ONLY valid JSON, no other text.`;

const RequirementItemSchema = z.union([
  z.string().trim().min(1).transform(text => ({ text, skill: text, kind: 'required' as const, keywords: [], source_text: text })),
  z.object({
    text: z.string().trim().min(1),
    skill: LenientStringSchema,
    kind: z.unknown().transform((value): RequirementKind =>
      typeof value === 'string' && /prefer|nice|bonus|plus|optional/i.test(value) ? 'preferred' : 'required'
    ),
    keywords: LenientStringListSchema,
    source_text: LenientStringSchema
  })
]);

const JobReplySchema = z.object({
  role: LenientStringSchema,
  company: LenientStringSchema,
  location: LenientStringSchema,
  experience_level: LenientStringSchema,
  education: LenientStringSchema,
  responsibilities: LenientStringListSchema,
  keywords: LenientStringListSchema,
  requirements: z.unknown().transform(value => {
    const items: Array<z.output<typeof RequirementItemSchema>> = [];
    for (const item of Array.isArray(value) ? value : []) {
      const parsed = RequirementItemSchema.safeParse(item);
      if (parsed.success) items.push(parsed.data);
    }
    return items;
  })
});

type RequirementItem = z.output<typeof RequirementItemSchema>;

/**
 * True for absolute http(s) URLs
 */
export function isUrl(source: string): boolean {
  try {
    const url = new URL(source.trim());
    return url.protocol === 'http:' || url.protocol === 'https:';
  } catch {
    return false;
  }
}

function specified(value: string | undefined): string | undefined {
  return value && !NOT_SPECIFIED.test(value) ? value : undefined;
}

function uniqueCaseInsensitive(values: string[], limit: number): string[] {
  const seen = new Set<string>();
  const result: string[] = [];
  for (const value of values) {
    const key = value.toLowerCase();
    if (seen.has(key)) continue;
    seen.add(key);
    result.push(value);
    if (result.length >= limit) break;
  }
  return result;
}

/**
 * Merge requirements with the same normalized text. The first occurrence
 * keeps its position; `required` wins over `preferred`; keywords are unioned.
 */
export function deduplicateRequirements(items: RequirementItem[]): Omit<JobRequirement, 'id'>[] {
  const byKey = new Map<string, Omit<JobRequirement, 'id'>>();

  for (const item of items) {
    const key = normalizeText(item.text);
    if (!key) continue;

    const existing = byKey.get(key);
    if (existing) {
      if (item.kind === 'required') existing.kind = 'required';
      existing.keywords = uniqueCaseInsensitive([...existing.keywords, ...item.keywords], MAX_REQUIREMENT_KEYWORDS);
      continue;
    }

    byKey.set(key, {
      text: item.text,
      skill: item.skill ?? item.text,
      kind: item.kind,
      keywords: uniqueCaseInsensitive(item.keywords, MAX_REQUIREMENT_KEYWORDS),
      sourceText: item.source_text ?? item.text
    });
  }

  return [...byKey.values()];
}

/**
 * Role, requirement skills and keywords as one string for prompts
 */
export function keywordsForEmbedding(job: JobPosting): string {
  const skills = job.requirements.map(requirement => requirement.skill);
  return uniqueCaseInsensitive([job.role, ...skills, ...job.keywords], MAX_KEYWORDS + MAX_REQUIREMENTS + 1).join(', ');
}

export class JobParser {
  constructor(
    private readonly llm: LLMCompleter,
    private readonly http: HttpClient,
    private readonly runLog?: RunLog
  ) {}

  /**
   * Parse a posting given as a URL or as its text
   */
  async parse(source: string): Promise<JobPosting> {
    if (isUrl(source)) {
      const url = source.trim();
      const extracted = await this.fetchJobText(url);
      return this.parseText(extracted.text, { sourceUrl: url, extraction: extracted.method });
    }
    return this.parseText(source, { extraction: 'text' });
  }

  async fetchJobText(url: string): Promise<ExtractedJobText> {
    let html: string;
    try {
      html = await this.http.getText(url);
    } catch (error) {
      throw OptimizerErrorFactory.jobFetchFailed(url, error instanceof Error ? error.message : String(error), error);
    }

    const extracted = extractJobText(html, url);
    log.info({ url, method: extracted.method, length: extracted.text.length }, 'Job text extracted');
    return extracted;
  }

  async parseText(
    text: string,
    options: { sourceUrl?: string; extraction: ExtractionMethod }
  ): Promise<JobPosting> {
    const prepared = prepareForParsing(text);
    if (prepared.length === 0) {
      throw OptimizerErrorFactory.jobExtractionFailed(
        options.sourceUrl
          ? `No text found on ${options.sourceUrl} (extraction: ${options.extraction})`
          : 'The job description is empty'
      );
    }

    const reply = await this.extract(truncateText(prepared, MAX_JOB_TEXT_LENGTH));
    const parsed = JobReplySchema.safeParse(reply);
    if (!parsed.success) {
      throw OptimizerErrorFactory.malformedReply(
        'job-parser',
        `Job reply does not match the expected shape: ${parsed.error.errors[0]?.message ?? 'unknown'}`
      );
    }

    const requirements: JobRequirement[] = deduplicateRequirements(parsed.data.requirements)
      .slice(0, MAX_REQUIREMENTS)
      .map((requirement, index) => ({ id: `req-${index + 1}`, ...requirement }));

    if (requirements.length === 0) {
      throw OptimizerErrorFactory.jobExtractionFailed('The model found no requirements in the job description');
    }

    const job: JobPosting = {
      role: specified(parsed.data.role) ?? 'Unknown Role',
      company: specified(parsed.data.company),
      location: specified(parsed.data.location),
      experienceLevel: specified(parsed.data.experience_level),
      education: specified(parsed.data.education),
      responsibilities: parsed.data.responsibilities.slice(0, MAX_RESPONSIBILITIES),
      keywords: uniqueCaseInsensitive(parsed.data.keywords, MAX_KEYWORDS),
      requirements,
      rawText: prepared,
      sourceUrl: options.sourceUrl,
      extraction: options.extraction
    };

    log.info(
      {
        role: job.role,
        company: job.company,
        requirements: requirements.length,
        required: requirements.filter(requirement => requirement.kind === 'required').length
      },
      'Job description parsed'
    );
    return job;
  }

  private async extract(text: string): Promise<unknown> {
    const request: LLMRequest = {
      systemPrompt: JOB_PARSING_SYSTEM_PROMPT,
      messages: [
        {
          role: 'user',
          content: `Parse this job description and extract structured information:

${text}

Return the result as a JSON object with these exact keys:
{
  "role": "...",
  "company": "...",
  "location": "...",
  "experience_level": "...",
  "education": "...",
  "responsibilities": ["responsibility1", "responsibility2"],
  "keywords": ["keyword1", "keyword2"],
  "requirements": [
    { "text": "...", "skill": "...", "kind": "required", "keywords": ["..."], "source_text": "..." }
  ]
}`
        }
      ],
      temperature: 0.1,
      maxTokens: 4096
    };

    const started = Date.now();
    let content: string;
    try {
      content = (await this.llm.complete(request)).content;
    } catch (error) {
      throw OptimizerErrorFactory.llmFailed('job-parser', error);
    }
    this.runLog?.logLLMCall('job-parser', 'job extraction', Date.now() - started);

    try {
      return this.llm.parseJsonResponse(content);
    } catch (error) {
      throw OptimizerErrorFactory.malformedReply(
        'job-parser',
        error instanceof Error ? error.message : String(error),
        error
      );
    }
  }
}
