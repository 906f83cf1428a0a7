/**
 * Rewrite Engine
 *
 * Produces the text for REWRITE and ADD decisions. The model may only
 * rephrase: every fact has to come from the original bullet or the cited
 * profile evidence. Output is plain text, escaped here for LaTeX.
 */

import type { LLMCompleter } from '../../shared/llm/types';
import { buildPromptSections, formatList, truncateText } from '../../shared/llm/prompts';
import { createComponentLogger } from '../../shared/logging/logger';
import { OptimizerErrorFactory } from '../errors/types';
import type { RunLog } from '../logging/runLog';
import { keywordsForEmbedding } from '../parser/jobParser';
import type { DecisionRecord, JobPosting } from '../types';

const log = createComponentLogger('rewrite-engine');

const MAX_KEYWORD_CHARS = 600;
export const MAX_BULLET_WORDS = 30;

const REWRITE_SYSTEM_PROMPT = `You are an expert resume writer specializing in ATS (Applicant Tracking System) optimization.

Write one resume bullet point that:
1. Uses the job's keywords where the evidence supports them
2. Starts with a strong action verb
3. Is at most ${MAX_BULLET_WORDS} words

STRICT RULES:
- Use ONLY facts present in the ORIGINAL BULLET or the EVIDENCE. Never add a fact, metric, employer, technology or outcome that is not stated there.
- If the evidence does not support a keyword, leave the keyword out.
- Plain text only: no LaTeX commands, no markdown, no quotes, no leading bullet marker.

Return ONLY the bullet text, nothing else.`;

const LATEX_SPECIALS: Record<string, string> = {
  '\\': '\\textbackslash{}',
  '&': '\\&',
  '%': '\\%',
  $: '\\$',
  '#': '\\#',
  _: '\\_',
  '{': '\\{',
  '}': '\\}',
  '~': '\\textasciitilde{}',
  '^': '\\textasciicircum{}'
};

/**
 * Escape characters with special meaning in LaTeX
 */
export function escapeLatex(text: string): string {
  return text.replace(/[\\&%$#_{}~^]/g, char => LATEX_SPECIALS[char] ?? char);
}

/**
 * Strip what models wrap around a bullet: quotes, markers, extra whitespace
 */
export function cleanBulletText(text: string): string {
  let cleaned = text.replace(/\s+/g, ' ').trim();
  cleaned = cleaned.replace(/^(?:\\item\s*|[-*\u2022]\s+|\d+[.)]\s+)+/, '').trim();

  const quotePairs: Array<[string, string]> = [['"', '"'], ["'", "'"], ['\u201C', '\u201D'], ['`', '`']];
  for (const [open, close] of quotePairs) {
    if (cleaned.length >= 2 && cleaned.startsWith(open) && cleaned.endsWith(close)) {
      cleaned = cleaned.slice(open.length, cleaned.length - close.length).trim();
    }
  }

  return cleaned;
}

/**
 * Model reply to a LaTeX-safe bullet body
 */
export function sanitizeRewrite(text: string): string {
  return escapeLatex(cleanBulletText(text));
}

export function buildRewritePrompt(record: DecisionRecord, job: JobPosting): string {
  const task = record.decision === 'ADD'
    ? 'Write a NEW resume bullet that addresses the job requirement below, using only the evidence.'
    : 'Rewrite the resume bullet below so it addresses the job requirement, using only the bullet and the evidence.';

  return buildPromptSections([
    { label: 'Task', body: task },
    { label: 'Original bullet', body: record.originalText ?? '' },
    { label: 'Job requirement', body: record.requirementText ?? '' },
    { label: 'Job keywords', body: truncateText(keywordsForEmbedding(job), MAX_KEYWORD_CHARS) },
    { label: 'Evidence', body: formatList(record.evidence.map(ref => ref.text), true) }
  ]);
}

/** Sampling settings for rewrite calls; `llm.temperature` and `llm.maxTokens` in production */
export interface RewriteGeneration {
  temperature: number;
  maxTokens: number;
}

export const DEFAULT_REWRITE_GENERATION: RewriteGeneration = {
  temperature: 0.3,
  maxTokens: 300
};

export class RewriteEngine {
  constructor(
    private readonly llm: LLMCompleter,
    private readonly runLog?: RunLog,
    private readonly generation: RewriteGeneration = DEFAULT_REWRITE_GENERATION
  ) {}

  /**
   * Text for one REWRITE or ADD decision, escaped for LaTeX
   */
  async rewrite(record: DecisionRecord, job: JobPosting): Promise<string> {
    const target = record.originalText ?? record.requirementText ?? record.bulletId ?? 'unknown';
    if (record.evidence.length === 0) {
      throw OptimizerErrorFactory.missingEvidence(record.decision, target);
    }

    const started = Date.now();
    let content: string;
    try {
      const response = await this.llm.complete({
        systemPrompt: REWRITE_SYSTEM_PROMPT,
        messages: [{ role: 'user', content: buildRewritePrompt(record, job) }],
        temperature: this.generation.temperature,
        maxTokens: this.generation.maxTokens
      });
      content = response.content;
    } catch (error) {
      throw OptimizerErrorFactory.llmFailed('rewrite-engine', error);
    }
    this.runLog?.logLLMCall('rewrite-engine', `${record.decision} ${record.bulletId ?? record.requirementId ?? ''}`.trim(), Date.now() - started);

    const sanitized = sanitizeRewrite(content);
    if (!sanitized) {
      throw OptimizerErrorFactory.malformedReply('rewrite-engine', `Empty rewrite for "${target}"`);
    }

    const words = sanitized.split(' ').length;
    if (words > MAX_BULLET_WORDS) {
      log.warn({ words, target }, 'Rewrite exceeds the word limit');
    }
    return sanitized;
  }

  /**
   * Fill `rewrittenText` on every REWRITE and ADD record, in order
   */
  async rewriteAll(decisions: DecisionRecord[], job: JobPosting): Promise<DecisionRecord[]> {
    const results: DecisionRecord[] = [];
    for (const record of decisions) {
      if (record.decision === 'REWRITE' || record.decision === 'ADD') {
        results.push({ ...record, rewrittenText: await this.rewrite(record, job) });
      } else {
        results.push(record);
      }
    }
    return results;
  }
}
