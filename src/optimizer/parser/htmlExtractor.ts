/**
 * Job Page Extraction
 *
 * Pulls the job description out of a downloaded posting page. Known boards
 * are matched by hostname and read through their own selectors; anything
 * else falls back to common description containers, then to the page body.
 */

import * as cheerio from 'cheerio';
import type { ExtractionMethod } from '../types';

export type JobBoard = 'linkedin' | 'indeed' | 'glassdoor' | 'greenhouse' | 'lever';

interface BoardRule {
  board: JobBoard;
  hosts: string[];
  selectors: string[];
}

const BOARD_RULES: BoardRule[] = [
  {
    board: 'linkedin',
    hosts: ['linkedin.com'],
    selectors: [
      'div[class*="description__text"]',
      'div.show-more-less-html__markup',
      'section.jobs-description__content',
      'div[data-automation-id="jobPostingDescription"]'
    ]
  },
  {
    board: 'indeed',
    hosts: ['indeed.com'],
    selectors: ['#jobDescriptionText', 'div[data-testid="job-description"]', 'div.jobsearch-jobDescriptionText']
  },
  {
    board: 'glassdoor',
    hosts: ['glassdoor.com'],
    selectors: ['div[data-test="jobDescriptionText"]', 'div.jobDescriptionContent', 'div[class*="jobDescription"]']
  },
  {
    board: 'greenhouse',
    hosts: ['greenhouse.io'],
    selectors: ['div.job__description', '#content', 'div#app_body']
  },
  {
    board: 'lever',
    hosts: ['lever.co'],
    selectors: ['div[data-qa="job-description"]', 'div.posting-page', 'div.content']
  }
];

const GENERIC_SELECTORS = [
  '[class*="job-description"]',
  '[class*="description"]',
  '[id*="description"]',
  'article',
  'main',
  '[role="main"]'
];

const JOB_KEYWORDS = ['responsibilities', 'requirements', 'qualifications', 'job', 'position'];

const MIN_SITE_LENGTH = 200;
const MIN_GENERIC_LENGTH = 300;

const NOISE_SELECTOR = 'script, style, noscript, nav, footer, header';
const BLOCK_SELECTOR = 'p, div, li, ul, ol, section, article, h1, h2, h3, h4, h5, h6, tr';

export interface ExtractedJobText {
  text: string;
  method: ExtractionMethod;
}

/**
 * Board for a URL, matched on the hostname or any parent domain
 */
export function detectJobBoard(url: string): JobBoard | undefined {
  let hostname: string;
  try {
    hostname = new URL(url).hostname.toLowerCase();
  } catch {
    return undefined;
  }
  const rule = BOARD_RULES.find(candidate =>
    candidate.hosts.some(host => hostname === host || hostname.endsWith(`.${host}`))
  );
  return rule?.board;
}

function visibleText(raw: string): string {
  return raw
    .split('\n')
    .map(line => line.replace(/\s+/g, ' ').trim())
    .filter(line => line.length > 0)
    .join('\n');
}

function looksLikeJob(text: string): boolean {
  const lowered = text.toLowerCase();
  return JOB_KEYWORDS.some(keyword => lowered.includes(keyword));
}

export function extractJobText(html: string, url: string): ExtractedJobText {
  const $ = cheerio.load(html);
  $(NOISE_SELECTOR).remove();
  // line breaks at block boundaries so text() keeps the structure
  $('br').replaceWith('\n');
  $(BLOCK_SELECTOR).each((_, element) => {
    $(element).append('\n');
  });

  const board = detectJobBoard(url);
  const rule = BOARD_RULES.find(candidate => candidate.board === board);
  if (rule) {
    for (const selector of rule.selectors) {
      const text = visibleText($(selector).first().text());
      if (text.length > MIN_SITE_LENGTH) {
        return { text, method: `site:${rule.board}` };
      }
    }
  }

  for (const selector of GENERIC_SELECTORS) {
    for (const element of $(selector).toArray()) {
      const text = visibleText($(element).text());
      if (text.length > MIN_GENERIC_LENGTH && looksLikeJob(text)) {
        return { text, method: 'generic' };
      }
    }
  }

  const body = $('body');
  return { text: visibleText(body.length > 0 ? body.text() : $.root().text()), method: 'body' };
}
