/**
 * Google Scholar Profile Source
 *
 * Scrapes the public citations page of a Scholar profile. Scholar has no API;
 * the page layout is parsed with cheerio and a page without a profile header
 * or publication rows is treated as a failed fetch (blocked or unknown id).
 */

import * as cheerio from 'cheerio';
import { HttpClient } from '../http/httpClient';
import type { Publication, ScholarProfileData } from '../types';
import type { ProfileSource, SourceContribution, StatementDraft } from './types';

const SCHOLAR_BASE_URL = 'https://scholar.google.com';

export interface ScholarSourceConfig {
  profileId?: string;
  maxPublications: number;
}

/**
 * Parse a Scholar citations page
 */
export function parseScholarProfile(html: string, profileId: string, maxPublications: number): ScholarProfileData {
  const $ = cheerio.load(html);

  const name = $('#gsc_prf_in').first().text().trim() || undefined;
  const interests = $('#gsc_prf_int a')
    .map((_, element) => $(element).text().trim())
    .get()
    .filter(interest => interest.length > 0);

  const publications: Publication[] = [];
  $('tr.gsc_a_tr').each((_, row) => {
    if (publications.length >= maxPublications) return false;

    const titleLink = $(row).find('a.gsc_a_at').first();
    const title = titleLink.text().trim();
    if (!title) return;

    const grayLines = $(row).find('.gs_gray');
    const venueLine = grayLines.length > 1 ? $(grayLines[1]).text().trim() : '';
    const yearText = $(row).find('.gsc_a_y span, span.gsc_a_h').first().text().trim();
    const citationText = $(row).find('a.gsc_a_ac').first().text().trim();
    const href = titleLink.attr('href');

    const year = /^\d{4}$/.test(yearText) ? Number(yearText) : undefined;
    const venue = venueLine.replace(/,\s*\d{4}\s*$/, '').trim() || undefined;

    publications.push({
      title,
      venue,
      year,
      citations: /^\d+$/.test(citationText) ? Number(citationText) : 0,
      url: href ? new URL(href, SCHOLAR_BASE_URL).toString() : undefined
    });
    return;
  });

  if (!name && publications.length === 0) {
    throw new Error('No Scholar profile found on the page (unknown id or request blocked)');
  }

  return { profileId, name, interests, publications };
}

export class ScholarSource implements ProfileSource {
  readonly name = 'scholar' as const;

  constructor(
    private readonly config: ScholarSourceConfig,
    private readonly http: HttpClient
  ) {}

  isConfigured(): boolean {
    return Boolean(this.config.profileId);
  }

  async collect(): Promise<SourceContribution> {
    const profileId = this.config.profileId;
    if (!profileId) {
      throw new Error('Scholar profile id is not configured');
    }

    const url = `${SCHOLAR_BASE_URL}/citations?user=${encodeURIComponent(profileId)}&hl=en&cstart=0&pagesize=100`;
    const html = await this.http.getText(url);
    const data = parseScholarProfile(html, profileId, this.config.maxPublications);

    return {
      statements: this.toStatements(data),
      raw: { scholar: data }
    };
  }

  toStatements(data: ScholarProfileData): StatementDraft[] {
    const statements: StatementDraft[] = data.publications.map(publication => {
      let text = `Published '${publication.title}'`;
      if (publication.venue) text += ` in ${publication.venue}`;
      if (publication.year) text += ` (${publication.year})`;
      if (publication.citations > 0) {
        text += ` - ${publication.citations} citation${publication.citations === 1 ? '' : 's'}`;
      }
      return {
        text,
        provenance: { kind: 'publication', reference: publication.title, url: publication.url }
      };
    });

    if (data.interests.length > 0) {
      statements.push({
        text: `Research interests: ${data.interests.join(', ')}`,
        skill: data.interests[0],
        provenance: {
          kind: 'research-summary',
          reference: data.name ?? data.profileId,
          url: `${SCHOLAR_BASE_URL}/citations?user=${encodeURIComponent(data.profileId)}`
        }
      });
    }

    return statements;
  }
}
