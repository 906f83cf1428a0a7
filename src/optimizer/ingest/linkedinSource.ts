/**
 * LinkedIn Profile Source
 *
 * Reads the schema.org Person graph that public LinkedIn profile pages embed
 * as application/ld+json. Pages behind the sign-in wall carry no such graph;
 * that counts as a failed fetch and the run continues without this source.
 */

import * as cheerio from 'cheerio';
import { HttpClient } from '../http/httpClient';
import type { LinkedInPosition, LinkedInProfileData } from '../types';
import type { ProfileSource, SourceContribution, StatementDraft } from './types';

export interface LinkedInSourceConfig {
  profileUrl?: string;
}

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function asArray(value: unknown): unknown[] {
  if (value === undefined || value === null) return [];
  return Array.isArray(value) ? value : [value];
}

function asString(value: unknown): string | undefined {
  return typeof value === 'string' && value.trim().length > 0 ? value.trim() : undefined;
}

function hasType(node: JsonObject, type: string): boolean {
  return asArray(node['@type']).some(entry => entry === type);
}

/**
 * Depth-first search for the first Person node in a JSON-LD document
 */
function findPerson(node: unknown): JsonObject | undefined {
  if (Array.isArray(node)) {
    for (const child of node) {
      const found = findPerson(child);
      if (found) return found;
    }
    return undefined;
  }
  if (!isObject(node)) return undefined;
  if (hasType(node, 'Person')) return node;
  return findPerson(node['@graph']);
}

function nameOf(value: unknown): string | undefined {
  return isObject(value) ? asString(value.name) : asString(value);
}

/**
 * Extract profile data from a public profile page
 */
export function parseLinkedInProfile(html: string, profileUrl: string): LinkedInProfileData {
  const $ = cheerio.load(html);
  let person: JsonObject | undefined;

  for (const element of $('script[type="application/ld+json"]').toArray()) {
    try {
      person = findPerson(JSON.parse($(element).text()));
    } catch {
      // other embedded JSON-LD blocks may be malformed; keep looking
    }
    if (person) break;
  }

  if (!person) {
    throw new Error('No public profile data on the page (profile private or sign-in required)');
  }

  const jobTitles = asArray(person.jobTitle).map(asString);
  const positions: LinkedInPosition[] = [];

  asArray(person.worksFor).forEach((organization, index) => {
    const company = nameOf(organization);
    if (!company) return;
    const member = isObject(organization) && isObject(organization.member) ? organization.member : undefined;
    const title = asString(member?.roleName) ?? asString(member?.jobTitle) ?? jobTitles[index];
    positions.push({
      title: title ?? 'Member',
      company,
      description: asString(member?.description) ?? (isObject(organization) ? asString(organization.description) : undefined)
    });
  });

  const education = asArray(person.alumniOf)
    .map(nameOf)
    .filter((name): name is string => name !== undefined);

  const skills = asArray(person.knowsAbout)
    .map(nameOf)
    .filter((skill): skill is string => skill !== undefined);

  return {
    profileUrl,
    name: asString(person.name),
    headline: asString(person.description) ?? jobTitles.find((title): title is string => title !== undefined),
    positions,
    education,
    skills
  };
}

export class LinkedInSource implements ProfileSource {
  readonly name = 'linkedin' as const;

  constructor(
    private readonly config: LinkedInSourceConfig,
    private readonly http: HttpClient
  ) {}

  isConfigured(): boolean {
    return Boolean(this.config.profileUrl);
  }

  async collect(): Promise<SourceContribution> {
    const profileUrl = this.config.profileUrl;
    if (!profileUrl) {
      throw new Error('LinkedIn profile URL is not configured');
    }

    const html = await this.http.getText(profileUrl);
    const data = parseLinkedInProfile(html, profileUrl);

    return {
      statements: this.toStatements(data),
      raw: { linkedin: data }
    };
  }

  toStatements(data: LinkedInProfileData): StatementDraft[] {
    const statements: StatementDraft[] = [];

    for (const position of data.positions) {
      const text = position.description
        ? `${position.title} at ${position.company}: ${position.description}`
        : `${position.title} at ${position.company}`;
      statements.push({
        text,
        provenance: { kind: 'position', reference: position.company, url: data.profileUrl }
      });
    }

    for (const school of data.education) {
      statements.push({
        text: `Studied at ${school}`,
        provenance: { kind: 'education', reference: school, url: data.profileUrl }
      });
    }

    if (data.skills.length > 0) {
      statements.push({
        text: `Skills: ${data.skills.join(', ')}`,
        skill: data.skills[0],
        provenance: { kind: 'skill-list', reference: data.name ?? data.profileUrl, url: data.profileUrl }
      });
    }

    return statements;
  }
}
