/**
 * GitHub Profile Source
 *
 * Lists the user's own repositories through the REST API and turns
 * descriptions, primary languages and README list items into capability
 * statements. Forks and archived repositories are skipped.
 */

import { z } from 'zod';
import { HttpClient, HttpError } from '../http/httpClient';
import { createComponentLogger } from '../../shared/logging/logger';
import type { GitHubProfileData, RepositorySummary } from '../types';
import type { ProfileSource, SourceContribution, StatementDraft } from './types';

const log = createComponentLogger('github-source');

const README_BULLETS_PER_REPO = 10;
const MIN_BULLET_LENGTH = 20;
const TOP_LANGUAGES = 10;

export interface GitHubSourceConfig {
  username?: string;
  token?: string;
  maxRepositories: number;
  apiBaseUrl: string;
}

const RepositorySchema = z.object({
  name: z.string(),
  description: z.string().nullable().optional(),
  language: z.string().nullable().optional(),
  html_url: z.string(),
  stargazers_count: z.number().default(0),
  fork: z.boolean().default(false),
  archived: z.boolean().default(false),
  topics: z.array(z.string()).optional(),
  owner: z.object({ login: z.string() })
});

const RepositoryListSchema = z.array(RepositorySchema);

type ApiRepository = z.infer<typeof RepositorySchema>;

/**
 * Plain-text list items from a README, markdown markup removed
 */
export function extractReadmeBullets(readme: string, limit = README_BULLETS_PER_REPO): string[] {
  const bullets: string[] = [];

  for (const line of readme.split(/\r?\n/)) {
    const match = /^\s*(?:[-*+]|\d+[.)])\s+(.+)$/.exec(line);
    if (!match) continue;

    const raw = match[1];
    if (raw.includes('![') || /^\[[ xX]\]/.test(raw)) continue; // badges, task lists

    const text = raw
      .replace(/\[([^\]]+)\]\([^)]*\)/g, '$1')
      .replace(/`([^`]+)`/g, '$1')
      .replace(/(\*\*|__)(.+?)\1/g, '$2')
      .replace(/(\*|_)(.+?)\1/g, '$2')
      .replace(/<[^>]+>/g, '')
      .replace(/\s+/g, ' ')
      .trim();

    if (text.length > MIN_BULLET_LENGTH) {
      bullets.push(text);
    }
    if (bullets.length >= limit) break;
  }

  return bullets;
}

export class GitHubSource implements ProfileSource {
  readonly name = 'github' as const;

  constructor(
    private readonly config: GitHubSourceConfig,
    private readonly http: HttpClient
  ) {}

  isConfigured(): boolean {
    return Boolean(this.config.username);
  }

  async collect(): Promise<SourceContribution> {
    const data = await this.fetchProfile();
    return {
      statements: this.toStatements(data),
      raw: { github: data }
    };
  }

  async fetchProfile(): Promise<GitHubProfileData> {
    const username = this.config.username;
    if (!username) {
      throw new Error('GitHub username is not configured');
    }

    const listUrl = `${this.config.apiBaseUrl}/users/${encodeURIComponent(username)}/repos?per_page=100&sort=updated&type=owner`;
    const payload = await this.http.getJson(listUrl, this.headers('application/vnd.github+json'));
    const parsed = RepositoryListSchema.safeParse(payload);
    if (!parsed.success) {
      throw new Error(`Unexpected repository list format: ${parsed.error.errors[0]?.message ?? 'unknown'}`);
    }

    const selected = parsed.data
      .filter(repo => !repo.fork && !repo.archived)
      .slice(0, this.config.maxRepositories);

    const repositories: RepositorySummary[] = [];
    const languages: Record<string, number> = {};

    for (const repo of selected) {
      const readme = await this.fetchReadme(repo);
      if (repo.language) {
        languages[repo.language] = (languages[repo.language] ?? 0) + 1;
      }
      repositories.push({
        name: repo.name,
        description: repo.description ?? undefined,
        language: repo.language ?? undefined,
        url: repo.html_url,
        stars: repo.stargazers_count,
        topics: repo.topics ?? [],
        readmeBullets: readme ? extractReadmeBullets(readme) : []
      });
    }

    log.info({ username, repositories: repositories.length }, 'GitHub repositories collected');
    return { username, repositories, languages };
  }

  toStatements(data: GitHubProfileData): StatementDraft[] {
    const statements: StatementDraft[] = [];

    for (const repo of data.repositories) {
      const provenance = { kind: 'repository' as const, reference: repo.name, url: repo.url };

      if (repo.description) {
        statements.push({ text: `Built ${repo.name}: ${repo.description}`, skill: repo.language, provenance });
      }
      if (repo.language) {
        statements.push({ text: `Developed ${repo.name} in ${repo.language}`, skill: repo.language, provenance });
      }
      for (const bullet of repo.readmeBullets) {
        statements.push({ text: `${repo.name}: ${bullet}`, skill: repo.language, provenance });
      }
    }

    const topLanguages = Object.entries(data.languages)
      .sort((a, b) => b[1] - a[1] || a[0].localeCompare(b[0]))
      .slice(0, TOP_LANGUAGES)
      .map(([language]) => language);

    if (topLanguages.length > 0) {
      statements.push({
        text: `Proficient in programming languages: ${topLanguages.join(', ')}`,
        skill: topLanguages[0],
        provenance: {
          kind: 'language-summary',
          reference: `${data.username} (${data.repositories.length} repositories)`,
          url: `https://github.com/${data.username}`
        }
      });
    }

    return statements;
  }

  /**
   * README as raw markdown; null when the repository has none or it
   * cannot be read
   */
  private async fetchReadme(repo: ApiRepository): Promise<string | null> {
    const url = `${this.config.apiBaseUrl}/repos/${encodeURIComponent(repo.owner.login)}/${encodeURIComponent(repo.name)}/readme`;
    try {
      return await this.http.getText(url, this.headers('application/vnd.github.raw'));
    } catch (error) {
      if (error instanceof HttpError && error.status === 404) {
        return null;
      }
      log.warn({ repository: repo.name, error: error instanceof Error ? error.message : String(error) }, 'README unavailable');
      return null;
    }
  }

  private headers(accept: string): Record<string, string> {
    const headers: Record<string, string> = {
      Accept: accept,
      'X-GitHub-Api-Version': '2022-11-28'
    };
    if (this.config.token) {
      headers.Authorization = `Bearer ${this.config.token}`;
    }
    return headers;
  }
}
