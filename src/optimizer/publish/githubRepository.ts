/**
 * GitHub Repository
 *
 * Reads and commits the resume file through the REST contents API.
 * A commit is a GET for the current blob sha (404: the file is new)
 * followed by a PUT carrying the base64 content.
 */

import { z } from 'zod';
import { createComponentLogger } from '../../shared/logging/logger';
import { ExternalServiceError, OptimizerErrorFactory } from '../errors/types';
import { HttpClient } from '../http/httpClient';
import type { PublishResult } from '../types';

const log = createComponentLogger('github-publisher');

export interface GitHubRepositoryConfig {
  owner: string;
  repo: string;
  token: string;
  branch: string;
  path: string;
  apiBaseUrl: string;
}

export interface PublishRequest {
  content: string;
  message: string;
}

const FileSchema = z.object({
  type: z.string().optional(),
  sha: z.string(),
  content: z.string().optional(),
  encoding: z.string().optional()
});

const CommitResponseSchema = z.object({
  content: z
    .object({
      path: z.string(),
      html_url: z.string().nullable().optional()
    })
    .nullable()
    .optional(),
  commit: z.object({
    sha: z.string(),
    html_url: z.string().optional()
  })
});

type RemoteFile = z.infer<typeof FileSchema>;

/**
 * Fill {role}, {company} and {score} in a commit message template
 */
export function formatCommitMessage(
  template: string,
  values: { role: string; company?: string; score: number }
): string {
  return template
    .replace(/\{role\}/g, values.role)
    .replace(/\{company\}/g, values.company ?? 'unknown company')
    .replace(/\{score\}/g, values.score.toFixed(1));
}

export class GitHubRepository {
  constructor(
    private readonly config: GitHubRepositoryConfig,
    private readonly http: HttpClient
  ) {}

  get target(): string {
    return `${this.config.owner}/${this.config.repo}@${this.config.branch}:${this.config.path}`;
  }

  /**
   * Current content of the resume file
   */
  async fetchResume(): Promise<string> {
    const file = await this.getFile();
    if (!file) {
      throw OptimizerErrorFactory.githubFailed(`${this.target} does not exist`, 404);
    }
    if (file.content === undefined || file.encoding !== 'base64') {
      throw OptimizerErrorFactory.githubFailed(`${this.target} is not a file with inline content`);
    }
    return Buffer.from(file.content.replace(/\s/g, ''), 'base64').toString('utf-8');
  }

  async publish(request: PublishRequest): Promise<PublishResult> {
    const existing = await this.getFile();

    const body: Record<string, string> = {
      message: request.message,
      content: Buffer.from(request.content, 'utf-8').toString('base64'),
      branch: this.config.branch
    };
    if (existing) {
      body.sha = existing.sha;
    }

    const payload = await this.send('PUT', this.contentsUrl(), JSON.stringify(body));
    const parsed = CommitResponseSchema.safeParse(payload);
    if (!parsed.success) {
      throw OptimizerErrorFactory.githubFailed(`Unexpected commit response: ${parsed.error.errors[0]?.message ?? 'unknown'}`);
    }

    const result: PublishResult = {
      commitSha: parsed.data.commit.sha,
      htmlUrl: parsed.data.content?.html_url ?? parsed.data.commit.html_url,
      path: parsed.data.content?.path ?? this.config.path,
      branch: this.config.branch,
      created: !existing
    };
    log.info({ target: this.target, commit: result.commitSha, created: result.created }, 'Resume committed');
    return result;
  }

  private async getFile(): Promise<RemoteFile | null> {
    const url = `${this.contentsUrl()}?ref=${encodeURIComponent(this.config.branch)}`;
    let payload: unknown;
    try {
      payload = await this.send('GET', url);
    } catch (error) {
      if (error instanceof ExternalServiceError && error.statusCode === 404) {
        return null;
      }
      throw error;
    }

    const parsed = FileSchema.safeParse(payload);
    if (!parsed.success || (parsed.data.type !== undefined && parsed.data.type !== 'file')) {
      throw OptimizerErrorFactory.githubFailed(`${this.target} is not a file`);
    }
    return parsed.data;
  }

  private contentsUrl(): string {
    const path = this.config.path.split('/').filter(Boolean).map(encodeURIComponent).join('/');
    return `${this.config.apiBaseUrl}/repos/${encodeURIComponent(this.config.owner)}/${encodeURIComponent(this.config.repo)}/contents/${path}`;
  }

  private async send(method: 'GET' | 'PUT', url: string, body?: string): Promise<unknown> {
    const headers: Record<string, string> = {
      Accept: 'application/vnd.github+json',
      Authorization: `Bearer ${this.config.token}`,
      'X-GitHub-Api-Version': '2022-11-28'
    };
    if (body !== undefined) {
      headers['Content-Type'] = 'application/json';
    }

    let response: Response;
    try {
      response = await this.http.request(url, { method, headers, body });
    } catch (error) {
      throw OptimizerErrorFactory.githubFailed(
        `${method} ${url} failed: ${error instanceof Error ? error.message : String(error)}`,
        undefined,
        error
      );
    }

    const text = await response.text();
    if (!response.ok) {
      throw OptimizerErrorFactory.githubFailed(
        `${method} ${url} returned ${response.status}: ${text.slice(0, 200)}`,
        response.status
      );
    }

    try {
      return JSON.parse(text);
    } catch (error) {
      throw OptimizerErrorFactory.githubFailed(`${method} ${url} returned invalid JSON`, response.status, error);
    }
  }
}
