/**
 * Profile Ingester
 *
 * Collects capability statements from every configured source. A source
 * that throws contributes nothing: its failure is converted to a
 * SourceFetchError, logged and recorded in the source report, and the
 * remaining sources still run.
 */

import { createComponentLogger } from '../../shared/logging/logger';
import { OptimizerErrorFactory } from '../errors/types';
import type { RunLog } from '../logging/runLog';
import type { OptimizerConfig } from '../config';
import type { CapabilityStatement, Profile, RawProfile, SourceReport } from '../types';
import { HttpClient } from '../http/httpClient';
import { deduplicateStatements, getDedupStats } from './statementDedup';
import { GitHubSource } from './githubSource';
import { ScholarSource } from './scholarSource';
import { LinkedInSource } from './linkedinSource';
import type { ProfileSource } from './types';

const log = createComponentLogger('profile-ingester');

/**
 * Per-run source identifiers that override the configured ones
 */
export interface SourceOverrides {
  scholarId?: string;
  linkedinUrl?: string;
  githubUsername?: string;
}

export function createProfileSources(
  config: OptimizerConfig,
  http: HttpClient,
  overrides: SourceOverrides = {}
): ProfileSource[] {
  return [
    new GitHubSource(
      {
        username: overrides.githubUsername ?? config.github.username,
        token: config.github.token,
        maxRepositories: config.github.maxRepositories,
        apiBaseUrl: config.github.apiBaseUrl
      },
      http
    ),
    new ScholarSource(
      {
        profileId: overrides.scholarId ?? config.sources.scholar.profileId,
        maxPublications: config.sources.scholar.maxPublications
      },
      http
    ),
    new LinkedInSource(
      { profileUrl: overrides.linkedinUrl ?? config.sources.linkedin.profileUrl },
      http
    )
  ];
}

export class ProfileIngester {
  constructor(
    private readonly sources: ProfileSource[],
    private readonly runLog?: RunLog
  ) {}

  async ingest(): Promise<Profile> {
    const collected: CapabilityStatement[] = [];
    const reports: SourceReport[] = [];
    let raw: RawProfile = {};

    for (const source of this.sources) {
      if (!source.isConfigured()) {
        this.record(reports, { source: source.name, status: 'skipped', statementCount: 0 });
        continue;
      }

      try {
        const contribution = await source.collect();
        contribution.statements.forEach((draft, index) => {
          collected.push({ ...draft, id: `${source.name}-${index + 1}`, source: source.name });
        });
        raw = { ...raw, ...contribution.raw };
        this.record(reports, {
          source: source.name,
          status: 'ok',
          statementCount: contribution.statements.length
        });
      } catch (error) {
        const failure = OptimizerErrorFactory.sourceFetchFailed(source.name, error);
        log.warn({ source: source.name, error: failure.technicalDetails }, failure.userMessage);
        this.record(reports, {
          source: source.name,
          status: 'failed',
          statementCount: 0,
          error: failure.technicalDetails
        });
      }
    }

    const statements = deduplicateStatements(collected);
    const stats = getDedupStats(collected, statements);
    if (stats.duplicates > 0) {
      log.debug(stats, 'Duplicate statements removed');
      this.runLog?.logInfo('Duplicate statements removed', { ...stats }, 'ingest');
    }

    return {
      statements,
      sources: reports,
      raw,
      ingestedAt: new Date().toISOString()
    };
  }

  private record(reports: SourceReport[], report: SourceReport): void {
    reports.push(report);
    this.runLog?.logSource(report);
  }
}
