/**
 * Tests for profile sources and the ingester
 */

import { describe, it, expect } from 'vitest';
import { GitHubSource, extractReadmeBullets } from '../../optimizer/ingest/githubSource';
import { ScholarSource, parseScholarProfile } from '../../optimizer/ingest/scholarSource';
import { LinkedInSource, parseLinkedInProfile } from '../../optimizer/ingest/linkedinSource';
import { ProfileIngester, createProfileSources } from '../../optimizer/ingest/profileIngester';
import type { ProfileSource, StatementDraft } from '../../optimizer/ingest/types';
import { RunLog, LogType } from '../../optimizer/logging/runLog';
import type { SourceName } from '../../optimizer/types';
import { createFetchStub } from '../helpers/stubs';
import { testConfig, testHttp } from '../helpers/fixtures';

const API = 'https://api.github.com';

const README = [
  '# graph-db',
  '![build](https://example.com/badge.svg)',
  '- Implements a **B-tree** storage engine with MVCC',
  '- [ ] task list entries are not capabilities',
  '- short',
  '* Query planner uses `cost-based` optimization'
].join('\n');

const REPOSITORIES = [
  {
    name: 'graph-db',
    description: 'A graph database written in Rust',
    language: 'Rust',
    html_url: 'https://github.com/octo/graph-db',
    stargazers_count: 12,
    owner: { login: 'octo' }
  },
  {
    name: 'forked-lib',
    description: 'Someone else\'s code',
    language: 'C',
    html_url: 'https://github.com/octo/forked-lib',
    fork: true,
    owner: { login: 'octo' }
  },
  {
    name: 'old-site',
    description: 'Archived',
    language: 'PHP',
    html_url: 'https://github.com/octo/old-site',
    archived: true,
    owner: { login: 'octo' }
  },
  {
    name: 'web-ui',
    description: null,
    language: 'TypeScript',
    html_url: 'https://github.com/octo/web-ui',
    owner: { login: 'octo' }
  }
];

const SCHOLAR_HTML = `<html><body>
<div id="gsc_prf_in">Ada Researcher</div>
<div id="gsc_prf_int"><a href="#">Machine Learning</a><a href="#">Databases</a></div>
<table><tbody>
<tr class="gsc_a_tr">
  <td class="gsc_a_t"><a class="gsc_a_at" href="/citations?view_op=view_citation&amp;citation_for_view=abc">Learned Index Structures</a>
  <div class="gs_gray">A Researcher, B Author</div><div class="gs_gray">SIGMOD Conference, 2021</div></td>
  <td class="gsc_a_c"><a class="gsc_a_ac">42</a></td>
  <td class="gsc_a_y"><span class="gsc_a_h">2021</span></td>
</tr>
<tr class="gsc_a_tr">
  <td class="gsc_a_t"><a class="gsc_a_at">Workshop Note</a><div class="gs_gray">A Researcher</div></td>
  <td class="gsc_a_c"><a class="gsc_a_ac"></a></td>
  <td class="gsc_a_y"><span class="gsc_a_h"></span></td>
</tr>
</tbody></table>
</body></html>`;

const PERSON_GRAPH = {
  '@context': 'http://schema.org',
  '@graph': [
    { '@type': 'WebPage', name: 'Profile page' },
    {
      '@type': 'Person',
      name: 'Ada Example',
      jobTitle: ['Staff Engineer'],
      worksFor: [
        {
          '@type': 'Organization',
          name: 'Acme',
          member: { '@type': 'OrganizationRole', description: 'Led the storage team' }
        }
      ],
      alumniOf: [{ '@type': 'EducationalOrganization', name: 'State University' }],
      knowsAbout: ['Distributed Systems', 'Go']
    }
  ]
};

const LINKEDIN_HTML = `<html><head>
<script type="application/ld+json">{not json</script>
<script type="application/ld+json">${JSON.stringify(PERSON_GRAPH)}</script>
</head><body></body></html>`;

function fakeSource(name: SourceName, behaviour: StatementDraft[] | Error | 'unconfigured'): ProfileSource {
  return {
    name,
    isConfigured: () => behaviour !== 'unconfigured',
    collect: async () => {
      if (behaviour instanceof Error) throw behaviour;
      if (behaviour === 'unconfigured') throw new Error('not configured');
      return { statements: behaviour, raw: {} };
    }
  };
}

function draft(text: string): StatementDraft {
  return { text, provenance: { kind: 'repository', reference: 'repo' } };
}

describe('extractReadmeBullets', () => {
  it('should keep long list items with markup removed', () => {
    expect(extractReadmeBullets(README)).toEqual([
      'Implements a B-tree storage engine with MVCC',
      'Query planner uses cost-based optimization'
    ]);
  });

  it('should unwrap links and respect the limit', () => {
    const readme = '1. See [the docs](https://example.com) for the full guide\n2. Second numbered item that is long';
    expect(extractReadmeBullets(readme, 1)).toEqual(['See the docs for the full guide']);
  });
});

describe('GitHubSource', () => {
  function createSource(token?: string) {
    const fetch = createFetchStub({
      [`${API}/users/octo/repos?per_page=100&sort=updated&type=owner`]: { body: REPOSITORIES },
      [`${API}/repos/octo/graph-db/readme`]: { body: README }
    });
    const source = new GitHubSource(
      { username: 'octo', token, maxRepositories: 10, apiBaseUrl: API },
      testHttp(fetch)
    );
    return { source, fetch };
  }

  it('should skip forks and archived repositories', async () => {
    const { source } = createSource();
    const data = await source.fetchProfile();

    expect(data.repositories.map(repo => repo.name)).toEqual(['graph-db', 'web-ui']);
    expect(data.languages).toEqual({ Rust: 1, TypeScript: 1 });
    expect(data.repositories[1].readmeBullets).toEqual([]);
  });

  it('should turn repositories into statements', async () => {
    const { source } = createSource();
    const { statements, raw } = await source.collect();

    expect(statements.map(statement => statement.text)).toEqual([
      'Built graph-db: A graph database written in Rust',
      'Developed graph-db in Rust',
      'graph-db: Implements a B-tree storage engine with MVCC',
      'graph-db: Query planner uses cost-based optimization',
      'Developed web-ui in TypeScript',
      'Proficient in programming languages: Rust, TypeScript'
    ]);
    expect(statements[0].provenance).toEqual({
      kind: 'repository',
      reference: 'graph-db',
      url: 'https://github.com/octo/graph-db'
    });
    expect(statements[5].provenance.reference).toBe('octo (2 repositories)');
    expect(raw.github?.username).toBe('octo');
  });

  it('should make a statement of every README bullet', async () => {
    const readme = Array.from({ length: 8 }, (_, i) => `- Storage engine capability number ${i + 1}`).join('\n');
    const source = new GitHubSource(
      { username: 'octo', maxRepositories: 10, apiBaseUrl: API },
      testHttp(createFetchStub({
        [`${API}/users/octo/repos?per_page=100&sort=updated&type=owner`]: { body: REPOSITORIES },
        [`${API}/repos/octo/graph-db/readme`]: { body: readme }
      }))
    );

    const { statements } = await source.collect();

    const readmeStatements = statements.filter(statement => statement.text.startsWith('graph-db: '));
    expect(readmeStatements).toHaveLength(8);
    expect(readmeStatements[7].text).toBe('graph-db: Storage engine capability number 8');
  });

  it('should keep the other repositories when one README cannot be read', async () => {
    const source = new GitHubSource(
      { username: 'octo', maxRepositories: 10, apiBaseUrl: API },
      testHttp(createFetchStub({
        [`${API}/users/octo/repos?per_page=100&sort=updated&type=owner`]: { body: REPOSITORIES },
        [`${API}/repos/octo/graph-db/readme`]: { body: README },
        [`${API}/repos/octo/web-ui/readme`]: { status: 500, body: 'boom' }
      }))
    );

    const { statements } = await source.collect();

    expect(statements.map(statement => statement.text)).toEqual([
      'Built graph-db: A graph database written in Rust',
      'Developed graph-db in Rust',
      'graph-db: Implements a B-tree storage engine with MVCC',
      'graph-db: Query planner uses cost-based optimization',
      'Developed web-ui in TypeScript',
      'Proficient in programming languages: Rust, TypeScript'
    ]);
  });

  it('should send the token when one is configured', async () => {
    const { source, fetch } = createSource('test-secret');
    await source.fetchProfile();

    const headers = new Headers(fetch.mock.calls[0][1]?.headers);
    expect(headers.get('Authorization')).toBe('Bearer test-secret');
    expect(headers.get('User-Agent')).toBe('test-agent');
  });

  it('should report as unconfigured without a username', () => {
    const source = new GitHubSource(
      { maxRepositories: 10, apiBaseUrl: API },
      testHttp(createFetchStub({}))
    );
    expect(source.isConfigured()).toBe(false);
  });

  it('should fail on an unknown user', async () => {
    const source = new GitHubSource(
      { username: 'nobody', maxRepositories: 10, apiBaseUrl: API },
      testHttp(createFetchStub({}))
    );
    await expect(source.collect()).rejects.toThrow(/HTTP 404/);
  });
});

describe('ScholarSource', () => {
  it('should parse profile, interests and publications', () => {
    const data = parseScholarProfile(SCHOLAR_HTML, 'abc123', 20);

    expect(data.name).toBe('Ada Researcher');
    expect(data.interests).toEqual(['Machine Learning', 'Databases']);
    expect(data.publications).toEqual([
      {
        title: 'Learned Index Structures',
        venue: 'SIGMOD Conference',
        year: 2021,
        citations: 42,
        url: 'https://scholar.google.com/citations?view_op=view_citation&citation_for_view=abc'
      },
      { title: 'Workshop Note', venue: undefined, year: undefined, citations: 0, url: undefined }
    ]);
  });

  it('should stop at the publication limit', () => {
    expect(parseScholarProfile(SCHOLAR_HTML, 'abc123', 1).publications).toHaveLength(1);
  });

  it('should reject a page without a profile', () => {
    expect(() => parseScholarProfile('<html><body>Please show you are not a robot</body></html>', 'x', 5))
      .toThrow(/No Scholar profile found/);
  });

  it('should describe publications as statements', async () => {
    const fetch = createFetchStub({
      'https://scholar.google.com/citations?user=abc123&hl=en&cstart=0&pagesize=100': { body: SCHOLAR_HTML }
    });
    const source = new ScholarSource({ profileId: 'abc123', maxPublications: 20 }, testHttp(fetch));
    const { statements } = await source.collect();

    expect(statements.map(statement => statement.text)).toEqual([
      "Published 'Learned Index Structures' in SIGMOD Conference (2021) - 42 citations",
      "Published 'Workshop Note'",
      'Research interests: Machine Learning, Databases'
    ]);
  });
});

describe('LinkedInSource', () => {
  it('should read the Person node from JSON-LD', () => {
    const data = parseLinkedInProfile(LINKEDIN_HTML, 'https://www.linkedin.com/in/ada');

    expect(data).toEqual({
      profileUrl: 'https://www.linkedin.com/in/ada',
      name: 'Ada Example',
      headline: 'Staff Engineer',
      positions: [{ title: 'Staff Engineer', company: 'Acme', description: 'Led the storage team' }],
      education: ['State University'],
      skills: ['Distributed Systems', 'Go']
    });
  });

  it('should fail behind the sign-in wall', () => {
    expect(() => parseLinkedInProfile('<html><body>Sign in</body></html>', 'https://www.linkedin.com/in/ada'))
      .toThrow(/No public profile data/);
  });

  it('should describe positions, schools and skills', async () => {
    const url = 'https://www.linkedin.com/in/ada';
    const source = new LinkedInSource({ profileUrl: url }, testHttp(createFetchStub({ [url]: { body: LINKEDIN_HTML } })));
    const { statements } = await source.collect();

    expect(statements.map(statement => statement.text)).toEqual([
      'Staff Engineer at Acme: Led the storage team',
      'Studied at State University',
      'Skills: Distributed Systems, Go'
    ]);
  });
});

describe('ProfileIngester', () => {
  it('should continue past failing and unconfigured sources', async () => {
    const runLog = new RunLog('test-run');
    const ingester = new ProfileIngester(
      [
        fakeSource('github', [draft('Built a compiler'), draft('Wrote a scheduler')]),
        fakeSource('scholar', new Error('request blocked')),
        fakeSource('linkedin', 'unconfigured')
      ],
      runLog
    );

    const profile = await ingester.ingest();

    expect(profile.statements.map(statement => statement.id)).toEqual(['github-1', 'github-2']);
    expect(profile.sources).toEqual([
      { source: 'github', status: 'ok', statementCount: 2 },
      { source: 'scholar', status: 'failed', statementCount: 0, error: 'request blocked' },
      { source: 'linkedin', status: 'skipped', statementCount: 0 }
    ]);
    expect(runLog.getEntries(LogType.SOURCE).map(entry => entry.message)).toEqual([
      'Source github: 2 statements',
      'Source scholar failed: request blocked',
      'Source linkedin skipped'
    ]);
  });

  it('should drop duplicate statements across sources, keeping the first', async () => {
    const runLog = new RunLog('test-run');
    const ingester = new ProfileIngester(
      [
        fakeSource('github', [draft('Built a compiler.')]),
        fakeSource('linkedin', [draft('built a   compiler'), draft('Mentored interns')])
      ],
      runLog
    );

    const profile = await ingester.ingest();

    expect(profile.statements.map(statement => `${statement.id}:${statement.text}`)).toEqual([
      'github-1:Built a compiler.',
      'linkedin-2:Mentored interns'
    ]);
    expect(runLog.getEntries(LogType.INFO).map(entry => [entry.message, entry.context])).toEqual([
      ['Duplicate statements removed', { total: 3, unique: 2, duplicates: 1 }]
    ]);
  });

  it('should succeed with no sources at all', async () => {
    const profile = await new ProfileIngester([]).ingest();
    expect(profile.statements).toEqual([]);
    expect(profile.sources).toEqual([]);
  });

  it('should let per-run identifiers override configuration', () => {
    const config = testConfig({ sources: { scholar: { profileId: 'configured' } } });
    const sources = createProfileSources(config, testHttp(createFetchStub({})), {
      linkedinUrl: 'https://www.linkedin.com/in/ada'
    });

    expect(sources.map(source => [source.name, source.isConfigured()])).toEqual([
      ['github', false],
      ['scholar', true],
      ['linkedin', true]
    ]);
  });
});
