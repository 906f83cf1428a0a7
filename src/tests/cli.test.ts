/**
 * Tests for the command line entry point
 */

import { describe, it, expect, beforeEach, afterEach, vi, type Mock } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { main, USAGE, type CliIO, type CliRuntime } from '../cli';
import { DEFAULT_PORT } from '../dashboard/server';
import { EMPTY_CAPABILITY_SUMMARY } from '../optimizer/analyzer/profileAnalyzer';
import { OptimizerErrorFactory, PipelineError } from '../optimizer/errors/types';
import type { OptimizerConfig } from '../optimizer/config';
import type { ProgressCallback, RunRequest, RunResult } from '../optimizer/orchestrator';
import type { DecisionRecord } from '../optimizer/types';

const RUN_ID = '20260301-123456-a1b2c3';

function decision(kind: DecisionRecord['decision'], bulletId: string): DecisionRecord {
  return { decision: kind, bulletId, similarity: 0.5, evidence: [], reason: 'test' };
}

const RESULT: RunResult = {
  runId: RUN_ID,
  runDir: `output/runs/${RUN_ID}`,
  optimizedDocument: '\\item Built data pipelines',
  analysis: {
    runId: RUN_ID,
    createdAt: '2026-03-01T12:34:56.000Z',
    matchScore: 86,
    job: { role: 'Data Engineer', company: 'Acme', extraction: 'text', requirementCount: 2 },
    profile: {
      statementCount: 3,
      sources: [
        { source: 'github', status: 'ok', statementCount: 3 },
        { source: 'scholar', status: 'failed', statementCount: 0, error: 'blocked' }
      ],
      summary: EMPTY_CAPABILITY_SUMMARY
    },
    resume: { fileName: 'resume.tex', bulletCount: 3 },
    matches: [],
    decisions: [decision('KEEP', 'b1'), decision('DE_EMPHASIZE', 'b2'), decision('REWRITE', 'b3')],
    recommendations: [],
    index: { profileGeneration: 1, profileFingerprint: 'abc123', reusedSnapshot: false }
  },
  publish: {
    commitSha: 'abc1234def5678',
    htmlUrl: 'https://github.com/octo/resumes/blob/main/main.tex',
    path: 'main.tex',
    branch: 'main',
    created: false
  }
};

describe('CLI', () => {
  let cwd: string;
  let out: string[];
  let err: string[];
  let io: CliIO;
  let runWorkflow: Mock<(config: OptimizerConfig, request: RunRequest, onProgress: ProgressCallback) => Promise<RunResult>>;
  let serve: Mock<(config: OptimizerConfig, port: number) => Promise<unknown>>;
  let runtime: CliRuntime;

  beforeEach(() => {
    cwd = fs.mkdtempSync(path.join(os.tmpdir(), 'optimizer-cli-'));
    out = [];
    err = [];
    io = {
      out: line => out.push(line),
      err: line => err.push(line),
      env: { OPENAI_API_KEY: 'test-secret' },
      cwd
    };
    runWorkflow = vi.fn(async (_config: OptimizerConfig, _request: RunRequest, onProgress: ProgressCallback) => {
      onProgress('ingest', 'Collecting profile data');
      return RESULT;
    });
    serve = vi.fn(async (_config: OptimizerConfig, _port: number): Promise<unknown> => undefined);
    runtime = { runWorkflow, serve };
  });

  afterEach(() => {
    fs.rmSync(cwd, { recursive: true, force: true });
  });

  it('should print usage for --help', async () => {
    expect(await main(['--help'], io, runtime)).toBe(0);
    expect(out).toEqual([USAGE]);
  });

  it('should reject a missing command', async () => {
    expect(await main([], io, runtime)).toBe(2);
    expect(err).toEqual(['No command given', USAGE]);
  });

  it('should reject an unknown command', async () => {
    expect(await main(['frobnicate'], io, runtime)).toBe(2);
    expect(err).toEqual(['Unknown command: frobnicate', USAGE]);
  });

  it('should reject unknown options', async () => {
    expect(await main(['check', '--verbose'], io, runtime)).toBe(2);
    expect(err[0]).toContain('--verbose');
    expect(err[1]).toBe(USAGE);
  });

  describe('invoke', () => {
    beforeEach(() => {
      fs.writeFileSync(path.join(cwd, 'resume.tex'), '\\item Built data pipelines\n');
      fs.writeFileSync(path.join(cwd, 'job.txt'), 'Data Engineer at Acme\n');
    });

    it('should require both positional arguments', async () => {
      expect(await main(['invoke', 'job.txt'], io, runtime)).toBe(2);
      expect(err[0]).toBe('invoke needs <job_source> and <resume_path>');
      expect(runWorkflow).not.toHaveBeenCalled();
    });

    it('should run the workflow and print a summary', async () => {
      const code = await main(['invoke', 'job.txt', 'resume.tex', '--scholar', 'abc123', '--no-publish'], io, runtime);

      expect(code).toBe(0);
      expect(runWorkflow.mock.calls[0]?.[1]).toEqual({
        jobSource: 'Data Engineer at Acme\n',
        resume: { fileName: 'resume.tex', content: '\\item Built data pipelines\n' },
        scholarId: 'abc123',
        linkedinUrl: undefined,
        publish: false
      });
      expect(out).toEqual([
        '[ingest] Collecting profile data',
        '',
        'Role:        Data Engineer at Acme',
        'Match score: 86.0%',
        'Decisions:   1 keep, 1 rewrite, 0 add, 1 de-emphasize',
        'Source:      github ok (3 statements)',
        'Source:      scholar failed',
        `Run dir:     output/runs/${RUN_ID}`,
        'Published:   https://github.com/octo/resumes/blob/main/main.tex (abc1234)'
      ]);
      expect(err).toEqual([]);
    });

    it('should pass URLs through and leave publishing to the configuration', async () => {
      await main(['invoke', ' https://example.com/jobs/42 ', 'resume.tex'], io, runtime);

      const request = runWorkflow.mock.calls[0]?.[1];
      expect(request?.jobSource).toBe('https://example.com/jobs/42');
      expect(request?.publish).toBeUndefined();
    });

    it('should report the failing stage and the artifacts', async () => {
      const failure = OptimizerErrorFactory.githubFailed('PUT returned 500', 500);
      runWorkflow.mockRejectedValue(new PipelineError('publish', RUN_ID, failure, `output/runs/${RUN_ID}`));

      expect(await main(['invoke', 'job.txt', 'resume.tex'], io, runtime)).toBe(1);
      expect(err).toEqual([
        `Run ${RUN_ID} failed at stage 'publish': GitHub request failed in github-publisher\n  PUT returned 500`,
        `Artifacts: output/runs/${RUN_ID}`
      ]);
    });

    it('should report unreadable input files', async () => {
      expect(await main(['invoke', 'job.txt', 'missing.tex'], io, runtime)).toBe(1);
      expect(err[0]).toContain('ENOENT');
      expect(runWorkflow).not.toHaveBeenCalled();
    });
  });

  describe('check', () => {
    it('should describe a valid configuration', async () => {
      expect(await main(['check'], io, runtime)).toBe(0);

      expect(out[0]).toBe('config file:     (none, defaults + environment)');
      expect(out[1]).toBe('llm:             openai gpt-4o-mini (key ****cret)');
      expect(out[out.length - 1]).toBe('Configuration OK');
    });

    it('should read an explicit config file', async () => {
      fs.writeFileSync(path.join(cwd, 'cfg.json'), JSON.stringify({ github: { username: 'octo' } }));

      expect(await main(['check', '--config', 'cfg.json'], io, runtime)).toBe(0);

      expect(out[0]).toBe(`config file:     ${path.join(cwd, 'cfg.json')}`);
      expect(out[3]).toBe('github source:   octo (token (not set))');
    });

    it('should list every configuration problem', async () => {
      io.env = {};

      expect(await main(['check'], io, runtime)).toBe(1);
      expect(err).toEqual([
        'Invalid configuration: llm.apiKey: Missing LLM API key (ANTHROPIC_API_KEY or OPENAI_API_KEY); ' +
          'embeddings.apiKey: Missing embeddings API key (OPENAI_API_KEY)'
      ]);
    });
  });

  describe('serve', () => {
    it('should start on the default port', async () => {
      expect(await main(['serve'], io, runtime)).toBe(0);
      expect(serve.mock.calls[0]?.[1]).toBe(DEFAULT_PORT);
    });

    it('should start on the requested port', async () => {
      expect(await main(['serve', '--port', '8080'], io, runtime)).toBe(0);
      expect(serve.mock.calls[0]?.[1]).toBe(8080);
    });

    it.each(['abc', '0', '70000'])('should reject port %s', async port => {
      expect(await main(['serve', '--port', port], io, runtime)).toBe(2);
      expect(err).toEqual([`Invalid port: ${port}`]);
      expect(serve).not.toHaveBeenCalled();
    });
  });
});
