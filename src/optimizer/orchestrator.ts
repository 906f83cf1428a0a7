/**
 * Resume Optimizer Orchestrator
 *
 * Runs one optimization as a sequence of stages:
 *
 *   ingest -> analyze-profile -> index-profile -> parse-job -> parse-resume
 *     -> index-job -> align -> rewrite -> write-artifacts -> publish
 *
 * A failing stage ends the run with a PipelineError naming it. Source
 * failures during ingest and a failed LLM review are recorded and the run
 * continues. Each run writes its own directory under `runs/`; the profile
 * index snapshot under `index/` is shared by all runs.
 */

import { randomBytes } from 'crypto';
import * as path from 'path';
import { z } from 'zod';
import { LLMClient } from '../shared/llm/client';
import type { LLMCompleter } from '../shared/llm/types';
import { createComponentLogger } from '../shared/logging/logger';
import { FileStorage } from '../shared/storage/fileStorage';
import type { StorageProvider } from '../shared/storage/interface';
import { AlignmentEngine } from './alignment/alignmentEngine';
import { ProfileAnalyzer } from './analyzer/profileAnalyzer';
import { toThresholds, type OptimizerConfig } from './config';
import { OpenAIEmbedder, type Embedder } from './embeddings/embedder';
import {
  computeFingerprint,
  EmbeddingStore,
  parseEmbeddingSnapshot,
  type EmbeddingSnapshot
} from './embeddings/embeddingStore';
import {
  OptimizerError,
  OptimizerErrorCode,
  OptimizerErrorFactory,
  PipelineError,
  type PipelineStage
} from './errors/types';
import { HttpClient, type FetchLike } from './http/httpClient';
import { createProfileSources, ProfileIngester, type SourceOverrides } from './ingest/profileIngester';
import type { ProfileSource } from './ingest/types';
import { RunLog } from './logging/runLog';
import { JobParser } from './parser/jobParser';
import { parseResume, type ResumeDocument } from './parser/resumeParser';
import { formatCommitMessage, GitHubRepository, type GitHubRepositoryConfig } from './publish/githubRepository';
import { RewriteEngine } from './rewrite/rewriteEngine';
import type {
  AlignmentReport,
  AnalysisResult,
  CapabilityStatement,
  CapabilitySummary,
  DecisionRecord,
  JobPosting,
  JobRequirement,
  Profile,
  ProfileReview,
  PublishResult,
  ResumeBullet
} from './types';

const log = createComponentLogger('orchestrator');

export const PROFILE_INDEX_PATH = 'index/profile-index.json';
export const RUNS_DIR = 'runs';

export interface RunRequest {
  /** Job posting URL, or the posting's text */
  jobSource: string;
  resume: { fileName: string; content: string };
  scholarId?: string;
  linkedinUrl?: string;
  /** Overrides github.publish.enabled for this run */
  publish?: boolean;
}

export interface RunResult {
  runId: string;
  runDir: string;
  analysis: AnalysisResult;
  optimizedDocument: string;
  publish?: PublishResult;
}

/**
 * Callback for stage progress
 */
export type ProgressCallback = (stage: PipelineStage, message: string) => void;

export interface OptimizerDependencies {
  config: OptimizerConfig;
  llm: LLMCompleter;
  embedder: Embedder;
  http: HttpClient;
  /** Rooted at output.dir */
  storage: StorageProvider;
  publisher?: GitHubRepository;
  sources?: (overrides: SourceOverrides) => ProfileSource[];
  onProgress?: ProgressCallback;
  now?: () => Date;
}

const StatementMetadataSchema: z.ZodType<CapabilityStatement, z.ZodTypeDef, unknown> = z.object({
  id: z.string(),
  text: z.string(),
  skill: z.string().optional(),
  source: z.enum(['github', 'scholar', 'linkedin']),
  provenance: z.object({
    kind: z.enum([
      'repository',
      'language-summary',
      'publication',
      'research-summary',
      'position',
      'education',
      'skill-list'
    ]),
    reference: z.string(),
    url: z.string().optional()
  })
});

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * `YYYYMMDD-HHmmss-xxxxxx`, UTC, with six random hex characters
 */
export function createRunId(date: Date = new Date(), suffix: string = randomBytes(3).toString('hex')): string {
  const day = `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}`;
  const time = `${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`;
  return `${day}-${time}-${suffix}`;
}

/**
 * Reduce a client-supplied file name to a single path segment of
 * `[A-Za-z0-9._-]` starting with a letter or digit, the names the
 * dashboard serves
 */
export function artifactFileName(fileName: string): string {
  const base = path.posix
    .basename(fileName.replace(/\\/g, '/'))
    .trim()
    .replace(/[^A-Za-z0-9._-]+/g, '-')
    .replace(/\.{2,}/g, '.')
    .replace(/^[^A-Za-z0-9]+/, '');
  if (!base || base === 'analysis.json' || base === 'run-log.json') {
    return 'resume.tex';
  }
  return base;
}

/**
 * Publish target from configuration, when every part of it is set
 */
export function publishTargetOf(config: OptimizerConfig): GitHubRepositoryConfig | undefined {
  const { owner, repo, path: filePath, branch } = config.github.publish;
  const token = config.github.token;
  if (!owner || !repo || !token) {
    return undefined;
  }
  return { owner, repo, token, branch, path: filePath, apiBaseUrl: config.github.apiBaseUrl };
}

function toOptimizerError(error: unknown): OptimizerError {
  if (error instanceof OptimizerError) {
    return error;
  }
  return new OptimizerError(
    OptimizerErrorCode.STAGE_FAILED,
    'orchestrator',
    'Unexpected failure',
    error instanceof Error ? error.message : String(error),
    { cause: error }
  );
}

/**
 * Mutable state carried through one run
 */
interface RunContext {
  runId: string;
  runPath: string;
  runDir: string;
  runLog: RunLog;
  artifactsWritten: boolean;
}

export class ResumeOptimizer {
  private readonly ingesterSources: (overrides: SourceOverrides) => ProfileSource[];
  private readonly now: () => Date;

  constructor(private readonly deps: OptimizerDependencies) {
    this.ingesterSources = deps.sources ?? (overrides => createProfileSources(deps.config, deps.http, overrides));
    this.now = deps.now ?? (() => new Date());
  }

  async run(request: RunRequest): Promise<RunResult> {
    const { config, storage } = this.deps;
    const runId = createRunId(this.now());
    const runPath = `${RUNS_DIR}/${runId}`;
    const ctx: RunContext = {
      runId,
      runPath,
      runDir: storage instanceof FileStorage ? path.join(storage.getRootPath(), RUNS_DIR, runId) : runPath,
      runLog: new RunLog(runId),
      artifactsWritten: false
    };
    ctx.runLog.logInfo('Run started', {
      jobSource: request.jobSource.length > 200 ? `${request.jobSource.slice(0, 200)}...` : request.jobSource,
      resume: request.resume.fileName
    });

    const profile = await this.stage(ctx, 'ingest', 'Collecting profile data', () =>
      new ProfileIngester(
        this.ingesterSources({ scholarId: request.scholarId, linkedinUrl: request.linkedinUrl }),
        ctx.runLog
      ).ingest()
    );

    const analyzer = new ProfileAnalyzer(this.deps.llm, ctx.runLog);
    const summary = await this.stage(ctx, 'analyze-profile', 'Summarizing capabilities', () =>
      analyzer.analyzeCapabilities(profile)
    );

    const { store: profileIndex, reused } = await this.stage(ctx, 'index-profile', 'Indexing profile statements', () =>
      this.indexProfile(profile, ctx.runLog)
    );

    const job = await this.stage(ctx, 'parse-job', 'Parsing the job posting', () =>
      new JobParser(this.deps.llm, this.deps.http, ctx.runLog).parse(request.jobSource)
    );

    const fileName = artifactFileName(request.resume.fileName);
    const document = await this.stage(ctx, 'parse-resume', 'Parsing the resume', async () => {
      const parsed = parseResume(request.resume.content, fileName);
      if (parsed.bullets.length === 0) {
        throw OptimizerErrorFactory.resumeExtractionFailed(fileName, 'The document contains no bullets');
      }
      return parsed;
    });

    const { requirementIndex, bulletIndex } = await this.stage(ctx, 'index-job', 'Indexing requirements and bullets', async () => {
      const requirements = new EmbeddingStore<JobRequirement>(this.deps.embedder);
      await requirements.rebuild(job.requirements.map(requirement => ({ text: requirement.text, metadata: requirement })));
      const bullets = new EmbeddingStore<ResumeBullet>(this.deps.embedder);
      await bullets.rebuild(document.bullets.map(bullet => ({ text: bullet.text, metadata: bullet })));
      return { requirementIndex: requirements, bulletIndex: bullets };
    });

    const { report, review } = await this.stage(ctx, 'align', 'Aligning bullets with requirements', async () => {
      const engine = new AlignmentEngine(
        toThresholds(config),
        { maxAdditions: config.analysis.maxAdditions },
        ctx.runLog
      );
      const alignment = engine.align({
        job,
        bullets: document.bullets,
        profileIndex,
        requirementIndex,
        bulletIndex
      });
      return { report: alignment, review: await this.review(analyzer, summary, job, ctx.runLog) };
    });

    const decisions = await this.stage(ctx, 'rewrite', 'Rewriting bullets from evidence', async () => {
      const rewritten = await new RewriteEngine(this.deps.llm, ctx.runLog, {
        temperature: config.llm.temperature,
        maxTokens: config.llm.maxTokens
      }).rewriteAll(report.decisions, job);
      this.applyDecisions(document, rewritten);
      return rewritten;
    });

    const optimizedDocument = document.render();
    const analysis = this.buildAnalysis({
      runId,
      job,
      profile,
      summary,
      fileName,
      bulletCount: document.bullets.length,
      report: { ...report, decisions },
      review,
      profileIndex,
      reused
    });

    await this.stage(ctx, 'write-artifacts', 'Writing run artifacts', async () => {
      await storage.write(`${runPath}/analysis.json`, JSON.stringify(analysis, null, 2));
      await storage.write(`${runPath}/${fileName}`, optimizedDocument);
      ctx.artifactsWritten = true;
    });

    let published: PublishResult | undefined;
    if (request.publish ?? config.github.publish.enabled) {
      const publisher = this.deps.publisher;
      if (publisher) {
        published = await this.stage(ctx, 'publish', `Publishing to ${publisher.target}`, () =>
          publisher.publish({
            content: optimizedDocument,
            message: formatCommitMessage(config.github.publish.commitMessage, {
              role: job.role,
              company: job.company,
              score: analysis.matchScore
            })
          })
        );
      } else {
        ctx.runLog.logInfo('Publishing requested but no publish target is configured', undefined, 'publish');
      }
    }

    await this.writeRunLog(ctx);
    log.info({ runId, runDir: ctx.runDir, matchScore: analysis.matchScore, published: Boolean(published) }, 'Run complete');

    return { runId, runDir: ctx.runDir, analysis, optimizedDocument, publish: published };
  }

  /**
   * Run one stage; failures end the run as a PipelineError
   */
  private async stage<T>(ctx: RunContext, stage: PipelineStage, message: string, work: () => Promise<T>): Promise<T> {
    const finish = ctx.runLog.startStage(stage);
    this.deps.onProgress?.(stage, message);
    try {
      const result = await work();
      finish('ok');
      return result;
    } catch (error) {
      finish('failed');
      const failure = toOptimizerError(error);
      ctx.runLog.logError(failure, stage);
      await this.writeRunLog(ctx);
      throw new PipelineError(stage, ctx.runId, failure, ctx.artifactsWritten ? ctx.runDir : undefined);
    }
  }

  private async writeRunLog(ctx: RunContext): Promise<void> {
    try {
      await this.deps.storage.write(`${ctx.runPath}/run-log.json`, ctx.runLog.export());
    } catch (error) {
      log.warn({ runId: ctx.runId, error: error instanceof Error ? error.message : String(error) }, 'Could not write run log');
    }
  }

  /**
   * Restore the cached profile index when its fingerprint matches the
   * statements of this run; otherwise embed everything and cache the result.
   */
  private async indexProfile(
    profile: Profile,
    runLog: RunLog
  ): Promise<{ store: EmbeddingStore<CapabilityStatement>; reused: boolean }> {
    const { embedder, storage, config } = this.deps;
    const entries = profile.statements.map(statement => ({ text: statement.text, metadata: statement }));
    const fingerprint = computeFingerprint(embedder.model, entries.map(entry => entry.text));

    if (config.embeddings.cacheIndex && (await storage.exists(PROFILE_INDEX_PATH))) {
      const snapshot = await this.readSnapshot();
      if (snapshot && snapshot.model === embedder.model && snapshot.fingerprint === fingerprint) {
        const store = EmbeddingStore.restore(snapshot, embedder);
        // refresh metadata; every text is already indexed
        await store.add(entries);
        runLog.logInfo('Reused cached profile index', { generation: store.generation, fingerprint }, 'index-profile');
        return { store, reused: true };
      }
      runLog.logInfo('Cached profile index is stale, rebuilding', { fingerprint }, 'index-profile');
    }

    const store = new EmbeddingStore<CapabilityStatement>(embedder);
    await store.rebuild(entries);
    if (config.embeddings.cacheIndex) {
      await storage.write(PROFILE_INDEX_PATH, JSON.stringify(store.snapshot()));
    }
    return { store, reused: false };
  }

  private async readSnapshot(): Promise<EmbeddingSnapshot<CapabilityStatement> | null> {
    let parsed: unknown;
    try {
      parsed = JSON.parse(await this.deps.storage.read(PROFILE_INDEX_PATH));
    } catch (error) {
      log.warn({ error: error instanceof Error ? error.message : String(error) }, 'Unreadable profile index snapshot');
      return null;
    }
    return parseEmbeddingSnapshot(parsed, StatementMetadataSchema);
  }

  /**
   * The LLM review is informational; its failure does not end the run
   */
  private async review(
    analyzer: ProfileAnalyzer,
    summary: CapabilitySummary,
    job: JobPosting,
    runLog: RunLog
  ): Promise<ProfileReview | undefined> {
    if (!this.deps.config.analysis.llmReview) {
      return undefined;
    }
    try {
      return await analyzer.reviewMatch(summary, job);
    } catch (error) {
      runLog.logError(error, 'align');
      return undefined;
    }
  }

  private applyDecisions(document: ResumeDocument, decisions: DecisionRecord[]): void {
    const commentOut = this.deps.config.analysis.deEmphasize === 'comment';
    for (const record of decisions) {
      switch (record.decision) {
        case 'REWRITE':
          if (record.bulletId && record.rewrittenText) {
            document.replaceBullet(record.bulletId, record.rewrittenText);
          }
          break;
        case 'ADD':
          if (record.anchorBulletId && record.rewrittenText) {
            document.insertAfter(record.anchorBulletId, record.rewrittenText);
          }
          break;
        case 'DE_EMPHASIZE':
          if (commentOut && record.bulletId) {
            document.commentOut(record.bulletId);
          }
          break;
        case 'KEEP':
          break;
      }
    }
  }

  private buildAnalysis(parts: {
    runId: string;
    job: JobPosting;
    profile: Profile;
    summary: CapabilitySummary;
    fileName: string;
    bulletCount: number;
    report: AlignmentReport;
    review?: ProfileReview;
    profileIndex: EmbeddingStore<CapabilityStatement>;
    reused: boolean;
  }): AnalysisResult {
    const { job, profile, report } = parts;
    return {
      runId: parts.runId,
      createdAt: this.now().toISOString(),
      matchScore: report.matchScore,
      job: {
        role: job.role,
        company: job.company,
        location: job.location,
        sourceUrl: job.sourceUrl,
        extraction: job.extraction,
        requirementCount: job.requirements.length
      },
      profile: {
        statementCount: profile.statements.length,
        sources: profile.sources,
        summary: parts.summary
      },
      resume: {
        fileName: parts.fileName,
        bulletCount: parts.bulletCount
      },
      matches: report.matches,
      decisions: report.decisions,
      recommendations: report.recommendations,
      profileReview: parts.review,
      index: {
        profileGeneration: parts.profileIndex.generation,
        profileFingerprint: parts.profileIndex.fingerprint(),
        reusedSnapshot: parts.reused
      }
    };
  }
}

export interface CreateOptimizerOptions {
  fetch?: FetchLike;
  onProgress?: ProgressCallback;
}

/**
 * Wire production components from configuration
 */
export function createResumeOptimizer(config: OptimizerConfig, options: CreateOptimizerOptions = {}): ResumeOptimizer {
  const http = new HttpClient({ timeoutMs: config.http.timeoutMs, userAgent: config.http.userAgent, fetch: options.fetch });
  const target = publishTargetOf(config);

  return new ResumeOptimizer({
    config,
    http,
    llm: new LLMClient({
      provider: config.llm.provider,
      apiKey: config.llm.apiKey,
      model: config.llm.model,
      temperature: config.llm.temperature,
      maxTokens: config.llm.maxTokens,
      timeout: config.llm.timeoutMs
    }),
    embedder: new OpenAIEmbedder({
      apiKey: config.embeddings.apiKey,
      model: config.embeddings.model,
      batchSize: config.embeddings.batchSize,
      timeoutMs: config.llm.timeoutMs
    }),
    storage: new FileStorage(config.output.dir),
    publisher: target ? new GitHubRepository(target, http) : undefined,
    onProgress: options.onProgress
  });
}
