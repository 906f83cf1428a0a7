/**
 * Configuration Management
 *
 * Layers, lowest precedence first:
 *   DEFAULT_CONFIG < JSON config file < environment variables < overrides
 *
 * The merged result is validated once with zod; any problem is a fatal
 * ValidationError listing every offending field. Components receive the
 * slice they need from the returned object and never read process.env.
 */

import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { OptimizerErrorFactory } from '../errors/types';
import { HttpUrlSchema, UnitIntervalSchema } from '../../shared/validation/schemas';
import { zodErrorToIssues } from '../../shared/validation/validator';
import { DEFAULT_LLM_CONFIG, LLMProvider } from '../../shared/llm/types';
import type { AlignmentThresholds } from '../types';

// =============================================================================
// Schema
// =============================================================================

const ProviderSchema = z.enum(['anthropic', 'openai']);

export const OptimizerConfigSchema = z
  .object({
    llm: z.object({
      provider: ProviderSchema,
      apiKey: z.string().min(1, 'Missing LLM API key (ANTHROPIC_API_KEY or OPENAI_API_KEY)'),
      model: z.string(), // empty: the provider's default model
      temperature: z.number().min(0).max(2),
      maxTokens: z.number().int().positive(),
      timeoutMs: z.number().int().positive()
    }),
    embeddings: z.object({
      apiKey: z.string().min(1, 'Missing embeddings API key (OPENAI_API_KEY)'),
      model: z.string().min(1),
      batchSize: z.number().int().min(1).max(2048),
      cacheIndex: z.boolean()
    }),
    github: z.object({
      username: z.string().min(1).optional(),
      token: z.string().min(1).optional(),
      maxRepositories: z.number().int().positive(),
      apiBaseUrl: HttpUrlSchema,
      publish: z.object({
        enabled: z.boolean(),
        owner: z.string().min(1).optional(),
        repo: z.string().min(1).optional(),
        path: z.string().min(1),
        branch: z.string().min(1),
        commitMessage: z.string().min(1)
      })
    }),
    sources: z.object({
      scholar: z.object({
        profileId: z.string().min(1).optional(),
        maxPublications: z.number().int().positive()
      }),
      linkedin: z.object({
        profileUrl: HttpUrlSchema.optional()
      })
    }),
    http: z.object({
      timeoutMs: z.number().int().positive(),
      userAgent: z.string().min(1)
    }),
    analysis: z.object({
      keepThreshold: UnitIntervalSchema,
      rewriteThreshold: UnitIntervalSchema,
      evidenceThreshold: UnitIntervalSchema,
      keywordCoverage: UnitIntervalSchema,
      maxAdditions: z.number().int().min(0),
      llmReview: z.boolean(),
      deEmphasize: z.enum(['none', 'comment'])
    }),
    output: z.object({
      dir: z.string().min(1)
    })
  })
  .superRefine((config, ctx) => {
    if (config.analysis.rewriteThreshold >= config.analysis.keepThreshold) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['analysis', 'rewriteThreshold'],
        message: 'Must be lower than analysis.keepThreshold'
      });
    }
    const publish = config.github.publish;
    if (publish.enabled) {
      if (!publish.owner) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['github', 'publish', 'owner'], message: 'Required when publishing is enabled (RESUME_REPO_OWNER)' });
      }
      if (!publish.repo) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['github', 'publish', 'repo'], message: 'Required when publishing is enabled (RESUME_REPO_NAME)' });
      }
      if (!config.github.token) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['github', 'token'], message: 'Required when publishing is enabled (GITHUB_TOKEN)' });
      }
    }
  });

export type OptimizerConfig = z.infer<typeof OptimizerConfigSchema>;

type DeepPartial<T> = {
  [K in keyof T]?: T[K] extends object ? DeepPartial<T[K]> : T[K];
};

export type ConfigOverrides = DeepPartial<OptimizerConfig>;

// =============================================================================
// Defaults
// =============================================================================

export const DEFAULT_CONFIG: OptimizerConfig = {
  llm: {
    provider: 'openai',
    apiKey: '',
    model: '',
    temperature: 0.3,
    maxTokens: 1024,
    timeoutMs: 60000
  },
  embeddings: {
    apiKey: '',
    model: 'text-embedding-3-small',
    batchSize: 100,
    cacheIndex: true
  },
  github: {
    maxRepositories: 20,
    apiBaseUrl: 'https://api.github.com',
    publish: {
      enabled: false,
      path: 'main.tex',
      branch: 'main',
      commitMessage: 'Optimize resume for {role} (Match: {score}%)'
    }
  },
  sources: {
    scholar: {
      maxPublications: 20
    },
    linkedin: {}
  },
  http: {
    timeoutMs: 30000,
    userAgent: 'Mozilla/5.0 (compatible; ats-resume-optimizer/0.1; +https://www.npmjs.com/)'
  },
  analysis: {
    keepThreshold: 0.8,
    rewriteThreshold: 0.5,
    evidenceThreshold: 0.5,
    keywordCoverage: 0.5,
    maxAdditions: 3,
    llmReview: true,
    deEmphasize: 'none'
  },
  output: {
    dir: 'output'
  }
};

export const DEFAULT_CONFIG_FILE = 'optimizer.config.json';

export interface ConfigLoadOptions {
  /** Explicit config file; must exist when given */
  configPath?: string;
  env?: NodeJS.ProcessEnv;
  overrides?: ConfigOverrides;
  cwd?: string;
}

// =============================================================================
// Loading
// =============================================================================

type PlainObject = Record<string, unknown>;

function isPlainObject(value: unknown): value is PlainObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Deep merge; arrays and scalars from `source` replace, undefined is skipped
 */
export function deepMerge(target: PlainObject, source: PlainObject): PlainObject {
  const result: PlainObject = { ...target };

  for (const [key, sourceValue] of Object.entries(source)) {
    const targetValue = result[key];
    if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined) {
      result[key] = sourceValue;
    }
  }

  return result;
}

/**
 * Place a value at a dotted path, creating intermediate objects
 */
function setPath(target: PlainObject, dottedPath: string, value: unknown): void {
  const keys = dottedPath.split('.');
  let cursor = target;
  for (const key of keys.slice(0, -1)) {
    const next = cursor[key];
    if (isPlainObject(next)) {
      cursor = next;
    } else {
      const created: PlainObject = {};
      cursor[key] = created;
      cursor = created;
    }
  }
  cursor[keys[keys.length - 1]] = value;
}

/**
 * Numbers that fail to parse are kept as strings so validation names the field
 */
function parseNumber(value: string): number | string {
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : value;
}

function parseBoolean(value: string): boolean | string {
  const lowered = value.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(lowered)) return true;
  if (['0', 'false', 'no', 'off'].includes(lowered)) return false;
  return value;
}

const ENV_BINDINGS: Array<{ env: string; path: string; parse?: (value: string) => unknown }> = [
  { env: 'LLM_PROVIDER', path: 'llm.provider' },
  { env: 'LLM_MODEL', path: 'llm.model' },
  { env: 'LLM_TEMPERATURE', path: 'llm.temperature', parse: parseNumber },
  { env: 'LLM_MAX_TOKENS', path: 'llm.maxTokens', parse: parseNumber },
  { env: 'LLM_TIMEOUT_MS', path: 'llm.timeoutMs', parse: parseNumber },
  { env: 'EMBEDDING_MODEL', path: 'embeddings.model' },
  { env: 'EMBEDDING_CACHE_INDEX', path: 'embeddings.cacheIndex', parse: parseBoolean },
  { env: 'GITHUB_USERNAME', path: 'github.username' },
  { env: 'GITHUB_TOKEN', path: 'github.token' },
  { env: 'GITHUB_MAX_REPOSITORIES', path: 'github.maxRepositories', parse: parseNumber },
  { env: 'GITHUB_PUBLISH', path: 'github.publish.enabled', parse: parseBoolean },
  { env: 'RESUME_REPO_OWNER', path: 'github.publish.owner' },
  { env: 'RESUME_REPO_NAME', path: 'github.publish.repo' },
  { env: 'RESUME_REPO_PATH', path: 'github.publish.path' },
  { env: 'RESUME_REPO_BRANCH', path: 'github.publish.branch' },
  { env: 'SCHOLAR_PROFILE_ID', path: 'sources.scholar.profileId' },
  { env: 'LINKEDIN_PROFILE_URL', path: 'sources.linkedin.profileUrl' },
  { env: 'HTTP_TIMEOUT_MS', path: 'http.timeoutMs', parse: parseNumber },
  { env: 'KEEP_THRESHOLD', path: 'analysis.keepThreshold', parse: parseNumber },
  { env: 'REWRITE_THRESHOLD', path: 'analysis.rewriteThreshold', parse: parseNumber },
  { env: 'EVIDENCE_THRESHOLD', path: 'analysis.evidenceThreshold', parse: parseNumber },
  { env: 'OUTPUT_DIR', path: 'output.dir' }
];

function readEnv(env: NodeJS.ProcessEnv, name: string): string | undefined {
  const value = env[name];
  return value !== undefined && value.trim() !== '' ? value.trim() : undefined;
}

function providerOf(layer: PlainObject): LLMProvider | undefined {
  const llm = layer.llm;
  if (!isPlainObject(llm)) return undefined;
  const parsed = ProviderSchema.safeParse(llm.provider);
  return parsed.success ? parsed.data : undefined;
}

/**
 * Build the environment layer. API keys are resolved against the provider
 * the lower layers settled on, since the key variable depends on it.
 */
function environmentLayer(env: NodeJS.ProcessEnv, lower: PlainObject): PlainObject {
  const layer: PlainObject = {};

  for (const binding of ENV_BINDINGS) {
    const raw = readEnv(env, binding.env);
    if (raw !== undefined) {
      setPath(layer, binding.path, binding.parse ? binding.parse(raw) : raw);
    }
  }

  const provider = providerOf(layer) ?? providerOf(lower) ?? DEFAULT_CONFIG.llm.provider;
  const llmKey = readEnv(env, provider === 'anthropic' ? 'ANTHROPIC_API_KEY' : 'OPENAI_API_KEY');
  if (llmKey) {
    setPath(layer, 'llm.apiKey', llmKey);
  }

  const embeddingKey = readEnv(env, 'OPENAI_API_KEY');
  if (embeddingKey) {
    setPath(layer, 'embeddings.apiKey', embeddingKey);
  }

  return layer;
}

function readConfigFile(filePath: string): PlainObject {
  let text: string;
  try {
    text = fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    throw OptimizerErrorFactory.configurationError([
      { field: 'configFile', message: `Cannot read ${filePath}: ${error instanceof Error ? error.message : String(error)}` }
    ]);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw OptimizerErrorFactory.configurationError([
      { field: 'configFile', message: `${filePath} is not valid JSON: ${error instanceof Error ? error.message : String(error)}` }
    ]);
  }

  if (!isPlainObject(parsed)) {
    throw OptimizerErrorFactory.configurationError([
      { field: 'configFile', message: `${filePath} must contain a JSON object` }
    ]);
  }
  return parsed;
}

/**
 * Locate the config file: explicit path, then OPTIMIZER_CONFIG, then
 * ./optimizer.config.json when present.
 */
export function resolveConfigPath(options: ConfigLoadOptions = {}): string | undefined {
  const cwd = options.cwd ?? process.cwd();
  const env = options.env ?? process.env;
  const explicit = options.configPath ?? readEnv(env, 'OPTIMIZER_CONFIG');
  if (explicit) {
    return path.resolve(cwd, explicit);
  }
  const fallback = path.resolve(cwd, DEFAULT_CONFIG_FILE);
  return fs.existsSync(fallback) ? fallback : undefined;
}

/**
 * Configuration manager
 */
export class ConfigManager {
  private readonly config: OptimizerConfig;
  private readonly sourcePath?: string;

  constructor(options: ConfigLoadOptions = {}) {
    this.sourcePath = resolveConfigPath(options);
    this.config = this.loadConfig(options);
  }

  private loadConfig(options: ConfigLoadOptions): OptimizerConfig {
    const env = options.env ?? process.env;

    const fileLayer = this.sourcePath ? readConfigFile(this.sourcePath) : {};
    const lower = deepMerge(DEFAULT_CONFIG, fileLayer);
    const withEnv = deepMerge(lower, environmentLayer(env, lower));
    const merged = options.overrides ? deepMerge(withEnv, options.overrides) : withEnv;

    const result = OptimizerConfigSchema.safeParse(merged);
    if (!result.success) {
      throw OptimizerErrorFactory.configurationError(zodErrorToIssues(result.error));
    }

    const config = result.data;
    if (config.llm.model) {
      return config;
    }
    return {
      ...config,
      llm: { ...config.llm, model: DEFAULT_LLM_CONFIG[config.llm.provider].model }
    };
  }

  getConfig(): OptimizerConfig {
    return this.config;
  }

  /**
   * Path of the config file that was read, if any
   */
  getSourcePath(): string | undefined {
    return this.sourcePath;
  }

  getThresholds(): AlignmentThresholds {
    return toThresholds(this.config);
  }
}

export function loadConfig(options: ConfigLoadOptions = {}): OptimizerConfig {
  return new ConfigManager(options).getConfig();
}

export function toThresholds(config: OptimizerConfig): AlignmentThresholds {
  return {
    keep: config.analysis.keepThreshold,
    rewrite: config.analysis.rewriteThreshold,
    evidence: config.analysis.evidenceThreshold,
    keywordCoverage: config.analysis.keywordCoverage
  };
}

/**
 * Mask a secret for display, keeping only the last four characters
 */
export function maskSecret(value: string | undefined): string {
  if (!value) return '(not set)';
  return value.length <= 4 ? '****' : `****${value.slice(-4)}`;
}

/**
 * Human-readable summary for the `check` command
 */
export function describeConfig(config: OptimizerConfig, sourcePath?: string): string[] {
  const publish = config.github.publish;
  return [
    `config file:     ${sourcePath ?? '(none, defaults + environment)'}`,
    `llm:             ${config.llm.provider} ${config.llm.model} (key ${maskSecret(config.llm.apiKey)})`,
    `embeddings:      ${config.embeddings.model} (key ${maskSecret(config.embeddings.apiKey)})`,
    `github source:   ${config.github.username ?? '(not configured)'} (token ${maskSecret(config.github.token)})`,
    `scholar source:  ${config.sources.scholar.profileId ?? '(not configured)'}`,
    `linkedin source: ${config.sources.linkedin.profileUrl ?? '(not configured)'}`,
    `thresholds:      keep ${config.analysis.keepThreshold}, rewrite ${config.analysis.rewriteThreshold}, evidence ${config.analysis.evidenceThreshold}`,
    `publish:         ${publish.enabled ? `${publish.owner}/${publish.repo}:${publish.branch}/${publish.path}` : 'disabled'}`,
    `output dir:      ${path.resolve(config.output.dir)}`
  ];
}
