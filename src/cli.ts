#!/usr/bin/env node
/**
 * Command line entry point
 *
 *   resume-optimizer invoke <job_source> <resume_path> [--scholar <id>] [--linkedin <url>]
 *                          [--config <file>] [--no-publish]
 *   resume-optimizer check [--config <file>]
 *   resume-optimizer serve [--port <n>] [--config <file>]
 */

import dotenv from 'dotenv';
import * as fs from 'fs/promises';
import * as path from 'path';
import { parseArgs } from 'util';
import { ErrorHandler } from './shared/errors/handler';
import { logFatal } from './shared/logging/logger';
import { formatIssues } from './shared/validation/validator';
import { ConfigManager, describeConfig, type OptimizerConfig } from './optimizer/config';
import { PipelineError, ValidationError } from './optimizer/errors/types';
import { isUrl } from './optimizer/parser/jobParser';
import {
  createResumeOptimizer,
  type ProgressCallback,
  type RunRequest,
  type RunResult
} from './optimizer/orchestrator';
import { DEFAULT_PORT, startDashboard } from './dashboard/server';
import type { BulletDecision } from './optimizer/types';

export const USAGE = `Usage: resume-optimizer <command> [options]

Commands:
  invoke <job_source> <resume_path>   Optimize a LaTeX resume for a job posting
      --scholar <id>                  Google Scholar profile id
      --linkedin <url>                LinkedIn profile URL
      --no-publish                    Do not commit the result to GitHub
  check                               Validate configuration and show what is enabled
  serve                               Start the dashboard
      --port <n>                      Port to listen on (default ${DEFAULT_PORT})

Options:
  --config <file>                     Configuration file (default ./optimizer.config.json)
  -h, --help                          Show this help

<job_source> is a URL or a path to a file holding the posting text.`;

export interface CliIO {
  out: (line: string) => void;
  err: (line: string) => void;
  env: NodeJS.ProcessEnv;
  cwd: string;
}

/**
 * Collaborators the CLI uses; replaced in tests
 */
export interface CliRuntime {
  runWorkflow: (config: OptimizerConfig, request: RunRequest, onProgress: ProgressCallback) => Promise<RunResult>;
  serve: (config: OptimizerConfig, port: number) => Promise<unknown>;
}

const defaultIO: CliIO = {
  out: line => process.stdout.write(`${line}\n`),
  err: line => process.stderr.write(`${line}\n`),
  env: process.env,
  cwd: process.cwd()
};

const defaultRuntime: CliRuntime = {
  runWorkflow: (config, request, onProgress) => createResumeOptimizer(config, { onProgress }).run(request),
  serve: (config, port) => startDashboard(config, port)
};

type ParsedArgs = ReturnType<typeof parse>;

function parse(argv: string[]) {
  return parseArgs({
    args: argv,
    allowPositionals: true,
    strict: true,
    options: {
      scholar: { type: 'string' },
      linkedin: { type: 'string' },
      config: { type: 'string' },
      'no-publish': { type: 'boolean' },
      port: { type: 'string' },
      help: { type: 'boolean', short: 'h' }
    }
  });
}

function loadConfig(args: ParsedArgs, io: CliIO): ConfigManager {
  return new ConfigManager({ configPath: args.values.config, env: io.env, cwd: io.cwd });
}

/**
 * Print a failure; configuration problems list every field
 */
function reportError(error: unknown, io: CliIO): void {
  if (error instanceof PipelineError) {
    io.err(`Run ${error.runId} failed at stage '${error.stage}': ${ErrorHandler.formatUserMessage(error.failure)}`);
    if (error.runDir) {
      io.err(`Artifacts: ${error.runDir}`);
    }
    return;
  }
  if (error instanceof ValidationError) {
    io.err(`${error.userMessage}: ${formatIssues(error.issues)}`);
    return;
  }
  io.err(ErrorHandler.formatUserMessage(error));
}

/**
 * URL as is; anything else is a file holding the posting text
 */
async function readJobSource(source: string, cwd: string): Promise<string> {
  if (isUrl(source)) {
    return source.trim();
  }
  return fs.readFile(path.resolve(cwd, source), 'utf-8');
}

function summarize(result: RunResult, io: CliIO): void {
  const counts: Record<BulletDecision, number> = { KEEP: 0, REWRITE: 0, ADD: 0, DE_EMPHASIZE: 0 };
  for (const record of result.analysis.decisions) {
    counts[record.decision]++;
  }

  const job = result.analysis.job;
  io.out('');
  io.out(`Role:        ${job.role}${job.company ? ` at ${job.company}` : ''}`);
  io.out(`Match score: ${result.analysis.matchScore.toFixed(1)}%`);
  io.out(`Decisions:   ${counts.KEEP} keep, ${counts.REWRITE} rewrite, ${counts.ADD} add, ${counts.DE_EMPHASIZE} de-emphasize`);
  for (const source of result.analysis.profile.sources) {
    io.out(`Source:      ${source.source} ${source.status}${source.status === 'ok' ? ` (${source.statementCount} statements)` : ''}`);
  }
  io.out(`Run dir:     ${result.runDir}`);
  if (result.publish) {
    io.out(`Published:   ${result.publish.htmlUrl ?? `${result.publish.branch}:${result.publish.path}`} (${result.publish.commitSha.slice(0, 7)})`);
  }
}

async function invoke(args: ParsedArgs, io: CliIO, runtime: CliRuntime): Promise<number> {
  const [, jobSource, resumePath] = args.positionals;
  if (!jobSource || !resumePath) {
    io.err('invoke needs <job_source> and <resume_path>');
    io.err(USAGE);
    return 2;
  }

  try {
    const config = loadConfig(args, io).getConfig();
    const request: RunRequest = {
      jobSource: await readJobSource(jobSource, io.cwd),
      resume: {
        fileName: path.basename(resumePath),
        content: await fs.readFile(path.resolve(io.cwd, resumePath), 'utf-8')
      },
      scholarId: args.values.scholar,
      linkedinUrl: args.values.linkedin,
      publish: args.values['no-publish'] ? false : undefined
    };

    const result = await runtime.runWorkflow(config, request, (stage, message) => {
      io.out(`[${stage}] ${message}`);
    });
    summarize(result, io);
    return 0;
  } catch (error) {
    reportError(error, io);
    return 1;
  }
}

function check(args: ParsedArgs, io: CliIO): number {
  try {
    const manager = loadConfig(args, io);
    for (const line of describeConfig(manager.getConfig(), manager.getSourcePath())) {
      io.out(line);
    }
    io.out('Configuration OK');
    return 0;
  } catch (error) {
    reportError(error, io);
    return 1;
  }
}

async function serve(args: ParsedArgs, io: CliIO, runtime: CliRuntime): Promise<number> {
  const port = args.values.port === undefined ? DEFAULT_PORT : Number(args.values.port);
  if (!Number.isInteger(port) || port <= 0 || port > 65535) {
    io.err(`Invalid port: ${args.values.port ?? ''}`);
    return 2;
  }

  try {
    await runtime.serve(loadConfig(args, io).getConfig(), port);
    return 0;
  } catch (error) {
    reportError(error, io);
    return 1;
  }
}

/**
 * Run the CLI and resolve with the exit status
 */
export async function main(
  argv: string[],
  io: CliIO = defaultIO,
  runtime: CliRuntime = defaultRuntime
): Promise<number> {
  let args: ParsedArgs;
  try {
    args = parse(argv);
  } catch (error) {
    io.err(ErrorHandler.describe(error));
    io.err(USAGE);
    return 2;
  }

  const command = args.positionals[0];
  if (args.values.help) {
    io.out(USAGE);
    return 0;
  }

  switch (command) {
    case 'invoke':
      return invoke(args, io, runtime);
    case 'check':
      return check(args, io);
    case 'serve':
      return serve(args, io, runtime);
    default:
      io.err(command ? `Unknown command: ${command}` : 'No command given');
      io.err(USAGE);
      return 2;
  }
}

if (require.main === module) {
  dotenv.config();
  main(process.argv.slice(2))
    .then(code => {
      process.exitCode = code;
    })
    .catch(error => {
      logFatal(error, 'Unhandled CLI failure');
      process.exitCode = 1;
    });
}
