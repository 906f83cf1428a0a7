/**
 * Run Log
 *
 * Per-run journal of stage transitions, source outcomes, decisions and
 * errors. Entries are mirrored to the process logger as they happen and
 * exported to run-log.json at the end of the run.
 */

import type { Logger } from 'pino';
import { createRunLogger, serializeError } from '../../shared/logging/logger';
import { AppError } from '../../shared/errors/types';
import type { PipelineStage } from '../errors/types';
import type { DecisionRecord, SourceReport } from '../types';

export enum LogType {
  STAGE = 'STAGE',
  SOURCE = 'SOURCE',
  DECISION = 'DECISION',
  LLM = 'LLM',
  ERROR = 'ERROR',
  INFO = 'INFO'
}

export interface LogEntry {
  type: LogType;
  timestamp: string;
  message: string;
  stage?: PipelineStage;
  context?: Record<string, unknown>;
}

export interface StageTiming {
  stage: PipelineStage;
  startedAt: string;
  durationMs?: number;
  status: 'running' | 'ok' | 'failed';
}

export class RunLog {
  private readonly entries: LogEntry[] = [];
  private readonly stages: StageTiming[] = [];
  private readonly logger: Logger;
  private readonly maxEntries: number;

  constructor(
    public readonly runId: string,
    options: { logger?: Logger; maxEntries?: number } = {}
  ) {
    this.logger = options.logger ?? createRunLogger(runId);
    this.maxEntries = options.maxEntries ?? 2000;
  }

  /**
   * Mark a stage as started; returns a function that closes it
   */
  startStage(stage: PipelineStage): (status: 'ok' | 'failed') => void {
    const started = Date.now();
    const timing: StageTiming = {
      stage,
      startedAt: new Date(started).toISOString(),
      status: 'running'
    };
    this.stages.push(timing);
    this.add(LogType.STAGE, `Stage ${stage} started`, { stage });

    return (status) => {
      timing.status = status;
      timing.durationMs = Date.now() - started;
      this.add(LogType.STAGE, `Stage ${stage} ${status === 'ok' ? 'completed' : 'failed'}`, {
        stage,
        context: { durationMs: timing.durationMs }
      });
    };
  }

  logSource(report: SourceReport): void {
    const message = report.status === 'ok'
      ? `Source ${report.source}: ${report.statementCount} statements`
      : `Source ${report.source} ${report.status}${report.error ? `: ${report.error}` : ''}`;
    this.add(LogType.SOURCE, message, {
      stage: 'ingest',
      context: { ...report },
      level: report.status === 'failed' ? 'warn' : 'info'
    });
  }

  logDecision(record: DecisionRecord): void {
    this.add(LogType.DECISION, `${record.decision}: ${record.originalText ?? record.requirementText ?? ''}`, {
      stage: 'align',
      context: {
        decision: record.decision,
        bulletId: record.bulletId,
        requirementId: record.requirementId,
        similarity: record.similarity,
        evidenceCount: record.evidence.length,
        reason: record.reason
      },
      level: 'debug'
    });
  }

  logLLMCall(component: string, purpose: string, durationMs: number): void {
    this.add(LogType.LLM, `${component}: ${purpose}`, {
      context: { component, purpose, durationMs },
      level: 'debug'
    });
  }

  logError(error: unknown, stage?: PipelineStage): void {
    const context: Record<string, unknown> = { err: serializeError(error) };
    if (error instanceof AppError) {
      context.category = error.category;
      context.severity = error.severity;
    }
    const message = error instanceof Error ? error.message : String(error);
    this.add(LogType.ERROR, message, { stage, context, level: 'error' });
  }

  logInfo(message: string, context?: Record<string, unknown>, stage?: PipelineStage): void {
    this.add(LogType.INFO, message, { stage, context });
  }

  getEntries(type?: LogType): LogEntry[] {
    return type ? this.entries.filter(entry => entry.type === type) : [...this.entries];
  }

  getStages(): StageTiming[] {
    return this.stages.map(stage => ({ ...stage }));
  }

  /**
   * JSON document written as run-log.json
   */
  export(): string {
    return JSON.stringify(
      { runId: this.runId, stages: this.stages, entries: this.entries },
      null,
      2
    );
  }

  private add(
    type: LogType,
    message: string,
    options: {
      stage?: PipelineStage;
      context?: Record<string, unknown>;
      level?: 'debug' | 'info' | 'warn' | 'error';
    } = {}
  ): void {
    const entry: LogEntry = {
      type,
      timestamp: new Date().toISOString(),
      message,
      stage: options.stage,
      context: options.context
    };

    if (this.entries.length >= this.maxEntries) {
      this.entries.shift();
    }
    this.entries.push(entry);

    const level = options.level ?? 'info';
    this.logger[level]({ type, stage: options.stage, ...options.context }, message);
  }
}
