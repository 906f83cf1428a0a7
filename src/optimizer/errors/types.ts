/**
 * Optimizer Error Types
 *
 * Typed failures reported by pipeline components. Every error names the
 * component it originated in; the orchestrator wraps fatal ones in a
 * PipelineError naming the stage.
 */

import { AppError, ErrorCategory, ErrorSeverity } from '../../shared/errors/types';
import { ValidationIssue } from '../../shared/validation/types';

export enum OptimizerErrorCode {
  SOURCE_FETCH_FAILED = 'SOURCE_FETCH_FAILED',
  JOB_FETCH_FAILED = 'JOB_FETCH_FAILED',
  JOB_EXTRACTION_FAILED = 'JOB_EXTRACTION_FAILED',
  RESUME_EXTRACTION_FAILED = 'RESUME_EXTRACTION_FAILED',
  MALFORMED_MODEL_REPLY = 'MALFORMED_MODEL_REPLY',
  LLM_REQUEST_FAILED = 'LLM_REQUEST_FAILED',
  EMBEDDING_REQUEST_FAILED = 'EMBEDDING_REQUEST_FAILED',
  GITHUB_REQUEST_FAILED = 'GITHUB_REQUEST_FAILED',
  INVALID_CONFIGURATION = 'INVALID_CONFIGURATION',
  INVALID_REQUEST = 'INVALID_REQUEST',
  MISSING_EVIDENCE = 'MISSING_EVIDENCE',
  STAGE_FAILED = 'STAGE_FAILED'
}

/**
 * Names of the components that raise errors
 */
export type ComponentName =
  | 'profile-ingester'
  | 'profile-analyzer'
  | 'embeddings'
  | 'job-parser'
  | 'resume-parser'
  | 'alignment-engine'
  | 'rewrite-engine'
  | 'github-publisher'
  | 'orchestrator'
  | 'config'
  | 'dashboard';

export type PipelineStage =
  | 'ingest'
  | 'analyze-profile'
  | 'index-profile'
  | 'parse-job'
  | 'parse-resume'
  | 'index-job'
  | 'align'
  | 'rewrite'
  | 'write-artifacts'
  | 'publish';

/**
 * Error response structure for the dashboard API
 */
export interface ErrorResponse {
  error: string;
  code: OptimizerErrorCode;
  component: ComponentName;
  stage?: PipelineStage;
  details?: string;
  validationErrors?: ValidationIssue[];
  runId?: string;
}

interface OptimizerErrorOptions {
  category?: ErrorCategory;
  severity?: ErrorSeverity;
  context?: Record<string, unknown>;
  recoverable?: boolean;
  suggestedAction?: string;
  cause?: unknown;
}

export class OptimizerError extends AppError {
  public readonly code: OptimizerErrorCode;
  public readonly component: ComponentName;

  constructor(
    code: OptimizerErrorCode,
    component: ComponentName,
    userMessage: string,
    technicalDetails: string,
    options: OptimizerErrorOptions = {}
  ) {
    super({
      category: options.category ?? ErrorCategory.UNEXPECTED,
      severity: options.severity ?? ErrorSeverity.MEDIUM,
      userMessage,
      technicalDetails,
      timestamp: new Date(),
      context: options.context,
      recoverable: options.recoverable ?? false,
      suggestedAction: options.suggestedAction,
      cause: options.cause
    });
    this.name = 'OptimizerError';
    this.code = code;
    this.component = component;
  }

  toErrorResponse(): ErrorResponse {
    return {
      error: this.userMessage,
      code: this.code,
      component: this.component,
      details: this.technicalDetails
    };
  }
}

/**
 * One ingestion source could not be read. Never fatal.
 */
export class SourceFetchError extends OptimizerError {
  public readonly source: string;

  constructor(source: string, technicalDetails: string, cause?: unknown) {
    super(
      OptimizerErrorCode.SOURCE_FETCH_FAILED,
      'profile-ingester',
      `Could not fetch ${source} profile data`,
      technicalDetails,
      {
        category: ErrorCategory.SOURCE,
        severity: ErrorSeverity.LOW,
        recoverable: true,
        context: { source },
        cause
      }
    );
    this.name = 'SourceFetchError';
    this.source = source;
  }
}

/**
 * The job posting or resume yielded no usable structure
 */
export class ExtractionError extends OptimizerError {
  constructor(
    code: OptimizerErrorCode,
    component: ComponentName,
    userMessage: string,
    technicalDetails: string,
    options: Omit<OptimizerErrorOptions, 'category'> = {}
  ) {
    super(code, component, userMessage, technicalDetails, {
      ...options,
      category: ErrorCategory.EXTRACTION,
      severity: options.severity ?? ErrorSeverity.HIGH
    });
    this.name = 'ExtractionError';
  }
}

/**
 * An LLM, embeddings or GitHub call failed
 */
export class ExternalServiceError extends OptimizerError {
  public readonly service: 'llm' | 'embeddings' | 'github';
  public readonly statusCode?: number;

  constructor(
    code: OptimizerErrorCode,
    component: ComponentName,
    service: 'llm' | 'embeddings' | 'github',
    technicalDetails: string,
    options: { statusCode?: number; cause?: unknown; context?: Record<string, unknown> } = {}
  ) {
    super(
      code,
      component,
      `${describeService(service)} request failed in ${component}`,
      technicalDetails,
      {
        category: ErrorCategory.EXTERNAL_SERVICE,
        severity: ErrorSeverity.HIGH,
        context: { ...options.context, service, statusCode: options.statusCode },
        cause: options.cause,
        suggestedAction: suggestionForStatus(service, options.statusCode)
      }
    );
    this.name = 'ExternalServiceError';
    this.service = service;
    this.statusCode = options.statusCode;
  }
}

/**
 * Malformed configuration or request
 */
export class ValidationError extends OptimizerError {
  public readonly issues: ValidationIssue[];

  constructor(
    component: ComponentName,
    userMessage: string,
    issues: ValidationIssue[],
    code: OptimizerErrorCode = OptimizerErrorCode.INVALID_CONFIGURATION
  ) {
    super(
      code,
      component,
      userMessage,
      issues.map(issue => `${issue.field}: ${issue.message}`).join('; '),
      {
        category: ErrorCategory.VALIDATION,
        severity: ErrorSeverity.CRITICAL,
        context: { issues }
      }
    );
    this.name = 'ValidationError';
    this.issues = issues;
  }

  override toErrorResponse(): ErrorResponse {
    return { ...super.toErrorResponse(), validationErrors: this.issues };
  }
}

/**
 * A fatal failure in one orchestrator stage
 */
export class PipelineError extends OptimizerError {
  public readonly stage: PipelineStage;
  public readonly runId: string;
  public readonly runDir?: string;
  public readonly failure: OptimizerError;

  constructor(
    stage: PipelineStage,
    runId: string,
    failure: OptimizerError,
    runDir?: string
  ) {
    super(
      OptimizerErrorCode.STAGE_FAILED,
      failure.component,
      `Run ${runId} failed at stage '${stage}': ${failure.userMessage}`,
      failure.technicalDetails,
      {
        category: ErrorCategory.PIPELINE,
        severity: ErrorSeverity.HIGH,
        context: { stage, runId, runDir },
        cause: failure
      }
    );
    this.name = 'PipelineError';
    this.stage = stage;
    this.runId = runId;
    this.runDir = runDir;
    this.failure = failure;
  }

  override toErrorResponse(): ErrorResponse {
    return {
      ...this.failure.toErrorResponse(),
      error: this.userMessage,
      stage: this.stage,
      runId: this.runId
    };
  }
}

function describeService(service: 'llm' | 'embeddings' | 'github'): string {
  switch (service) {
    case 'llm':
      return 'LLM';
    case 'embeddings':
      return 'Embedding';
    case 'github':
      return 'GitHub';
  }
}

function suggestionForStatus(service: string, statusCode?: number): string | undefined {
  if (statusCode === 401 || statusCode === 403) {
    return `Check the ${service} credentials and their permissions.`;
  }
  if (statusCode === 404) {
    return `Check that the ${service} target (repository, branch or model) exists.`;
  }
  if (statusCode === 429) {
    return `The ${service} provider is rate limiting requests; wait before running again.`;
  }
  return undefined;
}

/**
 * Pull an HTTP status out of an SDK or fetch error, if it carries one
 */
export function statusOf(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && 'status' in error) {
    const status = error.status;
    return typeof status === 'number' ? status : undefined;
  }
  return undefined;
}

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Factory functions for common error types
 */
export class OptimizerErrorFactory {
  static sourceFetchFailed(source: string, error: unknown): SourceFetchError {
    if (error instanceof SourceFetchError) {
      return error;
    }
    return new SourceFetchError(source, messageOf(error), error);
  }

  static llmFailed(component: ComponentName, error: unknown): ExternalServiceError {
    return new ExternalServiceError(
      OptimizerErrorCode.LLM_REQUEST_FAILED,
      component,
      'llm',
      messageOf(error),
      { statusCode: statusOf(error), cause: error }
    );
  }

  static embeddingFailed(error: unknown): ExternalServiceError {
    if (error instanceof ExternalServiceError && error.service === 'embeddings') {
      return error;
    }
    return new ExternalServiceError(
      OptimizerErrorCode.EMBEDDING_REQUEST_FAILED,
      'embeddings',
      'embeddings',
      messageOf(error),
      { statusCode: statusOf(error), cause: error }
    );
  }

  static githubFailed(details: string, statusCode?: number, cause?: unknown): ExternalServiceError {
    return new ExternalServiceError(
      OptimizerErrorCode.GITHUB_REQUEST_FAILED,
      'github-publisher',
      'github',
      details,
      { statusCode, cause }
    );
  }

  static malformedReply(component: ComponentName, details: string, cause?: unknown): ExtractionError {
    return new ExtractionError(
      OptimizerErrorCode.MALFORMED_MODEL_REPLY,
      component,
      'The model returned a reply that could not be understood',
      details,
      { cause }
    );
  }

  static jobFetchFailed(url: string, details: string, cause?: unknown): ExtractionError {
    return new ExtractionError(
      OptimizerErrorCode.JOB_FETCH_FAILED,
      'job-parser',
      `Could not retrieve the job posting at ${url}`,
      details,
      { cause, context: { url, statusCode: statusOf(cause) } }
    );
  }

  static jobExtractionFailed(details: string): ExtractionError {
    return new ExtractionError(
      OptimizerErrorCode.JOB_EXTRACTION_FAILED,
      'job-parser',
      'No usable job description could be extracted',
      details
    );
  }

  static resumeExtractionFailed(fileName: string, details: string, cause?: unknown): ExtractionError {
    return new ExtractionError(
      OptimizerErrorCode.RESUME_EXTRACTION_FAILED,
      'resume-parser',
      `No resume bullets could be extracted from ${fileName}`,
      details,
      {
        cause,
        suggestedAction: 'Bullets are read from \\item, \\resumeItem{...} and "- " lines inside \\section blocks.'
      }
    );
  }

  static missingEvidence(decision: string, target: string): OptimizerError {
    return new OptimizerError(
      OptimizerErrorCode.MISSING_EVIDENCE,
      'rewrite-engine',
      'Refusing to rewrite without supporting profile evidence',
      `${decision} requested for "${target}" with an empty evidence list`,
      { category: ErrorCategory.VALIDATION, severity: ErrorSeverity.CRITICAL }
    );
  }

  static configurationError(issues: ValidationIssue[]): ValidationError {
    return new ValidationError('config', 'Invalid configuration', issues);
  }

  static invalidRequest(issues: ValidationIssue[]): ValidationError {
    return new ValidationError(
      'dashboard',
      'Invalid request',
      issues,
      OptimizerErrorCode.INVALID_REQUEST
    );
  }
}
