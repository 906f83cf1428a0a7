/**
 * Runs routes - start an optimization run and browse the artifacts of
 * earlier runs.
 */

import { Router, Request, Response } from 'express';
import { z } from 'zod';
import { createComponentLogger } from '../../shared/logging/logger';
import type { StorageProvider } from '../../shared/storage/interface';
import { HttpUrlSchema, NonEmptyStringSchema } from '../../shared/validation/schemas';
import { validateWithSchema } from '../../shared/validation/validator';
import { OptimizerErrorFactory } from '../../optimizer/errors/types';
import { RUNS_DIR, type RunRequest, type RunResult } from '../../optimizer/orchestrator';
import { ApiError, asyncHandler } from '../middleware/errorHandler';

const log = createComponentLogger('dashboard');

export const RUN_ID_PATTERN = /^\d{8}-\d{6}-[0-9a-f]{6}$/;
const FILE_NAME_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;

export const CreateRunSchema = z.object({
  jobSource: NonEmptyStringSchema,
  resumeFileName: NonEmptyStringSchema,
  resumeContent: z.string().min(1, 'Must not be empty').optional(),
  scholarId: NonEmptyStringSchema.optional(),
  linkedinUrl: HttpUrlSchema.optional(),
  publish: z.boolean().optional()
});

export interface RunsRouterOptions {
  runWorkflow: (request: RunRequest) => Promise<RunResult>;
  /** Rooted at the output directory */
  storage: StorageProvider;
  /** Reads the resume from the publish repository */
  fetchResume?: () => Promise<string>;
}

function runIdParam(req: Request): string {
  const runId = req.params.runId;
  if (!RUN_ID_PATTERN.test(runId)) {
    throw new ApiError(400, `Invalid run id: ${runId}`, 'INVALID_RUN_ID');
  }
  return runId;
}

export function createRunsRouter(options: RunsRouterOptions): Router {
  const { runWorkflow, storage, fetchResume } = options;
  const router = Router();

  /**
   * POST /api/runs
   * Run the optimizer; responds once the run has finished
   */
  router.post('/', asyncHandler(async (req: Request, res: Response) => {
    const { result, data } = validateWithSchema(CreateRunSchema, req.body);
    if (!data) {
      throw OptimizerErrorFactory.invalidRequest(result.errors);
    }

    let content = data.resumeContent;
    if (content === undefined) {
      if (!fetchResume) {
        throw OptimizerErrorFactory.invalidRequest([
          { field: 'resumeContent', message: 'Required when no publish repository is configured' }
        ]);
      }
      content = await fetchResume();
    }

    const run = await runWorkflow({
      jobSource: data.jobSource,
      resume: { fileName: data.resumeFileName, content },
      scholarId: data.scholarId,
      linkedinUrl: data.linkedinUrl,
      publish: data.publish
    });

    log.info({ runId: run.runId, matchScore: run.analysis.matchScore }, 'Run finished');
    res.status(201).json({
      runId: run.runId,
      analysis: run.analysis,
      published: run.publish ?? null
    });
  }));

  /**
   * GET /api/runs
   * Run ids, newest first
   */
  router.get('/', asyncHandler(async (_req: Request, res: Response) => {
    const entries = await storage.list(RUNS_DIR);
    const runs = entries
      .filter(entry => entry.isDirectory && RUN_ID_PATTERN.test(entry.name))
      .map(entry => entry.name)
      .sort()
      .reverse();
    res.json({ runs });
  }));

  /**
   * GET /api/runs/:runId
   * The run's analysis.json
   */
  router.get('/:runId', asyncHandler(async (req: Request, res: Response) => {
    const runId = runIdParam(req);
    const analysisPath = `${RUNS_DIR}/${runId}/analysis.json`;
    if (!(await storage.exists(analysisPath))) {
      throw new ApiError(404, `Run not found: ${runId}`, 'RUN_NOT_FOUND');
    }
    const analysis: unknown = JSON.parse(await storage.read(analysisPath));
    res.json(analysis);
  }));

  /**
   * GET /api/runs/:runId/files/:fileName
   * Download one artifact of the run
   */
  router.get('/:runId/files/:fileName', asyncHandler(async (req: Request, res: Response) => {
    const runId = runIdParam(req);
    const fileName = req.params.fileName;
    if (!FILE_NAME_PATTERN.test(fileName) || fileName.includes('..')) {
      throw new ApiError(400, `Invalid file name: ${fileName}`, 'INVALID_FILE_NAME');
    }

    const filePath = `${RUNS_DIR}/${runId}/${fileName}`;
    if (!(await storage.exists(filePath))) {
      throw new ApiError(404, `File not found: ${fileName}`, 'FILE_NOT_FOUND');
    }
    const content = await storage.read(filePath);
    res.attachment(fileName);
    res.type(fileName.endsWith('.json') ? 'application/json' : 'text/plain');
    res.send(content);
  }));

  return router;
}
