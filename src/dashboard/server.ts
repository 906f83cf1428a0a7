/**
 * Dashboard server - wires the production optimizer into the Express app
 * and starts listening.
 */

import type { Server } from 'http';
import { createComponentLogger } from '../shared/logging/logger';
import { FileStorage } from '../shared/storage/fileStorage';
import type { OptimizerConfig } from '../optimizer/config';
import { HttpClient } from '../optimizer/http/httpClient';
import { createResumeOptimizer, publishTargetOf } from '../optimizer/orchestrator';
import { GitHubRepository } from '../optimizer/publish/githubRepository';
import { createDashboardApp } from './app';

const log = createComponentLogger('dashboard');

export const DEFAULT_PORT = 3000;

export function startDashboard(config: OptimizerConfig, port: number = DEFAULT_PORT): Promise<Server> {
  const optimizer = createResumeOptimizer(config);
  const target = publishTargetOf(config);
  const repository = target
    ? new GitHubRepository(target, new HttpClient({ timeoutMs: config.http.timeoutMs, userAgent: config.http.userAgent }))
    : undefined;

  const app = createDashboardApp({
    runWorkflow: request => optimizer.run(request),
    storage: new FileStorage(config.output.dir),
    fetchResume: repository ? () => repository.fetchResume() : undefined
  });

  return new Promise((resolve, reject) => {
    const server = app.listen(port, () => {
      log.info({ port, outputDir: config.output.dir }, `Dashboard listening on port ${port}`);
      resolve(server);
    });
    server.on('error', reject);
  });
}
