/**
 * Tests for the per-run journal
 */

import { describe, it, expect } from 'vitest';
import { RunLog, LogType } from '../../optimizer/logging/runLog';
import { OptimizerErrorFactory } from '../../optimizer/errors/types';

describe('RunLog', () => {
  it('should record stage start and completion', () => {
    const runLog = new RunLog('20260101-120000-abcdef');
    const finish = runLog.startStage('ingest');
    finish('ok');

    const [stage] = runLog.getStages();
    expect(stage.stage).toBe('ingest');
    expect(stage.status).toBe('ok');
    expect(stage.durationMs).toBeGreaterThanOrEqual(0);
    expect(runLog.getEntries(LogType.STAGE).map(entry => entry.message)).toEqual([
      'Stage ingest started',
      'Stage ingest completed'
    ]);
  });

  it('should mark failed stages', () => {
    const runLog = new RunLog('run');
    runLog.startStage('parse-job')('failed');

    expect(runLog.getStages()[0].status).toBe('failed');
    expect(runLog.getEntries(LogType.STAGE)[1].message).toBe('Stage parse-job failed');
  });

  it('should describe decisions', () => {
    const runLog = new RunLog('run');
    runLog.logDecision({
      decision: 'REWRITE',
      bulletId: 'b1',
      originalText: 'Built pipelines',
      similarity: 0.62,
      evidence: [],
      reason: 'Partial match'
    });

    const [entry] = runLog.getEntries(LogType.DECISION);
    expect(entry.message).toBe('REWRITE: Built pipelines');
    expect(entry.stage).toBe('align');
    expect(entry.context).toMatchObject({ bulletId: 'b1', similarity: 0.62, evidenceCount: 0 });
  });

  it('should keep error category and severity', () => {
    const runLog = new RunLog('run');
    runLog.logError(OptimizerErrorFactory.jobExtractionFailed('empty page'), 'parse-job');

    const [entry] = runLog.getEntries(LogType.ERROR);
    expect(entry.message).toBe('No usable job description could be extracted');
    expect(entry.context).toMatchObject({ category: 'EXTRACTION', severity: 'high' });
  });

  it('should drop the oldest entries past the limit', () => {
    const runLog = new RunLog('run', { maxEntries: 2 });
    runLog.logInfo('one');
    runLog.logInfo('two');
    runLog.logInfo('three');

    expect(runLog.getEntries().map(entry => entry.message)).toEqual(['two', 'three']);
  });

  it('should export stages and entries as JSON', () => {
    const runLog = new RunLog('run-42');
    runLog.startStage('align')('ok');
    runLog.logInfo('Publishing disabled', { reason: 'config' }, 'publish');

    const exported = JSON.parse(runLog.export());
    expect(exported.runId).toBe('run-42');
    expect(exported.stages).toHaveLength(1);
    expect(exported.entries[2]).toMatchObject({
      type: 'INFO',
      message: 'Publishing disabled',
      stage: 'publish',
      context: { reason: 'config' }
    });
  });
});
