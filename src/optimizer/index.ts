/**
 * Resume optimizer public API
 */

export * from './types';
export * from './errors/types';
export * from './config';
export * from './logging/runLog';
export * from './http/httpClient';
export * from './ingest';
export * from './analyzer';
export * from './embeddings';
export * from './parser';
export * from './alignment';
export * from './rewrite';
export * from './publish';
export * from './orchestrator';

export * from '../shared';
