/**
 * Embedders
 *
 * The store only needs text in, vectors out. OpenAIEmbedder is the
 * production implementation; tests substitute fixed vectors.
 */

import OpenAI from 'openai';
import { createComponentLogger } from '../../shared/logging/logger';
import { OptimizerErrorFactory } from '../errors/types';

const log = createComponentLogger('embeddings');

export interface Embedder {
  /** Identifies the vector space; part of every index fingerprint */
  readonly model: string;
  /** One vector per input text, in input order */
  embed(texts: string[]): Promise<number[][]>;
}

export interface OpenAIEmbedderConfig {
  apiKey: string;
  model: string;
  batchSize: number;
  timeoutMs?: number;
}

export class OpenAIEmbedder implements Embedder {
  readonly model: string;
  private readonly client: OpenAI;
  private readonly batchSize: number;

  constructor(config: OpenAIEmbedderConfig, client?: OpenAI) {
    this.model = config.model;
    this.batchSize = config.batchSize;
    this.client = client ?? new OpenAI({ apiKey: config.apiKey, timeout: config.timeoutMs });
  }

  async embed(texts: string[]): Promise<number[][]> {
    const vectors: number[][] = [];

    for (let offset = 0; offset < texts.length; offset += this.batchSize) {
      const batch = texts.slice(offset, offset + this.batchSize);
      const started = Date.now();

      try {
        const response = await this.client.embeddings.create({ model: this.model, input: batch });
        const ordered = [...response.data].sort((a, b) => a.index - b.index);
        if (ordered.length !== batch.length) {
          throw new Error(`Expected ${batch.length} embeddings, received ${ordered.length}`);
        }
        vectors.push(...ordered.map(item => item.embedding));
      } catch (error) {
        throw OptimizerErrorFactory.embeddingFailed(error);
      }

      log.debug({ model: this.model, count: batch.length, elapsedMs: Date.now() - started }, 'embedded batch');
    }

    return vectors;
  }
}
