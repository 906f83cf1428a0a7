/**
 * Embedding Store
 *
 * In-process vector index with exact cosine search. Entries are keyed by
 * their text; metadata is whatever the caller attaches (a capability
 * statement, a requirement, a bullet).
 *
 * Every mutation bumps `generation`. `fingerprint()` identifies the
 * contents independently of insertion order, so a persisted snapshot can be
 * checked for staleness before it is reused.
 */

import { createHash } from 'crypto';
import { z } from 'zod';
import { OptimizerErrorFactory } from '../errors/types';
import type { Embedder } from './embedder';

export interface EmbeddingEntry<T> {
  text: string;
  metadata: T;
}

export interface EmbeddingHit<T> {
  text: string;
  metadata: T;
  similarity: number;
}

export interface EmbeddingSnapshot<T> {
  model: string;
  generation: number;
  fingerprint: string;
  entries: Array<{ text: string; metadata: T; vector: number[] }>;
}

interface IndexedEntry<T> {
  text: string;
  metadata: T;
  vector: number[];
  norm: number;
  order: number;
}

function vectorNorm(vector: number[]): number {
  let sum = 0;
  for (const value of vector) sum += value * value;
  return Math.sqrt(sum);
}

/**
 * Cosine similarity clamped to [0, 1]; zero vectors score 0
 */
export function cosineSimilarity(a: number[], b: number[], normA = vectorNorm(a), normB = vectorNorm(b)): number {
  if (a.length !== b.length) {
    throw new Error(`Vector dimension mismatch: ${a.length} vs ${b.length}`);
  }
  if (normA === 0 || normB === 0) {
    return 0;
  }
  let dot = 0;
  for (let i = 0; i < a.length; i++) dot += a[i] * b[i];
  return Math.max(0, Math.min(1, dot / (normA * normB)));
}

/**
 * SHA-256 over the model and the sorted texts
 */
export function computeFingerprint(model: string, texts: Iterable<string>): string {
  const sorted = [...new Set(texts)].sort();
  const hash = createHash('sha256');
  hash.update(model);
  for (const text of sorted) {
    hash.update('\n');
    hash.update(text);
  }
  return hash.digest('hex');
}

const SnapshotEnvelopeSchema = z.object({
  model: z.string().min(1),
  generation: z.number().int().nonnegative(),
  fingerprint: z.string().min(1),
  entries: z.array(
    z.object({
      text: z.string(),
      metadata: z.unknown(),
      vector: z.array(z.number())
    })
  )
});

/**
 * Validate a snapshot read back from disk. Returns null when the document
 * is not a snapshot or any entry's metadata fails the schema.
 */
export function parseEmbeddingSnapshot<T>(
  value: unknown,
  metadataSchema: z.ZodType<T, z.ZodTypeDef, unknown>
): EmbeddingSnapshot<T> | null {
  const envelope = SnapshotEnvelopeSchema.safeParse(value);
  if (!envelope.success) {
    return null;
  }

  const entries: EmbeddingSnapshot<T>['entries'] = [];
  for (const entry of envelope.data.entries) {
    const metadata = metadataSchema.safeParse(entry.metadata);
    if (!metadata.success) {
      return null;
    }
    entries.push({ text: entry.text, metadata: metadata.data, vector: entry.vector });
  }

  return { ...envelope.data, entries };
}

export class EmbeddingStore<T> {
  private readonly entries = new Map<string, IndexedEntry<T>>();
  private nextOrder = 0;
  private generationCounter = 0;

  constructor(private readonly embedder: Embedder) {}

  get generation(): number {
    return this.generationCounter;
  }

  get size(): number {
    return this.entries.size;
  }

  get model(): string {
    return this.embedder.model;
  }

  /**
   * Insert entries, embedding only texts not already indexed.
   * An existing text keeps its vector and takes the newest metadata.
   */
  async add(entries: EmbeddingEntry<T>[]): Promise<void> {
    if (entries.length === 0) {
      return;
    }

    const pending = [...new Set(entries.map(entry => entry.text))].filter(text => !this.entries.has(text));
    const vectors = await this.embedAll(pending);
    const fresh = new Map(pending.map((text, index) => [text, vectors[index]]));

    for (const entry of entries) {
      const existing = this.entries.get(entry.text);
      if (existing) {
        existing.metadata = entry.metadata;
        continue;
      }
      const vector = fresh.get(entry.text);
      if (vector) {
        this.insert(entry.text, entry.metadata, vector);
      }
    }

    this.generationCounter++;
  }

  /**
   * Replace the whole index
   */
  async rebuild(entries: EmbeddingEntry<T>[]): Promise<void> {
    const texts = [...new Set(entries.map(entry => entry.text))];
    const vectors = await this.embedAll(texts);
    const byText = new Map(texts.map((text, index) => [text, vectors[index]]));

    this.entries.clear();
    this.nextOrder = 0;
    for (const entry of entries) {
      const vector = byText.get(entry.text);
      if (!vector) continue;
      const existing = this.entries.get(entry.text);
      if (existing) {
        existing.metadata = entry.metadata;
      } else {
        this.insert(entry.text, entry.metadata, vector);
      }
    }

    this.generationCounter++;
  }

  async query(text: string, k: number, minSimilarity = 0): Promise<Array<EmbeddingHit<T>>> {
    if (this.entries.size === 0 || k <= 0) {
      return [];
    }
    const [vector] = await this.embedAll([text]);
    return this.queryVector(vector, k, minSimilarity);
  }

  /**
   * Top-k by descending similarity; ties keep insertion order
   */
  queryVector(vector: number[], k: number, minSimilarity = 0): Array<EmbeddingHit<T>> {
    if (k <= 0) {
      return [];
    }
    const queryNorm = vectorNorm(vector);

    return [...this.entries.values()]
      .map(entry => ({
        entry,
        similarity: cosineSimilarity(vector, entry.vector, queryNorm, entry.norm)
      }))
      .filter(scored => scored.similarity >= minSimilarity)
      .sort((a, b) => b.similarity - a.similarity || a.entry.order - b.entry.order)
      .slice(0, k)
      .map(({ entry, similarity }) => ({ text: entry.text, metadata: entry.metadata, similarity }));
  }

  /**
   * Stored vector for a text, if indexed
   */
  vectorOf(text: string): number[] | undefined {
    return this.entries.get(text)?.vector;
  }

  fingerprint(): string {
    return computeFingerprint(this.embedder.model, this.entries.keys());
  }

  snapshot(): EmbeddingSnapshot<T> {
    const ordered = [...this.entries.values()].sort((a, b) => a.order - b.order);
    return {
      model: this.embedder.model,
      generation: this.generationCounter,
      fingerprint: this.fingerprint(),
      entries: ordered.map(entry => ({ text: entry.text, metadata: entry.metadata, vector: entry.vector }))
    };
  }

  static restore<T>(snapshot: EmbeddingSnapshot<T>, embedder: Embedder): EmbeddingStore<T> {
    if (snapshot.model !== embedder.model) {
      throw new Error(`Snapshot was built with ${snapshot.model}, embedder uses ${embedder.model}`);
    }
    const store = new EmbeddingStore<T>(embedder);
    for (const entry of snapshot.entries) {
      store.insert(entry.text, entry.metadata, entry.vector);
    }
    store.generationCounter = snapshot.generation;
    return store;
  }

  private insert(text: string, metadata: T, vector: number[]): void {
    this.entries.set(text, { text, metadata, vector, norm: vectorNorm(vector), order: this.nextOrder++ });
  }

  private async embedAll(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }
    let vectors: number[][];
    try {
      vectors = await this.embedder.embed(texts);
    } catch (error) {
      throw OptimizerErrorFactory.embeddingFailed(error);
    }
    if (vectors.length !== texts.length) {
      throw OptimizerErrorFactory.embeddingFailed(
        new Error(`Embedder returned ${vectors.length} vectors for ${texts.length} texts`)
      );
    }
    return vectors;
  }
}
