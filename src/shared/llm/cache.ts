/**
 * LLM Cache
 *
 * In-process response cache for a single LLMClient. Within one run the same
 * bullet/requirement pair can be sent more than once (dashboard re-runs,
 * duplicate bullets); identical prompts are answered from memory.
 */

import { createHash } from 'crypto';
import { LLMResponse } from './types';

interface CacheEntry {
  response: LLMResponse;
  timestamp: number;
}

/**
 * Cache configuration
 */
export interface CacheConfig {
  enabled: boolean;
  ttlSeconds: number;
  maxEntries: number;
}

export const DEFAULT_CACHE_CONFIG: CacheConfig = {
  enabled: true,
  ttlSeconds: 3600,
  maxEntries: 500
};

export interface CacheStats {
  size: number;
  maxEntries: number;
  enabled: boolean;
  hits: number;
  misses: number;
}

/**
 * LLM response cache with FIFO eviction
 */
export class LLMCache {
  private cache: Map<string, CacheEntry> = new Map();
  private config: CacheConfig;
  private hits = 0;
  private misses = 0;

  constructor(config: Partial<CacheConfig> = {}) {
    this.config = { ...DEFAULT_CACHE_CONFIG, ...config };
  }

  private generateKey(
    systemPrompt: string,
    userPrompt: string,
    temperature: number,
    model: string
  ): string {
    const digest = createHash('sha256')
      .update(`${model}\u0000${temperature}\u0000${systemPrompt}\u0000${userPrompt}`)
      .digest('hex');
    return `${model}:${digest}`;
  }

  /**
   * Get cached response if available and not expired
   */
  get(
    systemPrompt: string,
    userPrompt: string,
    temperature: number,
    model: string
  ): LLMResponse | null {
    if (!this.config.enabled) {
      return null;
    }

    const key = this.generateKey(systemPrompt, userPrompt, temperature, model);
    const entry = this.cache.get(key);

    if (!entry) {
      this.misses++;
      return null;
    }

    if (this.isExpired(entry, Date.now())) {
      this.cache.delete(key);
      this.misses++;
      return null;
    }

    this.hits++;
    return entry.response;
  }

  set(
    systemPrompt: string,
    userPrompt: string,
    temperature: number,
    model: string,
    response: LLMResponse
  ): void {
    if (!this.config.enabled) {
      return;
    }

    const key = this.generateKey(systemPrompt, userPrompt, temperature, model);

    if (!this.cache.has(key) && this.cache.size >= this.config.maxEntries && this.cleanup() === 0) {
      const oldest = this.cache.keys().next();
      if (!oldest.done) {
        this.cache.delete(oldest.value);
      }
    }

    this.cache.set(key, { response, timestamp: Date.now() });
  }

  getStats(): CacheStats {
    return {
      size: this.cache.size,
      maxEntries: this.config.maxEntries,
      enabled: this.config.enabled,
      hits: this.hits,
      misses: this.misses
    };
  }

  /**
   * Remove expired entries, returning how many were dropped
   */
  cleanup(): number {
    const now = Date.now();
    let removed = 0;

    for (const [key, entry] of this.cache.entries()) {
      if (this.isExpired(entry, now)) {
        this.cache.delete(key);
        removed++;
      }
    }

    return removed;
  }

  private isExpired(entry: CacheEntry, now: number): boolean {
    return (now - entry.timestamp) / 1000 > this.config.ttlSeconds;
  }
}
