// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Base Embedding Provider
 *
 * Abstract class that all embedding providers must implement. Remote calls
 * share one path: admission control (p-limit), per-request timeout, retry with
 * backoff, and a dimensionality check on every returned vector.
 */

import { createHash } from 'crypto';
import pLimit, { type LimitFunction } from 'p-limit';
import { ConfigError, EmbeddingUnavailableError, isAbortError, toError } from '../../errors.js';
import { logger } from '../../logger.js';
import { withRetry, withTimeout } from '../../providers/retry.js';

/**
 * Simple hash function for cache keys.
 */
function hashText(text: string): string {
  return createHash('sha256').update(text).digest('hex').slice(0, 16);
}

/**
 * Embedding cache entry with TTL.
 */
interface EmbeddingCacheEntry {
  embedding: readonly number[];
  timestamp: number;
}

/**
 * In-memory LRU cache for embeddings with TTL. Stored vectors are never
 * handed out; callers receive copies.
 */
class EmbeddingCache {
  private cache = new Map<string, EmbeddingCacheEntry>();
  private maxSize: number;
  private ttlMs: number;

  constructor(maxSize = 1000, ttlMinutes = 60) {
    this.maxSize = maxSize;
    this.ttlMs = ttlMinutes * 60 * 1000;
  }

  get(key: string): readonly number[] | undefined {
    const entry = this.cache.get(key);
    if (!entry) return undefined;

    // Check TTL
    if (Date.now() - entry.timestamp > this.ttlMs) {
      this.cache.delete(key);
      return undefined;
    }

    // Move to end for LRU (delete and re-add)
    this.cache.delete(key);
    this.cache.set(key, entry);
    return entry.embedding;
  }

  set(key: string, embedding: readonly number[]): void {
    // Evict oldest entries if at capacity
    while (this.cache.size >= this.maxSize) {
      const firstKey = this.cache.keys().next().value;
      if (firstKey === undefined) break;
      this.cache.delete(firstKey);
    }

    this.cache.set(key, {
      embedding,
      timestamp: Date.now(),
    });
  }

  clear(): void {
    this.cache.clear();
  }

  get size(): number {
    return this.cache.size;
  }
}

// Shared cache instance across all providers
const embeddingCache = new EmbeddingCache();

/**
 * Settings every provider receives from the embedding config section.
 */
export interface EmbeddingProviderOptions {
  dimensions: number;
  /** Maximum in-flight requests */
  concurrency: number;
  /** Per-request timeout in ms */
  timeoutMs: number;
  /** Retries for transient failures */
  maxRetries: number;
  /** First backoff delay in ms (default: 1000) */
  retryDelayMs?: number;
}

/**
 * Abstract base class for embedding providers.
 */
export abstract class BaseEmbeddingProvider {
  protected readonly dimensions: number;
  protected readonly timeoutMs: number;
  protected readonly maxRetries: number;
  protected readonly retryDelayMs: number;
  /** Most texts sent in one request */
  protected readonly maxBatchSize: number = 100;
  private readonly limit: LimitFunction;

  constructor(options: EmbeddingProviderOptions) {
    this.dimensions = options.dimensions;
    this.timeoutMs = options.timeoutMs;
    this.maxRetries = options.maxRetries;
    this.retryDelayMs = options.retryDelayMs ?? 1000;
    this.limit = pLimit(options.concurrency);
  }

  /**
   * Get the provider name (e.g., "OpenAI", "Ollama").
   */
  abstract getName(): string;

  /**
   * Get the model name being used.
   */
  abstract getModel(): string;

  /**
   * One request to the embedding backend. Vectors come back in input order.
   */
  protected abstract request(texts: string[], signal: AbortSignal): Promise<number[][]>;

  /**
   * Get the embedding vector dimensions.
   */
  getDimensions(): number {
    return this.dimensions;
  }

  /**
   * Identity recorded in the index manifest; ingestion and queries must agree on it.
   */
  fingerprint(): string {
    return `${this.getName().toLowerCase()}:${this.getModel()}:${this.dimensions}`;
  }

  /**
   * Generate embeddings for multiple texts, bypassing the cache.
   * @returns One vector per input text, in input order
   * @throws EmbeddingUnavailableError when a request still fails after retries
   * @throws ConfigError when the backend returns vectors of the wrong size
   */
  async embed(texts: string[], signal?: AbortSignal): Promise<number[][]> {
    if (texts.length === 0) return [];

    const groups: string[][] = [];
    for (let i = 0; i < texts.length; i += this.maxBatchSize) {
      groups.push(texts.slice(i, i + this.maxBatchSize));
    }

    const results = await Promise.all(groups.map((group) => this.embedGroup(group, signal)));
    return results.flat();
  }

  private async embedGroup(texts: string[], signal?: AbortSignal): Promise<number[][]> {
    let attempts = 0;
    let vectors: number[][];

    try {
      vectors = await withRetry(
        (attempt) =>
          this.limit(() => {
            attempts = attempt + 1;
            return withTimeout((requestSignal) => this.request(texts, requestSignal), this.timeoutMs, signal);
          }),
        {
          maxRetries: this.maxRetries,
          initialDelayMs: this.retryDelayMs,
          signal,
          onRetry: (attempt, error, delayMs) =>
            logger.retry(`${this.getName()} embeddings`, attempt, error, delayMs),
        }
      );
    } catch (error) {
      if (isAbortError(error)) throw error;
      const cause = toError(error);
      throw new EmbeddingUnavailableError(
        `${this.getName()} embeddings unavailable after ${attempts} attempt(s): ${cause.message}`,
        attempts,
        { cause }
      );
    }

    if (vectors.length !== texts.length) {
      throw new EmbeddingUnavailableError(
        `${this.getName()} returned ${vectors.length} vectors for ${texts.length} texts`,
        attempts
      );
    }
    for (const vector of vectors) {
      if (vector.length !== this.dimensions) {
        throw new ConfigError(
          `${this.getName()} model ${this.getModel()} returned ${vector.length}-dimensional vectors, ` +
          `expected ${this.dimensions}`
        );
      }
    }
    return vectors;
  }

  private cacheKey(text: string): string {
    return `${this.getName()}:${this.getModel()}:${this.dimensions}:${hashText(text)}`;
  }

  /**
   * Generate embedding for a single text with caching.
   */
  async embedOne(text: string, signal?: AbortSignal): Promise<number[]> {
    const [embedding] = await this.embedBatch([text], signal);
    return embedding;
  }

  /**
   * Generate embeddings for multiple texts with caching.
   * @returns One vector per input text, in input order
   */
  async embedBatch(texts: string[], signal?: AbortSignal): Promise<number[][]> {
    if (texts.length === 0) return [];

    const results: Array<number[] | undefined> = new Array(texts.length).fill(undefined);
    const uncachedIndices: number[] = [];
    const uncachedTexts: string[] = [];

    // Check cache for each text
    for (let i = 0; i < texts.length; i++) {
      const cached = embeddingCache.get(this.cacheKey(texts[i]));
      if (cached) {
        results[i] = [...cached];
      } else {
        uncachedIndices.push(i);
        uncachedTexts.push(texts[i]);
      }
    }

    // Embed uncached texts
    if (uncachedTexts.length > 0) {
      const newEmbeddings = await this.embed(uncachedTexts, signal);

      // Cache new embeddings and fill results
      for (let j = 0; j < uncachedIndices.length; j++) {
        const i = uncachedIndices[j];
        const embedding = newEmbeddings[j];
        results[i] = embedding;
        embeddingCache.set(this.cacheKey(texts[i]), [...embedding]);
      }
    }

    return results.map((embedding, i) => {
      if (!embedding) {
        throw new EmbeddingUnavailableError(`No embedding produced for input ${i}`);
      }
      return embedding;
    });
  }

  /**
   * Get embedding cache statistics.
   */
  static getCacheStats(): { size: number } {
    return { size: embeddingCache.size };
  }

  /**
   * Clear the embedding cache.
   */
  static clearCache(): void {
    embeddingCache.clear();
  }
}
