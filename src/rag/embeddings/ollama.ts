// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Ollama Embedding Provider
 *
 * Uses Ollama's local embedding models for generating embeddings.
 */

import { BaseEmbeddingProvider, type EmbeddingProviderOptions } from './base.js';

export const DEFAULT_OLLAMA_URL = 'http://localhost:11434';

export interface OllamaEmbeddingOptions extends EmbeddingProviderOptions {
  model: string;
  baseUrl?: string;
}

/**
 * Read the vector out of an /api/embeddings response body.
 */
function parseEmbedding(data: unknown): number[] {
  if (
    typeof data === 'object' &&
    data !== null &&
    'embedding' in data &&
    Array.isArray(data.embedding) &&
    data.embedding.every((value): value is number => typeof value === 'number')
  ) {
    return data.embedding;
  }
  throw new Error('Ollama returned a malformed embedding response');
}

/**
 * Ollama embedding provider implementation.
 */
export class OllamaEmbeddingProvider extends BaseEmbeddingProvider {
  // /api/embeddings takes a single prompt per request
  protected override readonly maxBatchSize = 1;
  private baseUrl: string;
  private model: string;

  constructor(options: OllamaEmbeddingOptions) {
    super(options);
    this.model = options.model;
    this.baseUrl = (options.baseUrl ?? DEFAULT_OLLAMA_URL).replace(/\/+$/, '');
  }

  getName(): string {
    return 'Ollama';
  }

  getModel(): string {
    return this.model;
  }

  protected async request(texts: string[], signal: AbortSignal): Promise<number[][]> {
    const vectors: number[][] = [];
    for (const text of texts) {
      const response = await fetch(`${this.baseUrl}/api/embeddings`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({
          model: this.model,
          prompt: text,
        }),
        signal,
      });

      if (!response.ok) {
        throw new Error(
          `Ollama embedding request failed: ${response.status} ${response.statusText}`
        );
      }

      vectors.push(parseEmbedding(await response.json()));
    }
    return vectors;
  }
}
