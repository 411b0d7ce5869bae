// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * OpenAI Embedding Provider
 *
 * Uses OpenAI's text-embedding models (or an OpenAI-compatible endpoint).
 */

import OpenAI from 'openai';
import { BaseEmbeddingProvider, type EmbeddingProviderOptions } from './base.js';

export interface OpenAIEmbeddingOptions extends EmbeddingProviderOptions {
  model: string;
  apiKey: string;
  baseUrl?: string;
}

/**
 * OpenAI embedding provider implementation.
 */
export class OpenAIEmbeddingProvider extends BaseEmbeddingProvider {
  private client: OpenAI;
  private model: string;

  constructor(options: OpenAIEmbeddingOptions) {
    super(options);
    this.client = new OpenAI({
      apiKey: options.apiKey,
      baseURL: options.baseUrl,
      // Retries are handled by withRetry in the base class
      maxRetries: 0,
    });
    this.model = options.model;
  }

  getName(): string {
    return 'OpenAI';
  }

  getModel(): string {
    return this.model;
  }

  protected async request(texts: string[], signal: AbortSignal): Promise<number[][]> {
    const response = await this.client.embeddings.create(
      {
        model: this.model,
        input: texts,
      },
      { signal }
    );

    // Sort by index to maintain order
    const sorted = [...response.data].sort((a, b) => a.index - b.index);
    return sorted.map((d) => d.embedding);
  }
}
