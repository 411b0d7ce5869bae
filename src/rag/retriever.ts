// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * RAG Retriever
 *
 * Embeds a query with the same provider used at ingestion and ranks the
 * vector index against it.
 */

import { throwIfAborted } from '../errors.js';
import { logger } from '../logger.js';
import type { PipelineConfig } from '../config/types.js';
import type { BaseEmbeddingProvider } from './embeddings/base.js';
import { ensureManifest } from './manifest.js';
import type { RetrievedChunk, ScoredRecord } from './types.js';
import type { VectorIndex } from './vector-index.js';

function toChunk({ record, score }: ScoredRecord): RetrievedChunk {
  return {
    id: record.id,
    text: record.payload.text,
    score,
    sourceId: record.payload.sourceId,
    deckId: record.deckId,
    position: record.payload.position,
    tokenCount: record.payload.tokenCount,
    citationIndex: null,
  };
}

/**
 * Retriever for querying the content index.
 */
export class Retriever {
  constructor(
    private embeddingProvider: BaseEmbeddingProvider,
    private index: VectorIndex,
    private config: PipelineConfig['retrieval']
  ) {}

  /**
   * Create a retriever after checking that the index was built with this embedder.
   * @throws ConfigError when the index manifest names a different embedder
   */
  static async open(
    embeddingProvider: BaseEmbeddingProvider,
    index: VectorIndex,
    config: PipelineConfig['retrieval']
  ): Promise<Retriever> {
    await ensureManifest(index, embeddingProvider);
    return new Retriever(embeddingProvider, index, config);
  }

  /**
   * Top-k chunks for a query, in descending score order.
   * Returns [] when nothing matches; aborting throws an AbortError.
   */
  async retrieve(
    query: string,
    k: number = this.config.topK,
    deckId?: string,
    signal?: AbortSignal
  ): Promise<RetrievedChunk[]> {
    throwIfAborted(signal);
    if (!query.trim() || k <= 0) return [];

    const start = Date.now();
    const embedding = await this.embeddingProvider.embedOne(query, signal);
    throwIfAborted(signal);

    const hits = await this.index.search(embedding, k, deckId);
    throwIfAborted(signal);

    const minScore = this.config.minScore;
    const chunks = hits
      .filter((hit) => minScore === undefined || hit.score >= minScore)
      .map(toChunk);

    logger.retrieval(query, chunks.length, deckId, (Date.now() - start) / 1000);
    return chunks;
  }
}
