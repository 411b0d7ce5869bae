// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Ingestor
 *
 * Chunks, embeds and stores source documents.
 * Features:
 * - Parallel processing of sources with configurable concurrency
 * - Per-block results: a block that cannot be embedded is counted, not fatal
 * - Re-ingestion replaces a source's blocks and removes positions it no longer has
 */

import pLimit from 'p-limit';
import { EmbeddingUnavailableError, IndexUnavailableError, toError } from '../errors.js';
import { logger } from '../logger.js';
import type { TextChunker } from './chunker.js';
import type { BaseEmbeddingProvider } from './embeddings/base.js';
import type {
  BlockResult,
  ContentBlock,
  IngestProgressCallback,
  IngestSummary,
  SourceDocument,
  SourceResult,
  VectorRecord,
} from './types.js';
import type { VectorIndex } from './vector-index.js';

/** Maximum parallel jobs allowed */
const MAX_PARALLEL_JOBS = 16;

export interface IngestorOptions {
  /** Sources processed concurrently */
  parallelJobs: number;
  /** Blocks per embedding request */
  batchSize: number;
}

function toRecord(block: ContentBlock, vector: number[]): VectorRecord {
  return {
    id: block.id,
    deckId: block.deckId,
    vector,
    payload: {
      text: block.text,
      sourceId: block.sourceId,
      position: block.position,
      tokenCount: block.tokenCount,
    },
  };
}

export class Ingestor {
  private parallelJobs: number;
  private batchSize: number;

  constructor(
    private chunker: TextChunker,
    private embeddingProvider: BaseEmbeddingProvider,
    private index: VectorIndex,
    options: IngestorOptions
  ) {
    this.parallelJobs = Math.min(Math.max(1, options.parallelJobs), MAX_PARALLEL_JOBS);
    this.batchSize = Math.max(1, options.batchSize);
  }

  /**
   * Ingest sources concurrently.
   *
   * Embedding failures are reported per source in the summary. An index
   * failure (or a configuration error) is rethrown once every source has
   * finished.
   *
   * @param onProgress - Called once per finished source
   */
  async ingest(sources: SourceDocument[], onProgress?: IngestProgressCallback): Promise<IngestSummary> {
    const limit = pLimit(this.parallelJobs);
    let done = 0;

    const settled = await Promise.allSettled(
      sources.map((source) =>
        limit(async () => {
          try {
            return await this.ingestSource(source);
          } finally {
            done++;
            logger.ingestProgress(done, sources.length, source.sourceId);
            onProgress?.(done, sources.length, source.sourceId);
          }
        })
      )
    );

    const summary: IngestSummary = { sources: [], totalBlocks: 0, embedded: 0, failed: 0 };
    let fatal: Error | null = null;

    for (let i = 0; i < settled.length; i++) {
      const outcome = settled[i];
      if (outcome.status === 'fulfilled') {
        summary.sources.push(outcome.value);
        continue;
      }
      const error = toError(outcome.reason);
      fatal ??= error;
      summary.sources.push({
        sourceId: sources[i].sourceId,
        deckId: sources[i].deckId,
        blocks: 0,
        embedded: 0,
        failed: 0,
        removed: 0,
        errors: [error.message],
      });
    }

    for (const result of summary.sources) {
      summary.totalBlocks += result.blocks;
      summary.embedded += result.embedded;
      summary.failed += result.failed;
    }

    if (fatal) throw fatal;
    return summary;
  }

  /**
   * Chunk, embed and store one source.
   * @throws IndexUnavailableError when its blocks cannot be written
   */
  async ingestSource(source: SourceDocument): Promise<SourceResult> {
    const blocks = this.chunker.chunk(source.text, source.sourceId, source.deckId, source.metadata);

    const batches: ContentBlock[][] = [];
    for (let i = 0; i < blocks.length; i += this.batchSize) {
      batches.push(blocks.slice(i, i + this.batchSize));
    }
    // Every batch settles before a write failure is rethrown, so nothing
    // reaches the index after ingestSource has rejected.
    const settled = await Promise.allSettled(batches.map((batch) => this.embedAndStore(batch)));
    const results: BlockResult[] = [];
    for (const outcome of settled) {
      if (outcome.status === 'rejected') throw toError(outcome.reason);
      results.push(...outcome.value);
    }

    const written = new Set<string>();
    const errors = new Set<string>();
    for (const result of results) {
      if (result.ok) {
        written.add(result.id);
      } else {
        errors.add(result.error.message);
      }
    }

    // Only positions the new text no longer has are stale; a block that failed
    // to embed keeps its previously stored record.
    const current = new Set(blocks.map((block) => block.id));
    const removed = await this.index.deleteBySource(source.sourceId, source.deckId, current);

    const sourceResult: SourceResult = {
      sourceId: source.sourceId,
      deckId: source.deckId,
      blocks: blocks.length,
      embedded: written.size,
      failed: blocks.length - written.size,
      removed,
      errors: [...errors],
    };
    logger.ingestSource(source.sourceId, sourceResult.embedded, sourceResult.failed);
    return sourceResult;
  }

  /**
   * Embed a batch in one request; if that fails, embed its blocks one by one
   * so a single bad block does not fail the rest.
   */
  private async embedAndStore(batch: ContentBlock[]): Promise<BlockResult[]> {
    const records: VectorRecord[] = [];
    const results: BlockResult[] = [];

    let vectors: number[][] | null = null;
    try {
      vectors = await this.embeddingProvider.embedBatch(batch.map((block) => block.text));
    } catch (error) {
      if (!(error instanceof EmbeddingUnavailableError)) throw error;
      if (batch.length === 1) {
        logger.blockFailure(batch[0].id, error);
        return [{ ok: false, id: batch[0].id, error }];
      }
    }

    if (vectors) {
      for (let i = 0; i < batch.length; i++) {
        records.push(toRecord(batch[i], vectors[i]));
      }
    } else {
      const single = await Promise.all(
        batch.map(async (block): Promise<{ block: ContentBlock; vector?: number[]; error?: Error }> => {
          try {
            return { block, vector: await this.embeddingProvider.embedOne(block.text) };
          } catch (error) {
            if (!(error instanceof EmbeddingUnavailableError)) throw error;
            return { block, error };
          }
        })
      );
      for (const { block, vector, error } of single) {
        if (vector) {
          records.push(toRecord(block, vector));
        } else {
          const failure = error ?? new EmbeddingUnavailableError(`No embedding for block ${block.id}`);
          logger.blockFailure(block.id, failure);
          results.push({ ok: false, id: block.id, error: failure });
        }
      }
    }

    try {
      await this.index.upsert(records);
    } catch (error) {
      if (error instanceof IndexUnavailableError) {
        logger.error(`Failed to store ${records.length} blocks`, error);
      }
      throw error;
    }

    for (const record of records) {
      results.push({ ok: true, id: record.id });
    }
    return results;
  }
}
