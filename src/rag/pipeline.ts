// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * RAG pipeline facade.
 *
 * Resolves every strategy once from the frozen configuration (tokenizer,
 * embedder, index backend, generator) and wires the ingestion and query paths
 * to the same embedder.
 */

import { assertValidConfig } from '../config/validator.js';
import type { PipelineConfig } from '../config/types.js';
import { IndexUnavailableError, isAbortError, toError } from '../errors.js';
import { logger } from '../logger.js';
import { createGenerationProvider } from '../providers/index.js';
import type { BaseGenerationProvider } from '../providers/base.js';
import { Answerer, NO_ANSWER_TEXT } from './answerer.js';
import { TextChunker } from './chunker.js';
import { ContextPacker } from './context-packer.js';
import type { BaseEmbeddingProvider } from './embeddings/base.js';
import { createEmbeddingProvider } from './embeddings/index.js';
import { Ingestor } from './indexer.js';
import { Retriever } from './retriever.js';
import { createTokenCounter, type Tokenizer } from './tokenizer.js';
import type {
  Answer,
  IndexStats,
  IngestProgressCallback,
  IngestSummary,
  QueryOptions,
  RetrievedChunk,
  SourceDocument,
  VectorRecord,
} from './types.js';
import { MemoryVectorIndex, type VectorIndex } from './vector-index.js';
import { VectraVectorStore } from './vector-store.js';

/**
 * Overrides for the components the configuration would otherwise create.
 */
export interface PipelineDeps {
  tokenizer?: Tokenizer;
  embeddingProvider?: BaseEmbeddingProvider;
  index?: VectorIndex;
  /** null disables generation regardless of configuration */
  generationProvider?: BaseGenerationProvider | null;
  env?: NodeJS.ProcessEnv;
}

async function openIndex(config: PipelineConfig): Promise<VectorIndex> {
  if (config.index.backend === 'memory') {
    return new MemoryVectorIndex(config.embedding.dimensions);
  }
  return VectraVectorStore.open(config.index.dataDir, config.index.collection, config.embedding.dimensions);
}

export class RagPipeline {
  private constructor(
    readonly config: PipelineConfig,
    private embeddingProvider: BaseEmbeddingProvider,
    private index: VectorIndex,
    private ingestor: Ingestor,
    private retriever: Retriever,
    private packer: ContextPacker,
    private answerer: Answerer
  ) {}

  /**
   * Build a pipeline from configuration.
   * @throws ConfigError for invalid settings or an index built by another embedder
   * @throws IndexUnavailableError when the persistent index cannot be opened
   */
  static async create(config: PipelineConfig, deps: PipelineDeps = {}): Promise<RagPipeline> {
    assertValidConfig(config);

    const env = deps.env ?? process.env;
    const embeddingProvider = deps.embeddingProvider ?? createEmbeddingProvider(config.embedding, env);
    const generator =
      deps.generationProvider !== undefined
        ? deps.generationProvider
        : createGenerationProvider(config.generation, env);
    const index = deps.index ?? (await openIndex(config));

    const chunker = new TextChunker(config.chunking, deps.tokenizer);
    const counter = createTokenCounter(config.chunking.strategy, deps.tokenizer);
    const retriever = await Retriever.open(embeddingProvider, index, config.retrieval);
    const ingestor = new Ingestor(chunker, embeddingProvider, index, {
      parallelJobs: config.ingest.parallelJobs,
      batchSize: config.embedding.batchSize,
    });

    logger.verbose(
      `Pipeline ready: ${embeddingProvider.fingerprint()}, ${index.backend} index, ` +
      `generation ${generator ? `${generator.getName()} ${generator.getModel()}` : 'off'}`
    );

    return new RagPipeline(
      config,
      embeddingProvider,
      index,
      ingestor,
      retriever,
      new ContextPacker(counter),
      new Answerer(generator, counter)
    );
  }

  /**
   * Ingest many sources; see Ingestor.ingest for failure semantics.
   */
  ingest(sources: SourceDocument[], onProgress?: IngestProgressCallback): Promise<IngestSummary> {
    return this.ingestor.ingest(sources, onProgress);
  }

  ingestText(sourceId: string, deckId: string, text: string): Promise<IngestSummary> {
    return this.ingest([{ sourceId, deckId, text }]);
  }

  /**
   * Ranked chunks for a query. Index failures and aborts propagate.
   */
  retrieve(query: string, options: QueryOptions = {}): Promise<RetrievedChunk[]> {
    return this.retriever.retrieve(query, options.k ?? this.config.retrieval.topK, options.deckId, options.signal);
  }

  /**
   * Retrieve, pack and answer.
   *
   * Always resolves to an answer or the no-answer marker, except when the
   * index is unavailable or the caller aborts.
   */
  async ask(query: string, options: QueryOptions = {}): Promise<Answer> {
    const budget = options.maxContextTokens ?? this.config.retrieval.maxContextTokens;

    try {
      const chunks = await this.retrieve(query, options);
      const packed = this.packer.pack(chunks, budget);
      return await this.answerer.answer(query, packed, {
        sourcesOnly: options.sourcesOnly,
        signal: options.signal,
      });
    } catch (error) {
      if (error instanceof IndexUnavailableError || isAbortError(error)) throw error;
      logger.error('Query failed, returning no answer', toError(error));
      return { text: NO_ANSWER_TEXT, sources: [], mode: 'no-answer' };
    }
  }

  /**
   * Stream stored records, ordered by deck, source and position.
   */
  export(deckId?: string): AsyncIterable<VectorRecord> {
    return this.index.export(deckId);
  }

  async stats(deckId?: string): Promise<IndexStats> {
    return {
      records: await this.index.count(deckId),
      deckId,
      backend: this.index.backend,
      embeddingFingerprint: this.embeddingProvider.fingerprint(),
      dimensions: this.embeddingProvider.getDimensions(),
    };
  }
}
