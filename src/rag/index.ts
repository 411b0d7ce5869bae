// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * RAG System Exports
 *
 * Main entry point for the ingestion and query pipeline.
 */

// Types
export type {
  Answer,
  AnswerMode,
  BlockResult,
  ContentBlock,
  IndexStats,
  IngestProgressCallback,
  IngestSummary,
  PackedContext,
  QueryOptions,
  RetrievedChunk,
  ScoredRecord,
  SourceDocument,
  SourceResult,
  VectorPayload,
  VectorRecord,
} from './types.js';

// Embedding providers
export {
  BaseEmbeddingProvider,
  OpenAIEmbeddingProvider,
  OllamaEmbeddingProvider,
  HashingEmbeddingProvider,
  hashEmbed,
  createEmbeddingProvider,
} from './embeddings/index.js';
export type { EmbeddingProviderOptions } from './embeddings/index.js';

// Core components
export { TextChunker, blockId } from './chunker.js';
export {
  TiktokenTokenizer,
  CharacterTokenizer,
  HeuristicTokenCounter,
  createTokenCounter,
  estimateTokens,
} from './tokenizer.js';
export type { Tokenizer, TokenCounter } from './tokenizer.js';
export { MemoryVectorIndex } from './vector-index.js';
export type { VectorIndex, IndexManifest } from './vector-index.js';
export { VectraVectorStore } from './vector-store.js';
export { ensureManifest } from './manifest.js';
export { Retriever } from './retriever.js';
export { ContextPacker, formatContext } from './context-packer.js';
export { Answerer, ANSWER_SYSTEM_PROMPT, NO_ANSWER_TEXT, buildAnswerPrompt } from './answerer.js';
export { Ingestor } from './indexer.js';
export type { IngestorOptions } from './indexer.js';
export { RagPipeline } from './pipeline.js';
export type { PipelineDeps } from './pipeline.js';

// Configuration and errors
export { resolveConfig, getDefaultConfig, mergeConfig, freezeConfig } from '../config/index.js';
export type { PipelineConfig, ResolvedConfig, WorkspaceConfig } from '../config/index.js';
export {
  DecklensError,
  ConfigError,
  EmbeddingUnavailableError,
  IndexUnavailableError,
  GenerationFailureError,
  AbortError,
  isAbortError,
} from '../errors.js';
