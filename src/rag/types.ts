// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * RAG System Types
 *
 * Defines the values that flow through ingestion (content blocks, vector
 * records) and the query path (retrieved chunks, packed context, answers).
 */

/**
 * A bounded span of source text prepared for embedding.
 */
export interface ContentBlock {
  /** Deterministic id (hash of deck, source and position) */
  readonly id: string;
  readonly sourceId: string;
  readonly deckId: string;
  readonly text: string;
  /** Token count under the chunker's tokenizer; never exceeds the window size */
  readonly tokenCount: number;
  /** 0-based window index within the source */
  readonly position: number;
  readonly metadata: Readonly<Record<string, string>>;
}

/**
 * Stored payload of a vector record.
 */
export interface VectorPayload {
  text: string;
  sourceId: string;
  position: number;
  tokenCount: number;
}

/**
 * One embedded content block as stored in the vector index.
 */
export interface VectorRecord {
  id: string;
  deckId: string;
  vector: number[];
  payload: VectorPayload;
}

/**
 * A search hit: the stored record and its cosine similarity to the query.
 */
export interface ScoredRecord {
  record: VectorRecord;
  score: number;
}

/**
 * A chunk returned by the retriever.
 */
export interface RetrievedChunk {
  id: string;
  text: string;
  /** Cosine similarity in [-1, 1] */
  score: number;
  sourceId: string;
  deckId: string;
  position: number;
  tokenCount: number;
  /** 1-based citation number, assigned only when packed into a context */
  citationIndex: number | null;
}

/**
 * Token-bounded context assembled from retrieved chunks.
 */
export interface PackedContext {
  /** Enumerated context: "[n] text" items separated by a blank line */
  text: string;
  /** Accepted chunks in citation order */
  sources: RetrievedChunk[];
  /** Sum of the accepted chunks' token counts */
  tokenCount: number;
  /** Token budget the context was packed against */
  budget: number;
  /** True when the only chunk was cut down to fit the budget */
  truncated: boolean;
}

export type AnswerMode = 'generated' | 'extractive' | 'sources-only' | 'no-answer';

export interface Answer {
  /** Answer text; null in sources-only mode */
  text: string | null;
  sources: RetrievedChunk[];
  mode: AnswerMode;
}

/**
 * Query-time options.
 */
export interface QueryOptions {
  deckId?: string;
  k?: number;
  maxContextTokens?: number;
  sourcesOnly?: boolean;
  signal?: AbortSignal;
}

/**
 * Raw text handed to ingestion by an upstream extractor.
 */
export interface SourceDocument {
  sourceId: string;
  deckId: string;
  text: string;
  metadata?: Record<string, string>;
}

/**
 * Outcome of embedding and storing one block.
 */
export type BlockResult =
  | { ok: true; id: string }
  | { ok: false; id: string; error: Error };

export interface SourceResult {
  sourceId: string;
  deckId: string;
  blocks: number;
  embedded: number;
  failed: number;
  /** Stale blocks of an earlier ingestion that were removed */
  removed: number;
  errors: string[];
}

export interface IngestSummary {
  sources: SourceResult[];
  totalBlocks: number;
  embedded: number;
  failed: number;
}

/**
 * Index statistics.
 */
export interface IndexStats {
  records: number;
  deckId?: string;
  backend: string;
  embeddingFingerprint: string;
  dimensions: number;
}

/**
 * Progress callback for ingestion.
 */
export type IngestProgressCallback = (done: number, total: number, sourceId: string) => void;
