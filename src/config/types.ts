// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Configuration Types
 *
 * Type definitions for workspace (file) configuration and the resolved,
 * immutable configuration handed to every pipeline component.
 */

export type ChunkStrategy = 'tokens' | 'chars';
export type EmbeddingProviderName = 'openai' | 'ollama' | 'hashing';
export type GenerationProviderName = 'openai' | 'anthropic' | 'ollama' | 'none';
export type IndexBackend = 'memory' | 'vectra';

/**
 * Workspace configuration.
 * Can be defined in .decklens.json or .decklens/config.json in the working
 * directory, or globally in ~/.decklens/config.json.
 */
export interface WorkspaceConfig {
  chunking?: {
    /** 'tokens' (tokenizer windows) or 'chars' (character windows) */
    strategy?: ChunkStrategy;
    /** Tokens per window (default: 700) */
    maxTokens?: number;
    /** Tokens shared by consecutive windows (default: 100) */
    overlapTokens?: number;
    /** Characters per window for the 'chars' strategy (default: 1200) */
    charSize?: number;
    /** Characters shared by consecutive windows (default: 150) */
    charOverlap?: number;
    /** Drop repeated or near-empty windows of a source (default: false) */
    dedupe?: boolean;
  };

  embedding?: {
    /** 'openai', 'ollama' or 'hashing' (local, deterministic) */
    provider?: EmbeddingProviderName;
    /** Model name for hosted providers */
    model?: string;
    /** Vector dimensionality; must match the model for hosted providers */
    dimensions?: number;
    /** Base URL (Ollama, or an OpenAI-compatible endpoint) */
    baseUrl?: string;
    /** Maximum in-flight embedding requests (default: 4) */
    concurrency?: number;
    /** Per-request timeout in ms (default: 30000) */
    timeoutMs?: number;
    /** Retries for transient failures (default: 3) */
    maxRetries?: number;
    /** Texts per embedding request during ingestion (default: 16) */
    batchSize?: number;
  };

  index?: {
    /** 'memory' (process lifetime) or 'vectra' (persistent, on disk) */
    backend?: IndexBackend;
    /** Data directory for persistent indexes (default: ~/.decklens/data) */
    dataDir?: string;
    /** Collection name (default: documents) */
    collection?: string;
  };

  retrieval?: {
    /** Number of chunks to retrieve (default: 5) */
    topK?: number;
    /** Token budget of the packed context (default: 1600) */
    maxContextTokens?: number;
    /** Minimum similarity score; unset keeps every hit */
    minScore?: number;
  };

  generation?: {
    /** 'openai', 'anthropic', 'ollama' or 'none' (extractive answers only) */
    provider?: GenerationProviderName;
    model?: string;
    baseUrl?: string;
    /** Maximum tokens to generate (default: 512) */
    maxTokens?: number;
    /** Sampling temperature (default: 0.2) */
    temperature?: number;
    /** Per-request timeout in ms (default: 60000) */
    timeoutMs?: number;
  };

  ingest?: {
    /** Sources processed concurrently (default: 4, max: 16) */
    parallelJobs?: number;
  };
}

/**
 * Fully resolved configuration with defaults applied.
 */
export interface ResolvedConfig {
  chunking: {
    strategy: ChunkStrategy;
    maxTokens: number;
    overlapTokens: number;
    charSize: number;
    charOverlap: number;
    dedupe: boolean;
  };
  embedding: {
    provider: EmbeddingProviderName;
    model: string;
    dimensions: number;
    baseUrl?: string;
    concurrency: number;
    timeoutMs: number;
    maxRetries: number;
    batchSize: number;
  };
  index: {
    backend: IndexBackend;
    dataDir: string;
    collection: string;
  };
  retrieval: {
    topK: number;
    maxContextTokens: number;
    minScore?: number;
  };
  generation: {
    provider: GenerationProviderName;
    model: string;
    baseUrl?: string;
    maxTokens: number;
    temperature: number;
    timeoutMs: number;
  };
  ingest: {
    parallelJobs: number;
  };
}

type DeepReadonly<T> = {
  readonly [K in keyof T]: T[K] extends object ? DeepReadonly<T[K]> : T[K];
};

/**
 * The frozen configuration object threaded through component constructors.
 */
export type PipelineConfig = DeepReadonly<ResolvedConfig>;
