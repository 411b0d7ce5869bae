// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Configuration Merger
 *
 * Functions for merging configuration from multiple sources.
 * Priority: CLI options > workspace config > global config > defaults
 */

import { DecklensPaths } from '../paths.js';
import {
  DEFAULT_EMBEDDING_MODELS,
  DEFAULT_HASHING_DIMENSIONS,
  knownEmbeddingDimensions,
} from '../rag/embeddings/dimensions.js';
import type {
  EmbeddingProviderName,
  GenerationProviderName,
  PipelineConfig,
  ResolvedConfig,
  WorkspaceConfig,
} from './types.js';

const DEFAULT_GENERATION_MODELS: Record<GenerationProviderName, string> = {
  openai: 'gpt-4o-mini',
  anthropic: 'claude-3-5-haiku-latest',
  ollama: 'llama3.2',
  none: '',
};

/** Maximum parallel ingestion jobs allowed */
const MAX_PARALLEL_JOBS = 16;

/**
 * Default configuration values.
 */
export function getDefaultConfig(env: NodeJS.ProcessEnv = process.env): ResolvedConfig {
  return {
    chunking: {
      strategy: 'tokens',
      maxTokens: 700,
      overlapTokens: 100,
      charSize: 1200,
      charOverlap: 150,
      dedupe: false,
    },
    embedding: {
      provider: 'hashing',
      model: DEFAULT_EMBEDDING_MODELS.hashing,
      dimensions: DEFAULT_HASHING_DIMENSIONS,
      concurrency: 4,
      timeoutMs: 30000,
      maxRetries: 3,
      batchSize: 16,
    },
    index: {
      backend: 'vectra',
      dataDir: DecklensPaths.data(env),
      collection: 'documents',
    },
    retrieval: {
      topK: 5,
      maxContextTokens: 1600,
    },
    generation: {
      provider: 'none',
      model: DEFAULT_GENERATION_MODELS.none,
      maxTokens: 512,
      temperature: 0.2,
      timeoutMs: 60000,
    },
    ingest: {
      parallelJobs: 4,
    },
  };
}

/**
 * CLI options that can override configuration.
 */
export interface CLIOptions {
  topK?: number;
  maxContextTokens?: number;
  embeddingProvider?: EmbeddingProviderName;
  generationProvider?: GenerationProviderName;
  dataDir?: string;
  memory?: boolean;
}

/**
 * Apply a workspace config layer to the resolved config.
 */
function applyWorkspaceConfig(config: ResolvedConfig, source: WorkspaceConfig): void {
  if (source.chunking) {
    config.chunking = { ...config.chunking, ...source.chunking };
  }

  if (source.embedding) {
    const providerChanged =
      source.embedding.provider !== undefined && source.embedding.provider !== config.embedding.provider;
    const next = { ...config.embedding, ...source.embedding };
    // A new provider without an explicit model falls back to that provider's default model
    if (providerChanged && source.embedding.model === undefined) {
      next.model = DEFAULT_EMBEDDING_MODELS[next.provider];
    }
    if (source.embedding.dimensions === undefined && (providerChanged || source.embedding.model !== undefined)) {
      next.dimensions =
        knownEmbeddingDimensions(next.provider, next.model) ??
        (next.provider === 'hashing' ? DEFAULT_HASHING_DIMENSIONS : config.embedding.dimensions);
    }
    config.embedding = next;
  }

  if (source.index) {
    config.index = { ...config.index, ...source.index };
  }

  if (source.retrieval) {
    config.retrieval = { ...config.retrieval, ...source.retrieval };
  }

  if (source.generation) {
    const providerChanged =
      source.generation.provider !== undefined && source.generation.provider !== config.generation.provider;
    const next = { ...config.generation, ...source.generation };
    if (providerChanged && source.generation.model === undefined) {
      next.model = DEFAULT_GENERATION_MODELS[next.provider];
    }
    config.generation = next;
  }

  if (source.ingest?.parallelJobs !== undefined) {
    config.ingest.parallelJobs = Math.min(Math.max(1, source.ingest.parallelJobs), MAX_PARALLEL_JOBS);
  }
}

/**
 * Translate CLI options into a config layer. Only options the user passed are set.
 */
function cliLayer(options: CLIOptions): WorkspaceConfig {
  const layer: WorkspaceConfig = {};

  if (options.embeddingProvider) layer.embedding = { provider: options.embeddingProvider };
  if (options.generationProvider) layer.generation = { provider: options.generationProvider };

  if (options.topK !== undefined || options.maxContextTokens !== undefined) {
    layer.retrieval = {};
    if (options.topK !== undefined) layer.retrieval.topK = options.topK;
    if (options.maxContextTokens !== undefined) layer.retrieval.maxContextTokens = options.maxContextTokens;
  }

  if (options.dataDir || options.memory) {
    layer.index = {};
    if (options.dataDir) layer.index.dataDir = options.dataDir;
    if (options.memory) layer.index.backend = 'memory';
  }

  return layer;
}

/**
 * Merge global config, workspace config, and CLI options into a resolved config.
 */
export function mergeConfig(
  globalConfig: WorkspaceConfig | null,
  workspaceConfig: WorkspaceConfig | null,
  cliOptions: CLIOptions = {},
  env: NodeJS.ProcessEnv = process.env
): ResolvedConfig {
  const config = getDefaultConfig(env);

  if (globalConfig) applyWorkspaceConfig(config, globalConfig);
  if (workspaceConfig) applyWorkspaceConfig(config, workspaceConfig);

  applyWorkspaceConfig(config, cliLayer(cliOptions));

  return config;
}

/**
 * Deep-freeze a resolved config into the immutable object components receive.
 */
export function freezeConfig(config: ResolvedConfig): PipelineConfig {
  const copy = structuredClone(config);
  for (const section of Object.values(copy)) {
    Object.freeze(section);
  }
  return Object.freeze(copy);
}
