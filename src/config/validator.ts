// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Configuration Validator
 *
 * validateConfig() returns warnings for questionable workspace settings.
 * assertValidConfig() throws ConfigError for settings the pipeline cannot run with.
 */

import { ConfigError } from '../errors.js';
import { knownEmbeddingDimensions } from '../rag/embeddings/dimensions.js';
import type { ResolvedConfig, WorkspaceConfig } from './types.js';

const VALID_EMBEDDING_PROVIDERS = ['openai', 'ollama', 'hashing'];
const VALID_GENERATION_PROVIDERS = ['openai', 'anthropic', 'ollama', 'none'];
const VALID_BACKENDS = ['memory', 'vectra'];
const VALID_STRATEGIES = ['tokens', 'chars'];

/**
 * Validate workspace configuration.
 * Returns an array of warning messages for invalid options.
 */
export function validateConfig(config: WorkspaceConfig): string[] {
  const warnings: string[] = [];

  const strategy = config.chunking?.strategy;
  if (strategy && !VALID_STRATEGIES.includes(strategy)) {
    warnings.push(`Unknown chunking strategy "${strategy}". Valid: ${VALID_STRATEGIES.join(', ')}`);
  }

  const embeddingProvider = config.embedding?.provider;
  if (embeddingProvider && !VALID_EMBEDDING_PROVIDERS.includes(embeddingProvider)) {
    warnings.push(
      `Unknown embedding provider "${embeddingProvider}". Valid: ${VALID_EMBEDDING_PROVIDERS.join(', ')}`
    );
  }

  const generationProvider = config.generation?.provider;
  if (generationProvider && !VALID_GENERATION_PROVIDERS.includes(generationProvider)) {
    warnings.push(
      `Unknown generation provider "${generationProvider}". Valid: ${VALID_GENERATION_PROVIDERS.join(', ')}`
    );
  }

  const backend = config.index?.backend;
  if (backend && !VALID_BACKENDS.includes(backend)) {
    warnings.push(`Unknown index backend "${backend}". Valid: ${VALID_BACKENDS.join(', ')}`);
  }

  const minScore = config.retrieval?.minScore;
  if (minScore !== undefined && (minScore < -1 || minScore > 1)) {
    warnings.push('retrieval.minScore should be between -1 and 1');
  }

  const temperature = config.generation?.temperature;
  if (temperature !== undefined && (temperature < 0 || temperature > 2)) {
    warnings.push('generation.temperature should be between 0 and 2');
  }

  const parallelJobs = config.ingest?.parallelJobs;
  if (parallelJobs !== undefined && parallelJobs > 16) {
    warnings.push('ingest.parallelJobs is capped at 16');
  }

  return warnings;
}

function requirePositiveInteger(value: number, name: string): void {
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigError(`${name} must be a positive integer (got ${value})`);
  }
}

/**
 * Check a window size / overlap pair.
 * @throws ConfigError when overlap is negative or not smaller than size
 */
export function assertWindow(size: number, overlap: number, label: string): void {
  requirePositiveInteger(size, `${label} size`);
  if (!Number.isInteger(overlap) || overlap < 0) {
    throw new ConfigError(`${label} overlap must be a non-negative integer (got ${overlap})`);
  }
  if (overlap >= size) {
    throw new ConfigError(`${label} overlap (${overlap}) must be smaller than the window size (${size})`);
  }
}

/**
 * Reject resolved configurations the pipeline cannot run with.
 * @throws ConfigError
 */
export function assertValidConfig(config: ResolvedConfig): void {
  const { chunking, embedding, retrieval, ingest } = config;

  if (!VALID_STRATEGIES.includes(chunking.strategy)) {
    throw new ConfigError(`Unknown chunking strategy "${chunking.strategy}"`);
  }
  assertWindow(chunking.maxTokens, chunking.overlapTokens, 'Token window');
  assertWindow(chunking.charSize, chunking.charOverlap, 'Character window');

  if (!VALID_EMBEDDING_PROVIDERS.includes(embedding.provider)) {
    throw new ConfigError(`Unknown embedding provider "${embedding.provider}"`);
  }
  requirePositiveInteger(embedding.dimensions, 'embedding.dimensions');
  requirePositiveInteger(embedding.concurrency, 'embedding.concurrency');
  requirePositiveInteger(embedding.batchSize, 'embedding.batchSize');
  requirePositiveInteger(embedding.timeoutMs, 'embedding.timeoutMs');
  if (!Number.isInteger(embedding.maxRetries) || embedding.maxRetries < 0) {
    throw new ConfigError(`embedding.maxRetries must be a non-negative integer (got ${embedding.maxRetries})`);
  }

  const known = knownEmbeddingDimensions(embedding.provider, embedding.model);
  if (known !== undefined && known !== embedding.dimensions) {
    throw new ConfigError(
      `embedding.dimensions is ${embedding.dimensions} but ${embedding.model} produces ${known}-dimensional vectors`
    );
  }

  if (!VALID_GENERATION_PROVIDERS.includes(config.generation.provider)) {
    throw new ConfigError(`Unknown generation provider "${config.generation.provider}"`);
  }
  if (!VALID_BACKENDS.includes(config.index.backend)) {
    throw new ConfigError(`Unknown index backend "${config.index.backend}"`);
  }

  requirePositiveInteger(retrieval.topK, 'retrieval.topK');
  requirePositiveInteger(retrieval.maxContextTokens, 'retrieval.maxContextTokens');
  requirePositiveInteger(ingest.parallelJobs, 'ingest.parallelJobs');
}
