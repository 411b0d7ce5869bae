// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Known output dimensions of hosted embedding models, and the default model
 * of each embedding provider.
 */

import type { EmbeddingProviderName } from '../../config/types.js';

/**
 * Model dimensions for OpenAI embedding models.
 */
export const OPENAI_MODEL_DIMENSIONS: Record<string, number> = {
  'text-embedding-3-small': 1536,
  'text-embedding-3-large': 3072,
  'text-embedding-ada-002': 1536,
};

/**
 * Model dimensions for common Ollama embedding models.
 */
export const OLLAMA_MODEL_DIMENSIONS: Record<string, number> = {
  'nomic-embed-text': 768,
  'mxbai-embed-large': 1024,
  'all-minilm': 384,
  'snowflake-arctic-embed': 1024,
};

export const DEFAULT_EMBEDDING_MODELS: Record<EmbeddingProviderName, string> = {
  openai: 'text-embedding-3-small',
  ollama: 'nomic-embed-text',
  hashing: 'ngram-hash-v1',
};

/** Dimensions of the hashing provider when none are configured */
export const DEFAULT_HASHING_DIMENSIONS = 512;

/**
 * Dimensions a model is known to produce, or undefined when the model is
 * unknown (or the provider accepts any dimensionality).
 */
export function knownEmbeddingDimensions(
  provider: EmbeddingProviderName,
  model: string
): number | undefined {
  switch (provider) {
    case 'openai':
      return OPENAI_MODEL_DIMENSIONS[model];
    case 'ollama':
      return OLLAMA_MODEL_DIMENSIONS[model.split(':')[0]];
    case 'hashing':
      return undefined;
  }
}
