// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Embedding Provider Factory
 *
 * Resolves the configured embedding strategy once, at startup.
 */

import { ConfigError } from '../../errors.js';
import type { PipelineConfig } from '../../config/types.js';
import { BaseEmbeddingProvider } from './base.js';
import { HashingEmbeddingProvider } from './hashing.js';
import { OllamaEmbeddingProvider } from './ollama.js';
import { OpenAIEmbeddingProvider } from './openai.js';

export { BaseEmbeddingProvider } from './base.js';
export type { EmbeddingProviderOptions } from './base.js';
export { OpenAIEmbeddingProvider } from './openai.js';
export { OllamaEmbeddingProvider } from './ollama.js';
export { HashingEmbeddingProvider, hashEmbed } from './hashing.js';
export {
  DEFAULT_EMBEDDING_MODELS,
  DEFAULT_HASHING_DIMENSIONS,
  knownEmbeddingDimensions,
} from './dimensions.js';

/**
 * Create the embedding provider named by configuration.
 * @throws ConfigError when a hosted provider lacks its credentials
 */
export function createEmbeddingProvider(
  config: PipelineConfig['embedding'],
  env: NodeJS.ProcessEnv = process.env
): BaseEmbeddingProvider {
  const options = {
    dimensions: config.dimensions,
    concurrency: config.concurrency,
    timeoutMs: config.timeoutMs,
    maxRetries: config.maxRetries,
  };

  switch (config.provider) {
    case 'openai': {
      const apiKey = env.OPENAI_API_KEY;
      if (!apiKey) {
        throw new ConfigError('OPENAI_API_KEY is required for the openai embedding provider');
      }
      return new OpenAIEmbeddingProvider({ ...options, model: config.model, apiKey, baseUrl: config.baseUrl });
    }

    case 'ollama':
      return new OllamaEmbeddingProvider({ ...options, model: config.model, baseUrl: config.baseUrl });

    case 'hashing':
      return new HashingEmbeddingProvider({ ...options, model: config.model });
  }
}
