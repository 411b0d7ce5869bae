// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

import { ConfigError } from '../errors.js';
import type { GenerationProviderName, PipelineConfig } from '../config/types.js';
import { AnthropicGenerationProvider } from './anthropic.js';
import { BaseGenerationProvider, type GenerationProviderConfig } from './base.js';
import { OllamaGenerationProvider } from './ollama.js';
import { OpenAIGenerationProvider } from './openai.js';

export { BaseGenerationProvider } from './base.js';
export type { GenerationProviderConfig, GenerationRequest, GenerationResult } from './base.js';
export { AnthropicGenerationProvider } from './anthropic.js';
export { OpenAIGenerationProvider } from './openai.js';
export { OllamaGenerationProvider } from './ollama.js';
export { withRetry, withTimeout, isRetryableError } from './retry.js';

/** Provider factory function type */
type ProviderFactory = (config: GenerationProviderConfig) => BaseGenerationProvider;

/** Registry of provider factories, keyed by config name */
const providerFactories: Record<Exclude<GenerationProviderName, 'none'>, ProviderFactory> = {
  openai: (config) => new OpenAIGenerationProvider(config),
  anthropic: (config) => new AnthropicGenerationProvider(config),
  ollama: (config) => new OllamaGenerationProvider(config),
};

const API_KEY_VARS: Partial<Record<GenerationProviderName, string>> = {
  openai: 'OPENAI_API_KEY',
  anthropic: 'ANTHROPIC_API_KEY',
};

/**
 * Create the configured generation provider, or null when generation is disabled.
 * @throws ConfigError when a hosted provider lacks its API key
 */
export function createGenerationProvider(
  config: PipelineConfig['generation'],
  env: NodeJS.ProcessEnv = process.env
): BaseGenerationProvider | null {
  if (config.provider === 'none') return null;

  const keyVar = API_KEY_VARS[config.provider];
  const apiKey = keyVar ? env[keyVar] : undefined;
  if (keyVar && !apiKey) {
    throw new ConfigError(`${keyVar} is required for the ${config.provider} generation provider`);
  }

  return providerFactories[config.provider]({
    model: config.model,
    maxTokens: config.maxTokens,
    temperature: config.temperature,
    timeoutMs: config.timeoutMs,
    baseUrl: config.baseUrl,
    apiKey,
  });
}
