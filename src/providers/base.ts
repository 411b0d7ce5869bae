// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

import { GenerationFailureError, isAbortError, toError } from '../errors.js';
import { logger } from '../logger.js';
import { withTimeout } from './retry.js';

/**
 * A prompt for a grounded answer.
 */
export interface GenerationRequest {
  system: string;
  prompt: string;
  signal?: AbortSignal;
}

export interface GenerationResult {
  text: string;
  model: string;
  inputTokens?: number;
  outputTokens?: number;
}

export interface GenerationProviderConfig {
  model: string;
  maxTokens: number;
  temperature: number;
  /** Per-request timeout in ms */
  timeoutMs: number;
  baseUrl?: string;
  apiKey?: string;
}

/**
 * Abstract base class for text generation backends.
 * Implement complete() to add support for a new backend.
 */
export abstract class BaseGenerationProvider {
  protected config: GenerationProviderConfig;

  constructor(config: GenerationProviderConfig) {
    this.config = config;
  }

  /**
   * Get the name of this provider.
   */
  abstract getName(): string;

  /**
   * Send one request to the backend.
   */
  protected abstract complete(request: GenerationRequest, signal: AbortSignal): Promise<GenerationResult>;

  /**
   * Get the current model being used.
   */
  getModel(): string {
    return this.config.model;
  }

  /**
   * Generate an answer.
   * @throws GenerationFailureError on any backend failure or an empty response
   * @throws AbortError when the request signal aborts
   */
  async generate(request: GenerationRequest): Promise<GenerationResult> {
    logger.promptFull(this.getModel(), request.system, request.prompt);

    let result: GenerationResult;
    try {
      result = await withTimeout(
        (signal) => this.complete(request, signal),
        this.config.timeoutMs,
        request.signal
      );
    } catch (error) {
      if (isAbortError(error)) throw error;
      const cause = toError(error);
      throw new GenerationFailureError(`${this.getName()} generation failed: ${cause.message}`, { cause });
    }

    if (!result.text.trim()) {
      throw new GenerationFailureError(`${this.getName()} returned an empty response`);
    }
    return result;
  }
}
