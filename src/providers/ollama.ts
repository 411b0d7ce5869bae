// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

import { BaseGenerationProvider, type GenerationProviderConfig, type GenerationRequest, type GenerationResult } from './base.js';

const DEFAULT_BASE_URL = 'http://localhost:11434';

/**
 * Ollama chat request format.
 */
interface OllamaChatRequest {
  model: string;
  messages: Array<{ role: 'system' | 'user' | 'assistant'; content: string }>;
  stream: false;
  options?: {
    temperature?: number;
    num_predict?: number;
  };
}

function parseChatResponse(data: unknown): { content: string; promptEvalCount?: number; evalCount?: number } {
  if (
    typeof data !== 'object' ||
    data === null ||
    !('message' in data) ||
    typeof data.message !== 'object' ||
    data.message === null ||
    !('content' in data.message) ||
    typeof data.message.content !== 'string'
  ) {
    throw new Error('Ollama returned a malformed chat response');
  }
  return {
    content: data.message.content,
    promptEvalCount: 'prompt_eval_count' in data && typeof data.prompt_eval_count === 'number'
      ? data.prompt_eval_count
      : undefined,
    evalCount: 'eval_count' in data && typeof data.eval_count === 'number' ? data.eval_count : undefined,
  };
}

/**
 * Provider for Ollama's native /api/chat endpoint (non-streaming).
 */
export class OllamaGenerationProvider extends BaseGenerationProvider {
  private baseUrl: string;

  constructor(config: GenerationProviderConfig) {
    super(config);
    this.baseUrl = (config.baseUrl || DEFAULT_BASE_URL).replace(/\/+$/, '');
  }

  getName(): string {
    return 'Ollama';
  }

  protected async complete(request: GenerationRequest, signal: AbortSignal): Promise<GenerationResult> {
    const requestBody: OllamaChatRequest = {
      model: this.config.model,
      messages: [
        { role: 'system', content: request.system },
        { role: 'user', content: request.prompt },
      ],
      stream: false,
      options: {
        temperature: this.config.temperature,
        num_predict: this.config.maxTokens || undefined,
      },
    };

    const response = await fetch(`${this.baseUrl}/api/chat`, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
      },
      body: JSON.stringify(requestBody),
      signal,
    });

    if (!response.ok) {
      throw new Error(`Ollama API request failed: ${response.status} ${response.statusText}`);
    }

    const parsed = parseChatResponse(await response.json());
    return {
      text: parsed.content,
      model: this.config.model,
      inputTokens: parsed.promptEvalCount,
      outputTokens: parsed.evalCount,
    };
  }
}
