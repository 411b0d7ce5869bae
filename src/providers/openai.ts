// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

import OpenAI from 'openai';
import { BaseGenerationProvider, type GenerationProviderConfig, type GenerationRequest, type GenerationResult } from './base.js';

export class OpenAIGenerationProvider extends BaseGenerationProvider {
  private client: OpenAI;

  constructor(config: GenerationProviderConfig) {
    super(config);
    this.client = new OpenAI({
      apiKey: config.apiKey || process.env.OPENAI_API_KEY,
      baseURL: config.baseUrl,
      maxRetries: 0,
    });
  }

  getName(): string {
    return 'OpenAI';
  }

  protected async complete(request: GenerationRequest, signal: AbortSignal): Promise<GenerationResult> {
    const response = await this.client.chat.completions.create(
      {
        model: this.config.model,
        max_tokens: this.config.maxTokens,
        temperature: this.config.temperature,
        messages: [
          { role: 'system', content: request.system },
          { role: 'user', content: request.prompt },
        ],
      },
      { signal }
    );

    return {
      text: response.choices[0]?.message?.content ?? '',
      model: response.model,
      inputTokens: response.usage?.prompt_tokens,
      outputTokens: response.usage?.completion_tokens,
    };
  }
}
