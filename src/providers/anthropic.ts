// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

import Anthropic from '@anthropic-ai/sdk';
import { BaseGenerationProvider, type GenerationProviderConfig, type GenerationRequest, type GenerationResult } from './base.js';

export class AnthropicGenerationProvider extends BaseGenerationProvider {
  private client: Anthropic;

  constructor(config: GenerationProviderConfig) {
    super(config);
    this.client = new Anthropic({
      apiKey: config.apiKey || process.env.ANTHROPIC_API_KEY,
      baseURL: config.baseUrl,
      maxRetries: 0,
    });
  }

  getName(): string {
    return 'Anthropic';
  }

  protected async complete(request: GenerationRequest, signal: AbortSignal): Promise<GenerationResult> {
    const response = await this.client.messages.create(
      {
        model: this.config.model,
        max_tokens: this.config.maxTokens,
        temperature: this.config.temperature,
        system: request.system,
        messages: [{ role: 'user', content: request.prompt }],
      },
      { signal }
    );

    const text = response.content
      .filter((block): block is Anthropic.TextBlock => block.type === 'text')
      .map((block) => block.text)
      .join('');

    return {
      text,
      model: response.model,
      inputTokens: response.usage.input_tokens,
      outputTokens: response.usage.output_tokens,
    };
  }
}
