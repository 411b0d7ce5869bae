// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Answerer
 *
 * Turns packed context into an answer. With a generation provider the answer
 * is generated with inline [n] citations; without one, or when generation
 * fails, the top source's text is returned verbatim within the packing budget.
 */

import { isAbortError, throwIfAborted, toError } from '../errors.js';
import { logger } from '../logger.js';
import type { BaseGenerationProvider } from '../providers/base.js';
import type { TokenCounter } from './tokenizer.js';
import type { Answer, PackedContext } from './types.js';

export const NO_ANSWER_TEXT = "I don't know.";

export const ANSWER_SYSTEM_PROMPT =
  'You are a helpful study assistant. Answer the question using ONLY the provided context. ' +
  'Cite sources inline as [1], [2], ... referring to the numbered context items. ' +
  "If the answer is not in the context, say you don't know. Be concise.";

/**
 * User message sent with the system prompt.
 */
export function buildAnswerPrompt(query: string, context: string): string {
  return `Context:\n${context}\n\nQuestion: ${query}\nAnswer:`;
}

export interface AnswerOptions {
  sourcesOnly?: boolean;
  signal?: AbortSignal;
}

export class Answerer {
  /**
   * @param generator - null answers extractively
   */
  constructor(
    private generator: BaseGenerationProvider | null,
    private counter: TokenCounter
  ) {}

  /**
   * Answer from packed context. Never throws for generation problems; only an abort propagates.
   */
  async answer(query: string, packed: PackedContext, options: AnswerOptions = {}): Promise<Answer> {
    throwIfAborted(options.signal);

    if (packed.sources.length === 0) {
      return { text: NO_ANSWER_TEXT, sources: [], mode: 'no-answer' };
    }

    if (options.sourcesOnly) {
      return { text: null, sources: packed.sources, mode: 'sources-only' };
    }

    if (!this.generator) {
      return this.extractive(packed);
    }

    try {
      const result = await this.generator.generate({
        system: ANSWER_SYSTEM_PROMPT,
        prompt: buildAnswerPrompt(query, packed.text),
        signal: options.signal,
      });
      return { text: result.text.trim(), sources: packed.sources, mode: 'generated' };
    } catch (error) {
      if (isAbortError(error)) throw error;
      logger.generationFallback(this.generator.getName(), toError(error));
      return this.extractive(packed);
    }
  }

  /**
   * The highest-scoring source, verbatim, bounded to the packing budget.
   */
  extractive(packed: PackedContext): Answer {
    let top = packed.sources[0];
    for (const source of packed.sources) {
      if (source.score > top.score) top = source;
    }
    return {
      text: this.counter.truncate(top.text, packed.budget),
      sources: packed.sources,
      mode: 'extractive',
    };
  }
}
