// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Tokenizers used for chunk windows and context budgets.
 *
 * - TiktokenTokenizer: cl100k_base BPE tokens (js-tiktoken)
 * - CharacterTokenizer: one token per Unicode code point
 * - HeuristicTokenCounter: ~4 chars per token estimate, for character windows
 */

import { getEncoding, type Tiktoken } from 'js-tiktoken';
import type { ChunkStrategy } from '../config/types.js';

/**
 * Counts tokens and cuts text down to a token budget.
 */
export interface TokenCounter {
  readonly name: string;
  count(text: string): number;
  truncate(text: string, maxTokens: number): string;
}

/**
 * A reversible tokenizer: windows are cut on encoded tokens and decoded back to text.
 */
export interface Tokenizer extends TokenCounter {
  encode(text: string): number[];
  decode(tokens: number[]): string;
}

const DEFAULT_ENCODING = 'cl100k_base';

/** Default chars per token for general text */
const DEFAULT_CHARS_PER_TOKEN = 4;

let sharedEncoding: Tiktoken | null = null;

function loadEncoding(): Tiktoken {
  if (!sharedEncoding) {
    sharedEncoding = getEncoding(DEFAULT_ENCODING);
  }
  return sharedEncoding;
}

export class TiktokenTokenizer implements Tokenizer {
  readonly name = `tiktoken:${DEFAULT_ENCODING}`;

  encode(text: string): number[] {
    return loadEncoding().encode(text);
  }

  decode(tokens: number[]): string {
    return loadEncoding().decode(tokens);
  }

  count(text: string): number {
    return text ? this.encode(text).length : 0;
  }

  truncate(text: string, maxTokens: number): string {
    const tokens = this.encode(text);
    if (tokens.length <= maxTokens) return text;
    return this.decode(tokens.slice(0, Math.max(0, maxTokens)));
  }
}

export class CharacterTokenizer implements Tokenizer {
  readonly name = 'chars';

  encode(text: string): number[] {
    return Array.from(text, (ch) => ch.codePointAt(0) ?? 0);
  }

  decode(tokens: number[]): string {
    return tokens.map((code) => String.fromCodePoint(code)).join('');
  }

  count(text: string): number {
    return Array.from(text).length;
  }

  truncate(text: string, maxTokens: number): string {
    const chars = Array.from(text);
    if (chars.length <= maxTokens) return text;
    return chars.slice(0, Math.max(0, maxTokens)).join('');
  }
}

/**
 * Estimate token count for a string (~4 chars per token).
 */
export function estimateTokens(text: string): number {
  if (!text) return 0;
  return Math.ceil(Array.from(text).length / DEFAULT_CHARS_PER_TOKEN);
}

export class HeuristicTokenCounter implements TokenCounter {
  readonly name = 'estimate';

  count(text: string): number {
    return estimateTokens(text);
  }

  truncate(text: string, maxTokens: number): string {
    const chars = Array.from(text);
    const limit = Math.max(0, maxTokens) * DEFAULT_CHARS_PER_TOKEN;
    if (chars.length <= limit) return text;
    return chars.slice(0, limit).join('');
  }
}

/**
 * The counter whose units match the token counts stored for a chunking strategy.
 */
export function createTokenCounter(strategy: ChunkStrategy, tokenizer?: Tokenizer): TokenCounter {
  if (strategy === 'chars') {
    return new HeuristicTokenCounter();
  }
  return tokenizer ?? new TiktokenTokenizer();
}
