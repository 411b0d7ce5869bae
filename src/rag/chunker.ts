// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Text Chunker
 *
 * Splits raw text into overlapping windows, either over tokenizer tokens
 * or over characters as a fallback.
 */

import * as crypto from 'crypto';
import { assertWindow } from '../config/validator.js';
import type { PipelineConfig } from '../config/types.js';
import {
  CharacterTokenizer,
  HeuristicTokenCounter,
  TiktokenTokenizer,
  type TokenCounter,
  type Tokenizer,
} from './tokenizer.js';
import type { ContentBlock } from './types.js';

/** Windows whose trimmed text is this short are dropped when deduplicating */
export const MIN_CHUNK_CHARS = 10;

/**
 * Splits source text into ContentBlocks.
 */
export class TextChunker {
  private readonly windowTokenizer: Tokenizer;
  private readonly counter: TokenCounter;
  private readonly size: number;
  private readonly overlap: number;
  private readonly dedupe: boolean;
  private readonly strategy: PipelineConfig['chunking']['strategy'];

  /**
   * @param tokenizer - Overrides the cl100k_base tokenizer of the 'tokens' strategy
   * @throws ConfigError when overlap is not smaller than the window size
   */
  constructor(config: PipelineConfig['chunking'], tokenizer?: Tokenizer) {
    this.strategy = config.strategy;
    this.dedupe = config.dedupe;

    if (config.strategy === 'chars') {
      assertWindow(config.charSize, config.charOverlap, 'Character window');
      this.size = config.charSize;
      this.overlap = config.charOverlap;
      this.windowTokenizer = new CharacterTokenizer();
      this.counter = new HeuristicTokenCounter();
    } else {
      assertWindow(config.maxTokens, config.overlapTokens, 'Token window');
      this.size = config.maxTokens;
      this.overlap = config.overlapTokens;
      this.windowTokenizer = tokenizer ?? new TiktokenTokenizer();
      this.counter = this.windowTokenizer;
    }
  }

  /**
   * Split text into blocks. Same text and settings always give the same blocks.
   */
  chunk(
    text: string,
    sourceId: string,
    deckId: string,
    metadata: Record<string, string> = {}
  ): ContentBlock[] {
    if (!text.trim()) return [];

    const windows = this.windows(text);
    const kept = this.dedupe && windows.length > 1 ? dropRepeats(windows) : windows;

    return kept.map((window, position) => ({
      id: blockId(deckId, sourceId, position),
      sourceId,
      deckId,
      text: window.text,
      tokenCount: this.strategy === 'chars' ? this.counter.count(window.text) : window.tokens,
      position,
      metadata: { ...metadata, strategy: this.strategy },
    }));
  }

  /**
   * Sliding windows of `size` units advancing by `size - overlap`.
   * The last window ends at the end of the text.
   */
  private windows(text: string): Array<{ text: string; tokens: number }> {
    const tokens = this.windowTokenizer.encode(text);
    const n = tokens.length;

    // Fits in one window: keep the input verbatim
    if (n <= this.size) {
      return [{ text, tokens: n }];
    }

    const result: Array<{ text: string; tokens: number }> = [];
    let start = 0;
    while (start < n) {
      const end = Math.min(start + this.size, n);
      result.push({ text: this.windowTokenizer.decode(tokens.slice(start, end)), tokens: end - start });
      if (end === n) break;
      start = end - this.overlap;
    }
    return result;
  }
}

/**
 * Drop windows that repeat an earlier window's trimmed text, or are near-empty.
 */
function dropRepeats<T extends { text: string }>(windows: T[]): T[] {
  const seen = new Set<string>();
  return windows.filter((window) => {
    const trimmed = window.text.trim();
    if (trimmed.length <= MIN_CHUNK_CHARS) return false;
    const key = crypto.createHash('md5').update(trimmed).digest('hex');
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });
}

/**
 * Deterministic, source-scoped block id.
 */
export function blockId(deckId: string, sourceId: string, position: number): string {
  return crypto
    .createHash('md5')
    .update(`${deckId}:${sourceId}:${position}`)
    .digest('hex')
    .slice(0, 16);
}
