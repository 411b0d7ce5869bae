// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Context Packer
 *
 * Greedy packing of retrieved chunks into a token budget. Chunks are taken in
 * arrival (score) order; one that would overflow is skipped and later, smaller
 * chunks are still tried. Accepted chunks are numbered 1, 2, 3, ... for citation.
 */

import { logger } from '../logger.js';
import type { TokenCounter } from './tokenizer.js';
import type { PackedContext, RetrievedChunk } from './types.js';

/**
 * Render accepted chunks as the numbered context shown to the generator.
 */
export function formatContext(sources: RetrievedChunk[]): string {
  return sources.map((chunk) => `[${chunk.citationIndex ?? '?'}] ${chunk.text}`).join('\n\n');
}

export class ContextPacker {
  constructor(private counter: TokenCounter) {}

  pack(chunks: RetrievedChunk[], maxContextTokens: number): PackedContext {
    const empty: PackedContext = { text: '', sources: [], tokenCount: 0, budget: maxContextTokens, truncated: false };
    if (chunks.length === 0 || maxContextTokens <= 0) return empty;

    const accepted: RetrievedChunk[] = [];
    const seenTexts = new Set<string>();
    let running = 0;
    let skipped = 0;

    for (const chunk of chunks) {
      if (seenTexts.has(chunk.text) || running + chunk.tokenCount > maxContextTokens) {
        skipped++;
        continue;
      }
      seenTexts.add(chunk.text);
      running += chunk.tokenCount;
      accepted.push({ ...chunk, citationIndex: accepted.length + 1 });
    }

    if (accepted.length > 0) {
      logger.packing(accepted.length, skipped, running, maxContextTokens, false);
      return {
        text: formatContext(accepted),
        sources: accepted,
        tokenCount: running,
        budget: maxContextTokens,
        truncated: false,
      };
    }

    // Nothing fits: cut the top chunk down to the budget
    const [first] = chunks;
    const text = this.counter.truncate(first.text, maxContextTokens);
    const tokenCount = Math.min(this.counter.count(text), maxContextTokens);
    const truncated: RetrievedChunk = { ...first, text, tokenCount, citationIndex: 1 };

    logger.packing(1, chunks.length - 1, tokenCount, maxContextTokens, true);
    return {
      text: formatContext([truncated]),
      sources: [truncated],
      tokenCount,
      budget: maxContextTokens,
      truncated: true,
    };
  }
}
