// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

import { describe, it, expect } from 'vitest';
import { TextChunker, blockId } from '../src/rag/chunker.js';
import { TiktokenTokenizer } from '../src/rag/tokenizer.js';
import { ConfigError } from '../src/errors.js';
import { testConfig } from './helpers/fakes.js';
import { WhitespaceTokenizer, words } from './helpers/whitespace-tokenizer.js';

describe('TextChunker', () => {
  describe('token windows', () => {
    const chunker = new TextChunker(
      testConfig({ chunking: { maxTokens: 700, overlapTokens: 100 } }).chunking,
      new WhitespaceTokenizer()
    );

    it('splits 1500 tokens into three overlapping windows', () => {
      const blocks = chunker.chunk(words(1500), 'lecture-1', 'bio-101');

      expect(blocks.map((b) => b.position)).toEqual([0, 1, 2]);
      expect(blocks.map((b) => b.tokenCount)).toEqual([700, 700, 300]);
      expect(blocks[0].text).toBe(words(700));
      expect(blocks[1].text.startsWith('w600 w601')).toBe(true);
      expect(blocks[2].text.startsWith('w1200 ')).toBe(true);
      expect(blocks[2].text.endsWith(' w1499')).toBe(true);
    });

    it('shares exactly the overlap between consecutive windows', () => {
      const blocks = chunker.chunk(words(1500), 'lecture-1', 'bio-101');

      for (let i = 1; i < blocks.length; i++) {
        const previous = blocks[i - 1].text.split(' ');
        const current = blocks[i].text.split(' ');
        expect(previous.slice(-100)).toEqual(current.slice(0, 100));
      }
    });

    it('keeps text that fits in one window verbatim', () => {
      const blocks = chunker.chunk('  Osmosis   moves water.\n', 'notes', 'bio-101');

      expect(blocks).toHaveLength(1);
      expect(blocks[0].text).toBe('  Osmosis   moves water.\n');
      expect(blocks[0].tokenCount).toBe(3);
      expect(blocks[0].position).toBe(0);
    });

    it('returns no blocks for blank text', () => {
      expect(chunker.chunk('', 'empty', 'bio-101')).toEqual([]);
      expect(chunker.chunk(' \n\t ', 'empty', 'bio-101')).toEqual([]);
    });

    it('is deterministic and scopes ids to deck and source', () => {
      const first = chunker.chunk(words(800), 'lecture-1', 'bio-101');
      const second = chunker.chunk(words(800), 'lecture-1', 'bio-101');
      const otherDeck = chunker.chunk(words(800), 'lecture-1', 'chem-201');

      expect(second).toEqual(first);
      expect(first[1].id).toBe(blockId('bio-101', 'lecture-1', 1));
      expect(otherDeck[0].id).not.toBe(first[0].id);
    });

    it('copies caller metadata and records the strategy', () => {
      const [block] = chunker.chunk('cell walls', 'notes', 'bio-101', { title: 'Plants' });

      expect(block.metadata).toEqual({ title: 'Plants', strategy: 'tokens' });
      expect(block.sourceId).toBe('notes');
      expect(block.deckId).toBe('bio-101');
    });
  });

  describe('character windows', () => {
    it('windows by characters and estimates token counts', () => {
      const chunker = new TextChunker(
        testConfig({ chunking: { strategy: 'chars', charSize: 10, charOverlap: 2 } }).chunking
      );

      const blocks = chunker.chunk('abcdefghijklmnopqrstuvwxy', 'alphabet', 'deck');

      expect(blocks.map((b) => b.text)).toEqual(['abcdefghij', 'ijklmnopqr', 'qrstuvwxy']);
      expect(blocks.map((b) => b.tokenCount)).toEqual([3, 3, 3]);
      expect(blocks[0].metadata.strategy).toBe('chars');
    });

    it('handles windows of hundreds of thousands of characters', () => {
      const chunker = new TextChunker(
        testConfig({ chunking: { strategy: 'chars', charSize: 200000, charOverlap: 100 } }).chunking
      );
      const text = 'abcdefghij'.repeat(25000);

      const blocks = chunker.chunk(text, 'long', 'deck');

      expect(blocks).toHaveLength(2);
      expect(blocks[0].text).toBe(text.slice(0, 200000));
      expect(blocks[1].text).toBe(text.slice(199900));
      expect(blocks.map((b) => b.tokenCount)).toEqual([50000, 12525]);
    });
  });

  describe('deduplication', () => {
    const text = 'alpha beta gamma alpha beta gamma delta epsilon zeta';

    it('keeps repeated windows when dedupe is off', () => {
      const chunker = new TextChunker(
        testConfig({ chunking: { maxTokens: 3, overlapTokens: 0 } }).chunking,
        new WhitespaceTokenizer()
      );

      expect(chunker.chunk(text, 's', 'd').map((b) => b.text)).toEqual([
        'alpha beta gamma',
        'alpha beta gamma',
        'delta epsilon zeta',
      ]);
    });

    it('drops repeated windows and renumbers positions', () => {
      const chunker = new TextChunker(
        testConfig({ chunking: { maxTokens: 3, overlapTokens: 0, dedupe: true } }).chunking,
        new WhitespaceTokenizer()
      );

      const blocks = chunker.chunk(text, 's', 'd');

      expect(blocks.map((b) => b.text)).toEqual(['alpha beta gamma', 'delta epsilon zeta']);
      expect(blocks.map((b) => b.position)).toEqual([0, 1]);
    });

    it('drops near-empty windows', () => {
      const chunker = new TextChunker(
        testConfig({ chunking: { maxTokens: 2, overlapTokens: 0, dedupe: true } }).chunking,
        new WhitespaceTokenizer()
      );

      const blocks = chunker.chunk('a b cccccc dddddd', 's', 'd');

      expect(blocks.map((b) => b.text)).toEqual(['cccccc dddddd']);
      expect(blocks[0].position).toBe(0);
    });
  });

  it('rejects an overlap that is not smaller than the window', () => {
    expect(
      () => new TextChunker(testConfig({ chunking: { maxTokens: 100, overlapTokens: 100 } }).chunking)
    ).toThrow(ConfigError);
  });

  it('uses cl100k_base tokens by default', () => {
    const chunker = new TextChunker(testConfig().chunking);
    const text = 'The mitochondria is the powerhouse of the cell.';

    const blocks = chunker.chunk(text, 'notes', 'bio-101');

    expect(blocks).toHaveLength(1);
    expect(blocks[0].text).toBe(text);
    expect(blocks[0].tokenCount).toBe(new TiktokenTokenizer().count(text));
  });
});
