// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

import { describe, it, expect, beforeEach } from 'vitest';
import { Retriever } from '../src/rag/retriever.js';
import { MemoryVectorIndex } from '../src/rag/vector-index.js';
import { BaseEmbeddingProvider } from '../src/rag/embeddings/base.js';
import { hashEmbed } from '../src/rag/embeddings/hashing.js';
import type { VectorRecord } from '../src/rag/types.js';
import { StubEmbeddingProvider, testConfig } from './helpers/fakes.js';

const DIMS = 64;

const passages = [
  { id: 'p0', deckId: 'bio', text: 'Mitochondria produce ATP through cellular respiration.' },
  { id: 'p1', deckId: 'bio', text: 'Ribosomes translate messenger RNA into proteins.' },
  { id: 'p2', deckId: 'bio', text: 'Chloroplasts capture light energy for photosynthesis.' },
  { id: 'p3', deckId: 'bio', text: 'The cell membrane regulates what enters the cell.' },
  { id: 'p4', deckId: 'chem', text: 'Mitochondria produce ATP through cellular respiration.' },
];

function toRecord(p: (typeof passages)[number], position: number): VectorRecord {
  return {
    id: p.id,
    deckId: p.deckId,
    vector: hashEmbed(p.text, DIMS),
    payload: { text: p.text, sourceId: `src-${p.id}`, position, tokenCount: 8 },
  };
}

describe('Retriever', () => {
  let index: MemoryVectorIndex;
  let provider: StubEmbeddingProvider;

  beforeEach(async () => {
    BaseEmbeddingProvider.clearCache();
    index = new MemoryVectorIndex(DIMS);
    provider = new StubEmbeddingProvider({ dimensions: DIMS });
    await index.upsert(passages.map(toRecord));
  });

  it('returns at most k chunks in descending score order', async () => {
    const retriever = await Retriever.open(provider, index, testConfig().retrieval);

    const chunks = await retriever.retrieve('Mitochondria produce ATP through cellular respiration.', 3, 'bio');

    expect(chunks).toHaveLength(3);
    expect(chunks[0]).toMatchObject({
      id: 'p0',
      text: 'Mitochondria produce ATP through cellular respiration.',
      sourceId: 'src-p0',
      deckId: 'bio',
      position: 0,
      tokenCount: 8,
      citationIndex: null,
    });
    expect(chunks[0].score).toBeCloseTo(1);
    for (let i = 1; i < chunks.length; i++) {
      expect(chunks[i - 1].score).toBeGreaterThanOrEqual(chunks[i].score);
    }
  });

  it('never returns chunks from another deck', async () => {
    const retriever = await Retriever.open(provider, index, testConfig().retrieval);

    const chunks = await retriever.retrieve('Mitochondria produce ATP', 10, 'chem');

    expect(chunks.map((c) => c.id)).toEqual(['p4']);
  });

  it('uses the configured top-k by default', async () => {
    const retriever = await Retriever.open(provider, index, testConfig({ retrieval: { topK: 2 } }).retrieval);

    expect(await retriever.retrieve('cell')).toHaveLength(2);
  });

  it('drops hits below the minimum score', async () => {
    const retriever = await Retriever.open(provider, index, testConfig({ retrieval: { minScore: 0.99 } }).retrieval);

    const chunks = await retriever.retrieve('Ribosomes translate messenger RNA into proteins.', 5, 'bio');

    expect(chunks.map((c) => c.id)).toEqual(['p1']);
  });

  it('returns nothing for a blank query or k of zero without embedding', async () => {
    const retriever = await Retriever.open(provider, index, testConfig().retrieval);

    expect(await retriever.retrieve('   ')).toEqual([]);
    expect(await retriever.retrieve('cell', 0)).toEqual([]);
    expect(provider.requests).not.toHaveBeenCalled();
  });

  it('returns nothing from an empty deck', async () => {
    const retriever = await Retriever.open(provider, index, testConfig().retrieval);

    expect(await retriever.retrieve('cell', 5, 'physics')).toEqual([]);
  });

  it('throws when aborted', async () => {
    const retriever = await Retriever.open(provider, index, testConfig().retrieval);
    const controller = new AbortController();
    controller.abort();

    await expect(retriever.retrieve('cell', 5, undefined, controller.signal)).rejects.toMatchObject({
      name: 'AbortError',
    });
  });
});
