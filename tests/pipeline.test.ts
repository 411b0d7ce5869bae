// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { RagPipeline } from '../src/rag/pipeline.js';
import { MemoryVectorIndex } from '../src/rag/vector-index.js';
import { BaseEmbeddingProvider } from '../src/rag/embeddings/base.js';
import { ConfigError, IndexUnavailableError } from '../src/errors.js';
import type { ScoredRecord, VectorRecord } from '../src/rag/types.js';
import { StubEmbeddingProvider, StubGenerationProvider, testConfig } from './helpers/fakes.js';
import { WhitespaceTokenizer } from './helpers/whitespace-tokenizer.js';

const PHOTOSYNTHESIS = 'Photosynthesis happens in chloroplasts, which capture light energy and store it as glucose.';
const MITOSIS = 'Mitosis divides one nucleus into two identical daughter nuclei.';
const INFLATION = 'Inflation measures how quickly the general price level rises.';

class UnreadableIndex extends MemoryVectorIndex {
  override async search(_vector: number[], _k: number, _deckId?: string): Promise<ScoredRecord[]> {
    throw new IndexUnavailableError('index file is corrupt');
  }
}

async function seed(pipeline: RagPipeline): Promise<void> {
  await pipeline.ingest([
    { sourceId: 'photosynthesis', deckId: 'bio', text: PHOTOSYNTHESIS },
    { sourceId: 'mitosis', deckId: 'bio', text: MITOSIS },
    { sourceId: 'inflation', deckId: 'econ', text: INFLATION },
  ]);
}

describe('RagPipeline', () => {
  beforeEach(() => {
    BaseEmbeddingProvider.clearCache();
  });

  it('answers extractively from the matching deck without a generator', async () => {
    const pipeline = await RagPipeline.create(testConfig(), { tokenizer: new WhitespaceTokenizer() });
    await seed(pipeline);

    const answer = await pipeline.ask('How do chloroplasts capture light energy in photosynthesis?', {
      deckId: 'bio',
    });

    expect(answer.mode).toBe('extractive');
    expect(answer.text).toBe(PHOTOSYNTHESIS);
    expect(answer.sources.map((s) => s.deckId)).toEqual(['bio', 'bio']);
    expect(answer.sources[0]).toMatchObject({ sourceId: 'photosynthesis', citationIndex: 1 });
  });

  it('generates an answer with the injected generator', async () => {
    const generator = new StubGenerationProvider('Chloroplasts capture light [1].');
    const pipeline = await RagPipeline.create(testConfig(), {
      tokenizer: new WhitespaceTokenizer(),
      generationProvider: generator,
    });
    await seed(pipeline);

    const answer = await pipeline.ask('chloroplasts light energy', { deckId: 'bio', k: 1 });

    expect(answer).toMatchObject({ text: 'Chloroplasts capture light [1].', mode: 'generated' });
    expect(generator.calls[0].prompt).toContain(`[1] ${PHOTOSYNTHESIS}`);
  });

  it("says I don't know for a deck with no material", async () => {
    const pipeline = await RagPipeline.create(testConfig());
    await seed(pipeline);

    const answer = await pipeline.ask('What is inflation?', { deckId: 'physics' });

    expect(answer).toEqual({ text: "I don't know.", sources: [], mode: 'no-answer' });
  });

  it('lists sources only when asked', async () => {
    const pipeline = await RagPipeline.create(testConfig());
    await seed(pipeline);

    const answer = await pipeline.ask('price level', { deckId: 'econ', sourcesOnly: true });

    expect(answer.mode).toBe('sources-only');
    expect(answer.text).toBeNull();
    expect(answer.sources.map((s) => s.sourceId)).toEqual(['inflation']);
  });

  it('retrieves at most k chunks', async () => {
    const pipeline = await RagPipeline.create(testConfig());
    await seed(pipeline);

    expect(await pipeline.retrieve('cells', { k: 2 })).toHaveLength(2);
    expect(await pipeline.retrieve('cells', { k: 2, deckId: 'econ' })).toHaveLength(1);
  });

  it('returns the no-answer result when the query cannot be embedded', async () => {
    const pipeline = await RagPipeline.create(testConfig({ embedding: { dimensions: 64 } }), {
      embeddingProvider: new StubEmbeddingProvider({ failOn: () => true }),
    });

    expect((await pipeline.ask('anything')).mode).toBe('no-answer');
  });

  it('surfaces an unavailable index', async () => {
    const pipeline = await RagPipeline.create(testConfig(), { index: new UnreadableIndex(512) });

    await expect(pipeline.ask('anything')).rejects.toThrow(IndexUnavailableError);
  });

  it('refuses an index built by another embedder', async () => {
    const index = new MemoryVectorIndex(512);
    await index.writeManifest({ fingerprint: 'openai:text-embedding-3-small:512', dimensions: 512, createdAt: '' });

    await expect(RagPipeline.create(testConfig(), { index })).rejects.toThrow(ConfigError);
  });

  it('rejects invalid configuration', async () => {
    await expect(
      RagPipeline.create(testConfig({ chunking: { maxTokens: 100, overlapTokens: 150 } }))
    ).rejects.toThrow(ConfigError);
  });

  it('exports records and reports stats', async () => {
    const pipeline = await RagPipeline.create(testConfig());
    await seed(pipeline);

    const records: VectorRecord[] = [];
    for await (const record of pipeline.export()) records.push(record);

    expect(records.map((r) => `${r.deckId}/${r.payload.sourceId}`)).toEqual([
      'bio/mitosis',
      'bio/photosynthesis',
      'econ/inflation',
    ]);
    expect(await pipeline.stats('bio')).toEqual({
      records: 2,
      deckId: 'bio',
      backend: 'memory',
      embeddingFingerprint: 'hashing:ngram-hash-v1:512',
      dimensions: 512,
    });
  });

  describe('with the persistent index', () => {
    let dataDir: string;

    beforeEach(() => {
      dataDir = fs.mkdtempSync(path.join(os.tmpdir(), 'decklens-pipeline-'));
    });

    afterEach(() => {
      fs.rmSync(dataDir, { recursive: true, force: true });
    });

    it('keeps ingested material across pipelines', async () => {
      const config = testConfig({ index: { backend: 'vectra', dataDir } });
      await seed(await RagPipeline.create(config));

      const reopened = await RagPipeline.create(config);

      expect((await reopened.stats()).records).toBe(3);
      const [top] = await reopened.retrieve(MITOSIS, { k: 1 });
      expect(top.sourceId).toBe('mitosis');
    });

    it('refuses to query with different embedding settings', async () => {
      await RagPipeline.create(testConfig({ index: { backend: 'vectra', dataDir } }));

      await expect(
        RagPipeline.create(testConfig({ index: { backend: 'vectra', dataDir }, embedding: { dimensions: 256 } }))
      ).rejects.toThrow(/built with hashing:ngram-hash-v1:512/);
    });
  });
});
