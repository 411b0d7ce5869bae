// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

import { describe, it, expect } from 'vitest';
import { ensureManifest } from '../src/rag/manifest.js';
import { MemoryVectorIndex } from '../src/rag/vector-index.js';
import { ConfigError } from '../src/errors.js';
import { StubEmbeddingProvider } from './helpers/fakes.js';

describe('ensureManifest', () => {
  it('records the embedder on a fresh index', async () => {
    const index = new MemoryVectorIndex(64);

    const manifest = await ensureManifest(index, new StubEmbeddingProvider());

    expect(manifest.fingerprint).toBe('stub:stub-model:64');
    expect(manifest.dimensions).toBe(64);
    expect(await index.readManifest()).toEqual(manifest);
  });

  it('accepts the same embedder again', async () => {
    const index = new MemoryVectorIndex(64);
    const created = await ensureManifest(index, new StubEmbeddingProvider());

    expect(await ensureManifest(index, new StubEmbeddingProvider())).toEqual(created);
  });

  it('rejects an index built by another embedding model', async () => {
    const index = new MemoryVectorIndex(64);
    await ensureManifest(index, new StubEmbeddingProvider({ model: 'model-a' }));

    await expect(ensureManifest(index, new StubEmbeddingProvider({ model: 'model-b' }))).rejects.toThrow(
      /built with stub:model-a:64/
    );
  });

  it('rejects an embedder whose dimensions differ from the index', async () => {
    const index = new MemoryVectorIndex(32);

    await expect(ensureManifest(index, new StubEmbeddingProvider({ dimensions: 64 }))).rejects.toThrow(ConfigError);
    expect(await index.readManifest()).toBeNull();
  });
});
