// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

import { ConfigError } from '../errors.js';
import { logger } from '../logger.js';
import type { BaseEmbeddingProvider } from './embeddings/base.js';
import type { IndexManifest, VectorIndex } from './vector-index.js';

/**
 * Bind an index to an embedding provider.
 *
 * A fresh index records the provider's fingerprint. An existing index must
 * carry the same fingerprint: vectors from different strategies are not
 * comparable, so a mismatch is a startup error.
 *
 * @throws ConfigError on fingerprint or dimension mismatch
 */
export async function ensureManifest(
  index: VectorIndex,
  embeddings: BaseEmbeddingProvider
): Promise<IndexManifest> {
  const fingerprint = embeddings.fingerprint();
  const dimensions = embeddings.getDimensions();

  if (index.dimensions !== dimensions) {
    throw new ConfigError(
      `Index stores ${index.dimensions}-dimensional vectors but ${fingerprint} produces ${dimensions}`
    );
  }

  const existing = await index.readManifest();
  if (existing) {
    if (existing.fingerprint !== fingerprint || existing.dimensions !== dimensions) {
      throw new ConfigError(
        `Index was built with ${existing.fingerprint} but the configured embedder is ${fingerprint}. ` +
        'Re-ingest into a new collection or restore the original embedding settings.'
      );
    }
    return existing;
  }

  const manifest: IndexManifest = { fingerprint, dimensions, createdAt: new Date().toISOString() };
  await index.writeManifest(manifest);
  logger.debug(`Index manifest created for ${fingerprint}`);
  return manifest;
}
