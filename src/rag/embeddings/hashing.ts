// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Hashing Embedding Provider
 *
 * Local, deterministic embeddings: lower-cased character n-grams (3, 4 and 5)
 * are hashed into signed buckets and the vector is L2-normalized. Texts that
 * share many n-grams land close together under cosine similarity.
 */

import { BaseEmbeddingProvider, type EmbeddingProviderOptions } from './base.js';
import { DEFAULT_EMBEDDING_MODELS } from './dimensions.js';

const NGRAM_RANGE = [3, 4, 5] as const;
const HASH_SEEDS = [0x9e3779b1, 0x85ebca77, 0xc2b2ae3d];

const rotate32 = (value: number, shift: number) =>
  (value << shift) | (value >>> (32 - shift));

const hashNgram = (ngram: string, seed: number) => {
  let hash = seed | 0;
  for (let i = 0; i < ngram.length; i += 1) {
    hash = Math.imul(hash ^ ngram.charCodeAt(i), 0x27d4eb2d);
    hash = rotate32(hash, 13);
  }
  return hash | 0;
};

const sanitize = (input: string) =>
  input
    .toLowerCase()
    .replace(/\s+/g, ' ')
    .trim();

/**
 * Hash text into a unit vector of `dims` dimensions.
 * Empty (or whitespace-only) text yields the zero vector.
 */
export function hashEmbed(text: string, dims: number): number[] {
  const vector = new Array<number>(dims).fill(0);
  const cleaned = sanitize(text);
  if (!cleaned) return vector;

  const add = (gram: string, seed: number) => {
    const hash = hashNgram(gram, seed);
    const index = Math.abs(hash) % dims;
    vector[index] += (hash & 1) === 0 ? 1 : -1;
  };

  if (cleaned.length < NGRAM_RANGE[0]) {
    // Too short for any n-gram: hash the whole string
    add(cleaned, HASH_SEEDS[0]);
  }

  for (let s = 0; s < NGRAM_RANGE.length; s += 1) {
    const n = NGRAM_RANGE[s];
    const seed = HASH_SEEDS[s % HASH_SEEDS.length];
    for (let i = 0; i <= cleaned.length - n; i += 1) {
      add(cleaned.slice(i, i + n), seed);
    }
  }

  let sum = 0;
  for (const value of vector) sum += value * value;
  const norm = Math.sqrt(sum);
  return norm === 0 ? vector : vector.map((value) => value / norm);
}

/**
 * Deterministic embedding provider that needs no network.
 */
export class HashingEmbeddingProvider extends BaseEmbeddingProvider {
  protected override readonly maxBatchSize = Number.POSITIVE_INFINITY;
  private model: string;

  constructor(options: EmbeddingProviderOptions & { model?: string }) {
    super(options);
    this.model = options.model ?? DEFAULT_EMBEDDING_MODELS.hashing;
  }

  getName(): string {
    return 'Hashing';
  }

  getModel(): string {
    return this.model;
  }

  protected async request(texts: string[]): Promise<number[][]> {
    return texts.map((text) => hashEmbed(text, this.dimensions));
  }
}
