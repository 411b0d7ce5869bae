// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Vector Index
 *
 * The storage contract shared by the in-memory index and the persistent
 * vectra store, plus the in-memory implementation.
 */

import { ConfigError } from '../errors.js';
import { cosineSimilarity } from '../utils/vector.js';
import type { ScoredRecord, VectorRecord } from './types.js';

/**
 * Embedding identity recorded beside an index.
 */
export interface IndexManifest {
  /** Embedding provider fingerprint (name:model:dims) */
  fingerprint: string;
  dimensions: number;
  createdAt: string;
}

export interface VectorIndex {
  readonly backend: string;
  readonly dimensions: number;

  /**
   * Insert or replace records by id.
   * @returns Number of records written
   * @throws ConfigError when a vector's length differs from the index dimensions
   */
  upsert(records: VectorRecord[]): Promise<number>;

  /**
   * Top-k records by cosine similarity, descending; ties go to the earlier-inserted record.
   * A deck filter is applied before the top-k cut.
   */
  search(vector: number[], k: number, deckId?: string): Promise<ScoredRecord[]>;

  /**
   * Paged scan ordered by deck, source and position. Each call starts a fresh scan.
   */
  export(deckId?: string, pageSize?: number): AsyncIterable<VectorRecord>;

  delete(ids: string[]): Promise<number>;

  /**
   * Remove a source's records, except the ids in `keep`.
   */
  deleteBySource(sourceId: string, deckId: string, keep?: ReadonlySet<string>): Promise<number>;

  count(deckId?: string): Promise<number>;

  /** Remove every record; the manifest stays */
  clear(): Promise<void>;

  readManifest(): Promise<IndexManifest | null>;
  writeManifest(manifest: IndexManifest): Promise<void>;
}

export const DEFAULT_EXPORT_PAGE_SIZE = 100;

/**
 * Reject vectors whose length differs from the index dimensions.
 */
export function assertDimensions(vector: readonly number[], dimensions: number, label: string): void {
  if (vector.length !== dimensions) {
    throw new ConfigError(
      `${label} has ${vector.length} dimensions but the index stores ${dimensions}-dimensional vectors`
    );
  }
}

export function copyRecord(record: VectorRecord): VectorRecord {
  return {
    id: record.id,
    deckId: record.deckId,
    vector: [...record.vector],
    payload: { ...record.payload },
  };
}

export interface ExportKey {
  deckId: string;
  sourceId: string;
  position: number;
}

/**
 * Export order: deck, then source, then position.
 */
export function compareForExport(a: ExportKey, b: ExportKey): number {
  if (a.deckId !== b.deckId) return a.deckId < b.deckId ? -1 : 1;
  if (a.sourceId !== b.sourceId) return a.sourceId < b.sourceId ? -1 : 1;
  return a.position - b.position;
}

/**
 * Search order: score descending, then insertion sequence ascending.
 */
export function compareHits(a: { score: number; seq: number }, b: { score: number; seq: number }): number {
  return b.score - a.score || a.seq - b.seq;
}

interface StoredRecord {
  record: VectorRecord;
  /** Insertion sequence; kept when a record is replaced */
  seq: number;
}

/**
 * In-process vector index.
 *
 * Every write builds a new map and swaps it in, so a search or export keeps
 * reading the snapshot it started with.
 */
export class MemoryVectorIndex implements VectorIndex {
  readonly backend = 'memory';
  private snapshot: ReadonlyMap<string, StoredRecord> = new Map();
  private nextSeq = 0;
  private manifest: IndexManifest | null = null;

  constructor(readonly dimensions: number) {}

  async upsert(records: VectorRecord[]): Promise<number> {
    for (const record of records) {
      assertDimensions(record.vector, this.dimensions, `Record ${record.id}`);
    }

    const next = new Map(this.snapshot);
    for (const record of records) {
      const existing = next.get(record.id);
      next.set(record.id, { record: copyRecord(record), seq: existing?.seq ?? this.nextSeq++ });
    }
    this.snapshot = next;
    return records.length;
  }

  async search(vector: number[], k: number, deckId?: string): Promise<ScoredRecord[]> {
    assertDimensions(vector, this.dimensions, 'Query vector');
    if (k <= 0) return [];

    const hits: Array<{ record: VectorRecord; seq: number; score: number }> = [];
    for (const { record, seq } of this.snapshot.values()) {
      if (deckId !== undefined && record.deckId !== deckId) continue;
      hits.push({ record, seq, score: cosineSimilarity(vector, record.vector) });
    }

    hits.sort(compareHits);
    return hits.slice(0, k).map((hit) => ({ record: copyRecord(hit.record), score: hit.score }));
  }

  async *export(deckId?: string, pageSize: number = DEFAULT_EXPORT_PAGE_SIZE): AsyncIterable<VectorRecord> {
    const records = [...this.snapshot.values()]
      .map((stored) => stored.record)
      .filter((record) => deckId === undefined || record.deckId === deckId)
      .sort((a, b) =>
        compareForExport(
          { deckId: a.deckId, sourceId: a.payload.sourceId, position: a.payload.position },
          { deckId: b.deckId, sourceId: b.payload.sourceId, position: b.payload.position }
        )
      );

    for (let offset = 0; offset < records.length; offset += pageSize) {
      const page = records.slice(offset, offset + pageSize).map(copyRecord);
      yield* page;
    }
  }

  async delete(ids: string[]): Promise<number> {
    const next = new Map(this.snapshot);
    let removed = 0;
    for (const id of ids) {
      if (next.delete(id)) removed++;
    }
    if (removed > 0) this.snapshot = next;
    return removed;
  }

  async deleteBySource(sourceId: string, deckId: string, keep: ReadonlySet<string> = new Set()): Promise<number> {
    const stale = [...this.snapshot.values()]
      .filter(({ record }) =>
        record.deckId === deckId && record.payload.sourceId === sourceId && !keep.has(record.id))
      .map(({ record }) => record.id);
    return this.delete(stale);
  }

  async count(deckId?: string): Promise<number> {
    if (deckId === undefined) return this.snapshot.size;
    let total = 0;
    for (const { record } of this.snapshot.values()) {
      if (record.deckId === deckId) total++;
    }
    return total;
  }

  async clear(): Promise<void> {
    this.snapshot = new Map();
  }

  async readManifest(): Promise<IndexManifest | null> {
    return this.manifest ? { ...this.manifest } : null;
  }

  async writeManifest(manifest: IndexManifest): Promise<void> {
    this.manifest = { ...manifest };
  }
}
