// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Vector Store
 *
 * Persistent VectorIndex on a vectra LocalIndex, one folder per collection
 * under <dataDir>/index/. The embedding manifest is kept beside the folder.
 */

import { LocalIndex, type IndexItem } from 'vectra';
import * as fs from 'fs';
import * as path from 'path';
import pLimit, { type LimitFunction } from 'p-limit';
import { IndexUnavailableError, toError } from '../errors.js';
import { DecklensPaths } from '../paths.js';
import type { ScoredRecord, VectorRecord } from './types.js';
import {
  assertDimensions,
  compareForExport,
  compareHits,
  DEFAULT_EXPORT_PAGE_SIZE,
  type IndexManifest,
  type VectorIndex,
} from './vector-index.js';

/**
 * Metadata stored with each vector in the index.
 */
interface RecordMetadata {
  deckId: string;
  sourceId: string;
  text: string;
  position: number;
  tokenCount: number;
  /** Insertion sequence used to break score ties */
  seq: number;
  [key: string]: string | number | boolean;
}

function toRecord(item: IndexItem<RecordMetadata>): VectorRecord {
  return {
    id: item.id,
    deckId: item.metadata.deckId,
    vector: [...item.vector],
    payload: {
      text: item.metadata.text,
      sourceId: item.metadata.sourceId,
      position: item.metadata.position,
      tokenCount: item.metadata.tokenCount,
    },
  };
}

function parseManifest(data: unknown): IndexManifest | null {
  if (
    typeof data === 'object' &&
    data !== null &&
    'fingerprint' in data &&
    typeof data.fingerprint === 'string' &&
    'dimensions' in data &&
    typeof data.dimensions === 'number'
  ) {
    const createdAt = 'createdAt' in data && typeof data.createdAt === 'string' ? data.createdAt : '';
    return { fingerprint: data.fingerprint, dimensions: data.dimensions, createdAt };
  }
  return null;
}

/**
 * Vector store for content block embeddings using vectra.
 */
export class VectraVectorStore implements VectorIndex {
  readonly backend = 'vectra';
  private seqs = new Map<string, number>();
  private nextSeq = 0;
  // vectra allows one open update per index
  private writeLane: LimitFunction = pLimit(1);

  private constructor(
    private index: LocalIndex<RecordMetadata>,
    private indexPath: string,
    private manifestPath: string,
    readonly dimensions: number
  ) {}

  /**
   * Open (creating if needed) the collection's index.
   * @throws IndexUnavailableError when the index cannot be created or read
   */
  static async open(dataDir: string, collection: string, dimensions: number): Promise<VectraVectorStore> {
    const indexPath = DecklensPaths.collection(dataDir, collection);
    const manifestPath = DecklensPaths.manifest(dataDir, collection);

    try {
      await fs.promises.mkdir(path.dirname(indexPath), { recursive: true });
      const index = new LocalIndex<RecordMetadata>(indexPath);
      if (!(await index.isIndexCreated())) {
        await index.createIndex({ version: 1 });
      }

      const store = new VectraVectorStore(index, indexPath, manifestPath, dimensions);
      for (const item of await index.listItems()) {
        store.seqs.set(item.id, item.metadata.seq);
        store.nextSeq = Math.max(store.nextSeq, item.metadata.seq + 1);
      }
      return store;
    } catch (error) {
      throw new IndexUnavailableError(`Cannot open vector index at ${indexPath}: ${toError(error).message}`, {
        cause: error,
      });
    }
  }

  /**
   * Run an index operation, surfacing failures as IndexUnavailableError.
   */
  private async guard<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      throw new IndexUnavailableError(`Vector index ${operation} failed: ${toError(error).message}`, {
        cause: error,
      });
    }
  }

  /**
   * Run writes inside one vectra update, one batch at a time.
   */
  private write<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    return this.writeLane(() =>
      this.guard(operation, async () => {
        await this.index.beginUpdate();
        try {
          const result = await fn();
          await this.index.endUpdate();
          return result;
        } catch (error) {
          this.index.cancelUpdate();
          throw error;
        }
      })
    );
  }

  async upsert(records: VectorRecord[]): Promise<number> {
    for (const record of records) {
      assertDimensions(record.vector, this.dimensions, `Record ${record.id}`);
    }
    if (records.length === 0) return 0;

    await this.write('upsert', async () => {
      for (const record of records) {
        const seq = this.seqs.get(record.id) ?? this.nextSeq++;
        this.seqs.set(record.id, seq);
        await this.index.upsertItem({
          id: record.id,
          vector: record.vector,
          metadata: {
            deckId: record.deckId,
            sourceId: record.payload.sourceId,
            text: record.payload.text,
            position: record.payload.position,
            tokenCount: record.payload.tokenCount,
            seq,
          },
        });
      }
    });
    return records.length;
  }

  async search(vector: number[], k: number, deckId?: string): Promise<ScoredRecord[]> {
    assertDimensions(vector, this.dimensions, 'Query vector');
    if (k <= 0) return [];

    return this.guard('search', async () => {
      const { items } = await this.index.getIndexStats();
      if (items === 0) return [];

      // Rank every candidate so ties resolve by insertion sequence before the cut
      const filter = deckId !== undefined ? { deckId: { $eq: deckId } } : undefined;
      const results = await this.index.queryItems(vector, '', items, filter);

      return results
        .map((result) => ({ item: result.item, score: result.score, seq: result.item.metadata.seq }))
        .sort(compareHits)
        .slice(0, k)
        .map((hit) => ({ record: toRecord(hit.item), score: hit.score }));
    });
  }

  async *export(deckId?: string, pageSize: number = DEFAULT_EXPORT_PAGE_SIZE): AsyncIterable<VectorRecord> {
    const items = await this.guard('export', () =>
      deckId !== undefined
        ? this.index.listItemsByMetadata({ deckId: { $eq: deckId } })
        : this.index.listItems()
    );
    const ordered = [...items].sort((a, b) => compareForExport(a.metadata, b.metadata));

    for (let offset = 0; offset < ordered.length; offset += pageSize) {
      yield* ordered.slice(offset, offset + pageSize).map(toRecord);
    }
  }

  async delete(ids: string[]): Promise<number> {
    const present = ids.filter((id) => this.seqs.has(id));
    if (present.length === 0) return 0;

    await this.write('delete', async () => {
      for (const id of present) {
        await this.index.deleteItem(id);
      }
    });
    for (const id of present) {
      this.seqs.delete(id);
    }
    return present.length;
  }

  async deleteBySource(sourceId: string, deckId: string, keep: ReadonlySet<string> = new Set()): Promise<number> {
    const items = await this.guard('lookup', () =>
      this.index.listItemsByMetadata({ sourceId: { $eq: sourceId }, deckId: { $eq: deckId } })
    );
    return this.delete(items.map((item) => item.id).filter((id) => !keep.has(id)));
  }

  async count(deckId?: string): Promise<number> {
    return this.guard('count', async () => {
      if (deckId === undefined) {
        return (await this.index.getIndexStats()).items;
      }
      return (await this.index.listItemsByMetadata({ deckId: { $eq: deckId } })).length;
    });
  }

  async clear(): Promise<void> {
    await this.writeLane(() =>
      this.guard('clear', async () => {
        await this.index.deleteIndex();
        await this.index.createIndex({ version: 1 });
      })
    );
    this.seqs.clear();
  }

  async readManifest(): Promise<IndexManifest | null> {
    let content: string;
    try {
      content = await fs.promises.readFile(this.manifestPath, 'utf-8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return null;
      }
      throw new IndexUnavailableError(`Cannot read index manifest ${this.manifestPath}`, { cause: error });
    }

    try {
      return parseManifest(JSON.parse(content));
    } catch (error) {
      throw new IndexUnavailableError(`Index manifest ${this.manifestPath} is not valid JSON`, { cause: error });
    }
  }

  async writeManifest(manifest: IndexManifest): Promise<void> {
    await this.guard('manifest write', () =>
      fs.promises.writeFile(this.manifestPath, JSON.stringify(manifest, null, 2) + '\n', 'utf-8')
    );
  }

  /**
   * Get the index path.
   */
  getPath(): string {
    return this.indexPath;
  }
}
