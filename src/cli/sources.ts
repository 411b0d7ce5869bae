// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Turn CLI file arguments into source documents.
 */

import { readFile } from 'fs/promises';
import { basename, resolve } from 'path';
import { ConfigError } from '../errors.js';
import type { SourceDocument } from '../rag/types.js';

/**
 * Read each file as raw text. The source id is the file's basename; two files
 * with the same basename in one deck are rejected rather than overwriting
 * each other.
 */
export async function readSources(
  deckId: string,
  files: string[],
  cwd: string = process.cwd()
): Promise<SourceDocument[]> {
  const seen = new Map<string, string>();
  const sources: SourceDocument[] = [];

  for (const file of files) {
    const fullPath = resolve(cwd, file);
    const sourceId = basename(fullPath);

    const previous = seen.get(sourceId);
    if (previous !== undefined) {
      throw new ConfigError(`Duplicate source id "${sourceId}": ${previous} and ${fullPath}`);
    }
    seen.set(sourceId, fullPath);

    let text: string;
    try {
      text = await readFile(fullPath, 'utf-8');
    } catch (error) {
      throw new ConfigError(`Cannot read ${file}`, { cause: error });
    }
    sources.push({ sourceId, deckId, text, metadata: { path: fullPath } });
  }

  return sources;
}
