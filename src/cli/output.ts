// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Terminal formatting for CLI command results.
 */

import chalk from 'chalk';
import type { Answer, IndexStats, IngestSummary, RetrievedChunk, VectorRecord } from '../rag/types.js';

const PREVIEW_CHARS = 200;

function preview(text: string): string {
  const flat = text.replace(/\s+/g, ' ').trim();
  return flat.length > PREVIEW_CHARS ? flat.slice(0, PREVIEW_CHARS) + '...' : flat;
}

/**
 * Per-source ingestion results followed by a totals line.
 */
export function formatIngestSummary(summary: IngestSummary): string {
  const lines: string[] = [];
  for (const source of summary.sources) {
    const counts = `${source.embedded}/${source.blocks} blocks`;
    if (source.failed > 0 || source.errors.length > 0) {
      lines.push(chalk.yellow(`✗ ${source.sourceId}`) + chalk.dim(` (${counts}, ${source.failed} failed)`));
      for (const error of source.errors) {
        lines.push(chalk.dim(`    ${error}`));
      }
    } else {
      lines.push(chalk.green(`✓ ${source.sourceId}`) + chalk.dim(` (${counts})`));
    }
  }
  lines.push(
    `Ingested ${summary.sources.length} sources: ${summary.embedded} blocks embedded, ${summary.failed} failed`
  );
  return lines.join('\n');
}

export function formatSearchResults(chunks: RetrievedChunk[]): string {
  if (chunks.length === 0) return chalk.dim('No results.');
  return chunks
    .map((chunk, i) =>
      `${chalk.bold(`${i + 1}.`)} ${chalk.cyan(chunk.sourceId)}#${chunk.position} ` +
      chalk.dim(`(${chunk.deckId}, score ${chunk.score.toFixed(3)})`) +
      `\n   ${preview(chunk.text)}`
    )
    .join('\n');
}

/**
 * The answer text (if any) and its numbered sources.
 */
export function formatAnswer(answer: Answer): string {
  const lines: string[] = [];
  if (answer.text !== null) {
    lines.push(answer.text);
  }
  if (answer.sources.length > 0) {
    if (lines.length > 0) lines.push('');
    lines.push(chalk.bold('Sources:'));
    for (const source of answer.sources) {
      lines.push(
        `  [${source.citationIndex ?? '?'}] ${source.sourceId}#${source.position} ` +
        chalk.dim(`(score ${source.score.toFixed(3)})`)
      );
    }
  }
  if (answer.mode === 'extractive') {
    lines.push(chalk.dim('(extractive answer)'));
  }
  return lines.join('\n');
}

export function formatStats(stats: IndexStats): string {
  return [
    `Records:    ${stats.records}${stats.deckId ? ` (deck ${stats.deckId})` : ''}`,
    `Backend:    ${stats.backend}`,
    `Embedding:  ${stats.embeddingFingerprint}`,
    `Dimensions: ${stats.dimensions}`,
  ].join('\n');
}

/**
 * One JSON object per line, no trailing newline.
 */
export function toJsonLine(record: VectorRecord): string {
  return JSON.stringify({
    id: record.id,
    deckId: record.deckId,
    vector: record.vector,
    payload: record.payload,
  });
}
