// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

import { describe, it, expect } from 'vitest';
import { Answerer, ANSWER_SYSTEM_PROMPT, NO_ANSWER_TEXT, buildAnswerPrompt } from '../src/rag/answerer.js';
import { ContextPacker } from '../src/rag/context-packer.js';
import { AbortError } from '../src/errors.js';
import type { PackedContext, RetrievedChunk } from '../src/rag/types.js';
import { StubGenerationProvider } from './helpers/fakes.js';
import { WhitespaceTokenizer } from './helpers/whitespace-tokenizer.js';

const tokenizer = new WhitespaceTokenizer();

function chunk(id: string, text: string, score: number): RetrievedChunk {
  return {
    id,
    text,
    score,
    sourceId: `source-${id}`,
    deckId: 'bio',
    position: 0,
    tokenCount: tokenizer.count(text),
    citationIndex: null,
  };
}

function pack(chunks: RetrievedChunk[], budget = 100): PackedContext {
  return new ContextPacker(tokenizer).pack(chunks, budget);
}

const question = 'What do mitochondria produce?';
const packed = pack([
  chunk('low', 'Cells contain many organelles.', 0.4),
  chunk('high', 'Mitochondria produce ATP for the cell.', 0.9),
]);

describe('Answerer', () => {
  it("answers I don't know without sources", async () => {
    const generator = new StubGenerationProvider('unused');

    const answer = await new Answerer(generator, tokenizer).answer(question, pack([]));

    expect(answer).toEqual({ text: NO_ANSWER_TEXT, sources: [], mode: 'no-answer' });
    expect(answer.text).toBe("I don't know.");
    expect(generator.calls).toHaveLength(0);
  });

  it('lists sources without generating when asked', async () => {
    const generator = new StubGenerationProvider('unused');

    const answer = await new Answerer(generator, tokenizer).answer(question, packed, { sourcesOnly: true });

    expect(answer.mode).toBe('sources-only');
    expect(answer.text).toBeNull();
    expect(answer.sources.map((s) => s.citationIndex)).toEqual([1, 2]);
    expect(generator.calls).toHaveLength(0);
  });

  it('generates an answer from the numbered context', async () => {
    const generator = new StubGenerationProvider('  Mitochondria produce ATP [2].\n');

    const answer = await new Answerer(generator, tokenizer).answer(question, packed);

    expect(answer).toEqual({ text: 'Mitochondria produce ATP [2].', sources: packed.sources, mode: 'generated' });
    expect(generator.calls[0].system).toBe(ANSWER_SYSTEM_PROMPT);
    expect(generator.calls[0].prompt).toBe(
      'Context:\n[1] Cells contain many organelles.\n\n[2] Mitochondria produce ATP for the cell.\n\n' +
      'Question: What do mitochondria produce?\nAnswer:'
    );
  });

  it('answers extractively without a generator', async () => {
    const answer = await new Answerer(null, tokenizer).answer(question, packed);

    expect(answer.mode).toBe('extractive');
    expect(answer.text).toBe('Mitochondria produce ATP for the cell.');
    expect(answer.sources).toBe(packed.sources);
  });

  it('falls back to the top source when generation fails', async () => {
    const generator = new StubGenerationProvider(new Error('503 Service Unavailable'));

    const answer = await new Answerer(generator, tokenizer).answer(question, packed);

    expect(answer).toEqual({
      text: 'Mitochondria produce ATP for the cell.',
      sources: packed.sources,
      mode: 'extractive',
    });
  });

  it('treats an empty generation as a failure', async () => {
    const answer = await new Answerer(new StubGenerationProvider('   '), tokenizer).answer(question, packed);

    expect(answer.mode).toBe('extractive');
  });

  it('bounds the extractive answer by the packing budget', async () => {
    const small = pack([chunk('only', 'one two three four five six', 0.8)], 4);

    const answer = await new Answerer(null, tokenizer).answer(question, small);

    expect(answer.text).toBe('one two three four');
  });

  it('propagates an abort instead of falling back', async () => {
    const controller = new AbortController();
    const generator = new StubGenerationProvider(new AbortError());

    await expect(new Answerer(generator, tokenizer).answer(question, packed)).rejects.toBeInstanceOf(AbortError);

    controller.abort();
    await expect(
      new Answerer(null, tokenizer).answer(question, packed, { signal: controller.signal })
    ).rejects.toMatchObject({ name: 'AbortError' });
  });
});

describe('buildAnswerPrompt', () => {
  it('places context before the question', () => {
    expect(buildAnswerPrompt('Why?', '[1] Because.')).toBe('Context:\n[1] Because.\n\nQuestion: Why?\nAnswer:');
  });
});
