// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Command definitions for the decklens CLI.
 */

import { Command, CommanderError, InvalidArgumentError } from 'commander';
import { resolveConfig, type CLIOptions, type EmbeddingProviderName, type GenerationProviderName } from '../config/index.js';
import { EmbeddingUnavailableError, GenerationFailureError, toError } from '../errors.js';
import { logger, parseLogLevel } from '../logger.js';
import { RagPipeline } from '../rag/pipeline.js';
import { VERSION } from '../version.js';
import { formatAnswer, formatIngestSummary, formatSearchResults, formatStats, toJsonLine } from './output.js';
import { readSources } from './sources.js';

const EMBEDDING_PROVIDERS: readonly EmbeddingProviderName[] = ['openai', 'ollama', 'hashing'];
const GENERATION_PROVIDERS: readonly GenerationProviderName[] = ['openai', 'anthropic', 'ollama', 'none'];

export interface ProgramIO {
  /** Writes one line of command output */
  out: (line: string) => void;
  cwd: string;
  env: NodeJS.ProcessEnv;
}

interface GlobalOptions {
  config?: string;
  dataDir?: string;
  memory?: boolean;
  embedding?: EmbeddingProviderName;
  generation?: GenerationProviderName;
  verbose?: boolean;
  debug?: boolean;
  trace?: boolean;
}

function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

function parseEmbeddingProvider(value: string): EmbeddingProviderName {
  const match = EMBEDDING_PROVIDERS.find((name) => name === value);
  if (!match) throw new InvalidArgumentError(`Expected one of: ${EMBEDDING_PROVIDERS.join(', ')}.`);
  return match;
}

function parseGenerationProvider(value: string): GenerationProviderName {
  const match = GENERATION_PROVIDERS.find((name) => name === value);
  if (!match) throw new InvalidArgumentError(`Expected one of: ${GENERATION_PROVIDERS.join(', ')}.`);
  return match;
}

/**
 * Embedding and generation outages are reported but do not fail the command.
 */
export function isRecoverableError(error: unknown): boolean {
  return error instanceof EmbeddingUnavailableError || error instanceof GenerationFailureError;
}

export function createProgram(io: ProgramIO): Command {
  const program = new Command();

  program
    .name('decklens')
    .description('Ingest study material into decks and ask questions with cited answers')
    .version(VERSION, '-v, --version', 'Output the current version')
    .option('-c, --config <path>', 'Configuration file (default: .decklens.json in the working directory)')
    .option('--data-dir <path>', 'Directory for the persistent index')
    .option('--memory', 'Use an in-memory index for this run')
    .option('--embedding <provider>', 'Embedding provider (openai, ollama, hashing)', parseEmbeddingProvider)
    .option('--generation <provider>', 'Generation provider (openai, anthropic, ollama, none)', parseGenerationProvider)
    .option('--verbose', 'Show per-source progress')
    .option('--debug', 'Show retries, retrieval and packing details')
    .option('--trace', 'Show full generation prompts')
    .exitOverride()
    .hook('preAction', () => {
      logger.setLevel(parseLogLevel(program.opts<GlobalOptions>()));
    });

  const open = async (cli: CLIOptions = {}): Promise<RagPipeline> => {
    const options = program.opts<GlobalOptions>();
    const config = resolveConfig({
      cwd: io.cwd,
      configPath: options.config,
      env: io.env,
      cli: {
        ...cli,
        dataDir: options.dataDir,
        memory: options.memory,
        embeddingProvider: options.embedding,
        generationProvider: options.generation,
      },
    });
    return RagPipeline.create(config, { env: io.env });
  };

  program
    .command('ingest')
    .description('Chunk, embed and store text files in a deck')
    .argument('<deck>', 'Deck id')
    .argument('<files...>', 'Plain-text or markdown files')
    .action(async (deck: string, files: string[]) => {
      const pipeline = await open();
      const sources = await readSources(deck, files, io.cwd);
      const summary = await pipeline.ingest(sources);
      io.out(formatIngestSummary(summary));
    });

  program
    .command('search')
    .description('Show the chunks most similar to a query')
    .argument('<query>', 'Query text')
    .option('-d, --deck <id>', 'Restrict to one deck')
    .option('-k, --top-k <n>', 'Number of results', parsePositiveInt)
    .action(async (query: string, options: { deck?: string; topK?: number }) => {
      const pipeline = await open({ topK: options.topK });
      const chunks = await pipeline.retrieve(query, { deckId: options.deck });
      io.out(formatSearchResults(chunks));
    });

  program
    .command('ask')
    .description('Answer a question from a deck, citing sources')
    .argument('<question>', 'Question text')
    .option('-d, --deck <id>', 'Restrict to one deck')
    .option('-k, --top-k <n>', 'Chunks to retrieve', parsePositiveInt)
    .option('--max-context-tokens <n>', 'Token budget for packed context', parsePositiveInt)
    .option('--sources-only', 'List sources without generating an answer')
    .action(
      async (
        question: string,
        options: { deck?: string; topK?: number; maxContextTokens?: number; sourcesOnly?: boolean }
      ) => {
        const pipeline = await open({ topK: options.topK, maxContextTokens: options.maxContextTokens });
        const answer = await pipeline.ask(question, {
          deckId: options.deck,
          sourcesOnly: options.sourcesOnly,
        });
        io.out(formatAnswer(answer));
      }
    );

  program
    .command('export')
    .description('Write stored records as JSON lines')
    .option('-d, --deck <id>', 'Restrict to one deck')
    .action(async (options: { deck?: string }) => {
      const pipeline = await open();
      // Keep stdout to JSON lines only
      logger.pause();
      try {
        for await (const record of pipeline.export(options.deck)) {
          io.out(toJsonLine(record));
        }
      } finally {
        logger.resume();
      }
    });

  program
    .command('stats')
    .description('Show index size and embedding strategy')
    .option('-d, --deck <id>', 'Restrict to one deck')
    .action(async (options: { deck?: string }) => {
      const pipeline = await open();
      io.out(formatStats(await pipeline.stats(options.deck)));
    });

  return program;
}

/**
 * Parse argv and run the selected command. Resolves to the process exit code.
 */
export async function runCli(argv: string[], io: ProgramIO): Promise<number> {
  const program = createProgram(io);
  try {
    await program.parseAsync(argv);
    return 0;
  } catch (error) {
    // Commander has already printed usage errors, help and the version
    if (error instanceof CommanderError) return error.exitCode;
    const err = toError(error);
    logger.error(err.message, err);
    return isRecoverableError(error) ? 0 : 1;
  }
}
