// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Logger
 *
 * Level-aware logging utilities for pipeline output.
 * Provides graduated verbosity: NORMAL → VERBOSE → DEBUG → TRACE
 */

import chalk from 'chalk';

/**
 * Log levels for graduated verbosity.
 */
export enum LogLevel {
  /** Normal output - only essential information */
  NORMAL = 0,
  /** Verbose - per-source ingestion progress and retrieval summaries */
  VERBOSE = 1,
  /** Debug - retries, packing decisions, fallbacks */
  DEBUG = 2,
  /** Trace - prompts and raw responses */
  TRACE = 3,
}

/**
 * Parse log level from CLI options.
 */
export function parseLogLevel(options: {
  verbose?: boolean;
  debug?: boolean;
  trace?: boolean;
}): LogLevel {
  if (options.trace) return LogLevel.TRACE;
  if (options.debug) return LogLevel.DEBUG;
  if (options.verbose) return LogLevel.VERBOSE;
  return LogLevel.NORMAL;
}

/**
 * Centralized logger with level-aware output.
 */
class Logger {
  private level: LogLevel = LogLevel.NORMAL;
  private paused: boolean = false;

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  /**
   * Pause all logging (used while the CLI streams JSON lines to stdout).
   */
  pause(): void {
    this.paused = true;
  }

  resume(): void {
    this.paused = false;
  }

  isLevelEnabled(level: LogLevel): boolean {
    return !this.paused && this.level >= level;
  }

  // ============================================
  // Level-aware logging methods
  // ============================================

  /**
   * Log at VERBOSE level (shows at VERBOSE, DEBUG, TRACE).
   */
  verbose(message: string): void {
    if (this.isLevelEnabled(LogLevel.VERBOSE)) {
      console.log(chalk.dim(message));
    }
  }

  /**
   * Log at DEBUG level (shows at DEBUG, TRACE).
   */
  debug(message: string): void {
    if (this.isLevelEnabled(LogLevel.DEBUG)) {
      console.log(chalk.dim(`[Debug] ${message}`));
    }
  }

  /**
   * Log at TRACE level (shows only at TRACE).
   */
  trace(message: string): void {
    if (this.isLevelEnabled(LogLevel.TRACE)) {
      console.log(chalk.gray(`[Trace] ${message}`));
    }
  }

  // ============================================
  // Formatted output helpers
  // ============================================

  /**
   * Log ingestion progress at VERBOSE level.
   */
  ingestProgress(done: number, total: number, sourceId: string): void {
    if (this.isLevelEnabled(LogLevel.VERBOSE)) {
      console.log(chalk.dim(`[Ingest] ${done}/${total} ${sourceId}`));
    }
  }

  /**
   * Log a per-source ingestion result at VERBOSE level.
   */
  ingestSource(sourceId: string, embedded: number, failed: number): void {
    if (this.isLevelEnabled(LogLevel.VERBOSE)) {
      const status = failed > 0
        ? chalk.yellow(`✗ ${sourceId}`) + chalk.dim(` (${embedded} embedded, ${failed} failed)`)
        : chalk.green(`✓ ${sourceId}`) + chalk.dim(` (${embedded} embedded)`);
      console.log(status);
    }
  }

  /**
   * Log a block that could not be embedded at DEBUG level.
   */
  blockFailure(blockId: string, error: Error): void {
    if (this.isLevelEnabled(LogLevel.DEBUG)) {
      console.log(chalk.red(chalk.dim(`[Ingest] block ${blockId} skipped: ${error.message.slice(0, 200)}`)));
    }
  }

  /**
   * Log a retry attempt at DEBUG level.
   */
  retry(label: string, attempt: number, error: Error, delayMs: number): void {
    if (this.isLevelEnabled(LogLevel.DEBUG)) {
      console.log(chalk.dim(`[Retry] ${label} attempt ${attempt} in ${delayMs}ms: ${error.message}`));
    }
  }

  /**
   * Log retrieval results at DEBUG level.
   */
  retrieval(query: string, hits: number, deckId: string | undefined, duration: number): void {
    if (this.isLevelEnabled(LogLevel.DEBUG)) {
      const deck = deckId ? ` in deck ${deckId}` : '';
      const shown = query.length > 60 ? query.slice(0, 60) + '...' : query;
      console.log(chalk.dim(`[Retrieve] "${this.sanitize(shown)}"${deck}: ${hits} hits, ${duration.toFixed(2)}s`));
    }
  }

  /**
   * Log context packing decisions at DEBUG level.
   */
  packing(accepted: number, skipped: number, usedTokens: number, budget: number, truncated: boolean): void {
    if (this.isLevelEnabled(LogLevel.DEBUG)) {
      const truncatedStr = truncated ? ', truncated' : '';
      console.log(chalk.dim(
        `[Context] ${accepted} accepted, ${skipped} skipped, ` +
        `${usedTokens.toLocaleString()}/${budget.toLocaleString()} tokens${truncatedStr}`
      ));
    }
  }

  /**
   * Log a generation fallback. Always shown at DEBUG, never surfaced as an error.
   */
  generationFallback(provider: string, error: Error): void {
    if (this.isLevelEnabled(LogLevel.DEBUG)) {
      console.log(chalk.yellow(chalk.dim(`[Answer] ${provider} failed, using extractive answer: ${error.message}`)));
    }
  }

  /**
   * Sanitize a string for safe terminal output.
   */
  private sanitize(str: string): string {
    return str
      .replace(/[\x00-\x08\x0B\x0C\x0E-\x1F\x7F]/g, '') // Remove control chars except \t, \n, \r
      .replace(/\r?\n/g, '\\n')
      .replace(/\t/g, '\\t');
  }

  /**
   * Log a full generation prompt at TRACE level.
   */
  promptFull(model: string, system: string, prompt: string): void {
    if (this.isLevelEnabled(LogLevel.TRACE)) {
      console.log(chalk.gray('\n' + '='.repeat(60)));
      console.log(chalk.gray('[Generation Request]'));
      console.log(chalk.gray('='.repeat(60)));
      console.log(chalk.gray(`  model: ${model}`));
      console.log(chalk.gray(`  system: "${this.sanitize(system.slice(0, 200))}${system.length > 200 ? '...' : ''}"`));
      console.log(chalk.gray(`  prompt: "${this.sanitize(prompt.slice(0, 500))}${prompt.length > 500 ? '...' : ''}"`));
      console.log(chalk.gray('='.repeat(60) + '\n'));
    }
  }

  /**
   * Log an error with optional stack trace at DEBUG level.
   */
  error(message: string, error?: Error): void {
    console.error(chalk.red(`Error: ${message}`));
    if (error && this.level >= LogLevel.DEBUG) {
      console.error(chalk.dim(error.stack || 'No stack trace available'));
    }
  }

  warn(message: string): void {
    console.warn(chalk.yellow(`Warning: ${message}`));
  }

  info(message: string): void {
    console.log(chalk.blue(`Info: ${message}`));
  }
}

/**
 * Singleton logger instance for global use.
 */
export const logger = new Logger();
