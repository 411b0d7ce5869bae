// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { logger, LogLevel, parseLogLevel } from '../src/logger.js';

describe('Logger', () => {
  beforeEach(() => {
    // Reset logger to NORMAL level before each test
    logger.setLevel(LogLevel.NORMAL);
    logger.resume();
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    logger.setLevel(LogLevel.NORMAL);
  });

  describe('parseLogLevel', () => {
    it('returns NORMAL when no flags set', () => {
      expect(parseLogLevel({})).toBe(LogLevel.NORMAL);
    });

    it('returns VERBOSE when verbose flag set', () => {
      expect(parseLogLevel({ verbose: true })).toBe(LogLevel.VERBOSE);
    });

    it('trace takes precedence over debug and verbose', () => {
      expect(parseLogLevel({ trace: true, debug: true, verbose: true })).toBe(LogLevel.TRACE);
    });

    it('debug takes precedence over verbose', () => {
      expect(parseLogLevel({ debug: true, verbose: true })).toBe(LogLevel.DEBUG);
    });
  });

  describe('isLevelEnabled', () => {
    it('VERBOSE level enables NORMAL and VERBOSE', () => {
      logger.setLevel(LogLevel.VERBOSE);
      expect(logger.getLevel()).toBe(LogLevel.VERBOSE);
      expect(logger.isLevelEnabled(LogLevel.NORMAL)).toBe(true);
      expect(logger.isLevelEnabled(LogLevel.VERBOSE)).toBe(true);
      expect(logger.isLevelEnabled(LogLevel.DEBUG)).toBe(false);
    });

    it('nothing is enabled while paused', () => {
      logger.setLevel(LogLevel.TRACE);
      logger.pause();
      expect(logger.isLevelEnabled(LogLevel.NORMAL)).toBe(false);
      logger.resume();
      expect(logger.isLevelEnabled(LogLevel.TRACE)).toBe(true);
    });
  });

  describe('level-aware methods', () => {
    it('suppresses verbose output at NORMAL', () => {
      logger.verbose('hidden');
      expect(console.log).not.toHaveBeenCalled();
    });

    it('prefixes debug and trace output', () => {
      logger.setLevel(LogLevel.TRACE);
      logger.debug('packing');
      logger.trace('payload');

      expect(console.log).toHaveBeenNthCalledWith(1, '[Debug] packing');
      expect(console.log).toHaveBeenNthCalledWith(2, '[Trace] payload');
    });
  });

  describe('ingestion helpers', () => {
    beforeEach(() => {
      logger.setLevel(LogLevel.DEBUG);
    });

    it('logs progress', () => {
      logger.ingestProgress(2, 5, 'notes.md');
      expect(console.log).toHaveBeenCalledWith('[Ingest] 2/5 notes.md');
    });

    it('logs per-source results', () => {
      logger.ingestSource('notes.md', 3, 0);
      logger.ingestSource('slides.md', 2, 1);

      expect(console.log).toHaveBeenNthCalledWith(1, '✓ notes.md (3 embedded)');
      expect(console.log).toHaveBeenNthCalledWith(2, '✗ slides.md (2 embedded, 1 failed)');
    });

    it('logs skipped blocks and retries', () => {
      logger.blockFailure('a1b2c3', new Error('bad input'));
      logger.retry('OpenAI embeddings', 1, new Error('429'), 1000);

      expect(console.log).toHaveBeenNthCalledWith(1, '[Ingest] block a1b2c3 skipped: bad input');
      expect(console.log).toHaveBeenNthCalledWith(2, '[Retry] OpenAI embeddings attempt 1 in 1000ms: 429');
    });
  });

  describe('query helpers', () => {
    beforeEach(() => {
      logger.setLevel(LogLevel.DEBUG);
    });

    it('logs retrieval with the query escaped', () => {
      logger.retrieval('line one\nline two', 3, 'bio', 0.123);

      expect(console.log).toHaveBeenCalledWith('[Retrieve] "line one\\nline two" in deck bio: 3 hits, 0.12s');
    });

    it('logs packing decisions', () => {
      logger.packing(1, 2, 50, 50, true);

      expect(console.log).toHaveBeenCalledWith('[Context] 1 accepted, 2 skipped, 50/50 tokens, truncated');
    });

    it('logs a generation fallback', () => {
      logger.generationFallback('OpenAI', new Error('boom'));

      expect(console.log).toHaveBeenCalledWith('[Answer] OpenAI failed, using extractive answer: boom');
    });

    it('only logs prompts at TRACE', () => {
      logger.promptFull('gpt-4o-mini', 'system', 'prompt');
      expect(console.log).not.toHaveBeenCalled();

      logger.setLevel(LogLevel.TRACE);
      logger.promptFull('gpt-4o-mini', 'system', 'prompt');
      expect(console.log).toHaveBeenCalledWith('  model: gpt-4o-mini');
    });
  });

  describe('error, warn and info', () => {
    it('always prints errors, with the stack only at DEBUG', () => {
      const error = new Error('index missing');
      logger.error('Cannot open index', error);
      expect(console.error).toHaveBeenCalledTimes(1);
      expect(console.error).toHaveBeenCalledWith('Error: Cannot open index');

      logger.setLevel(LogLevel.DEBUG);
      logger.error('Cannot open index', error);
      expect(console.error).toHaveBeenCalledTimes(3);
    });

    it('prints warnings and info', () => {
      logger.warn('careful');
      logger.info('hello');

      expect(console.warn).toHaveBeenCalledWith('Warning: careful');
      expect(console.log).toHaveBeenCalledWith('Info: hello');
    });
  });
});
