// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Error taxonomy for the ingestion and query pipeline.
 *
 * - ConfigError: invalid settings or mismatched embedding strategy. Fatal at startup.
 * - EmbeddingUnavailableError: an embedding call failed after retries. Per block.
 * - IndexUnavailableError: the vector index could not be read or written. Surfaced.
 * - GenerationFailureError: the generation call failed. Recovered by extractive answers.
 */

export type ErrorCode =
  | 'CONFIG'
  | 'EMBEDDING_UNAVAILABLE'
  | 'INDEX_UNAVAILABLE'
  | 'GENERATION_FAILURE';

/**
 * Base class for all pipeline errors.
 */
export class DecklensError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    public readonly retryable: boolean = false,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'DecklensError';
  }
}

export class ConfigError extends DecklensError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'CONFIG', false, options);
    this.name = 'ConfigError';
  }
}

export class EmbeddingUnavailableError extends DecklensError {
  constructor(
    message: string,
    public readonly attempts: number = 1,
    options?: { cause?: unknown }
  ) {
    super(message, 'EMBEDDING_UNAVAILABLE', false, options);
    this.name = 'EmbeddingUnavailableError';
  }
}

export class IndexUnavailableError extends DecklensError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'INDEX_UNAVAILABLE', false, options);
    this.name = 'IndexUnavailableError';
  }
}

export class GenerationFailureError extends DecklensError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'GENERATION_FAILURE', true, options);
    this.name = 'GenerationFailureError';
  }
}

/**
 * Raised when a caller aborts an operation through its AbortSignal.
 */
export class AbortError extends Error {
  constructor(message: string = 'The operation was aborted') {
    super(message);
    this.name = 'AbortError';
  }
}

/**
 * Normalize an unknown thrown value into an Error.
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

/**
 * True for errors raised by an aborted AbortSignal (our own, DOMException or SDK wrappers).
 */
export function isAbortError(error: unknown): boolean {
  if (!(error instanceof Error)) return false;
  return error.name === 'AbortError' || error.name === 'APIUserAbortError';
}

/**
 * Build the error thrown when a caller aborts an operation.
 */
export function createAbortError(reason?: unknown): Error {
  if (reason instanceof Error && isAbortError(reason)) {
    return reason;
  }
  return new AbortError(typeof reason === 'string' ? reason : undefined);
}

/**
 * Throw an AbortError if the signal has been aborted.
 */
export function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw createAbortError(signal.reason);
  }
}
