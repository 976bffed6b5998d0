/**
 * Error Handling System
 *
 * Provides a standardized error hierarchy with dual-message format:
 * - userMessage: Friendly message for callers of the engine (no internals)
 * - developerMessage: Technical details for debugging
 *
 * Every error thrown by the synchronization engine derives from SyncError.
 */

import { getLogger } from '../utils/logger.js';

/**
 * Error codes for all engine errors
 */
export enum ErrorCode {
  /** Watched path does not exist or is not a directory */
  PATH_NOT_FOUND = 'PATH_NOT_FOUND',
  /** Path is already registered with the orchestrator */
  ALREADY_WATCHED = 'ALREADY_WATCHED',
  /** Path is not registered with the orchestrator */
  NOT_WATCHED = 'NOT_WATCHED',
  /** Path is nested inside (or contains) an already watched root */
  PATH_CONFLICT = 'PATH_CONFLICT',
  /** Failed to extract text from a file */
  EXTRACTION_FAILED = 'EXTRACTION_FAILED',
  /** Vector store operation failed */
  INDEX_STORE_FAILED = 'INDEX_STORE_FAILED',
  /** Embedding model failed to load or to embed */
  EMBEDDING_FAILED = 'EMBEDDING_FAILED',
  /** Reranking model failed to load or to score */
  RERANK_FAILED = 'RERANK_FAILED',
  /** Configuration file or persisted state failed validation */
  INVALID_CONFIG = 'INVALID_CONFIG',
}

/**
 * Constructor options shared by all engine errors
 */
export interface SyncErrorOptions {
  code: ErrorCode;
  userMessage: string;
  developerMessage: string;
  cause?: Error;
}

/**
 * Base error class with dual messages
 *
 * Extends Error to provide:
 * - Separate user-friendly and developer messages
 * - Proper stack trace capture
 * - JSON serialization for status surfaces
 * - Integration with logging system
 */
export class SyncError extends Error {
  /** Error code for programmatic handling */
  readonly code: ErrorCode;

  /** User-friendly message (safe to display to end users) */
  readonly userMessage: string;

  /** Technical message with debugging details */
  readonly developerMessage: string;

  /** Original error that caused this error */
  declare readonly cause?: Error;

  constructor(options: SyncErrorOptions) {
    // Use developerMessage as the Error.message for logging
    super(options.developerMessage, { cause: options.cause });

    this.code = options.code;
    this.userMessage = options.userMessage;
    this.developerMessage = options.developerMessage;

    // Keep instanceof working for subclasses after transpilation
    Object.setPrototypeOf(this, new.target.prototype);

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }

    this.name = `${new.target.name}[${this.code}]`;

    this.logError();
  }

  /**
   * Log the error using the logger system
   *
   * Per-file failures are expected during normal operation and log at WARN;
   * everything else logs at ERROR.
   */
  private logError(): void {
    const logger = getLogger();
    const meta: Record<string, unknown> = {
      code: this.code,
      userMessage: this.userMessage,
    };

    if (this.cause) {
      meta.cause = {
        name: this.cause.name,
        message: this.cause.message,
        stack: this.cause.stack,
      };
    }

    if (this.code === ErrorCode.EXTRACTION_FAILED) {
      logger.warn('SyncError', this.developerMessage, meta);
    } else {
      logger.error('SyncError', this.developerMessage, meta);
    }
  }

  /**
   * Convert error to JSON for status responses
   */
  toJSON(): Record<string, unknown> {
    return {
      code: this.code,
      userMessage: this.userMessage,
      developerMessage: this.developerMessage,
      cause: this.cause
        ? {
            name: this.cause.name,
            message: this.cause.message,
          }
        : undefined,
    };
  }

  toString(): string {
    return `${this.name}: ${this.developerMessage}`;
  }
}

// ============================================================================
// User Input Errors
// ============================================================================

/**
 * The requested root does not exist or is not a directory
 */
export class PathNotFoundError extends SyncError {
  readonly path: string;

  constructor(folderPath: string, reason: 'missing' | 'not_directory' = 'missing') {
    super({
      code: ErrorCode.PATH_NOT_FOUND,
      userMessage:
        reason === 'missing'
          ? 'The folder could not be found. Please check the path and try again.'
          : 'The path points to a file, not a folder.',
      developerMessage:
        reason === 'missing'
          ? `Path not found: ${folderPath}`
          : `Path is not a directory: ${folderPath}`,
    });
    this.path = folderPath;
  }
}

/**
 * The canonical path is already registered
 */
export class AlreadyWatchedError extends SyncError {
  readonly path: string;

  constructor(folderPath: string) {
    super({
      code: ErrorCode.ALREADY_WATCHED,
      userMessage: 'This folder is already being watched.',
      developerMessage: `Folder already watched: ${folderPath}`,
    });
    this.path = folderPath;
  }
}

/**
 * The path is not registered
 */
export class NotWatchedError extends SyncError {
  readonly path: string;

  constructor(folderPath: string) {
    super({
      code: ErrorCode.NOT_WATCHED,
      userMessage: 'This folder is not being watched.',
      developerMessage: `Folder not watched: ${folderPath}`,
    });
    this.path = folderPath;
  }
}

/**
 * The path overlaps a watched root (parent or child)
 */
export class PathConflictError extends SyncError {
  readonly path: string;
  readonly conflicts: string[];

  constructor(folderPath: string, conflicts: string[]) {
    super({
      code: ErrorCode.PATH_CONFLICT,
      userMessage:
        'This folder overlaps a folder that is already being watched. Unwatch the other folder first.',
      developerMessage: `Path ${folderPath} conflicts with watched roots: ${conflicts.join(', ')}`,
    });
    this.path = folderPath;
    this.conflicts = conflicts;
  }
}

// ============================================================================
// Per-File and Infrastructure Errors
// ============================================================================

/**
 * Text could not be extracted from a file
 */
export class ExtractionError extends SyncError {
  readonly path: string;

  constructor(filePath: string, details: string, cause?: Error) {
    super({
      code: ErrorCode.EXTRACTION_FAILED,
      userMessage: 'The file could not be read as text and was skipped.',
      developerMessage: `Extraction failed for ${filePath}: ${details}`,
      cause,
    });
    this.path = filePath;
  }
}

/**
 * The vector store rejected or failed an operation (transient)
 */
export class IndexStoreError extends SyncError {
  readonly operation: string;

  constructor(operation: string, details: string, cause?: Error) {
    super({
      code: ErrorCode.INDEX_STORE_FAILED,
      userMessage: 'The search index is temporarily unavailable. Changes will be retried.',
      developerMessage: `Index store ${operation} failed: ${details}`,
      cause,
    });
    this.operation = operation;
  }
}

/**
 * The embedding model failed (transient, handled like IndexStoreError)
 */
export class EmbeddingProviderError extends SyncError {
  constructor(details: string, cause?: Error) {
    super({
      code: ErrorCode.EMBEDDING_FAILED,
      userMessage: 'The embedding model is unavailable. Changes will be retried.',
      developerMessage: `Embedding failed: ${details}`,
      cause,
    });
  }
}

/**
 * The reranking model failed
 */
export class RerankingProviderError extends SyncError {
  constructor(details: string, cause?: Error) {
    super({
      code: ErrorCode.RERANK_FAILED,
      userMessage: 'Search results could not be reranked.',
      developerMessage: `Reranking failed: ${details}`,
      cause,
    });
  }
}

/**
 * Configuration or persisted state failed validation
 */
export class InvalidConfigError extends SyncError {
  constructor(source: string, details: string, cause?: Error) {
    super({
      code: ErrorCode.INVALID_CONFIG,
      userMessage: 'The configuration is invalid.',
      developerMessage: `Invalid configuration in ${source}: ${details}`,
      cause,
    });
  }
}

// ============================================================================
// Type Guards and Utilities
// ============================================================================

/**
 * Type guard to check if an error is a SyncError
 */
export function isSyncError(error: unknown): error is SyncError {
  return error instanceof SyncError;
}

/**
 * Transient infrastructure failures are retried with backoff;
 * everything else fails immediately.
 */
export function isRetryableError(error: unknown): boolean {
  return error instanceof IndexStoreError || error instanceof EmbeddingProviderError;
}

/**
 * Normalize an unknown thrown value to an Error
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Wrap an unknown error as a SyncError if it isn't already
 *
 * @param error - The error to wrap
 * @param wrap - Builds the SyncError from the normalized cause
 */
export function wrapError(error: unknown, wrap: (cause: Error) => SyncError): SyncError {
  if (isSyncError(error)) {
    return error;
  }
  return wrap(toError(error));
}
