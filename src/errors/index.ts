/**
 * Fatal error taxonomy
 *
 * These are raised to the caller before (or instead of) any results.
 * Record-level problems are never raised; they are reported through the
 * skip and warning observers of the ingestion options.
 */

import type { ZodError, ZodIssue } from 'zod';

export type ErrorCode =
  | 'NOT_FOUND'
  | 'ACCESS_DENIED'
  | 'DECODE_FAILURE'
  | 'VALIDATION_FAILURE'
  | 'UNSUPPORTED_SCHEMA';

/**
 * Base class for every error this library raises itself
 */
export class ThreadscanError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'ThreadscanError';
  }
}

/**
 * The export path does not exist
 */
export class NotFoundError extends ThreadscanError {
  constructor(public readonly path: string, options?: { cause?: unknown }) {
    super(`Export file not found: ${path}`, 'NOT_FOUND', options);
    this.name = 'NotFoundError';
  }
}

/**
 * The export path exists but cannot be read
 */
export class AccessDeniedError extends ThreadscanError {
  constructor(public readonly path: string, options?: { cause?: unknown }) {
    super(`Permission denied reading export file: ${path}`, 'ACCESS_DENIED', options);
    this.name = 'AccessDeniedError';
  }
}

/**
 * The source is not a well-formed top-level JSON array
 */
export class DecodeError extends ThreadscanError {
  constructor(
    message: string,
    public readonly offset: number | null = null,
    options?: { cause?: unknown }
  ) {
    super(offset === null ? message : `${message} (at character ${offset})`, 'DECODE_FAILURE', options);
    this.name = 'DecodeError';
  }
}

/**
 * A value handed to the library (usually a search query) violates its constraints
 */
export class ValidationError extends ThreadscanError {
  constructor(
    message: string,
    public readonly issues: ZodIssue[] = []
  ) {
    super(message, 'VALIDATION_FAILURE');
    this.name = 'ValidationError';
  }

  static fromZodError(error: ZodError, subject = 'Value'): ValidationError {
    const messages = error.issues.map((issue) => {
      const path = issue.path.join('.');
      return path ? `  - ${path}: ${issue.message}` : `  - ${issue.message}`;
    });
    return new ValidationError(
      `${subject} validation failed:\n${messages.join('\n')}`,
      error.issues
    );
  }
}

/**
 * No adapter recognizes the structural shape of the export
 */
export class UnsupportedSchemaError extends ThreadscanError {
  constructor(message: string) {
    super(message, 'UNSUPPORTED_SCHEMA');
    this.name = 'UnsupportedSchemaError';
  }
}

/**
 * Translate an fs error for `path` into the taxonomy.
 * Anything other than a missing or unreadable file is returned untouched.
 */
export function mapFsError(err: unknown, path: string): unknown {
  if (isErrnoException(err)) {
    if (err.code === 'ENOENT') return new NotFoundError(path, { cause: err });
    if (err.code === 'EACCES' || err.code === 'EPERM') {
      return new AccessDeniedError(path, { cause: err });
    }
  }
  return err;
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err && typeof err.code === 'string';
}
