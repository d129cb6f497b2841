import type { RunSummary } from './types/Processing';

/**
 * Base class for every error raised by datesort itself.
 */
export class DatesortError extends Error {
  constructor(message: string, public cause?: unknown) {
    super(message);
    this.name = 'DatesortError';
  }
}

export class DatesortConfigError extends DatesortError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = 'DatesortConfigError';
  }
}

/** The source file could not be opened or read. Per-file, never fatal. */
export class SourceUnreadableError extends DatesortError {
  constructor(public readonly filePath: string, message: string, cause?: unknown) {
    super(message, cause);
    this.name = 'SourceUnreadableError';
  }
}

/** Writing below the destination root failed (disk full, permissions, path too long). */
export class DestinationWriteError extends DatesortError {
  constructor(public readonly targetPath: string, message: string, cause?: unknown) {
    super(message, cause);
    this.name = 'DestinationWriteError';
  }
}

/**
 * Two files ended up claiming one destination path. This means the
 * collision index was bypassed, so the run stops instead of carrying on.
 */
export class DestinationConflictError extends DatesortError {
  constructor(public readonly targetPath: string, message: string, cause?: unknown) {
    super(message, cause);
    this.name = 'DestinationConflictError';
  }
}

export class TimeoutError extends DatesortError {
  constructor(public readonly label: string, public readonly timeoutMs: number) {
    super(`${label} timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
  }
}

/** Run-level abort. Files already in flight were finished before this was thrown. */
export class RunAbortedError extends DatesortError {
  constructor(message: string, public readonly summary: RunSummary, cause?: unknown) {
    super(message, cause);
    this.name = 'RunAbortedError';
  }
}

/**
 * Checks the shape rather than the prototype: errors raised in another
 * realm (a vm context, a test sandbox) are not `instanceof Error` here.
 */
export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    typeof error.code === 'string' &&
    'message' in error &&
    typeof error.message === 'string'
  );
}

export function errorCode(error: unknown): string | undefined {
  return isErrnoException(error) ? error.code : undefined;
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
    return error.message;
  }
  return String(error);
}
