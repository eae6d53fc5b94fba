/**
 * Aerodrome Registry Error Types
 *
 * Custom error classes for sync, release and rollback failures. Each class
 * carries a readonly `code` so callers can switch on the failure kind
 * without instanceof chains.
 *
 * Release and rollback report these through result objects rather than
 * throwing; sync throws SourceUnavailableError.
 */

import type { ValidationIssue } from './types.js';

/**
 * Base class for all registry errors
 */
export abstract class RegistryError extends Error {
  abstract readonly code: string;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;

    // Maintain proper stack trace for where error was thrown (V8 only)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

// ============================================================================
// Source Errors
// ============================================================================

/**
 * A source feed or input file could not be retrieved. Fatal for sync.
 */
export class SourceUnavailableError extends RegistryError {
  readonly code = 'SOURCE_UNAVAILABLE';

  constructor(
    readonly source: string,
    cause: unknown
  ) {
    super(
      `Source unavailable: ${source} (${cause instanceof Error ? cause.message : String(cause)})`,
      { cause }
    );
  }
}

/**
 * An expected staging or production artifact does not exist
 */
export class SourceMissingError extends RegistryError {
  readonly code = 'SOURCE_MISSING';

  constructor(readonly filePath: string) {
    super(`File not found: ${filePath}`);
  }
}

// ============================================================================
// Release Errors
// ============================================================================

/**
 * The staging document failed validation; production was not touched.
 *
 * RECOVERY:
 * - Inspect `issues`, fix overrides or sources, re-run sync
 */
export class ValidationFailedError extends RegistryError {
  readonly code = 'VALIDATION_FAILED';

  constructor(readonly issues: readonly ValidationIssue[]) {
    super(`Validation failed with ${issues.length} issue(s)`);
  }

  /**
   * Get formatted summary of the first few issues
   */
  getSummary(limit = 5): string {
    const lines = [this.message + ':'];
    for (const issue of this.issues.slice(0, limit)) {
      lines.push(`  - [${issue.code}] ${issue.message}`);
    }
    if (this.issues.length > limit) {
      lines.push(`  ... and ${this.issues.length - limit} more issues`);
    }
    return lines.join('\n');
  }
}

export class ReleaseCancelledError extends RegistryError {
  readonly code = 'RELEASE_CANCELLED';

  constructor() {
    super('Release cancelled by user');
  }
}

/**
 * I/O failure while backing up or promoting.
 *
 * RECOVERY:
 * - If `backupPath` is set, the previous production file is preserved there
 *   and can be restored with `release rollback`
 */
export class ReleaseFailedError extends RegistryError {
  readonly code = 'RELEASE_FAILED';

  constructor(
    cause: unknown,
    readonly backupPath: string | null
  ) {
    super(`Release failed: ${cause instanceof Error ? cause.message : String(cause)}`, { cause });
  }
}

export type ReleaseError =
  | SourceMissingError
  | ValidationFailedError
  | ReleaseCancelledError
  | ReleaseFailedError;

// ============================================================================
// Rollback Errors
// ============================================================================

export class NoBackupsFoundError extends RegistryError {
  readonly code = 'ROLLBACK_NO_BACKUPS';

  constructor(readonly backupDir: string) {
    super(`No backup files found in ${backupDir}`);
  }
}

export class InvalidSelectionError extends RegistryError {
  readonly code = 'ROLLBACK_INVALID_SELECTION';

  constructor(
    readonly selection: string,
    readonly available: number
  ) {
    super(`Invalid selection "${selection}" (choose 1-${available})`);
  }
}

export class RollbackCancelledError extends RegistryError {
  readonly code = 'ROLLBACK_CANCELLED';

  constructor() {
    super('Rollback cancelled');
  }
}

export class RollbackFailedError extends RegistryError {
  readonly code = 'ROLLBACK_FAILED';

  constructor(cause: unknown) {
    super(`Rollback failed: ${cause instanceof Error ? cause.message : String(cause)}`, { cause });
  }
}

export type RollbackError =
  | NoBackupsFoundError
  | InvalidSelectionError
  | RollbackCancelledError
  | RollbackFailedError;

/**
 * Narrow an unknown error to a Node.js system error with a code
 */
export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}
