/**
 * Release Controller
 *
 * Promotes the staging artifact to production behind validation, operator
 * confirmation and a backup, and restores production from a backup.
 *
 * PROMOTION STATES:
 * idle → validating → backing-up → promoting → stamped
 * idle → validating → rejected
 * plus `cancelled` (operator declined) and `failed` (I/O error mid-promotion)
 *
 * Failures come back as result objects carrying a typed error; nothing here
 * throws for an expected outcome. Callers serialize release operations.
 *
 * @module release/release-controller
 */

import { readFile } from 'node:fs/promises';
import {
  InvalidSelectionError,
  NoBackupsFoundError,
  ReleaseCancelledError,
  ReleaseFailedError,
  RollbackCancelledError,
  RollbackFailedError,
  SourceMissingError,
  ValidationFailedError,
  isErrnoException,
  type ReleaseError,
  type RollbackError,
} from '../core/errors.js';
import type { RegistryDocument } from '../core/types.js';
import { atomicWriteFile, atomicWriteJSON } from '../core/utils/atomic-write.js';
import { logger as defaultLogger, type Logger } from '../core/utils/logger.js';
import { formatIsoWithOffset } from '../core/utils/timestamps.js';
import type { RegistryValidator } from '../validation/registry-validator.js';
import { createBackup, listBackups, type BackupEntry } from './backups.js';

/** Rollback offers at most this many recent backups */
export const ROLLBACK_CHOICES = 5;

// ============================================================================
// Types
// ============================================================================

export type ReleaseState =
  | 'idle'
  | 'validating'
  | 'backing-up'
  | 'promoting'
  | 'stamped'
  | 'rejected'
  | 'cancelled'
  | 'failed';

/** Ask the operator a yes/no question */
export type ConfirmFn = (message: string) => Promise<boolean>;

/**
 * Offer backups to the operator. Resolves to the raw 1-based selection,
 * or null / "cancel" to abort.
 */
export type ChooseFn = (backups: readonly BackupEntry[]) => Promise<string | null>;

export interface ReleasePaths {
  readonly staging: string;
  readonly production: string;
  readonly backups: string;
}

export interface ReleaseControllerOptions {
  readonly paths: ReleasePaths;
  readonly validator: RegistryValidator;
  /** Without one, unforced operations are treated as declined */
  readonly confirm?: ConfirmFn;
  readonly now?: () => Date;
  readonly logger?: Logger;
}

export type PromoteResult =
  | { readonly ok: true; readonly released: RegistryDocument; readonly backupPath: string | null }
  | { readonly ok: false; readonly error: ReleaseError };

export type RollbackResult =
  | { readonly ok: true; readonly restored: BackupEntry }
  | { readonly ok: false; readonly error: RollbackError };

export interface RollbackOptions {
  readonly choose: ChooseFn;
  readonly confirm?: ConfirmFn;
  readonly force?: boolean;
}

// ============================================================================
// Controller
// ============================================================================

export class ReleaseController {
  private readonly paths: ReleasePaths;
  private readonly validator: RegistryValidator;
  private readonly confirm: ConfirmFn | undefined;
  private readonly now: () => Date;
  private readonly logger: Logger;
  private currentState: ReleaseState = 'idle';

  constructor(options: ReleaseControllerOptions) {
    this.paths = options.paths;
    this.validator = options.validator;
    this.confirm = options.confirm;
    this.now = options.now ?? (() => new Date());
    this.logger = options.logger ?? defaultLogger;
  }

  /** State reached by the most recent promotion */
  get state(): ReleaseState {
    return this.currentState;
  }

  async promote(options: { force?: boolean } = {}): Promise<PromoteResult> {
    this.currentState = 'validating';

    let text: string;
    try {
      text = await readFile(this.paths.staging, 'utf-8');
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return this.reject(new SourceMissingError(this.paths.staging));
      }
      return this.fail(new ReleaseFailedError(error, null));
    }

    const checked = this.validator.parseDocument(text);
    if (!checked.valid) {
      return this.reject(new ValidationFailedError(checked.issues));
    }
    const staged = checked.document;
    this.logger.info('Staging validation passed', { total: staged.total_count });

    if (!options.force) {
      const approved = this.confirm
        ? await this.confirm(
            `Promote ${staged.total_count} aerodromes (version ${staged.version}) to production?`
          )
        : false;
      if (!approved) {
        this.currentState = 'cancelled';
        return { ok: false, error: new ReleaseCancelledError() };
      }
    }

    const now = this.now();

    this.currentState = 'backing-up';
    let backupPath: string | null;
    try {
      backupPath = await createBackup(this.paths.production, this.paths.backups, now);
    } catch (error) {
      return this.fail(new ReleaseFailedError(error, null));
    }
    if (backupPath) {
      this.logger.info('Backed up production', { backupPath });
    } else {
      this.logger.info('No existing production file, skipping backup');
    }

    this.currentState = 'promoting';
    const released: RegistryDocument = { ...staged, released_at: formatIsoWithOffset(now) };
    try {
      await atomicWriteJSON(this.paths.production, released);
    } catch (error) {
      return this.fail(new ReleaseFailedError(error, backupPath));
    }

    this.currentState = 'stamped';
    this.logger.info('Promoted staging to production', {
      total: released.total_count,
      releasedAt: released.released_at,
    });
    return { ok: true, released, backupPath };
  }

  listBackups(): Promise<BackupEntry[]> {
    return listBackups(this.paths.backups);
  }

  async rollback(options: RollbackOptions): Promise<RollbackResult> {
    let backups: BackupEntry[];
    try {
      backups = await this.listBackups();
    } catch (error) {
      return { ok: false, error: new RollbackFailedError(error) };
    }
    if (backups.length === 0) {
      return { ok: false, error: new NoBackupsFoundError(this.paths.backups) };
    }

    const offered = backups.slice(0, ROLLBACK_CHOICES);
    const selection = await options.choose(offered);
    if (selection === null || selection.trim().toLowerCase() === 'cancel') {
      return { ok: false, error: new RollbackCancelledError() };
    }

    const choice = /^\d+$/.test(selection.trim()) ? Number.parseInt(selection.trim(), 10) : NaN;
    const target = choice >= 1 && choice <= offered.length ? offered[choice - 1] : undefined;
    if (!target) {
      return { ok: false, error: new InvalidSelectionError(selection, offered.length) };
    }

    if (!options.force) {
      const confirm = options.confirm ?? this.confirm;
      const approved = confirm
        ? await confirm(`Restore production from ${target.fileName}?`)
        : false;
      if (!approved) {
        return { ok: false, error: new RollbackCancelledError() };
      }
    }

    try {
      // Backups are read-only; write the bytes instead of copying the file mode
      const bytes = await readFile(target.path);
      await atomicWriteFile(this.paths.production, bytes);
    } catch (error) {
      return { ok: false, error: new RollbackFailedError(error) };
    }

    this.logger.info('Rolled back production', { backup: target.fileName });
    return { ok: true, restored: target };
  }

  private reject(error: SourceMissingError | ValidationFailedError): PromoteResult {
    this.currentState = 'rejected';
    this.logger.error(error.message, { code: error.code });
    return { ok: false, error };
  }

  private fail(error: ReleaseFailedError): PromoteResult {
    this.currentState = 'failed';
    this.logger.error(error.message, { code: error.code, backupPath: error.backupPath });
    return { ok: false, error };
  }
}
