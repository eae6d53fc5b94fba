/**
 * Aerodrome Registry
 *
 * Public surface for programmatic use. The CLI in bin/ is built on the
 * same exports.
 *
 * @module aerodrome-registry
 */

export type {
  AerodromeRecord,
  AirportFacts,
  MergeStats,
  NormalizedAirport,
  NormalizedTimezone,
  OverrideCandidate,
  OverrideRecord,
  RegistryDocument,
  SkippedOverride,
  TimezoneFallback,
  ValidationIssue,
  ValidationIssueCode,
} from './core/types.js';

export {
  RegistryError,
  SourceUnavailableError,
  SourceMissingError,
  ValidationFailedError,
  ReleaseCancelledError,
  ReleaseFailedError,
  NoBackupsFoundError,
  InvalidSelectionError,
  RollbackCancelledError,
  RollbackFailedError,
  type ReleaseError,
  type RollbackError,
} from './core/errors.js';

export { createLogger, silentLogger, type Logger, type LogLevel } from './core/utils/logger.js';
export { SourceClient, type FetchText, type SourceClientConfig } from './core/source-client.js';

export {
  extractIcaoCode,
  normalizePrimaryRow,
  normalizeSecondaryFields,
  INVALID_TIMEZONE_VALUES,
} from './sources/normalizer.js';
export { parsePrimarySource } from './sources/primary-source.js';
export { parseSecondarySource } from './sources/secondary-source.js';
export { loadOverrides } from './sources/overrides.js';
export { loadCountryTimezones, createTimezoneFallback } from './sources/country-timezones.js';

export {
  reconcile,
  DEFAULT_TIMEZONE,
  type ReconcileInput,
  type ReconcileOptions,
  type ReconcileResult,
} from './reconciliation/reconcile.js';

export {
  RegistryValidator,
  checkStructure,
  loadRegistrySchema,
  DEFAULT_SCHEMA_PATH,
  type ValidationMode,
  type ValidationResult,
} from './validation/registry-validator.js';
export { loadRegistryFile, type LoadedRegistry } from './validation/registry-file.js';

export { listBackups, createBackup, type BackupEntry } from './release/backups.js';
export {
  ReleaseController,
  type ChooseFn,
  type ConfirmFn,
  type PromoteResult,
  type ReleaseState,
  type RollbackResult,
} from './release/release-controller.js';

export {
  diffRegistries,
  formatDiffReport,
  DEFAULT_DIFF_THRESHOLDS,
  type DiffReport,
  type DiffThresholds,
} from './diff/diff-reporter.js';

export { runSync, readVersion, type SyncOptions, type SyncResult } from './sync/sync-service.js';
