/**
 * Sync Service
 *
 * One sync run: fetch both feeds, load overrides and the country fallback
 * table, reconcile, and write the staging artifact. Production is never
 * touched here.
 *
 * A source that cannot be retrieved aborts the run with
 * SourceUnavailableError before anything is written.
 *
 * @module sync/sync-service
 */

import { readFile } from 'node:fs/promises';
import { isErrnoException, SourceUnavailableError } from '../core/errors.js';
import type { FetchText } from '../core/source-client.js';
import type { MergeStats, RegistryDocument, SkippedOverride } from '../core/types.js';
import { atomicWriteJSON } from '../core/utils/atomic-write.js';
import { logger as defaultLogger, type Logger } from '../core/utils/logger.js';
import { formatIsoWithOffset } from '../core/utils/timestamps.js';
import { reconcile } from '../reconciliation/reconcile.js';
import { createTimezoneFallback, loadCountryTimezones } from '../sources/country-timezones.js';
import { loadOverrides } from '../sources/overrides.js';
import { parsePrimarySource } from '../sources/primary-source.js';
import { parseSecondarySource } from '../sources/secondary-source.js';

export const DEFAULT_PRIMARY_URL =
  'https://davidmegginson.github.io/ourairports-data/airports.csv';
export const DEFAULT_SECONDARY_URL =
  'https://raw.githubusercontent.com/jpatokal/openflights/master/data/airports.dat';
export const DEFAULT_VERSION = '1.0.0';

// ============================================================================
// Types
// ============================================================================

export interface SyncPaths {
  readonly staging: string;
  readonly overrides: string;
  readonly versionFile: string;
  readonly countryTimezones: string;
}

export interface SyncOptions {
  readonly paths: SyncPaths;
  readonly primaryUrl: string;
  readonly secondaryUrl: string;
  readonly fetchText: FetchText;
  readonly now?: () => Date;
  readonly logger?: Logger;
}

/**
 * Per-source counters, for the operator summary
 */
export interface SourceCounts {
  readonly primaryRows: number;
  readonly primaryRejected: number;
  readonly airports: number;
  readonly secondaryLines: number;
  readonly secondaryRejected: number;
  readonly timezones: number;
  readonly overrideFiles: number;
  readonly overrideFilesSkipped: number;
  readonly overrideElementsSkipped: number;
}

export interface SyncResult {
  readonly document: RegistryDocument;
  readonly stats: MergeStats;
  readonly sources: SourceCounts;
  readonly skippedOverrides: readonly SkippedOverride[];
  readonly stagingPath: string;
}

// ============================================================================
// Sync
// ============================================================================

/**
 * Read the release version; a missing or empty file means the default
 */
export async function readVersion(versionFile: string): Promise<string> {
  try {
    const version = (await readFile(versionFile, 'utf-8')).trim();
    return version || DEFAULT_VERSION;
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return DEFAULT_VERSION;
    }
    throw new SourceUnavailableError(versionFile, error);
  }
}

export async function runSync(options: SyncOptions): Promise<SyncResult> {
  const logger = options.logger ?? defaultLogger;
  const now = options.now ?? (() => new Date());

  logger.info('Downloading data sources');
  const primaryText = await options.fetchText(options.primaryUrl);
  const secondaryText = await options.fetchText(options.secondaryUrl);

  const primary = parsePrimarySource(primaryText);
  logger.info(`Found ${primary.airports.size} airports with ICAO codes`, {
    rows: primary.rows,
    rejected: primary.rejected,
  });

  const secondary = parseSecondarySource(secondaryText);
  logger.info(`Found ${secondary.timezones.size} airports with timezone data`, {
    lines: secondary.lines,
    rejected: secondary.rejected,
  });

  const overrides = await loadOverrides(options.paths.overrides, logger);
  const fallbackTable = await loadCountryTimezones(options.paths.countryTimezones);
  const version = await readVersion(options.paths.versionFile);

  logger.info('Building aerodrome registry');
  const { document, stats, skipped } = reconcile(
    {
      primary: primary.airports,
      secondary: secondary.timezones,
      overrides: overrides.overrides,
    },
    {
      version,
      lastUpdated: formatIsoWithOffset(now()),
      fallbackTimezone: createTimezoneFallback(fallbackTable),
      logger,
    }
  );

  await atomicWriteJSON(options.paths.staging, document);
  logger.info('Registry saved', { path: options.paths.staging, total: document.total_count });

  return {
    document,
    stats,
    sources: {
      primaryRows: primary.rows,
      primaryRejected: primary.rejected,
      airports: primary.airports.size,
      secondaryLines: secondary.lines,
      secondaryRejected: secondary.rejected,
      timezones: secondary.timezones.size,
      overrideFiles: overrides.files,
      overrideFilesSkipped: overrides.skippedFiles,
      overrideElementsSkipped: overrides.skippedElements,
    },
    skippedOverrides: skipped,
    stagingPath: options.paths.staging,
  };
}
