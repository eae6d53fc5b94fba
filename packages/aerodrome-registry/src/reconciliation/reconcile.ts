/**
 * Reconciliation Engine
 *
 * Merges the normalized primary feed, the secondary timezone feed and the
 * operator overrides into one registry document.
 *
 * PRECEDENCE (highest first):
 * 1. Override for an ICAO present in the primary feed: override fields win
 *    field by field; an omitted timezone becomes UTC
 * 2. Primary record: timezone from the secondary feed, else the country
 *    fallback table, else UTC
 * 3. Override for an ICAO absent from the primary feed: new record from the
 *    override alone ("" for name/country, UTC for timezone)
 *
 * Every output record has a non-empty timezone and a unique ICAO; the
 * sequence is sorted by ICAO (ordinal) so diffs stay stable across runs.
 *
 * @module reconciliation/reconcile
 */

import type {
  AerodromeRecord,
  AirportFacts,
  MergeStats,
  OverrideCandidate,
  OverrideRecord,
  RegistryDocument,
  SkippedOverride,
  TimezoneFallback,
} from '../core/types.js';
import { logger as defaultLogger, type Logger } from '../core/utils/logger.js';

export const DEFAULT_TIMEZONE = 'UTC';

// ============================================================================
// Types
// ============================================================================

export interface ReconcileInput {
  /** Primary facts keyed by ICAO */
  readonly primary: ReadonlyMap<string, AirportFacts>;
  /** Secondary timezones keyed by ICAO */
  readonly secondary: ReadonlyMap<string, string>;
  /** Overrides in file order; later entries win for the same ICAO */
  readonly overrides: readonly OverrideCandidate[];
}

export interface ReconcileOptions {
  /** Supplied by the caller (VERSION file) */
  readonly version: string;
  /** Supplied by the caller, ISO-8601 with offset */
  readonly lastUpdated: string;
  readonly fallbackTimezone: TimezoneFallback;
  readonly logger?: Logger;
}

export interface ReconcileResult {
  readonly document: RegistryDocument;
  readonly stats: MergeStats;
  readonly skipped: readonly SkippedOverride[];
}

// ============================================================================
// Helpers
// ============================================================================

export function createMergeStats(): MergeStats {
  return {
    matched: 0,
    fallback: 0,
    unresolved: 0,
    overridden: 0,
    overrides: 0,
    skippedOverrides: 0,
  };
}

/**
 * Ordinal (code unit) comparison, independent of locale
 */
export function compareIcao(a: AerodromeRecord, b: AerodromeRecord): number {
  if (a.icao < b.icao) return -1;
  if (a.icao > b.icao) return 1;
  return 0;
}

/**
 * Check an override candidate's ICAO and normalize it.
 * Returns the reason it was rejected instead when unusable.
 */
export function toOverrideRecord(candidate: OverrideCandidate): OverrideRecord | string {
  if (candidate.icao === undefined) {
    return 'missing icao';
  }

  const icao = candidate.icao.trim().toUpperCase();
  if (icao.length !== 4) {
    return `icao "${candidate.icao}" is not 4 characters`;
  }

  const timezone = candidate.timezone?.trim();

  return {
    icao,
    ...(candidate.name !== undefined && { name: candidate.name }),
    ...(candidate.country !== undefined && { country: candidate.country }),
    ...(timezone && { timezone }),
  };
}

/**
 * Key overrides by ICAO, last one wins
 */
function indexOverrides(
  candidates: readonly OverrideCandidate[],
  skipped: SkippedOverride[],
  logger: Logger
): Map<string, OverrideRecord> {
  const index = new Map<string, OverrideRecord>();

  for (const candidate of candidates) {
    const record = toOverrideRecord(candidate);
    if (typeof record === 'string') {
      skipped.push({ reason: record, source: candidate.source });
      logger.warn('Skipping override', { reason: record, source: candidate.source });
      continue;
    }

    if (index.has(record.icao)) {
      logger.debug('Later override replaces earlier one', { icao: record.icao });
    }
    index.set(record.icao, record);
  }

  return index;
}

// ============================================================================
// Reconciliation
// ============================================================================

/**
 * Build the staging registry document from the three inputs
 */
export function reconcile(input: ReconcileInput, options: ReconcileOptions): ReconcileResult {
  const logger = options.logger ?? defaultLogger;
  const stats = createMergeStats();
  const skipped: SkippedOverride[] = [];
  const overrideIndex = indexOverrides(input.overrides, skipped, logger);
  stats.skippedOverrides = skipped.length;

  const records: AerodromeRecord[] = [];

  for (const [icao, facts] of input.primary) {
    const override = overrideIndex.get(icao);

    if (override) {
      records.push({
        icao,
        name: override.name ?? facts.name,
        country: override.country ?? facts.countryCode,
        timezone: override.timezone ?? DEFAULT_TIMEZONE,
      });
      stats.overridden++;
      logger.debug('Overriding aerodrome with custom data', { icao });
      continue;
    }

    let timezone = input.secondary.get(icao);
    if (timezone) {
      stats.matched++;
    } else {
      stats.fallback++;
      timezone = options.fallbackTimezone(facts.countryCode);
      if (!timezone) {
        stats.unresolved++;
        timezone = DEFAULT_TIMEZONE;
      }
    }

    records.push({ icao, name: facts.name, country: facts.countryCode, timezone });
  }

  for (const [icao, override] of overrideIndex) {
    if (input.primary.has(icao)) continue;

    records.push({
      icao,
      name: override.name ?? '',
      country: override.country ?? '',
      timezone: override.timezone ?? DEFAULT_TIMEZONE,
    });
    stats.overrides++;
    logger.debug('Adding new aerodrome from overrides', { icao });
  }

  records.sort(compareIcao);

  return {
    document: {
      version: options.version,
      last_updated: options.lastUpdated,
      total_count: records.length,
      aerodromes: records,
    },
    stats,
    skipped,
  };
}
