/**
 * Diff Reporter
 *
 * Compares the production and staging registries keyed by ICAO so an
 * operator can review a release before promoting it. Purely advisory:
 * warnings never block a release.
 *
 * @module diff/diff-reporter
 */

import type { AerodromeRecord, RegistryDocument } from '../core/types.js';

// ============================================================================
// Types
// ============================================================================

export interface DiffThresholds {
  /** Warn when more records than this are added */
  readonly warnAddedAbove: number;
  /** Warn when more records than this are removed */
  readonly warnRemovedAbove: number;
}

export const DEFAULT_DIFF_THRESHOLDS: DiffThresholds = {
  warnAddedAbove: 1000,
  warnRemovedAbove: 100,
};

export const DEFAULT_PREVIEW_LIMIT = 10;

export interface FieldChange {
  readonly field: keyof AerodromeRecord;
  readonly before: string;
  readonly after: string;
}

export interface ChangedRecord {
  readonly icao: string;
  readonly before: AerodromeRecord;
  readonly after: AerodromeRecord;
  readonly changes: readonly FieldChange[];
}

export interface DiffReport {
  /** Sorted ICAO codes present only in staging */
  readonly added: readonly string[];
  /** Sorted ICAO codes present only in production */
  readonly removed: readonly string[];
  /** Sorted ICAO codes present in both with differing records */
  readonly changed: readonly string[];
  readonly details: {
    readonly added: readonly AerodromeRecord[];
    readonly removed: readonly AerodromeRecord[];
    readonly changed: readonly ChangedRecord[];
  };
  readonly productionCount: number;
  readonly stagingCount: number;
  readonly netChange: number;
  readonly totalChanges: number;
  readonly productionUpdated: string | null;
  readonly stagingUpdated: string;
  readonly warnings: readonly string[];
}

// ============================================================================
// Comparison
// ============================================================================

function indexByIcao(records: readonly AerodromeRecord[]): Map<string, AerodromeRecord> {
  return new Map(records.map((record) => [record.icao, record]));
}

function byIcao(a: { icao: string }, b: { icao: string }): number {
  if (a.icao < b.icao) return -1;
  if (a.icao > b.icao) return 1;
  return 0;
}

const RECORD_FIELDS = ['icao', 'name', 'country', 'timezone'] as const;

/**
 * Field-level differences between two records (null when identical)
 */
export function compareRecords(
  before: AerodromeRecord,
  after: AerodromeRecord
): FieldChange[] | null {
  const changes = RECORD_FIELDS.filter((field) => before[field] !== after[field]).map(
    (field): FieldChange => ({ field, before: before[field], after: after[field] })
  );
  return changes.length > 0 ? changes : null;
}

/**
 * Compare production against staging. A missing production document is
 * treated as an empty registry.
 */
export function diffRegistries(
  production: RegistryDocument | null,
  staging: RegistryDocument,
  thresholds: DiffThresholds = DEFAULT_DIFF_THRESHOLDS
): DiffReport {
  const productionRecords = indexByIcao(production?.aerodromes ?? []);
  const stagingRecords = indexByIcao(staging.aerodromes);

  const added: AerodromeRecord[] = [];
  const changed: ChangedRecord[] = [];
  for (const [icao, after] of stagingRecords) {
    const before = productionRecords.get(icao);
    if (!before) {
      added.push(after);
      continue;
    }
    const changes = compareRecords(before, after);
    if (changes) {
      changed.push({ icao, before, after, changes });
    }
  }

  const removed = [...productionRecords.values()].filter(
    (record) => !stagingRecords.has(record.icao)
  );

  added.sort(byIcao);
  removed.sort(byIcao);
  changed.sort(byIcao);

  const warnings: string[] = [];
  if (removed.length > thresholds.warnRemovedAbove) {
    warnings.push(`${removed.length} aerodromes removed - verify this is expected`);
  }
  if (added.length > thresholds.warnAddedAbove) {
    warnings.push(`${added.length} aerodromes added - large data update`);
  }

  return {
    added: added.map((record) => record.icao),
    removed: removed.map((record) => record.icao),
    changed: changed.map((record) => record.icao),
    details: { added, removed, changed },
    productionCount: productionRecords.size,
    stagingCount: stagingRecords.size,
    netChange: stagingRecords.size - productionRecords.size,
    totalChanges: added.length + removed.length + changed.length,
    productionUpdated: production?.last_updated ?? null,
    stagingUpdated: staging.last_updated,
    warnings,
  };
}

// ============================================================================
// Formatting
// ============================================================================

function formatSigned(value: number): string {
  return value > 0 ? `+${value}` : String(value);
}

function pushOverflow(lines: string[], total: number, limit: number): void {
  if (total > limit) {
    lines.push(`   ... and ${total - limit} more`);
  }
}

/**
 * Render the human-readable review summary
 */
export function formatDiffReport(
  report: DiffReport,
  options: { previewLimit?: number } = {}
): string {
  const limit = options.previewLimit ?? DEFAULT_PREVIEW_LIMIT;
  const lines: string[] = [
    'Summary:',
    `   Production aerodromes: ${report.productionCount}`,
    `   Staging aerodromes: ${report.stagingCount}`,
    `   Net change: ${formatSigned(report.netChange)}`,
  ];

  const { added, removed, changed } = report.details;

  if (added.length > 0) {
    lines.push('', `NEW AERODROMES (${added.length}):`);
    for (const record of added.slice(0, limit)) {
      lines.push(`   + ${record.icao}: ${record.name} (${record.country})`);
    }
    pushOverflow(lines, added.length, limit);
  }

  if (removed.length > 0) {
    lines.push('', `REMOVED AERODROMES (${removed.length}):`);
    for (const record of removed.slice(0, limit)) {
      lines.push(`   - ${record.icao}: ${record.name} (${record.country})`);
    }
    pushOverflow(lines, removed.length, limit);
  }

  if (changed.length > 0) {
    lines.push('', `CHANGED AERODROMES (${changed.length}):`);
    for (const record of changed.slice(0, limit)) {
      lines.push(`   ~ ${record.icao}: ${record.after.name}`);
      for (const change of record.changes) {
        lines.push(`     ${change.field}: '${change.before}' -> '${change.after}'`);
      }
    }
    pushOverflow(lines, changed.length, limit);
  }

  lines.push('', `Staging last updated: ${report.stagingUpdated}`);
  if (report.productionUpdated) {
    lines.push(`Production last updated: ${report.productionUpdated}`);
  }

  lines.push('');
  if (report.totalChanges === 0) {
    lines.push('No changes detected - staging matches production');
  } else {
    lines.push(`Total changes: ${report.totalChanges}`);
    for (const warning of report.warnings) {
      lines.push(`WARNING: ${warning}`);
    }
  }

  return lines.join('\n');
}
