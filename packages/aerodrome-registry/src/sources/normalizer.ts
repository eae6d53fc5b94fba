/**
 * Source Record Normalizer
 *
 * Converts one raw row of the primary feed, or one tokenized line of the
 * secondary feed, into a typed record. A `null` return means "reject":
 * the caller counts it and moves on.
 *
 * @module sources/normalizer
 */

import type { NormalizedAirport, NormalizedTimezone } from '../core/types.js';

/**
 * Timezone values the secondary feed uses for "unknown"
 */
export const INVALID_TIMEZONE_VALUES: ReadonlySet<string> = new Set(['', 'N', 'NULL', '\\N']);

/** Zero-based field positions in the secondary feed */
export const SECONDARY_ICAO_FIELD = 5;
export const SECONDARY_TIMEZONE_FIELD = 11;

const ALPHA_IDENT = /^[A-Za-z]{4}$/;

/**
 * Raw primary-feed row, keyed by CSV header
 */
export type PrimaryRow = Readonly<Record<string, string | undefined>>;

function field(row: PrimaryRow, key: string): string {
  return (row[key] ?? '').trim();
}

/**
 * Derive the ICAO code for a primary row.
 *
 * An explicit 4-character `icao_code` wins; otherwise a purely alphabetic
 * 4-character `ident` is accepted (many small fields only carry the ident).
 */
export function extractIcaoCode(row: PrimaryRow): string | null {
  const icaoField = field(row, 'icao_code');
  if (icaoField.length === 4) {
    return icaoField.toUpperCase();
  }

  const identField = field(row, 'ident');
  if (ALPHA_IDENT.test(identField)) {
    return identField.toUpperCase();
  }

  return null;
}

/**
 * Parse a coordinate, defaulting to 0 when absent or unparsable
 */
export function parseCoordinate(value: string | undefined): number {
  if (!value) return 0;
  const parsed = Number.parseFloat(value);
  return Number.isFinite(parsed) ? parsed : 0;
}

/**
 * Normalize one primary row, or reject it (closed fields, no usable code)
 */
export function normalizePrimaryRow(row: PrimaryRow): NormalizedAirport | null {
  if (field(row, 'type') === 'closed') {
    return null;
  }

  const icao = extractIcaoCode(row);
  if (!icao) {
    return null;
  }

  return {
    icao,
    facts: {
      name: field(row, 'name'),
      countryCode: field(row, 'iso_country'),
      latitude: parseCoordinate(row['latitude_deg']),
      longitude: parseCoordinate(row['longitude_deg']),
    },
  };
}

function unquote(value: string | undefined): string {
  return (value ?? '').trim().replace(/^"+|"+$/g, '');
}

/**
 * Normalize one tokenized secondary line into an ICAO → timezone pair
 */
export function normalizeSecondaryFields(fields: readonly string[]): NormalizedTimezone | null {
  if (fields.length <= SECONDARY_TIMEZONE_FIELD) {
    return null;
  }

  const icao = unquote(fields[SECONDARY_ICAO_FIELD]);
  const timezone = unquote(fields[SECONDARY_TIMEZONE_FIELD]);

  if (icao.length !== 4 || INVALID_TIMEZONE_VALUES.has(timezone)) {
    return null;
  }

  return { icao: icao.toUpperCase(), timezone };
}
