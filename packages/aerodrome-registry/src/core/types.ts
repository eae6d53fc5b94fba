/**
 * Aerodrome Registry Core Types
 *
 * Shapes shared by the reconciliation, validation and release layers.
 * Field names of the published documents are snake_case because they are
 * the on-disk wire format consumed by downstream apps.
 *
 * @module core/types
 */

// ============================================================================
// Published Records
// ============================================================================

/**
 * A single published aerodrome entry
 */
export interface AerodromeRecord {
  /** 4-character ICAO code, the registry key (e.g., "KJFK") */
  readonly icao: string;
  /** Airport name, may be empty */
  readonly name: string;
  /** ISO country code or free text, may be empty */
  readonly country: string;
  /** IANA timezone identifier, never empty */
  readonly timezone: string;
}

/**
 * The unit of publication (staging and production artifacts)
 */
export interface RegistryDocument {
  readonly version: string;
  /** ISO-8601 with offset, stamped by sync */
  readonly last_updated: string;
  /** ISO-8601 with offset, stamped only on promotion */
  readonly released_at?: string;
  readonly total_count: number;
  /** Sorted ascending by icao */
  readonly aerodromes: readonly AerodromeRecord[];
}

// ============================================================================
// Source-derived Records
// ============================================================================

/**
 * Normalized facts from the primary (OurAirports) feed
 */
export interface AirportFacts {
  readonly name: string;
  readonly countryCode: string;
  readonly latitude: number;
  readonly longitude: number;
}

export interface NormalizedAirport {
  readonly icao: string;
  readonly facts: AirportFacts;
}

export interface NormalizedTimezone {
  readonly icao: string;
  readonly timezone: string;
}

/**
 * Operator-authored patch. Supplied fields win over sourced data.
 */
export interface OverrideRecord {
  readonly icao: string;
  readonly name?: string;
  readonly country?: string;
  readonly timezone?: string;
}

/**
 * Override element as loaded from disk, before the icao is checked
 */
export interface OverrideCandidate {
  readonly icao?: string;
  readonly name?: string;
  readonly country?: string;
  readonly timezone?: string;
  /** File the element came from, for diagnostics */
  readonly source?: string;
}

// ============================================================================
// Reconciliation Results
// ============================================================================

/**
 * Per-run merge counters. Diagnostic only.
 */
export interface MergeStats {
  /** Timezone taken from the secondary feed */
  matched: number;
  /** Timezone taken from the country fallback table (or UTC) */
  fallback: number;
  /** Fallback table had no entry, UTC used */
  unresolved: number;
  /** Existing records patched by an override */
  overridden: number;
  /** New records introduced purely by an override */
  overrides: number;
  /** Malformed override entries dropped */
  skippedOverrides: number;
}

export interface SkippedOverride {
  readonly reason: string;
  readonly source?: string;
}

/**
 * Looks up a timezone for an ISO country code
 */
export type TimezoneFallback = (countryCode: string) => string | undefined;

// ============================================================================
// Validation
// ============================================================================

export type ValidationIssueCode =
  | 'invalid_json'
  | 'not_an_object'
  | 'missing_field'
  | 'not_an_array'
  | 'count_mismatch'
  | 'missing_record_field'
  | 'duplicate_icao'
  | 'schema_violation';

/**
 * A single reportable validation failure
 */
export interface ValidationIssue {
  readonly code: ValidationIssueCode;
  readonly message: string;
  /** JSON pointer style location, when known (e.g., "/aerodromes/3") */
  readonly path?: string;
}
