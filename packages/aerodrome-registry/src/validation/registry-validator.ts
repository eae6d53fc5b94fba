/**
 * Registry Validator
 *
 * Structural checks over a candidate registry document, plus the JSON
 * Schema contract (Ajv, draft-07) in strict mode.
 *
 * MODES:
 * - sample: record fields are checked on the first record only
 * - strict: every record is checked, then the schema contract runs
 *
 * Checks never short-circuit; every issue found is reported. The input is
 * never mutated.
 *
 * @module validation/registry-validator
 */

import { readFile } from 'node:fs/promises';
import { fileURLToPath } from 'node:url';
import { Ajv, type ErrorObject, type SchemaObject, type ValidateFunction } from 'ajv';
import type { RegistryDocument, ValidationIssue } from '../core/types.js';

export const DEFAULT_SCHEMA_PATH = fileURLToPath(
  new URL('../../schema/registry.schema.json', import.meta.url)
);

export const REQUIRED_FIELDS = ['version', 'last_updated', 'total_count', 'aerodromes'] as const;
export const REQUIRED_RECORD_FIELDS = ['icao', 'name', 'country', 'timezone'] as const;

export type ValidationMode = 'sample' | 'strict';

/**
 * Headline fields of a document that passed validation
 */
export interface RegistrySummary {
  readonly version: string;
  readonly lastUpdated: string;
  readonly totalCount: number;
}

export interface ValidationResult {
  readonly valid: boolean;
  readonly issues: readonly ValidationIssue[];
  /** Present when `valid` */
  readonly summary?: RegistrySummary;
}

export type DocumentValidationResult =
  | { readonly valid: true; readonly document: RegistryDocument }
  | { readonly valid: false; readonly issues: readonly ValidationIssue[] };

// ============================================================================
// Helpers
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isSchemaObject(value: unknown): value is SchemaObject {
  return isRecord(value);
}

function toSchemaIssue(error: ErrorObject): ValidationIssue {
  const path = error.instancePath || '/';
  return {
    code: 'schema_violation',
    message: `${path} ${error.message ?? 'is invalid'}`,
    path,
  };
}

function parseJson(
  text: string
): { ok: true; value: unknown } | { ok: false; issue: ValidationIssue } {
  try {
    const value: unknown = JSON.parse(text);
    return { ok: true, value };
  } catch (error) {
    return {
      ok: false,
      issue: {
        code: 'invalid_json',
        message: `Invalid JSON: ${error instanceof Error ? error.message : String(error)}`,
      },
    };
  }
}

/**
 * Load and parse a JSON Schema file
 */
export async function loadRegistrySchema(
  schemaPath: string = DEFAULT_SCHEMA_PATH
): Promise<SchemaObject> {
  const parsed: unknown = JSON.parse(await readFile(schemaPath, 'utf-8'));
  if (!isSchemaObject(parsed)) {
    throw new Error(`Schema at ${schemaPath} is not a JSON object`);
  }
  return parsed;
}

// ============================================================================
// Structural Checks
// ============================================================================

/**
 * Required fields, array shape, count, record fields and duplicate ICAOs
 */
export function checkStructure(doc: unknown, mode: ValidationMode): ValidationIssue[] {
  if (!isRecord(doc)) {
    return [{ code: 'not_an_object', message: 'Registry document must be a JSON object' }];
  }

  const issues: ValidationIssue[] = [];

  for (const field of REQUIRED_FIELDS) {
    if (!(field in doc)) {
      issues.push({
        code: 'missing_field',
        message: `Missing required field: ${field}`,
        path: `/${field}`,
      });
    }
  }

  const aerodromes = doc.aerodromes;
  if (aerodromes === undefined) {
    return issues;
  }
  if (!Array.isArray(aerodromes)) {
    issues.push({
      code: 'not_an_array',
      message: 'aerodromes must be an array',
      path: '/aerodromes',
    });
    return issues;
  }

  if ('total_count' in doc && doc.total_count !== aerodromes.length) {
    issues.push({
      code: 'count_mismatch',
      message: `Count mismatch: total_count=${String(doc.total_count)}, actual=${aerodromes.length}`,
      path: '/total_count',
    });
  }

  const checked = mode === 'sample' ? aerodromes.slice(0, 1) : aerodromes;
  checked.forEach((record: unknown, index) => {
    for (const field of REQUIRED_RECORD_FIELDS) {
      if (!isRecord(record) || !(field in record)) {
        issues.push({
          code: 'missing_record_field',
          message: `Record ${index} missing required field: ${field}`,
          path: `/aerodromes/${index}`,
        });
      }
    }
  });

  const seen = new Map<string, number>();
  for (const record of aerodromes) {
    if (isRecord(record) && typeof record.icao === 'string') {
      seen.set(record.icao, (seen.get(record.icao) ?? 0) + 1);
    }
  }
  for (const [icao, occurrences] of seen) {
    if (occurrences > 1) {
      issues.push({
        code: 'duplicate_icao',
        message: `Duplicate ICAO code: ${icao} (${occurrences} records)`,
        path: '/aerodromes',
      });
    }
  }

  return issues;
}

export function summarizeRegistry(doc: unknown): RegistrySummary | undefined {
  if (!isRecord(doc) || !Array.isArray(doc.aerodromes)) return undefined;
  return {
    version: String(doc.version),
    lastUpdated: String(doc.last_updated),
    totalCount: doc.aerodromes.length,
  };
}

// ============================================================================
// Validator
// ============================================================================

export class RegistryValidator {
  private readonly schemaCheck: ValidateFunction<RegistryDocument>;

  constructor(schema: SchemaObject) {
    const ajv = new Ajv({ allErrors: true, strict: false });
    this.schemaCheck = ajv.compile<RegistryDocument>(schema);
  }

  /**
   * Build a validator from a schema file (default: the bundled contract)
   */
  static async fromFile(schemaPath: string = DEFAULT_SCHEMA_PATH): Promise<RegistryValidator> {
    return new RegistryValidator(await loadRegistrySchema(schemaPath));
  }

  validate(doc: unknown, mode: ValidationMode): ValidationResult {
    const issues = checkStructure(doc, mode);

    if (mode === 'strict' && issues.length === 0 && !this.schemaCheck(doc)) {
      issues.push(...(this.schemaCheck.errors ?? []).map(toSchemaIssue));
    }

    return issues.length === 0
      ? { valid: true, issues, summary: summarizeRegistry(doc) }
      : { valid: false, issues };
  }

  /**
   * Validate raw JSON text; unparsable input is a single `invalid_json` issue
   */
  validateText(text: string, mode: ValidationMode): ValidationResult {
    const parsed = parseJson(text);
    return parsed.ok ? this.validate(parsed.value, mode) : { valid: false, issues: [parsed.issue] };
  }

  /**
   * Strict validation that also hands back the typed document
   */
  validateDocument(doc: unknown): DocumentValidationResult {
    const issues = checkStructure(doc, 'strict');
    if (issues.length === 0 && this.schemaCheck(doc)) {
      return { valid: true, document: doc };
    }
    if (issues.length === 0) {
      issues.push(...(this.schemaCheck.errors ?? []).map(toSchemaIssue));
    }
    return { valid: false, issues };
  }

  /**
   * Parse JSON text and run `validateDocument`
   */
  parseDocument(text: string): DocumentValidationResult {
    const parsed = parseJson(text);
    return parsed.ok ? this.validateDocument(parsed.value) : { valid: false, issues: [parsed.issue] };
  }
}
