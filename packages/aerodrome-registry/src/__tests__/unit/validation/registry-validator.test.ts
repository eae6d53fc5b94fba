import { describe, it, expect, beforeAll } from 'vitest';
import { silentLogger } from '../../../core/utils/logger.js';
import { formatIsoWithOffset } from '../../../core/utils/timestamps.js';
import { reconcile } from '../../../reconciliation/reconcile.js';
import { RegistryValidator, checkStructure } from '../../../validation/registry-validator.js';

function validDocument() {
  return {
    version: '1.0.0',
    last_updated: '2026-10-19T09:30:00+02:00',
    total_count: 2,
    aerodromes: [
      { icao: 'EGLL', name: 'London Heathrow Airport', country: 'GB', timezone: 'Europe/London' },
      { icao: 'KJFK', name: 'John F Kennedy International Airport', country: 'US', timezone: 'America/New_York' },
    ],
  };
}

describe('RegistryValidator', () => {
  let validator: RegistryValidator;

  beforeAll(async () => {
    validator = await RegistryValidator.fromFile();
  });

  describe('valid documents', () => {
    it('accepts a well-formed registry in strict mode', () => {
      expect(validator.validate(validDocument(), 'strict')).toEqual({
        valid: true,
        issues: [],
        summary: { version: '1.0.0', lastUpdated: '2026-10-19T09:30:00+02:00', totalCount: 2 },
      });
    });

    it('accepts a released registry', () => {
      const doc = { ...validDocument(), released_at: '2026-10-19T10:00:00+02:00' };
      expect(validator.validate(doc, 'strict').valid).toBe(true);
    });

    it('accepts override-only records with empty name and country', () => {
      const doc = {
        ...validDocument(),
        total_count: 1,
        aerodromes: [{ icao: 'ZZZZ', name: '', country: '', timezone: 'UTC' }],
      };
      expect(validator.validate(doc, 'strict').valid).toBe(true);
    });

    it('hands back the typed document', () => {
      const doc = validDocument();
      const result = validator.validateDocument(doc);

      expect(result.valid).toBe(true);
      if (result.valid) {
        expect(result.document).toBe(doc);
      }
    });

    it('accepts a freshly reconciled document', () => {
      const { document } = reconcile(
        {
          primary: new Map([
            ['KJFK', { name: 'JFK', countryCode: 'US', latitude: 40.6, longitude: -73.8 }],
            ['LFPG', { name: 'Charles de Gaulle', countryCode: 'FR', latitude: 49, longitude: 2.55 }],
          ]),
          secondary: new Map([['KJFK', 'America/New_York']]),
          overrides: [{ icao: 'zzzz', name: 'Private strip' }],
        },
        {
          version: '1.0.0',
          lastUpdated: formatIsoWithOffset(new Date(2026, 9, 19, 9, 30, 0)),
          fallbackTimezone: () => undefined,
          logger: silentLogger,
        }
      );

      const result = validator.validate(document, 'strict');

      expect(result.valid).toBe(true);
      expect(result.issues).toEqual([]);
      expect(result.summary?.totalCount).toBe(3);
    });

    it('does not modify the input', () => {
      const doc = validDocument();
      validator.validate(doc, 'strict');
      expect(doc).toEqual(validDocument());
    });
  });

  describe('structural checks', () => {
    it('rejects non-objects', () => {
      expect(validator.validate([], 'strict').issues.map((i) => i.code)).toEqual(['not_an_object']);
      expect(validator.validate(null, 'sample').issues.map((i) => i.code)).toEqual(['not_an_object']);
    });

    it('reports every missing top-level field', () => {
      const issues = checkStructure({ aerodromes: [] }, 'strict');

      expect(issues.map((i) => i.message)).toEqual([
        'Missing required field: version',
        'Missing required field: last_updated',
        'Missing required field: total_count',
      ]);
    });

    it('rejects a non-array aerodromes field', () => {
      const doc = { ...validDocument(), aerodromes: {} };
      expect(checkStructure(doc, 'strict')).toEqual([
        { code: 'not_an_array', message: 'aerodromes must be an array', path: '/aerodromes' },
      ]);
    });

    it('rejects a count mismatch', () => {
      const doc = { ...validDocument(), total_count: 3 };
      expect(checkStructure(doc, 'sample')).toEqual([
        {
          code: 'count_mismatch',
          message: 'Count mismatch: total_count=3, actual=2',
          path: '/total_count',
        },
      ]);
    });

    it('checks only the first record in sample mode', () => {
      const doc = validDocument();
      const aerodromes = [doc.aerodromes[0], { icao: 'KJFK', name: 'JFK', country: 'US' }];
      const partial = { ...doc, aerodromes };

      expect(validator.validate(partial, 'sample').valid).toBe(true);
      expect(validator.validate(partial, 'strict').issues).toEqual([
        {
          code: 'missing_record_field',
          message: 'Record 1 missing required field: timezone',
          path: '/aerodromes/1',
        },
      ]);
    });

    it('rejects duplicate ICAO codes in both modes', () => {
      const doc = validDocument();
      const duplicated = { ...doc, aerodromes: [doc.aerodromes[1], doc.aerodromes[1]] };

      for (const mode of ['sample', 'strict'] as const) {
        expect(validator.validate(duplicated, mode).issues).toEqual([
          {
            code: 'duplicate_icao',
            message: 'Duplicate ICAO code: KJFK (2 records)',
            path: '/aerodromes',
          },
        ]);
      }
    });
  });

  describe('schema contract', () => {
    it('reports an empty timezone as a schema violation', () => {
      const doc = validDocument();
      const broken = {
        ...doc,
        aerodromes: [doc.aerodromes[0], { ...doc.aerodromes[1], timezone: '' }],
      };

      const issues = validator.validate(broken, 'strict').issues;

      expect(issues).toHaveLength(1);
      expect(issues[0].code).toBe('schema_violation');
      expect(issues[0].path).toBe('/aerodromes/1/timezone');
    });

    it('reports a wrong-length icao as a schema violation', () => {
      const doc = { ...validDocument(), total_count: 1 };
      doc.aerodromes = [{ ...doc.aerodromes[0], icao: 'EGLLX' }];

      const issues = validator.validate(doc, 'strict').issues;

      expect(issues.map((i) => [i.code, i.path])).toEqual([['schema_violation', '/aerodromes/0/icao']]);
    });

    it('does not run the schema in sample mode', () => {
      const doc = validDocument();
      const broken = { ...doc, aerodromes: [doc.aerodromes[0], { ...doc.aerodromes[1], timezone: '' }] };

      expect(validator.validate(broken, 'sample').valid).toBe(true);
    });
  });

  describe('validateText', () => {
    it('reports unparsable JSON', () => {
      const result = validator.validateText('{ "version": ', 'strict');

      expect(result.valid).toBe(false);
      expect(result.issues.map((i) => i.code)).toEqual(['invalid_json']);
    });

    it('validates parsed JSON', () => {
      expect(validator.validateText(JSON.stringify(validDocument()), 'strict').valid).toBe(true);
    });
  });
});
