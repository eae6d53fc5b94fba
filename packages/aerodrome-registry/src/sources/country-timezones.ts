/**
 * Country → timezone fallback table
 *
 * Used when the secondary feed has no timezone for an airport. Each ISO
 * 3166-1 alpha-2 code maps to one representative IANA zone (the capital's
 * zone for multi-zone countries), so the result is approximate by nature.
 *
 * @module sources/country-timezones
 */

import { readFile } from 'node:fs/promises';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { SourceUnavailableError } from '../core/errors.js';
import type { TimezoneFallback } from '../core/types.js';

export const DEFAULT_COUNTRY_TIMEZONES_PATH = fileURLToPath(
  new URL('../../data/country-timezones.json', import.meta.url)
);

const CountryTimezoneTableSchema = z.record(z.string(), z.string().min(1));

/**
 * Load the fallback table from JSON
 *
 * @throws {SourceUnavailableError} when the file cannot be read or is not a string map
 */
export async function loadCountryTimezones(
  filePath: string = DEFAULT_COUNTRY_TIMEZONES_PATH
): Promise<Map<string, string>> {
  try {
    const parsed = CountryTimezoneTableSchema.parse(JSON.parse(await readFile(filePath, 'utf-8')));
    return new Map(
      Object.entries(parsed).map(([code, timezone]) => [code.toUpperCase(), timezone])
    );
  } catch (error) {
    throw new SourceUnavailableError(filePath, error);
  }
}

/**
 * Build a lookup over a loaded table; country codes match case-insensitively
 */
export function createTimezoneFallback(table: ReadonlyMap<string, string>): TimezoneFallback {
  return (countryCode: string) => table.get(countryCode.trim().toUpperCase());
}
