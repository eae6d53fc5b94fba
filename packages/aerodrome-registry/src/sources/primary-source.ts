/**
 * Primary feed reader (OurAirports airports.csv)
 *
 * The header line names the columns; every later line is tokenized on its
 * own and handed to the normalizer. Lines that fail to tokenize or
 * normalize are dropped and counted.
 *
 * @module sources/primary-source
 */

import type { AirportFacts } from '../core/types.js';
import { documentLines, tokenizeLine } from './csv-line.js';
import { normalizePrimaryRow, type PrimaryRow } from './normalizer.js';

export interface PrimaryParseResult {
  /** Airports keyed by ICAO; a later row with the same code replaces the earlier one */
  readonly airports: Map<string, AirportFacts>;
  readonly rows: number;
  readonly rejected: number;
}

function toRow(columns: readonly string[], fields: readonly string[]): PrimaryRow {
  const row: Record<string, string> = {};
  columns.forEach((column, index) => {
    if (index < fields.length) row[column] = fields[index];
  });
  return row;
}

/**
 * Parse the primary CSV document into normalized airport facts
 */
export function parsePrimarySource(csvText: string): PrimaryParseResult {
  const airports = new Map<string, AirportFacts>();
  const [headerLine, ...dataLines] = documentLines(csvText);
  const columns = headerLine === undefined ? null : tokenizeLine(headerLine);

  if (!columns) {
    return { airports, rows: dataLines.length, rejected: dataLines.length };
  }

  let rejected = 0;
  for (const line of dataLines) {
    const fields = tokenizeLine(line);
    const normalized = fields ? normalizePrimaryRow(toRow(columns, fields)) : null;
    if (!normalized) {
      rejected++;
      continue;
    }
    airports.set(normalized.icao, normalized.facts);
  }

  return { airports, rows: dataLines.length, rejected };
}
