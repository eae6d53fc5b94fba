/**
 * Secondary feed reader (OpenFlights airports.dat)
 *
 * Line-oriented: each line is tokenized on its own so that one broken
 * quote only costs that line. The optional header line is skipped.
 *
 * @module sources/secondary-source
 */

import { documentLines, tokenizeLine } from './csv-line.js';
import { normalizeSecondaryFields } from './normalizer.js';

const HEADER_MARKER = 'Airport ID';

export interface SecondaryParseResult {
  /** ICAO → IANA timezone */
  readonly timezones: Map<string, string>;
  readonly lines: number;
  readonly rejected: number;
}

/**
 * Parse the secondary document into an ICAO → timezone map
 */
export function parseSecondarySource(text: string): SecondaryParseResult {
  const timezones = new Map<string, string>();
  let lines = 0;
  let rejected = 0;

  for (const line of documentLines(text)) {
    if (line.startsWith(HEADER_MARKER)) continue;

    lines++;
    const fields = tokenizeLine(line);
    const normalized = fields ? normalizeSecondaryFields(fields) : null;
    if (!normalized) {
      rejected++;
      continue;
    }
    timezones.set(normalized.icao, normalized.timezone);
  }

  return { timezones, lines, rejected };
}
