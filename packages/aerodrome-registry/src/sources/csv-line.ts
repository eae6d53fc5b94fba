/**
 * Single-line CSV tokenizing shared by both feed readers. Each line is read
 * on its own so an unclosed quote only costs the line it is on.
 *
 * @module sources/csv-line
 */

import { parse } from 'csv-parse/sync';

/**
 * Tokenize a single comma-delimited line. Returns null when it cannot be read.
 */
export function tokenizeLine(line: string): string[] | null {
  try {
    const rows: unknown = parse(line, { relax_quotes: true, relax_column_count: true });
    if (!Array.isArray(rows) || rows.length !== 1) return null;

    const first: unknown = rows[0];
    if (!Array.isArray(first)) return null;
    return first.map((value: unknown) => (typeof value === 'string' ? value : String(value)));
  } catch {
    return null;
  }
}

/**
 * Split a document into trimmed, non-empty lines, dropping a leading BOM
 */
export function documentLines(text: string): string[] {
  return text
    .replace(/^\uFEFF/, '')
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}
