/**
 * Delimited text helpers shared by both apps.
 */

import { parse } from 'csv-parse/sync';
import { stringify } from 'csv-stringify/sync';
import { InputFormatError } from '../errors/index.js';

export type CsvCell = string | number | boolean;

/**
 * Parse CSV text into raw rows. Blank lines are dropped, ragged rows allowed.
 */
export function parseCsv(text: string): string[][] {
  try {
    const rows: string[][] = parse(text, {
      bom: true,
      skip_empty_lines: true,
      relax_column_count: true,
      relax_quotes: true,
    });
    return rows;
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new InputFormatError(`File could not be parsed as CSV: ${detail}`, { cause: error });
  }
}

/**
 * Serialize a header plus rows. Booleans are written as "true"/"false".
 */
export function toCsv(header: readonly string[], rows: ReadonlyArray<readonly CsvCell[]>): string {
  const records = [
    [...header],
    ...rows.map(row => row.map(cell => String(cell))),
  ];
  return stringify(records);
}
