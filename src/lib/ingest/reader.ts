/**
 * URL List Reader
 *
 * Reads an uploaded CSV, finds the column holding URLs and returns the
 * distinct URLs in the order they first appear.
 */

import { parseCsv } from '../csv/index.js';
import { DEFAULT_CONFIG } from '../config/index.js';
import { EmptyInputError, InputFormatError } from '../errors/index.js';

// ============================================================================
// Types
// ============================================================================

/**
 * How the URL column was found.
 */
export type ColumnResolution =
  | { kind: 'explicit'; index: number; name: string }
  | { kind: 'header'; index: number; name: string }
  | { kind: 'heuristic'; index: number; name: string | null; headerless: boolean };

export interface SkippedEntry {
  /** 1-based line number in the uploaded file */
  row: number;
  value: string;
  reason: 'invalid-url' | 'duplicate';
}

export interface UrlList {
  column: ColumnResolution;
  urls: string[];
  skipped: SkippedEntry[];
}

export interface ReadUrlListOptions {
  /** Column chosen by the user; matched case-insensitively against the header */
  column?: string;
  /** Header names recognised as URL columns */
  urlHeaders?: readonly string[];
}

const URL_LIKE = /^https?:\/\/\S+$/i;

// ============================================================================
// Reader
// ============================================================================

export function readUrlList(text: string, options: ReadUrlListOptions = {}): UrlList {
  const rows = parseCsv(text);
  if (rows.length === 0) {
    throw new EmptyInputError('The uploaded file is empty');
  }

  const column = resolveUrlColumn(rows, options);
  const firstDataRow = column.kind === 'heuristic' && column.headerless ? 0 : 1;

  const urls: string[] = [];
  const seen = new Set<string>();
  const skipped: SkippedEntry[] = [];

  for (let i = firstDataRow; i < rows.length; i++) {
    const value = (rows[i][column.index] ?? '').trim();
    if (value === '') continue;

    if (!isHttpUrl(value)) {
      skipped.push({ row: i + 1, value, reason: 'invalid-url' });
      continue;
    }
    if (seen.has(value)) {
      skipped.push({ row: i + 1, value, reason: 'duplicate' });
      continue;
    }

    seen.add(value);
    urls.push(value);
  }

  if (urls.length === 0) {
    throw new EmptyInputError('No valid http(s) URLs were found in the uploaded file');
  }

  return { column, urls, skipped };
}

/**
 * Explicit choice first, then a known header name, then the first column
 * whose cells look like URLs. Never guesses past that.
 */
export function resolveUrlColumn(rows: string[][], options: ReadUrlListOptions = {}): ColumnResolution {
  const header = (rows[0] ?? []).map(cell => cell.trim());
  const lowered = header.map(cell => cell.toLowerCase());

  if (options.column !== undefined) {
    const wanted = options.column.trim().toLowerCase();
    const index = lowered.indexOf(wanted);
    if (index === -1) {
      throw new InputFormatError(
        `Column "${options.column}" was not found. Available columns: ${header.join(', ')}`
      );
    }
    return { kind: 'explicit', index, name: header[index] };
  }

  const known = (options.urlHeaders ?? DEFAULT_CONFIG.ingestion.url_headers).map(h => h.toLowerCase());
  const headerIndex = lowered.findIndex(cell => known.includes(cell));
  if (headerIndex !== -1) {
    return { kind: 'header', index: headerIndex, name: header[headerIndex] };
  }

  const width = Math.max(...rows.map(row => row.length));
  for (let index = 0; index < width; index++) {
    if (isHttpUrl(header[index] ?? '')) {
      return { kind: 'heuristic', index, name: null, headerless: true };
    }
    const hasUrl = rows.slice(1).some(row => isHttpUrl((row[index] ?? '').trim()));
    if (hasUrl) {
      return { kind: 'heuristic', index, name: header[index] ?? null, headerless: false };
    }
  }

  throw new InputFormatError(
    'Could not find a column of URLs. Name the column "url" or choose it explicitly.'
  );
}

export function isHttpUrl(value: string): boolean {
  if (!URL_LIKE.test(value)) return false;
  try {
    new URL(value);
    return true;
  } catch {
    return false;
  }
}
