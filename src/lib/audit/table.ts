/**
 * Results Table
 *
 * The flat table handed from the audit app to the analyzer app. Its column
 * names and order are the analyzer's input contract.
 */

import { parseCsv, toCsv } from '../csv/index.js';
import { EmptyInputError, InputFormatError } from '../errors/index.js';
import { ISSUE_SEVERITIES, type CheckResult, type IssueSeverity } from '../checker/index.js';

// ============================================================================
// Schema
// ============================================================================

export const RESULT_COLUMNS = [
  'URL',
  'IssueCount',
  'IssueMessage',
  'IssueCode',
  'IssueSeverity',
  'IssueSelector',
  'Failed',
  'FailureReason',
] as const;

export type ResultColumn = (typeof RESULT_COLUMNS)[number];

/**
 * Columns an uploaded table must have to be analyzed.
 */
export const REQUIRED_RESULT_COLUMNS: readonly ResultColumn[] = ['URL', 'IssueCount', 'IssueMessage', 'IssueCode'];

export interface ResultRow {
  url: string;
  /** Total issues for this row's URL; repeated on every row of the URL */
  issueCount: number;
  issueMessage: string;
  issueCode: string;
  issueSeverity: IssueSeverity | '';
  issueSelector: string;
  failed: boolean;
  failureReason: string;
}

export interface ResultsTable {
  rows: ResultRow[];
}

export interface AuditSummary {
  totalUrls: number;
  checkedUrls: number;
  urlsWithIssues: number;
  cleanUrls: number;
  failedUrls: number;
  totalIssues: number;
  bySeverity: Record<IssueSeverity, number>;
}

// ============================================================================
// Aggregation
// ============================================================================

/**
 * One row per issue. A clean URL gets a single row with empty issue fields,
 * a failed URL a single flagged row.
 */
export function buildResultsTable(results: readonly CheckResult[]): ResultsTable {
  const rows: ResultRow[] = [];

  for (const result of results) {
    const base = {
      url: result.url,
      issueCount: result.issueCount,
      issueMessage: '',
      issueCode: '',
      issueSeverity: '' as const,
      issueSelector: '',
      failed: false,
      failureReason: '',
    };

    if (result.failure) {
      rows.push({ ...base, issueCount: 0, failed: true, failureReason: result.failure.message });
      continue;
    }

    if (result.issues.length === 0) {
      rows.push(base);
      continue;
    }

    for (const issue of result.issues) {
      rows.push({
        ...base,
        issueMessage: issue.message,
        issueCode: issue.code,
        issueSeverity: issue.type,
        issueSelector: issue.selector,
      });
    }
  }

  return { rows };
}

export function summarizeResults(results: readonly CheckResult[]): AuditSummary {
  const bySeverity: Record<IssueSeverity, number> = { error: 0, warning: 0, notice: 0 };
  let failedUrls = 0;
  let urlsWithIssues = 0;
  let totalIssues = 0;

  for (const result of results) {
    if (result.failure) {
      failedUrls++;
      continue;
    }
    if (result.issueCount > 0) urlsWithIssues++;
    totalIssues += result.issueCount;
    for (const issue of result.issues) {
      bySeverity[issue.type]++;
    }
  }

  const checkedUrls = results.length - failedUrls;
  return {
    totalUrls: results.length,
    checkedUrls,
    urlsWithIssues,
    cleanUrls: checkedUrls - urlsWithIssues,
    failedUrls,
    totalIssues,
    bySeverity,
  };
}

// ============================================================================
// CSV
// ============================================================================

export function resultsTableToCsv(table: ResultsTable): string {
  return toCsv(
    RESULT_COLUMNS,
    table.rows.map(row => [
      row.url,
      row.issueCount,
      row.issueMessage,
      row.issueCode,
      row.issueSeverity,
      row.issueSelector,
      row.failed,
      row.failureReason,
    ])
  );
}

function toSeverity(value: string): IssueSeverity | '' {
  const lowered = value.trim().toLowerCase();
  return ISSUE_SEVERITIES.find(s => s === lowered) ?? '';
}

function toCount(value: string): number {
  const n = Number.parseInt(value.trim(), 10);
  return Number.isFinite(n) && n > 0 ? n : 0;
}

/**
 * Read a results table back from CSV. Optional columns may be missing.
 */
export function readResultsTable(text: string): ResultsTable {
  const records = parseCsv(text);
  if (records.length === 0) {
    throw new EmptyInputError('The uploaded results file is empty');
  }

  const header = records[0].map(cell => cell.trim());
  const missing = REQUIRED_RESULT_COLUMNS.filter(column => !header.includes(column));
  if (missing.length > 0) {
    throw new InputFormatError(
      `Results file is missing required column(s): ${missing.join(', ')}. ` +
      'Upload a file downloaded from the audit app.'
    );
  }

  const indexOf = (column: ResultColumn): number => header.indexOf(column);
  const cell = (record: string[], column: ResultColumn): string => {
    const index = indexOf(column);
    return index === -1 ? '' : (record[index] ?? '');
  };

  const rows = records.slice(1).map((record, i): ResultRow => ({
    url: cell(record, 'URL').trim() || `Row ${i + 1}`,
    issueCount: toCount(cell(record, 'IssueCount')),
    issueMessage: cell(record, 'IssueMessage').trim(),
    issueCode: cell(record, 'IssueCode').trim(),
    issueSeverity: toSeverity(cell(record, 'IssueSeverity')),
    issueSelector: cell(record, 'IssueSelector'),
    failed: cell(record, 'Failed').trim().toLowerCase() === 'true',
    failureReason: cell(record, 'FailureReason'),
  }));

  if (rows.length === 0) {
    throw new EmptyInputError('The uploaded results file has no rows');
  }

  return { rows };
}
