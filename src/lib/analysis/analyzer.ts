/**
 * Pattern Analyzer
 *
 * Turns a results table into the "most common problems" and "most
 * problematic pages" views, plus a few summary figures.
 */

import { toCsv } from '../csv/index.js';
import type { ResultRow } from '../audit/index.js';
import { categorize, fixesFor, issueKey, type WcagCategory } from './normalize.js';

// ============================================================================
// Types
// ============================================================================

export interface IssuePattern {
  key: string;
  occurrences: number;
  /** Distinct URLs in first-seen order */
  affectedUrls: string[];
  affectedUrlCount: number;
  /** occurrences × affected URLs */
  impactScore: number;
  category: WcagCategory;
  /** Up to three distinct original messages */
  samples: string[];
}

export interface PriorityItem {
  url: string;
  totalIssues: number;
}

export interface CategoryCount {
  category: WcagCategory;
  count: number;
}

export interface Recommendation {
  key: string;
  occurrences: number;
  affectedUrlCount: number;
  fixes: readonly string[];
}

export interface IssueDetail {
  url: string;
  key: string;
  message: string;
  code: string;
  severity: string;
  category: WcagCategory;
}

export interface AnalysisSummary {
  totalRows: number;
  totalUrls: number;
  totalIssues: number;
  uniqueIssueTypes: number;
  urlsWithIssues: number;
  failedUrls: number;
  averageIssuesPerUrl: number;
}

export interface AnalysisReport {
  summary: AnalysisSummary;
  patterns: IssuePattern[];
  priorities: PriorityItem[];
  categories: CategoryCount[];
  recommendations: Recommendation[];
  details: IssueDetail[];
}

const MAX_SAMPLES = 3;
const RECOMMENDATION_COUNT = 3;

// ============================================================================
// Analysis
// ============================================================================

/**
 * Rows flagged failed and clean placeholder rows are not issues.
 */
export function isIssueRow(row: ResultRow): boolean {
  if (row.failed) return false;
  return row.issueMessage !== '' || row.issueCode !== '' || row.issueCount > 0;
}

function byCountThenKey(a: { count: number; key: string }, b: { count: number; key: string }): number {
  if (a.count !== b.count) return b.count - a.count;
  if (a.key < b.key) return -1;
  if (a.key > b.key) return 1;
  return 0;
}

export function analyzeResults(rows: readonly ResultRow[]): AnalysisReport {
  const groups = new Map<string, { occurrences: number; urls: Set<string>; samples: Set<string>; category: WcagCategory }>();
  const perUrl = new Map<string, number>();
  const perCategory = new Map<WcagCategory, number>();
  const details: IssueDetail[] = [];
  const allUrls = new Set<string>();
  const failedUrls = new Set<string>();

  for (const row of rows) {
    allUrls.add(row.url);
    if (row.failed) failedUrls.add(row.url);
    if (!isIssueRow(row)) continue;

    const key = issueKey(row.issueMessage, row.issueCode);

    // A pattern's category comes from its first row and covers all its rows
    let group = groups.get(key);
    if (!group) {
      group = {
        occurrences: 0,
        urls: new Set(),
        samples: new Set(),
        category: categorize(row.issueMessage || key),
      };
      groups.set(key, group);
    }
    const category = group.category;
    group.occurrences++;
    group.urls.add(row.url);
    if (row.issueMessage && group.samples.size < MAX_SAMPLES) {
      group.samples.add(row.issueMessage);
    }

    perUrl.set(row.url, (perUrl.get(row.url) ?? 0) + 1);
    perCategory.set(category, (perCategory.get(category) ?? 0) + 1);
    details.push({
      url: row.url,
      key,
      message: row.issueMessage,
      code: row.issueCode,
      severity: row.issueSeverity,
      category,
    });
  }

  const patterns: IssuePattern[] = [...groups.entries()]
    .map(([key, group]) => ({
      key,
      occurrences: group.occurrences,
      affectedUrls: [...group.urls],
      affectedUrlCount: group.urls.size,
      impactScore: group.occurrences * group.urls.size,
      category: group.category,
      samples: [...group.samples],
    }))
    .sort((a, b) => byCountThenKey({ count: a.occurrences, key: a.key }, { count: b.occurrences, key: b.key }));

  const priorities: PriorityItem[] = [...perUrl.entries()]
    .map(([url, totalIssues]) => ({ url, totalIssues }))
    .sort((a, b) => byCountThenKey({ count: a.totalIssues, key: a.url }, { count: b.totalIssues, key: b.url }));

  const categories: CategoryCount[] = [...perCategory.entries()]
    .map(([category, count]) => ({ category, count }))
    .sort((a, b) => byCountThenKey({ count: a.count, key: a.category }, { count: b.count, key: b.category }));

  const recommendations: Recommendation[] = patterns.slice(0, RECOMMENDATION_COUNT).map(p => ({
    key: p.key,
    occurrences: p.occurrences,
    affectedUrlCount: p.affectedUrlCount,
    fixes: fixesFor(p.key),
  }));

  const totalIssues = details.length;
  return {
    summary: {
      totalRows: rows.length,
      totalUrls: allUrls.size,
      totalIssues,
      uniqueIssueTypes: patterns.length,
      urlsWithIssues: perUrl.size,
      failedUrls: failedUrls.size,
      averageIssuesPerUrl: allUrls.size === 0 ? 0 : Math.round((totalIssues / allUrls.size) * 10) / 10,
    },
    patterns,
    priorities,
    categories,
    recommendations,
    details,
  };
}

// ============================================================================
// Export
// ============================================================================

export const PATTERN_COLUMNS = ['IssueKey', 'OccurrenceCount', 'AffectedUrlCount', 'ImpactScore', 'Category'] as const;
export const PRIORITY_COLUMNS = ['URL', 'TotalIssueCount'] as const;
export const DETAIL_COLUMNS = ['URL', 'IssueKey', 'IssueMessage', 'IssueCode', 'IssueSeverity', 'Category'] as const;

export function patternsToCsv(patterns: readonly IssuePattern[]): string {
  return toCsv(
    PATTERN_COLUMNS,
    patterns.map(p => [p.key, p.occurrences, p.affectedUrlCount, p.impactScore, p.category])
  );
}

export function prioritiesToCsv(priorities: readonly PriorityItem[]): string {
  return toCsv(PRIORITY_COLUMNS, priorities.map(p => [p.url, p.totalIssues]));
}

export function detailsToCsv(details: readonly IssueDetail[]): string {
  return toCsv(
    DETAIL_COLUMNS,
    details.map(d => [d.url, d.key, d.message, d.code, d.severity, d.category])
  );
}
