/**
 * Analysis Module
 *
 * Provides:
 * - Issue grouping by normalized message
 * - Most common issues and most affected pages, deterministically ordered
 * - WCAG category breakdown and fix recommendations
 * - CSV exports of each view
 */

export {
  analyzeResults,
  isIssueRow,
  patternsToCsv,
  prioritiesToCsv,
  detailsToCsv,
  PATTERN_COLUMNS,
  PRIORITY_COLUMNS,
  DETAIL_COLUMNS,
  type IssuePattern,
  type PriorityItem,
  type CategoryCount,
  type Recommendation,
  type IssueDetail,
  type AnalysisSummary,
  type AnalysisReport,
} from './analyzer.js';
export {
  normalizeMessage,
  issueKey,
  categorize,
  fixesFor,
  UNCLASSIFIED,
  GENERIC_FIX,
  type WcagCategory,
} from './normalize.js';
