/**
 * Audit Module
 *
 * Provides:
 * - Batch pipeline over a checker with failure isolation
 * - Results table aggregation and summary metrics
 * - Results CSV export and re-import
 */

export { runAudit, checkUrl, type RunAuditOptions, type AuditProgress } from './pipeline.js';
export {
  buildResultsTable,
  summarizeResults,
  resultsTableToCsv,
  readResultsTable,
  RESULT_COLUMNS,
  REQUIRED_RESULT_COLUMNS,
  type ResultColumn,
  type ResultRow,
  type ResultsTable,
  type AuditSummary,
} from './table.js';
