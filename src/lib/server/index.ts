/**
 * Server Module
 *
 * Provides:
 * - Audit app: CSV upload, background pa11y runs, progress, CSV download
 * - Analyzer app: results upload, issue patterns and page priorities
 * - Shared HTTP base with error-to-status mapping
 */

export { AuditServer, createAuditServer, type AuditServerConfig } from './audit.js';
export { AnalyzerServer, createAnalyzerServer, type AnalyzerServerConfig } from './analyzer.js';
export { WebApp, HttpError, MAX_UPLOAD_BYTES } from './base.js';
export { RunStore, type AuditRun, type RunSnapshot, type RunStatus } from './runs.js';
export { renderAuditPage, renderAnalyzerPage, escapeHtml } from './pages.js';
