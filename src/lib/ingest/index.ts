/**
 * Ingestion Module
 *
 * Provides:
 * - CSV upload parsing
 * - URL column detection (explicit, header name, content heuristic)
 * - Validation and order-preserving de-duplication
 */

export {
  readUrlList,
  resolveUrlColumn,
  isHttpUrl,
  type ColumnResolution,
  type SkippedEntry,
  type UrlList,
  type ReadUrlListOptions,
} from './reader.js';
