/**
 * a11y-batch-audit
 *
 * Run pa11y over a CSV of URLs, then aggregate the results to find the
 * accessibility issues that recur most and the pages that need work first.
 */

// Errors shared by both apps
export * from './lib/errors/index.js';

// Configuration
export * from './lib/config/index.js';

// CSV upload parsing and URL column detection
export * from './lib/ingest/index.js';

// pa11y invocation
export * from './lib/checker/index.js';

// Batch pipeline and results table
export * from './lib/audit/index.js';

// Pattern analysis
export * from './lib/analysis/index.js';

// Web apps
export * from './lib/server/index.js';

// Version
export const VERSION = '0.1.0';
