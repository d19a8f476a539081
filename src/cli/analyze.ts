#!/usr/bin/env node
/**
 * CLI: Issue Aggregator app
 *
 * Usage:
 *   analyzer-app [options]
 *
 * Example:
 *   analyzer-app --port 8081
 */

import { resolveConfig } from '../lib/config/index.js';
import { createAnalyzerServer } from '../lib/server/index.js';
import { parseAppArgs } from './args.js';

async function main() {
  const args = parseAppArgs(process.argv.slice(2));

  if (args.help) {
    console.log(`
Accessibility Issue Aggregator - find recurring issues in audit results

Usage:
  npx tsx src/cli/analyze.ts [options]

Options:
  --port      Server port (default: 3848)
  --host      Host to bind (default: localhost)
  --config    Config file (default: ./.a11y-audit.yml when present)
`);
    process.exit(0);
  }

  const config = await resolveConfig(args.config);
  const host = args.host ?? config.analyzer_server.host;
  const port = args.port ?? config.analyzer_server.port;

  console.log('📊 Starting Issue Aggregator...\n');
  console.log(`  Host: ${host}`);
  console.log(`  Port: ${port}\n`);

  const server = createAnalyzerServer({ host, port });
  await server.start();

  process.on('SIGINT', () => {
    console.log('\n\nShutting down...');
    server.stop().then(
      () => process.exit(0),
      error => {
        console.error('❌ Error during shutdown:', error);
        process.exit(1);
      }
    );
  });
}

main().catch(error => {
  console.error('❌ Error:', error instanceof Error ? error.message : error);
  process.exit(1);
});
