#!/usr/bin/env node
/**
 * CLI: Accessibility Checker app
 *
 * Usage:
 *   audit-app [options]
 *
 * Example:
 *   audit-app --port 8080 --config ./.a11y-audit.yml
 */

import { resolveConfig } from '../lib/config/index.js';
import { createAuditServer } from '../lib/server/index.js';
import { ToolNotFoundError } from '../lib/errors/index.js';
import { parseAppArgs } from './args.js';

async function main() {
  const args = parseAppArgs(process.argv.slice(2));

  if (args.help) {
    console.log(`
Accessibility Checker - run pa11y over a CSV of URLs

Usage:
  npx tsx src/cli/audit.ts [options]

Options:
  --port      Server port (default: 3847)
  --host      Host to bind (default: localhost)
  --config    Config file (default: ./.a11y-audit.yml when present)

Requires pa11y on PATH:
  npm install -g pa11y
`);
    process.exit(0);
  }

  const config = await resolveConfig(args.config);
  const host = args.host ?? config.audit_server.host;
  const port = args.port ?? config.audit_server.port;

  console.log('♿ Starting Accessibility Checker...\n');
  console.log(`  Checker: ${config.checker.command} (${config.checker.standard})`);
  console.log(`  Timeout: ${config.checker.timeout_ms}ms per URL`);
  console.log(`  Concurrency: ${config.checker.concurrency}`);
  console.log(`  Host: ${host}`);
  console.log(`  Port: ${port}\n`);

  const server = createAuditServer({
    host,
    port,
    checker: config.checker,
    urlHeaders: config.ingestion.url_headers,
  });

  try {
    await server.start();
  } catch (error) {
    if (error instanceof ToolNotFoundError) {
      console.error(`❌ ${error.message}`);
      console.error(`   ${error.remediation}`);
      process.exit(1);
    }
    throw error;
  }

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
