/**
 * Analyzer App Server
 *
 * Upload a results CSV and get back the issue patterns, page priorities and
 * their CSV exports.
 */

import type { IncomingMessage, ServerResponse } from 'http';
import { WebApp } from './base.js';
import { renderAnalyzerPage } from './pages.js';
import { DEFAULT_CONFIG, type ServerSettings } from '../config/index.js';
import { readResultsTable } from '../audit/index.js';
import { analyzeResults, patternsToCsv, prioritiesToCsv, detailsToCsv } from '../analysis/index.js';

export type AnalyzerServerConfig = Partial<ServerSettings>;

export class AnalyzerServer extends WebApp {
  constructor(config: AnalyzerServerConfig = {}) {
    super(
      {
        host: config.host ?? DEFAULT_CONFIG.analyzer_server.host,
        port: config.port ?? DEFAULT_CONFIG.analyzer_server.port,
      },
      'Accessibility Issue Aggregator'
    );
  }

  protected async route(req: IncomingMessage, res: ServerResponse, url: URL): Promise<boolean> {
    const method = req.method || 'GET';

    if (method === 'GET' && (url.pathname === '/' || url.pathname === '/index.html')) {
      this.sendHtml(res, renderAnalyzerPage());
      return true;
    }

    if (method === 'POST' && url.pathname === '/api/analysis') {
      const table = readResultsTable(await this.readBody(req));
      const report = analyzeResults(table.rows);
      console.log(
        `[Analyzer] ${report.summary.totalRows} row(s): ${report.summary.totalIssues} issue(s), ` +
        `${report.summary.uniqueIssueTypes} type(s)`
      );

      this.sendJson(res, 200, {
        report,
        exports: {
          patterns: patternsToCsv(report.patterns),
          priorities: prioritiesToCsv(report.priorities),
          details: detailsToCsv(report.details),
        },
      });
      return true;
    }

    return false;
  }
}

export function createAnalyzerServer(config?: AnalyzerServerConfig): AnalyzerServer {
  return new AnalyzerServer(config);
}
