/**
 * Audit App Server
 *
 * Upload a CSV of URLs, run the checker over them in the background and
 * serve progress, results and a CSV download.
 */

import type { IncomingMessage, ServerResponse } from 'http';
import { WebApp, HttpError } from './base.js';
import { RunStore } from './runs.js';
import { renderAuditPage } from './pages.js';
import { DEFAULT_CONFIG, type CheckerSettings, type ServerSettings } from '../config/index.js';
import { readUrlList } from '../ingest/index.js';
import {
  Pa11yChecker,
  resolveChecker,
  execFileExecutor,
  type CheckerInfo,
  type ProcessExecutor,
} from '../checker/index.js';
import { runAudit, buildResultsTable, summarizeResults, resultsTableToCsv } from '../audit/index.js';

// ============================================================================
// Types
// ============================================================================

export interface AuditServerConfig extends Partial<ServerSettings> {
  checker?: Partial<CheckerSettings>;
  urlHeaders?: string[];
  /** Process launcher; replaced with a fake in tests */
  executor?: ProcessExecutor;
}

const RUN_PATH = /^\/api\/audits\/([0-9a-f-]+)$/;
const CANCEL_PATH = /^\/api\/audits\/([0-9a-f-]+)\/cancel$/;
const CSV_PATH = /^\/api\/audits\/([0-9a-f-]+)\/results\.csv$/;

// ============================================================================
// Audit Server
// ============================================================================

export class AuditServer extends WebApp {
  private settings: CheckerSettings;
  private urlHeaders: string[];
  private executor: ProcessExecutor;
  private checker: Pa11yChecker;
  private checkerInfo: CheckerInfo | null = null;
  private runs = new RunStore();
  private pending = new Set<Promise<void>>();

  constructor(config: AuditServerConfig = {}) {
    super(
      {
        host: config.host ?? DEFAULT_CONFIG.audit_server.host,
        port: config.port ?? DEFAULT_CONFIG.audit_server.port,
      },
      'Accessibility Checker'
    );
    this.settings = { ...DEFAULT_CONFIG.checker, ...config.checker };
    this.urlHeaders = config.urlHeaders ?? DEFAULT_CONFIG.ingestion.url_headers;
    this.executor = config.executor ?? execFileExecutor;
    this.checker = new Pa11yChecker({ ...this.settings, executor: this.executor });
  }

  /**
   * Confirm the checker is installed, then listen. Throws ToolNotFoundError
   * without opening the port when it is missing.
   */
  override async start(): Promise<void> {
    this.checkerInfo = await resolveChecker(this.settings.command, this.executor);
    console.log(`[Audit] Using ${this.checkerInfo.command} ${this.checkerInfo.version}`);
    await super.start();
  }

  /**
   * Cancel running audits, wait for them to settle, then close.
   */
  override async stop(): Promise<void> {
    this.runs.cancelAll();
    await Promise.all([...this.pending]);
    await super.stop();
  }

  protected async route(req: IncomingMessage, res: ServerResponse, url: URL): Promise<boolean> {
    const method = req.method || 'GET';
    const path = url.pathname;

    if (method === 'GET' && (path === '/' || path === '/index.html')) {
      this.sendHtml(res, renderAuditPage(this.requireCheckerInfo()));
      return true;
    }

    if (method === 'GET' && path === '/api/health') {
      this.sendJson(res, 200, { status: 'ok', checker: this.requireCheckerInfo() });
      return true;
    }

    if (method === 'POST' && path === '/api/audits') {
      await this.handleStartRun(req, res, url);
      return true;
    }

    let match = RUN_PATH.exec(path);
    if (method === 'GET' && match) {
      const run = this.requireRun(match[1]);
      this.sendJson(res, 200, this.runs.snapshot(run));
      return true;
    }

    match = CANCEL_PATH.exec(path);
    if (method === 'POST' && match) {
      const run = this.requireRun(match[1]);
      const cancelled = this.runs.cancel(run.id);
      this.sendJson(res, cancelled ? 202 : 409, {
        id: run.id,
        cancelled,
        status: run.status,
      });
      return true;
    }

    match = CSV_PATH.exec(path);
    if (method === 'GET' && match) {
      const run = this.requireRun(match[1]);
      if (!run.table) {
        throw new HttpError(409, 'Results are not available until the run has finished');
      }
      const stamp = Math.floor(new Date(run.updatedAt).getTime() / 1000);
      this.sendCsv(res, `pa11y_results_${stamp}.csv`, resultsTableToCsv(run.table));
      return true;
    }

    return false;
  }

  // --------------------------------------------------------------------------
  // Runs
  // --------------------------------------------------------------------------

  private async handleStartRun(req: IncomingMessage, res: ServerResponse, url: URL): Promise<void> {
    const body = await this.readBody(req);
    const column = url.searchParams.get('column')?.trim() || undefined;

    // Input errors surface here, before any checker is launched
    const list = readUrlList(body, { column, urlHeaders: this.urlHeaders });
    const run = this.runs.create(list);

    const task = this.execute(run.id, list.urls).catch(error => {
      console.error(`[Audit] Run ${run.id} failed:`, error);
      this.runs.update(run.id, {
        status: 'error',
        error: error instanceof Error ? error.message : String(error),
      });
    });
    this.pending.add(task);
    void task.finally(() => this.pending.delete(task));

    this.sendJson(res, 202, this.runs.snapshot(run));
  }

  private async execute(id: string, urls: string[]): Promise<void> {
    const signal = this.runs.signal(id);
    console.log(`[Audit] Run ${id}: checking ${urls.length} URL(s) with concurrency ${this.settings.concurrency}`);

    const results = await runAudit(urls, {
      checker: this.checker,
      concurrency: this.settings.concurrency,
      signal,
      onProgress: ({ completed }) => {
        this.runs.update(id, { completed });
      },
    });

    const summary = summarizeResults(results);
    this.runs.update(id, {
      status: signal?.aborted ? 'cancelled' : 'done',
      completed: results.length,
      results,
      table: buildResultsTable(results),
      summary,
    });

    console.log(
      `[Audit] Run ${id} ${signal?.aborted ? 'cancelled' : 'complete'}: ` +
      `${summary.totalIssues} issue(s), ${summary.failedUrls} failed URL(s)`
    );
  }

  private requireRun(id: string) {
    const run = this.runs.get(id);
    if (!run) throw new HttpError(404, `Unknown audit run: ${id}`);
    return run;
  }

  private requireCheckerInfo(): CheckerInfo {
    if (!this.checkerInfo) throw new HttpError(503, 'Checker has not been resolved yet');
    return this.checkerInfo;
  }
}

// ============================================================================
// Factory
// ============================================================================

export function createAuditServer(config?: AuditServerConfig): AuditServer {
  return new AuditServer(config);
}
