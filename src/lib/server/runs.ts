/**
 * Audit Run Store
 *
 * Holds each run's context in memory: the URL list, progress, and results
 * once finished. Nothing is shared between runs.
 */

import { randomUUID } from 'crypto';
import type { ColumnResolution, SkippedEntry, UrlList } from '../ingest/index.js';
import type { CheckResult } from '../checker/index.js';
import type { AuditSummary, ResultsTable, ResultRow } from '../audit/index.js';

export type RunStatus = 'running' | 'done' | 'cancelled' | 'error';

export interface AuditRun {
  id: string;
  status: RunStatus;
  column: ColumnResolution;
  urls: string[];
  skipped: SkippedEntry[];
  completed: number;
  total: number;
  createdAt: string;
  updatedAt: string;
  results?: CheckResult[];
  table?: ResultsTable;
  summary?: AuditSummary;
  error?: string;
}

/**
 * What the API returns for a run
 */
export interface RunSnapshot {
  id: string;
  status: RunStatus;
  column: ColumnResolution;
  skipped: SkippedEntry[];
  progress: { completed: number; total: number };
  createdAt: string;
  updatedAt: string;
  summary?: AuditSummary;
  rows?: ResultRow[];
  error?: string;
}

const MAX_RUNS = 20;

export class RunStore {
  private runs = new Map<string, { run: AuditRun; controller: AbortController }>();

  create(list: UrlList): AuditRun {
    const now = new Date().toISOString();
    const run: AuditRun = {
      id: randomUUID(),
      status: 'running',
      column: list.column,
      urls: list.urls,
      skipped: list.skipped,
      completed: 0,
      total: list.urls.length,
      createdAt: now,
      updatedAt: now,
    };
    this.runs.set(run.id, { run, controller: new AbortController() });
    this.prune();
    return run;
  }

  get(id: string): AuditRun | undefined {
    return this.runs.get(id)?.run;
  }

  signal(id: string): AbortSignal | undefined {
    return this.runs.get(id)?.controller.signal;
  }

  update(id: string, patch: Partial<Omit<AuditRun, 'id'>>): AuditRun | undefined {
    const entry = this.runs.get(id);
    if (!entry) return undefined;
    entry.run = { ...entry.run, ...patch, updatedAt: new Date().toISOString() };
    return entry.run;
  }

  /**
   * Abort a running run. Returns false when there is nothing to cancel.
   */
  cancel(id: string): boolean {
    const entry = this.runs.get(id);
    if (!entry || entry.run.status !== 'running') return false;
    entry.controller.abort();
    return true;
  }

  cancelAll(): void {
    for (const { run, controller } of this.runs.values()) {
      if (run.status === 'running') controller.abort();
    }
  }

  snapshot(run: AuditRun): RunSnapshot {
    return {
      id: run.id,
      status: run.status,
      column: run.column,
      skipped: run.skipped,
      progress: { completed: run.completed, total: run.total },
      createdAt: run.createdAt,
      updatedAt: run.updatedAt,
      summary: run.summary,
      rows: run.table?.rows,
      error: run.error,
    };
  }

  // Oldest finished runs go first; running ones are kept
  private prune(): void {
    for (const [id, { run }] of this.runs) {
      if (this.runs.size <= MAX_RUNS) return;
      if (run.status !== 'running') this.runs.delete(id);
    }
  }
}
