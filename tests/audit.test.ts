/**
 * Audit Pipeline and Results Table Tests
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import {
  runAudit,
  checkUrl,
  buildResultsTable,
  summarizeResults,
  resultsTableToCsv,
  readResultsTable,
  RESULT_COLUMNS,
} from '../src/lib/audit/index.js';
import { Pa11yChecker, type Checker, type CheckIssue, type CheckResult } from '../src/lib/checker/index.js';
import { EmptyInputError, InputFormatError } from '../src/lib/errors/index.js';
import { fakeExecutor, output, pa11yIssue, pa11yOutput, sleep } from './fakes.js';

const HEADER = RESULT_COLUMNS.join(',');

function issue(message: string, code: string, type: CheckIssue['type'] = 'error', selector = 'body'): CheckIssue {
  return { code, type, message, selector, context: '' };
}

function passed(url: string, issues: CheckIssue[] = []): CheckResult {
  return { url, issueCount: issues.length, issues, durationMs: 10 };
}

/**
 * Checker that answers from a table after a per-URL delay.
 */
function scriptedChecker(script: Record<string, { delay: number; issues?: CheckIssue[]; error?: Error }>): Checker {
  return {
    async check(url: string) {
      const step = script[url];
      await sleep(step.delay);
      if (step.error) throw step.error;
      return step.issues ?? [];
    },
  };
}

describe('runAudit', () => {
  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should isolate a timed out URL and keep the rest of the batch', async () => {
    const executor = fakeExecutor({
      'https://a.edu/1': pa11yOutput([
        pa11yIssue('Problem one', 'C.1'),
        pa11yIssue('Problem two', 'C.2'),
        pa11yIssue('Problem three', 'C.3', 'warning'),
      ]),
      'https://a.edu/2': output({ exitCode: null, timedOut: true }),
    });

    const results = await runAudit(['https://a.edu/1', 'https://a.edu/2'], {
      checker: new Pa11yChecker({ executor }),
    });
    const table = buildResultsTable(results);

    expect(results[0].issueCount).toBe(3);
    expect(results[1].failure).toEqual({ kind: 'timeout', message: 'Timed out after 35 seconds' });
    expect(table.rows).toHaveLength(4);
    expect(table.rows.filter(r => r.url === 'https://a.edu/1' && !r.failed)).toHaveLength(3);
    expect(table.rows[3]).toMatchObject({ url: 'https://a.edu/2', failed: true, issueCount: 0 });
  });

  it('should keep input order when later URLs finish first', async () => {
    const checker = scriptedChecker({
      'https://slow.org/': { delay: 30, issues: [issue('Slow issue', 'S')] },
      'https://mid.org/': { delay: 15 },
      'https://fast.org/': { delay: 1, issues: [issue('Fast issue', 'F')] },
    });
    const urls = ['https://slow.org/', 'https://mid.org/', 'https://fast.org/'];

    const first = await runAudit(urls, { checker, concurrency: 3 });
    const second = await runAudit(urls, { checker, concurrency: 3 });

    expect(first.map(r => r.url)).toEqual(urls);
    expect(resultsTableToCsv(buildResultsTable(second))).toBe(resultsTableToCsv(buildResultsTable(first)));
  });

  it('should record unexpected errors as failures of kind unknown', async () => {
    const checker = scriptedChecker({
      'https://a.org/': { delay: 0, error: new Error('boom') },
      'https://b.org/': { delay: 0 },
    });

    const results = await runAudit(['https://a.org/', 'https://b.org/'], { checker });

    expect(results[0].failure).toEqual({ kind: 'unknown', message: 'boom' });
    expect(results[1].failure).toBeUndefined();
  });

  it('should report progress for every URL', async () => {
    const checker = scriptedChecker({
      'https://a.org/': { delay: 0 },
      'https://b.org/': { delay: 0 },
    });
    const completed: number[] = [];

    await runAudit(['https://a.org/', 'https://b.org/'], {
      checker,
      concurrency: 1,
      onProgress: progress => completed.push(progress.completed),
    });

    expect(completed).toEqual([1, 2]);
  });

  it('should mark unstarted URLs as cancelled after abort', async () => {
    const controller = new AbortController();
    const checker: Checker = {
      async check() {
        controller.abort();
        return [];
      },
    };

    const results = await runAudit(['https://a.org/', 'https://b.org/', 'https://c.org/'], {
      checker,
      concurrency: 1,
      signal: controller.signal,
    });

    expect(results.map(r => r.failure?.kind)).toEqual([undefined, 'cancelled', 'cancelled']);
    expect(results.map(r => r.url)).toEqual(['https://a.org/', 'https://b.org/', 'https://c.org/']);
  });

  it('should return frozen results', async () => {
    const result = await checkUrl(scriptedChecker({ 'https://a.org/': { delay: 0 } }), 'https://a.org/');

    expect(Object.isFrozen(result)).toBe(true);
    expect(Object.isFrozen(result.issues)).toBe(true);
  });
});

describe('buildResultsTable', () => {
  it('should write one row per issue, one for a clean URL and one for a failure', () => {
    const table = buildResultsTable([
      passed('https://clean.org/'),
      passed('https://issues.org/', [issue('Missing alt', 'H37', 'error', 'img'), issue('Low contrast', 'G18', 'warning', 'p')]),
      { url: 'https://down.org/', issueCount: 0, issues: [], failure: { kind: 'exit', message: 'pa11y exited with code 1: Error' }, durationMs: 3 },
    ]);

    expect(table.rows).toEqual([
      { url: 'https://clean.org/', issueCount: 0, issueMessage: '', issueCode: '', issueSeverity: '', issueSelector: '', failed: false, failureReason: '' },
      { url: 'https://issues.org/', issueCount: 2, issueMessage: 'Missing alt', issueCode: 'H37', issueSeverity: 'error', issueSelector: 'img', failed: false, failureReason: '' },
      { url: 'https://issues.org/', issueCount: 2, issueMessage: 'Low contrast', issueCode: 'G18', issueSeverity: 'warning', issueSelector: 'p', failed: false, failureReason: '' },
      { url: 'https://down.org/', issueCount: 0, issueMessage: '', issueCode: '', issueSeverity: '', issueSelector: '', failed: true, failureReason: 'pa11y exited with code 1: Error' },
    ]);
  });
});

describe('summarizeResults', () => {
  it('should count issues, clean and failed URLs', () => {
    const summary = summarizeResults([
      passed('https://clean.org/'),
      passed('https://issues.org/', [issue('a', 'A'), issue('b', 'B', 'notice')]),
      { url: 'https://down.org/', issueCount: 0, issues: [], failure: { kind: 'timeout', message: 'Timed out' }, durationMs: 1 },
    ]);

    expect(summary).toEqual({
      totalUrls: 3,
      checkedUrls: 2,
      urlsWithIssues: 1,
      cleanUrls: 1,
      failedUrls: 1,
      totalIssues: 2,
      bySeverity: { error: 1, warning: 0, notice: 1 },
    });
  });
});

describe('resultsTableToCsv', () => {
  it('should write the fixed column header and one line per row', () => {
    const csv = resultsTableToCsv(buildResultsTable([
      passed('https://clean.org/'),
      passed('https://issues.org/', [issue('Img element missing an alt attribute.', 'WCAG2AA.H37', 'error', 'img')]),
      { url: 'https://down.org/', issueCount: 0, issues: [], failure: { kind: 'timeout', message: 'Timed out after 35 seconds' }, durationMs: 1 },
    ]));

    expect(csv).toBe(
      'URL,IssueCount,IssueMessage,IssueCode,IssueSeverity,IssueSelector,Failed,FailureReason\n' +
      'https://clean.org/,0,,,,,false,\n' +
      'https://issues.org/,1,Img element missing an alt attribute.,WCAG2AA.H37,error,img,false,\n' +
      'https://down.org/,0,,,,,true,Timed out after 35 seconds\n'
    );
  });

  it('should quote messages containing commas', () => {
    const csv = resultsTableToCsv(buildResultsTable([
      passed('https://a.org/', [issue('Expected 4.5:1, got 2:1', 'G18', 'error', 'p')]),
    ]));

    expect(csv.split('\n')[1]).toBe('https://a.org/,1,"Expected 4.5:1, got 2:1",G18,error,p,false,');
  });
});

describe('readResultsTable', () => {
  it('should read back a downloaded table', () => {
    const table = buildResultsTable([
      passed('https://issues.org/', [issue('Low contrast, see ratio', 'G18', 'warning', 'p')]),
      { url: 'https://down.org/', issueCount: 0, issues: [], failure: { kind: 'timeout', message: 'Timed out' }, durationMs: 1 },
    ]);

    expect(readResultsTable(resultsTableToCsv(table))).toEqual(table);
  });

  it('should accept a table without optional columns', () => {
    const table = readResultsTable('URL,IssueCount,IssueMessage,IssueCode\nhttps://a.org/,1,Missing alt,H37\n');

    expect(table.rows).toEqual([
      { url: 'https://a.org/', issueCount: 1, issueMessage: 'Missing alt', issueCode: 'H37', issueSeverity: '', issueSelector: '', failed: false, failureReason: '' },
    ]);
  });

  it('should reject a table without the required columns', () => {
    expect(() => readResultsTable('URL,pa11y_errors\nhttps://a.org/,2\n')).toThrow(InputFormatError);
    expect(() => readResultsTable('URL,pa11y_errors\nhttps://a.org/,2\n')).toThrow(
      'Results file is missing required column(s): IssueCount, IssueMessage, IssueCode. Upload a file downloaded from the audit app.'
    );
  });

  it('should reject a header-only table', () => {
    expect(() => readResultsTable(`${HEADER}\n`)).toThrow(EmptyInputError);
  });
});
