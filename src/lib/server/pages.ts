/**
 * HTML pages for the two apps. Each page is static markup plus a small
 * inline script that talks to the JSON API.
 */

import type { CheckerInfo } from '../checker/index.js';

export function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

const STYLES = `
    * { box-sizing: border-box; margin: 0; padding: 0; }
    body {
      font-family: -apple-system, BlinkMacSystemFont, 'Segoe UI', Roboto, sans-serif;
      background: linear-gradient(135deg, #1a1a2e 0%, #16213e 100%);
      color: #fff;
      min-height: 100vh;
    }
    .container { max-width: 1100px; margin: 0 auto; padding: 40px 20px; }
    header { text-align: center; margin-bottom: 30px; }
    h1 { font-size: 34px; margin-bottom: 10px; }
    .subtitle { opacity: 0.7; font-size: 17px; }
    .badge { display: inline-block; margin-top: 12px; padding: 5px 12px; border-radius: 6px; background: rgba(34,197,94,0.2); font-size: 13px; }
    .section { background: rgba(255,255,255,0.05); border-radius: 12px; padding: 25px; margin-bottom: 20px; }
    .section h2 { font-size: 20px; margin-bottom: 16px; padding-bottom: 12px; border-bottom: 1px solid rgba(255,255,255,0.1); }
    .stats { display: grid; grid-template-columns: repeat(auto-fit, minmax(160px, 1fr)); gap: 16px; margin-bottom: 20px; }
    .stat { background: rgba(255,255,255,0.1); padding: 20px; border-radius: 12px; text-align: center; }
    .stat-value { font-size: 30px; font-weight: bold; }
    .stat-label { opacity: 0.7; font-size: 13px; margin-top: 5px; }
    label { display: block; margin: 10px 0 6px; font-size: 14px; opacity: 0.8; }
    input[type=text] { padding: 8px 10px; border-radius: 6px; border: none; width: 260px; }
    .btn {
      display: inline-block;
      margin-top: 16px;
      padding: 10px 22px;
      background: #6366f1;
      color: white;
      border: none;
      text-decoration: none;
      border-radius: 8px;
      font-weight: 500;
      cursor: pointer;
    }
    .btn:hover { background: #4f46e5; }
    .btn.secondary { background: rgba(255,255,255,0.15); }
    .error { color: #fca5a5; margin-top: 12px; }
    .hidden { display: none; }
    table { width: 100%; border-collapse: collapse; font-size: 13px; }
    th, td { text-align: left; padding: 8px; border-bottom: 1px solid rgba(255,255,255,0.1); vertical-align: top; }
    th { opacity: 0.7; font-weight: 500; }
    tr.failed td { color: #fca5a5; }
    progress { width: 100%; height: 14px; }
    ul.fixes { margin: 8px 0 16px 20px; }
    select { width: 100%; padding: 8px; border-radius: 8px; margin: 8px 0; }
    .sample { font-family: monospace; font-size: 12px; opacity: 0.85; }
`;

function layout(title: string, subtitle: string, badge: string, body: string, script: string): string {
  return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="UTF-8">
  <meta name="viewport" content="width=device-width, initial-scale=1.0">
  <title>${escapeHtml(title)}</title>
  <style>${STYLES}</style>
</head>
<body>
  <div class="container">
    <header>
      <h1>${escapeHtml(title)}</h1>
      <p class="subtitle">${escapeHtml(subtitle)}</p>
      ${badge}
    </header>
${body}
  </div>
  <script>
${CLIENT_HELPERS}
${script}
  </script>
</body>
</html>`;
}

// Shared browser-side helpers. Plain ES5-ish code, no template literals.
const CLIENT_HELPERS = `
    function el(tag, text, className) {
      var node = document.createElement(tag);
      if (text !== undefined && text !== null) node.textContent = String(text);
      if (className) node.className = className;
      return node;
    }
    function renderTable(target, columns, rows, rowClass) {
      target.innerHTML = '';
      var table = el('table');
      var head = el('tr');
      columns.forEach(function (c) { head.appendChild(el('th', c.label)); });
      table.appendChild(head);
      rows.forEach(function (row) {
        var tr = el('tr', null, rowClass ? rowClass(row) : '');
        columns.forEach(function (c) { tr.appendChild(el('td', c.value(row))); });
        table.appendChild(tr);
      });
      target.appendChild(table);
    }
    function renderStats(target, stats) {
      target.innerHTML = '';
      stats.forEach(function (s) {
        var box = el('div', null, 'stat');
        box.appendChild(el('div', s[1], 'stat-value'));
        box.appendChild(el('div', s[0], 'stat-label'));
        target.appendChild(box);
      });
    }
    function download(name, text) {
      var blob = new Blob([text], { type: 'text/csv' });
      var a = document.createElement('a');
      a.href = URL.createObjectURL(blob);
      a.download = name;
      a.click();
      URL.revokeObjectURL(a.href);
    }
    function showError(message) {
      var box = document.getElementById('error');
      box.textContent = message || '';
    }
`;

// ============================================================================
// Audit app
// ============================================================================

export function renderAuditPage(checker: CheckerInfo): string {
  const badge = `<div class="badge">✅ ${escapeHtml(checker.command)} ${escapeHtml(checker.version)} is installed and ready</div>`;

  const body = `
    <div class="section">
      <h2>📤 Upload URLs</h2>
      <form id="upload">
        <label for="file">CSV file with a column of URLs</label>
        <input id="file" type="file" accept=".csv,text/csv" required>
        <label for="column">URL column (optional, detected when empty)</label>
        <input id="column" type="text" placeholder="url">
        <div><button class="btn" type="submit">Start accessibility audit</button></div>
      </form>
      <div id="error" class="error"></div>
    </div>

    <div id="progress-section" class="section hidden">
      <h2>⏳ Progress</h2>
      <p id="status"></p>
      <progress id="progress" value="0" max="1"></progress>
      <div><button id="cancel" class="btn secondary" type="button">Cancel run</button></div>
    </div>

    <div id="results-section" class="section hidden">
      <h2>📊 Results</h2>
      <div id="stats" class="stats"></div>
      <a id="download" class="btn" href="#">📥 Download results as CSV</a>
      <div id="results" style="margin-top: 20px;"></div>
    </div>`;

  const script = `
    var runId = null;
    var form = document.getElementById('upload');

    form.addEventListener('submit', function (event) {
      event.preventDefault();
      showError('');
      var file = document.getElementById('file').files[0];
      if (!file) return;
      var column = document.getElementById('column').value.trim();
      var query = column ? '?column=' + encodeURIComponent(column) : '';
      file.text().then(function (text) {
        return fetch('/api/audits' + query, { method: 'POST', headers: { 'Content-Type': 'text/csv' }, body: text });
      }).then(function (res) {
        return res.json().then(function (body) {
          if (!res.ok) throw new Error(body.error || 'Upload failed');
          runId = body.id;
          document.getElementById('results-section').classList.add('hidden');
          document.getElementById('progress-section').classList.remove('hidden');
          update(body);
          poll();
        });
      }).catch(function (err) { showError(err.message); });
    });

    document.getElementById('cancel').addEventListener('click', function () {
      if (runId) fetch('/api/audits/' + runId + '/cancel', { method: 'POST' });
    });

    function poll() {
      fetch('/api/audits/' + runId).then(function (res) { return res.json(); }).then(function (run) {
        update(run);
        if (run.status === 'running') setTimeout(poll, 1000);
      }).catch(function (err) { showError(err.message); });
    }

    function update(run) {
      var p = run.progress;
      document.getElementById('progress').max = p.total;
      document.getElementById('progress').value = p.completed;
      document.getElementById('status').textContent = run.status === 'running'
        ? 'Processed ' + p.completed + ' of ' + p.total + ' URLs'
        : 'Run ' + run.status + (run.error ? ': ' + run.error : '');
      if (run.status === 'running' || !run.summary) return;

      var s = run.summary;
      renderStats(document.getElementById('stats'), [
        ['Total Issues Found', s.totalIssues],
        ['URLs with Issues', s.urlsWithIssues],
        ['Clean URLs', s.cleanUrls],
        ['Failed URLs', s.failedUrls]
      ]);
      document.getElementById('download').href = '/api/audits/' + run.id + '/results.csv';
      renderTable(document.getElementById('results'), [
        { label: 'URL', value: function (r) { return r.url; } },
        { label: 'Issues', value: function (r) { return r.failed ? 'FAILED' : r.issueCount; } },
        { label: 'Severity', value: function (r) { return r.issueSeverity; } },
        { label: 'Message', value: function (r) { return r.failed ? r.failureReason : r.issueMessage; } },
        { label: 'Code', value: function (r) { return r.issueCode; } }
      ], run.rows || [], function (r) { return r.failed ? 'failed' : ''; });
      document.getElementById('results-section').classList.remove('hidden');
    }`;

  return layout(
    '♿ Accessibility Checker',
    'Upload a CSV file with URLs and run pa11y against each of them',
    badge,
    body,
    script
  );
}

// ============================================================================
// Analyzer app
// ============================================================================

export function renderAnalyzerPage(): string {
  const body = `
    <div class="section">
      <h2>📤 Upload Results</h2>
      <form id="upload">
        <label for="file">Results CSV downloaded from the accessibility checker</label>
        <input id="file" type="file" accept=".csv,text/csv" required>
        <div><button class="btn" type="submit">Analyze issues</button></div>
      </form>
      <div id="error" class="error"></div>
    </div>

    <div id="report" class="hidden">
      <div class="section">
        <h2>📈 Summary</h2>
        <div id="stats" class="stats"></div>
        <button id="dl-patterns" class="btn" type="button">📊 Priority issues CSV</button>
        <button id="dl-priorities" class="btn" type="button">📄 Pages CSV</button>
        <button id="dl-details" class="btn" type="button">📋 Detailed breakdown CSV</button>
      </div>
      <div class="section"><h2>🎯 Most Common Issues</h2><div id="patterns"></div></div>
      <div class="section"><h2>🔥 Most Problematic Pages</h2><div id="priorities"></div></div>
      <div class="section"><h2>🧭 Issues by WCAG Category</h2><div id="categories"></div></div>
      <div class="section">
        <h2>🔍 Detailed Issue Breakdown</h2>
        <label for="breakdown-select">Issue type</label>
        <select id="breakdown-select"></select>
        <div id="breakdown"></div>
      </div>
      <div class="section"><h2>💡 Recommendations</h2><div id="recommendations"></div></div>
    </div>`;

  const script = `
    var exportsCsv = null;
    var patterns = [];

    document.getElementById('breakdown-select').addEventListener('change', function (event) {
      renderBreakdown(patterns[Number(event.target.value)]);
    });

    function renderBreakdown(pattern) {
      var target = document.getElementById('breakdown');
      target.innerHTML = '';
      if (!pattern) return;
      target.appendChild(el('p', pattern.category + ': ' + pattern.occurrences + ' occurrences on ' + pattern.affectedUrlCount + ' URLs'));
      target.appendChild(el('h3', 'Affected URLs'));
      var urls = el('ul', null, 'fixes');
      pattern.affectedUrls.forEach(function (u) { urls.appendChild(el('li', u)); });
      target.appendChild(urls);
      if (pattern.samples.length > 0) {
        target.appendChild(el('h3', 'Sample messages'));
        var samples = el('ul', null, 'fixes');
        pattern.samples.forEach(function (m) { samples.appendChild(el('li', m, 'sample')); });
        target.appendChild(samples);
      }
    }

    document.getElementById('upload').addEventListener('submit', function (event) {
      event.preventDefault();
      showError('');
      var file = document.getElementById('file').files[0];
      if (!file) return;
      file.text().then(function (text) {
        return fetch('/api/analysis', { method: 'POST', headers: { 'Content-Type': 'text/csv' }, body: text });
      }).then(function (res) {
        return res.json().then(function (body) {
          if (!res.ok) throw new Error(body.error || 'Analysis failed');
          render(body);
        });
      }).catch(function (err) { showError(err.message); });
    });

    document.getElementById('dl-patterns').addEventListener('click', function () {
      if (exportsCsv) download('accessibility_priority_issues.csv', exportsCsv.patterns);
    });
    document.getElementById('dl-priorities').addEventListener('click', function () {
      if (exportsCsv) download('accessibility_problem_pages.csv', exportsCsv.priorities);
    });
    document.getElementById('dl-details').addEventListener('click', function () {
      if (exportsCsv) download('accessibility_detailed_breakdown.csv', exportsCsv.details);
    });

    function render(body) {
      var report = body.report;
      exportsCsv = body.exports;
      var s = report.summary;
      renderStats(document.getElementById('stats'), [
        ['Total Issues', s.totalIssues],
        ['Unique Issue Types', s.uniqueIssueTypes],
        ['URLs with Issues', s.urlsWithIssues],
        ['Avg Issues per URL', s.averageIssuesPerUrl]
      ]);
      if (s.totalIssues === 0) showError('No accessibility issues found in the uploaded file.');

      renderTable(document.getElementById('patterns'), [
        { label: 'Issue Type', value: function (p) { return p.key; } },
        { label: 'Total Occurrences', value: function (p) { return p.occurrences; } },
        { label: 'URLs Affected', value: function (p) { return p.affectedUrlCount; } },
        { label: 'Impact Score', value: function (p) { return p.impactScore; } },
        { label: 'Category', value: function (p) { return p.category; } }
      ], report.patterns.slice(0, 15));

      renderTable(document.getElementById('priorities'), [
        { label: 'URL', value: function (p) { return p.url; } },
        { label: 'Total Issues', value: function (p) { return p.totalIssues; } }
      ], report.priorities.slice(0, 15));

      renderTable(document.getElementById('categories'), [
        { label: 'Category', value: function (c) { return c.category; } },
        { label: 'Issues', value: function (c) { return c.count; } }
      ], report.categories);

      var recs = document.getElementById('recommendations');
      recs.innerHTML = '';
      report.recommendations.forEach(function (r) {
        recs.appendChild(el('h3', r.key));
        recs.appendChild(el('p', 'Affects ' + r.affectedUrlCount + ' URLs with ' + r.occurrences + ' occurrences'));
        var list = el('ul', null, 'fixes');
        r.fixes.forEach(function (f) { list.appendChild(el('li', f)); });
        recs.appendChild(list);
      });

      patterns = report.patterns;
      var select = document.getElementById('breakdown-select');
      select.innerHTML = '';
      patterns.forEach(function (p, i) {
        var option = el('option', p.key + ' (' + p.occurrences + ')');
        option.value = String(i);
        select.appendChild(option);
      });
      renderBreakdown(patterns[0]);

      document.getElementById('report').classList.remove('hidden');
    }`;

  return layout(
    '📊 Accessibility Issue Aggregator',
    'Upload audit results to find and prioritize recurring accessibility issues',
    '',
    body,
    script
  );
}
