import fs from 'fs';
import os from 'os';
import path from 'path';
import { ReplySink, escapeHtml, handleReportPage, handleSummary, renderRows } from '../src/ui/routes';
import { ReportSummary, SUMMARY_JSON } from '../src/reporting/reportWriter';

class FakeReply implements ReplySink {
  statusCode = 0;
  jsonBody: unknown;
  textBody = '';

  status(code: number) {
    this.statusCode = code;
    return this;
  }

  json(body: unknown) {
    this.jsonBody = body;
    return this;
  }

  send(body: string) {
    this.textBody = body;
    return this;
  }
}

const summary: ReportSummary = {
  generatedAt: '2025-06-01T12:00:00.000Z',
  config: { initialCapital: 1_000_000, transactionCostBps: 10, slippageBps: 5, topN: 20, riskFreeRate: 0.05, cadences: { '1d': 24 } },
  rows: [
    {
      frequency: '1d',
      cadenceHours: 24,
      totalReturnPct: 4.5,
      annualizedReturnPct: 60,
      volatilityPct: 40,
      sharpeRatio: 1.375,
      maxDrawdownPct: -8,
      rebalances: 30,
      transactionCosts: 2400.4,
      transactionCostsPct: 0.24,
      trackingErrorPct: 1.1,
      finalNav: 1_045_000,
      days: 30
    },
    {
      frequency: 'continuous',
      cadenceHours: 0,
      totalReturnPct: 4,
      annualizedReturnPct: 50,
      volatilityPct: 41,
      sharpeRatio: 1.1,
      maxDrawdownPct: -9,
      rebalances: 720,
      transactionCosts: 0,
      transactionCostsPct: 0,
      trackingErrorPct: 0,
      finalNav: 1_040_000,
      days: 30
    }
  ],
  excluded: [],
  flags: [{ code: 'MISSING_PRICE', severity: 'warn', message: '[1d] missing' }]
};
summary.recommended = summary.rows[0];

describe('report UI routes', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'ui-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('answers 404 before any report exists', () => {
    const api = new FakeReply();
    handleSummary(dir)({}, api);
    expect(api.statusCode).toBe(404);
    expect(api.jsonBody).toEqual({ error: 'No report has been written yet' });

    const page = new FakeReply();
    handleReportPage(dir)({}, page);
    expect(page.statusCode).toBe(404);
    expect(page.textBody).toContain('<h1>No report yet</h1>');
  });

  it('serves the stored summary and renders the table', () => {
    fs.writeFileSync(path.join(dir, SUMMARY_JSON), JSON.stringify(summary));

    const api = new FakeReply();
    handleSummary(dir)({}, api);
    expect(api.statusCode).toBe(200);
    expect(api.jsonBody).toEqual(summary);

    const page = new FakeReply();
    handleReportPage(dir)({}, page);
    expect(page.statusCode).toBe(200);
    expect(page.textBody).toContain('Recommended cadence: <strong>1d</strong>');
    expect(page.textBody).toContain('<p>1 data-quality flag(s), 0 excluded cadence(s).');
    expect(page.textBody).not.toContain('{{');
  });

  it('rejects a summary file of the wrong shape', () => {
    fs.writeFileSync(path.join(dir, SUMMARY_JSON), JSON.stringify({ rows: 'nope' }));
    expect(() => handleSummary(dir)({}, new FakeReply())).toThrow(/Invalid report summary/);
  });
});

describe('renderRows', () => {
  it('highlights the recommended cadence', () => {
    const [first, second] = renderRows(summary).split('\n');
    expect(first).toBe(
      '<tr class="recommended"><td>1d</td><td>4.50%</td><td>60.00%</td><td>40.00%</td><td>1.38</td>' +
        '<td>-8.00%</td><td>30</td><td>2400</td><td>1.10%</td></tr>'
    );
    expect(second.startsWith('<tr><td>continuous</td>')).toBe(true);
  });
});

describe('escapeHtml', () => {
  it('escapes markup characters', () => {
    expect(escapeHtml('<a href="x">&</a>')).toBe('&lt;a href=&quot;x&quot;&gt;&amp;&lt;/a&gt;');
  });
});
