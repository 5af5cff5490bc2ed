import express from 'express';
import fs from 'fs';
import path from 'path';
import { ReportSummary, SUMMARY_JSON } from '../reporting/reportWriter';
import { reportSummarySchema } from '../core/schema';

// Templates stay in src/; compiled code under dist/ui resolves to the same place.
const viewDir = path.resolve(__dirname, '..', '..', 'src', 'ui', 'views');

export interface ReplySink {
  status(code: number): ReplySink;
  json(body: unknown): unknown;
  send(body: string): unknown;
}

export const renderTemplate = (templateName: string, vars: Record<string, string>) => {
  const layout = fs.readFileSync(path.join(viewDir, 'layout.html'), 'utf-8');
  const bodyTemplate = fs.readFileSync(path.join(viewDir, `${templateName}.html`), 'utf-8');
  const fill = (input: string) => input.replace(/{{\s*(\w+)\s*}}/g, (_match, key: string) => vars[key] ?? '');
  return layout.replace('{{content}}', () => fill(bodyTemplate));
};

export const escapeHtml = (val: string) =>
  val.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;').replace(/"/g, '&quot;');

const pct = (v: number) => `${v.toFixed(2)}%`;

export const readSummary = (resultsDir: string): ReportSummary | undefined => {
  const file = path.join(resultsDir, SUMMARY_JSON);
  if (!fs.existsSync(file)) return undefined;
  const parsed = reportSummarySchema.safeParse(JSON.parse(fs.readFileSync(file, 'utf-8')));
  if (!parsed.success) {
    const errors = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    throw new Error(`Invalid report summary ${file}: ${errors.join('; ')}`);
  }
  return parsed.data;
};

export const renderRows = (summary: ReportSummary): string =>
  summary.rows
    .map((r) => {
      const cls = summary.recommended?.frequency === r.frequency ? ' class="recommended"' : '';
      return [
        `<tr${cls}>`,
        `<td>${escapeHtml(r.frequency)}</td>`,
        `<td>${pct(r.totalReturnPct)}</td>`,
        `<td>${pct(r.annualizedReturnPct)}</td>`,
        `<td>${pct(r.volatilityPct)}</td>`,
        `<td>${r.sharpeRatio.toFixed(2)}</td>`,
        `<td>${pct(r.maxDrawdownPct)}</td>`,
        `<td>${r.rebalances}</td>`,
        `<td>${r.transactionCosts.toFixed(0)}</td>`,
        `<td>${pct(r.trackingErrorPct)}</td>`,
        '</tr>'
      ].join('');
    })
    .join('\n');

export const handleSummary = (resultsDir: string) => (_req: unknown, res: ReplySink) => {
  const summary = readSummary(resultsDir);
  if (!summary) {
    res.status(404).json({ error: 'No report has been written yet' });
    return;
  }
  res.status(200).json(summary);
};

export const handleReportPage = (resultsDir: string) => (_req: unknown, res: ReplySink) => {
  const summary = readSummary(resultsDir);
  if (!summary) {
    res.status(404).send(renderTemplate('empty', { resultsDir: escapeHtml(resultsDir) }));
    return;
  }
  res.status(200).send(
    renderTemplate('report', {
      generatedAt: escapeHtml(summary.generatedAt),
      recommended: summary.recommended ? escapeHtml(summary.recommended.frequency) : 'none',
      rows: renderRows(summary),
      flagCount: String(summary.flags.length),
      excludedCount: String(summary.excluded.length)
    })
  );
};

export const registerRoutes = (app: express.Application, options: { resultsDir: string }) => {
  const summary = handleSummary(options.resultsDir);
  const page = handleReportPage(options.resultsDir);
  app.get('/api/summary', (req, res) => summary(req, res));
  app.get('/', (req, res) => page(req, res));
  app.use('/results', express.static(options.resultsDir));
};
