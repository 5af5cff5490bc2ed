import fs from 'fs';
import path from 'path';
import { ComparisonReport, ComparisonRow, OptimizerConfig } from '../core/types';
import { ensureDir, writeJSONFile } from '../core/utils';

export const REPORT_CSV = 'rebalancing_comparison_report.csv';
export const NAV_HISTORY_CSV = 'detailed_nav_history.csv';
export const SUMMARY_JSON = 'summary.json';

const REPORT_HEADER = [
  'Frequency',
  'Total Return (%)',
  'Annualized Return (%)',
  'Volatility (%)',
  'Sharpe Ratio',
  'Max Drawdown (%)',
  'Rebalances',
  'Transaction Costs ($)',
  'Transaction Costs (%)',
  'Tracking Error (%)',
  'Final NAV',
  'Days'
];

export const reportRowToCsv = (row: ComparisonRow): string =>
  [
    row.frequency,
    row.totalReturnPct.toFixed(4),
    row.annualizedReturnPct.toFixed(4),
    row.volatilityPct.toFixed(4),
    row.sharpeRatio.toFixed(4),
    row.maxDrawdownPct.toFixed(4),
    String(row.rebalances),
    row.transactionCosts.toFixed(2),
    row.transactionCostsPct.toFixed(4),
    row.trackingErrorPct.toFixed(4),
    row.finalNav.toFixed(2),
    String(row.days)
  ].join(',');

export const buildReportCsv = (report: ComparisonReport): string =>
  [REPORT_HEADER.join(','), ...report.rows.map(reportRowToCsv)].join('\n');

export const buildNavHistoryCsv = (report: ComparisonReport): string => {
  const lines = ['timestamp,nav,cash,frequency'];
  for (const row of report.rows) {
    const result = report.results[row.frequency];
    if (!result) continue;
    for (const p of result.navHistory) {
      lines.push([p.timestamp, p.nav.toFixed(2), p.cash.toFixed(2), row.frequency].join(','));
    }
  }
  return lines.join('\n');
};

export interface ReportSummary {
  generatedAt: string;
  config: Pick<OptimizerConfig, 'initialCapital' | 'transactionCostBps' | 'slippageBps' | 'topN' | 'riskFreeRate' | 'cadences'>;
  rows: ComparisonRow[];
  recommended?: ComparisonRow;
  excluded: ComparisonReport['excluded'];
  flags: ComparisonReport['flags'];
}

export const buildSummary = (report: ComparisonReport, config: OptimizerConfig, now = new Date()): ReportSummary => ({
  generatedAt: now.toISOString(),
  config: {
    initialCapital: config.initialCapital,
    transactionCostBps: config.transactionCostBps,
    slippageBps: config.slippageBps,
    topN: config.topN,
    riskFreeRate: config.riskFreeRate,
    cadences: config.cadences
  },
  rows: report.rows,
  recommended: report.recommended,
  excluded: report.excluded,
  flags: [
    ...report.flags,
    ...Object.values(report.results).flatMap((r) => r.flags.map((f) => ({ ...f, message: `[${r.cadence.label}] ${f.message}` })))
  ]
});

export const writeComparisonArtifacts = (report: ComparisonReport, config: OptimizerConfig, resultsDir: string) => {
  ensureDir(resultsDir);
  const reportPath = path.join(resultsDir, REPORT_CSV);
  const navPath = path.join(resultsDir, NAV_HISTORY_CSV);
  const summaryPath = path.join(resultsDir, SUMMARY_JSON);
  fs.writeFileSync(reportPath, buildReportCsv(report));
  fs.writeFileSync(navPath, buildNavHistoryCsv(report));
  writeJSONFile(summaryPath, buildSummary(report, config));
  return { reportPath, navPath, summaryPath };
};

const usd = (v: number) => `$${Math.round(v).toLocaleString('en-US')}`;

export const formatRecommendation = (row: ComparisonRow): string =>
  [
    `Frequency: ${row.frequency}`,
    `Total Return: ${row.totalReturnPct.toFixed(2)}%`,
    `Annualized Return: ${row.annualizedReturnPct.toFixed(2)}%`,
    `Sharpe Ratio: ${row.sharpeRatio.toFixed(2)}`,
    `Transaction Costs: ${usd(row.transactionCosts)} (${row.transactionCostsPct.toFixed(2)}%)`,
    `Tracking Error: ${row.trackingErrorPct.toFixed(2)}%`,
    `Rebalances: ${row.rebalances}`
  ].join('\n');
