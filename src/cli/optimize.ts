#!/usr/bin/env node
/* eslint-disable no-console */
import 'dotenv/config';
import { Command } from 'commander';
import path from 'path';
import { OptimizerConfig, SnapshotTable } from '../core/types';
import { loadConfig } from '../core/utils';
import { parseOptimizerConfig } from '../core/schema';
import { loadEmissionSnapshots } from '../data/emissionFiles';
import { generateSyntheticSnapshots } from '../data/emissions.stub';
import { buildSnapshotTable } from '../data/snapshotTable';
import { createYieldEstimator } from '../yield/yieldEstimator';
import { loadWeightSchedule } from '../schedule/weightSchedule';
import { runCadenceSweep } from '../analytics/comparison';
import { formatRecommendation, writeComparisonArtifacts } from '../reporting/reportWriter';

export interface OptimizeOptions {
  config?: string;
  emissionsDir?: string;
  out?: string;
  cadences?: string;
  topN?: string;
  costBps?: string;
  slippageBps?: string;
  capital?: string;
  concurrency?: string;
  weightSchedule?: string;
  synthetic?: string;
  subnets?: string;
}

/** "1h=1,1d=24,continuous=0" -> { '1h': 1, '1d': 24, continuous: 0 } */
export const parseCadenceList = (raw: string): Record<string, number> => {
  const out: Record<string, number> = {};
  for (const part of raw.split(',').map((p) => p.trim()).filter(Boolean)) {
    const [label, hoursRaw] = part.split('=').map((s) => s.trim());
    const hours = Number(hoursRaw);
    if (!label || hoursRaw === undefined || !Number.isInteger(hours) || hours < 0) {
      throw new Error(`Invalid cadence "${part}" (expected label=hours)`);
    }
    out[label] = hours;
  }
  return out;
};

const numberOption = (raw: string | undefined): number | undefined => (raw === undefined ? undefined : Number(raw));

export const applyCliOverrides = (config: OptimizerConfig, opts: OptimizeOptions): OptimizerConfig =>
  parseOptimizerConfig({
    ...config,
    ...(opts.emissionsDir ? { emissionsDir: path.resolve(process.cwd(), opts.emissionsDir) } : {}),
    ...(opts.out ? { resultsDir: path.resolve(process.cwd(), opts.out) } : {}),
    ...(opts.cadences ? { cadences: parseCadenceList(opts.cadences) } : {}),
    ...(opts.topN !== undefined ? { topN: numberOption(opts.topN) } : {}),
    ...(opts.costBps !== undefined ? { transactionCostBps: numberOption(opts.costBps) } : {}),
    ...(opts.slippageBps !== undefined ? { slippageBps: numberOption(opts.slippageBps) } : {}),
    ...(opts.capital !== undefined ? { initialCapital: numberOption(opts.capital) } : {}),
    ...(opts.concurrency !== undefined ? { maxConcurrency: numberOption(opts.concurrency) } : {}),
    ...(opts.weightSchedule ? { weightScheduleFile: path.resolve(process.cwd(), opts.weightSchedule) } : {})
  });

const loadTable = (config: OptimizerConfig, opts: OptimizeOptions): SnapshotTable => {
  if (opts.synthetic !== undefined) {
    const hours = Number(opts.synthetic);
    const subnets = Number(opts.subnets ?? 32);
    console.log(`Generating ${hours} synthetic hourly snapshots for ${subnets} subnets`);
    const snapshots = generateSyntheticSnapshots({ start: '2025-07-01T00:00:00Z', hours, subnets });
    return buildSnapshotTable(snapshots, config.priceModel);
  }
  console.log(`Loading emissions data from ${config.emissionsDir}`);
  const loaded = loadEmissionSnapshots(config.emissionsDir);
  loaded.flags.forEach((f) => console.warn(`[${f.code}] ${f.message}`));
  console.log(`Found ${loaded.files.length} emissions files, ${loaded.snapshots.length} hourly samples`);
  return buildSnapshotTable(loaded.snapshots, config.priceModel);
};

export const runOptimization = async (opts: OptimizeOptions, signal?: AbortSignal) => {
  const configPath = path.resolve(process.cwd(), opts.config ?? 'src/config/default.json');
  const config = applyCliOverrides(loadConfig(configPath), opts);

  console.log('Configuration:');
  console.log(`  Initial Capital: $${config.initialCapital.toLocaleString('en-US')}`);
  console.log(`  Transaction Cost: ${config.transactionCostBps} bps`);
  console.log(`  Slippage: ${config.slippageBps} bps`);
  console.log(`  Top N Subnets: ${config.topN}`);
  console.log(`  Frequencies: ${Object.keys(config.cadences).join(', ')}`);

  const table = loadTable(config, opts);
  console.log(
    `Loaded ${table.snapshots.length} samples from ${table.snapshots[0].timestamp} to ${
      table.snapshots[table.snapshots.length - 1].timestamp
    } (${table.subnetIds.length} subnets)`
  );

  const report = await runCadenceSweep(table, config, {
    yieldEstimator: createYieldEstimator(config.yieldModel),
    weightSchedule: config.weightScheduleFile ? loadWeightSchedule(config.weightScheduleFile) : undefined,
    signal,
    onCadenceComplete: (r) =>
      console.log(
        `${r.cadence.label}: Return=${(r.totalReturn * 100).toFixed(2)}%, Sharpe=${r.sharpeRatio.toFixed(2)}, ` +
          `Rebalances=${r.rebalanceCount}, Costs=$${Math.round(r.totalTransactionCost)}`
      )
  });

  report.excluded.forEach((e) => console.warn(`Excluded ${e.cadence.label}: ${e.reason}`));
  report.flags.forEach((f) => console.warn(`[${f.code}] ${f.message}`));
  console.table(
    report.rows.map((r) => ({
      Frequency: r.frequency,
      'Return %': r.totalReturnPct.toFixed(2),
      'Ann. %': r.annualizedReturnPct.toFixed(2),
      'Vol %': r.volatilityPct.toFixed(2),
      Sharpe: r.sharpeRatio.toFixed(2),
      'MaxDD %': r.maxDrawdownPct.toFixed(2),
      Rebalances: r.rebalances,
      'Costs $': Math.round(r.transactionCosts),
      'TE %': r.trackingErrorPct.toFixed(2)
    }))
  );

  const written = writeComparisonArtifacts(report, config, config.resultsDir);
  console.log(`Reports written to ${written.reportPath}, ${written.navPath} and ${written.summaryPath}`);
  if (report.recommended) {
    console.log('\nRECOMMENDED FREQUENCY');
    console.log(formatRecommendation(report.recommended));
  } else {
    console.warn('No implementable cadence completed; nothing to recommend.');
  }
  return report;
};

const program = new Command();

program
  .description('Compare rebalancing cadences for an emission-weighted subnet index')
  .option('--config <path>', 'config JSON', 'src/config/default.json')
  .option('--emissions-dir <dir>', 'directory of emissions_v2_*.json files')
  .option('--out <dir>', 'results directory')
  .option('--cadences <list>', 'label=hours pairs, e.g. 1h=1,1d=24,continuous=0')
  .option('--top-n <n>', 'index breadth')
  .option('--cost-bps <bps>', 'transaction cost in basis points')
  .option('--slippage-bps <bps>', 'slippage in basis points')
  .option('--capital <amount>', 'initial capital')
  .option('--concurrency <n>', 'cadences simulated at once')
  .option('--weight-schedule <path>', 'JSON weight schedule used instead of live emission weights')
  .option('--synthetic <hours>', 'use a synthetic emission series of this many hours')
  .option('--subnets <n>', 'subnet count for --synthetic');

const run = async () => {
  const opts = program.parse(process.argv).opts<OptimizeOptions>();
  const controller = new AbortController();
  process.once('SIGINT', () => {
    console.warn('Interrupted; aborting sweep');
    controller.abort();
  });
  await runOptimization(opts, controller.signal);
};

if (require.main === module) {
  run().catch((err) => {
    console.error('Optimization failed', err);
    process.exitCode = 1;
  });
}
