import {
  CadenceSpec,
  ComparisonReport,
  ComparisonRow,
  DataQualityFlag,
  ExcludedCadence,
  OptimizerConfig,
  SimulationResult,
  SnapshotTable
} from '../core/types';
import { InsufficientSnapshotsError, SweepAbortedError } from '../core/errors';
import { YieldEstimator } from '../yield/yieldEstimator';
import { WeightSchedule } from '../schedule/weightSchedule';
import { isContinuous, simulateCadence } from '../simulation/cadenceSimulator';
import { computeTrackingError } from './metrics';

export interface SweepDependencies {
  yieldEstimator: YieldEstimator;
  weightSchedule?: WeightSchedule;
  signal?: AbortSignal;
  yieldEveryTicks?: number;
  onCadenceComplete?: (result: SimulationResult) => void;
}

export const BENCHMARK_LABEL = 'continuous';

/** Cadences in config order, with the continuous benchmark appended when absent. */
export const resolveCadences = (cadences: Record<string, number>): CadenceSpec[] => {
  const specs = Object.entries(cadences).map(([label, hours]) => ({ label, hours }));
  if (!specs.some(isContinuous)) {
    specs.push({ label: BENCHMARK_LABEL, hours: 0 });
  }
  return specs;
};

export const toComparisonRow = (r: SimulationResult): ComparisonRow => ({
  frequency: r.cadence.label,
  cadenceHours: r.cadence.hours,
  totalReturnPct: r.totalReturn * 100,
  annualizedReturnPct: r.annualizedReturn * 100,
  volatilityPct: r.annualizedVolatility * 100,
  sharpeRatio: r.sharpeRatio,
  maxDrawdownPct: r.maxDrawdown * 100,
  rebalances: r.rebalanceCount,
  transactionCosts: r.totalTransactionCost,
  transactionCostsPct: r.transactionCostPct * 100,
  trackingErrorPct: r.trackingError * 100,
  finalNav: r.finalNav,
  days: r.days
});

/**
 * Fills in tracking error for every non-benchmark result. The benchmark's own
 * tracking error stays 0.
 */
export const applyTrackingErrors = (results: Record<string, SimulationResult>, benchmark: SimulationResult) => {
  const benchNavs = benchmark.navHistory.map((p) => p.nav);
  for (const result of Object.values(results)) {
    if (result === benchmark) {
      result.trackingError = 0;
      continue;
    }
    result.trackingError = computeTrackingError(
      result.navHistory.map((p) => p.nav),
      benchNavs
    );
  }
};

/**
 * Highest Sharpe among implementable cadences. A Sharpe tie goes to the higher
 * total return, then to the earlier cadence.
 */
export const selectRecommended = (ordered: SimulationResult[]): SimulationResult | undefined => {
  let best: SimulationResult | undefined;
  for (const r of ordered) {
    if (isContinuous(r.cadence)) continue;
    if (
      !best ||
      r.sharpeRatio > best.sharpeRatio ||
      (r.sharpeRatio === best.sharpeRatio && r.totalReturn > best.totalReturn)
    ) {
      best = r;
    }
  }
  return best;
};

export const buildComparisonReport = (
  cadences: CadenceSpec[],
  results: Record<string, SimulationResult>,
  excluded: ExcludedCadence[],
  flags: DataQualityFlag[] = []
): ComparisonReport => {
  const ordered = cadences.map((c) => results[c.label]).filter((r): r is SimulationResult => Boolean(r));
  const benchmark = ordered.find((r) => isContinuous(r.cadence));
  if (benchmark) {
    applyTrackingErrors(results, benchmark);
  } else {
    flags.push({
      code: 'BENCHMARK_UNAVAILABLE',
      severity: 'warn',
      message: 'Continuous benchmark did not complete; tracking error left at 0'
    });
  }
  const rows = ordered.map(toComparisonRow).sort((a, b) => b.totalReturnPct - a.totalReturnPct);
  const best = selectRecommended(ordered);
  return {
    rows,
    recommended: best ? rows.find((row) => row.frequency === best.cadence.label) : undefined,
    results,
    excluded,
    flags
  };
};

/**
 * Runs every cadence against the shared, read-only snapshot table. At most
 * `maxConcurrency` cadences are in flight; each owns its own portfolio.
 * An abort, or any failure other than too-short data, cancels the rest.
 */
export const runCadenceSweep = async (
  table: SnapshotTable,
  config: OptimizerConfig,
  deps: SweepDependencies
): Promise<ComparisonReport> => {
  const cadences = resolveCadences(config.cadences);
  const results: Record<string, SimulationResult> = {};
  const excluded: ExcludedCadence[] = [];

  const controller = new AbortController();
  const onOuterAbort = () => controller.abort();
  if (deps.signal?.aborted) throw new SweepAbortedError();
  deps.signal?.addEventListener('abort', onOuterAbort, { once: true });

  const queue = [...cadences];
  const worker = async () => {
    for (let cadence = queue.shift(); cadence; cadence = queue.shift()) {
      try {
        const result = await simulateCadence({
          table,
          cadence,
          settings: config,
          yieldEstimator: deps.yieldEstimator,
          weightSchedule: deps.weightSchedule,
          signal: controller.signal,
          yieldEveryTicks: deps.yieldEveryTicks
        });
        results[cadence.label] = result;
        deps.onCadenceComplete?.(result);
      } catch (err) {
        if (err instanceof InsufficientSnapshotsError) {
          excluded.push({ cadence, reason: err.message });
          continue;
        }
        controller.abort();
        throw err;
      }
    }
  };

  try {
    const workers = Array.from({ length: Math.min(config.maxConcurrency, cadences.length) }, () => worker());
    await Promise.all(workers);
  } finally {
    deps.signal?.removeEventListener('abort', onOuterAbort);
  }

  if (Object.keys(results).length === 0) {
    throw new InsufficientSnapshotsError(table.snapshots.length, 'every cadence');
  }
  return buildComparisonReport(cadences, results, excluded, [...table.flags]);
};
