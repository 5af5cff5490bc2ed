import { setImmediate as yieldToEventLoop } from 'timers/promises';
import {
  CadenceSpec,
  DataQualityFlag,
  NavPoint,
  OptimizerConfig,
  SimulationResult,
  SnapshotTable,
  SubnetId,
  TargetWeights
} from '../core/types';
import { InsufficientSnapshotsError, SweepAbortedError } from '../core/errors';
import { pricesAt } from '../data/snapshotTable';
import { usablePrice } from '../execution/rebalanceEngine';
import { IndexPortfolio, calculateTargetWeights } from '../portfolio/portfolio';
import { YieldEstimator, hourlyRateFromApy } from '../yield/yieldEstimator';
import { WeightSchedule } from '../schedule/weightSchedule';
import { computeSummaryMetrics } from '../analytics/metrics';

export type SimulatorPhase = 'INITIALIZING' | 'ACTIVE' | 'FINALIZED';

export type SimulationSettings = Pick<
  OptimizerConfig,
  'initialCapital' | 'transactionCostBps' | 'slippageBps' | 'topN' | 'riskFreeRate' | 'minTradeValue' | 'dustQuantity'
>;

export interface CadenceSimulationInput {
  table: SnapshotTable;
  cadence: CadenceSpec;
  settings: SimulationSettings;
  yieldEstimator: YieldEstimator;
  weightSchedule?: WeightSchedule;
  signal?: AbortSignal;
  yieldEveryTicks?: number;
}

// One tick is one hour of chain time.
const HOURS_PER_TICK = 1;
const DEFAULT_YIELD_EVERY_TICKS = 250;

export const isContinuous = (cadence: CadenceSpec) => cadence.hours === 0;

const observedDetail = (observed: DataQualityFlag['observed']): Record<string, unknown> => {
  if (observed === undefined) return {};
  if (typeof observed === 'object' && !Array.isArray(observed)) return observed;
  return { detail: observed };
};

/**
 * Repeated per-tick events collapse into one flag per code, counting
 * occurrences and remembering the affected subnets and first timestamp. The
 * first occurrence's own `observed` detail is kept alongside the counts.
 */
class FlagLog {
  private readonly byCode = new Map<
    string,
    { flag: DataQualityFlag; count: number; symbols: Set<string>; firstAt: string }
  >();

  add(flag: DataQualityFlag, timestamp: string) {
    const existing = this.byCode.get(flag.code);
    if (existing) {
      existing.count += 1;
      flag.symbols?.forEach((s) => existing.symbols.add(s));
      return;
    }
    this.byCode.set(flag.code, { flag, count: 1, symbols: new Set(flag.symbols ?? []), firstAt: timestamp });
  }

  toArray(): DataQualityFlag[] {
    return Array.from(this.byCode.values()).map(({ flag, count, symbols, firstAt }) => ({
      ...flag,
      ...(symbols.size ? { symbols: Array.from(symbols) } : {}),
      observed: { ...observedDetail(flag.observed), ticks: count, firstAt }
    }));
  }
}

export class CadenceSimulator {
  private state: SimulatorPhase = 'INITIALIZING';
  private readonly portfolio: IndexPortfolio;
  private readonly flags = new FlagLog();
  private readonly navHistory: NavPoint[] = [];
  private hoursSinceRebalance = 0;
  private rebalanceCount = 0;
  private totalTransactionCost = 0;

  constructor(private readonly input: CadenceSimulationInput) {
    this.portfolio = new IndexPortfolio(input.settings.initialCapital, {
      minTradeValue: input.settings.minTradeValue,
      dustQuantity: input.settings.dustQuantity
    });
  }

  get phase(): SimulatorPhase {
    return this.state;
  }

  async run(): Promise<SimulationResult> {
    const { table, cadence, signal } = this.input;
    if (this.state !== 'INITIALIZING') {
      throw new Error(`Cadence ${cadence.label} has already run`);
    }
    if (table.snapshots.length < 2) {
      throw new InsufficientSnapshotsError(table.snapshots.length, `cadence ${cadence.label}`);
    }
    const yieldEvery = Math.max(1, this.input.yieldEveryTicks ?? DEFAULT_YIELD_EVERY_TICKS);

    for (let tick = 0; tick < table.snapshots.length; tick++) {
      if (signal?.aborted) throw new SweepAbortedError(cadence.label);
      this.step(tick);
      if ((tick + 1) % yieldEvery === 0) {
        await yieldToEventLoop();
      }
    }
    return this.finalize();
  }

  private step(tick: number) {
    const { table, cadence, settings } = this.input;
    const snapshot = table.snapshots[tick];
    const prices = pricesAt(table, tick);

    if (this.state === 'ACTIVE') {
      this.accrueStakingYield(snapshot.emissions, snapshot.supplies, snapshot.timestamp);
    }

    let shouldRebalance = this.state === 'INITIALIZING';
    if (!shouldRebalance) {
      if (isContinuous(cadence)) {
        shouldRebalance = true;
      } else if (this.hoursSinceRebalance >= cadence.hours) {
        shouldRebalance = true;
        this.hoursSinceRebalance = 0;
      }
    }

    if (shouldRebalance) {
      const weights = this.targetWeightsAt(tick);
      if (Object.keys(weights).length === 0) {
        this.flags.add(
          {
            code: 'ZERO_TARGET_EMISSIONS',
            severity: 'info',
            message: 'No positive target weights at a rebalance trigger; holdings left unchanged'
          },
          snapshot.timestamp
        );
      } else {
        const costBps = isContinuous(cadence) ? 0 : settings.transactionCostBps;
        const slippageBps = isContinuous(cadence) ? 0 : settings.slippageBps;
        const result = this.portfolio.rebalance(weights, prices, costBps, slippageBps);
        result.flags.forEach((f) => this.flags.add(f, snapshot.timestamp));
        this.totalTransactionCost += result.costCharged;
        this.rebalanceCount += 1;
      }
    }

    const unpriced = Object.keys(this.portfolio.holdings).filter((id) => usablePrice(prices[id]) === undefined);
    if (unpriced.length) {
      this.flags.add(
        { code: 'MISSING_PRICE', severity: 'warn', message: 'Held subnet has no usable price; valued at 0', symbols: unpriced },
        snapshot.timestamp
      );
    }

    this.navHistory.push({
      timestamp: snapshot.timestamp,
      nav: this.portfolio.portfolioValue(prices),
      cash: this.portfolio.cash
    });
    this.hoursSinceRebalance += HOURS_PER_TICK;
    this.state = 'ACTIVE';
  }

  private targetWeightsAt(tick: number): TargetWeights {
    const { table, settings, weightSchedule } = this.input;
    if (weightSchedule) {
      return weightSchedule.weightsAt(table.timestampsMs[tick]);
    }
    return calculateTargetWeights(table.snapshots[tick].emissions, settings.topN);
  }

  private accrueStakingYield(
    emissions: Record<SubnetId, number>,
    supplies: Record<SubnetId, number> | undefined,
    timestamp: string
  ) {
    const unavailable: string[] = [];
    for (const id of Object.keys(this.portfolio.holdings)) {
      const apy = this.input.yieldEstimator.estimateApy(emissions[id] ?? 0, supplies?.[id]);
      if (!Number.isFinite(apy) || apy <= -100) {
        unavailable.push(id);
        continue;
      }
      if (apy === 0) continue;
      this.portfolio.scaleHolding(id, Math.pow(1 + hourlyRateFromApy(apy), HOURS_PER_TICK));
    }
    if (unavailable.length) {
      this.flags.add(
        { code: 'YIELD_UNAVAILABLE', severity: 'warn', message: 'Staking yield not estimable; no accrual', symbols: unavailable },
        timestamp
      );
    }
  }

  private finalize(): SimulationResult {
    const { cadence, settings } = this.input;
    const metrics = computeSummaryMetrics(this.navHistory, settings.riskFreeRate);
    this.state = 'FINALIZED';
    return {
      cadence,
      navHistory: this.navHistory,
      finalNav: metrics.finalNav,
      totalReturn: metrics.totalReturn,
      annualizedReturn: metrics.annualizedReturn,
      annualizedVolatility: metrics.annualizedVolatility,
      sharpeRatio: metrics.sharpeRatio,
      maxDrawdown: metrics.maxDrawdown,
      rebalanceCount: this.rebalanceCount,
      totalTransactionCost: this.totalTransactionCost,
      transactionCostPct: this.totalTransactionCost / settings.initialCapital,
      trackingError: 0,
      days: metrics.days,
      flags: this.flags.toArray()
    };
  }
}

export const simulateCadence = (input: CadenceSimulationInput): Promise<SimulationResult> => new CadenceSimulator(input).run();
