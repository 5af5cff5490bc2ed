import { SubnetId, TargetWeights } from '../core/types';
import { compareSubnetIds } from '../core/utils';
import { DEFAULT_MIN_TRADE_VALUE, RebalanceResult, planRebalance, valueHoldings } from '../execution/rebalanceEngine';

export const DEFAULT_DUST_QUANTITY = 0.001;

/**
 * Top-N subnets by emission, weighted by their share of the top-N total.
 * Ties rank by subnet id. Empty when the top-N emit nothing.
 */
export const calculateTargetWeights = (emissions: Record<SubnetId, number>, topN: number): TargetWeights => {
  const ranked = Object.entries(emissions)
    .filter(([, e]) => Number.isFinite(e) && e >= 0)
    .sort((a, b) => b[1] - a[1] || compareSubnetIds(a[0], b[0]))
    .slice(0, Math.max(0, topN));
  const total = ranked.reduce((acc, [, e]) => acc + e, 0);
  if (total <= 0) return {};
  const weights: TargetWeights = {};
  for (const [id, e] of ranked) {
    if (e > 0) weights[id] = e / total;
  }
  return weights;
};

export interface PortfolioOptions {
  minTradeValue?: number;
  dustQuantity?: number;
}

export class IndexPortfolio {
  cash: number;
  private holdingsBook: Record<SubnetId, number> = {};
  private cumulativeCost = 0;
  private readonly minTradeValue: number;
  private readonly dustQuantity: number;

  constructor(readonly initialCapital: number, options: PortfolioOptions = {}) {
    this.cash = initialCapital;
    this.minTradeValue = options.minTradeValue ?? DEFAULT_MIN_TRADE_VALUE;
    this.dustQuantity = options.dustQuantity ?? DEFAULT_DUST_QUANTITY;
  }

  get holdings(): Readonly<Record<SubnetId, number>> {
    return { ...this.holdingsBook };
  }

  get cumulativeTransactionCost(): number {
    return this.cumulativeCost;
  }

  get isEmpty(): boolean {
    return Object.keys(this.holdingsBook).length === 0;
  }

  calculateTargetWeights(emissions: Record<SubnetId, number>, topN: number): TargetWeights {
    return calculateTargetWeights(emissions, topN);
  }

  portfolioValue(prices: Record<SubnetId, number>): number {
    return valueHoldings(this.cash, this.holdingsBook, prices);
  }

  /** Multiplies one position's quantity, e.g. for staking accrual. */
  scaleHolding(id: SubnetId, multiplier: number) {
    const qty = this.holdingsBook[id];
    if (qty === undefined) return;
    this.holdingsBook[id] = qty * multiplier;
  }

  rebalance(targetWeights: TargetWeights, prices: Record<SubnetId, number>, costBps: number, slippageBps: number): RebalanceResult {
    const plan = planRebalance({
      cash: this.cash,
      holdings: this.holdingsBook,
      prices,
      targetWeights,
      costBps,
      slippageBps,
      minTradeValue: this.minTradeValue
    });
    for (const trade of plan.trades) {
      const next = (this.holdingsBook[trade.subnetId] ?? 0) + trade.quantityChange;
      if (next > this.dustQuantity) {
        this.holdingsBook[trade.subnetId] = next;
      } else {
        delete this.holdingsBook[trade.subnetId];
      }
    }
    this.cash += plan.cashDelta;
    this.cumulativeCost += plan.costCharged;
    return plan;
  }
}
