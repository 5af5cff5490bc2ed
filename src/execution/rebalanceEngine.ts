import { DataQualityFlag, SubnetId, TargetWeights } from '../core/types';
import { compareSubnetIds } from '../core/utils';

export type TradeSide = 'BUY' | 'SELL';

export interface RebalanceInput {
  cash: number;
  holdings: Record<SubnetId, number>;
  prices: Record<SubnetId, number>;
  targetWeights: TargetWeights;
  costBps: number;
  slippageBps: number;
  minTradeValue?: number;
}

export interface PlannedTrade {
  subnetId: SubnetId;
  side: TradeSide;
  tradeValue: number; // signed: positive buys, negative sells
  price: number;
  quantityChange: number;
  cost: number;
}

export interface RebalanceResult {
  status: 'OK' | 'SKIPPED_NO_CHANGES';
  portfolioValue: number;
  trades: PlannedTrade[];
  skipped: Array<{ subnetId: SubnetId; reason: 'MIN_TRADE_VALUE' | 'STALE_PRICE'; tradeValue: number }>;
  drift: Record<SubnetId, { currentWeight: number; targetWeight: number; absDiff: number }>;
  costCharged: number;
  cashDelta: number;
  flags: DataQualityFlag[];
}

export const DEFAULT_MIN_TRADE_VALUE = 0.01;

export const usablePrice = (px: number | undefined): number | undefined =>
  px !== undefined && Number.isFinite(px) && px > 0 ? px : undefined;

export const valueHoldings = (cash: number, holdings: Record<SubnetId, number>, prices: Record<SubnetId, number>): number => {
  let invested = 0;
  for (const [id, qty] of Object.entries(holdings)) {
    const px = usablePrice(prices[id]);
    if (px !== undefined) invested += qty * px;
  }
  return cash + invested;
};

/**
 * Nets the current book against target weights. Pure: nothing is mutated, the
 * caller applies `trades` and `cashDelta`.
 */
export const planRebalance = ({
  cash,
  holdings,
  prices,
  targetWeights,
  costBps,
  slippageBps,
  minTradeValue = DEFAULT_MIN_TRADE_VALUE
}: RebalanceInput): RebalanceResult => {
  const flags: DataQualityFlag[] = [];
  const skipped: RebalanceResult['skipped'] = [];
  const trades: PlannedTrade[] = [];
  const drift: RebalanceResult['drift'] = {};

  const portfolioValue = valueHoldings(cash, holdings, prices);
  const rate = (costBps + slippageBps) / 10_000;
  const universe = Array.from(new Set([...Object.keys(targetWeights), ...Object.keys(holdings)])).sort(compareSubnetIds);

  const stale: string[] = [];
  let unexecutedValue = 0;
  let costCharged = 0;
  let cashDelta = 0;
  for (const id of universe) {
    const px = usablePrice(prices[id]);
    const targetValue = portfolioValue * (targetWeights[id] ?? 0);
    const currentValue = px !== undefined ? (holdings[id] ?? 0) * px : 0;
    const tradeValue = targetValue - currentValue;

    const targetWeight = targetWeights[id] ?? 0;
    const currentWeight = portfolioValue > 0 ? currentValue / portfolioValue : 0;
    drift[id] = { currentWeight, targetWeight, absDiff: Math.abs(currentWeight - targetWeight) };

    if (Math.abs(tradeValue) <= minTradeValue) {
      if (tradeValue !== 0) skipped.push({ subnetId: id, reason: 'MIN_TRADE_VALUE', tradeValue });
      continue;
    }
    if (px === undefined) {
      stale.push(id);
      unexecutedValue += Math.abs(tradeValue);
      skipped.push({ subnetId: id, reason: 'STALE_PRICE', tradeValue });
      continue;
    }
    const cost = Math.abs(tradeValue) * rate;
    trades.push({
      subnetId: id,
      side: tradeValue > 0 ? 'BUY' : 'SELL',
      tradeValue,
      price: px,
      quantityChange: tradeValue / px,
      cost
    });
    costCharged += cost;
    cashDelta -= tradeValue + cost;
  }

  if (stale.length) {
    flags.push({
      code: 'STALE_PRICE',
      severity: 'warn',
      message: 'No usable price; trade left unexecuted',
      symbols: stale,
      observed: { unexecutedValue }
    });
  }

  return {
    status: trades.length ? 'OK' : 'SKIPPED_NO_CHANGES',
    portfolioValue,
    trades,
    skipped,
    drift,
    costCharged,
    cashDelta,
    flags
  };
};
