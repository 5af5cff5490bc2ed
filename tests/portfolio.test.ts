import { IndexPortfolio, calculateTargetWeights } from '../src/portfolio/portfolio';
import type { TargetWeights } from '../src/core/types';

describe('calculateTargetWeights', () => {
  it('weights the top-N subnets by their share of top-N emission', () => {
    expect(calculateTargetWeights({ A: 0.6, B: 0.4, C: 0.1 }, 2)).toEqual({ A: 0.6, B: 0.4 });
  });

  it('sums to one when any top-N subnet emits', () => {
    const weights = calculateTargetWeights({ '1': 0.2, '2': 0.05, '3': 0.1, '4': 0.3 }, 3);
    expect(Object.keys(weights).sort()).toEqual(['1', '3', '4']);
    expect(Object.values(weights).reduce((a, b) => a + b, 0)).toBeCloseTo(1, 12);
  });

  it('is empty when the top-N emit nothing', () => {
    expect(calculateTargetWeights({ A: 0, B: 0 }, 2)).toEqual({});
    expect(calculateTargetWeights({}, 5)).toEqual({});
  });

  it('breaks emission ties by subnet id', () => {
    expect(calculateTargetWeights({ '12': 0.3, '3': 0.3, '7': 0.3 }, 2)).toEqual({ '3': 0.5, '7': 0.5 });
  });

  it('ignores negative and non-finite emissions', () => {
    expect(calculateTargetWeights({ A: -1, B: Number.NaN, C: 0.2 }, 3)).toEqual({ C: 1 });
  });
});

describe('IndexPortfolio', () => {
  it('exposes the target-weight calculation', () => {
    expect(new IndexPortfolio(1000).calculateTargetWeights({ A: 3, B: 1, C: 0 }, 2)).toEqual({ A: 0.75, B: 0.25 });
  });

  it('values missing prices at zero', () => {
    const p = new IndexPortfolio(1000);
    p.rebalance({ A: 0.5, B: 0.5 }, { A: 1, B: 1 }, 0, 0);
    expect(p.portfolioValue({ A: 2 })).toBeCloseTo(1000, 10);
    expect(p.portfolioValue({ A: 2, B: 1 })).toBeCloseTo(1500, 10);
  });

  it('buys the initial composition and charges cost plus slippage', () => {
    const p = new IndexPortfolio(1_000_000);
    const result = p.rebalance({ A: 0.6, B: 0.4 }, { A: 1, B: 1 }, 10, 5);
    expect(result.status).toBe('OK');
    expect(result.costCharged).toBeCloseTo(1500, 8);
    expect(p.holdings).toEqual({ A: 600_000, B: 400_000 });
    expect(p.cash).toBeCloseTo(-1500, 8);
    expect(p.portfolioValue({ A: 1, B: 1 })).toBeCloseTo(998_500, 8);
    expect(p.cumulativeTransactionCost).toBeCloseTo(1500, 8);
  });

  it('does not trade when already at target weights', () => {
    const p = new IndexPortfolio(1_000_000);
    p.rebalance({ A: 0.6, B: 0.4 }, { A: 1, B: 1 }, 0, 0);
    const second = p.rebalance({ A: 0.6, B: 0.4 }, { A: 1, B: 1 }, 10, 5);
    expect(second.status).toBe('SKIPPED_NO_CHANGES');
    expect(second.trades).toHaveLength(0);
    expect(second.costCharged).toBe(0);
    expect(p.cumulativeTransactionCost).toBe(0);
  });

  it('changes NAV across a rebalance only by the cost charged', () => {
    const p = new IndexPortfolio(1000);
    p.rebalance({ A: 0.5, B: 0.5 }, { A: 1, B: 1 }, 0, 0);
    const prices = { A: 2, B: 1 };
    const before = p.portfolioValue(prices);
    const result = p.rebalance({ A: 0.5, B: 0.5 }, prices, 10, 0);
    expect(before).toBeCloseTo(1500, 10);
    expect(result.costCharged).toBeCloseTo(0.5, 10);
    expect(p.portfolioValue(prices)).toBeCloseTo(before - result.costCharged, 8);
    expect(p.holdings.A).toBeCloseTo(375, 8);
    expect(p.holdings.B).toBeCloseTo(750, 8);
  });

  it('closes positions that fall to dust', () => {
    const p = new IndexPortfolio(10);
    p.rebalance({ A: 1 }, { A: 1, B: 1 }, 0, 0);
    p.rebalance({ B: 1 }, { A: 1, B: 1 }, 0, 0);
    expect(p.holdings).toEqual({ B: 10 });
    expect(p.isEmpty).toBe(false);
  });

  it('leaves holdings alone when the target has no usable price', () => {
    const p = new IndexPortfolio(1000);
    const result = p.rebalance({ A: 0.5, B: 0.5 }, { A: 1 }, 10, 0);
    expect(p.holdings).toEqual({ A: 500 });
    expect(result.costCharged).toBeCloseTo(0.5, 10);
    expect(result.skipped).toEqual([{ subnetId: 'B', reason: 'STALE_PRICE', tradeValue: 500 }]);
    expect(result.flags.map((f) => f.code)).toEqual(['STALE_PRICE']);
    expect(result.flags[0].observed).toEqual({ unexecutedValue: 500 });
    expect(p.cash).toBeCloseTo(499.5, 10);
  });

  it('never decreases cumulative cost', () => {
    const p = new IndexPortfolio(50_000);
    const path = [
      { A: 1, B: 1, C: 1 },
      { A: 1.2, B: 0.9, C: 1 },
      { A: 0.8, B: 1.3, C: 1.1 },
      { A: 1.05, B: 1.0, C: 0.7 }
    ];
    const targets: TargetWeights[] = [{ A: 0.5, B: 0.3, C: 0.2 }, { A: 0.2, B: 0.5, C: 0.3 }, { B: 1 }, { A: 0.4, C: 0.6 }];
    let last = 0;
    path.forEach((prices, i) => {
      p.rebalance(targets[i], prices, 10, 5);
      expect(p.cumulativeTransactionCost).toBeGreaterThanOrEqual(last);
      last = p.cumulativeTransactionCost;
    });
    expect(last).toBeGreaterThan(0);
  });

  it('scales a held position for yield accrual', () => {
    const p = new IndexPortfolio(100);
    p.rebalance({ A: 1 }, { A: 1 }, 0, 0);
    p.scaleHolding('A', 1.5);
    p.scaleHolding('Z', 2);
    expect(p.holdings).toEqual({ A: 150 });
  });
});
