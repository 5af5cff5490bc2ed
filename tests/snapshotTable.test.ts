import { buildPriceSeries, buildSnapshotTable, pricesAt } from '../src/data/snapshotTable';
import { SnapshotDataError } from '../src/core/errors';
import { EmissionSnapshot } from '../src/core/types';

const snap = (hour: number, emissions: Record<string, number>): EmissionSnapshot => ({
  timestamp: new Date(Date.UTC(2025, 6, 1, hour)).toISOString(),
  block: 1000 + hour * 300,
  emissions
});

describe('buildPriceSeries', () => {
  it('compounds damped emission changes from the base price', () => {
    const prices = buildPriceSeries([0.1, 0.2, 0.1]);
    expect(prices[0]).toBe(100);
    expect(prices[1]).toBeCloseTo(110, 10);
    expect(prices[2]).toBeCloseTo(104.5, 10);
  });

  it('treats zero or absent rates as no change', () => {
    expect(buildPriceSeries([0, 0.1, 0, 0.2])).toEqual([100, 100, 100, 100]);
  });

  it('clips extreme changes', () => {
    const prices = buildPriceSeries([0.1, 1.0], { dampingFactor: 1, clipBound: 0.5, basePrice: 100 });
    expect(prices).toEqual([100, 150]);
  });

  it('forward-fills non-finite steps', () => {
    const prices = buildPriceSeries([1, Number.MAX_VALUE, Number.MAX_VALUE], {
      dampingFactor: Number.MAX_VALUE,
      clipBound: Infinity,
      basePrice: 100
    });
    expect(prices).toEqual([100, 100, 100]);
  });
});

describe('buildSnapshotTable', () => {
  it('aligns a price series for every subnet ever observed', () => {
    const table = buildSnapshotTable([snap(0, { '10': 0.5, '2': 0.5 }), snap(1, { '2': 1 }), snap(2, { '10': 0.2, '3': 0.8 })]);
    expect(table.subnetIds).toEqual(['2', '3', '10']);
    expect(table.prices['10']).toEqual([100, 100, 100]);
    expect(table.prices['2']).toHaveLength(3);
    expect(table.prices['2'][1]).toBeCloseTo(110, 10);
    expect(table.timestampsMs[1] - table.timestampsMs[0]).toBe(3_600_000);
    expect(Object.isFrozen(table)).toBe(true);
    expect(Object.isFrozen(table.prices['2'])).toBe(true);
  });

  it('returns all prices of one tick', () => {
    const table = buildSnapshotTable([snap(0, { A: 0.5 }), snap(1, { A: 1, B: 0.3 })]);
    expect(pricesAt(table, 1)).toEqual({ A: 110.00000000000001, B: 100 });
  });

  it('keeps a single snapshot so the caller can decide', () => {
    const table = buildSnapshotTable([snap(0, { A: 1 })]);
    expect(table.snapshots).toHaveLength(1);
  });

  it('rejects an empty sequence', () => {
    expect(() => buildSnapshotTable([])).toThrow(SnapshotDataError);
  });

  it('rejects duplicate and out-of-order timestamps', () => {
    expect(() => buildSnapshotTable([snap(0, { A: 1 }), snap(0, { A: 1 })])).toThrow(/duplicate snapshot timestamp/);
    expect(() => buildSnapshotTable([snap(2, { A: 1 }), snap(1, { A: 1 })])).toThrow(/out of timestamp order/);
  });

  it('rejects a sequence with no parseable timestamp', () => {
    expect(() => buildSnapshotTable([{ timestamp: 'yesterday', block: 1, emissions: {} }])).toThrow(
      '[SNAPSHOT_DATA] no snapshot has a parseable timestamp'
    );
  });

  it('drops entries with unparseable timestamps and flags them', () => {
    const table = buildSnapshotTable([snap(0, { A: 0.5 }), { timestamp: 'garbage', block: 1, emissions: { A: 9 } }, snap(2, { A: 1 })]);
    expect(table.snapshots).toHaveLength(2);
    expect(table.timestampsMs[1] - table.timestampsMs[0]).toBe(2 * 3_600_000);
    expect(table.prices.A).toHaveLength(2);
    expect(table.prices.A[1]).toBeCloseTo(110, 10);
    expect(table.flags).toEqual([
      {
        code: 'MALFORMED_SNAPSHOT',
        severity: 'warn',
        message: '1 snapshot(s) without a parseable timestamp dropped',
        observed: { indices: [1] }
      }
    ]);
  });

  it('checks ordering on the surviving entries', () => {
    expect(() => buildSnapshotTable([snap(2, { A: 1 }), { timestamp: '', block: 0, emissions: {} }, snap(1, { A: 1 })])).toThrow(
      /snapshot 1 is out of timestamp order/
    );
  });
});
