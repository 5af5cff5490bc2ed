import { DataQualityFlag, EmissionSnapshot, PriceModelConfig, SnapshotTable, SubnetId } from '../core/types';
import { SnapshotDataError } from '../core/errors';
import { parseTimestamp } from '../core/time';
import { compareSubnetIds } from '../core/utils';

export const defaultPriceModel: PriceModelConfig = {
  dampingFactor: 0.1,
  clipBound: 0.5,
  basePrice: 100
};

const clip = (value: number, bound: number) => Math.max(-bound, Math.min(bound, value));

/**
 * Proxy price path for one subnet: emission-rate percentage changes, damped and
 * clipped, compounded from the base price. A change is only measured when both
 * the previous and the current rate are positive; otherwise it counts as 0.
 */
export const buildPriceSeries = (rates: readonly number[], model: PriceModelConfig = defaultPriceModel): number[] => {
  const prices: number[] = [];
  let last: number | undefined;
  for (let i = 0; i < rates.length; i++) {
    const prev = i > 0 ? rates[i - 1] : 0;
    const curr = rates[i];
    const change = prev > 0 && curr > 0 ? curr / prev - 1 : 0;
    const step = clip(change * model.dampingFactor, model.clipBound);
    const candidate = (last ?? model.basePrice) * (1 + step);
    if (Number.isFinite(candidate) && candidate > 0) {
      last = candidate;
      prices.push(candidate);
    } else {
      // forward-fill, or seed at base when nothing valid came before
      prices.push(last ?? model.basePrice);
    }
  }
  return prices;
};

const emissionRate = (snapshot: EmissionSnapshot, id: SubnetId): number => {
  const v = snapshot.emissions[id];
  return typeof v === 'number' && Number.isFinite(v) ? v : 0;
};

/**
 * Aligns the snapshot sequence with a proxy price series for every subnet ever
 * observed. Entries without a parseable timestamp are dropped and flagged; the
 * sequence is fatal only when none survive. The returned table is frozen;
 * downstream consumers share it read-only.
 */
export const buildSnapshotTable = (
  input: readonly EmissionSnapshot[],
  model: PriceModelConfig = defaultPriceModel
): SnapshotTable => {
  if (!input.length) {
    throw new SnapshotDataError('snapshot sequence is empty');
  }

  const flags: DataQualityFlag[] = [];
  const snapshots: EmissionSnapshot[] = [];
  const timestampsMs: number[] = [];
  const dropped: number[] = [];
  input.forEach((s, idx) => {
    const ms = parseTimestamp(s.timestamp);
    if (ms === undefined) {
      dropped.push(idx);
      return;
    }
    snapshots.push(s);
    timestampsMs.push(ms);
  });
  if (!snapshots.length) {
    throw new SnapshotDataError('no snapshot has a parseable timestamp', { entries: input.length });
  }
  if (dropped.length) {
    flags.push({
      code: 'MALFORMED_SNAPSHOT',
      severity: 'warn',
      message: `${dropped.length} snapshot(s) without a parseable timestamp dropped`,
      observed: { indices: dropped }
    });
  }

  for (let i = 1; i < timestampsMs.length; i++) {
    const ms = timestampsMs[i];
    const prev = timestampsMs[i - 1];
    if (ms <= prev) {
      const { timestamp } = snapshots[i];
      throw new SnapshotDataError(
        ms === prev ? `duplicate snapshot timestamp ${timestamp}` : `snapshot ${i} is out of timestamp order`,
        { index: i, timestamp }
      );
    }
  }

  const ids = new Set<SubnetId>();
  for (const s of snapshots) {
    Object.keys(s.emissions).forEach((id) => ids.add(id));
  }
  const subnetIds = Array.from(ids).sort(compareSubnetIds);

  const prices: Record<SubnetId, readonly number[]> = {};
  for (const id of subnetIds) {
    const rates = snapshots.map((s) => emissionRate(s, id));
    prices[id] = Object.freeze(buildPriceSeries(rates, model));
  }

  return Object.freeze({
    snapshots: Object.freeze(snapshots.map((s) => Object.freeze({ ...s }))),
    timestampsMs: Object.freeze(timestampsMs),
    subnetIds: Object.freeze(subnetIds),
    prices: Object.freeze(prices),
    flags: Object.freeze(flags)
  });
};

/** Prices for every subnet at one tick. */
export const pricesAt = (table: SnapshotTable, tick: number): Record<SubnetId, number> => {
  const out: Record<SubnetId, number> = {};
  for (const id of table.subnetIds) {
    const series = table.prices[id];
    const px = series?.[tick];
    if (px !== undefined) out[id] = px;
  }
  return out;
};
