import { EmissionSnapshot } from '../core/types';
import { addHours } from '../core/time';
import { hashString, mulberry32 } from '../core/utils';

export interface SyntheticEmissionOptions {
  start: string;
  hours: number;
  subnets: number;
  seed?: number;
  startBlock?: number;
}

const BLOCKS_PER_HOUR = 300;

/**
 * Deterministic hourly emission series for demo runs without collected data.
 * Each subnet's raw rate follows a seeded multiplicative random walk; every
 * tick is normalized so fractions sum to 1.
 */
export const generateSyntheticSnapshots = ({
  start,
  hours,
  subnets,
  seed = 7,
  startBlock = 4_000_000
}: SyntheticEmissionOptions): EmissionSnapshot[] => {
  const ids = Array.from({ length: subnets }, (_, i) => String(i + 1));
  const rngs = ids.map((id) => mulberry32(hashString(`${seed}-${id}`)));
  const levels = rngs.map((rng) => 0.2 + rng());

  const out: EmissionSnapshot[] = [];
  for (let h = 0; h < hours; h++) {
    if (h > 0) {
      levels.forEach((lvl, i) => {
        const shock = (rngs[i]() - 0.5) * 0.08; // +/-4% per hour
        levels[i] = Math.max(0.01, lvl * (1 + shock));
      });
    }
    const total = levels.reduce((a, b) => a + b, 0);
    const emissions: Record<string, number> = {};
    ids.forEach((id, i) => {
      emissions[id] = levels[i] / total;
    });
    out.push({ timestamp: addHours(start, h), block: startBlock + h * BLOCKS_PER_HOUR, emissions });
  }
  return out;
};
