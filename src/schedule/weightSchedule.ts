import { TargetWeights } from '../core/types';
import { readJSONFile } from '../core/utils';
import { weightScheduleSchema } from '../core/schema';

export interface WeightScheduleEntry {
  effectiveMs: number;
  effectiveDate: string;
  weights: TargetWeights;
}

const normalize = (weights: TargetWeights): TargetWeights => {
  const total = Object.values(weights).reduce((a, b) => a + b, 0);
  if (total <= 0) return {};
  const out: TargetWeights = {};
  for (const [id, w] of Object.entries(weights)) {
    if (w > 0) out[id] = w / total;
  }
  return out;
};

/**
 * Ordered (effective date, weights) table. Lookup returns the entry with the
 * latest effective date not after the requested instant.
 */
export class WeightSchedule {
  private readonly entries: WeightScheduleEntry[];

  constructor(entries: Array<{ effectiveDate: string; weights: TargetWeights }>) {
    const parsed = entries.map((e) => {
      const ms = Date.parse(e.effectiveDate);
      if (Number.isNaN(ms)) {
        throw new Error(`Invalid schedule date: ${e.effectiveDate}`);
      }
      return { effectiveMs: ms, effectiveDate: e.effectiveDate, weights: normalize(e.weights) };
    });
    parsed.sort((a, b) => a.effectiveMs - b.effectiveMs);
    for (let i = 1; i < parsed.length; i++) {
      if (parsed[i].effectiveMs === parsed[i - 1].effectiveMs) {
        throw new Error(`Duplicate schedule date: ${parsed[i].effectiveDate}`);
      }
    }
    this.entries = parsed;
  }

  get size(): number {
    return this.entries.length;
  }

  entryAt(ms: number): WeightScheduleEntry | undefined {
    let lo = 0;
    let hi = this.entries.length - 1;
    let found = -1;
    while (lo <= hi) {
      const mid = (lo + hi) >> 1;
      if (this.entries[mid].effectiveMs <= ms) {
        found = mid;
        lo = mid + 1;
      } else {
        hi = mid - 1;
      }
    }
    return found >= 0 ? this.entries[found] : undefined;
  }

  /** Empty when the instant precedes the first effective date. */
  weightsAt(ms: number): TargetWeights {
    const entry = this.entryAt(ms);
    return entry ? { ...entry.weights } : {};
  }
}

export const loadWeightSchedule = (filePath: string): WeightSchedule => {
  const result = weightScheduleSchema.safeParse(readJSONFile(filePath));
  if (!result.success) {
    const errors = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    throw new Error(`Invalid weight schedule ${filePath}: ${errors.join('; ')}`);
  }
  return new WeightSchedule(result.data);
};
