import { NavPoint } from '../core/types';
import { pctChange, sampleStdDev } from '../core/utils';
import { HOURS_PER_YEAR, elapsedWholeDays } from '../core/time';

export const TICKS_PER_YEAR = HOURS_PER_YEAR;

export interface SummaryMetrics {
  finalNav: number;
  totalReturn: number;
  annualizedReturn: number;
  annualizedVolatility: number;
  sharpeRatio: number;
  maxDrawdown: number;
  days: number;
}

// Most negative peak-to-trough decline; 0 for a non-decreasing series.
export const computeMaxDrawdown = (navs: readonly number[]): number => {
  let peak = -Infinity;
  let worst = 0;
  for (const nav of navs) {
    peak = Math.max(peak, nav);
    if (peak > 0) worst = Math.min(worst, (nav - peak) / peak);
  }
  return worst;
};

export const computeSummaryMetrics = (points: readonly NavPoint[], riskFreeRate: number): SummaryMetrics => {
  if (!points.length) {
    return { finalNav: 0, totalReturn: 0, annualizedReturn: 0, annualizedVolatility: 0, sharpeRatio: 0, maxDrawdown: 0, days: 0 };
  }
  const navs = points.map((p) => p.nav);
  const first = navs[0];
  const finalNav = navs[navs.length - 1];
  const totalReturn = first > 0 ? finalNav / first - 1 : 0;

  const days = elapsedWholeDays(Date.parse(points[0].timestamp), Date.parse(points[points.length - 1].timestamp));
  const annualizedReturn = days > 0 ? Math.pow(1 + totalReturn, 365 / days) - 1 : 0;

  const annualizedVolatility = sampleStdDev(pctChange(navs)) * Math.sqrt(TICKS_PER_YEAR);
  const sharpeRatio = annualizedVolatility > 0 ? (annualizedReturn - riskFreeRate) / annualizedVolatility : 0;

  return {
    finalNav,
    totalReturn,
    annualizedReturn,
    annualizedVolatility,
    sharpeRatio,
    maxDrawdown: computeMaxDrawdown(navs),
    days
  };
};

/**
 * Annualized standard deviation of per-tick return differences against the
 * benchmark, over the overlapping prefix of the two histories.
 */
export const computeTrackingError = (navs: readonly number[], benchmarkNavs: readonly number[]): number => {
  const n = Math.min(navs.length, benchmarkNavs.length);
  const own = pctChange(navs.slice(0, n));
  const bench = pctChange(benchmarkNavs.slice(0, n));
  const diffs = own.map((r, i) => r - bench[i]);
  return sampleStdDev(diffs) * Math.sqrt(TICKS_PER_YEAR);
};
