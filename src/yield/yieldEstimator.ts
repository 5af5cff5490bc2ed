import { YieldModelConfig } from '../core/types';
import { HOURS_PER_YEAR } from '../core/time';

/** Annualized staking yield, in percent, for a subnet at its current emission share. */
export interface YieldEstimator {
  estimateApy(emissionFraction: number, supply?: number): number;
}

export const hourlyRateFromApy = (apy: number): number => Math.pow(1 + apy / 100, 1 / HOURS_PER_YEAR) - 1;

export class ZeroYieldEstimator implements YieldEstimator {
  estimateApy(): number {
    return 0;
  }
}

export class ConstantYieldEstimator implements YieldEstimator {
  constructor(private readonly apy: number) {}

  estimateApy(): number {
    return this.apy;
  }
}

/** Linear in emission share: a subnet emitting more pays stakers proportionally more. */
export class EmissionScaledYieldEstimator implements YieldEstimator {
  constructor(private readonly dailyReturnPerEmission = 0.0001) {}

  estimateApy(emissionFraction: number): number {
    if (!Number.isFinite(emissionFraction) || emissionFraction <= 0) return 0;
    return emissionFraction * this.dailyReturnPerEmission * 365 * 100;
  }
}

export interface StakingCalibrationPoint {
  supply: number;
  stakedRatio: number;
}

const TOKENS_PER_DAY = 7200;
const ALPHA_MULTIPLIER = 2;
const MIN_STAKED_RATIO = 0.05;
const MAX_STAKED_RATIO = 0.4;
const NEW_SUBNET_SUPPLY_M = 0.1;
const NEW_SUBNET_STAKED_RATIO = 0.3;

const defaultCalibration: [StakingCalibrationPoint, StakingCalibrationPoint] = [
  { supply: 1_129_000, stakedRatio: 0.2066 },
  { supply: 3_166_000, stakedRatio: 0.1838 }
];

/**
 * Yield = daily subnet emission / staked tokens, annualized. The staked share of
 * supply follows a power law fit through two calibration points; subnets under
 * 100k supply blend linearly toward a 30% staked share.
 *
 * The fit rests on two observations and is not validated. Swap it freely.
 */
export class SupplyCalibratedYieldEstimator implements YieldEstimator {
  private readonly a: number;
  private readonly b: number;

  constructor(calibration: readonly StakingCalibrationPoint[] = defaultCalibration) {
    if (calibration.length !== 2) {
      throw new Error('Supply calibration needs exactly two points');
    }
    const [p1, p2] = calibration;
    const s1 = p1.supply / 1_000_000;
    const s2 = p2.supply / 1_000_000;
    if (s1 === s2) {
      throw new Error('Supply calibration points must have distinct supplies');
    }
    this.b = Math.log(p2.stakedRatio / p1.stakedRatio) / Math.log(s2 / s1);
    this.a = p1.stakedRatio / Math.pow(s1, this.b);
  }

  stakedRatio(supply: number): number {
    const supplyM = supply / 1_000_000;
    if (supplyM < NEW_SUBNET_SUPPLY_M) {
      const atThreshold = this.a * Math.pow(NEW_SUBNET_SUPPLY_M, this.b);
      const w = supplyM / NEW_SUBNET_SUPPLY_M;
      return w * atThreshold + (1 - w) * NEW_SUBNET_STAKED_RATIO;
    }
    const ratio = this.a * Math.pow(supplyM, this.b);
    return Math.max(MIN_STAKED_RATIO, Math.min(MAX_STAKED_RATIO, ratio));
  }

  estimateApy(emissionFraction: number, supply?: number): number {
    if (supply === undefined || !Number.isFinite(supply) || supply <= 0) return 0;
    if (!Number.isFinite(emissionFraction) || emissionFraction <= 0) return 0;
    const dailyEmission = emissionFraction * TOKENS_PER_DAY * ALPHA_MULTIPLIER;
    const staked = supply * this.stakedRatio(supply);
    return (dailyEmission / staked) * 365 * 100;
  }
}

export const createYieldEstimator = (model: YieldModelConfig): YieldEstimator => {
  switch (model.kind) {
    case 'zero':
      return new ZeroYieldEstimator();
    case 'constant':
      return new ConstantYieldEstimator(model.apy);
    case 'emission-scaled':
      return new EmissionScaledYieldEstimator(model.dailyReturnPerEmission);
    case 'supply-calibrated':
      return new SupplyCalibratedYieldEstimator(model.calibration);
    default: {
      const unreachable: never = model;
      throw new Error(`Unknown yield model: ${JSON.stringify(unreachable)}`);
    }
  }
};
