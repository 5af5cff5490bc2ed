export type SubnetId = string;

export interface EmissionSnapshot {
  timestamp: string; // ISO-8601 UTC
  block: number;
  emissions: Record<SubnetId, number>;
  supplies?: Record<SubnetId, number>;
}

export interface SnapshotTable {
  readonly snapshots: readonly EmissionSnapshot[];
  readonly timestampsMs: readonly number[];
  readonly subnetIds: readonly SubnetId[];
  readonly prices: Readonly<Record<SubnetId, readonly number[]>>;
  readonly flags: readonly DataQualityFlag[];
}

export type TargetWeights = Record<SubnetId, number>;

export type DataQualitySeverity = 'info' | 'warn' | 'error';

export interface DataQualityFlag {
  code: string;
  severity: DataQualitySeverity;
  message: string;
  symbols?: string[];
  observed?: Record<string, unknown> | string | number | string[];
}

export interface CadenceSpec {
  label: string;
  hours: number; // 0 = continuous benchmark
}

export interface NavPoint {
  timestamp: string;
  nav: number;
  cash: number;
}

export interface SimulationResult {
  cadence: CadenceSpec;
  navHistory: NavPoint[];
  finalNav: number;
  totalReturn: number;
  annualizedReturn: number;
  annualizedVolatility: number;
  sharpeRatio: number;
  maxDrawdown: number;
  rebalanceCount: number;
  totalTransactionCost: number;
  transactionCostPct: number;
  trackingError: number;
  days: number;
  flags: DataQualityFlag[];
}

export interface PriceModelConfig {
  dampingFactor: number;
  clipBound: number;
  basePrice: number;
}

export type YieldModelConfig =
  | { kind: 'zero' }
  | { kind: 'constant'; apy: number }
  | { kind: 'emission-scaled'; dailyReturnPerEmission?: number }
  | { kind: 'supply-calibrated'; calibration?: Array<{ supply: number; stakedRatio: number }> };

export interface OptimizerConfig {
  initialCapital: number;
  transactionCostBps: number;
  slippageBps: number;
  topN: number;
  riskFreeRate: number;
  cadences: Record<string, number>;
  priceModel: PriceModelConfig;
  minTradeValue: number;
  dustQuantity: number;
  yieldModel: YieldModelConfig;
  maxConcurrency: number;
  emissionsDir: string;
  resultsDir: string;
  weightScheduleFile?: string;
  uiPort: number;
  uiBind: string;
}

export interface ComparisonRow {
  frequency: string;
  cadenceHours: number;
  totalReturnPct: number;
  annualizedReturnPct: number;
  volatilityPct: number;
  sharpeRatio: number;
  maxDrawdownPct: number;
  rebalances: number;
  transactionCosts: number;
  transactionCostsPct: number;
  trackingErrorPct: number;
  finalNav: number;
  days: number;
}

export interface ExcludedCadence {
  cadence: CadenceSpec;
  reason: string;
}

export interface ComparisonReport {
  rows: ComparisonRow[];
  recommended?: ComparisonRow;
  results: Record<string, SimulationResult>;
  excluded: ExcludedCadence[];
  flags: DataQualityFlag[];
}
