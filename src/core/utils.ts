import fs from 'fs';
import path from 'path';
import { OptimizerConfig } from './types';
import { parseOptimizerConfig } from './schema';

export const ensureDir = (dir: string) => {
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }
};

export const readJSONFile = (filePath: string): unknown => {
  const raw = fs.readFileSync(filePath, 'utf-8');
  return JSON.parse(raw);
};

export const writeJSONFile = (filePath: string, data: unknown) => {
  ensureDir(path.dirname(filePath));
  fs.writeFileSync(filePath, JSON.stringify(data, null, 2));
};

const envNumber = (env: NodeJS.ProcessEnv, name: string): number | undefined => {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return undefined;
  const parsed = Number(raw);
  if (!Number.isFinite(parsed)) {
    throw new Error(`Invalid numeric value for ${name}: ${raw}`);
  }
  return parsed;
};

/**
 * Reads the JSON config, layers environment overrides on top and validates the
 * result. Relative directories resolve against the process working directory.
 */
export const loadConfig = (configPath: string, env: NodeJS.ProcessEnv = process.env): OptimizerConfig => {
  const raw = readJSONFile(configPath);
  const base = typeof raw === 'object' && raw !== null ? { ...raw } : {};
  const overrides: Record<string, unknown> = {
    initialCapital: envNumber(env, 'OPTIMIZER_INITIAL_CAPITAL'),
    transactionCostBps: envNumber(env, 'OPTIMIZER_COST_BPS'),
    slippageBps: envNumber(env, 'OPTIMIZER_SLIPPAGE_BPS'),
    topN: envNumber(env, 'OPTIMIZER_TOP_N'),
    riskFreeRate: envNumber(env, 'OPTIMIZER_RISK_FREE_RATE'),
    emissionsDir: env.EMISSIONS_DIR || undefined,
    resultsDir: env.RESULTS_DIR || undefined,
    uiPort: envNumber(env, 'UI_PORT'),
    uiBind: env.UI_BIND || undefined
  };
  const merged: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) merged[key] = value;
  }
  const cfg = parseOptimizerConfig(merged);
  return {
    ...cfg,
    emissionsDir: path.resolve(process.cwd(), cfg.emissionsDir),
    resultsDir: path.resolve(process.cwd(), cfg.resultsDir),
    weightScheduleFile: cfg.weightScheduleFile ? path.resolve(process.cwd(), cfg.weightScheduleFile) : undefined
  };
};

export const mulberry32 = (seed: number) => {
  let t = seed + 0x6d2b79f5;
  return () => {
    t += 0x6d2b79f5;
    let r = Math.imul(t ^ (t >>> 15), 1 | t);
    r ^= r + Math.imul(r ^ (r >>> 7), 61 | r);
    return ((r ^ (r >>> 14)) >>> 0) / 4294967296;
  };
};

// FNV-1a, used to derive per-subnet seeds.
export const hashString = (input: string): number => {
  let hash = 0x811c9dc5;
  for (let i = 0; i < input.length; i++) {
    hash ^= input.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193);
  }
  return hash >>> 0;
};

export const sum = (arr: readonly number[]): number => arr.reduce((a, b) => a + b, 0);

export const average = (arr: readonly number[]): number => (arr.length ? sum(arr) / arr.length : 0);

// Sample standard deviation (n - 1). Fewer than two points -> 0.
export const sampleStdDev = (arr: readonly number[]): number => {
  if (arr.length < 2) return 0;
  const mean = average(arr);
  const sq = arr.reduce((acc, v) => acc + (v - mean) ** 2, 0);
  return Math.sqrt(sq / (arr.length - 1));
};

/** Period-over-period change; the first element has no predecessor and is omitted. */
export const pctChange = (values: readonly number[]): number[] => {
  const out: number[] = [];
  for (let i = 1; i < values.length; i++) {
    const prev = values[i - 1];
    out.push(prev !== 0 ? values[i] / prev - 1 : 0);
  }
  return out;
};

export const compareSubnetIds = (a: string, b: string): number => {
  const na = Number(a);
  const nb = Number(b);
  const aNumeric = a.trim() !== '' && Number.isFinite(na);
  const bNumeric = b.trim() !== '' && Number.isFinite(nb);
  if (aNumeric && bNumeric) return na - nb;
  if (aNumeric) return -1;
  if (bNumeric) return 1;
  return a < b ? -1 : a > b ? 1 : 0;
};
