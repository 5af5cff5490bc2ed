import fs from 'fs';
import path from 'path';
import { DataQualityFlag, EmissionSnapshot } from '../core/types';
import { emissionFileSchema, emissionSampleSchema } from '../core/schema';
import { parseTimestamp, toISOTimestamp } from '../core/time';

export const EMISSION_FILE_PATTERN = /^emissions_v2_.*\.json$/;

export interface LoadedSnapshots {
  snapshots: EmissionSnapshot[];
  files: string[];
  flags: DataQualityFlag[];
}

const parseFile = (filePath: string, flags: DataQualityFlag[]): EmissionSnapshot[] => {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (err) {
    flags.push({
      code: 'EMISSION_FILE_UNREADABLE',
      severity: 'warn',
      message: `Skipping ${path.basename(filePath)}: ${err instanceof Error ? err.message : String(err)}`
    });
    return [];
  }
  const file = emissionFileSchema.safeParse(raw);
  if (!file.success) {
    flags.push({
      code: 'EMISSION_FILE_NO_SAMPLES',
      severity: 'warn',
      message: `Skipping ${path.basename(filePath)}: no samples array`
    });
    return [];
  }

  const out: EmissionSnapshot[] = [];
  let rejected = 0;
  for (const sample of file.data.samples) {
    const parsed = emissionSampleSchema.safeParse(sample);
    if (!parsed.success) {
      rejected += 1;
      continue;
    }
    const ms = parseTimestamp(parsed.data.block_timestamp_utc);
    if (ms === undefined) {
      rejected += 1;
      continue;
    }
    out.push({
      timestamp: toISOTimestamp(ms),
      block: parsed.data.closest_block,
      emissions: parsed.data.emissions,
      ...(parsed.data.supplies ? { supplies: parsed.data.supplies } : {})
    });
  }
  if (rejected > 0) {
    flags.push({
      code: 'EMISSION_SAMPLES_REJECTED',
      severity: 'warn',
      message: `${rejected} malformed sample(s) dropped from ${path.basename(filePath)}`,
      observed: { rejected }
    });
  }
  return out;
};

/**
 * Reads collected `emissions_v2_*.json` files, orders the samples by timestamp
 * and keeps the last sample seen for any repeated timestamp.
 */
export const loadEmissionSnapshots = (dir: string): LoadedSnapshots => {
  const flags: DataQualityFlag[] = [];
  if (!fs.existsSync(dir)) {
    return {
      snapshots: [],
      files: [],
      flags: [{ code: 'EMISSIONS_DIR_MISSING', severity: 'error', message: `Emissions directory not found: ${dir}` }]
    };
  }
  const files = fs
    .readdirSync(dir)
    .filter((name) => EMISSION_FILE_PATTERN.test(name))
    .sort()
    .map((name) => path.join(dir, name));

  const byTimestamp = new Map<string, EmissionSnapshot>();
  let duplicates = 0;
  for (const file of files) {
    for (const snapshot of parseFile(file, flags)) {
      if (byTimestamp.has(snapshot.timestamp)) duplicates += 1;
      byTimestamp.set(snapshot.timestamp, snapshot);
    }
  }
  if (duplicates > 0) {
    flags.push({
      code: 'DUPLICATE_SNAPSHOT_TIMESTAMPS',
      severity: 'info',
      message: `${duplicates} repeated timestamp(s) collapsed; last sample kept`,
      observed: { duplicates }
    });
  }

  const snapshots = Array.from(byTimestamp.values()).sort((a, b) => Date.parse(a.timestamp) - Date.parse(b.timestamp));
  return { snapshots, files, flags };
};
