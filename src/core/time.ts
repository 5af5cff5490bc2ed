export const HOURS_PER_YEAR = 365 * 24;
const MS_PER_DAY = 86_400_000;

export const parseTimestamp = (value: string): number | undefined => {
  const ms = Date.parse(value);
  return Number.isNaN(ms) ? undefined : ms;
};

export const toISOTimestamp = (ms: number): string => new Date(ms).toISOString();

// Whole days between two instants, truncated toward zero.
export const elapsedWholeDays = (fromMs: number, toMs: number): number => Math.trunc((toMs - fromMs) / MS_PER_DAY);

export const addHours = (iso: string, hours: number): string => {
  const ms = parseTimestamp(iso);
  if (ms === undefined) {
    throw new Error(`Invalid timestamp: ${iso}`);
  }
  return toISOTimestamp(ms + hours * 3_600_000);
};
