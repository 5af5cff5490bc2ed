import fs from 'fs';
import os from 'os';
import path from 'path';
import { WeightSchedule, loadWeightSchedule } from '../src/schedule/weightSchedule';

const at = (iso: string) => Date.parse(iso);

describe('WeightSchedule', () => {
  const schedule = new WeightSchedule([
    { effectiveDate: '2025-02-01T00:00:00Z', weights: { B: 1 } },
    { effectiveDate: '2025-01-01T00:00:00Z', weights: { A: 3, B: 1 } }
  ]);

  it('returns nothing before the first effective date', () => {
    expect(schedule.weightsAt(at('2024-12-31T23:00:00Z'))).toEqual({});
    expect(schedule.entryAt(at('2024-12-31T23:00:00Z'))).toBeUndefined();
  });

  it('applies the latest entry effective at the instant', () => {
    expect(schedule.weightsAt(at('2025-01-01T00:00:00Z'))).toEqual({ A: 0.75, B: 0.25 });
    expect(schedule.weightsAt(at('2025-01-31T23:59:59Z'))).toEqual({ A: 0.75, B: 0.25 });
    expect(schedule.weightsAt(at('2025-02-01T00:00:00Z'))).toEqual({ B: 1 });
    expect(schedule.weightsAt(at('2026-01-01T00:00:00Z'))).toEqual({ B: 1 });
    expect(schedule.size).toBe(2);
  });

  it('hands out copies of its weights', () => {
    const w = schedule.weightsAt(at('2025-03-01T00:00:00Z'));
    w.B = 0;
    expect(schedule.weightsAt(at('2025-03-01T00:00:00Z'))).toEqual({ B: 1 });
  });

  it('drops zero weights and treats an all-zero entry as empty', () => {
    const s = new WeightSchedule([
      { effectiveDate: '2025-01-01T00:00:00Z', weights: { A: 1, B: 0 } },
      { effectiveDate: '2025-01-02T00:00:00Z', weights: { A: 0 } }
    ]);
    expect(s.weightsAt(at('2025-01-01T12:00:00Z'))).toEqual({ A: 1 });
    expect(s.weightsAt(at('2025-01-02T12:00:00Z'))).toEqual({});
  });

  it('rejects repeated and unparseable dates', () => {
    expect(
      () =>
        new WeightSchedule([
          { effectiveDate: '2025-01-01T00:00:00Z', weights: { A: 1 } },
          { effectiveDate: '2025-01-01T00:00:00.000Z', weights: { B: 1 } }
        ])
    ).toThrow(/Duplicate schedule date/);
    expect(() => new WeightSchedule([{ effectiveDate: 'soon', weights: { A: 1 } }])).toThrow(/Invalid schedule date: soon/);
  });
});

describe('loadWeightSchedule', () => {
  it('reads the bundled example', () => {
    const s = loadWeightSchedule(path.resolve(__dirname, '../src/config/weightSchedule.example.json'));
    expect(s.size).toBe(3);
    expect(s.weightsAt(at('2025-07-20T00:00:00Z'))['64']).toBeCloseTo(0.3, 12);
  });

  it('rejects a malformed file', () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'schedule-'));
    const file = path.join(dir, 'bad.json');
    fs.writeFileSync(file, JSON.stringify([{ effectiveDate: '2025-01-01', weights: { A: -1 } }]));
    expect(() => loadWeightSchedule(file)).toThrow(/Invalid weight schedule/);
    fs.rmSync(dir, { recursive: true, force: true });
  });
});
