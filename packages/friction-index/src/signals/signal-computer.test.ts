import { describe, it, expect } from 'vitest';
import {
  computeRatioSignals,
  computeSignals,
  computeVolumes,
  provisionalWeights,
  ratioPercent,
} from './signal-computer.js';
import { DEFAULT_WEIGHTS } from '../core/config.js';
import { biometricRow, enrolmentRow } from '../__tests__/utils/fixtures.js';

describe('ratioPercent', () => {
  it('returns 0 for a zero denominator', () => {
    expect(ratioPercent(0, 0)).toBe(0);
    expect(ratioPercent(5, 0)).toBe(0);
  });

  it('returns the percentage otherwise', () => {
    expect(ratioPercent(1, 4)).toBe(25);
  });
});

describe('computeVolumes and computeRatioSignals', () => {
  it('derives UIS, RIS and BSS from joined counts', () => {
    const volumes = computeVolumes({
      key: { state: 'S', district: 'D', period: '2024-01' },
      sources: ['biometric', 'demographic', 'enrolment'],
      biometricUpdates: 80,
      biometricFailures: 20,
      biometricRetries: 10,
      demographicUpdates: 20,
      addressUpdates: 10,
      nameUpdates: 5,
      dobUpdates: 5,
      enrolments: 100,
    });

    expect(volumes).toEqual({
      totalUpdates: 100,
      totalRecords: 200,
      failedResolutions: 10,
      totalAttempts: 110,
      biometricFailures: 20,
      biometricAttempts: 100,
      enrolments: 100,
    });

    const signals = computeRatioSignals(volumes);
    expect(signals.UIS).toBe(50);
    expect(signals.RIS).toBeCloseTo((10 / 110) * 100, 12);
    expect(signals.BSS).toBe(20);
  });
});

describe('provisionalWeights', () => {
  it('rescales the UIS, RIS and BSS weights to sum to 1', () => {
    const scale = provisionalWeights(DEFAULT_WEIGHTS);
    expect(scale.UIS).toBeCloseTo(0.375, 12);
    expect(scale.RIS).toBeCloseTo(0.3125, 12);
    expect(scale.BSS).toBeCloseTo(0.3125, 12);
  });

  it('falls back to equal thirds when TSD carries all the weight', () => {
    expect(provisionalWeights({ UIS: 0, RIS: 0, BSS: 0, TSD: 1 })).toEqual({
      UIS: 1 / 3,
      RIS: 1 / 3,
      BSS: 1 / 3,
    });
  });
});

describe('computeSignals', () => {
  const D1_JAN = { state: 'S', district: 'D1', period: '2024-01' };
  const D1_FEB = { state: 'S', district: 'D1', period: '2024-02' };
  const D2_JAN = { state: 'S', district: 'D2', period: '2024-01' };

  it('yields 0, never NaN, for a key with no activity', () => {
    const [record] = computeSignals(
      { biometric: [], demographic: [], enrolment: [enrolmentRow(D2_JAN, 0)] },
      { weights: DEFAULT_WEIGHTS }
    );
    expect(record.signals).toEqual({ UIS: 0, RIS: 0, BSS: 0, TSD: 0 });
  });

  it('computes TSD per district from the provisional composite', () => {
    // UIS: D1 Jan 50, D1 Feb 100, D2 Jan 0; RIS and BSS are 0 everywhere,
    // so they normalize to 50. Provisional composites: 50, 68.75, 31.25.
    const records = computeSignals(
      {
        biometric: [
          biometricRow(D1_JAN, { biometric_update_count: 50 }),
          biometricRow(D1_FEB, { biometric_update_count: 100 }),
        ],
        demographic: [],
        enrolment: [enrolmentRow(D1_JAN, 50), enrolmentRow(D2_JAN, 100)],
      },
      { weights: DEFAULT_WEIGHTS }
    );

    expect(records.map((r) => r.key)).toEqual([D1_JAN, D1_FEB, D2_JAN]);
    expect(records.map((r) => r.signals.UIS)).toEqual([50, 100, 0]);

    const expectedTsd = 18.75 / Math.SQRT2;
    expect(records[0].signals.TSD).toBeCloseTo(expectedTsd, 10);
    expect(records[1].signals.TSD).toBe(records[0].signals.TSD);
    expect(records[2].signals.TSD).toBe(0);
  });
});
