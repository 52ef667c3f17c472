import { describe, it, expect } from 'vitest';
import { classifyFriction, IndexComposer, validateSignals } from './index-composer.js';
import { competitionRanks, groupedCompetitionRanks, percentileRanks } from './rankings.js';
import { DiagnosticCollector } from '../core/diagnostics.js';
import { isSchemaError } from '../core/errors.js';
import { signalRecord } from '../__tests__/utils/fixtures.js';

const key = (state: string, district: string) => ({ state, district, period: '2024-01' });

describe('IndexComposer', () => {
  // UIS and RIS normalize to 0/50/100; BSS and TSD are flat and land on 50.
  // Raw composites: 22.5, 50, 77.5 -> AFI 0, 50, 100.
  const records = [
    signalRecord(key('S1', 'A'), { UIS: 10, RIS: 0 }),
    signalRecord(key('S1', 'B'), { UIS: 20, RIS: 5 }),
    signalRecord(key('S2', 'C'), { UIS: 30, RIS: 10 }),
  ];

  it('normalizes signals and composes a bounded AFI', () => {
    const { records: composed } = new IndexComposer().compose(records);

    expect(composed.map((r) => r.signals.UIS)).toEqual([0, 50, 100]);
    expect(composed.map((r) => r.signals.BSS)).toEqual([50, 50, 50]);
    expect(composed[0].rawComposite).toBeCloseTo(22.5, 10);
    expect(composed[1].rawComposite).toBeCloseTo(50, 10);
    expect(composed[2].rawComposite).toBeCloseTo(77.5, 10);
    expect(composed[0].afi).toBe(0);
    expect(composed[1].afi).toBeCloseTo(50, 10);
    expect(composed[2].afi).toBeCloseTo(100, 10);
  });

  it('classifies, ranks and keeps the raw signals', () => {
    const { records: composed } = new IndexComposer().compose(records);

    expect(composed.map((r) => r.frictionClass)).toEqual(['Low', 'Medium', 'High']);
    expect(composed.map((r) => r.nationalRank)).toEqual([3, 2, 1]);
    expect(composed.map((r) => r.stateRank)).toEqual([2, 1, 1]);
    expect(composed[2].nationalPercentile).toBeCloseTo(100 / 3, 10);
    expect(composed[0].nationalPercentile).toBe(100);
    expect(composed[1].rawSignals).toEqual({ UIS: 20, RIS: 5, BSS: 0, TSD: 0 });
  });

  it('returns the ranges it normalized with', () => {
    const { ranges } = new IndexComposer().compose(records);

    expect(ranges.signals.UIS).toEqual({ min: 10, max: 30 });
    expect(ranges.signals.RIS).toEqual({ min: 0, max: 10 });
    expect(ranges.signals.BSS).toEqual({ min: 0, max: 0 });
    expect(ranges.composite?.min).toBeCloseTo(22.5, 10);
    expect(ranges.composite?.max).toBeCloseTo(77.5, 10);
  });

  it('reports flat signals as degenerate input', () => {
    const diagnostics = new DiagnosticCollector();
    new IndexComposer().compose(records, diagnostics);

    expect(diagnostics.list().map((d) => d.message)).toEqual([
      'Zero normalization range for BSS; using midpoint 50',
      'Zero normalization range for TSD; using midpoint 50',
    ]);
  });

  it('gives a single record AFI 50', () => {
    const { records: composed } = new IndexComposer().compose([
      signalRecord(key('S1', 'A'), { UIS: 80, RIS: 3, BSS: 9, TSD: 0 }),
    ]);

    expect(composed[0].afi).toBe(50);
    expect(composed[0].frictionClass).toBe('Medium');
    expect(composed[0].nationalRank).toBe(1);
  });

  it('returns nothing for no records', () => {
    const { records: composed, ranges } = new IndexComposer().compose([]);
    expect(composed).toEqual([]);
    expect(ranges.composite).toBeNull();
  });

  it('applies configured class thresholds', () => {
    const composer = new IndexComposer({ classThresholds: { high: 90, medium: 60 } });
    const { records: composed } = composer.compose(records);
    expect(composed.map((r) => r.frictionClass)).toEqual(['Low', 'Low', 'High']);
  });
});

describe('validateSignals', () => {
  it('rejects a non-finite signal', () => {
    try {
      validateSignals([signalRecord(key('S1', 'A'), { UIS: Number.NaN })]);
      expect.unreachable();
    } catch (error) {
      expect(isSchemaError(error)).toBe(true);
      if (isSchemaError(error)) {
        expect(error.details).toEqual({
          table: 'signals',
          reason: 'invalid-value',
          column: 'UIS',
          row: 0,
        });
      }
    }
  });

  it('rejects a negative signal', () => {
    expect(() => validateSignals([signalRecord(key('S1', 'A'), { TSD: -1 })])).toThrow(
      /Signal TSD of S1 \/ A \/ 2024-01/
    );
  });
});

describe('classifyFriction', () => {
  it('uses inclusive lower bounds', () => {
    expect(classifyFriction(70)).toBe('High');
    expect(classifyFriction(69.99)).toBe('Medium');
    expect(classifyFriction(40)).toBe('Medium');
    expect(classifyFriction(39.99)).toBe('Low');
  });
});

describe('rankings', () => {
  it('shares competition ranks between ties', () => {
    expect(competitionRanks([90, 90, 10, 50])).toEqual([1, 1, 4, 3]);
  });

  it('averages percentile positions between ties', () => {
    expect(percentileRanks([90, 90, 10])).toEqual([50, 50, 100]);
    expect(percentileRanks([])).toEqual([]);
  });

  it('ranks within groups', () => {
    expect(groupedCompetitionRanks([10, 80, 50, 20], ['a', 'a', 'b', 'b'])).toEqual([2, 1, 1, 2]);
  });
});
