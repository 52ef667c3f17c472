import { describe, it, expect } from 'vitest';
import { runFrictionPipeline } from './friction-pipeline.js';
import { ConfigError, SchemaError } from '../core/errors.js';
import { rankRecords } from '../ranking/ranker.js';
import { biometricRow, demographicRow, enrolmentRow } from '../__tests__/utils/fixtures.js';
import type { RawObservationTables } from '../validation/schemas.js';
import type {
  BiometricObservation,
  DemographicObservation,
  EnrolmentObservation,
} from '../core/types/index.js';

const STATES = ['Assam', 'Bihar'];
const DISTRICTS = ['North', 'South'];
const PERIODS = ['2024-01', '2024-02', '2024-03'];

function buildTables(): RawObservationTables {
  const biometric: BiometricObservation[] = [];
  const demographic: DemographicObservation[] = [];
  const enrolment: EnrolmentObservation[] = [];
  let i = 0;
  for (const state of STATES) {
    for (const district of DISTRICTS) {
      for (const period of PERIODS) {
        i++;
        const key = { state, district, period };
        biometric.push(
          biometricRow(key, {
            biometric_update_count: 100 + ((i * 37) % 90),
            biometric_failure_count: (i * 7) % 25,
            biometric_retry_count: (i * 3) % 11,
          })
        );
        demographic.push(demographicRow(key, { demographic_update_count: 40 + ((i * 13) % 60) }));
        enrolment.push(enrolmentRow(key, 50 + ((i * 29) % 120)));
      }
    }
  }
  return { biometric, demographic, enrolment };
}

describe('runFrictionPipeline', () => {
  const tables = buildTables();
  const result = runFrictionPipeline(tables);

  it('produces one bounded index record per key, sorted by key', () => {
    expect(result.indexRecords).toHaveLength(12);
    expect(result.indexRecords[0].key).toEqual({ state: 'Assam', district: 'North', period: '2024-01' });
    expect(result.indexRecords[11].key).toEqual({ state: 'Bihar', district: 'South', period: '2024-03' });

    const afi = result.indexRecords.map((r) => r.afi);
    for (const value of afi) {
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThanOrEqual(100);
    }
    expect(Math.min(...afi)).toBe(0);
    expect(Math.max(...afi)).toBeCloseTo(100, 10);
  });

  it('keeps rollups consistent with the records', () => {
    expect(result.districts).toHaveLength(4);
    expect(result.states.map((s) => s.count)).toEqual([6, 6]);
    expect(result.months.map((m) => m.districtsReporting)).toEqual([4, 4, 4]);
  });

  it('ranks the top records and districts', () => {
    expect(result.topRecords).toEqual(rankRecords(result.indexRecords));
    expect(result.topDistricts).toHaveLength(4);
    expect(result.topRecords[0].nationalRank).toBe(1);
  });

  it('flags hidden risk only against its own thresholds', () => {
    const { thresholds, records } = result.hiddenRisk;
    expect(thresholds?.population).toBe(12);
    for (const record of records) {
      expect(record.thresholds).toEqual(thresholds);
      expect(record.volumes.totalUpdates).toBeLessThan(record.thresholds.medianTotalUpdates);
      expect(record.afi).toBeGreaterThan(record.thresholds.p75Afi);
    }
  });

  it('is deterministic', () => {
    expect(runFrictionPipeline(buildTables())).toEqual(result);
  });

  it('applies configured sizes', () => {
    const small = runFrictionPipeline(tables, { topN: 3, topDistricts: 1 });
    expect(small.topRecords).toHaveLength(3);
    expect(small.topDistricts).toHaveLength(1);
  });

  it('rejects invalid weights before reading any table', () => {
    const malformed: RawObservationTables = { biometric: [{}], demographic: [], enrolment: [] };
    expect(() =>
      runFrictionPipeline(malformed, { weights: { UIS: 0.3, RIS: 0.25, BSS: 0.25, TSD: 0.19 } })
    ).toThrow(ConfigError);
  });

  it('rejects a malformed table', () => {
    const malformed: RawObservationTables = {
      ...tables,
      enrolment: [{ state: 'Assam', district: 'North', period: '2024-01' }],
    };
    expect(() => runFrictionPipeline(malformed)).toThrow(SchemaError);
  });

  it('degrades to AFI 50 and an empty hidden-risk result for a single record', () => {
    const key = { state: 'Assam', district: 'North', period: '2024-01' };
    const single = runFrictionPipeline({
      biometric: [biometricRow(key, { biometric_update_count: 5 })],
      demographic: [],
      enrolment: [enrolmentRow(key, 5)],
    });

    expect(single.indexRecords[0].afi).toBe(50);
    expect(single.hiddenRisk).toEqual({ thresholds: null, records: [] });
    expect(single.diagnostics.map((d) => d.code)).toContain('EMPTY_RESULT');
    expect(single.diagnostics[0]).toEqual(
      expect.objectContaining({ code: 'DEGENERATE_INPUT', message: 'demographic table has no rows' })
    );
  });
});
