/**
 * Ranker / Selector
 *
 * Ordered views over IndexRecords and district aggregates. Sorting is stable
 * and fully determined: AFI descending, then state, district and period
 * ascending. Inputs are never reordered in place.
 *
 * @module ranking/ranker
 */

import { compareGeoPeriodKeys, compareText } from '../core/utils/keys.js';
import type {
  DistrictAggregate,
  FrictionClass,
  GeoPeriodKey,
  IndexRecord,
  SignalVector,
  StateAggregate,
} from '../core/types/index.js';

/**
 * AFI descending, then key ascending
 */
export function compareByFriction<T extends Pick<IndexRecord, 'key' | 'afi'>>(a: T, b: T): number {
  if (a.afi !== b.afi) return b.afi - a.afi;
  return compareGeoPeriodKeys(a.key, b.key);
}

/**
 * New array of the records in ranking order
 */
export function rankRecords<T extends Pick<IndexRecord, 'key' | 'afi'>>(records: readonly T[]): T[] {
  return [...records].sort(compareByFriction);
}

/**
 * Full ranked table
 */
export function passThrough(records: readonly IndexRecord[]): IndexRecord[] {
  return rankRecords(records);
}

/**
 * First `n` records of the ranked view; empty for n <= 0
 */
export function topN(records: readonly IndexRecord[], n: number): IndexRecord[] {
  if (n <= 0) return [];
  return rankRecords(records).slice(0, Math.floor(n));
}

/**
 * Highest-friction districts by mean AFI, ties by state then district
 */
export function rankDistricts(
  districts: readonly DistrictAggregate[],
  n: number = districts.length
): DistrictAggregate[] {
  if (n <= 0) return [];
  return [...districts]
    .sort(
      (a, b) =>
        b.afi.mean - a.afi.mean ||
        compareText(a.state, b.state) ||
        compareText(a.district, b.district)
    )
    .slice(0, Math.floor(n));
}

/**
 * States by mean AFI, ties by state name
 */
export function rankStates(
  states: readonly StateAggregate[],
  n: number = states.length
): StateAggregate[] {
  if (n <= 0) return [];
  return [...states]
    .sort((a, b) => b.afi.mean - a.afi.mean || compareText(a.state, b.state))
    .slice(0, Math.floor(n));
}

/**
 * Row of an audit extract
 */
export interface AuditRow extends GeoPeriodKey {
  readonly afi: number;
  readonly signals: SignalVector;
  readonly nationalRank: number;
  readonly frictionClass: FrictionClass;
}

/**
 * Top-N records projected onto the audit columns
 */
export function auditExtract(records: readonly IndexRecord[], n: number): AuditRow[] {
  return topN(records, n).map((record) => ({
    state: record.key.state,
    district: record.key.district,
    period: record.key.period,
    afi: record.afi,
    signals: record.signals,
    nationalRank: record.nationalRank,
    frictionClass: record.frictionClass,
  }));
}
