/**
 * Aggregator
 *
 * Three independent group-by-reduce rollups over IndexRecords:
 *
 * - by district: all periods sharing (state, district)
 * - by state:    all district rows sharing state
 * - by month:    all rows sharing period
 *
 * Rollups are recomputed from the records they are given and never edited.
 * For every state, the district counts sum to the state count.
 *
 * @module aggregation/aggregator
 */

import { DEFAULT_CONFIG, type ClassThresholds } from '../core/config.js';
import { SIGNAL_NAMES } from '../core/constants.js';
import { compareText, districtId, groupBy } from '../core/utils/keys.js';
import { max, mean, median, sum } from '../core/utils/stats.js';
import { classifyFriction } from '../composition/index-composer.js';
import type {
  DistrictAggregate,
  IndexRecord,
  MonthAggregate,
  SignalName,
  StateAggregate,
  SummaryStats,
} from '../core/types/index.js';

export function summarize(values: readonly number[]): SummaryStats {
  return { mean: mean(values), median: median(values), max: max(values) };
}

function signalSummaries(
  records: readonly IndexRecord[]
): Readonly<Record<SignalName, SummaryStats>> {
  const column = (name: SignalName) => summarize(records.map((r) => r.signals[name]));
  return {
    UIS: column('UIS'),
    RIS: column('RIS'),
    BSS: column('BSS'),
    TSD: column('TSD'),
  };
}

/**
 * Signal with the highest mean; earlier signals win ties
 */
export function dominantSignal(signals: Readonly<Record<SignalName, SummaryStats>>): SignalName {
  let best: SignalName = SIGNAL_NAMES[0];
  for (const name of SIGNAL_NAMES) {
    if (signals[name].mean > signals[best].mean) best = name;
  }
  return best;
}

// ============================================================================
// District
// ============================================================================

/**
 * Roll records up per (state, district), sorted by state then district
 */
export function aggregateByDistrict(
  records: readonly IndexRecord[],
  thresholds: ClassThresholds = DEFAULT_CONFIG.classThresholds
): DistrictAggregate[] {
  const groups = groupBy(records, (r) => districtId(r.key));

  const districts: DistrictAggregate[] = [];
  for (const group of groups.values()) {
    const { state, district } = group[0].key;
    const afi = summarize(group.map((r) => r.afi));
    const signals = signalSummaries(group);

    districts.push({
      state,
      district,
      count: group.length,
      periods: group.map((r) => r.key.period).sort(compareText),
      totalUpdates: sum(group.map((r) => r.volumes.totalUpdates)),
      totalEnrolments: sum(group.map((r) => r.volumes.enrolments)),
      afi,
      signals,
      frictionClass: classifyFriction(afi.mean, thresholds),
      dominantSignal: dominantSignal(signals),
    });
  }

  return districts.sort(
    (a, b) => compareText(a.state, b.state) || compareText(a.district, b.district)
  );
}

// ============================================================================
// State
// ============================================================================

/**
 * Roll district rows up per state, sorted by state.
 *
 * Counts and volumes are summed over the district rows; AFI and signal
 * statistics are taken over the underlying records of the state.
 */
export function aggregateByState(
  districts: readonly DistrictAggregate[],
  records: readonly IndexRecord[],
  thresholds: ClassThresholds = DEFAULT_CONFIG.classThresholds
): StateAggregate[] {
  const recordsByState = groupBy(records, (r) => r.key.state);
  const districtsByState = groupBy(districts, (d) => d.state);

  const states: StateAggregate[] = [];
  for (const [state, rows] of districtsByState) {
    const stateRecords = recordsByState.get(state) ?? [];
    const afi = summarize(stateRecords.map((r) => r.afi));

    states.push({
      state,
      count: sum(rows.map((d) => d.count)),
      districts: rows.length,
      totalUpdates: sum(rows.map((d) => d.totalUpdates)),
      totalEnrolments: sum(rows.map((d) => d.totalEnrolments)),
      afi,
      signals: signalSummaries(stateRecords),
      frictionClass: classifyFriction(afi.mean, thresholds),
    });
  }

  return states.sort((a, b) => compareText(a.state, b.state));
}

// ============================================================================
// Month
// ============================================================================

/**
 * Roll records up per period, sorted by period.
 *
 * The update-to-enrolment ratio feeds lifecycle-imbalance reporting.
 */
export function aggregateByMonth(records: readonly IndexRecord[]): MonthAggregate[] {
  const groups = groupBy(records, (r) => r.key.period);

  const months: MonthAggregate[] = [];
  for (const [period, group] of groups) {
    const afiValues = group.map((r) => r.afi);
    const totalUpdates = sum(group.map((r) => r.volumes.totalUpdates));
    const totalEnrolments = sum(group.map((r) => r.volumes.enrolments));

    months.push({
      period,
      meanAfi: mean(afiValues),
      medianAfi: median(afiValues),
      districtsReporting: new Set(group.map((r) => districtId(r.key))).size,
      totalUpdates,
      totalEnrolments,
      updateToEnrolmentRatio: totalEnrolments > 0 ? totalUpdates / totalEnrolments : 0,
    });
  }

  return months.sort((a, b) => compareText(a.period, b.period));
}

/**
 * All three rollups of a run
 */
export interface Aggregates {
  readonly districts: readonly DistrictAggregate[];
  readonly states: readonly StateAggregate[];
  readonly months: readonly MonthAggregate[];
}

export function aggregate(
  records: readonly IndexRecord[],
  thresholds: ClassThresholds = DEFAULT_CONFIG.classThresholds
): Aggregates {
  const districts = aggregateByDistrict(records, thresholds);
  return {
    districts,
    states: aggregateByState(districts, records, thresholds),
    months: aggregateByMonth(records),
  };
}
