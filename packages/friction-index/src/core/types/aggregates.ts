/**
 * Aggregate Types
 *
 * Read-only rollups over IndexRecords. They are recomputed from the current
 * run's records and never edited.
 */

import type { FrictionClass, SignalName } from './signals.js';

/**
 * Central tendency and peak of a value across a group
 */
export interface SummaryStats {
  readonly mean: number;
  readonly median: number;
  readonly max: number;
}

/**
 * All periods of one (state, district)
 */
export interface DistrictAggregate {
  readonly state: string;
  readonly district: string;
  readonly count: number;
  /** Periods observed, ascending */
  readonly periods: readonly string[];
  readonly totalUpdates: number;
  readonly totalEnrolments: number;
  readonly afi: SummaryStats;
  readonly signals: Readonly<Record<SignalName, SummaryStats>>;
  /** Class of the mean AFI */
  readonly frictionClass: FrictionClass;
  /** Signal with the highest mean normalized value */
  readonly dominantSignal: SignalName;
}

/**
 * All district rows of one state
 */
export interface StateAggregate {
  readonly state: string;
  /** Sum of the district counts */
  readonly count: number;
  readonly districts: number;
  readonly totalUpdates: number;
  readonly totalEnrolments: number;
  readonly afi: SummaryStats;
  readonly signals: Readonly<Record<SignalName, SummaryStats>>;
  readonly frictionClass: FrictionClass;
}

/**
 * All geography rows reporting in one period
 */
export interface MonthAggregate {
  readonly period: string;
  readonly meanAfi: number;
  readonly medianAfi: number;
  readonly districtsReporting: number;
  readonly totalUpdates: number;
  readonly totalEnrolments: number;
  /** Update volume per enrolment; 0 when the month has no enrolments */
  readonly updateToEnrolmentRatio: number;
}
