/**
 * Observation Types
 *
 * Input rows of the three administrative datasets. Field names follow the
 * column names of the upstream tables, so they stay snake_case here.
 */

import type { GeoPeriodKey } from './geo.js';

/**
 * Biometric-update events for one geography-period
 */
export interface BiometricObservation extends GeoPeriodKey {
  readonly biometric_update_count: number;
  readonly biometric_failure_count: number;
  readonly biometric_retry_count: number;
}

/**
 * Demographic-update events for one geography-period
 */
export interface DemographicObservation extends GeoPeriodKey {
  readonly demographic_update_count: number;
  readonly address_updates: number;
  readonly name_updates: number;
  readonly dob_updates: number;
}

/**
 * Enrolment events for one geography-period
 */
export interface EnrolmentObservation extends GeoPeriodKey {
  readonly enrolment_count: number;
}

/**
 * Input table names, used in error reports and join provenance
 */
export type ObservationTable = 'biometric' | 'demographic' | 'enrolment';

/**
 * The three input tables of a run
 */
export interface ObservationTables {
  readonly biometric: readonly BiometricObservation[];
  readonly demographic: readonly DemographicObservation[];
  readonly enrolment: readonly EnrolmentObservation[];
}

/**
 * One row per key present in at least one input table.
 *
 * Counts from a table with no row for the key are 0; `sources` lists the
 * tables that did contribute a row.
 */
export interface JoinedObservation {
  readonly key: GeoPeriodKey;
  readonly sources: readonly ObservationTable[];
  readonly biometricUpdates: number;
  readonly biometricFailures: number;
  readonly biometricRetries: number;
  readonly demographicUpdates: number;
  readonly addressUpdates: number;
  readonly nameUpdates: number;
  readonly dobUpdates: number;
  readonly enrolments: number;
}
