/**
 * Geography-period keys
 *
 * Every table in a run is keyed by (state, district, period). `period` is a
 * `YYYY-MM` token that is only ever compared lexicographically.
 */

/**
 * Composite key of a single geography-period
 */
export interface GeoPeriodKey {
  readonly state: string;
  readonly district: string;
  /** `YYYY-MM` */
  readonly period: string;
}

/**
 * Key of a district across all of its periods
 */
export type DistrictKey = Pick<GeoPeriodKey, 'state' | 'district'>;
