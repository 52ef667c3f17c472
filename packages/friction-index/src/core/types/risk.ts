/**
 * Hidden Risk Types
 */

import type { IndexRecord } from './signals.js';

/**
 * Data-dependent cut-offs used by one detection run.
 *
 * Persisted with every flagged record so a flag can be audited without
 * recomputing against later data.
 */
export interface HiddenRiskThresholds {
  /** Median of totalUpdates over all records of the run */
  readonly medianTotalUpdates: number;
  /** 75th percentile of AFI over all records of the run */
  readonly p75Afi: number;
  /** Number of records the thresholds were computed over */
  readonly population: number;
}

/**
 * Low-volume, high-friction geography-period
 */
export interface HiddenRiskRecord extends IndexRecord {
  readonly thresholds: HiddenRiskThresholds;
}

/**
 * Output of a detection run
 */
export interface HiddenRiskResult {
  /** null when the detector skipped (fewer than 2 records) */
  readonly thresholds: HiddenRiskThresholds | null;
  readonly records: readonly HiddenRiskRecord[];
}
