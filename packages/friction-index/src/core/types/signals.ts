/**
 * Signal and Index Record Types
 */

import type { GeoPeriodKey } from './geo.js';

/**
 * The four component signals of the friction index
 *
 * - UIS: update intensity
 * - RIS: repeat/resolution issues
 * - BSS: biometric stress
 * - TSD: temporal deviation
 */
export type SignalName = 'UIS' | 'RIS' | 'BSS' | 'TSD';

/**
 * One value per component signal
 */
export type SignalVector = Readonly<Record<SignalName, number>>;

/**
 * Friction class buckets derived from AFI
 */
export type FrictionClass = 'Low' | 'Medium' | 'High';

/**
 * Activity volumes behind the signal ratios of one geography-period
 */
export interface SignalVolumes {
  readonly totalUpdates: number;
  readonly totalRecords: number;
  readonly failedResolutions: number;
  readonly totalAttempts: number;
  readonly biometricFailures: number;
  readonly biometricAttempts: number;
  readonly enrolments: number;
}

/**
 * Raw (pre-normalization) signals for one geography-period
 */
export interface SignalRecord {
  readonly key: GeoPeriodKey;
  readonly volumes: SignalVolumes;
  readonly signals: SignalVector;
}

/**
 * Fully composed index entry for one geography-period
 */
export interface IndexRecord {
  readonly key: GeoPeriodKey;
  readonly volumes: SignalVolumes;
  /** Signals as computed, before rescaling */
  readonly rawSignals: SignalVector;
  /** Signals rescaled into [0, 100] over the whole run */
  readonly signals: SignalVector;
  /** Weighted sum of the normalized signals */
  readonly rawComposite: number;
  /** Aadhaar Friction Index, in [0, 100] */
  readonly afi: number;
  readonly frictionClass: FrictionClass;
  /** 1 = highest AFI; ties share the lowest rank */
  readonly nationalRank: number;
  /** Rank within the record's state */
  readonly stateRank: number;
  /** Percentile rank by AFI descending (average ties), 0-100 */
  readonly nationalPercentile: number;
}
